import { ConfigurationError } from '../types/api';
import type { AppConfig, DistanceMetric } from '../types';
import { DEFAULT_PROMPT_TEMPLATE, DEFAULT_SYSTEM_PROMPT } from './prompts';

type Env = Record<string, string | undefined>;

export class Config implements AppConfig {
  public readonly yandex: AppConfig['yandex'];
  public readonly rag: AppConfig['rag'];
  public readonly index: AppConfig['index'];
  public readonly server: AppConfig['server'];

  private constructor(env: Env) {
    this.yandex = Object.freeze({
      apiKey: env.YANDEX_API_KEY || '',
      folderId: env.YANDEX_FOLDER_ID || '',
      baseUrl: (env.YANDEX_API_BASE_URL || 'https://llm.api.cloud.yandex.net/foundationModels/v1').replace(/\/+$/, ''),
      chatModel: env.YANDEX_GPT_MODEL || 'yandexgpt-lite',
      embedModel: env.YANDEX_EMBED_MODEL || 'text-search-doc',
      defaultEmbeddingDimension: parseInt(env.EMBEDDING_DIMENSION || '256'),
      maxEmbeddingChars: parseInt(env.EMBEDDING_MAX_CHARS || '10000'),
      requestTimeoutMs: parseInt(env.REQUEST_TIMEOUT_MS || '30000')
    });

    this.rag = Object.freeze({
      topK: parseInt(env.RAG_TOP_K || '3'),
      maxContextLength: parseInt(env.RAG_MAX_CONTEXT_LENGTH || '3000'),
      maxHistoryPairs: parseInt(env.RAG_MAX_HISTORY_PAIRS || '10'),
      temperature: parseFloat(env.RAG_TEMPERATURE || '0.7'),
      maxTokens: parseInt(env.RAG_MAX_TOKENS || '1000'),
      systemPrompt: env.RAG_SYSTEM_PROMPT || DEFAULT_SYSTEM_PROMPT,
      promptTemplate: env.RAG_PROMPT_TEMPLATE || DEFAULT_PROMPT_TEMPLATE,
      includeSourceLabels: (env.RAG_INCLUDE_SOURCE_LABELS || 'true') === 'true',
      degradeOnEmbeddingFailure: env.RAG_DEGRADE_ON_EMBEDDING_FAILURE === 'true',
      chunkSize: parseInt(env.RAG_CHUNK_SIZE || '1000'),
      chunkOverlap: parseInt(env.RAG_CHUNK_OVERLAP || '200'),
      documentsPath: env.DOCUMENTS_PATH || './data/docs',
      embeddingCacheTtl: parseInt(env.EMBEDDING_CACHE_TTL || '3600')
    });

    this.index = Object.freeze({
      vectorsPath: env.VECTOR_INDEX_PATH || './data/index.vec',
      metadataPath: env.VECTOR_METADATA_PATH || './data/metadata.json',
      metric: parseMetric(env.VECTOR_METRIC || 'l2')
    });

    this.server = Object.freeze({
      port: parseInt(env.PORT || '3001'),
      host: env.HOST || 'localhost',
      corsOrigin: env.CORS_ORIGIN || 'http://localhost:3000'
    });

    Object.freeze(this);
  }

  /**
   * Build the configuration from environment variables. Nothing is read from
   * the environment after this call.
   */
  public static fromEnv(env: Env = process.env): Config {
    return new Config(env);
  }

  public validate(): void {
    if (!this.yandex.apiKey || !this.yandex.folderId) {
      throw new ConfigurationError('YANDEX_API_KEY and YANDEX_FOLDER_ID must be set');
    }

    // Validate numeric settings
    requirePositive('EMBEDDING_DIMENSION', this.yandex.defaultEmbeddingDimension);
    requirePositive('EMBEDDING_MAX_CHARS', this.yandex.maxEmbeddingChars);
    requirePositive('REQUEST_TIMEOUT_MS', this.yandex.requestTimeoutMs);
    requirePositive('RAG_TOP_K', this.rag.topK);
    requirePositive('RAG_MAX_CONTEXT_LENGTH', this.rag.maxContextLength);
    requirePositive('RAG_MAX_TOKENS', this.rag.maxTokens);
    requirePositive('RAG_CHUNK_SIZE', this.rag.chunkSize);

    if (!(this.rag.maxHistoryPairs >= 0)) {
      throw new ConfigurationError('RAG_MAX_HISTORY_PAIRS must not be negative');
    }
    if (!(this.rag.temperature >= 0 && this.rag.temperature <= 1)) {
      throw new ConfigurationError('RAG_TEMPERATURE must be between 0 and 1');
    }
    if (!(this.rag.chunkOverlap >= 0) || this.rag.chunkOverlap >= this.rag.chunkSize) {
      throw new ConfigurationError('RAG_CHUNK_OVERLAP must be less than RAG_CHUNK_SIZE');
    }
    if (!(this.rag.embeddingCacheTtl >= 0)) {
      throw new ConfigurationError('EMBEDDING_CACHE_TTL must not be negative');
    }
    if (this.server.port < 1 || this.server.port > 65535) {
      throw new ConfigurationError('PORT must be between 1 and 65535');
    }
  }
}

function requirePositive(name: string, value: number): void {
  // NaN fails this check too
  if (!(value > 0)) {
    throw new ConfigurationError(`${name} must be positive`);
  }
}

function parseMetric(value: string): DistanceMetric {
  if (value === 'l2' || value === 'cosine') {
    return value;
  }
  throw new ConfigurationError(`VECTOR_METRIC must be "l2" or "cosine", got "${value}"`);
}
