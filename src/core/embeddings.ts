import { z } from 'zod';
import { logger } from '../utils/logger';
import { EmbeddingCache } from '../utils/cache';
import { postJson } from './http';
import type { YandexConfig } from '../types';

export interface EmbeddingClient {
  readonly modelName: string;
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
  /** Dimension of the most recent embedding, or the configured default before the first call */
  dimension(): number;
}

const embeddingResponseSchema = z.object({
  embedding: z.array(z.coerce.number()).min(1)
});

export class YandexEmbeddingService implements EmbeddingClient {
  public readonly modelName: string;
  private readonly modelUri: string;
  private readonly url: string;
  private readonly headers: Record<string, string>;
  private currentDimension: number;

  constructor(
    private readonly config: YandexConfig,
    private readonly cache: EmbeddingCache = new EmbeddingCache(0)
  ) {
    this.modelName = config.embedModel;
    this.modelUri = `emb://${config.folderId}/${config.embedModel}`;
    this.url = `${config.baseUrl}/textEmbedding`;
    this.headers = {
      Authorization: `Api-Key ${config.apiKey}`,
      'x-folder-id': config.folderId
    };
    this.currentDimension = config.defaultEmbeddingDimension;

    logger.info(`Embedding service initialized with model: ${this.modelUri}`);
  }

  /**
   * Generate the embedding for a single text
   */
  async embed(text: string): Promise<number[]> {
    let input = text;
    if (input.length > this.config.maxEmbeddingChars) {
      input = input.slice(0, this.config.maxEmbeddingChars);
      logger.warn(`Text truncated to ${this.config.maxEmbeddingChars} characters before embedding`);
    }

    const cached = this.cache.getEmbedding(this.modelName, input);
    if (cached) {
      return cached;
    }

    const startTime = Date.now();
    const data = await postJson(
      this.url,
      { modelUri: this.modelUri, text: input },
      embeddingResponseSchema,
      { service: 'Yandex embeddings', headers: this.headers, timeoutMs: this.config.requestTimeoutMs }
    );
    const embedding = data.embedding;

    if (embedding.length !== this.currentDimension) {
      logger.info(`Embedding dimension updated: ${this.currentDimension} -> ${embedding.length}`);
      this.currentDimension = embedding.length;
    }

    this.cache.setEmbedding(this.modelName, input, embedding);
    logger.performance('Embedding request', Date.now() - startTime, {
      textLength: input.length,
      dimension: embedding.length
    });
    return embedding;
  }

  /**
   * Generate embeddings one text at a time, in order
   */
  async embedBatch(texts: string[]): Promise<number[][]> {
    logger.info(`Generating embeddings for ${texts.length} texts`);

    const embeddings: number[][] = [];
    for (let i = 0; i < texts.length; i++) {
      logger.debug(`Embedding text ${i + 1}/${texts.length} (${texts[i].length} characters)`);
      embeddings.push(await this.embed(texts[i]));
    }

    logger.info(`Generated ${embeddings.length} embeddings`);
    return embeddings;
  }

  dimension(): number {
    return this.currentDimension;
  }

  /**
   * Embed a probe string and report whether the service answered
   */
  async testConnection(): Promise<boolean> {
    try {
      const embedding = await this.embed('test');
      logger.info(`Embedding service reachable, dimension: ${embedding.length}`);
      return true;
    } catch (error) {
      logger.error('Embedding service connection test failed', error);
      return false;
    }
  }
}
