import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { EmbeddingClient } from '../core/embeddings';
import type { CompletionClient } from '../core/completion';
import type { AppConfig, ChatMessage, CompletionOptions, NotSupportedResult } from '../types';
import { DEFAULT_PROMPT_TEMPLATE, DEFAULT_SYSTEM_PROMPT } from '../config/prompts';

/**
 * Bag-of-words embedder: one dimension per vocabulary word, counting occurrences.
 */
export class FakeEmbedder implements EmbeddingClient {
  public readonly modelName = 'fake-embed';
  public readonly calls: string[] = [];
  public failure: Error | null = null;

  constructor(private readonly vocabulary: string[]) {}

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    if (this.failure) {
      throw this.failure;
    }
    const words = text.toLowerCase().match(/[a-z]+/g) ?? [];
    return this.vocabulary.map(term => words.filter(word => word === term).length);
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (const text of texts) {
      vectors.push(await this.embed(text));
    }
    return vectors;
  }

  dimension(): number {
    return this.vocabulary.length;
  }
}

export class FakeCompletion implements CompletionClient {
  public readonly modelName = 'fake-chat';
  public readonly requests: Array<{ messages: ChatMessage[]; options: CompletionOptions }> = [];
  public answer = 'Paris.';
  public failure: Error | null = null;

  async complete(messages: ChatMessage[], options: CompletionOptions): Promise<string> {
    this.requests.push({ messages, options });
    if (this.failure) {
      throw this.failure;
    }
    return this.answer;
  }

  async analyzeImage(): Promise<NotSupportedResult> {
    return { status: 'not_supported', capability: 'image-understanding', message: 'not available' };
  }
}

export const CAPITALS_VOCABULARY = ['paris', 'france', 'berlin', 'germany', 'madrid', 'spain', 'capital'];
export const CAPITALS_DOCUMENTS = [
  'Paris is the capital of France.',
  'Berlin is the capital of Germany.',
  'Madrid is the capital of Spain.'
];
export const CAPITALS_SOURCES = ['fr.txt', 'de.txt', 'es.txt'];

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'rag-test-'));
}

export function testConfig(dir: string, rag: Partial<AppConfig['rag']> = {}): Pick<AppConfig, 'rag' | 'index'> {
  return {
    rag: {
      topK: 3,
      maxContextLength: 3000,
      maxHistoryPairs: 10,
      temperature: 0.7,
      maxTokens: 1000,
      systemPrompt: DEFAULT_SYSTEM_PROMPT,
      promptTemplate: DEFAULT_PROMPT_TEMPLATE,
      includeSourceLabels: true,
      degradeOnEmbeddingFailure: false,
      chunkSize: 1000,
      chunkOverlap: 200,
      documentsPath: path.join(dir, 'docs'),
      embeddingCacheTtl: 0,
      ...rag
    },
    index: {
      vectorsPath: path.join(dir, 'index.vec'),
      metadataPath: path.join(dir, 'metadata.json'),
      metric: 'l2'
    }
  };
}
