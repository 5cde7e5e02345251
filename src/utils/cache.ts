import NodeCache from 'node-cache';
import { createHash } from 'crypto';
import { logger } from './logger';

/**
 * In-memory embedding cache keyed by model and text. A TTL of 0 disables it.
 */
export class EmbeddingCache {
  private cache: NodeCache | null;

  constructor(ttlSeconds: number) {
    if (ttlSeconds <= 0) {
      this.cache = null;
      return;
    }

    this.cache = new NodeCache({
      stdTTL: ttlSeconds,
      checkperiod: Math.max(60, Math.floor(ttlSeconds / 6)),
      useClones: false,
      deleteOnExpire: true
    });

    this.cache.on('expired', (key: string | number) => {
      logger.debug(`Cache expired: ${key}`);
    });
  }

  public getEmbedding(model: string, text: string): number[] | undefined {
    return this.cache?.get<number[]>(this.key(model, text));
  }

  public setEmbedding(model: string, text: string, embedding: number[]): boolean {
    if (!this.cache) return false;
    return this.cache.set(this.key(model, text), embedding);
  }

  public close(): void {
    this.cache?.close();
  }

  private key(model: string, text: string): string {
    return `embedding:${model}:${createHash('sha256').update(text).digest('hex')}`;
  }
}
