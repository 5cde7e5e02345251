import { logger } from '../utils/logger';
import { MalformedUpstreamResponseError, UpstreamCallError } from '../types/api';
import type { EmbeddingClient } from './embeddings';
import type { PersistentVectorIndex } from './vector-db';

export interface RetrieverOptions {
  /** Prefix every passage with its source label */
  includeSourceLabels: boolean;
  /** Return an empty context instead of failing when the query cannot be embedded */
  degradeOnEmbeddingFailure?: boolean;
}

export const CONTEXT_SEPARATOR = '\n\n';

export class DocumentRetriever {
  constructor(
    private readonly embedder: EmbeddingClient,
    private readonly index: PersistentVectorIndex,
    private readonly options: RetrieverOptions
  ) {}

  /**
   * Build the context block for a query: passages in relevance order,
   * packed greedily and cut at `maxLength` code points.
   */
  async retrieveContext(query: string, topK: number, maxLength: number): Promise<string> {
    if (this.index.stats().recordCount === 0) {
      logger.warn('Vector index is empty, returning empty context');
      return '';
    }

    const queryVector = await this.embedQuery(query);
    if (!queryVector) {
      return '';
    }

    const hits = this.index.search(queryVector, topK);
    const passages = hits.map(hit =>
      this.options.includeSourceLabels ? `[${hit.source}]\n${hit.text}` : hit.text
    );
    // Budget counts code points so a cut never splits a surrogate pair
    const context = Array.from(passages.join(CONTEXT_SEPARATOR)).slice(0, Math.max(0, maxLength)).join('');

    logger.debug(`Retrieved context from ${hits.length} passages`);
    return context;
  }

  /**
   * Source labels of the nearest records, deduplicated, first occurrence wins.
   */
  async getRelevantSources(query: string, topK: number): Promise<string[]> {
    if (this.index.stats().recordCount === 0) {
      return [];
    }

    const queryVector = await this.embedQuery(query);
    if (!queryVector) {
      return [];
    }

    const hits = this.index.search(queryVector, topK);
    return [...new Set(hits.map(hit => hit.source))];
  }

  /**
   * Embed the query, or return null when embedding failed and the retriever degrades.
   */
  private async embedQuery(query: string): Promise<number[] | null> {
    try {
      return await this.embedder.embed(query);
    } catch (error) {
      if (this.options.degradeOnEmbeddingFailure && isEmbeddingFailure(error)) {
        logger.warn('Query embedding failed, continuing without retrieval', { error: error.message });
        return null;
      }
      throw error;
    }
  }
}

function isEmbeddingFailure(error: unknown): error is UpstreamCallError | MalformedUpstreamResponseError {
  return error instanceof UpstreamCallError || error instanceof MalformedUpstreamResponseError;
}
