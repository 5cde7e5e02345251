import { logger } from '../utils/logger';
import { renderPrompt } from '../config/prompts';
import { LengthMismatchError, RagError, errorMessage } from '../types/api';
import { DocumentRetriever } from './retriever';
import { PersistentVectorIndex } from './vector-db';
import type { EmbeddingClient } from './embeddings';
import type { CompletionClient } from './completion';
import type {
  AppConfig,
  ChatMessage,
  ErrorKind,
  HistoryMessage,
  NotSupportedResult,
  PipelineStats,
  QueryResult
} from '../types';

export const ERROR_MARKER = '❌';
export const NOT_LOADED_ANSWER = `${ERROR_MARKER} The knowledge base is not loaded. Run document indexing (/ingest) first.`;
export const FAILED_ANSWER_PREFIX = `${ERROR_MARKER} An error occurred while processing the request:`;

export interface PipelineDependencies {
  config: Pick<AppConfig, 'rag' | 'index'>;
  embedder: EmbeddingClient;
  llm: CompletionClient;
  /** Builds an empty index bound to the configured storage paths */
  createIndex?: () => PersistentVectorIndex;
}

/**
 * Keep the most recent `maxPairs` question/answer pairs, i.e. the last
 * `2 * maxPairs` entries. Older entries are dropped.
 */
export function trimHistory(history: readonly HistoryMessage[], maxPairs: number): HistoryMessage[] {
  const limit = Math.max(0, Math.floor(maxPairs)) * 2;
  if (limit === 0) return [];
  return history.slice(-limit);
}

export function isErrorAnswer(result: Pick<QueryResult, 'answer'>): boolean {
  return result.answer.startsWith(ERROR_MARKER);
}

export class RAGPipeline {
  private readonly config: PipelineDependencies['config'];
  private readonly embedder: EmbeddingClient;
  private readonly llm: CompletionClient;
  private readonly createIndex: () => PersistentVectorIndex;
  private index: PersistentVectorIndex;
  private retriever: DocumentRetriever;
  private loaded = false;
  private indexingQueue: Promise<unknown> = Promise.resolve();

  constructor(deps: PipelineDependencies) {
    this.config = deps.config;
    this.embedder = deps.embedder;
    this.llm = deps.llm;
    this.createIndex = deps.createIndex ?? (() => new PersistentVectorIndex(deps.config.index));
    this.index = this.createIndex();
    this.retriever = this.buildRetriever(this.index);
  }

  /**
   * Load the saved index, if any. A pipeline without an index still answers
   * queries, with the not-loaded response.
   */
  async initialize(): Promise<boolean> {
    this.loaded = await this.index.load();

    if (this.loaded) {
      logger.info('RAG pipeline initialized with saved index', { ...this.index.stats() });
    } else {
      logger.warn('RAG pipeline initialized without an index. Index documents to enable answers.');
    }
    return this.loaded;
  }

  get isLoaded(): boolean {
    return this.loaded;
  }

  async query(text: string, topK: number = this.config.rag.topK): Promise<QueryResult> {
    return this.queryWithHistory(text, [], topK);
  }

  /**
   * Answer a question grounded in the index. Never throws: failures come back
   * as a result whose answer starts with the error marker.
   */
  async queryWithHistory(
    text: string,
    history: readonly HistoryMessage[] = [],
    topK: number = this.config.rag.topK
  ): Promise<QueryResult> {
    if (!this.loaded) {
      logger.error('Query rejected: vector index is not loaded');
      return this.failure(text, 'INDEX_NOT_LOADED', NOT_LOADED_ANSWER, 'Vector index is not loaded');
    }

    // In-flight queries keep the index they started with, even if indexing swaps it
    const retriever = this.retriever;
    const { rag } = this.config;
    const startTime = Date.now();

    try {
      const context = await retriever.retrieveContext(text, topK, rag.maxContextLength);
      const sources = await retriever.getRelevantSources(text, topK);

      const messages = this.buildMessages(text, context, history);
      logger.info(`Generating answer (${messages.length} messages)`);

      const answer = await this.llm.complete(messages, {
        temperature: rag.temperature,
        maxTokens: rag.maxTokens
      });

      logger.performance('RAG query', Date.now() - startTime, {
        sources: sources.length,
        contextLength: context.length,
        answerLength: answer.length
      });

      return {
        answer,
        context,
        sources,
        model: this.llm.modelName,
        cleanQuery: text
      };
    } catch (error) {
      logger.error('RAG query failed', error);
      const kind: ErrorKind = error instanceof RagError ? error.code : 'INTERNAL_ERROR';
      const message = errorMessage(error);
      return this.failure(text, kind, `${FAILED_ANSWER_PREFIX} ${message}`, message);
    }
  }

  /**
   * Rebuild the index from scratch and persist it. The new index is built
   * aside and becomes active only after it has been saved; a failure leaves
   * the previous index (or none) in place.
   */
  async indexDocuments(documents: string[], sources: string[]): Promise<boolean> {
    const run = this.indexingQueue.then(() => this.runIndexing(documents, sources));
    this.indexingQueue = run;
    return run;
  }

  stats(): PipelineStats {
    return {
      ...this.index.stats(),
      isLoaded: this.loaded,
      embedModel: this.embedder.modelName,
      chatModel: this.llm.modelName
    };
  }

  async processImage(imageUrl: string, query?: string): Promise<NotSupportedResult> {
    return this.llm.analyzeImage(imageUrl, query);
  }

  private async runIndexing(documents: string[], sources: string[]): Promise<boolean> {
    logger.info(`Indexing ${documents.length} documents`);
    const startTime = Date.now();

    try {
      if (documents.length !== sources.length) {
        throw new LengthMismatchError({ documents: documents.length, sources: sources.length });
      }

      const embeddings = await this.embedder.embedBatch(documents);

      const staging = this.createIndex();
      staging.create(this.embedder.dimension());
      staging.add(documents, embeddings, sources);
      await staging.save();

      this.index = staging;
      this.retriever = this.buildRetriever(staging);
      this.loaded = true;

      logger.performance('Document indexing', Date.now() - startTime, { documents: documents.length });
      return true;
    } catch (error) {
      logger.error('Document indexing failed', error);
      return false;
    }
  }

  private buildMessages(query: string, context: string, history: readonly HistoryMessage[]): ChatMessage[] {
    const { rag } = this.config;
    const recentHistory = trimHistory(history, rag.maxHistoryPairs);
    if (recentHistory.length > 0) {
      logger.debug(`Added ${recentHistory.length} history messages`);
    }

    return [
      { role: 'system', content: rag.systemPrompt },
      ...recentHistory.map(({ role, content }) => ({ role, content })),
      { role: 'user', content: renderPrompt(rag.promptTemplate, { context, query }) }
    ];
  }

  private buildRetriever(index: PersistentVectorIndex): DocumentRetriever {
    return new DocumentRetriever(this.embedder, index, {
      includeSourceLabels: this.config.rag.includeSourceLabels,
      degradeOnEmbeddingFailure: this.config.rag.degradeOnEmbeddingFailure
    });
  }

  private failure(query: string, kind: ErrorKind, answer: string, message: string): QueryResult {
    return {
      answer,
      context: '',
      sources: [],
      model: this.llm.modelName,
      cleanQuery: query,
      error: { kind, message }
    };
  }
}
