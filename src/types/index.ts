// Core types for the RAG pipeline
export interface SearchHit {
  position: number;
  text: string;
  source: string;
  distance: number;
}

export type DistanceMetric = 'l2' | 'cosine';

export interface IndexStats {
  recordCount: number;
  dimension: number | null;
  isLoaded: boolean;
}

export type HistoryRole = 'user' | 'assistant';
export type MessageRole = 'system' | HistoryRole;

export interface HistoryMessage {
  role: HistoryRole;
  content: string;
}

export interface ChatMessage {
  role: MessageRole;
  content: string;
}

export type ErrorKind =
  | 'CONFIGURATION_ERROR'
  | 'INDEX_NOT_LOADED'
  | 'DIMENSION_MISMATCH'
  | 'LENGTH_MISMATCH'
  | 'UPSTREAM_CALL_FAILURE'
  | 'MALFORMED_UPSTREAM_RESPONSE'
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'INTERNAL_ERROR';

export interface QueryResult {
  answer: string;
  context: string;
  sources: string[];
  model: string;
  cleanQuery: string;
  error?: {
    kind: ErrorKind;
    message: string;
  };
}

export interface PipelineStats extends IndexStats {
  embedModel: string;
  chatModel: string;
}

export interface CompletionOptions {
  temperature: number;
  maxTokens: number;
}

export interface NotSupportedResult {
  status: 'not_supported';
  capability: string;
  message: string;
}

export interface LoadedDocuments {
  texts: string[];
  sources: string[];
  files: string[];
}

// Configuration types
export interface YandexConfig {
  apiKey: string;
  folderId: string;
  baseUrl: string;
  chatModel: string;
  embedModel: string;
  defaultEmbeddingDimension: number;
  maxEmbeddingChars: number;
  requestTimeoutMs: number;
}

export interface RagConfig {
  topK: number;
  maxContextLength: number;
  maxHistoryPairs: number;
  temperature: number;
  maxTokens: number;
  systemPrompt: string;
  promptTemplate: string;
  includeSourceLabels: boolean;
  degradeOnEmbeddingFailure: boolean;
  chunkSize: number;
  chunkOverlap: number;
  documentsPath: string;
  embeddingCacheTtl: number;
}

export interface IndexConfig {
  vectorsPath: string;
  metadataPath: string;
  metric: DistanceMetric;
}

export interface ServerConfig {
  port: number;
  host: string;
  corsOrigin: string;
}

export interface LoggingConfig {
  level: string;
  file?: string;
  silent: boolean;
}

export interface AppConfig {
  yandex: YandexConfig;
  rag: RagConfig;
  index: IndexConfig;
  server: ServerConfig;
}
