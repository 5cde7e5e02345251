import type { ErrorKind, HistoryMessage } from './index';

// API specific types
export interface ApiQueryRequest {
  question: string;
  history?: HistoryMessage[];
  topK?: number;
}

export interface ApiIndexRequest {
  documents: string[];
  sources: string[];
}

export interface ApiImageRequest {
  imageUrl: string;
  question?: string;
}

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  timestamp: string;
}

// Error types
export class RagError extends Error {
  constructor(
    message: string,
    public code: ErrorKind,
    public statusCode: number = 500
  ) {
    super(message);
    this.name = 'RagError';
  }
}

export class ConfigurationError extends RagError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR', 500);
    this.name = 'ConfigurationError';
  }
}

export class IndexNotLoadedError extends RagError {
  constructor(message = 'Vector index is not loaded') {
    super(message, 'INDEX_NOT_LOADED', 503);
    this.name = 'IndexNotLoadedError';
  }
}

export class DimensionMismatchError extends RagError {
  constructor(
    public expected: number,
    public actual: number
  ) {
    super(`Vector dimension mismatch: expected ${expected}, got ${actual}`, 'DIMENSION_MISMATCH', 400);
    this.name = 'DimensionMismatchError';
  }
}

export class LengthMismatchError extends RagError {
  constructor(counts: Record<string, number>) {
    const detail = Object.entries(counts)
      .map(([name, count]) => `${name}=${count}`)
      .join(', ');
    super(`Input length mismatch: ${detail}`, 'LENGTH_MISMATCH', 400);
    this.name = 'LengthMismatchError';
  }
}

export class UpstreamCallError extends RagError {
  constructor(
    public service: string,
    message: string,
    public upstreamStatus?: number
  ) {
    super(`${service}: ${message}`, 'UPSTREAM_CALL_FAILURE', 502);
    this.name = 'UpstreamCallError';
  }
}

export class MalformedUpstreamResponseError extends RagError {
  constructor(
    public service: string,
    message: string
  ) {
    super(`${service} returned an unexpected response: ${message}`, 'MALFORMED_UPSTREAM_RESPONSE', 502);
    this.name = 'MalformedUpstreamResponseError';
  }
}

export class ValidationError extends RagError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends RagError {
  constructor(resource: string) {
    super(`${resource} not found`, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
