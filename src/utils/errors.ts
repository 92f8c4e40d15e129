export class ValidationError extends Error {
  code = 'VALIDATION_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends Error {
  code = 'NOT_FOUND';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class GraphStoreError extends Error {
  code = 'GRAPH_STORE_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'GraphStoreError';
  }
}

export class VectorStoreError extends Error {
  code = 'VECTOR_STORE_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'VectorStoreError';
  }
}

export class EmbeddingError extends Error {
  code = 'EMBEDDING_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'EmbeddingError';
  }
}

export class RerankerError extends Error {
  code = 'RERANKER_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'RerankerError';
  }
}

export class LLMServiceError extends Error {
  code = 'LLM_SERVICE_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'LLMServiceError';
  }
}

export type DependencyError =
  | GraphStoreError
  | VectorStoreError
  | EmbeddingError
  | RerankerError
  | LLMServiceError;

export const isDependencyError = (error: unknown): error is DependencyError =>
  error instanceof GraphStoreError ||
  error instanceof VectorStoreError ||
  error instanceof EmbeddingError ||
  error instanceof RerankerError ||
  error instanceof LLMServiceError;
