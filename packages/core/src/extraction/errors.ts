// Custom error types for the extraction pipeline

/**
 * Base error for extraction failures that are not model-call failures
 */
export class ExtractionError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'ExtractionError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when the embedder returns a different number of vectors than inputs
 */
export class EntityEmbeddingError extends ExtractionError {
  constructor(
    message: string,
    public readonly expected: number,
    public readonly received: number,
  ) {
    super(message);
    this.name = 'EntityEmbeddingError';
  }
}

/**
 * Thrown when the hierarchical clusterer fails
 */
export class ClusteringError extends ExtractionError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'ClusteringError';
  }
}

export function isExtractionError(error: unknown): error is ExtractionError {
  return error instanceof ExtractionError;
}
