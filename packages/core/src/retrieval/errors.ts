// Error types for query-time retrieval

/**
 * Base error for context assembly
 */
export class RetrievalError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'RetrievalError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when naive retrieval is requested without a chunk vector index
 */
export class NaiveRetrievalDisabledError extends RetrievalError {
  constructor() {
    super('Naive retrieval is not enabled for this instance', 'naive');
    this.name = 'NaiveRetrievalDisabledError';
  }
}

export function isRetrievalError(error: unknown): error is RetrievalError {
  return error instanceof RetrievalError;
}
