// Error types for embedding calls

/**
 * Base error for embedding failures
 */
export class EmbeddingError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'EmbeddingError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export class EmbeddingAuthError extends EmbeddingError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'EmbeddingAuthError';
  }
}

export class EmbeddingPermissionError extends EmbeddingError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'EmbeddingPermissionError';
  }
}

export class EmbeddingRateLimitError extends EmbeddingError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'EmbeddingRateLimitError';
  }
}

export class EmbeddingModelError extends EmbeddingError {
  constructor(
    message: string,
    public readonly model: string,
    cause?: Error,
  ) {
    super(message, cause);
    this.name = 'EmbeddingModelError';
  }
}

/**
 * Input rejected locally (blank text) or by the provider (too long)
 */
export class EmbeddingInputError extends EmbeddingError {
  constructor(
    message: string,
    public readonly index?: number,
    cause?: Error,
  ) {
    super(message, cause);
    this.name = 'EmbeddingInputError';
  }
}

export class EmbeddingServerError extends EmbeddingError {
  constructor(
    message: string,
    public readonly statusCode: number,
    cause?: Error,
  ) {
    super(message, cause);
    this.name = 'EmbeddingServerError';
  }
}

/**
 * Provider answered with a different number of vectors than inputs
 */
export class EmbeddingCountError extends EmbeddingError {
  constructor(
    public readonly expected: number,
    public readonly received: number,
  ) {
    super(`Expected ${expected} embeddings, received ${received}`);
    this.name = 'EmbeddingCountError';
  }
}

export function isEmbeddingError(error: unknown): error is EmbeddingError {
  return error instanceof EmbeddingError;
}
