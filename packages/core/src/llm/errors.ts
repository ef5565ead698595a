// Error types for generative model calls

/**
 * Base error for model completion failures
 */
export class LLMError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'LLMError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Missing or rejected API key (401)
 */
export class AuthenticationError extends LLMError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'AuthenticationError';
  }
}

/**
 * Key lacks access to the model or endpoint (403)
 */
export class PermissionError extends LLMError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'PermissionError';
  }
}

/**
 * Too many requests (429); `retryAfter` is in milliseconds when the
 * provider sent a hint
 */
export class RateLimitError extends LLMError {
  constructor(
    message: string,
    public readonly retryAfter?: number,
    cause?: Error,
  ) {
    super(message, cause);
    this.name = 'RateLimitError';
  }
}

export class ModelError extends LLMError {
  constructor(
    message: string,
    public readonly model: string,
    cause?: Error,
  ) {
    super(message, cause);
    this.name = 'ModelError';
  }
}

export class ContextLengthError extends LLMError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'ContextLengthError';
  }
}

export class ContentFilterError extends LLMError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'ContentFilterError';
  }
}

/**
 * Provider-side failure (5xx)
 */
export class ServerError extends LLMError {
  constructor(
    message: string,
    public readonly statusCode: number,
    cause?: Error,
  ) {
    super(message, cause);
    this.name = 'ServerError';
  }
}

/**
 * Completion options rejected before any request is sent
 */
export class LLMValidationError extends LLMError {
  constructor(
    message: string,
    public readonly field: string,
  ) {
    super(message);
    this.name = 'LLMValidationError';
  }
}

export function isLLMError(error: unknown): error is LLMError {
  return error instanceof LLMError;
}
