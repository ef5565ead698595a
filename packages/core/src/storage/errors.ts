// Custom error types for storage layer

/**
 * Base error for all storage-related errors
 */
export class StorageError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'StorageError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when the graph database is unreachable or not connected
 */
export class ConnectionError extends StorageError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'ConnectionError';
  }
}

/**
 * Thrown when a Cypher query fails
 */
export class QueryError extends StorageError {
  constructor(
    message: string,
    public readonly query?: string,
    cause?: Error,
  ) {
    super(message, cause);
    this.name = 'QueryError';
  }
}

/**
 * Thrown when a backend is misconfigured
 */
export class StorageConfigError extends StorageError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'StorageConfigError';
  }
}

/**
 * Thrown when a stored record or argument fails validation
 */
export class ValidationError extends StorageError {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError;
}
