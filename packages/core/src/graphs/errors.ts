// Custom error types for graph operations

/**
 * Base error for all graph-related errors
 */
export class GraphError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'GraphError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a graph query returns an unusable result
 */
export class GraphQueryError extends GraphError {
  constructor(
    message: string,
    public readonly query?: string,
    cause?: Error,
  ) {
    super(message, cause);
    this.name = 'GraphQueryError';
  }
}

/**
 * Thrown when a stored node or edge cannot be decoded
 */
export class GraphParseError extends GraphError {
  constructor(
    message: string,
    public readonly recordType?: 'node' | 'edge' | 'community',
    cause?: Error,
  ) {
    super(message, cause);
    this.name = 'GraphParseError';
  }
}

/**
 * Thrown when merging a node or edge into storage fails
 */
export class MergeError extends GraphError {
  constructor(
    message: string,
    public readonly key: string,
    cause?: Error,
  ) {
    super(message, cause);
    this.name = 'MergeError';
  }
}

/**
 * Check if an error is a GraphError or subclass
 */
export function isGraphError(error: unknown): error is GraphError {
  return error instanceof GraphError;
}
