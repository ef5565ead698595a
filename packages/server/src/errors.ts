// Server error types
// Follows the same pattern as core package errors

import {
  GraphParseError,
  GraphQueryError,
  isGraphError,
  isGraphRAGError,
  type GraphError,
  type GraphRAGError,
  RateLimitError,
} from '@strata-rag/core';

/**
 * Base error class for all server-related errors
 */
export class ServerError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'ServerError';

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    // Set cause for error chaining
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * Thrown when server configuration is invalid
 */
export class ServerConfigError extends ServerError {
  constructor(
    message: string,
    public readonly field?: string,
    cause?: Error,
  ) {
    super(message, cause);
    this.name = 'ServerConfigError';
  }
}

/**
 * Thrown when HTTP transport configuration is invalid
 */
export class TransportConfigError extends ServerError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'TransportConfigError';
  }
}

/**
 * Thrown when server fails to start
 */
export class ServerStartError extends ServerError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'ServerStartError';
  }
}

/**
 * Thrown when server fails to stop gracefully
 */
export class ServerStopError extends ServerError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'ServerStopError';
  }
}

/**
 * Thrown when a request body cannot be read as JSON
 */
export class RequestBodyError extends ServerError {
  constructor(
    message: string,
    public readonly statusCode: 400 | 413,
    cause?: Error,
  ) {
    super(message, cause);
    this.name = 'RequestBodyError';
  }
}

/**
 * Type guard to check if an error is a ServerError
 */
export function isServerError(error: unknown): error is ServerError {
  return error instanceof ServerError;
}

/**
 * Wrap an unknown error as a ServerError
 */
export function wrapServerError(error: unknown, message: string): ServerError {
  if (error instanceof ServerError) {
    return error;
  }
  if (error instanceof Error) {
    return new ServerError(`${message}: ${error.message}`, error);
  }
  return new ServerError(`${message}: ${String(error)}`);
}

/**
 * Format error for MCP tool response
 */
export function formatToolError(
  error: unknown,
  toolName: string,
): {
  content: Array<{ type: 'text'; text: string }>;
  isError: true;
} {
  let errorMessage: string;

  if (isGraphRAGError(error)) {
    errorMessage = formatPipelineError(error, toolName);
  } else if (isGraphError(error)) {
    errorMessage = formatGraphError(error, toolName);
  } else if (error instanceof Error) {
    errorMessage = `Error in ${toolName}: ${error.message}`;
  } else {
    errorMessage = `Unknown error in ${toolName}: ${String(error)}`;
  }

  return {
    content: [{ type: 'text' as const, text: errorMessage }],
    isError: true,
  };
}

/**
 * Name the failed pipeline stage; the underlying cause decides the wording
 */
function formatPipelineError(error: GraphRAGError, toolName: string): string {
  const { cause, stage } = error;
  if (stage === 'validation') {
    return `Validation error in ${toolName}: ${error.message}`;
  }
  if (cause instanceof RateLimitError) {
    const retry = cause.retryAfter ? ` (retry after ${cause.retryAfter} ms)` : '';
    return `Model rate limit reached during ${stage}${retry}`;
  }
  if (isGraphError(cause)) {
    return `${formatGraphError(cause, toolName)} (during ${stage})`;
  }
  return `Error in ${toolName} during ${stage}: ${cause?.message ?? error.message}`;
}

/**
 * Format graph-specific errors with user-friendly messages
 */
function formatGraphError(error: GraphError, toolName: string): string {
  if (error instanceof GraphParseError) {
    const recordType = error.recordType ? ` (${error.recordType})` : '';
    return `Failed to parse graph data${recordType}: ${error.message}`;
  }

  if (error instanceof GraphQueryError) {
    return `Graph query failed: ${error.message}`;
  }

  // Generic graph error
  return `Graph error in ${toolName}: ${error.message}`;
}
