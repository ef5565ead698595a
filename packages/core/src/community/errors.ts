// Custom error types for community report generation

/**
 * Thrown when a community report cannot be produced
 */
export class CommunityReportError extends Error {
  constructor(
    message: string,
    public readonly communityId: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'CommunityReportError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export function isCommunityReportError(error: unknown): error is CommunityReportError {
  return error instanceof CommunityReportError;
}
