// Errors raised by the GraphRAG facade

export type PipelineStage =
  | 'validation'
  | 'extraction'
  | 'merge'
  | 'clustering'
  | 'reports'
  | 'indexing'
  | 'retrieval'
  | 'answer';

/**
 * A pipeline stage failed; `cause` carries the collaborator's typed error
 */
export class GraphRAGError extends Error {
  constructor(
    message: string,
    public readonly stage: PipelineStage,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'GraphRAGError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export function isGraphRAGError(error: unknown): error is GraphRAGError {
  return error instanceof GraphRAGError;
}
