// strata-rag core - indexing pipeline, graph storage and query context
export * from './community/index.js';
export * from './embeddings/index.js';
export { GraphRAGError, isGraphRAGError, type PipelineStage } from './errors.js';
export * from './extraction/index.js';
export {
  GraphRAG,
  type GraphRAGCreateOptions,
  type GraphRAGDependencies,
} from './graph-rag.js';
export * from './graphs/index.js';
export * from './llm/index.js';
export { createLogger, type Logger, logger } from './logger.js';
export * from './prompts.js';
export * from './retrieval/index.js';
export * from './storage/index.js';
export * from './utils/index.js';

export const VERSION = '0.1.0';
