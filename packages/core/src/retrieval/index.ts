// Query-time context assembly
export { findPathWithRequiredNodes } from './bridge-path.js';
export {
  formatReferences,
  type GraphQueryMode,
  NAIVE_CHUNK_SEPARATOR,
  type QueryContext,
  QueryContextBuilder,
  type QueryContextBuilderOptions,
} from './context-builder.js';
export {
  isRetrievalError,
  NaiveRetrievalDisabledError,
  RetrievalError,
} from './errors.js';
export {
  findEdgesAlongPath,
  findRelatedCommunities,
  findRelatedEdges,
  findRelatedTextUnits,
  rankEdges,
  type RankedEdge,
  type RetrievedEntity,
  retrieveEntities,
  type SelectionContext,
  selectKeyEntities,
} from './selectors.js';
