// Merge-consistency layer
export {
  GraphMerger,
  majorityVote,
  PLACEHOLDER_ENTITY_TYPE,
} from './graph-merger.js';
export type { GraphMergerOptions, MergedEntity } from './graph-merger.js';

// Graph errors - for MCP to catch and display appropriately
export {
  GraphError,
  GraphQueryError,
  GraphParseError,
  MergeError,
  isGraphError,
} from './errors.js';
