// Storage interfaces and backends
export {
  ConnectionState,
  type ConnectionStateType,
  type GraphStorage,
  type GraphStorageStatistics,
  type KVStorage,
  type VectorMatch,
  type VectorRecord,
  type VectorStorage,
} from './interface.js';

export { MemoryGraphStorage } from './memory-graph.js';
export { MemoryKVStorage } from './memory-kv.js';
export {
  cosineSimilarity,
  MemoryVectorStorage,
  type MemoryVectorStorageOptions,
} from './memory-vector.js';
export {
  FalkorDBAdapter,
  type CypherParam,
  type CypherParams,
  type CypherResult,
  type CypherRow,
} from './falkordb.js';
export { FalkorDBGraphStorage } from './falkordb-graph.js';
export { buildCommunitySchema, parseClusterMemberships } from './community-schema.js';
export { hierarchicalLouvain } from './louvain-clustering.js';
export { KeyedMutex } from './keyed-mutex.js';

// Error types
export {
  StorageError,
  StorageConfigError,
  ConnectionError,
  QueryError,
  ValidationError,
  isStorageError,
} from './errors.js';
