// Storage interfaces - abstract the graph, vector and key-value backends
import type {
  Community,
  EdgeRecord,
  GraphBackend,
  NodeRecord,
} from '@strata-rag/shared';

/**
 * Connection state enumeration
 */
export const ConnectionState = {
  Disconnected: 'disconnected',
  Connecting: 'connecting',
  Connected: 'connected',
  Error: 'error',
} as const;

export type ConnectionStateType =
  (typeof ConnectionState)[keyof typeof ConnectionState];

export interface GraphStorageStatistics {
  nodes: number;
  edges: number;
  communities: number;
}

/**
 * Undirected entity graph. Node identity is the canonical entity name;
 * (a, b) and (b, a) address the same edge.
 */
export interface GraphStorage {
  readonly backend: GraphBackend;

  start(): Promise<void>;
  stop(): Promise<void>;
  healthCheck(): Promise<boolean>;

  hasNode(name: string): Promise<boolean>;
  hasEdge(source: string, target: string): Promise<boolean>;
  getNode(name: string): Promise<NodeRecord | null>;
  getEdge(source: string, target: string): Promise<EdgeRecord | null>;
  /** Edges touching `name` as [name, neighbour] pairs */
  getNodeEdges(name: string): Promise<[string, string][]>;
  /** 0 for an unknown node */
  nodeDegree(name: string): Promise<number>;
  /** Sum of both endpoint degrees */
  edgeDegree(source: string, target: string): Promise<number>;
  upsertNode(name: string, data: NodeRecord): Promise<void>;
  upsertEdge(source: string, target: string, data: EdgeRecord): Promise<void>;

  /**
   * Serialize read-modify-write sections that share `key`
   */
  runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T>;

  /** Assign hierarchical cluster memberships to every node */
  clustering(): Promise<void>;
  communitySchema(): Promise<Record<string, Community>>;

  /** Unweighted shortest path, null when unreachable or unknown */
  shortestPath(source: string, target: string): Promise<string[] | null>;
  /** Edges of the subgraph induced by `nodes`, as sorted pairs */
  subgraphEdges(nodes: readonly string[]): Promise<[string, string][]>;

  statistics(): Promise<GraphStorageStatistics>;
}

export interface VectorRecord {
  content: string;
  entityName?: string;
}

export interface VectorMatch {
  id: string;
  score: number;
  entityName?: string;
}

export interface VectorStorage {
  upsert(records: Record<string, VectorRecord>): Promise<void>;
  query(text: string, topK: number): Promise<VectorMatch[]>;
}

export interface KVStorage<T> {
  allKeys(): Promise<string[]>;
  getById(id: string): Promise<T | null>;
  /** Result is aligned with `ids`; unknown ids map to null */
  getByIds(ids: readonly string[]): Promise<(T | null)[]>;
  /** Subset of `ids` not yet stored */
  filterKeys(ids: readonly string[]): Promise<Set<string>>;
  upsert(records: Record<string, T>): Promise<void>;
  drop(): Promise<void>;
}
