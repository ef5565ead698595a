// In-process graph storage backed by graphology
import {
  type Community,
  type EdgeRecord,
  type NodeRecord,
  NodeRecordSchema,
} from '@strata-rag/shared';
import Graph from 'graphology';
import { bidirectional } from 'graphology-shortest-path';
import { createLogger, type Logger } from '../logger.js';
import { edgeKey, sortedPair } from '../utils/text.js';
import { buildCommunitySchema } from './community-schema.js';
import {
  ConnectionState,
  type ConnectionStateType,
  type GraphStorage,
  type GraphStorageStatistics,
} from './interface.js';
import { KeyedMutex } from './keyed-mutex.js';
import { hierarchicalLouvain } from './louvain-clustering.js';

export class MemoryGraphStorage implements GraphStorage {
  readonly backend = 'memory' as const;
  private readonly graph = new Graph<NodeRecord, EdgeRecord>({
    type: 'undirected',
    multi: false,
    allowSelfLoops: true,
  });
  private readonly mutex = new KeyedMutex();
  private readonly logger: Logger;
  private state: ConnectionStateType = ConnectionState.Disconnected;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger('memory-graph');
  }

  async start(): Promise<void> {
    this.state = ConnectionState.Connected;
  }

  async stop(): Promise<void> {
    this.state = ConnectionState.Disconnected;
  }

  async healthCheck(): Promise<boolean> {
    return this.state === ConnectionState.Connected;
  }

  async hasNode(name: string): Promise<boolean> {
    return this.graph.hasNode(name);
  }

  async hasEdge(source: string, target: string): Promise<boolean> {
    return this.graph.hasEdge(source, target);
  }

  async getNode(name: string): Promise<NodeRecord | null> {
    return this.graph.hasNode(name) ? { ...this.graph.getNodeAttributes(name) } : null;
  }

  async getEdge(source: string, target: string): Promise<EdgeRecord | null> {
    return this.graph.hasEdge(source, target)
      ? { ...this.graph.getEdgeAttributes(source, target) }
      : null;
  }

  async getNodeEdges(name: string): Promise<[string, string][]> {
    if (!this.graph.hasNode(name)) {
      return [];
    }
    return this.graph.mapNeighbors(name, (neighbor): [string, string] => [name, neighbor]);
  }

  async nodeDegree(name: string): Promise<number> {
    return this.graph.hasNode(name) ? this.graph.degree(name) : 0;
  }

  async edgeDegree(source: string, target: string): Promise<number> {
    return (await this.nodeDegree(source)) + (await this.nodeDegree(target));
  }

  async upsertNode(name: string, data: NodeRecord): Promise<void> {
    this.graph.mergeNode(name, data);
  }

  async upsertEdge(source: string, target: string, data: EdgeRecord): Promise<void> {
    for (const endpoint of [source, target]) {
      if (!this.graph.hasNode(endpoint)) {
        this.graph.addNode(endpoint, NodeRecordSchema.parse({}));
      }
    }
    this.graph.mergeEdge(source, target, data);
  }

  runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(key, fn);
  }

  async clustering(): Promise<void> {
    const memberships = hierarchicalLouvain(this.graph);
    for (const [node, clusters] of memberships) {
      this.graph.setNodeAttribute(node, 'clusters', JSON.stringify(clusters));
    }
    this.logger.info('Graph clustered', {
      nodes: memberships.size,
      levels: Math.max(0, ...[...memberships.values()].map((m) => m.length)),
    });
  }

  async communitySchema(): Promise<Record<string, Community>> {
    return buildCommunitySchema(
      this.graph.mapNodes((node, attributes): [string, NodeRecord] => [node, attributes]),
      this.graph.mapEdges((_edge, _attributes, source, target): [string, string] => [
        source,
        target,
      ]),
      this.logger,
    );
  }

  async shortestPath(source: string, target: string): Promise<string[] | null> {
    if (!this.graph.hasNode(source) || !this.graph.hasNode(target)) {
      return null;
    }
    if (source === target) {
      return [source];
    }
    return bidirectional(this.graph, source, target);
  }

  async subgraphEdges(nodes: readonly string[]): Promise<[string, string][]> {
    const members = new Set(nodes);
    const edges = new Map<string, [string, string]>();
    this.graph.forEachEdge((_edge, _attributes, source, target) => {
      if (members.has(source) && members.has(target)) {
        edges.set(edgeKey(source, target), sortedPair(source, target));
      }
    });
    return [...edges.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([, pair]) => pair);
  }

  async statistics(): Promise<GraphStorageStatistics> {
    return {
      nodes: this.graph.order,
      edges: this.graph.size,
      communities: Object.keys(await this.communitySchema()).length,
    };
  }
}
