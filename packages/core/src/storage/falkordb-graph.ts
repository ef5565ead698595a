// Graph storage on FalkorDB: entities are :Entity nodes keyed by name,
// relations a single :RELATED edge stored from the smaller name
import {
  type Community,
  type EdgeRecord,
  EdgeRecordSchema,
  type NodeRecord,
  NodeRecordSchema,
} from '@strata-rag/shared';
import Graph from 'graphology';
import type { Attributes } from 'graphology-types';
import { GraphParseError, GraphQueryError } from '../graphs/errors.js';
import { createLogger, type Logger } from '../logger.js';
import { edgeKey, sortedPair } from '../utils/text.js';
import { buildCommunitySchema } from './community-schema.js';
import type { CypherParams, CypherRow, FalkorDBAdapter } from './falkordb.js';
import type { GraphStorage, GraphStorageStatistics } from './interface.js';
import { KeyedMutex } from './keyed-mutex.js';
import { hierarchicalLouvain, type WeightedEdge } from './louvain-clustering.js';

const CLUSTER_WRITE_BATCH = 500;

function readCount(row: CypherRow | undefined, key: string): number {
  const value = row?.[key];
  return typeof value === 'number' ? value : 0;
}

function readString(row: CypherRow, key: string): string | null {
  const value = row[key];
  return typeof value === 'string' ? value : null;
}

function nodeProps(data: NodeRecord): CypherParams {
  const props: CypherParams = {
    entity_type: data.entity_type,
    description: data.description,
    source_id: data.source_id,
  };
  if (data.clusters !== undefined) {
    props.clusters = data.clusters;
  }
  return props;
}

export class FalkorDBGraphStorage implements GraphStorage {
  readonly backend = 'falkordb' as const;
  private readonly mutex = new KeyedMutex();
  private readonly logger: Logger;

  constructor(
    private readonly adapter: FalkorDBAdapter,
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger('falkordb-graph');
  }

  start(): Promise<void> {
    return this.adapter.connect();
  }

  stop(): Promise<void> {
    return this.adapter.disconnect();
  }

  healthCheck(): Promise<boolean> {
    return this.adapter.healthCheck();
  }

  async hasNode(name: string): Promise<boolean> {
    const result = await this.adapter.query(
      'MATCH (n:Entity {name: $name}) RETURN count(n) AS count',
      { name },
    );
    return readCount(result.records[0], 'count') > 0;
  }

  async hasEdge(source: string, target: string): Promise<boolean> {
    const [a, b] = sortedPair(source, target);
    const result = await this.adapter.query(
      'MATCH (:Entity {name: $a})-[r:RELATED]-(:Entity {name: $b}) RETURN count(r) AS count',
      { a, b },
    );
    return readCount(result.records[0], 'count') > 0;
  }

  async getNode(name: string): Promise<NodeRecord | null> {
    const result = await this.adapter.query(
      'MATCH (n:Entity {name: $name}) RETURN properties(n) AS props',
      { name },
    );
    const row = result.records[0];
    if (!row) {
      return null;
    }
    const parsed = NodeRecordSchema.safeParse(row.props);
    if (!parsed.success) {
      throw new GraphParseError(`Stored node ${name} is malformed`, 'node', parsed.error);
    }
    return parsed.data;
  }

  async getEdge(source: string, target: string): Promise<EdgeRecord | null> {
    const [a, b] = sortedPair(source, target);
    const result = await this.adapter.query(
      'MATCH (:Entity {name: $a})-[r:RELATED]-(:Entity {name: $b}) RETURN properties(r) AS props LIMIT 1',
      { a, b },
    );
    const row = result.records[0];
    if (!row) {
      return null;
    }
    const parsed = EdgeRecordSchema.safeParse(row.props);
    if (!parsed.success) {
      throw new GraphParseError(
        `Stored edge ${a} - ${b} is malformed`,
        'edge',
        parsed.error,
      );
    }
    return parsed.data;
  }

  async getNodeEdges(name: string): Promise<[string, string][]> {
    const result = await this.adapter.query(
      'MATCH (:Entity {name: $name})-[:RELATED]-(m:Entity) RETURN m.name AS neighbor',
      { name },
    );
    const edges: [string, string][] = [];
    for (const row of result.records) {
      const neighbor = readString(row, 'neighbor');
      if (neighbor !== null) {
        edges.push([name, neighbor]);
      }
    }
    return edges;
  }

  async nodeDegree(name: string): Promise<number> {
    const result = await this.adapter.query(
      'MATCH (n:Entity {name: $name}) OPTIONAL MATCH (n)-[r:RELATED]-() RETURN count(r) AS degree',
      { name },
    );
    return readCount(result.records[0], 'degree');
  }

  async edgeDegree(source: string, target: string): Promise<number> {
    const [s, t] = await Promise.all([this.nodeDegree(source), this.nodeDegree(target)]);
    return s + t;
  }

  async upsertNode(name: string, data: NodeRecord): Promise<void> {
    await this.adapter.query('MERGE (n:Entity {name: $name}) SET n += $props', {
      name,
      props: nodeProps(data),
    });
  }

  async upsertEdge(source: string, target: string, data: EdgeRecord): Promise<void> {
    const [a, b] = sortedPair(source, target);
    await this.adapter.query(
      `MERGE (a:Entity {name: $a})
       ON CREATE SET a.entity_type = 'UNKNOWN', a.description = '', a.source_id = ''
       MERGE (b:Entity {name: $b})
       ON CREATE SET b.entity_type = 'UNKNOWN', b.description = '', b.source_id = ''
       MERGE (a)-[r:RELATED]->(b)
       SET r += $props`,
      {
        a,
        b,
        props: {
          weight: data.weight,
          description: data.description,
          source_id: data.source_id,
          order: data.order,
        },
      },
    );
  }

  runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(key, fn);
  }

  /**
   * Load the graph into memory, partition it, and write memberships back
   */
  async clustering(): Promise<void> {
    const graph = new Graph<Attributes, WeightedEdge>({
      type: 'undirected',
      multi: false,
      allowSelfLoops: true,
    });
    for (const name of await this.allNodeNames()) {
      graph.addNode(name);
    }
    const edges = await this.adapter.query(
      'MATCH (a:Entity)-[r:RELATED]->(b:Entity) RETURN a.name AS source, b.name AS target, r.weight AS weight',
    );
    for (const row of edges.records) {
      const source = readString(row, 'source');
      const target = readString(row, 'target');
      if (source === null || target === null) {
        throw new GraphQueryError('Edge row without endpoint names');
      }
      const weight = typeof row.weight === 'number' ? row.weight : 1;
      graph.mergeEdge(source, target, { weight });
    }

    const rows: CypherParams[] = [];
    for (const [name, clusters] of hierarchicalLouvain(graph)) {
      rows.push({ name, clusters: JSON.stringify(clusters) });
    }
    for (let start = 0; start < rows.length; start += CLUSTER_WRITE_BATCH) {
      await this.adapter.query(
        'UNWIND $rows AS row MATCH (n:Entity {name: row.name}) SET n.clusters = row.clusters',
        { rows: rows.slice(start, start + CLUSTER_WRITE_BATCH) },
      );
    }
    this.logger.info('Graph clustered', { nodes: rows.length });
  }

  async communitySchema(): Promise<Record<string, Community>> {
    const nodes = await this.adapter.query(
      'MATCH (n:Entity) WHERE n.clusters IS NOT NULL RETURN n.name AS name, properties(n) AS props',
    );
    const entries: [string, NodeRecord][] = [];
    for (const row of nodes.records) {
      const name = readString(row, 'name');
      const parsed = NodeRecordSchema.safeParse(row.props);
      if (name === null || !parsed.success) {
        this.logger.warn('Skipping unreadable node in community schema', { name });
        continue;
      }
      entries.push([name, parsed.data]);
    }
    return buildCommunitySchema(entries, await this.edgePairs(), this.logger);
  }

  async shortestPath(source: string, target: string): Promise<string[] | null> {
    if (source === target) {
      return (await this.hasNode(source)) ? [source] : null;
    }
    const result = await this.adapter.query(
      `MATCH (a:Entity {name: $source}), (b:Entity {name: $target})
       WITH a, b
       MATCH p = shortestPath((a)-[:RELATED*]-(b))
       RETURN [n IN nodes(p) | n.name] AS path`,
      { source, target },
    );
    const path = result.records[0]?.path;
    if (path === undefined) {
      return null;
    }
    if (!Array.isArray(path) || !path.every((n): n is string => typeof n === 'string')) {
      throw new GraphQueryError('Shortest path returned a non-string node list');
    }
    return path;
  }

  async subgraphEdges(nodes: readonly string[]): Promise<[string, string][]> {
    const result = await this.adapter.query(
      `MATCH (a:Entity)-[:RELATED]->(b:Entity)
       WHERE a.name IN $names AND b.name IN $names
       RETURN a.name AS source, b.name AS target`,
      { names: [...nodes] },
    );
    return this.toSortedPairs(result.records);
  }

  async statistics(): Promise<GraphStorageStatistics> {
    const nodes = await this.adapter.query('MATCH (n:Entity) RETURN count(n) AS count');
    const edges = await this.adapter.query(
      'MATCH (:Entity)-[r:RELATED]->(:Entity) RETURN count(r) AS count',
    );
    return {
      nodes: readCount(nodes.records[0], 'count'),
      edges: readCount(edges.records[0], 'count'),
      communities: Object.keys(await this.communitySchema()).length,
    };
  }

  private async allNodeNames(): Promise<string[]> {
    const result = await this.adapter.query('MATCH (n:Entity) RETURN n.name AS name');
    const names: string[] = [];
    for (const row of result.records) {
      const name = readString(row, 'name');
      if (name !== null) {
        names.push(name);
      }
    }
    return names;
  }

  private async edgePairs(): Promise<[string, string][]> {
    const result = await this.adapter.query(
      'MATCH (a:Entity)-[:RELATED]->(b:Entity) RETURN a.name AS source, b.name AS target',
    );
    return this.toSortedPairs(result.records);
  }

  private toSortedPairs(rows: readonly CypherRow[]): [string, string][] {
    const pairs = new Map<string, [string, string]>();
    for (const row of rows) {
      const source = readString(row, 'source');
      const target = readString(row, 'target');
      if (source !== null && target !== null) {
        pairs.set(edgeKey(source, target), sortedPair(source, target));
      }
    }
    return [...pairs.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([, pair]) => pair);
  }
}
