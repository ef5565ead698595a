// Graph-side selection of entities, communities, chunks and relations
// for a query
import type {
  CommunityReport,
  EdgeRecord,
  NodeRecord,
  QueryParam,
  TextChunk,
} from '@strata-rag/shared';
import type { Logger } from '../logger.js';
import { GRAPH_FIELD_SEP } from '../prompts.js';
import { parseClusterMemberships } from '../storage/community-schema.js';
import type { GraphStorage, KVStorage, VectorStorage } from '../storage/interface.js';
import { edgeKey, sortedPair, splitByMarkers } from '../utils/text.js';
import type { Tokenizer } from '../utils/tokenizer.js';
import { truncateListByTokenSize } from '../utils/truncate.js';

export interface RetrievedEntity extends NodeRecord {
  entity_name: string;
  /** Node degree */
  rank: number;
}

export interface RankedEdge extends EdgeRecord {
  source: string;
  target: string;
  /** Sum of endpoint degrees */
  rank: number;
}

export interface SelectionContext {
  graph: GraphStorage;
  tokenizer: Tokenizer;
  logger: Logger;
}

/**
 * Nearest entities for `query`, in similarity order. Matches whose node
 * is missing from the graph are dropped.
 */
export async function retrieveEntities(
  query: string,
  topK: number,
  entityVectors: VectorStorage,
  { graph, logger }: SelectionContext,
): Promise<RetrievedEntity[]> {
  const matches = await entityVectors.query(query, topK);
  const names = matches.flatMap((match) => (match.entityName ? [match.entityName] : []));

  const [nodes, degrees] = await Promise.all([
    Promise.all(names.map((name) => graph.getNode(name))),
    Promise.all(names.map((name) => graph.nodeDegree(name))),
  ]);

  const entities: RetrievedEntity[] = [];
  names.forEach((name, i) => {
    const node = nodes[i];
    if (!node) {
      logger.warn('Vector match has no graph node', { entity: name });
      return;
    }
    entities.push({ ...node, entity_name: name, rank: degrees[i] });
  });
  return entities;
}

/**
 * Reports of the communities the entities belong to at or below
 * `param.level`, most referenced first
 */
export async function findRelatedCommunities(
  entities: readonly RetrievedEntity[],
  param: QueryParam,
  communityReports: KVStorage<CommunityReport>,
  { tokenizer, logger }: SelectionContext,
): Promise<CommunityReport[]> {
  const counts = new Map<string, number>();
  for (const entity of entities) {
    if (!entity.clusters) {
      continue;
    }
    const memberships =
      parseClusterMemberships(entity.entity_name, entity.clusters, logger) ?? [];
    for (const membership of memberships) {
      if (membership.level <= param.level) {
        counts.set(membership.cluster, (counts.get(membership.cluster) ?? 0) + 1);
      }
    }
  }

  const ids = [...counts.keys()];
  const reports = await communityReports.getByIds(ids);
  const available: { report: CommunityReport; count: number }[] = [];
  ids.forEach((id, i) => {
    const report = reports[i];
    if (!report) {
      logger.warn('Community report not found', { community: id });
      return;
    }
    available.push({ report, count: counts.get(id) ?? 0 });
  });

  available.sort(
    (a, b) =>
      b.count - a.count ||
      (b.report.report_json.rating ?? -1) - (a.report.report_json.rating ?? -1),
  );

  const selected = truncateListByTokenSize(
    available.map(({ report }) => report),
    (report) => report.report_string,
    param.maxTokenForCommunityReport,
    tokenizer,
  );
  return param.communitySingleOne ? selected.slice(0, 1) : selected;
}

/**
 * Source chunks of the entities, in entity order, preferring chunks that
 * the entities' neighbours also mention
 */
export async function findRelatedTextUnits(
  entities: readonly RetrievedEntity[],
  param: QueryParam,
  chunks: KVStorage<TextChunk>,
  { graph, tokenizer, logger }: SelectionContext,
): Promise<TextChunk[]> {
  const sourceIds = entities.map((entity) =>
    splitByMarkers(entity.source_id, [GRAPH_FIELD_SEP]),
  );
  const edges = await Promise.all(
    entities.map((entity) => graph.getNodeEdges(entity.entity_name)),
  );

  const neighbours = [...new Set(edges.flat().map(([, neighbour]) => neighbour))];
  const neighbourNodes = await Promise.all(
    neighbours.map((name) => graph.getNode(name)),
  );
  const neighbourSources = new Map<string, Set<string>>();
  neighbours.forEach((name, i) => {
    const node = neighbourNodes[i];
    if (node) {
      neighbourSources.set(
        name,
        new Set(splitByMarkers(node.source_id, [GRAPH_FIELD_SEP])),
      );
    }
  });

  // First entity to mention a chunk decides its order
  const candidates: { id: string; order: number; relationCounts: number }[] = [];
  const seen = new Set<string>();
  sourceIds.forEach((ids, order) => {
    for (const id of ids) {
      if (seen.has(id)) {
        continue;
      }
      seen.add(id);
      const relationCounts = edges[order].filter(([, neighbour]) =>
        neighbourSources.get(neighbour)?.has(id),
      ).length;
      candidates.push({ id, order, relationCounts });
    }
  });

  const stored = await chunks.getByIds(candidates.map(({ id }) => id));
  const units: { chunk: TextChunk; order: number; relationCounts: number }[] = [];
  candidates.forEach((candidate, i) => {
    const chunk = stored[i];
    if (!chunk) {
      logger.warn('Text chunk not found', { chunk: candidate.id });
      return;
    }
    units.push({ chunk, order: candidate.order, relationCounts: candidate.relationCounts });
  });

  units.sort((a, b) => a.order - b.order || b.relationCounts - a.relationCounts);

  return truncateListByTokenSize(
    units.map(({ chunk }) => chunk),
    (chunk) => chunk.content,
    param.maxTokenForTextUnit,
    tokenizer,
  );
}

/**
 * Fetch and rank edges by (degree sum, weight), clipped to `maxTokenSize`
 * of descriptions
 */
export async function rankEdges(
  pairs: readonly [string, string][],
  maxTokenSize: number,
  { graph, tokenizer, logger }: SelectionContext,
): Promise<RankedEdge[]> {
  const [records, degrees] = await Promise.all([
    Promise.all(pairs.map(([source, target]) => graph.getEdge(source, target))),
    Promise.all(pairs.map(([source, target]) => graph.edgeDegree(source, target))),
  ]);

  const ranked: RankedEdge[] = [];
  pairs.forEach(([source, target], i) => {
    const record = records[i];
    if (!record) {
      logger.warn('Edge not found', { source, target });
      return;
    }
    ranked.push({ ...record, source, target, rank: degrees[i] });
  });

  ranked.sort((a, b) => b.rank - a.rank || b.weight - a.weight);

  return truncateListByTokenSize(
    ranked,
    (edge) => edge.description,
    maxTokenSize,
    tokenizer,
  );
}

/**
 * Every edge touching one of the entities
 */
export async function findRelatedEdges(
  entities: readonly RetrievedEntity[],
  param: QueryParam,
  context: SelectionContext,
): Promise<RankedEdge[]> {
  const edges = await Promise.all(
    entities.map((entity) => context.graph.getNodeEdges(entity.entity_name)),
  );
  const pairs = new Map<string, [string, string]>();
  for (const [a, b] of edges.flat()) {
    pairs.set(edgeKey(a, b), sortedPair(a, b));
  }
  return rankEdges([...pairs.values()], param.maxTokenForLocalContext, context);
}

/**
 * Edges among the nodes of a reasoning path
 */
export async function findEdgesAlongPath(
  path: readonly string[],
  param: QueryParam,
  context: SelectionContext,
): Promise<RankedEdge[]> {
  const pairs = await context.graph.subgraphEdges(path);
  return rankEdges(pairs, param.maxTokenForBridgeKnowledge, context);
}

/**
 * Up to `topM` retrieved entities per selected community, in retrieval
 * order. Without communities the first `topM` entities stand in.
 */
export function selectKeyEntities(
  communities: readonly CommunityReport[],
  pool: readonly RetrievedEntity[],
  topM: number,
): string[] {
  const groups =
    communities.length > 0
      ? communities.map((community) => {
          const members = new Set(community.nodes);
          return pool.filter((entity) => members.has(entity.entity_name)).slice(0, topM);
        })
      : [pool.slice(0, topM)];

  return [...new Set(groups.flat().map((entity) => entity.entity_name))];
}
