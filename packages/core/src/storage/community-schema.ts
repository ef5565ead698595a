// Aggregate node cluster memberships into community descriptors
import {
  ClusterMembershipListSchema,
  type ClusterMembership,
  type Community,
  type NodeRecord,
} from '@strata-rag/shared';
import type { Logger } from '../logger.js';
import { GRAPH_FIELD_SEP } from '../prompts.js';
import { edgeKey, sortedPair, splitByMarkers } from '../utils/text.js';

interface CommunityDraft {
  level: number;
  nodes: Set<string>;
  edges: Map<string, [string, string]>;
  chunkIds: Set<string>;
}

export function parseClusterMemberships(
  name: string,
  clusters: string,
  logger?: Logger,
): ClusterMembership[] | null {
  let raw: unknown;
  try {
    raw = JSON.parse(clusters);
  } catch (error) {
    logger?.warn('Skipping node with unreadable clusters', {
      node: name,
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
  const result = ClusterMembershipListSchema.safeParse(raw);
  if (!result.success) {
    logger?.warn('Skipping node with invalid clusters', { node: name });
    return null;
  }
  return result.data;
}

/**
 * Build one community per cluster id. A community's edges are every edge
 * touching one of its nodes; sub-communities are next-level communities
 * whose nodes all belong to it.
 */
export function buildCommunitySchema(
  nodes: Iterable<readonly [string, NodeRecord]>,
  edges: Iterable<readonly [string, string]>,
  logger?: Logger,
): Record<string, Community> {
  const adjacency = new Map<string, [string, string][]>();
  for (const [a, b] of edges) {
    const pair = sortedPair(a, b);
    for (const endpoint of new Set([a, b])) {
      const list = adjacency.get(endpoint) ?? [];
      list.push(pair);
      adjacency.set(endpoint, list);
    }
  }

  const drafts = new Map<string, CommunityDraft>();
  let maxChunks = 0;

  for (const [name, data] of nodes) {
    if (!data.clusters) {
      continue;
    }
    const memberships = parseClusterMemberships(name, data.clusters, logger);
    if (!memberships) {
      continue;
    }
    const chunkIds = splitByMarkers(data.source_id, [GRAPH_FIELD_SEP]);
    for (const { level, cluster } of memberships) {
      let draft = drafts.get(cluster);
      if (!draft) {
        draft = { level, nodes: new Set(), edges: new Map(), chunkIds: new Set() };
        drafts.set(cluster, draft);
      }
      draft.level = level;
      draft.nodes.add(name);
      for (const pair of adjacency.get(name) ?? []) {
        draft.edges.set(edgeKey(...pair), pair);
      }
      for (const id of chunkIds) {
        draft.chunkIds.add(id);
      }
      maxChunks = Math.max(maxChunks, draft.chunkIds.size);
    }
  }

  const byLevel = new Map<number, string[]>();
  for (const [id, draft] of drafts) {
    const ids = byLevel.get(draft.level) ?? [];
    ids.push(id);
    byLevel.set(draft.level, ids);
  }

  const schema: Record<string, Community> = {};
  for (const [id, draft] of drafts) {
    const subCommunities = (byLevel.get(draft.level + 1) ?? []).filter((candidate) => {
      const child = drafts.get(candidate);
      return child !== undefined && [...child.nodes].every((n) => draft.nodes.has(n));
    });
    schema[id] = {
      level: draft.level,
      title: `Cluster ${id}`,
      nodes: [...draft.nodes].sort(),
      edges: [...draft.edges.entries()]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([, pair]) => pair),
      chunk_ids: [...draft.chunkIds].sort(),
      occurrence: maxChunks > 0 ? draft.chunkIds.size / maxChunks : 0,
      sub_communities: subCommunities,
    };
  }
  return schema;
}
