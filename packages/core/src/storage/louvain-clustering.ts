// Two-level Louvain partition shared by both graph backends
import type { ClusterMembership } from '@strata-rag/shared';
import Graph from 'graphology';
import louvain from 'graphology-communities-louvain';
import type { AbstractGraph, Attributes } from 'graphology-types';
import { edgeKey } from '../utils/text.js';

export type WeightedEdge = { weight: number };

type WeightedGraph<N extends Attributes, E extends WeightedEdge> = AbstractGraph<N, E>;

const LOUVAIN_OPTIONS = { getEdgeWeight: 'weight', randomWalk: false } as const;

/**
 * Louvain communities renumbered 0..n-1 in node iteration order.
 * A graph without edges puts every node in its own community.
 */
function partition<N extends Attributes, E extends WeightedEdge>(graph: WeightedGraph<N, E>): Record<string, number> {
  const raw: Record<string, number> =
    graph.size === 0 ? {} : louvain(graph, LOUVAIN_OPTIONS);
  const renumbered = new Map<number, number>();
  const result: Record<string, number> = {};
  let singleton = -1;

  graph.forEachNode((node) => {
    const community = Object.hasOwn(raw, node) ? raw[node] : singleton--;
    let id = renumbered.get(community);
    if (id === undefined) {
      id = renumbered.size;
      renumbered.set(community, id);
    }
    result[node] = id;
  });
  return result;
}

/**
 * Graph of communities; edge weights are summed across the cut
 */
function quotientGraph<N extends Attributes, E extends WeightedEdge>(
  graph: WeightedGraph<N, E>,
  communities: Record<string, number>,
): Graph<Attributes, WeightedEdge> {
  const quotient = new Graph<Attributes, WeightedEdge>({ type: 'undirected', multi: false });
  for (const community of new Set(Object.values(communities))) {
    quotient.addNode(String(community));
  }

  const weights = new Map<string, { a: string; b: string; weight: number }>();
  graph.forEachEdge((_edge, attributes, source, target) => {
    const a = String(communities[source]);
    const b = String(communities[target]);
    if (a === b) {
      return;
    }
    const key = edgeKey(a, b);
    const entry = weights.get(key);
    if (entry) {
      entry.weight += attributes.weight;
    } else {
      weights.set(key, { a, b, weight: attributes.weight });
    }
  });
  for (const { a, b, weight } of weights.values()) {
    quotient.addEdge(a, b, { weight });
  }
  return quotient;
}

/**
 * Assign each node a fine community and, when a second Louvain pass over
 * the community graph merges anything, a coarser parent. Level 0 is the
 * coarsest level present.
 */
export function hierarchicalLouvain<N extends Attributes, E extends WeightedEdge>(
  graph: WeightedGraph<N, E>,
): Map<string, ClusterMembership[]> {
  const memberships = new Map<string, ClusterMembership[]>();
  if (graph.order === 0) {
    return memberships;
  }

  const fine = partition(graph);
  const fineCount = new Set(Object.values(fine)).size;
  const coarseOfFine = partition(quotientGraph(graph, fine));
  const coarseCount = new Set(Object.values(coarseOfFine)).size;
  const twoLevels = coarseCount < fineCount;

  graph.forEachNode((node) => {
    const fineId = fine[node];
    if (twoLevels) {
      memberships.set(node, [
        { level: 0, cluster: `L0-${coarseOfFine[String(fineId)]}` },
        { level: 1, cluster: `L1-${fineId}` },
      ]);
    } else {
      memberships.set(node, [{ level: 0, cluster: `L0-${fineId}` }]);
    }
  });
  return memberships;
}
