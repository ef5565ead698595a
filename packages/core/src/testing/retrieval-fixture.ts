// Small indexed graph shared by the retrieval tests
import type { CommunityReport, TextChunk } from '@strata-rag/shared';
import { MemoryKVStorage } from '../storage/memory-kv.js';
import { MemoryGraphStorage } from '../storage/memory-graph.js';

export function report(
  id: string,
  level: number,
  rating: number,
  nodes: string[],
): CommunityReport {
  return {
    level,
    title: `Cluster ${id}`,
    nodes,
    edges: [],
    chunk_ids: [],
    occurrence: 1,
    sub_communities: [],
    report_string: `# ${id}\n\nSummary ${id}.`,
    report_json: { title: id, rating },
  };
}

function textChunk(content: string, index: number): TextChunk {
  return { tokens: content.length, content, chunk_order_index: index, full_doc_id: 'doc-1' };
}

/**
 * A - B - C path plus an isolated D.
 * Communities: c0 = {A, B, C} at level 0; c1 = {A, B} and c2 = {C} at level 1.
 */
export async function buildRetrievalFixture() {
  const graph = new MemoryGraphStorage();
  const inner = (child: string) =>
    JSON.stringify([
      { level: 0, cluster: 'c0' },
      { level: 1, cluster: child },
    ]);

  await graph.upsertNode('A', {
    entity_type: 'PERSON',
    description: 'A desc',
    source_id: 'chunk-1<SEP>chunk-2',
    clusters: inner('c1'),
  });
  await graph.upsertNode('B', {
    entity_type: 'PERSON',
    description: 'B desc',
    source_id: 'chunk-2',
    clusters: inner('c1'),
  });
  await graph.upsertNode('C', {
    entity_type: 'ORGANIZATION',
    description: 'C desc',
    source_id: 'chunk-3',
    clusters: inner('c2'),
  });
  await graph.upsertNode('D', {
    entity_type: 'GEO',
    description: 'D desc',
    source_id: 'chunk-4',
  });
  await graph.upsertEdge('A', 'B', {
    weight: 2,
    description: 'ab',
    source_id: 'chunk-2',
    order: 1,
  });
  await graph.upsertEdge('B', 'C', {
    weight: 5,
    description: 'bc',
    source_id: 'chunk-3',
    order: 1,
  });

  // chunk-3 and chunk-4 are never stored
  const chunks = new MemoryKVStorage<TextChunk>('text_chunks');
  await chunks.upsert({
    'chunk-1': textChunk('one', 0),
    'chunk-2': textChunk('two two', 1),
  });

  const communityReports = new MemoryKVStorage<CommunityReport>('community_reports');
  await communityReports.upsert({
    c0: report('c0', 0, 1, ['A', 'B', 'C']),
    c1: report('c1', 1, 9, ['A', 'B']),
    c2: report('c2', 1, 5, ['C']),
  });

  return { graph, chunks, communityReports };
}
