import {
  type CommunityReport,
  type QueryParamInput,
  QueryParamSchema,
  type TextChunk,
} from '@strata-rag/shared';
import { beforeEach, describe, expect, it } from 'vitest';
import { createLogger } from '../logger.js';
import { MemoryKVStorage } from '../storage/memory-kv.js';
import type { MemoryGraphStorage } from '../storage/memory-graph.js';
import { CharTokenizer, entityMatches, StubVectorStorage } from '../testing/fakes.js';
import { buildRetrievalFixture, report } from '../testing/retrieval-fixture.js';
import {
  findEdgesAlongPath,
  findRelatedCommunities,
  findRelatedEdges,
  findRelatedTextUnits,
  type RetrievedEntity,
  retrieveEntities,
  type SelectionContext,
  selectKeyEntities,
} from './selectors.js';

const param = (input: QueryParamInput = {}) => QueryParamSchema.parse(input);

describe('retrieval selectors', () => {
  let graph: MemoryGraphStorage;
  let chunks: MemoryKVStorage<TextChunk>;
  let communityReports: MemoryKVStorage<CommunityReport>;
  let context: SelectionContext;

  const entitiesFor = (...names: string[]) =>
    retrieveEntities('q', names.length, new StubVectorStorage(entityMatches(...names)), context);

  beforeEach(async () => {
    ({ graph, chunks, communityReports } = await buildRetrievalFixture());
    context = { graph, tokenizer: new CharTokenizer(), logger: createLogger('test') };
  });

  describe('retrieveEntities', () => {
    it('should attach degrees and drop matches without a graph node', async () => {
      const vectors = new StubVectorStorage([
        ...entityMatches('B', 'GHOST', 'A'),
        { id: 'orphan', score: 0.1 },
      ]);

      const entities = await retrieveEntities('q', 10, vectors, context);

      expect(entities.map((e) => [e.entity_name, e.rank])).toEqual([
        ['B', 2],
        ['A', 1],
      ]);
      expect(entities[0].description).toBe('B desc');
    });

    it('should honour topK', async () => {
      const vectors = new StubVectorStorage(entityMatches('A', 'B', 'C'));
      const entities = await retrieveEntities('q', 1, vectors, context);
      expect(entities.map((e) => e.entity_name)).toEqual(['A']);
    });
  });

  describe('findRelatedCommunities', () => {
    const titles = (reports: CommunityReport[]) => reports.map((r) => r.title);

    it('should order communities by how many entities reference them', async () => {
      const entities = await entitiesFor('A', 'B', 'C');
      const reports = await findRelatedCommunities(entities, param(), communityReports, context);
      expect(titles(reports)).toEqual(['Cluster c0', 'Cluster c1', 'Cluster c2']);
    });

    it('should break ties by rating', async () => {
      // c2 is seen before c1, but c1 rates higher
      const entities = await entitiesFor('C', 'A');
      const reports = await findRelatedCommunities(entities, param(), communityReports, context);
      expect(titles(reports)).toEqual(['Cluster c0', 'Cluster c1', 'Cluster c2']);
    });

    it('should ignore memberships above the level ceiling', async () => {
      const entities = await entitiesFor('A', 'B', 'C');
      const reports = await findRelatedCommunities(
        entities,
        param({ level: 0 }),
        communityReports,
        context,
      );
      expect(titles(reports)).toEqual(['Cluster c0']);
    });

    it('should truncate to the report budget', async () => {
      const entities = await entitiesFor('A', 'B', 'C');
      const reports = await findRelatedCommunities(
        entities,
        param({ maxTokenForCommunityReport: 34 }),
        communityReports,
        context,
      );
      expect(titles(reports)).toEqual(['Cluster c0', 'Cluster c1']);
    });

    it('should keep only the top community when asked', async () => {
      const entities = await entitiesFor('A', 'B', 'C');
      const reports = await findRelatedCommunities(
        entities,
        param({ communitySingleOne: true }),
        communityReports,
        context,
      );
      expect(titles(reports)).toEqual(['Cluster c0']);
    });

    it('should skip communities without a stored report', async () => {
      const partial = new MemoryKVStorage<CommunityReport>('community_reports');
      await partial.upsert({ c1: report('c1', 1, 9, ['A', 'B']) });
      const entities = await entitiesFor('A', 'B', 'C');

      const reports = await findRelatedCommunities(entities, param(), partial, context);

      expect(titles(reports)).toEqual(['Cluster c1']);
    });

    it('should return nothing for unclustered entities', async () => {
      const entities = await entitiesFor('D');
      expect(await findRelatedCommunities(entities, param(), communityReports, context)).toEqual(
        [],
      );
    });
  });

  describe('findRelatedTextUnits', () => {
    it('should prefer chunks shared with neighbours and skip missing chunks', async () => {
      const entities = await entitiesFor('A', 'B', 'C');

      const units = await findRelatedTextUnits(entities, param(), chunks, context);

      expect(units.map((u) => u.content)).toEqual(['two two', 'one']);
    });

    it('should keep entity order ahead of relation counts', async () => {
      const entities = await entitiesFor('B', 'A');

      const units = await findRelatedTextUnits(entities, param(), chunks, context);

      // chunk-2 comes from B, chunk-1 only from A
      expect(units.map((u) => u.content)).toEqual(['two two', 'one']);
    });

    it('should truncate to the text unit budget', async () => {
      const entities = await entitiesFor('A');
      const units = await findRelatedTextUnits(
        entities,
        param({ maxTokenForTextUnit: 7 }),
        chunks,
        context,
      );
      expect(units.map((u) => u.content)).toEqual(['two two']);
    });
  });

  describe('findRelatedEdges', () => {
    const summary = (edges: Awaited<ReturnType<typeof findRelatedEdges>>) =>
      edges.map((e) => [e.source, e.target, e.weight, e.rank]);

    it('should dedupe edges and rank by degree then weight', async () => {
      const entities = await entitiesFor('A', 'B');

      const edges = await findRelatedEdges(entities, param(), context);

      expect(summary(edges)).toEqual([
        ['B', 'C', 5, 3],
        ['A', 'B', 2, 3],
      ]);
    });

    it('should truncate to the local context budget', async () => {
      const entities = await entitiesFor('A', 'B');
      const edges = await findRelatedEdges(
        entities,
        param({ maxTokenForLocalContext: 2 }),
        context,
      );
      expect(summary(edges)).toEqual([['B', 'C', 5, 3]]);
    });

    it('should select the edges induced by a path', async () => {
      expect(summary(await findEdgesAlongPath(['A', 'B'], param(), context))).toEqual([
        ['A', 'B', 2, 3],
      ]);
      expect(
        await findEdgesAlongPath(
          ['A', 'B', 'C'],
          param({ maxTokenForBridgeKnowledge: 0 }),
          context,
        ),
      ).toEqual([]);
    });
  });
});

describe('selectKeyEntities', () => {
  const pool = (...names: string[]): RetrievedEntity[] =>
    names.map((name) => ({
      entity_type: 'PERSON',
      description: '',
      source_id: '',
      entity_name: name,
      rank: 0,
    }));
  const c0 = report('c0', 0, 1, ['A', 'B', 'C']);
  const c1 = report('c1', 1, 9, ['A', 'B']);
  const c2 = report('c2', 1, 5, ['C']);

  it('should take up to topM members per community in retrieval order', () => {
    expect(selectKeyEntities([c1, c2], pool('B', 'C', 'A'), 1)).toEqual(['B', 'C']);
    expect(selectKeyEntities([c1, c2], pool('B', 'C', 'A'), 5)).toEqual(['B', 'A', 'C']);
  });

  it('should keep the first occurrence of shared members', () => {
    expect(selectKeyEntities([c0, c1], pool('B', 'C', 'A'), 2)).toEqual(['B', 'C', 'A']);
  });

  it('should fall back to the top entities without communities', () => {
    expect(selectKeyEntities([], pool('B', 'C', 'A'), 2)).toEqual(['B', 'C']);
  });
});
