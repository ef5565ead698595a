import { type IndexingProgress, type LLMCompletionOptions, loadConfig } from '@strata-rag/shared';
import { beforeEach, describe, expect, it, type Mock, vi } from 'vitest';
import { GraphRAGError } from './errors.js';
import { GraphRAG } from './graph-rag.js';
import { DEFAULT_DELIMITERS, FAIL_RESPONSE } from './prompts.js';
import { NaiveRetrievalDisabledError } from './retrieval/errors.js';
import { MemoryGraphStorage } from './storage/memory-graph.js';
import { CharTokenizer, KeywordEmbeddings } from './testing/fakes.js';
import { computeMdhashId } from './utils/hash.js';

const T = DEFAULT_DELIMITERS.tuple;
const entity = (name: string, description: string) =>
  `("entity"${T}"${name}"${T}"person"${T}"${description}")`;
const relation = (src: string, tgt: string, description: string) =>
  `("relationship"${T}"${src}"${T}"${tgt}"${T}"${description}"${T}1)`;

const DOCS = ['Alice works with Bob.', '  Bob and Carl collaborate.  '];

function respond(options: LLMCompletionOptions): string {
  if (options.systemPrompt) {
    return 'final answer';
  }
  if (options.prompt.includes('Write a comprehensive report of a community')) {
    return '{"title": "Team", "summary": "People who work together.", "rating": 5}';
  }
  if (options.prompt.includes('Text: Alice works with Bob.')) {
    return [
      entity('Alice', 'Alice is an engineer.'),
      entity('Bob', 'Bob works with Alice.'),
      relation('Alice', 'Bob', 'Alice works with Bob.'),
    ].join('##');
  }
  return [
    entity('Bob', 'Bob collaborates with Carl.'),
    entity('Carl', 'Carl is a collaborator.'),
    relation('Carl', 'Bob', 'Bob and Carl collaborate.'),
  ].join('##');
}

type CompleteMock = Mock<(options: LLMCompletionOptions) => Promise<string>>;

describe('GraphRAG', () => {
  let bestModel: { complete: CompleteMock };
  let cheapModel: { complete: CompleteMock };
  let graph: MemoryGraphStorage;
  let progress: IndexingProgress[];

  const build = (enableNaiveRag = false) =>
    new GraphRAG(
      loadConfig({
        extraction: { hierarchical: false, maxGleaning: 0 },
        query: { enableNaiveRag },
      }),
      {
        bestModel,
        cheapModel,
        embedder: new KeywordEmbeddings(['alice', 'bob', 'carl']),
        graph,
        tokenizer: new CharTokenizer(),
        onProgress: (event) => progress.push(event),
      },
    );

  beforeEach(() => {
    bestModel = { complete: vi.fn(async (options: LLMCompletionOptions) => respond(options)) };
    cheapModel = { complete: vi.fn(async (_options: LLMCompletionOptions) => 'summary') };
    graph = new MemoryGraphStorage();
    progress = [];
  });

  describe('insert', () => {
    it('should build the entity graph from documents', async () => {
      const rag = build();

      const result = await rag.insert(DOCS);

      expect(result).toMatchObject({ documents: 2, chunks: 2, entities: 3, relations: 2 });
      expect(result.communities).toBeGreaterThan(0);
      expect((await rag.communityReports.allKeys()).length).toBe(result.communities);

      const bob = await graph.getNode('BOB');
      expect(bob?.source_id.split('<SEP>').sort()).toEqual(
        [
          computeMdhashId('Alice works with Bob.', 'chunk-'),
          computeMdhashId('Bob and Carl collaborate.', 'chunk-'),
        ].sort(),
      );
      expect(await graph.hasEdge('ALICE', 'BOB')).toBe(true);
      expect(await graph.hasEdge('BOB', 'CARL')).toBe(true);
      expect(await graph.hasEdge('ALICE', 'CARL')).toBe(false);
      expect(cheapModel.complete).not.toHaveBeenCalled();
    });

    it('should commit documents and chunks after the graph update', async () => {
      const rag = build();

      await rag.insert(DOCS);

      expect(await rag.statistics()).toMatchObject({
        nodes: 3,
        edges: 2,
        documents: 2,
        chunks: 2,
      });
      expect(await rag.fullDocs.getById(computeMdhashId('Bob and Carl collaborate.', 'doc-')))
        .toEqual({ content: 'Bob and Carl collaborate.' });
    });

    it('should skip documents that are already stored', async () => {
      const rag = build();
      await rag.insert(DOCS);
      bestModel.complete.mockClear();

      const again = await rag.insert([' Alice works with Bob. ']);

      expect(again).toEqual({
        documents: 0,
        chunks: 0,
        entities: 0,
        relations: 0,
        communities: 0,
      });
      expect(bestModel.complete).not.toHaveBeenCalled();
    });

    it('should report extraction and report progress', async () => {
      await build().insert(DOCS);

      expect(progress.filter((p) => p.stage === 'entity-extraction')).toHaveLength(2);
      expect(progress.some((p) => p.stage === 'community-reports')).toBe(true);
    });

    it('should tag failures with the stage and leave documents uncommitted', async () => {
      const failure = new Error('upstream unavailable');
      bestModel.complete.mockRejectedValue(failure);
      const rag = build();

      const error = await rag.insert(DOCS).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(GraphRAGError);
      if (error instanceof GraphRAGError) {
        expect(error.stage).toBe('extraction');
        expect(error.cause).toBe(failure);
      }
      expect(await rag.fullDocs.allKeys()).toEqual([]);
    });

    it('should ingest a document once when inserts overlap', async () => {
      const rag = build();

      const [first, second] = await Promise.all([
        rag.insert([DOCS[0]]),
        rag.insert([DOCS[0]]),
      ]);

      expect(first).toMatchObject({ documents: 1, chunks: 1, entities: 2, relations: 1 });
      expect(second).toEqual({
        documents: 0,
        chunks: 0,
        entities: 0,
        relations: 0,
        communities: 0,
      });
      expect((await graph.getEdge('ALICE', 'BOB'))?.weight).toBe(1);
    });

    it('should keep accepting inserts after a queued insert fails', async () => {
      const rag = build();
      bestModel.complete.mockRejectedValueOnce(new Error('upstream unavailable'));

      const [failed, succeeded] = await Promise.allSettled([
        rag.insert([DOCS[0]]),
        rag.insert([DOCS[1]]),
      ]);

      expect(failed.status).toBe('rejected');
      expect(succeeded.status).toBe('fulfilled');
      expect(await rag.fullDocs.allKeys()).toEqual([
        computeMdhashId('Bob and Carl collaborate.', 'doc-'),
      ]);
    });

    it('should not index chunk vectors when the insert fails', async () => {
      bestModel.complete.mockRejectedValue(new Error('upstream unavailable'));
      const rag = build(true);

      await expect(rag.insert(DOCS)).rejects.toBeInstanceOf(GraphRAGError);

      expect(await rag.chunkVectors?.query('bob', 5)).toEqual([]);
      expect(await rag.query('bob', { mode: 'naive', onlyNeedContext: true })).toBe(
        FAIL_RESPONSE,
      );
    });

    it('should not commit documents when nothing was extracted', async () => {
      bestModel.complete.mockResolvedValue('no records here');
      const rag = build();

      const result = await rag.insert(DOCS);

      expect(result).toMatchObject({ documents: 2, chunks: 2, entities: 0 });
      expect(await rag.fullDocs.allKeys()).toEqual([]);
    });
  });

  describe('query', () => {
    it('should return the local context when only the context is needed', async () => {
      const rag = build();
      await rag.insert(DOCS);

      const context = await rag.query('Who is Bob?', {
        mode: 'local',
        onlyNeedContext: true,
      });

      expect(context).toContain(
        '0,\tBOB,\tPERSON,\tBob collaborates with Carl.<SEP>Bob works with Alice.,\t2',
      );
      expect(context).toContain('-----Relationships-----');
    });

    it('should answer with the context in the system prompt', async () => {
      const rag = build();
      await rag.insert(DOCS);

      const answer = await rag.query('Who is Bob?', { responseType: 'Single Paragraph' });

      expect(answer).toBe('final answer');
      const [options] = bestModel.complete.mock.calls[bestModel.complete.mock.calls.length - 1];
      expect(options.prompt).toBe('Who is Bob?');
      expect(options.systemPrompt).toContain('-----Reasoning Path-----');
      expect(options.systemPrompt).toContain('Single Paragraph');
    });

    it('should return the failure response when nothing matches', async () => {
      const rag = build();
      await rag.insert(DOCS);
      bestModel.complete.mockClear();

      expect(await rag.query('Who is Zed?')).toBe(FAIL_RESPONSE);
      expect(await rag.query('Who is Zed?', { onlyNeedContext: true })).toBe(FAIL_RESPONSE);
      expect(bestModel.complete).not.toHaveBeenCalled();
    });

    it('should reject invalid parameters', async () => {
      const error = await build()
        .query('Who is Bob?', { topK: 0 })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(GraphRAGError);
      if (error instanceof GraphRAGError) {
        expect(error.stage).toBe('validation');
      }
    });

    it('should join matching chunks in naive mode', async () => {
      const rag = build(true);
      await rag.insert(DOCS);

      const context = await rag.query('bob', { mode: 'naive', onlyNeedContext: true });

      expect(context).toBe('Alice works with Bob.--New Chunk--\nBob and Carl collaborate.');
    });

    it('should refuse naive mode unless enabled', async () => {
      const rag = build();
      await rag.insert(DOCS);

      const error = await rag.query('bob', { mode: 'naive' }).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(GraphRAGError);
      if (error instanceof GraphRAGError) {
        expect(error.stage).toBe('retrieval');
        expect(error.cause).toBeInstanceOf(NaiveRetrievalDisabledError);
      }
    });
  });
});
