// GraphRAG - document ingest and query answering over the entity graph
import {
  type CommunityReport,
  type EmbeddingProvider,
  type FullDoc,
  type GraphStatistics,
  type InsertResult,
  type LLMProvider,
  type ProgressCallback,
  type QueryParam,
  type QueryParamInput,
  QueryParamSchema,
  type RagConfig,
  type TextChunk,
} from '@strata-rag/shared';
import pLimit from 'p-limit';
import { CommunityReportGenerator } from './community/report-generator.js';
import { createEmbeddingProvider } from './embeddings/index.js';
import { type PipelineStage, GraphRAGError } from './errors.js';
import { chunkDocuments } from './extraction/chunker.js';
import {
  EntityExtractor,
  type HierarchicalClusterer,
  HierarchicalEntityExtractor,
} from './extraction/entity-extractor.js';
import { GraphMerger } from './graphs/graph-merger.js';
import type { CachedResponse } from './llm/cached.js';
import { createLLMProvider } from './llm/index.js';
import { createLogger, type Logger } from './logger.js';
import { FAIL_RESPONSE, formatPrompt, PROMPTS } from './prompts.js';
import { QueryContextBuilder } from './retrieval/context-builder.js';
import { FalkorDBAdapter } from './storage/falkordb.js';
import { FalkorDBGraphStorage } from './storage/falkordb-graph.js';
import type { GraphStorage, KVStorage, VectorStorage } from './storage/interface.js';
import { MemoryGraphStorage } from './storage/memory-graph.js';
import { MemoryKVStorage } from './storage/memory-kv.js';
import { MemoryVectorStorage } from './storage/memory-vector.js';
import { computeMdhashId } from './utils/hash.js';
import { TiktokenTokenizer, type Tokenizer } from './utils/tokenizer.js';

export interface GraphRAGDependencies {
  /** Extraction, community reports and answers */
  bestModel: LLMProvider;
  /** Description summaries */
  cheapModel: LLMProvider;
  embedder: EmbeddingProvider;
  graph: GraphStorage;
  tokenizer?: Tokenizer;
  /** Cluster layer augmentation for hierarchical extraction */
  clusterer?: HierarchicalClusterer;
  fullDocs?: KVStorage<FullDoc>;
  textChunks?: KVStorage<TextChunk>;
  communityReports?: KVStorage<CommunityReport>;
  entityVectors?: VectorStorage;
  chunkVectors?: VectorStorage;
  onProgress?: ProgressCallback;
  logger?: Logger;
}

export type GraphRAGCreateOptions = Pick<
  GraphRAGDependencies,
  'clusterer' | 'onProgress' | 'logger'
>;

const EMPTY_INSERT: InsertResult = {
  documents: 0,
  chunks: 0,
  entities: 0,
  relations: 0,
  communities: 0,
};

function asError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class GraphRAG {
  readonly graph: GraphStorage;
  readonly fullDocs: KVStorage<FullDoc>;
  readonly textChunks: KVStorage<TextChunk>;
  readonly communityReports: KVStorage<CommunityReport>;
  readonly entityVectors: VectorStorage;
  readonly chunkVectors?: VectorStorage;

  private readonly tokenizer: Tokenizer;
  private readonly contextBuilder: QueryContextBuilder;
  private readonly logger: Logger;
  // Inserts re-cluster and replace every report, so they run one at a time
  private readonly insertLimit = pLimit(1);

  /**
   * Wire providers and storage from configuration. The graph backend is
   * chosen by `storage.graphBackend`.
   */
  static create(config: RagConfig, options: GraphRAGCreateOptions = {}): GraphRAG {
    const llmCache = config.llm.enableCache
      ? new MemoryKVStorage<CachedResponse>('llm_response_cache')
      : undefined;
    const graph =
      config.storage.graphBackend === 'falkordb'
        ? new FalkorDBGraphStorage(new FalkorDBAdapter(config.falkordb))
        : new MemoryGraphStorage();

    return new GraphRAG(config, {
      ...options,
      bestModel: createLLMProvider(config.llm, 'best', llmCache),
      cheapModel: createLLMProvider(config.llm, 'cheap', llmCache),
      embedder: createEmbeddingProvider(config.embeddings, config.llm.apiKey),
      graph,
      tokenizer: new TiktokenTokenizer(config.extraction.tokenizerEncoding),
    });
  }

  constructor(
    readonly config: RagConfig,
    private readonly deps: GraphRAGDependencies,
  ) {
    this.logger = deps.logger ?? createLogger('graph-rag');
    this.tokenizer =
      deps.tokenizer ?? new TiktokenTokenizer(config.extraction.tokenizerEncoding);
    this.graph = deps.graph;
    this.fullDocs = deps.fullDocs ?? new MemoryKVStorage('full_docs');
    this.textChunks = deps.textChunks ?? new MemoryKVStorage('text_chunks');
    this.communityReports = deps.communityReports ?? new MemoryKVStorage('community_reports');

    const vectorOptions = {
      embedder: deps.embedder,
      cosineThreshold: config.storage.vectorCosineThreshold,
      batchSize: config.embeddings.batchSize,
    };
    this.entityVectors = deps.entityVectors ?? new MemoryVectorStorage(vectorOptions);
    if (config.query.enableNaiveRag) {
      this.chunkVectors = deps.chunkVectors ?? new MemoryVectorStorage(vectorOptions);
    }

    this.contextBuilder = new QueryContextBuilder({
      graph: this.graph,
      entityVectors: this.entityVectors,
      chunks: this.textChunks,
      communityReports: this.communityReports,
      tokenizer: this.tokenizer,
      chunkVectors: this.chunkVectors,
      logger: this.logger,
    });
  }

  start(): Promise<void> {
    return this.graph.start();
  }

  stop(): Promise<void> {
    return this.graph.stop();
  }

  healthCheck(): Promise<boolean> {
    return this.graph.healthCheck();
  }

  /**
   * Ingest raw documents: chunk, extract, merge into the graph, re-cluster
   * and regenerate every community report. Documents and chunks already
   * stored are skipped. Documents are committed only after the graph
   * update succeeds. Overlapping calls are queued.
   */
  insert(documents: readonly string[]): Promise<InsertResult> {
    return this.insertLimit(() => this.insertDocuments(documents));
  }

  private async insertDocuments(documents: readonly string[]): Promise<InsertResult> {
    const docs: Record<string, FullDoc> = {};
    for (const raw of documents) {
      const content = raw.trim();
      docs[computeMdhashId(content, 'doc-')] = { content };
    }
    const newDocIds = await this.fullDocs.filterKeys(Object.keys(docs));
    const newDocs = Object.fromEntries(
      Object.entries(docs).filter(([id]) => newDocIds.has(id)),
    );
    if (newDocIds.size === 0) {
      this.logger.warn('All documents are already in the store');
      return EMPTY_INSERT;
    }
    this.logger.info('Inserting documents', { documents: newDocIds.size });

    const chunks = chunkDocuments(newDocs, {
      tokenizer: this.tokenizer,
      maxTokenSize: this.config.extraction.chunkTokenSize,
      overlapTokenSize: this.config.extraction.chunkOverlapTokenSize,
    });
    const newChunkIds = await this.textChunks.filterKeys(Object.keys(chunks));
    const newChunks = Object.fromEntries(
      Object.entries(chunks).filter(([id]) => newChunkIds.has(id)),
    );
    if (newChunkIds.size === 0) {
      this.logger.warn('All chunks are already in the store');
      return EMPTY_INSERT;
    }
    this.logger.info('Inserting chunks', { chunks: newChunkIds.size });

    const bags = await this.stage('extraction', 'Entity extraction failed', () =>
      this.createExtractor().extract(newChunks),
    );

    const merger = new GraphMerger({
      graph: this.graph,
      llm: this.deps.cheapModel,
      tokenizer: this.tokenizer,
      summaryMaxTokens: this.config.extraction.summaryMaxTokens,
      llmMaxTokens: this.config.llm.cheapModelMaxTokens,
      entityVectors: this.entityVectors,
      logger: this.logger,
    });
    const entities = await this.stage('merge', 'Graph merge failed', () =>
      merger.upsertBags(bags),
    );
    if (!entities) {
      this.logger.warn('No new entities found; documents were not committed');
      return { ...EMPTY_INSERT, documents: newDocIds.size, chunks: newChunkIds.size };
    }

    await this.stage('clustering', 'Graph clustering failed', () => this.graph.clustering());

    const reports = await this.stage('reports', 'Community report generation failed', () =>
      this.regenerateReports(),
    );

    if (this.chunkVectors) {
      await this.stage('indexing', 'Chunk indexing failed', () =>
        this.indexChunks(newChunks),
      );
    }
    await this.fullDocs.upsert(newDocs);
    await this.textChunks.upsert(newChunks);

    const result: InsertResult = {
      documents: newDocIds.size,
      chunks: newChunkIds.size,
      entities: entities.length,
      relations: bags.edges.size,
      communities: reports,
    };
    this.logger.info('Insert finished', result);
    return result;
  }

  /**
   * Answer `query`, or return the assembled context when
   * `onlyNeedContext` is set. Queries nothing matches get FAIL_RESPONSE.
   */
  async query(query: string, input: QueryParamInput = {}): Promise<string> {
    const parsed = QueryParamSchema.safeParse(input);
    if (!parsed.success) {
      throw new GraphRAGError(
        `Invalid query parameters: ${parsed.error.issues
          .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
          .join(', ')}`,
        'validation',
      );
    }
    const param = parsed.data;

    const context = await this.stage('retrieval', 'Context assembly failed', () =>
      this.buildContext(query, param),
    );
    if (context === null) {
      return FAIL_RESPONSE;
    }
    if (param.onlyNeedContext) {
      return context;
    }

    const systemPrompt =
      param.mode === 'naive'
        ? formatPrompt(PROMPTS.naiveRagResponse, {
            content_data: context,
            response_type: param.responseType,
          })
        : formatPrompt(PROMPTS.localRagResponse, {
            context_data: context,
            response_type: param.responseType,
          });
    return this.stage('answer', 'Answer generation failed', () =>
      this.deps.bestModel.complete({ prompt: query, systemPrompt }),
    );
  }

  async statistics(): Promise<GraphStatistics> {
    const [graph, documents, chunks] = await Promise.all([
      this.graph.statistics(),
      this.fullDocs.allKeys(),
      this.textChunks.allKeys(),
    ]);
    return { ...graph, documents: documents.length, chunks: chunks.length };
  }

  private async buildContext(query: string, param: QueryParam): Promise<string | null> {
    if (param.mode === 'naive') {
      return this.contextBuilder.buildNaiveContext(query, param);
    }
    const context = await this.contextBuilder.build(query, { ...param, mode: param.mode });
    return context?.text ?? null;
  }

  private createExtractor(): EntityExtractor {
    const options = {
      llm: this.deps.bestModel,
      maxGleaning: this.config.extraction.maxGleaning,
      onProgress: this.deps.onProgress,
      logger: this.logger,
    };
    if (!this.config.extraction.hierarchical) {
      return new EntityExtractor(options);
    }
    const { clusterer } = this.deps;
    return new HierarchicalEntityExtractor({
      ...options,
      clustering: clusterer
        ? { clusterer, embedder: this.deps.embedder, batchSize: this.config.embeddings.batchSize }
        : undefined,
    });
  }

  private async indexChunks(chunks: Record<string, TextChunk>): Promise<void> {
    if (!this.chunkVectors) {
      return;
    }
    await this.chunkVectors.upsert(
      Object.fromEntries(
        Object.entries(chunks).map(([id, chunk]) => [id, { content: chunk.content }]),
      ),
    );
  }

  /**
   * Replace every stored report with a fresh set; returns the count
   */
  private async regenerateReports(): Promise<number> {
    const generator = new CommunityReportGenerator({
      graph: this.graph,
      llm: this.deps.bestModel,
      tokenizer: this.tokenizer,
      maxTokenSize: this.config.community.reportMaxTokens ?? this.config.llm.bestModelMaxTokens,
      forceSubCommunities: this.config.community.forceSubCommunities,
      onProgress: this.deps.onProgress,
      logger: this.logger,
    });
    await this.communityReports.drop();
    const reports = await generator.generate();
    await this.communityReports.upsert(reports);
    return Object.keys(reports).length;
  }

  /**
   * Run one pipeline stage, attaching the stage to any failure
   */
  private async stage<T>(
    stage: PipelineStage,
    message: string,
    fn: () => Promise<T>,
  ): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof GraphRAGError) {
        throw error;
      }
      this.logger.error(message, { stage, error: errorMessage(error) });
      throw new GraphRAGError(`${message}: ${errorMessage(error)}`, stage, asError(error));
    }
  }
}
