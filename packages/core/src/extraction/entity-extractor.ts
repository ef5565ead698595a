// Concurrent per-chunk entity and relation extraction with gleaning
import type {
  ChatMessage,
  EmbeddingProvider,
  IndexingStage,
  LLMProvider,
  ProgressCallback,
  TextChunk,
} from '@strata-rag/shared';
import { createLogger, type Logger } from '../logger.js';
import {
  DEFAULT_DELIMITERS,
  DEFAULT_ENTITY_TYPES,
  type ExtractionDelimiters,
  formatPrompt,
  META_ENTITY_TYPES,
  PROMPTS,
} from '../prompts.js';
import { ClusteringError, EntityEmbeddingError } from './errors.js';
import {
  addEntityRecord,
  addRelationRecord,
  emptyBags,
  type EntityRecord,
  type ExtractionBags,
  groupRecords,
  mergeBags,
  parseExtractionOutput,
  type RelationRecord,
} from './record-parser.js';

export interface EmbeddedEntity extends EntityRecord {
  embedding: number[];
}

export type ClusterLayerRecord = EntityRecord | RelationRecord;

/**
 * Produces synthetic summary entities and membership relations, one
 * list per hierarchy layer.
 */
export interface HierarchicalClusterer {
  cluster(
    entities: ReadonlyMap<string, EmbeddedEntity>,
  ): Promise<ClusterLayerRecord[][]>;
}

export interface EntityExtractorOptions {
  llm: LLMProvider;
  maxGleaning: number;
  entityTypes?: readonly string[];
  delimiters?: ExtractionDelimiters;
  onProgress?: ProgressCallback;
  logger?: Logger;
}

export type ChunkMap = Record<string, TextChunk>;

/**
 * Normalize a yes/no answer: trim, strip quotes, lower-case
 */
export function normalizeLoopAnswer(answer: string): string {
  return answer
    .trim()
    .replace(/^"+|"+$/g, '')
    .replace(/^'+|'+$/g, '')
    .toLowerCase();
}

/**
 * Run the initial prompt, then up to `maxGleaning` continue rounds.
 * Every round but the last asks whether more entities remain and stops
 * on anything other than "yes". Returns all rounds' output concatenated.
 */
export async function gleanExtraction(
  llm: LLMProvider,
  initialPrompt: string,
  maxGleaning: number,
): Promise<string> {
  const first = await llm.complete({ prompt: initialPrompt });
  let output = first;
  let history: readonly ChatMessage[] = [
    { role: 'user', content: initialPrompt },
    { role: 'assistant', content: first },
  ];

  for (let round = 0; round < maxGleaning; round++) {
    const glean = await llm.complete({
      prompt: PROMPTS.continueExtraction,
      history,
    });
    history = [
      ...history,
      { role: 'user', content: PROMPTS.continueExtraction },
      { role: 'assistant', content: glean },
    ];
    output += glean;

    if (round === maxGleaning - 1) {
      break;
    }
    const answer = await llm.complete({
      prompt: PROMPTS.ifLoopExtraction,
      history,
    });
    if (normalizeLoopAnswer(answer) !== 'yes') {
      break;
    }
  }

  return output;
}

/**
 * Single-pass extractor: one combined entity and relationship prompt per chunk
 */
export class EntityExtractor {
  protected readonly llm: LLMProvider;
  protected readonly maxGleaning: number;
  protected readonly delimiters: ExtractionDelimiters;
  protected readonly entityTypes: readonly string[];
  protected readonly onProgress?: ProgressCallback;
  protected readonly logger: Logger;

  constructor(options: EntityExtractorOptions) {
    this.llm = options.llm;
    this.maxGleaning = Math.max(0, options.maxGleaning);
    this.delimiters = options.delimiters ?? DEFAULT_DELIMITERS;
    this.entityTypes = options.entityTypes ?? DEFAULT_ENTITY_TYPES;
    this.onProgress = options.onProgress;
    this.logger = options.logger ?? createLogger('extraction');
  }

  runGleaning(initialPrompt: string): Promise<string> {
    return gleanExtraction(this.llm, initialPrompt, this.maxGleaning);
  }

  async extract(chunks: ChunkMap): Promise<ExtractionBags> {
    const ordered = Object.entries(chunks);
    const results = await Promise.all(
      ordered.map(([key, chunk]) =>
        this.extractChunk(
          'entity-extraction',
          key,
          chunk,
          PROMPTS.entityExtraction,
          { entity_types: this.entityTypes.join(',') },
          ordered.length,
        ),
      ),
    );
    const bags = mergeBags(...results);
    this.logSummary('Extraction finished', ordered.length, bags);
    return bags;
  }

  protected async extractChunk(
    stage: IndexingStage,
    key: string,
    chunk: TextChunk,
    template: string,
    values: Record<string, string>,
    total: number,
  ): Promise<ExtractionBags> {
    const prompt = formatPrompt(template, {
      tuple_delimiter: this.delimiters.tuple,
      record_delimiter: this.delimiters.record,
      completion_delimiter: this.delimiters.completion,
      ...values,
      input_text: chunk.content,
    });
    const output = await this.runGleaning(prompt);
    const bags = groupRecords(parseExtractionOutput(output, key, this.delimiters));
    this.onProgress?.({
      stage,
      item: key,
      total,
      entities: bags.nodes.size,
      relations: bags.edges.size,
    });
    return bags;
  }

  protected logSummary(message: string, chunks: number, bags: ExtractionBags): void {
    this.logger.info(message, {
      chunks,
      entities: bags.nodes.size,
      relations: bags.edges.size,
      unrecognized: bags.unrecognized,
    });
  }
}

export interface ClusteringOptions {
  clusterer: HierarchicalClusterer;
  embedder: EmbeddingProvider;
  /** Descriptions embedded per request (default 64) */
  batchSize?: number;
}

export interface HierarchicalEntityExtractorOptions extends EntityExtractorOptions {
  clustering?: ClusteringOptions;
}

/**
 * Two-pass extractor: entities first, then relations with the chunk's own
 * entity names as hints, plus optional clusterer augmentation.
 */
export class HierarchicalEntityExtractor extends EntityExtractor {
  private readonly clustering?: ClusteringOptions;

  constructor(options: HierarchicalEntityExtractorOptions) {
    super({ ...options, entityTypes: options.entityTypes ?? META_ENTITY_TYPES });
    this.clustering = options.clustering;
  }

  override async extract(chunks: ChunkMap): Promise<ExtractionBags> {
    const ordered = Object.entries(chunks);

    const entityResults = await Promise.all(
      ordered.map(([key, chunk]) =>
        this.extractChunk(
          'entity-extraction',
          key,
          chunk,
          PROMPTS.hiEntityExtraction,
          { entity_types: this.entityTypes.join(',') },
          ordered.length,
        ),
      ),
    );

    // First record per name; later chunks overwrite earlier ones
    const allEntities = new Map<string, EntityRecord>();
    for (const bags of entityResults) {
      for (const [name, records] of bags.nodes) {
        allEntities.set(name, records[0]);
      }
    }

    const relationResults = await Promise.all(
      ordered.map(([key, chunk], i) =>
        this.extractChunk(
          'relation-extraction',
          key,
          chunk,
          PROMPTS.hiRelationExtraction,
          { entities: [...entityResults[i].nodes.keys()].join(',') },
          ordered.length,
        ),
      ),
    );

    const bags = emptyBags();
    entityResults.forEach((entityBags, i) => {
      for (const records of entityBags.nodes.values()) {
        for (const record of records) {
          addEntityRecord(bags, record);
        }
      }
      for (const edge of relationResults[i].edges.values()) {
        for (const record of edge.records) {
          addRelationRecord(bags, record);
        }
      }
      bags.unrecognized += entityBags.unrecognized + relationResults[i].unrecognized;
    });

    if (this.clustering && allEntities.size > 0) {
      const layers = await this.clusterEntities(this.clustering, allEntities);
      for (const layer of layers) {
        for (const record of layer) {
          if ('entity_name' in record) {
            addEntityRecord(bags, record);
          } else {
            addRelationRecord(bags, record);
          }
        }
      }
      this.logger.debug('Cluster layers added', { layers: layers.length });
    }

    this.logSummary('Hierarchical extraction finished', ordered.length, bags);
    return bags;
  }

  private async clusterEntities(
    options: ClusteringOptions,
    entities: Map<string, EntityRecord>,
  ): Promise<ClusterLayerRecord[][]> {
    const embedded = await this.embedEntities(options, entities);
    try {
      return await options.clusterer.cluster(embedded);
    } catch (error) {
      throw new ClusteringError(
        'Hierarchical clustering failed',
        error instanceof Error ? error : undefined,
      );
    }
  }

  /**
   * Embed descriptions in sequential batches
   */
  private async embedEntities(
    options: ClusteringOptions,
    entities: Map<string, EntityRecord>,
  ): Promise<Map<string, EmbeddedEntity>> {
    const batchSize = options.batchSize ?? 64;
    const records = [...entities.values()];
    const vectors: number[][] = [];

    for (let start = 0; start < records.length; start += batchSize) {
      const batch = records
        .slice(start, start + batchSize)
        .map((record) => record.description || record.entity_name);
      const result = await options.embedder.embedBatch(batch);
      if (result.length !== batch.length) {
        throw new EntityEmbeddingError(
          `Expected ${batch.length} embeddings, received ${result.length}`,
          batch.length,
          result.length,
        );
      }
      vectors.push(...result);
    }

    const embedded = new Map<string, EmbeddedEntity>();
    records.forEach((record, i) => {
      embedded.set(record.entity_name, { ...record, embedding: vectors[i] });
    });
    return embedded;
  }
}
