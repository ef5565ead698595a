// Merge extracted records into the shared graph and entity vector index
import type { EdgeRecord, LLMProvider, NodeRecord } from '@strata-rag/shared';
import type { EntityRecord, ExtractionBags, RelationRecord } from '../extraction/record-parser.js';
import { createLogger, type Logger } from '../logger.js';
import { formatPrompt, GRAPH_FIELD_SEP, PROMPTS } from '../prompts.js';
import type { GraphStorage, VectorStorage } from '../storage/interface.js';
import { computeMdhashId } from '../utils/hash.js';
import { edgeKey, splitByMarkers } from '../utils/text.js';
import type { Tokenizer } from '../utils/tokenizer.js';
import { MergeError } from './errors.js';

export const PLACEHOLDER_ENTITY_TYPE = 'UNKNOWN';

export interface MergedEntity extends NodeRecord {
  entity_name: string;
}

export interface GraphMergerOptions {
  graph: GraphStorage;
  /** Cheap model used to condense long descriptions */
  llm: LLMProvider;
  tokenizer: Tokenizer;
  /** Descriptions at or above this many tokens are summarized */
  summaryMaxTokens: number;
  /** Input cap for the summarization call */
  llmMaxTokens: number;
  entityVectors?: VectorStorage;
  logger?: Logger;
}

/**
 * Most frequent value; ties go to the value seen first
 */
export function majorityVote(values: readonly string[]): string | undefined {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  let best: string | undefined;
  let bestCount = 0;
  for (const [value, count] of counts) {
    if (count > bestCount) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}

function unionDescriptions(existing: string | undefined, incoming: readonly string[]): string {
  const all = new Set<string>(incoming.filter((d) => d.length > 0));
  if (existing) {
    for (const part of splitByMarkers(existing, [GRAPH_FIELD_SEP])) {
      all.add(part);
    }
  }
  return [...all].sort().join(GRAPH_FIELD_SEP);
}

function unionSourceIds(existing: string | undefined, incoming: readonly string[]): string {
  const ids = new Set<string>(existing ? splitByMarkers(existing, [GRAPH_FIELD_SEP]) : []);
  for (const id of incoming) {
    for (const part of splitByMarkers(id, [GRAPH_FIELD_SEP])) {
      ids.add(part);
    }
  }
  return [...ids].join(GRAPH_FIELD_SEP);
}

function toError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

/**
 * Merges per-chunk records into storage. Concurrent merges of the same
 * node or edge are serialized through the storage's keyed lock.
 */
export class GraphMerger {
  private readonly graph: GraphStorage;
  private readonly llm: LLMProvider;
  private readonly tokenizer: Tokenizer;
  private readonly summaryMaxTokens: number;
  private readonly llmMaxTokens: number;
  private readonly entityVectors?: VectorStorage;
  private readonly logger: Logger;

  constructor(options: GraphMergerOptions) {
    this.graph = options.graph;
    this.llm = options.llm;
    this.tokenizer = options.tokenizer;
    this.summaryMaxTokens = options.summaryMaxTokens;
    this.llmMaxTokens = options.llmMaxTokens;
    this.entityVectors = options.entityVectors;
    this.logger = options.logger ?? createLogger('merge');
  }

  /**
   * Return `description` unchanged when short, else a model summary of
   * its leading `llmMaxTokens` tokens
   */
  async summarizeDescriptions(name: string, description: string): Promise<string> {
    const tokens = this.tokenizer.encode(description);
    if (tokens.length < this.summaryMaxTokens) {
      return description;
    }
    const truncated = this.tokenizer.decode(tokens.slice(0, this.llmMaxTokens));
    const prompt = formatPrompt(PROMPTS.summarizeDescriptions, {
      entity_name: name,
      description_list: JSON.stringify(truncated.split(GRAPH_FIELD_SEP)),
    });
    this.logger.debug('Summarizing description', { name, tokens: tokens.length });
    return this.llm.complete({
      prompt,
      maxTokens: this.summaryMaxTokens,
      temperature: 0,
    });
  }

  async mergeNode(name: string, records: readonly EntityRecord[]): Promise<MergedEntity> {
    return this.graph.runExclusive(`node:${name}`, async () => {
      try {
        const existing = await this.graph.getNode(name);
        const types = records.map((r) => r.entity_type);
        if (existing) {
          types.push(existing.entity_type);
        }
        const joined = unionDescriptions(
          existing?.description,
          records.map((r) => r.description),
        );
        const node: NodeRecord = {
          entity_type: majorityVote(types) ?? PLACEHOLDER_ENTITY_TYPE,
          description: await this.summarizeDescriptions(name, joined),
          source_id: unionSourceIds(
            existing?.source_id,
            records.map((r) => r.source_id),
          ),
        };
        await this.graph.upsertNode(name, node);
        return { entity_name: name, ...node };
      } catch (error) {
        throw new MergeError(`Failed to merge node ${name}`, name, toError(error));
      }
    });
  }

  async mergeEdge(
    endpoints: readonly [string, string],
    records: readonly RelationRecord[],
  ): Promise<EdgeRecord> {
    const [source, target] = endpoints;
    const key = edgeKey(source, target);
    return this.graph.runExclusive(`edge:${key}`, async () => {
      try {
        const existing = await this.graph.getEdge(source, target);
        let weight = existing?.weight ?? 0;
        const orders = existing ? [existing.order] : [];
        for (const record of records) {
          weight += record.weight;
          orders.push(record.order);
        }
        const description = unionDescriptions(
          existing?.description,
          records.map((r) => r.description),
        );
        const sourceId = unionSourceIds(
          existing?.source_id,
          records.map((r) => r.source_id),
        );

        for (const endpoint of new Set([source, target])) {
          await this.ensurePlaceholder(endpoint, description, sourceId);
        }

        const edge: EdgeRecord = {
          weight,
          order: orders.length > 0 ? Math.min(...orders) : 1,
          description: await this.summarizeDescriptions(`${source}, ${target}`, description),
          source_id: sourceId,
        };
        await this.graph.upsertEdge(source, target, edge);
        return edge;
      } catch (error) {
        throw new MergeError(`Failed to merge edge ${source} - ${target}`, key, toError(error));
      }
    });
  }

  /**
   * Merge every node, then every edge. Returns null when the bags hold
   * no entities; nothing is written to the vector index in that case.
   */
  async upsertBags(bags: ExtractionBags): Promise<MergedEntity[] | null> {
    const entities = await Promise.all(
      [...bags.nodes].map(([name, records]) => this.mergeNode(name, records)),
    );
    await Promise.all(
      [...bags.edges.values()].map((edge) => this.mergeEdge(edge.endpoints, edge.records)),
    );

    if (entities.length === 0) {
      this.logger.warn('No entities extracted; the model output may be malformed');
      return null;
    }

    if (this.entityVectors) {
      const records = Object.fromEntries(
        entities.map((entity) => [
          computeMdhashId(entity.entity_name, 'ent-'),
          {
            content: entity.entity_name + entity.description,
            entityName: entity.entity_name,
          },
        ]),
      );
      await this.entityVectors.upsert(records);
    }

    this.logger.info('Graph merge finished', {
      entities: entities.length,
      relations: bags.edges.size,
    });
    return entities;
  }

  private async ensurePlaceholder(
    name: string,
    description: string,
    sourceId: string,
  ): Promise<void> {
    await this.graph.runExclusive(`node:${name}`, async () => {
      if (!(await this.graph.hasNode(name))) {
        await this.graph.upsertNode(name, {
          entity_type: PLACEHOLDER_ENTITY_TYPE,
          description,
          source_id: sourceId,
        });
      }
    });
  }
}
