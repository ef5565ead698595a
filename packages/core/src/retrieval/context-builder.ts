// Assemble the per-mode query context handed to the answering model
import type {
  CommunityReport,
  ContextReferences,
  QueryMode,
  QueryParam,
  TextChunk,
} from '@strata-rag/shared';
import { createLogger, type Logger } from '../logger.js';
import type { GraphStorage, KVStorage, VectorStorage } from '../storage/interface.js';
import { type CsvCell, listOfListToCsv } from '../utils/csv.js';
import type { Tokenizer } from '../utils/tokenizer.js';
import { truncateListByTokenSize } from '../utils/truncate.js';
import { findPathWithRequiredNodes } from './bridge-path.js';
import { NaiveRetrievalDisabledError } from './errors.js';
import {
  findEdgesAlongPath,
  findRelatedCommunities,
  findRelatedEdges,
  findRelatedTextUnits,
  type RankedEdge,
  type RetrievedEntity,
  retrieveEntities,
  type SelectionContext,
  selectKeyEntities,
} from './selectors.js';

export type GraphQueryMode = Exclude<QueryMode, 'naive'>;

export interface QueryContext {
  mode: GraphQueryMode;
  text: string;
  references: ContextReferences;
}

export interface QueryContextBuilderOptions {
  graph: GraphStorage;
  entityVectors: VectorStorage;
  chunks: KVStorage<TextChunk>;
  communityReports: KVStorage<CommunityReport>;
  tokenizer: Tokenizer;
  /** Chunk index for naive retrieval; naive mode is disabled without it */
  chunkVectors?: VectorStorage;
  logger?: Logger;
}

export const NAIVE_CHUNK_SEPARATOR = '--New Chunk--\n';

const COMMUNITY_FIELDS = ['id', 'content'];
const ENTITY_FIELDS = ['id', 'entity', 'type', 'description', 'rank'];
const RELATION_FIELDS = ['id', 'source', 'target', 'description', 'weight', 'rank'];
const SOURCE_FIELDS = ['id', 'content'];

type Section = [header: string, rows: CsvCell[][]];

function renderSection([header, rows]: Section): string {
  return `-----${header}-----\n\`\`\`csv\n${listOfListToCsv(rows)}\n\`\`\``;
}

function communityRows(communities: readonly CommunityReport[], flatten = false): CsvCell[][] {
  return [
    COMMUNITY_FIELDS,
    ...communities.map((community, i) => [
      i,
      flatten ? community.report_string.replace(/\n/g, ' ') : community.report_string,
    ]),
  ];
}

function entityRows(entities: readonly RetrievedEntity[]): CsvCell[][] {
  return [
    ENTITY_FIELDS,
    ...entities.map((entity, i) => [
      i,
      entity.entity_name,
      entity.entity_type,
      entity.description,
      entity.rank,
    ]),
  ];
}

function relationRows(edges: readonly RankedEdge[]): CsvCell[][] {
  return [
    RELATION_FIELDS,
    ...edges.map((edge, i) => [
      i,
      edge.source,
      edge.target,
      edge.description,
      edge.weight,
      edge.rank,
    ]),
  ];
}

function sourceRows(chunks: readonly TextChunk[]): CsvCell[][] {
  return [SOURCE_FIELDS, ...chunks.map((chunk, i) => [i, chunk.content])];
}

export function formatReferences(references: ContextReferences): string {
  const communities = references.communities.map(
    ({ level, title }) => `(${level}, ${title})`,
  );
  const chunks = references.chunks.map(
    ({ fullDocId, chunkOrderIndex }) => `(${fullDocId}, ${chunkOrderIndex})`,
  );
  return [
    `Entities (${references.entities.length}): [${references.entities.join(', ')}]`,
    `Communities (level, cluster_id) (${communities.length}): [${communities.join(', ')}]`,
    `Chunks (doc_id, chunk_index) (${chunks.length}): [${chunks.join(', ')}]`,
  ].join('\n\n');
}

/**
 * Builds context text for every graph-backed query mode plus naive
 * chunk retrieval
 */
export class QueryContextBuilder {
  private readonly selection: SelectionContext;
  private readonly logger: Logger;

  constructor(private readonly options: QueryContextBuilderOptions) {
    this.logger = options.logger ?? createLogger('retrieval');
    this.selection = {
      graph: options.graph,
      tokenizer: options.tokenizer,
      logger: this.logger,
    };
  }

  /**
   * Context for a graph-backed mode, or null when no entity matches the query
   */
  async build(
    query: string,
    param: QueryParam & { mode: GraphQueryMode },
  ): Promise<QueryContext | null> {
    const hierarchical = param.mode !== 'local';
    const pool = await retrieveEntities(
      query,
      hierarchical ? param.topK * 10 : param.topK,
      this.options.entityVectors,
      this.selection,
    );
    if (pool.length === 0) {
      this.logger.info('No entities matched the query', { mode: param.mode });
      return null;
    }
    const entities = pool.slice(0, param.topK);

    const [communities, textUnits] = await Promise.all([
      findRelatedCommunities(entities, param, this.options.communityReports, this.selection),
      findRelatedTextUnits(entities, param, this.options.chunks, this.selection),
    ]);

    const sections: Section[] = [];
    let entityRefs: RetrievedEntity[] = entities;
    let relationCount = 0;

    switch (param.mode) {
      case 'local':
      case 'hierarchical-local': {
        const relations = await findRelatedEdges(entities, param, this.selection);
        relationCount = relations.length;
        sections.push(
          ['Reports', communityRows(communities)],
          ['Entities', entityRows(entities)],
          ['Relationships', relationRows(relations)],
        );
        break;
      }
      case 'hierarchical-global':
        entityRefs = [];
        sections.push(['Backgrounds', communityRows(communities)]);
        break;
      case 'hierarchical-bridge': {
        const reasoning = await this.reasoningPath(communities, pool, param);
        relationCount = reasoning.length;
        entityRefs = [];
        sections.push(['Reasoning Path', relationRows(reasoning)]);
        break;
      }
      case 'hierarchical-full': {
        const reasoning = await this.reasoningPath(communities, pool, param);
        relationCount = reasoning.length;
        sections.push(
          ['Backgrounds', communityRows(communities, true)],
          ['Reasoning Path', relationRows(reasoning)],
          ['Entities', entityRows(entities)],
        );
        break;
      }
    }
    sections.push(['Sources', sourceRows(textUnits)]);

    this.logger.info('Query context assembled', {
      mode: param.mode,
      entities: entityRefs.length,
      communities: communities.length,
      relations: relationCount,
      chunks: textUnits.length,
    });

    const references: ContextReferences = {
      entities: entityRefs.map((entity) => entity.entity_name),
      communities: communities.map(({ level, title }) => ({ level, title })),
      chunks: textUnits.map((chunk) => ({
        fullDocId: chunk.full_doc_id,
        chunkOrderIndex: chunk.chunk_order_index,
      })),
    };
    this.logger.info('Query references', { references: formatReferences(references) });

    return {
      mode: param.mode,
      text: `\n${sections.map(renderSection).join('\n')}\n`,
      references,
    };
  }

  /**
   * Chunk contents nearest to the query, or null when nothing matches
   */
  async buildNaiveContext(query: string, param: QueryParam): Promise<string | null> {
    const { chunkVectors, chunks } = this.options;
    if (!chunkVectors) {
      throw new NaiveRetrievalDisabledError();
    }

    const matches = await chunkVectors.query(query, param.topK);
    if (matches.length === 0) {
      return null;
    }

    const stored = await chunks.getByIds(matches.map((match) => match.id));
    const found: TextChunk[] = [];
    matches.forEach((match, i) => {
      const chunk = stored[i];
      if (chunk) {
        found.push(chunk);
      } else {
        this.logger.warn('Text chunk not found', { chunk: match.id });
      }
    });

    const selected = truncateListByTokenSize(
      found,
      (chunk) => chunk.content,
      param.naiveMaxTokenForTextUnit,
      this.options.tokenizer,
    );
    this.logger.info('Naive context assembled', {
      matched: matches.length,
      chunks: selected.length,
    });
    return selected.map((chunk) => chunk.content).join(NAIVE_CHUNK_SEPARATOR);
  }

  private async reasoningPath(
    communities: readonly CommunityReport[],
    pool: readonly RetrievedEntity[],
    param: QueryParam,
  ): Promise<RankedEdge[]> {
    const keyEntities = selectKeyEntities(communities, pool, param.topM);
    const path = await findPathWithRequiredNodes(this.options.graph, keyEntities);
    this.logger.debug('Reasoning path found', { keyEntities: keyEntities.length, path });
    return findEdgesAlongPath(path, param, this.selection);
  }
}
