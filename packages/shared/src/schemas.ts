// Zod schemas for configuration, persisted records and MCP tool validation
import { z } from 'zod';

// ============================================================================
// Configuration Schemas - for validating config at runtime
// ============================================================================

export const FalkorDBConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  password: z.string().optional(),
  graphName: z.string().min(1),
});

export const GraphBackendSchema = z.enum(['memory', 'falkordb']);

export const StorageConfigSchema = z.object({
  graphBackend: GraphBackendSchema,
  vectorCosineThreshold: z.number().min(0).max(1),
});

export const LLMConfigSchema = z.object({
  provider: z.literal('openai'),
  bestModel: z.string().min(1),
  cheapModel: z.string().min(1),
  apiKey: z.string().optional(),
  bestModelMaxTokens: z.number().int().positive(),
  cheapModelMaxTokens: z.number().int().positive(),
  maxAsync: z.number().int().positive(),
  enableCache: z.boolean(),
  timeoutMs: z.number().int().positive(),
  maxRetries: z.number().int().min(0),
});

export const EmbeddingsConfigSchema = z.object({
  provider: z.literal('openai'),
  model: z.string().min(1),
  dimensions: z.number().int().positive(),
  batchSize: z.number().int().positive(),
  maxAsync: z.number().int().positive(),
});

export const TokenizerEncodingSchema = z.enum([
  'o200k_base',
  'cl100k_base',
  'p50k_base',
  'r50k_base',
]);

export const ExtractionConfigSchema = z
  .object({
    maxGleaning: z.number().int().min(0),
    summaryMaxTokens: z.number().int().positive(),
    hierarchical: z.boolean(),
    chunkTokenSize: z.number().int().positive(),
    chunkOverlapTokenSize: z.number().int().min(0),
    tokenizerEncoding: TokenizerEncodingSchema,
  })
  .refine((value) => value.chunkOverlapTokenSize < value.chunkTokenSize, {
    message: 'chunkOverlapTokenSize must be smaller than chunkTokenSize',
    path: ['chunkOverlapTokenSize'],
  });

export const CommunityConfigSchema = z.object({
  forceSubCommunities: z.boolean(),
  // Falls back to llm.bestModelMaxTokens when unset
  reportMaxTokens: z.number().int().positive().optional(),
});

export const QueryConfigSchema = z.object({
  enableNaiveRag: z.boolean(),
});

export const RagConfigSchema = z.object({
  falkordb: FalkorDBConfigSchema,
  storage: StorageConfigSchema,
  llm: LLMConfigSchema,
  embeddings: EmbeddingsConfigSchema,
  extraction: ExtractionConfigSchema,
  community: CommunityConfigSchema,
  query: QueryConfigSchema,
});

// ============================================================================
// Query Parameters
// ============================================================================

export const QueryModeSchema = z.enum([
  'naive',
  'local',
  'hierarchical-local',
  'hierarchical-global',
  'hierarchical-bridge',
  'hierarchical-full',
]);

export const QueryParamSchema = z.object({
  mode: QueryModeSchema.default('hierarchical-full'),
  onlyNeedContext: z.boolean().default(false),
  responseType: z.string().min(1).default('Multiple Paragraphs'),
  // Highest community level considered when selecting reports
  level: z.number().int().min(0).default(2),
  topK: z.number().int().positive().default(20),
  // Key entities taken from each selected community for bridging
  topM: z.number().int().positive().default(10),
  naiveMaxTokenForTextUnit: z.number().int().min(0).default(12000),
  maxTokenForTextUnit: z.number().int().min(0).default(4000),
  maxTokenForLocalContext: z.number().int().min(0).default(4000),
  maxTokenForBridgeKnowledge: z.number().int().min(0).default(4000),
  maxTokenForCommunityReport: z.number().int().min(0).default(3200),
  communitySingleOne: z.boolean().default(false),
});

// ============================================================================
// Storage Record Schemas - validated at the storage boundary
// ============================================================================

export const NodeRecordSchema = z.object({
  entity_type: z.string().default('UNKNOWN'),
  description: z.string().default(''),
  source_id: z.string().default(''),
  clusters: z.string().optional(),
});

export const EdgeRecordSchema = z.object({
  weight: z.coerce.number().default(1),
  description: z.string().default(''),
  source_id: z.string().default(''),
  order: z.coerce.number().int().default(1),
});

export const ClusterMembershipSchema = z.object({
  level: z.number().int().min(0),
  cluster: z.union([z.string(), z.number()]).transform(String),
});

export const ClusterMembershipListSchema = z.array(ClusterMembershipSchema);

export const TextChunkSchema = z.object({
  tokens: z.number().int().min(0),
  content: z.string(),
  chunk_order_index: z.number().int().min(0),
  full_doc_id: z.string(),
});

export const FullDocSchema = z.object({
  content: z.string(),
});

export const CommunitySchema = z.object({
  level: z.number().int().min(0),
  title: z.string(),
  nodes: z.array(z.string()),
  edges: z.array(z.tuple([z.string(), z.string()])),
  chunk_ids: z.array(z.string()),
  occurrence: z.number().min(0).max(1),
  sub_communities: z.array(z.string()),
});

// Model output is loosely structured; fields that fail to parse are dropped
export const CommunityReportJsonSchema = z
  .object({
    title: z.string().optional().catch(undefined),
    summary: z.string().optional().catch(undefined),
    rating: z
      .union([z.number(), z.string().trim().min(1).pipe(z.coerce.number())])
      .optional()
      .catch(undefined),
    rating_explanation: z.string().optional().catch(undefined),
    findings: z
      .array(
        z.union([
          z.string(),
          z.object({
            summary: z.string().optional(),
            explanation: z.string().optional(),
          }),
        ]),
      )
      .optional()
      .catch(undefined),
  })
  .passthrough();

export const CommunityReportSchema = CommunitySchema.extend({
  report_string: z.string(),
  report_json: CommunityReportJsonSchema,
});

// ============================================================================
// MCP Tool Schemas
// ============================================================================

export const InsertDocumentsSchema = z.object({
  documents: z
    .array(z.string().min(1))
    .min(1)
    .describe('Raw text documents to add to the knowledge graph'),
});

export const QueryInputSchema = z.object({
  query: z.string().min(1).describe('Natural language question'),
  mode: QueryModeSchema.optional().describe(
    'Retrieval strategy (default: hierarchical-full)',
  ),
  only_need_context: z
    .boolean()
    .optional()
    .describe('Return the assembled context instead of an answer'),
  top_k: z
    .number()
    .int()
    .min(1)
    .max(200)
    .optional()
    .describe('Number of entities to retrieve (default: 20)'),
  level: z
    .number()
    .int()
    .min(0)
    .optional()
    .describe('Highest community level to use (default: 2)'),
  response_type: z
    .string()
    .min(1)
    .optional()
    .describe('Desired answer shape, e.g. "Single Paragraph"'),
});

export const GetStatisticsSchema = z.object({});

// ============================================================================
// Server Configuration Schemas
// ============================================================================

// HTTP transport options
export const HTTPServerOptionsSchema = z.object({
  port: z.number().int().min(1).max(65535).describe('Port to listen on'),
  host: z
    .string()
    .min(1)
    .optional()
    .describe('Host to bind to (default: 0.0.0.0)'),
  maxBodyBytes: z
    .number()
    .int()
    .positive()
    .optional()
    .describe('Maximum accepted request body size (default: 10 MiB)'),
});

// Health status response
export const HealthStatusSchema = z.object({
  status: z.enum(['ok', 'degraded', 'error']),
  graphStorage: z.enum(['connected', 'disconnected']),
  backend: GraphBackendSchema,
  uptime: z.number().int().min(0),
});

// ============================================================================
// Export inferred types from schemas
// ============================================================================

// Config types
export type FalkorDBConfig = z.infer<typeof FalkorDBConfigSchema>;
export type GraphBackend = z.infer<typeof GraphBackendSchema>;
export type StorageConfig = z.infer<typeof StorageConfigSchema>;
export type LLMConfig = z.infer<typeof LLMConfigSchema>;
export type EmbeddingsConfig = z.infer<typeof EmbeddingsConfigSchema>;
export type TokenizerEncoding = z.infer<typeof TokenizerEncodingSchema>;
export type ExtractionConfig = z.infer<typeof ExtractionConfigSchema>;
export type CommunityConfig = z.infer<typeof CommunityConfigSchema>;
export type QueryConfig = z.infer<typeof QueryConfigSchema>;
export type RagConfig = z.infer<typeof RagConfigSchema>;

// Query types
export type QueryMode = z.infer<typeof QueryModeSchema>;
export type QueryParam = z.infer<typeof QueryParamSchema>;
export type QueryParamInput = z.input<typeof QueryParamSchema>;

// Storage record types
export type NodeRecord = z.infer<typeof NodeRecordSchema>;
export type EdgeRecord = z.infer<typeof EdgeRecordSchema>;
export type ClusterMembership = z.infer<typeof ClusterMembershipSchema>;
export type TextChunk = z.infer<typeof TextChunkSchema>;
export type FullDoc = z.infer<typeof FullDocSchema>;
export type Community = z.infer<typeof CommunitySchema>;
export type CommunityReportJson = z.infer<typeof CommunityReportJsonSchema>;
export type CommunityReport = z.infer<typeof CommunityReportSchema>;

// MCP tool input types
export type InsertDocumentsInput = z.infer<typeof InsertDocumentsSchema>;
export type QueryInput = z.infer<typeof QueryInputSchema>;

// Server types
export type HTTPServerOptions = z.infer<typeof HTTPServerOptionsSchema>;
export type HealthStatus = z.infer<typeof HealthStatusSchema>;
