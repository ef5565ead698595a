// MCP Server Factory - Creates configured McpServer instances with all tools registered
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  GetStatisticsSchema,
  InsertDocumentsSchema,
  type QueryInput,
  QueryInputSchema,
  type QueryParamInput,
} from '@strata-rag/shared';
import { formatToolError } from './errors.js';
import type { SharedResources } from './shared-resources.js';

const SERVER_VERSION = '0.1.0';

/**
 * Create a new McpServer instance with all tools registered.
 * Instances are cheap; the knowledge graph lives in the shared resources.
 */
export function createMcpServer(resources: SharedResources): McpServer {
  const mcpServer = new McpServer(
    {
      name: 'strata-rag',
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
      instructions:
        'Knowledge-graph retrieval server. Insert documents to grow the entity graph and its community reports, then query it locally, globally or along bridging paths.',
    },
  );

  registerInsertDocumentsTool(mcpServer, resources);
  registerQueryTool(mcpServer, resources);
  registerStatisticsTool(mcpServer, resources);

  return mcpServer;
}

/**
 * Map snake_case tool arguments onto query parameters
 */
export function toQueryParam(args: QueryInput): QueryParamInput {
  return {
    mode: args.mode,
    onlyNeedContext: args.only_need_context,
    topK: args.top_k,
    level: args.level,
    responseType: args.response_type,
  };
}

function registerInsertDocumentsTool(
  mcpServer: McpServer,
  resources: SharedResources,
): void {
  mcpServer.registerTool(
    'insert_documents',
    {
      description:
        'Add raw text documents: chunk them, extract entities and relations, merge them into the graph, re-cluster and regenerate community reports. Documents already stored are skipped.',
      inputSchema: InsertDocumentsSchema.shape,
    },
    async (args) => {
      try {
        const result = await resources.graphRag.insert(args.documents);
        return {
          content: [
            {
              type: 'text' as const,
              text: `Inserted ${result.documents} document(s) as ${result.chunks} chunk(s): ${result.entities} entities, ${result.relations} relations, ${result.communities} communities`,
            },
          ],
          structuredContent: { ...result },
        };
      } catch (error) {
        return formatToolError(error, 'insert_documents');
      }
    },
  );
}

function registerQueryTool(
  mcpServer: McpServer,
  resources: SharedResources,
): void {
  mcpServer.registerTool(
    'query',
    {
      description:
        'Answer a natural language question from the knowledge graph, or return the assembled context when only_need_context is set.',
      inputSchema: QueryInputSchema.shape,
    },
    async (args) => {
      try {
        const answer = await resources.graphRag.query(args.query, toQueryParam(args));
        return {
          content: [{ type: 'text' as const, text: answer }],
        };
      } catch (error) {
        return formatToolError(error, 'query');
      }
    },
  );
}

function registerStatisticsTool(
  mcpServer: McpServer,
  resources: SharedResources,
): void {
  mcpServer.registerTool(
    'get_statistics',
    {
      description:
        'Get counts of entities, relations, communities, documents and chunks',
      inputSchema: GetStatisticsSchema.shape,
    },
    async () => {
      try {
        const stats = await resources.graphRag.statistics();
        return {
          content: [
            {
              type: 'text' as const,
              text: JSON.stringify(stats, null, 2),
            },
          ],
          structuredContent: { ...stats },
        };
      } catch (error) {
        return formatToolError(error, 'get_statistics');
      }
    },
  );
}
