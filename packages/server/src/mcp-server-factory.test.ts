import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { type CallToolResult, CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { GraphRAGError } from '@strata-rag/core';
import { loadConfig } from '@strata-rag/shared';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createMcpServer, toQueryParam } from './mcp-server-factory.js';
import { SharedResources } from './shared-resources.js';

const TEST_CONFIG = loadConfig({ llm: { apiKey: 'test-secret' } });

function textOf(result: CallToolResult): string {
  const [first] = result.content;
  return first?.type === 'text' ? first.text : '';
}

describe('createMcpServer', () => {
  let resources: SharedResources;
  let client: Client;

  const callTool = async (name: string, args: Record<string, unknown> = {}) =>
    CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));

  beforeEach(async () => {
    resources = new SharedResources(TEST_CONFIG);
    const server = createMcpServer(resources);
    client = new Client({ name: 'test-client', version: '0.0.0' });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  });

  afterEach(async () => {
    await client.close();
  });

  it('should register the three tools', async () => {
    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name).sort()).toEqual([
      'get_statistics',
      'insert_documents',
      'query',
    ]);
  });

  describe('insert_documents', () => {
    it('should insert and summarize the result', async () => {
      const insert = vi.spyOn(resources.graphRag, 'insert').mockResolvedValue({
        documents: 1,
        chunks: 2,
        entities: 3,
        relations: 4,
        communities: 5,
      });

      const result = await callTool('insert_documents', { documents: ['doc one'] });

      expect(insert).toHaveBeenCalledWith(['doc one']);
      expect(textOf(result)).toBe(
        'Inserted 1 document(s) as 2 chunk(s): 3 entities, 4 relations, 5 communities',
      );
      expect(result.structuredContent).toEqual({
        documents: 1,
        chunks: 2,
        entities: 3,
        relations: 4,
        communities: 5,
      });
    });

    it('should return pipeline failures as tool errors', async () => {
      vi.spyOn(resources.graphRag, 'insert').mockRejectedValue(
        new GraphRAGError('Entity extraction failed: offline', 'extraction', new Error('offline')),
      );

      const result = await callTool('insert_documents', { documents: ['doc one'] });

      expect(result.isError).toBe(true);
      expect(textOf(result)).toBe('Error in insert_documents during extraction: offline');
    });
  });

  describe('query', () => {
    it('should pass converted parameters to the facade', async () => {
      const query = vi.spyOn(resources.graphRag, 'query').mockResolvedValue('the answer');

      const result = await callTool('query', {
        query: 'Who is Bob?',
        mode: 'local',
        only_need_context: true,
        top_k: 5,
      });

      expect(textOf(result)).toBe('the answer');
      expect(query).toHaveBeenCalledWith('Who is Bob?', {
        mode: 'local',
        onlyNeedContext: true,
        topK: 5,
        level: undefined,
        responseType: undefined,
      });
    });

    it('should report validation failures', async () => {
      vi.spyOn(resources.graphRag, 'query').mockRejectedValue(
        new GraphRAGError('Invalid query parameters: level: too small', 'validation'),
      );

      const result = await callTool('query', { query: 'Who is Bob?' });

      expect(result.isError).toBe(true);
      expect(textOf(result)).toBe(
        'Validation error in query: Invalid query parameters: level: too small',
      );
    });
  });

  describe('get_statistics', () => {
    it('should return counts for an empty graph', async () => {
      const result = await callTool('get_statistics');

      expect(result.structuredContent).toEqual({
        nodes: 0,
        edges: 0,
        communities: 0,
        documents: 0,
        chunks: 0,
      });
      expect(JSON.parse(textOf(result))).toEqual(result.structuredContent);
    });
  });
});

describe('toQueryParam', () => {
  it('should rename snake_case arguments', () => {
    expect(
      toQueryParam({
        query: 'q',
        mode: 'hierarchical-global',
        only_need_context: false,
        top_k: 10,
        level: 1,
        response_type: 'Bullet Points',
      }),
    ).toEqual({
      mode: 'hierarchical-global',
      onlyNeedContext: false,
      topK: 10,
      level: 1,
      responseType: 'Bullet Points',
    });
  });
});
