// HTTP transport handler for MCP over Streamable HTTP
import {
  createServer,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from 'node:http';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { createLogger, type Logger } from '@strata-rag/core';
import {
  type HTTPServerOptions,
  HTTPServerOptionsSchema,
} from '@strata-rag/shared';
import {
  RequestBodyError,
  ServerStartError,
  ServerStopError,
  TransportConfigError,
  wrapServerError,
} from './errors.js';
import { createMcpServer } from './mcp-server-factory.js';
import type { SharedResources } from './shared-resources.js';

export type { HTTPServerOptions };

const DEFAULT_MAX_BODY_BYTES = 10 * 1024 * 1024;

/**
 * HTTP Transport for MCP Server
 * Stateless Streamable HTTP: every POST gets its own McpServer and
 * transport over the shared resources
 */
export class HTTPTransport {
  private server: Server | null = null;
  private sharedResources: SharedResources | null = null;
  private readonly validatedOptions: HTTPServerOptions;
  private readonly logger: Logger;

  /**
   * @throws {TransportConfigError} if options are invalid
   */
  constructor(options: HTTPServerOptions, logger?: Logger) {
    const result = HTTPServerOptionsSchema.safeParse(options);
    if (!result.success) {
      const errorMessages = result.error.issues
        .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
        .join('\n');
      throw new TransportConfigError(
        `Invalid HTTP transport options:\n${errorMessages}`,
      );
    }
    this.validatedOptions = result.data;
    this.logger = logger ?? createLogger('http');
  }

  attachResources(resources: SharedResources): void {
    this.sharedResources = resources;
  }

  hasResources(): boolean {
    return this.sharedResources !== null;
  }

  isRunning(): boolean {
    return this.server?.listening ?? false;
  }

  /**
   * Start the HTTP server
   * @throws {ServerStartError} if server fails to start
   */
  async start(): Promise<void> {
    if (!this.hasResources()) {
      throw new ServerStartError(
        'No resources attached. Call attachResources() first.',
      );
    }

    if (this.isRunning()) {
      return;
    }

    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch((error: unknown) => {
        this.logger.error('Unhandled error in request handler', {
          error: wrapServerError(error, 'Request failed').message,
        });
      });
    });
    const host = this.validatedOptions.host ?? '0.0.0.0';
    const port = this.validatedOptions.port;

    try {
      await new Promise<void>((resolve, reject) => {
        server.once('error', (err) => {
          reject(
            new ServerStartError(
              `Failed to start HTTP server on ${host}:${port}: ${err.message}`,
              err,
            ),
          );
        });
        server.listen(port, host, () => {
          resolve();
        });
      });
    } catch (error) {
      if (error instanceof ServerStartError) {
        throw error;
      }
      throw new ServerStartError(
        `Failed to start HTTP transport: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined,
      );
    }
    this.server = server;
    this.logger.info('HTTP transport listening', { host, port });
  }

  /**
   * Stop the HTTP server
   * @throws {ServerStopError} if shutdown fails
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;

    try {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    } catch (error) {
      throw new ServerStopError(
        `Errors during HTTP transport shutdown: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined,
      );
    }
  }

  private async handleRequest(
    req: IncomingMessage,
    res: ServerResponse,
  ): Promise<void> {
    try {
      const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);

      if (url.pathname === '/health') {
        await this.handleHealthCheck(req, res);
        return;
      }

      if (url.pathname === '/mcp' || url.pathname === '/') {
        await this.handleMCPRequest(req, res);
        return;
      }

      this.sendJsonResponse(res, 404, { error: 'Not found' });
    } catch (error) {
      this.logger.error('Request handling failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      if (!res.headersSent) {
        this.sendJsonResponse(res, 500, { error: 'Internal server error' });
      }
    }
  }

  private async handleMCPRequest(
    req: IncomingMessage,
    res: ServerResponse,
  ): Promise<void> {
    if (!this.sharedResources) {
      this.sendJsonResponse(res, 503, { error: 'Resources not attached' });
      return;
    }

    // No sessions, so no SSE stream to open and none to delete
    if (req.method !== 'POST') {
      this.sendJsonRpcError(res, 405, -32000, 'Method not allowed.');
      return;
    }

    let body: unknown;
    try {
      body = await this.parseBody(req);
    } catch (error) {
      if (error instanceof RequestBodyError) {
        this.sendJsonRpcError(res, error.statusCode, -32700, error.message);
        return;
      }
      throw error;
    }

    const mcpServer = createMcpServer(this.sharedResources);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
    });
    res.on('close', () => {
      Promise.all([transport.close(), mcpServer.close()]).catch((error: unknown) => {
        this.logger.warn('Failed to close request transport', {
          error: error instanceof Error ? error.message : String(error),
        });
      });
    });

    await mcpServer.connect(transport);
    await transport.handleRequest(req, res, body);
  }

  private async handleHealthCheck(
    req: IncomingMessage,
    res: ServerResponse,
  ): Promise<void> {
    if (req.method !== 'GET') {
      this.sendJsonResponse(res, 405, { error: 'Method not allowed' });
      return;
    }
    if (!this.sharedResources) {
      this.sendJsonResponse(res, 503, { error: 'Resources not attached' });
      return;
    }

    try {
      const health = await this.sharedResources.getHealth();
      const statusCode =
        health.status === 'ok' ? 200 : health.status === 'degraded' ? 503 : 500;
      this.sendJsonResponse(res, statusCode, health);
    } catch (error) {
      const wrappedError = wrapServerError(error, 'Health check failed');
      this.logger.error('Health check error', { error: wrappedError.message });
      this.sendJsonResponse(res, 500, {
        status: 'error',
        error: wrappedError.message,
      });
    }
  }

  /**
   * Parse request body as JSON
   * @throws {RequestBodyError} if the body is too large or not JSON
   */
  private parseBody(req: IncomingMessage): Promise<unknown> {
    const maxBodySize = this.validatedOptions.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;

    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let totalSize = 0;

      req.on('data', (chunk: Buffer) => {
        totalSize += chunk.length;
        if (totalSize > maxBodySize) {
          reject(new RequestBodyError('Request body too large', 413));
          req.destroy();
          return;
        }
        chunks.push(chunk);
      });

      req.on('end', () => {
        const body = Buffer.concat(chunks).toString('utf-8');
        if (!body) {
          resolve(undefined);
          return;
        }

        try {
          resolve(JSON.parse(body));
        } catch (error) {
          reject(
            new RequestBodyError(
              'Invalid JSON body',
              400,
              error instanceof Error ? error : undefined,
            ),
          );
        }
      });

      req.on('error', (error) => {
        reject(new RequestBodyError(`Request error: ${error.message}`, 400, error));
      });
    });
  }

  private sendJsonRpcError(
    res: ServerResponse,
    statusCode: number,
    code: number,
    message: string,
  ): void {
    this.sendJsonResponse(res, statusCode, {
      jsonrpc: '2.0',
      error: { code, message },
      id: null,
    });
  }

  private sendJsonResponse(
    res: ServerResponse,
    statusCode: number,
    data: unknown,
  ): void {
    res.writeHead(statusCode, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(data));
  }

  getAddress(): { host: string; port: number } | null {
    if (!this.server) return null;
    const address = this.server.address();
    if (typeof address === 'string' || address === null) return null;
    return { host: address.address, port: address.port };
  }

  getOptions(): HTTPServerOptions {
    return this.validatedOptions;
  }
}
