// SharedResources - the knowledge graph shared by every MCP request
import { createLogger, GraphRAG, type Logger } from '@strata-rag/core';
import {
  type HealthStatus,
  type RagConfig,
  RagConfigSchema,
} from '@strata-rag/shared';
import {
  ServerConfigError,
  ServerStartError,
  ServerStopError,
} from './errors.js';
import { HealthChecker } from './health.js';

/**
 * Holds the GraphRAG instance (graph storage, model providers, KV and
 * vector stores). Every request's McpServer works against it.
 */
export class SharedResources {
  readonly graphRag: GraphRAG;
  readonly healthChecker: HealthChecker;
  private readonly validatedConfig: RagConfig;
  private readonly logger: Logger;
  private _isConnected = false;

  /**
   * @throws {ServerConfigError} if configuration is invalid or a provider
   * cannot be created from it
   */
  constructor(config: RagConfig) {
    const configResult = RagConfigSchema.safeParse(config);
    if (!configResult.success) {
      throw new ServerConfigError(
        `Invalid configuration:\n${configResult.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n')}`,
      );
    }
    this.validatedConfig = configResult.data;
    this.logger = createLogger('server');

    try {
      this.graphRag = GraphRAG.create(this.validatedConfig, {
        onProgress: (progress) => this.logger.debug('Indexing progress', progress),
      });
    } catch (error) {
      throw new ServerConfigError(
        `GraphRAG initialization failed: ${error instanceof Error ? error.message : String(error)}`,
        'llm',
        error instanceof Error ? error : undefined,
      );
    }

    this.healthChecker = new HealthChecker(this.graphRag);
  }

  /**
   * Connect graph storage
   * @throws {ServerStartError} if connection fails
   */
  async start(): Promise<void> {
    if (this._isConnected) {
      return;
    }

    try {
      await this.graphRag.start();
      this._isConnected = true;
    } catch (error) {
      throw new ServerStartError(
        `Failed to connect graph storage (${this.validatedConfig.storage.graphBackend}): ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined,
      );
    }
  }

  /**
   * @throws {ServerStopError} if shutdown fails
   */
  async stop(): Promise<void> {
    try {
      await this.graphRag.stop();
    } catch (error) {
      throw new ServerStopError(
        `Errors during shutdown: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined,
      );
    } finally {
      this._isConnected = false;
    }
  }

  isConnected(): boolean {
    return this._isConnected;
  }

  async getHealth(): Promise<HealthStatus> {
    return this.healthChecker.check();
  }

  getConfig(): RagConfig {
    return this.validatedConfig;
  }
}
