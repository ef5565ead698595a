// FalkorDB adapter - database connection and query execution
import { type FalkorDBConfig, validateFalkorDBConfig } from '@strata-rag/shared';
import { FalkorDB, type Graph } from 'falkordb';
import { createLogger, type Logger } from '../logger.js';
import { ConnectionError, QueryError, StorageConfigError } from './errors.js';
import { ConnectionState, type ConnectionStateType } from './interface.js';

// FalkorDB query param types
export type CypherParam =
  | null
  | string
  | number
  | boolean
  | CypherParams
  | CypherParam[];
export type CypherParams = { [key: string]: CypherParam };

export type CypherRow = Record<string, unknown>;

export interface CypherResult {
  records: CypherRow[];
  metadata: string[];
}

/**
 * FalkorDB connection wrapper. Every query goes through `query`, which
 * maps driver failures onto storage errors.
 */
export class FalkorDBAdapter {
  private client: FalkorDB | null = null;
  private graph: Graph | null = null;
  private connectionState: ConnectionStateType = ConnectionState.Disconnected;
  private readonly validatedConfig: FalkorDBConfig;
  private readonly logger: Logger;

  /**
   * @throws StorageConfigError if configuration is invalid
   */
  constructor(config: FalkorDBConfig, logger?: Logger) {
    try {
      this.validatedConfig = validateFalkorDBConfig(config);
    } catch (error) {
      throw new StorageConfigError(
        `Invalid FalkorDB configuration: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined,
      );
    }
    this.logger = logger ?? createLogger('falkordb');
  }

  getConnectionState(): ConnectionStateType {
    return this.connectionState;
  }

  get graphName(): string {
    return this.validatedConfig.graphName;
  }

  /**
   * @throws ConnectionError if connection fails
   */
  async connect(): Promise<void> {
    if (this.connectionState === ConnectionState.Connected) {
      return;
    }

    if (this.connectionState === ConnectionState.Connecting) {
      throw new ConnectionError('Connection already in progress');
    }

    this.connectionState = ConnectionState.Connecting;

    try {
      this.client = await FalkorDB.connect({
        socket: {
          host: this.validatedConfig.host,
          port: this.validatedConfig.port,
        },
        password: this.validatedConfig.password,
      });
      this.graph = this.client.selectGraph(this.validatedConfig.graphName);
      this.connectionState = ConnectionState.Connected;
      this.logger.info('Connected to FalkorDB', {
        host: this.validatedConfig.host,
        graph: this.validatedConfig.graphName,
      });
    } catch (error) {
      this.connectionState = ConnectionState.Error;
      this.client = null;
      this.graph = null;
      throw new ConnectionError(
        `Failed to connect to FalkorDB at ${this.validatedConfig.host}:${this.validatedConfig.port}`,
        error instanceof Error ? error : undefined,
      );
    }
  }

  async disconnect(): Promise<void> {
    if (!this.client) {
      return;
    }
    try {
      await this.client.close();
    } catch (error) {
      this.logger.warn('Error while closing FalkorDB connection', {
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      this.client = null;
      this.graph = null;
      this.connectionState = ConnectionState.Disconnected;
    }
  }

  async healthCheck(): Promise<boolean> {
    if (this.connectionState !== ConnectionState.Connected || !this.graph) {
      return false;
    }

    try {
      await this.graph.query('RETURN 1');
      return true;
    } catch (error) {
      this.logger.warn('FalkorDB health check failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  /**
   * Execute a Cypher query
   * @throws ConnectionError if not connected
   * @throws QueryError if query execution fails
   */
  async query(cypher: string, params?: CypherParams): Promise<CypherResult> {
    const graph = this.requireConnection();

    try {
      const result = await graph.query<CypherRow>(cypher, params ? { params } : undefined);
      return {
        records: result.data ?? [],
        metadata: result.metadata ?? [],
      };
    } catch (error) {
      throw new QueryError(
        'Query execution failed',
        cypher,
        error instanceof Error ? error : undefined,
      );
    }
  }

  private requireConnection(): Graph {
    if (this.connectionState !== ConnectionState.Connected || !this.graph) {
      throw new ConnectionError('Not connected to FalkorDB. Call connect() first.');
    }
    return this.graph;
  }
}
