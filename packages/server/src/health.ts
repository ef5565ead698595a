// Health check endpoint
import type { GraphRAG } from '@strata-rag/core';
import type { HealthStatus } from '@strata-rag/shared';

export class HealthChecker {
  private startTime: number;

  constructor(private rag: GraphRAG) {
    this.startTime = Date.now();
  }

  async check(): Promise<HealthStatus> {
    const connected = await this.rag.healthCheck().catch(() => false);

    return {
      status: connected ? 'ok' : 'error',
      graphStorage: connected ? 'connected' : 'disconnected',
      backend: this.rag.graph.backend,
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
    };
  }
}
