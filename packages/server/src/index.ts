// strata-rag server entry point

export * from './errors.js';
export { HealthChecker } from './health.js';
export { HTTPTransport } from './http.js';
export { createMcpServer, toQueryParam } from './mcp-server-factory.js';
export { SharedResources } from './shared-resources.js';

export const VERSION = '0.1.0';
