/**
 * @termjudge/mcp — MCP tool surface over the session engine gateway.
 */

export { createMcpServer, SERVER_NAME, SERVER_VERSION, type CreateMcpServerOptions } from './server.js';
export { CoreApiClient, CoreApiError, type CoreApiClientOptions } from './core-client.js';
export { loadConfig } from './config/config.js';
export { createRateLimiter, type RateLimiterMiddleware } from './middleware/rate-limiter.js';
export { registerAllTools, type ToolMiddleware } from './tools/index.js';
