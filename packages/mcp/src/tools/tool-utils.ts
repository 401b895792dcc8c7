/**
 * Tool utilities — shared helpers for wrapping tool handlers with middleware.
 */

import type { RateLimiterMiddleware } from '../middleware/rate-limiter.js';

export interface ToolMiddleware {
  rateLimiter: RateLimiterMiddleware;
}

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

export function textResult(text: string): ToolResult {
  return { content: [{ type: 'text', text }] };
}

export function errorResult(text: string): ToolResult {
  return { content: [{ type: 'text', text }], isError: true };
}

export function wrapToolHandler<T>(
  toolName: string,
  middleware: ToolMiddleware,
  handler: (args: T) => Promise<ToolResult>,
): (args: T) => Promise<ToolResult> {
  return async (args: T): Promise<ToolResult> => {
    const rateResult = middleware.rateLimiter.check(toolName);
    if (!rateResult.allowed) {
      return errorResult(
        `Rate limit exceeded for "${toolName}". Retry after ${String(rateResult.retryAfterMs ?? 1000)}ms.`
      );
    }

    try {
      return await handler(args);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return errorResult(`Tool "${toolName}" failed: ${message}`);
    }
  };
}
