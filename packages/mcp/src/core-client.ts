/**
 * CoreApiClient — typed HTTP client wrapping fetch() to call the gateway REST API.
 *
 * Every response body is parsed with the schema the caller supplies, so tools
 * only ever see validated shapes.
 */

import type { z } from 'zod';
import { ErrorBodySchema } from '@termjudge/shared';

type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface CoreApiClientOptions {
  coreUrl: string;
  coreToken?: string;
  /** Per-request timeout. Judge runs can take a while. */
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 120_000;

export class CoreApiClient {
  private readonly baseUrl: string;
  private readonly token: string | undefined;
  private readonly timeoutMs: number;

  constructor(opts: CoreApiClientOptions) {
    this.baseUrl = opts.coreUrl.replace(/\/+$/, '');
    this.token = opts.coreToken;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  get<T>(path: string, schema: ResponseSchema<T>): Promise<T> {
    return this.request('GET', path, schema);
  }

  post<T>(path: string, schema: ResponseSchema<T>, body?: unknown): Promise<T> {
    return this.request('POST', path, schema, body);
  }

  delete<T>(path: string, schema: ResponseSchema<T>): Promise<T> {
    return this.request('DELETE', path, schema);
  }

  private async request<T>(method: string, path: string, schema: ResponseSchema<T>, body?: unknown): Promise<T> {
    const res = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers: this.headers(body !== undefined),
      body: body !== undefined ? JSON.stringify(body) : undefined,
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    return this.handleResponse(res, schema);
  }

  private headers(hasBody: boolean): Record<string, string> {
    const headers: Record<string, string> = {};
    if (hasBody) headers['Content-Type'] = 'application/json';
    if (this.token) headers['Authorization'] = `Bearer ${this.token}`;
    return headers;
  }

  private async handleResponse<T>(res: Response, schema: ResponseSchema<T>): Promise<T> {
    const text = await res.text();
    let body: unknown = undefined;
    if (text) {
      try {
        body = JSON.parse(text);
      } catch {
        body = text;
      }
    }

    if (!res.ok) {
      const error = ErrorBodySchema.safeParse(body);
      throw new CoreApiError(res.status, error.success ? error.data.message : text || res.statusText);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new CoreApiError(res.status, `Unexpected response shape: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}

export class CoreApiError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly detail: string
  ) {
    super(`Core API error ${statusCode}: ${detail}`);
    this.name = 'CoreApiError';
  }
}
