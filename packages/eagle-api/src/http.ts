/**
 * HTTP transport for the Eagle local API.
 *
 * Every endpoint answers with an envelope `{ status, data?, message? }`.
 * The client unwraps it and hands back `data`, or throws a typed error.
 */

import { z } from 'zod';
import type { ConnectionConfig } from './config.js';
import { EagleApiError, EagleConnectionError } from './errors.js';
import { jsonValueSchema, type JsonValue } from './json.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type QueryValue = string | number | boolean | undefined;

const envelopeSchema = z.object({
  status: z.string(),
  data: jsonValueSchema.optional(),
  message: z.string().optional(),
});

export class EagleHttpClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(config: ConnectionConfig, fetchImpl: FetchLike = fetch) {
    this.baseUrl = `http://${config.host}:${config.port}`;
    this.timeoutMs = config.timeoutMs;
    this.fetchImpl = fetchImpl;
  }

  /** Build the URL for `/api/<resource>/<action>`; undefined query values are omitted. */
  endpoint(resource: string, action: string, query: Record<string, QueryValue> = {}): string {
    const url = new URL(`/api/${resource}/${action}`, this.baseUrl);
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  async get(
    resource: string,
    action: string,
    query: Record<string, QueryValue> = {},
  ): Promise<JsonValue> {
    return this.requestUrl(this.endpoint(resource, action, query), 'GET');
  }

  async post(resource: string, action: string, body: JsonValue): Promise<JsonValue> {
    return this.requestUrl(this.endpoint(resource, action), 'POST', body);
  }

  /**
   * Send a request to an arbitrary URL and unwrap the envelope.
   * Used directly for plugin servers, which do not follow the /api layout.
   */
  async requestUrl(url: string, method: HttpMethod, body?: JsonValue): Promise<JsonValue> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new EagleConnectionError(this.describeFailure(url, err), url);
    }

    let text: string;
    try {
      text = await response.text();
    } catch (err) {
      throw new EagleConnectionError(this.describeFailure(url, err, 'Lost connection to'), url);
    }
    if (!response.ok) {
      const detail = text.trim() === '' ? '' : `: ${text.trim().slice(0, 200)}`;
      throw new EagleApiError(
        `${method} ${url} failed with HTTP ${response.status}${detail}`,
        response.status,
      );
    }
    return parseEnvelope(text, url);
  }

  private describeFailure(url: string, err: unknown, prefix = 'Could not connect to'): string {
    if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
      return `Request to ${url} timed out after ${this.timeoutMs}ms`;
    }
    const origin = new URL(url).origin;
    if (err instanceof Error) {
      const reason = err.cause instanceof Error ? err.cause.message : err.message;
      return `${prefix} ${origin}: ${reason}`;
    }
    return `${prefix} ${origin}: ${String(err)}`;
  }
}

/**
 * Decode a response body and return the envelope's data (null when absent).
 */
export function parseEnvelope(text: string, url: string): JsonValue {
  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch (err) {
    throw new EagleApiError(
      `Invalid JSON from ${url}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const envelope = envelopeSchema.safeParse(decoded);
  if (!envelope.success) {
    const issue = envelope.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new EagleApiError(
      `Unexpected response from ${url}${where}: ${issue?.message ?? 'invalid envelope'}`,
    );
  }

  const { status, data, message } = envelope.data;
  if (status !== 'success') {
    throw new EagleApiError(message ?? `Request to ${url} returned status "${status}"`);
  }
  return data ?? null;
}
