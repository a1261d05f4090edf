// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * HTTP Transport
 *
 * Performs one HTTP request per logical operation against a configured base
 * URL and normalizes the outcome into an ApiResult:
 *
 * - 2xx      → ok (body decoded with the caller's schema)
 * - 404      → not_found
 * - other    → remote failure with the server's `detail` when present
 * - no reply → connection failure naming the base URL
 * - closed   → cancelled
 *
 * A transport is created once per process and closed on every exit path.
 * Closing aborts the request in flight and refuses new ones.
 */

import type { z } from 'zod';
import { logger } from '../logger.js';
import { failure, notFound, ok, type ApiFailure, type ApiResult } from './result.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Minimal fetch signature so tests can inject a stand-in.
 */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

/**
 * Whether a request carries the bearer token.
 * - none: never
 * - optional: when one is configured
 * - required: refuse locally when none is configured
 */
export type AuthMode = 'none' | 'optional' | 'required';

export type QueryValue = string | number | boolean | undefined;

export interface TransportConfig {
  baseUrl: string;
  /** Path prefix shared by every route, e.g. "/admin" */
  prefix?: string;
  token?: string;
  /** Default per-request timeout */
  timeoutMs: number;
  /** Human name used in connection hints, e.g. "Admin API" */
  serviceName: string;
  fetch?: FetchLike;
}

export interface RequestOptions<T> {
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** JSON request body */
  json?: unknown;
  /** Multipart request body; takes precedence over json */
  form?: FormData;
  query?: Record<string, QueryValue>;
  auth?: AuthMode;
  /** Token for this request only (e.g. the token being validated) */
  bearer?: string;
  /** Name of the operation for the missing-token message */
  operation?: string;
  timeoutMs?: number;
}

/**
 * Anything with a close step, released by withClient.
 */
export interface Closeable {
  close(): void | Promise<void>;
}

type SendOutcome =
  | { sent: true; status: number; statusText: string; ok: boolean; text: string }
  | { sent: false; error: ApiFailure };

/**
 * Encode one user-supplied path segment.
 */
export function pathSegment(value: string): string {
  return encodeURIComponent(value);
}

/**
 * Pull the human-readable `detail` out of an error body, if there is one.
 */
export function extractDetail(text: string): string | null {
  if (text.trim() === '') return null;
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    return null;
  }
  if (typeof body !== 'object' || body === null || !('detail' in body)) {
    return null;
  }
  const detail = body.detail;
  if (typeof detail === 'string') return detail;
  return JSON.stringify(detail);
}

function describeCause(error: unknown): string {
  if (error instanceof Error) {
    // fetch wraps socket errors: TypeError("fetch failed") with the real cause attached
    if (error.cause instanceof Error && error.cause.message) {
      return error.cause.message;
    }
    return error.message;
  }
  return String(error);
}

export class HttpTransport implements Closeable {
  readonly baseUrl: string;
  readonly serviceName: string;
  private readonly prefix: string;
  private readonly token?: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly lifetime = new AbortController();
  private closed = false;

  constructor(config: TransportConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.prefix = config.prefix ?? '';
    this.token = config.token || undefined;
    this.timeoutMs = config.timeoutMs;
    this.serviceName = config.serviceName;
    this.fetchImpl = config.fetch ?? ((url, init) => fetch(url, init));
  }

  get hasToken(): boolean {
    return this.token !== undefined;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Build the absolute URL for a route.
   */
  url(path: string, query?: Record<string, QueryValue>): string {
    let url = `${this.baseUrl}${this.prefix}${path}`;
    if (query) {
      const params = new URLSearchParams();
      for (const [key, value] of Object.entries(query)) {
        if (value !== undefined) params.append(key, String(value));
      }
      const qs = params.toString();
      if (qs) url += `?${qs}`;
    }
    return url;
  }

  async request<T>(method: HttpMethod, path: string, options: RequestOptions<T>): Promise<ApiResult<T>> {
    if (this.closed) {
      return failure({ type: 'cancelled' });
    }

    const auth = options.auth ?? 'none';
    const token = options.bearer ?? (auth === 'none' ? undefined : this.token);
    if (auth === 'required' && !token) {
      return failure(this.missingToken(options.operation ?? 'this operation'));
    }

    const headers: Record<string, string> = { Accept: 'application/json' };
    let body: string | FormData | undefined;
    if (options.form) {
      body = options.form;
    } else if (options.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.json);
      logger.apiPayload('request', body);
    }
    if (token) {
      headers.Authorization = `Bearer ${token}`;
    }

    const url = this.url(path, options.query);
    const outcome = await this.send(method, url, headers, body, options.timeoutMs ?? this.timeoutMs);
    if (!outcome.sent) {
      return failure(outcome.error);
    }
    return this.interpret(outcome, options.schema);
  }

  /**
   * Local refusal for a protected operation attempted without a token.
   */
  missingToken(operation: string): ApiFailure {
    return {
      type: 'validation',
      field: 'token',
      message: `Authentication required for ${operation}. Please provide a token.`,
    };
  }

  /**
   * Abort anything in flight and refuse further requests. Idempotent.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.lifetime.abort();
    logger.debug(`Closed ${this.serviceName} client`);
  }

  private async send(
    method: HttpMethod,
    url: string,
    headers: Record<string, string>,
    body: string | FormData | undefined,
    timeoutMs: number
  ): Promise<SendOutcome> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onClose = (): void => controller.abort();
    this.lifetime.signal.addEventListener('abort', onClose, { once: true });

    const started = Date.now();
    logger.apiRequest(method, url);
    try {
      const response = await this.fetchImpl(url, { method, headers, body, signal: controller.signal });
      const text = await response.text();
      logger.apiResponse(response.status, (Date.now() - started) / 1000);
      return {
        sent: true,
        status: response.status,
        statusText: response.statusText,
        ok: response.ok,
        text,
      };
    } catch (error) {
      if (this.closed && !timedOut) {
        logger.debug(`[API] ${method} ${url} cancelled`);
        return { sent: false, error: { type: 'cancelled' } };
      }
      const cause = timedOut ? `Request timed out after ${timeoutMs / 1000}s` : describeCause(error);
      logger.debug(`[API] ${method} ${url} failed: ${cause}`);
      return { sent: false, error: this.connectionFailure(cause) };
    } finally {
      clearTimeout(timer);
      this.lifetime.signal.removeEventListener('abort', onClose);
    }
  }

  private interpret<T>(
    response: { status: number; statusText: string; ok: boolean; text: string },
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): ApiResult<T> {
    if (response.status === 404) {
      return notFound();
    }

    if (!response.ok) {
      const fallback = `${response.status} ${response.statusText}`.trim();
      return failure({
        type: 'remote',
        status: response.status,
        detail: extractDetail(response.text) ?? fallback,
      });
    }

    let payload: unknown = null;
    if (response.text.trim() !== '') {
      logger.apiPayload('response', response.text);
      try {
        payload = JSON.parse(response.text);
      } catch {
        return failure({ type: 'decode', message: 'response body is not valid JSON' });
      }
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return failure({ type: 'decode', message: `${where}${issue.message}` });
    }
    return ok(parsed.data);
  }

  private connectionFailure(cause: string): ApiFailure {
    return { type: 'connection', cause, baseUrl: this.baseUrl, service: this.serviceName };
  }
}

/**
 * Create a client, run `use` with it and close it on every exit path.
 */
export async function withClient<C extends Closeable, R>(
  create: () => C,
  use: (client: C) => Promise<R>
): Promise<R> {
  const client = create();
  try {
    return await use(client);
  } finally {
    await client.close();
  }
}
