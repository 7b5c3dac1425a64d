/**
 * Resilient HTTP invoker
 *
 * Every outbound call goes through here. Retries 429/500/502/503/504 and
 * network failures with exponential backoff plus jitter; 429 on a GET honours
 * Retry-After or doubles the backoff. Never throws for remote failures: the
 * caller branches on HttpResult.
 */

import {
  ConflictAlreadySatisfied,
  PermanentRemoteError,
  RemoteError,
  TransientRemoteError,
  isAlreadySatisfied,
  describeError,
} from '../shared/errors.js';
import { nullSink, type EventSink } from '../shared/events.js';
import { sleep as realSleep, type Sleep } from '../shared/pacing.js';
import type { RetryPolicy } from '../shared/types.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type HttpResult<T> =
  | { ok: true; value: T; status: number }
  | { ok: false; error: RemoteError };

export interface RequestSpec {
  url: string;
  method?: HttpMethod;
  query?: Record<string, string | number | undefined>;
  headers?: Record<string, string>;
  json?: unknown;
  form?: Record<string, string>;
  maxAttempts?: number;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface InvokerOptions {
  policy: RetryPolicy;
  fetchImpl?: FetchLike;
  sleep?: Sleep;
  random?: () => number;
  events?: EventSink;
}

const TRANSIENT_STATUSES = new Set([429, 500, 502, 503, 504]);

export type StatusClass = 'ok' | 'transient' | 'permanent';

export function classifyStatus(status: number): StatusClass {
  if (status >= 200 && status < 300) return 'ok';
  return TRANSIENT_STATUSES.has(status) ? 'transient' : 'permanent';
}

/**
 * Delay before the next attempt. `attempt` is the 1-based attempt that failed.
 * Rate-limited (429 on GET): Retry-After + up to 1s, else base·2^(n-1)·2 + up to 1s.
 * Anything else transient: base·2^(n-1) + up to 250ms.
 */
export function backoffDelayMs(
  attempt: number,
  baseDelayMs: number,
  rateLimited: boolean,
  retryAfterSec: number | null,
  random: () => number = Math.random
): number {
  const exp = baseDelayMs * 2 ** (attempt - 1);
  if (rateLimited) {
    if (retryAfterSec != null) return retryAfterSec * 1000 + random() * 1000;
    return exp * 2 + random() * 1000;
  }
  return exp + random() * 250;
}

function parseRetryAfter(value: string | null): number | null {
  if (!value) return null;
  const n = Number.parseInt(value, 10);
  return Number.isFinite(n) && n >= 0 ? n : null;
}

export function buildUrl(url: string, query?: RequestSpec['query']): string {
  if (!query) return url;
  const params = new URLSearchParams();
  for (const [k, v] of Object.entries(query)) {
    if (v !== undefined && v !== '') params.set(k, String(v));
  }
  const qs = params.toString();
  if (!qs) return url;
  return `${url}${url.includes('?') ? '&' : '?'}${qs}`;
}

export class HttpInvoker {
  private readonly policy: RetryPolicy;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly events: EventSink;

  constructor(opts: InvokerOptions) {
    this.policy = opts.policy;
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.sleep = opts.sleep ?? realSleep;
    this.random = opts.random ?? Math.random;
    this.events = opts.events ?? nullSink;
  }

  /**
   * Run `operation` under the retry policy. The operation receives an
   * AbortSignal bound to the per-attempt timeout.
   */
  async call(
    operation: (signal: AbortSignal) => Promise<Response>,
    meta: { method: HttpMethod; url: string; maxAttempts?: number }
  ): Promise<HttpResult<Response>> {
    const maxAttempts = Math.max(1, meta.maxAttempts ?? this.policy.maxAttempts);
    let lastError: RemoteError = new TransientRemoteError('no attempt made', meta.url, null);

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), this.policy.timeoutMs);
      let res: Response;
      try {
        res = await operation(controller.signal);
      } catch (err) {
        const message = controller.signal.aborted
          ? `timeout after ${this.policy.timeoutMs}ms`
          : describeError(err);
        lastError = new TransientRemoteError(`${meta.method} ${meta.url}: ${message}`, meta.url, null);
        if (attempt < maxAttempts) await this.backoff(attempt, maxAttempts, meta, false, null, message);
        continue;
      } finally {
        clearTimeout(timer);
      }

      const cls = classifyStatus(res.status);
      if (cls === 'ok') return { ok: true, value: res, status: res.status };

      const body = await res.text().catch(() => '');
      const summary = `HTTP ${res.status} ${meta.method} ${meta.url}${body ? `: ${body.slice(0, 200)}` : ''}`;

      if (cls === 'permanent') {
        if (meta.method !== 'GET' && isAlreadySatisfied(res.status, body)) {
          return { ok: false, error: new ConflictAlreadySatisfied(summary, meta.url, res.status) };
        }
        return { ok: false, error: new PermanentRemoteError(summary, meta.url, res.status) };
      }

      const retryAfter = parseRetryAfter(res.headers.get('retry-after'));
      lastError = new TransientRemoteError(summary, meta.url, res.status, retryAfter);
      if (attempt < maxAttempts) {
        const rateLimited = res.status === 429 && meta.method === 'GET';
        await this.backoff(attempt, maxAttempts, meta, rateLimited, retryAfter, `HTTP ${res.status}`);
      }
    }

    return { ok: false, error: lastError };
  }

  /** JSON request; the body is decoded as T. */
  async request<T>(spec: RequestSpec): Promise<HttpResult<T>> {
    const result = await this.exec({ ...spec, method: spec.method ?? 'GET' });
    if (!result.ok) return result;

    const text = await result.value.text();
    try {
      const value = (text ? JSON.parse(text) : {}) as T;
      return { ok: true, value, status: result.status };
    } catch {
      return {
        ok: false,
        error: new PermanentRemoteError(`invalid JSON from ${spec.url}`, spec.url, result.status),
      };
    }
  }

  /** Request whose response body is irrelevant (204s, mutating calls). */
  async send(spec: RequestSpec): Promise<HttpResult<null>> {
    const result = await this.exec({ ...spec, method: spec.method ?? 'POST' });
    if (!result.ok) return result;
    await result.value.arrayBuffer().catch(() => undefined);
    return { ok: true, value: null, status: result.status };
  }

  private exec(spec: RequestSpec & { method: HttpMethod }): Promise<HttpResult<Response>> {
    return this.call((signal) => this.fetchImpl(buildUrl(spec.url, spec.query), this.init(spec, signal)), {
      method: spec.method,
      url: spec.url,
      maxAttempts: spec.maxAttempts,
    });
  }

  private init(spec: RequestSpec & { method: HttpMethod }, signal: AbortSignal): RequestInit {
    const headers: Record<string, string> = { Accept: 'application/json', ...spec.headers };
    let body: string | undefined;
    if (spec.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(spec.json);
    } else if (spec.form) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
      body = new URLSearchParams(spec.form).toString();
    }
    return { method: spec.method, headers, body, signal };
  }

  private async backoff(
    attempt: number,
    maxAttempts: number,
    meta: { url: string },
    rateLimited: boolean,
    retryAfter: number | null,
    reason: string
  ): Promise<void> {
    const delayMs = backoffDelayMs(attempt, this.policy.baseDelayMs, rateLimited, retryAfter, this.random);
    this.events.emit({ type: 'retry', url: meta.url, attempt: attempt + 1, maxAttempts, delayMs, reason });
    await this.sleep(delayMs);
  }
}
