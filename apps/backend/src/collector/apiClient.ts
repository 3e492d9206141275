/**
 * Authenticated client for the project-portfolio REST API.
 *
 * - Every request passes the shared RateGate first.
 * - 429 → Retry-After (header, then body, then default) is applied to the
 *   gate and the same request is retried, up to `maxRetries` times.
 * - Any other failure is an UpstreamError (status 0 for network/timeout).
 */

import { DEFAULT_RETRY_AFTER_SECONDS, MAX_PAGE_SIZE, type EndpointName } from '@flash-deck/shared';
import { RateLimitExceededError, UpstreamError, errorMessage } from '../errors.js';
import type { CollectorLayout } from '../config/files.js';
import { systemClock, type Clock } from './clock.js';
import type { RateGate } from './rateGate.js';

// ─── Types ──────────────────────────────────────────────

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type QueryParams = Record<string, string | number | undefined>;

export interface ApiClientOptions {
  baseUrl: string;
  token: string;
  authScheme: string;
  timeoutMs: number;
  maxRetries: number;
  gate: RateGate;
  layout: CollectorLayout;
  fetch?: FetchLike;
  clock?: Clock;
  /** Run-level abort; cancels waits and in-flight requests. */
  signal?: AbortSignal;
}

interface Page {
  items: unknown[];
  next: string | null;
}

const BODY_EXCERPT_CHARS = 200;

// ─── Response helpers ───────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * The API answers list endpoints with `{count, next, previous, results}`,
 * but some return a bare array or a single object.
 */
export function toPage(body: unknown): Page {
  if (Array.isArray(body)) return { items: body, next: null };
  if (isRecord(body)) {
    if (Array.isArray(body.results)) {
      const next = typeof body.next === 'string' && body.next.length > 0 ? body.next : null;
      return { items: body.results, next };
    }
    return { items: [body], next: null };
  }
  return { items: [], next: null };
}

const HTTP_DATE = /^[A-Za-z]{3}, \d{2} [A-Za-z]{3} \d{4} \d{2}:\d{2}:\d{2} GMT$/;

function parseSeconds(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value) && value >= 0) return value;
  if (typeof value === 'string' && /^\s*\d+(\.\d+)?\s*$/.test(value)) return Number(value);
  return null;
}

/**
 * Seconds to wait after a 429. Header first (delta-seconds or HTTP-date),
 * then `retry_after` / `retryAfter` / "... in N seconds" in the JSON body.
 */
export function parseRetryAfter(headerValue: string | null, bodyText: string, nowMs: number): number {
  if (headerValue !== null) {
    const seconds = parseSeconds(headerValue);
    if (seconds !== null) return seconds;
    const trimmed = headerValue.trim();
    if (HTTP_DATE.test(trimmed)) {
      const at = Date.parse(trimmed);
      if (!Number.isNaN(at)) return Math.max(0, Math.ceil((at - nowMs) / 1000));
    }
  }

  let body: unknown;
  try {
    body = JSON.parse(bodyText);
  } catch {
    body = undefined;
  }
  if (isRecord(body)) {
    const direct = parseSeconds(body.retry_after) ?? parseSeconds(body.retryAfter);
    if (direct !== null) return direct;
    if (typeof body.detail === 'string') {
      const m = /in (\d+(?:\.\d+)?) seconds?/i.exec(body.detail);
      if (m) return Number(m[1]);
    }
  }
  return DEFAULT_RETRY_AFTER_SECONDS;
}

// ─── Client ─────────────────────────────────────────────

export class ApiClient {
  private readonly fetchImpl: FetchLike;
  private readonly clock: Clock;
  readonly layout: CollectorLayout;

  constructor(private readonly opts: ApiClientOptions) {
    this.fetchImpl = opts.fetch ?? ((url, init) => fetch(url, init));
    this.clock = opts.clock ?? systemClock;
    this.layout = opts.layout;
  }

  /** Configured path for a named endpoint, `{id}` substituted. */
  endpoint(name: EndpointName, id?: string): string {
    const path = this.opts.layout.endpoints[name];
    return id === undefined ? path : path.replace('{id}', encodeURIComponent(id));
  }

  buildUrl(path: string, params: QueryParams = {}): string {
    const url = /^https?:\/\//.test(path)
      ? new URL(path)
      : new URL(`${this.opts.baseUrl}${path.startsWith('/') ? '' : '/'}${path}`);
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  /** GET one resource and return its parsed JSON body. */
  async get(path: string, params: QueryParams = {}): Promise<unknown> {
    return this.request(this.buildUrl(path, params), path);
  }

  /**
   * Every item of a paginated collection, in server order.
   * Requests the largest page size and follows `next` until it is null.
   */
  async fetchAllPages(path: string, params: QueryParams = {}): Promise<unknown[]> {
    const items: unknown[] = [];
    const visited = new Set<string>();
    let url: string | null = this.buildUrl(path, { ...params, page_size: MAX_PAGE_SIZE });

    while (url !== null) {
      if (visited.has(url)) {
        throw new UpstreamError(`Pagination loop on ${path}: ${url} was already fetched`, {
          status: 0,
          endpoint: path,
          attempts: 1,
        });
      }
      visited.add(url);
      const page = toPage(await this.request(url, path));
      items.push(...page.items);
      url = page.next === null ? null : this.buildUrl(page.next);
    }
    return items;
  }

  private async request(url: string, endpoint: string): Promise<unknown> {
    const { gate, maxRetries, timeoutMs, signal } = this.opts;

    for (let attempt = 1; ; attempt++) {
      await gate.acquire(signal);

      const timeout = AbortSignal.timeout(timeoutMs);
      let res: Response;
      try {
        res = await this.fetchImpl(url, {
          method: 'GET',
          headers: {
            Authorization: `${this.opts.authScheme} ${this.opts.token}`,
            Accept: 'application/json',
          },
          signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
        });
      } catch (err) {
        if (signal?.aborted) throw err;
        const reason = timeout.aborted ? `timed out after ${timeoutMs}ms` : errorMessage(err);
        throw new UpstreamError(`GET ${endpoint} failed: ${reason}`, {
          status: 0,
          endpoint,
          attempts: attempt,
          cause: err,
        });
      }

      if (res.status === 429) {
        const bodyText = await res.text().catch(() => '');
        const seconds = parseRetryAfter(res.headers.get('retry-after'), bodyText, this.clock.now());
        // paused even when this was the last attempt
        gate.pauseFor(seconds * 1000);
        if (attempt > maxRetries) {
          throw new RateLimitExceededError(endpoint, attempt, seconds);
        }
        console.warn(
          `[collector] 429 on ${endpoint}, pausing all workers for ${seconds}s (retry ${attempt}/${maxRetries})`,
        );
        continue;
      }

      if (!res.ok) {
        const bodyText = await res.text().catch(() => '');
        throw new UpstreamError(
          `GET ${endpoint} returned HTTP ${res.status}: ${bodyText.slice(0, BODY_EXCERPT_CHARS)}`,
          { status: res.status, endpoint, attempts: attempt },
        );
      }

      try {
        return await res.json();
      } catch (err) {
        throw new UpstreamError(`GET ${endpoint} returned a body that is not JSON`, {
          status: res.status,
          endpoint,
          attempts: attempt,
          cause: err,
        });
      }
    }
  }
}
