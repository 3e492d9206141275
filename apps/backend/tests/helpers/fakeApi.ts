import { DEFAULT_ENDPOINTS } from '@flash-deck/shared';
import type { FetchLike } from '../../src/collector/apiClient.js';
import type { Clock } from '../../src/collector/clock.js';
import type { Settings } from '../../src/config/env.js';
import type { CollectorLayout } from '../../src/config/files.js';

export const BASE_URL = 'https://api.test/v1';

export const LAYOUT: CollectorLayout = { endpoints: { ...DEFAULT_ENDPOINTS }, expand: ['owner'] };

/** Time only moves when someone sleeps. */
export class FakeClock implements Clock {
  t = 0;
  now(): number {
    return this.t;
  }
  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    this.t += Math.max(0, ms);
  }
}

export function json(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', ...headers },
  });
}

export function page(results: unknown[], next: string | null = null): Response {
  return json({ count: results.length, next, previous: null, results });
}

export type Handler = (url: URL, callIndex: number) => Response | Promise<Response>;

export interface RecordedCall {
  path: string;
  url: URL;
  at: number;
  authorization: string | null;
}

/**
 * In-process stand-in for the REST API. Routes are keyed by path below
 * BASE_URL; an unrouted path answers 404.
 */
export function fakeApi(routes: Record<string, Handler>, clock: Clock = new FakeClock()) {
  const calls: RecordedCall[] = [];
  const perPath = new Map<string, number>();

  const fetch: FetchLike = async (raw, init) => {
    const url = new URL(raw);
    const path = url.pathname.replace(/^\/v1/, '');
    const headers = new Headers(init.headers);
    calls.push({ path, url, at: clock.now(), authorization: headers.get('authorization') });
    const n = perPath.get(path) ?? 0;
    perPath.set(path, n + 1);
    const handler = routes[path];
    return handler ? handler(url, n) : new Response('not found', { status: 404 });
  };

  return { fetch, calls };
}

export const REFERENCE_ROUTES: Record<string, Handler> = {
  '/projects_moods/': () => page([{ code: 'good', name: 'Good', name_fr: 'Bon' }]),
  '/projects_statuses/': () => page([{ code: 'in_progress', name: 'In progress' }]),
  '/projects_risks/': () => page([{ code: 'low', name: 'Low' }]),
};

/** Routes for one healthy project: detail plus empty related collections. */
export function projectRoutes(id: string, detail: Record<string, unknown> = {}): Record<string, Handler> {
  return {
    [`/projects/${id}/`]: () =>
      json({ id, short_id: `P${id}`, name: `Project ${id}`, mood: 'good', status: 'in_progress', risk: 'low', ...detail }),
  };
}

/** Related collections filtered by the `project` query parameter. */
export function relatedRoutes(byProject: Record<string, { milestones?: unknown[]; decisions?: unknown[] }> = {}): Record<string, Handler> {
  return {
    '/milestones/': (url) => page(byProject[url.searchParams.get('project') ?? '']?.milestones ?? []),
    '/decisions/': (url) => page(byProject[url.searchParams.get('project') ?? '']?.decisions ?? []),
    '/attention_points/': () => page([]),
  };
}

export function testSettings(dir: string, overrides: Partial<Settings> = {}): Settings {
  return {
    api: {
      baseUrl: BASE_URL,
      token: 'test-secret-token-0000',
      authScheme: 'Api-Key',
      timeoutMs: 5_000,
      maxRetries: 3,
      ratePerSecond: 1_000,
    },
    concurrency: 2,
    dataDir: `${dir}/data`,
    outputDir: `${dir}/outputs`,
    configDir: `${dir}/config`,
    templatePath: `${dir}/template.pptx`,
    port: 0,
    ...overrides,
  };
}
