// ─── Remote API defaults ─────────────────────────────────

/** Largest page the API serves; requested on every paginated call. */
export const MAX_PAGE_SIZE = 100;

/** Wait applied on a 429 that carries no usable Retry-After (seconds). */
export const DEFAULT_RETRY_AFTER_SECONDS = 5;

/** Upper bound on consecutive 429 retries for a single request. */
export const DEFAULT_MAX_RETRIES = 5;

/** Per-request timeout in ms. */
export const DEFAULT_REQUEST_TIMEOUT_MS = 15_000;

/** Documented API ceiling is 15 req/s; stay comfortably below it. */
export const DEFAULT_RATE_PER_SECOND = 10;

/** Concurrent entity fetches. */
export const DEFAULT_CONCURRENCY = 5;

export const DEFAULT_AUTH_SCHEME = 'Api-Key';

/** Default endpoint layout. Overridable from config/collector.json. */
export const DEFAULT_ENDPOINTS = {
  moods: '/projects_moods/',
  statuses: '/projects_statuses/',
  risks: '/projects_risks/',
  project: '/projects/{id}/',
  milestones: '/milestones/',
  decisions: '/decisions/',
  attentionPoints: '/attention_points/',
} as const;

export type EndpointName = keyof typeof DEFAULT_ENDPOINTS;

/** Related fields expanded on the project detail call. */
export const DEFAULT_PROJECT_EXPAND = ['owner', 'program', 'goals', 'teams'] as const;

/** Snapshot files are named `<YYYY-MM-DD>${SNAPSHOT_SUFFIX}`. */
export const SNAPSHOT_SUFFIX = '_projects.json';
