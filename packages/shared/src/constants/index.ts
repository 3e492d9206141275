// ─── Constants ───────────────────────────────────────────

export {
  MAX_PAGE_SIZE,
  DEFAULT_RETRY_AFTER_SECONDS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_RATE_PER_SECOND,
  DEFAULT_CONCURRENCY,
  DEFAULT_AUTH_SCHEME,
  DEFAULT_ENDPOINTS,
  DEFAULT_PROJECT_EXPAND,
  SNAPSHOT_SUFFIX,
} from './api.js';
export type { EndpointName } from './api.js';

export {
  EMU_PER_INCH,
  POSITION_PRECISION,
  DEFAULT_POSITION_TOLERANCE,
  DEFAULT_MATCH_EPSILON,
  DEFAULT_COVERAGE_THRESHOLD,
  DEFAULT_TEMPLATE_SLIDE,
  PROJECT_SLIDE_TYPE,
  SUMMARY_MAX_ROWS,
  DECK_SUFFIX,
} from './template.js';
