/**
 * Error taxonomy for the Collector and Template Synchronizer.
 * Each error keeps the context a caller needs to log actionably.
 */

/**
 * Missing or malformed configuration (credentials, id list, config files).
 * Fatal: no partial output is written.
 */
export class ConfigError extends Error {
  public readonly violations: string[];
  constructor(violations: string[]) {
    const header = `Invalid configuration (${violations.length} violation(s)):`;
    const body = violations.map((v, i) => `  ${i + 1}. ${v}`).join('\n');
    super(`${header}\n${body}`);
    this.name = 'ConfigError';
    this.violations = violations;
  }
}

/** Non-429 HTTP failure, network error or timeout on a single call. */
export class UpstreamError extends Error {
  public readonly status: number; // 0 = no response
  public readonly endpoint: string;
  public readonly attempts: number;
  public readonly entityId?: string;
  constructor(
    message: string,
    opts: { status: number; endpoint: string; attempts: number; entityId?: string; cause?: unknown },
  ) {
    super(message, opts.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = 'UpstreamError';
    this.status = opts.status;
    this.endpoint = opts.endpoint;
    this.attempts = opts.attempts;
    this.entityId = opts.entityId;
  }

  /** Same failure, tagged with the entity it was fetched for. */
  forEntity(entityId: string): UpstreamError {
    return new UpstreamError(`[entity ${entityId}] ${this.message}`, {
      status: this.status,
      endpoint: this.endpoint,
      attempts: this.attempts,
      entityId,
      cause: this,
    });
  }
}

/** The server kept answering 429 past the retry ceiling. */
export class RateLimitExceededError extends Error {
  public readonly endpoint: string;
  public readonly attempts: number;
  public readonly lastRetryAfterSeconds: number;
  constructor(endpoint: string, attempts: number, lastRetryAfterSeconds: number) {
    super(
      `Rate limit still in effect on ${endpoint} after ${attempts} attempt(s) (last Retry-After: ${lastRetryAfterSeconds}s)`,
    );
    this.name = 'RateLimitExceededError';
    this.endpoint = endpoint;
    this.attempts = attempts;
    this.lastRetryAfterSeconds = lastRetryAfterSeconds;
  }
}

/** The template could not be opened as a presentation package. */
export class TemplateLoadError extends Error {
  public readonly source: string;
  constructor(source: string, reason: string, cause?: unknown) {
    super(`Cannot load template ${source}: ${reason}`, cause !== undefined ? { cause } : undefined);
    this.name = 'TemplateLoadError';
    this.source = source;
  }
}

/** File read/write failure, carrying the path involved. */
export class SnapshotIOError extends Error {
  public readonly path: string;
  public readonly operation: 'read' | 'write' | 'list' | 'parse';
  constructor(operation: 'read' | 'write' | 'list' | 'parse', path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to ${operation} ${path}: ${reason}`, { cause });
    this.name = 'SnapshotIOError';
    this.path = path;
    this.operation = operation;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** HTTP status for an error surfaced by a route. */
export function httpStatusFor(err: unknown): number {
  if (err instanceof ConfigError) return 400;
  if (err instanceof UpstreamError || err instanceof RateLimitExceededError) return 502;
  if (err instanceof TemplateLoadError) return 422;
  // listing found nothing to work from
  if (err instanceof SnapshotIOError && err.operation === 'list') return 404;
  return 500;
}
