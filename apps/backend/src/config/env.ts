/**
 * Runtime settings, read from the environment (see .env.example).
 * Entrypoints load `dotenv/config` before calling loadSettings().
 *
 * Nothing here is cached: the Collector and the Synchronizer receive a
 * Settings value explicitly, so tests build their own without touching
 * process.env.
 */

import { resolve } from 'node:path';
import {
  DEFAULT_AUTH_SCHEME,
  DEFAULT_CONCURRENCY,
  DEFAULT_MAX_RETRIES,
  DEFAULT_RATE_PER_SECOND,
  DEFAULT_REQUEST_TIMEOUT_MS,
} from '@flash-deck/shared';
import { ConfigError } from '../errors.js';

export interface ApiSettings {
  baseUrl: string;
  token: string;
  authScheme: string;
  timeoutMs: number;
  maxRetries: number;
  ratePerSecond: number;
}

export interface Settings {
  api: ApiSettings;
  concurrency: number;
  dataDir: string;
  outputDir: string;
  configDir: string;
  templatePath: string;
  port: number;
}

type Env = Record<string, string | undefined>;

// ─── Helpers ─────────────────────────────────────────────

function envString(env: Env, name: string): string | undefined {
  const value = env[name];
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function envInt(env: Env, name: string, fallback: number, violations: string[], min = 1): number {
  const raw = envString(env, name);
  if (raw === undefined) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min) {
    violations.push(`${name} must be an integer >= ${min} (got "${raw}")`);
    return fallback;
  }
  return n;
}

function envPath(env: Env, name: string, fallback: string): string {
  return resolve(process.cwd(), envString(env, name) ?? fallback);
}

// ─── Public API ──────────────────────────────────────────

/**
 * Build Settings from an environment map.
 * Credentials are NOT required here: the HTTP surface and the template
 * commands run without them. requireApiCredentials() checks them for the
 * Collector.
 */
export function loadSettings(env: Env = process.env): Settings {
  const violations: string[] = [];

  const settings: Settings = {
    api: {
      baseUrl: (envString(env, 'API_BASE_URL') ?? '').replace(/\/+$/, ''),
      token: envString(env, 'API_TOKEN') ?? '',
      authScheme: envString(env, 'API_AUTH_SCHEME') ?? DEFAULT_AUTH_SCHEME,
      timeoutMs: envInt(env, 'API_TIMEOUT_MS', DEFAULT_REQUEST_TIMEOUT_MS, violations),
      maxRetries: envInt(env, 'API_MAX_RETRIES', DEFAULT_MAX_RETRIES, violations, 0),
      ratePerSecond: envInt(env, 'API_RATE_PER_SECOND', DEFAULT_RATE_PER_SECOND, violations),
    },
    concurrency: envInt(env, 'COLLECT_CONCURRENCY', DEFAULT_CONCURRENCY, violations),
    dataDir: envPath(env, 'DATA_DIR', 'data'),
    outputDir: envPath(env, 'OUTPUT_DIR', 'outputs'),
    configDir: envPath(env, 'CONFIG_DIR', 'config'),
    templatePath: envPath(env, 'TEMPLATE_PATH', 'templates/ProjectCard.pptx'),
    port: envInt(env, 'PORT', 4000, violations),
  };

  if (violations.length > 0) {
    throw new ConfigError(violations);
  }
  return settings;
}

/** Collector preflight: base URL and token must be present. */
export function requireApiCredentials(api: ApiSettings): void {
  const violations: string[] = [];
  if (!api.baseUrl) {
    violations.push('API_BASE_URL is not set.');
  } else if (!/^https?:\/\//.test(api.baseUrl)) {
    violations.push(`API_BASE_URL must be an http(s) URL (got "${api.baseUrl}").`);
  }
  if (!api.token) {
    violations.push('API_TOKEN is not set.');
  }
  if (violations.length > 0) {
    throw new ConfigError(violations);
  }
}

/**
 * Soft credential check. A token that looks wrong is worth a warning, never
 * a refusal: the server is the only authority on validity.
 */
export function tokenWarnings(token: string): string[] {
  const warnings: string[] = [];
  if (/\s/.test(token)) {
    warnings.push('API_TOKEN contains whitespace; check for a copy/paste error.');
  }
  if (token.length > 0 && token.length < 16) {
    warnings.push(`API_TOKEN is unusually short (${token.length} chars).`);
  }
  return warnings;
}
