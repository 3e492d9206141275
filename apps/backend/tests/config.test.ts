/**
 * L. Configuration
 * - Environment values are validated together; every violation is reported
 * - Config files are validated with zod and fail as ConfigError
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { DEFAULT_ENDPOINTS } from '@flash-deck/shared';
import { loadSettings, requireApiCredentials, tokenWarnings } from '../src/config/env.js';
import {
  loadCollectorLayout,
  loadMapping,
  loadPositionMap,
  loadProjectIds,
  mappingPath,
  positionMapPath,
} from '../src/config/files.js';
import { ConfigError } from '../src/errors.js';

const CONFIG_DIR = fileURLToPath(new URL('../../../config', import.meta.url));

describe('L. loadSettings', () => {
  it('applies defaults', () => {
    const settings = loadSettings({});
    expect(settings.api).toEqual({
      baseUrl: '',
      token: '',
      authScheme: 'Api-Key',
      timeoutMs: 15_000,
      maxRetries: 5,
      ratePerSecond: 10,
    });
    expect(settings.concurrency).toBe(5);
    expect(settings.port).toBe(4000);
    expect(settings.dataDir).toBe(resolve(process.cwd(), 'data'));
    expect(settings.templatePath).toBe(resolve(process.cwd(), 'templates/ProjectCard.pptx'));
  });

  it('reads and trims values', () => {
    const settings = loadSettings({
      API_BASE_URL: ' https://api.test/v1/ ',
      API_TOKEN: 'test-secret',
      API_MAX_RETRIES: '0',
      COLLECT_CONCURRENCY: '3',
      OUTPUT_DIR: '/tmp/decks',
    });
    expect(settings.api.baseUrl).toBe('https://api.test/v1');
    expect(settings.api.token).toBe('test-secret');
    expect(settings.api.maxRetries).toBe(0);
    expect(settings.concurrency).toBe(3);
    expect(settings.outputDir).toBe('/tmp/decks');
  });

  it('reports every invalid number at once', () => {
    let caught: unknown;
    try {
      loadSettings({ PORT: 'abc', COLLECT_CONCURRENCY: '0', API_MAX_RETRIES: '-1' });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof ConfigError ? caught.violations : []).toEqual([
      'API_MAX_RETRIES must be an integer >= 0 (got "-1")',
      'COLLECT_CONCURRENCY must be an integer >= 1 (got "0")',
      'PORT must be an integer >= 1 (got "abc")',
    ]);
  });
});

describe('L. credentials', () => {
  const api = loadSettings({}).api;

  it('requires base URL and token', () => {
    expect(() => requireApiCredentials(api)).toThrow(ConfigError);
    expect(() => requireApiCredentials({ ...api, baseUrl: 'ftp://x', token: 'test-secret' })).toThrow(
      'API_BASE_URL must be an http(s) URL (got "ftp://x").',
    );
    expect(() => requireApiCredentials({ ...api, baseUrl: 'https://api.test', token: 'test-secret' })).not.toThrow();
  });

  it('warns about tokens that look wrong', () => {
    expect(tokenWarnings('test-secret')).toEqual(['API_TOKEN is unusually short (11 chars).']);
    expect(tokenWarnings('test secret token value')).toEqual(['API_TOKEN contains whitespace; check for a copy/paste error.']);
    expect(tokenWarnings('test-secret-token-0000')).toEqual([]);
  });
});

describe('L. config files', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('accepts ids as strings, numbers or objects, de-duplicated', () => {
    writeFileSync(join(dir, 'projects.json'), JSON.stringify([12, '12', { id: 'A' }, 'B']));
    expect(loadProjectIds(dir)).toEqual(['12', 'A', 'B']);
  });

  it('rejects an empty or missing id list', () => {
    expect(() => loadProjectIds(dir)).toThrow(ConfigError);
    writeFileSync(join(dir, 'projects.json'), JSON.stringify({ projects: [] }));
    expect(() => loadProjectIds(dir)).toThrow(`${join(dir, 'projects.json')} lists no projects.`);
  });

  it('names the offending path in a malformed file', () => {
    writeFileSync(join(dir, 'positions.json'), JSON.stringify({ title: { x: 1, y: 1, width: 'wide', height: 1 } }));
    try {
      loadPositionMap(positionMapPath(dir));
      expect.unreachable();
    } catch (err) {
      expect(err instanceof ConfigError ? err.violations : []).toEqual([
        `${positionMapPath(dir)}: title.width: Expected number, received string`,
      ]);
    }
  });

  it('rejects invalid JSON', () => {
    writeFileSync(join(dir, 'mapping.json'), '{ nope');
    expect(() => loadMapping(mappingPath(dir))).toThrow(/is not valid JSON/);
  });

  it('merges collector.json over the default endpoints', () => {
    expect(loadCollectorLayout(dir)).toEqual({ endpoints: DEFAULT_ENDPOINTS, expand: ['owner', 'program', 'goals', 'teams'] });
    writeFileSync(join(dir, 'collector.json'), JSON.stringify({ endpoints: { milestones: '/v2/milestones/' } }));
    expect(loadCollectorLayout(dir).endpoints).toEqual({ ...DEFAULT_ENDPOINTS, milestones: '/v2/milestones/' });
  });

  it('requires {id} in the project endpoint', () => {
    writeFileSync(join(dir, 'collector.json'), JSON.stringify({ endpoints: { project: '/projects/' } }));
    expect(() => loadCollectorLayout(dir)).toThrow(ConfigError);
  });
});

describe('L. shipped configuration', () => {
  it('loads every file under config/', () => {
    expect(loadProjectIds(CONFIG_DIR)).toEqual(['PRJ-101', 'PRJ-102']);
    expect(loadCollectorLayout(CONFIG_DIR).expand).toContain('requesting_team');
    expect(Object.keys(loadPositionMap(positionMapPath(CONFIG_DIR)))).toHaveLength(11);
    const mapping = loadMapping(mappingPath(CONFIG_DIR));
    expect(Object.keys(mapping.slides.project_card ?? {})).toEqual(Object.keys(loadPositionMap(positionMapPath(CONFIG_DIR))));
  });
});
