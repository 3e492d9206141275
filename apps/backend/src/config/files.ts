/**
 * JSON configuration files under CONFIG_DIR.
 *
 *   projects.json   entity ids to collect
 *   collector.json  endpoint layout overrides (optional)
 *   positions.json  PositionMap
 *   mapping.json    role → field mapping
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import {
  DEFAULT_ENDPOINTS,
  DEFAULT_PROJECT_EXPAND,
  MappingFileSchema,
  PositionMapSchema,
  zEntityId,
  type EndpointName,
  type MappingFile,
  type PositionMap,
} from '@flash-deck/shared';
import { ConfigError } from '../errors.js';

// ─── Schemas ─────────────────────────────────────────────

const ProjectEntrySchema = z.union([
  zEntityId,
  z.object({ id: zEntityId, name: z.string().optional() }).transform((p) => p.id),
]);

const ProjectsFileSchema = z.union([
  z.array(ProjectEntrySchema),
  z.object({ projects: z.array(ProjectEntrySchema) }).transform((f) => f.projects),
]);

const CollectorFileSchema = z.object({
  endpoints: z
    .object({
      moods: z.string(),
      statuses: z.string(),
      risks: z.string(),
      project: z.string().includes('{id}'),
      milestones: z.string(),
      decisions: z.string(),
      attentionPoints: z.string(),
    })
    .partial()
    .default({}),
  expand: z.array(z.string()).optional(),
});

export type Endpoints = Record<EndpointName, string>;

export interface CollectorLayout {
  endpoints: Endpoints;
  expand: string[];
}

// ─── Loader ──────────────────────────────────────────────

/** Read and validate one JSON file; every failure becomes a ConfigError. */
export function readJsonConfig<S extends z.ZodTypeAny>(path: string, schema: S): z.output<S> {
  if (!existsSync(path)) {
    throw new ConfigError([`${path} not found.`]);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError([`${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`]);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${path}: ${i.path.join('.') || '(root)'}: ${i.message}`),
    );
  }
  return parsed.data;
}

/** Entity ids, de-duplicated, order preserved. An empty list is a ConfigError. */
export function loadProjectIds(configDir: string): string[] {
  const path = join(configDir, 'projects.json');
  const ids = readJsonConfig(path, ProjectsFileSchema);
  const unique = [...new Set(ids)];
  if (unique.length === 0) {
    throw new ConfigError([`${path} lists no projects.`]);
  }
  return unique;
}

/** Endpoint layout; collector.json is optional and only overrides what it names. */
export function loadCollectorLayout(configDir: string): CollectorLayout {
  const path = join(configDir, 'collector.json');
  const file = existsSync(path) ? readJsonConfig(path, CollectorFileSchema) : undefined;
  return {
    endpoints: { ...DEFAULT_ENDPOINTS, ...file?.endpoints },
    expand: file?.expand ?? [...DEFAULT_PROJECT_EXPAND],
  };
}

export function positionMapPath(configDir: string): string {
  return join(configDir, 'positions.json');
}

export function mappingPath(configDir: string): string {
  return join(configDir, 'mapping.json');
}

export function loadPositionMap(path: string): PositionMap {
  return readJsonConfig(path, PositionMapSchema);
}

export function loadMapping(path: string): MappingFile {
  return readJsonConfig(path, MappingFileSchema);
}
