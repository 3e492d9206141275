// ─── Run Log Types ───────────────────────────────────────

/**
 * Structured event appended to the JSONL run log for every Collector and
 * generation run.
 */
export type RunEventType =
  | 'COLLECT_START'
  | 'COLLECT_DONE'
  | 'COLLECT_ABORTED'
  | 'ENTITY_FAILED'
  | 'SNAPSHOT_WRITTEN'
  | 'TEMPLATE_VERIFIED'
  | 'GENERATE_DONE'
  | 'POSITION_MAP_SYNCED'
  | 'ERROR';

export type RunLevel = 'INFO' | 'WARN' | 'ERROR';

export interface RunEvent {
  id: string;
  timestamp: number; // ms
  type: RunEventType;
  runId?: string;
  payload?: unknown; // absent when the event carries nothing
  level: RunLevel;
}
