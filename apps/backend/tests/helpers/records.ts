import type { EntityRecord, Snapshot } from '@flash-deck/shared';

export function fullRecord(overrides: Partial<EntityRecord> = {}): EntityRecord {
  return {
    id: '7',
    project: {
      id: 7,
      short_id: 'DP-7',
      name: 'Data Platform',
      status: 'in_progress',
      mood: 'good',
      risk: 'low',
      progress: 40,
      start_date: '2024-01-15',
      end_date: null,
      description_text: 'Migrate the reporting stack. Retire the legacy warehouse. Ok. Train the analysts on the new tools',
      owner: { name: 'Alex Martin' },
      budget_capex_initial: 1234567.4,
      budget_capex_used: 250000,
      budget_capex_landing: null,
    },
    resolved: { mood: 'Bon', status: 'In progress', risk: 'Low' },
    milestones: [
      { name: 'Kickoff', status: 'done' },
      { name: 'Pilot', status: 'done' },
      { name: 'Rollout', status: 'todo' },
    ],
    decisions: [
      { title: 'Pick vendor', status: 'taken' },
      { title: 'Approve budget', status: 'pending' },
    ],
    attention_points: [{ title: 'Staffing gap' }, { title: 'Vendor delay' }, { title: 'Third point' }],
    errors: [],
    ...overrides,
  };
}

/** A project the API knows almost nothing about. */
export function sparseRecord(id = '9'): EntityRecord {
  return {
    id,
    project: {},
    resolved: { mood: null, status: null, risk: null },
    milestones: [],
    decisions: [],
    attention_points: [],
    errors: [],
  };
}

export function snapshotOf(projects: EntityRecord[]): Snapshot {
  return {
    fetched_at: '2024-03-01T08:00:00.000Z',
    reference_data: { moods: [], statuses: [], risks: [] },
    projects,
    summary: { succeeded: projects.map((p) => p.id), failed: [] },
  };
}
