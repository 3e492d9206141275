/**
 * F. Field transforms
 * Each mapped role renders one TextBlock from an EntityRecord.
 */

import { describe, it, expect } from 'vitest';
import type { FieldMapping, FieldTransform } from '@flash-deck/shared';
import { descriptionSentences, formatAmount, renderField, unfilledFields, valueAt } from '../src/template/fields.js';
import { fullRecord, sparseRecord } from './helpers/records.js';

const TODAY = new Date(2024, 2, 1);

function render(transform: FieldTransform | undefined, record = fullRecord(), source = '', role = 'role') {
  const mapping: FieldMapping = { source, transform, status: 'ok' };
  return renderField(record, mapping, { role, today: TODAY });
}

describe('F. Field transforms', () => {
  it('title', () => {
    expect(render('title')).toEqual({ items: ['Project review : Data Platform'], bullets: 'keep', fontSizePt: 14 });
    expect(render('title', sparseRecord())?.items).toEqual(['Project review : Unknown Project']);
  });

  it('date prints the generation day', () => {
    expect(render('date')).toEqual({ items: ['01/03/2024'], bullets: 'keep', fontSizePt: 8 });
  });

  it('mood_status prefers resolved labels', () => {
    expect(render('mood_status', fullRecord(), '', 'mood_status')).toEqual({
      items: ['Status: In progress\nMood: Bon'],
      bullets: 'keep',
      fontSizePt: 9,
    });
    expect(render('mood_status', sparseRecord(), '', 'mood_status')?.items).toEqual(['Status: N/A\nMood: N/A']);
  });

  it('scope_summary counts milestones and formats dates', () => {
    expect(render('scope_summary')).toEqual({
      padding: 1,
      items: ['Milestones: 2/3', 'Progress: 40%', 'Start: 15/01/2024'],
      bullets: 'on',
      fontSizePt: 9,
    });
  });

  it('description_bullets splits sentences and drops fragments', () => {
    expect(render('description_bullets')?.items).toEqual([
      'Migrate the reporting stack',
      'Retire the legacy warehouse',
      'Train the analysts on the new tools',
    ]);
    expect(render('description_bullets', sparseRecord())?.items).toEqual(['No description available']);
  });

  describe('pending_decisions', () => {
    it('lists open decisions first', () => {
      expect(render('pending_decisions')?.items).toEqual(['Approve budget']);
    });

    it('falls back to every decision when all are closed', () => {
      const record = fullRecord({ decisions: [{ title: 'Pick vendor', status: 'taken' }, { name: 'Hire lead', status: 'actions-done' }] });
      expect(render('pending_decisions', record)?.items).toEqual(['Pick vendor', 'Hire lead']);
    });

    it('falls back to open milestones without decisions', () => {
      expect(render('pending_decisions', fullRecord({ decisions: [] }))?.items).toEqual(['Rollout']);
    });

    it('says so when there is nothing at all', () => {
      expect(render('pending_decisions', sparseRecord())?.items).toEqual(['No pending decisions or milestones']);
    });
  });

  it('completed_milestones carries its section title', () => {
    expect(render('completed_milestones')).toEqual({
      title: 'Made :',
      items: ['Kickoff', 'Pilot'],
      bullets: 'on',
      fontSizePt: 9,
    });
  });

  it('risk_summary lists two attention points', () => {
    expect(render('risk_summary')?.items).toEqual(['Risk Level: Low', 'Staffing gap', 'Vendor delay']);
    expect(render('risk_summary', sparseRecord())?.items).toEqual(['Risk Level: Not set']);
  });

  it('budget_summary formats amounts and marks gaps', () => {
    expect(render('budget_summary')).toEqual({
      title: 'Build',
      items: ['BAC: 1,234,567 €', 'Actual: 250,000 €', 'EAC: N/A'],
      bullets: 'on',
      fontSizePt: 9,
    });
  });

  describe('text', () => {
    it('reads a dotted source path', () => {
      expect(render('text', fullRecord(), 'project.short_id')).toEqual({ items: ['DP-7'], bullets: 'keep', fontSizePt: 9 });
    });

    it('is the default transform', () => {
      expect(render(undefined, fullRecord(), 'project.owner.name')?.items).toEqual(['Alex Martin']);
    });

    it('renders nothing when the source is empty', () => {
      expect(render('text', fullRecord(), 'project.end_date')).toBeNull();
      expect(render('text', fullRecord(), 'project.nope.deeper')).toBeNull();
    });
  });
});

describe('F. Helpers', () => {
  it('valueAt walks nested objects', () => {
    expect(valueAt({ a: { b: { c: 3 } } }, 'a.b.c')).toBe(3);
    expect(valueAt({ a: [1] }, 'a.0')).toBeUndefined();
  });

  it('formatAmount groups thousands', () => {
    expect(formatAmount(1000)).toBe('1,000');
    expect(formatAmount(-2500000.6)).toBe('-2,500,001');
    expect(formatAmount(-0.4)).toBe('0');
  });

  it('descriptionSentences keeps at most three, each at most 60 chars', () => {
    const long = 'x'.repeat(70);
    expect(descriptionSentences(`${long}. Second one. Third one. Fourth one`)).toEqual([
      `${'x'.repeat(57)}...`,
      'Second one',
      'Third one',
    ]);
  });
});

describe('F. unfilledFields', () => {
  it('lists what the API left empty', () => {
    expect(unfilledFields(fullRecord())).toEqual([{ project: 'Data Platform', field: 'End date', reason: 'not provided' }]);
  });

  it('falls back to the id for an unnamed project', () => {
    expect(unfilledFields(sparseRecord('9'))).toEqual([
      { project: '9', field: 'Description', reason: 'not provided' },
      { project: '9', field: 'End date', reason: 'not provided' },
      { project: '9', field: 'Budget', reason: 'not provided by the API' },
    ]);
  });
});
