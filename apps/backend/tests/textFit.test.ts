import { describe, it, expect } from 'vitest';
import { fitText, truncateLines, truncateText } from '../src/template/textFit.js';

describe('E. Text fitting', () => {
  describe('truncateText', () => {
    it('leaves short text alone', () => {
      expect(truncateText('short', 10)).toBe('short');
    });

    it('cuts at a word boundary near the end of the budget', () => {
      expect(truncateText('The quick brown fox jumps over', 20)).toBe('The quick brown...');
    });

    it('cuts mid-word when no boundary is close enough', () => {
      expect(truncateText('abcdefghijklmnop', 10)).toBe('abcdefg...');
    });

    it('maps missing text to an empty string', () => {
      expect(truncateText(null, 10)).toBe('');
      expect(truncateText(undefined, 10)).toBe('');
    });
  });

  describe('truncateLines', () => {
    it('ends the last kept line with an ellipsis', () => {
      expect(truncateLines('first line\nsecond line\nthird', 2)).toBe('first line\nsecond l...');
    });

    it('replaces a very short last line with the ellipsis', () => {
      expect(truncateLines('a\nb\nc', 2)).toBe('a\n...');
    });

    it('cuts each line to the per-line budget', () => {
      expect(truncateLines('abcdefghijkl\nok', 3, 8)).toBe('abcde...\nok');
    });
  });

  describe('fitText', () => {
    it('keeps 9pt for text well inside the budget', () => {
      expect(fitText('a'.repeat(40), 'title')).toEqual({ text: 'a'.repeat(40), fontSizePt: 9 });
    });

    it('steps down to 8pt past 80% of the budget', () => {
      expect(fitText('a'.repeat(70), 'title').fontSizePt).toBe(8);
    });

    it('steps down to 7pt past 95% of the budget', () => {
      expect(fitText('a'.repeat(78), 'title').fontSizePt).toBe(7);
    });

    it('applies the per-line budget of the role', () => {
      expect(fitText('x'.repeat(100), 'scope').text).toBe(`${'x'.repeat(47)}...`);
    });

    it('falls back to default budgets for an unknown role', () => {
      expect(fitText('line\n'.repeat(6).trim(), 'unknown').text).toBe('line\nline\nline\nl...');
    });

    it('returns empty text at the content size', () => {
      expect(fitText('', 'title')).toEqual({ text: '', fontSizePt: 9 });
    });
  });
});
