/**
 * Cubicle Runtime Tests: Highlight Session
 * Incremental classification with cached line states
 */

import { describe, expect, it } from 'vitest';
import {
  classify,
  HighlightError,
  HighlightSession,
  type InvalidateEvent,
  type ScanEvent,
} from 'cubicle-highlight';

const SOURCE = 'var X : bool\n(* a\nTODO *)\nY := 1';

describe('Cubicle Runtime: Highlight Session', () => {
  describe('lines', () => {
    it('counts lines', () => {
      expect(new HighlightSession(SOURCE).lineCount).toBe(4);
      expect(new HighlightSession('').lineCount).toBe(1);
    });

    it('returns line offsets including the newline', () => {
      const session = new HighlightSession(SOURCE);
      expect(session.lineRange(1)).toEqual({ from: 0, to: 13 });
      expect(session.lineRange(2)).toEqual({ from: 13, to: 18 });
      expect(session.lineRange(4)).toEqual({ from: 26, to: 32 });
    });

    it('finds the line of an offset', () => {
      const session = new HighlightSession(SOURCE);
      expect(session.lineAt(0)).toBe(1);
      expect(session.lineAt(12)).toBe(1);
      expect(session.lineAt(13)).toBe(2);
      expect(session.lineAt(31)).toBe(4);
    });

    it('rejects lines outside the buffer', () => {
      const session = new HighlightSession(SOURCE);
      expect(() => session.lineRange(9)).toThrow('Line 9 out of bounds (1..4)');
      expect(() => session.lineRange(0)).toThrow(HighlightError);
    });
  });

  describe('classifyRange', () => {
    it('matches a full classification', () => {
      const session = new HighlightSession(SOURCE);
      expect(session.classifyRange()).toEqual(classify(SOURCE));
    });

    it('matches a ranged classification starting inside a comment', () => {
      const session = new HighlightSession(SOURCE);
      session.classifyRange();
      const range = { from: 18, to: 22 };
      expect(session.classifyRange(range)).toEqual(classify(SOURCE, { range }));
    });

    it('reports scans through onScan', () => {
      const events: ScanEvent[] = [];
      const session = new HighlightSession(SOURCE, {
        callbacks: { onScan: (event) => events.push(event) },
      });

      session.classifyRange({ from: 26, to: 32 });

      expect(events).toHaveLength(1);
      expect(events[0]?.fromLine).toBe(4);
      expect(events[0]?.spanCount).toBe(3);
      expect(events[0]?.cachedLines).toBe(4);
    });

    it('rejects a range outside the buffer', () => {
      const session = new HighlightSession(SOURCE);
      expect(() => session.classifyRange({ from: 10, to: 5 })).toThrow(
        'Invalid range 10..5 for buffer of length 32 at 1:11'
      );
    });
  });

  describe('line state', () => {
    it('reports open comment regions at a line start', () => {
      const session = new HighlightSession(SOURCE);
      expect(session.scopesAtLine(1)).toEqual([]);
      expect(session.scopesAtLine(3)).toEqual([
        { kind: 'comment', open: { line: 2, column: 1, offset: 13 } },
      ]);
      expect(session.scopesAtLine(4)).toEqual([]);
    });

    it('reports open enclosures at a line start', () => {
      const session = new HighlightSession('A[\ni]');
      expect(session.scopesAtLine(2)).toEqual([
        { kind: 'bracket', open: { line: 1, column: 2, offset: 1 } },
      ]);
    });

    it('tokenizes a single line from its cached state', () => {
      const session = new HighlightSession(SOURCE);
      const tokens = session.tokenizeLine(3);
      expect(tokens.map((t) => [t.category, t.value])).toEqual([
        ['todo', 'TODO'],
        ['comment', ' '],
        ['comment', '*)'],
      ]);
    });

    it('includes plain tokens of a line when requested', () => {
      const session = new HighlightSession(SOURCE);
      const tokens = session.tokenizeLine(4, { includePlain: true });
      expect(tokens.map((t) => t.value)).toEqual(['Y', ' ', ':=', ' ', '1']);
    });
  });

  describe('applyEdit', () => {
    it('drops line states after the edited line', () => {
      const events: InvalidateEvent[] = [];
      const session = new HighlightSession(SOURCE, {
        callbacks: { onInvalidate: (event) => events.push(event) },
      });
      session.scopesAtLine(3);
      expect(session.cachedLines).toBe(3);

      session.applyEdit({ from: 13, to: 13, insert: '' });

      expect(events).toEqual([{ line: 2, dropped: 1 }]);
      expect(session.cachedLines).toBe(2);
    });

    it('re-classifies following lines after an edit opens a comment', () => {
      const session = new HighlightSession('a\nb\nc');
      expect(session.classifyRange().map((s) => s.value)).toEqual([
        'a',
        'b',
        'c',
      ]);

      session.applyEdit({ from: 0, to: 0, insert: '(* ' });

      expect(session.text).toBe('(* a\nb\nc');
      expect(session.classifyRange().map((s) => [s.category, s.value])).toEqual([
        ['comment', '(* a\nb\nc'],
      ]);
      expect(session.scopesAtLine(3).map((s) => s.kind)).toEqual(['comment']);
    });

    it('matches a fresh classification after replacing text', () => {
      const session = new HighlightSession(SOURCE);
      session.classifyRange();
      session.applyEdit({ from: 26, to: 27, insert: 'Turn' });
      expect(session.classifyRange()).toEqual(classify(session.text));
      expect(session.lineCount).toBe(4);
    });

    it('rejects an edit outside the buffer', () => {
      const session = new HighlightSession('abc');
      expect(() => session.applyEdit({ from: 2, to: 9, insert: '' })).toThrow(
        'Invalid edit 2..9 for buffer of length 3 at 1:3'
      );
    });
  });
});
