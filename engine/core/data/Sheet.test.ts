/**
 * GridCalc Engine - Sheet Unit Tests
 *
 * Tests the immutable cell store and on-demand rendering.
 * Covers:
 * - Raw text round-trip and removal
 * - Literal and formula rendering
 * - Cycles, division by zero, type mismatch, out-of-range references
 * - Recomputation after edits
 * - Queries (positions, used range, stats)
 */

import { describe, it, expect } from 'vitest';
import { Sheet } from './Sheet.js';
import { InvalidPositionError } from '../types/index.js';
import type { Position } from '../types/index.js';
import { parseA1 } from '../types/address.js';
import { formatNumber } from '../formatting/DisplayFormat.js';

function at(ref: string): Position {
  const position = parseA1(ref);
  if (!position) throw new Error(`bad test reference ${ref}`);
  return position;
}

function sheetWith(cells: Record<string, string>, base: Sheet = Sheet.empty()): Sheet {
  let sheet = base;
  for (const [ref, text] of Object.entries(cells)) {
    sheet = sheet.insertFormula(at(ref), text);
  }
  return sheet;
}

// =============================================================================
// Raw Storage
// =============================================================================

describe('Sheet raw storage', () => {
  it('starts empty', () => {
    const sheet = Sheet.empty();
    expect(sheet.size).toBe(0);
    expect(sheet.raw(at('A1'))).toBe('');
    expect(sheet.render(at('A1'))).toBe('');
  });

  it('returns the inserted text verbatim whether or not it evaluates', () => {
    const texts = ['42', '  padded  ', '=A1+', '=1/0', 'hello world', '=A1', '007'];
    for (const text of texts) {
      expect(Sheet.empty().insertFormula(at('C3'), text).raw(at('C3'))).toBe(text);
    }
  });

  it('removes the entry when inserting empty text', () => {
    const filled = sheetWith({ A1: '5', B1: '6' });
    const cleared = filled.insertFormula(at('A1'), '');

    expect(cleared.raw(at('A1'))).toBe('');
    expect(cleared.render(at('A1'))).toBe('');
    expect(cleared.has(at('A1'))).toBe(false);
    expect(cleared.size).toBe(1);
  });

  it('never modifies the receiver', () => {
    const before = sheetWith({ A1: '1' });
    const after = before.insertFormula(at('A1'), '2').insertFormula(at('B1'), '3');

    expect(before.raw(at('A1'))).toBe('1');
    expect(before.has(at('B1'))).toBe(false);
    expect(after.raw(at('A1'))).toBe('2');
  });

  it('returns the same sheet for no-op edits', () => {
    const sheet = sheetWith({ A1: '1' });
    expect(sheet.insertFormula(at('A1'), '1')).toBe(sheet);
    expect(sheet.insertFormula(at('B1'), '')).toBe(sheet);
  });

  it('rejects positions below 1', () => {
    expect(() => Sheet.empty().insertFormula({ row: 0, column: 1 }, 'x')).toThrow(InvalidPositionError);
    expect(() => Sheet.empty().evaluate({ row: 1, column: 0 })).toThrow(InvalidPositionError);
  });
});

// =============================================================================
// Rendering
// =============================================================================

describe('Sheet rendering', () => {
  it('renders numeric literals in canonical form', () => {
    const literals: Array<[string, number]> = [
      ['007', 7],
      ['3.50', 3.5],
      [' 12 ', 12],
      ['-0.25', -0.25],
      ['1e3', 1000],
    ];
    for (const [text, value] of literals) {
      const sheet = Sheet.empty().insertFormula(at('A1'), text);
      expect(sheet.render(at('A1'))).toBe(formatNumber(value));
    }
    expect(Sheet.empty().insertFormula(at('A1'), '007').render(at('A1'))).toBe('7');
  });

  it('renders text verbatim', () => {
    expect(sheetWith({ A1: 'abc' }).render(at('A1'))).toBe('abc');
  });

  it('applies multiplication before addition', () => {
    const sheet = sheetWith({ A1: '2', B1: '3', C1: '4', D1: '=A1+B1*C1' });
    expect(sheet.render(at('D1'))).toBe('14');
  });

  it('recomputes chained references after an edit', () => {
    const sheet = sheetWith({ A1: '5', B1: '=A1+1', C1: '=B1*2' });
    expect(sheet.render(at('C1'))).toBe('12');

    const edited = sheet.insertFormula(at('A1'), '10');
    expect(edited.render(at('C1'))).toBe('22');
    expect(sheet.render(at('C1'))).toBe('12');
  });

  it('renders a self reference as a cycle', () => {
    const sheet = Sheet.empty().insertFormula(at('A1'), '=A1');
    expect(sheet.render(at('A1'))).toBe('#CYCLE!');
  });

  it('renders both ends of a two-cell cycle as cycles', () => {
    const sheet = sheetWith({ A1: '=B1', B1: '=A1' });
    expect(sheet.render(at('A1'))).toBe('#CYCLE!');
    expect(sheet.render(at('B1'))).toBe('#CYCLE!');
  });

  it('renders a cell depending on a cycle as a cycle', () => {
    const sheet = sheetWith({ A1: '=B1', B1: '=A1', C1: '=A1*2' });
    expect(sheet.render(at('C1'))).toBe('#CYCLE!');
  });

  it('renders division by zero as a tag', () => {
    const sheet = sheetWith({ A1: '10', B1: '0', C1: '=A1/B1' });
    expect(sheet.render(at('C1'))).toBe('#DIV/0!');
  });

  it('treats blank references as 0 and text references as mismatches', () => {
    const sheet = sheetWith({ A1: '=Z9', B1: 'word', C1: '=B1' });
    expect(sheet.render(at('A1'))).toBe('0');
    expect(sheet.render(at('C1'))).toBe('#VALUE!');
  });

  it('propagates errors from referenced cells', () => {
    const sheet = sheetWith({ B1: '=1/0', A1: '=B1+1' });
    expect(sheet.render(at('A1'))).toBe('#DIV/0!');
  });

  it('renders a doubling sheet of shared references', () => {
    let sheet = Sheet.empty().insertFormula(at('A1'), '1');
    for (let row = 2; row <= 40; row++) {
      sheet = sheet.insertFormula({ row, column: 1 }, `=A${row - 1}+A${row - 1}`);
    }

    const started = Date.now();
    expect(sheet.evaluate(at('A40'))).toEqual({ kind: 'number', value: 2 ** 39 });
    expect(sheet.render(at('A40'))).toBe('5.49756E+11');
    expect(Date.now() - started).toBeLessThan(1000);
  });

  it('renders the end of a long reference chain', () => {
    let sheet = Sheet.empty().insertFormula(at('A1'), '0');
    for (let row = 2; row <= 3000; row++) {
      sheet = sheet.insertFormula({ row, column: 1 }, `=A${row - 1}+1`);
    }

    expect(sheet.render({ row: 3000, column: 1 })).toBe('2999');
  });

  it('renders normally once a cycle is broken', () => {
    const cyclic = sheetWith({ A1: '=B1+1', B1: '=A1', C1: '=A1+B1' });
    expect(cyclic.render(at('C1'))).toBe('#CYCLE!');

    const fixed = cyclic.insertFormula(at('B1'), '4');
    expect(fixed.render(at('C1'))).toBe('9');
    expect(fixed.render(at('A1'))).toBe('5');
    expect(cyclic.render(at('A1'))).toBe('#CYCLE!');
  });

  it('renders overflowing number literals in formulas as parse errors', () => {
    const sheet = Sheet.empty().insertFormula(at('A1'), `=1${'0'.repeat(400)}`);
    expect(sheet.evaluate(at('A1'))).toMatchObject({ kind: 'error', error: { type: 'parse' } });
    expect(sheet.render(at('A1'))).toBe('#PARSE!');
  });

  it('renders malformed formulas as parse errors', () => {
    const sheet = sheetWith({ A1: '=1+', B1: '=-5', C1: '=' });
    expect(sheet.render(at('A1'))).toBe('#PARSE!');
    expect(sheet.render(at('B1'))).toBe('#PARSE!');
    expect(sheet.render(at('C1'))).toBe('#PARSE!');
  });

  it('renders references past configured bounds as #REF!', () => {
    const bounded = sheetWith({ A1: '=E1', B1: '=A5' }, Sheet.empty({ maxRow: 10, maxColumn: 4 }));
    expect(bounded.render(at('A1'))).toBe('#REF!');
    expect(bounded.render(at('B1'))).toBe('0');
  });

  it('does not bound references by default', () => {
    expect(sheetWith({ A1: '=ZZ5000' }).render(at('A1'))).toBe('0');
  });

  it('formats fractional results', () => {
    const sheet = sheetWith({ A1: '=1/3', B1: '=0.1+0.2', C1: '=(1+2)*(3-5)/4' });
    expect(sheet.render(at('A1'))).toBe('0.3333333333');
    expect(sheet.render(at('B1'))).toBe('0.3');
    expect(sheet.render(at('C1'))).toBe('-1.5');
  });

  it('returns structured results from evaluate', () => {
    const sheet = sheetWith({ A1: '=2*3', B1: 'x' });
    expect(sheet.evaluate(at('A1'))).toEqual({ kind: 'number', value: 6 });
    expect(sheet.evaluate(at('B1'))).toEqual({ kind: 'text', value: 'x' });
    expect(sheet.evaluate(at('C1'))).toEqual({ kind: 'blank' });
  });
});

// =============================================================================
// Queries
// =============================================================================

describe('Sheet queries', () => {
  it('lists positions row-major', () => {
    const sheet = sheetWith({ C2: '1', A2: '2', B1: '3' });
    expect(sheet.positions()).toEqual([
      { row: 1, column: 2 },
      { row: 2, column: 1 },
      { row: 2, column: 3 },
    ]);
    expect(sheet.entries()).toEqual([
      { position: { row: 1, column: 2 }, text: '3' },
      { position: { row: 2, column: 1 }, text: '2' },
      { position: { row: 2, column: 3 }, text: '1' },
    ]);
  });

  it('computes the used range', () => {
    expect(Sheet.empty().getUsedRange()).toBeNull();
    expect(sheetWith({ B5: '1', D2: '2' }).getUsedRange()).toEqual({
      start: { row: 2, column: 2 },
      end: { row: 5, column: 4 },
    });
  });

  it('counts cells and formulas', () => {
    const sheet = sheetWith({ A1: '1', A2: '=A1', A3: 'text', A4: '=1/0' });
    expect(sheet.getStats()).toEqual({ cellCount: 4, formulaCount: 2 });
  });

  it('lists formula references', () => {
    const sheet = sheetWith({ A1: '=B2*B2+C3' });
    expect(sheet.references(at('A1'))).toEqual([
      { row: 2, column: 2 },
      { row: 3, column: 3 },
    ]);
    expect(sheet.references(at('Z1'))).toEqual([]);
  });

  it('reports bounds only when configured', () => {
    expect(Sheet.empty().getBounds()).toBeNull();
    expect(Sheet.empty({ maxRow: 3 }).getBounds()).toEqual({
      maxRow: 3,
      maxColumn: Number.POSITIVE_INFINITY,
    });
  });
});
