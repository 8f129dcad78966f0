import { describe, it, expect } from 'vitest';
import { empty, insertFormula, next, raw, render } from './SheetOperations.js';

const A1 = { row: 1, column: 1 };
const B1 = { row: 1, column: 2 };

describe('SheetOperations', () => {
  it('threads a sheet through insertFormula and render', () => {
    let sheet = empty();
    sheet = insertFormula(A1, '21', sheet);
    sheet = insertFormula(B1, '=A1*2', sheet);

    expect(render(B1, sheet)).toBe('42');
    expect(raw(B1, sheet)).toBe('=A1*2');
  });

  it('leaves earlier sheets untouched', () => {
    const first = insertFormula(A1, '1', empty());
    const second = insertFormula(A1, '', first);

    expect(raw(A1, first)).toBe('1');
    expect(raw(A1, second)).toBe('');
    expect(render(A1, second)).toBe('');
  });

  it('passes bounds through empty()', () => {
    const sheet = insertFormula(A1, '=C1', empty({ maxRow: 5, maxColumn: 2 }));
    expect(render(A1, sheet)).toBe('#REF!');
  });

  it('steps positions with next', () => {
    expect(next('right', A1)).toEqual(B1);
    expect(next('up', A1)).toEqual(A1);
  });
});
