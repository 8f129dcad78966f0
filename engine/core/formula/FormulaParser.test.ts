/**
 * GridCalc Engine - Formula Parser Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { formulaReferences, isFormulaText, parseCell, parseNumberLiteral } from './FormulaParser.js';
import type { Expr } from '../types/index.js';

const num = (value: number): Expr => ({ kind: 'number', value });
const ref = (row: number, column: number): Expr => ({ kind: 'reference', position: { row, column } });
const bin = (operator: '+' | '-' | '*' | '/', left: Expr, right: Expr): Expr => ({
  kind: 'binary',
  operator,
  left,
  right,
});

function expression(text: string): Expr {
  const value = parseCell(text);
  if (value.kind !== 'formula') {
    throw new Error(`expected a formula, got ${value.kind}`);
  }
  return value.expression;
}

describe('parseNumberLiteral', () => {
  it('accepts signed decimals with fraction and exponent', () => {
    expect(parseNumberLiteral('42')).toBe(42);
    expect(parseNumberLiteral('-3.5')).toBe(-3.5);
    expect(parseNumberLiteral('+.5')).toBe(0.5);
    expect(parseNumberLiteral('1e3')).toBe(1000);
    expect(parseNumberLiteral('2.5E-2')).toBe(0.025);
  });

  it('ignores surrounding whitespace', () => {
    expect(parseNumberLiteral('  7 ')).toBe(7);
  });

  it('drops leading zeros', () => {
    expect(parseNumberLiteral('007')).toBe(7);
  });

  it('rejects non-decimal forms', () => {
    expect(parseNumberLiteral('')).toBeNull();
    expect(parseNumberLiteral('0x10')).toBeNull();
    expect(parseNumberLiteral('Infinity')).toBeNull();
    expect(parseNumberLiteral('1,000')).toBeNull();
    expect(parseNumberLiteral('12abc')).toBeNull();
  });

  it('rejects literals that overflow to infinity', () => {
    expect(parseNumberLiteral('1e400')).toBeNull();
  });
});

describe('parseCell literals', () => {
  it('classifies numbers and text', () => {
    expect(parseCell('3.25')).toEqual({ kind: 'number', value: 3.25 });
    expect(parseCell('hello')).toEqual({ kind: 'text', value: 'hello' });
  });

  it('keeps text verbatim, whitespace included', () => {
    expect(parseCell('  two words ')).toEqual({ kind: 'text', value: '  two words ' });
  });

  it('detects formulas by the leading "="', () => {
    expect(isFormulaText('=1')).toBe(true);
    expect(isFormulaText(' =1')).toBe(false);
    expect(parseCell(' =1')).toEqual({ kind: 'text', value: ' =1' });
  });
});

describe('parseCell formulas', () => {
  it('parses a single number or reference', () => {
    expect(expression('=5')).toEqual(num(5));
    expect(expression('=B3')).toEqual(ref(3, 2));
  });

  it('gives * and / precedence over + and -', () => {
    expect(expression('=A1+B1*C1')).toEqual(bin('+', ref(1, 1), bin('*', ref(1, 2), ref(1, 3))));
  });

  it('is left-associative', () => {
    expect(expression('=1-2-3')).toEqual(bin('-', bin('-', num(1), num(2)), num(3)));
    expect(expression('=8/4/2')).toEqual(bin('/', bin('/', num(8), num(4)), num(2)));
  });

  it('honours parentheses', () => {
    expect(expression('=(1+2)*3')).toEqual(bin('*', bin('+', num(1), num(2)), num(3)));
    expect(expression('=((7))')).toEqual(num(7));
  });

  it('allows whitespace between tokens', () => {
    expect(expression('= 1 +  A2 ')).toEqual(bin('+', num(1), ref(2, 1)));
  });

  it('accepts multi-letter columns', () => {
    expect(expression('=AA1')).toEqual(ref(1, 27));
  });
});

describe('parseCell errors', () => {
  const cases: Array<[string, string, number]> = [
    ['=', 'Empty formula', 1],
    ['=1+', 'Unexpected end of formula', 3],
    ['=(1+2', 'Missing closing parenthesis', 5],
    ['=(1+2 3', "Expected ')' but found '3'", 6],
    ['=1 2', "Unexpected token '2'", 3],
    ['=1)', "Unexpected token ')'", 2],
    ['=-5', "Unexpected token '-'", 1],
    ['=*2', "Unexpected token '*'", 1],
    ['=A', "Invalid cell reference 'A'", 1],
    ['=2#', "Unexpected character '#'", 2],
  ];

  it.each(cases)('%s -> %s at %d', (text, message, offset) => {
    expect(parseCell(text)).toEqual({ kind: 'parseError', message, offset });
  });

  it('rejects number literals that overflow', () => {
    expect(parseCell(`=2+1${'0'.repeat(400)}`)).toEqual({
      kind: 'parseError',
      message: 'Number out of range',
      offset: 3,
    });
  });
});

describe('formulaReferences', () => {
  it('lists distinct references in source order', () => {
    expect(formulaReferences('=B2+A1*B2')).toEqual([
      { row: 2, column: 2 },
      { row: 1, column: 1 },
    ]);
  });

  it('is empty for literals and malformed formulas', () => {
    expect(formulaReferences('12')).toEqual([]);
    expect(formulaReferences('=A1+')).toEqual([]);
  });
});
