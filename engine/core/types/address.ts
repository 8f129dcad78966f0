/**
 * GridCalc Engine - A1 Address Utilities
 *
 * Column letters use bijective base-26: A=1 ... Z=26, AA=27, AZ=52, BA=53.
 */

import type { CellRange, Position } from './index.js';

const A1_PATTERN = /^([A-Z]+)(\d+)$/i;

/**
 * Convert column letters to a 1-based column number.
 * @returns column number, or null if the input contains anything but letters
 */
export function columnLettersToNumber(letters: string): number | null {
  if (!/^[A-Z]+$/i.test(letters)) return null;

  const upper = letters.toUpperCase();
  let column = 0;
  for (let i = 0; i < upper.length; i++) {
    column = column * 26 + (upper.charCodeAt(i) - 64);
  }
  return column;
}

/**
 * Convert a 1-based column number to letters.
 */
export function columnNumberToLetters(column: number): string {
  let letters = '';
  let c = column;

  while (c > 0) {
    const remainder = (c - 1) % 26;
    letters = String.fromCharCode(65 + remainder) + letters;
    c = Math.floor((c - 1) / 26);
  }

  return letters;
}

/**
 * Parse an A1-style reference ("B12", "aa3").
 * Row 0 is accepted here ("A0" yields row 0); callers decide whether it is in range.
 */
export function parseA1(ref: string): Position | null {
  const match = ref.trim().match(A1_PATTERN);
  if (!match) return null;

  const column = columnLettersToNumber(match[1]);
  if (column === null) return null;

  return { row: parseInt(match[2], 10), column };
}

export function toA1(position: Position): string {
  return `${columnNumberToLetters(position.column)}${position.row}`;
}

/**
 * Parse "A1:C3" (corners in any order) or a single cell "B2".
 */
export function parseA1Range(range: string): CellRange | null {
  const parts = range.split(':');

  if (parts.length === 1) {
    const cell = parseA1(parts[0]);
    if (!cell) return null;
    return { start: cell, end: cell };
  }

  if (parts.length === 2) {
    const a = parseA1(parts[0]);
    const b = parseA1(parts[1]);
    if (!a || !b) return null;
    return {
      start: { row: Math.min(a.row, b.row), column: Math.min(a.column, b.column) },
      end: { row: Math.max(a.row, b.row), column: Math.max(a.column, b.column) },
    };
  }

  return null;
}

export function rangeToA1(range: CellRange): string {
  return `${toA1(range.start)}:${toA1(range.end)}`;
}
