/**
 * GridCalc Engine - Display Formatting
 *
 * Converts evaluation results into the strings a grid shows.
 *
 * Numbers use a fixed "General" policy:
 * - 0 and -0 display as "0"
 * - |n| >= 1e11 or |n| < 1e-4 use scientific notation with up to 6
 *   significant digits ("1.23457E+11", "5E-5")
 * - Integers display all their digits
 * - Everything else is rounded to 10 significant digits, trailing zeros removed
 */

import type { CellResult, EvalError } from '../types/index.js';
import { ERROR_TAGS } from '../types/index.js';

const SCIENTIFIC_UPPER = 1e11;
const SCIENTIFIC_LOWER = 1e-4;
const SIGNIFICANT_DIGITS = 10;
const MANTISSA_DIGITS = 6;

function stripTrailingZeros(text: string): string {
  if (!text.includes('.')) return text;
  return text.replace(/0+$/, '').replace(/\.$/, '');
}

function formatScientific(absValue: number): string {
  // "1.23457e+11"
  const [mantissa, exponent] = absValue.toExponential(MANTISSA_DIGITS - 1).split('e');
  const exp = parseInt(exponent, 10);
  return `${stripTrailingZeros(mantissa)}E${exp >= 0 ? '+' : '-'}${Math.abs(exp)}`;
}

/**
 * Format a finite number for display.
 */
export function formatNumber(value: number): string {
  if (value === 0) return '0';
  if (!Number.isFinite(value)) return ERROR_TAGS.numericOverflow;

  const isNegative = value < 0;
  const absValue = Math.abs(value);

  let text: string;
  if (absValue >= SCIENTIFIC_UPPER || absValue < SCIENTIFIC_LOWER) {
    text = formatScientific(absValue);
  } else if (Number.isInteger(absValue)) {
    text = absValue.toString();
  } else {
    text = absValue.toPrecision(SIGNIFICANT_DIGITS);
    // toPrecision switches to exponent form once the integer part has more digits
    text = text.includes('e') ? Math.round(absValue).toString() : stripTrailingZeros(text);
  }

  return isNegative ? `-${text}` : text;
}

export function formatError(error: EvalError): string {
  return ERROR_TAGS[error.type];
}

/**
 * Display string for any evaluation result. Blank cells show as ''.
 */
export function formatResult(result: CellResult): string {
  switch (result.kind) {
    case 'number':
      return formatNumber(result.value);
    case 'text':
      return result.value;
    case 'blank':
      return '';
    case 'error':
      return formatError(result.error);
  }
}
