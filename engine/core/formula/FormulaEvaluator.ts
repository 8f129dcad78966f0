/**
 * GridCalc Engine - Formula Evaluator
 *
 * Demand-driven evaluation of a single cell:
 * - Raw text is re-parsed on every top-level call (nothing is cached between calls)
 * - References are resolved by evaluating the referenced cell recursively
 * - An EvaluationContext lives for one top-level call: it holds the chain of
 *   cells currently being evaluated (meeting one again is a cycle) and the
 *   results of cells already finished, so shared references evaluate once
 * - Every failure is returned as an EvalError value, never thrown
 *
 * Operands are evaluated left before right and the first error wins.
 */

import type {
  CellKey,
  CellResult,
  EvalError,
  EvalErrorType,
  Expr,
  GridBounds,
  Position,
} from '../types/index.js';
import { cellKey } from '../types/index.js';
import { toA1 } from '../types/address.js';
import { parseCell } from './FormulaParser.js';

/**
 * Read access to cell text, decoupled from the store implementation.
 */
export interface CellSource {
  /** Stored raw text, or '' when the cell is empty */
  raw(position: Position): string;

  /** Grid limits for reference checking, or null when references are unbounded */
  getBounds(): GridBounds | null;
}

/**
 * Per-call evaluation state. Never shared between top-level calls.
 */
export interface EvaluationContext {
  /** Cells whose evaluation has started and not yet finished */
  readonly chain: Set<CellKey>;
  /** Finished results, keyed by cell */
  readonly results: Map<CellKey, CellResult>;
}

export function createEvaluationContext(inProgress: Iterable<CellKey> = []): EvaluationContext {
  return { chain: new Set(inProgress), results: new Map() };
}

type NumericOutcome =
  | { ok: true; value: number }
  | { ok: false; error: EvalError };

const BLANK: CellResult = { kind: 'blank' };

function fail(type: EvalErrorType, message: string, position: Position): NumericOutcome {
  return { ok: false, error: { type, message, position } };
}

function isReferenceInRange(position: Position, bounds: GridBounds | null): boolean {
  if (position.row < 1 || position.column < 1) return false;
  if (!bounds) return true;
  return position.row <= bounds.maxRow && position.column <= bounds.maxColumn;
}

/**
 * Evaluate the cell at `position`.
 *
 * @param context - state of the enclosing evaluation. Top-level callers
 *   leave this out; a fresh context is started per call.
 */
export function evaluateCell(
  position: Position,
  source: CellSource,
  context: EvaluationContext = createEvaluationContext()
): CellResult {
  const key = cellKey(position);
  const cached = context.results.get(key);
  if (cached) return cached;

  const result = computeCell(position, key, source, context);
  context.results.set(key, result);
  return result;
}

function computeCell(
  position: Position,
  key: CellKey,
  source: CellSource,
  context: EvaluationContext
): CellResult {
  const rawText = source.raw(position);
  if (rawText === '') return BLANK;

  const value = parseCell(rawText);

  switch (value.kind) {
    case 'number':
      return { kind: 'number', value: value.value };

    case 'text':
      return { kind: 'text', value: value.value };

    case 'parseError':
      return {
        kind: 'error',
        error: {
          type: 'parse',
          message: `${value.message} (at character ${value.offset})`,
          position,
        },
      };

    case 'formula': {
      context.chain.add(key);
      const outcome = evaluateExpression(value.expression, source, context, position);
      context.chain.delete(key);

      return outcome.ok
        ? { kind: 'number', value: outcome.value }
        : { kind: 'error', error: outcome.error };
    }
  }
}

/**
 * Evaluate an expression tree in the context of the formula cell `origin`.
 */
export function evaluateExpression(
  node: Expr,
  source: CellSource,
  context: EvaluationContext,
  origin: Position
): NumericOutcome {
  switch (node.kind) {
    case 'number':
      return { ok: true, value: node.value };

    case 'reference':
      return resolveReference(node.position, source, context, origin);

    case 'binary': {
      const left = evaluateExpression(node.left, source, context, origin);
      if (!left.ok) return left;

      const right = evaluateExpression(node.right, source, context, origin);
      if (!right.ok) return right;

      let value: number;
      switch (node.operator) {
        case '+':
          value = left.value + right.value;
          break;
        case '-':
          value = left.value - right.value;
          break;
        case '*':
          value = left.value * right.value;
          break;
        case '/':
          if (right.value === 0) {
            return fail('divideByZero', `Division by zero in ${toA1(origin)}`, origin);
          }
          value = left.value / right.value;
          break;
      }

      if (!Number.isFinite(value)) {
        return fail('numericOverflow', `Result out of numeric range in ${toA1(origin)}`, origin);
      }
      return { ok: true, value };
    }
  }
}

function resolveReference(
  target: Position,
  source: CellSource,
  context: EvaluationContext,
  origin: Position
): NumericOutcome {
  if (!isReferenceInRange(target, source.getBounds())) {
    return fail('referenceOutOfRange', `Reference ${toA1(target)} is outside the grid`, origin);
  }

  if (context.chain.has(cellKey(target))) {
    return fail('cycle', `Circular reference: ${toA1(origin)} -> ${toA1(target)}`, origin);
  }

  const result = evaluateCell(target, source, context);

  switch (result.kind) {
    case 'number':
      return { ok: true, value: result.value };
    case 'blank':
      return { ok: true, value: 0 };
    case 'text':
      return fail('typeMismatch', `${toA1(target)} holds text, not a number`, origin);
    case 'error':
      return { ok: false, error: result.error };
  }
}
