/**
 * GridCalc Engine - Core Type Definitions
 * Cell addressing, expression tree and evaluation result types
 */

// ============================================================================
// Position Types
// ============================================================================

/**
 * Grid address. Both coordinates are 1-based.
 * Positions are plain immutable values; compare with positionsEqual.
 */
export interface Position {
  readonly row: number;
  readonly column: number;
}

/** Key format: "row:column" */
export type CellKey = string;

export function cellKey(position: Position): CellKey {
  return `${position.row}:${position.column}`;
}

export function parseKey(key: CellKey): Position {
  const [row, column] = key.split(':').map(Number);
  return { row, column };
}

export function positionsEqual(a: Position, b: Position): boolean {
  return a.row === b.row && a.column === b.column;
}

/**
 * Row-major ordering (row first, then column).
 */
export function comparePositions(a: Position, b: Position): number {
  return a.row - b.row || a.column - b.column;
}

/**
 * Thrown when a caller hands the engine a coordinate that can never
 * address a cell (non-integer, or below 1).
 */
export class InvalidPositionError extends Error {
  row: number;
  column: number;

  constructor(row: number, column: number, reason = 'both must be integers >= 1') {
    super(`Invalid cell position: row=${row}, column=${column} (${reason})`);
    this.name = 'InvalidPositionError';
    this.row = row;
    this.column = column;
  }
}

export function isValidPosition(position: Position): boolean {
  return Number.isInteger(position.row) && Number.isInteger(position.column) &&
         position.row >= 1 && position.column >= 1;
}

/**
 * Build a validated Position.
 * @throws InvalidPositionError if either coordinate is not an integer >= 1
 */
export function createPosition(row: number, column: number): Position {
  const position = { row, column };
  if (!isValidPosition(position)) {
    throw new InvalidPositionError(row, column);
  }
  return position;
}

export function assertValidPosition(position: Position): void {
  if (!isValidPosition(position)) {
    throw new InvalidPositionError(position.row, position.column);
  }
}

export interface CellRange {
  start: Position;
  end: Position;
}

export function rangeContains(range: CellRange, position: Position): boolean {
  return position.row >= range.start.row && position.row <= range.end.row &&
         position.column >= range.start.column && position.column <= range.end.column;
}

/**
 * Upper limits of the grid. Lower limits are always 1.
 */
export interface GridBounds {
  maxRow: number;
  maxColumn: number;
}

// ============================================================================
// Navigation Types
// ============================================================================

export type Direction = 'up' | 'down' | 'left' | 'right';

export const DIRECTIONS: readonly Direction[] = ['up', 'down', 'left', 'right'];

export function isDirection(value: string): value is Direction {
  const names: readonly string[] = DIRECTIONS;
  return names.includes(value);
}

// ============================================================================
// Formula Types
// ============================================================================

export type BinaryOperator = '+' | '-' | '*' | '/';

export interface NumberNode {
  kind: 'number';
  value: number;
}

export interface ReferenceNode {
  kind: 'reference';
  position: Position;
}

export interface BinaryNode {
  kind: 'binary';
  operator: BinaryOperator;
  left: Expr;
  right: Expr;
}

/** Expression tree produced by the formula parser */
export type Expr = NumberNode | ReferenceNode | BinaryNode;

/**
 * Interpretation of a cell's raw text.
 */
export type CellValue =
  | { kind: 'number'; value: number }
  | { kind: 'text'; value: string }
  | { kind: 'formula'; expression: Expr }
  | { kind: 'parseError'; message: string; offset: number };

// ============================================================================
// Evaluation Types
// ============================================================================

export type EvalErrorType =
  | 'parse'
  | 'cycle'
  | 'typeMismatch'
  | 'divideByZero'
  | 'referenceOutOfRange'
  | 'numericOverflow';

export interface EvalError {
  type: EvalErrorType;
  message: string;
  /** Cell where the failure was first detected */
  position?: Position;
}

export type CellResult =
  | { kind: 'number'; value: number }
  | { kind: 'text'; value: string }
  | { kind: 'blank' }
  | { kind: 'error'; error: EvalError };

export type FormulaErrorTag =
  | '#PARSE!'
  | '#CYCLE!'
  | '#VALUE!'
  | '#DIV/0!'
  | '#REF!'
  | '#NUM!';

export const ERROR_TAGS: Readonly<Record<EvalErrorType, FormulaErrorTag>> = {
  parse: '#PARSE!',
  cycle: '#CYCLE!',
  typeMismatch: '#VALUE!',
  divideByZero: '#DIV/0!',
  referenceOutOfRange: '#REF!',
  numericOverflow: '#NUM!',
};

export function isFormulaErrorTag(value: string): value is FormulaErrorTag {
  const tags: readonly string[] = Object.values(ERROR_TAGS);
  return tags.includes(value);
}

// ============================================================================
// Event Types
// ============================================================================

export interface CellChangeEvent {
  position: Position;
  oldText: string;
  newText: string;
}

export interface SelectionChangeEvent {
  oldPosition: Position;
  newPosition: Position;
}

// ============================================================================
// Constants
// ============================================================================

/** Default grid size used by the engine facade and the harness */
export const DEFAULT_MAX_ROWS = 1000;
export const DEFAULT_MAX_COLUMNS = 26;
