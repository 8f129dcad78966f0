/**
 * GridCalc Engine - Sheet (Cell Store)
 *
 * Immutable mapping from position to the raw text a user typed.
 *
 * - Only non-empty cells are stored; inserting '' removes the entry
 * - insertFormula returns a new Sheet and never modifies the receiver
 * - Nothing is evaluated on insert; render/evaluate recompute from raw text
 *   on every call
 */

import type {
  CellKey,
  CellRange,
  CellResult,
  GridBounds,
  Position,
} from '../types/index.js';
import {
  assertValidPosition,
  cellKey,
  comparePositions,
  parseKey,
} from '../types/index.js';
import { evaluateCell } from '../formula/FormulaEvaluator.js';
import type { CellSource } from '../formula/FormulaEvaluator.js';
import { formulaReferences, isFormulaText } from '../formula/FormulaParser.js';
import { formatResult } from '../formatting/DisplayFormat.js';

export interface SheetOptions {
  /**
   * Last row a formula may reference. References past it evaluate to #REF!.
   * Leave unset for unbounded references.
   */
  maxRow?: number;
  /** Last column a formula may reference. */
  maxColumn?: number;
}

export interface SheetStats {
  cellCount: number;
  formulaCount: number;
}

export class Sheet implements CellSource {
  /** Main cell storage: Map<"row:column", raw text> */
  private readonly cells: ReadonlyMap<CellKey, string>;
  private readonly options: Readonly<SheetOptions>;

  private constructor(cells: ReadonlyMap<CellKey, string>, options: Readonly<SheetOptions>) {
    this.cells = cells;
    this.options = options;
  }

  /**
   * The empty store.
   */
  static empty(options: SheetOptions = {}): Sheet {
    return new Sheet(new Map(), Object.freeze({ ...options }));
  }

  // ===========================================================================
  // Cell Operations
  // ===========================================================================

  /**
   * Store `text` at `position`, or remove the entry when `text` is empty.
   * @returns a new Sheet; this one is unchanged
   * @throws InvalidPositionError for a coordinate below 1 or not an integer
   */
  insertFormula(position: Position, text: string): Sheet {
    assertValidPosition(position);
    const key = cellKey(position);

    if (text === '') {
      if (!this.cells.has(key)) return this;
      const cells = new Map(this.cells);
      cells.delete(key);
      return new Sheet(cells, this.options);
    }

    if (this.cells.get(key) === text) return this;

    const cells = new Map(this.cells);
    cells.set(key, text);
    return new Sheet(cells, this.options);
  }

  /**
   * Raw text exactly as entered, or '' for an empty cell.
   */
  raw(position: Position): string {
    return this.cells.get(cellKey(position)) ?? '';
  }

  has(position: Position): boolean {
    return this.cells.has(cellKey(position));
  }

  /**
   * Evaluate the cell. Failures come back as { kind: 'error' }.
   */
  evaluate(position: Position): CellResult {
    assertValidPosition(position);
    return evaluateCell(position, this);
  }

  /**
   * Display string for a cell: formatted number, verbatim text,
   * '' for blank, or an error tag such as "#CYCLE!".
   */
  render(position: Position): string {
    return formatResult(this.evaluate(position));
  }

  /**
   * Positions referenced by the cell's formula, in source order.
   */
  references(position: Position): Position[] {
    return formulaReferences(this.raw(position));
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  get size(): number {
    return this.cells.size;
  }

  getBounds(): GridBounds | null {
    const { maxRow, maxColumn } = this.options;
    if (maxRow === undefined && maxColumn === undefined) return null;
    return {
      maxRow: maxRow ?? Number.POSITIVE_INFINITY,
      maxColumn: maxColumn ?? Number.POSITIVE_INFINITY,
    };
  }

  getOptions(): Readonly<SheetOptions> {
    return this.options;
  }

  /**
   * All non-empty positions, row-major.
   */
  positions(): Position[] {
    return Array.from(this.cells.keys(), parseKey).sort(comparePositions);
  }

  /**
   * Non-empty cells with their raw text, row-major.
   */
  entries(): Array<{ position: Position; text: string }> {
    return this.positions().map(position => ({ position, text: this.raw(position) }));
  }

  /**
   * Bounding box of all non-empty cells, or null for an empty sheet.
   */
  getUsedRange(): CellRange | null {
    if (this.cells.size === 0) return null;

    let minRow = Number.POSITIVE_INFINITY;
    let minColumn = Number.POSITIVE_INFINITY;
    let maxRow = 0;
    let maxColumn = 0;

    for (const key of this.cells.keys()) {
      const { row, column } = parseKey(key);
      if (row < minRow) minRow = row;
      if (row > maxRow) maxRow = row;
      if (column < minColumn) minColumn = column;
      if (column > maxColumn) maxColumn = column;
    }

    return {
      start: { row: minRow, column: minColumn },
      end: { row: maxRow, column: maxColumn },
    };
  }

  getStats(): SheetStats {
    let formulaCount = 0;
    for (const text of this.cells.values()) {
      if (isFormulaText(text)) formulaCount++;
    }
    return { cellCount: this.cells.size, formulaCount };
  }
}
