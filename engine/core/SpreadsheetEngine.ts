/**
 * GridCalc Engine - Main Spreadsheet Engine
 *
 * Single owner of the sheet and the active cell. Ties together:
 * - Sheet for cell storage and on-demand evaluation
 * - NavigationManager for bounded arrow-key movement
 *
 * The sheet itself is immutable; the engine swaps in the new sheet after
 * every edit, so getSheet() snapshots stay valid forever.
 */

import type {
  CellChangeEvent,
  CellRange,
  CellResult,
  Direction,
  Position,
  SelectionChangeEvent,
} from './types/index.js';
import {
  DEFAULT_MAX_COLUMNS,
  DEFAULT_MAX_ROWS,
  InvalidPositionError,
  assertValidPosition,
  positionsEqual,
} from './types/index.js';
import { Sheet } from './data/Sheet.js';
import { NavigationManager } from './navigation/NavigationManager.js';
import type { NavigationResult } from './navigation/NavigationManager.js';

export interface SpreadsheetEngineConfig {
  /** Number of rows in the grid */
  maxRow: number;
  /** Number of columns in the grid */
  maxColumn: number;
  /** Arrow keys wrap to the opposite edge */
  wrapAround: boolean;
  /** Formulas referencing cells outside the grid evaluate to #REF! */
  enforceReferenceBounds: boolean;
}

export const DEFAULT_ENGINE_CONFIG: SpreadsheetEngineConfig = {
  maxRow: DEFAULT_MAX_ROWS,
  maxColumn: DEFAULT_MAX_COLUMNS,
  wrapAround: false,
  enforceReferenceBounds: true,
};

export interface SpreadsheetEngineEvents {
  /** Called when a cell's raw text changes */
  onCellChange?: (event: CellChangeEvent) => void;
  /** Called when the active cell changes */
  onSelectionChange?: (event: SelectionChangeEvent) => void;
}

export interface EngineStats {
  cellCount: number;
  formulaCount: number;
  /** Cells whose evaluation currently fails */
  errorCount: number;
}

export class SpreadsheetEngine {
  private sheet: Sheet;
  private readonly navigation: NavigationManager;
  private readonly config: Readonly<SpreadsheetEngineConfig>;
  private events: SpreadsheetEngineEvents = {};

  constructor(config: Partial<SpreadsheetEngineConfig> = {}) {
    this.config = Object.freeze({ ...DEFAULT_ENGINE_CONFIG, ...config });
    this.sheet = this.createEmptySheet();
    this.navigation = new NavigationManager({
      maxRow: this.config.maxRow,
      maxColumn: this.config.maxColumn,
      wrapAround: this.config.wrapAround,
    });
  }

  // ===========================================================================
  // Configuration
  // ===========================================================================

  setEventHandlers(events: SpreadsheetEngineEvents): void {
    this.events = { ...this.events, ...events };
  }

  getConfig(): Readonly<SpreadsheetEngineConfig> {
    return this.config;
  }

  // ===========================================================================
  // Selection
  // ===========================================================================

  getActiveCell(): Position {
    return this.navigation.getCurrentPosition();
  }

  /**
   * Make `position` the active cell (clamped into the grid).
   */
  select(position: Position): NavigationResult {
    return this.trackSelection(() => this.navigation.goTo(position));
  }

  /**
   * Move the active cell one step.
   */
  move(direction: Direction): NavigationResult {
    return this.trackSelection(() => this.navigation.move(direction));
  }

  private trackSelection(navigate: () => NavigationResult): NavigationResult {
    const result = navigate();
    if (!positionsEqual(result.previousPosition, result.position)) {
      this.emitSelectionChange({
        oldPosition: result.previousPosition,
        newPosition: result.position,
      });
    }
    return result;
  }

  // ===========================================================================
  // Editing
  // ===========================================================================

  /**
   * Replace the raw text of a cell. Empty text clears it.
   * @throws InvalidPositionError if the position is outside the grid
   */
  setCellText(position: Position, text: string): void {
    this.assertInGrid(position);

    const oldText = this.sheet.raw(position);
    const updated = this.sheet.insertFormula(position, text);
    if (updated === this.sheet) return;

    this.sheet = updated;
    this.emitCellChange({ position, oldText, newText: text });
  }

  /**
   * Commit an edit to the active cell.
   */
  editActiveCell(text: string): void {
    this.setCellText(this.getActiveCell(), text);
  }

  clearCell(position: Position): void {
    this.setCellText(position, '');
  }

  /**
   * Remove every cell. Emits one change event per removed cell.
   */
  clear(): void {
    const previous = this.sheet;
    this.sheet = this.createEmptySheet();

    for (const { position, text } of previous.entries()) {
      this.emitCellChange({ position, oldText: text, newText: '' });
    }
  }

  // ===========================================================================
  // Reading
  // ===========================================================================

  /**
   * Current sheet snapshot.
   */
  getSheet(): Sheet {
    return this.sheet;
  }

  getCellRaw(position: Position): string {
    return this.sheet.raw(position);
  }

  getCellDisplayValue(position: Position): string {
    return this.sheet.render(position);
  }

  getCellResult(position: Position): CellResult {
    return this.sheet.evaluate(position);
  }

  getCellReferences(position: Position): Position[] {
    return this.sheet.references(position);
  }

  /**
   * Display strings for a rectangular block, one array per row.
   */
  getDisplayGrid(range: CellRange): string[][] {
    const rows: string[][] = [];
    for (let row = range.start.row; row <= range.end.row; row++) {
      const values: string[] = [];
      for (let column = range.start.column; column <= range.end.column; column++) {
        values.push(this.sheet.render({ row, column }));
      }
      rows.push(values);
    }
    return rows;
  }

  getStats(): EngineStats {
    let errorCount = 0;
    for (const position of this.sheet.positions()) {
      if (this.sheet.evaluate(position).kind === 'error') errorCount++;
    }
    return { ...this.sheet.getStats(), errorCount };
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private createEmptySheet(): Sheet {
    return this.config.enforceReferenceBounds
      ? Sheet.empty({ maxRow: this.config.maxRow, maxColumn: this.config.maxColumn })
      : Sheet.empty();
  }

  private assertInGrid(position: Position): void {
    assertValidPosition(position);
    if (position.row > this.config.maxRow || position.column > this.config.maxColumn) {
      throw new InvalidPositionError(
        position.row,
        position.column,
        `grid is ${this.config.maxRow} rows x ${this.config.maxColumn} columns`
      );
    }
  }

  private emitCellChange(event: CellChangeEvent): void {
    this.notify('onCellChange', () => this.events.onCellChange?.(event));
  }

  private emitSelectionChange(event: SelectionChangeEvent): void {
    this.notify('onSelectionChange', () => this.events.onSelectionChange?.(event));
  }

  private notify(name: keyof SpreadsheetEngineEvents, dispatch: () => void): void {
    try {
      dispatch();
    } catch (error) {
      console.error(`${name} listener error:`, error);
    }
  }
}

export function createSpreadsheetEngine(config?: Partial<SpreadsheetEngineConfig>): SpreadsheetEngine {
  return new SpreadsheetEngine(config);
}
