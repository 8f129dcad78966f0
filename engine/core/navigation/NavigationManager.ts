/**
 * GridCalc Engine - Navigation Manager
 *
 * Pure logic layer for keyboard navigation in a spreadsheet grid.
 * Handles all navigation operations without touching any view.
 *
 * Features:
 * - Arrow key navigation (move)
 * - Direct cell navigation (goTo)
 * - Grid bounds enforcement, optional wrap-around at edges
 *
 * Positions are 1-based. No operation ever produces a row or column below 1.
 */

import type { Direction, GridBounds, Position } from '../types/index.js';
import { DEFAULT_MAX_ROWS, DEFAULT_MAX_COLUMNS } from '../types/index.js';

// =============================================================================
// Types
// =============================================================================

export type NavigationAction = 'move' | 'goTo';

/**
 * Configuration for NavigationManager.
 */
export interface NavigationConfig {
  /** Last addressable row (inclusive). Default: 1000 */
  maxRow: number;

  /** Last addressable column (inclusive). Default: 26 */
  maxColumn: number;

  /** Wrap to the opposite edge instead of stopping. Default: false */
  wrapAround: boolean;
}

/**
 * Result of a navigation operation.
 */
export interface NavigationResult {
  /** The target cell position. */
  position: Position;

  /** The action that was performed. */
  action: NavigationAction;

  /** Direction of movement (if applicable). */
  direction?: Direction;

  /** Whether a boundary was hit (couldn't move further). */
  boundaryHit: boolean;

  /** The cell we started from. */
  previousPosition: Position;
}

/**
 * Event callbacks for navigation operations.
 */
export interface NavigationEvents {
  /** Called after any navigation operation. */
  onNavigate?: (result: NavigationResult) => void;

  /** Called when navigation hits a boundary. */
  onBoundaryHit?: (direction: Direction, position: Position) => void;
}

// =============================================================================
// Default Configuration
// =============================================================================

export const DEFAULT_NAVIGATION_CONFIG: NavigationConfig = {
  maxRow: DEFAULT_MAX_ROWS,
  maxColumn: DEFAULT_MAX_COLUMNS,
  wrapAround: false,
};

// =============================================================================
// Direction Utilities
// =============================================================================

/** Direction vectors for movement. */
const DIRECTION_DELTA: Readonly<Record<Direction, { dRow: number; dColumn: number }>> = {
  up: { dRow: -1, dColumn: 0 },
  down: { dRow: 1, dColumn: 0 },
  left: { dRow: 0, dColumn: -1 },
  right: { dRow: 0, dColumn: 1 },
};

// =============================================================================
// Pure Navigation Functions
// =============================================================================

/**
 * Step one cell in a direction, clamped at 1 on the low side.
 * There is no upper bound; use nextWithin when the grid size is known.
 */
export function next(direction: Direction, position: Position): Position {
  const delta = DIRECTION_DELTA[direction];
  return {
    row: Math.max(1, position.row + delta.dRow),
    column: Math.max(1, position.column + delta.dColumn),
  };
}

/**
 * Step one cell in a direction, clamped into [1, bounds].
 */
export function nextWithin(direction: Direction, position: Position, bounds: GridBounds): Position {
  return clampToBounds(next(direction, position), bounds);
}

export function clampToBounds(position: Position, bounds: GridBounds): Position {
  return {
    row: Math.min(Math.max(1, position.row), Math.max(1, bounds.maxRow)),
    column: Math.min(Math.max(1, position.column), Math.max(1, bounds.maxColumn)),
  };
}

// =============================================================================
// NavigationManager Class
// =============================================================================

/**
 * Navigation manager for a bounded grid.
 *
 * Tracks the active cell internally; every operation returns a
 * NavigationResult and never mutates anything but that tracked position.
 *
 * Usage:
 * ```typescript
 * const nav = new NavigationManager({ maxRow: 100, maxColumn: 10 });
 *
 * const result = nav.move('down');           // from the current cell
 * const other = nav.move('right', { row: 3, column: 2 });
 * nav.goTo({ row: 500, column: 3 });          // clamped to row 100
 * ```
 */
export class NavigationManager {
  private readonly config: Readonly<NavigationConfig>;
  private events: NavigationEvents = {};

  private current: Position = { row: 1, column: 1 };

  constructor(config: Partial<NavigationConfig> = {}) {
    this.config = Object.freeze({ ...DEFAULT_NAVIGATION_CONFIG, ...config });
  }

  // ===========================================================================
  // Configuration
  // ===========================================================================

  /**
   * Set event handlers.
   */
  setEventHandlers(events: NavigationEvents): void {
    this.events = { ...this.events, ...events };
  }

  getConfig(): Readonly<NavigationConfig> {
    return this.config;
  }

  getBounds(): GridBounds {
    return { maxRow: this.config.maxRow, maxColumn: this.config.maxColumn };
  }

  // ===========================================================================
  // Position Access
  // ===========================================================================

  getCurrentPosition(): Position {
    return this.current;
  }

  /**
   * Set the current position directly (clamped into the grid, no events).
   */
  setCurrentPosition(position: Position): void {
    this.current = clampToBounds(position, this.getBounds());
  }

  // ===========================================================================
  // Core Navigation
  // ===========================================================================

  /**
   * Move one cell in a direction (arrow key behavior).
   *
   * @param direction - Direction to move
   * @param from - Starting position (defaults to current cell)
   */
  move(direction: Direction, from?: Position): NavigationResult {
    const start = clampToBounds(from ?? this.current, this.getBounds());
    const delta = DIRECTION_DELTA[direction];

    const target = { row: start.row + delta.dRow, column: start.column + delta.dColumn };
    const outside = target.row < 1 || target.row > this.config.maxRow ||
      target.column < 1 || target.column > this.config.maxColumn;

    const position = outside && this.config.wrapAround
      ? this.wrap(target)
      : clampToBounds(target, this.getBounds());

    const result: NavigationResult = {
      position,
      action: 'move',
      direction,
      boundaryHit: outside,
      previousPosition: start,
    };

    this.current = position;
    this.events.onNavigate?.(result);
    if (outside) {
      this.events.onBoundaryHit?.(direction, position);
    }

    return result;
  }

  /**
   * Navigate directly to a cell, clamped into the grid.
   */
  goTo(position: Position): NavigationResult {
    const start = this.current;
    const clamped = clampToBounds(position, this.getBounds());

    const result: NavigationResult = {
      position: clamped,
      action: 'goTo',
      boundaryHit: clamped.row !== position.row || clamped.column !== position.column,
      previousPosition: start,
    };

    this.current = clamped;
    this.events.onNavigate?.(result);

    return result;
  }

  private wrap(target: Position): Position {
    const { maxRow, maxColumn } = this.config;
    let { row, column } = target;

    if (row < 1) row = maxRow;
    else if (row > maxRow) row = 1;

    if (column < 1) column = maxColumn;
    else if (column > maxColumn) column = 1;

    return { row, column };
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createNavigationManager(config?: Partial<NavigationConfig>): NavigationManager {
  return new NavigationManager(config);
}
