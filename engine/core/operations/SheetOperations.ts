/**
 * GridCalc Engine - Sheet Operations
 *
 * Free-function form of the engine boundary, for presentation layers that
 * hold the sheet and the selection themselves:
 *
 * ```typescript
 * let sheet = empty();
 * sheet = insertFormula({ row: 1, column: 1 }, '=2*3', sheet);
 * render({ row: 1, column: 1 }, sheet); // "6"
 * ```
 */

import type { Direction, Position } from '../types/index.js';
import { Sheet } from '../data/Sheet.js';
import type { SheetOptions } from '../data/Sheet.js';
import { next as nextPosition } from '../navigation/NavigationManager.js';

export function empty(options?: SheetOptions): Sheet {
  return Sheet.empty(options);
}

export function insertFormula(position: Position, text: string, sheet: Sheet): Sheet {
  return sheet.insertFormula(position, text);
}

export function raw(position: Position, sheet: Sheet): string {
  return sheet.raw(position);
}

export function render(position: Position, sheet: Sheet): string {
  return sheet.render(position);
}

export function next(direction: Direction, position: Position): Position {
  return nextPosition(direction, position);
}
