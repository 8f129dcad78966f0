/**
 * GridCalc Engine
 *
 * A spreadsheet formula and cell-model engine:
 * - Immutable cell store keyed by 1-based (row, column) positions
 * - Arithmetic formulas (+ - * /, parentheses, A1 references)
 * - Demand-driven evaluation with cycle detection
 * - Errors as values, rendered as short tags (#CYCLE!, #DIV/0!, ...)
 *
 * @example
 * ```typescript
 * import { empty, insertFormula, render } from 'gridcalc';
 *
 * let sheet = empty();
 * sheet = insertFormula({ row: 1, column: 1 }, '5', sheet);
 * sheet = insertFormula({ row: 1, column: 2 }, '=A1*2+1', sheet);
 *
 * console.log(render({ row: 1, column: 2 }, sheet)); // "11"
 * ```
 */

export * from './core/index.js';
