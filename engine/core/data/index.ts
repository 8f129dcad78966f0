/**
 * GridCalc Engine - Data Module Exports
 */

export { Sheet } from './Sheet.js';
export type { SheetOptions, SheetStats } from './Sheet.js';
