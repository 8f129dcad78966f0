/**
 * GridCalc Engine - Operations Module Exports
 */

export { empty, insertFormula, raw, render, next } from './SheetOperations.js';
