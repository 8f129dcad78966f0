/**
 * GridCalc Engine - Core Module Exports
 *
 * This is the main entry point for the GridCalc formula engine.
 */

// Main Engine
export {
  SpreadsheetEngine,
  createSpreadsheetEngine,
  DEFAULT_ENGINE_CONFIG,
} from './SpreadsheetEngine.js';
export type {
  SpreadsheetEngineConfig,
  SpreadsheetEngineEvents,
  EngineStats,
} from './SpreadsheetEngine.js';

// Types - export all
export * from './types/index.js';
export * from './types/address.js';

// Cell Store
export * from './data/index.js';

// Boundary operations: empty, insertFormula, raw, render, next
export * from './operations/index.js';

// Formula Parsing & Evaluation
export * from './formula/index.js';

// Display Formatting
export * from './formatting/index.js';

// Navigation
export * from './navigation/index.js';
