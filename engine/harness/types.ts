/**
 * GridCalc Headless Harness - Types
 *
 * Command protocol and output types for stdin/stdout driving of the engine.
 */

import type { SpreadsheetEngineConfig } from '../core/SpreadsheetEngine.js';

// =============================================================================
// Command Types
// =============================================================================

export type CommandType =
  // Cell operations
  | 'SET'           // SET A1 100 | SET A1 =B1*2 | SET A1 "two words"
  | 'GET'           // GET A1 (display value)
  | 'RAW'           // RAW A1 (text as entered)
  | 'CLEAR'         // CLEAR (all) | CLEAR A1
  | 'REFS'          // REFS A1 (cells the formula references)

  // Selection
  | 'SELECT'        // SELECT B2
  | 'MOVE'          // MOVE down [3]
  | 'EDIT'          // EDIT =A1+1 (writes the active cell)

  // State inspection
  | 'DUMP'          // DUMP A1:C5 (display values as table)
  | 'STATS'         // STATS

  // Utility
  | 'ECHO'          // ECHO message
  | 'ASSERT'        // ASSERT A1 == 14
  | 'ASSERT_ERROR'  // ASSERT_ERROR (next command should fail)

  // Control
  | 'RESET'         // RESET (clear all state)
  | 'QUIT';         // QUIT

export interface ParsedCommand {
  type: CommandType;
  args: string[];
  raw: string;
  lineNumber: number;
}

// =============================================================================
// Output Types
// =============================================================================

export type OutputType =
  | 'result'    // Command result
  | 'value'     // Cell value
  | 'error'     // Error message
  | 'info'      // Info message
  | 'stats'     // Statistics
  | 'table'     // Tabular data dump
  | 'assert'    // Assertion result
  | 'echo';     // Echo output

export interface OutputBase {
  type: OutputType;
  timestamp: number;
  command?: string;
  lineNumber?: number;
}

export interface ResultOutput extends OutputBase {
  type: 'result';
  success: boolean;
  data?: unknown;
}

export interface ValueOutput extends OutputBase {
  type: 'value';
  /** A1 address of the cell */
  cell: string;
  value: string | string[];
}

export type HarnessErrorType = 'CommandSyntax' | 'CommandFailed' | 'UnexpectedSuccess' | 'StepLimitExceeded';

export interface ErrorOutput extends OutputBase {
  type: 'error';
  message: string;
  errorType: HarnessErrorType;
}

export interface InfoOutput extends OutputBase {
  type: 'info';
  message: string;
}

export interface StatsOutput extends OutputBase {
  type: 'stats';
  cellCount: number;
  formulaCount: number;
  errorCount: number;
  activeCell: string;
}

export interface TableOutput extends OutputBase {
  type: 'table';
  headers: string[];
  rows: string[][];
}

export interface AssertOutput extends OutputBase {
  type: 'assert';
  passed: boolean;
  expected: string;
  actual: string;
  message?: string;
}

export interface EchoOutput extends OutputBase {
  type: 'echo';
  message: string;
}

export type Output =
  | ResultOutput
  | ValueOutput
  | ErrorOutput
  | InfoOutput
  | StatsOutput
  | TableOutput
  | AssertOutput
  | EchoOutput;

// =============================================================================
// Harness Configuration
// =============================================================================

export interface HarnessConfig {
  /** Output format: 'json' (one JSON per line) or 'pretty' (human readable) */
  outputFormat: 'json' | 'pretty';
  /** Include timestamps in pretty output */
  includeTimestamps: boolean;
  /** Stop on first error or failed assertion */
  stopOnError: boolean;
  /** Echo commands before executing */
  echoCommands: boolean;
  /** Verbose mode (extra logging) */
  verbose: boolean;
  /** Maximum commands per script execution */
  maxStepsPerScript: number;
  /** Grid settings passed to the engine */
  engine: Partial<SpreadsheetEngineConfig>;
}

export const DEFAULT_CONFIG: HarnessConfig = {
  outputFormat: 'json',
  includeTimestamps: false,
  stopOnError: false,
  echoCommands: false,
  verbose: false,
  maxStepsPerScript: 10000,
  engine: {},
};
