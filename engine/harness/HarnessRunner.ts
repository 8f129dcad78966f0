/**
 * GridCalc Headless Harness - Runner
 *
 * Executes parsed commands against the SpreadsheetEngine
 * and produces structured output.
 */

import type {
  AssertOutput,
  EchoOutput,
  ErrorOutput,
  HarnessConfig,
  HarnessErrorType,
  InfoOutput,
  Output,
  ParsedCommand,
  ResultOutput,
  StatsOutput,
  TableOutput,
  ValueOutput,
} from './types.js';
import { DEFAULT_CONFIG } from './types.js';
import { CommandParser, CommandSyntaxError } from './CommandParser.js';
import { formatOutput } from './OutputFormatter.js';
import { SpreadsheetEngine } from '../core/SpreadsheetEngine.js';
import type { CellRange, Position } from '../core/types/index.js';
import { isDirection } from '../core/types/index.js';
import { columnNumberToLetters, parseA1, parseA1Range, toA1 } from '../core/types/address.js';

type AssertOperator = '==' | '!=' | '<' | '>' | '<=' | '>=';

/** A parsed command, or the syntax error reported for its line */
type ScriptStep = ParsedCommand | ErrorOutput;

type CommandSource = Pick<ParsedCommand, 'raw' | 'lineNumber'>;

/**
 * Raw text of a command line from its argument at `argIndex` onward.
 */
function textAfterArgument(raw: string, argIndex: number): string {
  const skipped = new RegExp(`^(?:\\S+\\s+){${argIndex + 1}}`).exec(raw);
  return skipped ? raw.slice(skipped[0].length) : '';
}

const ASSERT_OPERATORS: ReadonlySet<string> = new Set<AssertOperator>(['==', '!=', '<', '>', '<=', '>=']);

// =============================================================================
// Harness Runner
// =============================================================================

export class HarnessRunner {
  private config: HarnessConfig;
  private engine: SpreadsheetEngine;
  private readonly parser = new CommandParser();

  // State tracking
  private expectError: boolean = false;

  // Output handler
  private outputHandler: (output: Output) => void;

  constructor(
    config: Partial<HarnessConfig> = {},
    outputHandler?: (output: Output) => void
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.outputHandler = outputHandler ?? this.defaultOutputHandler.bind(this);
    this.engine = new SpreadsheetEngine(this.config.engine);
  }

  // ===========================================================================
  // Command Execution
  // ===========================================================================

  /**
   * Execute a single command. Failures become error outputs; nothing throws.
   */
  execute(cmd: ParsedCommand): Output {
    if (this.config.echoCommands) {
      this.emit(this.createEcho(cmd.raw, cmd));
    }

    try {
      const result = this.executeCommand(cmd);

      // ASSERT_ERROR arms the flag for the following command
      if (this.expectError && cmd.type !== 'ASSERT_ERROR') {
        this.expectError = false;
        return this.createError('Expected error but command succeeded', cmd, 'UnexpectedSuccess');
      }

      return result;
    } catch (error) {
      if (this.expectError) {
        this.expectError = false;
        return this.createResult(true, { expectedError: true }, cmd);
      }

      const err = error instanceof Error ? error : new Error(String(error));
      return this.createError(err.message, cmd, 'CommandFailed');
    }
  }

  /**
   * Execute multiple commands with step limit protection.
   * Stops after QUIT, and after the first failure when stopOnError is set.
   */
  executeAll(commands: ParsedCommand[]): Output[] {
    return this.run(commands);
  }

  /**
   * Execute a script (multiple lines). A line that does not parse yields an
   * error output in its place.
   */
  executeScript(script: string): Output[] {
    const steps: ScriptStep[] = [];
    const lines = script.split('\n');

    for (let i = 0; i < lines.length; i++) {
      try {
        const cmd = this.parser.parse(lines[i], i + 1);
        if (cmd) steps.push(cmd);
      } catch (error) {
        if (!(error instanceof CommandSyntaxError)) throw error;
        steps.push(this.createSyntaxError(error));
      }
    }

    return this.run(steps);
  }

  /**
   * Execute a single line of input (for interactive mode).
   * Returns false if QUIT command was executed.
   */
  executeLine(line: string, lineNumber: number = 0): boolean {
    let cmd: ParsedCommand | null;
    try {
      cmd = this.parser.parse(line, lineNumber);
    } catch (error) {
      if (!(error instanceof CommandSyntaxError)) throw error;
      this.emit(this.createSyntaxError(error));
      return true;
    }

    if (!cmd) {
      return true;
    }

    const output = this.execute(cmd);
    this.emit(output);

    return cmd.type !== 'QUIT';
  }

  /**
   * Set a custom output handler.
   */
  onOutput(handler: (output: Output) => void): void {
    this.outputHandler = handler;
  }

  getEngine(): SpreadsheetEngine {
    return this.engine;
  }

  getConfig(): Readonly<HarnessConfig> {
    return this.config;
  }

  private run(steps: readonly ScriptStep[]): Output[] {
    const outputs: Output[] = [];
    let stepCount = 0;

    for (const step of steps) {
      const source = 'args' in step ? step : { raw: step.command ?? '', lineNumber: step.lineNumber ?? 0 };

      stepCount++;
      if (stepCount > this.config.maxStepsPerScript) {
        const output = this.createError(
          `Step limit exceeded: ${stepCount} steps (max: ${this.config.maxStepsPerScript})`,
          source,
          'StepLimitExceeded'
        );
        outputs.push(output);
        this.emit(output);
        break;
      }

      const output = 'args' in step ? this.execute(step) : step;
      outputs.push(output);
      this.emit(output);

      if (this.config.stopOnError && isFailure(output)) {
        break;
      }

      if ('args' in step && step.type === 'QUIT') {
        break;
      }
    }

    return outputs;
  }

  private executeCommand(cmd: ParsedCommand): Output {
    switch (cmd.type) {
      // Cell operations
      case 'SET': return this.cmdSet(cmd);
      case 'GET': return this.cmdGet(cmd);
      case 'RAW': return this.cmdRaw(cmd);
      case 'CLEAR': return this.cmdClear(cmd);
      case 'REFS': return this.cmdRefs(cmd);

      // Selection
      case 'SELECT': return this.cmdSelect(cmd);
      case 'MOVE': return this.cmdMove(cmd);
      case 'EDIT': return this.cmdEdit(cmd);

      // State inspection
      case 'DUMP': return this.cmdDump(cmd);
      case 'STATS': return this.cmdStats(cmd);

      // Utility
      case 'ECHO': return this.cmdEcho(cmd);
      case 'ASSERT': return this.cmdAssert(cmd);
      case 'ASSERT_ERROR': return this.cmdAssertError(cmd);

      // Control
      case 'RESET': return this.cmdReset(cmd);
      case 'QUIT': return this.cmdQuit(cmd);
    }
  }

  // ===========================================================================
  // Cell Commands
  // ===========================================================================

  private cmdSet(cmd: ParsedCommand): Output {
    const [cellRef, ...rest] = cmd.args;
    if (!cellRef || rest.length === 0) throw new Error('SET requires cell and text');

    const cell = this.requireCell(cellRef);
    // Several words: keep the rest of the line as typed, spacing included
    const text = rest.length === 1 ? rest[0] : textAfterArgument(cmd.raw, 1);
    this.engine.setCellText(cell, text);

    return this.createResult(true, { cell: toA1(cell), text }, cmd);
  }

  private cmdGet(cmd: ParsedCommand): Output {
    const [cellRef] = cmd.args;
    if (!cellRef) throw new Error('GET requires cell reference');

    const cell = this.requireCell(cellRef);
    return this.createValue(cell, this.engine.getCellDisplayValue(cell), cmd);
  }

  private cmdRaw(cmd: ParsedCommand): Output {
    const [cellRef] = cmd.args;
    if (!cellRef) throw new Error('RAW requires cell reference');

    const cell = this.requireCell(cellRef);
    return this.createValue(cell, this.engine.getCellRaw(cell), cmd);
  }

  private cmdClear(cmd: ParsedCommand): Output {
    const [cellRef] = cmd.args;

    if (!cellRef) {
      this.engine.clear();
      return this.createResult(true, { cleared: 'all' }, cmd);
    }

    const cell = this.requireCell(cellRef);
    this.engine.clearCell(cell);
    return this.createResult(true, { cleared: toA1(cell) }, cmd);
  }

  private cmdRefs(cmd: ParsedCommand): Output {
    const [cellRef] = cmd.args;
    if (!cellRef) throw new Error('REFS requires cell reference');

    const cell = this.requireCell(cellRef);
    const refs = this.engine.getCellReferences(cell).map(toA1);
    return this.createValue(cell, refs, cmd);
  }

  // ===========================================================================
  // Selection Commands
  // ===========================================================================

  private cmdSelect(cmd: ParsedCommand): Output {
    const [cellRef] = cmd.args;
    if (!cellRef) throw new Error('SELECT requires cell reference');

    const result = this.engine.select(this.requireCell(cellRef));
    return this.createResult(true, {
      selected: toA1(result.position),
      boundaryHit: result.boundaryHit,
    }, cmd);
  }

  private cmdMove(cmd: ParsedCommand): Output {
    const [directionArg, countArg] = cmd.args;
    if (!directionArg) throw new Error('MOVE requires direction (up, down, left, right)');

    const direction = directionArg.toLowerCase();
    if (!isDirection(direction)) throw new Error(`Invalid direction: ${directionArg}`);

    const count = countArg === undefined ? 1 : Number(countArg);
    if (!Number.isInteger(count) || count < 1) throw new Error(`Invalid count: ${countArg}`);

    let boundaryHit = false;
    for (let i = 0; i < count; i++) {
      if (this.engine.move(direction).boundaryHit) boundaryHit = true;
    }

    return this.createResult(true, {
      selected: toA1(this.engine.getActiveCell()),
      boundaryHit,
    }, cmd);
  }

  private cmdEdit(cmd: ParsedCommand): Output {
    if (cmd.args.length === 0) throw new Error('EDIT requires text');

    const text = cmd.args.length === 1 ? cmd.args[0] : textAfterArgument(cmd.raw, 0);
    const cell = this.engine.getActiveCell();
    this.engine.editActiveCell(text);

    return this.createResult(true, { cell: toA1(cell), text }, cmd);
  }

  // ===========================================================================
  // State Inspection Commands
  // ===========================================================================

  private cmdDump(cmd: ParsedCommand): Output {
    const [rangeRef] = cmd.args;
    if (!rangeRef) throw new Error('DUMP requires range reference');

    const range = this.requireRange(rangeRef);
    const grid = this.engine.getDisplayGrid(range);

    // Build headers (column letters)
    const headers: string[] = [''];
    for (let col = range.start.column; col <= range.end.column; col++) {
      headers.push(columnNumberToLetters(col));
    }

    const rows = grid.map((values, i) => [String(range.start.row + i), ...values]);

    const output: TableOutput = {
      type: 'table',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      headers,
      rows,
    };

    return output;
  }

  private cmdStats(cmd: ParsedCommand): Output {
    const stats = this.engine.getStats();

    const output: StatsOutput = {
      type: 'stats',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      cellCount: stats.cellCount,
      formulaCount: stats.formulaCount,
      errorCount: stats.errorCount,
      activeCell: toA1(this.engine.getActiveCell()),
    };

    return output;
  }

  // ===========================================================================
  // Utility Commands
  // ===========================================================================

  private cmdEcho(cmd: ParsedCommand): Output {
    return this.createEcho(cmd.args.join(' '), cmd);
  }

  /**
   * ASSERT <cell> <expected>
   * ASSERT <cell> <operator> <expected>
   *
   * Compares against the display string. Ordering operators compare numerically.
   */
  private cmdAssert(cmd: ParsedCommand): Output {
    const [cellRef, ...rest] = cmd.args;
    if (!cellRef || rest.length === 0) throw new Error('ASSERT requires cell and expected value');

    let operator: AssertOperator = '==';
    let expectedParts = rest;
    const [first] = rest;
    if (rest.length >= 2 && isAssertOperator(first)) {
      operator = first;
      expectedParts = rest.slice(1);
    }
    const expected = expectedParts.join(' ');

    const cell = this.requireCell(cellRef);
    const actual = this.engine.getCellDisplayValue(cell);
    const passed = compare(actual, operator, expected);

    const output: AssertOutput = {
      type: 'assert',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      passed,
      expected,
      actual,
      message: passed ? undefined : `Assertion failed: ${toA1(cell)} ${operator} ${expected}`,
    };

    return output;
  }

  private cmdAssertError(cmd: ParsedCommand): Output {
    this.expectError = true;
    return this.createInfo('Expecting error on next command', cmd);
  }

  // ===========================================================================
  // Control Commands
  // ===========================================================================

  private cmdReset(cmd: ParsedCommand): Output {
    this.engine = new SpreadsheetEngine(this.config.engine);
    this.expectError = false;
    return this.createResult(true, { reset: true }, cmd);
  }

  private cmdQuit(cmd: ParsedCommand): Output {
    return this.createInfo('Quitting', cmd);
  }

  // ===========================================================================
  // Argument Helpers
  // ===========================================================================

  private requireCell(ref: string): Position {
    const cell = parseA1(ref);
    if (!cell || cell.row < 1) throw new Error(`Invalid cell reference: ${ref}`);
    return cell;
  }

  private requireRange(ref: string): CellRange {
    const range = parseA1Range(ref);
    if (!range || range.start.row < 1) throw new Error(`Invalid range: ${ref}`);
    return range;
  }

  // ===========================================================================
  // Output Helpers
  // ===========================================================================

  private createResult(success: boolean, data: unknown, cmd: ParsedCommand): ResultOutput {
    return {
      type: 'result',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      success,
      data,
    };
  }

  private createValue(cell: Position, value: string | string[], cmd: ParsedCommand): ValueOutput {
    return {
      type: 'value',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      cell: toA1(cell),
      value,
    };
  }

  private createError(message: string, cmd: CommandSource, errorType: HarnessErrorType): ErrorOutput {
    return {
      type: 'error',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      message,
      errorType,
    };
  }

  private createSyntaxError(error: CommandSyntaxError): ErrorOutput {
    return {
      type: 'error',
      timestamp: Date.now(),
      command: error.line,
      lineNumber: error.lineNumber,
      message: error.message,
      errorType: 'CommandSyntax',
    };
  }

  private createInfo(message: string, cmd: ParsedCommand): InfoOutput {
    return {
      type: 'info',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      message,
    };
  }

  private createEcho(message: string, cmd: ParsedCommand): EchoOutput {
    return {
      type: 'echo',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      message,
    };
  }

  private emit(output: Output): void {
    this.outputHandler(output);
  }

  private defaultOutputHandler(output: Output): void {
    const lines = formatOutput(output, this.config);
    const write = output.type === 'error' ? console.error : console.log;
    for (const line of lines) {
      write(line);
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

function isAssertOperator(value: string): value is AssertOperator {
  return ASSERT_OPERATORS.has(value);
}

function compare(actual: string, operator: AssertOperator, expected: string): boolean {
  switch (operator) {
    case '==': return actual === expected;
    case '!=': return actual !== expected;
    case '<': return Number(actual) < Number(expected);
    case '>': return Number(actual) > Number(expected);
    case '<=': return Number(actual) <= Number(expected);
    case '>=': return Number(actual) >= Number(expected);
  }
}

/**
 * True for error outputs and failed assertions.
 */
export function isFailure(output: Output): boolean {
  return output.type === 'error' || (output.type === 'assert' && !output.passed);
}

/**
 * Count the failures in a run, for exit codes.
 */
export function countFailures(outputs: Output[]): number {
  return outputs.filter(isFailure).length;
}

export function createHarnessRunner(
  config?: Partial<HarnessConfig>,
  outputHandler?: (output: Output) => void
): HarnessRunner {
  return new HarnessRunner(config, outputHandler);
}
