/**
 * GridCalc Headless Harness - Module Exports
 *
 * Drives the engine through a stdin/stdout command protocol.
 */

export { CommandParser, CommandSyntaxError, createCommandParser } from './CommandParser.js';

export { HarnessRunner, countFailures, createHarnessRunner, isFailure } from './HarnessRunner.js';

export { formatOutput, formatTable } from './OutputFormatter.js';
export type { FormatOptions } from './OutputFormatter.js';

export type {
  CommandType,
  ParsedCommand,
  OutputType,
  Output,
  OutputBase,
  ResultOutput,
  ValueOutput,
  ErrorOutput,
  HarnessErrorType,
  InfoOutput,
  StatsOutput,
  TableOutput,
  AssertOutput,
  EchoOutput,
  HarnessConfig,
} from './types.js';

export { DEFAULT_CONFIG } from './types.js';
