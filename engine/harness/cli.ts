#!/usr/bin/env node
/**
 * GridCalc Headless Harness - CLI Entry Point
 *
 * Usage:
 *   gridcalc-harness [options]              # REPL when stdin is a terminal
 *   gridcalc-harness [options] < script.txt # run a script
 *   echo "SET A1 100" | gridcalc-harness
 *
 * Exits 1 when a script produced an error or a failed assertion.
 */

import * as readline from 'readline';
import { HarnessRunner, countFailures, createHarnessRunner } from './HarnessRunner.js';
import { DEFAULT_CONFIG } from './types.js';
import type { HarnessConfig } from './types.js';
import type { SpreadsheetEngineConfig } from '../core/SpreadsheetEngine.js';

// =============================================================================
// CLI Argument Parsing
// =============================================================================

interface CLIArgs {
  config: Partial<HarnessConfig>;
  engine: Partial<SpreadsheetEngineConfig>;
  help: boolean;
  interactive: boolean;
}

function parseArgs(args: string[]): CLIArgs {
  const result: CLIArgs = {
    config: {},
    engine: {},
    help: false,
    interactive: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--pretty':
        result.config.outputFormat = 'pretty';
        break;
      case '--json':
        result.config.outputFormat = 'json';
        break;
      case '--timestamps':
        result.config.includeTimestamps = true;
        break;
      case '--no-timestamps':
        result.config.includeTimestamps = false;
        break;
      case '--stop-on-error':
        result.config.stopOnError = true;
        break;
      case '--continue-on-error':
        result.config.stopOnError = false;
        break;
      case '--echo':
        result.config.echoCommands = true;
        break;
      case '--verbose':
      case '-v':
        result.config.verbose = true;
        break;
      case '--max-steps':
        result.config.maxStepsPerScript = readPositiveInteger(arg, args[++i]);
        break;
      case '--rows':
        result.engine.maxRow = readPositiveInteger(arg, args[++i]);
        break;
      case '--cols':
        result.engine.maxColumn = readPositiveInteger(arg, args[++i]);
        break;
      case '--wrap':
        result.engine.wrapAround = true;
        break;
      case '--no-ref-bounds':
        result.engine.enforceReferenceBounds = false;
        break;
      case '--interactive':
      case '-i':
        result.interactive = true;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      default:
        console.error(`Unknown option: ${arg}`);
        process.exit(1);
    }
  }

  return result;
}

function readPositiveInteger(flag: string, value: string | undefined): number {
  const parsed = Number(value);
  if (value === undefined || !Number.isInteger(parsed) || parsed < 1) {
    console.error(`${flag} requires a positive integer`);
    process.exit(1);
  }
  return parsed;
}

// =============================================================================
// Help Text
// =============================================================================

const HELP_TEXT = `
GridCalc Headless Harness

USAGE:
  gridcalc-harness [options]
  gridcalc-harness [options] < script.txt

OPTIONS:
  --pretty            Human-readable output (default: JSON)
  --json              JSON output (one object per line)
  --timestamps        Show timestamps in pretty output
  --stop-on-error     Stop at the first error or failed assertion
  --echo              Echo commands before executing
  --max-steps <n>     Maximum commands per script (default: ${DEFAULT_CONFIG.maxStepsPerScript})
  --rows <n>          Grid rows (default: 1000)
  --cols <n>          Grid columns (default: 26)
  --wrap              Arrow moves wrap at the grid edge
  --no-ref-bounds     Allow formulas to reference cells outside the grid
  --verbose, -v       Verbose mode
  --interactive, -i   Force interactive mode
  --help, -h          Show this help message

COMMANDS:
  SET <cell> <text>          Enter text (number, text, or =formula); "" clears
  GET <cell>                 Display value
  RAW <cell>                 Text as entered
  CLEAR [cell]               Clear one cell or everything
  REFS <cell>                Cells referenced by the formula
  SELECT <cell>              Make cell active
  MOVE <direction> [count]   Move active cell (up, down, left, right)
  EDIT <text>                Enter text into the active cell
  DUMP <range>               Display values as a table
  STATS                      Cell, formula and error counts
  ECHO <message>             Print message
  ASSERT <cell> [op] <val>   Assert display value (==, !=, <, >, <=, >=)
  ASSERT_ERROR               Expect next command to fail
  RESET                      Reset engine state
  QUIT                       Exit harness

EXAMPLE:
  SET A1 2
  SET B1 3
  SET C1 4
  SET D1 =A1+B1*C1
  ASSERT D1 14
  SET A1 =A1
  GET A1                     # "#CYCLE!"
`;

// =============================================================================
// Main Entry Point
// =============================================================================

async function main(): Promise<void> {
  const cliArgs = parseArgs(process.argv.slice(2));

  if (cliArgs.help) {
    console.log(HELP_TEXT);
    return;
  }

  const runner = createHarnessRunner({
    ...cliArgs.config,
    engine: cliArgs.engine,
  });

  const isInteractive = cliArgs.interactive || process.stdin.isTTY === true;

  if (isInteractive) {
    await runInteractive(runner);
  } else {
    process.exitCode = await runPiped(runner);
  }
}

async function runInteractive(runner: HarnessRunner): Promise<void> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: 'gc> ',
  });

  if (runner.getConfig().verbose) {
    console.log('GridCalc Headless Harness');
    console.log('Type "help" for commands, "quit" to exit.');
  }

  rl.prompt();

  let lineNumber = 0;
  for await (const line of rl) {
    lineNumber++;

    if (line.trim().toLowerCase() === 'help') {
      console.log(HELP_TEXT);
      rl.prompt();
      continue;
    }

    if (!runner.executeLine(line, lineNumber)) {
      break;
    }
    rl.prompt();
  }

  rl.close();
}

async function runPiped(runner: HarnessRunner): Promise<number> {
  const rl = readline.createInterface({
    input: process.stdin,
    terminal: false,
  });

  const lines: string[] = [];
  for await (const line of rl) {
    lines.push(line);
  }

  const outputs = runner.executeScript(lines.join('\n'));
  return countFailures(outputs) === 0 ? 0 : 1;
}

// Run
main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
