/**
 * GridCalc Headless Harness - Command Parser
 *
 * Parses text commands into structured command objects.
 *
 * Command syntax:
 *   COMMAND [args...]
 *
 * Arguments are separated by whitespace. Single or double quotes keep
 * spaces inside one argument ("two words"); \" \\ \n \t escapes are
 * honoured inside quotes. "" is an empty argument.
 *
 * Cell Operations:
 *   SET A1 100                  - Enter a number
 *   SET A1 "Hello World"        - Enter text
 *   SET A1 =B1*(C1+2)           - Enter a formula
 *   SET A1 ""                   - Clear the cell
 *   GET A1                      - Display value
 *   RAW A1                      - Text as entered
 *   CLEAR [A1]                  - Clear one cell, or everything
 *   REFS A1                     - Cells the formula in A1 references
 *
 * Selection:
 *   SELECT B2 / MOVE down [n] / EDIT =A1+1
 *
 * State Inspection:
 *   DUMP A1:C5 / STATS
 *
 * Utility:
 *   ECHO text / ASSERT A1 == 14 / ASSERT_ERROR / RESET / QUIT
 */

import type { CommandType, ParsedCommand } from './types.js';

const VALID_COMMANDS: ReadonlySet<string> = new Set<CommandType>([
  // Cell operations
  'SET', 'GET', 'RAW', 'CLEAR', 'REFS',
  // Selection
  'SELECT', 'MOVE', 'EDIT',
  // State inspection
  'DUMP', 'STATS',
  // Utility
  'ECHO', 'ASSERT', 'ASSERT_ERROR',
  // Control
  'RESET', 'QUIT',
]);

function isCommandType(value: string): value is CommandType {
  return VALID_COMMANDS.has(value);
}

export class CommandParser {
  /**
   * Parse a single command line.
   * @returns null for blank lines and comments (# or //)
   * @throws CommandSyntaxError for unknown commands and unterminated quotes
   */
  parse(line: string, lineNumber: number = 0): ParsedCommand | null {
    const trimmed = line.trim();

    // Skip empty lines and comments
    if (trimmed === '' || trimmed.startsWith('#') || trimmed.startsWith('//')) {
      return null;
    }

    const tokens = this.tokenize(trimmed, lineNumber);
    if (tokens.length === 0) return null;

    // First token is the command
    const commandStr = tokens[0].toUpperCase();

    if (!isCommandType(commandStr)) {
      throw new CommandSyntaxError(`Unknown command: ${commandStr}`, lineNumber, trimmed);
    }

    return {
      type: commandStr,
      args: tokens.slice(1),
      raw: trimmed,
      lineNumber,
    };
  }

  /**
   * Parse a script (multiline string).
   */
  parseScript(script: string): ParsedCommand[] {
    const commands: ParsedCommand[] = [];
    const lines = script.split('\n');

    for (let i = 0; i < lines.length; i++) {
      const cmd = this.parse(lines[i], i + 1);
      if (cmd) {
        commands.push(cmd);
      }
    }

    return commands;
  }

  /**
   * Tokenize a command line, respecting quoted strings.
   */
  private tokenize(line: string, lineNumber: number): string[] {
    const tokens: string[] = [];
    let current = '';
    let inQuotes = false;
    let quoteChar = '';

    for (let i = 0; i < line.length; i++) {
      const char = line[i];

      if (inQuotes) {
        if (char === quoteChar) {
          // End of quoted string
          tokens.push(current);
          current = '';
          inQuotes = false;
          quoteChar = '';
        } else if (char === '\\' && i + 1 < line.length) {
          // Escape sequence
          const next = line[i + 1];
          if (next === quoteChar || next === '\\' || next === 'n' || next === 't') {
            if (next === 'n') current += '\n';
            else if (next === 't') current += '\t';
            else current += next;
            i++;
          } else {
            current += char;
          }
        } else {
          current += char;
        }
      } else {
        if (char === '"' || char === "'") {
          // Start of quoted string
          if (current !== '') {
            tokens.push(current);
            current = '';
          }
          inQuotes = true;
          quoteChar = char;
        } else if (char === ' ' || char === '\t') {
          // Whitespace separator
          if (current !== '') {
            tokens.push(current);
            current = '';
          }
        } else {
          current += char;
        }
      }
    }

    // Don't forget the last token
    if (current !== '') {
      tokens.push(current);
    }

    if (inQuotes) {
      throw new CommandSyntaxError('Unterminated string', lineNumber, line);
    }

    return tokens;
  }
}

// =============================================================================
// Command Syntax Error
// =============================================================================

export class CommandSyntaxError extends Error {
  lineNumber: number;
  line: string;

  constructor(message: string, lineNumber: number, line: string) {
    super(`Syntax error at line ${lineNumber}: ${message}\n  ${line}`);
    this.name = 'CommandSyntaxError';
    this.lineNumber = lineNumber;
    this.line = line;
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createCommandParser(): CommandParser {
  return new CommandParser();
}
