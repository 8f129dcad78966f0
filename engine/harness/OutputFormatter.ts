/**
 * GridCalc Headless Harness - Output Formatter
 *
 * Turns structured outputs into printable lines.
 */

import type { HarnessConfig, Output } from './types.js';

export type FormatOptions = Pick<HarnessConfig, 'outputFormat' | 'includeTimestamps' | 'verbose'>;

/**
 * Format one output. JSON mode yields a single line; pretty mode may yield several.
 */
export function formatOutput(output: Output, options: FormatOptions): string[] {
  if (options.outputFormat === 'json') {
    return [JSON.stringify(output)];
  }

  const stamp = options.includeTimestamps ? `${new Date(output.timestamp).toISOString()} ` : '';
  const prefix = `${stamp}${output.lineNumber ? `[${output.lineNumber}] ` : ''}`;

  switch (output.type) {
    case 'result': {
      const lines = [`${prefix}${output.success ? 'OK' : 'FAILED'} ${output.command ?? ''}`.trimEnd()];
      if (output.data !== undefined && options.verbose) {
        lines.push(`   ${JSON.stringify(output.data)}`);
      }
      return lines;
    }

    case 'value':
      return [`${prefix}${output.cell} = ${JSON.stringify(output.value)}`];

    case 'error':
      return [`${prefix}ERROR: ${output.message}`];

    case 'info':
      return [`${prefix}INFO: ${output.message}`];

    case 'echo':
      return [`${prefix}${output.message}`];

    case 'stats':
      return [
        `${prefix}STATS: cells=${output.cellCount} formulas=${output.formulaCount} ` +
          `errors=${output.errorCount} active=${output.activeCell}`,
      ];

    case 'assert':
      return output.passed
        ? [`${prefix}ASSERT passed`]
        : [`${prefix}ASSERT failed: expected ${JSON.stringify(output.expected)}, got ${JSON.stringify(output.actual)}`];

    case 'table':
      return [formatTable(output.headers, output.rows, prefix)];
  }
}

/**
 * Render a table with columns padded to their widest cell.
 */
export function formatTable(headers: string[], rows: string[][], prefix: string = ''): string {
  const widths = headers.map((header, i) =>
    Math.max(header.length, ...rows.map(row => (row[i] ?? '').length))
  );

  const line = (cells: string[]): string =>
    cells.map((cell, i) => cell.padEnd(widths[i])).join(' | ').trimEnd();

  const separator = widths.map(w => '-'.repeat(w)).join('-+-');

  return [`${prefix}TABLE:`, line(headers), separator, ...rows.map(line)].join('\n');
}
