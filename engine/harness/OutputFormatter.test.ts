import { describe, it, expect } from 'vitest';
import { formatOutput, formatTable } from './OutputFormatter.js';
import type { FormatOptions } from './OutputFormatter.js';
import type { Output } from './types.js';

const pretty: FormatOptions = { outputFormat: 'pretty', includeTimestamps: false, verbose: false };

describe('formatOutput', () => {
  it('writes one JSON line in json mode', () => {
    const output: Output = { type: 'echo', timestamp: 0, message: 'hi' };
    expect(formatOutput(output, { ...pretty, outputFormat: 'json' })).toEqual([
      '{"type":"echo","timestamp":0,"message":"hi"}',
    ]);
  });

  it('prints results and their data when verbose', () => {
    const output: Output = {
      type: 'result',
      timestamp: 0,
      command: 'SET A1 1',
      lineNumber: 1,
      success: true,
      data: { cell: 'A1', text: '1' },
    };
    expect(formatOutput(output, pretty)).toEqual(['[1] OK SET A1 1']);
    expect(formatOutput(output, { ...pretty, verbose: true })).toEqual([
      '[1] OK SET A1 1',
      '   {"cell":"A1","text":"1"}',
    ]);
  });

  it('prints values, stats and assertions', () => {
    expect(formatOutput({ type: 'value', timestamp: 0, lineNumber: 3, cell: 'D1', value: '14' }, pretty))
      .toEqual(['[3] D1 = "14"']);

    expect(formatOutput({
      type: 'stats',
      timestamp: 0,
      cellCount: 1,
      formulaCount: 0,
      errorCount: 0,
      activeCell: 'A1',
    }, pretty)).toEqual(['STATS: cells=1 formulas=0 errors=0 active=A1']);

    expect(formatOutput({ type: 'assert', timestamp: 0, passed: false, expected: '15', actual: '14' }, pretty))
      .toEqual(['ASSERT failed: expected "15", got "14"']);
  });

  it('prefixes ISO timestamps when asked', () => {
    const output: Output = { type: 'info', timestamp: 0, message: 'Quitting' };
    expect(formatOutput(output, { ...pretty, includeTimestamps: true })).toEqual([
      '1970-01-01T00:00:00.000Z INFO: Quitting',
    ]);
  });
});

describe('formatTable', () => {
  it('pads columns to the widest cell', () => {
    expect(formatTable(['', 'A', 'B'], [['1', '10', '3'], ['2', '', '']])).toBe(
      ['TABLE:', ' | A  | B', '--+----+--', '1 | 10 | 3', '2 |    |'].join('\n')
    );
  });
});
