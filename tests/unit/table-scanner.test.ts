import { describe, expect, it } from 'vitest';

import {
  containsSeparatorRun,
  findTableBlocks,
  isTableRowLine,
  isTableStart,
  scanTableBlocks
} from '../../src/markdown/table-scanner.js';

describe('table scanner', () => {
  it('detects separator candidates by a run of three dashes', () => {
    expect(containsSeparatorRun('|---|')).toBe(true);
    expect(containsSeparatorRun('x---')).toBe(true);
    expect(containsSeparatorRun('-- -')).toBe(false);
    expect(isTableStart('| a |', '| a---b |')).toBe(true);
    expect(isTableStart('| a |', '-----')).toBe(false);
    expect(isTableStart('a', '|---|')).toBe(false);
  });

  it('requires body rows to carry a pipe and content', () => {
    expect(isTableRowLine('| 1 |')).toBe(true);
    expect(isTableRowLine('   ')).toBe(false);
    expect(isTableRowLine('text')).toBe(false);
  });

  it('finds one block ending at the first non-row line', () => {
    const lines = ['| a | b |', '|---|---|', '| 1 | 2 |', '', 'text'];
    expect(findTableBlocks(lines)).toEqual([{ start: 0, end: 3 }]);
  });

  it('finds consecutive blocks without overlap', () => {
    const lines = ['| a |', '| --- |', '| 1 |', 'text', '| b |', '| --- |'];
    expect(findTableBlocks(lines)).toEqual([
      { start: 0, end: 3 },
      { start: 4, end: 6 }
    ]);
  });

  it('absorbs separator-looking body rows into the current block', () => {
    const lines = ['| a | b |', '|---|---|', '|---|---|', '| x | y |'];
    expect(findTableBlocks(lines)).toEqual([{ start: 0, end: 4 }]);
  });

  it('ignores documents too short to hold a table', () => {
    expect(findTableBlocks([])).toEqual([]);
    expect(findTableBlocks(['| a |'])).toEqual([]);
    expect(findTableBlocks(['| a |', '|---|'])).toEqual([{ start: 0, end: 2 }]);
  });

  it('restarts the scan on every call', () => {
    const lines = ['| a |', '|---|', '| 1 |'];
    expect([...scanTableBlocks(lines)]).toEqual([...scanTableBlocks(lines)]);

    const iterator = scanTableBlocks(lines);
    expect(iterator.next()).toEqual({ value: { start: 0, end: 3 }, done: false });
    expect(iterator.next().done).toBe(true);
  });
});
