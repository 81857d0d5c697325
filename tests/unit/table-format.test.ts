import { describe, expect, it } from 'vitest';

import {
  computeColumnWidths,
  formatSeparatorRow,
  formatTable,
  padCell
} from '../../src/markdown/table-format.js';

describe('table formatting', () => {
  it('computes the widest cell per column', () => {
    expect(
      computeColumnWidths([
        ['a', 'bb'],
        ['1', '22']
      ])
    ).toEqual([1, 2]);
    expect(computeColumnWidths([])).toEqual([]);
  });

  it('pads cells on the right', () => {
    expect(padCell('a', 3)).toBe('a  ');
    expect(padCell('abcd', 2)).toBe('abcd');
  });

  it('never emits fewer than three separator dashes', () => {
    expect(formatSeparatorRow([1, 5])).toBe('| --- | ----- |');
  });

  it('renders narrow tables', () => {
    expect(
      formatTable([
        ['a', 'bb'],
        ['1', '22']
      ])
    ).toEqual(['| a | bb |', '| --- | --- |', '| 1 | 22 |']);
  });

  it('aligns columns to the widest cell', () => {
    expect(
      formatTable([
        ['name', 'qty'],
        ['apple', '3'],
        ['kiwi', '12']
      ])
    ).toEqual(['| name  | qty |', '| ----- | --- |', '| apple | 3   |', '| kiwi  | 12  |']);
  });

  it('measures widths in code points', () => {
    expect(
      formatTable([
        ['😀', 'b'],
        ['cc', 'd']
      ])
    ).toEqual(['| 😀  | b |', '| --- | --- |', '| cc | d |']);
  });

  it('renders nothing for an empty table', () => {
    expect(formatTable([])).toEqual([]);
  });
});
