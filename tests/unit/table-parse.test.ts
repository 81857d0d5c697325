import { describe, expect, it } from 'vitest';

import { parseTableBlock, splitTableRow } from '../../src/markdown/table-parse.js';

describe('table row splitting', () => {
  it('strips the outer pipes and trims cells', () => {
    expect(splitTableRow('| a | b |')).toEqual(['a', 'b']);
    expect(splitTableRow('  a |b  ')).toEqual(['a', 'b']);
    expect(splitTableRow('a|b|')).toEqual(['a', 'b']);
  });

  it('strips only one pipe on each side', () => {
    expect(splitTableRow('|| a ||')).toEqual(['', 'a', '']);
    expect(splitTableRow('| a |  | c |')).toEqual(['a', '', 'c']);
  });

  it('splits a block into rows and the raw separator', () => {
    expect(parseTableBlock(['| h1 | h2 |', ' |---|---| ', '| 1 | 2 |'])).toEqual({
      rows: [
        ['h1', 'h2'],
        ['1', '2']
      ],
      separator: '|---|---|'
    });
  });

  it('returns nothing for blocks shorter than two lines', () => {
    expect(parseTableBlock(['| a |'])).toBeUndefined();
    expect(parseTableBlock([])).toBeUndefined();
  });
});
