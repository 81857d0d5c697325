import { describe, expect, it } from 'vitest';

import { matchHeading, normalizeHeading, normalizeHeadingLines } from '../../src/markdown/headings.js';

describe('heading normalization', () => {
  it('matches one to six leading hashes', () => {
    expect(matchHeading('##Title')).toEqual({ level: 2, text: 'Title' });
    expect(matchHeading('######   deep  ')).toEqual({ level: 6, text: 'deep' });
    expect(matchHeading('####### seven')).toBeUndefined();
    expect(matchHeading('  # indented')).toBeUndefined();
    expect(matchHeading('plain')).toBeUndefined();
  });

  it('rewrites headings as hashes, one space and trimmed text', () => {
    expect(normalizeHeading('##Title')).toBe('## Title');
    expect(normalizeHeading('#   Title  ')).toBe('# Title');
    expect(normalizeHeading('#######Seven')).toBe('#######Seven');
    expect(normalizeHeading('##')).toBe('## ');
  });

  it('inserts a blank line only when the next line has content', () => {
    expect(normalizeHeadingLines(['#A', 'text'])).toEqual(['# A', '', 'text']);
    expect(normalizeHeadingLines(['# A', '', 'text'])).toEqual(['# A', '', 'text']);
    expect(normalizeHeadingLines(['#A   ', '  '])).toEqual(['# A', '']);
    expect(normalizeHeadingLines(['# A'])).toEqual(['# A']);
    expect(normalizeHeadingLines(['#A', '##B'])).toEqual(['# A', '', '## B']);
  });

  it('can skip the blank line after headings', () => {
    expect(normalizeHeadingLines(['#A', 'text'], { blankLineAfterHeading: false })).toEqual(['# A', 'text']);
  });

  it('only trims the end of other lines', () => {
    expect(normalizeHeadingLines(['  indented  ', 'text\t'])).toEqual(['  indented', 'text']);
    expect(normalizeHeadingLines(['##'])).toEqual(['##']);
  });
});
