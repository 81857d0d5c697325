import { isBlankLine } from '../core/lines.js';

/** Deepest heading level recognized by the normalizer. */
export const MAX_HEADING_LEVEL = 6;

/** A recognized heading line: marker length and trimmed text. */
export interface HeadingMatch {
  level: number;
  text: string;
}

/** Settings for the heading pass. */
export interface HeadingPassSettings {
  blankLineAfterHeading?: boolean;
}

/** Match a line starting with 1-6 `#`; a longer run is not a heading. */
export function matchHeading(line: string): HeadingMatch | undefined {
  let level = 0;
  while (line[level] === '#') {
    level += 1;
  }

  if (level === 0 || level > MAX_HEADING_LEVEL) {
    return undefined;
  }

  return { level, text: line.slice(level).trim() };
}

/** Rewrite a heading as `<hashes> <text>`; other lines are returned untouched. */
export function normalizeHeading(line: string): string {
  const heading = matchHeading(line);
  if (!heading) {
    return line;
  }

  return `${'#'.repeat(heading.level)} ${heading.text}`;
}

/**
 * First Markdown pass. Headings are normalized and trimmed, and followed by one
 * blank line when the next source line has content; every other line only loses
 * its trailing whitespace.
 */
export function normalizeHeadingLines(lines: readonly string[], settings: HeadingPassSettings = {}): string[] {
  const blankLineAfterHeading = settings.blankLineAfterHeading ?? true;
  const result: string[] = [];

  lines.forEach((line, index) => {
    if (!matchHeading(line)) {
      result.push(line.trimEnd());
      return;
    }

    result.push(normalizeHeading(line).trim());
    const next = lines[index + 1];
    if (blankLineAfterHeading && next !== undefined && !isBlankLine(next)) {
      result.push('');
    }
  });

  return result;
}
