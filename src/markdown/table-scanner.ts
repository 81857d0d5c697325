import { isBlankLine } from '../core/lines.js';

/** Half-open `[start, end)` range of lines forming one pipe table. */
export interface TableBlock {
  start: number;
  end: number;
}

/** Minimum dash run that marks a separator candidate. */
const SEPARATOR_DASH_RUN = 3;

/** True when the line contains a pipe character. */
export function hasPipe(line: string): boolean {
  return line.includes('|');
}

/** True when the line contains at least three consecutive dashes anywhere. */
export function containsSeparatorRun(line: string): boolean {
  let run = 0;
  for (const char of line) {
    run = char === '-' ? run + 1 : 0;
    if (run >= SEPARATOR_DASH_RUN) {
      return true;
    }
  }
  return false;
}

/** True when `line` can open a table whose separator candidate is `next`. */
export function isTableStart(line: string, next: string): boolean {
  return hasPipe(line) && hasPipe(next) && containsSeparatorRun(next);
}

/** Body lines must carry a pipe and some content. */
export function isTableRowLine(line: string): boolean {
  return hasPipe(line) && !isBlankLine(line);
}

/**
 * Lazily yield non-overlapping table blocks, scanning forward. Each block takes
 * the longest run of row lines after its separator and scanning resumes at the
 * block end. Calling the generator again restarts the scan.
 */
export function* scanTableBlocks(lines: readonly string[]): Generator<TableBlock, void, undefined> {
  let index = 0;
  while (index < lines.length - 1) {
    const header = lines[index];
    const separator = lines[index + 1];
    if (header === undefined || separator === undefined || !isTableStart(header, separator)) {
      index += 1;
      continue;
    }

    let end = index + 2;
    while (end < lines.length) {
      const line = lines[end];
      if (line === undefined || !isTableRowLine(line)) {
        break;
      }
      end += 1;
    }

    yield { start: index, end };
    index = end;
  }
}

/** Eager form of `scanTableBlocks`. */
export function findTableBlocks(lines: readonly string[]): TableBlock[] {
  return [...scanTableBlocks(lines)];
}
