/** One row of trimmed cell strings. */
export type TableRow = string[];

/** A table block split into header/data rows plus its raw separator. */
export interface ParsedTable {
  /** Header first, then data rows; the separator is not included. */
  rows: TableRow[];
  separator: string;
}

/**
 * Split a table line into cells: trim, strip one leading and one trailing pipe,
 * split on the remaining pipes and trim each piece.
 */
export function splitTableRow(line: string): TableRow {
  let inner = line.trim();
  if (inner.startsWith('|')) {
    inner = inner.slice(1);
  }
  if (inner.endsWith('|')) {
    inner = inner.slice(0, -1);
  }

  return inner.split('|').map((cell) => cell.trim());
}

/** Parse the lines of one table block; blocks shorter than two lines have no table. */
export function parseTableBlock(blockLines: readonly string[]): ParsedTable | undefined {
  const [header, separator, ...body] = blockLines;
  if (header === undefined || separator === undefined) {
    return undefined;
  }

  return {
    rows: [splitTableRow(header), ...body.map(splitTableRow)],
    separator: separator.trim()
  };
}
