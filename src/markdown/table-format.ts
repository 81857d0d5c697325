import { codePointLength } from '../core/lines.js';
import type { TableRow } from './table-parse.js';

/** Separator cells never shrink below this many dashes. */
export const MIN_SEPARATOR_WIDTH = 3;

/** Widest cell per column across all rows, header included. */
export function computeColumnWidths(rows: readonly TableRow[]): number[] {
  const columnCount = rows[0]?.length ?? 0;
  const widths = new Array<number>(columnCount).fill(0);

  for (const row of rows) {
    row.forEach((cell, column) => {
      const current = widths[column];
      if (current !== undefined) {
        widths[column] = Math.max(current, codePointLength(cell));
      }
    });
  }

  return widths;
}

/** Pad a cell on the right up to `width` code points. */
export function padCell(cell: string, width: number): string {
  return cell + ' '.repeat(Math.max(0, width - codePointLength(cell)));
}

/** Render one row as `| c1 | c2 | ... |`. */
export function formatTableRow(row: TableRow, widths: readonly number[]): string {
  const cells = row.map((cell, column) => padCell(cell, widths[column] ?? 0));
  return `| ${cells.join(' | ')} |`;
}

/** Render the separator row with `max(3, width)` dashes per column. */
export function formatSeparatorRow(widths: readonly number[]): string {
  const cells = widths.map((width) => '-'.repeat(Math.max(MIN_SEPARATOR_WIDTH, width)));
  return `| ${cells.join(' | ')} |`;
}

/**
 * Re-emit a structurally valid table with aligned columns. Row and column order
 * are kept and cell text is only padded.
 */
export function formatTable(rows: readonly TableRow[]): string[] {
  const [header, ...body] = rows;
  if (header === undefined) {
    return [];
  }

  const widths = computeColumnWidths(rows);
  return [formatTableRow(header, widths), formatSeparatorRow(widths), ...body.map((row) => formatTableRow(row, widths))];
}
