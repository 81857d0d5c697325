import { splitTableRow, type TableRow } from './table-parse.js';

/** Which structural rule a table broke. */
export type TableProblemKind = 'empty' | 'row-columns' | 'separator-columns' | 'separator-marker';

/** Verdict for one table. */
export type TableValidation =
  | { valid: true; message: string }
  | { valid: false; message: string; kind: TableProblemKind };

/** Minimum dashes in an alignment marker. */
const MIN_MARKER_DASHES = 3;

/** True for `---`, `:---`, `---:` and `:---:` with any dash count of three or more. */
export function isAlignmentMarker(segment: string): boolean {
  let index = 0;
  if (segment[index] === ':') {
    index += 1;
  }

  let dashes = 0;
  while (segment[index] === '-') {
    dashes += 1;
    index += 1;
  }
  if (dashes < MIN_MARKER_DASHES) {
    return false;
  }

  if (segment[index] === ':') {
    index += 1;
  }
  return index === segment.length;
}

/**
 * Check that every row and the separator have the header's column count and
 * that each separator segment is an alignment marker. The first broken rule wins.
 */
export function validateTable(rows: readonly TableRow[], separatorLine: string): TableValidation {
  const [header] = rows;
  if (header === undefined) {
    return { valid: false, message: 'Empty table', kind: 'empty' };
  }

  const columnCount = header.length;
  for (const [index, row] of rows.entries()) {
    if (row.length !== columnCount) {
      return {
        valid: false,
        message: `Row ${index + 1} has ${row.length} columns; expected ${columnCount}`,
        kind: 'row-columns'
      };
    }
  }

  const segments = splitTableRow(separatorLine);
  if (segments.length !== columnCount) {
    return {
      valid: false,
      message: `Separator has ${segments.length} columns; expected ${columnCount}`,
      kind: 'separator-columns'
    };
  }

  const badSegment = segments.find((segment) => !isAlignmentMarker(segment));
  if (badSegment !== undefined) {
    return {
      valid: false,
      message: `Separator segment '${badSegment}' is not a valid alignment marker (--- or :---:)`,
      kind: 'separator-marker'
    };
  }

  return { valid: true, message: 'Table looks valid' };
}
