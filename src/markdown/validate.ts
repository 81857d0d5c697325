import { splitLines } from '../core/lines.js';
import { parseTableBlock, type TableRow } from './table-parse.js';
import { scanTableBlocks, type TableBlock } from './table-scanner.js';
import { validateTable, type TableProblemKind, type TableValidation } from './table-validate.js';

/** One invalid table, located by inclusive 1-based line numbers. */
export interface TableProblem {
  startLine: number;
  endLine: number;
  message: string;
  kind: TableProblemKind;
}

/** Rows of one scanned block together with their verdict. */
export interface CheckedTableBlock {
  rows: TableRow[];
  validation: TableValidation;
}

/** Parse and validate the lines of one scanned block. */
export function checkTableBlock(lines: readonly string[], block: TableBlock): CheckedTableBlock {
  const parsed = parseTableBlock(lines.slice(block.start, block.end));
  const rows = parsed?.rows ?? [];
  return { rows, validation: validateTable(rows, parsed?.separator ?? '') };
}

/** Build the problem record for an invalid block. */
export function toTableProblem(block: TableBlock, validation: Extract<TableValidation, { valid: false }>): TableProblem {
  return {
    startLine: block.start + 1,
    endLine: block.end,
    message: validation.message,
    kind: validation.kind
  };
}

/** `Table at lines S-E : <reason>` */
export function describeTableProblem(problem: TableProblem): string {
  return `Table at lines ${problem.startLine}-${problem.endLine} : ${problem.message}`;
}

/** Validate every table of the raw document; headings are not normalized first. */
export function validateMarkdownText(text: string): TableProblem[] {
  const lines = splitLines(text);
  const problems: TableProblem[] = [];

  for (const block of scanTableBlocks(lines)) {
    const { validation } = checkTableBlock(lines, block);
    if (!validation.valid) {
      problems.push(toTableProblem(block, validation));
    }
  }

  return problems;
}
