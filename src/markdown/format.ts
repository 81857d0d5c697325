import { joinDocumentLines, splitLines } from '../core/lines.js';
import { normalizeHeadingLines } from './headings.js';
import { formatTable } from './table-format.js';
import { scanTableBlocks } from './table-scanner.js';
import { checkTableBlock, toTableProblem, type TableProblem } from './validate.js';

/** Settings for the Markdown format orchestrator. */
export interface MarkdownFormatSettings {
  blankLineAfterHeading?: boolean;
  formatTables?: boolean;
}

/** Output of the table pass. */
export interface TablePassResult {
  lines: string[];
  formattedTables: number;
  skippedTables: TableProblem[];
}

/** Output of the whole Markdown format run. */
export interface MarkdownFormatOutcome extends TablePassResult {
  text: string;
}

/**
 * Second Markdown pass. Valid tables are replaced by their aligned rendering;
 * invalid ones are copied through verbatim and reported.
 */
export function reformatTables(lines: readonly string[]): TablePassResult {
  const result: string[] = [];
  const skippedTables: TableProblem[] = [];
  let formattedTables = 0;
  let cursor = 0;

  for (const block of scanTableBlocks(lines)) {
    result.push(...lines.slice(cursor, block.start));
    cursor = block.end;

    const { rows, validation } = checkTableBlock(lines, block);
    if (!validation.valid) {
      result.push(...lines.slice(block.start, block.end));
      skippedTables.push(toTableProblem(block, validation));
      continue;
    }

    result.push(...formatTable(rows));
    formattedTables += 1;
  }

  result.push(...lines.slice(cursor));
  return { lines: result, formattedTables, skippedTables };
}

/** Heading pass, then table pass, then join with a single trailing newline. */
export function formatMarkdownText(text: string, settings: MarkdownFormatSettings = {}): MarkdownFormatOutcome {
  const normalized = normalizeHeadingLines(splitLines(text), {
    blankLineAfterHeading: settings.blankLineAfterHeading
  });

  const tablePass: TablePassResult =
    settings.formatTables === false
      ? { lines: normalized, formattedTables: 0, skippedTables: [] }
      : reformatTables(normalized);

  return { ...tablePass, text: joinDocumentLines(tablePass.lines) };
}
