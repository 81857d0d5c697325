import type { Diagnostic } from '../core/diagnostics.js';
import { formatTable } from '../markdown/table-format.js';
import type { TableRow } from '../markdown/table-parse.js';
import type { FixtureExpectation, FixtureFormat, FixtureOperation } from './fixtures.js';

/** String-keyed histogram helper used by aggregate summaries. */
export type FixtureHistogram = Record<string, number>;

/** One fixture execution result captured for triage and artifact reporting. */
export interface FixtureExecutionResult {
  fixtureId: string;
  metaPath: string;
  documentPath: string;
  category: string;
  format: FixtureFormat;
  operation: FixtureOperation;
  expected: FixtureExpectation;
  observed: FixtureExpectation;
  diagnostics: Diagnostic[];
  success: boolean;
  failureReasons: string[];
}

/** Category-level aggregate for triage slicing. */
export interface FixtureCategoryRollup {
  fixtureCount: number;
  passCount: number;
  failCount: number;
}

/** Aggregated execution report for all processed fixtures. */
export interface FixtureExecutionReport {
  generatedAt: string;
  fixtureCount: number;
  passCount: number;
  failCount: number;
  diagnosticCodeHistogram: FixtureHistogram;
  diagnosticSeverityHistogram: FixtureHistogram;
  categoryRollups: Record<string, FixtureCategoryRollup>;
  results: FixtureExecutionResult[];
}

/** Format a compact Markdown summary; its tables are aligned by the project's own formatter. */
export function formatFixtureReportMarkdown(report: FixtureExecutionReport): string {
  const lines: string[] = [
    '# Fixture Execution Report',
    '',
    `Generated at: ${report.generatedAt}`,
    `Fixtures executed: ${report.fixtureCount}`,
    `Passed: ${report.passCount}`,
    `Failed: ${report.failCount}`,
    ''
  ];

  const rows: TableRow[] = [['Fixture', 'Operation', 'Expected', 'Observed', 'Match', 'Notes']];
  for (const result of report.results) {
    rows.push([
      result.fixtureId,
      `${result.format} ${result.operation}`,
      result.expected,
      result.observed,
      result.success ? 'yes' : 'no',
      escapeMarkdownTable(result.failureReasons.length > 0 ? result.failureReasons.join('; ') : 'ok')
    ]);
  }
  lines.push(...formatTable(rows));

  lines.push('');
  lines.push('## Diagnostic Histograms');
  lines.push('');
  appendHistogramSection(lines, 'Diagnostic Codes', report.diagnosticCodeHistogram);
  lines.push('');
  appendHistogramSection(lines, 'Diagnostic Severities', report.diagnosticSeverityHistogram);
  lines.push('');
  lines.push('## Category Rollups');
  lines.push('');
  appendCategoryRollupSection(lines, report.categoryRollups);

  return `${lines.join('\n')}\n`;
}

/** Serialize report content to deterministic JSON text for artifacts. */
export function formatFixtureReportJson(report: FixtureExecutionReport): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}

/** Build a diagnostic code histogram from a list of diagnostics. */
export function buildCodeHistogram(diagnostics: Diagnostic[]): FixtureHistogram {
  const histogram: FixtureHistogram = {};
  for (const diagnostic of diagnostics) {
    histogram[diagnostic.code] = (histogram[diagnostic.code] ?? 0) + 1;
  }
  return histogram;
}

/** Build a severity histogram from a list of diagnostics. */
export function buildSeverityHistogram(diagnostics: Diagnostic[]): FixtureHistogram {
  const histogram: FixtureHistogram = {};
  for (const diagnostic of diagnostics) {
    histogram[diagnostic.severity] = (histogram[diagnostic.severity] ?? 0) + 1;
  }
  return histogram;
}

/** Build per-category pass/fail aggregates. */
export function buildCategoryRollups(results: FixtureExecutionResult[]): Record<string, FixtureCategoryRollup> {
  const rollups: Record<string, FixtureCategoryRollup> = {};

  for (const result of results) {
    const rollup = (rollups[result.category] ??= { fixtureCount: 0, passCount: 0, failCount: 0 });
    rollup.fixtureCount += 1;
    if (result.success) {
      rollup.passCount += 1;
    } else {
      rollup.failCount += 1;
    }
  }

  return rollups;
}

/** Escape table delimiters in free-form diagnostic text. */
function escapeMarkdownTable(value: string): string {
  return value.replaceAll('|', '\\|');
}

/** Append a histogram section sorted by descending count then key name. */
function appendHistogramSection(lines: string[], title: string, histogram: FixtureHistogram): void {
  lines.push(`### ${title}`);
  lines.push('');

  const entries = Object.entries(histogram).sort((left, right) => {
    if (right[1] !== left[1]) {
      return right[1] - left[1];
    }
    return left[0].localeCompare(right[0]);
  });

  if (entries.length === 0) {
    lines.push('- none');
    return;
  }

  lines.push(...formatTable([['Key', 'Count'], ...entries.map(([key, count]) => [key, String(count)])]));
}

/** Append rollup rows sorted by category key. */
function appendCategoryRollupSection(lines: string[], categoryRollups: Record<string, FixtureCategoryRollup>): void {
  const entries = Object.entries(categoryRollups).sort((left, right) => left[0].localeCompare(right[0]));

  if (entries.length === 0) {
    lines.push('- none');
    return;
  }

  const rows: TableRow[] = [['Category', 'Fixtures', 'Passed', 'Failed']];
  for (const [category, rollup] of entries) {
    rows.push([category, String(rollup.fixtureCount), String(rollup.passCount), String(rollup.failCount)]);
  }
  lines.push(...formatTable(rows));
}
