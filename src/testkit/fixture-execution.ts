import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { Diagnostic } from '../core/diagnostics.js';
import { formatJson, formatMarkdown, validateJson, validateMarkdown } from '../public/api.js';
import type { FixtureExpectation, FixtureRecord } from './fixtures.js';
import {
  buildCategoryRollups,
  buildCodeHistogram,
  buildSeverityHistogram,
  formatFixtureReportJson,
  formatFixtureReportMarkdown,
  type FixtureExecutionReport,
  type FixtureExecutionResult
} from './fixture-report.js';

/** Output artifact locations written by `writeFixtureReportArtifacts`. */
export interface FixtureReportArtifactPaths {
  markdownPath: string;
  jsonPath: string;
}

/** What one API call produced for a fixture document. */
interface ObservedRun {
  observed: FixtureExpectation;
  output?: string;
  diagnostics: Diagnostic[];
}

/**
 * Execute one fixture through the public API and compare the outcome, the pinned
 * output (if any) and, for format runs, idempotence of the output.
 */
export async function executeFixture(fixture: FixtureRecord): Promise<FixtureExecutionResult> {
  const text = await readFile(fixture.documentPath, 'utf8');
  const run = runFixtureOperation(fixture, text);
  const failureReasons: string[] = [];

  if (run.observed !== fixture.meta.expected) {
    failureReasons.push(`expected '${fixture.meta.expected}' but observed '${run.observed}'`);
  }

  if (fixture.expectedOutputPath !== undefined) {
    const expectedOutput = await readFile(fixture.expectedOutputPath, 'utf8');
    if (run.output !== expectedOutput) {
      failureReasons.push('output differs from expected output file');
    }
  }

  if (run.output !== undefined) {
    const rerun = runFixtureOperation(fixture, run.output);
    if (rerun.output !== run.output) {
      failureReasons.push('formatting the output again changed it');
    }
  }

  return {
    fixtureId: fixture.meta.id,
    metaPath: fixture.metaPath,
    documentPath: fixture.documentPath,
    category: fixture.category,
    format: fixture.format,
    operation: fixture.meta.operation,
    expected: fixture.meta.expected,
    observed: run.observed,
    diagnostics: run.diagnostics,
    success: failureReasons.length === 0,
    failureReasons
  };
}

/** Execute all active fixtures and collect a timestamped aggregate report. */
export async function executeFixtures(fixtures: FixtureRecord[]): Promise<FixtureExecutionReport> {
  const results: FixtureExecutionResult[] = [];
  for (const fixture of fixtures) {
    if (fixture.meta.status !== 'active') {
      continue;
    }
    results.push(await executeFixture(fixture));
  }

  const passCount = results.filter((result) => result.success).length;
  const diagnostics = results.flatMap((result) => result.diagnostics);

  return {
    generatedAt: new Date().toISOString(),
    fixtureCount: results.length,
    passCount,
    failCount: results.length - passCount,
    diagnosticCodeHistogram: buildCodeHistogram(diagnostics),
    diagnosticSeverityHistogram: buildSeverityHistogram(diagnostics),
    categoryRollups: buildCategoryRollups(results),
    results
  };
}

/** Write Markdown and JSON report artifacts into `outDir`. */
export async function writeFixtureReportArtifacts(
  report: FixtureExecutionReport,
  outDir: string
): Promise<FixtureReportArtifactPaths> {
  await mkdir(outDir, { recursive: true });
  const markdownPath = path.join(outDir, 'fixture-report.md');
  const jsonPath = path.join(outDir, 'fixture-report.json');

  await writeFile(markdownPath, formatFixtureReportMarkdown(report), 'utf8');
  await writeFile(jsonPath, formatFixtureReportJson(report), 'utf8');

  return { markdownPath, jsonPath };
}

function runFixtureOperation(fixture: FixtureRecord, text: string): ObservedRun {
  const options = { sourceName: fixture.documentPath, mode: fixture.meta.mode };

  if (fixture.format === 'json') {
    if (fixture.meta.operation === 'validate') {
      const result = validateJson(text, options);
      return { observed: result.valid ? 'pass' : 'fail', diagnostics: result.diagnostics };
    }

    const result = formatJson(text, options);
    return {
      observed: result.status === 'formatted' ? 'pass' : result.status === 'repaired' ? 'repaired' : 'fail',
      output: result.output === undefined ? undefined : `${result.output}\n`,
      diagnostics: result.diagnostics
    };
  }

  if (fixture.meta.operation === 'validate') {
    const result = validateMarkdown(text, options);
    return { observed: result.valid ? 'pass' : 'fail', diagnostics: result.diagnostics };
  }

  const result = formatMarkdown(text, options);
  return {
    observed: result.ok && result.skippedTables.length === 0 ? 'pass' : 'fail',
    output: result.output,
    diagnostics: result.diagnostics
  };
}
