import type { ChalkInstance } from 'chalk';

import { loadConfig, type DocTidyConfig } from '../config/config.js';
import { runWithConcurrency, summarizeDurations } from '../core/execution-loop.js';
import { formatJsonErrorDetail } from '../json/diagnose.js';
import { describeTableProblem } from '../markdown/validate.js';
import {
  formatJson,
  formatMarkdown,
  validateJson,
  validateMarkdown,
  type JsonValidationResult,
  type MarkdownValidationResult
} from '../public/api.js';
import { readDocument, writeDocument } from './io.js';
import { tagged, type Reporter } from './reporter.js';

/** Parsed command-line options. */
export type CliOptions = {
  validateJson?: string[];
  formatJson?: string;
  validateMd?: string[];
  formatMd?: string;
  out?: string;
  config?: string;
  color: boolean;
};

/** Process-facing collaborators of a CLI run. */
export interface CliRuntime {
  reporter: Reporter;
  paint: ChalkInstance;
  showHelp(): void;
  /** Directory probed for default config files. */
  cwd?: string;
}

/** Exit codes: 0 valid or formatted, 1 invalid, aborted or fatal. */
export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

/** Runtime plus the resolved configuration. */
export interface CommandContext extends CliRuntime {
  config: DocTidyConfig;
}

/** Per-file batch outcome; unreadable files carry the read error instead of a result. */
type FileCheck<TResult> =
  | { filePath: string; ok: true; result: TResult; durationMs: number }
  | { filePath: string; ok: false; message: string };

/**
 * Dispatch one CLI invocation and map the outcome to an exit code. Missing
 * files and configuration errors are reported here instead of escaping.
 */
export async function runCli(options: CliOptions, runtime: CliRuntime): Promise<number> {
  try {
    const config = await loadConfig({ configPath: options.config, cwd: runtime.cwd });
    const ctx: CommandContext = { ...runtime, config };

    if (options.validateJson) {
      return await validateJsonFiles(options.validateJson, ctx);
    }
    if (options.formatJson !== undefined) {
      return await formatJsonFile(options.formatJson, options.out, ctx);
    }
    if (options.validateMd) {
      return await validateMarkdownFiles(options.validateMd, ctx);
    }
    if (options.formatMd !== undefined) {
      return await formatMarkdownFile(options.formatMd, options.out, ctx);
    }

    runtime.showHelp();
    return EXIT_OK;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    runtime.reporter.error(tagged(runtime.paint, 'ERR', message));
    return EXIT_FAILURE;
  }
}

/** Validate each JSON file; a repair preview is printed for failures the heuristics can fix. */
export async function validateJsonFiles(paths: readonly string[], ctx: CommandContext): Promise<number> {
  const checks = await checkFiles(paths, ctx, (text, filePath) =>
    validateJson(text, { sourceName: filePath, indent: ctx.config.json.indent, mode: ctx.config.mode })
  );

  for (const check of checks) {
    if (check.ok) {
      reportJsonValidation(check.filePath, check.result, ctx);
    } else {
      reportUnreadableFile(check.filePath, check.message, ctx);
    }
  }
  reportBatchSummary(checks, ctx);

  return checks.every((check) => check.ok && check.result.valid) ? EXIT_OK : EXIT_FAILURE;
}

/** Pretty-print one JSON file to `out` or standard output. */
export async function formatJsonFile(filePath: string, out: string | undefined, ctx: CommandContext): Promise<number> {
  const { reporter, paint, config } = ctx;
  const text = await readDocument(filePath);
  const result = formatJson(text, {
    sourceName: filePath,
    indent: config.json.indent,
    autoRepair: config.json.autoRepair,
    mode: config.mode
  });

  if (result.error) {
    reporter.line(tagged(paint, 'ERR', `Cannot format: JSON invalid - ${formatJsonErrorDetail(result.error)}`));
  }
  if (result.status === 'repaired') {
    reporter.line(tagged(paint, 'INFO', 'Auto-repair succeeded; formatting repaired JSON.'));
  }
  if (result.status === 'failed' || result.output === undefined) {
    const reason = config.json.autoRepair ? 'Auto-repair failed' : 'Auto-repair disabled';
    reporter.line(tagged(paint, 'ERR', `${reason}; aborting format.`));
    return EXIT_FAILURE;
  }

  if (out === undefined) {
    reporter.raw(`${result.output}\n`);
    return EXIT_OK;
  }

  await writeDocument(out, config.json.finalNewline ? `${result.output}\n` : result.output);
  reporter.line(tagged(paint, 'OK', `Formatted JSON saved to ${out}`));
  return EXIT_OK;
}

/** Report broken tables of each Markdown file. */
export async function validateMarkdownFiles(paths: readonly string[], ctx: CommandContext): Promise<number> {
  const checks = await checkFiles(paths, ctx, (text, filePath) =>
    validateMarkdown(text, { sourceName: filePath, mode: ctx.config.mode })
  );

  for (const check of checks) {
    if (check.ok) {
      reportMarkdownValidation(check.filePath, check.result, paths.length > 1, ctx);
    } else {
      reportUnreadableFile(check.filePath, check.message, ctx);
    }
  }
  reportBatchSummary(checks, ctx);

  return checks.every((check) => check.ok && check.result.valid) ? EXIT_OK : EXIT_FAILURE;
}

/** Normalize one Markdown file to `out` or standard output. */
export async function formatMarkdownFile(
  filePath: string,
  out: string | undefined,
  ctx: CommandContext
): Promise<number> {
  const { reporter, paint, config } = ctx;
  const text = await readDocument(filePath);
  const result = formatMarkdown(text, {
    sourceName: filePath,
    mode: config.mode,
    blankLineAfterHeading: config.markdown.blankLineAfterHeading,
    formatTables: config.markdown.formatTables
  });

  for (const diagnostic of result.diagnostics) {
    const tag = diagnostic.severity === 'error' ? 'ERR' : 'WARN';
    reporter.error(tagged(paint, tag, `${diagnostic.message} (left unformatted)`));
  }

  if (!result.ok || result.output === undefined) {
    reporter.error(tagged(paint, 'ERR', 'Strict mode: invalid tables found; aborting format.'));
    return EXIT_FAILURE;
  }

  if (out === undefined) {
    // Printed as a line: the document's final newline is followed by one more.
    reporter.raw(`${result.output}\n`);
    return EXIT_OK;
  }

  await writeDocument(out, result.output);
  reporter.line(tagged(paint, 'OK', `Formatted Markdown saved to ${out}`));
  return EXIT_OK;
}

/**
 * Read and check files with bounded concurrency; results keep input order. A
 * file that cannot be read fails on its own without stopping the batch.
 */
async function checkFiles<TResult>(
  paths: readonly string[],
  ctx: CommandContext,
  check: (text: string, filePath: string) => TResult
): Promise<Array<FileCheck<TResult>>> {
  return runWithConcurrency(paths, ctx.config.concurrency, async (filePath): Promise<FileCheck<TResult>> => {
    let text: string;
    try {
      text = await readDocument(filePath);
    } catch (error) {
      return { filePath, ok: false, message: error instanceof Error ? error.message : String(error) };
    }

    const started = performance.now();
    const result = check(text, filePath);
    return { filePath, ok: true, result, durationMs: performance.now() - started };
  });
}

function reportUnreadableFile(filePath: string, message: string, ctx: CommandContext): void {
  ctx.reporter.line(tagged(ctx.paint, 'ERR', `${filePath}: ${message}`));
}

function reportJsonValidation(filePath: string, result: JsonValidationResult, ctx: CommandContext): void {
  const { reporter, paint } = ctx;
  if (result.valid) {
    reporter.line(tagged(paint, 'OK', `${filePath}: ${result.message}`));
    return;
  }

  reporter.line(tagged(paint, 'ERR', `${filePath}: ${result.message}`));
  if (!result.repairPreview) {
    return;
  }

  reporter.line('');
  reporter.line(tagged(paint, 'HINT', 'Suggested repaired JSON (preview):'));
  reporter.line('');
  reporter.line(result.repairPreview.text ?? '  (auto-repair failed to produce valid JSON)');
}

function reportMarkdownValidation(
  filePath: string,
  result: MarkdownValidationResult,
  prefixPath: boolean,
  ctx: CommandContext
): void {
  const { reporter, paint } = ctx;
  if (result.valid) {
    reporter.line(tagged(paint, 'OK', `No table structure issues found in ${filePath}`));
    return;
  }

  const heading = 'Markdown validation found issues:';
  reporter.line(tagged(paint, 'ERR', prefixPath ? `${filePath}: ${heading}` : heading));
  for (const problem of result.problems) {
    reporter.line(`  - ${describeTableProblem(problem)}`);
  }
}

function reportBatchSummary(checks: ReadonlyArray<FileCheck<unknown>>, ctx: CommandContext): void {
  if (checks.length < 2) {
    return;
  }

  const summary = summarizeDurations(checks.flatMap((check) => (check.ok ? [check.durationMs] : [])));
  const timings = [
    `avg ${summary.averageMs.toFixed(1)} ms`,
    `max ${summary.maxMs.toFixed(1)} ms`,
    `p95 ${summary.p95Ms.toFixed(1)} ms`
  ].join(', ');
  const checked = `Checked ${summary.count} of ${checks.length} files in ${summary.totalMs.toFixed(1)} ms`;
  ctx.reporter.line(tagged(ctx.paint, 'INFO', `${checked} (${timings})`));
}
