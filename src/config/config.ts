import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { parse as parseYaml } from 'yaml';

import type { ReportMode } from '../core/report-context.js';

/** JSON section of the resolved configuration. */
export interface JsonConfig {
  indent: number;
  autoRepair: boolean;
  finalNewline: boolean;
}

/** Markdown section of the resolved configuration. */
export interface MarkdownConfig {
  blankLineAfterHeading: boolean;
  formatTables: boolean;
}

/** Fully resolved configuration; every field has a value. */
export interface DocTidyConfig {
  mode: ReportMode;
  concurrency: number;
  json: JsonConfig;
  markdown: MarkdownConfig;
}

/** Where to look for configuration. */
export interface LoadConfigOptions {
  /** Explicit file; it must exist. */
  configPath?: string;
  /** Directory probed for the default file names. */
  cwd?: string;
}

/** Validation error for malformed configuration files. */
export class ConfigError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(`Config error in ${filePath}: ${message}`);
    this.name = 'ConfigError';
    this.filePath = filePath;
  }
}

/** File names probed in the working directory, in order. */
export const CONFIG_FILENAMES = ['doctidy.config.yaml', 'doctidy.config.yml', '.doctidy.yaml'] as const;

/** Largest accepted JSON indent. */
const MAX_INDENT = 10;

export const DEFAULT_CONFIG: DocTidyConfig = {
  mode: 'lenient',
  concurrency: 4,
  json: {
    indent: 2,
    autoRepair: true,
    finalNewline: true
  },
  markdown: {
    blankLineAfterHeading: true,
    formatTables: true
  }
};

/** Load the explicit config file, else the first default file found, else defaults. */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<DocTidyConfig> {
  if (options.configPath !== undefined) {
    const raw = await readFile(options.configPath, 'utf8');
    return parseConfig(options.configPath, raw);
  }

  const cwd = options.cwd ?? process.cwd();
  for (const fileName of CONFIG_FILENAMES) {
    const candidate = path.join(cwd, fileName);
    const raw = await readOptionalFile(candidate);
    if (raw !== undefined) {
      return parseConfig(candidate, raw);
    }
  }

  return DEFAULT_CONFIG;
}

/** Parse YAML configuration text and merge it over the defaults. */
export function parseConfig(filePath: string, raw: string): DocTidyConfig {
  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (error) {
    throw new ConfigError(filePath, error instanceof Error ? error.message : String(error));
  }

  // An empty file parses to null.
  if (parsed === null || parsed === undefined) {
    return DEFAULT_CONFIG;
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(filePath, 'configuration must be a YAML object');
  }

  rejectUnknownKeys(filePath, parsed, ['mode', 'concurrency', 'json', 'markdown'], '');
  const json = readOptionalSection(filePath, parsed, 'json');
  const markdown = readOptionalSection(filePath, parsed, 'markdown');
  rejectUnknownKeys(filePath, json, ['indent', 'auto_repair', 'final_newline'], 'json.');
  rejectUnknownKeys(filePath, markdown, ['blank_line_after_heading', 'format_tables'], 'markdown.');

  return {
    mode: readOptionalMode(filePath, parsed, 'mode') ?? DEFAULT_CONFIG.mode,
    concurrency: readOptionalPositiveInteger(filePath, parsed, 'concurrency') ?? DEFAULT_CONFIG.concurrency,
    json: {
      indent: readOptionalIndent(filePath, json, 'indent') ?? DEFAULT_CONFIG.json.indent,
      autoRepair: readOptionalBoolean(filePath, json, 'auto_repair') ?? DEFAULT_CONFIG.json.autoRepair,
      finalNewline: readOptionalBoolean(filePath, json, 'final_newline') ?? DEFAULT_CONFIG.json.finalNewline
    },
    markdown: {
      blankLineAfterHeading:
        readOptionalBoolean(filePath, markdown, 'blank_line_after_heading') ??
        DEFAULT_CONFIG.markdown.blankLineAfterHeading,
      formatTables: readOptionalBoolean(filePath, markdown, 'format_tables') ?? DEFAULT_CONFIG.markdown.formatTables
    }
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Read a file, or `undefined` when it does not exist. */
async function readOptionalFile(filePath: string): Promise<string | undefined> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    if (isRecord(error) && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}

/** Read an optional nested object; absent sections read as empty. */
function readOptionalSection(filePath: string, obj: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = obj[key];
  if (value === undefined || value === null) {
    return {};
  }

  if (!isRecord(value)) {
    throw new ConfigError(filePath, `'${key}' must be an object`);
  }
  return value;
}

function rejectUnknownKeys(
  filePath: string,
  obj: Record<string, unknown>,
  allowed: readonly string[],
  prefix: string
): void {
  const unknown = Object.keys(obj).find((key) => !allowed.includes(key));
  if (unknown !== undefined) {
    throw new ConfigError(filePath, `unknown key '${prefix}${unknown}'`);
  }
}

function readOptionalMode(filePath: string, obj: Record<string, unknown>, key: string): ReportMode | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (value !== 'strict' && value !== 'lenient') {
    throw new ConfigError(filePath, `'${key}' must be 'strict' or 'lenient'`);
  }
  return value;
}

function readOptionalBoolean(filePath: string, obj: Record<string, unknown>, key: string): boolean | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== 'boolean') {
    throw new ConfigError(filePath, `'${key}' must be a boolean`);
  }
  return value;
}

function readOptionalPositiveInteger(
  filePath: string,
  obj: Record<string, unknown>,
  key: string
): number | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ConfigError(filePath, `'${key}' must be a positive integer`);
  }
  return value;
}

function readOptionalIndent(filePath: string, obj: Record<string, unknown>, key: string): number | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > MAX_INDENT) {
    throw new ConfigError(filePath, `'${key}' must be an integer between 0 and ${MAX_INDENT}`);
  }
  return value;
}
