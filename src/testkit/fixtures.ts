import { access, readdir, readFile } from 'node:fs/promises';
import path from 'node:path';

import { parse as parseYaml } from 'yaml';

import type { ReportMode } from '../core/report-context.js';

/** Document formats handled by the fixtures. */
export type FixtureFormat = 'json' | 'markdown';
/** Operation a fixture exercises. */
export type FixtureOperation = 'validate' | 'format';
/** Expected outcome; `repaired` only applies to JSON formatting. */
export type FixtureExpectation = 'pass' | 'fail' | 'repaired';
/** Fixture activation status in the conformance suite. */
export type FixtureStatus = 'active' | 'skip';

/** Metadata contract for one fixture sidecar file. */
export interface FixtureMeta {
  id: string;
  operation: FixtureOperation;
  expected: FixtureExpectation;
  status: FixtureStatus;
  mode?: ReportMode;
  notes?: string;
}

/** Resolved fixture record including metadata and document paths. */
export interface FixtureRecord {
  metaPath: string;
  documentPath: string;
  /** Exact expected output, when the fixture pins one. */
  expectedOutputPath?: string;
  format: FixtureFormat;
  category: string;
  meta: FixtureMeta;
}

/** Validation error for malformed fixture metadata. */
export class FixtureMetadataError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(`Metadata error in ${filePath}: ${message}`);
    this.name = 'FixtureMetadataError';
    this.filePath = filePath;
  }
}

/** Accepted metadata filename suffixes. */
const META_SUFFIXES = ['.meta.yaml', '.meta.yml'];
/** Document extensions probed when resolving a fixture from metadata. */
const DOCUMENT_EXTENSIONS: ReadonlyArray<readonly [string, FixtureFormat]> = [
  ['.json', 'json'],
  ['.md', 'markdown']
];

/** Load and validate all fixture records under `rootDir`, sorted by id. */
export async function loadFixtures(rootDir: string): Promise<FixtureRecord[]> {
  const metaFiles = await findMetadataFiles(rootDir);
  const records: FixtureRecord[] = [];

  for (const metaPath of metaFiles) {
    const raw = await readFile(metaPath, 'utf8');
    const meta = parseAndValidateMeta(metaPath, parseYaml(raw));
    const { documentPath, format, expectedOutputPath } = await resolveDocument(metaPath);

    if (meta.expected === 'repaired' && (format !== 'json' || meta.operation !== 'format')) {
      throw new FixtureMetadataError(metaPath, "'repaired' is only valid for JSON format fixtures");
    }

    const record: FixtureRecord = {
      metaPath,
      documentPath,
      format,
      category: readCategory(rootDir, metaPath),
      meta
    };
    if (expectedOutputPath !== undefined) {
      record.expectedOutputPath = expectedOutputPath;
    }
    records.push(record);
  }

  records.sort((left, right) => left.meta.id.localeCompare(right.meta.id));
  return records;
}

/** Recursively discover metadata files from the fixture root. */
async function findMetadataFiles(rootDir: string): Promise<string[]> {
  const matches: string[] = [];

  async function walk(dir: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
        continue;
      }

      if (META_SUFFIXES.some((suffix) => entry.name.endsWith(suffix))) {
        matches.push(fullPath);
      }
    }
  }

  await walk(rootDir);
  return matches;
}

/** Parse YAML metadata into a validated `FixtureMeta` object. */
function parseAndValidateMeta(filePath: string, input: unknown): FixtureMeta {
  if (!isRecord(input)) {
    throw new FixtureMetadataError(filePath, 'metadata must be a YAML object');
  }

  const id = readRequiredString(filePath, input, 'id');
  const operation = readRequiredEnum(filePath, input, 'operation', ['validate', 'format'] as const);
  const expected = readRequiredEnum(filePath, input, 'expected', ['pass', 'fail', 'repaired'] as const);
  const status = readRequiredEnum(filePath, input, 'status', ['active', 'skip'] as const);
  const mode = readOptionalEnum(filePath, input, 'mode', ['strict', 'lenient'] as const);
  const notes = readOptionalString(filePath, input, 'notes');

  const meta: FixtureMeta = { id, operation, expected, status };
  if (mode !== undefined) {
    meta.mode = mode;
  }
  if (notes !== undefined) {
    meta.notes = notes;
  }

  return meta;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Read a required non-empty string metadata field. */
function readRequiredString(filePath: string, obj: Record<string, unknown>, key: string): string {
  const value = obj[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new FixtureMetadataError(filePath, `missing or invalid '${key}'`);
  }
  return value;
}

/** Read an optional string metadata field. */
function readOptionalString(filePath: string, obj: Record<string, unknown>, key: string): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== 'string') {
    throw new FixtureMetadataError(filePath, `'${key}' must be a string`);
  }

  return value;
}

/** Read a required field and check enum membership. */
function readRequiredEnum<T extends string>(
  filePath: string,
  obj: Record<string, unknown>,
  key: string,
  allowed: readonly T[]
): T {
  const value = readOptionalEnum(filePath, obj, key, allowed);
  if (value === undefined) {
    throw new FixtureMetadataError(filePath, `missing or invalid '${key}'`);
  }
  return value;
}

/** Read an optional field and check enum membership. */
function readOptionalEnum<T extends string>(
  filePath: string,
  obj: Record<string, unknown>,
  key: string,
  allowed: readonly T[]
): T | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new FixtureMetadataError(filePath, `'${key}' must be one of ${allowed.map((item) => `'${item}'`).join(', ')}`);
  }
  return match;
}

/** Resolve the document (and optional expected output) that belongs to one metadata file. */
async function resolveDocument(
  metaPath: string
): Promise<{ documentPath: string; format: FixtureFormat; expectedOutputPath?: string }> {
  const base = stripMetaSuffix(metaPath);

  for (const [extension, format] of DOCUMENT_EXTENSIONS) {
    const documentPath = `${base}${extension}`;
    if (!(await exists(documentPath))) {
      continue;
    }

    const expectedOutputPath = `${base}.expected${extension}`;
    return (await exists(expectedOutputPath))
      ? { documentPath, format, expectedOutputPath }
      : { documentPath, format };
  }

  throw new FixtureMetadataError(metaPath, 'no matching document found for metadata');
}

/** Remove `.meta.yaml`/`.meta.yml` from a metadata file path. */
function stripMetaSuffix(filePath: string): string {
  for (const suffix of META_SUFFIXES) {
    if (filePath.endsWith(suffix)) {
      return filePath.slice(0, -suffix.length);
    }
  }

  return filePath;
}

/** First directory below the fixture root, or `root` for top-level fixtures. */
function readCategory(rootDir: string, metaPath: string): string {
  const [first, ...rest] = path.relative(rootDir, metaPath).split(path.sep);
  return first !== undefined && first !== '' && rest.length > 0 ? first : 'root';
}

/** Promise-based existence check used by fixture resolution. */
async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}
