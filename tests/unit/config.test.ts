import { mkdtemp, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { ConfigError, DEFAULT_CONFIG, loadConfig, parseConfig } from '../../src/config/config.js';

describe('config parsing', () => {
  it('returns defaults for an empty file', () => {
    expect(parseConfig('doctidy.config.yaml', '')).toEqual(DEFAULT_CONFIG);
  });

  it('merges partial sections over the defaults', () => {
    const config = parseConfig(
      'doctidy.config.yaml',
      ['mode: strict', 'json:', '  indent: 4', 'markdown:', '  format_tables: false'].join('\n')
    );

    expect(config).toEqual({
      mode: 'strict',
      concurrency: 4,
      json: { indent: 4, autoRepair: true, finalNewline: true },
      markdown: { blankLineAfterHeading: true, formatTables: false }
    });
  });

  it('rejects unknown keys at every level', () => {
    expect(() => parseConfig('a.yaml', 'colour: true')).toThrow("Config error in a.yaml: unknown key 'colour'");
    expect(() => parseConfig('a.yaml', 'json:\n  spaces: 2')).toThrow("unknown key 'json.spaces'");
  });

  it('rejects values of the wrong shape', () => {
    expect(() => parseConfig('a.yaml', 'mode: loose')).toThrow("'mode' must be 'strict' or 'lenient'");
    expect(() => parseConfig('a.yaml', 'concurrency: 0')).toThrow("'concurrency' must be a positive integer");
    expect(() => parseConfig('a.yaml', 'json:\n  indent: 11')).toThrow(
      "'indent' must be an integer between 0 and 10"
    );
    expect(() => parseConfig('a.yaml', 'json:\n  auto_repair: "yes"')).toThrow("'auto_repair' must be a boolean");
    expect(() => parseConfig('a.yaml', 'markdown: true')).toThrow("'markdown' must be an object");
    expect(() => parseConfig('a.yaml', '- a\n- b')).toThrow('configuration must be a YAML object');
  });

  it('wraps YAML syntax errors', () => {
    expect(() => parseConfig('a.yaml', 'mode: [')).toThrow(ConfigError);
  });
});

describe('config loading', () => {
  it('falls back to defaults when no file exists', async () => {
    const tempDir = await mkdtemp(path.join(os.tmpdir(), 'doctidy-config-'));
    await expect(loadConfig({ cwd: tempDir })).resolves.toEqual(DEFAULT_CONFIG);
  });

  it('tries the default file names in order', async () => {
    const tempDir = await mkdtemp(path.join(os.tmpdir(), 'doctidy-config-'));
    await writeFile(path.join(tempDir, '.doctidy.yaml'), 'concurrency: 2\n', 'utf8');
    expect((await loadConfig({ cwd: tempDir })).concurrency).toBe(2);

    await writeFile(path.join(tempDir, 'doctidy.config.yaml'), 'concurrency: 3\n', 'utf8');
    expect((await loadConfig({ cwd: tempDir })).concurrency).toBe(3);
  });

  it('reads an explicit path and requires it to exist', async () => {
    const tempDir = await mkdtemp(path.join(os.tmpdir(), 'doctidy-config-'));
    const configPath = path.join(tempDir, 'custom.yaml');
    await writeFile(configPath, 'mode: strict\n', 'utf8');

    expect((await loadConfig({ configPath })).mode).toBe('strict');
    await expect(loadConfig({ configPath: path.join(tempDir, 'missing.yaml') })).rejects.toThrow(/ENOENT/);
  });
});
