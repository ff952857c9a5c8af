import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import {
  ConfigSchema,
  DEFAULT_INDEX_URL,
  deepMerge,
  generateDefaultConfig,
  generateDefaultConfigYaml,
  loadConfig,
  mergeConfig,
} from '../config.js';
import { ConfigError } from '../errors.js';

describe('ConfigSchema', () => {
  it('produces valid defaults from empty object', () => {
    const result = ConfigSchema.safeParse({});
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.index.url).toBe(DEFAULT_INDEX_URL);
      expect(result.data.index.extractor).toBe('regex');
      expect(result.data.network.fetch_timeout_ms).toBe(10000);
      expect(result.data.network.probe_timeout_ms).toBe(5000);
      expect(result.data.pool.capacity).toBe(5);
      expect(result.data.pool.probe_concurrency).toBe(1);
      expect(result.data.output.playlists_dir).toBe('./m3u_files');
      expect(result.data.output.processed_dir).toBe('./processed');
    }
  });

  it('accepts valid overrides', () => {
    const result = ConfigSchema.safeParse({
      pool: { capacity: 8 },
      index: { extractor: 'html-table' },
    });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.pool.capacity).toBe(8);
      expect(result.data.index.extractor).toBe('html-table');
      // defaults still apply for other fields
      expect(result.data.pool.probe_concurrency).toBe(1);
      expect(result.data.index.url).toBe(DEFAULT_INDEX_URL);
    }
  });

  it('rejects invalid types', () => {
    const result = ConfigSchema.safeParse({
      network: { fetch_timeout_ms: 'soon' },
    });
    expect(result.success).toBe(false);
  });

  it('rejects a zero pool capacity', () => {
    expect(ConfigSchema.safeParse({ pool: { capacity: 0 } }).success).toBe(false);
  });

  it('rejects an unknown extractor strategy', () => {
    expect(ConfigSchema.safeParse({ index: { extractor: 'xpath' } }).success).toBe(false);
  });
});

describe('generateDefaultConfig', () => {
  it('returns a full Config object', () => {
    const config = generateDefaultConfig();
    expect(config.pool.capacity).toBe(5);
    expect(config.logging.level).toBe('info');
    expect(config.logging.file).toBe('');
  });
});

describe('generateDefaultConfigYaml', () => {
  it('returns a YAML string', () => {
    const yaml = generateDefaultConfigYaml();
    expect(yaml).toContain('pool:');
    expect(yaml).toContain('capacity: 5');
    expect(yaml).toContain('probe_timeout_ms: 5000');
  });
});

describe('mergeConfig', () => {
  it('applies nested overrides and keeps the rest', () => {
    const merged = mergeConfig(generateDefaultConfig(), {
      pool: { capacity: 2 },
      output: { processed_dir: '/tmp/out' },
    });
    expect(merged.pool.capacity).toBe(2);
    expect(merged.pool.probe_concurrency).toBe(1);
    expect(merged.output.processed_dir).toBe('/tmp/out');
    expect(merged.output.playlists_dir).toBe('./m3u_files');
  });

  it('ignores undefined values in the patch', () => {
    const merged = mergeConfig(generateDefaultConfig(), {
      index: { url: undefined, extractor: undefined },
    });
    expect(merged.index.url).toBe(DEFAULT_INDEX_URL);
    expect(merged.index.extractor).toBe('regex');
  });

  it('does not modify the input config', () => {
    const base = generateDefaultConfig();
    mergeConfig(base, { pool: { capacity: 3 } });
    expect(base.pool.capacity).toBe(5);
  });

  it('throws ConfigError for invalid values', () => {
    expect(() => mergeConfig(generateDefaultConfig(), { index: { url: 'not a url' } })).toThrow(ConfigError);
  });
});

describe('deepMerge', () => {
  it('merges nested objects in place', () => {
    const target: Record<string, unknown> = { a: { b: 1, c: 2 } };
    deepMerge(target, { a: { c: 3 }, d: 4 });
    expect(target).toEqual({ a: { b: 1, c: 3 }, d: 4 });
  });

  it('replaces arrays instead of merging them', () => {
    const target: Record<string, unknown> = { list: [1, 2] };
    deepMerge(target, { list: [3] });
    expect(target).toEqual({ list: [3] });
  });
});

describe('loadConfig', () => {
  const originalCwd = process.cwd();
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'streamsieve-config-'));
    process.chdir(tmpDir);
    vi.stubEnv('HOME', tmpDir);
    vi.stubEnv('STREAMSIEVE_CONFIG', undefined);
    vi.stubEnv('STREAMSIEVE_INDEX_URL', undefined);
    vi.stubEnv('LOG_LEVEL', undefined);
  });

  afterEach(() => {
    process.chdir(originalCwd);
    vi.unstubAllEnvs();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('falls back to defaults when no config file exists', async () => {
    await expect(loadConfig()).resolves.toEqual(generateDefaultConfig());
  });

  it('throws ConfigError when STREAMSIEVE_CONFIG names a missing file', async () => {
    const missing = path.join(tmpDir, 'nope.yaml');
    vi.stubEnv('STREAMSIEVE_CONFIG', missing);

    await expect(loadConfig()).rejects.toThrow(ConfigError);
    await expect(loadConfig()).rejects.toThrow(`Config file not found: ${missing}`);
  });

  it('reads the file named by STREAMSIEVE_CONFIG', async () => {
    const file = path.join(tmpDir, 'custom.yaml');
    fs.writeFileSync(file, 'pool:\n  capacity: 7\n');
    vi.stubEnv('STREAMSIEVE_CONFIG', file);

    const config = await loadConfig();
    expect(config.pool.capacity).toBe(7);
    expect(config.pool.probe_concurrency).toBe(1);
  });

  it('finds streamsieve.config.yaml in the working directory', async () => {
    fs.writeFileSync(path.join(tmpDir, 'streamsieve.config.yaml'), 'output:\n  processed_dir: ./sorted\n');

    const config = await loadConfig();
    expect(config.output.processed_dir).toBe('./sorted');
    expect(config.output.playlists_dir).toBe('./m3u_files');
  });

  it('prefers the working directory file over the one in the home directory', async () => {
    fs.mkdirSync(path.join(tmpDir, '.streamsieve'));
    fs.writeFileSync(path.join(tmpDir, '.streamsieve', 'config.yaml'), 'pool:\n  capacity: 9\n');
    fs.writeFileSync(path.join(tmpDir, 'streamsieve.config.yaml'), 'pool:\n  capacity: 4\n');

    await expect(loadConfig()).resolves.toMatchObject({ pool: { capacity: 4 } });
  });

  it('reads ~/.streamsieve/config.yaml when nothing else is found', async () => {
    const home = path.join(tmpDir, 'home');
    fs.mkdirSync(path.join(home, '.streamsieve'), { recursive: true });
    fs.writeFileSync(path.join(home, '.streamsieve', 'config.yaml'), 'pool:\n  capacity: 9\n');
    vi.stubEnv('HOME', home);

    await expect(loadConfig()).resolves.toMatchObject({ pool: { capacity: 9 } });
  });

  it('lets STREAMSIEVE_INDEX_URL and LOG_LEVEL override the file', async () => {
    const file = path.join(tmpDir, 'custom.yaml');
    fs.writeFileSync(
      file,
      ['index:', '  url: https://file.test/index.md', 'logging:', '  level: warn', 'pool:', '  capacity: 3', ''].join('\n'),
    );
    vi.stubEnv('STREAMSIEVE_CONFIG', file);
    vi.stubEnv('STREAMSIEVE_INDEX_URL', 'https://env.test/index.md');
    vi.stubEnv('LOG_LEVEL', 'debug');

    const config = await loadConfig();
    expect(config.index.url).toBe('https://env.test/index.md');
    expect(config.logging.level).toBe('debug');
    expect(config.pool.capacity).toBe(3);
  });

  it('throws ConfigError for invalid values in the file', async () => {
    fs.writeFileSync(path.join(tmpDir, 'streamsieve.config.yaml'), 'pool:\n  capacity: 0\n');

    await expect(loadConfig()).rejects.toThrow(ConfigError);
  });
});
