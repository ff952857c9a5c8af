import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getStreamsieveDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const DEFAULT_INDEX_URL = 'https://raw.githubusercontent.com/iptv-org/iptv/master/README.md';

// A table cell label followed on the same line by an inline code span holding the playlist URL.
export const DEFAULT_LINK_PATTERN = String.raw`<td>(?<name>.+?)</td>.*?<code>(?<url>https://[^\s]+\.m3u8?)</code>`;

const positiveInt = z.number().int().positive();

export const ConfigSchema = z.object({
  index: z
    .object({
      url: z.string().url().default(DEFAULT_INDEX_URL),
      extractor: z.enum(['regex', 'html-table']).default('regex'),
      pattern: z.string().min(1).default(DEFAULT_LINK_PATTERN),
    })
    .default({}),

  network: z
    .object({
      fetch_timeout_ms: positiveInt.default(10000),
      probe_timeout_ms: positiveInt.default(5000),
      user_agent: z.string().default('streamsieve/0.1'),
    })
    .default({}),

  pool: z
    .object({
      capacity: positiveInt.default(5),
      probe_concurrency: positiveInt.default(1),
    })
    .default({}),

  output: z
    .object({
      playlists_dir: z.string().min(1).default('./m3u_files'),
      processed_dir: z.string().min(1).default('./processed'),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
      file: z.string().default(''),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function getDefaultConfigPath(): string {
  return path.join(getStreamsieveDir(), 'config.yaml');
}

export function writeDefaultConfig(configPath: string): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, generateDefaultConfigYaml(), 'utf-8');
}

function parseConfig(raw: Record<string, unknown>): Config {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  return parsed.data;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Resolve configuration from STREAMSIEVE_CONFIG, then a streamsieve.config.yaml in the working
 * directory, then ~/.streamsieve/config.yaml, then defaults.
 * STREAMSIEVE_INDEX_URL and LOG_LEVEL override whatever the file says.
 */
export async function loadConfig(): Promise<Config> {
  const explorer = cosmiconfig('streamsieve', {
    searchPlaces: [
      'streamsieve.config.yaml',
      'streamsieve.config.yml',
      '.streamsieverc.yaml',
      '.streamsieverc.yml',
    ],
  });

  const envConfigPath = process.env['STREAMSIEVE_CONFIG'];
  const defaultConfigPath = getDefaultConfigPath();

  let loaded: unknown;

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`, { path: resolved });
    }
    loaded = (await explorer.load(resolved))?.config;
  } else {
    const found = await explorer.search();
    if (found) {
      logger.debug({ path: found.filepath }, 'Using project config');
      loaded = found.config;
    } else if (fs.existsSync(defaultConfigPath)) {
      loaded = (await explorer.load(defaultConfigPath))?.config;
    } else {
      logger.debug('No config file found, using defaults');
    }
  }

  const rawConfig: Record<string, unknown> = isRecord(loaded) ? loaded : {};

  const envIndexUrl = process.env['STREAMSIEVE_INDEX_URL'];
  const envLogLevel = process.env['LOG_LEVEL'];
  if (envIndexUrl) {
    deepMerge(rawConfig, { index: { url: envIndexUrl } });
  }
  if (envLogLevel) {
    deepMerge(rawConfig, { logging: { level: envLogLevel } });
  }

  return parseConfig(rawConfig);
}

/**
 * Apply a partial override (e.g. from CLI flags) on top of a resolved config and re-validate.
 * Undefined values in the patch are ignored.
 */
export function mergeConfig(config: Config, patch: Record<string, unknown>): Config {
  const target: Record<string, unknown> = structuredClone(config);
  deepMerge(target, patch);
  return parseConfig(target);
}

/**
 * Deep-merge a plain-object patch into a target object in place.
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): void {
  for (const key of Object.keys(source)) {
    const sv = source[key];
    const tv = target[key];
    if (sv === undefined) continue;
    if (isRecord(sv) && isRecord(tv)) {
      deepMerge(tv, sv);
    } else if (isRecord(sv)) {
      const fresh: Record<string, unknown> = {};
      deepMerge(fresh, sv);
      target[key] = fresh;
    } else {
      target[key] = sv;
    }
  }
}
