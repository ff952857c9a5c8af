import { InvalidArgumentError } from 'commander';
import type { ExtractorStrategy } from '../source/extractor.js';

export interface NetworkFlags {
  fetchTimeout?: number;
  probeTimeout?: number;
  probeConcurrency?: number;
}

export interface RunFlags extends NetworkFlags {
  indexUrl?: string;
  extractor?: ExtractorStrategy;
  playlistsDir?: string;
  processedDir?: string;
  concurrency?: number;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Map CLI flags onto the config shape. Flags that were not given stay undefined and are
 * skipped by mergeConfig().
 */
export function flagsToConfigPatch(flags: RunFlags): Record<string, unknown> {
  return {
    index: { url: flags.indexUrl, extractor: flags.extractor },
    network: { fetch_timeout_ms: flags.fetchTimeout, probe_timeout_ms: flags.probeTimeout },
    pool: { capacity: flags.concurrency, probe_concurrency: flags.probeConcurrency },
    output: { playlists_dir: flags.playlistsDir, processed_dir: flags.processedDir },
  };
}
