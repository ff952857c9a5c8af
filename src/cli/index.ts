#!/usr/bin/env node

import { Command, Option } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import {
  loadConfig,
  mergeConfig,
  writeDefaultConfig,
  getDefaultConfigPath,
  type Config,
} from '../shared/config.js';
import { ConfigError, StreamsieveError } from '../shared/errors.js';
import { resolvePath } from '../shared/utils.js';
import { normalizeName } from '../source/normalize.js';
import { createRunContext } from '../engine/context.js';
import { discoverPlaylists, runPipeline, type RunStats } from '../engine/pipeline.js';
import { validatePlaylist } from '../engine/validate.js';
import { ensureOutputDirs, writePartitions } from '../playlist/store.js';
import { flagsToConfigPatch, parsePositiveInt, type NetworkFlags, type RunFlags } from './options.js';

const program = new Command();

program
  .name('streamsieve')
  .description('Find the playlists listed in an index document and sort their entries by reachability')
  .version('0.1.0');

async function resolveConfig(flags: RunFlags): Promise<Config> {
  return mergeConfig(await loadConfig(), flagsToConfigPatch(flags));
}

// === init ===
program
  .command('init')
  .description('Write a default config file')
  .option('--path <file>', 'Where to write the config', getDefaultConfigPath())
  .option('-f, --force', 'Overwrite an existing file', false)
  .action((opts: { path: string; force: boolean }) => {
    const configPath = resolvePath(opts.path);
    if (fs.existsSync(configPath) && !opts.force) {
      log(`✓ ${configPath} already exists (use --force to overwrite)`);
      return;
    }
    writeDefaultConfig(configPath);
    log(`✓ ${configPath} created`);
  });

// === config ===
program
  .command('config')
  .description('Print the effective configuration')
  .action(async () => {
    const config = await loadConfig();
    log(yamlStringify(config).trimEnd());
  });

// === extract ===
program
  .command('extract')
  .description('Fetch the index document and list the playlists it references')
  .option('--index-url <url>', 'Index document URL')
  .addOption(new Option('--extractor <strategy>', 'Link extraction strategy').choices(['regex', 'html-table']))
  .option('--fetch-timeout <ms>', 'Timeout for the index fetch', parsePositiveInt)
  .action(async (opts: RunFlags) => {
    const config = await resolveConfig(opts);
    const ctx = createRunContext(config);

    const resources = await discoverPlaylists(ctx);
    if (resources.length === 0) {
      log('No playlist links found.');
      process.exitCode = 1;
      return;
    }
    for (const r of resources) {
      log(`${r.name.padEnd(32)} ${r.url}`);
    }
    log(`\n${resources.length} playlists`);
  });

// === run ===
program
  .command('run')
  .description('Download every playlist in the index and split its entries into available/unavailable')
  .option('--index-url <url>', 'Index document URL')
  .addOption(new Option('--extractor <strategy>', 'Link extraction strategy').choices(['regex', 'html-table']))
  .option('--playlists-dir <dir>', 'Directory for downloaded playlists')
  .option('--processed-dir <dir>', 'Directory for available_/unavailable_ files')
  .option('-c, --concurrency <n>', 'Playlists checked at the same time', parsePositiveInt)
  .option('--probe-concurrency <n>', 'Probes in flight per playlist', parsePositiveInt)
  .option('--fetch-timeout <ms>', 'Timeout for index and playlist downloads', parsePositiveInt)
  .option('--probe-timeout <ms>', 'Timeout for each entry probe', parsePositiveInt)
  .action(async (opts: RunFlags) => {
    const config = await resolveConfig(opts);
    const controller = new AbortController();
    const ctx = createRunContext(config, { signal: controller.signal });

    const onSigint = (): void => {
      ctx.log.warn('Interrupted, abandoning in-flight checks');
      controller.abort();
    };
    process.once('SIGINT', onSigint);

    let stats: RunStats;
    try {
      stats = await runPipeline(ctx);
    } finally {
      process.off('SIGINT', onSigint);
    }

    printStats(stats);
    if (stats.outcome === 'empty') {
      process.exitCode = 1;
    } else if (stats.outcome === 'aborted') {
      process.exitCode = 130;
    }
  });

// === check ===
program
  .command('check <file>')
  .description('Probe the entries of a local playlist file')
  .option('-w, --write', 'Write available_/unavailable_ files to the processed directory', false)
  .option('--processed-dir <dir>', 'Directory for available_/unavailable_ files')
  .option('--probe-concurrency <n>', 'Probes in flight', parsePositiveInt)
  .option('--probe-timeout <ms>', 'Timeout for each entry probe', parsePositiveInt)
  .action(async (file: string, opts: NetworkFlags & { write: boolean; processedDir?: string }) => {
    const filePath = resolvePath(file);
    if (!fs.existsSync(filePath)) {
      log(`Playlist file not found: ${filePath}`);
      process.exitCode = 1;
      return;
    }

    const config = await resolveConfig(opts);
    const ctx = createRunContext(config);
    const name = normalizeName(path.basename(filePath, path.extname(filePath))) || 'playlist';

    const report = await validatePlaylist(ctx, name, fs.readFileSync(filePath, 'utf-8'));

    for (const entry of report.available) {
      log(`✓ ${entry.url}`);
    }
    for (const entry of report.unavailable) {
      const label = entry.reason === 'unreachable' ? 'unreachable' : 'check failed';
      log(`✗ ${entry.url}  (${label}${entry.detail ? `: ${entry.detail}` : ''})`);
    }
    log(`\n${report.available.length} available, ${report.unavailable.length} unavailable`);

    if (opts.write) {
      ensureOutputDirs(ctx.dirs);
      const files = writePartitions(ctx.dirs, name, report.available, report.unavailable);
      log(`✓ Written: ${files.available}`);
      log(`✓ Written: ${files.unavailable}`);
    }
  });

function printStats(stats: RunStats): void {
  log(`\nRun ${stats.runId} ${stats.outcome} (started ${stats.startedAt}):`);
  log(`  Playlists found:      ${stats.playlistsFound}`);
  log(`  Playlists downloaded: ${stats.playlistsDownloaded}`);
  log(`  Playlists processed:  ${stats.playlistsProcessed}`);
  log(`  Playlists failed:     ${stats.playlistsFailed}`);
  log(`  Entries checked:      ${stats.entriesChecked}`);
  log(`  Entries available:    ${stats.entriesAvailable}`);
  log(`  Entries unreachable:  ${stats.entriesUnreachable}`);
  log(`  Probe failures:       ${stats.entriesProbeFailed}`);
  log(`  Duration:             ${stats.durationMs}ms`);

  if (stats.errors.length > 0) {
    log('\nErrors:');
    for (const e of stats.errors) {
      log(`  [${e.stage}] ${e.playlist}: ${e.error}`);
    }
  }
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    log(`Configuration error: ${err.message}`);
    const issues = err.details?.['issues'];
    if (Array.isArray(issues)) {
      for (const issue of issues) log(`  ${String(issue)}`);
    }
  } else if (err instanceof StreamsieveError) {
    log(`Error: ${err.message}`);
  } else {
    log(`Unexpected error: ${err instanceof Error ? (err.stack ?? err.message) : String(err)}`);
  }
  process.exitCode = 1;
});
