import {
  DocumentFetchError,
  PersistError,
  PlaylistDownloadError,
  RunAbortedError,
  errorMessage,
} from '../shared/errors.js';
import { nowISO } from '../shared/utils.js';
import { toNamedResources, type NamedResource } from '../source/extractor.js';
import { ensureOutputDirs, savePlaylist, writePartitions, type PartitionFiles } from '../playlist/store.js';
import type { RunContext } from './context.js';
import { WorkerPool, type TaskHandle } from './pool.js';
import { countUnavailable, validatePlaylist, type PlaylistReport } from './validate.js';

export type RunOutcome = 'completed' | 'empty' | 'aborted';

export type FailureStage = 'download' | 'process' | 'persist' | 'aborted';

export interface PlaylistFailure {
  playlist: string;
  url: string;
  stage: FailureStage;
  error: string;
}

export interface RunStats {
  runId: string;
  startedAt: string;
  outcome: RunOutcome;
  playlistsFound: number;
  playlistsDownloaded: number;
  playlistsProcessed: number;
  playlistsFailed: number;
  entriesChecked: number;
  entriesAvailable: number;
  entriesUnreachable: number;
  entriesProbeFailed: number;
  errors: PlaylistFailure[];
  durationMs: number;
}

export interface PlaylistResult {
  report: PlaylistReport;
  files: PartitionFiles;
}

interface SubmittedPlaylist {
  resource: NamedResource;
  handle: TaskHandle<PlaylistResult>;
}

/**
 * Fetch the index document and extract its playlist links.
 * Throws DocumentFetchError when the document cannot be retrieved.
 */
export async function discoverPlaylists(ctx: RunContext): Promise<NamedResource[]> {
  const { config, log } = ctx;
  const url = config.index.url;

  log.info({ url }, 'Fetching index document');
  let documentText: string;
  try {
    documentText = await ctx.fetcher.fetchText(url, config.network.fetch_timeout_ms, ctx.signal);
  } catch (err) {
    log.error({ url, error: errorMessage(err) }, 'Failed to fetch index document');
    throw new DocumentFetchError(`Failed to fetch index document: ${errorMessage(err)}`, {
      url,
      cause: errorMessage(err),
    });
  }

  const resources = toNamedResources(ctx.extractor.extract(documentText));
  log.info({ count: resources.length, strategy: ctx.extractor.strategy }, 'Extracted playlist links');
  return resources;
}

/**
 * Discover, download, check and persist every playlist of the index document.
 *
 * Only a failed index fetch (DocumentFetchError) or output directories that cannot be created
 * (PersistError) reject. Download, check and write failures are confined to their playlist and
 * reported in `stats.errors`; the run still accounts for every other playlist.
 */
export async function runPipeline(ctx: RunContext): Promise<RunStats> {
  const startTime = Date.now();
  const { log } = ctx;

  const stats: RunStats = {
    runId: ctx.runId,
    startedAt: nowISO(),
    outcome: 'completed',
    playlistsFound: 0,
    playlistsDownloaded: 0,
    playlistsProcessed: 0,
    playlistsFailed: 0,
    entriesChecked: 0,
    entriesAvailable: 0,
    entriesUnreachable: 0,
    entriesProbeFailed: 0,
    errors: [],
    durationMs: 0,
  };

  const resources = await discoverPlaylists(ctx);
  stats.playlistsFound = resources.length;

  if (resources.length === 0) {
    log.warn({ url: ctx.config.index.url }, 'No playlist links found in index document');
    stats.outcome = 'empty';
    stats.durationMs = Date.now() - startTime;
    return stats;
  }

  ensureOutputDirs(ctx.dirs);

  const pool = new WorkerPool(ctx.config.pool.capacity);
  const submitted: SubmittedPlaylist[] = [];

  for (const resource of resources) {
    if (ctx.signal?.aborted) break;

    const text = await downloadPlaylist(ctx, resource, stats);
    if (text === null) continue;

    const handle = await pool.submit(resource.name, () => processPlaylist(ctx, resource.name, text));
    submitted.push({ resource, handle });
  }

  const settled = await Promise.all(
    submitted.map(async ({ resource, handle }) => ({ resource, outcome: await handle.result })),
  );

  for (const { resource, outcome } of settled) {
    if (outcome.ok) {
      const { report } = outcome.value;
      const { unreachable, probeFailed } = countUnavailable(report);
      stats.playlistsProcessed++;
      stats.entriesChecked += report.available.length + report.unavailable.length;
      stats.entriesAvailable += report.available.length;
      stats.entriesUnreachable += unreachable;
      stats.entriesProbeFailed += probeFailed;
    } else {
      recordFailure(ctx, stats, resource, failureStage(outcome.error), outcome.error);
    }
  }

  if (ctx.signal?.aborted) {
    stats.outcome = 'aborted';
  }
  stats.durationMs = Date.now() - startTime;

  log.info(
    {
      outcome: stats.outcome,
      playlistsFound: stats.playlistsFound,
      playlistsProcessed: stats.playlistsProcessed,
      playlistsFailed: stats.playlistsFailed,
      entriesAvailable: stats.entriesAvailable,
      entriesUnavailable: stats.entriesUnreachable + stats.entriesProbeFailed,
      durationMs: stats.durationMs,
    },
    'Run complete',
  );

  return stats;
}

async function downloadPlaylist(ctx: RunContext, resource: NamedResource, stats: RunStats): Promise<string | null> {
  const { name, url } = resource;
  ctx.log.info({ playlist: name, url }, 'Downloading playlist');

  try {
    const text = await ctx.fetcher.fetchText(url, ctx.config.network.fetch_timeout_ms, ctx.signal);
    const filePath = savePlaylist(ctx.dirs, name, text);
    stats.playlistsDownloaded++;
    ctx.log.debug({ playlist: name, path: filePath }, 'Saved playlist');
    return text;
  } catch (err) {
    const error = new PlaylistDownloadError(`Failed to download playlist ${name}: ${errorMessage(err)}`, {
      playlist: name,
      url,
      cause: errorMessage(err),
    });
    recordFailure(ctx, stats, resource, ctx.signal?.aborted ? 'aborted' : 'download', error);
    return null;
  }
}

async function processPlaylist(ctx: RunContext, name: string, text: string): Promise<PlaylistResult> {
  if (ctx.signal?.aborted) {
    throw new RunAbortedError(`Run cancelled before checking ${name}`, { playlist: name });
  }

  const report = await validatePlaylist(ctx, name, text);
  const files = writePartitions(ctx.dirs, name, report.available, report.unavailable);

  ctx.log.info(
    {
      playlist: name,
      available: report.available.length,
      unavailable: report.unavailable.length,
      files,
    },
    'Saved playlist partitions',
  );
  return { report, files };
}

function failureStage(error: unknown): FailureStage {
  if (error instanceof PersistError) return 'persist';
  if (error instanceof RunAbortedError) return 'aborted';
  return 'process';
}

function recordFailure(
  ctx: RunContext,
  stats: RunStats,
  resource: NamedResource,
  stage: FailureStage,
  error: unknown,
): void {
  const message = errorMessage(error);
  stats.playlistsFailed++;
  stats.errors.push({ playlist: resource.name, url: resource.url, stage, error: message });

  const fields = { playlist: resource.name, url: resource.url, stage, error: message };
  if (stage === 'aborted') {
    ctx.log.warn(fields, 'Playlist skipped');
  } else {
    ctx.log.error(fields, 'Playlist failed');
  }
}
