import { RunAbortedError, errorMessage } from '../shared/errors.js';
import { parsePlaylist, type PlaylistEntry } from '../playlist/parse.js';
import type { ProbeOutcome } from '../source/probe.js';
import type { RunContext } from './context.js';
import { mapWithConcurrency } from './pool.js';

export interface UnavailableEntry extends PlaylistEntry {
  readonly reason: 'unreachable' | 'probe_failed';
  /** HTTP status for `unreachable`, error text for `probe_failed`. */
  readonly detail?: string;
}

export interface PlaylistReport {
  readonly name: string;
  readonly available: PlaylistEntry[];
  readonly unavailable: UnavailableEntry[];
}

export interface CheckedEntry {
  entry: PlaylistEntry;
  outcome: ProbeOutcome;
}

async function probeEntry(ctx: RunContext, entry: PlaylistEntry): Promise<ProbeOutcome> {
  const startTime = Date.now();
  try {
    return await ctx.prober.probe(entry.url, ctx.config.network.probe_timeout_ms, ctx.signal);
  } catch (err) {
    // Probers are not supposed to reject; keep the failure scoped to this entry if one does.
    return { status: 'probe_failed', error: errorMessage(err), durationMs: Date.now() - startTime };
  }
}

export async function probeEntries(
  ctx: RunContext,
  name: string,
  entries: readonly PlaylistEntry[],
): Promise<CheckedEntry[]> {
  return mapWithConcurrency(entries, ctx.config.pool.probe_concurrency, async (entry) => {
    const outcome = await probeEntry(ctx, entry);
    ctx.log.debug(
      { playlist: name, url: entry.url, status: outcome.status, httpStatus: outcome.httpStatus, error: outcome.error },
      'Probed entry',
    );
    return { entry, outcome };
  });
}

/**
 * Stable split: both sides keep the order the entries were parsed in.
 */
export function partitionEntries(name: string, checked: readonly CheckedEntry[]): PlaylistReport {
  const available: PlaylistEntry[] = [];
  const unavailable: UnavailableEntry[] = [];

  for (const { entry, outcome } of checked) {
    const { metadata, url } = entry;
    switch (outcome.status) {
      case 'reachable':
        available.push({ metadata, url });
        break;
      case 'unreachable':
        unavailable.push({
          metadata,
          url,
          reason: 'unreachable',
          detail: outcome.httpStatus !== undefined ? `HTTP ${outcome.httpStatus}` : undefined,
        });
        break;
      case 'probe_failed':
        unavailable.push({ metadata, url, reason: 'probe_failed', detail: outcome.error });
        break;
    }
  }

  return { name, available, unavailable };
}

/**
 * Parse one playlist and probe every entry. Throws RunAbortedError if the run was cancelled
 * while probing, so a half-checked playlist is never reported.
 */
export async function validatePlaylist(ctx: RunContext, name: string, text: string): Promise<PlaylistReport> {
  const entries = parsePlaylist(text);
  ctx.log.info({ playlist: name, entries: entries.length }, 'Checking playlist');

  const checked = await probeEntries(ctx, name, entries);
  if (ctx.signal?.aborted) {
    throw new RunAbortedError(`Run cancelled while checking ${name}`, { playlist: name });
  }

  return partitionEntries(name, checked);
}

export function countUnavailable(report: PlaylistReport): { unreachable: number; probeFailed: number } {
  let unreachable = 0;
  let probeFailed = 0;
  for (const entry of report.unavailable) {
    if (entry.reason === 'unreachable') unreachable++;
    else probeFailed++;
  }
  return { unreachable, probeFailed };
}
