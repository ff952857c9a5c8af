import type { Config } from '../shared/config.js';
import { createLogger, type Logger } from '../shared/logger.js';
import { generateId } from '../shared/utils.js';
import { createLinkExtractor, type LinkExtractor } from '../source/extractor.js';
import { HttpFetcher, type ResourceFetcher } from '../source/fetcher.js';
import { HttpProber, type LivenessProber } from '../source/probe.js';
import { resolveOutputDirs, type OutputDirs } from '../playlist/store.js';

/**
 * Everything one run needs, built once and passed down explicitly.
 */
export interface RunContext {
  readonly runId: string;
  readonly config: Config;
  readonly log: Logger;
  readonly dirs: OutputDirs;
  readonly fetcher: ResourceFetcher;
  readonly prober: LivenessProber;
  readonly extractor: LinkExtractor;
  /** Aborting it cancels the run: nothing new starts and in-flight requests are dropped. */
  readonly signal?: AbortSignal;
}

export interface RunContextOverrides {
  runId?: string;
  logger?: Logger;
  fetcher?: ResourceFetcher;
  prober?: LivenessProber;
  extractor?: LinkExtractor;
  signal?: AbortSignal;
}

export function createRunContext(config: Config, overrides: RunContextOverrides = {}): RunContext {
  const runId = overrides.runId ?? generateId(10);
  const log = (overrides.logger ?? createLogger(config.logging)).child({ run: runId });

  return {
    runId,
    config,
    log,
    dirs: resolveOutputDirs(config.output),
    fetcher: overrides.fetcher ?? new HttpFetcher(config.network.user_agent),
    prober: overrides.prober ?? new HttpProber(config.network.user_agent),
    extractor: overrides.extractor ?? createLinkExtractor(config.index, log),
    signal: overrides.signal,
  };
}
