import { errorMessage } from '../shared/errors.js';
import { deadlineSignal } from '../shared/utils.js';

/**
 * `reachable`: the HEAD answered 200 itself. Redirects are not followed.
 * `probe_failed`: the check could not be completed (timeout, DNS, refused, cancelled).
 * `unreachable`: the check completed with any other status.
 */
export type ProbeStatus = 'reachable' | 'unreachable' | 'probe_failed';

export interface ProbeOutcome {
  status: ProbeStatus;
  httpStatus?: number;
  error?: string;
  durationMs: number;
}

export interface LivenessProber {
  /** Never rejects; every failure is expressed in the outcome. */
  probe(url: string, timeoutMs: number, signal?: AbortSignal): Promise<ProbeOutcome>;
}

export class HttpProber implements LivenessProber {
  constructor(private readonly userAgent: string = 'streamsieve/0.1') {}

  async probe(url: string, timeoutMs: number, signal?: AbortSignal): Promise<ProbeOutcome> {
    const startTime = Date.now();
    const deadline = deadlineSignal(timeoutMs, signal);

    try {
      const response = await fetch(url, {
        method: 'HEAD',
        headers: { 'User-Agent': this.userAgent },
        signal: deadline.signal,
        redirect: 'manual',
      });

      return {
        status: response.status === 200 ? 'reachable' : 'unreachable',
        httpStatus: response.status,
        durationMs: Date.now() - startTime,
      };
    } catch (err) {
      let error: string;
      if (deadline.timedOut()) {
        error = `timed out after ${timeoutMs}ms`;
      } else if (signal?.aborted) {
        error = 'cancelled';
      } else {
        error = errorMessage(err);
      }
      return { status: 'probe_failed', error, durationMs: Date.now() - startTime };
    } finally {
      deadline.dispose();
    }
  }
}
