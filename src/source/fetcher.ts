import { FetchError, errorMessage } from '../shared/errors.js';
import { deadlineSignal } from '../shared/utils.js';

export interface ResourceFetcher {
  /**
   * Retrieve the body of `url` as text. Rejects with FetchError on a non-2xx status,
   * a transport failure, the timeout or cancellation through `signal`. Never retries.
   */
  fetchText(url: string, timeoutMs: number, signal?: AbortSignal): Promise<string>;
}

export class HttpFetcher implements ResourceFetcher {
  constructor(private readonly userAgent: string = 'streamsieve/0.1') {}

  async fetchText(url: string, timeoutMs: number, signal?: AbortSignal): Promise<string> {
    const deadline = deadlineSignal(timeoutMs, signal);

    try {
      const response = await fetch(url, {
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'text/plain, text/markdown, audio/x-mpegurl, application/vnd.apple.mpegurl, */*',
        },
        signal: deadline.signal,
        redirect: 'follow',
      });

      if (!response.ok) {
        await response.body?.cancel();
        throw new FetchError(`Fetch failed: ${response.status} from ${url}`, {
          url,
          status: response.status,
        });
      }

      // Body reads stay under the same deadline.
      return await response.text();
    } catch (err) {
      if (err instanceof FetchError) throw err;
      if (deadline.timedOut()) {
        throw new FetchError(`Fetch timed out after ${timeoutMs}ms: ${url}`, { url, timeoutMs });
      }
      if (signal?.aborted) {
        throw new FetchError(`Fetch cancelled: ${url}`, { url, cancelled: true });
      }
      throw new FetchError(`Fetch failed: ${errorMessage(err)}`, { url, cause: errorMessage(err) });
    } finally {
      deadline.dispose();
    }
  }
}
