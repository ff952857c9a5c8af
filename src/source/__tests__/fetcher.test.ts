import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HttpFetcher } from '../fetcher.js';
import { FetchError } from '../../shared/errors.js';

function hangUntilAborted(_url: string, opts?: RequestInit): Promise<Response> {
  // Return a promise that rejects when abort signal fires
  return new Promise<Response>((_resolve, reject) => {
    opts?.signal?.addEventListener('abort', () => {
      reject(Object.assign(new Error('The operation was aborted'), { name: 'AbortError' }));
    });
  });
}

describe('HttpFetcher', () => {
  const originalFetch = globalThis.fetch;

  beforeEach(() => {
    vi.restoreAllMocks();
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it('returns the response body as text', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('#EXTM3U\nhttp://a.test/1', { status: 200 }));

    const fetcher = new HttpFetcher();
    await expect(fetcher.fetchText('https://lists.test/a.m3u', 1000)).resolves.toBe('#EXTM3U\nhttp://a.test/1');
  });

  it('sends a GET with the configured user agent and follows redirects', async () => {
    const mockFetch = vi.fn().mockResolvedValue(new Response('ok', { status: 200 }));
    globalThis.fetch = mockFetch;

    await new HttpFetcher('sieve-test/1.0').fetchText('https://lists.test/a.m3u', 1000);

    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://lists.test/a.m3u');
    expect(init.headers['User-Agent']).toBe('sieve-test/1.0');
    expect(init.redirect).toBe('follow');
    expect(init.method).toBeUndefined();
  });

  it('throws FetchError on non-ok response', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('Not Found', { status: 404 }));

    const fetcher = new HttpFetcher();
    const err = await fetcher.fetchText('https://lists.test/missing.m3u', 1000).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(FetchError);
    if (err instanceof FetchError) {
      expect(err.message).toBe('Fetch failed: 404 from https://lists.test/missing.m3u');
      expect(err.code).toBe('FETCH_ERROR');
      expect(err.details).toEqual({ url: 'https://lists.test/missing.m3u', status: 404 });
    }
  });

  it('releases the body of a non-ok response', async () => {
    const response = new Response('Server Error', { status: 500 });
    globalThis.fetch = vi.fn().mockResolvedValue(response);

    await expect(new HttpFetcher().fetchText('https://lists.test/broken.m3u', 1000)).rejects.toThrow(FetchError);
    expect(response.bodyUsed).toBe(true);
  });

  it('throws FetchError on network error', async () => {
    globalThis.fetch = vi.fn().mockRejectedValue(new Error('ECONNREFUSED'));

    const fetcher = new HttpFetcher();
    await expect(fetcher.fetchText('https://down.test/a.m3u', 1000)).rejects.toThrow('Fetch failed: ECONNREFUSED');
  });

  it('includes the nested cause in the message', async () => {
    globalThis.fetch = vi
      .fn()
      .mockRejectedValue(new TypeError('fetch failed', { cause: new Error('getaddrinfo ENOTFOUND down.test') }));

    const fetcher = new HttpFetcher();
    await expect(fetcher.fetchText('https://down.test/a.m3u', 1000)).rejects.toThrow(
      'Fetch failed: fetch failed (getaddrinfo ENOTFOUND down.test)',
    );
  });

  it('throws FetchError on timeout', async () => {
    globalThis.fetch = vi.fn().mockImplementation(hangUntilAborted);

    const fetcher = new HttpFetcher();
    await expect(fetcher.fetchText('https://slow.test/a.m3u', 50)).rejects.toThrow(
      'Fetch timed out after 50ms: https://slow.test/a.m3u',
    );
  });

  it('throws FetchError when cancelled through the signal', async () => {
    globalThis.fetch = vi.fn().mockImplementation(hangUntilAborted);
    const controller = new AbortController();

    const pending = new HttpFetcher().fetchText('https://slow.test/a.m3u', 10_000, controller.signal);
    controller.abort();

    await expect(pending).rejects.toThrow('Fetch cancelled: https://slow.test/a.m3u');
  });
});
