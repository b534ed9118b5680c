import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConcurrentFetcher, charsetOf, type FetchProgress } from '../fetcher.js';

const originalFetch = globalThis.fetch;

afterEach(() => {
  globalThis.fetch = originalFetch;
  vi.restoreAllMocks();
});

function makeFetcher(overrides: Partial<ConstructorParameters<typeof ConcurrentFetcher>[0]> = {}) {
  return new ConcurrentFetcher({ maxConcurrent: 5, timeoutMs: 1000, maxRedirects: 3, ...overrides });
}

/** fetch stand-in that rejects like undici when its signal aborts, and otherwise never settles */
function hangingFetch(onStart?: () => void) {
  return vi.fn().mockImplementation((_url: string, init?: RequestInit) => {
    return new Promise<Response>((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => {
        reject(Object.assign(new Error('This operation was aborted'), { name: 'AbortError' }));
      });
      onStart?.();
    });
  });
}

describe('fetchOne', () => {
  it('returns the body on 2xx', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('<rss/>', { status: 200 }));

    const result = await makeFetcher().fetchOne('https://example.com/feed');

    expect(result).toEqual({ key: 'https://example.com/feed', content: '<rss/>', error: null });
  });

  it('reports non-2xx as an HttpStatusError', async () => {
    globalThis.fetch = vi
      .fn()
      .mockResolvedValue(new Response('boom', { status: 500, statusText: 'Internal Server Error' }));

    const result = await makeFetcher().fetchOne('https://example.com/feed');

    expect(result.content).toBeNull();
    expect(result.error).toBe('HttpStatusError: 500 Internal Server Error');
  });

  it('reports transport errors with their cause', async () => {
    globalThis.fetch = vi.fn().mockRejectedValue(
      new TypeError('fetch failed', { cause: new Error('connect ECONNREFUSED 127.0.0.1:80') }),
    );

    const result = await makeFetcher().fetchOne('https://example.com/feed');

    expect(result.error).toBe('TypeError: fetch failed (connect ECONNREFUSED 127.0.0.1:80)');
  });

  it('never rejects on non-Error throwables', async () => {
    globalThis.fetch = vi.fn().mockRejectedValue('boom');

    const result = await makeFetcher().fetchOne('https://example.com/feed');

    expect(result.error).toBe('Error: boom');
  });

  it('times out stuck requests', async () => {
    globalThis.fetch = hangingFetch();

    const result = await makeFetcher({ timeoutMs: 50 }).fetchOne('https://example.com/slow');

    expect(result.content).toBeNull();
    expect(result.error).toBe('TimeoutError: request timed out after 50ms');
  });

  it('follows relative and absolute redirects up to the limit', async () => {
    const mockFetch = vi.fn().mockImplementation((url: string) => {
      if (url === 'https://a.test/1') {
        return Promise.resolve(new Response(null, { status: 301, headers: { Location: '/2' } }));
      }
      if (url === 'https://a.test/2') {
        return Promise.resolve(new Response(null, { status: 302, headers: { Location: 'https://a.test/3' } }));
      }
      return Promise.resolve(new Response('final', { status: 200 }));
    });
    globalThis.fetch = mockFetch;

    const result = await makeFetcher({ maxRedirects: 3 }).fetchOne('https://a.test/1');

    expect(result.content).toBe('final');
    expect(result.key).toBe('https://a.test/1');
    expect(mockFetch.mock.calls.map((c) => c[0])).toEqual([
      'https://a.test/1',
      'https://a.test/2',
      'https://a.test/3',
    ]);
    expect(mockFetch.mock.calls[0][1].redirect).toBe('manual');
  });

  it('fails once the redirect limit is exceeded', async () => {
    globalThis.fetch = vi.fn().mockImplementation(() =>
      Promise.resolve(new Response(null, { status: 301, headers: { Location: '/loop' } })),
    );

    const result = await makeFetcher({ maxRedirects: 1 }).fetchOne('https://a.test/start');

    expect(result.error).toBe('RedirectLimitError: exceeded 1 redirects');
    expect(globalThis.fetch).toHaveBeenCalledTimes(2);
  });

  it('sends the configured user agent', async () => {
    const mockFetch = vi.fn().mockResolvedValue(new Response('ok', { status: 200 }));
    globalThis.fetch = mockFetch;

    await makeFetcher({ userAgent: 'test-agent/1.0' }).fetchOne('https://example.com');

    expect(mockFetch.mock.calls[0][1].headers['User-Agent']).toBe('test-agent/1.0');
  });
});

describe('body decoding', () => {
  function bytesResponse(bytes: Uint8Array, contentType?: string): Response {
    return new Response(bytes, { status: 200, headers: contentType ? { 'Content-Type': contentType } : {} });
  }

  it('decodes by the declared latin1 charset', async () => {
    const body = new Uint8Array(Buffer.from('<rss><title>Café</title></rss>', 'latin1'));
    globalThis.fetch = vi.fn().mockResolvedValue(bytesResponse(body, 'text/xml; charset=ISO-8859-1'));

    const result = await makeFetcher().fetchOne('https://example.com/feed');

    expect(result.content).toBe('<rss><title>Café</title></rss>');
  });

  it('decodes windows-1251 pages', async () => {
    const body = new Uint8Array([0xcf, 0xf0, 0xe8, 0xe2, 0xe5, 0xf2]);
    globalThis.fetch = vi.fn().mockResolvedValue(bytesResponse(body, 'text/html; charset="windows-1251"'));

    const result = await makeFetcher().fetchOne('https://example.com/page');

    expect(result.content).toBe('Привет');
  });

  it('falls back to utf-8 without a charset', async () => {
    const body = new Uint8Array(Buffer.from('Café', 'utf-8'));
    globalThis.fetch = vi.fn().mockResolvedValue(bytesResponse(body, 'application/rss+xml'));

    expect((await makeFetcher().fetchOne('https://example.com/feed')).content).toBe('Café');
  });

  it('falls back to utf-8 for an unknown charset label', async () => {
    const body = new Uint8Array(Buffer.from('Café', 'utf-8'));
    globalThis.fetch = vi.fn().mockResolvedValue(bytesResponse(body, 'text/xml; charset=x-made-up'));

    const result = await makeFetcher().fetchOne('https://example.com/feed');

    expect(result.error).toBeNull();
    expect(result.content).toBe('Café');
  });
});

describe('charsetOf', () => {
  it('reads the charset parameter', () => {
    expect(charsetOf('text/html; charset=UTF-8')).toBe('utf-8');
    expect(charsetOf('text/xml;charset="ISO-8859-1"')).toBe('iso-8859-1');
    expect(charsetOf('text/xml')).toBeNull();
    expect(charsetOf(null)).toBeNull();
  });
});

describe('fetchMany', () => {
  it('never runs more than maxConcurrent requests at once', async () => {
    let active = 0;
    let peak = 0;
    globalThis.fetch = vi.fn().mockImplementation(async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((r) => setTimeout(r, 20));
      active--;
      return new Response('ok', { status: 200 });
    });

    const fetcher = makeFetcher({ maxConcurrent: 2 });
    const urls = [1, 2, 3, 4, 5].map((n) => `https://example.com/${n}`);
    const results = await fetcher.fetchMany(urls);

    expect(peak).toBe(2);
    expect(results).toHaveLength(5);
    expect(new Set(results.map((r) => r.key))).toEqual(new Set(urls));
    expect(results.every((r) => r.content === 'ok')).toBe(true);
    expect(fetcher.inFlight).toBe(0);
  });

  it('returns results in completion order', async () => {
    globalThis.fetch = vi.fn().mockImplementation(async (url: string) => {
      await new Promise((r) => setTimeout(r, url.endsWith('slow') ? 40 : 5));
      return new Response(url, { status: 200 });
    });

    const results = await makeFetcher().fetchMany(['https://example.com/slow', 'https://example.com/fast']);

    expect(results.map((r) => r.key)).toEqual(['https://example.com/fast', 'https://example.com/slow']);
  });

  it('reports progress as each request completes', async () => {
    globalThis.fetch = vi.fn().mockImplementation((url: string) =>
      Promise.resolve(url.includes('bad') ? new Response('', { status: 404 }) : new Response('ok', { status: 200 })),
    );

    const seen: FetchProgress[] = [];
    await makeFetcher().fetchMany(['https://a.test/ok', 'https://a.test/bad', 'https://b.test/ok'], {
      onProgress: (p) => seen.push(p),
    });

    expect(seen.map((p) => p.completed)).toEqual([1, 2, 3]);
    expect(seen.every((p) => p.total === 3)).toBe(true);
    expect(seen.filter((p) => p.result.error !== null)).toHaveLength(1);
  });

  it('isolates failures from successes', async () => {
    globalThis.fetch = vi.fn().mockImplementation((url: string) =>
      url.includes('down')
        ? Promise.reject(new TypeError('fetch failed'))
        : Promise.resolve(new Response('ok', { status: 200 })),
    );

    const results = await makeFetcher().fetchMany(['https://down.test/', 'https://up.test/']);
    const byKey = new Map(results.map((r) => [r.key, r]));

    expect(byKey.get('https://up.test/')?.content).toBe('ok');
    expect(byKey.get('https://down.test/')?.error).toBe('TypeError: fetch failed');
  });

  it('returns an empty list for no urls', async () => {
    globalThis.fetch = vi.fn();
    expect(await makeFetcher().fetchMany([])).toEqual([]);
    expect(globalThis.fetch).not.toHaveBeenCalled();
  });
});

describe('close', () => {
  it('refuses new requests', async () => {
    globalThis.fetch = vi.fn();
    const fetcher = makeFetcher();
    fetcher.close();

    const result = await fetcher.fetchOne('https://example.com');

    expect(result.error).toBe('FetchError: fetcher is closed');
    expect(globalThis.fetch).not.toHaveBeenCalled();
  });

  it('aborts requests already in flight', async () => {
    let markStarted: () => void = () => undefined;
    const started = new Promise<void>((resolve) => {
      markStarted = resolve;
    });
    globalThis.fetch = hangingFetch(() => markStarted());

    const fetcher = makeFetcher({ timeoutMs: 5000 });
    const pending = fetcher.fetchOne('https://example.com/slow');
    await started;
    fetcher.close();

    const result = await pending;
    expect(result.error).toBe('FetchError: fetcher closed during request');
    expect(fetcher.inFlight).toBe(0);
  });
});
