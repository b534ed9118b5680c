import type { Config } from '../shared/config.js';
import {
  FetchError,
  HttpStatusError,
  RedirectLimitError,
  TimeoutError,
  describeError,
} from '../shared/errors.js';
import { childLogger } from '../shared/logger.js';
import { Semaphore } from './semaphore.js';

/**
 * Outcome of one GET. Exactly one of `content` / `error` is set.
 */
export interface FetchResult {
  key: string;
  content: string | null;
  error: string | null;
}

export interface FetcherOptions {
  maxConcurrent: number;
  timeoutMs: number;
  maxRedirects: number;
  userAgent?: string;
}

export interface FetchProgress {
  completed: number;
  total: number;
  result: FetchResult;
}

export type ProgressObserver = (progress: FetchProgress) => void;

const log = childLogger('fetch');

const ACCEPT =
  'application/rss+xml, application/atom+xml, application/xml;q=0.9, text/xml;q=0.9, text/html;q=0.8, */*;q=0.5';

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

/**
 * Bounded-concurrency HTTP GET client. At most `maxConcurrent` requests are in
 * flight; the rest wait on the gate. No retries: a failure is reported once and
 * cross-run backoff is left to the cache's fail_count.
 */
export class ConcurrentFetcher {
  private readonly gate: Semaphore;
  private readonly shutdown = new AbortController();
  private readonly timeoutMs: number;
  private readonly maxRedirects: number;
  private readonly userAgent: string;

  constructor(options: FetcherOptions) {
    this.gate = new Semaphore(options.maxConcurrent);
    this.timeoutMs = options.timeoutMs;
    this.maxRedirects = options.maxRedirects;
    this.userAgent = options.userAgent ?? 'feedsmith/1.0';
  }

  static fromConfig(config: Config['fetch']): ConcurrentFetcher {
    return new ConcurrentFetcher({
      maxConcurrent: config.max_concurrent,
      timeoutMs: config.timeout_ms,
      maxRedirects: config.max_redirects,
      userAgent: config.user_agent,
    });
  }

  get closed(): boolean {
    return this.shutdown.signal.aborted;
  }

  /** Requests currently holding a slot. */
  get inFlight(): number {
    return this.gate.inUse;
  }

  /** Never rejects; failures come back as `error`. */
  async fetchOne(url: string): Promise<FetchResult> {
    return this.gate.run(() => this.request(url));
  }

  /**
   * Fetch every URL with bounded parallelism. Results are returned in completion
   * order, not input order; correlate them by `key`.
   */
  async fetchMany(
    urls: readonly string[],
    options: { onProgress?: ProgressObserver } = {},
  ): Promise<FetchResult[]> {
    const total = urls.length;
    const results: FetchResult[] = [];

    await Promise.all(
      urls.map(async (url) => {
        const result = await this.fetchOne(url);
        results.push(result);
        options.onProgress?.({ completed: results.length, total, result });
      }),
    );

    return results;
  }

  /**
   * Abort in-flight requests and refuse new ones. Safe to call more than once.
   */
  close(): void {
    if (this.closed) return;
    this.shutdown.abort();
    log.debug('Fetcher closed');
  }

  private async request(url: string): Promise<FetchResult> {
    if (this.closed) {
      return { key: url, content: null, error: describeError(new FetchError('fetcher is closed')) };
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onShutdown = () => controller.abort();
    this.shutdown.signal.addEventListener('abort', onShutdown, { once: true });

    try {
      log.debug({ url }, 'Fetching');
      const content = await this.follow(url, controller.signal);
      return { key: url, content, error: null };
    } catch (err) {
      let error: string;
      if (timedOut) {
        error = describeError(new TimeoutError(this.timeoutMs, url));
      } else if (this.closed) {
        error = describeError(new FetchError('fetcher closed during request'));
      } else {
        error = describeError(err);
      }
      log.warn({ url, error }, 'Fetch failed');
      return { key: url, content: null, error };
    } finally {
      clearTimeout(timer);
      this.shutdown.signal.removeEventListener('abort', onShutdown);
    }
  }

  private async follow(url: string, signal: AbortSignal): Promise<string> {
    let current = url;

    for (let redirects = 0; ; redirects++) {
      const response = await fetch(current, {
        headers: { 'User-Agent': this.userAgent, Accept: ACCEPT },
        signal,
        redirect: 'manual',
      });

      if (REDIRECT_STATUSES.has(response.status)) {
        const location = response.headers.get('location');
        await response.body?.cancel();
        if (!location) {
          throw new HttpStatusError(response.status, 'redirect without Location', current);
        }
        if (redirects >= this.maxRedirects) {
          throw new RedirectLimitError(this.maxRedirects, url);
        }
        current = new URL(location, current).toString();
        continue;
      }

      if (!response.ok) {
        await response.body?.cancel();
        throw new HttpStatusError(response.status, response.statusText, current);
      }

      return await decodeBody(response);
    }
  }
}

/** `charset` parameter of a Content-Type header, lower-cased, if any. */
export function charsetOf(contentType: string | null): string | null {
  const match = contentType?.match(/;\s*charset\s*=\s*"?([^";\s]+)"?/i);
  return match ? match[1].toLowerCase() : null;
}

/**
 * Decode by the declared charset; missing or unknown labels fall back to UTF-8.
 */
export async function decodeBody(response: Response): Promise<string> {
  const bytes = await response.arrayBuffer();
  const charset = charsetOf(response.headers.get('content-type')) ?? 'utf-8';
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(charset);
  } catch {
    decoder = new TextDecoder('utf-8');
  }
  return decoder.decode(bytes);
}
