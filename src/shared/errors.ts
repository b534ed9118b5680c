export class FeedsmithError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'FeedsmithError';
  }
}

export class ConfigError extends FeedsmithError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class RecipeError extends FeedsmithError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'RECIPE_ERROR', details);
    this.name = 'RecipeError';
  }
}

export class DbError extends FeedsmithError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DB_ERROR', details);
    this.name = 'DbError';
  }
}

export class FetchError extends FeedsmithError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'FETCH_ERROR', details);
    this.name = 'FetchError';
  }
}

export class HttpStatusError extends FetchError {
  constructor(
    public readonly status: number,
    statusText: string,
    url: string,
  ) {
    super(statusText ? `${status} ${statusText}` : String(status), { url, status });
    this.name = 'HttpStatusError';
  }
}

export class TimeoutError extends FetchError {
  constructor(timeoutMs: number, url: string) {
    super(`request timed out after ${timeoutMs}ms`, { url, timeoutMs });
    this.name = 'TimeoutError';
  }
}

export class RedirectLimitError extends FetchError {
  constructor(maxRedirects: number, url: string) {
    super(`exceeded ${maxRedirects} redirects`, { url, maxRedirects });
    this.name = 'RedirectLimitError';
  }
}

/**
 * Render a thrown value as a short `Kind: message` string.
 * Undici wraps socket failures as `TypeError: fetch failed`, so the cause is appended.
 */
export function describeError(err: unknown): string {
  if (!(err instanceof Error)) return `Error: ${String(err)}`;
  const base = `${err.name}: ${err.message}`;
  const cause = err.cause;
  if (cause instanceof Error && cause.message && !err.message.includes(cause.message)) {
    return `${base} (${cause.message})`;
  }
  return base;
}
