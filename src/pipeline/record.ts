import type { CacheStore } from '../cache/cacheStore.js';
import type { FetchResult } from '../fetch/fetcher.js';
import { describeError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

/**
 * Write a fetch attempt to the cache. `payload` replaces the raw body on success
 * (the content namespace stores serialized extractions). A stray write failure is
 * logged and the run carries on; returns whether the write landed.
 */
export function recordFetch(store: CacheStore, result: FetchResult, payload?: string | null): boolean {
  const success = result.error === null && result.content !== null;
  try {
    store.set(
      result.key,
      success ? (payload === undefined ? result.content : payload) : null,
      success,
      result.error,
    );
    return true;
  } catch (err) {
    logger.error({ namespace: store.namespace, key: result.key, error: describeError(err) }, 'Cache write failed');
    return false;
  }
}
