import type { CacheStore } from '../cache/cacheStore.js';
import type { ConcurrentFetcher } from '../fetch/fetcher.js';
import type { Config } from '../shared/config.js';

/**
 * Result of one unit of work (a feed URL or an item URL). Failures are values,
 * not exceptions, so one bad unit never aborts its batch.
 */
export type UnitOutcome<T> =
  | { status: 'ok'; key: string; value: T }
  | { status: 'skipped'; key: string; reason: string };

export function ok<T>(key: string, value: T): UnitOutcome<T> {
  return { status: 'ok', key, value };
}

export function skipped<T>(key: string, reason: string): UnitOutcome<T> {
  return { status: 'skipped', key, reason };
}

export function skippedUnits<T>(outcomes: readonly UnitOutcome<T>[]): Array<{ key: string; reason: string }> {
  const out: Array<{ key: string; reason: string }> = [];
  for (const o of outcomes) {
    if (o.status === 'skipped') out.push({ key: o.key, reason: o.reason });
  }
  return out;
}

/**
 * Everything the pipeline needs, passed explicitly. The two stores must be bound
 * to the `feeds` and `content` namespaces respectively.
 */
export interface PipelineContext {
  feeds: CacheStore;
  contents: CacheStore;
  fetcher: ConcurrentFetcher;
  config: Config;
  /** Clock in epoch milliseconds; drives the lookback cutoff. */
  now: () => number;
}
