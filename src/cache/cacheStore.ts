import type { Db } from '../db/db.js';
import { DbError } from '../shared/errors.js';
import { childLogger } from '../shared/logger.js';

/**
 * `feeds` holds raw feed documents keyed by feed URL; `content` holds serialized
 * extraction results keyed by item URL. The two never share rows.
 */
export type CacheNamespace = 'feeds' | 'content';

/**
 * Database row shape for the cache_entries table. Timestamps are epoch milliseconds.
 */
export interface CacheEntry {
  namespace: CacheNamespace;
  key: string;
  content: string | null;
  created_at: number;
  updated_at: number;
  fail_count: number;
  error_reason: string | null;
}

export interface CacheStats {
  total: number;
  withContent: number;
  failing: number;
}

export interface CacheStoreOptions {
  /** Clock in epoch milliseconds. */
  now?: () => number;
}

interface UpsertParams {
  namespace: CacheNamespace;
  key: string;
  content: string | null;
  error_reason: string | null;
  now: number;
}

const log = childLogger('cache');

const UPSERT_SUCCESS = `
  INSERT INTO cache_entries (namespace, key, content, created_at, updated_at, fail_count, error_reason)
  VALUES (@namespace, @key, @content, @now, @now, 0, NULL)
  ON CONFLICT(namespace, key) DO UPDATE SET
    content = excluded.content,
    updated_at = MAX(cache_entries.updated_at, excluded.updated_at),
    fail_count = 0,
    error_reason = NULL
`;

const UPSERT_FAILURE = `
  INSERT INTO cache_entries (namespace, key, content, created_at, updated_at, fail_count, error_reason)
  VALUES (@namespace, @key, NULL, @now, @now, 1, @error_reason)
  ON CONFLICT(namespace, key) DO UPDATE SET
    content = NULL,
    updated_at = MAX(cache_entries.updated_at, excluded.updated_at),
    fail_count = cache_entries.fail_count + 1,
    error_reason = excluded.error_reason
`;

/**
 * Persistent URL → content cache with TTL reads and consecutive-failure tracking.
 *
 * A row exists from the first fetch attempt onwards, but it only counts as a hit
 * while it holds content and is younger than the caller's TTL. Every write is one
 * upsert statement, so writers to different keys never need coordination.
 */
export class CacheStore {
  private readonly now: () => number;

  constructor(
    private readonly db: Db,
    readonly namespace: CacheNamespace,
    options: CacheStoreOptions = {},
  ) {
    this.now = options.now ?? Date.now;
  }

  get(key: string, ttlMs: number): string | null {
    const row = this.db
      .prepare<[CacheNamespace, string, number], { content: string }>(
        `SELECT content FROM cache_entries
         WHERE namespace = ? AND key = ? AND updated_at > ? AND content IS NOT NULL`,
      )
      .get(this.namespace, key, this.now() - ttlMs);
    return row?.content ?? null;
  }

  /**
   * Vectorized `get`. Every requested key is present in the result; misses map to null.
   */
  batchGet(keys: readonly string[], ttlMs: number): Map<string, string | null> {
    const result = new Map<string, string | null>(keys.map((k) => [k, null]));
    if (keys.length === 0) return result;

    const rows = this.db
      .prepare<[CacheNamespace, number, string], { key: string; content: string }>(
        `SELECT key, content FROM cache_entries
         WHERE namespace = ? AND updated_at > ? AND content IS NOT NULL
           AND key IN (SELECT value FROM json_each(?))`,
      )
      .all(this.namespace, this.now() - ttlMs, JSON.stringify(keys));

    for (const row of rows) {
      result.set(row.key, row.content);
    }
    return result;
  }

  /**
   * Record a fetch attempt. A failure always clears content and bumps fail_count;
   * a success resets fail_count and the error.
   */
  set(key: string, content: string | null, success: boolean, errorReason?: string | null): void {
    const params: UpsertParams = {
      namespace: this.namespace,
      key,
      content: success ? content : null,
      error_reason: success ? null : (errorReason ?? null),
      now: this.now(),
    };

    try {
      this.db.prepare<UpsertParams>(success ? UPSERT_SUCCESS : UPSERT_FAILURE).run(params);
    } catch (err) {
      throw new DbError(`Failed to write cache entry: ${err instanceof Error ? err.message : String(err)}`, {
        namespace: this.namespace,
        key,
      });
    }
  }

  getEntry(key: string): CacheEntry | undefined {
    return this.db
      .prepare<[CacheNamespace, string], CacheEntry>(
        'SELECT * FROM cache_entries WHERE namespace = ? AND key = ?',
      )
      .get(this.namespace, key);
  }

  listFailing(minFailCount: number): Set<string> {
    const rows = this.db
      .prepare<[CacheNamespace, number], { key: string }>(
        'SELECT key FROM cache_entries WHERE namespace = ? AND fail_count >= ? ORDER BY key',
      )
      .all(this.namespace, minFailCount);
    return new Set(rows.map((r) => r.key));
  }

  /**
   * Delete rows that are older than `retentionMs` and currently healthy, plus every
   * row whose key is not in `knownKeys`. Old rows that keep failing are only removed
   * through the orphan branch. Without `knownKeys` only the time-based branch runs.
   */
  cleanup(retentionMs: number, knownKeys?: Iterable<string>): number {
    const cutoff = this.now() - retentionMs;
    const known = knownKeys === undefined ? undefined : JSON.stringify([...knownKeys]);

    const sweep = this.db.transaction(() => {
      const expired = this.db
        .prepare<[CacheNamespace, number]>(
          'DELETE FROM cache_entries WHERE namespace = ? AND updated_at < ? AND fail_count = 0',
        )
        .run(this.namespace, cutoff).changes;

      let orphaned = 0;
      if (known !== undefined) {
        orphaned = this.db
          .prepare<[CacheNamespace, string]>(
            `DELETE FROM cache_entries
             WHERE namespace = ? AND key NOT IN (SELECT value FROM json_each(?))`,
          )
          .run(this.namespace, known).changes;
      }
      return { expired, orphaned };
    });

    const { expired, orphaned } = sweep();
    log.info({ namespace: this.namespace, expired, orphaned }, 'Cache cleanup complete');
    return expired + orphaned;
  }

  stats(): CacheStats {
    const row = this.db
      .prepare<[CacheNamespace], { total: number; withContent: number | null; failing: number | null }>(
        `SELECT COUNT(*) AS total,
                SUM(CASE WHEN content IS NOT NULL THEN 1 ELSE 0 END) AS withContent,
                SUM(CASE WHEN fail_count > 0 THEN 1 ELSE 0 END) AS failing
         FROM cache_entries WHERE namespace = ?`,
      )
      .get(this.namespace);
    return {
      total: row?.total ?? 0,
      withContent: row?.withContent ?? 0,
      failing: row?.failing ?? 0,
    };
  }
}
