import type { Recipe } from '../source/recipes.js';
import type { FeedItem } from '../source/types.js';
import { parseFeedEntries } from '../source/rss.js';
import { describeError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { DAY_MS } from '../shared/utils.js';
import { progressLogger } from './progress.js';
import { recordFetch } from './record.js';
import { ok, skipped, type PipelineContext, type UnitOutcome } from './types.js';

export interface AcquireStats {
  feeds: number;
  cacheHits: number;
  fetched: number;
  fetchFailed: number;
  parseFailed: number;
  items: number;
}

export interface AcquireResult {
  /** Items from cached feeds first, then from freshly fetched feeds. */
  items: FeedItem[];
  /** One outcome per feed URL; `value` is the number of items it contributed. */
  outcomes: UnitOutcome<number>[];
  stats: AcquireStats;
}

async function parseUnit(
  url: string,
  content: string,
  recipe: Recipe,
  cutoff: Date,
): Promise<UnitOutcome<FeedItem[]>> {
  try {
    return ok(url, await parseFeedEntries(content, { cutoff, filters: recipe.filters }));
  } catch (err) {
    return skipped(url, `ParseError: ${describeError(err)}`);
  }
}

/**
 * Turn a recipe's feed URLs into items. Fresh cache rows are parsed directly;
 * misses are fetched, written back to the cache (success or failure) and only
 * then parsed. A failing feed contributes no items and never aborts the batch.
 */
export async function acquireFeeds(
  ctx: PipelineContext,
  recipeName: string,
  recipe: Recipe,
): Promise<AcquireResult> {
  const { feeds, fetcher, config } = ctx;
  const cutoff = new Date(ctx.now() - config.pipeline.lookback_days * DAY_MS);
  const urls = [...new Set(recipe.urls)];

  const stats: AcquireStats = {
    feeds: urls.length,
    cacheHits: 0,
    fetched: 0,
    fetchFailed: 0,
    parseFailed: 0,
    items: 0,
  };
  const outcomes: UnitOutcome<number>[] = [];
  const cachedItems: FeedItem[] = [];
  const fetchedItems: FeedItem[] = [];

  const collect = (outcome: UnitOutcome<FeedItem[]>, into: FeedItem[]): void => {
    if (outcome.status === 'ok') {
      into.push(...outcome.value);
      outcomes.push(ok(outcome.key, outcome.value.length));
    } else {
      stats.parseFailed++;
      logger.error({ recipe: recipeName, url: outcome.key, error: outcome.reason }, 'Feed parse failed');
      outcomes.push(outcome);
    }
  };

  const cached = feeds.batchGet(urls, config.cache.feed_ttl_ms);
  const misses: string[] = [];

  for (const url of urls) {
    const content = cached.get(url) ?? null;
    if (content === null) {
      misses.push(url);
      continue;
    }
    stats.cacheHits++;
    collect(await parseUnit(url, content, recipe, cutoff), cachedItems);
  }

  if (misses.length === 0) {
    logger.info({ recipe: recipeName, feeds: urls.length }, `${recipeName} all ${urls.length} feeds were cached`);
  } else {
    logger.info(
      { recipe: recipeName, uncached: misses.length, feeds: urls.length },
      `${recipeName} fetching ${misses.length} uncached feeds, total ${urls.length}`,
    );
  }

  const results = await fetcher.fetchMany(misses, { onProgress: progressLogger(recipeName, 'feeds') });

  for (const result of results) {
    // the cache write precedes parsing so a parse error cannot lose the fetch
    recordFetch(feeds, result);

    if (result.content === null) {
      stats.fetchFailed++;
      const reason = result.error ?? 'unknown fetch failure';
      logger.warn({ recipe: recipeName, url: result.key, error: reason }, 'Skipping feed after fetch failure');
      outcomes.push(skipped(result.key, reason));
      continue;
    }

    stats.fetched++;
    collect(await parseUnit(result.key, result.content, recipe, cutoff), fetchedItems);
  }

  const items = [...cachedItems, ...fetchedItems];
  stats.items = items.length;
  return { items, outcomes, stats };
}
