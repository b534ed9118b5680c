import type { Config } from '../shared/config.js';
import type { FeedItem } from '../source/types.js';
import {
  deserializeExtraction,
  detectLanguage,
  extractContent,
  serializeExtraction,
  type ExtractedContent,
} from '../source/extract.js';
import { logger } from '../shared/logger.js';
import { progressLogger } from './progress.js';
import { recordFetch } from './record.js';
import { ok, skipped, type PipelineContext, type UnitOutcome } from './types.js';

export type ContentThresholds = Pick<
  Config['pipeline'],
  'substantial_html_chars' | 'substantial_text_chars' | 'short_title_chars'
>;

export interface FulfillStats {
  items: number;
  candidates: number;
  cacheHits: number;
  fetched: number;
  fetchFailed: number;
  improved: number;
}

export interface FulfillResult {
  items: FeedItem[];
  /** One outcome per distinct item URL; `value` is whether any item changed. */
  outcomes: UnitOutcome<boolean>[];
  stats: FulfillStats;
}

export function hasSubstantialContent(item: FeedItem, thresholds: ContentThresholds): boolean {
  if (item.content_html && item.content_html.length > thresholds.substantial_html_chars) return true;
  if (item.content_text && item.content_text.length > thresholds.substantial_text_chars) return true;
  return false;
}

/**
 * Merge an extraction into an item in place. Content fields are only replaced by
 * non-empty candidates; the title only when the current one is short and the
 * candidate is strictly longer. Returns whether anything changed.
 */
export function mergeExtraction(item: FeedItem, extracted: ExtractedContent, shortTitleChars: number): boolean {
  let changed = false;

  if (extracted.content_html && extracted.content_html !== item.content_html) {
    item.content_html = extracted.content_html;
    changed = true;
  }
  if (extracted.content_text && extracted.content_text !== item.content_text) {
    item.content_text = extracted.content_text;
    changed = true;
  }
  if (
    extracted.title &&
    item.title.length < shortTitleChars &&
    extracted.title.length > item.title.length
  ) {
    item.title = extracted.title;
    changed = true;
  }
  if (changed && !item.language && item.content_text) {
    item.language = detectLanguage(item.content_text);
  }

  return changed;
}

function applyToGroup(group: readonly FeedItem[], extracted: ExtractedContent, shortTitleChars: number): number {
  let changed = 0;
  for (const item of group) {
    if (mergeExtraction(item, extracted, shortTitleChars)) changed++;
  }
  return changed;
}

/**
 * Fill in thin items by fetching their own pages. Extractions are cached by item
 * URL in the `content` namespace, so each page is fetched at most once per TTL
 * window; an empty extraction is cached too and simply means "no improvement".
 */
export async function fulfillItems(
  ctx: PipelineContext,
  recipeName: string,
  items: FeedItem[],
): Promise<FulfillResult> {
  const { contents, fetcher, config } = ctx;
  const thresholds = config.pipeline;
  const shortTitle = thresholds.short_title_chars;

  const stats: FulfillStats = {
    items: items.length,
    candidates: 0,
    cacheHits: 0,
    fetched: 0,
    fetchFailed: 0,
    improved: 0,
  };
  const outcomes: UnitOutcome<boolean>[] = [];

  const groups = new Map<string, FeedItem[]>();
  for (const item of items) {
    if (hasSubstantialContent(item, thresholds)) continue;
    stats.candidates++;
    const group = groups.get(item.url);
    if (group) group.push(item);
    else groups.set(item.url, [item]);
  }

  if (groups.size === 0) {
    logger.info({ recipe: recipeName, items: items.length }, `${recipeName}: all ${items.length} items have substantial content`);
    return { items, outcomes, stats };
  }

  logger.info(
    { recipe: recipeName, candidates: stats.candidates, items: items.length },
    `${recipeName}: ${stats.candidates}/${items.length} items need content`,
  );

  const settle = (url: string, group: readonly FeedItem[], extracted: ExtractedContent): void => {
    const changed = applyToGroup(group, extracted, shortTitle);
    stats.improved += changed;
    outcomes.push(ok(url, changed > 0));
  };

  const cached = contents.batchGet([...groups.keys()], config.cache.content_ttl_ms);
  const misses: string[] = [];

  for (const [url, group] of groups) {
    const payload = cached.get(url) ?? null;
    const extracted = payload === null ? null : deserializeExtraction(payload);
    if (extracted === null) {
      if (payload !== null) {
        logger.warn({ recipe: recipeName, url }, 'Discarding unreadable cached extraction');
      }
      misses.push(url);
      continue;
    }
    stats.cacheHits++;
    settle(url, group, extracted);
  }

  if (misses.length > 0) {
    logger.info({ recipe: recipeName, urls: misses.length }, `${recipeName}: fetching content for ${misses.length} items`);
  }

  const results = await fetcher.fetchMany(misses, { onProgress: progressLogger(recipeName, 'content') });

  for (const result of results) {
    const group = groups.get(result.key);
    if (!group) continue;

    if (result.content === null) {
      recordFetch(contents, result);
      stats.fetchFailed++;
      const reason = result.error ?? 'unknown fetch failure';
      logger.warn({ recipe: recipeName, url: result.key, error: reason }, 'Failed to fetch item content');
      outcomes.push(skipped(result.key, reason));
      continue;
    }

    stats.fetched++;
    const extracted = extractContent(result.content, result.key);
    recordFetch(contents, result, serializeExtraction(extracted));

    if (!extracted.content_html && !extracted.content_text) {
      logger.debug({ recipe: recipeName, url: result.key }, 'Fetched page yielded no extractable content');
    }
    settle(result.key, group, extracted);
  }

  logger.info({ recipe: recipeName, ...stats }, `${recipeName}: content fulfillment complete`);
  return { items, outcomes, stats };
}
