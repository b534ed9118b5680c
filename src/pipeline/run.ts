import { CacheStore } from '../cache/cacheStore.js';
import { openDb, type Db } from '../db/db.js';
import { ConcurrentFetcher } from '../fetch/fetcher.js';
import { buildJsonFeed, writeJsonFeed } from '../output/jsonFeed.js';
import type { Config } from '../shared/config.js';
import { describeError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { DAY_MS, resolvePath } from '../shared/utils.js';
import { allRecipeUrls, selectRecipes, type Recipe, type RecipeCollection } from '../source/recipes.js';
import type { FeedItem } from '../source/types.js';
import { processRecipe } from './process.js';
import type { PipelineContext } from './types.js';

export interface RunOptions {
  /** Recipes to process; all when empty or omitted. */
  recipeNames?: string[];
  /** Run the cache cleanup sweep first (default true). */
  cleanup?: boolean;
  now?: () => number;
}

export interface RecipeSummary {
  name: string;
  items: number;
  skipped: Array<{ key: string; reason: string }>;
  output: string | null;
  error: string | null;
}

export interface RunSummary {
  recipes: RecipeSummary[];
  cleaned: number;
  durationMs: number;
}

export interface CacheStores {
  feeds: CacheStore;
  contents: CacheStore;
}

export function openStores(db: Db, now?: () => number): CacheStores {
  return {
    feeds: new CacheStore(db, 'feeds', { now }),
    contents: new CacheStore(db, 'content', { now }),
  };
}

/**
 * Feed rows are pruned by age and by absence from every recipe; content rows are
 * keyed by item URLs no recipe lists, so they only expire by age.
 */
export function cleanupCaches(stores: CacheStores, config: Config, recipes: RecipeCollection): number {
  const retentionMs = config.cache.retention_days * DAY_MS;
  const deleted =
    stores.feeds.cleanup(retentionMs, allRecipeUrls(recipes)) + stores.contents.cleanup(retentionMs);
  logger.info({ deleted }, `Cleaned up ${deleted} entries (old or orphaned)`);
  return deleted;
}

export function warnPersistentFailures(feeds: CacheStore, threshold: number): string[] {
  const failing = [...feeds.listFailing(threshold)];
  if (failing.length > 0) {
    logger.warn({ count: failing.length, threshold, feeds: failing.slice(0, 20) }, 'Feeds failing persistently');
  }
  return failing;
}

async function forgeRecipe(
  ctx: PipelineContext,
  name: string,
  recipe: Recipe,
  outputDir: string,
): Promise<RecipeSummary> {
  let items: FeedItem[] = [];
  let skipped: RecipeSummary['skipped'] = [];
  let error: string | null = null;

  try {
    const result = await processRecipe(ctx, name, recipe);
    items = result.items;
    skipped = result.skipped;
  } catch (err) {
    error = describeError(err);
    logger.error({ recipe: name, error }, 'Recipe processing failed, writing empty feed');
  }

  let output: string | null = null;
  try {
    output = writeJsonFeed(outputDir, buildJsonFeed(name, items, ctx.config.output.base_url));
    logger.info({ recipe: name, output, items: items.length }, `${name} generated feed file: ${output}, ${items.length} items`);
  } catch (err) {
    error = error ?? describeError(err);
    logger.error({ recipe: name, error: describeError(err) }, 'Failed to write feed file');
  }

  return { name, items: items.length, skipped, output, error };
}

/**
 * One full run: open the cache (fatal on failure), sweep it, then forge every
 * selected recipe into a JSON Feed file. The fetcher and database are released on
 * every exit path.
 */
export async function runForge(
  config: Config,
  recipes: RecipeCollection,
  options: RunOptions = {},
): Promise<RunSummary> {
  const startTime = Date.now();
  const now = options.now ?? Date.now;
  const selected = selectRecipes(recipes, options.recipeNames ?? []);

  const db = openDb(config.cache.path);
  const stores = openStores(db, now);
  const fetcher = ConcurrentFetcher.fromConfig(config.fetch);
  const ctx: PipelineContext = { ...stores, fetcher, config, now };

  const summary: RunSummary = { recipes: [], cleaned: 0, durationMs: 0 };

  try {
    if (options.cleanup ?? true) {
      summary.cleaned = cleanupCaches(stores, config, recipes);
    }
    warnPersistentFailures(stores.feeds, config.cache.fail_alert_threshold);

    const outputDir = resolvePath(config.output.dir);
    for (const [name, recipe] of Object.entries(selected)) {
      summary.recipes.push(await forgeRecipe(ctx, name, recipe, outputDir));
    }
  } finally {
    fetcher.close();
    db.close();
  }

  summary.durationMs = Date.now() - startTime;
  logger.info(
    { recipes: summary.recipes.length, cleaned: summary.cleaned, durationMs: summary.durationMs },
    'Run complete',
  );
  return summary;
}
