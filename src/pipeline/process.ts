import type { Recipe } from '../source/recipes.js';
import type { FeedItem } from '../source/types.js';
import { logger } from '../shared/logger.js';
import { acquireFeeds, type AcquireStats } from './acquire.js';
import { fulfillItems, type FulfillStats } from './fulfill.js';
import { skippedUnits, type PipelineContext } from './types.js';

export interface RecipeResult {
  name: string;
  items: FeedItem[];
  duplicates: number;
  acquire: AcquireStats;
  fulfill: FulfillStats | null;
  skipped: Array<{ key: string; reason: string }>;
}

/** Keep the first item per id; feeds that share entries would otherwise repeat them. */
export function dedupeItems(items: readonly FeedItem[]): FeedItem[] {
  const seen = new Set<string>();
  const out: FeedItem[] = [];
  for (const item of items) {
    if (seen.has(item.id)) continue;
    seen.add(item.id);
    out.push(item);
  }
  return out;
}

export async function processRecipe(ctx: PipelineContext, name: string, recipe: Recipe): Promise<RecipeResult> {
  logger.info({ recipe: name, feeds: recipe.urls.length }, `${name} processing ${recipe.urls.length} feeds`);

  const acquired = await acquireFeeds(ctx, name, recipe);
  const items = dedupeItems(acquired.items);
  const skipped = skippedUnits(acquired.outcomes);

  let fulfill: FulfillStats | null = null;
  if (recipe.fulfill && items.length > 0) {
    const fulfilled = await fulfillItems(ctx, name, items);
    fulfill = fulfilled.stats;
    skipped.push(...skippedUnits(fulfilled.outcomes));
  }

  return {
    name,
    items,
    duplicates: acquired.items.length - items.length,
    acquire: acquired.stats,
    fulfill,
    skipped,
  };
}
