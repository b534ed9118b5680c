#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { loadConfig, writeDefaultConfig, type Config } from '../shared/config.js';
import { FeedsmithError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { resolvePath } from '../shared/utils.js';
import { openDb, type Db } from '../db/db.js';
import { loadRecipes, writeSampleRecipes } from '../source/recipes.js';
import { cleanupCaches, openStores, runForge, type CacheStores } from '../pipeline/run.js';
import { startScheduler, stopScheduler, runScheduledForge } from '../schedule/scheduler.js';

const program = new Command();

program
  .name('feedsmith')
  .description('Forge JSON Feeds from recipes of Atom/RSS sources')
  .version('0.1.0');

// === init ===
program
  .command('init')
  .description('Create a default config file and a sample recipes file')
  .option('-d, --dir <dir>', 'Target directory', '.')
  .action((opts: { dir: string }) => {
    const dir = resolvePath(opts.dir);
    const configPath = path.join(dir, 'feedsmith.config.yaml');
    const recipesPath = path.join(dir, 'recipes.yaml');

    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log(`✓ ${configPath} created`);
    } else {
      log(`✓ ${configPath} already exists`);
    }

    if (!fs.existsSync(recipesPath)) {
      writeSampleRecipes(recipesPath);
      log(`✓ ${recipesPath} created`);
    } else {
      log(`✓ ${recipesPath} already exists`);
    }
  });

// === run ===
program
  .command('run [recipes...]')
  .description('Fetch, enrich and write feeds for all (or the named) recipes')
  .option('--no-cleanup', 'Skip the cache cleanup sweep')
  .action(async (names: string[], opts: { cleanup: boolean }) => {
    const config = await loadConfig();
    const recipes = loadRecipes(resolvePath(config.recipes_path));
    const summary = await runForge(config, recipes, { recipeNames: names, cleanup: opts.cleanup });

    for (const r of summary.recipes) {
      const status = r.error ? '✗' : '✓';
      log(`${status} ${r.name.padEnd(24)} ${String(r.items).padStart(4)} items  ${r.skipped.length} skipped  ${r.output ?? '(not written)'}`);
    }
    log(`\n${summary.recipes.length} recipes, ${summary.cleaned} cache rows cleaned, ${(summary.durationMs / 1000).toFixed(1)}s`);
  });

// === cleanup ===
program
  .command('cleanup')
  .description('Delete expired and orphaned cache entries')
  .action(async () => {
    const { config, stores, close } = await openCache();
    try {
      const recipes = loadRecipes(resolvePath(config.recipes_path));
      const deleted = cleanupCaches(stores, config, recipes);
      log(`✓ ${deleted} cache entries deleted`);
    } finally {
      close();
    }
  });

// === cache ===
const cacheCmd = program.command('cache').description('Inspect the feed cache');

cacheCmd
  .command('failing')
  .description('List feeds at or above a consecutive-failure threshold')
  .option('-m, --min <n>', 'Minimum fail count (defaults to cache.fail_alert_threshold)')
  .option('--content', 'Inspect the item content cache instead of feeds')
  .action(async (opts: { min?: string; content?: boolean }) => {
    const { config, stores, close } = await openCache();
    try {
      const store = opts.content ? stores.contents : stores.feeds;
      const min = opts.min ? parseInt(opts.min, 10) : config.cache.fail_alert_threshold;
      const keys = store.listFailing(min);
      if (keys.size === 0) {
        log(`No entries with ${min}+ consecutive failures.`);
        return;
      }
      for (const key of keys) {
        const entry = store.getEntry(key);
        log(`${String(entry?.fail_count ?? '?').padStart(4)}  ${key}  ${entry?.error_reason ?? ''}`);
      }
      log(`\n${keys.size} failing entries`);
    } finally {
      close();
    }
  });

cacheCmd
  .command('show <key>')
  .description('Show one cache entry')
  .option('--content', 'Look in the item content cache instead of feeds')
  .option('--body', 'Print the cached payload')
  .action(async (key: string, opts: { content?: boolean; body?: boolean }) => {
    const { stores, close } = await openCache();
    try {
      const store = opts.content ? stores.contents : stores.feeds;
      const entry = store.getEntry(key);
      if (!entry) {
        log(`No cache entry for ${key}`);
        process.exitCode = 1;
        return;
      }
      log(`key:          ${entry.key}`);
      log(`namespace:    ${entry.namespace}`);
      log(`created_at:   ${new Date(entry.created_at).toISOString()}`);
      log(`updated_at:   ${new Date(entry.updated_at).toISOString()}`);
      log(`fail_count:   ${entry.fail_count}`);
      log(`error_reason: ${entry.error_reason ?? '-'}`);
      log(`content:      ${entry.content === null ? '(none)' : `${entry.content.length} chars`}`);
      if (opts.body && entry.content !== null) {
        log('');
        log(entry.content);
      }
    } finally {
      close();
    }
  });

// === doctor ===
program
  .command('doctor')
  .description('Check config, recipes and cache health')
  .action(async () => {
    const results: string[] = [];
    let config: Config;
    try {
      config = await loadConfig();
      results.push('Config: ok');
    } catch (err) {
      log(`✗ Config: error (${err instanceof Error ? err.message : String(err)})`);
      process.exitCode = 1;
      return;
    }

    try {
      const recipes = loadRecipes(resolvePath(config.recipes_path));
      const feeds = Object.values(recipes).reduce((n, r) => n + r.urls.length, 0);
      results.push(`Recipes: ${Object.keys(recipes).length} (${feeds} feeds)`);
    } catch (err) {
      results.push(`Recipes: error (${err instanceof Error ? err.message : String(err)})`);
    }

    const dbPath = resolvePath(config.cache.path);
    if (!fs.existsSync(dbPath)) {
      results.push('Cache: missing (created on first run)');
    } else {
      try {
        const db = openDb(dbPath);
        try {
          const stores = openStores(db);
          const feeds = stores.feeds.stats();
          const contents = stores.contents.stats();
          const failing = stores.feeds.listFailing(config.cache.fail_alert_threshold).size;
          results.push(
            `Cache: ${feeds.total} feeds (${feeds.failing} failing, ${failing} past threshold), ${contents.total} pages`,
          );
        } finally {
          db.close();
        }
      } catch (err) {
        results.push(`Cache: error (${err instanceof Error ? err.message : String(err)})`);
      }
    }

    log(`✓ ${results.join(' | ')}`);
  });

// === schedule ===
program
  .command('schedule')
  .description('Run on schedule.cron until interrupted')
  .option('--now', 'Also run once immediately')
  .action(async (opts: { now?: boolean }) => {
    const config = await loadConfig();
    startScheduler(config);
    log(`✓ Scheduler running (${config.schedule.cron}). Ctrl+C to stop.`);

    const shutdown = () => {
      stopScheduler();
      process.exit(0);
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);

    if (opts.now) {
      await runScheduledForge(config);
    }
  });

// === Helper to open the cache ===
async function openCache(): Promise<{
  config: Config;
  db: Db;
  stores: CacheStores;
  close: () => void;
}> {
  const config = await loadConfig();
  const db = openDb(config.cache.path);
  return { config, db, stores: openStores(db), close: () => db.close() };
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  if (err instanceof FeedsmithError) {
    logger.error({ code: err.code, details: err.details }, err.message);
  } else {
    logger.error({ error: err instanceof Error ? err.stack : String(err) }, 'Unexpected failure');
  }
  process.exitCode = 1;
});
