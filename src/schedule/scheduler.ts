/**
 * Scheduler — node-cron job that repeats full runs on `schedule.cron`.
 * Started by `feedsmith schedule`.
 */

import cron from 'node-cron';
import type { Config } from '../shared/config.js';
import { ConfigError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { resolvePath } from '../shared/utils.js';
import { loadRecipes } from '../source/recipes.js';
import { runForge, type RunSummary } from '../pipeline/run.js';

let task: cron.ScheduledTask | null = null;
let running = false;

/**
 * Run once unless a previous run is still going. Recipes are re-read on every
 * tick so edits apply without a restart.
 */
export async function runScheduledForge(config: Config): Promise<RunSummary | null> {
  if (running) {
    logger.warn('Previous run still in progress, skipping this tick');
    return null;
  }

  running = true;
  logger.info('Scheduled run starting');
  try {
    const recipes = loadRecipes(resolvePath(config.recipes_path));
    const summary = await runForge(config, recipes);
    logger.info({ recipes: summary.recipes.length, durationMs: summary.durationMs }, 'Scheduled run complete');
    return summary;
  } catch (e) {
    logger.error({ error: e instanceof Error ? e.message : String(e) }, 'Scheduled run failed');
    return null;
  } finally {
    running = false;
  }
}

export function startScheduler(config: Config): void {
  const expression = config.schedule.cron;
  if (!cron.validate(expression)) {
    throw new ConfigError(`Invalid schedule.cron expression: ${expression}`);
  }

  task = cron.schedule(expression, () => {
    void runScheduledForge(config);
  });

  logger.info({ cron: expression }, 'Scheduler started');
}

/**
 * Stop the scheduled task (for graceful shutdown). An in-flight run finishes on its own.
 */
export function stopScheduler(): void {
  task?.stop();
  task = null;
  logger.info('Scheduler stopped');
}
