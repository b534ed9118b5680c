import { describe, it, expect, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { runScheduledForge, startScheduler, stopScheduler } from '../scheduler.js';
import { generateDefaultConfig, type Config } from '../../shared/config.js';
import { ConfigError } from '../../shared/errors.js';
import { routeFetch } from '../../pipeline/__tests__/fixtures.js';

const originalFetch = globalThis.fetch;
let dir: string | null = null;

afterEach(() => {
  stopScheduler();
  globalThis.fetch = originalFetch;
  if (dir) fs.rmSync(dir, { recursive: true, force: true });
  dir = null;
});

function makeConfig(cron = '45 * * * *'): Config {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'feedsmith-schedule-'));
  const recipesPath = path.join(dir, 'recipes.yaml');
  fs.writeFileSync(recipesPath, 'recipes:\n  Solo:\n    urls:\n      - https://solo.test/feed.xml\n');

  const base = generateDefaultConfig();
  return {
    ...base,
    cache: { ...base.cache, path: ':memory:' },
    output: { ...base.output, dir: path.join(dir, 'out') },
    recipes_path: recipesPath,
    schedule: { cron },
  };
}

describe('runScheduledForge', () => {
  it('skips a tick while the previous run is still going', async () => {
    routeFetch({});
    const config = makeConfig();

    const first = runScheduledForge(config);
    const second = await runScheduledForge(config);
    const summary = await first;

    expect(second).toBeNull();
    expect(summary?.recipes.map((r) => r.name)).toEqual(['Solo']);
  });

  it('returns null when the recipes file cannot be read', async () => {
    const config = { ...makeConfig(), recipes_path: '/nonexistent/recipes.yaml' };
    expect(await runScheduledForge(config)).toBeNull();
  });
});

describe('startScheduler', () => {
  it('rejects an invalid cron expression', () => {
    expect(() => startScheduler(makeConfig('not a cron'))).toThrow(ConfigError);
  });

  it('accepts a valid expression', () => {
    expect(() => startScheduler(makeConfig('*/5 * * * *'))).not.toThrow();
  });
});
