import { vi } from 'vitest';
import { openDb, type Db } from '../../db/db.js';
import { ConcurrentFetcher } from '../../fetch/fetcher.js';
import { generateDefaultConfig, type Config } from '../../shared/config.js';
import type { FeedItem } from '../../source/types.js';
import { openStores } from '../run.js';
import type { PipelineContext } from '../types.js';

export const NOW = Date.parse('2024-01-12T00:00:00Z');

export interface FeedEntry {
  title: string;
  link: string;
  date: string;
  description?: string;
}

export function rssFeed(entries: FeedEntry[]): string {
  const items = entries
    .map(
      (e) => `<item>
      <title>${e.title}</title>
      <link>${e.link}</link>
      <pubDate>${new Date(e.date).toUTCString()}</pubDate>
      ${e.description === undefined ? '' : `<description>${e.description}</description>`}
    </item>`,
    )
    .join('\n');
  return `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0"><channel><title>Fixture</title><link>https://fixture.test</link>
${items}
</channel></rss>`;
}

export type Route = string | { status: number; statusText?: string; body?: string };

/**
 * Replace global fetch with a lookup table keyed by URL. Unknown URLs answer 404.
 */
export function routeFetch(routes: Record<string, Route>) {
  const mock = vi.fn().mockImplementation((url: string) => {
    const route = routes[url];
    if (route === undefined) {
      return Promise.resolve(new Response('missing', { status: 404, statusText: 'Not Found' }));
    }
    if (typeof route === 'string') {
      return Promise.resolve(new Response(route, { status: 200 }));
    }
    return Promise.resolve(new Response(route.body ?? '', { status: route.status, statusText: route.statusText }));
  });
  globalThis.fetch = mock;
  return mock;
}

export function testConfig(overrides: Partial<Config> = {}): Config {
  const base = generateDefaultConfig();
  return {
    ...base,
    cache: { ...base.cache, path: ':memory:' },
    ...overrides,
  };
}

export interface TestContext extends PipelineContext {
  db: Db;
  close: () => void;
}

export function makeContext(config: Config = testConfig()): TestContext {
  const db = openDb(':memory:');
  const now = () => NOW;
  const fetcher = ConcurrentFetcher.fromConfig(config.fetch);
  return {
    ...openStores(db, now),
    fetcher,
    config,
    now,
    db,
    close: () => {
      fetcher.close();
      db.close();
    },
  };
}

export function makeItem(overrides: Partial<FeedItem> & Pick<FeedItem, 'url'>): FeedItem {
  return {
    id: overrides.url,
    title: 'Untitled entry',
    content_html: null,
    content_text: null,
    summary: null,
    date_published: new Date('2024-01-10T00:00:00Z'),
    author: null,
    tags: [],
    language: null,
    image: null,
    external_url: null,
    ...overrides,
  };
}
