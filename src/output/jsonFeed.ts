import fs from 'node:fs';
import path from 'node:path';
import type { Author, FeedItem } from '../source/types.js';

export const JSON_FEED_VERSION = 'https://jsonfeed.org/version/1.1';

export interface JsonFeedItem {
  id: string;
  url: string;
  title: string;
  content_text?: string;
  content_html?: string;
  summary?: string;
  date_published: string;
  author?: Author;
  tags: string[];
  language?: string;
  image?: string;
  external_url?: string;
}

export interface JsonFeed {
  version: string;
  title: string;
  description: string;
  home_page_url: string;
  feed_url: string;
  items: JsonFeedItem[];
  authors: Author[];
  language: string;
  user_comment: string;
}

/** Drop null fields so they are omitted from the written document. */
function present<T>(value: T | null): T | undefined {
  return value === null ? undefined : value;
}

export function toJsonFeedItem(item: FeedItem): JsonFeedItem {
  return {
    id: item.id,
    url: item.url,
    title: item.title,
    content_text: present(item.content_text),
    content_html: present(item.content_html),
    summary: present(item.summary),
    date_published: item.date_published.toISOString(),
    author: present(item.author),
    tags: item.tags,
    language: present(item.language),
    image: present(item.image),
    external_url: present(item.external_url),
  };
}

/**
 * Assemble the JSON Feed document for one recipe, newest items first.
 */
export function buildJsonFeed(name: string, items: readonly FeedItem[], baseUrl: string): JsonFeed {
  const base = baseUrl.replace(/\/+$/, '');
  const sorted = [...items].sort((a, b) => b.date_published.getTime() - a.date_published.getTime());

  return {
    version: JSON_FEED_VERSION,
    title: name,
    description: `Aggregated feed for ${name}`,
    home_page_url: `${base}/tag/latest`,
    feed_url: `${base}/download/latest/${encodeURIComponent(name)}.json`,
    items: sorted.map(toJsonFeedItem),
    authors: [],
    language: 'en',
    user_comment: 'Generated by feedsmith',
  };
}

export function outputFileName(name: string): string {
  return `${name.replace(/[/\\]/g, '_')}.json`;
}

/** Write `<dir>/<title>.json` and return its path. */
export function writeJsonFeed(dir: string, feed: JsonFeed): string {
  fs.mkdirSync(dir, { recursive: true });
  const filePath = path.join(dir, outputFileName(feed.title));
  fs.writeFileSync(filePath, JSON.stringify(feed, null, 2), 'utf-8');
  return filePath;
}
