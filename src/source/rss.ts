import Parser from 'rss-parser';
import type { FilterRule } from './recipes.js';
import type { Author, FeedItem } from './types.js';
import { shouldIncludeItem } from './filters.js';
import { logger } from '../shared/logger.js';

interface CustomFeed {
  language?: string;
}

interface CustomItem {
  contentEncoded?: string;
  author?: unknown;
  mediaContent?: unknown[];
  source?: unknown;
}

const parser = new Parser<CustomFeed, CustomItem>({
  customFields: {
    feed: ['language'],
    item: [
      ['content:encoded', 'contentEncoded'],
      ['author', 'author'],
      ['media:content', 'mediaContent', { keepArray: true }],
      ['source', 'source'],
    ],
  },
});

type ParsedEntry = Parser.Item & CustomItem;

export interface ParseOptions {
  /** Entries published before this instant are dropped. */
  cutoff: Date;
  filters?: readonly FilterRule[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function firstString(...values: unknown[]): string | undefined {
  for (const v of values) {
    if (typeof v === 'string' && v.trim()) return v.trim();
    if (Array.isArray(v)) {
      const nested = firstString(...v);
      if (nested) return nested;
    }
  }
  return undefined;
}

export function parseDate(value: string | undefined): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

/** Primary language subtag, lower-cased (`en-US` → `en`). */
export function primaryLanguage(value: string | undefined): string | null {
  const tag = value?.split('-')[0]?.trim().toLowerCase();
  return tag ? tag : null;
}

function extractAuthor(entry: ParsedEntry): Author | null {
  // Atom <author><name>…</name><uri>…</uri></author> arrives as an object
  const raw = Array.isArray(entry.author) ? entry.author[0] : entry.author;
  if (isRecord(raw)) {
    const name = firstString(raw['name']);
    if (!name) return null;
    const url = firstString(raw['uri'], raw['href']);
    return url ? { name, url } : { name };
  }
  const name = firstString(raw, entry.creator);
  return name ? { name } : null;
}

/**
 * Content that starts with markup is HTML, anything else plain text. A summary is
 * only kept when distinct content exists; otherwise it becomes the content.
 */
function extractContent(entry: ParsedEntry): Pick<FeedItem, 'content_html' | 'content_text' | 'summary'> {
  const body = firstString(entry.contentEncoded, entry.content);
  const summary = firstString(entry.summary);

  const primary = body ?? summary;
  if (!primary) return { content_html: null, content_text: null, summary: null };

  const isHtml = primary.startsWith('<');
  return {
    content_html: isHtml ? primary : null,
    content_text: isHtml ? null : primary,
    summary: body && summary && summary !== body ? summary : null,
  };
}

function extractImage(entry: ParsedEntry): string | null {
  for (const media of entry.mediaContent ?? []) {
    const attrs = isRecord(media) && isRecord(media['$']) ? media['$'] : undefined;
    if (attrs && attrs['medium'] === 'image' && typeof attrs['url'] === 'string') {
      return attrs['url'];
    }
  }
  if (entry.enclosure?.type?.startsWith('image/')) {
    return entry.enclosure.url;
  }
  return null;
}

function extractTags(entry: ParsedEntry): string[] {
  const tags: string[] = [];
  for (const category of entry.categories ?? []) {
    const value: unknown = category;
    if (typeof value === 'string' && value.trim()) {
      tags.push(value.trim());
    } else if (isRecord(value) && isRecord(value['$'])) {
      // Atom <category term="…"/>
      const term = firstString(value['$']['term']);
      if (term) tags.push(term);
    }
  }
  return tags;
}

function extractExternalUrl(entry: ParsedEntry): string | null {
  if (isRecord(entry.source) && isRecord(entry.source['$'])) {
    return firstString(entry.source['$']['url'], entry.source['$']['href']) ?? null;
  }
  return null;
}

/**
 * Parse a raw Atom/RSS document into feed items.
 * Throws on malformed XML; per-entry problems are logged and the entry dropped.
 */
export async function parseFeedEntries(content: string, options: ParseOptions): Promise<FeedItem[]> {
  const feed = await parser.parseString(content);
  const language = primaryLanguage(feed.language);
  const filters = options.filters ?? [];
  const items: FeedItem[] = [];

  for (const entry of feed.items ?? []) {
    const url = entry.link?.trim();
    const title = entry.title?.trim();
    if (!url || !title) continue;

    const rawDate = entry.isoDate ?? entry.pubDate;
    if (!rawDate) {
      logger.warn({ url }, 'No date found for entry');
      continue;
    }
    const published = parseDate(rawDate);
    if (!published) {
      logger.warn({ url, date: rawDate }, 'Failed to parse entry date');
      continue;
    }
    if (published < options.cutoff) continue;

    if (!shouldIncludeItem(title, filters)) continue;

    items.push({
      id: url,
      url,
      title,
      ...extractContent(entry),
      date_published: published,
      author: extractAuthor(entry),
      tags: extractTags(entry),
      language,
      image: extractImage(entry),
      external_url: extractExternalUrl(entry),
    });
  }

  return items;
}
