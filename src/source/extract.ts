import { JSDOM } from 'jsdom';
import { franc } from 'franc-min';
import { z } from 'zod';
import { logger } from '../shared/logger.js';

export interface ExtractedContent {
  title: string | null;
  content_html: string | null;
  content_text: string | null;
}

/**
 * How a content container is located. `selector` strategies win on their first
 * match; `largest-block` picks the matching element with the most text.
 */
export type ExtractionStrategy =
  | { kind: 'selector'; selector: string }
  | { kind: 'largest-block'; selector: string };

export const DEFAULT_STRATEGIES: readonly ExtractionStrategy[] = [
  { kind: 'selector', selector: 'article' },
  { kind: 'selector', selector: 'main' },
  { kind: 'selector', selector: '.post-content' },
  { kind: 'selector', selector: '.entry-content' },
  { kind: 'selector', selector: '.article-content' },
  { kind: 'selector', selector: '#content' },
  { kind: 'largest-block', selector: 'div' },
];

const STRIPPED_ELEMENTS = 'script, style, iframe, noscript';

export const EMPTY_EXTRACTION: Readonly<ExtractedContent> = Object.freeze({
  title: null,
  content_html: null,
  content_text: null,
});

// Serialized form stored in the `content` cache namespace.
export const ExtractedContentSchema = z.object({
  title: z.string().nullable(),
  content_html: z.string().nullable(),
  content_text: z.string().nullable(),
});

export function serializeExtraction(content: ExtractedContent): string {
  return JSON.stringify({
    title: content.title,
    content_html: content.content_html,
    content_text: content.content_text,
  });
}

/** Returns null when the payload is not a serialized extraction. */
export function deserializeExtraction(payload: string): ExtractedContent | null {
  let raw: unknown;
  try {
    raw = JSON.parse(payload);
  } catch {
    return null;
  }
  const parsed = ExtractedContentSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Text of every descendant text node, trimmed and joined by single spaces.
 */
export function blockText(element: Element): string {
  const doc = element.ownerDocument;
  // NodeFilter.SHOW_TEXT
  const walker = doc.createTreeWalker(element, 4);
  const parts: string[] = [];
  for (let node = walker.nextNode(); node; node = walker.nextNode()) {
    const text = node.textContent ? collapse(node.textContent) : '';
    if (text) parts.push(text);
  }
  return parts.join(' ');
}

function locate(doc: Document, strategy: ExtractionStrategy): Element | null {
  switch (strategy.kind) {
    case 'selector':
      return doc.querySelector(strategy.selector);
    case 'largest-block': {
      let best: Element | null = null;
      let bestLength = -1;
      // strict comparison keeps the earliest element on ties
      for (const el of Array.from(doc.querySelectorAll(strategy.selector))) {
        const length = (el.textContent ?? '').length;
        if (length > bestLength) {
          best = el;
          bestLength = length;
        }
      }
      return best;
    }
  }
}

/**
 * Best-effort article extraction from a fetched page.
 * Never throws: parse failures return the all-null result.
 */
export function extractContent(
  html: string,
  sourceUrl: string,
  strategies: readonly ExtractionStrategy[] = DEFAULT_STRATEGIES,
): ExtractedContent {
  let dom: JSDOM | null = null;
  try {
    dom = new JSDOM(html, { url: sourceUrl });
    const { document } = dom.window;

    const titleText = document.querySelector('title')?.textContent;
    const title = titleText ? collapse(titleText) || null : null;

    let container: Element | null = null;
    for (const strategy of strategies) {
      container = locate(document, strategy);
      if (container) break;
    }

    if (!container) {
      return { ...EMPTY_EXTRACTION, title };
    }

    for (const el of Array.from(container.querySelectorAll(STRIPPED_ELEMENTS))) {
      el.remove();
    }

    const text = blockText(container);
    return {
      title,
      content_html: container.outerHTML,
      content_text: text || null,
    };
  } catch (err) {
    logger.debug({ url: sourceUrl, error: err instanceof Error ? err.message : String(err) }, 'Extraction failed');
    return { ...EMPTY_EXTRACTION };
  } finally {
    dom?.window.close();
  }
}

/**
 * Detect language from text. Maps ISO 639-3 to short codes.
 */
export function detectLanguage(text: string): string | null {
  if (!text || text.length < 20) return null;

  const iso3 = franc(text);
  if (iso3 === 'und') return null;

  const map: Record<string, string> = {
    eng: 'en',
    cmn: 'zh',
    zho: 'zh',
    jpn: 'ja',
    kor: 'ko',
    fra: 'fr',
    deu: 'de',
    spa: 'es',
    por: 'pt',
    rus: 'ru',
    ara: 'ar',
  };

  return map[iso3] ?? iso3;
}
