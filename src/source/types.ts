export interface Author {
  name: string;
  url?: string;
  avatar?: string;
}

/**
 * One parsed feed entry. Fulfillment mutates `title`, `content_html`,
 * `content_text` and `language` in place.
 */
export interface FeedItem {
  id: string;
  url: string;
  title: string;
  content_html: string | null;
  content_text: string | null;
  summary: string | null;
  date_published: Date;
  author: Author | null;
  tags: string[];
  language: string | null;
  image: string | null;
  external_url: string | null;
}
