/**
 * Normalization of raw HN items into Article and Comment records
 */

import type { ApiItem, Article, Comment, StoryType } from './types.js';

/**
 * Domain used for self-posts (Ask HN, polls, jobs without a link)
 */
export const SELF_POST_DOMAIN = 'news.ycombinator.com';

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

/**
 * Decode HTML entities in a single pass so `&amp;lt;` stays `&lt;`
 */
export function unescapeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity[0] === '#') {
      const codePoint =
        entity[1] === 'x' || entity[1] === 'X'
          ? parseInt(entity.slice(2), 16)
          : parseInt(entity.slice(1), 10);
      if (!Number.isFinite(codePoint) || codePoint > 0x10ffff) {
        return match;
      }
      return String.fromCodePoint(codePoint);
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
  });
}

/**
 * Strip HTML tags and decode entities.
 * HN stores comment and story text as HTML with `<p>` separated paragraphs.
 */
export function cleanMarkup(html: string): string {
  const text = html
    .replace(/<p>/gi, '\n\n')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<a\s+href="([^"]*)"[^>]*>([^<]*)<\/a>/gi, (_match, href: string, label: string) =>
      href === label ? label : `${label} (${href})`
    )
    .replace(/<[^>]+>/g, '');

  return unescapeEntities(text)
    .replace(/[ \t]+\n/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Cap text at `maxLength` characters
 */
export function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? text.slice(0, maxLength) : text;
}

/**
 * Extract the display domain of a URL: lower-cased host without a `www.` prefix
 */
export function extractDomain(url: string | null | undefined): string {
  if (!url) {
    return SELF_POST_DOMAIN;
  }

  try {
    const hostname = new URL(url).hostname.toLowerCase();
    if (!hostname) return 'unknown';
    return hostname.startsWith('www.') ? hostname.slice(4) : hostname;
  } catch {
    return 'unknown';
  }
}

/**
 * Map an API item to a story type, or null when the item is not an article
 */
export function classifyStoryType(item: ApiItem): StoryType | null {
  switch (item.type) {
    case 'job':
      return 'job';
    case 'poll':
      return 'poll';
    case 'story':
      return /^ask hn\b/i.test(item.title?.trim() ?? '') ? 'ask' : 'story';
    default:
      return null;
  }
}

function toDate(unixSeconds: number | undefined): Date {
  return new Date((unixSeconds ?? 0) * 1000);
}

/**
 * Build an Article from an API item. Returns null for comments and poll options.
 */
export function toArticle(item: ApiItem, maxStoryTextLength: number): Article | null {
  const storyType = classifyStoryType(item);
  if (!storyType) {
    return null;
  }

  const url = item.url?.trim() || null;
  const storyText = item.text ? truncate(cleanMarkup(item.text), maxStoryTextLength) : '';

  return {
    id: String(item.id),
    title: item.title?.trim() || 'Untitled',
    url,
    domain: extractDomain(url),
    score: Math.max(0, item.score ?? 0),
    author: item.by ?? 'unknown',
    postedAt: toDate(item.time),
    commentCount: Math.max(0, item.descendants ?? 0),
    storyText: storyText || null,
    storyType,
  };
}

/**
 * Build a Comment from an API item. Returns null when the item has no usable text.
 */
export function toComment(
  item: ApiItem,
  position: { articleId: string; parentId: string | null; depth: number },
  maxLength: number
): Comment | null {
  const text = item.text ? truncate(cleanMarkup(item.text), maxLength) : '';
  if (!text) {
    return null;
  }

  return {
    id: String(item.id),
    articleId: position.articleId,
    parentId: position.parentId,
    author: item.by ?? 'unknown',
    text,
    postedAt: toDate(item.time),
    depth: position.depth,
  };
}
