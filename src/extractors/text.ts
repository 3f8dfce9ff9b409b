import type { Cheerio, CheerioAPI } from 'cheerio';
import { AnyNode, isDocument, isTag, isText } from 'domhandler';
import { stripTracking } from '../utils/url';

const SKIPPED_TAGS = new Set(['script', 'style', 'noscript', 'template', 'svg', 'iframe']);

const BLOCK_TAGS = new Set([
  'address', 'article', 'aside', 'blockquote', 'dd', 'div', 'dl', 'dt', 'figcaption', 'figure',
  'footer', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'header', 'hr', 'li', 'main', 'nav', 'ol', 'p',
  'pre', 'section', 'table', 'tr', 'ul',
]);

function collectText(node: AnyNode, parts: string[]): void {
  if (isText(node)) {
    parts.push(node.data);
    return;
  }
  if (isDocument(node)) {
    for (const child of node.children) {
      collectText(child, parts);
    }
    return;
  }
  if (!isTag(node)) {
    return;
  }

  const name = node.name.toLowerCase();
  if (SKIPPED_TAGS.has(name)) return;
  if (name === 'br') {
    parts.push('\n');
    return;
  }

  const block = BLOCK_TAGS.has(name);
  if (block) parts.push('\n');
  for (const child of node.children) {
    collectText(child, parts);
  }
  if (block) parts.push('\n');
}

/** Collapses runs of whitespace per line and drops blank lines. */
export function normalizeWhitespace(raw: string): string {
  return raw
    .split(/\r?\n/)
    .map((line) => line.replace(/[\s\u200b\ufeff]+/g, ' ').trim())
    .filter(Boolean)
    .join('\n');
}

export function blockText<T extends AnyNode>(selection: Cheerio<T>): string {
  const parts: string[] = [];
  selection.each((_, node) => collectText(node, parts));
  return normalizeWhitespace(parts.join(''));
}

export function inlineText<T extends AnyNode>(selection: Cheerio<T>): string {
  return selection.first().text().replace(/\s+/g, ' ').trim();
}

export function firstText($: CheerioAPI, selectors: readonly string[]): string | undefined {
  for (const selector of selectors) {
    const value = inlineText($(selector));
    if (value) return value;
  }
  return undefined;
}

export function firstAttr($: CheerioAPI, selectors: readonly string[], attribute: string): string | undefined {
  for (const selector of selectors) {
    const value = $(selector).first().attr(attribute)?.trim();
    if (value) return value;
  }
  return undefined;
}

export function stripAuthorPrefix(value: string): string {
  return value.replace(/^(?:(?:作者|文|author|by)(?:\s*[:：|/]|\s+)|作者)\s*/i, '').trim();
}

const ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&#x27;': "'",
  '&nbsp;': ' ',
};

export function decodeEntities(value: string): string {
  return value.replace(/&(amp|lt|gt|quot|nbsp|#39|#x27);/g, (entity) => ENTITIES[entity] ?? entity);
}

/** Image sources inside `root`, absolute and tracking-free, first occurrence wins. */
export function extractImages<T extends AnyNode>(
  $: CheerioAPI,
  root: Cheerio<T>,
  baseUrl: string,
): string[] {
  const images: string[] = [];
  root.find('img').each((_, element) => {
    const img = $(element);
    const source = img.attr('data-src') || img.attr('src') || img.attr('data-backup-src');
    if (!source || source.startsWith('data:')) return;
    const absolute = stripTracking(source, baseUrl);
    if (absolute && !images.includes(absolute)) {
      images.push(absolute);
    }
  });
  return images;
}

const LOCAL_DATE_TIME =
  /^(\d{4})\s*[-/.年]\s*(\d{1,2})\s*[-/.月]\s*(\d{1,2})\s*日?(?:[\sT]+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;
const ZONED_ISO = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Parses the publish-time formats seen on the platform into ISO 8601 UTC.
 * Values without a zone are read at `offsetMinutes` east of UTC.
 */
export function parsePublishTime(value: unknown, offsetMinutes: number): string | null {
  if (typeof value === 'number') {
    return fromEpoch(value);
  }
  if (typeof value !== 'string') {
    return null;
  }

  const trimmed = value.trim();
  if (!trimmed) return null;

  if (/^\d{9,13}$/.test(trimmed)) {
    return fromEpoch(Number(trimmed));
  }

  if (ZONED_ISO.test(trimmed)) {
    const parsed = new Date(trimmed);
    return Number.isNaN(parsed.getTime()) ? null : parsed.toISOString();
  }

  const match = trimmed.match(LOCAL_DATE_TIME);
  if (!match) {
    return null;
  }

  const [, year, month, day, hour = '0', minute = '0', second = '0'] = match;
  const monthIndex = Number(month) - 1;
  const dayOfMonth = Number(day);
  if (monthIndex < 0 || monthIndex > 11 || dayOfMonth < 1 || dayOfMonth > 31) {
    return null;
  }

  const utc = Date.UTC(Number(year), monthIndex, dayOfMonth, Number(hour), Number(minute), Number(second));
  return new Date(utc - offsetMinutes * 60_000).toISOString();
}

function fromEpoch(value: number): string | null {
  if (!Number.isFinite(value) || value <= 0) return null;
  const date = new Date(value >= 1e12 ? value : value * 1000);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}
