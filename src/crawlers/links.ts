import type { CheerioAPI } from 'cheerio';
import type { AnyNode } from 'domhandler';
import { asString, isRecord } from '../extractors/payload';
import { decodeEntities } from '../extractors/text';
import { EmbeddedPayloads } from '../types/crawl';
import { canonicalizeUrl } from '../utils/url';

export interface PageLink {
  url: string;
  title?: string;
}

const LINK_ATTRIBUTES = ['href', 'data-link', 'data-url'];
const PAYLOAD_URL_KEYS = ['url', 'link', 'content_url', 'msg_link', 'article_url'];
const MAX_PAYLOAD_DEPTH = 6;

export function linkOf($: CheerioAPI, element: AnyNode, baseUrl: string): string | null {
  const node = $(element);
  for (const attribute of LINK_ATTRIBUTES) {
    const value = node.attr(attribute);
    const url = value && !value.startsWith('#') ? canonicalizeUrl(decodeEntities(value), baseUrl) : null;
    if (url) return url;
  }
  const nested = node.find('a[href]').first().attr('href');
  return nested ? canonicalizeUrl(decodeEntities(nested), baseUrl) : null;
}

/** Every navigable link in document order, canonicalized, first occurrence kept. */
export function pageLinks($: CheerioAPI, baseUrl: string): PageLink[] {
  const links: PageLink[] = [];
  const seen = new Set<string>();
  $('a[href], [data-link], [data-url]').each((_, element) => {
    const url = linkOf($, element, baseUrl);
    if (!url || seen.has(url)) return;
    seen.add(url);
    const node = $(element);
    const title = node.attr('title')?.trim() || node.text().replace(/\s+/g, ' ').trim();
    links.push({ url, title: title || undefined });
  });
  return links;
}

function parseJsonString(value: string): unknown {
  const trimmed = value.trim();
  if (!trimmed.startsWith('{') && !trimmed.startsWith('[')) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(decodeEntities(trimmed));
    return parsed;
  } catch {
    return undefined;
  }
}

function walkPayload(value: unknown, baseUrl: string, out: PageLink[], depth: number): void {
  if (depth > MAX_PAYLOAD_DEPTH) return;

  if (typeof value === 'string') {
    const parsed = parseJsonString(value);
    if (parsed !== undefined) walkPayload(parsed, baseUrl, out, depth + 1);
    return;
  }
  if (Array.isArray(value)) {
    for (const item of value) walkPayload(item, baseUrl, out, depth + 1);
    return;
  }
  if (!isRecord(value)) return;

  for (const key of PAYLOAD_URL_KEYS) {
    const raw = asString(value[key]);
    if (!raw) continue;
    const url = canonicalizeUrl(decodeEntities(raw), baseUrl);
    if (url) {
      out.push({ url, title: asString(value.title) });
      break;
    }
  }
  for (const [key, child] of Object.entries(value)) {
    if (PAYLOAD_URL_KEYS.includes(key)) continue;
    walkPayload(child, baseUrl, out, depth + 1);
  }
}

/** Links found anywhere inside the named payloads (all of them when no keys are given). */
export function payloadLinks(payloads: EmbeddedPayloads, baseUrl: string, keys?: readonly string[]): PageLink[] {
  const out: PageLink[] = [];
  const names = keys ?? Object.keys(payloads);
  for (const name of names) {
    walkPayload(payloads[name], baseUrl, out, 0);
  }

  const seen = new Set<string>();
  return out.filter((link) => {
    if (seen.has(link.url)) return false;
    seen.add(link.url);
    return true;
  });
}
