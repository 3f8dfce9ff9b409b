import { EmbeddedPayloads } from '../types/crawl';
import { decodeEntities } from './text';

/** Article metadata pulled from embedded payloads, with raw values left for the caller to normalize. */
export interface PayloadMeta {
  title?: string;
  description?: string;
  author?: string;
  accountName?: string;
  publishTime?: string | number;
  coverImage?: string;
  contentHtml?: string;
  contentText?: string;
  readCount?: number;
  likeCount?: number;
  link?: string;
  biz?: string;
}

const INLINE_VARIABLES = [
  'msg_title',
  'msg_desc',
  'msg_cdn_url',
  'msg_link',
  'nickname',
  'user_name',
  'author',
  'publish_time',
  'ct',
  'read_num',
  'like_num',
  'old_like_num',
  'biz',
  'content_noencode',
] as const;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asString(value: unknown): string | undefined {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed ? trimmed : undefined;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
}

export function asCount(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Math.max(0, Math.floor(value));
  }
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    return Number(value.trim());
  }
  return undefined;
}

function decodeJsString(value: string): string {
  return value.replace(/\\(x[0-9a-fA-F]{2}|u[0-9a-fA-F]{4}|.)/g, (_, escape: string) => {
    if (escape.length > 1) {
      return String.fromCharCode(parseInt(escape.slice(1), 16));
    }
    switch (escape) {
      case 'n':
        return '\n';
      case 'r':
        return '\r';
      case 't':
        return '\t';
      default:
        return escape;
    }
  });
}

/**
 * Reads `var name = "..."` style assignments from inline scripts. Pages that were
 * captured without running scripts still carry their metadata this way.
 */
export function readInlineVariables(html: string): Record<string, string> {
  const found: Record<string, string> = {};
  for (const name of INLINE_VARIABLES) {
    const pattern = new RegExp(
      `(?:\\bvar|\\blet|\\bconst|window\\.)\\s*${name}\\s*=\\s*(?:"((?:\\\\.|[^"\\\\])*)"|'((?:\\\\.|[^'\\\\])*)'|(\\d+))`,
    );
    const match = html.match(pattern);
    if (!match) continue;
    const raw = match[1] ?? match[2] ?? match[3];
    if (raw === undefined) continue;
    const value = decodeEntities(decodeJsString(raw)).trim();
    if (value) {
      found[name] = value;
    }
  }
  return found;
}

function linkedDataArticle(payloads: EmbeddedPayloads): Record<string, unknown> | undefined {
  for (const value of Object.values(payloads)) {
    const entries = Array.isArray(value) ? value : [value];
    for (const entry of entries) {
      if (!isRecord(entry)) continue;
      const type = entry['@type'];
      const types = Array.isArray(type) ? type : [type];
      if (types.some((item) => typeof item === 'string' && /Article|BlogPosting/.test(item))) {
        return entry;
      }
    }
  }
  return undefined;
}

function imageUrl(value: unknown): string | undefined {
  if (Array.isArray(value)) return imageUrl(value[0]);
  if (isRecord(value)) return asString(value.url);
  return asString(value);
}

function personName(value: unknown): string | undefined {
  if (Array.isArray(value)) return personName(value[0]);
  if (isRecord(value)) return asString(value.name);
  return asString(value);
}

export function readPayloadMeta(payloads: EmbeddedPayloads, html: string): PayloadMeta {
  const inline = readInlineVariables(html);
  const pick = (name: string): unknown => payloads[name] ?? inline[name];
  const ld = linkedDataArticle(payloads);

  const publishRaw = pick('publish_time') ?? pick('ct') ?? ld?.datePublished;
  const publishTime = typeof publishRaw === 'number' ? publishRaw : asString(publishRaw);

  const contentHtml = asString(pick('content_noencode')) ?? asString(pick('content'));

  return {
    title: asString(pick('msg_title')) ?? asString(ld?.headline),
    description: asString(pick('msg_desc')) ?? asString(ld?.description),
    author: asString(pick('author')) ?? personName(ld?.author),
    accountName: asString(pick('nickname')) ?? asString(pick('user_name')) ?? personName(ld?.publisher),
    publishTime,
    coverImage: asString(pick('msg_cdn_url')) ?? imageUrl(ld?.image),
    contentHtml,
    contentText: asString(ld?.articleBody),
    readCount: asCount(pick('read_num')),
    likeCount: asCount(pick('like_num')) ?? asCount(pick('old_like_num')),
    link: asString(pick('msg_link')),
    biz: asString(pick('biz')),
  };
}
