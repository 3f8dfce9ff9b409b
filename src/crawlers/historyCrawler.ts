import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { asCount, asString, isRecord, readPayloadMeta } from '../extractors/payload';
import { decodeEntities, parsePublishTime } from '../extractors/text';
import { ArticleRecord, Candidate, EmbeddedPayloads, FetchedPage } from '../types/crawl';
import { canonicalizeUrl, getQueryParam } from '../utils/url';
import { BaseCrawler, uniqueCandidates } from './baseCrawler';
import { linkOf } from './links';

interface HistoryEntry {
  url: string;
  title?: string;
  /** Epoch ms, when the listing says. */
  publishedAt: number | null;
}

const NEXT_PAGE_SELECTORS = ['a[rel="next"]', '.weui_more a', '.js_next_page', '.load_more a'];
const NEXT_PAGE_TEXT = /^(下一页|加载更多|更多|next page|older)/i;

function toMillis(iso: string | null): number | null {
  return iso ? Date.parse(iso) : null;
}

function parseMessageList(value: unknown): unknown[] {
  let parsed = value;
  if (typeof value === 'string') {
    try {
      parsed = JSON.parse(decodeEntities(value));
    } catch {
      return [];
    }
  }
  if (Array.isArray(parsed)) return parsed;
  if (isRecord(parsed) && Array.isArray(parsed.list)) return parsed.list;
  return [];
}

/**
 * Walks an account's chronological listing page by page, newest first, until
 * the listing ends, the time floor is crossed or the page limit is reached.
 */
export class HistoryCrawler extends BaseCrawler {
  readonly name = 'history' as const;

  expand(page: FetchedPage, parent: Candidate, record?: ArticleRecord): Candidate[] {
    const $ = cheerio.load(page.html);

    if (parent.kind === 'article') {
      const listing = this.profileUrl($, page, parent, record);
      return uniqueCandidates(listing ? [this.child(listing, parent, 'profile', { pageIndex: 0 })] : [], parent);
    }

    const since = this.settings.since;
    let crossedFloor = false;
    const found: (Candidate | null)[] = [];

    for (const entry of this.entries($, page)) {
      if (since !== null && entry.publishedAt !== null && entry.publishedAt < since) {
        crossedFloor = true;
        continue;
      }
      const candidate = this.child(entry.url, parent, 'history', entry.title ? { hintTitle: entry.title } : {});
      found.push(candidate?.kind === 'article' ? candidate : null);
    }

    const pageIndex = parent.pageIndex ?? 0;
    if (!crossedFloor && pageIndex + 1 < this.settings.historyMaxPages) {
      const next = this.nextPageUrl($, page, parent);
      if (next) {
        const candidate = this.child(next, parent, 'next-page', { pageIndex: pageIndex + 1 });
        found.push(candidate?.kind === 'listing' ? candidate : null);
      }
    }

    return uniqueCandidates(found, parent);
  }

  private profileUrl($: CheerioAPI, page: FetchedPage, parent: Candidate, record?: ArticleRecord): string | null {
    for (const element of $('a[href*="profile_ext"]').toArray()) {
      const url = linkOf($, element, page.finalUrl);
      if (url && this.classify(url) === 'listing') return url;
    }

    const biz =
      getQueryParam(page.finalUrl, '__biz') ??
      getQueryParam(parent.url, '__biz') ??
      readPayloadMeta(page.payloads, page.html).biz ??
      (record ? getQueryParam(record.url, '__biz') : null);
    if (!biz) return null;

    const host = new URL(parent.url).host;
    return canonicalizeUrl(`https://${host}/mp/profile_ext?action=home&__biz=${encodeURIComponent(biz)}`);
  }

  private entries($: CheerioAPI, page: FetchedPage): HistoryEntry[] {
    const offset = this.settings.timezoneOffsetMinutes;
    const entries: HistoryEntry[] = [];

    for (const item of parseMessageList(page.payloads.msgList)) {
      if (!isRecord(item)) continue;
      const info: Record<string, unknown> = isRecord(item.comm_msg_info) ? item.comm_msg_info : {};
      const publishedAt = toMillis(parsePublishTime(asCount(info.datetime), offset));
      const main = isRecord(item.app_msg_ext_info) ? item.app_msg_ext_info : null;
      if (!main) continue;

      const extras: unknown[] = Array.isArray(main.multi_app_msg_item_list) ? main.multi_app_msg_item_list : [];
      const group: unknown[] = [main, ...extras];
      for (const message of group) {
        if (!isRecord(message)) continue;
        const raw = asString(message.content_url);
        const url = raw ? canonicalizeUrl(decodeEntities(raw), page.finalUrl) : null;
        if (url) entries.push({ url, title: asString(message.title), publishedAt });
      }
    }

    $('a[href], [data-link], [data-url]').each((_, element) => {
      const url = linkOf($, element, page.finalUrl);
      if (!url || this.classify(url) !== 'article') return;
      const node = $(element);
      const stamp = node.closest('[data-time]').attr('data-time') ?? node.find('[data-time]').attr('data-time');
      entries.push({
        url,
        title: node.text().replace(/\s+/g, ' ').trim() || undefined,
        publishedAt: toMillis(parsePublishTime(stamp, offset)),
      });
    });

    return entries;
  }

  private nextPageUrl($: CheerioAPI, page: FetchedPage, parent: Candidate): string | null {
    const payloads: EmbeddedPayloads = page.payloads;
    const canContinue = payloads.can_msg_continue;
    const nextOffset = asCount(payloads.next_offset);
    if ((canContinue === true || asCount(canContinue) === 1) && nextOffset !== undefined) {
      const url = new URL(parent.url);
      url.searchParams.set('offset', String(nextOffset));
      return canonicalizeUrl(url.toString());
    }
    if (canContinue === false || asCount(canContinue) === 0) {
      return null;
    }

    for (const selector of NEXT_PAGE_SELECTORS) {
      const element = $(selector).get(0);
      const url = element ? linkOf($, element, page.finalUrl) : null;
      if (url) return url;
    }

    for (const element of $('a').toArray()) {
      const text = $(element).text().replace(/\s+/g, ' ').trim();
      const url = text && text.length <= 20 && NEXT_PAGE_TEXT.test(text) ? linkOf($, element, page.finalUrl) : null;
      if (url) return url;
    }
    return null;
  }
}
