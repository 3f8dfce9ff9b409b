import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { asString, isRecord } from '../extractors/payload';
import { ArticleRecord, Candidate, EmbeddedPayloads, FetchPlan, FetchedPage } from '../types/crawl';
import { canonicalizeUrl } from '../utils/url';
import { BaseCrawler, uniqueCandidates } from './baseCrawler';
import { PageLink, linkOf, pageLinks, payloadLinks } from './links';
import { isSeriesSibling, parseTitlePattern } from './titlePattern';

type Direction = 'prev' | 'next';

const NAVIGATION_SELECTORS: [string, Direction][] = [
  ['.album_read_nav_prev', 'prev'],
  ['.js_prev_article', 'prev'],
  ['[rel="prev"]', 'prev'],
  ['.album_read_nav_next', 'next'],
  ['.js_next_article', 'next'],
  ['[rel="next"]', 'next'],
];

const PREV_TEXT = /^(上一篇|previous\b|prev\b)/i;
const NEXT_TEXT = /^(下一篇|next\b)/i;

const SERIES_PAYLOADS = ['related_article_list', 'recommend_list', 'author_articles', 'appmsg_album_info'];

function isAlbumDirectory(url: string): boolean {
  try {
    return new URL(url).pathname === '/mp/appmsgalbum';
  } catch {
    return false;
  }
}

/**
 * Walks a series in both directions: explicit prev/next navigation, album
 * directories, and titles that only differ in their running number or date.
 */
export class SeriesCrawler extends BaseCrawler {
  readonly name = 'series' as const;

  fetchPlan(candidate: Candidate): FetchPlan {
    const plan = super.fetchPlan(candidate);
    // album directories lazy-load their entries
    return candidate.kind === 'listing' ? { ...plan, scrollRounds: this.settings.scrollRounds } : plan;
  }

  expand(page: FetchedPage, parent: Candidate, record?: ArticleRecord): Candidate[] {
    const $ = cheerio.load(page.html);
    const base = page.finalUrl;
    const links = pageLinks($, base);

    if (parent.kind === 'listing') {
      return this.albumEntries(page, parent, links);
    }

    const found: (Candidate | null)[] = [];

    for (const { url, direction } of this.navigationLinks($, base, page.payloads)) {
      found.push(this.articleChild(url, parent, direction));
    }

    for (const link of links) {
      if (isAlbumDirectory(link.url)) {
        found.push(this.child(link.url, parent, 'album', { pageIndex: 0 }));
      }
    }

    const reference = parseTitlePattern(record?.title ?? parent.hintTitle ?? page.title);
    const titled = [...links, ...payloadLinks(page.payloads, base, SERIES_PAYLOADS)];
    for (const link of titled) {
      if (link.title && isSeriesSibling(reference, link.title)) {
        found.push(this.articleChild(link.url, parent, 'title-pattern', link.title));
      }
    }

    return uniqueCandidates(found, parent);
  }

  private albumEntries(page: FetchedPage, parent: Candidate, links: PageLink[]): Candidate[] {
    const lazy: PageLink[] = page.lazyLinks.map((url) => ({ url }));
    const mined = payloadLinks(page.payloads, page.finalUrl);
    return uniqueCandidates(
      [...links, ...lazy, ...mined].map((link) => this.articleChild(link.url, parent, 'album', link.title)),
      parent,
    );
  }

  private articleChild(url: string, parent: Candidate, source: string, hintTitle?: string): Candidate | null {
    const candidate = this.child(url, parent, source, hintTitle ? { hintTitle } : {});
    return candidate?.kind === 'article' ? candidate : null;
  }

  private navigationLinks(
    $: CheerioAPI,
    base: string,
    payloads: EmbeddedPayloads,
  ): { url: string; direction: Direction }[] {
    const found: { url: string; direction: Direction }[] = [];

    for (const [selector, direction] of NAVIGATION_SELECTORS) {
      $(selector).each((_, element) => {
        const url = linkOf($, element, base);
        if (url) found.push({ url, direction });
      });
    }

    $('a').each((_, element) => {
      const text = $(element).text().replace(/\s+/g, ' ').trim();
      if (!text || text.length > 40) return;
      const direction: Direction | null = PREV_TEXT.test(text) ? 'prev' : NEXT_TEXT.test(text) ? 'next' : null;
      const url = direction ? linkOf($, element, base) : null;
      if (direction && url) found.push({ url, direction });
    });

    for (const [key, direction] of [['prev_article', 'prev'], ['next_article', 'next']] as const) {
      const value = payloads[key];
      const raw = isRecord(value) ? asString(value.url) ?? asString(value.link) : asString(value);
      const url = raw ? canonicalizeUrl(raw, base) : null;
      if (url) found.push({ url, direction });
    }

    return found;
  }
}
