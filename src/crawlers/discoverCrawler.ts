import * as cheerio from 'cheerio';
import { Candidate, FetchPlan, FetchedPage } from '../types/crawl';
import { canonicalizeUrl } from '../utils/url';
import { BaseCrawler, uniqueCandidates } from './baseCrawler';
import { pageLinks, payloadLinks } from './links';

/**
 * Breadth-first expansion from one article. Link precedence is fixed:
 * explicit in-page links, then links revealed by scrolling, then mined payloads.
 */
export class DiscoverCrawler extends BaseCrawler {
  readonly name = 'discover' as const;

  fetchPlan(candidate: Candidate): FetchPlan {
    const plan = super.fetchPlan(candidate);
    // pages at the depth limit are not expanded, so there is nothing to reveal
    return candidate.depth < this.settings.maxDepth ? { ...plan, scrollRounds: this.settings.scrollRounds } : plan;
  }

  expand(page: FetchedPage, parent: Candidate): Candidate[] {
    if (parent.depth >= this.settings.maxDepth) {
      return [];
    }

    const base = page.finalUrl;
    const lazy = page.lazyLinks
      .map((url) => canonicalizeUrl(url, base))
      .filter((url): url is string => url !== null);
    const lazySet = new Set(lazy);

    const explicit = pageLinks(cheerio.load(page.html), base).filter((link) => !lazySet.has(link.url));
    const mined = payloadLinks(page.payloads, base);

    const ordered: (Candidate | null)[] = [
      ...explicit.map((link) => this.articleChild(link.url, parent, 'link', link.title)),
      ...lazy.map((url) => this.articleChild(url, parent, 'scroll')),
      ...mined.map((link) => this.articleChild(link.url, parent, 'payload', link.title)),
    ];
    return uniqueCandidates(ordered, parent);
  }

  private articleChild(url: string, parent: Candidate, source: string, hintTitle?: string): Candidate | null {
    const candidate = this.child(url, parent, source, hintTitle ? { hintTitle } : {});
    return candidate?.kind === 'article' ? candidate : null;
  }
}
