import {
  ArticleRecord,
  Candidate,
  CandidateKind,
  FetchPlan,
  FetchedPage,
  StrategyName,
} from '../types/crawl';
import { canonicalizeUrl, isArticleUrl, isListingUrl } from '../utils/url';

export interface StrategySettings {
  articleHosts: string[];
  /** Breadth-first depth limit (discover). */
  maxDepth: number;
  /** Scroll-triggered loads per page that is still expanded. */
  scrollRounds: number;
  historyMaxPages: number;
  /** Epoch ms; history stops at entries published before it. */
  since: number | null;
  timezoneOffsetMinutes: number;
}

export const ARTICLE_READY_SELECTORS = ['#js_content', '#activity-name', '.rich_media_content', 'article'];
export const LISTING_READY_SELECTORS = ['.weui_msg_card_list', '#js_history_list', '.album__list', '.album__list-item'];

/**
 * A pluggable discovery strategy. Strategies are pure with respect to the page
 * they are handed; the orchestrator owns fetching and deduplication.
 */
export abstract class BaseCrawler {
  abstract readonly name: StrategyName;

  constructor(protected readonly settings: StrategySettings) {}

  seed(url: string): Candidate[] {
    const candidate = this.candidate(url, null, 'seed', 0);
    if (!candidate) return [];
    return [candidate.kind === 'listing' ? { ...candidate, pageIndex: 0 } : candidate];
  }

  /** Candidates discovered on a fetched page. `record` is absent when nothing was extracted. */
  abstract expand(page: FetchedPage, parent: Candidate, record?: ArticleRecord): Candidate[];

  fetchPlan(candidate: Candidate): FetchPlan {
    return {
      scrollRounds: 0,
      readySelectors: candidate.kind === 'article' ? ARTICLE_READY_SELECTORS : LISTING_READY_SELECTORS,
    };
  }

  protected classify(url: string): CandidateKind | null {
    if (isArticleUrl(url, this.settings.articleHosts)) return 'article';
    if (isListingUrl(url, this.settings.articleHosts)) return 'listing';
    return null;
  }

  protected candidate(
    url: string,
    parent: Candidate | null,
    source: string,
    depth: number,
    extra: Pick<Candidate, 'hintTitle' | 'pageIndex'> = {},
  ): Candidate | null {
    const key = canonicalizeUrl(url);
    if (!key) return null;
    const kind = this.classify(key);
    if (!kind) return null;

    return {
      url: key,
      kind,
      discoveredVia: { strategy: this.name, parentUrl: parent?.url ?? null, source },
      depth,
      attempts: 0,
      ...extra,
    };
  }

  protected child(
    url: string,
    parent: Candidate,
    source: string,
    extra: Pick<Candidate, 'hintTitle' | 'pageIndex'> = {},
  ): Candidate | null {
    return this.candidate(url, parent, source, parent.depth + 1, extra);
  }
}

/** Drops nulls, the parent itself and repeats, keeping the first occurrence. */
export function uniqueCandidates(candidates: (Candidate | null)[], parent: Candidate): Candidate[] {
  const seen = new Set<string>([parent.url]);
  const result: Candidate[] = [];
  for (const candidate of candidates) {
    if (!candidate || seen.has(candidate.url)) continue;
    seen.add(candidate.url);
    result.push(candidate);
  }
  return result;
}
