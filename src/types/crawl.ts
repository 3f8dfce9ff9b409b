export type StrategyName = 'series' | 'history' | 'discover';

export const STRATEGY_NAMES: readonly StrategyName[] = ['series', 'history', 'discover'];

export type CandidateKind = 'article' | 'listing';

export interface DiscoveredVia {
  strategy: StrategyName;
  parentUrl: string | null;
  /** How the link was found, e.g. `next`, `album`, `title-pattern`, `payload`. */
  source: string;
}

export interface Candidate {
  url: string;
  kind: CandidateKind;
  discoveredVia: DiscoveredVia;
  depth: number;
  attempts: number;
  /** Title seen on the link that led here, when there was one. */
  hintTitle?: string;
  /** Listing page number for history pagination. */
  pageIndex?: number;
}

export interface ArticleRecord {
  url: string;
  title: string;
  author: string | null;
  accountName: string | null;
  /** ISO 8601, UTC. */
  publishTime: string | null;
  content: string;
  images: string[];
  coverImage: string | null;
  readCount: number;
  likeCount: number;
  rawContentRef: string | null;
  crawlTime: string;
  extractedBy: ExtractionStrategyName;
}

export type ExtractionStrategyName = 'semantic' | 'pattern' | 'payload';

/** Values mined from page scripts. Shape varies over time, so nothing here is trusted. */
export type EmbeddedPayloads = Record<string, unknown>;

export interface FetchPlan {
  /** Bounded number of scroll-triggered loads after the page is ready. */
  scrollRounds: number;
  readySelectors: string[];
}

export interface RawPage {
  finalUrl: string;
  status: number;
  title: string;
  html: string;
  payloads: EmbeddedPayloads;
  /** Links that only appeared after scroll-triggered loads. */
  lazyLinks: string[];
}

export interface FetchedPage extends RawPage {
  requestedUrl: string;
  sessionId: string;
  proxyId: string;
  fetchedAt: string;
}

export interface FingerprintProfile {
  name: string;
  userAgent: string;
  viewport: { width: number; height: number };
  deviceScaleFactor: number;
  platform: string;
}

export type ProxyHealth = 'healthy' | 'degraded' | 'blocked';

export interface ProxyRecord {
  id: string;
  address: string;
  protocol: string;
  credentials: { username: string; password: string } | null;
  healthState: ProxyHealth;
  lastFailureAt: number | null;
  consecutiveFailures: number;
  successCount: number;
  failureCount: number;
  requestCount: number;
  restingUntil: number | null;
}

/** `aborted` fetches were cut short by cancellation and say nothing about the proxy. */
export type FetchOutcome = 'success' | 'transient' | 'detected' | 'permanent' | 'aborted';

export interface SessionHandle {
  contextId: string;
  proxyId: string;
  fingerprintProfile: FingerprintProfile;
  lastUsedAt: number;
  requestCount: number;
}

export type SaveOutcome = 'success' | 'duplicate' | 'error';
