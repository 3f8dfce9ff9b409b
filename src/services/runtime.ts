import { ArticleStore, InMemoryArticleRepository } from '../repositories/article.repository';
import {
  FileRawContentStore,
  InMemoryRawContentStore,
  RawContentStore,
} from '../repositories/raw-content.repository';
import { CrawlerConfig } from '../utils/config';
import { logger } from '../utils/logger';
import { PolitenessGate } from '../utils/politeness';
import { CrawlJobService } from './crawlJob.service';
import { DiscoveryEngine } from './discovery.service';
import { ArticleExtractor } from './extractor.service';
import { Fetcher } from './fetcher.service';
import { ProxyRotator } from './proxy-rotator.service';
import { SessionFactory, SessionPool } from './session-pool.service';
import { StorageApiService } from './storage-api.service';

export interface RuntimeOverrides {
  sessionFactory: SessionFactory;
  store?: ArticleStore;
  rawStore?: RawContentStore;
  /** Clock and randomness for the rotator, session pool and politeness gate. */
  now?: () => number;
  random?: () => number;
}

export interface CrawlRuntime {
  config: CrawlerConfig;
  rotator: ProxyRotator;
  pool: SessionPool;
  discovery: DiscoveryEngine;
  store: ArticleStore;
  jobs: CrawlJobService;
}

function createStore(config: CrawlerConfig): ArticleStore {
  if (config.storageApiUrl) {
    return new StorageApiService({ baseUrl: config.storageApiUrl, timeoutMs: config.fetchTimeoutMs });
  }
  logger.warn('STORAGE_API_URL not set, articles are kept in memory only');
  return new InMemoryArticleRepository();
}

/** Wires the crawler's collaborators from one configuration. */
export function createRuntime(config: CrawlerConfig, overrides: RuntimeOverrides): CrawlRuntime {
  const rotator = new ProxyRotator(config.proxies, {
    failureThreshold: config.proxyFailureThreshold,
    cooldownMs: config.proxyCooldownMs,
    requestBudget: config.proxyRequestBudget,
    now: overrides.now,
    random: overrides.random,
  });

  const pool = new SessionPool(overrides.sessionFactory, rotator, {
    maxSessions: config.maxSessions,
    requestBudget: config.sessionRequestBudget,
    proxyWaitTimeoutMs: config.proxyWaitTimeoutMs,
    now: overrides.now,
  });

  const rawStore =
    overrides.rawStore ??
    (config.rawContentDir ? new FileRawContentStore(config.rawContentDir) : new InMemoryRawContentStore());

  const extractor = new ArticleExtractor({
    rawStore,
    timezoneOffsetMinutes: config.timezoneOffsetMinutes,
  });

  const politeness = new PolitenessGate({
    delayMs: config.politenessDelayMs,
    jitterMs: config.politenessJitterMs,
    now: overrides.now,
  });

  const discovery = new DiscoveryEngine(config);
  const store = overrides.store ?? createStore(config);

  const jobs = new CrawlJobService({
    config,
    pool,
    fetcher: new Fetcher(pool, { timeoutMs: config.fetchTimeoutMs }),
    extractor,
    discovery,
    store,
    politeness,
  });

  return { config, rotator, pool, discovery, store, jobs };
}
