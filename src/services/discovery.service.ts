import { BaseCrawler, StrategySettings } from '../crawlers/baseCrawler';
import { DiscoverCrawler } from '../crawlers/discoverCrawler';
import { HistoryCrawler } from '../crawlers/historyCrawler';
import { SeriesCrawler } from '../crawlers/seriesCrawler';
import { InvalidJobRequestError } from '../errors/crawl-errors';
import { STRATEGY_NAMES, StrategyName } from '../types/crawl';
import { CrawlJobOptions } from '../types/jobs';
import { CrawlerConfig } from '../utils/config';

type StrategyConstructor = new (settings: StrategySettings) => BaseCrawler;

const STRATEGIES: Record<StrategyName, StrategyConstructor> = {
  series: SeriesCrawler,
  history: HistoryCrawler,
  discover: DiscoverCrawler,
};

export class DiscoveryEngine {
  constructor(
    private readonly config: Pick<
      CrawlerConfig,
      | 'strategies'
      | 'articleHosts'
      | 'discoverMaxDepth'
      | 'discoverScrollRounds'
      | 'historyMaxPages'
      | 'timezoneOffsetMinutes'
    >,
  ) {}

  enabled(): StrategyName[] {
    return STRATEGY_NAMES.filter((name) => this.config.strategies[name]);
  }

  /** A fresh strategy instance scoped to one job's options. */
  create(name: StrategyName, options: CrawlJobOptions = {}): BaseCrawler {
    if (!this.config.strategies[name]) {
      throw new InvalidJobRequestError(`Strategy "${name}" is disabled`);
    }

    const since = options.since ? Date.parse(options.since) : null;
    if (since !== null && Number.isNaN(since)) {
      throw new InvalidJobRequestError(`Invalid "since" value: ${options.since}`);
    }

    const Strategy = STRATEGIES[name];
    return new Strategy({
      articleHosts: this.config.articleHosts,
      maxDepth: options.maxDepth ?? this.config.discoverMaxDepth,
      scrollRounds: this.config.discoverScrollRounds,
      historyMaxPages: this.config.historyMaxPages,
      since,
      timezoneOffsetMinutes: this.config.timezoneOffsetMinutes,
    });
  }
}
