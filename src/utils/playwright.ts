import { chromium, Browser, BrowserContext, Page } from 'playwright';
import { playwrightUtils } from 'crawlee';
import { TransientFetchError } from '../errors/crawl-errors';
import { BrowserSession, SessionFactory, createSessionId } from '../services/session-pool.service';
import { DIRECT_PROXY_ID, toPlaywrightProxy } from '../services/proxy-rotator.service';
import { EmbeddedPayloads, FetchPlan, FingerprintProfile, ProxyRecord, RawPage } from '../types/crawl';
import { logger } from './logger';
import { randomBetween, sleep, waitUntil } from './wait';

const DEFAULT_TIMEOUT = 30_000;
const SETTLE_POLL_MS = 300;

const LAUNCH_ARGS = [
  '--disable-blink-features=AutomationControlled',
  '--disable-features=IsolateOrigins,site-per-process',
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-accelerated-2d-canvas',
  '--disable-gpu',
];

/** Page globals worth mining; names follow the platform's inline scripts. */
export const PAYLOAD_GLOBALS = [
  'msg_title',
  'msg_desc',
  'msg_link',
  'msg_source_url',
  'msg_cdn_url',
  'nickname',
  'user_name',
  'author',
  'publish_time',
  'ct',
  'read_num',
  'like_num',
  'old_like_num',
  'biz',
  'idx',
  'related_article_list',
  'recommend_list',
  'author_articles',
  'history_articles',
  'appmsg_album_info',
  'prev_article',
  'next_article',
  'msgList',
  'can_msg_continue',
  'next_offset',
];

export interface PlaywrightSessionOptions {
  headless: boolean;
  navigationTimeoutMs?: number;
  /** Upper bound of the randomized pause before and after navigation. */
  maxHumanDelayMs?: number;
}

function hideAutomation() {
  Object.defineProperty(navigator, 'webdriver', { get: () => undefined });
  Object.defineProperty(navigator, 'plugins', {
    get: () => [{ name: 'Chrome PDF Plugin' }, { name: 'Chrome PDF Viewer' }, { name: 'Native Client' }],
  });
  Object.defineProperty(navigator, 'languages', { get: () => ['zh-CN', 'zh'] });
  Object.defineProperty(window, 'chrome', { value: { runtime: {} }, configurable: true });
}

async function collectLinks(page: Page): Promise<string[]> {
  return page.$$eval('a[href]', (anchors) =>
    anchors.map((anchor) => (anchor instanceof HTMLAnchorElement ? anchor.href : '')).filter(Boolean),
  );
}

async function minePayloads(page: Page): Promise<EmbeddedPayloads> {
  return page.evaluate((names) => {
    const found: Record<string, unknown> = {};
    for (const name of names) {
      const value: unknown = Reflect.get(window, name);
      if (value === undefined || typeof value === 'function') continue;
      try {
        found[name] = JSON.parse(JSON.stringify(value));
      } catch {
        continue;
      }
    }

    const scripts = Array.from(
      document.querySelectorAll('script[type="application/json"], script[type="application/ld+json"]'),
    );
    scripts.forEach((script, index) => {
      const key = script.id || `json_${index}`;
      try {
        found[key] = JSON.parse(script.textContent ?? '');
      } catch {
        found[key] = null;
      }
    });
    return found;
  }, PAYLOAD_GLOBALS);
}

export class PlaywrightSession implements BrowserSession {
  readonly id = createSessionId();

  constructor(
    private readonly context: BrowserContext,
    private readonly options: PlaywrightSessionOptions,
  ) {}

  async load(url: string, plan: FetchPlan, signal: AbortSignal): Promise<RawPage> {
    const page = await this.context.newPage();
    const onAbort = () => {
      page.close().catch((error: unknown) => logger.debug('Page close after abort failed', { error }));
    };
    signal.addEventListener('abort', onAbort, { once: true });

    try {
      const maxDelay = this.options.maxHumanDelayMs ?? 1200;
      await sleep(randomBetween(Math.min(300, maxDelay), maxDelay), signal);

      const response = await page.goto(url, {
        waitUntil: 'domcontentloaded',
        timeout: this.options.navigationTimeoutMs ?? DEFAULT_TIMEOUT,
      });

      await this.waitForContent(page, plan, signal);

      await page.evaluate((distance) => window.scrollBy(0, distance), randomBetween(200, 600));
      await sleep(randomBetween(200, 800), signal);

      let lazyLinks: string[] = [];
      if (plan.scrollRounds > 0) {
        const before = new Set(await collectLinks(page));
        await playwrightUtils.infiniteScroll(page, {
          timeoutSecs: plan.scrollRounds * 2,
          waitForSecs: 2,
        });
        lazyLinks = (await collectLinks(page)).filter((link) => !before.has(link));
      }

      return {
        finalUrl: page.url(),
        status: response?.status() ?? 200,
        title: await page.title(),
        html: await page.content(),
        payloads: await minePayloads(page),
        lazyLinks,
      };
    } catch (error) {
      if (signal.aborted) {
        throw new TransientFetchError(`Fetch of ${url} aborted`, 'navigation');
      }
      throw error;
    } finally {
      signal.removeEventListener('abort', onAbort);
      if (!page.isClosed()) {
        await page.close();
      }
    }
  }

  async close(): Promise<void> {
    await this.context.close();
  }

  /** Ready once a marker element exists, or once the DOM stops growing. */
  private async waitForContent(page: Page, plan: FetchPlan, signal: AbortSignal): Promise<void> {
    let previousLength = -1;
    const result = await waitUntil(
      async () => {
        for (const selector of plan.readySelectors) {
          if (await page.$(selector)) {
            return `marker:${selector}`;
          }
        }
        const length = await page.evaluate(() => document.body?.innerHTML.length ?? 0);
        const settled = length > 0 && length === previousLength;
        previousLength = length;
        return settled ? 'settled' : undefined;
      },
      { timeoutMs: this.options.navigationTimeoutMs ?? DEFAULT_TIMEOUT, intervalMs: SETTLE_POLL_MS, signal },
    );

    if (!result.ok) {
      throw new TransientFetchError(`Content never became ready (${result.reason})`, 'timeout');
    }
  }
}

export class PlaywrightSessionFactory implements SessionFactory {
  private browser: Promise<Browser> | null = null;

  constructor(private readonly options: PlaywrightSessionOptions) {}

  async create(proxy: ProxyRecord, profile: FingerprintProfile): Promise<BrowserSession> {
    const browser = await this.launch();
    const context = await browser.newContext({
      viewport: profile.viewport,
      userAgent: profile.userAgent,
      deviceScaleFactor: profile.deviceScaleFactor,
      isMobile: true,
      hasTouch: true,
      locale: 'zh-CN',
      timezoneId: 'Asia/Shanghai',
      ignoreHTTPSErrors: true,
      proxy: proxy.id === DIRECT_PROXY_ID ? undefined : toPlaywrightProxy(proxy),
      extraHTTPHeaders: {
        'Accept-Language': 'zh-CN,zh;q=0.9',
      },
    });
    await context.addInitScript(hideAutomation);
    context.setDefaultTimeout(this.options.navigationTimeoutMs ?? DEFAULT_TIMEOUT);

    return new PlaywrightSession(context, this.options);
  }

  async shutdown(): Promise<void> {
    if (!this.browser) return;
    const browser = await this.browser;
    this.browser = null;
    await browser.close();
    logger.info('Browser closed');
  }

  private launch(): Promise<Browser> {
    if (!this.browser) {
      this.browser = chromium
        .launch({
          headless: this.options.headless,
          args: LAUNCH_ARGS,
          // contexts carry their own proxies
          proxy: { server: 'per-context' },
        })
        .catch((error: unknown) => {
          this.browser = null;
          throw error;
        });
      logger.info('Launching browser', { headless: this.options.headless });
    }
    return this.browser;
  }
}
