import { describe, expect, it } from 'vitest';
import {
  DetectionError,
  PermanentFetchError,
  TransientFetchError,
  classifyFetchError,
} from '../src/errors/crawl-errors';
import { ProxyRotator } from '../src/services/proxy-rotator.service';
import { Fetcher, inspectPage } from '../src/services/fetcher.service';
import { SessionPool } from '../src/services/session-pool.service';
import { RawPage } from '../src/types/crawl';
import { FakeSessionFactory, FakeSite, articlePage, articleUrl } from './helpers/fake-site';

const URL_UNDER_TEST = articleUrl('inspect');

function raw(overrides: Partial<RawPage>): RawPage {
  return {
    finalUrl: URL_UNDER_TEST,
    status: 200,
    title: 'Plain article',
    html: '<html><body><p>Readable text</p></body></html>',
    payloads: {},
    lazyLinks: [],
    ...overrides,
  };
}

function thrown(action: () => void): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('inspectPage', () => {
  it('accepts an ordinary page', () => {
    expect(() => inspectPage(raw({}), URL_UNDER_TEST)).not.toThrow();
  });

  it('treats missing pages as permanent', () => {
    const error = thrown(() => inspectPage(raw({ status: 404 }), URL_UNDER_TEST));
    expect(error).toBeInstanceOf(PermanentFetchError);
    if (error instanceof PermanentFetchError) expect(error.reason).toBe('not-found');
  });

  it('spots verification interstitials by title and URL', () => {
    const byTitle = thrown(() => inspectPage(raw({ title: '环境异常' }), URL_UNDER_TEST));
    expect(byTitle).toBeInstanceOf(DetectionError);
    if (byTitle instanceof DetectionError) expect(byTitle.marker).toBe('环境异常');

    const byUrl = thrown(() =>
      inspectPage(raw({ finalUrl: 'https://mp.weixin.qq.com/mp/wappoc_appmsgcaptcha?x=1' }), URL_UNDER_TEST),
    );
    expect(byUrl).toBeInstanceOf(DetectionError);
    expect(byUrl).toBeInstanceOf(TransientFetchError);
  });

  it('only looks for markers in the body of short pages', () => {
    const longBody = `<html><body><p>${'a'.repeat(3100)} 验证码</p></body></html>`;
    expect(() => inspectPage(raw({ html: longBody }), URL_UNDER_TEST)).not.toThrow();

    const shortBody = '<html><body><p>请完成安全验证</p></body></html>';
    expect(thrown(() => inspectPage(raw({ html: shortBody }), URL_UNDER_TEST))).toBeInstanceOf(DetectionError);
  });

  it('treats removal notices as permanent', () => {
    const error = thrown(() =>
      inspectPage(raw({ html: '<html><body><p>该内容已被发布者删除</p></body></html>' }), URL_UNDER_TEST),
    );
    expect(error).toBeInstanceOf(PermanentFetchError);
    if (error instanceof PermanentFetchError) expect(error.reason).toBe('removed');
  });

  it('maps HTTP statuses', () => {
    expect(thrown(() => inspectPage(raw({ status: 403 }), URL_UNDER_TEST))).toBeInstanceOf(DetectionError);
    const unavailable = thrown(() => inspectPage(raw({ status: 503 }), URL_UNDER_TEST));
    expect(unavailable).toBeInstanceOf(TransientFetchError);
    expect(unavailable).not.toBeInstanceOf(DetectionError);
  });
});

describe('classifyFetchError', () => {
  it('maps unknown errors onto transient reasons', () => {
    const timeout = classifyFetchError(new Error('page.goto: Timeout 30000ms exceeded'));
    expect(timeout).toBeInstanceOf(TransientFetchError);
    if (timeout instanceof TransientFetchError) expect(timeout.reason).toBe('timeout');

    const other = classifyFetchError('net::ERR_CONNECTION_RESET');
    expect(other.transient).toBe(true);
    expect(other.message).toBe('Navigation failed: net::ERR_CONNECTION_RESET');
  });
});

describe('Fetcher', () => {
  function setup(delayMs: number, timeoutMs: number) {
    const site = new FakeSite();
    site.set(URL_UNDER_TEST, articlePage(URL_UNDER_TEST, { title: 'Fetched' }));
    const rotator = new ProxyRotator([], { failureThreshold: 3, cooldownMs: 1000, requestBudget: 0 });
    const pool = new SessionPool(new FakeSessionFactory(site, delayMs), rotator, {
      maxSessions: 1,
      requestBudget: 10,
      proxyWaitTimeoutMs: 100,
    });
    return { site, pool, fetcher: new Fetcher(pool, { timeoutMs }) };
  }

  const plan = { scrollRounds: 0, readySelectors: ['#js_content'] };

  it('returns the page with session details', async () => {
    const { pool, fetcher } = setup(0, 1000);
    const handle = await pool.acquire();

    const page = await fetcher.fetch(handle, URL_UNDER_TEST, plan);

    expect(page.title).toBe('Fetched');
    expect(page.requestedUrl).toBe(URL_UNDER_TEST);
    expect(page.sessionId).toBe(handle.contextId);
    expect(page.proxyId).toBe('direct');
    await pool.release(handle, 'success');
  });

  it('turns a slow load into a transient timeout', async () => {
    const { pool, fetcher } = setup(200, 20);
    const handle = await pool.acquire();

    const error = await fetcher.fetch(handle, URL_UNDER_TEST, plan).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransientFetchError);
    if (error instanceof TransientFetchError) expect(error.reason).toBe('timeout');
    await pool.release(handle, 'transient');
  });
});
