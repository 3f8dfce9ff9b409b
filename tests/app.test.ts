import { Server } from 'http';
import { afterEach, describe, expect, it } from 'vitest';
import { createServer } from '../src/app';
import { InMemoryArticleRepository } from '../src/repositories/article.repository';
import { InMemoryRawContentStore } from '../src/repositories/raw-content.repository';
import { CrawlRuntime, createRuntime } from '../src/services/runtime';
import { createConfig } from '../src/utils/config';
import { FakeSessionFactory, FakeSite, articlePage, articleUrl } from './helpers/fake-site';

let runtime: CrawlRuntime;
let server: Server;
let baseUrl: string;

function start(site: FakeSite, delayMs = 0): Promise<void> {
  runtime = createRuntime(
    createConfig({
      workerConcurrency: 1,
      maxConcurrentJobs: 1,
      maxSessions: 1,
      politenessDelayMs: 0,
      politenessJitterMs: 0,
      retryBaseDelayMs: 0,
      retryMaxDelayMs: 0,
      fetchTimeoutMs: 2000,
    }),
    {
      sessionFactory: new FakeSessionFactory(site, delayMs),
      store: new InMemoryArticleRepository(),
      rawStore: new InMemoryRawContentStore(),
    },
  );
  return new Promise((resolve) => {
    server = createServer(runtime).listen(0, () => {
      const address = server.address();
      const port = address && typeof address === 'object' ? address.port : 0;
      baseUrl = `http://127.0.0.1:${port}/api`;
      resolve();
    });
  });
}

function post(path: string, body: unknown): Promise<Response> {
  return fetch(`${baseUrl}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

function singleArticleSite(): FakeSite {
  return new FakeSite().set(articleUrl('solo'), articlePage(articleUrl('solo'), { title: 'Solo article' }));
}

afterEach(async () => {
  await runtime.jobs.shutdown();
  await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
});

describe('crawl API', () => {
  it('reports health', async () => {
    await start(new FakeSite());

    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toMatchObject({ status: 'ok' });
  });

  it('rejects malformed job requests', async () => {
    await start(new FakeSite());

    const response = await post('/crawl/jobs', { seedUrl: 'not-a-url', strategy: 'series', budget: 0 });

    expect(response.status).toBe(400);
    const body = await response.json();
    expect(body.success).toBe(false);
    expect(body.error).toBe('Invalid request payload');
    expect(Object.keys(body.details.fieldErrors).sort()).toEqual(['budget', 'seedUrl']);
  });

  it('rejects seeds the strategy cannot start from', async () => {
    await start(new FakeSite());

    const response = await post('/crawl/jobs', { seedUrl: 'https://example.com/page', strategy: 'series', budget: 3 });

    expect(response.status).toBe(400);
    const body = await response.json();
    expect(body.error).toBe('Seed URL https://example.com/page is not a page the series strategy can start from');
  });

  it('accepts a job and exposes its status', async () => {
    await start(singleArticleSite());

    const created = await post('/crawl/jobs', { seedUrl: articleUrl('solo'), strategy: ' Series ', budget: 1 });
    expect(created.status).toBe(202);
    const { jobId } = await created.json();

    await runtime.jobs.waitForCompletion(jobId);
    const status = await fetch(`${baseUrl}/crawl/jobs/${jobId}`);
    const body = await status.json();

    expect(body.job).toMatchObject({ jobId, state: 'completed', articlesFound: 1, strategy: 'series' });

    const list = await (await fetch(`${baseUrl}/crawl/jobs`)).json();
    expect(list.jobs).toHaveLength(1);
  });

  it('answers 404 for unknown jobs', async () => {
    await start(new FakeSite());

    const missing = await fetch(`${baseUrl}/crawl/jobs/nope`);
    const cancelled = await fetch(`${baseUrl}/crawl/jobs/nope`, { method: 'DELETE' });

    expect(missing.status).toBe(404);
    expect(cancelled.status).toBe(404);
    await expect(missing.json()).resolves.toEqual({ success: false, error: 'Job not found' });
  });

  it('cancels a queued job', async () => {
    const site = singleArticleSite().set(
      articleUrl('other'),
      articlePage(articleUrl('other'), { title: 'Other article' }),
    );
    await start(site, 200);

    await post('/crawl/jobs', { seedUrl: articleUrl('solo'), strategy: 'series', budget: 1 });
    const queued = await (await post('/crawl/jobs', { seedUrl: articleUrl('other'), strategy: 'series', budget: 1 })).json();
    expect(queued.state).toBe('queued');

    const response = await post(`/crawl/jobs/${queued.jobId}/cancel`, {});
    const body = await response.json();

    expect(body.job).toMatchObject({ state: 'cancelled', errorSummary: 'Cancelled before start' });
  });

  it('streams events until the job ends', async () => {
    await start(singleArticleSite(), 50);

    const { jobId } = await (await post('/crawl/jobs', { seedUrl: articleUrl('solo'), strategy: 'series', budget: 1 })).json();
    const stream = await fetch(`${baseUrl}/crawl/jobs/${jobId}/stream`);
    expect(stream.headers.get('content-type')).toContain('text/event-stream');

    const text = await stream.text();
    const events = text
      .split('\n\n')
      .filter((chunk) => chunk.startsWith('data: '))
      .map((chunk) => JSON.parse(chunk.slice('data: '.length)));

    expect(events[0].type).toBe('state');
    expect(events[events.length - 1]).toMatchObject({ type: 'state', jobId, state: 'completed' });
  });

  it('describes proxies, sessions and strategies', async () => {
    await start(new FakeSite());

    const proxies = await (await fetch(`${baseUrl}/crawl/proxies`)).json();
    const sessions = await (await fetch(`${baseUrl}/crawl/sessions`)).json();
    const strategies = await (await fetch(`${baseUrl}/crawl/strategies`)).json();

    expect(proxies).toMatchObject({ success: true, mode: 'direct' });
    expect(sessions.sessions).toMatchObject({ capacity: 1, busy: 0 });
    expect(strategies.strategies).toEqual(['series', 'history', 'discover']);
  });
});
