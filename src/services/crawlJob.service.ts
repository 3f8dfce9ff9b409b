import { randomUUID } from 'crypto';
import { BaseCrawler } from '../crawlers/baseCrawler';
import {
  CircuitBreakerTripError,
  CrawlError,
  DetectionError,
  InvalidJobRequestError,
  JobTimeoutError,
  PermanentFetchError,
  ProxyExhaustedError,
  TransientFetchError,
  classifyFetchError,
  errorMessage,
} from '../errors/crawl-errors';
import { ArticleStore } from '../repositories/article.repository';
import {
  ArticleRecord,
  Candidate,
  FetchOutcome,
  FetchedPage,
  SaveOutcome,
  StrategyName,
} from '../types/crawl';
import {
  CrawlEvent,
  CrawlEventListener,
  CrawlJobCounters,
  CrawlJobOptions,
  CrawlJobRecord,
  CrawlJobStatus,
  CrawlJobView,
  TERMINAL_STATUSES,
} from '../types/jobs';
import { CircuitBreaker } from '../utils/circuit-breaker';
import { CrawlerConfig } from '../utils/config';
import { logger } from '../utils/logger';
import { PolitenessGate } from '../utils/politeness';
import { canonicalizeUrl } from '../utils/url';
import { randomBetween, sleep } from '../utils/wait';
import { DiscoveryEngine } from './discovery.service';
import { ArticleExtractor } from './extractor.service';
import { Fetcher } from './fetcher.service';
import { Frontier } from './frontier';
import { SessionPool } from './session-pool.service';

export interface CrawlJobServiceDeps {
  config: CrawlerConfig;
  pool: SessionPool;
  fetcher: Fetcher;
  extractor: ArticleExtractor;
  discovery: DiscoveryEngine;
  store: ArticleStore;
  politeness: PolitenessGate;
}

/**
 * How a processed candidate bears on the stall rule. Only fetched and expanded pages
 * count; failures, skips and aborted work are `ignored`.
 */
type StepResult = 'advanced' | 'stalled' | 'ignored';

interface ActiveJob {
  record: CrawlJobRecord;
  counters: CrawlJobCounters;
  frontier: Frontier;
  strategy: BaseCrawler;
  breaker: CircuitBreaker;
  controller: AbortController;
  /** Set when a drain-mode cancel lets in-flight candidates finish. */
  draining: boolean;
  errors: string[];
  failureCauses: Map<string, number>;
  /** Budget slots held by article candidates in flight. */
  reserved: number;
  inFlight: number;
  unproductiveStreak: number;
  changeWaiters: (() => void)[];
  timer?: NodeJS.Timeout;
  done: Promise<CrawlJobView>;
  resolveDone: (view: CrawlJobView) => void;
}

interface Subscription {
  listener: CrawlEventListener;
  jobId?: string;
}

function isTerminal(status: CrawlJobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

function failureCause(failure: CrawlError): string {
  if (failure instanceof DetectionError) return 'detection';
  if (failure instanceof TransientFetchError || failure instanceof PermanentFetchError) return failure.reason;
  return failure.code;
}

/**
 * Runs crawl jobs: a bounded queue of jobs, each with its own pool of workers
 * pulling candidates from the job's frontier through fetch, extract and expand.
 */
export class CrawlJobService {
  private readonly jobs = new Map<string, ActiveJob>();
  private readonly pending: string[] = [];
  private readonly subscriptions = new Set<Subscription>();
  private running = 0;

  constructor(private readonly deps: CrawlJobServiceDeps) {}

  private get config(): CrawlerConfig {
    return this.deps.config;
  }

  submit(seedUrl: string, strategyName: StrategyName, budget: number, options: CrawlJobOptions = {}): CrawlJobView {
    if (!Number.isInteger(budget) || budget < 1) {
      throw new InvalidJobRequestError(`Budget must be a positive integer, got ${budget}`);
    }

    const strategy = this.deps.discovery.create(strategyName, options);
    const seeds = strategy.seed(seedUrl);
    if (seeds.length === 0) {
      throw new InvalidJobRequestError(`Seed URL ${seedUrl} is not a page the ${strategyName} strategy can start from`);
    }

    const now = new Date().toISOString();
    let resolveDone: (view: CrawlJobView) => void = () => undefined;
    const done = new Promise<CrawlJobView>((resolve) => {
      resolveDone = resolve;
    });

    const job: ActiveJob = {
      record: {
        id: randomUUID(),
        seedUrl: seeds[0].url,
        strategy: strategyName,
        status: 'queued',
        maxArticles: budget,
        options,
        createdAt: now,
        updatedAt: now,
      },
      counters: { articlesFound: 0, articlesFailed: 0, articlesSkipped: 0, duplicates: 0 },
      frontier: new Frontier(),
      strategy,
      breaker: new CircuitBreaker({
        name: `job:${strategyName}`,
        window: this.config.breakerWindow,
        minSamples: this.config.breakerMinSamples,
        threshold: this.config.breakerThreshold,
      }),
      controller: new AbortController(),
      draining: false,
      errors: [],
      failureCauses: new Map(),
      reserved: 0,
      inFlight: 0,
      unproductiveStreak: 0,
      changeWaiters: [],
      done,
      resolveDone,
    };

    for (const seed of seeds) {
      job.frontier.offer(seed);
    }

    this.jobs.set(job.record.id, job);
    this.pending.push(job.record.id);
    logger.info('Crawl job queued', {
      jobId: job.record.id,
      seedUrl: job.record.seedUrl,
      strategy: strategyName,
      budget,
    });
    this.emit({ type: 'state', jobId: job.record.id, state: 'queued', timestamp: Date.now() });

    this.pump();
    return this.view(job);
  }

  status(jobId: string): CrawlJobView | undefined {
    const job = this.jobs.get(jobId);
    return job ? this.view(job) : undefined;
  }

  list(): CrawlJobView[] {
    return [...this.jobs.values()].map((job) => this.view(job));
  }

  cancel(jobId: string): CrawlJobView | undefined {
    const job = this.jobs.get(jobId);
    if (!job) {
      return undefined;
    }

    if (job.record.status === 'queued') {
      const index = this.pending.indexOf(jobId);
      if (index >= 0) this.pending.splice(index, 1);
      this.finish(job, 'cancelled', 'Cancelled before start');
      job.resolveDone(this.view(job));
    } else if (job.record.status === 'running') {
      this.finish(job, 'cancelled', 'Cancelled by request');
    }
    return this.view(job);
  }

  async waitForCompletion(jobId: string): Promise<CrawlJobView | undefined> {
    return this.jobs.get(jobId)?.done;
  }

  subscribe(listener: CrawlEventListener, jobId?: string): () => void {
    const subscription: Subscription = { listener, jobId };
    this.subscriptions.add(subscription);
    return () => {
      this.subscriptions.delete(subscription);
    };
  }

  async shutdown(): Promise<void> {
    const open = [...this.jobs.values()].filter((job) => !isTerminal(job.record.status));
    for (const job of open) {
      this.cancel(job.record.id);
      job.controller.abort();
    }
    await Promise.all(open.map((job) => job.done));
    await this.deps.pool.shutdown();
    logger.info('Crawl job service shut down', { cancelled: open.length });
  }

  private pump(): void {
    while (this.running < this.config.maxConcurrentJobs && this.pending.length > 0) {
      const jobId = this.pending.shift();
      const job = jobId ? this.jobs.get(jobId) : undefined;
      if (!job || job.record.status !== 'queued') {
        continue;
      }

      this.running += 1;
      void this.runJob(job)
        .catch((error: unknown) => {
          logger.error('Job execution failed', { jobId: job.record.id, error: errorMessage(error) });
          this.finish(job, 'failed', `Unexpected error: ${errorMessage(error)}`);
        })
        .finally(() => {
          this.running -= 1;
          job.resolveDone(this.view(job));
          this.pump();
        });
    }
  }

  private async runJob(job: ActiveJob): Promise<void> {
    const startedAt = new Date().toISOString();
    job.record.startedAt = startedAt;
    this.transition(job, 'running');
    this.progress(job, `Crawling from ${job.record.seedUrl} with ${this.config.workerConcurrency} workers`);

    const timeoutMs = this.config.jobTimeoutMs;
    if (timeoutMs > 0) {
      job.timer = setTimeout(() => {
        this.finish(job, 'failed', new JobTimeoutError(timeoutMs).message);
      }, timeoutMs);
    }

    const workers = Array.from({ length: this.config.workerConcurrency }, (_, index) => this.worker(job, index));
    await Promise.all(workers);

    if (job.record.status === 'running') {
      this.finish(job, 'completed', null, 'frontier exhausted');
    }
  }

  private async worker(job: ActiveJob, index: number): Promise<void> {
    while (job.record.status === 'running') {
      if (job.counters.articlesFound >= job.record.maxArticles) {
        this.finish(job, 'completed', null, 'budget met');
        return;
      }

      const candidate = this.take(job);
      if (!candidate) {
        if (job.inFlight === 0) {
          return;
        }
        await this.waitForChange(job);
        continue;
      }

      const holdsSlot = candidate.kind === 'article';
      if (holdsSlot) job.reserved += 1;
      job.inFlight += 1;
      logger.debug('Worker picked candidate', {
        jobId: job.record.id,
        worker: index,
        url: candidate.url,
        kind: candidate.kind,
        depth: candidate.depth,
      });

      let step: StepResult = 'ignored';
      try {
        step = await this.process(job, candidate);
      } catch (error) {
        logger.error('Unexpected error while processing candidate', {
          jobId: job.record.id,
          url: candidate.url,
          error: errorMessage(error),
          stack: error instanceof Error ? error.stack : undefined,
        });
        this.candidateFailed(job, candidate, `Unexpected error: ${errorMessage(error)}`);
      } finally {
        if (holdsSlot) job.reserved -= 1;
        job.inFlight -= 1;
        this.notifyChange(job);
      }

      this.trackProgress(job, step);
    }
  }

  private take(job: ActiveJob): Candidate | undefined {
    const remaining = job.record.maxArticles - job.counters.articlesFound - job.reserved;
    return job.frontier.next((kind) => kind === 'listing' || remaining > 0);
  }

  /** Drives one candidate to the end and reports how its expansion bears on the stall rule. */
  private async process(job: ActiveJob, candidate: Candidate): Promise<StepResult> {
    let discoveryOnly = false;
    if (candidate.kind === 'article' && this.config.crossJobDedup && (await this.alreadyStored(job, candidate.url))) {
      job.counters.articlesSkipped += 1;
      if (!this.config.traverseExisting) {
        logger.debug('Skipping already stored article', { jobId: job.record.id, url: candidate.url });
        return 'ignored';
      }
      discoveryOnly = true;
    }

    for (;;) {
      candidate.attempts += 1;
      try {
        const page = await this.fetchOnce(job, candidate);
        if (!this.isActive(job)) return 'ignored';
        return await this.handlePage(job, candidate, page, discoveryOnly);
      } catch (error) {
        if (!this.isActive(job) || job.draining) return 'ignored';

        const failure = classifyFetchError(error);
        if (failure instanceof ProxyExhaustedError) {
          this.finish(job, 'failed', `Proxy exhaustion: ${failure.message}`);
          return 'ignored';
        }

        if (failure.transient && candidate.attempts <= this.config.maxRetries) {
          const delayMs = this.backoff(candidate.attempts);
          logger.warn('Retrying candidate after transient failure', {
            jobId: job.record.id,
            url: candidate.url,
            attempt: candidate.attempts,
            maxRetries: this.config.maxRetries,
            delayMs,
            reason: failure.message,
          });
          if (!(await sleep(delayMs, job.controller.signal))) return 'ignored';
          continue;
        }

        this.candidateFailed(job, candidate, failure.message);
        return 'ignored';
      }
    }
  }

  private async fetchOnce(job: ActiveJob, candidate: Candidate): Promise<FetchedPage> {
    const signal = job.controller.signal;
    const handle = await this.deps.pool.acquire(signal);
    let outcome: FetchOutcome = 'aborted';

    try {
      const allowed = await this.deps.politeness.wait(handle.proxyId, signal);
      if (!allowed) {
        throw new TransientFetchError(`Fetch of ${candidate.url} aborted`, 'navigation');
      }

      const page = await this.deps.fetcher.fetch(handle, candidate.url, job.strategy.fetchPlan(candidate), signal);
      outcome = 'success';
      this.recordAttempt(job, null);
      return page;
    } catch (error) {
      const failure = classifyFetchError(error);
      if (!signal.aborted) {
        outcome = failure instanceof DetectionError ? 'detected' : failure.transient ? 'transient' : 'permanent';
        this.recordAttempt(job, failure);
      }
      throw failure;
    } finally {
      await this.deps.pool.release(handle, outcome);
    }
  }

  private async handlePage(
    job: ActiveJob,
    candidate: Candidate,
    page: FetchedPage,
    discoveryOnly: boolean,
  ): Promise<StepResult> {
    let saved = false;
    let failed = false;
    let record: ArticleRecord | undefined;

    if (candidate.kind === 'article' && !discoveryOnly) {
      const finalUrl = canonicalizeUrl(page.finalUrl);
      if (finalUrl && finalUrl !== candidate.url && !job.frontier.registerAlias(finalUrl)) {
        job.counters.duplicates += 1;
        logger.info('Redirect target already handled in this job', {
          jobId: job.record.id,
          url: candidate.url,
          finalUrl,
        });
        return 'ignored';
      }

      const result = await this.deps.extractor.extract(page.html, page.payloads, candidate.url);
      if (!result.ok) {
        failed = true;
        this.candidateFailed(job, candidate, result.failure.message);
      } else if (this.isActive(job)) {
        record = result.record;
        const outcome = await this.persist(job, candidate, result.record);
        saved = outcome === 'success';
        failed = outcome === 'error';
      }
    }

    if (job.record.status !== 'running') {
      return saved ? 'advanced' : 'ignored';
    }

    let added = 0;
    for (const child of job.strategy.expand(page, candidate, record)) {
      if (job.frontier.offer(child)) added += 1;
    }
    if (added > 0) {
      logger.debug('Candidates discovered', { jobId: job.record.id, from: candidate.url, added });
      this.notifyChange(job);
    }
    if (saved || added > 0) return 'advanced';
    return failed ? 'ignored' : 'stalled';
  }

  private async persist(job: ActiveJob, candidate: Candidate, record: ArticleRecord): Promise<SaveOutcome> {
    let outcome: SaveOutcome;
    try {
      outcome = await this.deps.store.save(record);
    } catch (error) {
      logger.error('Storage save threw', { jobId: job.record.id, url: record.url, error: errorMessage(error) });
      outcome = 'error';
    }

    switch (outcome) {
      case 'success':
        job.counters.articlesFound += 1;
        logger.info('Article harvested', {
          jobId: job.record.id,
          url: record.url,
          title: record.title,
          extractedBy: record.extractedBy,
          found: job.counters.articlesFound,
        });
        this.emit({ type: 'article', jobId: job.record.id, record, timestamp: Date.now() });
        if (job.counters.articlesFound >= job.record.maxArticles) {
          this.finish(job, 'completed', null, 'budget met');
        }
        break;
      case 'duplicate':
        job.counters.duplicates += 1;
        logger.debug('Storage already had article', { jobId: job.record.id, url: record.url });
        break;
      default:
        this.candidateFailed(job, candidate, `Storage rejected ${record.url}`);
    }
    return outcome;
  }

  private async alreadyStored(job: ActiveJob, url: string): Promise<boolean> {
    try {
      return await this.deps.store.exists(url);
    } catch (error) {
      logger.warn('Storage exists check failed, fetching anyway', {
        jobId: job.record.id,
        url,
        error: errorMessage(error),
      });
      return false;
    }
  }

  private recordAttempt(job: ActiveJob, failure: CrawlError | null): void {
    if (failure) {
      const cause = failureCause(failure);
      job.failureCauses.set(cause, (job.failureCauses.get(cause) ?? 0) + 1);
    }

    // only transient failures say something about our standing with the site
    const tripped = job.breaker.record(failure === null || !failure.transient);
    if (tripped && job.record.status === 'running') {
      this.finish(job, 'failed', new CircuitBreakerTripError(this.breakerSummary(job)).message);
    }
  }

  private breakerSummary(job: ActiveJob): string {
    const { failures, samples } = job.breaker.getState();
    const [cause, count] = [...job.failureCauses.entries()].sort((a, b) => b[1] - a[1])[0] ?? ['unknown', 0];
    const label = cause === 'detection' ? 'repeated detection of automated traffic' : cause;
    return `Circuit breaker tripped: ${failures} of the last ${samples} fetch attempts failed; dominant cause: ${label} (${count} attempts)`;
  }

  private trackProgress(job: ActiveJob, step: StepResult): void {
    if (job.record.status !== 'running' || step === 'ignored') return;
    if (step === 'advanced') {
      job.unproductiveStreak = 0;
      return;
    }

    job.unproductiveStreak += 1;
    if (job.unproductiveStreak >= this.config.stallLimit) {
      this.finish(job, 'completed', null, `no progress after ${job.unproductiveStreak} consecutive expansions`);
    }
  }

  private candidateFailed(job: ActiveJob, candidate: Candidate, reason: string): void {
    job.counters.articlesFailed += 1;
    job.errors.push(`${candidate.url}: ${reason}`);
    if (job.errors.length > this.config.maxErrorReasons) {
      job.errors.shift();
    }

    logger.warn('Candidate failed', {
      jobId: job.record.id,
      url: candidate.url,
      kind: candidate.kind,
      attempts: candidate.attempts,
      reason,
    });
    this.emit({ type: 'candidate-failed', jobId: job.record.id, url: candidate.url, reason, timestamp: Date.now() });
  }

  private finish(job: ActiveJob, status: CrawlJobStatus, errorSummary: string | null, reason?: string): void {
    if (isTerminal(job.record.status)) {
      return;
    }

    const now = new Date().toISOString();
    job.record.finishedAt = now;
    if (errorSummary) job.record.errorSummary = errorSummary;

    const discarded = job.frontier.discard();
    if (job.timer) clearTimeout(job.timer);

    if (status === 'cancelled' && this.config.cancelMode === 'drain') {
      job.draining = true;
    } else {
      job.controller.abort();
    }

    this.transition(job, status);
    this.progress(job, `Job ${status}${reason ? ` (${reason})` : ''}; ${discarded} queued candidates discarded`);

    const meta = {
      jobId: job.record.id,
      ...job.counters,
      discarded,
      reason,
      errorSummary: errorSummary ?? undefined,
    };
    if (status === 'failed') {
      logger.error('Crawl job failed', meta);
    } else {
      logger.info(`Crawl job ${status}`, meta);
    }
    this.notifyChange(job);
  }

  private transition(job: ActiveJob, status: CrawlJobStatus): void {
    job.record.status = status;
    job.record.updatedAt = new Date().toISOString();
    this.emit({ type: 'state', jobId: job.record.id, state: status, timestamp: Date.now() });
  }

  private progress(job: ActiveJob, message: string): void {
    this.emit({ type: 'progress', jobId: job.record.id, message, timestamp: Date.now() });
  }

  private isActive(job: ActiveJob): boolean {
    return job.record.status === 'running' || job.draining;
  }

  private backoff(attempt: number): number {
    const delay = Math.min(this.config.retryMaxDelayMs, this.config.retryBaseDelayMs * 2 ** (attempt - 1));
    return delay > 0 ? delay + randomBetween(0, Math.ceil(delay / 4)) : 0;
  }

  private waitForChange(job: ActiveJob): Promise<void> {
    return new Promise((resolve) => {
      job.changeWaiters.push(resolve);
    });
  }

  private notifyChange(job: ActiveJob): void {
    for (const resolve of job.changeWaiters.splice(0)) {
      resolve();
    }
  }

  private emit(event: CrawlEvent): void {
    for (const subscription of this.subscriptions) {
      if (subscription.jobId && subscription.jobId !== event.jobId) continue;
      try {
        subscription.listener(event);
      } catch (error) {
        logger.warn('Event listener threw', { type: event.type, jobId: event.jobId, error: errorMessage(error) });
      }
    }
  }

  private view(job: ActiveJob): CrawlJobView {
    const { record } = job;
    return {
      jobId: record.id,
      seedUrl: record.seedUrl,
      strategy: record.strategy,
      state: record.status,
      maxArticles: record.maxArticles,
      ...job.counters,
      frontierSize: job.frontier.size,
      inFlight: job.inFlight,
      errors: [...job.errors],
      errorSummary: record.errorSummary ?? null,
      createdAt: record.createdAt,
      updatedAt: record.updatedAt,
      startedAt: record.startedAt ?? null,
      finishedAt: record.finishedAt ?? null,
    };
  }
}
