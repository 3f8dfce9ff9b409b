import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from '../errors/crawl-errors';
import { StrategyName } from '../types/crawl';
import { logger } from './logger';

const booleanFlag = z
  .string()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const int = (fallback: number, min = 0) => z.coerce.number().int().min(min).default(fallback);

const envSchema = z.object({
  PORT: int(4000, 1),
  HEADLESS: booleanFlag.default('true'),
  WORKER_CONCURRENCY: int(3, 1),
  MAX_CONCURRENT_JOBS: int(2, 1),
  MAX_SESSIONS: int(4, 1),
  MAX_RETRIES: int(3),
  RETRY_BASE_DELAY_MS: int(2000),
  RETRY_MAX_DELAY_MS: int(30_000),
  FETCH_TIMEOUT_MS: int(30_000, 1),
  JOB_TIMEOUT_MS: int(0),
  SESSION_REQUEST_BUDGET: int(20, 1),
  PROXY_REQUEST_BUDGET: int(0),
  PROXY_FAILURE_THRESHOLD: int(3, 1),
  PROXY_COOLDOWN_MS: int(600_000),
  PROXY_WAIT_TIMEOUT_MS: int(60_000),
  PROXY_LIST: z.string().optional(),
  PROXY_LIST_FILE: z.string().optional(),
  POLITENESS_DELAY_MS: int(3000),
  POLITENESS_JITTER_MS: int(1000),
  BREAKER_WINDOW: int(20, 1),
  BREAKER_MIN_SAMPLES: int(10, 1),
  BREAKER_THRESHOLD: z.coerce.number().min(0).max(1).default(0.6),
  STALL_LIMIT: int(8, 1),
  DISCOVER_MAX_DEPTH: int(2),
  DISCOVER_SCROLL_ROUNDS: int(3),
  HISTORY_MAX_PAGES: int(50, 1),
  STRATEGY_SERIES: booleanFlag.default('true'),
  STRATEGY_HISTORY: booleanFlag.default('true'),
  STRATEGY_DISCOVER: booleanFlag.default('true'),
  CROSS_JOB_DEDUP: booleanFlag.default('true'),
  TRAVERSE_EXISTING: booleanFlag.default('false'),
  CANCEL_MODE: z.enum(['abort', 'drain']).default('abort'),
  MAX_ERROR_REASONS: int(20, 1),
  ARTICLE_HOSTS: z.string().default('mp.weixin.qq.com'),
  TIMEZONE_OFFSET_MINUTES: z.coerce.number().int().min(-720).max(840).default(480),
  STORAGE_API_URL: z.string().url().optional(),
  RAW_CONTENT_DIR: z.string().optional(),
});

export interface CrawlerConfig {
  port: number;
  headless: boolean;
  workerConcurrency: number;
  maxConcurrentJobs: number;
  maxSessions: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  fetchTimeoutMs: number;
  /** 0 disables the overall job deadline. */
  jobTimeoutMs: number;
  sessionRequestBudget: number;
  /** 0 means unlimited. */
  proxyRequestBudget: number;
  proxyFailureThreshold: number;
  proxyCooldownMs: number;
  proxyWaitTimeoutMs: number;
  proxies: string[];
  politenessDelayMs: number;
  politenessJitterMs: number;
  breakerWindow: number;
  breakerMinSamples: number;
  breakerThreshold: number;
  stallLimit: number;
  discoverMaxDepth: number;
  discoverScrollRounds: number;
  historyMaxPages: number;
  strategies: Record<StrategyName, boolean>;
  crossJobDedup: boolean;
  traverseExisting: boolean;
  cancelMode: 'abort' | 'drain';
  maxErrorReasons: number;
  articleHosts: string[];
  timezoneOffsetMinutes: number;
  storageApiUrl?: string;
  rawContentDir?: string;
}

export const DEFAULT_CONFIG: CrawlerConfig = {
  port: 4000,
  headless: true,
  workerConcurrency: 3,
  maxConcurrentJobs: 2,
  maxSessions: 4,
  maxRetries: 3,
  retryBaseDelayMs: 2000,
  retryMaxDelayMs: 30_000,
  fetchTimeoutMs: 30_000,
  jobTimeoutMs: 0,
  sessionRequestBudget: 20,
  proxyRequestBudget: 0,
  proxyFailureThreshold: 3,
  proxyCooldownMs: 600_000,
  proxyWaitTimeoutMs: 60_000,
  proxies: [],
  politenessDelayMs: 3000,
  politenessJitterMs: 1000,
  breakerWindow: 20,
  breakerMinSamples: 10,
  breakerThreshold: 0.6,
  stallLimit: 8,
  discoverMaxDepth: 2,
  discoverScrollRounds: 3,
  historyMaxPages: 50,
  strategies: { series: true, history: true, discover: true },
  crossJobDedup: true,
  traverseExisting: false,
  cancelMode: 'abort',
  maxErrorReasons: 20,
  articleHosts: ['mp.weixin.qq.com'],
  timezoneOffsetMinutes: 480,
};

export function createConfig(overrides: Partial<CrawlerConfig> = {}): CrawlerConfig {
  return {
    ...DEFAULT_CONFIG,
    ...overrides,
    strategies: { ...DEFAULT_CONFIG.strategies, ...overrides.strategies },
  };
}

function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(/[,\n]/)
    .map((item) => item.trim())
    .filter((item) => item && !item.startsWith('#'));
}

function readProxyFile(file: string | undefined): string[] {
  if (!file) return [];
  const resolved = path.resolve(process.cwd(), file);
  if (!fs.existsSync(resolved)) {
    logger.warn('Proxy list file not found', { file: resolved });
    return [];
  }
  return splitList(fs.readFileSync(resolved, 'utf-8'));
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CrawlerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  const values = parsed.data;

  return {
    port: values.PORT,
    headless: values.HEADLESS,
    workerConcurrency: values.WORKER_CONCURRENCY,
    maxConcurrentJobs: values.MAX_CONCURRENT_JOBS,
    maxSessions: values.MAX_SESSIONS,
    maxRetries: values.MAX_RETRIES,
    retryBaseDelayMs: values.RETRY_BASE_DELAY_MS,
    retryMaxDelayMs: values.RETRY_MAX_DELAY_MS,
    fetchTimeoutMs: values.FETCH_TIMEOUT_MS,
    jobTimeoutMs: values.JOB_TIMEOUT_MS,
    sessionRequestBudget: values.SESSION_REQUEST_BUDGET,
    proxyRequestBudget: values.PROXY_REQUEST_BUDGET,
    proxyFailureThreshold: values.PROXY_FAILURE_THRESHOLD,
    proxyCooldownMs: values.PROXY_COOLDOWN_MS,
    proxyWaitTimeoutMs: values.PROXY_WAIT_TIMEOUT_MS,
    proxies: [...splitList(values.PROXY_LIST), ...readProxyFile(values.PROXY_LIST_FILE)],
    politenessDelayMs: values.POLITENESS_DELAY_MS,
    politenessJitterMs: values.POLITENESS_JITTER_MS,
    breakerWindow: values.BREAKER_WINDOW,
    breakerMinSamples: values.BREAKER_MIN_SAMPLES,
    breakerThreshold: values.BREAKER_THRESHOLD,
    stallLimit: values.STALL_LIMIT,
    discoverMaxDepth: values.DISCOVER_MAX_DEPTH,
    discoverScrollRounds: values.DISCOVER_SCROLL_ROUNDS,
    historyMaxPages: values.HISTORY_MAX_PAGES,
    strategies: {
      series: values.STRATEGY_SERIES,
      history: values.STRATEGY_HISTORY,
      discover: values.STRATEGY_DISCOVER,
    },
    crossJobDedup: values.CROSS_JOB_DEDUP,
    traverseExisting: values.TRAVERSE_EXISTING,
    cancelMode: values.CANCEL_MODE,
    maxErrorReasons: values.MAX_ERROR_REASONS,
    articleHosts: splitList(values.ARTICLE_HOSTS).map((host) => host.toLowerCase()),
    timezoneOffsetMinutes: values.TIMEZONE_OFFSET_MINUTES,
    storageApiUrl: values.STORAGE_API_URL,
    rawContentDir: values.RAW_CONTENT_DIR,
  };
}
