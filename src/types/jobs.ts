import { ArticleRecord, StrategyName } from './crawl';

export type CrawlJobStatus = 'queued' | 'running' | 'completed' | 'failed' | 'cancelled';

export const TERMINAL_STATUSES: readonly CrawlJobStatus[] = ['completed', 'failed', 'cancelled'];

export interface CrawlJobOptions {
  /** History pagination stops at articles published before this instant. */
  since?: string;
  /** Overrides the configured breadth-first depth limit for the discover strategy. */
  maxDepth?: number;
}

export interface CrawlJobRecord {
  id: string;
  seedUrl: string;
  strategy: StrategyName;
  status: CrawlJobStatus;
  maxArticles: number;
  options: CrawlJobOptions;
  createdAt: string;
  updatedAt: string;
  startedAt?: string;
  finishedAt?: string;
  errorSummary?: string;
}

export interface CrawlJobCounters {
  articlesFound: number;
  articlesFailed: number;
  articlesSkipped: number;
  duplicates: number;
}

export interface CrawlJobView extends CrawlJobCounters {
  jobId: string;
  seedUrl: string;
  strategy: StrategyName;
  state: CrawlJobStatus;
  maxArticles: number;
  frontierSize: number;
  inFlight: number;
  errors: string[];
  errorSummary: string | null;
  createdAt: string;
  updatedAt: string;
  startedAt: string | null;
  finishedAt: string | null;
}

export type CrawlEvent =
  | { type: 'article'; jobId: string; record: ArticleRecord; timestamp: number }
  | { type: 'candidate-failed'; jobId: string; url: string; reason: string; timestamp: number }
  | { type: 'state'; jobId: string; state: CrawlJobStatus; timestamp: number }
  | { type: 'progress'; jobId: string; message: string; timestamp: number };

export type CrawlEventListener = (event: CrawlEvent) => void;
