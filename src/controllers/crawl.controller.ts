import { Request, Response } from 'express';
import { z } from 'zod';
import { InvalidJobRequestError, errorMessage } from '../errors/crawl-errors';
import { CrawlRuntime } from '../services/runtime';
import { CrawlEvent, TERMINAL_STATUSES } from '../types/jobs';
import { logger } from '../utils/logger';

const strategySchema = z.preprocess(
  (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
  z.enum(['series', 'history', 'discover']),
);

const bodySchema = z.object({
  seedUrl: z.string().url(),
  strategy: strategySchema,
  budget: z.number().int().min(1),
  options: z
    .object({
      since: z.string().min(1).optional(),
      maxDepth: z.number().int().min(0).optional(),
    })
    .optional(),
});

export class CrawlController {
  constructor(private readonly runtime: CrawlRuntime) {}

  async createJob(req: Request, res: Response) {
    try {
      const parsed = bodySchema.parse(req.body);
      const job = this.runtime.jobs.submit(parsed.seedUrl, parsed.strategy, parsed.budget, parsed.options ?? {});

      return res.status(202).json({
        jobId: job.jobId,
        state: job.state,
        message: 'Crawl job accepted, follow its progress via /jobs/:jobId or /jobs/:jobId/stream.',
        job,
      });
    } catch (error) {
      if (error instanceof z.ZodError) {
        return res.status(400).json({
          success: false,
          error: 'Invalid request payload',
          details: error.flatten(),
        });
      }
      if (error instanceof InvalidJobRequestError) {
        return res.status(400).json({ success: false, error: error.message });
      }

      logger.error('Failed to enqueue crawl job', { error: errorMessage(error) });
      return res.status(500).json({ success: false, error: 'Failed to enqueue crawl job' });
    }
  }

  listJobs(_req: Request, res: Response) {
    return res.json({ success: true, jobs: this.runtime.jobs.list() });
  }

  getJob(req: Request, res: Response) {
    const job = this.runtime.jobs.status(req.params.jobId);
    if (!job) {
      return res.status(404).json({ success: false, error: 'Job not found' });
    }
    return res.json({ success: true, job });
  }

  cancelJob(req: Request, res: Response) {
    const job = this.runtime.jobs.cancel(req.params.jobId);
    if (!job) {
      return res.status(404).json({ success: false, error: 'Job not found' });
    }
    return res.json({ success: true, job });
  }

  streamJob(req: Request, res: Response) {
    const { jobId } = req.params;
    const job = this.runtime.jobs.status(jobId);
    if (!job) {
      res.status(404).json({ success: false, error: 'Job not found' });
      return;
    }

    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no');
    res.flushHeaders();

    const sendEvent = (event: CrawlEvent) => {
      res.write(`data: ${JSON.stringify(event)}\n\n`);
    };

    sendEvent({ type: 'state', jobId, state: job.state, timestamp: Date.now() });
    if (TERMINAL_STATUSES.includes(job.state)) {
      res.end();
      return;
    }

    const unsubscribe = this.runtime.jobs.subscribe((event) => {
      sendEvent(event);
      if (event.type === 'state' && TERMINAL_STATUSES.includes(event.state)) {
        unsubscribe();
        res.end();
      }
    }, jobId);

    req.on('close', () => {
      logger.debug('Client disconnected from job stream', { jobId });
      unsubscribe();
    });
  }

  proxies(_req: Request, res: Response) {
    return res.json({
      success: true,
      mode: this.runtime.rotator.isDirect ? 'direct' : 'proxied',
      proxies: this.runtime.rotator.stats(),
    });
  }

  sessions(_req: Request, res: Response) {
    return res.json({ success: true, sessions: this.runtime.pool.stats() });
  }

  strategies(_req: Request, res: Response) {
    return res.json({ success: true, strategies: this.runtime.discovery.enabled() });
  }
}
