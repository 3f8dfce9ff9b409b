import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { createCrawlRouter } from './routes/crawl.route';
import { CrawlRuntime } from './services/runtime';
import { errorMessage } from './errors/crawl-errors';
import { logger } from './utils/logger';

export function createServer(runtime: CrawlRuntime) {
  const app = express();

  app.use(cors({
    origin: true,
    credentials: true,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  }));

  app.use(express.json({ limit: '1mb' }));

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', uptime: process.uptime() });
  });

  app.use('/api/crawl', createCrawlRouter(runtime));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error('Unhandled error', { error: errorMessage(err) });
    res.status(500).json({ success: false, error: 'Internal server error' });
  });

  return app;
}
