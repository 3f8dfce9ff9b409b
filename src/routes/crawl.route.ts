import { Router } from 'express';
import { CrawlController } from '../controllers/crawl.controller';
import { CrawlRuntime } from '../services/runtime';

export function createCrawlRouter(runtime: CrawlRuntime): Router {
  const controller = new CrawlController(runtime);
  const router = Router();

  router.post('/jobs', controller.createJob.bind(controller));
  router.get('/jobs', controller.listJobs.bind(controller));
  router.get('/jobs/:jobId', controller.getJob.bind(controller));
  router.get('/jobs/:jobId/stream', controller.streamJob.bind(controller));
  router.post('/jobs/:jobId/cancel', controller.cancelJob.bind(controller));
  router.delete('/jobs/:jobId', controller.cancelJob.bind(controller));
  router.get('/proxies', controller.proxies.bind(controller));
  router.get('/sessions', controller.sessions.bind(controller));
  router.get('/strategies', controller.strategies.bind(controller));

  return router;
}
