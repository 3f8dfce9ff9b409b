import { createServer } from './app';
import { createRuntime } from './services/runtime';
import { errorMessage } from './errors/crawl-errors';
import { loadConfig } from './utils/config';
import { loadEnv } from './utils/env';
import { logger } from './utils/logger';
import { PlaywrightSessionFactory } from './utils/playwright';

async function bootstrap() {
  loadEnv();
  const config = loadConfig();
  const runtime = createRuntime(config, {
    sessionFactory: new PlaywrightSessionFactory({
      headless: config.headless,
      navigationTimeoutMs: config.fetchTimeoutMs,
    }),
  });

  const app = createServer(runtime);
  const server = app.listen(config.port, () => {
    logger.info(`Article harvester listening on port ${config.port}`, {
      strategies: runtime.discovery.enabled(),
      workers: config.workerConcurrency,
    });
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down', { signal });
    server.close();
    runtime.jobs
      .shutdown()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Shutdown failed', { error: errorMessage(error) });
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

bootstrap().catch((error) => {
  logger.error('Failed to bootstrap application', { error: errorMessage(error) });
  process.exit(1);
});
