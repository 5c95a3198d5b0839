import 'dotenv/config';
import { buildApp } from './app';
import { config } from './config';
import { Logger } from './utils/logger';

const app = buildApp();

const start = async () => {
  try {
    await app.listen({ port: config.port, host: '0.0.0.0' });
    app.log.info(`Server listening at ${config.port}`);
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }

  const scheduler = app.syncScheduler;
  if (config.sync.autoSync && scheduler) {
    const logger = new Logger(app.log);
    scheduler.start(config.sync.intervalHours).catch((err: unknown) => {
      logger.error('Initial employee sync failed', err);
    });
  }
};

const shutdown = async (signal: string) => {
  app.log.info(`${signal} received, shutting down`);
  try {
    await app.close();
    process.exit(0);
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    void shutdown(signal);
  });
}

void start();
