import 'dotenv/config';
import { createApp } from './app';
import { buildAppConfig } from './config/appConfig';
import { getEnv } from './config/env';
import { buildContainer, drainContainer } from './container';
import { errorMessage } from './errors';
import { JobScheduler } from './services/sync/jobScheduler';
import { createLogger } from './utils/logger';
import { closeRedisClient, getRedisConnection } from './utils/redisClient';

const logger = createLogger('server');

const env = getEnv();
const config = buildAppConfig(env);
const container = buildContainer(config);
const scheduler = new JobScheduler(container.jobRunner, config, getRedisConnection(env.REDIS_URL));

const app = createApp({ config, picksService: container.picksService, jobRunner: container.jobRunner });

const server = app.listen(env.PORT, () => {
  logger.info(
    { port: env.PORT, offseason: config.flags.offseason, timezone: config.appTimezone },
    'server listening',
  );
  scheduler.start().catch((err: unknown) => {
    logger.error({ error: errorMessage(err) }, 'scheduler failed to start');
  });
});

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ signal }, 'shutting down');

  server.close();
  try {
    await scheduler.stop();
    await drainContainer(container);
    await closeRedisClient();
  } catch (err) {
    logger.error({ error: errorMessage(err) }, 'shutdown error');
    process.exitCode = 1;
  }
  process.exit();
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});
