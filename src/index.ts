import { buildApp } from './app';
import { env } from './config/env';
import { logger } from './observability/logger';

async function main(): Promise<void> {
  let shuttingDown = false;

  const { app, redis, scheduler } = await buildApp({
    // The store is unreachable: stop taking work rather than lose transitions
    onFatal: (err) => {
      logger.fatal({ err }, 'Conversation store unavailable; shutting down');
      shutdown('fatal', 1).catch((shutdownErr) => {
        logger.error({ err: shutdownErr }, 'Shutdown failed');
        process.exit(1);
      });
    },
  });

  // Graceful shutdown
  async function shutdown(signal: string, exitCode = 0): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down...');
    scheduler.stop();
    await app.close();
    if (redis) {
      redis.disconnect();
    }
    process.exit(exitCode);
  }

  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((err) => logger.error({ err }, 'Shutdown failed'));
  });
  process.on('SIGINT', () => {
    shutdown('SIGINT').catch((err) => logger.error({ err }, 'Shutdown failed'));
  });

  // Start server
  try {
    await app.listen({ port: env.port, host: '0.0.0.0' });
    if (env.scheduler.enabled) {
      scheduler.start(env.scheduler.intervalSeconds * 1000);
    }
    logger.info({
      port: env.port,
      env: env.nodeEnv,
      schedulerEnabled: env.scheduler.enabled,
    }, 'Expert relay started');
  } catch (err) {
    logger.fatal({ err }, 'Failed to start server');
    process.exit(1);
  }
}

main().catch((err) => {
  logger.fatal({ err }, 'Startup failed');
  process.exit(1);
});
