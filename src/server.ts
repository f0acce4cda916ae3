import os from 'os';
import { buildApp } from './app';
import { config } from './config/env';
import { initSentry } from './config/sentry';
import { createContainer } from './container';
import { closePool } from './infrastructure/db';
import { closeRedisClients, getRedisClient, pingWithTimeout } from './infrastructure/redis';
import { initCronJobs } from './jobs/cron';
import { closePipelineQueue, setupPipelineWorker } from './services/PipelineQueueService';

// Initialize Sentry before anything else
initSentry();

const start = async () => {
  const container = createContainer();
  const app = buildApp({ pipeline: container.pipeline, notifications: container.notifications });

  let isShuttingDown = false;
  const instanceId = process.env.HOSTNAME || os.hostname();

  let cronHandle: { stop: () => void } | null = null;
  let pipelineWorker: ReturnType<typeof setupPipelineWorker> | null = null;

  const logShutdownError = (step: string) => (err: unknown) => {
    app.log.warn({ event: 'shutdown.step_failed', step, error: err instanceof Error ? err.message : String(err) }, 'Shutdown step failed');
  };

  const handleShutdown = async (signal: string) => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    app.log.info(`Received ${signal}, starting graceful shutdown...`);

    const timeout = setTimeout(() => {
      app.log.error('Force shutdown due to timeout');
      process.exit(1);
    }, 10000);

    try {
      // Stop cron schedules first to prevent new work starting mid-shutdown
      cronHandle?.stop();

      // In-flight runs finish their current stage; the rest resume from the store.
      await pipelineWorker?.close().catch(logShutdownError('worker'));
      await closePipelineQueue().catch(logShutdownError('queue'));

      await app.close();
      await closePool();
      await closeRedisClients();
      clearTimeout(timeout);
      app.log.info('Graceful shutdown complete');
      process.exit(0);
    } catch (err) {
      app.log.error(err, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void handleShutdown('SIGINT'));
  process.on('SIGTERM', () => void handleShutdown('SIGTERM'));

  try {
    // In production, verify Redis connectivity BEFORE binding the HTTP listener.
    if (config.NODE_ENV === 'production') {
      const result = await pingWithTimeout(getRedisClient(), 1000, 1);
      if (!result.ok) {
        throw new Error(`Redis connectivity check failed: ${result.error}`);
      }
    }

    if (config.CRON_ENABLED === 'true') {
      app.log.info(`CRON_ENABLED=true instance=${instanceId}`);
      cronHandle = initCronJobs(container.pipeline);
    } else {
      app.log.info(`CRON_ENABLED=false instance=${instanceId}`);
    }

    if (config.PIPELINE_PROCESSOR_ENABLED === 'true') {
      pipelineWorker = setupPipelineWorker(container.orchestrator, config.PIPELINE_WORKER_CONCURRENCY);
      app.log.info(`Pipeline worker started instance=${instanceId} concurrency=${config.PIPELINE_WORKER_CONCURRENCY}`);
    }

    await app.listen({ port: config.PORT, host: '0.0.0.0' });
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

void start();
