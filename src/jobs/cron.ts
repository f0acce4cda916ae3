import cron, { type ScheduledTask } from 'node-cron';
import os from 'os';
import { config } from '../config/env';
import { logger } from '../infrastructure/logger';
import { acquireLock, releaseLock } from '../infrastructure/redis';
import type { InvoicePipelineService } from '../services/InvoicePipelineService';

type LockFns = {
  acquire: typeof acquireLock;
  release: typeof releaseLock;
};

/**
 * Runs `fn` only when this instance holds the Redis lock for `jobName`.
 * Returns false when another instance has it.
 */
export async function withRedisLock(
  jobName: string,
  ttlMs: number,
  fn: () => Promise<void>,
  locks: LockFns = { acquire: acquireLock, release: releaseLock },
): Promise<boolean> {
  const instanceId = process.env.HOSTNAME || os.hostname();
  const lockKey = `cron:${jobName}`;
  const lockValue = `${instanceId}:${Date.now()}`;

  const acquired = await locks.acquire({ key: lockKey, value: lockValue, ttlMs }).catch((err: unknown) => {
    logger.warn({ event: 'cron.lock.error', jobName, error: err instanceof Error ? err.message : String(err) }, 'Lock unavailable');
    return false;
  });
  if (!acquired) {
    return false;
  }

  const start = Date.now();
  try {
    await fn();
  } finally {
    // If the TTL already expired the release is a no-op.
    await locks.release({ key: lockKey, value: lockValue }).catch(() => false);
    logger.debug({ event: 'cron.job.done', jobName, durationMs: Date.now() - start, instanceId }, 'Cron job finished');
  }
  return true;
}

export function initCronJobs(pipeline: InvoicePipelineService) {
  logger.info({ event: 'cron.init' }, 'Initializing cron jobs');

  // Guards against overlapping runs on this instance
  let isRecovering = false;

  const schedules: ScheduledTask[] = [];

  // Every minute: pick up runs that stalled mid-pipeline
  schedules.push(
    cron.schedule('* * * * *', async () => {
      if (isRecovering) return;
      isRecovering = true;
      try {
        await withRedisLock('recoverStaleRuns', 5 * 60_000, async () => {
          await pipeline.recoverStaleRuns({ staleMinutes: config.PIPELINE_STALE_MINUTES });
        });
      } catch (err) {
        logger.error({ event: 'cron.recoverStaleRuns.failed', error: err instanceof Error ? err.message : String(err) }, 'Stale run recovery failed');
      } finally {
        isRecovering = false;
      }
    }),
  );

  logger.info({ event: 'cron.scheduled', jobs: ['recoverStaleRuns'] }, 'Stale run recovery scheduled (every minute)');

  return {
    stop: () => {
      for (const task of schedules) {
        task.stop();
      }
    },
  };
}
