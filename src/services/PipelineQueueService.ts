import { Queue, Worker, type Job } from 'bullmq';
import { getBullMqRedisClient } from '../infrastructure/redis';
import { logger } from '../infrastructure/logger';
import { runWithPipelineContext } from '../infrastructure/requestContext';
import type { PipelineOrchestrator } from './pipeline/PipelineOrchestrator';

export const PIPELINE_QUEUE_NAME = 'pipeline-runs';
export const PIPELINE_JOB_ATTEMPTS = 3;

export type PipelineJobData = {
  runId: string;
  reason: 'submitted' | 'recovery';
};

/** Hands a run to a worker. Processing never happens on the request path. */
export interface RunDispatcher {
  enqueue(runId: string, reason?: PipelineJobData['reason']): Promise<void>;
}

let queue: Queue<PipelineJobData> | null = null;

function getQueue(): Queue<PipelineJobData> {
  if (!queue) {
    queue = new Queue<PipelineJobData>(PIPELINE_QUEUE_NAME, {
      connection: getBullMqRedisClient(),
      defaultJobOptions: {
        attempts: PIPELINE_JOB_ATTEMPTS,
        backoff: {
          type: 'exponential',
          delay: 5000, // 5s, 10s
        },
        removeOnComplete: 1000,
        removeOnFail: 2000,
      },
    });
  }
  return queue;
}

// BullMQ ignores an add whose jobId already exists, so a submission is enqueued
// once; recovery jobs get their own id so they are not swallowed by a retained job.
function jobIdFor(runId: string, reason: PipelineJobData['reason']): string {
  return reason === 'submitted' ? runId : `${runId}-recovery-${Date.now()}`;
}

export const pipelineQueue: RunDispatcher = {
  async enqueue(runId, reason = 'submitted') {
    const job = await getQueue().add('process-run', { runId, reason }, { jobId: jobIdFor(runId, reason) });
    logger.info({ event: 'pipeline.job.enqueued', runId, jobId: job.id, reason }, 'Pipeline run enqueued');
  },
};

export function setupPipelineWorker(orchestrator: PipelineOrchestrator, concurrency: number) {
  const worker = new Worker<PipelineJobData>(
    PIPELINE_QUEUE_NAME,
    async (job: Job<PipelineJobData>) => {
      const { runId } = job.data;
      if (!runId) throw new Error('Job missing runId');

      const run = await runWithPipelineContext({ runId, jobId: job.id, attempt: job.attemptsMade + 1 }, () =>
        orchestrator.process(runId),
      );
      return { runId, status: run.status };
    },
    { connection: getBullMqRedisClient(), concurrency },
  );

  worker.on('failed', (job, err) => {
    logger.error(
      { event: 'pipeline.job.failed', jobId: job?.id, runId: job?.data.runId, attemptsMade: job?.attemptsMade, error: err.message },
      'Pipeline job failed',
    );
    if (!job) return;

    const maxAttempts = job.opts.attempts ?? 1;
    if (job.attemptsMade < maxAttempts) return;

    // Out of attempts: the run is closed as FAILED so it does not linger.
    void orchestrator.failRun(job.data.runId, err).catch((failErr: unknown) => {
      logger.error(
        {
          event: 'pipeline.job.fail_run_error',
          runId: job.data.runId,
          error: failErr instanceof Error ? failErr.message : String(failErr),
        },
        'Could not mark run as failed after retries',
      );
    });
  });

  return worker;
}

export async function closePipelineQueue(): Promise<void> {
  if (queue) {
    await queue.close();
    queue = null;
  }
}
