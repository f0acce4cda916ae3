import type { Logger } from 'pino';
import type { ListRunsQueryType } from '../dtos/invoiceDtos';
import type { PipelineRunStore } from '../repositories/pipelineRunRepository';
import type { RunDispatcher } from './PipelineQueueService';
import type { PipelineOrchestrator, SubmitRunInput } from './pipeline/PipelineOrchestrator';
import type { PipelineRun } from './pipeline/types';

export type InvoicePipelineServiceDeps = {
  orchestrator: PipelineOrchestrator;
  dispatcher: RunDispatcher;
  store: PipelineRunStore;
  logger: Logger;
  clock?: () => Date;
};

export type RunPage = {
  items: PipelineRun[];
  page: number;
  limit: number;
  total: number;
};

/**
 * Intake and query surface over the orchestrator. Runs are created here and
 * handed to the queue; nothing in this class executes a run.
 */
export class InvoicePipelineService {
  constructor(private readonly deps: InvoicePipelineServiceDeps) {}

  async submit(input: SubmitRunInput): Promise<PipelineRun> {
    const run = await this.deps.orchestrator.submit(input);
    await this.deps.dispatcher.enqueue(run.id, 'submitted');
    return run;
  }

  getRun(runId: string): Promise<PipelineRun> {
    return this.deps.orchestrator.getRun(runId);
  }

  async listRuns(query: ListRunsQueryType): Promise<RunPage> {
    const { runs, total } = await this.deps.store.list({
      offset: (query.page - 1) * query.limit,
      limit: query.limit,
      status: query.status,
    });
    return { items: runs, page: query.page, limit: query.limit, total };
  }

  cancel(runId: string): Promise<PipelineRun> {
    return this.deps.orchestrator.requestCancel(runId);
  }

  /**
   * Re-enqueues runs nobody has touched for `staleMinutes`: crashed workers,
   * lost jobs, or terminal runs whose notification/archiving did not finish.
   */
  async recoverStaleRuns(params: { staleMinutes: number; limit?: number }): Promise<number> {
    const now = this.deps.clock?.() ?? new Date();
    const olderThan = new Date(now.getTime() - params.staleMinutes * 60_000);
    const stale = await this.deps.store.findStale({ olderThan, limit: params.limit ?? 100 });

    let enqueued = 0;
    for (const run of stale) {
      try {
        await this.deps.dispatcher.enqueue(run.id, 'recovery');
        enqueued += 1;
      } catch (err) {
        this.deps.logger.error(
          { event: 'pipeline.recovery.enqueue_failed', runId: run.id, error: err instanceof Error ? err.message : String(err) },
          'Could not re-enqueue stale run',
        );
      }
    }

    if (stale.length > 0) {
      this.deps.logger.info(
        { event: 'pipeline.recovery', found: stale.length, enqueued },
        `Re-enqueued ${enqueued} stale run(s)`,
      );
    }
    return enqueued;
  }
}
