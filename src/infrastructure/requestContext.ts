import { AsyncLocalStorage } from 'async_hooks';

export type PipelineContext = {
  runId: string;
  jobId?: string;
  attempt?: number;
};

const als = new AsyncLocalStorage<PipelineContext>();

export function runWithPipelineContext<T>(ctx: PipelineContext, fn: () => T): T {
  return als.run(ctx, fn);
}

export function getPipelineContext(): PipelineContext | undefined {
  return als.getStore();
}
