import type { RunStatus } from './types';

export class PipelineRunNotFoundError extends Error {
  constructor(runId: string) {
    super(`Pipeline run ${runId} not found`);
    this.name = 'PipelineRunNotFoundError';
  }
}

/** The extracted record lacks the fields that identify the invoice. Fatal for the run. */
export class ExtractionMalformedError extends Error {
  constructor(readonly missingFields: string[]) {
    super(`Extracted invoice is missing mandatory identity fields: ${missingFields.join(', ')}`);
    this.name = 'ExtractionMalformedError';
  }
}

export class InvalidRunTransitionError extends Error {
  constructor(
    readonly from: RunStatus,
    readonly to: RunStatus,
  ) {
    super(`Illegal pipeline transition ${from} -> ${to}`);
    this.name = 'InvalidRunTransitionError';
  }
}

export class RunNotCancellableError extends Error {
  constructor(
    readonly runId: string,
    readonly status: RunStatus,
  ) {
    super(`Pipeline run ${runId} is ${status} and can no longer be cancelled`);
    this.name = 'RunNotCancellableError';
  }
}

/**
 * Record creation did not get a definitive answer. The run stays in FINALIZING
 * and a later attempt re-sends the same idempotency key.
 */
export class FinalizationInterruptedError extends Error {
  constructor(
    readonly runId: string,
    options?: { cause?: unknown },
  ) {
    super(`Record creation for run ${runId} was interrupted; finalization must be retried`, options);
    this.name = 'FinalizationInterruptedError';
  }
}

/** Raised at a stage boundary when the run has been asked to stop. */
export class RunCancelledError extends Error {
  constructor(readonly reason: string) {
    super(`Run cancelled: ${reason}`);
    this.name = 'RunCancelledError';
  }
}

/** Another worker wrote the run since this copy was read; this copy must stop. */
export class RunConcurrentUpdateError extends Error {
  constructor(
    readonly runId: string,
    readonly expectedRevision: number,
  ) {
    super(`Pipeline run ${runId} changed since revision ${expectedRevision}`);
    this.name = 'RunConcurrentUpdateError';
  }
}
