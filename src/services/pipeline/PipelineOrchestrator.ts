import { randomUUID } from 'crypto';
import { performance } from 'perf_hooks';
import * as Sentry from '@sentry/node';
import type { Logger } from 'pino';
import type { PipelineSettings } from '../../config/pipeline';
import { getPipelineContext, runWithPipelineContext } from '../../infrastructure/requestContext';
import type { PipelineRunStore, SaveGuard } from '../../repositories/pipelineRunRepository';
import { withRetry } from '../../utils/retry';
import type { ErpToolClient, RecordCreationResult } from '../erp/ErpToolClient';
import { ErpToolError, ToolProtocolError, isTransientToolError } from '../erp/errors';
import type { ReviewNotifier } from '../notificationService';
import { aggregateConfidence } from './confidenceAggregator';
import {
  ExtractionMalformedError,
  FinalizationInterruptedError,
  PipelineRunNotFoundError,
  RunCancelledError,
  RunConcurrentUpdateError,
  RunNotCancellableError,
} from './errors';
import { assertInvoiceIdentity, buildRecordPayload, idempotencyKeyFor, planChecks, type PlannedCheck } from './invoiceFields';
import {
  buildCancellationReport,
  buildFailureReport,
  buildNotificationMessage,
  buildRejectionReport,
  buildReviewReport,
} from './reports';
import { decideRoute } from './routingDecision';
import { assertTransition, isCancellable, isTerminal } from './runStateMachine';
import {
  CHECK_KINDS,
  RunStatus,
  presentValue,
  type ExtractedInvoice,
  type PipelineRun,
  type RejectionReport,
  type ReviewReport,
  type RoutingDecision,
  type StateTransition,
  type SupplierCandidate,
  type TerminalResult,
  type VerificationOutcome,
} from './types';

export type PipelineOrchestratorDeps = {
  store: PipelineRunStore;
  tools: ErpToolClient;
  notifier: ReviewNotifier;
  settings: PipelineSettings;
  logger: Logger;
  clock?: () => Date;
  newId?: () => string;
  /** Backoff sleep between tool retries. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

export type SubmitRunInput = {
  invoice: ExtractedInvoice;
  documentRef?: string | null;
};

type RunPatch = Partial<Omit<PipelineRun, 'id' | 'status' | 'revision' | 'history' | 'createdAt' | 'updatedAt'>>;

export const CANCELLABLE_STATUSES: readonly RunStatus[] = Object.values(RunStatus).filter(isCancellable);

const errorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));

/**
 * Drives one run from RECEIVED to a terminal state.
 *
 * Every transition is persisted before the next stage starts, so `process` can be
 * called again on the same run after a crash and picks up where the store says it
 * stopped. Record creation is the only external write; once a run is FINALIZING it
 * can no longer be cancelled and an interrupted creation is retried with the same
 * idempotency key.
 *
 * Writes are compare-and-set on the run's revision. A worker whose copy went stale
 * (a recovery job overlapping a slow worker, a stalled BullMQ job) stops quietly.
 */
export class PipelineOrchestrator {
  private readonly clock: () => Date;
  private readonly newId: () => string;

  constructor(private readonly deps: PipelineOrchestratorDeps) {
    this.clock = deps.clock ?? (() => new Date());
    this.newId = deps.newId ?? randomUUID;
  }

  async submit(input: SubmitRunInput): Promise<PipelineRun> {
    const id = this.newId();
    const at = this.now();
    const run: PipelineRun = {
      id,
      status: RunStatus.RECEIVED,
      documentRef: input.documentRef ?? null,
      invoice: input.invoice,
      outcomes: [],
      supplierCandidates: [],
      aggregate: null,
      decision: null,
      result: null,
      idempotencyKey: idempotencyKeyFor(id),
      cancelRequested: false,
      revision: 0,
      history: [{ from: null, to: RunStatus.RECEIVED, at }],
      notifiedAt: null,
      archivedAt: null,
      createdAt: at,
      updatedAt: at,
    };

    await this.deps.store.create(run);
    this.deps.logger.info(
      { event: 'pipeline.run.received', runId: id, documentRef: run.documentRef },
      'Pipeline run received',
    );
    return run;
  }

  async getRun(runId: string): Promise<PipelineRun> {
    const run = await this.deps.store.findById(runId);
    if (!run) throw new PipelineRunNotFoundError(runId);
    return run;
  }

  /**
   * Raises the cancel flag. The run stops at its next stage boundary; a run that
   * already reached FINALIZING is not cancellable.
   */
  async requestCancel(runId: string): Promise<PipelineRun> {
    const flagged = await this.deps.store.requestCancel(runId, CANCELLABLE_STATUSES);
    if (flagged) {
      this.deps.logger.info({ event: 'pipeline.cancel.requested', runId, status: flagged.status }, 'Cancellation requested');
      return flagged;
    }

    const run = await this.getRun(runId);
    throw new RunNotCancellableError(runId, run.status);
  }

  async process(runId: string, options: { signal?: AbortSignal } = {}): Promise<PipelineRun> {
    if (getPipelineContext()?.runId !== runId) {
      return runWithPipelineContext({ runId }, () => this.process(runId, options));
    }

    try {
      return await this.drive(runId, options.signal);
    } catch (err) {
      if (!(err instanceof RunConcurrentUpdateError)) throw err;
      // Another worker owns the run now; leave it to them.
      this.deps.logger.warn(
        { event: 'pipeline.run.concurrent_update', runId, expectedRevision: err.expectedRevision },
        'Run was advanced by another worker, stopping',
      );
      return this.getRun(runId);
    }
  }

  /** Used once the queue has given up on a run. */
  async failRun(runId: string, err: unknown): Promise<PipelineRun> {
    const run = await this.getRun(runId);
    if (isTerminal(run.status)) return run;
    return this.fail(run, err);
  }

  private async drive(runId: string, signal?: AbortSignal): Promise<PipelineRun> {
    const run = await this.getRun(runId);
    if (isTerminal(run.status)) return this.settleTerminal(run);
    if (run.status === RunStatus.FINALIZING) return this.finalize(run);

    let routed: PipelineRun;
    try {
      routed = await this.advanceToRouted(run, signal);
    } catch (err) {
      return this.handleStageError(runId, err, signal);
    }
    return this.finalize(routed);
  }

  private async advanceToRouted(run: PipelineRun, signal?: AbortSignal): Promise<PipelineRun> {
    if (run.cancelRequested) throw new RunCancelledError('cancellation requested');

    let current = run;
    if (current.status === RunStatus.RECEIVED || current.status === RunStatus.VALIDATING) {
      current = await this.validate(current, signal);
    }
    if (current.status === RunStatus.AGGREGATING) {
      current = await this.route(current);
    }
    await this.checkpoint(current, signal);
    return current;
  }

  private async validate(run: PipelineRun, signal?: AbortSignal): Promise<PipelineRun> {
    // Before any tool call: a record that cannot be identified is never checked.
    const identity = assertInvoiceIdentity(run.invoice);
    await this.checkpoint(run, signal);

    const resumed = run.status === RunStatus.VALIDATING;
    const validating = await this.transition(
      run,
      RunStatus.VALIDATING,
      { outcomes: [], supplierCandidates: [] },
      resumed ? 'resumed' : undefined,
    );

    const planned = planChecks(validating.invoice);
    const settled = await Promise.allSettled(
      planned.map((check) => this.runCheck(check, identity.supplierName, signal)),
    );

    const outcomes: VerificationOutcome[] = [];
    for (const s of settled) {
      if (s.status === 'rejected') throw s.reason;
      outcomes.push(s.value);
    }

    const supplierCandidates = await this.lookupCandidates(identity.supplierName, outcomes, planned.length, signal);

    await this.checkpoint(validating, signal);
    return this.transition(validating, RunStatus.AGGREGATING, { outcomes, supplierCandidates });
  }

  private async runCheck(check: PlannedCheck, supplierHint: string, signal?: AbortSignal): Promise<VerificationOutcome> {
    const { toolRetry } = this.deps.settings;
    const started = performance.now();
    let attempts = 0;

    try {
      return await withRetry(
        (attempt) => {
          attempts = attempt;
          return check.execute(this.deps.tools, { supplierHint, attempt, signal });
        },
        {
          retries: toolRetry.maxRetries,
          baseDelayMs: toolRetry.baseDelayMs,
          shouldRetry: isTransientToolError,
          signal,
          sleep: this.deps.sleep,
          onRetry: ({ attempt, delayMs, error }) => {
            this.deps.logger.warn(
              { event: 'erp.tool.retry', check: check.kind, attempt, delayMs, error: errorMessage(error) },
              'Reference check failed, retrying',
            );
          },
        },
      );
    } catch (err) {
      if (!(err instanceof ErpToolError)) throw err;

      if (err instanceof ToolProtocolError) {
        this.deps.logger.error(
          { event: 'erp.tool.protocol_error', check: check.kind, tool: err.tool, issues: err.issues },
          'Reference tool answered outside its contract',
        );
      } else {
        this.deps.logger.warn(
          { event: 'erp.tool.exhausted', check: check.kind, tool: err.tool, kind: err.kind, attempts },
          'Reference check could not be completed',
        );
      }

      const outcome: VerificationOutcome = {
        kind: check.kind,
        result: 'ToolError',
        canonicalValue: null,
        message: err.message,
        toolErrorKind: err.kind,
        attempts,
        latencyMs: Math.round(performance.now() - started),
        checkedAt: this.now(),
      };
      return Object.freeze(outcome);
    }
  }

  private async lookupCandidates(
    supplierName: string,
    outcomes: VerificationOutcome[],
    plannedCount: number,
    signal?: AbortSignal,
  ): Promise<SupplierCandidate[]> {
    if (!this.deps.settings.supplierLookupFallback) return [];

    const unverified =
      plannedCount < CHECK_KINDS.length || outcomes.some((o) => o.result === 'Mismatch' || o.result === 'NotFound');
    if (!unverified) return [];

    try {
      const candidates = await this.deps.tools.lookupSupplier(supplierName, { signal });
      this.deps.logger.info(
        { event: 'pipeline.supplier_lookup', candidates: candidates.length },
        'Supplier candidates attached for the reviewer',
      );
      return candidates;
    } catch (err) {
      if (signal?.aborted) throw err;
      // Hints only; a failed lookup never changes the routing.
      this.deps.logger.warn(
        { event: 'pipeline.supplier_lookup.failed', error: errorMessage(err) },
        'Supplier lookup failed',
      );
      return [];
    }
  }

  private async route(run: PipelineRun): Promise<PipelineRun> {
    const { policy } = this.deps.settings;
    const aggregate = aggregateConfidence(run.invoice, run.outcomes, policy);
    const decision = decideRoute(aggregate, policy);

    this.deps.logger.info(
      {
        event: 'pipeline.routed',
        outcome: decision.outcome,
        score: aggregate.overallScore,
        toolErrors: aggregate.toolErrorCount,
      },
      `Run routed to ${decision.outcome}`,
    );
    return this.transition(run, RunStatus.ROUTED, { aggregate, decision }, decision.outcome);
  }

  private async finalize(run: PipelineRun): Promise<PipelineRun> {
    const { decision, aggregate } = run;
    if (!decision || !aggregate) {
      return this.fail(run, new Error(`Run ${run.id} reached finalization without a routing decision`));
    }

    const finalizing = run.status === RunStatus.FINALIZING ? run : await this.enterFinalizing(run, decision);
    if (finalizing.status === RunStatus.CANCELLED) return finalizing;

    switch (decision.outcome) {
      case 'Proceed':
        return this.createRecord(finalizing);
      case 'Reject':
        return this.complete(finalizing, buildRejectionReport(finalizing));
      case 'ManualReview':
        return this.complete(finalizing, buildReviewReport(finalizing));
    }
  }

  /** ROUTED -> FINALIZING only lands while no cancel request is stored. */
  private async enterFinalizing(run: PipelineRun, decision: RoutingDecision): Promise<PipelineRun> {
    try {
      return await this.transition(run, RunStatus.FINALIZING, {}, decision.outcome, { unlessCancelRequested: true });
    } catch (err) {
      if (!(err instanceof RunConcurrentUpdateError)) throw err;
      const current = await this.getRun(run.id);
      if (current.revision !== run.revision || !current.cancelRequested) throw err;
      return this.cancel(current, 'cancellation requested');
    }
  }

  private async createRecord(run: PipelineRun): Promise<PipelineRun> {
    const identity = assertInvoiceIdentity(run.invoice);
    const { toolRetry } = this.deps.settings;

    let result: RecordCreationResult;
    try {
      result = await withRetry(
        () => this.deps.tools.createInvoiceRecord(buildRecordPayload(run.invoice, identity), run.idempotencyKey),
        {
          retries: toolRetry.maxRetries,
          baseDelayMs: toolRetry.baseDelayMs,
          shouldRetry: isTransientToolError,
          sleep: this.deps.sleep,
          onRetry: ({ attempt, delayMs, error }) => {
            this.deps.logger.warn(
              { event: 'erp.record.retry', attempt, delayMs, error: errorMessage(error) },
              'Record creation failed, retrying with the same idempotency key',
            );
          },
        },
      );
    } catch (err) {
      if (err instanceof ErpToolError) {
        this.deps.logger.warn(
          { event: 'pipeline.finalize.interrupted', kind: err.kind, idempotencyKey: run.idempotencyKey },
          'Record creation interrupted, run stays in FINALIZING',
        );
        throw new FinalizationInterruptedError(run.id, { cause: err });
      }
      throw err;
    }

    if (result.status === 'created') {
      this.deps.logger.info(
        { event: 'pipeline.record.created', recordId: result.recordId, replayed: result.replayed },
        'Invoice record created',
      );
      return this.complete(run, { kind: 'created', recordId: result.recordId, replayed: result.replayed });
    }

    // The system of record has the last word: its refusal turns Proceed into Reject.
    const decision: RoutingDecision = {
      outcome: 'Reject',
      reasons: [`reference system refused the record (${result.code}): ${result.message}`],
      overriddenBy: 'reference-system',
    };
    this.deps.logger.warn(
      { event: 'pipeline.record.refused', code: result.code },
      'Reference system refused the invoice record',
    );
    const overridden: PipelineRun = { ...run, decision };
    return this.complete(overridden, buildRejectionReport(overridden));
  }

  private async complete(run: PipelineRun, result: TerminalResult): Promise<PipelineRun> {
    const completed = await this.transition(run, RunStatus.COMPLETED, { result });
    return this.settleTerminal(completed);
  }

  private async fail(run: PipelineRun, err: unknown): Promise<PipelineRun> {
    const report = buildFailureReport(run.status, err);

    if (err instanceof ExtractionMalformedError) {
      this.deps.logger.warn(
        { event: 'pipeline.run.malformed', runId: run.id, missingFields: err.missingFields },
        'Extracted invoice cannot be identified',
      );
    } else {
      Sentry.captureException(err, { tags: { runId: run.id, stage: run.status } });
      this.deps.logger.error(
        { event: 'pipeline.run.failed', runId: run.id, stage: run.status, errorName: report.errorName, error: report.message },
        'Pipeline run failed',
      );
    }

    const failed = await this.transition(run, RunStatus.FAILED, { result: report });
    return this.settleTerminal(failed);
  }

  private async cancel(run: PipelineRun, reason: string): Promise<PipelineRun> {
    const cancelled = await this.transition(
      run,
      RunStatus.CANCELLED,
      { result: buildCancellationReport(run.status, reason) },
      reason,
    );
    return this.settleTerminal(cancelled);
  }

  private async handleStageError(runId: string, err: unknown, signal?: AbortSignal): Promise<PipelineRun> {
    if (err instanceof RunConcurrentUpdateError) throw err;

    // The store holds the last persisted state; stages may have moved past the caller's copy.
    const current = await this.getRun(runId);
    if (isTerminal(current.status) || current.status === RunStatus.FINALIZING) throw err;

    if (err instanceof RunCancelledError) return this.cancel(current, err.reason);
    if (signal?.aborted) return this.cancel(current, 'processing aborted');
    return this.fail(current, err);
  }

  private async checkpoint(run: PipelineRun, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw new RunCancelledError('processing aborted');
    if (await this.deps.store.isCancelRequested(run.id)) {
      throw new RunCancelledError('cancellation requested');
    }
  }

  /** Terminal side effects: the review notification (once) and archiving. */
  private async settleTerminal(run: PipelineRun): Promise<PipelineRun> {
    let current = run;

    const report = current.result;
    if (
      current.status === RunStatus.COMPLETED &&
      !current.notifiedAt &&
      report &&
      (report.kind === 'rejection' || report.kind === 'review')
    ) {
      current = await this.notifyOnce(current, report);
    }

    if (!current.archivedAt) {
      const at = this.now();
      current = await this.persist(current, { ...current, archivedAt: at, updatedAt: at });
      this.deps.logger.info(
        { event: 'pipeline.run.archived', runId: current.id, status: current.status },
        'Pipeline run archived',
      );
    }
    return current;
  }

  private async notifyOnce(run: PipelineRun, report: RejectionReport | ReviewReport): Promise<PipelineRun> {
    await this.deps.notifier.notify({
      runId: run.id,
      outcome: report.kind === 'rejection' ? 'Reject' : 'ManualReview',
      invoiceNumber: presentValue(run.invoice.invoiceNumber),
      supplierName: presentValue(run.invoice.supplierName),
      message: buildNotificationMessage(report),
      reasons: report.reasons,
      requiresManualReview: report.kind === 'review',
    });

    const at = this.now();
    return this.persist(run, { ...run, notifiedAt: at, updatedAt: at });
  }

  private async transition(
    run: PipelineRun,
    to: RunStatus,
    patch: RunPatch = {},
    note?: string,
    guard: Omit<SaveGuard, 'expectedRevision'> = {},
  ): Promise<PipelineRun> {
    assertTransition(run.status, to);
    const at = this.now();
    const entry: StateTransition = note ? { from: run.status, to, at, note } : { from: run.status, to, at };
    const next = await this.persist(
      run,
      { ...run, ...patch, status: to, history: [...run.history, entry], updatedAt: at },
      guard,
    );
    this.deps.logger.info(
      { event: 'pipeline.transition', runId: run.id, from: run.status, to, note },
      `Run ${run.status} -> ${to}`,
    );
    return next;
  }

  /** Writes `next` over `prev` only if nobody else wrote the run in between. */
  private async persist(
    prev: PipelineRun,
    next: PipelineRun,
    guard: Omit<SaveGuard, 'expectedRevision'> = {},
  ): Promise<PipelineRun> {
    const written: PipelineRun = { ...next, revision: prev.revision + 1 };
    const saved = await this.deps.store.save(written, { ...guard, expectedRevision: prev.revision });
    if (!saved) throw new RunConcurrentUpdateError(prev.id, prev.revision);
    return written;
  }

  private now(): string {
    return this.clock().toISOString();
  }
}
