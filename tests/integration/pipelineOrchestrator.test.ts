import { describe, it, expect, vi } from 'vitest';
import { ToolUnavailableError } from '../../src/services/erp/errors';
import { CANCELLABLE_STATUSES } from '../../src/services/pipeline/PipelineOrchestrator';
import {
  FinalizationInterruptedError,
  PipelineRunNotFoundError,
  RunNotCancellableError,
} from '../../src/services/pipeline/errors';
import { REJECTION_RECOMMENDATION } from '../../src/services/pipeline/reports';
import type { PipelineRun } from '../../src/services/pipeline/types';
import { absent, buildHarness, buildInvoice, present } from '../support/factories';

const unavailable = (tool: string) => new ToolUnavailableError(tool, `${tool} unreachable: connection refused`);

describe('PipelineOrchestrator', () => {
  describe('proceed', () => {
    it('verifies a clean invoice and creates the record under the run key', async () => {
      const { orchestrator, erp, notifier, store } = buildHarness();
      const submitted = await orchestrator.submit({ invoice: buildInvoice(), documentRef: 'scan-001.pdf' });

      const run = await orchestrator.process(submitted.id);

      expect(run.status).toBe('COMPLETED');
      expect(run.decision?.outcome).toBe('Proceed');
      expect(run.result).toEqual({ kind: 'created', recordId: 'REC-0001', replayed: false });
      expect(run.idempotencyKey).toBe(`invoice-run-${submitted.id}`);
      expect(erp.callsTo('create_invoice_record').map((c) => c.idempotencyKey)).toEqual([run.idempotencyKey]);
      expect(erp.callsTo('lookup_supplier')).toHaveLength(0);
      expect(notifier.sent).toHaveLength(0);
      expect(run.archivedAt).not.toBeNull();
      expect(run.history.map((h) => h.to)).toEqual([
        'RECEIVED',
        'VALIDATING',
        'AGGREGATING',
        'ROUTED',
        'FINALIZING',
        'COMPLETED',
      ]);
      expect(store.savedStatuses.get(submitted.id)).toEqual([
        'RECEIVED',
        'VALIDATING',
        'AGGREGATING',
        'ROUTED',
        'FINALIZING',
        'COMPLETED',
        'COMPLETED',
      ]);
    });

    it('retries a transient failure and records the attempts', async () => {
      const { orchestrator, erp, sleeps } = buildHarness();
      erp.failNext('check_bank_account', unavailable('check_bank_account'));
      const { id } = await orchestrator.submit({ invoice: buildInvoice() });

      const run = await orchestrator.process(id);

      expect(run.decision?.outcome).toBe('Proceed');
      expect(run.outcomes.find((o) => o.kind === 'bank')).toMatchObject({ result: 'Match', attempts: 2 });
      expect(sleeps).toEqual([10]);
    });
  });

  describe('malformed extraction', () => {
    it('fails without calling any tool when the supplier name is absent', async () => {
      const { orchestrator, erp, notifier } = buildHarness();
      const { id } = await orchestrator.submit({ invoice: buildInvoice({ supplierName: absent() }) });

      const run = await orchestrator.process(id);

      expect(run.status).toBe('FAILED');
      expect(run.result).toEqual({
        kind: 'failure',
        stage: 'RECEIVED',
        errorName: 'ExtractionMalformedError',
        message: 'Extracted invoice is missing mandatory identity fields: supplierName',
        missingFields: ['supplierName'],
      });
      expect(erp.calls).toHaveLength(0);
      expect(notifier.sent).toHaveLength(0);
    });

    it('treats a blank invoice number as missing', async () => {
      const { orchestrator, erp } = buildHarness();
      const { id } = await orchestrator.submit({ invoice: buildInvoice({ invoiceNumber: present('   ') }) });

      const run = await orchestrator.process(id);

      expect(run.status).toBe('FAILED');
      expect(run.result).toMatchObject({ kind: 'failure', missingFields: ['invoiceNumber'] });
      expect(erp.calls).toHaveLength(0);
    });
  });

  describe('manual review', () => {
    it('routes an unreachable bank check to review naming bankAccount', async () => {
      const { orchestrator, erp, notifier, sleeps } = buildHarness();
      erp.failNext('check_bank_account', unavailable('check_bank_account'), 3);
      const { id } = await orchestrator.submit({ invoice: buildInvoice() });

      const run = await orchestrator.process(id);

      expect(run.status).toBe('COMPLETED');
      expect(run.outcomes.find((o) => o.kind === 'bank')).toMatchObject({
        result: 'ToolError',
        toolErrorKind: 'unavailable',
        attempts: 3,
      });
      expect(sleeps).toEqual([10, 20]);
      expect(run.decision?.outcome).toBe('ManualReview');
      expect(run.decision?.reasons[0]).toBe('1 check(s) could not be completed: bankAccount');
      expect(run.result).toMatchObject({ kind: 'review', unresolvedFields: ['bankAccount'] });
      expect(erp.callsTo('create_invoice_record')).toHaveLength(0);
      expect(notifier.sent).toEqual([
        {
          runId: id,
          outcome: 'ManualReview',
          invoiceNumber: 'F-2026-0042',
          supplierName: 'Atelier Lumen SAS',
          message: 'Invoice F-2026-0042 from Atelier Lumen SAS needs manual review. Unverified: bankAccount.',
          reasons: run.decision?.reasons,
          requiresManualReview: true,
        },
      ]);
    });

    it('does not retry a contract violation and still reviews', async () => {
      const { orchestrator, erp, sleeps } = buildHarness();
      erp.respondWith('check_purchase_order', () => ({ status: 'match', canonicalValue: null, message: 'ok', extra: 1 }));
      const { id } = await orchestrator.submit({ invoice: buildInvoice() });

      const run = await orchestrator.process(id);

      expect(run.outcomes.find((o) => o.kind === 'purchase-order')).toMatchObject({
        result: 'ToolError',
        toolErrorKind: 'protocol',
        attempts: 1,
      });
      expect(sleeps).toEqual([]);
      expect(run.decision?.outcome).toBe('ManualReview');
    });

    it('reviews instead of rejecting when a mismatch comes with an unresolved check', async () => {
      const { orchestrator, erp } = buildHarness();
      erp.failNext('check_bank_account', unavailable('check_bank_account'), 3);
      const { id } = await orchestrator.submit({ invoice: buildInvoice({ purchaseOrderRef: present('PO-TEST-003') }) });

      const run = await orchestrator.process(id);

      expect(run.decision?.outcome).toBe('ManualReview');
      expect(run.result?.kind).toBe('review');
    });
  });

  describe('reject', () => {
    it('rejects a closed purchase order with a report and candidate hints', async () => {
      const { orchestrator, erp, notifier } = buildHarness();
      const { id } = await orchestrator.submit({ invoice: buildInvoice({ purchaseOrderRef: present('PO-TEST-003') }) });

      const run = await orchestrator.process(id);

      expect(run.status).toBe('COMPLETED');
      expect(run.aggregate?.overallScore).toBeCloseTo(0.7125, 10);
      expect(run.decision?.outcome).toBe('Reject');
      expect(run.result).toMatchObject({
        kind: 'rejection',
        invoiceNumber: 'F-2026-0042',
        supplierName: 'Atelier Lumen SAS',
        failures: [
          {
            field: 'purchaseOrderRef',
            reason: 'purchaseOrderRef: purchase order PO-TEST-003 is closed',
            suggestedCorrection: null,
          },
        ],
        recommendation: REJECTION_RECOMMENDATION,
      });
      expect(run.supplierCandidates.map((c) => c.supplierId)).toEqual(['SUP-001', 'SUP-004']);
      expect(erp.callsTo('create_invoice_record')).toHaveLength(0);
      expect(notifier.sent).toHaveLength(1);
      expect(notifier.sent[0]).toMatchObject({
        outcome: 'Reject',
        requiresManualReview: false,
        message: 'Invoice F-2026-0042 from Atelier Lumen SAS was rejected: 1 field(s) failed verification.',
      });
    });

    it('scores an absent checked field as NotFound without calling its tool', async () => {
      const { orchestrator, erp } = buildHarness();
      const { id } = await orchestrator.submit({ invoice: buildInvoice({ nationalId: absent() }) });

      const run = await orchestrator.process(id);

      expect(erp.callsTo('check_national_id')).toHaveLength(0);
      expect(erp.callsTo('lookup_supplier')).toHaveLength(1);
      expect(run.aggregate?.fields[1]).toMatchObject({ field: 'nationalId', result: 'NotFound' });
      expect(run.decision?.outcome).toBe('Reject');
    });

    it('turns a refusal at creation time into a rejection', async () => {
      const { orchestrator, erp, notifier } = buildHarness();
      erp.refuseRecords('DUPLICATE_INVOICE', 'invoice number already booked');
      const { id } = await orchestrator.submit({ invoice: buildInvoice() });

      const run = await orchestrator.process(id);

      expect(run.status).toBe('COMPLETED');
      expect(run.decision).toEqual({
        outcome: 'Reject',
        reasons: ['reference system refused the record (DUPLICATE_INVOICE): invoice number already booked'],
        overriddenBy: 'reference-system',
      });
      expect(run.result?.kind).toBe('rejection');
      expect(notifier.sent.map((n) => n.outcome)).toEqual(['Reject']);
    });
  });

  describe('idempotent finalization', () => {
    it('returns the same record when finalization is replayed', async () => {
      const { orchestrator, erp, store } = buildHarness();
      const { id } = await orchestrator.submit({ invoice: buildInvoice() });
      const first = await orchestrator.process(id);

      // As if the process died after the reference system answered.
      store.put({ ...first, status: 'FINALIZING', result: null, archivedAt: null });
      const replayed = await orchestrator.process(id);

      expect(replayed.result).toEqual({ kind: 'created', recordId: 'REC-0001', replayed: true });
      expect(erp.records.size).toBe(1);
      expect(new Set(erp.callsTo('create_invoice_record').map((c) => c.idempotencyKey))).toEqual(
        new Set([`invoice-run-${id}`]),
      );
    });

    it('leaves an interrupted creation in FINALIZING and finishes it on the next attempt', async () => {
      const { orchestrator, erp, store } = buildHarness();
      erp.failNext('create_invoice_record', unavailable('create_invoice_record'), 3);
      const { id } = await orchestrator.submit({ invoice: buildInvoice() });

      await expect(orchestrator.process(id)).rejects.toBeInstanceOf(FinalizationInterruptedError);
      expect((await store.findById(id))?.status).toBe('FINALIZING');

      const run = await orchestrator.process(id);

      expect(run.status).toBe('COMPLETED');
      expect(run.result).toEqual({ kind: 'created', recordId: 'REC-0001', replayed: false });
      expect(erp.callsTo('create_invoice_record')).toHaveLength(4);
    });
  });

  describe('notification', () => {
    it('notifies once even when a finished run is processed again', async () => {
      const { orchestrator, notifier } = buildHarness();
      const { id } = await orchestrator.submit({ invoice: buildInvoice({ purchaseOrderRef: present('PO-TEST-003') }) });

      await orchestrator.process(id);
      await orchestrator.process(id);

      expect(notifier.sent).toHaveLength(1);
    });

    it('retries a failed notification on the next pass without repeating routing', async () => {
      const { orchestrator, notifier, store } = buildHarness();
      notifier.failNext();
      const { id } = await orchestrator.submit({ invoice: buildInvoice({ purchaseOrderRef: present('PO-TEST-003') }) });

      await expect(orchestrator.process(id)).rejects.toThrow('notification channel down');
      const stored = await store.findById(id);
      expect(stored).toMatchObject({ status: 'COMPLETED', notifiedAt: null, archivedAt: null });

      const run = await orchestrator.process(id);

      expect(notifier.sent).toHaveLength(1);
      expect(run.notifiedAt).not.toBeNull();
      expect(run.archivedAt).not.toBeNull();
    });
  });

  describe('cancellation', () => {
    it('cancels a queued run before any tool call', async () => {
      const { orchestrator, erp } = buildHarness();
      const { id } = await orchestrator.submit({ invoice: buildInvoice() });

      const flagged = await orchestrator.requestCancel(id);
      const run = await orchestrator.process(id);

      expect(flagged.cancelRequested).toBe(true);
      expect(run.status).toBe('CANCELLED');
      expect(run.result).toEqual({ kind: 'cancellation', stage: 'RECEIVED', reason: 'cancellation requested' });
      expect(erp.calls).toHaveLength(0);
    });

    it('stops at the next stage boundary when cancelled mid-validation', async () => {
      const { orchestrator, erp, store } = buildHarness();
      const { id } = await orchestrator.submit({ invoice: buildInvoice() });
      erp.respondWith('check_tax_id', () => {
        void store.requestCancel(id, CANCELLABLE_STATUSES);
        return { status: 'match', canonicalValue: 'FR11000000001', message: 'ok' };
      });

      const run = await orchestrator.process(id);

      expect(run.status).toBe('CANCELLED');
      expect(run.result).toMatchObject({ kind: 'cancellation', stage: 'VALIDATING' });
      expect(erp.callsTo('create_invoice_record')).toHaveLength(0);
    });

    it('cancels when the caller aborts', async () => {
      const { orchestrator } = buildHarness();
      const { id } = await orchestrator.submit({ invoice: buildInvoice() });
      const controller = new AbortController();
      controller.abort();

      const run = await orchestrator.process(id, { signal: controller.signal });

      expect(run.status).toBe('CANCELLED');
      expect(run.result).toMatchObject({ reason: 'processing aborted' });
    });

    it('honours a cancel accepted after routing and before finalization', async () => {
      const { orchestrator, erp, store } = buildHarness();
      const { id } = await orchestrator.submit({ invoice: buildInvoice() });
      const isCancelRequested = store.isCancelRequested.bind(store);
      let accepted: PipelineRun | null = null;
      vi.spyOn(store, 'isCancelRequested').mockImplementation(async (runId) => {
        const flagged = await isCancelRequested(runId);
        if ((await store.findById(runId))?.status === 'ROUTED' && !accepted) {
          accepted = await orchestrator.requestCancel(runId);
        }
        return flagged;
      });

      const run = await orchestrator.process(id);

      expect(accepted).toMatchObject({ status: 'ROUTED', cancelRequested: true });
      expect(run.status).toBe('CANCELLED');
      expect(run.result).toEqual({ kind: 'cancellation', stage: 'ROUTED', reason: 'cancellation requested' });
      expect(erp.callsTo('create_invoice_record')).toHaveLength(0);
      expect(run.history.map((h) => h.to)).not.toContain('FINALIZING');
    });

    it('refuses to cancel a finalizing run', async () => {
      const { orchestrator, store } = buildHarness();
      const submitted = await orchestrator.submit({ invoice: buildInvoice() });
      store.put({ ...submitted, status: 'FINALIZING' });

      await expect(orchestrator.requestCancel(submitted.id)).rejects.toBeInstanceOf(RunNotCancellableError);
    });

    it('reports an unknown run', async () => {
      const { orchestrator } = buildHarness();

      await expect(orchestrator.requestCancel('00000000-0000-4000-8000-999999999999')).rejects.toBeInstanceOf(
        PipelineRunNotFoundError,
      );
    });
  });

  describe('concurrent workers', () => {
    it('lets only one of two simultaneous workers drive a run', async () => {
      const { orchestrator, erp, store, notifier } = buildHarness();
      const { id } = await orchestrator.submit({ invoice: buildInvoice({ purchaseOrderRef: present('PO-TEST-003') }) });

      await Promise.all([orchestrator.process(id), orchestrator.process(id)]);

      expect(erp.calls).toHaveLength(5);
      expect(store.savedStatuses.get(id)).toEqual([
        'RECEIVED',
        'VALIDATING',
        'AGGREGATING',
        'ROUTED',
        'FINALIZING',
        'COMPLETED',
        'COMPLETED',
        'COMPLETED',
      ]);
      expect(notifier.sent).toHaveLength(1);
      expect((await store.findById(id))?.status).toBe('COMPLETED');
    });

    it('lets only one worker resume a run left in VALIDATING', async () => {
      const { orchestrator, erp, store } = buildHarness();
      const submitted = await orchestrator.submit({ invoice: buildInvoice() });
      store.put({
        ...submitted,
        status: 'VALIDATING',
        history: [...submitted.history, { from: 'RECEIVED', to: 'VALIDATING', at: submitted.createdAt }],
      });

      const [first, second] = await Promise.all([orchestrator.process(submitted.id), orchestrator.process(submitted.id)]);

      expect(erp.callsTo('check_tax_id')).toHaveLength(1);
      expect(erp.callsTo('create_invoice_record')).toHaveLength(1);
      expect([first.status, second.status]).toContain('COMPLETED');
    });

    it('does not rewrite a run from a stale copy', async () => {
      const { orchestrator, store } = buildHarness();
      const submitted = await orchestrator.submit({ invoice: buildInvoice() });
      await orchestrator.process(submitted.id);

      const written = await store.save({ ...submitted, status: 'VALIDATING' }, { expectedRevision: submitted.revision });

      expect(written).toBe(false);
      expect((await store.findById(submitted.id))?.status).toBe('COMPLETED');
    });
  });

  describe('recovery and failure', () => {
    it('resumes a run left in VALIDATING by re-issuing the checks', async () => {
      const { orchestrator, store, erp } = buildHarness();
      const submitted = await orchestrator.submit({ invoice: buildInvoice() });
      store.put({
        ...submitted,
        status: 'VALIDATING',
        history: [...submitted.history, { from: 'RECEIVED', to: 'VALIDATING', at: submitted.createdAt }],
      });

      const run = await orchestrator.process(submitted.id);

      expect(run.status).toBe('COMPLETED');
      expect(run.history[2]).toMatchObject({ from: 'VALIDATING', to: 'VALIDATING', note: 'resumed' });
      expect(erp.callsTo('check_tax_id')).toHaveLength(1);
    });

    it('fails the run on an unexpected error during validation', async () => {
      const { orchestrator, erp } = buildHarness();
      erp.failNext('check_tax_id', new Error('boom'));
      const { id } = await orchestrator.submit({ invoice: buildInvoice() });

      const run = await orchestrator.process(id);

      expect(run.status).toBe('FAILED');
      expect(run.result).toMatchObject({ kind: 'failure', stage: 'VALIDATING', errorName: 'Error', message: 'boom' });
    });

    it('closes a run the queue gave up on', async () => {
      const { orchestrator } = buildHarness();
      const { id } = await orchestrator.submit({ invoice: buildInvoice() });

      const run = await orchestrator.failRun(id, new Error('worker crashed'));

      expect(run.status).toBe('FAILED');
      expect(run.result).toEqual({
        kind: 'failure',
        stage: 'RECEIVED',
        errorName: 'Error',
        message: 'worker crashed',
        missingFields: [],
      });
    });
  });
});
