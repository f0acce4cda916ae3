import { describe, it, expect } from 'vitest';
import { DEFAULT_DECISION_POLICY } from '../../../src/config/pipeline';
import { aggregateConfidence } from '../../../src/services/pipeline/confidenceAggregator';
import { ExtractionMalformedError } from '../../../src/services/pipeline/errors';
import {
  REJECTION_RECOMMENDATION,
  buildCancellationReport,
  buildFailureReport,
  buildNotificationMessage,
  buildRejectionReport,
  buildReviewReport,
} from '../../../src/services/pipeline/reports';
import { decideRoute } from '../../../src/services/pipeline/routingDecision';
import type { PipelineRun, VerificationOutcome } from '../../../src/services/pipeline/types';
import { buildInvoice } from '../../support/factories';
import { outcome } from '../../support/outcomes';

function routedRun(outcomes: VerificationOutcome[]): PipelineRun {
  const invoice = buildInvoice();
  const aggregate = aggregateConfidence(invoice, outcomes, DEFAULT_DECISION_POLICY);
  return {
    id: 'run-1',
    status: 'FINALIZING',
    documentRef: null,
    invoice,
    outcomes,
    supplierCandidates: [],
    aggregate,
    decision: decideRoute(aggregate, DEFAULT_DECISION_POLICY),
    result: null,
    idempotencyKey: 'invoice-run-run-1',
    cancelRequested: false,
    revision: 4,
    history: [],
    notifiedAt: null,
    archivedAt: null,
    createdAt: '2026-03-02T09:00:00.000Z',
    updatedAt: '2026-03-02T09:00:00.000Z',
  };
}

describe('buildRejectionReport', () => {
  it('lists each failed field with its suggested correction', () => {
    const run = routedRun([
      outcome('tax-id', 'Mismatch', { canonicalValue: 'FR99000000009', message: 'taxId differs' }),
      outcome('national-id', 'Match'),
      outcome('bank', 'Match'),
      outcome('purchase-order', 'Match'),
    ]);

    const report = buildRejectionReport(run);

    expect(report.failures).toEqual([
      { field: 'taxId', reason: 'taxId: taxId differs', suggestedCorrection: 'FR99000000009' },
    ]);
    expect(report.recommendation).toBe(REJECTION_RECOMMENDATION);
    expect(report.reasons).toEqual(run.decision?.reasons);
    expect(buildNotificationMessage(report)).toBe(
      'Invoice F-2026-0042 from Atelier Lumen SAS was rejected: 1 field(s) failed verification.',
    );
  });
});

describe('buildReviewReport', () => {
  it('names the unresolved fields', () => {
    const run = routedRun([
      outcome('tax-id', 'Match'),
      outcome('national-id', 'ToolError'),
      outcome('bank', 'ToolError', { toolErrorKind: 'timeout' }),
      outcome('purchase-order', 'Match'),
    ]);

    const report = buildReviewReport(run);

    expect(report.unresolvedFields).toEqual(['nationalId', 'bankAccount']);
    expect(report.failures.map((f) => f.field)).toEqual(['nationalId', 'bankAccount']);
    expect(buildNotificationMessage(report)).toBe(
      'Invoice F-2026-0042 from Atelier Lumen SAS needs manual review. Unverified: nationalId, bankAccount.',
    );
  });
});

describe('buildFailureReport', () => {
  it('carries the missing fields of a malformed extraction', () => {
    expect(buildFailureReport('RECEIVED', new ExtractionMalformedError(['invoiceNumber']))).toEqual({
      kind: 'failure',
      stage: 'RECEIVED',
      errorName: 'ExtractionMalformedError',
      message: 'Extracted invoice is missing mandatory identity fields: invoiceNumber',
      missingFields: ['invoiceNumber'],
    });
  });

  it('describes a thrown non-error value', () => {
    expect(buildFailureReport('VALIDATING', 'disk full')).toEqual({
      kind: 'failure',
      stage: 'VALIDATING',
      errorName: 'Error',
      message: 'disk full',
      missingFields: [],
    });
  });
});

describe('buildCancellationReport', () => {
  it('records where the run stopped', () => {
    expect(buildCancellationReport('AGGREGATING', 'cancellation requested')).toEqual({
      kind: 'cancellation',
      stage: 'AGGREGATING',
      reason: 'cancellation requested',
    });
  });
});
