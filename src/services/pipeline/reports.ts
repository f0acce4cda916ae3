import { ExtractionMalformedError } from './errors';
import {
  presentValue,
  type CancellationReport,
  type FailureReport,
  type FieldFailure,
  type PipelineRun,
  type RejectionReport,
  type ReviewReport,
  type RunStatus,
} from './types';

export const REJECTION_RECOMMENDATION =
  'Verify the listed fields with the supplier and update the reference data if needed before resubmitting the invoice.';

function fieldFailures(run: PipelineRun): FieldFailure[] {
  if (!run.aggregate) return [];
  return run.aggregate.fields
    .filter((f) => !f.passed)
    .map((f) => ({
      field: f.field,
      reason: f.reason ?? `${f.field}: ${f.result}`,
      suggestedCorrection: f.suggestedCorrection,
    }));
}

function header(run: PipelineRun) {
  return {
    invoiceNumber: presentValue(run.invoice.invoiceNumber),
    supplierName: presentValue(run.invoice.supplierName),
    overallScore: run.aggregate?.overallScore ?? 0,
  };
}

export function buildRejectionReport(run: PipelineRun): RejectionReport {
  return {
    kind: 'rejection',
    ...header(run),
    failures: fieldFailures(run),
    reasons: run.decision?.reasons ?? [],
    recommendation: REJECTION_RECOMMENDATION,
    supplierCandidates: run.supplierCandidates,
  };
}

export function buildReviewReport(run: PipelineRun): ReviewReport {
  return {
    kind: 'review',
    ...header(run),
    unresolvedFields: run.aggregate?.unresolvedFields ?? [],
    failures: fieldFailures(run),
    reasons: run.decision?.reasons ?? [],
    supplierCandidates: run.supplierCandidates,
  };
}

export function buildFailureReport(stage: RunStatus, err: unknown): FailureReport {
  if (err instanceof ExtractionMalformedError) {
    return {
      kind: 'failure',
      stage,
      errorName: err.name,
      message: err.message,
      missingFields: err.missingFields,
    };
  }
  return {
    kind: 'failure',
    stage,
    errorName: err instanceof Error ? err.name : 'Error',
    message: err instanceof Error ? err.message : String(err),
    missingFields: [],
  };
}

export function buildCancellationReport(stage: RunStatus, reason: string): CancellationReport {
  return { kind: 'cancellation', stage, reason };
}

export function buildNotificationMessage(report: RejectionReport | ReviewReport): string {
  const invoice = report.invoiceNumber ?? 'unknown invoice';
  const supplier = report.supplierName ?? 'unknown supplier';
  if (report.kind === 'rejection') {
    return `Invoice ${invoice} from ${supplier} was rejected: ${report.failures.length} field(s) failed verification.`;
  }
  const unresolved = report.unresolvedFields.length > 0 ? ` Unverified: ${report.unresolvedFields.join(', ')}.` : '';
  return `Invoice ${invoice} from ${supplier} needs manual review.${unresolved}`;
}
