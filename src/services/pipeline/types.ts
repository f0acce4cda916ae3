import type { ExtractedInvoiceInput } from '../../dtos/invoiceDtos';

export type ExtractedField<T> =
  | { status: 'present'; value: T; confidence: number }
  | { status: 'absent' };

export type ExtractedInvoice = Readonly<ExtractedInvoiceInput>;

/**
 * Reference-data checks, in the fixed order used for aggregation.
 * The order matters: summing in a stable order keeps scores bit-identical.
 */
export const CHECK_KINDS = ['tax-id', 'national-id', 'bank', 'purchase-order'] as const;

export type CheckKind = (typeof CHECK_KINDS)[number];

export const CHECK_FIELDS = {
  'tax-id': 'taxId',
  'national-id': 'nationalId',
  bank: 'bankAccount',
  'purchase-order': 'purchaseOrderRef',
} as const satisfies Record<CheckKind, keyof ExtractedInvoiceInput>;

export type CheckedField = (typeof CHECK_FIELDS)[CheckKind];

export type VerificationResult = 'Match' | 'Mismatch' | 'NotFound' | 'ToolError';

export type ToolErrorKind = 'unavailable' | 'timeout' | 'protocol';

export type VerificationOutcome = Readonly<{
  kind: CheckKind;
  result: VerificationResult;
  /** Value the reference system holds for this field, when it returned one. */
  canonicalValue: string | null;
  message: string;
  toolErrorKind: ToolErrorKind | null;
  attempts: number;
  latencyMs: number;
  checkedAt: string;
}>;

export type FieldAssessment = {
  kind: CheckKind;
  field: CheckedField;
  result: VerificationResult;
  /** null when the check did not resolve (ToolError). */
  confidence: number | null;
  passed: boolean;
  resolved: boolean;
  suggestedCorrection: string | null;
  reason: string | null;
};

export type AggregatedConfidence = {
  overallScore: number;
  fields: FieldAssessment[];
  failureReasons: string[];
  unresolvedFields: CheckedField[];
  toolErrorCount: number;
  forcedManualReview: boolean;
};

export type RouteOutcome = 'Proceed' | 'Reject' | 'ManualReview';

export type RoutingDecision = {
  outcome: RouteOutcome;
  reasons: string[];
  /** Set when the system of record overruled the pipeline at creation time. */
  overriddenBy?: 'reference-system';
};

export const RunStatus = {
  RECEIVED: 'RECEIVED',
  VALIDATING: 'VALIDATING',
  AGGREGATING: 'AGGREGATING',
  ROUTED: 'ROUTED',
  FINALIZING: 'FINALIZING',
  COMPLETED: 'COMPLETED',
  FAILED: 'FAILED',
  CANCELLED: 'CANCELLED',
} as const;

export type RunStatus = (typeof RunStatus)[keyof typeof RunStatus];

export type SupplierCandidate = {
  supplierId: string;
  name: string;
  taxId: string | null;
  nationalId: string | null;
  score: number;
};

export type FieldFailure = {
  field: string;
  reason: string;
  suggestedCorrection: string | null;
};

export type RejectionReport = {
  kind: 'rejection';
  invoiceNumber: string | null;
  supplierName: string | null;
  overallScore: number;
  failures: FieldFailure[];
  reasons: string[];
  recommendation: string;
  supplierCandidates: SupplierCandidate[];
};

export type ReviewReport = {
  kind: 'review';
  invoiceNumber: string | null;
  supplierName: string | null;
  overallScore: number;
  unresolvedFields: string[];
  failures: FieldFailure[];
  reasons: string[];
  supplierCandidates: SupplierCandidate[];
};

export type FailureReport = {
  kind: 'failure';
  stage: RunStatus;
  errorName: string;
  message: string;
  missingFields: string[];
};

export type CancellationReport = {
  kind: 'cancellation';
  stage: RunStatus;
  reason: string;
};

export type CreatedRecord = {
  kind: 'created';
  recordId: string;
  /** True when the system of record replayed an earlier creation for the same key. */
  replayed: boolean;
};

export type TerminalResult = CreatedRecord | RejectionReport | ReviewReport | FailureReport | CancellationReport;

export type StateTransition = {
  from: RunStatus | null;
  to: RunStatus;
  at: string;
  note?: string;
};

export type PipelineRun = {
  id: string;
  status: RunStatus;
  documentRef: string | null;
  invoice: ExtractedInvoice;
  outcomes: VerificationOutcome[];
  supplierCandidates: SupplierCandidate[];
  aggregate: AggregatedConfidence | null;
  decision: RoutingDecision | null;
  result: TerminalResult | null;
  idempotencyKey: string;
  cancelRequested: boolean;
  /** Bumped on every orchestrator write; writes are compare-and-set on it. */
  revision: number;
  history: StateTransition[];
  notifiedAt: string | null;
  archivedAt: string | null;
  createdAt: string;
  updatedAt: string;
};

export function presentValue<T>(field: ExtractedField<T>): T | null {
  return field.status === 'present' ? field.value : null;
}
