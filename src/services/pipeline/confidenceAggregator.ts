import type { DecisionPolicy } from '../../config/pipeline';
import {
  CHECK_FIELDS,
  CHECK_KINDS,
  type AggregatedConfidence,
  type CheckKind,
  type ExtractedInvoice,
  type FieldAssessment,
  type VerificationOutcome,
} from './types';

function extractionConfidence(invoice: ExtractedInvoice, kind: CheckKind): number {
  const field = invoice[CHECK_FIELDS[kind]];
  return field.status === 'present' ? field.confidence : 0;
}

function assessField(
  invoice: ExtractedInvoice,
  kind: CheckKind,
  outcome: VerificationOutcome | undefined,
  fieldThreshold: number,
): FieldAssessment {
  const field = CHECK_FIELDS[kind];

  // A kind that was never checked (field absent) counts as NotFound.
  if (!outcome) {
    return {
      kind,
      field,
      result: 'NotFound',
      confidence: 0,
      passed: false,
      resolved: true,
      suggestedCorrection: null,
      reason: `${field}: not present on the invoice, nothing to verify`,
    };
  }

  switch (outcome.result) {
    case 'Match': {
      const confidence = extractionConfidence(invoice, kind);
      const passed = confidence >= fieldThreshold;
      return {
        kind,
        field,
        result: 'Match',
        confidence,
        passed,
        resolved: true,
        suggestedCorrection: null,
        reason: passed ? null : `${field}: verified but extraction confidence ${confidence} is below ${fieldThreshold}`,
      };
    }
    case 'Mismatch':
      return {
        kind,
        field,
        result: 'Mismatch',
        confidence: 0,
        passed: false,
        resolved: true,
        suggestedCorrection: outcome.canonicalValue,
        reason: `${field}: ${outcome.message}`,
      };
    case 'NotFound':
      return {
        kind,
        field,
        result: 'NotFound',
        confidence: 0,
        passed: false,
        resolved: true,
        suggestedCorrection: null,
        reason: `${field}: ${outcome.message}`,
      };
    case 'ToolError':
      return {
        kind,
        field,
        result: 'ToolError',
        confidence: null,
        passed: false,
        resolved: false,
        suggestedCorrection: null,
        reason: `${field}: could not be verified (${outcome.toolErrorKind ?? 'unknown'} error: ${outcome.message})`,
      };
  }
}

/**
 * Combines the settled verification outcomes with the extractor's own confidences.
 *
 * Pure: the same invoice and outcome set always produce the same score, whatever
 * order the outcomes arrive in. Checks that errored are left out of the mean and
 * reported as unresolved; more of them than `maxToolErrors` forces manual review.
 */
export function aggregateConfidence(
  invoice: ExtractedInvoice,
  outcomes: readonly VerificationOutcome[],
  policy: DecisionPolicy,
): AggregatedConfidence {
  const byKind = new Map<CheckKind, VerificationOutcome>();
  for (const outcome of outcomes) {
    if (!byKind.has(outcome.kind)) byKind.set(outcome.kind, outcome);
  }

  const fields = CHECK_KINDS.map((kind) => assessField(invoice, kind, byKind.get(kind), policy.fieldThreshold));

  let sum = 0;
  let resolvedCount = 0;
  for (const f of fields) {
    if (f.resolved && f.confidence !== null) {
      sum += f.confidence;
      resolvedCount += 1;
    }
  }

  const unresolved = fields.filter((f) => !f.resolved);
  const overallScore = resolvedCount === 0 ? 0 : sum / resolvedCount;
  const failureReasons = fields.flatMap((f) => (f.reason ? [f.reason] : []));

  return {
    overallScore,
    fields,
    failureReasons,
    unresolvedFields: unresolved.map((f) => f.field),
    toolErrorCount: unresolved.length,
    forcedManualReview: unresolved.length > policy.maxToolErrors,
  };
}
