import { maskAccountNumber } from '../../utils/identifiers';
import type { ExtractedInvoice, PipelineRun } from './types';

function maskInvoice(invoice: ExtractedInvoice): ExtractedInvoice {
  const bank = invoice.bankAccount;
  if (bank.status !== 'present') return invoice;
  return {
    ...invoice,
    bankAccount: { ...bank, value: { ...bank.value, accountNumber: maskAccountNumber(bank.value.accountNumber) } },
  };
}

export function toRunSummary(run: PipelineRun) {
  return {
    id: run.id,
    status: run.status,
    documentRef: run.documentRef,
    outcome: run.decision?.outcome ?? null,
    overallScore: run.aggregate?.overallScore ?? null,
    cancelRequested: run.cancelRequested,
    createdAt: run.createdAt,
    updatedAt: run.updatedAt,
  };
}

/** Full run report for the API. Account numbers never leave the service unmasked. */
export function toRunView(run: PipelineRun) {
  return {
    ...toRunSummary(run),
    invoice: maskInvoice(run.invoice),
    outcomes: run.outcomes,
    supplierCandidates: run.supplierCandidates,
    aggregate: run.aggregate,
    decision: run.decision,
    result: run.result,
    history: run.history,
    notifiedAt: run.notifiedAt,
    archivedAt: run.archivedAt,
  };
}
