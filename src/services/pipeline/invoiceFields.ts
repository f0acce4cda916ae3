import type { CheckContext, ErpToolClient, InvoiceRecordPayload } from '../erp/ErpToolClient';
import { ExtractionMalformedError } from './errors';
import { presentValue, type CheckKind, type ExtractedInvoice, type VerificationOutcome } from './types';

export const MANDATORY_IDENTITY_FIELDS = ['supplierName', 'invoiceNumber'] as const;

export type InvoiceIdentity = {
  supplierName: string;
  invoiceNumber: string;
};

export function assertInvoiceIdentity(invoice: ExtractedInvoice): InvoiceIdentity {
  const supplierName = presentValue(invoice.supplierName)?.trim() ?? '';
  const invoiceNumber = presentValue(invoice.invoiceNumber)?.trim() ?? '';

  const missing = MANDATORY_IDENTITY_FIELDS.filter((f) => (f === 'supplierName' ? !supplierName : !invoiceNumber));
  if (missing.length > 0) {
    throw new ExtractionMalformedError([...missing]);
  }
  return { supplierName, invoiceNumber };
}

export type PlannedCheck = {
  kind: CheckKind;
  execute: (tools: ErpToolClient, ctx: CheckContext) => Promise<VerificationOutcome>;
};

/**
 * Checks whose input is present on the invoice. A kind left out here reaches the
 * aggregator as "no outcome" and is scored as NotFound.
 */
export function planChecks(invoice: ExtractedInvoice): PlannedCheck[] {
  const checks: PlannedCheck[] = [];

  const taxId = presentValue(invoice.taxId);
  if (taxId) {
    checks.push({ kind: 'tax-id', execute: (tools, ctx) => tools.checkTaxId(taxId, ctx) });
  }

  const nationalId = presentValue(invoice.nationalId);
  if (nationalId) {
    checks.push({ kind: 'national-id', execute: (tools, ctx) => tools.checkNationalId(nationalId, ctx) });
  }

  const bankAccount = presentValue(invoice.bankAccount);
  if (bankAccount) {
    checks.push({ kind: 'bank', execute: (tools, ctx) => tools.checkBankAccount(bankAccount, ctx) });
  }

  const poRef = presentValue(invoice.purchaseOrderRef);
  if (poRef) {
    checks.push({ kind: 'purchase-order', execute: (tools, ctx) => tools.checkPurchaseOrder(poRef, ctx) });
  }

  return checks;
}

export function buildRecordPayload(invoice: ExtractedInvoice, identity: InvoiceIdentity): InvoiceRecordPayload {
  return {
    supplierName: identity.supplierName,
    invoiceNumber: identity.invoiceNumber,
    taxId: presentValue(invoice.taxId),
    nationalId: presentValue(invoice.nationalId),
    purchaseOrderRef: presentValue(invoice.purchaseOrderRef),
    invoiceDate: presentValue(invoice.invoiceDate),
    currency: presentValue(invoice.currency),
    netAmount: presentValue(invoice.netAmount),
    taxAmount: presentValue(invoice.taxAmount),
    totalAmount: presentValue(invoice.totalAmount),
    lineItems: presentValue(invoice.lineItems) ?? [],
  };
}

export function idempotencyKeyFor(runId: string): string {
  return `invoice-run-${runId}`;
}
