import { performance } from 'perf_hooks';
import type { output, ZodTypeAny } from 'zod';
import type { CheckKind, SupplierCandidate, VerificationOutcome, VerificationResult } from '../pipeline/types';
import { normalizeRoutingCode, normalizeAccountNumber, normalizeTaxId } from '../../utils/identifiers';
import { normalizeSupplierName } from '../../utils/normalizeSupplierName';
import { ToolProtocolError } from './errors';
import type { ErpToolTransport } from './httpToolTransport';
import {
  CheckResponse,
  CreateRecordResponse,
  ERP_TOOLS,
  LookupSupplierResponse,
  type CheckResponseType,
  type ErpToolName,
} from './toolSchemas';

export type CheckContext = {
  supplierHint: string | null;
  /** 1-based attempt number, recorded on the outcome. */
  attempt?: number;
  signal?: AbortSignal;
};

export type InvoiceRecordPayload = {
  supplierName: string;
  invoiceNumber: string;
  taxId: string | null;
  nationalId: string | null;
  purchaseOrderRef: string | null;
  invoiceDate: string | null;
  currency: string | null;
  netAmount: number | null;
  taxAmount: number | null;
  totalAmount: number | null;
  lineItems: Array<{ description: string; quantity: number; unitPrice: number }>;
};

export type RecordCreationResult =
  | { status: 'created'; recordId: string; replayed: boolean }
  | { status: 'rejected'; code: string; message: string };

const RESULT_BY_STATUS: Record<CheckResponseType['status'], VerificationResult> = {
  match: 'Match',
  mismatch: 'Mismatch',
  not_found: 'NotFound',
};

/**
 * Typed client for the reference-data (ERP) tools. One method per capability,
 * no state between calls. Transport failures surface as ErpToolError subclasses
 * and are never folded into a NotFound outcome.
 */
export class ErpToolClient {
  constructor(
    private readonly transport: ErpToolTransport,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  checkTaxId(taxId: string, ctx: CheckContext): Promise<VerificationOutcome> {
    return this.runCheck('tax-id', ERP_TOOLS.checkTaxId, { taxId: normalizeTaxId(taxId), supplierHint: ctx.supplierHint }, ctx);
  }

  checkNationalId(nationalId: string, ctx: CheckContext): Promise<VerificationOutcome> {
    return this.runCheck(
      'national-id',
      ERP_TOOLS.checkNationalId,
      { nationalId: nationalId.replace(/\s+/g, ''), supplierHint: ctx.supplierHint },
      ctx,
    );
  }

  checkBankAccount(
    account: { accountNumber: string; routingCode: string },
    ctx: CheckContext,
  ): Promise<VerificationOutcome> {
    return this.runCheck(
      'bank',
      ERP_TOOLS.checkBankAccount,
      {
        accountNumber: normalizeAccountNumber(account.accountNumber),
        routingCode: normalizeRoutingCode(account.routingCode),
        supplierHint: ctx.supplierHint,
      },
      ctx,
    );
  }

  checkPurchaseOrder(reference: string, ctx: CheckContext): Promise<VerificationOutcome> {
    return this.runCheck(
      'purchase-order',
      ERP_TOOLS.checkPurchaseOrder,
      { reference: reference.trim(), supplierHint: ctx.supplierHint },
      ctx,
    );
  }

  async lookupSupplier(name: string, options: { signal?: AbortSignal } = {}): Promise<SupplierCandidate[]> {
    const raw = await this.transport.call(ERP_TOOLS.lookupSupplier, { name: name.trim() }, options);
    const parsed = parseResponse(ERP_TOOLS.lookupSupplier, LookupSupplierResponse, raw);

    // Entries that differ only in accents or legal form are the same supplier for the reviewer.
    const byName = new Map<string, SupplierCandidate>();
    for (const candidate of parsed.candidates) {
      const key = normalizeSupplierName(candidate.name);
      const previous = byName.get(key);
      if (!previous || candidate.score > previous.score) byName.set(key, candidate);
    }
    return [...byName.values()].sort((a, b) => b.score - a.score || a.supplierId.localeCompare(b.supplierId));
  }

  /**
   * The only call with an external write. The idempotency key lets the reference
   * system recognise a retried creation and answer with the record it already made.
   */
  async createInvoiceRecord(
    payload: InvoiceRecordPayload,
    idempotencyKey: string,
    options: { signal?: AbortSignal } = {},
  ): Promise<RecordCreationResult> {
    const raw = await this.transport.call(
      ERP_TOOLS.createInvoiceRecord,
      { invoice: payload, idempotencyKey },
      { ...options, idempotencyKey },
    );
    const parsed = parseResponse(ERP_TOOLS.createInvoiceRecord, CreateRecordResponse, raw);

    switch (parsed.outcome) {
      case 'created':
        return { status: 'created', recordId: parsed.recordId, replayed: false };
      case 'duplicate':
        return { status: 'created', recordId: parsed.recordId, replayed: true };
      case 'rejected':
        return { status: 'rejected', code: parsed.code, message: parsed.message };
    }
  }

  private async runCheck(
    kind: CheckKind,
    tool: ErpToolName,
    args: Record<string, unknown>,
    ctx: CheckContext,
  ): Promise<VerificationOutcome> {
    const start = performance.now();
    const raw = await this.transport.call(tool, args, { signal: ctx.signal });
    const parsed = parseResponse(tool, CheckResponse, raw);

    return Object.freeze({
      kind,
      result: RESULT_BY_STATUS[parsed.status],
      canonicalValue: parsed.canonicalValue,
      message: parsed.message,
      toolErrorKind: null,
      attempts: ctx.attempt ?? 1,
      latencyMs: Math.round(performance.now() - start),
      checkedAt: this.clock().toISOString(),
    });
  }
}

function parseResponse<S extends ZodTypeAny>(tool: ErpToolName, schema: S, raw: unknown): output<S> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ToolProtocolError(
      tool,
      `${tool} returned a response that does not match its contract`,
      parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
    );
  }
  return parsed.data;
}
