import z from 'zod';

// Tool responses are validated strictly: an unknown field is a contract break,
// not something to ignore.

export const ERP_TOOLS = {
  checkTaxId: 'check_tax_id',
  checkNationalId: 'check_national_id',
  checkBankAccount: 'check_bank_account',
  checkPurchaseOrder: 'check_purchase_order',
  lookupSupplier: 'lookup_supplier',
  createInvoiceRecord: 'create_invoice_record',
} as const;

export type ErpToolName = (typeof ERP_TOOLS)[keyof typeof ERP_TOOLS];

export const ToolEnvelope = z.object({ result: z.unknown() }).strict();

export const CheckResponse = z
  .object({
    status: z.enum(['match', 'mismatch', 'not_found']),
    canonicalValue: z.string().nullable(),
    message: z.string(),
  })
  .strict();

export type CheckResponseType = z.infer<typeof CheckResponse>;

export const SupplierCandidateResponse = z
  .object({
    supplierId: z.string(),
    name: z.string(),
    taxId: z.string().nullable(),
    nationalId: z.string().nullable(),
    score: z.number().min(0).max(1),
  })
  .strict();

export const LookupSupplierResponse = z
  .object({
    candidates: z.array(SupplierCandidateResponse),
  })
  .strict();

export const CreateRecordResponse = z.discriminatedUnion('outcome', [
  z.object({ outcome: z.literal('created'), recordId: z.string().min(1) }).strict(),
  // Same idempotency key seen before: the earlier record is returned, nothing new is written.
  z.object({ outcome: z.literal('duplicate'), recordId: z.string().min(1) }).strict(),
  z
    .object({
      outcome: z.literal('rejected'),
      code: z.string().min(1),
      message: z.string(),
    })
    .strict(),
]);

export type CreateRecordResponseType = z.infer<typeof CreateRecordResponse>;
