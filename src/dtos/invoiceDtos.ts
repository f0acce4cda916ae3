import z from 'zod';

const Confidence = z.number().min(0).max(1);

// Every field is explicitly present (with the extractor's confidence) or absent.
const extracted = <T extends z.ZodTypeAny>(value: T) =>
  z.union([
    z.object({ status: z.literal('present'), value, confidence: Confidence }).strict(),
    z.object({ status: z.literal('absent') }).strict(),
  ]);

export const BankAccountSchema = z
  .object({
    accountNumber: z.string().min(1),
    routingCode: z.string().min(1),
  })
  .strict();

export const LineItemSchema = z
  .object({
    description: z.string(),
    quantity: z.number(),
    unitPrice: z.number(),
  })
  .strict();

export const ExtractedInvoiceSchema = z
  .object({
    supplierName: extracted(z.string().min(1)),
    taxId: extracted(z.string().min(1)),
    nationalId: extracted(z.string().min(1)),
    bankAccount: extracted(BankAccountSchema),
    purchaseOrderRef: extracted(z.string().min(1)),
    invoiceNumber: extracted(z.string().min(1)),
    invoiceDate: extracted(z.string().date()),
    lineItems: extracted(z.array(LineItemSchema)),
    currency: extracted(z.string().length(3)),
    netAmount: extracted(z.number()),
    taxAmount: extracted(z.number()),
    totalAmount: extracted(z.number()),
  })
  .strict();

export type ExtractedInvoiceInput = z.infer<typeof ExtractedInvoiceSchema>;

export const SubmitInvoiceRequest = z.object({
  invoice: ExtractedInvoiceSchema,
  // Name of the source document, kept for the audit trail
  documentRef: z.string().max(255).optional(),
});

export type SubmitInvoiceRequestType = z.infer<typeof SubmitInvoiceRequest>;

export const RunStatusFilter = z.enum([
  'RECEIVED',
  'VALIDATING',
  'AGGREGATING',
  'ROUTED',
  'FINALIZING',
  'COMPLETED',
  'FAILED',
  'CANCELLED',
]);

export const ListRunsQuery = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(100).default(20),
  status: RunStatusFilter.optional(),
});

export type ListRunsQueryType = z.infer<typeof ListRunsQuery>;

export const RunIdParams = z.object({ id: z.string().uuid() });

export const ListNotificationsQuery = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(100).default(50),
});

export type ListNotificationsQueryType = z.infer<typeof ListNotificationsQuery>;
