import type { ListRunsQueryType, SubmitInvoiceRequestType } from '../dtos/invoiceDtos';
import type { InvoicePipelineService } from '../services/InvoicePipelineService';
import { toRunSummary, toRunView } from '../services/pipeline/runView';

export function createInvoiceController(pipeline: InvoicePipelineService) {
  return {
    async submit(body: SubmitInvoiceRequestType) {
      const run = await pipeline.submit({ invoice: body.invoice, documentRef: body.documentRef });
      return { runId: run.id, status: run.status };
    },

    async list(query: ListRunsQueryType) {
      const page = await pipeline.listRuns(query);
      return {
        items: page.items.map(toRunSummary),
        pagination: { page: page.page, limit: page.limit, total: page.total },
      };
    },

    async get(id: string) {
      return toRunView(await pipeline.getRun(id));
    },

    async cancel(id: string) {
      const run = await pipeline.cancel(id);
      return { runId: run.id, status: run.status, cancelRequested: run.cancelRequested };
    },
  };
}
