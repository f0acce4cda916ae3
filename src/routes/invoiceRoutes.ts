import type { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { createInvoiceController } from '../controllers/invoiceController';
import { ListRunsQuery, RunIdParams, SubmitInvoiceRequest } from '../dtos/invoiceDtos';
import type { InvoicePipelineService } from '../services/InvoicePipelineService';

export type InvoiceRoutesOptions = {
  pipeline: InvoicePipelineService;
};

export default async function invoiceRoutes(fastify: FastifyInstance, opts: InvoiceRoutesOptions) {
  const app = fastify.withTypeProvider<ZodTypeProvider>();
  const controller = createInvoiceController(opts.pipeline);

  // POST /invoices - accepted for asynchronous processing
  app.post('/', { schema: { body: SubmitInvoiceRequest } }, async (req, reply) => {
    const accepted = await controller.submit(req.body);
    reply.code(202);
    return accepted;
  });

  // GET /invoices
  app.get('/', { schema: { querystring: ListRunsQuery } }, async (req) => controller.list(req.query));

  // GET /invoices/:id
  app.get('/:id', { schema: { params: RunIdParams } }, async (req) => controller.get(req.params.id));

  // POST /invoices/:id/cancel
  app.post('/:id/cancel', { schema: { params: RunIdParams } }, async (req, reply) => {
    const result = await controller.cancel(req.params.id);
    reply.code(202);
    return result;
  });
}
