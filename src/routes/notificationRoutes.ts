import type { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { createNotificationController, type NotificationReader } from '../controllers/notificationController';
import { ListNotificationsQuery } from '../dtos/invoiceDtos';

export default async function notificationRoutes(fastify: FastifyInstance, opts: { notifications: NotificationReader }) {
  const app = fastify.withTypeProvider<ZodTypeProvider>();
  const controller = createNotificationController(opts.notifications);

  // GET /notifications
  app.get('/', { schema: { querystring: ListNotificationsQuery } }, async (req) => controller.list(req.query));
}
