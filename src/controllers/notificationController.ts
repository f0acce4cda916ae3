import type { ListNotificationsQueryType } from '../dtos/invoiceDtos';
import type { StoredNotification } from '../repositories/notificationRepository';

export interface NotificationReader {
  list(params: { offset: number; limit: number }): Promise<{ notifications: StoredNotification[]; total: number }>;
}

export function createNotificationController(notifications: NotificationReader) {
  return {
    async list(query: ListNotificationsQueryType) {
      const { notifications: items, total } = await notifications.list({
        offset: (query.page - 1) * query.limit,
        limit: query.limit,
      });
      return { items, pagination: { page: query.page, limit: query.limit, total } };
    },
  };
}
