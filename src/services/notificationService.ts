import type { Logger } from 'pino';
import { config } from '../config/env';
import { logger as rootLogger } from '../infrastructure/logger';
import {
  notificationRepository,
  type NotificationStore,
  type ReviewNotification,
  type StoredNotification,
} from '../repositories/notificationRepository';
import { createGmailProviderFromConfig, type EmailSender } from './emailProviders/gmailSmtpProvider';
import { buildReviewEmail } from './emailTemplates/reviewTemplates';
import { pusherService, type RealtimePublisher } from './pusherService';

export const REVIEW_EVENT = 'invoice.review-required';

export interface ReviewNotifier {
  notify(notification: ReviewNotification): Promise<void>;
}

export type NotificationServiceDeps = {
  store: NotificationStore;
  realtime: RealtimePublisher;
  email: EmailSender | null;
  channel: string;
  recipients: string[];
  logger: Logger;
};

/**
 * Records the review notification and fans it out. The stored row is the
 * durable part; the realtime event and e-mail are best effort and are only
 * sent the first time a run is notified.
 */
export class NotificationService implements ReviewNotifier {
  constructor(private readonly deps: NotificationServiceDeps) {}

  async notify(notification: ReviewNotification): Promise<void> {
    const { notification: stored, created } = await this.deps.store.insertOnce(notification);
    if (!created) {
      this.deps.logger.info(
        { event: 'notification.duplicate', runId: notification.runId },
        'Run already notified, skipping fan-out',
      );
      return;
    }

    await this.deps.realtime.triggerEvent(this.deps.channel, REVIEW_EVENT, {
      id: stored.id,
      runId: stored.runId,
      outcome: stored.outcome,
      invoiceNumber: stored.invoiceNumber,
      supplierName: stored.supplierName,
      requiresManualReview: stored.requiresManualReview,
      createdAt: stored.createdAt,
    });

    await this.sendEmail(stored);

    this.deps.logger.info(
      { event: 'notification.sent', runId: stored.runId, outcome: stored.outcome },
      'Review notification recorded',
    );
  }

  list(params: { offset: number; limit: number }) {
    return this.deps.store.list(params);
  }

  private async sendEmail(notification: StoredNotification): Promise<void> {
    if (!this.deps.email || this.deps.recipients.length === 0) return;

    const { subject, html, text } = buildReviewEmail(notification);
    try {
      await this.deps.email.sendEmail({ to: this.deps.recipients, subject, html, text });
    } catch (error) {
      this.deps.logger.error(
        { event: 'notification.email_failed', runId: notification.runId, error: error instanceof Error ? error.message : String(error) },
        'Failed to send review e-mail',
      );
    }
  }
}

function parseRecipients(raw: string | undefined): string[] {
  return (raw ?? '')
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

export const notificationService = new NotificationService({
  store: notificationRepository,
  realtime: pusherService,
  email: createGmailProviderFromConfig(),
  channel: config.PUSHER_CHANNEL,
  recipients: parseRecipients(config.REVIEW_NOTIFICATION_EMAIL),
  logger: rootLogger,
});
