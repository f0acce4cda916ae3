import Pusher from 'pusher';
import { config } from '../config/env';
import { logger } from '../infrastructure/logger';

export interface RealtimePublisher {
  triggerEvent(channel: string, event: string, data: unknown): Promise<void>;
}

class PusherService implements RealtimePublisher {
  private pusher: Pusher | null = null;

  constructor() {
    if (config.PUSHER_APP_ID && config.PUSHER_KEY && config.PUSHER_SECRET) {
      try {
        this.pusher = new Pusher({
          appId: config.PUSHER_APP_ID,
          key: config.PUSHER_KEY,
          secret: config.PUSHER_SECRET,
          cluster: config.PUSHER_CLUSTER || 'eu',
          useTLS: true,
        });
      } catch (error) {
        logger.warn({ event: 'pusher.init_failed', error: error instanceof Error ? error.message : String(error) }, 'Failed to initialize Pusher');
      }
    } else {
      logger.info({ event: 'pusher.disabled' }, 'Pusher not configured, realtime review events disabled');
    }
  }

  public async triggerEvent(channel: string, event: string, data: unknown): Promise<void> {
    if (!this.pusher) {
      return;
    }

    try {
      await this.pusher.trigger(channel, event, data);
    } catch (error) {
      // Soft fail: the stored notification is the record of truth
      logger.error(
        { event: 'pusher.trigger_failed', channel, pusherEvent: event, error: error instanceof Error ? error.message : String(error) },
        'Failed to trigger Pusher event',
      );
    }
  }
}

export const pusherService = new PusherService();
