import { logger } from '../utils/logger.js';
import { NotificationDeliveryError } from '../utils/errors.js';
import { buildAttachment, fallbackText, type FooterOptions } from './format.js';
import type { ChatTransport, Notification } from '../notifications/types.js';
import type { SlackChatClient } from './types.js';

const log = logger.child({ component: 'slack-transport' });

export interface SlackTransportOptions extends FooterOptions {
  recipientId: string;
  pingUser: boolean;
}

/** Delivers notifications as direct messages to the operator. */
export class SlackTransport implements ChatTransport {
  private channelId: string | null = null;
  private readonly pendingDeletes = new Set<NodeJS.Timeout>();

  constructor(
    private readonly client: SlackChatClient,
    private readonly options: SlackTransportOptions
  ) {}

  /** Opens (or reuses) the DM channel with the operator. */
  async fetchRecipient(): Promise<string> {
    if (this.channelId) return this.channelId;

    const result = await this.client.conversations.open({ users: this.options.recipientId });
    const channelId = result.channel?.id;
    if (!channelId) {
      throw new NotificationDeliveryError('open direct message', new Error(`No DM channel for ${this.options.recipientId}`));
    }

    this.channelId = channelId;
    log.info({ recipientId: this.options.recipientId, channelId }, 'Resolved operator DM channel');
    return channelId;
  }

  async deliver(notification: Notification, signal: AbortSignal): Promise<void> {
    const channel = await this.fetchRecipient();
    if (signal.aborted) {
      throw new NotificationDeliveryError(notification.title, new Error('aborted'));
    }

    const result = await this.client.chat.postMessage({
      channel,
      text: fallbackText(notification, this.options.pingUser ? this.options.recipientId : undefined),
      attachments: [buildAttachment(notification, this.options)],
    });

    if (notification.ephemeralTtlMs && result.ts) {
      this.scheduleDelete(result.channel ?? channel, result.ts, notification.ephemeralTtlMs);
    }
  }

  /** Cancels pending ephemeral deletions. */
  dispose(): void {
    for (const timer of this.pendingDeletes) {
      clearTimeout(timer);
    }
    this.pendingDeletes.clear();
  }

  private scheduleDelete(channel: string, ts: string, ttlMs: number): void {
    const timer = setTimeout(() => {
      this.pendingDeletes.delete(timer);
      this.client.chat.delete({ channel, ts }).catch((err: unknown) => {
        log.debug({ err, channel, ts }, 'Failed to delete ephemeral message');
      });
    }, ttlMs);
    timer.unref();
    this.pendingDeletes.add(timer);
  }
}
