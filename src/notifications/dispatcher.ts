import { logger } from '../utils/logger.js';
import { NotificationDeliveryError, toError } from '../utils/errors.js';
import { EventChannel } from '../session/channel.js';
import type { ChatTransport, Notification } from './types.js';

const log = logger.child({ component: 'notifier' });

export interface DispatcherOptions {
  capacity: number;
  timeoutMs: number;
}

/**
 * Bounded outbox with one sender task. Producers never wait on the chat
 * transport: `enqueue` returns immediately and drops when the outbox is full
 * or shutting down.
 */
export class NotificationDispatcher {
  private readonly outbox = new EventChannel<Notification>();
  private sender: Promise<void> | null = null;
  private current: AbortController | null = null;
  private discarding = false;
  private delivered = 0;
  private failed = 0;
  private dropped = 0;

  constructor(
    private readonly transport: ChatTransport,
    private readonly options: DispatcherOptions
  ) {}

  get stats(): { delivered: number; failed: number; dropped: number; queued: number } {
    return {
      delivered: this.delivered,
      failed: this.failed,
      dropped: this.dropped,
      queued: this.outbox.size,
    };
  }

  enqueue(notification: Notification): boolean {
    if (this.outbox.isClosed) {
      this.dropped++;
      log.debug({ title: notification.title }, 'Outbox closed, dropping notification');
      return false;
    }
    if (this.outbox.size >= this.options.capacity) {
      this.dropped++;
      log.warn({ title: notification.title, capacity: this.options.capacity }, 'Outbox full, dropping notification');
      return false;
    }
    return this.outbox.publish(notification);
  }

  start(): void {
    if (this.sender) return;
    this.sender = this.run();
  }

  /**
   * Stops accepting notifications and lets the sender drain what is queued,
   * aborting the in-flight delivery once `drainTimeoutMs` has passed.
   */
  async stop(options: { drainTimeoutMs?: number } = {}): Promise<void> {
    this.outbox.close();
    if (!this.sender) return;

    const drainTimeoutMs = options.drainTimeoutMs ?? this.options.timeoutMs;
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<'expired'>((resolve) => {
      timer = setTimeout(() => resolve('expired'), drainTimeoutMs);
    });

    const outcome = await Promise.race([this.sender.then(() => 'drained' as const), expired]);
    clearTimeout(timer);

    if (outcome === 'expired') {
      log.warn({ queued: this.outbox.size }, 'Outbox drain timed out');
      this.discarding = true;
      this.current?.abort();
      await this.sender;
    }
    this.sender = null;
  }

  private async run(): Promise<void> {
    for await (const notification of this.outbox) {
      if (this.discarding) {
        this.dropped++;
        continue;
      }
      try {
        await this.deliver(notification);
        this.delivered++;
        log.debug({ title: notification.title }, 'Notification delivered');
      } catch (err) {
        this.failed++;
        log.error({ err, title: notification.title }, 'Failed to deliver notification');
      }
    }
  }

  private async deliver(notification: Notification): Promise<void> {
    const controller = new AbortController();
    this.current = controller;
    let timer: NodeJS.Timeout | undefined;

    const guard = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new NotificationDeliveryError(notification.title, new Error(`timed out after ${this.options.timeoutMs}ms`)));
        controller.abort();
      }, this.options.timeoutMs);
      controller.signal.addEventListener('abort', () => {
        reject(new NotificationDeliveryError(notification.title, new Error('aborted')));
      }, { once: true });
    });

    try {
      await Promise.race([
        this.transport.deliver(notification, controller.signal).catch((err: unknown) => {
          throw new NotificationDeliveryError(notification.title, toError(err));
        }),
        guard,
      ]);
    } finally {
      clearTimeout(timer);
      this.current = null;
    }
  }
}
