import { logger } from '../utils/logger.js';
import { NotificationDeliveryError } from '../utils/errors.js';
import { commandFromAction } from '../commands/parser.js';
import { pollResponseSchema } from './protocol.js';
import { SEVERITY_COLORS, type ChatTransport, type Notification, type StatusOutbox } from '../notifications/types.js';
import type { QueuedCommand, RemoteCommandInbox } from '../commands/types.js';

const log = logger.child({ component: 'relay-client' });

const REQUEST_TIMEOUT_MS = 5000;

export interface RelayClientOptions {
  baseUrl: string;
  userId: string;
  authToken: string;
  fetch?: typeof fetch;
}

abstract class RelayEndpoint {
  protected readonly baseUrl: string;
  protected readonly fetchImpl: typeof fetch;

  constructor(protected readonly options: RelayClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? fetch;
  }

  protected request(path: string, init: RequestInit = {}, signal?: AbortSignal): Promise<Response> {
    const timeout = AbortSignal.timeout(REQUEST_TIMEOUT_MS);
    return this.fetchImpl(`${this.baseUrl}${path}`, {
      ...init,
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.options.authToken}`,
      },
      signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
    });
  }
}

/** Sends notifications to the relay server, which forwards them over chat. */
export class RelayTransport extends RelayEndpoint implements ChatTransport {
  async deliver(notification: Notification, signal: AbortSignal): Promise<void> {
    const response = await this.request('/event', {
      method: 'POST',
      body: JSON.stringify({
        user_id: this.options.userId,
        title: notification.title,
        description: notification.body,
        color: SEVERITY_COLORS[notification.severity],
      }),
    }, signal);

    if (!response.ok) {
      throw new NotificationDeliveryError(notification.title, new Error(`relay answered ${response.status}`));
    }
  }
}

/**
 * Drains the user's queue on the relay server and answers status requests
 * by posting the status notification back.
 */
export class RelayCommandInbox extends RelayEndpoint implements RemoteCommandInbox, StatusOutbox {
  async drain(): Promise<QueuedCommand[]> {
    const response = await this.request(`/poll/${encodeURIComponent(this.options.userId)}`);
    if (!response.ok) {
      throw new Error(`Relay poll failed with status ${response.status}`);
    }

    const parsed = pollResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      log.warn({ issues: parsed.error.issues.length }, 'Malformed poll response');
      return [];
    }

    const commands: QueuedCommand[] = [];
    for (const { action } of parsed.data.commands) {
      const command = commandFromAction(action);
      if (command) {
        commands.push({ command, operatorId: this.options.userId });
      } else {
        log.warn({ action }, 'Ignoring unknown relay action');
      }
    }
    return commands;
  }

  async report(notification: Notification): Promise<void> {
    const response = await this.request(`/status/${encodeURIComponent(this.options.userId)}`, {
      method: 'POST',
      body: JSON.stringify({ title: notification.title, description: notification.body }),
    });
    if (!response.ok) {
      throw new Error(`Relay status report failed with status ${response.status}`);
    }
  }
}
