import pkg from '@slack/bolt';
import type { App as AppType, SocketModeReceiver as SocketModeReceiverType } from '@slack/bolt';
import { logger } from '../utils/logger.js';
import { ChatStartupError, NotificationDeliveryError, toError } from '../utils/errors.js';
import type { ConnectionHandlers, MessageHandler } from './types.js';

const { App, LogLevel, SocketModeReceiver } = pkg;

const log = logger.child({ component: 'slack-bot' });

function slackLogLevel() {
  return logger.isLevelEnabled('debug') ? LogLevel.DEBUG : LogLevel.INFO;
}

export interface SlackCredentials {
  botToken: string;
  appToken: string;
}

/**
 * Socket Mode receiver whose connectivity is reported through `connection`.
 * With auto-reconnect on, a dropped socket goes straight to `reconnecting`;
 * `disconnected` only follows when the client gives up or is stopped.
 */
export function createSocketReceiver(
  appToken: string,
  connection?: ConnectionHandlers
): SocketModeReceiverType {
  const receiver = new SocketModeReceiver({
    appToken,
    logLevel: slackLogLevel(),
  });

  if (connection) {
    const lost = (state: string) => () => {
      log.warn({ state }, 'Slack socket connection lost');
      connection.onConnectionLost();
    };
    receiver.client.on('reconnecting', lost('reconnecting'));
    receiver.client.on('disconnected', lost('disconnected'));
    receiver.client.on('connected', () => {
      log.info('Slack socket connected');
      connection.onConnectionRestored();
    });
  }

  return receiver;
}

/**
 * Socket Mode app that routes direct messages to `onMessage`. The socket's
 * own connectivity is reported through `connection`, independently of the
 * monitored application.
 */
export function createSlackBot(
  credentials: SlackCredentials,
  onMessage: MessageHandler,
  connection?: ConnectionHandlers
): AppType {
  const app = new App({
    token: credentials.botToken,
    receiver: createSocketReceiver(credentials.appToken, connection),
    logLevel: slackLogLevel(),
  });

  // Direct messages only
  app.event('message', async ({ event, client }) => {
    // Ignore bot messages, message changes, etc.
    if (event.subtype !== undefined) return;
    if (event.bot_id || event.channel_type !== 'im') return;
    if (!event.text) return;

    log.debug({
      userId: event.user,
      channelId: event.channel,
    }, 'Received direct message');

    try {
      await onMessage(
        {
          userId: event.user,
          channelId: event.channel,
          messageTs: event.ts,
        },
        event.text,
        client
      );
    } catch (err) {
      log.error({ err, userId: event.user }, 'Failed to handle direct message');
    }
  });

  // Error handler
  app.error(async (error) => {
    log.error({ err: error }, 'Slack app error');
  });

  return app;
}

// Slack API error codes that retrying will not fix.
const STARTUP_AUTH_ERRORS = new Set([
  'not_authed',
  'invalid_auth',
  'account_inactive',
  'token_revoked',
  'token_expired',
  'team_disabled',
  'missing_scope',
  'user_not_found',
  'user_disabled',
  'cannot_dm_bot',
]);

function platformErrorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  if (!('code' in err) || err.code !== 'slack_webapi_platform_error') return undefined;
  if (!('data' in err) || typeof err.data !== 'object' || err.data === null) return undefined;
  return 'error' in err.data && typeof err.data.error === 'string' ? err.data.error : undefined;
}

/** True for failures caused by credentials or the operator account rather than the network. */
export function isSlackStartupAuthError(err: unknown): boolean {
  if (err instanceof NotificationDeliveryError) return true;
  const code = platformErrorCode(err);
  return code !== undefined && STARTUP_AUTH_ERRORS.has(code);
}

/**
 * Connects the socket and resolves the operator's DM channel. Rejected
 * credentials surface as ChatStartupError; anything else is rethrown as is.
 */
export async function bootstrapSlack(
  start: () => Promise<void>,
  transport: { fetchRecipient(): Promise<string> }
): Promise<void> {
  try {
    await start();
    await transport.fetchRecipient();
  } catch (err) {
    if (isSlackStartupAuthError(err)) {
      throw new ChatStartupError(toError(err));
    }
    throw err;
  }
}

export async function startSlackBot(app: AppType): Promise<void> {
  await app.start();
  log.info('Slack bot started in Socket Mode');
}

export async function stopSlackBot(app: AppType): Promise<void> {
  await app.stop();
  log.info('Slack bot stopped');
}
