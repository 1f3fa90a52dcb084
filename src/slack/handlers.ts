import { parseRemoteCommand } from '../commands/parser.js';
import { logger } from '../utils/logger.js';
import { UnauthorizedError } from '../utils/errors.js';
import type { AuthService } from '../gateway/auth.js';
import type { RemoteCommand } from '../commands/types.js';
import type { MessageHandler } from './types.js';

const log = logger.child({ component: 'slack-handlers' });

export interface CommandSink {
  enqueue(operatorId: string, command: RemoteCommand): void;
}

/**
 * DM handler for the monitor: authorized `!commands` go to the inbox, the
 * result is reported back through the notification outbox.
 */
export function createCommandHandler(authService: AuthService, sink: CommandSink): MessageHandler {
  return async (ctx, text, client) => {
    const command = parseRemoteCommand(text);
    if (!command) return;

    try {
      authService.assertAllowed(ctx.userId);
    } catch (err) {
      if (!(err instanceof UnauthorizedError)) throw err;
      log.warn({ userId: ctx.userId, command: command.type }, 'Unauthorized command attempt');
      await client.chat.postMessage({
        channel: ctx.channelId,
        text: 'You are not authorized to control this monitor.',
      });
      return;
    }

    if (command.type === 'unknown') {
      await client.chat.postMessage({
        channel: ctx.channelId,
        text: `Unknown command: \`${command.command}\`. Use \`!help\` for the list of commands.`,
      });
      return;
    }

    log.info({ userId: ctx.userId, command: command.type }, 'Queued remote command');
    sink.enqueue(ctx.userId, command);
  };
}
