import { logger } from '../utils/logger.js';
import { sleep } from '../utils/time.js';
import { COMMAND_PREFIX } from '../commands/parser.js';
import { buildAttachment, type FooterOptions } from '../slack/format.js';
import type { AuthService } from '../gateway/auth.js';
import type { MessageHandler, SlackChatClient, SlackContext } from '../slack/types.js';
import type { CommandQueueStore } from './queue.js';
import type { TokenStore } from './tokens.js';

const log = logger.child({ component: 'relay-bot' });

const STATUS_POLL_MS = 500;

export interface RelayBotOptions {
  tokens: TokenStore;
  queue: CommandQueueStore;
  auth: AuthService;
  footer: FooterOptions;
  /** How long `!status` waits for the client to answer. */
  statusWaitMs: number;
  statusPollMs?: number;
  now?: () => number;
}

const RELAY_HELP = [
  '`!register` - Get (or show) your client token',
  '`!status` - Ask your client whether the application is running',
  '`!kill` - Ask your client to kill the application',
  '`!help` - Show this message',
].join('\n');

/** DM handler for the relay server's bot: token registration and queued commands. */
export function createRelayMessageHandler(options: RelayBotOptions): MessageHandler {
  const now = options.now ?? Date.now;
  const statusPollMs = options.statusPollMs ?? STATUS_POLL_MS;

  const reply = async (client: SlackChatClient, ctx: SlackContext, text: string): Promise<void> => {
    await client.chat.postMessage({ channel: ctx.channelId, text });
  };

  return async (ctx, text, client) => {
    const trimmed = text.trim();
    if (!trimmed.startsWith(COMMAND_PREFIX)) return;
    const cmd = trimmed.slice(COMMAND_PREFIX.length).split(/\s+/)[0]?.toLowerCase() ?? '';

    if (!options.auth.isAllowed(ctx.userId)) {
      log.warn({ userId: ctx.userId, cmd }, 'Unauthorized relay command');
      await reply(client, ctx, 'You are not authorized to use this bot.');
      return;
    }

    switch (cmd) {
      case 'register': {
        const token = options.tokens.issue(ctx.userId);
        await reply(client, ctx, `Your token is: \`${token}\`\nKeep it secret! Set it as RELAY_AUTH_TOKEN in your monitor's .env.`);
        return;
      }

      case 'status': {
        if (!options.tokens.hasUser(ctx.userId)) {
          await reply(client, ctx, 'You are not registered. Use `!register` to get your client token.');
          return;
        }
        // A stale answer from an earlier request must not be mistaken for this one.
        await options.queue.takeStatus(ctx.userId);
        await options.queue.push(ctx.userId, { action: 'status', queued_at: now() });
        await reply(client, ctx, 'Status command queued for your client.');

        const deadline = now() + options.statusWaitMs;
        while (now() < deadline) {
          await sleep(statusPollMs);
          const report = await options.queue.takeStatus(ctx.userId);
          if (report) {
            await client.chat.postMessage({
              channel: ctx.channelId,
              text: report.title,
              attachments: [buildAttachment({ title: report.title, body: report.description, severity: 'info' }, options.footer)],
            });
            return;
          }
        }
        await reply(client, ctx, 'No response from client.');
        return;
      }

      case 'kill': {
        if (!options.tokens.hasUser(ctx.userId)) {
          await reply(client, ctx, 'You are not registered. Use `!register` to get your client token.');
          return;
        }
        await options.queue.push(ctx.userId, { action: 'kill', queued_at: now() });
        await reply(client, ctx, 'Kill command queued for your client.');
        return;
      }

      case 'help':
        await reply(client, ctx, RELAY_HELP);
        return;

      default:
        await reply(client, ctx, `Unknown command: \`${cmd}\`. Use \`!help\` for the list of commands.`);
    }
  };
}
