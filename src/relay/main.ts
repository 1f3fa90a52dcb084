#!/usr/bin/env node
import 'dotenv/config';
import { serve, type ServerType } from '@hono/node-server';
import type { App } from '@slack/bolt';
import { loadRelayServerConfig, type RelayServerConfig } from '../config/index.js';
import { enableFileLogging, logger } from '../utils/logger.js';
import { ConfigurationError } from '../utils/errors.js';
import { AuthService } from '../gateway/auth.js';
import { createSlackBot, startSlackBot, stopSlackBot } from '../slack/bot.js';
import { SlackTransport } from '../slack/transport.js';
import { getRedisClient, closeRedis, RedisCommandQueue } from '../storage/redis.js';
import { MemoryCommandQueue, type CommandQueueStore } from './queue.js';
import { TokenStore } from './tokens.js';
import { createRelayApp } from './server.js';
import { createRelayMessageHandler } from './bot.js';
import type { Notification } from '../notifications/types.js';

const log = logger.child({ component: 'relay' });

let slackApp: App | null = null;
let server: ServerType | null = null;
let isShuttingDown = false;

function loadConfigOrExit(): RelayServerConfig {
  try {
    return loadRelayServerConfig();
  } catch (err) {
    if (err instanceof ConfigurationError) {
      log.fatal({ issues: err.issues }, 'Invalid configuration');
      process.exit(1);
    }
    throw err;
  }
}

async function main(): Promise<void> {
  const config = loadConfigOrExit();

  enableFileLogging(config.logging);
  log.info({ port: config.server.port }, 'Starting relay server');

  const queue: CommandQueueStore = config.redis.url
    ? new RedisCommandQueue(await getRedisClient(config.redis.url))
    : new MemoryCommandQueue();
  const tokens = new TokenStore(config.server.tokensFile);
  const auth = new AuthService(config.auth.allowedUserIds, { allowAll: config.auth.allowAll });
  const footer = {
    footerText: config.notifications.footerText,
    footerIcon: config.notifications.footerIcon,
  };

  const app = createSlackBot(
    config.slack,
    createRelayMessageHandler({
      tokens,
      queue,
      auth,
      footer,
      statusWaitMs: config.server.statusWaitMs,
    })
  );
  slackApp = app;

  // One DM channel per user, resolved on first delivery.
  const transports = new Map<string, SlackTransport>();
  const deliver = async (userId: string, notification: Notification): Promise<void> => {
    let transport = transports.get(userId);
    if (!transport) {
      transport = new SlackTransport(app.client, {
        ...footer,
        recipientId: userId,
        pingUser: config.notifications.pingUser,
      });
      transports.set(userId, transport);
    }
    await transport.deliver(notification, AbortSignal.timeout(config.notifications.timeoutMs));
  };

  await startSlackBot(app);

  const relay = createRelayApp({ tokens, queue, deliver });
  server = serve({ fetch: relay.fetch, port: config.server.port }, (info) => {
    log.info({ port: info.port, queue: config.redis.url ? 'redis' : 'memory' }, 'Relay server listening');
  });
}

async function shutdown(signal: string): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;

  log.info({ signal }, 'Shutting down...');

  try {
    server?.close();
    if (slackApp) {
      await stopSlackBot(slackApp);
    }
    await closeRedis();

    log.info('Shutdown complete');
    process.exit(0);
  } catch (err) {
    log.error({ err }, 'Error during shutdown');
    process.exit(1);
  }
}

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));

main().catch((err: unknown) => {
  log.fatal({ err }, 'Failed to start relay server');
  process.exit(1);
});
