#!/usr/bin/env node
import 'dotenv/config';
import { fileURLToPath } from 'url';
import type Database from 'better-sqlite3';
import type { App } from '@slack/bolt';
import { getConfig, type Config } from './config/index.js';
import { enableFileLogging, logger } from './utils/logger.js';
import { ChatStartupError, ConfigurationError, InstanceAlreadyRunningError, LogDirectoryMissingError } from './utils/errors.js';
import { findOtherInstance, osUptimeMs } from './utils/system.js';
import { openDatabase, SessionJournal } from './storage/sqlite.js';
import { SystemProcessTable } from './process/table.js';
import { ProcessWatcher } from './process/watcher.js';
import { LogTailer } from './logs/tailer.js';
import { EventClassifier } from './logs/classifier.js';
import { NotificationDispatcher } from './notifications/dispatcher.js';
import { Monitor } from './session/monitor.js';
import { AuthService } from './gateway/auth.js';
import { MemoryCommandInbox } from './commands/inbox.js';
import { bootstrapSlack, createSlackBot, startSlackBot, stopSlackBot } from './slack/bot.js';
import { createCommandHandler } from './slack/handlers.js';
import { SlackTransport } from './slack/transport.js';
import { RelayCommandInbox, RelayTransport } from './relay/client.js';
import type { ChatTransport, StatusOutbox } from './notifications/types.js';
import type { RemoteCommandInbox } from './commands/types.js';

const log = logger.child({ component: 'main' });

const EXIT_CONFIG_ERROR = 1;
const EXIT_CRASH = 3;
const SLACK_COMMAND_POLL_MS = 500;

let slackApp: App | null = null;
let slackTransport: SlackTransport | null = null;
let monitor: Monitor | null = null;
let dispatcher: NotificationDispatcher | null = null;
let database: Database.Database | null = null;
let isShuttingDown = false;

function loadConfigOrExit(): Config {
  try {
    return getConfig();
  } catch (err) {
    if (err instanceof ConfigurationError) {
      log.fatal({ issues: err.issues }, 'Invalid configuration');
      process.exit(EXIT_CONFIG_ERROR);
    }
    throw err;
  }
}

interface ChatWiring {
  transport: ChatTransport;
  inbox: RemoteCommandInbox;
  statusOutbox?: StatusOutbox;
  commandPollIntervalMs: number;
  bootstrap: () => Promise<void>;
}

function wireSlack(config: Config, slack: NonNullable<Config['slack']>): ChatWiring {
  const inbox = new MemoryCommandInbox();
  const auth = new AuthService([config.operator.userId, ...config.operator.additionalIds]);

  const app = createSlackBot(slack, createCommandHandler(auth, inbox), {
    onConnectionLost: () => monitor?.publish({ type: 'transport-disconnected' }),
    onConnectionRestored: () => monitor?.publish({ type: 'transport-resumed' }),
  });
  const transport = new SlackTransport(app.client, {
    recipientId: config.operator.userId,
    footerText: config.notifications.footerText,
    footerIcon: config.notifications.footerIcon,
    pingUser: config.notifications.pingUser,
  });
  slackApp = app;
  slackTransport = transport;

  return {
    transport,
    inbox,
    commandPollIntervalMs: SLACK_COMMAND_POLL_MS,
    bootstrap: () => bootstrapSlack(() => startSlackBot(app), transport),
  };
}

function wireRelay(config: Config, url: string, authToken: string): ChatWiring {
  const options = { baseUrl: url, userId: config.operator.userId, authToken };
  const inbox = new RelayCommandInbox(options);
  return {
    transport: new RelayTransport(options),
    inbox,
    statusOutbox: inbox,
    commandPollIntervalMs: config.relay.pollIntervalMs,
    bootstrap: async () => {
      log.info({ url }, 'Using relay server');
    },
  };
}

async function main(): Promise<void> {
  const config = loadConfigOrExit();
  enableFileLogging(config.logging);

  log.info({ app: config.monitor.appName, transport: config.transport }, 'Starting session monitor');

  const table = new SystemProcessTable();
  const script = fileURLToPath(import.meta.url);
  const other = await findOtherInstance(table, script);
  if (other) {
    const err = new InstanceAlreadyRunningError(other.pid, script);
    log.fatal({ err, pid: other.pid }, 'Another monitor instance is already running');
    process.exit(EXIT_CONFIG_ERROR);
  }

  const createTailer = () => new LogTailer({
    dir: config.monitor.logDir,
    extension: config.monitor.logExtension,
    pollIntervalMs: config.monitor.logPollIntervalMs,
  });
  try {
    createTailer().assertDirectory();
  } catch (err) {
    if (err instanceof LogDirectoryMissingError) {
      log.fatal({ err }, 'Application log directory is missing');
      process.exit(EXIT_CONFIG_ERROR);
    }
    throw err;
  }

  database = openDatabase(config.sqlite.path);
  const journal = new SessionJournal(database);

  let chat: ChatWiring;
  if (config.transport === 'relay' && config.relay.url && config.relay.authToken) {
    chat = wireRelay(config, config.relay.url, config.relay.authToken);
  } else if (config.slack) {
    chat = wireSlack(config, config.slack);
  } else {
    // Unreachable: the schema requires credentials for the chosen transport.
    throw new ConfigurationError(['transport: no credentials for the selected transport']);
  }

  const outbox = new NotificationDispatcher(chat.transport, {
    capacity: config.notifications.outboxCapacity,
    timeoutMs: config.notifications.timeoutMs,
  });
  dispatcher = outbox;

  const watcher = new ProcessWatcher(table, { processNames: config.monitor.processNames });

  const running = new Monitor(
    {
      watcher,
      controller: watcher,
      notify: notification => { outbox.enqueue(notification); },
      inbox: chat.inbox,
      statusOutbox: chat.statusOutbox,
      journal,
      osUptimeMs,
    },
    {
      appName: config.monitor.appName,
      autoKillOnDisconnect: config.monitor.autoKillOnDisconnect,
      correlationWindowMs: config.monitor.correlationWindowMinutes * 60_000,
      inactivityTimeoutMs: config.monitor.inactivityTimeoutMinutes * 60_000,
      sessionStartedTtlMs: config.notifications.sessionStartedTtlSeconds * 1000,
      processPollIntervalMs: config.monitor.processPollIntervalMs,
      commandPollIntervalMs: chat.commandPollIntervalMs,
      heartbeatIntervalMs: config.notifications.heartbeatIntervalHours * 3_600_000,
      logs: {
        createTailer,
        classifier: new EventClassifier(config.monitor.keywordRules),
        attachToExisting: config.monitor.attachToExistingLog,
      },
    }
  );
  monitor = running;
  running.on('exitRequested', (code) => {
    void shutdown(code === 2 ? 'restart' : 'shutdown', code);
  });

  try {
    await chat.bootstrap();
  } catch (err) {
    if (err instanceof ChatStartupError) {
      // Exit code 1 stops the supervisor.
      log.fatal({ err }, 'Chat transport rejected the monitor');
      process.exit(EXIT_CONFIG_ERROR);
    }
    throw err;
  }
  outbox.start();
  running.start();

  log.info({
    logDir: config.monitor.logDir,
    processNames: config.monitor.processNames,
    autoKillOnDisconnect: config.monitor.autoKillOnDisconnect,
    attachToExistingLog: config.monitor.attachToExistingLog,
  }, 'Session monitor is running');
}

async function shutdown(reason: string, exitCode: number): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;

  log.info({ reason, exitCode }, 'Shutting down...');

  try {
    if (monitor) {
      await monitor.stop();
    }
    // Lets the shutdown or restart notice go out before the socket closes.
    if (dispatcher) {
      await dispatcher.stop();
    }
    slackTransport?.dispose();
    if (slackApp) {
      await stopSlackBot(slackApp);
    }
    database?.close();

    log.info('Shutdown complete');
    process.exit(exitCode);
  } catch (err) {
    log.error({ err }, 'Error during shutdown');
    process.exit(exitCode === 0 ? EXIT_CRASH : exitCode);
  }
}

// Handle termination signals
process.on('SIGINT', () => void shutdown('SIGINT', 0));
process.on('SIGTERM', () => void shutdown('SIGTERM', 0));

// Handle uncaught errors
process.on('uncaughtException', (err) => {
  log.fatal({ err }, 'Uncaught exception');
  void shutdown('uncaughtException', EXIT_CRASH);
});

process.on('unhandledRejection', (reason) => {
  log.fatal({ reason }, 'Unhandled rejection');
  void shutdown('unhandledRejection', EXIT_CRASH);
});

// Start the application
main().catch((err: unknown) => {
  log.fatal({ err }, 'Failed to start');
  process.exit(EXIT_CRASH);
});
