import fs from 'fs';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';
import { defaultAppLogDir } from '../logs/paths.js';

export const DEFAULT_DISCONNECT_KEYWORDS = [
  'Lost connection with reason',
  'Client has been disconnected with reason',
  'Disconnection Notification.',
];

export const DEFAULT_CLOSED_KEYWORDS = ['stop() called'];

const keywordRuleSchema = z.object({
  pattern: z.string().min(1, 'Keyword pattern must not be empty'),
  kind: z.enum(['disconnect', 'closed']),
});

const keywordFileSchema = z.object({
  rules: z.array(keywordRuleSchema).min(1, 'Keyword file must define at least one rule'),
});

export type KeywordRuleConfig = z.infer<typeof keywordRuleSchema>;

const loggingSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  pretty: z.boolean().default(process.env.NODE_ENV !== 'production'),
  dir: z.string().default('./logs'),
  retentionDays: z.number().int().nonnegative({ message: 'Log retention must be 0 (unlimited) or a positive number of days' }).default(7),
  maxFileBytes: z.number().int().positive().default(5 * 1024 * 1024),
});

const slackSchema = z.object({
  botToken: z.string().startsWith('xoxb-', { message: 'Bot token must start with xoxb-' }),
  appToken: z.string().startsWith('xapp-', { message: 'App token must start with xapp-' }),
});

const notificationsSchema = z.object({
  footerText: z.string().default('Session Monitor'),
  footerIcon: z.string().default(''),
  pingUser: z.boolean().default(true),
  sessionStartedTtlSeconds: z.number().int().positive().default(15),
  timeoutMs: z.number().int().positive().default(10_000),
  outboxCapacity: z.number().int().positive().default(100),
  heartbeatIntervalHours: z.number().nonnegative().default(3),
});

const configSchema = z
  .object({
    transport: z.enum(['slack', 'relay']).default('slack'),

    slack: slackSchema.optional(),

    operator: z.object({
      userId: z.string().min(1, 'OPERATOR_USER_ID is required'),
      additionalIds: z.array(z.string()).default([]),
    }),

    relay: z.object({
      url: z.string().url().optional(),
      authToken: z.string().min(1).optional(),
      pollIntervalMs: z.number().int().positive().default(5000),
    }),

    notifications: notificationsSchema,

    monitor: z.object({
      appName: z.string().min(1).default('Roblox'),
      processNames: z.array(z.string().min(1)).min(1, 'At least one process name is required'),
      logDir: z.string().min(1),
      logExtension: z.string().default('.log'),
      keywordRules: z.array(keywordRuleSchema).min(1),
      autoKillOnDisconnect: z.boolean().default(true),
      attachToExistingLog: z.boolean().default(true),
      correlationWindowMinutes: z.number().positive().default(60),
      /** 0 turns the log inactivity watchdog off. */
      inactivityTimeoutMinutes: z.number().int().nonnegative().default(0),
      processPollIntervalMs: z.number().int().min(1000, 'Process polling must be at least 1000ms apart').default(1000),
      logPollIntervalMs: z.number().int().positive().default(1000),
    }),

    sqlite: z.object({
      path: z.string().default('./data/monitor.db'),
    }),

    logging: loggingSchema,
  })
  .superRefine((value, ctx) => {
    if (value.transport === 'slack' && !value.slack) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['slack'],
        message: 'SLACK_BOT_TOKEN and SLACK_APP_TOKEN are required for the slack transport',
      });
    }
    if (value.transport === 'relay') {
      if (!value.relay.url) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['relay', 'url'], message: 'RELAY_URL is required for the relay transport' });
      }
      if (!value.relay.authToken) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['relay', 'authToken'], message: 'RELAY_AUTH_TOKEN is required for the relay transport' });
      }
    }
  });

const relayServerSchema = z.object({
  slack: slackSchema,
  server: z.object({
    port: z.number().int().positive().default(5000),
    tokensFile: z.string().default('./data/user_tokens.json'),
    statusWaitMs: z.number().int().positive().default(10_000),
  }),
  redis: z.object({
    url: z.string().url().optional(),
  }),
  auth: z.object({
    allowedUserIds: z.array(z.string()).default([]),
    allowAll: z.boolean().default(true),
  }),
  notifications: notificationsSchema,
  logging: loggingSchema,
});

export type Config = z.infer<typeof configSchema>;
export type RelayServerConfig = z.infer<typeof relayServerSchema>;
export type LoggingConfig = z.infer<typeof loggingSchema>;

type Env = Record<string, string | undefined>;

function parseEnvArray(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(',').map(s => s.trim()).filter(Boolean);
}

function parseEnvBool(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
}

function parseEnvInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

function rawLogging(env: Env) {
  const maxFileMb = parseEnvInt(env.LOG_MAX_FILE_MB);
  return {
    level: env.LOG_LEVEL || undefined,
    pretty: parseEnvBool(env.LOG_PRETTY),
    dir: env.LOG_DIR,
    retentionDays: parseEnvInt(env.LOG_RETENTION_DAYS),
    maxFileBytes: maxFileMb === undefined ? undefined : Math.floor(maxFileMb * 1024 * 1024),
  };
}

function rawSlack(env: Env) {
  if (!env.SLACK_BOT_TOKEN && !env.SLACK_APP_TOKEN) {
    return undefined;
  }
  return {
    botToken: env.SLACK_BOT_TOKEN ?? '',
    appToken: env.SLACK_APP_TOKEN ?? '',
  };
}

function rawNotifications(env: Env) {
  return {
    footerText: env.FOOTER_TEXT,
    footerIcon: env.FOOTER_ICON,
    pingUser: parseEnvBool(env.PING_USER),
    sessionStartedTtlSeconds: parseEnvInt(env.SESSION_STARTED_TTL_SECONDS),
    timeoutMs: parseEnvInt(env.NOTIFY_TIMEOUT_MS),
    outboxCapacity: parseEnvInt(env.OUTBOX_CAPACITY),
    heartbeatIntervalHours: parseEnvInt(env.HEARTBEAT_INTERVAL_HOURS),
  };
}

/**
 * Keyword rules come from KEYWORDS_FILE when set, otherwise from the
 * DISCONNECT_KEYWORDS / CLOSED_KEYWORDS lists. Disconnect rules are
 * matched before closed rules.
 */
export function loadKeywordRules(env: Env): KeywordRuleConfig[] {
  if (env.KEYWORDS_FILE) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(env.KEYWORDS_FILE, 'utf-8'));
    } catch (err) {
      throw new ConfigurationError([
        `KEYWORDS_FILE: unable to read ${env.KEYWORDS_FILE} (${err instanceof Error ? err.message : String(err)})`,
      ]);
    }
    const result = keywordFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new ConfigurationError(formatIssues(result.error).map(issue => `KEYWORDS_FILE.${issue}`));
    }
    return result.data.rules;
  }

  const disconnect = parseEnvArray(env.DISCONNECT_KEYWORDS);
  const closed = parseEnvArray(env.CLOSED_KEYWORDS);

  return [
    ...(disconnect.length ? disconnect : DEFAULT_DISCONNECT_KEYWORDS).map(pattern => ({ pattern, kind: 'disconnect' as const })),
    ...(closed.length ? closed : DEFAULT_CLOSED_KEYWORDS).map(pattern => ({ pattern, kind: 'closed' as const })),
  ];
}

export function loadLoggingConfig(env: Env = process.env): LoggingConfig {
  const result = loggingSchema.safeParse(rawLogging(env));
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error).map(issue => `logging.${issue}`));
  }
  return result.data;
}

export function loadConfig(env: Env = process.env): Config {
  const processNames = parseEnvArray(env.PROCESS_NAMES);

  const rawConfig = {
    transport: env.MONITOR_TRANSPORT || undefined,
    slack: rawSlack(env),
    operator: {
      userId: env.OPERATOR_USER_ID ?? '',
      additionalIds: parseEnvArray(env.ADDITIONAL_OPERATOR_IDS),
    },
    relay: {
      url: env.RELAY_URL || undefined,
      authToken: env.RELAY_AUTH_TOKEN || undefined,
      pollIntervalMs: parseEnvInt(env.RELAY_POLL_INTERVAL_MS),
    },
    notifications: rawNotifications(env),
    monitor: {
      appName: env.APP_NAME || undefined,
      processNames: processNames.length ? processNames : ['roblox', 'sober'],
      logDir: env.APP_LOG_DIR || defaultAppLogDir(),
      logExtension: env.APP_LOG_EXTENSION || undefined,
      keywordRules: loadKeywordRules(env),
      autoKillOnDisconnect: parseEnvBool(env.AUTO_KILL_ON_DISCONNECT),
      attachToExistingLog: parseEnvBool(env.ATTACH_TO_EXISTING_LOG),
      correlationWindowMinutes: parseEnvInt(env.CORRELATION_WINDOW_MINUTES),
      inactivityTimeoutMinutes: parseEnvInt(env.LOG_INACTIVITY_TIMEOUT_MINUTES),
      processPollIntervalMs: parseEnvInt(env.PROCESS_POLL_INTERVAL_MS),
      logPollIntervalMs: parseEnvInt(env.LOG_POLL_INTERVAL_MS),
    },
    sqlite: {
      path: env.SQLITE_PATH || undefined,
    },
    logging: rawLogging(env),
  };

  const result = configSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error));
  }
  return result.data;
}

export function loadRelayServerConfig(env: Env = process.env): RelayServerConfig {
  const allowedUserIds = parseEnvArray(env.ALLOWED_USER_IDS);

  const rawConfig = {
    slack: rawSlack(env) ?? { botToken: '', appToken: '' },
    server: {
      port: parseEnvInt(env.RELAY_PORT ?? env.PORT),
      tokensFile: env.RELAY_TOKENS_FILE || undefined,
      statusWaitMs: parseEnvInt(env.RELAY_STATUS_WAIT_MS),
    },
    redis: {
      url: env.REDIS_URL || undefined,
    },
    auth: {
      allowedUserIds,
      allowAll: allowedUserIds.length === 0,
    },
    notifications: rawNotifications(env),
    logging: rawLogging(env),
  };

  const result = relayServerSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error));
  }
  return result.data;
}

let cached: Config | null = null;

export function getConfig(): Config {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}
