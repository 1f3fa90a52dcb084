import { pino, multistream, destination } from 'pino';
import pretty from 'pino-pretty';
import { loadLoggingConfig, type LoggingConfig } from '../config/index.js';
import { ConfigurationError } from './errors.js';
import { RotatingFileStream, cleanupOldLogs } from './log-files.js';

function resolveLoggingConfig(): LoggingConfig {
  try {
    return loadLoggingConfig(process.env);
  } catch (err) {
    // Reported properly by loadConfig() in main; log with defaults until then.
    if (err instanceof ConfigurationError) {
      return loadLoggingConfig({});
    }
    throw err;
  }
}

const loggingConfig = resolveLoggingConfig();

const consoleStream = loggingConfig.pretty
  ? pretty({
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    })
  : destination(1);

const streams = multistream([{ level: 'trace', stream: consoleStream }]);

export const logger = pino({ level: loggingConfig.level }, streams);

/**
 * Adds the persisted, size-rotated log file next to console output and
 * prunes files older than the retention period.
 */
export function enableFileLogging(options: Pick<LoggingConfig, 'dir' | 'retentionDays' | 'maxFileBytes'>): RotatingFileStream | null {
  if (!options.dir) return null;

  const deleted = cleanupOldLogs(options.dir, options.retentionDays);
  const file = new RotatingFileStream({ dir: options.dir, maxBytes: options.maxFileBytes });
  streams.add({ level: 'trace', stream: file });

  logger.info({
    file: file.path,
    retentionDays: options.retentionDays || 'unlimited',
    deleted,
  }, 'File logging enabled');
  return file;
}
