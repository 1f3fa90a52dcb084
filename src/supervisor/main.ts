#!/usr/bin/env node
import 'dotenv/config';
import path from 'path';
import { fileURLToPath } from 'url';
import { Command, InvalidArgumentError } from 'commander';
import { enableFileLogging, logger } from '../utils/logger.js';
import { loadLoggingConfig } from '../config/index.js';
import { ConfigurationError } from '../utils/errors.js';
import { RestartPolicy } from './policy.js';
import { Supervisor, spawnNodeScript } from './supervisor.js';
import { findGitRoot, gitFetchAndPull } from './git-update.js';

const log = logger.child({ component: 'supervisor' });

const here = fileURLToPath(import.meta.url);
// The monitor entry point sits next to this directory, compiled or not.
const DEFAULT_SCRIPT = path.join(path.dirname(here), '..', `index${path.extname(here)}`);

interface SupervisorCliOptions {
  maxRestarts: number;
  autoRestart: boolean;
  restartDelay: number;
  gracePeriod: number;
  autoUpdate: boolean;
  gitBranch?: string;
  script: string;
}

function nonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

const program = new Command()
  .name('session-relay-supervisor')
  .description('Runs the session monitor and restarts it when it crashes')
  .option('--max-restarts <count>', 'Maximum number of restart attempts', nonNegativeInt, 50)
  .option('--no-auto-restart', 'Run once; do not restart on crash')
  .option('--restart-delay <seconds>', 'Base backoff delay between restarts', nonNegativeInt, 10)
  .option('--grace-period <seconds>', 'Time the monitor gets to exit after a forwarded signal', nonNegativeInt, 5)
  .option('--auto-update', 'Fast-forward the git checkout before each start', false)
  .option('--git-branch <branch>', 'Branch to update from (default: current branch)')
  .option('--script <path>', 'Monitor entry point to run', DEFAULT_SCRIPT)
  .action(async () => {
    const options = program.opts<SupervisorCliOptions>();

    try {
      enableFileLogging(loadLoggingConfig());
    } catch (err) {
      if (!(err instanceof ConfigurationError)) throw err;
      log.warn({ issues: err.issues }, 'Invalid logging configuration, file logging disabled');
    }

    log.info({
      script: options.script,
      autoRestart: options.autoRestart,
      maxRestarts: options.maxRestarts,
      restartDelay: options.restartDelay,
    }, 'Supervisor started');

    const policy = new RestartPolicy({
      maxRestarts: options.maxRestarts,
      autoRestart: options.autoRestart,
      baseDelayMs: options.restartDelay * 1000,
    });

    const beforeStart = options.autoUpdate
      ? async () => {
          const root = findGitRoot(path.dirname(options.script));
          if (!root) {
            log.warn('Git repository root not found, skipping auto-update');
            return;
          }
          if (await gitFetchAndPull(root, options.gitBranch)) {
            log.info({ root }, 'Repository updated');
          }
        }
      : undefined;

    const supervisor = new Supervisor(() => spawnNodeScript(options.script), {
      policy,
      gracePeriodMs: options.gracePeriod * 1000,
      beforeStart,
    });

    const onSignal = (signal: NodeJS.Signals) => {
      log.info({ signal }, 'Shutting down...');
      supervisor.shutdown(signal).then(
        () => process.exit(0),
        (err: unknown) => {
          log.error({ err }, 'Error during shutdown');
          process.exit(1);
        }
      );
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);

    const result = await supervisor.run();
    log.info({ reason: result.reason }, 'Supervisor stopped');
    process.exitCode = result.exitCode;
  });

program.parseAsync().catch((err: unknown) => {
  log.fatal({ err }, 'Supervisor failed');
  process.exit(1);
});
