import { spawn } from 'child_process';
import { logger } from '../utils/logger.js';
import { sleep as defaultSleep } from '../utils/time.js';
import { classifyExit, type RestartPolicy } from './policy.js';

const log = logger.child({ component: 'supervisor' });

export interface ChildExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  error?: Error;
}

export interface ChildHandle {
  pid: number | undefined;
  exited: Promise<ChildExit>;
  kill(signal: NodeJS.Signals): void;
}

export type Spawner = () => ChildHandle;

export interface SupervisorOptions {
  policy: RestartPolicy;
  gracePeriodMs: number;
  /** Runs before every start, e.g. a git update; failures are logged. */
  beforeStart?: () => Promise<void>;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
}

export interface SupervisorResult {
  reason: string;
  exitCode: number;
}

/** Runs `script` with the current Node binary and loader flags, sharing our stdio. */
export function spawnNodeScript(script: string, args: string[] = []): ChildHandle {
  const child = spawn(process.execPath, [...process.execArgv, script, ...args], {
    stdio: 'inherit',
  });

  const exited = new Promise<ChildExit>((resolve) => {
    child.once('exit', (code, signal) => resolve({ code, signal }));
    child.once('error', (error) => resolve({ code: null, signal: null, error }));
  });

  return {
    pid: child.pid,
    exited,
    kill: (signal) => {
      child.kill(signal);
    },
  };
}

/**
 * Starts the monitor, waits for it to exit and restarts it according to the
 * restart policy until the policy says stop or `shutdown` is called.
 */
export class Supervisor {
  private child: ChildHandle | null = null;
  private stopping = false;
  private readonly controller = new AbortController();
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly now: () => number;

  constructor(
    private readonly spawner: Spawner,
    private readonly options: SupervisorOptions
  ) {
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  async run(): Promise<SupervisorResult> {
    while (!this.stopping) {
      if (this.options.beforeStart) {
        try {
          await this.options.beforeStart();
        } catch (err) {
          log.error({ err }, 'Pre-start hook failed');
        }
      }
      if (this.stopping) break;

      const child = this.spawner();
      this.child = child;
      log.info({ pid: child.pid }, 'Monitor process started');

      const exit = await child.exited;
      this.child = null;

      if (exit.error) {
        log.error({ err: exit.error }, 'Failed to start monitor process');
        return { reason: 'spawn failed', exitCode: 1 };
      }
      log.info({ code: exit.code, signal: exit.signal }, 'Monitor process exited');
      if (this.stopping) break;

      const kind = classifyExit(exit.code);
      const decision = this.options.policy.onExit(kind, this.now());

      if (decision.action === 'stop') {
        const level = kind === 'crash' ? 'error' : 'info';
        log[level]({ reason: decision.reason, code: exit.code }, 'Not restarting monitor');
        return { reason: decision.reason, exitCode: 0 };
      }

      if (kind === 'crash') {
        log.warn({
          code: exit.code,
          restart: this.options.policy.restartCount,
          recentCrashes: this.options.policy.recentCrashes,
          delayMs: decision.delayMs,
        }, 'Monitor crashed, restarting');
      } else {
        log.info('Monitor requested a restart');
      }

      if (decision.delayMs > 0) {
        await this.sleep(decision.delayMs, this.controller.signal);
      }
    }

    return { reason: 'shutdown requested', exitCode: 0 };
  }

  /**
   * Forwards `signal` to the child and waits up to the grace period before
   * force-killing it.
   */
  async shutdown(signal: NodeJS.Signals): Promise<void> {
    if (this.stopping) return;
    this.stopping = true;
    this.controller.abort();

    const child = this.child;
    if (!child) return;

    log.info({ signal, pid: child.pid }, 'Forwarding signal to monitor');
    child.kill(signal);

    const grace = new AbortController();
    const graceExpired = this.sleep(this.options.gracePeriodMs, grace.signal).then(() => 'timeout' as const);
    const outcome = await Promise.race([child.exited.then(() => 'exited' as const), graceExpired]);
    grace.abort();

    if (outcome === 'timeout') {
      log.warn({ pid: child.pid, gracePeriodMs: this.options.gracePeriodMs }, 'Monitor did not exit in time, killing');
      child.kill('SIGKILL');
      await child.exited;
    } else {
      log.info('Monitor process terminated cleanly');
    }
  }
}
