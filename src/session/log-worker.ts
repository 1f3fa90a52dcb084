import path from 'path';
import { logger } from '../utils/logger.js';
import { sleep, systemClock, type Clock } from '../utils/time.js';
import type { LogTailer } from '../logs/tailer.js';
import type { EventClassifier } from '../logs/classifier.js';
import type { LogWorkerHandle, MonitorEvent, Session } from './types.js';

const log = logger.child({ component: 'log-worker' });

export interface LogWorkerOptions {
  createTailer: () => LogTailer;
  classifier: EventClassifier;
  /** Attach to the newest existing log instead of waiting for a new file. */
  attachToExisting: boolean;
  publish: (event: MonitorEvent) => boolean;
  /**
   * Log files that existed while the application was not running. Without
   * it the worker lists the directory itself when it starts.
   */
  baseline?: Set<string>;
  /** Publish `log-inactive` once no line arrived for this long; 0 disables. */
  inactivityTimeoutMs?: number;
  clock?: Clock;
  retryDelayMs?: number;
}

export interface RunningLogWorker extends LogWorkerHandle {
  done: Promise<void>;
}

/**
 * Tails the application log for one session and publishes every detected
 * event tagged with that session's id. Stopping aborts the tail at its next
 * poll.
 */
export function startLogWorker(session: Session, options: LogWorkerOptions): RunningLogWorker {
  const controller = new AbortController();
  const activity = { at: (options.clock ?? systemClock).monotonic() };
  const done = runLogWorker(session, options, controller.signal, activity).catch((err: unknown) => {
    log.error({ err, sessionId: session.id }, 'Log worker stopped unexpectedly');
  });

  return {
    stop: () => controller.abort(),
    lastActivityAt: () => activity.at,
    done,
  };
}

async function runLogWorker(
  session: Session,
  options: LogWorkerOptions,
  signal: AbortSignal,
  activity: { at: number }
): Promise<void> {
  const tailer = options.createTailer();
  const clock = options.clock ?? systemClock;
  const timeoutMs = options.inactivityTimeoutMs ?? 0;
  const retryDelayMs = options.retryDelayMs ?? 1000;
  activity.at = clock.monotonic();
  log.info({ sessionId: session.id, dir: tailer.dir, baseline: options.baseline !== undefined }, 'Log worker started');

  try {
    // Files present before the session began; a brand-new log is anything else.
    const existing = options.baseline ?? await tailer.snapshot().catch((err: unknown) => {
      log.warn({ err }, 'Failed to snapshot log directory');
      return new Set<string>();
    });

    while (!signal.aborted) {
      try {
        if (!tailer.currentFile) {
          const opened = await openLog(tailer, options.attachToExisting, existing, signal);
          if (!opened) break;
          activity.at = clock.monotonic();
        }

        while (!signal.aborted) {
          const line = await tailer.readLine(signal);
          if (line === null) {
            const idleMs = clock.monotonic() - activity.at;
            if (timeoutMs > 0 && idleMs >= timeoutMs && !signal.aborted) {
              log.warn({ sessionId: session.id, idleMs }, 'No log activity, giving up on the session');
              options.publish({ type: 'log-inactive', sessionId: session.id, idleMs });
              return;
            }
            continue;
          }

          activity.at = clock.monotonic();
          const classified = options.classifier.classify(line);
          if (classified.kind === 'none') continue;
          if (signal.aborted) break;

          log.debug({ sessionId: session.id, kind: classified.kind }, 'Log event detected');
          options.publish({ type: 'log-event', sessionId: session.id, event: classified });
        }
      } catch (err) {
        log.error({ err, sessionId: session.id, file: tailer.currentFile }, 'Log worker iteration failed, retrying');
        await sleep(retryDelayMs, signal);
      }
    }
  } finally {
    await tailer.close();
    log.info({ sessionId: session.id }, 'Log worker stopped');
  }
}

async function openLog(
  tailer: LogTailer,
  attachToExisting: boolean,
  existing: Set<string>,
  signal: AbortSignal
): Promise<boolean> {
  if (attachToExisting) {
    const latest = await tailer.findLatest();
    if (latest) {
      log.info({ file: path.basename(latest) }, 'Attaching to existing log file');
      await tailer.openAtEnd(latest);
      return true;
    }
  }

  log.info('Waiting for a new log file');
  const fresh = await tailer.findLatestNew(existing, signal);
  if (!fresh) return false;

  // Created after the session began, so every line in it is new.
  await tailer.openAtStart(fresh);
  return true;
}
