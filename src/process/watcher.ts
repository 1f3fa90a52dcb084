import { logger } from '../utils/logger.js';
import { systemClock, type Clock } from '../utils/time.js';
import type { ProcessController, ProcessInfo, ProcessTable } from './types.js';

const log = logger.child({ component: 'process-watcher' });

export interface ProcessWatcherOptions {
  /** Case-insensitive substrings matched against process names. */
  processNames: string[];
  /** How long an `isRunning()` answer may be reused. */
  cacheMs?: number;
  clock?: Clock;
}

/**
 * Read-only view of whether the monitored application is running, plus the
 * kill capability used by the session state machine and remote commands.
 */
export class ProcessWatcher implements ProcessController {
  private readonly patterns: string[];
  private readonly cacheMs: number;
  private readonly clock: Clock;
  private lastCheckAt: number | null = null;
  private lastRunning = false;
  private inFlight: Promise<boolean> | null = null;

  constructor(
    private readonly table: ProcessTable,
    options: ProcessWatcherOptions
  ) {
    this.patterns = options.processNames.map(name => name.toLowerCase());
    this.cacheMs = options.cacheMs ?? 1000;
    this.clock = options.clock ?? systemClock;
  }

  matches(name: string): boolean {
    const lower = name.toLowerCase();
    return this.patterns.some(pattern => lower.includes(pattern));
  }

  async isRunning(): Promise<boolean> {
    const now = this.clock.monotonic();
    if (this.lastCheckAt !== null && now - this.lastCheckAt < this.cacheMs) {
      return this.lastRunning;
    }
    if (this.inFlight) {
      return this.inFlight;
    }

    this.inFlight = this.findMatching()
      .then((matching) => {
        this.lastRunning = matching.length > 0;
        this.lastCheckAt = this.clock.monotonic();
        return this.lastRunning;
      })
      .finally(() => {
        this.inFlight = null;
      });

    return this.inFlight;
  }

  /**
   * Best-effort monotonic session start: the earliest matching process's
   * creation time, shifted onto the monotonic clock.
   */
  async sessionStartEstimate(): Promise<number | null> {
    try {
      const matching = await this.findMatching();
      if (matching.length === 0) return null;

      const created = await this.table.creationTimes(matching.map(p => p.pid));
      if (created.size === 0) return null;

      const earliest = Math.min(...created.values());
      const estimate = this.clock.monotonic() - (this.clock.wall() - earliest);
      return Math.min(estimate, this.clock.monotonic());
    } catch (err) {
      log.warn({ err }, 'Unable to estimate session start');
      return null;
    }
  }

  async killAll(): Promise<number> {
    const matching = await this.findMatching();
    let killed = 0;

    for (const proc of matching) {
      try {
        await this.table.kill(proc.pid);
        killed++;
      } catch (err) {
        log.debug({ err, pid: proc.pid, name: proc.name }, 'Failed to kill process');
      }
    }

    // The next isRunning() must look at the table again.
    this.lastCheckAt = null;
    log.info({ killed, matched: matching.length }, 'Killed monitored processes');
    return killed;
  }

  private async findMatching(): Promise<ProcessInfo[]> {
    const processes = await this.table.list();
    return processes.filter(p => this.matches(p.name));
  }
}
