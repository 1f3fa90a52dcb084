export type ExitKind = 'clean' | 'config-error' | 'restart-requested' | 'crash';

/** Monitor exit codes: 0 clean, 1 configuration error, 2 restart requested, anything else a crash. */
export function classifyExit(code: number | null): ExitKind {
  switch (code) {
    case 0:
      return 'clean';
    case 1:
      return 'config-error';
    case 2:
      return 'restart-requested';
    default:
      return 'crash';
  }
}

export interface RestartPolicyOptions {
  maxRestarts: number;
  autoRestart: boolean;
  baseDelayMs: number;
  maxDelayMs?: number;
  crashWindowMs?: number;
  /** More crashes than this inside the window stops the supervisor. */
  maxCrashesPerWindow?: number;
}

export type RestartDecision =
  | { action: 'restart'; delayMs: number }
  | { action: 'stop'; reason: string };

/**
 * Decides what follows each child exit. Crash backoff grows every fifth
 * restart: `min(base * floor(restarts / 5), max)`.
 */
export class RestartPolicy {
  private restarts = 0;
  private crashTimes: number[] = [];
  private readonly maxDelayMs: number;
  private readonly crashWindowMs: number;
  private readonly maxCrashesPerWindow: number;

  constructor(private readonly options: RestartPolicyOptions) {
    this.maxDelayMs = options.maxDelayMs ?? 120_000;
    this.crashWindowMs = options.crashWindowMs ?? 60_000;
    this.maxCrashesPerWindow = options.maxCrashesPerWindow ?? 5;
  }

  get restartCount(): number {
    return this.restarts;
  }

  /** Crashes inside the rolling window as of the last recorded crash. */
  get recentCrashes(): number {
    return this.crashTimes.length;
  }

  onExit(kind: ExitKind, now: number): RestartDecision {
    switch (kind) {
      case 'clean':
        return { action: 'stop', reason: 'clean exit' };
      case 'config-error':
        return { action: 'stop', reason: 'configuration error' };
      case 'restart-requested':
        return { action: 'restart', delayMs: 0 };
      case 'crash':
        return this.onCrash(now);
    }
  }

  backoffMs(restartCount: number): number {
    return Math.min(this.options.baseDelayMs * Math.floor(restartCount / 5), this.maxDelayMs);
  }

  private onCrash(now: number): RestartDecision {
    this.crashTimes = this.crashTimes.filter(t => now - t < this.crashWindowMs);
    this.crashTimes.push(now);

    if (this.crashTimes.length > this.maxCrashesPerWindow) {
      return { action: 'stop', reason: `more than ${this.maxCrashesPerWindow} crashes within ${this.crashWindowMs / 1000}s` };
    }
    if (!this.options.autoRestart) {
      return { action: 'stop', reason: 'auto-restart disabled' };
    }
    if (this.restarts >= this.options.maxRestarts) {
      return { action: 'stop', reason: `reached max restarts (${this.options.maxRestarts})` };
    }

    this.restarts++;
    return { action: 'restart', delayMs: this.backoffMs(this.restarts) };
  }
}
