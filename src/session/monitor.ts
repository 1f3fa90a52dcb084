import { EventEmitter } from 'events';
import { logger } from '../utils/logger.js';
import { sleep } from '../utils/time.js';
import { EventChannel } from './channel.js';
import { SessionStateMachine, type SessionStateMachineDeps, type SessionStateMachineOptions } from './state-machine.js';
import { startLogWorker, type LogWorkerOptions } from './log-worker.js';
import type { LogTailer } from '../logs/tailer.js';
import type { RemoteCommandInbox } from '../commands/types.js';
import type { MonitorEvent, MonitorEvents } from './types.js';

const log = logger.child({ component: 'monitor' });

export interface MonitorDeps extends Omit<SessionStateMachineDeps, 'startLogWorker' | 'watcher'> {
  watcher: SessionStateMachineDeps['watcher'] & { isRunning(): Promise<boolean> };
  inbox?: RemoteCommandInbox;
}

export interface MonitorOptions extends SessionStateMachineOptions {
  processPollIntervalMs: number;
  commandPollIntervalMs: number;
  /** 0 disables the heartbeat. */
  heartbeatIntervalMs: number;
  logs: Omit<LogWorkerOptions, 'publish' | 'baseline' | 'clock' | 'inactivityTimeoutMs'>;
}

/**
 * Wires the workers to the state machine. Process polling, command polling,
 * log tailing and the heartbeat only publish onto one channel; a single
 * consumer loop applies events to the state machine in order.
 */
export class Monitor extends EventEmitter<MonitorEvents> {
  readonly machine: SessionStateMachine;
  private readonly channel = new EventChannel<MonitorEvent>();
  private readonly controller = new AbortController();
  private readonly workers: Promise<void>[] = [];
  private started = false;
  /** Log files listed at the last reading that found the application not running. */
  private idleLogFiles: Set<string> | undefined;
  private snapshotTailer: LogTailer | null = null;

  constructor(
    private readonly deps: MonitorDeps,
    private readonly options: MonitorOptions
  ) {
    super();
    this.machine = new SessionStateMachine(
      {
        ...deps,
        startLogWorker: (session) => startLogWorker(session, {
          ...options.logs,
          baseline: this.idleLogFiles,
          clock: deps.clock,
          inactivityTimeoutMs: options.inactivityTimeoutMs,
          publish: (event) => this.publish(event),
        }),
      },
      options
    );

    this.machine.on('exitRequested', code => this.emit('exitRequested', code));
    this.machine.on('sessionStarted', session => this.emit('sessionStarted', session));
    this.machine.on('sessionEnded', (id, reason) => this.emit('sessionEnded', id, reason));
  }

  /** Returns false once the monitor is stopping. */
  publish(event: MonitorEvent): boolean {
    return this.channel.publish(event);
  }

  start(): void {
    if (this.started) return;
    this.started = true;

    this.workers.push(this.consume());
    this.workers.push(this.pollProcesses());
    if (this.deps.inbox) {
      this.workers.push(this.pollCommands(this.deps.inbox));
    }
    if (this.options.heartbeatIntervalMs > 0) {
      this.workers.push(this.sendHeartbeats(this.options.heartbeatIntervalMs));
    }

    log.info({
      processPollIntervalMs: this.options.processPollIntervalMs,
      heartbeatIntervalMs: this.options.heartbeatIntervalMs,
      autoKillOnDisconnect: this.options.autoKillOnDisconnect,
    }, 'Monitor started');
  }

  async stop(): Promise<void> {
    if (this.controller.signal.aborted) return;
    this.controller.abort();
    this.channel.close();
    await Promise.all(this.workers);
    this.machine.dispose();
    log.info('Monitor stopped');
  }

  private async consume(): Promise<void> {
    for await (const event of this.channel) {
      try {
        await this.machine.handle(event);
      } catch (err) {
        log.error({ err, event: event.type }, 'Failed to handle monitor event');
      }
    }
  }

  private async pollProcesses(): Promise<void> {
    const signal = this.controller.signal;
    while (!signal.aborted) {
      try {
        // Listed before the reading: a log created by a launch after this point is never in it.
        const listing = this.options.logs.attachToExisting ? undefined : await this.listLogFiles();
        const running = await this.deps.watcher.isRunning();
        if (!running && listing) {
          this.idleLogFiles = listing;
        }
        this.publish({ type: 'process-status', running });
      } catch (err) {
        log.warn({ err }, 'Process poll failed');
      }
      await sleep(this.options.processPollIntervalMs, signal);
    }
  }

  private async listLogFiles(): Promise<Set<string> | undefined> {
    this.snapshotTailer ??= this.options.logs.createTailer();
    try {
      return await this.snapshotTailer.snapshot();
    } catch (err) {
      log.debug({ err }, 'Failed to list log files');
      return undefined;
    }
  }

  private async pollCommands(inbox: RemoteCommandInbox): Promise<void> {
    const signal = this.controller.signal;
    while (!signal.aborted) {
      try {
        for (const { command, operatorId } of await inbox.drain()) {
          this.publish({ type: 'remote-command', command, operatorId });
        }
      } catch (err) {
        log.warn({ err }, 'Command poll failed');
      }
      await sleep(this.options.commandPollIntervalMs, signal);
    }
  }

  private async sendHeartbeats(intervalMs: number): Promise<void> {
    const signal = this.controller.signal;
    for (;;) {
      await sleep(intervalMs, signal);
      if (signal.aborted) return;
      this.publish({ type: 'heartbeat' });
    }
  }
}
