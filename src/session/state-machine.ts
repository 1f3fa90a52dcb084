import { EventEmitter } from 'events';
import { nanoid } from 'nanoid';
import { logger } from '../utils/logger.js';
import { systemClock, type Clock } from '../utils/time.js';
import * as messages from '../notifications/messages.js';
import type { Notification, StatusOutbox } from '../notifications/types.js';
import type { ProcessController } from '../process/types.js';
import type { RemoteCommand } from '../commands/types.js';
import type { DetectedEvent } from '../logs/classifier.js';
import type {
  LogWorkerHandle,
  MonitorEvent,
  MonitorEvents,
  MonitorState,
  Session,
  SessionEndReason,
  SessionRecorder,
} from './types.js';

const log = logger.child({ component: 'session' });

const HISTORY_LIMIT = 5;

export interface SessionStateMachineDeps {
  watcher: { sessionStartEstimate(): Promise<number | null> };
  controller: ProcessController;
  /** Hands a notification to the outbox; never waits on delivery. */
  notify: (notification: Notification) => void;
  /** Starts tailing for a session; stopped when the session ends. */
  startLogWorker: (session: Session) => LogWorkerHandle;
  statusOutbox?: StatusOutbox;
  journal?: SessionRecorder;
  clock?: Clock;
  osUptimeMs?: () => number;
}

export interface SessionStateMachineOptions {
  appName: string;
  autoKillOnDisconnect: boolean;
  correlationWindowMs: number;
  debounceMs?: number;
  sessionStartedTtlMs: number;
  /** A session with no log line for this long is ended and killed; 0 disables. */
  inactivityTimeoutMs?: number;
}

/**
 * Reconciles process readings, classified log lines, remote commands and
 * control-plane connectivity into session transitions and notifications.
 * Events are handled one at a time by the monitor's consumer loop, so the
 * state needs no locking.
 */
export class SessionStateMachine extends EventEmitter<MonitorEvents> {
  private readonly state: MonitorState = {
    status: 'idle',
    session: null,
    awaitingExit: false,
    ignoreNextDisconnect: false,
    controlPlaneDisconnect: null,
    lastControlPlaneSignal: null,
    appDisconnect: null,
  };
  private logWorker: LogWorkerHandle | null = null;
  private readonly clock: Clock;
  private readonly debounceMs: number;
  private readonly startedAt: number;

  constructor(
    private readonly deps: SessionStateMachineDeps,
    private readonly options: SessionStateMachineOptions
  ) {
    super();
    this.clock = deps.clock ?? systemClock;
    this.debounceMs = options.debounceMs ?? 10_000;
    this.startedAt = this.clock.monotonic();
  }

  snapshot(): Readonly<MonitorState> {
    return {
      ...this.state,
      session: this.state.session ? { ...this.state.session } : null,
      controlPlaneDisconnect: this.state.controlPlaneDisconnect ? { ...this.state.controlPlaneDisconnect } : null,
      appDisconnect: this.state.appDisconnect ? { ...this.state.appDisconnect } : null,
    };
  }

  /** Elapsed time of the running session, or null when idle. */
  elapsedMs(): number | null {
    const session = this.state.session;
    if (!session) return null;
    return Math.max(0, this.clock.monotonic() - session.startTime);
  }

  async handle(event: MonitorEvent): Promise<void> {
    switch (event.type) {
      case 'process-status':
        if (event.running) {
          await this.onRunning();
        } else {
          this.onNotRunning();
        }
        return;

      case 'log-event':
        await this.onLogEvent(event.sessionId, event.event);
        return;

      case 'log-inactive':
        await this.onLogInactive(event.sessionId, event.idleMs);
        return;

      case 'remote-command':
        await this.onCommand(event.command, event.operatorId);
        return;

      case 'transport-disconnected':
        this.onTransportDisconnected();
        return;

      case 'transport-resumed':
        this.onTransportResumed();
        return;

      case 'heartbeat':
        this.deps.notify(messages.heartbeat(this.clock.monotonic() - this.startedAt, this.options.sessionStartedTtlMs));
        return;
    }
  }

  /** Stops the log worker of the current session, if any. */
  dispose(): void {
    this.stopLogWorker();
  }

  private async onRunning(): Promise<void> {
    if (this.state.awaitingExit || this.state.status === 'running') return;

    const now = this.clock.monotonic();
    const estimate = await this.deps.watcher.sessionStartEstimate();
    const startTime = estimate === null ? now : Math.min(estimate, now);

    const session: Session = {
      id: nanoid(),
      startTime,
      startedAtWall: this.clock.wall() - (now - startTime),
    };
    this.state.status = 'running';
    this.state.session = session;

    log.info({ sessionId: session.id, estimated: estimate !== null }, 'Session started');
    this.deps.notify(messages.sessionStarted(this.options.appName, session.startedAtWall, this.options.sessionStartedTtlMs));
    this.record(() => this.deps.journal?.sessionStarted(session));
    this.emit('sessionStarted', session);

    this.logWorker = this.deps.startLogWorker(session);
  }

  private onNotRunning(): void {
    if (this.state.awaitingExit) {
      this.state.awaitingExit = false;
      log.debug('Application exit observed after kill');
    }

    if (this.state.status !== 'running') return;

    const elapsed = this.elapsedMs() ?? 0;
    this.deps.notify(messages.processEnded(this.options.appName, elapsed));
    this.endSession('ended');
  }

  private async onLogEvent(sessionId: string, event: DetectedEvent): Promise<void> {
    const session = this.state.session;
    if (!session || session.id !== sessionId) {
      log.debug({ sessionId, kind: event.kind }, 'Ignoring log event from a finished session');
      return;
    }

    const elapsed = this.elapsedMs() ?? 0;
    this.record(() => this.deps.journal?.eventRecorded(session.id, { kind: event.kind, detail: event.line, at: this.clock.wall() }));

    if (event.kind === 'closed') {
      log.info({ sessionId, line: event.line }, 'Application closed');
      this.deps.notify(messages.applicationClosed(this.options.appName, elapsed));
      this.endSession('closed');
      this.state.awaitingExit = true;
      await this.killAll();
      return;
    }

    if (this.state.ignoreNextDisconnect) {
      this.state.ignoreNextDisconnect = false;
      log.info({ sessionId, line: event.line }, 'Disconnect ignored by one-shot flag');
      return;
    }

    this.state.appDisconnect = { monotonic: this.clock.monotonic(), wall: this.clock.wall() };
    log.warn({ sessionId, line: event.line }, 'Disconnect detected');
    this.deps.notify(messages.disconnectDetected(event.line, elapsed));

    if (this.options.autoKillOnDisconnect) {
      this.endSession('disconnect');
      this.state.awaitingExit = true;
      await this.killAll();
    }
  }

  private async onLogInactive(sessionId: string, idleMs: number): Promise<void> {
    const session = this.state.session;
    if (!session || session.id !== sessionId) return;

    const elapsed = this.elapsedMs() ?? 0;
    log.warn({ sessionId, idleMs }, 'Log inactivity timeout expired');
    this.record(() => this.deps.journal?.eventRecorded(session.id, { kind: 'inactive', detail: `idle ${Math.round(idleMs)}ms`, at: this.clock.wall() }));
    this.deps.notify(messages.inactivityExpired(this.options.appName, idleMs, elapsed));
    this.endSession('inactive');
    this.state.awaitingExit = true;
    await this.killAll();
  }

  /** Time until the inactivity timeout fires, or null when it does not apply. */
  private inactivityRemainingMs(): number | null {
    const timeoutMs = this.options.inactivityTimeoutMs ?? 0;
    const lastActivityAt = this.logWorker?.lastActivityAt?.();
    if (timeoutMs <= 0 || this.state.status !== 'running' || lastActivityAt === undefined) {
      return null;
    }
    return Math.max(0, timeoutMs - (this.clock.monotonic() - lastActivityAt));
  }

  private async onCommand(command: RemoteCommand, operatorId: string): Promise<void> {
    log.info({ command: command.type, operatorId }, 'Remote command received');

    switch (command.type) {
      case 'kill': {
        const killed = await this.killAll();
        this.deps.notify(messages.applicationKill(this.options.appName, killed));
        return;
      }

      case 'status': {
        const status = messages.clientStatus(this.state.status === 'running', this.elapsedMs(), this.inactivityRemainingMs());
        if (!this.deps.statusOutbox) {
          this.deps.notify(status);
          return;
        }
        try {
          await this.deps.statusOutbox.report(status);
        } catch (err) {
          log.warn({ err }, 'Failed to report status, sending it as a notification');
          this.deps.notify(status);
        }
        return;
      }

      case 'ping':
        this.deps.notify(messages.pong());
        return;

      case 'uptime':
        this.deps.notify(messages.uptime(
          this.options.appName,
          this.elapsedMs(),
          this.clock.monotonic() - this.startedAt,
          this.deps.osUptimeMs?.() ?? 0
        ));
        return;

      case 'toggle-disconnect-flag':
        this.state.ignoreNextDisconnect = !this.state.ignoreNextDisconnect;
        this.deps.notify(messages.disconnectFlag(this.state.ignoreNextDisconnect));
        return;

      case 'history': {
        let records: ReturnType<SessionRecorder['recentSessions']> = [];
        try {
          records = this.deps.journal?.recentSessions(HISTORY_LIMIT) ?? [];
        } catch (err) {
          log.warn({ err }, 'Failed to read session history');
        }
        this.deps.notify(messages.sessionHistory(records));
        return;
      }

      case 'shutdown':
        this.deps.notify(messages.monitorExit(0));
        this.emit('exitRequested', 0);
        return;

      case 'restart':
        this.deps.notify(messages.monitorExit(2));
        this.emit('exitRequested', 2);
        return;

      case 'help':
        this.deps.notify(messages.availableCommands());
        return;
    }
  }

  private onTransportDisconnected(): void {
    const now = this.clock.monotonic();
    const last = this.state.lastControlPlaneSignal;

    if (last !== null && now - last < this.debounceMs) {
      log.debug('Repeated control-plane disconnect ignored');
      return;
    }
    this.state.lastControlPlaneSignal = now;

    if (this.state.controlPlaneDisconnect === null) {
      this.state.controlPlaneDisconnect = { monotonic: now, wall: this.clock.wall() };
      log.warn('Chat transport disconnected');
    }
  }

  private onTransportResumed(): void {
    const disconnect = this.state.controlPlaneDisconnect;
    if (!disconnect) return;

    const appDisconnect = this.state.appDisconnect;
    const correlated = appDisconnect !== null
      && Math.abs(appDisconnect.monotonic - disconnect.monotonic) <= this.options.correlationWindowMs;

    log.info({ correlated }, 'Chat transport resumed');
    this.deps.notify(messages.botDisconnected(
      this.options.appName,
      disconnect.wall,
      correlated && appDisconnect ? appDisconnect.wall : null
    ));

    // The application disconnect stays recorded and may pair with a later bot outage.
    this.state.controlPlaneDisconnect = null;
  }

  private endSession(reason: SessionEndReason): void {
    const session = this.state.session;
    if (!session) return;

    const elapsedMs = this.elapsedMs() ?? 0;
    this.stopLogWorker();
    this.state.status = 'idle';
    this.state.session = null;

    log.info({ sessionId: session.id, reason, elapsedMs }, 'Session ended');
    this.record(() => this.deps.journal?.sessionEnded(session.id, { endedAt: this.clock.wall(), reason, elapsedMs }));
    this.emit('sessionEnded', session.id, reason);
  }

  private stopLogWorker(): void {
    if (this.logWorker) {
      this.logWorker.stop();
      this.logWorker = null;
    }
  }

  private async killAll(): Promise<number> {
    try {
      return await this.deps.controller.killAll();
    } catch (err) {
      log.error({ err }, 'Failed to kill application processes');
      return 0;
    }
  }

  /** Journal writes never block a transition. */
  private record(write: () => void): void {
    try {
      write();
    } catch (err) {
      log.warn({ err }, 'Failed to write session journal');
    }
  }
}
