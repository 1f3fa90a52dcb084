import type { DetectedEvent } from '../logs/classifier.js';
import type { RemoteCommand } from '../commands/types.js';

export type SessionStatus = 'idle' | 'running';

export interface Session {
  id: string;
  /** Monotonic start time; elapsed time is always measured against it. */
  startTime: number;
  /** Wall-clock start, for display and the journal only. */
  startedAtWall: number;
}

/** A moment captured on both clocks: `monotonic` for comparisons, `wall` for display. */
export interface Timestamp {
  monotonic: number;
  wall: number;
}

/**
 * Everything the state machine owns. `session` is non-null exactly when
 * `status` is `running`.
 */
export interface MonitorState {
  status: SessionStatus;
  session: Session | null;
  /** Set after the monitor killed or saw the app close; cleared by the next not-running reading. */
  awaitingExit: boolean;
  /** One-shot: the next disconnect line is consumed silently. */
  ignoreNextDisconnect: boolean;
  controlPlaneDisconnect: Timestamp | null;
  /** Monotonic time of the first control-plane disconnect signal in the current debounce window. */
  lastControlPlaneSignal: number | null;
  appDisconnect: Timestamp | null;
}

export type MonitorEvent =
  | { type: 'process-status'; running: boolean }
  | { type: 'log-event'; sessionId: string; event: DetectedEvent }
  | { type: 'log-inactive'; sessionId: string; idleMs: number }
  | { type: 'remote-command'; command: RemoteCommand; operatorId: string }
  | { type: 'transport-disconnected' }
  | { type: 'transport-resumed' }
  | { type: 'heartbeat' };

export type SessionEndReason = 'closed' | 'disconnect' | 'ended' | 'inactive';

export interface SessionRecord {
  id: string;
  startedAt: number;
  endedAt: number | null;
  endReason: SessionEndReason | null;
  elapsedMs: number | null;
}

/** Persistent record of sessions and the events seen in them. */
export interface SessionRecorder {
  sessionStarted(session: Session): void;
  sessionEnded(sessionId: string, end: { endedAt: number; reason: SessionEndReason; elapsedMs: number }): void;
  eventRecorded(sessionId: string, event: { kind: string; detail: string; at: number }): void;
  recentSessions(limit: number): SessionRecord[];
}

export interface LogWorkerHandle {
  stop(): void;
  /** Monotonic time the last log line was read, for workers that track it. */
  lastActivityAt?(): number;
}

export interface MonitorEvents {
  exitRequested: [exitCode: number];
  sessionStarted: [session: Session];
  sessionEnded: [sessionId: string, reason: SessionEndReason];
}
