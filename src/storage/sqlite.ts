import Database from 'better-sqlite3';
import { logger } from '../utils/logger.js';
import { StorageError, toError } from '../utils/errors.js';
import type { Session, SessionEndReason, SessionRecord, SessionRecorder } from '../session/types.js';
import fs from 'fs';
import path from 'path';

const log = logger.child({ component: 'sqlite' });

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS sessions (
    id TEXT PRIMARY KEY,
    started_at INTEGER NOT NULL,
    ended_at INTEGER,
    end_reason TEXT,
    elapsed_ms INTEGER
  );

  CREATE INDEX IF NOT EXISTS idx_sessions_started_at ON sessions(started_at);

  CREATE TABLE IF NOT EXISTS events (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    session_id TEXT NOT NULL,
    kind TEXT NOT NULL,
    detail TEXT NOT NULL,
    at INTEGER NOT NULL,
    FOREIGN KEY (session_id) REFERENCES sessions(id)
  );

  CREATE INDEX IF NOT EXISTS idx_events_session_id ON events(session_id);
`;

interface SessionRow {
  id: string;
  startedAt: number;
  endedAt: number | null;
  endReason: string | null;
  elapsedMs: number | null;
}

const END_REASONS: readonly SessionEndReason[] = ['closed', 'disconnect', 'ended', 'inactive'];

function toEndReason(value: string | null): SessionEndReason | null {
  return END_REASONS.find(reason => reason === value) ?? null;
}

/** Opens the journal database, creating its directory and schema. ':memory:' is accepted. */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(dbPath);
  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.exec(SCHEMA);

  log.info({ path: dbPath }, 'SQLite database initialized');
  return db;
}

export class SessionJournal implements SessionRecorder {
  constructor(private database: Database.Database) {}

  sessionStarted(session: Session): void {
    try {
      this.database
        .prepare<[string, number]>('INSERT INTO sessions (id, started_at) VALUES (?, ?)')
        .run(session.id, Math.round(session.startedAtWall));
      log.debug({ sessionId: session.id }, 'Session logged');
    } catch (err) {
      log.error({ err, sessionId: session.id }, 'Failed to log session start');
      throw new StorageError('sessionStarted', toError(err));
    }
  }

  sessionEnded(sessionId: string, end: { endedAt: number; reason: SessionEndReason; elapsedMs: number }): void {
    try {
      this.database
        .prepare<[number, string, number, string]>(`
          UPDATE sessions SET ended_at = ?, end_reason = ?, elapsed_ms = ?
          WHERE id = ?
        `)
        .run(Math.round(end.endedAt), end.reason, Math.round(end.elapsedMs), sessionId);
      log.debug({ sessionId, reason: end.reason }, 'Session end logged');
    } catch (err) {
      log.error({ err, sessionId }, 'Failed to log session end');
      throw new StorageError('sessionEnded', toError(err));
    }
  }

  eventRecorded(sessionId: string, event: { kind: string; detail: string; at: number }): void {
    try {
      this.database
        .prepare<[string, string, string, number]>('INSERT INTO events (session_id, kind, detail, at) VALUES (?, ?, ?, ?)')
        .run(sessionId, event.kind, event.detail, Math.round(event.at));
    } catch (err) {
      log.error({ err, sessionId, kind: event.kind }, 'Failed to log event');
      throw new StorageError('eventRecorded', toError(err));
    }
  }

  recentSessions(limit: number): SessionRecord[] {
    const rows = this.database
      .prepare<[number], SessionRow>(`
        SELECT id, started_at as startedAt, ended_at as endedAt,
               end_reason as endReason, elapsed_ms as elapsedMs
        FROM sessions
        ORDER BY started_at DESC, rowid DESC
        LIMIT ?
      `)
      .all(limit);

    return rows.map(row => ({
      id: row.id,
      startedAt: row.startedAt,
      endedAt: row.endedAt,
      endReason: toEndReason(row.endReason),
      elapsedMs: row.elapsedMs,
    }));
  }
}
