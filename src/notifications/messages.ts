import { formatElapsed, formatTimestamp } from '../utils/time.js';
import { COMMAND_HELP } from '../commands/parser.js';
import type { Notification } from './types.js';
import type { SessionRecord } from '../session/types.js';

export function sessionStarted(appName: string, startedAtWall: number, ttlMs: number): Notification {
  return {
    title: 'SESSION STARTED',
    body: `${appName} session started at ${formatTimestamp(startedAtWall)}`,
    severity: 'success',
    ephemeralTtlMs: ttlMs,
  };
}

export function applicationClosed(appName: string, elapsedMs: number): Notification {
  return {
    title: 'APPLICATION CLOSED',
    body: `${appName} was closed.\nTime elapsed: ${formatElapsed(elapsedMs)}`,
    severity: 'warning',
  };
}

export function disconnectDetected(line: string, elapsedMs: number): Notification {
  return {
    title: 'DISCONNECT DETECTED',
    body: `${line}\nTime elapsed: ${formatElapsed(elapsedMs)}`,
    severity: 'error',
  };
}

export function processEnded(appName: string, elapsedMs: number): Notification {
  return {
    title: 'PROCESS ENDED',
    body: `${appName} is no longer running.\nTime elapsed: ${formatElapsed(elapsedMs)}`,
    severity: 'warning',
  };
}

export function applicationKill(appName: string, killed: number): Notification {
  return {
    title: 'APPLICATION KILL',
    body: killed > 0 ? `Killed ${killed} process(es).` : `No ${appName} processes found to kill.`,
    severity: killed > 0 ? 'success' : 'warning',
  };
}

/** `timeLeftMs` is the inactivity countdown, shown only while it applies. */
export function clientStatus(running: boolean, elapsedMs: number | null, timeLeftMs: number | null = null): Notification {
  let body = `running: ${running}\nTime elapsed: ${elapsedMs === null ? 'N/A' : formatElapsed(elapsedMs)}`;
  if (timeLeftMs !== null) {
    body += `\nTime left: ${formatElapsed(timeLeftMs)}`;
  }
  return { title: 'CLIENT STATUS', body, severity: 'info' };
}

export function inactivityExpired(appName: string, idleMs: number, elapsedMs: number): Notification {
  return {
    title: 'TIMER EXPIRED',
    body: `No log activity for ${formatElapsed(idleMs)}. Closing ${appName}...\nTime elapsed: ${formatElapsed(elapsedMs)}`,
    severity: 'error',
  };
}

/** Control-plane reconnect, optionally paired with an application disconnect seen in the log. */
export function botDisconnected(appName: string, disconnectedAtWall: number, appDisconnectAtWall: number | null): Notification {
  let body = `Reconnected after disconnect at ${formatTimestamp(disconnectedAtWall)}`;
  if (appDisconnectAtWall !== null) {
    body += `\nPossible ${appName} disconnect at ${formatTimestamp(appDisconnectAtWall)}`;
  }
  return { title: 'BOT DISCONNECTED', body, severity: 'warning' };
}

export function heartbeat(monitorUptimeMs: number, ttlMs: number): Notification {
  return {
    title: 'HEARTBEAT',
    body: `Monitor is alive. Uptime: ${formatElapsed(monitorUptimeMs)}`,
    severity: 'info',
    ephemeralTtlMs: ttlMs,
  };
}

export function pong(): Notification {
  return { title: 'PONG', body: 'Monitor is responsive.', severity: 'info' };
}

export function uptime(appName: string, appElapsedMs: number | null, monitorUptimeMs: number, osUptimeMs: number): Notification {
  return {
    title: 'SYSTEM UPTIME',
    body: [
      `${appName}: ${appElapsedMs === null ? 'N/A' : formatElapsed(appElapsedMs)}`,
      `Monitor: ${formatElapsed(monitorUptimeMs)}`,
      `System: ${formatElapsed(osUptimeMs)}`,
    ].join('\n'),
    severity: 'info',
  };
}

export function disconnectFlag(ignoreNext: boolean): Notification {
  return {
    title: 'DISCONNECT FLAG SET',
    body: ignoreNext ? 'The next disconnect will be ignored.' : 'Disconnects will be reported normally.',
    severity: 'info',
  };
}

export function sessionHistory(records: SessionRecord[]): Notification {
  if (records.length === 0) {
    return { title: 'SESSION HISTORY', body: 'No sessions recorded yet.', severity: 'info' };
  }

  const lines = records.map((record) => {
    const duration = record.elapsedMs === null ? 'in progress' : formatElapsed(record.elapsedMs);
    const reason = record.endReason ? ` (${record.endReason})` : '';
    return `${formatTimestamp(record.startedAt)}  ${duration}${reason}`;
  });
  return { title: 'SESSION HISTORY', body: lines.join('\n'), severity: 'info' };
}

export function monitorExit(exitCode: 0 | 2): Notification {
  return exitCode === 0
    ? { title: 'MONITOR SHUTDOWN', body: 'Monitor is shutting down.', severity: 'warning' }
    : { title: 'MONITOR RESTART', body: 'Monitor is restarting.', severity: 'warning' };
}

export function availableCommands(): Notification {
  return {
    title: 'AVAILABLE COMMANDS',
    body: COMMAND_HELP.map(({ usage, description }) => `${usage} - ${description}`).join('\n'),
    severity: 'info',
  };
}
