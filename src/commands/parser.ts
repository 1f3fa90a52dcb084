import type { ParsedCommand, RemoteCommand } from './types.js';

export const COMMAND_PREFIX = '!';

export const COMMAND_HELP: ReadonlyArray<{ usage: string; description: string }> = [
  { usage: '!status', description: 'Check whether the application is running and for how long' },
  { usage: '!kill', description: 'Kill the application processes' },
  { usage: '!ping', description: 'Test monitor responsiveness' },
  { usage: '!uptime', description: 'Show application, monitor and OS uptime' },
  { usage: '!setflag', description: 'Toggle the ignore-next-disconnect flag' },
  { usage: '!history', description: 'Show recent sessions' },
  { usage: '!shutdown', description: 'Shut down the monitor' },
  { usage: '!restart', description: 'Restart the monitor' },
  { usage: '!help', description: 'Show this message' },
];

/**
 * Parses a direct message into a command. Returns null for anything that
 * does not start with the command prefix.
 */
export function parseRemoteCommand(text: string): ParsedCommand | null {
  const trimmed = text.trim();

  if (!trimmed.startsWith(COMMAND_PREFIX)) {
    return null;
  }

  const cmd = trimmed.slice(COMMAND_PREFIX.length).split(/\s+/)[0]?.toLowerCase() ?? '';

  switch (cmd) {
    case 'kill':
    case 'close':
      return { type: 'kill' };

    case 'status':
    case 'info':
      return { type: 'status' };

    case 'ping':
      return { type: 'ping' };

    case 'uptime':
      return { type: 'uptime' };

    case 'setflag':
    case 'flag':
      return { type: 'toggle-disconnect-flag' };

    case 'history':
    case 'sessions':
      return { type: 'history' };

    case 'shutdown':
    case 'stop':
      return { type: 'shutdown' };

    case 'restart':
      return { type: 'restart' };

    case 'help':
    case 'commands':
      return { type: 'help' };

    default:
      return { type: 'unknown', command: cmd };
  }
}

/** Commands carried over the relay as `{ action }` objects. */
export function commandFromAction(action: string): RemoteCommand | null {
  switch (action) {
    case 'kill':
      return { type: 'kill' };
    case 'status':
      return { type: 'status' };
    case 'ping':
      return { type: 'ping' };
    default:
      return null;
  }
}
