export type RemoteCommand =
  | { type: 'kill' }
  | { type: 'status' }
  | { type: 'ping' }
  | { type: 'uptime' }
  | { type: 'toggle-disconnect-flag' }
  | { type: 'history' }
  | { type: 'shutdown' }
  | { type: 'restart' }
  | { type: 'help' };

export type RemoteCommandType = RemoteCommand['type'];

export type ParsedCommand = RemoteCommand | { type: 'unknown'; command: string };

export interface QueuedCommand {
  command: RemoteCommand;
  operatorId: string;
}

/** A per-operator mailbox the monitor drains; each command is handed out at most once. */
export interface RemoteCommandInbox {
  drain(): Promise<QueuedCommand[]>;
}
