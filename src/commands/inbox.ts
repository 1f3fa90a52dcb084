import type { QueuedCommand, RemoteCommand, RemoteCommandInbox } from './types.js';

/** In-process mailbox filled by the chat bot and drained by the monitor. */
export class MemoryCommandInbox implements RemoteCommandInbox {
  private readonly queues = new Map<string, RemoteCommand[]>();

  enqueue(operatorId: string, command: RemoteCommand): void {
    const queue = this.queues.get(operatorId) ?? [];
    queue.push(command);
    this.queues.set(operatorId, queue);
  }

  async drain(): Promise<QueuedCommand[]> {
    const drained: QueuedCommand[] = [];
    for (const [operatorId, queue] of this.queues) {
      for (const command of queue) {
        drained.push({ operatorId, command });
      }
    }
    this.queues.clear();
    return drained;
  }
}
