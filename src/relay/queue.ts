import type { QueuedAction, StatusReport } from './protocol.js';

/** Per-user command queue and the latest status report, as seen by the relay server. */
export interface CommandQueueStore {
  push(userId: string, action: QueuedAction): Promise<void>;
  /** Returns and removes everything queued for `userId`. */
  drain(userId: string): Promise<QueuedAction[]>;
  setStatus(userId: string, report: StatusReport): Promise<void>;
  /** Returns and removes the latest status report, if any. */
  takeStatus(userId: string): Promise<StatusReport | null>;
}

export class MemoryCommandQueue implements CommandQueueStore {
  private readonly queues = new Map<string, QueuedAction[]>();
  private readonly statuses = new Map<string, StatusReport>();

  async push(userId: string, action: QueuedAction): Promise<void> {
    const queue = this.queues.get(userId) ?? [];
    queue.push(action);
    this.queues.set(userId, queue);
  }

  async drain(userId: string): Promise<QueuedAction[]> {
    const queue = this.queues.get(userId) ?? [];
    this.queues.delete(userId);
    return queue;
  }

  async setStatus(userId: string, report: StatusReport): Promise<void> {
    this.statuses.set(userId, report);
  }

  async takeStatus(userId: string): Promise<StatusReport | null> {
    const report = this.statuses.get(userId) ?? null;
    this.statuses.delete(userId);
    return report;
  }
}
