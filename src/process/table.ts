import psList from 'ps-list';
import pidusage from 'pidusage';
import { logger } from '../utils/logger.js';
import { ProcessTableError, toError } from '../utils/errors.js';
import type { ProcessInfo, ProcessTable } from './types.js';

const log = logger.child({ component: 'process-table' });

/** Process table backed by ps-list (enumeration) and pidusage (start times). */
export class SystemProcessTable implements ProcessTable {
  async list(): Promise<ProcessInfo[]> {
    try {
      const processes = await psList();
      return processes.map(p => ({ pid: p.pid, name: p.name, cmd: p.cmd }));
    } catch (err) {
      throw new ProcessTableError('list', toError(err));
    }
  }

  async creationTimes(pids: number[]): Promise<Map<number, number>> {
    const result = new Map<number, number>();
    if (pids.length === 0) return result;

    try {
      const stats = await pidusage(pids);
      for (const [pid, stat] of Object.entries(stats)) {
        if (stat) {
          result.set(Number(pid), stat.timestamp - stat.elapsed);
        }
      }
      return result;
    } catch (err) {
      // A single vanished pid fails the whole batch; fall back to one at a time.
      log.debug({ err, pids }, 'Bulk pidusage failed, retrying per process');
    }

    for (const pid of pids) {
      try {
        const stat = await pidusage(pid);
        result.set(pid, stat.timestamp - stat.elapsed);
      } catch (err) {
        log.debug({ err, pid }, 'Unable to read process start time');
      }
    }
    return result;
  }

  async kill(pid: number): Promise<void> {
    process.kill(pid, 'SIGKILL');
  }
}
