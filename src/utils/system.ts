import os from 'os';
import path from 'path';
import { logger } from './logger.js';
import type { ProcessInfo, ProcessTable } from '../process/types.js';

const log = logger.child({ component: 'system' });

/**
 * Finds another process whose command line references `script`. The current
 * process and its parent (a loader such as tsx re-executing us) are skipped.
 */
export async function findOtherInstance(
  table: ProcessTable,
  script: string,
  self: { pid: number; ppid: number } = { pid: process.pid, ppid: process.ppid }
): Promise<ProcessInfo | null> {
  const target = path.resolve(script);
  const processes = await table.list();

  for (const proc of processes) {
    if (proc.pid === self.pid || proc.pid === self.ppid) continue;
    if (!proc.cmd) continue;

    const args = proc.cmd.split(/\s+/).filter(Boolean);
    if (args.some(arg => arg === script || (path.isAbsolute(arg) && path.resolve(arg) === target))) {
      log.debug({ pid: proc.pid, cmd: proc.cmd }, 'Found another monitor instance');
      return proc;
    }
  }

  return null;
}

export function osUptimeMs(): number {
  return os.uptime() * 1000;
}
