import fs from 'fs';
import path from 'path';
import { execFile } from 'child_process';
import { promisify } from 'util';
import { logger } from '../utils/logger.js';

const log = logger.child({ component: 'git-update' });

const execFileAsync = promisify(execFile);

const GIT_TIMEOUT_MS = 60_000;

/** Walks up from `start` to the directory holding `.git`. */
export function findGitRoot(start: string): string | null {
  let dir = path.resolve(start);
  for (;;) {
    if (fs.existsSync(path.join(dir, '.git'))) {
      return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

async function git(root: string, args: string[]): Promise<string> {
  const { stdout } = await execFileAsync('git', args, { cwd: root, timeout: GIT_TIMEOUT_MS });
  return stdout.trim();
}

/**
 * Fetches `branch` (the current branch when omitted) and fast-forwards when
 * the remote is ahead. Returns true when new commits were pulled.
 */
export async function gitFetchAndPull(root: string, branch?: string): Promise<boolean> {
  const target = branch ?? await git(root, ['rev-parse', '--abbrev-ref', 'HEAD']);

  await git(root, ['fetch', 'origin', target]);

  const local = await git(root, ['rev-parse', 'HEAD']);
  const remote = await git(root, ['rev-parse', `origin/${target}`]);
  if (local === remote) {
    log.debug({ branch: target, commit: local }, 'Repository is up to date');
    return false;
  }

  const ahead = await git(root, ['rev-list', '--count', `HEAD..origin/${target}`]);
  if (ahead === '0') {
    log.debug({ branch: target }, 'Local branch has unpushed commits, not pulling');
    return false;
  }

  log.info({ branch: target, from: local.slice(0, 7), to: remote.slice(0, 7) }, 'Pulling updates');
  await git(root, ['pull', '--ff-only', 'origin', target]);
  return true;
}
