import fs from 'fs';
import path from 'path';
import type { FileHandle } from 'fs/promises';
import { logger } from '../utils/logger.js';
import { LogDirectoryMissingError } from '../utils/errors.js';
import { sleep } from '../utils/time.js';

const log = logger.child({ component: 'log-tailer' });

const NEWLINE = 0x0a;
const MAX_CHUNK_BYTES = 1024 * 1024;

export interface LogTailerOptions {
  dir: string;
  extension?: string;
  /** Sleep between reads when no new line is available. */
  pollIntervalMs?: number;
  /** Sleep between directory scans while waiting for a new file. */
  discoveryIntervalMs?: number;
}

export interface LogFileEntry {
  path: string;
  createdMs: number;
}

/**
 * Position in one log file. `offset` always sits at the start of a line:
 * a trailing partial line is left unread until its newline arrives.
 */
interface LogCursor {
  path: string;
  handle: FileHandle;
  offset: number;
  /** Files present in the directory when this cursor was opened. */
  knownFiles: Set<string>;
  pending: string[];
  /** Opened mid-line; the first completed line is a fragment. */
  skipFragment: boolean;
}

export class LogTailer {
  private cursor: LogCursor | null = null;
  private readonly decoder = new TextDecoder('utf-8');
  private readonly extension: string;
  private readonly pollIntervalMs: number;
  private readonly discoveryIntervalMs: number;

  constructor(private readonly options: LogTailerOptions) {
    this.extension = options.extension ?? '.log';
    this.pollIntervalMs = options.pollIntervalMs ?? 1000;
    this.discoveryIntervalMs = options.discoveryIntervalMs ?? 500;
  }

  get dir(): string {
    return this.options.dir;
  }

  get currentFile(): string | null {
    return this.cursor?.path ?? null;
  }

  assertDirectory(): void {
    if (!fs.existsSync(this.options.dir) || !fs.statSync(this.options.dir).isDirectory()) {
      throw new LogDirectoryMissingError(this.options.dir);
    }
  }

  async listFiles(): Promise<LogFileEntry[]> {
    const entries = await fs.promises.readdir(this.options.dir);
    const files: LogFileEntry[] = [];

    for (const entry of entries) {
      if (!entry.endsWith(this.extension)) continue;
      const fullPath = path.join(this.options.dir, entry);
      try {
        const stat = await fs.promises.stat(fullPath);
        if (!stat.isFile()) continue;
        files.push({ path: fullPath, createdMs: stat.birthtimeMs || stat.ctimeMs });
      } catch {
        // Removed between readdir and stat.
        continue;
      }
    }

    return files;
  }

  async snapshot(): Promise<Set<string>> {
    return new Set((await this.listFiles()).map(f => f.path));
  }

  async findLatest(): Promise<string | null> {
    return newest(await this.listFiles());
  }

  /**
   * Polls until a file that is not in `existing` shows up and returns the
   * newest such file, or null once `signal` aborts.
   */
  async findLatestNew(existing: Set<string>, signal?: AbortSignal): Promise<string | null> {
    while (!signal?.aborted) {
      try {
        const fresh = (await this.listFiles()).filter(f => !existing.has(f.path));
        const latest = newest(fresh);
        if (latest) {
          log.info({ file: path.basename(latest) }, 'New log file detected');
          return latest;
        }
      } catch (err) {
        log.warn({ err, dir: this.options.dir }, 'Failed to scan log directory');
      }
      await sleep(this.discoveryIntervalMs, signal);
    }
    return null;
  }

  /** Opens `filePath` at its current end; only lines appended afterwards are read. */
  async openAtEnd(filePath: string): Promise<void> {
    await this.open(filePath, 'end');
  }

  async openAtStart(filePath: string): Promise<void> {
    await this.open(filePath, 'start');
  }

  /**
   * Returns the next complete line, or null after one idle poll. While idle
   * it also looks for a newer log file and switches to it.
   */
  async readLine(signal?: AbortSignal): Promise<string | null> {
    const cursor = this.requireCursor();

    const queued = cursor.pending.shift();
    if (queued !== undefined) return queued;

    if (await this.fill(cursor)) {
      return cursor.pending.shift() ?? null;
    }

    await sleep(this.pollIntervalMs, signal);
    if (signal?.aborted) return null;

    await this.switchToNewerFile();
    const current = this.requireCursor();
    if (current.pending.length === 0) {
      await this.fill(current);
    }
    return current.pending.shift() ?? null;
  }

  async close(): Promise<void> {
    if (!this.cursor) return;
    const { handle, path: filePath } = this.cursor;
    this.cursor = null;
    try {
      await handle.close();
    } catch (err) {
      log.debug({ err, file: filePath }, 'Failed to close log file');
    }
  }

  private async open(filePath: string, position: 'start' | 'end'): Promise<void> {
    const carried = this.cursor?.pending ?? [];
    await this.close();

    const handle = await fs.promises.open(filePath, 'r');
    const { size } = await handle.stat();
    let skipFragment = false;

    if (position === 'end' && size > 0) {
      const last = Buffer.alloc(1);
      await handle.read(last, 0, 1, size - 1);
      skipFragment = last[0] !== NEWLINE;
    }

    let knownFiles = new Set<string>([filePath]);
    try {
      knownFiles = await this.snapshot();
      knownFiles.add(filePath);
    } catch (err) {
      log.warn({ err }, 'Failed to snapshot log directory');
    }

    this.cursor = {
      path: filePath,
      handle,
      offset: position === 'end' ? size : 0,
      knownFiles,
      pending: carried,
      skipFragment,
    };

    log.info({ file: path.basename(filePath), position }, 'Tailing log file');
  }

  /** Reads every complete line past the cursor into `pending`. */
  private async fill(cursor: LogCursor): Promise<boolean> {
    try {
      const { size } = await cursor.handle.stat();

      if (size < cursor.offset) {
        log.warn({ file: path.basename(cursor.path), size, offset: cursor.offset }, 'Log file truncated, restarting from the beginning');
        cursor.offset = 0;
        cursor.skipFragment = false;
      }
      if (size === cursor.offset) return false;

      const length = Math.min(size - cursor.offset, MAX_CHUNK_BYTES);
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await cursor.handle.read(buffer, 0, length, cursor.offset);
      const data = buffer.subarray(0, bytesRead);

      let end = data.lastIndexOf(NEWLINE);
      if (end === -1) {
        if (bytesRead < MAX_CHUNK_BYTES) return false;
        // A single line larger than one chunk; hand it over in pieces.
        end = bytesRead - 1;
      }

      const complete = data.subarray(0, end + 1);
      cursor.offset += complete.length;

      const lines = this.decoder.decode(complete).split('\n');
      lines.pop();

      let added = 0;
      for (const raw of lines) {
        if (cursor.skipFragment) {
          cursor.skipFragment = false;
          continue;
        }
        const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
        if (line.length === 0) continue;
        cursor.pending.push(line);
        added++;
      }
      return added > 0;
    } catch (err) {
      log.warn({ err, file: path.basename(cursor.path) }, 'Failed to read log file');
      return false;
    }
  }

  /**
   * Moves to the newest file that appeared after the current cursor was
   * opened. The old file is drained first and the new one is read from its
   * start, so nothing is lost or repeated at the boundary.
   */
  private async switchToNewerFile(): Promise<void> {
    const cursor = this.requireCursor();

    let files: LogFileEntry[];
    try {
      files = await this.listFiles();
    } catch (err) {
      log.warn({ err, dir: this.options.dir }, 'Failed to scan log directory');
      return;
    }

    const latest = newest(files.filter(f => !cursor.knownFiles.has(f.path)));
    if (!latest) return;

    await this.fill(cursor);
    log.info({ from: path.basename(cursor.path), to: path.basename(latest) }, 'Detected new log file, switching');
    await this.openAtStart(latest);
  }

  private requireCursor(): LogCursor {
    if (!this.cursor) {
      throw new Error('LogTailer has no open file');
    }
    return this.cursor;
  }
}

function newest(files: LogFileEntry[]): string | null {
  let best: LogFileEntry | null = null;
  for (const file of files) {
    if (!best || file.createdMs > best.createdMs) {
      best = file;
    }
  }
  return best?.path ?? null;
}
