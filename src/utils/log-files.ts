import fs from 'fs';
import path from 'path';

const LOG_FILE_PREFIX = 'monitor_';
const LOG_FILE_SUFFIX = '.log';

function fileTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

export interface RotatingFileOptions {
  dir: string;
  maxBytes: number;
  now?: () => Date;
}

/**
 * Append-only pino destination. Once the current file would grow past
 * `maxBytes` it is renamed to `<name>_rotated_<epoch>.log` and a fresh
 * file is started.
 */
export class RotatingFileStream {
  private fd: number | null = null;
  private size = 0;
  private currentPath: string;
  private readonly now: () => Date;

  constructor(private readonly options: RotatingFileOptions) {
    this.now = options.now ?? (() => new Date());
    fs.mkdirSync(options.dir, { recursive: true });
    this.currentPath = this.freshPath();
  }

  get path(): string {
    return this.currentPath;
  }

  write(chunk: string): void {
    const bytes = Buffer.byteLength(chunk);
    if (this.fd !== null && this.size > 0 && this.size + bytes > this.options.maxBytes) {
      this.rotate();
    }
    if (this.fd === null) {
      this.open();
    }
    if (this.fd === null) return;
    fs.writeSync(this.fd, chunk);
    this.size += bytes;
  }

  close(): void {
    if (this.fd !== null) {
      fs.closeSync(this.fd);
      this.fd = null;
    }
  }

  private open(): void {
    this.fd = fs.openSync(this.currentPath, 'a');
    this.size = fs.fstatSync(this.fd).size;
  }

  private rotate(): void {
    this.close();
    const base = this.currentPath.slice(0, -LOG_FILE_SUFFIX.length);
    const rotated = `${base}_rotated_${Math.floor(this.now().getTime() / 1000)}${LOG_FILE_SUFFIX}`;
    fs.renameSync(this.currentPath, rotated);
    this.currentPath = this.freshPath();
    this.open();
    const notice = `${JSON.stringify({ level: 30, time: this.now().getTime(), msg: `Log rotated -> ${path.basename(rotated)}` })}\n`;
    if (this.fd !== null) {
      fs.writeSync(this.fd, notice);
      this.size += Buffer.byteLength(notice);
    }
  }

  private freshPath(): string {
    return path.join(this.options.dir, `${LOG_FILE_PREFIX}${fileTimestamp(this.now())}${LOG_FILE_SUFFIX}`);
  }
}

/**
 * Deletes monitor log files last modified more than `retentionDays` ago.
 * A retention of 0 keeps everything.
 */
export function cleanupOldLogs(dir: string, retentionDays: number, now: number = Date.now()): number {
  if (retentionDays === 0 || !fs.existsSync(dir)) {
    return 0;
  }

  const cutoff = now - retentionDays * 86_400_000;
  let deleted = 0;

  for (const entry of fs.readdirSync(dir)) {
    if (!entry.startsWith(LOG_FILE_PREFIX) || !entry.endsWith(LOG_FILE_SUFFIX)) continue;
    const fullPath = path.join(dir, entry);
    if (fs.statSync(fullPath).mtimeMs < cutoff) {
      fs.rmSync(fullPath);
      deleted++;
    }
  }

  return deleted;
}
