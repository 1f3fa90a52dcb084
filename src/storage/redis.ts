import { Redis } from 'ioredis';
import { logger } from '../utils/logger.js';
import { StorageError, toError } from '../utils/errors.js';
import { queuedActionSchema, statusReportSchema, type QueuedAction, type StatusReport } from '../relay/protocol.js';
import type { CommandQueueStore } from '../relay/queue.js';

const log = logger.child({ component: 'redis' });

const STATUS_TTL_SECONDS = 60;

let redisClient: Redis | null = null;

export async function getRedisClient(url: string): Promise<Redis> {
  if (redisClient) return redisClient;

  redisClient = new Redis(url, {
    maxRetriesPerRequest: 3,
    lazyConnect: true,
  });

  redisClient.on('error', (err: Error) => {
    log.error({ err }, 'Redis connection error');
  });

  redisClient.on('connect', () => {
    log.info('Connected to Redis');
  });

  redisClient.on('reconnecting', () => {
    log.warn('Reconnecting to Redis');
  });

  await redisClient.connect();
  return redisClient;
}

export async function closeRedis(): Promise<void> {
  if (redisClient) {
    await redisClient.quit();
    redisClient = null;
    log.info('Redis connection closed');
  }
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

export class RedisCommandQueue implements CommandQueueStore {
  constructor(private redis: Redis) {}

  private commandsKey(userId: string): string {
    return `relay:commands:${userId}`;
  }

  private statusKey(userId: string): string {
    return `relay:status:${userId}`;
  }

  async push(userId: string, action: QueuedAction): Promise<void> {
    try {
      await this.redis.rpush(this.commandsKey(userId), JSON.stringify(action));
    } catch (err) {
      throw new StorageError('push', toError(err));
    }
  }

  async drain(userId: string): Promise<QueuedAction[]> {
    let raw: string[];
    try {
      const results = await this.redis.multi()
        .lrange(this.commandsKey(userId), 0, -1)
        .del(this.commandsKey(userId))
        .exec();
      const entries = results?.[0]?.[1];
      raw = Array.isArray(entries) ? entries.filter((e): e is string => typeof e === 'string') : [];
    } catch (err) {
      throw new StorageError('drain', toError(err));
    }

    const actions: QueuedAction[] = [];
    for (const entry of raw) {
      const parsed = queuedActionSchema.safeParse(parseJson(entry));
      if (parsed.success) {
        actions.push(parsed.data);
      } else {
        log.warn({ userId, entry }, 'Dropping malformed queued command');
      }
    }
    return actions;
  }

  async setStatus(userId: string, report: StatusReport): Promise<void> {
    try {
      await this.redis.set(this.statusKey(userId), JSON.stringify(report), 'EX', STATUS_TTL_SECONDS);
    } catch (err) {
      throw new StorageError('setStatus', toError(err));
    }
  }

  async takeStatus(userId: string): Promise<StatusReport | null> {
    let raw: unknown;
    try {
      const results = await this.redis.multi()
        .get(this.statusKey(userId))
        .del(this.statusKey(userId))
        .exec();
      raw = results?.[0]?.[1];
    } catch (err) {
      throw new StorageError('takeStatus', toError(err));
    }

    if (typeof raw !== 'string') return null;
    const parsed = statusReportSchema.safeParse(parseJson(raw));
    return parsed.success ? parsed.data : null;
  }
}
