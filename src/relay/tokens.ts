import fs from 'fs';
import path from 'path';
import { nanoid } from 'nanoid';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { StorageError, toError } from '../utils/errors.js';

const log = logger.child({ component: 'tokens' });

const tokenFileSchema = z.record(z.string(), z.string());

/** Bearer token per user, persisted as a `{ userId: token }` JSON file. */
export class TokenStore {
  private tokens = new Map<string, string>();

  constructor(private readonly filePath: string) {
    this.load();
  }

  /** Returns the user's token, issuing and persisting one on first use. */
  issue(userId: string): string {
    const existing = this.tokens.get(userId);
    if (existing) return existing;

    const token = nanoid(32);
    this.tokens.set(userId, token);
    this.save();
    log.info({ userId }, 'Issued relay token');
    return token;
  }

  hasUser(userId: string): boolean {
    return this.tokens.has(userId);
  }

  verify(userId: string, token: string | null): boolean {
    return token !== null && this.tokens.get(userId) === token;
  }

  userForToken(token: string): string | null {
    for (const [userId, candidate] of this.tokens) {
      if (candidate === token) return userId;
    }
    return null;
  }

  private load(): void {
    if (!fs.existsSync(this.filePath)) return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch (err) {
      throw new StorageError('loadTokens', toError(err));
    }

    const result = tokenFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new StorageError('loadTokens', new Error(`${this.filePath} is not a user-to-token map`));
    }
    this.tokens = new Map(Object.entries(result.data));
    log.info({ count: this.tokens.size }, 'Loaded relay tokens');
  }

  private save(): void {
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(this.filePath, JSON.stringify(Object.fromEntries(this.tokens), null, 2));
    } catch (err) {
      throw new StorageError('saveTokens', toError(err));
    }
  }
}
