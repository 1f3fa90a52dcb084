import { logger } from '../utils/logger.js';
import { UnauthorizedError } from '../utils/errors.js';

const log = logger.child({ component: 'auth' });

export class AuthService {
  private allowedUsers: Set<string>;
  private allowAll: boolean;

  constructor(allowedUserIds: string[], options: { allowAll?: boolean } = {}) {
    this.allowedUsers = new Set(allowedUserIds);
    this.allowAll = options.allowAll ?? false;

    log.info({
      allowedCount: this.allowedUsers.size,
      allowAll: this.allowAll,
    }, 'Auth service initialized');
  }

  isAllowed(userId: string): boolean {
    if (this.allowAll) {
      return true;
    }

    const allowed = this.allowedUsers.has(userId);

    if (!allowed) {
      log.debug({ userId }, 'User not authorized');
    }

    return allowed;
  }

  assertAllowed(userId: string): void {
    if (!this.isAllowed(userId)) {
      throw new UnauthorizedError(userId);
    }
  }
}
