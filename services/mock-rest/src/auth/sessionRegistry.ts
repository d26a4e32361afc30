import { createHash, randomBytes } from 'crypto';
import { UnauthorizedError } from '../errors';
import type { SessionRegistry } from '../contracts/sessions';
import type { SessionToken, UserId } from '../types';

const TOKEN_BYTES = 32;
const TOKEN_PATTERN = /^[0-9a-f]{64}$/;

/** Stable principal id for a username, so repeated logins resolve to the same user. */
export function userIdFor(username: string): UserId {
  return `usr_${createHash('sha256').update(username).digest('hex').slice(0, 16)}`;
}

export class MemorySessionRegistry implements SessionRegistry {
  private readonly tokens = new Map<string, SessionToken>();

  constructor(private readonly now: () => number = Date.now) {}

  issue(userId: UserId): SessionToken {
    const session: SessionToken = {
      token: randomBytes(TOKEN_BYTES).toString('hex'),
      user_id: userId,
      issued_at: this.now(),
    };
    this.tokens.set(session.token, session);
    return { ...session };
  }

  validate(token: string | undefined): UserId {
    if (!token) {
      throw new UnauthorizedError('missing_credentials', 'Bearer token is required');
    }
    if (!TOKEN_PATTERN.test(token)) {
      throw new UnauthorizedError('invalid_token', 'Malformed bearer token');
    }
    const session = this.tokens.get(token);
    if (!session) {
      throw new UnauthorizedError('invalid_token', 'Invalid or revoked token');
    }
    return session.user_id;
  }

  revoke(token: string): boolean {
    return this.tokens.delete(token);
  }

  size(): number {
    return this.tokens.size;
  }
}
