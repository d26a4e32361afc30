import type { SessionToken, UserId } from '../types';

/** Maps issued bearer tokens to the principal they were issued for. */
export interface SessionRegistry {
  issue(userId: UserId): SessionToken;
  /** Resolves the token's user id or throws `UnauthorizedError`. */
  validate(token: string | undefined): UserId;
  revoke(token: string): boolean;
  size(): number;
}
