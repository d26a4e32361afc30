import { UnauthorizedError } from '../errors';
import type { SessionRegistry } from '../contracts/sessions';
import type { Principal } from '../types';

const BEARER = /^Bearer\s+(\S+)$/i;

/**
 * Resolves the principal behind an `Authorization: Bearer <token>` header.
 * Every rejection is a 401; the code says which check failed.
 */
export function authenticate(header: string | undefined, sessions: SessionRegistry): Principal {
  const value = header?.trim();
  if (!value) {
    throw new UnauthorizedError('missing_credentials', 'Authorization header is required');
  }

  const match = BEARER.exec(value);
  if (!match) {
    throw new UnauthorizedError('invalid_auth_scheme', 'Authorization header must use the Bearer scheme');
  }

  const token = match[1];
  return { userId: sessions.validate(token), token };
}
