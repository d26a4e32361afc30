import { userIdFor } from '../auth/sessionRegistry';
import { UnauthorizedError } from '../errors';
import type { RouteTable } from '../http/routeTable';
import { parseLoginBody } from '../schemas/payloads';

export const LOGIN_URL = '/api/login';
export const LOGOUT_URL = '/api/logout';

export function registerAuthRoutes(table: RouteTable) {
  // Login: single configured credential pair, tokens never expire
  table.open('POST', LOGIN_URL, async ({ request, reply, ctx }) => {
    const parsed = parseLoginBody(request.body);
    if (!parsed.ok) throw parsed.error;

    const { username, password } = parsed.value;
    const expected = ctx.config.credentials;
    if (username !== expected.username || password !== expected.password) {
      request.log.warn({ username }, 'login rejected');
      throw new UnauthorizedError('invalid_credentials', 'Invalid credentials');
    }

    const session = ctx.sessions.issue(userIdFor(username));
    request.log.info({ userId: session.user_id }, 'login succeeded');
    return reply.send({ token: session.token, user_id: session.user_id });
  });

  // Logout: revokes the token the request was authenticated with
  table.guarded('POST', LOGOUT_URL, async ({ request, reply, ctx, principal }) => {
    ctx.sessions.revoke(principal.token);
    request.log.info({ userId: principal.userId }, 'token revoked');
    return reply.code(204).send();
  });
}
