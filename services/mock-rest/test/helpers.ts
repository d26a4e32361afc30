import { request as httpRequest, type IncomingHttpHeaders, type OutgoingHttpHeaders } from 'http';
import { loadConfig } from '../src/config';
import { buildApp, type BuildAppOptions } from '../src/server';

export type AppInstance = Awaited<ReturnType<typeof buildApp>>;

export const ADMIN = { username: 'admin', password: 'password' };

/** Builds an app on default config, ignoring whatever the local environment sets. */
export function buildTestApp(options: BuildAppOptions = {}): Promise<AppInstance> {
  return buildApp({ ...options, config: { ...loadConfig({}), ...options.config } });
}

export async function loginToken(app: AppInstance): Promise<string> {
  const res = await app.inject({ method: 'POST', url: '/api/login', payload: ADMIN });
  return res.json<{ token: string }>().token;
}

export const bearer = (token: string) => ({ authorization: `Bearer ${token}` });

/** Clock that only moves when told to. */
export function manualClock(start = 1_700_000_000_000) {
  let t = start;
  return {
    now: () => t,
    advance(ms: number) {
      t += ms;
    },
  };
}

export function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected function to throw');
}

/** Starts the app on an ephemeral loopback port and returns the port. */
export async function listenLocal(app: AppInstance): Promise<number> {
  await app.listen({ port: 0, host: '127.0.0.1' });
  const address = app.server.address();
  if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
  return address.port;
}

export interface RawResponse {
  statusCode: number;
  headers: IncomingHttpHeaders;
  body: string;
}

/**
 * Sends one request over a real socket, for methods `inject` does not accept
 * (TRACE, WebDAV verbs) and for CONNECT, which Node answers on its own event.
 */
export function sendRaw(
  port: number,
  method: string,
  path: string,
  headers: OutgoingHttpHeaders = {},
): Promise<RawResponse> {
  return new Promise((resolve, reject) => {
    const collect = (statusCode: number | undefined, resHeaders: IncomingHttpHeaders, first?: Buffer) => {
      const chunks: Buffer[] = first ? [first] : [];
      return {
        push: (chunk: Buffer) => chunks.push(chunk),
        done: () =>
          resolve({ statusCode: statusCode ?? 0, headers: resHeaders, body: Buffer.concat(chunks).toString('utf8') }),
      };
    };

    const req = httpRequest({ host: '127.0.0.1', port, method, path, headers, agent: false }, (res) => {
      const body = collect(res.statusCode, res.headers);
      res.on('data', body.push);
      res.on('end', body.done);
      res.on('error', reject);
    });

    // CONNECT answers arrive here; the body is whatever follows the head on the socket
    req.on('connect', (res, socket, head) => {
      const body = collect(res.statusCode, res.headers, head);
      socket.on('data', body.push);
      socket.on('end', body.done);
      socket.on('error', reject);
    });

    req.on('error', reject);
    req.end();
  });
}
