import { STATUS_CODES, type IncomingHttpHeaders } from 'http';
import type { FastifyBaseLogger } from 'fastify';
import { authenticate } from '../auth/gate';
import { ApiError, MethodNotAllowedError, ValidationError, internalErrorBody } from '../errors';
import type { ServerContext } from '../contracts/context';
import { corsHeaders } from './cors';
import { ROUTABLE_METHODS } from './routeTable';

export interface ConnectRequest {
  url?: string;
  httpVersion: string;
  headers: IncomingHttpHeaders;
  socket?: { remoteAddress?: string };
}

export interface ConnectSocket {
  end(chunk: string): void;
}

export interface ConnectResult {
  statusCode: number;
  headers: Record<string, string>;
  body: unknown;
}

export const CONNECT_ROUTE = '*';
const ACK_PORT_SUFFIX = ':443';

/**
 * Decides the answer to a CONNECT request. No tunnel is ever opened: the
 * `acknowledge` policy answers 200 for port 443 targets, `reject` answers 405.
 * Both require a valid bearer token first.
 */
export function resolveConnect(ctx: ServerContext, req: ConnectRequest): ConnectResult {
  const target = req.url ?? '';
  ctx.stats.record({
    method: 'CONNECT',
    route: CONNECT_ROUTE,
    path: target,
    clientAddress: req.socket?.remoteAddress,
  });

  try {
    authenticate(req.headers.authorization, ctx.sessions);

    if (ctx.config.connectPolicy === 'reject') {
      throw new MethodNotAllowedError(ROUTABLE_METHODS, 'CONNECT');
    }
    if (!target.endsWith(ACK_PORT_SUFFIX)) {
      throw new ValidationError(
        `CONNECT is only acknowledged for port 443 targets, got "${target}"`,
        'unsupported_connect_target',
      );
    }
    return {
      statusCode: 200,
      headers: {},
      body: {
        message: 'CONNECT acknowledged; this server does not open tunnels',
        endpoint: target,
        status: 'not_tunneled',
      },
    };
  } catch (err) {
    if (err instanceof ApiError) {
      return { statusCode: err.statusCode, headers: err.headers, body: err.toBody() };
    }
    throw err;
  }
}

export function serializeConnectResponse(result: ConnectResult, httpVersion = '1.1'): string {
  const body = JSON.stringify(result.body);
  const headers: Record<string, string> = {
    ...corsHeaders(),
    ...result.headers,
    'Content-Type': 'application/json; charset=utf-8',
    'Content-Length': String(Buffer.byteLength(body, 'utf8')),
    Connection: 'close',
  };
  const statusLine = `HTTP/${httpVersion} ${result.statusCode} ${STATUS_CODES[result.statusCode] ?? ''}`.trimEnd();
  const headerLines = Object.entries(headers).map(([name, value]) => `${name}: ${value}`);
  return `${[statusLine, ...headerLines].join('\r\n')}\r\n\r\n${body}`;
}

/** Writes the CONNECT answer and closes the connection. */
export function handleConnect(
  ctx: ServerContext,
  req: ConnectRequest,
  socket: ConnectSocket,
  log: Pick<FastifyBaseLogger, 'info' | 'error'>,
) {
  let result: ConnectResult;
  try {
    result = resolveConnect(ctx, req);
  } catch (err) {
    log.error({ err }, 'CONNECT handling failed');
    result = { statusCode: 500, headers: {}, body: internalErrorBody(err, ctx.config.debug) };
  }
  log.info({ target: req.url, statusCode: result.statusCode }, 'CONNECT answered without tunneling');
  socket.end(serializeConnectResponse(result, req.httpVersion));
}
