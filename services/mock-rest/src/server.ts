import type { IncomingMessage } from 'http';
import type { Duplex } from 'stream';
import Fastify, { type FastifyReply, type FastifyServerOptions } from 'fastify';
import { MemorySessionRegistry } from './auth/sessionRegistry';
import { config, type ServerConfig } from './config';
import type { ServerContext } from './contracts/context';
import { NotFoundError, ValidationError, internalErrorBody, sendApiError, toApiError } from './errors';
import { handleConnect } from './http/connect';
import { corsHeaders, registerCors } from './http/cors';
import { mountRouteTable, pathOf } from './http/routeTable';
import { buildRouteTable } from './routes';
import { RequestStats, UNMATCHED_ROUTE } from './stats/requestStats';
import { MemoryItemStore } from './storage/memoryItemStore';

declare module 'fastify' {
  interface FastifyInstance {
    serverContext: ServerContext;
  }
}

export interface BuildAppOptions {
  logger?: FastifyServerOptions['logger'];
  config?: Partial<ServerConfig>;
  context?: Partial<Pick<ServerContext, 'items' | 'sessions' | 'now'>>;
}

export function createServerContext(
  cfg: ServerConfig,
  overrides: BuildAppOptions['context'] = {},
): ServerContext {
  const now = overrides.now ?? Date.now;
  return {
    config: cfg,
    items: overrides.items ?? new MemoryItemStore(now),
    sessions: overrides.sessions ?? new MemorySessionRegistry(now),
    stats: new RequestStats(now),
    startedAt: now(),
    now,
  };
}

export async function buildApp(options: BuildAppOptions = {}) {
  const cfg: ServerConfig = { ...config, ...options.config };
  const ctx = createServerContext(cfg, options.context);

  const app = Fastify({
    logger: options.logger ?? false,
    bodyLimit: cfg.bodyLimitBytes,
    exposeHeadRoutes: false,
    // Raised before routing and hooks, e.g. undecodable percent-escapes in the path
    frameworkErrors: (err, request, reply: FastifyReply) => {
      ctx.stats.record({
        method: request.method,
        route: UNMATCHED_ROUTE,
        path: pathOf(request.url),
        clientAddress: request.ip,
      });
      reply.headers(corsHeaders());
      if (err.code === 'FST_ERR_BAD_URL') {
        sendApiError(reply, new ValidationError(`'${pathOf(request.url)}' is not a valid URL`, 'invalid_url'));
        return;
      }
      request.log.error({ err }, 'Framework error before routing');
      reply.code(500).send(internalErrorBody(err, cfg.debug));
    },
  });
  app.decorate('serverContext', ctx);

  registerCors(app);

  app.setErrorHandler((err, request, reply) => {
    const apiError = toApiError(err);
    if (apiError) return sendApiError(reply, apiError);

    request.log.error({ err }, 'Unhandled error while serving request');
    return reply.code(500).send(internalErrorBody(err, cfg.debug));
  });

  app.setNotFoundHandler((request, reply) => {
    ctx.stats.record({
      method: request.method,
      route: UNMATCHED_ROUTE,
      path: pathOf(request.url),
      clientAddress: request.ip,
    });
    return sendApiError(reply, new NotFoundError('Endpoint not found'));
  });

  mountRouteTable(app, buildRouteTable(), ctx);

  // CONNECT bypasses the router entirely
  app.server.on('connect', (req: IncomingMessage, socket: Duplex) => {
    socket.on('error', (err) => app.log.debug({ err }, 'CONNECT socket error'));
    handleConnect(ctx, req, socket, app.log);
  });

  return app;
}
