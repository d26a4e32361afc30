import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { authenticate } from '../auth/gate';
import { MethodNotAllowedError } from '../errors';
import type { ServerContext } from '../contracts/context';
import type { Principal } from '../types';

// Order used for every Allow header
export const ROUTABLE_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'HEAD', 'OPTIONS', 'TRACE'] as const;
export type RoutableMethod = (typeof ROUTABLE_METHODS)[number];

// CONNECT never reaches the router; Node hands it to the server's 'connect' event
export const SERVER_METHODS = [...ROUTABLE_METHODS, 'CONNECT'] as const;
export type ServerMethod = (typeof SERVER_METHODS)[number];

export interface PublicHandlerArgs {
  request: FastifyRequest;
  reply: FastifyReply;
  ctx: ServerContext;
}

export interface ProtectedHandlerArgs extends PublicHandlerArgs {
  principal: Principal;
}

export type RouteEntry =
  | { method: RoutableMethod; url: string; auth: false; handler: (args: PublicHandlerArgs) => unknown }
  | { method: RoutableMethod; url: string; auth: true; handler: (args: ProtectedHandlerArgs) => unknown };

export function isRoutableMethod(method: string): method is RoutableMethod {
  return ROUTABLE_METHODS.some((m) => m === method);
}

/**
 * (method, path template) -> handler, built once at startup. The set of
 * methods per path is what 405 responses advertise in `Allow`.
 */
export class RouteTable {
  private readonly routes = new Map<string, Map<RoutableMethod, RouteEntry>>();

  open(method: RoutableMethod, url: string, handler: (args: PublicHandlerArgs) => unknown): this {
    return this.add({ method, url, auth: false, handler });
  }

  guarded(method: RoutableMethod, url: string, handler: (args: ProtectedHandlerArgs) => unknown): this {
    return this.add({ method, url, auth: true, handler });
  }

  add(entry: RouteEntry): this {
    let byMethod = this.routes.get(entry.url);
    if (!byMethod) {
      byMethod = new Map();
      this.routes.set(entry.url, byMethod);
    }
    if (byMethod.has(entry.method)) {
      throw new Error(`Route already registered: ${entry.method} ${entry.url}`);
    }
    byMethod.set(entry.method, entry);
    return this;
  }

  lookup(url: string, method: string): RouteEntry | undefined {
    if (!isRoutableMethod(method)) return undefined;
    return this.routes.get(url)?.get(method);
  }

  allowed(url: string): RoutableMethod[] {
    const byMethod = this.routes.get(url);
    if (!byMethod) return [];
    return ROUTABLE_METHODS.filter((m) => byMethod.has(m));
  }

  urls(): string[] {
    return [...this.routes.keys()];
  }
}

export function pathOf(url: string): string {
  const q = url.indexOf('?');
  return q === -1 ? url : url.slice(0, q);
}

/**
 * Registers one Fastify route per path covering every method Fastify parses
 * (WebDAV verbs included) and dispatches through the table: count the request,
 * answer 405 for methods the path lacks, run the auth gate for protected
 * entries, then call the handler.
 */
export function mountRouteTable(app: FastifyInstance, table: RouteTable, ctx: ServerContext) {
  for (const url of table.urls()) {
    app.all(url, async (request, reply) => {
      ctx.stats.record({
        method: request.method,
        route: url,
        path: pathOf(request.url),
        clientAddress: request.ip,
      });

      const entry = table.lookup(url, request.method);
      if (!entry) throw new MethodNotAllowedError(table.allowed(url), request.method);

      if (entry.auth) {
        const principal = authenticate(request.headers.authorization, ctx.sessions);
        return entry.handler({ request, reply, ctx, principal });
      }
      return entry.handler({ request, reply, ctx });
    });
  }
}
