import type { FastifyInstance } from 'fastify';
import { SERVER_METHODS } from './routeTable';

export const CORS_ALLOW_HEADERS = 'Content-Type, Authorization, X-Requested-With';
export const CORS_EXPOSE_HEADERS = 'Allow, X-Total-Items, X-Active-Tokens';

// Sent on every response, errors and 404s included
export function corsHeaders(): Record<string, string> {
  return {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': SERVER_METHODS.join(', '),
    'Access-Control-Allow-Headers': CORS_ALLOW_HEADERS,
    'Access-Control-Expose-Headers': CORS_EXPOSE_HEADERS,
  };
}

export function registerCors(app: FastifyInstance) {
  app.addHook('onRequest', async (_req, reply) => {
    reply.headers(corsHeaders());
  });
}
