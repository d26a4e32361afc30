import { SERVER_METHODS, type RouteTable } from '../http/routeTable';

export const API_VERSION = '1.0';

const displayPath = (url: string) => url.replace(/:(\w+)/g, '{$1}');

/**
 * Adds an unauthenticated OPTIONS answer to every path already in the table,
 * so it must be registered after all other routes.
 */
export function registerDiscoveryRoutes(table: RouteTable) {
  const urls = table.urls();
  const endpoints = urls.map(displayPath);

  for (const url of urls) {
    table.open('OPTIONS', url, async ({ reply }) => {
      return reply
        .header('Allow', SERVER_METHODS.join(', '))
        .header('X-API-Version', API_VERSION)
        .send({
          available_endpoints: endpoints,
          supported_methods: [...SERVER_METHODS],
          resource_methods: table.allowed(url),
        });
    });
  }
}
