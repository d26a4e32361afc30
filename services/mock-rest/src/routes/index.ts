import { RouteTable } from '../http/routeTable';
import { registerAuthRoutes } from './auth';
import { registerDebugRoutes } from './debug';
import { registerDiscoveryRoutes } from './discovery';
import { registerItemRoutes } from './items';

export function buildRouteTable(): RouteTable {
  const table = new RouteTable();
  registerAuthRoutes(table);
  registerItemRoutes(table);
  registerDebugRoutes(table);
  registerDiscoveryRoutes(table); // last: covers every path above
  return table;
}
