import type { RouteTable } from '../http/routeTable';

export const DEBUG_VARS_URL = '/debug/vars';
const RECENT_REQUESTS = 5;

export function registerDebugRoutes(table: RouteTable) {
  table.guarded('GET', DEBUG_VARS_URL, async ({ reply, ctx }) => {
    return reply.send({
      requests: ctx.stats.snapshot(),
      uptime_seconds: Math.max(0, (ctx.now() - ctx.startedAt) / 1000),
      active_tokens: ctx.sessions.size(),
      items_count: await ctx.items.count(),
      recent_requests: ctx.stats.recent(RECENT_REQUESTS),
    });
  });
}
