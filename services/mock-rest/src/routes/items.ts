import { TRACE_CONTENT_TYPE, buildTraceMessage } from '../http/trace';
import type { RouteTable } from '../http/routeTable';
import { parseItemId } from '../schemas/payloads';

export const ITEMS_URL = '/api/items';
export const ITEM_URL = '/api/items/:id';

export function registerItemRoutes(table: RouteTable) {
  // ---------- Collection ----------
  table.guarded('GET', ITEMS_URL, async ({ reply, ctx }) => {
    return reply.send(await ctx.items.list());
  });

  table.guarded('POST', ITEMS_URL, async ({ request, reply, ctx }) => {
    const item = await ctx.items.create(request.body);
    request.log.debug({ itemId: item.id }, 'item created');
    return reply.code(201).send(item);
  });

  // Same lookup as GET, headers only; Content-Length is the size the body would have
  table.guarded('HEAD', ITEMS_URL, async ({ reply, ctx }) => {
    const items = await ctx.items.list();
    const body = JSON.stringify(items);
    return reply
      .header('Content-Type', 'application/json; charset=utf-8')
      .header('Content-Length', String(Buffer.byteLength(body, 'utf8')))
      .header('X-Total-Items', String(items.length))
      .header('X-Active-Tokens', String(ctx.sessions.size()))
      .send();
  });

  table.guarded('TRACE', ITEMS_URL, async ({ request, reply }) => {
    const message = buildTraceMessage({
      method: request.method,
      url: request.url,
      httpVersion: request.raw.httpVersion,
      headers: request.headers,
    });
    return reply.header('Content-Type', TRACE_CONTENT_TYPE).send(message);
  });

  // ---------- Single item ----------
  table.guarded('GET', ITEM_URL, async ({ request, reply, ctx }) => {
    return reply.send(await ctx.items.get(parseItemId(request.params)));
  });

  table.guarded('PUT', ITEM_URL, async ({ request, reply, ctx }) => {
    const id = parseItemId(request.params);
    return reply.send(await ctx.items.replace(id, request.body));
  });

  table.guarded('PATCH', ITEM_URL, async ({ request, reply, ctx }) => {
    const id = parseItemId(request.params);
    return reply.send(await ctx.items.patch(id, request.body));
  });

  table.guarded('DELETE', ITEM_URL, async ({ request, reply, ctx }) => {
    const id = parseItemId(request.params);
    await ctx.items.delete(id);
    request.log.debug({ itemId: id }, 'item deleted');
    return reply.code(204).send();
  });
}
