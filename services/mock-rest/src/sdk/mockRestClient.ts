import { z } from 'zod';
import type { Item, ItemFields, ItemId, ItemPatch } from '../types';

const DEFAULT_BASE_URL = 'http://localhost:8000';

type FetchImpl = typeof fetch;

export interface MockRestClientOptions {
  baseUrl?: string;
  token?: string;
  fetch?: FetchImpl;
}

// ---------- Response schemas ----------
const itemSchema = z.object({
  id: z.number().int().positive(),
  name: z.string(),
  description: z.string().optional(),
  price: z.number(),
  metadata: z.record(z.unknown()).optional(),
  created_at: z.number(),
  updated_at: z.number(),
});

const loginResponseSchema = z.object({
  token: z.string(),
  user_id: z.string(),
});

const debugVarsSchema = z.object({
  requests: z.record(z.number()),
  uptime_seconds: z.number(),
  active_tokens: z.number(),
  items_count: z.number(),
  recent_requests: z.array(
    z.object({
      timestamp: z.number(),
      method: z.string(),
      path: z.string(),
      client_address: z.string().optional(),
    }),
  ),
});

const errorResponseSchema = z.object({
  error: z.object({ code: z.string(), message: z.string() }),
});

export type LoginResponse = z.infer<typeof loginResponseSchema>;
export type DebugVars = z.infer<typeof debugVarsSchema>;

export class MockRestClientError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = 'MockRestClientError';
  }
}

/**
 * Typed client for the mock REST server, meant for test harnesses.
 * `login()` keeps the issued token and sends it on every later call.
 */
export function createMockRestClient(options: MockRestClientOptions = {}) {
  const baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
  const fetchImpl: FetchImpl = options.fetch ?? globalThis.fetch;
  let token = options.token;

  async function send(method: string, path: string, body?: unknown): Promise<Response> {
    const headers: Record<string, string> = {};
    if (token) headers.authorization = `Bearer ${token}`;
    if (body !== undefined) headers['content-type'] = 'application/json';

    const res = await fetchImpl(`${baseUrl}${path}`, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    if (!res.ok) throw await toClientError(res);
    return res;
  }

  async function sendForItem(method: string, path: string, body?: unknown): Promise<Item> {
    const res = await send(method, path, body);
    return itemSchema.parse(await res.json());
  }

  return {
    get token() {
      return token;
    },

    async login(username: string, password: string): Promise<LoginResponse> {
      const res = await send('POST', '/api/login', { username, password });
      const session = loginResponseSchema.parse(await res.json());
      token = session.token;
      return session;
    },

    async logout(): Promise<void> {
      await send('POST', '/api/logout');
      token = undefined;
    },

    async listItems(): Promise<Item[]> {
      const res = await send('GET', '/api/items');
      return z.array(itemSchema).parse(await res.json());
    },

    /** Item count from the HEAD response headers, without transferring the list. */
    async countItems(): Promise<number> {
      const res = await send('HEAD', '/api/items');
      return Number(res.headers.get('x-total-items') ?? 0);
    },

    getItem: (id: ItemId) => sendForItem('GET', `/api/items/${id}`),
    createItem: (fields: ItemFields) => sendForItem('POST', '/api/items', fields),
    replaceItem: (id: ItemId, fields: ItemFields) => sendForItem('PUT', `/api/items/${id}`, fields),
    patchItem: (id: ItemId, patch: ItemPatch) => sendForItem('PATCH', `/api/items/${id}`, patch),

    async deleteItem(id: ItemId): Promise<void> {
      await send('DELETE', `/api/items/${id}`);
    },

    async debugVars(): Promise<DebugVars> {
      const res = await send('GET', '/debug/vars');
      return debugVarsSchema.parse(await res.json());
    },
  };
}

export type MockRestClient = ReturnType<typeof createMockRestClient>;

async function toClientError(res: Response): Promise<MockRestClientError> {
  const fallback = `${res.status} ${res.statusText}`.trim();
  let payload: unknown;
  try {
    payload = await res.json();
  } catch {
    return new MockRestClientError(res.status, 'http_error', fallback);
  }
  const parsed = errorResponseSchema.safeParse(payload);
  if (!parsed.success) return new MockRestClientError(res.status, 'http_error', fallback);
  return new MockRestClientError(res.status, parsed.data.error.code, parsed.data.error.message);
}
