import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MockRestClientError, createMockRestClient, type MockRestClient } from '../src/sdk/mockRestClient';
import { ADMIN, buildTestApp, type AppInstance } from './helpers';

// The verbs the client sends; all of them are ones inject() accepts
const CLIENT_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD'] as const;
type ClientMethod = (typeof CLIENT_METHODS)[number];

const isClientMethod = (method: string): method is ClientMethod => CLIENT_METHODS.some((m) => m === method);

// Serves client fetches from app.inject so no socket is opened
function injectFetch(app: AppInstance): typeof fetch {
  return async (input, init) => {
    const url = new URL(typeof input === 'string' ? input : input instanceof URL ? input.href : input.url);
    const method = init?.method ?? 'GET';
    if (!isClientMethod(method)) throw new Error(`Unexpected method ${method}`);

    const res = await app.inject({
      method,
      url: url.pathname + url.search,
      headers: Object.fromEntries(new Headers(init?.headers).entries()),
      payload: typeof init?.body === 'string' ? init.body : undefined,
    });

    const headers = new Headers();
    for (const [name, value] of Object.entries(res.headers)) {
      if (value !== undefined) headers.set(name, Array.isArray(value) ? value.join(', ') : String(value));
    }
    const body = res.statusCode === 204 || method === 'HEAD' ? null : res.body;
    return new Response(body, { status: res.statusCode, headers });
  };
}

describe('createMockRestClient', () => {
  let app: AppInstance;
  let client: MockRestClient;

  beforeEach(async () => {
    app = await buildTestApp();
    client = createMockRestClient({ baseUrl: 'http://mock.test/', fetch: injectFetch(app) });
  });

  afterEach(async () => {
    await app.close();
  });

  it('keeps the login token for later calls', async () => {
    expect(client.token).toBeUndefined();
    const session = await client.login(ADMIN.username, ADMIN.password);
    expect(client.token).toBe(session.token);

    const created = await client.createItem({ name: 'Kettle', price: 30 });
    expect(created).toMatchObject({ id: 1, name: 'Kettle', price: 30 });
    expect(await client.listItems()).toEqual([created]);
  });

  it('covers the item lifecycle', async () => {
    await client.login(ADMIN.username, ADMIN.password);
    await client.createItem({ name: 'Mug', description: 'white', price: 8 });

    expect(await client.countItems()).toBe(1);
    expect(await client.patchItem(1, { price: 9 })).toMatchObject({ name: 'Mug', description: 'white', price: 9 });
    expect(await client.replaceItem(1, { name: 'Cup', price: 7 })).not.toHaveProperty('description');
    expect(await client.getItem(1)).toMatchObject({ name: 'Cup', price: 7 });

    await client.deleteItem(1);
    expect(await client.countItems()).toBe(0);
  });

  it('surfaces server errors as MockRestClientError', async () => {
    await client.login(ADMIN.username, ADMIN.password);
    const err = await client.getItem(42).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(MockRestClientError);
    expect(err).toMatchObject({ status: 404, code: 'not_found', message: 'Item 42 not found' });
  });

  it('rejects bad credentials', async () => {
    await expect(client.login('admin', 'nope')).rejects.toMatchObject({ status: 401, code: 'invalid_credentials' });
    expect(client.token).toBeUndefined();
  });

  it('reads debug vars', async () => {
    await client.login(ADMIN.username, ADMIN.password);
    const vars = await client.debugVars();
    expect(vars.active_tokens).toBe(1);
    expect(vars.items_count).toBe(0);
    expect(vars.requests['POST /api/login']).toBe(1);
  });

  it('drops the token on logout', async () => {
    await client.login(ADMIN.username, ADMIN.password);
    await client.logout();
    expect(client.token).toBeUndefined();
    await expect(client.listItems()).rejects.toMatchObject({ status: 401, code: 'missing_credentials' });
  });
});
