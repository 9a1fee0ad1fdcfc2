/**
 * Unit tests — mock server: signature gate, grant lifecycle, resource authorization
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { generateKeyPairSync } from 'crypto';
import Fastify from 'fastify';
import { Signer } from 'open-payments-client';
import { buildMockServer, createSignatureVerification, signedRoute } from 'open-payments-mock-server';
import type { MockServer } from 'open-payments-mock-server';

const HOST = 'as.test';
const BASE = `http://${HOST}`;
const { privateKey, publicKey } = generateKeyPairSync('ed25519');
const key = { keyId: 'test-key', privateKey };

let now: Date;
let server: MockServer;

function signedPost(url: string, payload: unknown, signer = new Signer(key, { clock: () => now })) {
  const body = JSON.stringify(payload);
  const signed = signer.sign('POST', `${BASE}${url}`, body);
  return server.app.inject({ method: 'POST', url, headers: { host: HOST, ...signed.headers }, payload: body });
}

function bearer(method: 'GET' | 'POST' | 'DELETE', url: string, token?: string, payload?: Record<string, unknown>) {
  return server.app.inject({
    method,
    url,
    headers: { host: HOST, ...(token && { authorization: `GNAP ${token}` }) },
    ...(payload !== undefined && { payload }),
  });
}

async function grantToken(type: 'incoming-payment' | 'quote', actions: string[]): Promise<string> {
  const res = await signedPost('/', { access_token: [{ type, actions }], client: `${BASE}/alice` });
  expect(res.statusCode).toBe(200);
  return res.json<{ access_token: { value: string } }>().access_token.value;
}

beforeEach(async () => {
  now = new Date('2026-01-01T00:00:00.000Z');
  server = await buildMockServer({ keys: new Map([['test-key', publicKey]]), clock: () => now });
});

afterEach(async () => {
  await server.app.close();
});

describe('signature verification', () => {
  const grantBody = { access_token: [{ type: 'incoming-payment', actions: ['create'] }], client: `${BASE}/alice` };

  it('accepts a valid signature', async () => {
    const res = await signedPost('/', grantBody);
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      access_token: { manage: expect.stringMatching(/^http:\/\/as\.test\/token\//), expires_in: 600 },
    });
  });

  it('rejects a request without signature headers', async () => {
    const res = await server.app.inject({ method: 'POST', url: '/', headers: { host: HOST }, payload: grantBody });
    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({ error: 'invalid_client', reason: 'missing_signature' });
  });

  it('rejects an unknown keyId', async () => {
    const res = await signedPost('/', grantBody, new Signer({ keyId: 'other', privateKey }, { clock: () => now }));
    expect(res.json()).toEqual({ error: 'invalid_client', reason: 'unknown_key' });
  });

  it('rejects a body that differs from the signed one', async () => {
    const signed = new Signer(key, { clock: () => now }).sign('POST', `${BASE}/`, JSON.stringify(grantBody));
    const res = await server.app.inject({
      method: 'POST',
      url: '/',
      headers: { host: HOST, ...signed.headers },
      payload: JSON.stringify({ ...grantBody, client: `${BASE}/mallory` }),
    });
    expect(res.json()).toEqual({ error: 'invalid_client', reason: 'invalid_signature' });
  });

  it('rejects a signature for another host', async () => {
    const signed = new Signer(key, { clock: () => now }).sign('POST', 'http://elsewhere.test/', JSON.stringify(grantBody));
    const res = await server.app.inject({
      method: 'POST',
      url: '/',
      headers: { host: HOST, ...signed.headers },
      payload: JSON.stringify(grantBody),
    });
    expect(res.json()).toEqual({ error: 'invalid_client', reason: 'invalid_signature' });
  });

  it('rejects a stale timestamp', async () => {
    const old = new Signer(key, { clock: () => new Date(now.getTime() - 3_600_000) });
    const res = await signedPost('/', grantBody, old);
    expect(res.json()).toEqual({ error: 'invalid_client', reason: 'stale_timestamp' });
  });

  it('only gates routes that ask for it', async () => {
    const app = Fastify({ logger: false });
    await app.register(createSignatureVerification({ resolveKey: () => publicKey }));
    app.get('/open', async () => ({ open: true }));
    app.route(signedRoute({ method: 'GET', url: '/closed', handler: async () => ({ closed: true }) }));
    await app.ready();

    expect((await app.inject({ method: 'GET', url: '/open' })).statusCode).toBe(200);
    expect((await app.inject({ method: 'GET', url: '/closed' })).statusCode).toBe(401);
    await app.close();
  });
});

describe('grant lifecycle', () => {
  const outgoing = {
    access_token: [{ type: 'outgoing-payment', actions: ['create', 'read'], identifier: `${BASE}/alice` }],
    client: `${BASE}/alice`,
    interact: {
      start: ['redirect'],
      finish: { method: 'redirect', uri: 'http://client.test/callback', nonce: 'client-nonce' },
    },
  };

  it('answers outgoing-payment requests with an interaction', async () => {
    const res = await signedPost('/', outgoing);
    const body = res.json<{ interact: { redirect: string }; continue: { uri: string; access_token: { value: string } } }>();

    expect(body.interact.redirect).toMatch(/^http:\/\/as\.test\/interact\/[0-9a-f-]{36}$/);
    expect(body.continue.uri).toBe(body.interact.redirect.replace('/interact/', '/continue/'));
    expect(server.state.grants.size).toBe(1);
  });

  it('issues a token after consent and continuation', async () => {
    const pending = (await signedPost('/', outgoing)).json<{
      interact: { redirect: string };
      continue: { uri: string; access_token: { value: string } };
    }>();
    const continuePath = new URL(pending.continue.uri).pathname;
    const cont = pending.continue.access_token.value;

    const early = await bearer('POST', continuePath, cont);
    expect(early.statusCode).toBe(400);
    expect(early.json()).toEqual({ error: 'too_fast', wait: 5 });

    const consent = await server.app.inject({
      method: 'GET',
      url: new URL(pending.interact.redirect).pathname,
      headers: { host: HOST },
    });
    expect(consent.statusCode).toBe(302);
    const location = new URL(String(consent.headers.location));
    expect(location.origin + location.pathname).toBe('http://client.test/callback');
    const interactRef = location.searchParams.get('interact_ref');
    expect(interactRef).toMatch(/^[0-9a-f-]{36}$/);

    const wrongRef = await bearer('POST', continuePath, cont, { interact_ref: 'nope' });
    expect(wrongRef.json()).toEqual({ error: 'invalid_interaction' });

    const granted = await bearer('POST', continuePath, cont, { interact_ref: interactRef });
    expect(granted.statusCode).toBe(200);
    expect(granted.json()).toMatchObject({ access_token: { access: outgoing.access_token } });

    const again = await bearer('POST', continuePath, cont);
    expect(again.json()).toMatchObject({ error: 'invalid_continuation' });
  });

  it('rejects a wrong continuation token', async () => {
    const pending = (await signedPost('/', outgoing)).json<{ continue: { uri: string } }>();
    const res = await bearer('POST', new URL(pending.continue.uri).pathname, 'forged');
    expect(res.statusCode).toBe(401);
  });

  it('reports a denied grant', async () => {
    const pending = (await signedPost('/', outgoing)).json<{
      interact: { redirect: string };
      continue: { uri: string; access_token: { value: string } };
    }>();
    server.denyGrant(pending.interact.redirect);

    const res = await bearer('POST', new URL(pending.continue.uri).pathname, pending.continue.access_token.value);
    expect(res.statusCode).toBe(403);
    expect(res.json()).toEqual({ error: 'user_denied' });
  });

  it('rotates and revokes tokens', async () => {
    const issued = (await signedPost('/', { access_token: [{ type: 'quote', actions: ['create'] }], client: 'c' })).json<{
      access_token: { value: string; manage: string };
    }>();
    const managePath = new URL(issued.access_token.manage).pathname;

    const rotated = await bearer('POST', managePath, issued.access_token.value);
    expect(rotated.statusCode).toBe(200);
    const fresh = rotated.json<{ access_token: { value: string; manage: string } }>().access_token;
    expect(fresh.value).not.toBe(issued.access_token.value);

    expect((await bearer('POST', managePath, issued.access_token.value)).statusCode).toBe(401);

    const revoked = await bearer('DELETE', new URL(fresh.manage).pathname, fresh.value);
    expect(revoked.statusCode).toBe(204);
    expect([...server.state.tokens.values()].every((t) => t.revoked)).toBe(true);
  });
});

describe('resource authorization', () => {
  const amount = { value: '1000', assetCode: 'USD', assetScale: 2 };

  it('creates and reads an incoming payment with the right token', async () => {
    const token = await grantToken('incoming-payment', ['create', 'read']);

    const created = await bearer('POST', '/incoming-payments', token, { walletAddress: `${BASE}/bob`, incomingAmount: amount });
    expect(created.statusCode).toBe(201);
    const payment = created.json<{ id: string }>();
    expect(payment).toMatchObject({
      walletAddress: `${BASE}/bob`,
      incomingAmount: amount,
      receivedAmount: { ...amount, value: '0' },
      completed: false,
      createdAt: '2026-01-01T00:00:00.000Z',
    });

    const read = await bearer('GET', new URL(payment.id).pathname, token);
    expect(read.json()).toEqual(created.json());
  });

  it('returns 401 without a token and 403 without the right', async () => {
    const quoteOnly = await grantToken('quote', ['create']);

    expect((await bearer('GET', '/incoming-payments/x')).statusCode).toBe(401);
    const forbidden = await bearer('POST', '/incoming-payments', quoteOnly, { walletAddress: `${BASE}/bob`, incomingAmount: amount });
    expect(forbidden.statusCode).toBe(403);
  });

  it('expires tokens after their lifetime', async () => {
    const token = await grantToken('incoming-payment', ['read']);
    now = new Date(now.getTime() + 601_000);

    expect((await bearer('GET', '/incoming-payments/x', token)).json()).toEqual({ error: 'invalid_token' });
  });

  it('returns 404 for an unknown payment', async () => {
    const token = await grantToken('incoming-payment', ['read']);
    expect((await bearer('GET', '/incoming-payments/missing', token)).statusCode).toBe(404);
  });

  it('serves wallet documents', async () => {
    const res = await server.app.inject({ method: 'GET', url: '/alice', headers: { host: HOST } });
    expect(res.json()).toEqual({
      id: `${BASE}/alice`,
      publicName: 'Alice',
      assetCode: 'USD',
      assetScale: 2,
      authServer: BASE,
      resourceServer: BASE,
    });
    expect((await server.app.inject({ method: 'GET', url: '/carol', headers: { host: HOST } })).statusCode).toBe(404);
  });
});
