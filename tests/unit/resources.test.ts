/**
 * Unit tests — ResourceClient (incoming / outgoing payments)
 */
import { describe, it, expect } from 'vitest';
import {
  HttpError,
  ProtocolError,
  RequestValidationError,
  ResourceClient,
  ResourceRequestError,
  TokenExpiredError,
} from 'open-payments-client';
import type { Amount } from 'open-payments-client';
import { json, stubFetch } from '../helpers/fetch-stub.js';
import type { Reply } from '../helpers/fetch-stub.js';

const RS_URL = 'https://rs.test';
const BOB = 'https://wallet.test/bob';
const ALICE = 'https://wallet.test/alice';
const AMOUNT: Amount = { value: '1250', assetCode: 'USD', assetScale: 2 };

function setup(...replies: Reply[]) {
  const stub = stubFetch(...replies);
  const client = new ResourceClient({ resourceServerUrl: RS_URL, accessToken: 'tok-rs', fetchImpl: stub.fetchImpl });
  return { client, calls: stub.calls };
}

describe('ResourceClient — incoming payments', () => {
  it('creates and reads back an incoming payment', async () => {
    const { client, calls } = setup(
      json(201, { id: 'https://rs/ip/1', completed: false }),
      json(200, { id: 'https://rs/ip/1', completed: false }),
    );

    const created = await client.createIncomingPayment(BOB, AMOUNT);
    expect(created).toEqual({ id: 'https://rs/ip/1', completed: false, walletAddress: BOB, incomingAmount: AMOUNT });

    const fetched = await client.getIncomingPayment(created.id);
    expect(fetched.id).toBe('https://rs/ip/1');
    expect(fetched.completed).toBe(false);
    expect(calls[1]?.url).toBe('https://rs/ip/1');
    expect(calls[1]?.method).toBe('GET');
  });

  it('posts the create body with the bearer token', async () => {
    const { client, calls } = setup(json(201, { id: 'https://rs.test/incoming-payments/1' }));

    await client.createIncomingPayment(BOB, AMOUNT, '2026-02-01T00:00:00.000Z', { description: 'Invoice #7' });

    const [call] = calls;
    expect(call?.url).toBe('https://rs.test/incoming-payments');
    expect(call?.method).toBe('POST');
    expect(call?.headers.get('authorization')).toBe('GNAP tok-rs');
    expect(call?.headers.get('content-type')).toBe('application/json');
    expect(JSON.parse(call?.body ?? '')).toEqual({
      walletAddress: BOB,
      incomingAmount: AMOUNT,
      expiresAt: '2026-02-01T00:00:00.000Z',
      metadata: { description: 'Invoice #7' },
    });
  });

  it('omits absent optional fields from the body', async () => {
    const { client, calls } = setup(json(201, { id: 'https://rs.test/incoming-payments/1' }));

    await client.createIncomingPayment(BOB, AMOUNT);

    expect(calls[0]?.body).toBe(JSON.stringify({ walletAddress: BOB, incomingAmount: AMOUNT }));
  });

  it('prefers server-reported fields over the request echo', async () => {
    const received: Amount = { value: '300', assetCode: 'USD', assetScale: 2 };
    const { client } = setup(
      json(201, {
        id: 'https://rs.test/incoming-payments/1',
        walletAddress: 'https://wallet.test/bob-canonical',
        incomingAmount: AMOUNT,
        receivedAmount: received,
        completed: false,
      }),
    );

    const created = await client.createIncomingPayment(BOB, AMOUNT);
    expect(created.walletAddress).toBe('https://wallet.test/bob-canonical');
    expect(created.receivedAmount).toEqual(received);
  });

  it('sends no content-type on reads', async () => {
    const { client, calls } = setup(json(200, { id: 'https://rs.test/incoming-payments/1', completed: true }));

    const payment = await client.getIncomingPayment('https://rs.test/incoming-payments/1');

    expect(payment.completed).toBe(true);
    expect(calls[0]?.headers.get('content-type')).toBeNull();
    expect(calls[0]?.headers.get('accept')).toBe('application/json');
  });

  it('rejects a bare id instead of the full URL', async () => {
    const { client, calls } = setup();

    const error = await client.getIncomingPayment('ip-1').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RequestValidationError);
    expect(error).toMatchObject({ field: 'resourceUrl' });
    expect(calls).toHaveLength(0);
  });

  it('rejects a non-integer amount before sending', async () => {
    const { client, calls } = setup();

    const error = await client
      .createIncomingPayment(BOB, { value: '12.50', assetCode: 'USD', assetScale: 2 })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RequestValidationError);
    expect(error).toMatchObject({ field: 'incomingAmount' });
    expect(calls).toHaveLength(0);
  });

  it('maps 401 to TokenExpiredError', async () => {
    const { client } = setup(json(401, { error: 'invalid_token' }));

    const error = await client.getIncomingPayment('https://rs.test/incoming-payments/1').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TokenExpiredError);
    expect(error).not.toBeInstanceOf(HttpError);
    expect(error).toMatchObject({
      code: 'token_expired',
      status: 401,
      url: 'https://rs.test/incoming-payments/1',
      body: { error: 'invalid_token' },
    });
  });

  it('surfaces other failures as ResourceRequestError', async () => {
    const { client } = setup(json(404, { error: 'not_found' }));

    const error = await client.getIncomingPayment('https://rs.test/incoming-payments/9').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ResourceRequestError);
    expect(error).toMatchObject({ status: 404, body: { error: 'not_found' } });
  });

  it('throws ProtocolError when the response has no id', async () => {
    const { client } = setup(json(201, { completed: false }));
    await expect(client.createIncomingPayment(BOB, AMOUNT)).rejects.toThrow(ProtocolError);
  });
});

describe('ResourceClient — outgoing payments', () => {
  it('creates an outgoing payment from a quote', async () => {
    const { client, calls } = setup(
      json(201, { id: 'https://rs.test/outgoing-payments/1', sentAmount: AMOUNT, failed: false }),
    );

    const payment = await client.createOutgoingPayment(ALICE, 'https://rs.test/quotes/1');

    expect(payment).toEqual({
      id: 'https://rs.test/outgoing-payments/1',
      sentAmount: AMOUNT,
      failed: false,
      walletAddress: ALICE,
      quoteId: 'https://rs.test/quotes/1',
    });
    expect(calls[0]?.url).toBe('https://rs.test/outgoing-payments');
    expect(JSON.parse(calls[0]?.body ?? '')).toEqual({ walletAddress: ALICE, quoteId: 'https://rs.test/quotes/1' });
  });

  it('defaults failed to false when the server omits it', async () => {
    const { client } = setup(json(200, { id: 'https://rs.test/outgoing-payments/1' }));

    const payment = await client.getOutgoingPayment('https://rs.test/outgoing-payments/1');
    expect(payment).toEqual({ id: 'https://rs.test/outgoing-payments/1', failed: false });
  });

  it('requires a quote id', async () => {
    const { client } = setup();
    await expect(client.createOutgoingPayment(ALICE, '')).rejects.toThrow(RequestValidationError);
  });

  it('maps 401 on create to TokenExpiredError', async () => {
    const { client } = setup(json(401, { error: 'invalid_token' }));
    await expect(client.createOutgoingPayment(ALICE, 'https://rs.test/quotes/1')).rejects.toThrow(TokenExpiredError);
  });
});

describe('ResourceClient — construction', () => {
  it('accepts an AccessToken object', async () => {
    const stub = stubFetch(json(200, { id: 'https://rs.test/incoming-payments/1' }));
    const client = new ResourceClient({
      resourceServerUrl: 'https://rs.test/',
      accessToken: { value: 'tok-obj', manageUrl: 'https://as.test/token/1', access: [] },
      fetchImpl: stub.fetchImpl,
    });

    await client.getIncomingPayment('https://rs.test/incoming-payments/1');
    expect(stub.calls[0]?.headers.get('authorization')).toBe('GNAP tok-obj');
    expect(client.resourceServerUrl).toBe('https://rs.test');
  });

  it('rejects an empty token', () => {
    expect(() => new ResourceClient({ resourceServerUrl: RS_URL, accessToken: '' })).toThrow(RequestValidationError);
  });
});
