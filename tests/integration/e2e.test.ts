/**
 * Integration tests — end-to-end: mock server on a real port + every client
 *
 * Alice pays Bob: wallet lookup, incoming payment, quote, interactive grant,
 * outgoing payment, token rotation and revocation.
 */
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import {
  GrantClient,
  QuoteClient,
  ResourceClient,
  TokenExpiredError,
  UnexpectedInteractionRequiredError,
  WalletLookup,
  accessRight,
  withClient,
} from 'open-payments-client';
import type { AccessToken, Amount, GrantResponse, IncomingPayment, Quote, WalletAddress } from 'open-payments-client';
import { generateKeyPair } from 'open-payments-keys';
import { buildMockServer } from 'open-payments-mock-server';
import type { MockServer } from 'open-payments-mock-server';

const REDIRECT_URI = 'http://localhost:3344/callback';
const pair = generateKeyPair('e2e-key');

function tokenOf(response: GrantResponse): AccessToken {
  if (response.status !== 'granted') throw new Error(`expected granted, got ${response.status}`);
  return response.accessToken;
}

describe('End-to-end integration', () => {
  let server: MockServer;
  let baseUrl: string;
  let alice: WalletAddress;
  let bob: WalletAddress;
  let grants: GrantClient;

  beforeAll(async () => {
    server = await buildMockServer({ keys: new Map([[pair.keyId, pair.publicKey]]) });
    await server.app.listen({ port: 0, host: '127.0.0.1' });
    const addr = server.app.server.address();
    if (addr === null || typeof addr === 'string') throw new Error('server is not listening on a port');
    baseUrl = `http://127.0.0.1:${addr.port}`;

    [alice, bob] = await withClient(new WalletLookup(), (lookup) =>
      Promise.all([lookup.getWalletAddress(`${baseUrl}/alice`), lookup.getWalletAddress(`${baseUrl}/bob`)]),
    );
    grants = new GrantClient({ authServerUrl: alice.authServer, signer: pair });
  });

  afterAll(async () => {
    grants.close();
    await server.app.close();
  });

  it('resolves wallet addresses', () => {
    expect(alice).toEqual({
      id: `${baseUrl}/alice`,
      publicName: 'Alice',
      assetCode: 'USD',
      assetScale: 2,
      authServer: baseUrl,
      resourceServer: baseUrl,
    });
    expect(bob.id).toBe(`${baseUrl}/bob`);
  });

  it('completes the full payment flow', async () => {
    const amount: Amount = { value: '1250', assetCode: bob.assetCode, assetScale: bob.assetScale };

    // Incoming payment on Bob's wallet
    const incomingToken = tokenOf(
      await grants.requestGrantNonInteractive([accessRight('incoming-payment', ['create', 'read'])], alice.id),
    );
    const incoming: IncomingPayment = await withClient(
      new ResourceClient({ resourceServerUrl: bob.resourceServer, accessToken: incomingToken }),
      (rs) => rs.createIncomingPayment(bob.id, amount, undefined, { description: 'Invoice #1' }),
    );
    expect(incoming.id.startsWith(`${baseUrl}/incoming-payments/`)).toBe(true);
    expect(incoming.completed).toBe(false);
    expect(incoming.metadata).toEqual({ description: 'Invoice #1' });

    // Quote, signed and token-authorized
    const quoteToken = tokenOf(await grants.requestGrantNonInteractive([accessRight('quote', ['create'])], alice.id));
    const quote: Quote = await withClient(
      new QuoteClient({ walletAddress: alice.id, signer: pair, accessToken: quoteToken }),
      (quotes) => quotes.createQuote(bob.id, { receiveAmount: amount }),
    );
    expect(quote.receiveAmount).toEqual(amount);
    expect(quote.sendAmount).toEqual(amount);

    // Outgoing-payment grant needs consent
    const pending = await grants.requestGrantInteractive(
      [accessRight('outgoing-payment', ['create', 'read'], { identifier: alice.id })],
      alice.id,
      REDIRECT_URI,
    );
    if (pending.status !== 'pending_interaction' || !pending.continuation) {
      throw new Error(`expected a pending grant with a continuation, got ${pending.status}`);
    }

    const consent = await fetch(pending.interaction.redirectUrl, { redirect: 'manual' });
    expect(consent.status).toBe(302);
    const finish = new URL(consent.headers.get('location') ?? '');
    expect(`${finish.origin}${finish.pathname}`).toBe(REDIRECT_URI);
    const interactRef = finish.searchParams.get('interact_ref') ?? undefined;

    const outgoingToken = tokenOf(
      await grants.continueGrant(pending.continuation.uri, pending.continuation.accessToken, interactRef),
    );

    // Outgoing payment settles the incoming one
    const outgoing = await withClient(
      new ResourceClient({ resourceServerUrl: alice.resourceServer, accessToken: outgoingToken }),
      (rs) => rs.createOutgoingPayment(alice.id, quote.id),
    );
    expect(outgoing.failed).toBe(false);
    expect(outgoing.sentAmount).toEqual(amount);
    expect(outgoing.quoteId).toBe(quote.id);

    const settled = await withClient(
      new ResourceClient({ resourceServerUrl: bob.resourceServer, accessToken: incomingToken }),
      (rs) => rs.getIncomingPayment(incoming.id),
    );
    expect(settled.completed).toBe(true);
    expect(settled.receivedAmount).toEqual(amount);
  });

  it('refuses to silently start an interaction on the non-interactive flow', async () => {
    await expect(
      grants.requestGrantNonInteractive([accessRight('outgoing-payment', ['create'])], alice.id),
    ).rejects.toThrow(UnexpectedInteractionRequiredError);
  });

  it('rotates and revokes tokens', async () => {
    const token = tokenOf(
      await grants.requestGrantNonInteractive([accessRight('incoming-payment', ['create', 'read'])], alice.id),
    );
    const rotated = await grants.rotateToken(token);
    expect(rotated.value).not.toBe(token.value);
    expect(rotated.access).toEqual([{ type: 'incoming-payment', actions: ['create', 'read'] }]);

    const rs = new ResourceClient({ resourceServerUrl: alice.resourceServer, accessToken: token });
    await expect(rs.getIncomingPayment(`${baseUrl}/incoming-payments/none`)).rejects.toThrow(TokenExpiredError);
    rs.close();

    await grants.revokeToken(rotated);
    await expect(
      withClient(new ResourceClient({ resourceServerUrl: alice.resourceServer, accessToken: rotated }), (client) =>
        client.createIncomingPayment(alice.id, { value: '1', assetCode: 'USD', assetScale: 2 }),
      ),
    ).rejects.toThrow(TokenExpiredError);
  });

  it('rejects requests signed with an unregistered key', async () => {
    const stranger = new GrantClient({ authServerUrl: alice.authServer, signer: generateKeyPair('stranger') });
    await expect(
      stranger.requestGrantNonInteractive([accessRight('quote', ['create'])], alice.id),
    ).rejects.toMatchObject({ code: 'http_error', status: 401, body: { error: 'invalid_client', reason: 'unknown_key' } });
    stranger.close();
  });
});
