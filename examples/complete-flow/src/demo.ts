/**
 * complete-flow — Alice pays Bob, end to end, in the terminal.
 *
 * Run (after starting the mock server):
 *   npm run demo
 *
 * Steps:
 *   1. resolve both wallet addresses
 *   2. non-interactive grant → incoming payment on Bob's wallet
 *   3. non-interactive grant → quote for Bob's receive amount
 *   4. interactive grant → Alice consents in the browser → continue
 *   5. outgoing payment from Alice, then re-read Bob's incoming payment
 *
 * Environment variables: see loadConfig() in open-payments-client, plus
 *   OP_RECEIVER_WALLET_ADDRESS   Bob's wallet (default: <OP_WALLET_ADDRESS origin>/bob)
 */
import { createInterface } from 'readline/promises';
import {
  GrantClient,
  QuoteClient,
  ResourceClient,
  WalletLookup,
  accessRight,
  isOpenPaymentsError,
  loadConfig,
  withClient,
} from 'open-payments-client';
import type { Amount, GrantResponse } from 'open-payments-client';
import { loadSigningKey } from 'open-payments-keys';

const config = loadConfig();
const receiverWallet = process.env['OP_RECEIVER_WALLET_ADDRESS'] ?? `${new URL(config.walletAddress).origin}/bob`;
const redirectUri = config.redirectUri ?? 'http://localhost:3344/callback';
const transport = { timeoutMs: config.timeoutMs };

function divider(title: string) {
  const line = '─'.repeat(60);
  console.log(`\n${line}`);
  console.log(`  ${title}`);
  console.log(line);
}

function requireGranted(response: GrantResponse, what: string) {
  if (response.status !== 'granted') {
    throw new Error(`Expected ${what} to be granted immediately, got ${response.status}`);
  }
  return response.accessToken;
}

try {
  const key = await loadSigningKey(config.keyId, config.privateKeyPath);

  // ── 1. Wallets ──────────────────────────────────────────────────────────────
  divider('1 — Resolve wallet addresses');

  const [alice, bob] = await withClient(new WalletLookup(transport), (lookup) =>
    Promise.all([lookup.getWalletAddress(config.walletAddress), lookup.getWalletAddress(receiverWallet)]),
  );
  console.log(`  sender   ${alice.id} (${alice.assetCode}, scale ${alice.assetScale})`);
  console.log(`  receiver ${bob.id} (${bob.assetCode}, scale ${bob.assetScale})`);

  const bobGrants = new GrantClient({ ...transport, authServerUrl: bob.authServer, signer: key });
  const aliceGrants = new GrantClient({ ...transport, authServerUrl: alice.authServer, signer: key });

  // ── 2. Incoming payment ─────────────────────────────────────────────────────
  divider('2 — Incoming payment on the receiver wallet');

  const incomingToken = requireGranted(
    await bobGrants.requestGrantNonInteractive(
      [accessRight('incoming-payment', ['create', 'read'])],
      config.clientId,
    ),
    'incoming-payment grant',
  );

  const amount: Amount = { value: '1250', assetCode: bob.assetCode, assetScale: bob.assetScale };
  const incoming = await withClient(
    new ResourceClient({ ...transport, resourceServerUrl: bob.resourceServer, accessToken: incomingToken }),
    (rs) => rs.createIncomingPayment(bob.id, amount, undefined, { description: 'Invoice #1' }),
  );
  console.log(`✅ ${incoming.id}`);

  // ── 3. Quote ────────────────────────────────────────────────────────────────
  divider('3 — Quote');

  const quoteToken = requireGranted(
    await aliceGrants.requestGrantNonInteractive([accessRight('quote', ['create', 'read'])], config.clientId),
    'quote grant',
  );
  const quote = await withClient(
    new QuoteClient({ ...transport, walletAddress: alice.id, baseUrl: alice.resourceServer, signer: key, accessToken: quoteToken }),
    (quotes) => quotes.createQuote(bob.id, { receiveAmount: amount }),
  );
  console.log(`✅ ${quote.id}: send ${quote.sendAmount?.value ?? '?'} → receive ${quote.receiveAmount?.value ?? '?'}`);

  // ── 4. Interactive grant ────────────────────────────────────────────────────
  divider('4 — Outgoing-payment grant (user consent)');

  const pending = await aliceGrants.requestGrantInteractive(
    [accessRight('outgoing-payment', ['create', 'read'], { identifier: alice.id, limits: { debitAmount: amount } })],
    config.clientId,
    redirectUri,
  );
  if (pending.status !== 'pending_interaction' || !pending.continuation) {
    throw new Error(`Expected a pending grant with a continuation, got ${pending.status}`);
  }

  console.log(`\n→ Open in a browser and approve:\n  ${pending.interaction.redirectUrl}`);
  console.log(`  You will be sent to ${redirectUri}?interact_ref=…`);
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  const interactRef = (await rl.question('\n  Paste interact_ref: ')).trim();
  rl.close();

  const granted = await aliceGrants.continueGrant(
    pending.continuation.uri,
    pending.continuation.accessToken,
    interactRef || undefined,
  );
  const outgoingToken = requireGranted(granted, 'outgoing-payment grant');
  console.log('✅ grant approved');

  // ── 5. Outgoing payment ─────────────────────────────────────────────────────
  divider('5 — Outgoing payment');

  const outgoing = await withClient(
    new ResourceClient({ ...transport, resourceServerUrl: alice.resourceServer, accessToken: outgoingToken }),
    (rs) => rs.createOutgoingPayment(alice.id, quote.id, { description: 'Invoice #1' }),
  );
  console.log(`✅ ${outgoing.id}: sent ${outgoing.sentAmount?.value ?? '?'} (failed: ${outgoing.failed})`);

  const settled = await withClient(
    new ResourceClient({ ...transport, resourceServerUrl: bob.resourceServer, accessToken: incomingToken }),
    (rs) => rs.getIncomingPayment(incoming.id),
  );
  console.log(`   incoming payment completed: ${settled.completed}`);

  bobGrants.close();
  aliceGrants.close();
  divider('Flow complete ✅');
  console.log('');
} catch (err) {
  if (isOpenPaymentsError(err)) {
    console.error(`\n❌ ${err.code}: ${err.message}`);
  } else {
    console.error('\n❌', err);
  }
  process.exit(1);
}
