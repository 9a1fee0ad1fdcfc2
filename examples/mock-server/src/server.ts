/**
 * mock-server — serves the in-memory Open Payments servers on a local port.
 *
 * Run: npm run mock-server
 *
 * Endpoints (see open-payments-mock-server):
 *   POST /                 grant requests (signed)
 *   GET  /interact/:id     consent page; redirects to the client's finish URI
 *   POST /continue/:id     grant continuation
 *   POST /incoming-payments, /outgoing-payments, /quotes
 *   GET  /alice, /bob      wallet address documents
 *
 * Environment variables:
 *   OP_KEY_ID              keyId the client signs with (default: demo-key)
 *   OP_PUBLIC_KEY_PATH     SPKI PEM of that key (default: keys/<OP_KEY_ID>_public.pem)
 *   PORT / HOST            listen address (default: 127.0.0.1:4000)
 *   LOG_LEVEL              Fastify logger level (default: info)
 */
import { loadPublicKey } from 'open-payments-keys';
import { buildMockServer } from 'open-payments-mock-server';

const KEY_ID = process.env['OP_KEY_ID'] ?? 'demo-key';
const PUBLIC_KEY_PATH = process.env['OP_PUBLIC_KEY_PATH'] ?? `keys/${KEY_ID}_public.pem`;
const PORT = parseInt(process.env['PORT'] ?? '4000', 10);
const HOST = process.env['HOST'] ?? '127.0.0.1';

async function build() {
  const publicKey = await loadPublicKey(PUBLIC_KEY_PATH);
  return buildMockServer({
    keys: new Map([[KEY_ID, publicKey]]),
    logger: { level: process.env['LOG_LEVEL'] ?? 'info' },
  });
}

let server: Awaited<ReturnType<typeof build>>;
try {
  server = await build();
} catch (err) {
  console.error(`\n❌ Could not load public key "${KEY_ID}" from ${PUBLIC_KEY_PATH}`);
  console.error('   Generate one with: npm run keys:generate\n');
  console.error(err);
  process.exit(1);
}

try {
  await server.app.listen({ port: PORT, host: HOST });
  console.log(`\n✅ mock-server running at http://${HOST}:${PORT}`);
  console.log(`   wallets: http://${HOST}:${PORT}/alice, http://${HOST}:${PORT}/bob`);
  console.log(`   accepting signatures from keyId "${KEY_ID}"\n`);
} catch (err) {
  server.app.log.error(err);
  process.exit(1);
}

export { build };
