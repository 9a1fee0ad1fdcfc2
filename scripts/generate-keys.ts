/**
 * generate-keys.ts — create an Ed25519 key pair for request signing.
 *
 * Usage:
 *   OP_KEY_ID=<keyId> tsx scripts/generate-keys.ts [outDir]
 *
 * Writes <outDir>/<keyId>_private.pem, <keyId>_public.pem and jwks.json
 * (default outDir: keys). Register the JWKS with the wallet, then point
 * OP_PRIVATE_KEY_PATH at the private key.
 */
import { writeFile } from 'fs/promises';
import { join } from 'path';
import { exportPublicJwk, generateKeyPair, toJwks, writeKeyPair } from 'open-payments-keys';

const KEY_ID = process.env['OP_KEY_ID'] ?? 'demo-key';
const OUT_DIR = process.argv[2] ?? 'keys';

try {
  const pair = generateKeyPair(KEY_ID);
  const { privateKeyPath, publicKeyPath } = await writeKeyPair(OUT_DIR, pair);

  const jwksPath = join(OUT_DIR, 'jwks.json');
  await writeFile(jwksPath, `${JSON.stringify(toJwks(exportPublicJwk(pair.publicKey, KEY_ID)), null, 2)}\n`);

  console.log(`\n✅ Generated key "${KEY_ID}"`);
  console.log(`   private: ${privateKeyPath}  (keep secret)`);
  console.log(`   public : ${publicKeyPath}`);
  console.log(`   jwks   : ${jwksPath}`);
  console.log(`\n   export OP_KEY_ID=${KEY_ID}`);
  console.log(`   export OP_PRIVATE_KEY_PATH=${privateKeyPath}\n`);
} catch (err) {
  console.error(`\n❌ ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}
