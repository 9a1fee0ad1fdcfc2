/**
 * Ed25519 key pairs on disk.
 *
 * Private keys are PKCS#8 PEM, public keys SPKI PEM:
 *   <dir>/<keyId>_private.pem
 *   <dir>/<keyId>_public.pem
 */
import { createPrivateKey, createPublicKey, generateKeyPairSync } from 'crypto';
import type { KeyObject } from 'crypto';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';

// Structural type (mirrors open-payments-client's SigningKey without importing it)
export interface SigningKey {
  keyId: string;
  privateKey: KeyObject;
}

export interface GeneratedKeyPair extends SigningKey {
  publicKey: KeyObject;
}

export interface KeyPairPaths {
  privateKeyPath: string;
  publicKeyPath: string;
}

export function generateKeyPair(keyId: string): GeneratedKeyPair {
  if (!keyId) throw new Error('keyId must not be empty');
  const { privateKey, publicKey } = generateKeyPairSync('ed25519');
  return { keyId, privateKey, publicKey };
}

function requireEd25519(key: KeyObject, source: string): KeyObject {
  if (key.asymmetricKeyType !== 'ed25519') {
    throw new Error(`${source} holds a ${key.asymmetricKeyType ?? 'symmetric'} key, expected ed25519`);
  }
  return key;
}

/** Parse a PKCS#8 PEM string into a signing key. */
export function signingKeyFromPem(keyId: string, pem: string): SigningKey {
  let privateKey: KeyObject;
  try {
    privateKey = createPrivateKey({ key: pem, format: 'pem' });
  } catch (error) {
    throw new Error(`Could not parse private key "${keyId}" from PEM`, { cause: error });
  }
  return { keyId, privateKey: requireEd25519(privateKey, `Private key "${keyId}"`) };
}

export async function loadSigningKey(keyId: string, privateKeyPath: string): Promise<SigningKey> {
  const pem = await readFile(privateKeyPath, 'utf8');
  return signingKeyFromPem(keyId, pem);
}

export async function loadPublicKey(publicKeyPath: string): Promise<KeyObject> {
  const pem = await readFile(publicKeyPath, 'utf8');
  return requireEd25519(createPublicKey({ key: pem, format: 'pem' }), publicKeyPath);
}

/** Write both halves as PEM. The private key file is created with mode 0600. */
export async function writeKeyPair(dir: string, pair: GeneratedKeyPair): Promise<KeyPairPaths> {
  await mkdir(dir, { recursive: true });

  const privateKeyPath = join(dir, `${pair.keyId}_private.pem`);
  const publicKeyPath = join(dir, `${pair.keyId}_public.pem`);

  await writeFile(privateKeyPath, pair.privateKey.export({ format: 'pem', type: 'pkcs8' }), { mode: 0o600 });
  await writeFile(publicKeyPath, pair.publicKey.export({ format: 'pem', type: 'spki' }));

  return { privateKeyPath, publicKeyPath };
}
