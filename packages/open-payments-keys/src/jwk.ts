/**
 * JWK export for the public half of an Ed25519 key.
 *
 * A wallet publishes { keys: [jwk] } so the counterpart can verify the
 * Signature header; `kid` must equal the keyId used when signing.
 */
import { createPublicKey } from 'crypto';
import type { KeyObject } from 'crypto';

export interface Ed25519Jwk {
  kid: string;
  kty: 'OKP';
  alg: 'EdDSA';
  crv: 'Ed25519';
  /** base64url raw public key, no padding */
  x: string;
  use: 'sig';
}

export interface JwksDocument {
  keys: Ed25519Jwk[];
}

/** Accepts the public key or the private key (its public half is derived). */
export function exportPublicJwk(key: KeyObject, keyId: string): Ed25519Jwk {
  const publicKey = key.type === 'private' ? createPublicKey(key) : key;
  if (publicKey.asymmetricKeyType !== 'ed25519') {
    throw new Error(`Key "${keyId}" is not an Ed25519 key`);
  }

  const exported = publicKey.export({ format: 'jwk' });
  if (typeof exported.x !== 'string') {
    throw new Error(`Key "${keyId}" exported without an x coordinate`);
  }

  return { kid: keyId, kty: 'OKP', alg: 'EdDSA', crv: 'Ed25519', x: exported.x, use: 'sig' };
}

export function toJwks(...jwks: Ed25519Jwk[]): JwksDocument {
  return { keys: jwks };
}

export function publicKeyFromJwk(jwk: Pick<Ed25519Jwk, 'kty' | 'crv' | 'x'>): KeyObject {
  return createPublicKey({ key: { kty: jwk.kty, crv: jwk.crv, x: jwk.x }, format: 'jwk' });
}
