/**
 * open-payments-keys — public API
 *
 * Exports:
 *   generateKeyPair    Fresh Ed25519 key pair bound to a keyId
 *   loadSigningKey     PKCS#8 PEM file → { keyId, privateKey }
 *   signingKeyFromPem  PKCS#8 PEM string → { keyId, privateKey }
 *   loadPublicKey      SPKI PEM file → KeyObject
 *   writeKeyPair       Persist a pair as <keyId>_private.pem / <keyId>_public.pem
 *   exportPublicJwk    Public key → JWK (kty OKP, crv Ed25519)
 *   toJwks             JWKs → { keys: [...] } document
 *   publicKeyFromJwk   JWK → KeyObject, for verifiers
 */

export { generateKeyPair, signingKeyFromPem, loadSigningKey, loadPublicKey, writeKeyPair } from './pem.js';
export type { SigningKey, GeneratedKeyPair, KeyPairPaths } from './pem.js';

export { exportPublicJwk, toJwks, publicKeyFromJwk } from './jwk.js';
export type { Ed25519Jwk, JwksDocument } from './jwk.js';
