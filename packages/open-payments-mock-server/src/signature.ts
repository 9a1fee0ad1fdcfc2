/**
 * Server-side half of request signing.
 *
 * signing string = METHOD "\n" URL "\n" CREATED [ "\n" base64(SHA-256(RAW_BODY)) ]
 *
 * CREATED comes from `Signature-Input: sig1=();created=<timestamp>`; URL is
 * the absolute URL the client addressed (scheme + Host header + path).
 */
import { createHash, verify as ed25519Verify } from 'crypto';
import type { KeyObject } from 'crypto';

export type SignatureFailure =
  | 'missing_signature'
  | 'malformed_signature'
  | 'unsupported_algorithm'
  | 'unknown_key'
  | 'stale_timestamp'
  | 'invalid_signature';

export type SignatureCheck =
  | { ok: true; keyId: string; created: string }
  | { ok: false; reason: SignatureFailure };

export interface SignedRequestParts {
  method: string;
  url: string;
  rawBody: Buffer;
  signature?: string;
  signatureInput?: string;
}

export interface VerifyOptions {
  resolveKey: (keyId: string) => KeyObject | undefined;
  /** Accept timestamps within ±maxSkewSeconds of now. 0 disables the check. */
  maxSkewSeconds: number;
  now: Date;
}

export function computeSigningString(method: string, url: string, created: string, rawBody: Buffer): string {
  let content = `${method.toUpperCase()}\n${url}\n${created}`;
  if (rawBody.length > 0) {
    content += `\n${createHash('sha256').update(rawBody).digest('base64')}`;
  }
  return content;
}

function parseParams(header: string): Map<string, string> {
  const params = new Map<string, string>();
  for (const match of header.matchAll(/(\w+)="([^"]*)"/g)) {
    const [, key, value] = match;
    if (key !== undefined && value !== undefined) params.set(key, value);
  }
  return params;
}

function parseCreated(signatureInput: string): string | undefined {
  return /;created=([^;\s]+)/.exec(signatureInput)?.[1];
}

export function verifyRequestSignature(parts: SignedRequestParts, options: VerifyOptions): SignatureCheck {
  if (!parts.signature || !parts.signatureInput) return { ok: false, reason: 'missing_signature' };

  const params = parseParams(parts.signature);
  const keyId = params.get('keyId');
  const algorithm = params.get('algorithm');
  const signatureB64 = params.get('signature');
  const created = parseCreated(parts.signatureInput);
  if (!keyId || !algorithm || !signatureB64 || !created) return { ok: false, reason: 'malformed_signature' };

  if (algorithm !== 'ed25519') return { ok: false, reason: 'unsupported_algorithm' };

  const publicKey = options.resolveKey(keyId);
  if (!publicKey) return { ok: false, reason: 'unknown_key' };

  const createdMs = new Date(created).getTime();
  if (isNaN(createdMs)) return { ok: false, reason: 'malformed_signature' };
  if (options.maxSkewSeconds > 0 && Math.abs(options.now.getTime() - createdMs) > options.maxSkewSeconds * 1000) {
    return { ok: false, reason: 'stale_timestamp' };
  }

  const content = computeSigningString(parts.method, parts.url, created, parts.rawBody);
  let valid: boolean;
  try {
    valid = ed25519Verify(null, Buffer.from(content, 'utf8'), publicKey, Buffer.from(signatureB64, 'base64'));
  } catch {
    // Wrong signature length or a non-Ed25519 key registered under keyId.
    valid = false;
  }

  return valid ? { ok: true, keyId, created } : { ok: false, reason: 'invalid_signature' };
}
