/**
 * Request signing.
 *
 * signing string =
 *   METHOD           + "\n" +
 *   URL              + "\n" +
 *   TIMESTAMP                     ← ISO-8601 UTC, e.g. 2026-01-01T00:00:00.000Z
 *   [ + "\n" + base64(SHA-256(BODY)) ]   ← only when a body is sent
 *
 * The UTF-8 bytes of that string are signed with Ed25519 and sent as
 *   Signature:       keyId="<id>",algorithm="ed25519",signature="<b64>"
 *   Signature-Input: sig1=();created=<timestamp>
 *
 * Headers are produced per send attempt. A retry must call sign() again.
 */
import { createHash, sign as ed25519Sign } from 'crypto';
import { SigningError } from './errors.js';
import type { SignedHeaders, SigningKey } from './types.js';

export const SIGNATURE_ALGORITHM = 'ed25519';

const KEY_ID_PATTERN = /^[^"\\\x00-\x1f\x7f]+$/;

export interface SignerOptions {
  /** Clock used for the signed timestamp. Default: () => new Date() */
  clock?: () => Date;
}

export interface ParsedSignature {
  keyId: string;
  algorithm: string;
  signature: string;
}

/** base64(SHA-256(body)) */
export function contentDigest(body: string): string {
  return createHash('sha256').update(body, 'utf8').digest('base64');
}

export function buildSigningString(method: string, url: string, timestamp: string, body?: string): string {
  let content = `${method.toUpperCase()}\n${url}\n${timestamp}`;
  if (body) {
    content += `\n${contentDigest(body)}`;
  }
  return content;
}

/** Parse a Signature header back into its parts. Returns null when malformed. */
export function parseSignatureHeader(header: string): ParsedSignature | null {
  const params = new Map<string, string>();
  for (const match of header.matchAll(/(\w+)="([^"]*)"/g)) {
    const [, key, value] = match;
    if (key !== undefined && value !== undefined) params.set(key, value);
  }

  const keyId = params.get('keyId');
  const algorithm = params.get('algorithm');
  const signature = params.get('signature');
  if (!keyId || !algorithm || !signature) return null;

  return { keyId, algorithm, signature };
}

export class Signer {
  readonly keyId: string;
  private readonly key: SigningKey;
  private readonly clock: () => Date;

  constructor(key: SigningKey, options: SignerOptions = {}) {
    // keyId is written into a quoted header parameter
    if (!KEY_ID_PATTERN.test(key.keyId)) {
      throw new SigningError(`Invalid keyId ${JSON.stringify(key.keyId)}: empty, or contains a quote or control character`);
    }
    this.key = key;
    this.keyId = key.keyId;
    this.clock = options.clock ?? (() => new Date());
  }

  sign(method: string, url: string, body?: string): SignedHeaders {
    const { privateKey, keyId } = this.key;

    if (privateKey.type !== 'private' || privateKey.asymmetricKeyType !== SIGNATURE_ALGORITHM) {
      throw new SigningError(
        `Key "${keyId}" is not an Ed25519 private key (type=${privateKey.type}, algorithm=${privateKey.asymmetricKeyType ?? 'unknown'})`,
      );
    }

    const timestamp = this.clock().toISOString();
    const content = buildSigningString(method, url, timestamp, body);

    let signatureBytes: Buffer;
    try {
      // Ed25519 hashes internally; the digest argument must be null.
      signatureBytes = ed25519Sign(null, Buffer.from(content, 'utf8'), privateKey);
    } catch (error) {
      throw new SigningError(`Key "${keyId}" failed to produce a signature`, error);
    }

    const signatureB64 = signatureBytes.toString('base64');
    const signature = `keyId="${keyId}",algorithm="${SIGNATURE_ALGORITHM}",signature="${signatureB64}"`;
    const signatureInput = `sig1=();created=${timestamp}`;

    const headers: Record<string, string> = {
      signature,
      'signature-input': signatureInput,
    };
    if (body) {
      headers['content-type'] = 'application/json';
    }

    return { signature, signatureInput, timestamp, headers };
  }
}
