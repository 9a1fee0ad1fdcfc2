/**
 * createSignatureVerification — Fastify plugin that checks request signatures.
 *
 * Uses fastify-plugin to escape Fastify's scope encapsulation so that
 * hooks apply to ALL routes, not just routes registered inside the plugin.
 *
 * Usage:
 *   fastify.register(createSignatureVerification({ resolveKey }));
 *
 * Routes opt in via route config:
 *   fastify.post('/quotes', { config: { requireSignature: true } }, handler);
 *
 * or via the signedRoute / signedHandler helpers (see route.ts).
 */
import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import { Readable } from 'stream';
import { verifyRequestSignature } from './signature.js';
import type { SignatureVerificationOptions } from './types.js';

// Raw body bytes captured in preParsing; the digest covers exactly these.
declare module 'fastify' {
  interface FastifyRequest {
    rawBodyBytes?: Buffer;
  }
}

/** Absolute URL the client addressed, as it appears in the signing string. */
export function requestUrl(request: FastifyRequest): string {
  return `${request.protocol}://${request.headers.host ?? 'localhost'}${request.url}`;
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

const signaturePlugin: (options: SignatureVerificationOptions) => FastifyPluginAsync =
  (options) =>
  fp(async function signaturePluginImpl(fastify) {
    const maxSkewSeconds = options.maxSkewSeconds ?? 300;
    const clock = options.clock ?? (() => new Date());

    // ── 1. Capture raw body bytes ──────────────────────────────────────────
    // Intercept in preParsing, buffer the stream, then re-feed a fresh
    // Readable so Fastify's body parser can still consume it normally.
    fastify.addHook('preParsing', async (request, _reply, payload) => {
      const chunks: Buffer[] = [];
      for await (const chunk of payload as AsyncIterable<Buffer | string>) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
      }
      const raw = Buffer.concat(chunks);
      request.rawBodyBytes = raw;

      const readable = Readable.from(raw) as Readable & { receivedEncodedLength?: number };
      readable.receivedEncodedLength = raw.length;
      return readable;
    });

    // ── 2. Signature gate ──────────────────────────────────────────────────
    fastify.addHook('preHandler', async (request: FastifyRequest, reply: FastifyReply) => {
      if (!request.routeOptions.config.requireSignature) return;

      const check = verifyRequestSignature(
        {
          method: request.method,
          url: requestUrl(request),
          rawBody: request.rawBodyBytes ?? Buffer.alloc(0),
          signature: headerValue(request.headers['signature']),
          signatureInput: headerValue(request.headers['signature-input']),
        },
        { resolveKey: options.resolveKey, maxSkewSeconds, now: clock() },
      );

      if (!check.ok) {
        request.log.warn({ reason: check.reason, url: request.url }, 'signature rejected');
        reply.code(401).send({ error: 'invalid_client', reason: check.reason });
        return reply;
      }

      request.signatureKeyId = check.keyId;
    });
  });

/**
 * Returns a Fastify plugin (wrapped with fastify-plugin) that verifies the
 * Signature / Signature-Input headers on routes marked requireSignature.
 *
 * Must be registered before any signed routes.
 */
export const createSignatureVerification = signaturePlugin;
