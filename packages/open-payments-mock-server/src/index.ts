/**
 * open-payments-mock-server — public API
 *
 * Exports:
 *   buildMockServer               In-memory Authorization Server, Resource Server and wallet host
 *   createSignatureVerification   Fastify plugin verifying Signature / Signature-Input headers
 *   signedRoute / signedHandler   Mark routes as requiring a signature
 *   verifyRequestSignature        The verification itself, without Fastify
 */

export { buildMockServer } from './server.js';
export type { MockServer, MockServerOptions, MockState } from './server.js';

export { createSignatureVerification, requestUrl } from './middleware.js';
export { signedRoute, signedHandler } from './route.js';
export type { SignedRouteOptions } from './route.js';

export { verifyRequestSignature, computeSigningString } from './signature.js';
export type { SignatureCheck, SignatureFailure, SignedRequestParts, VerifyOptions } from './signature.js';

export type {
  AccessRightBody,
  Amount,
  GrantRequestBody,
  MockWallet,
  SignatureVerificationOptions,
  StoredGrant,
  StoredIncomingPayment,
  StoredOutgoingPayment,
  StoredQuote,
  StoredToken,
} from './types.js';
