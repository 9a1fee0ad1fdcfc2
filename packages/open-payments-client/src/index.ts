/**
 * open-payments-client — public API
 *
 * Exports:
 *   Signer           Ed25519 request signing (Signature / Signature-Input headers)
 *   GrantClient      GNAP grant negotiation: non-interactive, interactive, continue, rotate, revoke
 *   ResourceClient   Incoming / outgoing payments with a bearer token
 *   QuoteClient      Signed quote creation
 *   WalletLookup     Public wallet address metadata
 *   accessRight      Frozen AccessRight factory
 *   loadConfig       Environment configuration
 *   withClient       Close a client on every exit path
 *
 *   OpenPaymentsError and subclasses   Error taxonomy (see errors.ts)
 */

export { Signer, buildSigningString, contentDigest, parseSignatureHeader, SIGNATURE_ALGORITHM } from './signer.js';
export type { SignerOptions, ParsedSignature } from './signer.js';

export { GrantClient } from './grant.js';
export type { GrantClientOptions } from './grant.js';

export { ResourceClient } from './resources.js';
export type { ResourceClientOptions } from './resources.js';

export { QuoteClient } from './quotes.js';
export type { QuoteClientOptions } from './quotes.js';

export { WalletLookup } from './wallet.js';

export { accessRight, toGrantRequestBody } from './access.js';

export { HttpTransport, withClient, DEFAULT_TIMEOUT_MS } from './http.js';
export type { Closeable, HttpRequest, HttpResponse } from './http.js';

export { loadConfig } from './config.js';
export type { ClientConfig } from './config.js';

export { getRootLogger, componentLogger, maskToken } from './logger.js';

export {
  OpenPaymentsError,
  SigningError,
  ProtocolError,
  UnexpectedInteractionRequiredError,
  InvalidContinuationError,
  HttpError,
  ResourceRequestError,
  TokenExpiredError,
  TransportError,
  RequestValidationError,
  ConfigError,
  isOpenPaymentsError,
} from './errors.js';
export type { OpenPaymentsErrorCode, TransportErrorCode } from './errors.js';

export type {
  AccessRight,
  AccessRightType,
  AccessAction,
  AccessLimits,
  AccessToken,
  Amount,
  CallOptions,
  Continuation,
  GrantRequest,
  GrantRequestBody,
  GrantResponse,
  GrantedResponse,
  PendingInteractionResponse,
  GrantState,
  GrantTransition,
  IncomingPayment,
  InteractionHandle,
  InteractionRequest,
  OutgoingPayment,
  PaymentMetadata,
  Quote,
  QuoteAmount,
  SignedHeaders,
  SigningKey,
  TransportOptions,
  WalletAddress,
} from './types.js';
