/**
 * open-payments-client — types
 *
 * Wire-format objects use the protocol's JSON field names (snake_case for
 * GNAP, camelCase for Open Payments resources). Everything the client hands
 * back to callers is camelCase.
 */
import type { KeyObject } from 'crypto';
import type { Logger } from 'pino';

// ─── Access rights ───────────────────────────────────────────────────────────

export type AccessRightType = 'incoming-payment' | 'quote' | 'outgoing-payment';

export type AccessAction = 'create' | 'read' | 'update' | 'list';

/** Opaque numeric/asset constraints forwarded to the Authorization Server. */
export type AccessLimits = Readonly<Record<string, unknown>>;

export interface AccessRight {
  readonly type: AccessRightType;
  /** Never empty. */
  readonly actions: readonly [AccessAction, ...AccessAction[]];
  /** URL scoping the right to one resource instance */
  readonly identifier?: string;
  readonly limits?: AccessLimits;
}

// ─── Grant negotiation ───────────────────────────────────────────────────────

export interface InteractionRequest {
  redirectUri: string;
  nonce: string;
}

export interface GrantRequest {
  accessRights: readonly AccessRight[];
  clientId: string;
  interaction?: InteractionRequest;
}

/** JSON body of `POST /` on the Authorization Server. */
export interface GrantRequestBody {
  access_token: Array<{
    type: AccessRightType;
    actions: AccessAction[];
    identifier?: string;
    limits?: AccessLimits;
  }>;
  client: string;
  interact?: {
    start: ['redirect'];
    finish: {
      method: 'redirect';
      uri: string;
      nonce: string;
    };
  };
}

export interface AccessToken {
  /** Bearer secret. Never log this in full (see maskToken). */
  value: string;
  manageUrl: string;
  expiresInSeconds?: number;
  /** Rights actually granted; may be a subset of those requested. */
  access: AccessRight[];
}

export interface InteractionHandle {
  redirectUrl: string;
  /** Server nonce used to compute the redirect hash on finish */
  finishNonce?: string;
}

export interface Continuation {
  uri: string;
  accessToken: string;
  waitSeconds?: number;
}

export interface GrantedResponse {
  status: 'granted';
  accessToken: AccessToken;
  continuation?: Continuation;
}

export interface PendingInteractionResponse {
  status: 'pending_interaction';
  interaction: InteractionHandle;
  continuation?: Continuation;
}

export type GrantResponse = GrantedResponse | PendingInteractionResponse;

export type GrantState =
  | 'BUILDING'
  | 'SENT'
  | 'GRANTED'
  | 'PENDING_INTERACTION'
  | 'CONTINUING'
  | 'FAILED';

export interface GrantTransition {
  /** Identifies one negotiation attempt across its transitions */
  attempt: number;
  from: GrantState | null;
  to: GrantState;
}

// ─── Payment resources ───────────────────────────────────────────────────────

export interface Amount {
  /** Integer amount in the asset's smallest unit, as a string */
  value: string;
  assetCode: string;
  assetScale: number;
}

export type PaymentMetadata = Record<string, unknown>;

export interface IncomingPayment {
  /** Full resource URL; reuse verbatim for reads. */
  id: string;
  walletAddress?: string;
  incomingAmount?: Amount;
  receivedAmount?: Amount;
  completed: boolean;
  expiresAt?: string;
  metadata?: PaymentMetadata;
  createdAt?: string;
  updatedAt?: string;
}

export interface OutgoingPayment {
  id: string;
  walletAddress?: string;
  quoteId?: string;
  sendAmount?: Amount;
  receiveAmount?: Amount;
  sentAmount?: Amount;
  failed: boolean;
  metadata?: PaymentMetadata;
  createdAt?: string;
  updatedAt?: string;
}

export interface Quote {
  id: string;
  walletAddress?: string;
  receiver?: string;
  method?: string;
  sendAmount?: Amount;
  receiveAmount?: Amount;
  expiresAt?: string;
  createdAt?: string;
}

/** Exactly one side of the quote is fixed. */
export type QuoteAmount =
  | { sendAmount: Amount; receiveAmount?: never }
  | { receiveAmount: Amount; sendAmount?: never };

export interface WalletAddress {
  id: string;
  publicName?: string;
  assetCode: string;
  assetScale: number;
  authServer: string;
  resourceServer: string;
}

// ─── Signing ─────────────────────────────────────────────────────────────────

/** Loaded Ed25519 key plus the id of its public half on record with the server. */
export interface SigningKey {
  keyId: string;
  privateKey: KeyObject;
}

export interface SignedHeaders {
  signature: string;
  signatureInput: string;
  /** ISO-8601 UTC creation time embedded in the signed content */
  timestamp: string;
  /** Ready-to-send header map (includes content-type when a body is signed) */
  headers: Record<string, string>;
}

// ─── Client options ──────────────────────────────────────────────────────────

export interface TransportOptions {
  /** Per-request timeout. Default: 30 000 ms */
  timeoutMs?: number;
  /** Replaces the global fetch (tests, proxies) */
  fetchImpl?: typeof fetch;
  /** Parent logger; each component derives a named child */
  logger?: Logger;
}

export interface CallOptions {
  /** Cancels this call only */
  signal?: AbortSignal;
}
