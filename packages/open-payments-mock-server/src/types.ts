/**
 * open-payments-mock-server — shared types
 *
 * The server keeps every object in memory. Ids are absolute URLs built from
 * the Host header of the request that created them.
 */
import type { KeyObject } from 'crypto';

// ─── Mirrors of the client wire types (structural, not imported) ────────────

export type AccessRightType = 'incoming-payment' | 'quote' | 'outgoing-payment';
export type AccessAction = 'create' | 'read' | 'update' | 'list';

export interface AccessRightBody {
  type: AccessRightType;
  actions: AccessAction[];
  identifier?: string;
  limits?: Record<string, unknown>;
}

export interface GrantRequestBody {
  access_token: AccessRightBody[];
  client: string;
  interact?: {
    start: string[];
    finish?: { method: string; uri: string; nonce: string };
  };
}

export interface Amount {
  value: string;
  assetCode: string;
  assetScale: number;
}

// ─── Stored state ────────────────────────────────────────────────────────────

export interface StoredToken {
  id: string;
  value: string;
  access: AccessRightBody[];
  /** Epoch ms; undefined = no expiry */
  expiresAt?: number;
  revoked: boolean;
}

export interface StoredGrant {
  id: string;
  client: string;
  keyId: string;
  access: AccessRightBody[];
  status: 'pending' | 'approved' | 'finalized' | 'denied';
  continueToken: string;
  finish?: { uri: string; nonce: string };
  interactRef?: string;
}

export interface StoredIncomingPayment {
  id: string;
  walletAddress: string;
  incomingAmount: Amount;
  receivedAmount: Amount;
  completed: boolean;
  expiresAt?: string;
  metadata?: Record<string, unknown>;
  createdAt: string;
  updatedAt: string;
}

export interface StoredQuote {
  id: string;
  walletAddress: string;
  receiver: string;
  method: 'ilp';
  sendAmount: Amount;
  receiveAmount: Amount;
  expiresAt: string;
  createdAt: string;
}

export interface StoredOutgoingPayment {
  id: string;
  walletAddress: string;
  quoteId: string;
  sendAmount: Amount;
  receiveAmount: Amount;
  sentAmount: Amount;
  failed: boolean;
  metadata?: Record<string, unknown>;
  createdAt: string;
  updatedAt: string;
}

export interface MockWallet {
  /** Path segment, e.g. "alice" → GET /alice */
  name: string;
  publicName?: string;
  assetCode: string;
  assetScale: number;
}

// ─── Options ─────────────────────────────────────────────────────────────────

export interface SignatureVerificationOptions {
  /** Look up the public key registered for a keyId */
  resolveKey: (keyId: string) => KeyObject | undefined;
  /**
   * Reject signatures whose created timestamp is further than this from now.
   * Default: 300. 0 disables the check.
   */
  maxSkewSeconds?: number;
  /** Default: () => new Date() */
  clock?: () => Date;
}

// ─── Route config augmentation ───────────────────────────────────────────────

declare module 'fastify' {
  interface FastifyContextConfig {
    requireSignature?: boolean;
  }
  interface FastifyRequest {
    /** keyId of a verified Signature header */
    signatureKeyId?: string;
  }
}
