/**
 * Response schemas. Every server payload passes through one of these before
 * a component trusts it; a mismatch becomes a ProtocolError at the call site.
 */
import { z } from 'zod';

export const ACCESS_RIGHT_TYPES = ['incoming-payment', 'quote', 'outgoing-payment'] as const;
export const ACCESS_ACTIONS = ['create', 'read', 'update', 'list'] as const;

export const amountSchema = z.object({
  value: z.string().regex(/^\d+$/, 'must be a non-negative integer string'),
  assetCode: z.string().min(1),
  assetScale: z.number().int().min(0).max(255),
});

export const accessRightSchema = z.object({
  type: z.enum(ACCESS_RIGHT_TYPES),
  actions: z.array(z.enum(ACCESS_ACTIONS)).nonempty(),
  identifier: z.string().url().optional(),
  limits: z.record(z.unknown()).optional(),
});

const tokenSchema = z.object({
  value: z.string().min(1),
  manage: z.string().min(1),
  expires_in: z.number().int().nonnegative().optional(),
  access: z.array(accessRightSchema).optional(),
});

export const grantResponseSchema = z.object({
  // A single token object, or an array when several were issued.
  access_token: z.union([tokenSchema, z.array(tokenSchema).nonempty()]).optional(),
  interact: z
    .object({
      redirect: z.string().min(1),
      finish: z.string().optional(),
    })
    .optional(),
  continue: z
    .object({
      uri: z.string().min(1),
      access_token: z.object({ value: z.string().min(1) }),
      wait: z.number().int().nonnegative().optional(),
    })
    .optional(),
});

export type GrantResponseBody = z.infer<typeof grantResponseSchema>;
export type TokenBody = z.infer<typeof tokenSchema>;

/** Response to POST <manageUrl> (rotation). */
export const rotatedTokenSchema = z.object({ access_token: tokenSchema });

const metadataSchema = z.record(z.unknown());

export const incomingPaymentSchema = z.object({
  id: z.string().min(1),
  walletAddress: z.string().optional(),
  incomingAmount: amountSchema.optional(),
  receivedAmount: amountSchema.optional(),
  completed: z.boolean().default(false),
  expiresAt: z.string().optional(),
  metadata: metadataSchema.optional(),
  createdAt: z.string().optional(),
  updatedAt: z.string().optional(),
});

export const outgoingPaymentSchema = z.object({
  id: z.string().min(1),
  walletAddress: z.string().optional(),
  quoteId: z.string().optional(),
  sendAmount: amountSchema.optional(),
  receiveAmount: amountSchema.optional(),
  sentAmount: amountSchema.optional(),
  failed: z.boolean().default(false),
  metadata: metadataSchema.optional(),
  createdAt: z.string().optional(),
  updatedAt: z.string().optional(),
});

export const quoteSchema = z.object({
  id: z.string().min(1),
  walletAddress: z.string().optional(),
  receiver: z.string().optional(),
  method: z.string().optional(),
  sendAmount: amountSchema.optional(),
  receiveAmount: amountSchema.optional(),
  expiresAt: z.string().optional(),
  createdAt: z.string().optional(),
});

export const walletAddressSchema = z.object({
  id: z.string().url(),
  publicName: z.string().optional(),
  assetCode: z.string().min(1),
  assetScale: z.number().int().min(0),
  authServer: z.string().url(),
  resourceServer: z.string().url(),
});

/** First issue of a failed parse, formatted as "path: message". */
export function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'invalid value';
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}
