/**
 * buildMockServer — one Fastify app playing Authorization Server, Resource
 * Server and wallet host.
 *
 * Authorization Server
 *   POST   /                  signed grant request
 *   GET    /interact/:id      user consent (redirects to the client's finish URI)
 *   POST   /continue/:id      GNAP <continue token>
 *   POST   /token/:id         rotate (GNAP <access token>)
 *   DELETE /token/:id         revoke
 *
 * Resource Server (GNAP <access token>)
 *   POST   /incoming-payments          GET /incoming-payments/:id
 *   POST   /outgoing-payments          GET /outgoing-payments/:id
 *   POST   /quotes                     signed; bearer token optional
 *
 * Wallet host
 *   GET    /:wallet
 *
 * Grants for `interactiveTypes` (default: outgoing-payment) always come back
 * pending, even when the request carried no interact block.
 */
import { createHash, randomBytes, randomUUID } from 'crypto';
import type { KeyObject } from 'crypto';
import Fastify from 'fastify';
import type { FastifyInstance, FastifyReply, FastifyRequest, FastifyServerOptions } from 'fastify';
import { createSignatureVerification } from './middleware.js';
import { signedHandler, signedRoute } from './route.js';
import type {
  AccessAction,
  AccessRightBody,
  AccessRightType,
  Amount,
  GrantRequestBody,
  MockWallet,
  StoredGrant,
  StoredIncomingPayment,
  StoredOutgoingPayment,
  StoredQuote,
  StoredToken,
} from './types.js';

export interface MockServerOptions {
  /** keyId → registered Ed25519 public key */
  keys: Map<string, KeyObject>;
  wallets?: MockWallet[];
  interactiveTypes?: AccessRightType[];
  /** Default: 600 */
  tokenTtlSeconds?: number;
  /** Default: 300 */
  quoteTtlSeconds?: number;
  /** Forwarded to the signature plugin. Default: 300 */
  maxSkewSeconds?: number;
  clock?: () => Date;
  logger?: FastifyServerOptions['logger'];
}

export interface MockState {
  grants: Map<string, StoredGrant>;
  tokens: Map<string, StoredToken>;
  incomingPayments: Map<string, StoredIncomingPayment>;
  outgoingPayments: Map<string, StoredOutgoingPayment>;
  quotes: Map<string, StoredQuote>;
}

export interface MockServer {
  app: FastifyInstance;
  state: MockState;
  /** Approve a pending grant by id or redirect URL; returns the interact_ref. */
  approveGrant(grantIdOrRedirectUrl: string): string;
  denyGrant(grantIdOrRedirectUrl: string): void;
}

const DEFAULT_WALLETS: MockWallet[] = [
  { name: 'alice', publicName: 'Alice', assetCode: 'USD', assetScale: 2 },
  { name: 'bob', publicName: 'Bob', assetCode: 'USD', assetScale: 2 },
];

// ─── Route shapes (bodies are checked by the JSON schemas below) ─────────────

interface GrantRoute {
  Body: GrantRequestBody;
}

interface ByIdRoute {
  Params: { id: string };
}

interface ContinueRoute {
  Params: { id: string };
  Body: { interact_ref?: unknown } | undefined;
}

interface IncomingPaymentRoute {
  Body: {
    walletAddress: string;
    incomingAmount: Amount;
    expiresAt?: string;
    metadata?: Record<string, unknown>;
  };
}

interface OutgoingPaymentRoute {
  Body: { walletAddress: string; quoteId: string; metadata?: Record<string, unknown> };
}

// ─── JSON schemas ────────────────────────────────────────────────────────────

const amountJsonSchema = {
  type: 'object',
  required: ['value', 'assetCode', 'assetScale'],
  properties: {
    value: { type: 'string', pattern: '^[0-9]+$' },
    assetCode: { type: 'string', minLength: 1 },
    assetScale: { type: 'integer', minimum: 0 },
  },
} as const;

const grantRequestJsonSchema = {
  type: 'object',
  required: ['access_token', 'client'],
  properties: {
    access_token: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        required: ['type', 'actions'],
        properties: {
          type: { type: 'string', enum: ['incoming-payment', 'quote', 'outgoing-payment'] },
          actions: {
            type: 'array',
            minItems: 1,
            items: { type: 'string', enum: ['create', 'read', 'update', 'list'] },
          },
          identifier: { type: 'string' },
          limits: { type: 'object' },
        },
      },
    },
    client: { type: 'string', minLength: 1 },
    interact: { type: 'object' },
  },
} as const;

function gnapToken(request: FastifyRequest): string | undefined {
  const header = request.headers.authorization;
  if (!header?.startsWith('GNAP ')) return undefined;
  return header.slice('GNAP '.length).trim() || undefined;
}

function baseUrlOf(request: FastifyRequest): string {
  return `${request.protocol}://${request.headers.host ?? 'localhost'}`;
}

function newSecret(): string {
  return randomBytes(24).toString('base64url');
}

function addAmounts(a: Amount, b: Amount): Amount {
  return { ...a, value: (BigInt(a.value) + BigInt(b.value)).toString() };
}

export async function buildMockServer(options: MockServerOptions): Promise<MockServer> {
  const clock = options.clock ?? (() => new Date());
  const wallets = options.wallets ?? DEFAULT_WALLETS;
  const interactiveTypes = new Set<AccessRightType>(options.interactiveTypes ?? ['outgoing-payment']);
  const tokenTtlSeconds = options.tokenTtlSeconds ?? 600;
  const quoteTtlSeconds = options.quoteTtlSeconds ?? 300;

  const state: MockState = {
    grants: new Map(),
    tokens: new Map(),
    incomingPayments: new Map(),
    outgoingPayments: new Map(),
    quotes: new Map(),
  };

  const fastify = Fastify({ logger: options.logger ?? false });

  await fastify.register(
    createSignatureVerification({
      resolveKey: (keyId) => options.keys.get(keyId),
      maxSkewSeconds: options.maxSkewSeconds,
      clock,
    }),
  );

  function issueToken(base: string, access: AccessRightBody[]) {
    const token: StoredToken = {
      id: randomUUID(),
      value: newSecret(),
      access,
      expiresAt: clock().getTime() + tokenTtlSeconds * 1000,
      revoked: false,
    };
    state.tokens.set(token.id, token);
    return {
      value: token.value,
      manage: `${base}/token/${token.id}`,
      expires_in: tokenTtlSeconds,
      access,
    };
  }

  /**
   * Resolve the bearer token and check it covers type/action. Sends 401 for
   * an unknown, expired or revoked token and 403 for a missing right.
   */
  function authorize(
    request: FastifyRequest,
    reply: FastifyReply,
    type: AccessRightType,
    action: AccessAction,
  ): StoredToken | undefined {
    const value = gnapToken(request);
    const token = value === undefined ? undefined : [...state.tokens.values()].find((t) => t.value === value);

    if (!token || token.revoked || (token.expiresAt !== undefined && token.expiresAt <= clock().getTime())) {
      reply.code(401).send({ error: 'invalid_token' });
      return undefined;
    }
    if (!token.access.some((right) => right.type === type && right.actions.includes(action))) {
      reply.code(403).send({ error: 'insufficient_scope', required: { type, action } });
      return undefined;
    }
    return token;
  }

  function findGrant(grantIdOrRedirectUrl: string): StoredGrant {
    const id = grantIdOrRedirectUrl.split('/').pop() ?? grantIdOrRedirectUrl;
    const grant = state.grants.get(id);
    if (!grant) throw new Error(`Unknown grant: ${grantIdOrRedirectUrl}`);
    return grant;
  }

  function approve(grant: StoredGrant): string {
    if (grant.status !== 'pending') throw new Error(`Grant ${grant.id} is ${grant.status}, not pending`);
    grant.status = 'approved';
    grant.interactRef = randomUUID();
    return grant.interactRef;
  }

  // ── Authorization Server ─────────────────────────────────────────────────

  fastify.post<GrantRoute>('/', { ...signedHandler(), schema: { body: grantRequestJsonSchema } }, async (request) => {
    const { body } = request;
    const base = baseUrlOf(request);

    const needsInteraction = body.access_token.some((right) => interactiveTypes.has(right.type));
    if (!needsInteraction) {
      return { access_token: issueToken(base, body.access_token) };
    }

    const grant: StoredGrant = {
      id: randomUUID(),
      client: body.client,
      keyId: request.signatureKeyId ?? '',
      access: body.access_token,
      status: 'pending',
      continueToken: newSecret(),
      ...(body.interact?.finish && {
        finish: { uri: body.interact.finish.uri, nonce: body.interact.finish.nonce },
      }),
    };
    state.grants.set(grant.id, grant);

    return {
      interact: {
        redirect: `${base}/interact/${grant.id}`,
        finish: randomUUID(),
      },
      continue: {
        uri: `${base}/continue/${grant.id}`,
        access_token: { value: grant.continueToken },
        wait: 5,
      },
    };
  });

  fastify.get<ByIdRoute>('/interact/:id', async (request, reply) => {
    const { id } = request.params;
    const grant = state.grants.get(id);
    if (!grant || grant.status !== 'pending') {
      reply.code(404).send({ error: 'unknown_interaction' });
      return;
    }

    const interactRef = approve(grant);
    if (!grant.finish) {
      return { approved: true, interact_ref: interactRef };
    }

    const hash = createHash('sha256')
      .update(`${grant.finish.nonce}\n${interactRef}\n${baseUrlOf(request)}/`)
      .digest('base64');
    const target = new URL(grant.finish.uri);
    target.searchParams.set('interact_ref', interactRef);
    target.searchParams.set('hash', hash);
    return reply.redirect(302, target.toString());
  });

  fastify.post<ContinueRoute>('/continue/:id', async (request, reply) => {
    const { id } = request.params;
    const grant = state.grants.get(id);
    if (!grant || gnapToken(request) !== grant.continueToken) {
      reply.code(401).send({ error: 'invalid_continuation' });
      return;
    }

    if (grant.status === 'pending') {
      reply.code(400).send({ error: 'too_fast', wait: 5 });
      return;
    }
    if (grant.status === 'denied') {
      reply.code(403).send({ error: 'user_denied' });
      return;
    }
    if (grant.status === 'finalized') {
      reply.code(400).send({ error: 'invalid_continuation', reason: 'grant already finalized' });
      return;
    }

    const interactRef = request.body?.interact_ref;
    if (interactRef !== undefined && interactRef !== grant.interactRef) {
      reply.code(400).send({ error: 'invalid_interaction' });
      return;
    }

    grant.status = 'finalized';
    return { access_token: issueToken(baseUrlOf(request), grant.access) };
  });

  fastify.post<ByIdRoute>('/token/:id', async (request, reply) => {
    const { id } = request.params;
    const token = state.tokens.get(id);
    if (!token || token.revoked || gnapToken(request) !== token.value) {
      reply.code(401).send({ error: 'invalid_token' });
      return;
    }

    token.revoked = true;
    return { access_token: issueToken(baseUrlOf(request), token.access) };
  });

  fastify.delete<ByIdRoute>('/token/:id', async (request, reply) => {
    const { id } = request.params;
    const token = state.tokens.get(id);
    if (!token || gnapToken(request) !== token.value) {
      reply.code(401).send({ error: 'invalid_token' });
      return;
    }

    token.revoked = true;
    reply.code(204).send();
  });

  // ── Resource Server ──────────────────────────────────────────────────────

  fastify.post<IncomingPaymentRoute>(
    '/incoming-payments',
    {
      schema: {
        body: {
          type: 'object',
          required: ['walletAddress', 'incomingAmount'],
          properties: {
            walletAddress: { type: 'string' },
            incomingAmount: amountJsonSchema,
            expiresAt: { type: 'string' },
            metadata: { type: 'object' },
          },
        },
      },
    },
    async (request, reply) => {
      if (!authorize(request, reply, 'incoming-payment', 'create')) return;
      const { body } = request;

      const now = clock().toISOString();
      const payment: StoredIncomingPayment = {
        id: `${baseUrlOf(request)}/incoming-payments/${randomUUID()}`,
        walletAddress: body.walletAddress,
        incomingAmount: body.incomingAmount,
        receivedAmount: { ...body.incomingAmount, value: '0' },
        completed: false,
        ...(body.expiresAt !== undefined && { expiresAt: body.expiresAt }),
        ...(body.metadata !== undefined && { metadata: body.metadata }),
        createdAt: now,
        updatedAt: now,
      };
      state.incomingPayments.set(payment.id, payment);

      reply.code(201);
      return payment;
    },
  );

  fastify.get('/incoming-payments/:id', async (request, reply) => {
    if (!authorize(request, reply, 'incoming-payment', 'read')) return;
    const payment = state.incomingPayments.get(`${baseUrlOf(request)}${request.url}`);
    if (!payment) {
      reply.code(404).send({ error: 'not_found' });
      return;
    }
    return payment;
  });

  fastify.route(
    signedRoute({
      method: 'POST',
      url: '/quotes',
      schema: {
        body: {
          type: 'object',
          required: ['walletAddress', 'method'],
          properties: {
            walletAddress: { type: 'string' },
            method: { type: 'string', enum: ['ilp'] },
            sendAmount: amountJsonSchema,
            receiveAmount: amountJsonSchema,
          },
        },
      },
      handler: async (request, reply) => {
        if (request.headers.authorization && !authorize(request, reply, 'quote', 'create')) return;
        const body = request.body as { walletAddress: string; sendAmount?: Amount; receiveAmount?: Amount };

        // Exactly one side fixed; the mock converts 1:1 with no fee.
        const fixed = body.sendAmount ?? body.receiveAmount;
        if (!fixed || (body.sendAmount && body.receiveAmount)) {
          reply.code(400).send({ error: 'invalid_request', reason: 'exactly one of sendAmount or receiveAmount' });
          return;
        }

        const now = clock();
        const quote: StoredQuote = {
          id: `${baseUrlOf(request)}/quotes/${randomUUID()}`,
          walletAddress: body.walletAddress,
          receiver: body.walletAddress,
          method: 'ilp',
          sendAmount: fixed,
          receiveAmount: fixed,
          expiresAt: new Date(now.getTime() + quoteTtlSeconds * 1000).toISOString(),
          createdAt: now.toISOString(),
        };
        state.quotes.set(quote.id, quote);

        reply.code(201);
        return quote;
      },
    }),
  );

  fastify.post<OutgoingPaymentRoute>(
    '/outgoing-payments',
    {
      schema: {
        body: {
          type: 'object',
          required: ['walletAddress', 'quoteId'],
          properties: {
            walletAddress: { type: 'string' },
            quoteId: { type: 'string' },
            metadata: { type: 'object' },
          },
        },
      },
    },
    async (request, reply) => {
      if (!authorize(request, reply, 'outgoing-payment', 'create')) return;
      const { body } = request;

      const quote = state.quotes.get(body.quoteId);
      if (!quote || new Date(quote.expiresAt).getTime() <= clock().getTime()) {
        reply.code(400).send({ error: 'invalid_quote' });
        return;
      }

      const now = clock().toISOString();
      const payment: StoredOutgoingPayment = {
        id: `${baseUrlOf(request)}/outgoing-payments/${randomUUID()}`,
        walletAddress: body.walletAddress,
        quoteId: quote.id,
        sendAmount: quote.sendAmount,
        receiveAmount: quote.receiveAmount,
        sentAmount: quote.sendAmount,
        failed: false,
        ...(body.metadata !== undefined && { metadata: body.metadata }),
        createdAt: now,
        updatedAt: now,
      };
      state.outgoingPayments.set(payment.id, payment);
      settle(quote.receiver, quote.receiveAmount, now);

      reply.code(201);
      return payment;
    },
  );

  fastify.get('/outgoing-payments/:id', async (request, reply) => {
    if (!authorize(request, reply, 'outgoing-payment', 'read')) return;
    const payment = state.outgoingPayments.get(`${baseUrlOf(request)}${request.url}`);
    if (!payment) {
      reply.code(404).send({ error: 'not_found' });
      return;
    }
    return payment;
  });

  /** Credit the oldest open incoming payment on the receiving wallet. */
  function settle(receiver: string, amount: Amount, at: string): void {
    const target = [...state.incomingPayments.values()].find(
      (payment) => payment.walletAddress === receiver && !payment.completed,
    );
    if (!target) return;

    target.receivedAmount = addAmounts(target.receivedAmount, amount);
    target.completed = BigInt(target.receivedAmount.value) >= BigInt(target.incomingAmount.value);
    target.updatedAt = at;
  }

  // ── Wallet host ──────────────────────────────────────────────────────────

  fastify.get<{ Params: { wallet: string } }>('/:wallet', async (request, reply) => {
    const { wallet: name } = request.params;
    const wallet = wallets.find((w) => w.name === name);
    if (!wallet) {
      reply.code(404).send({ error: 'unknown_wallet' });
      return;
    }

    const base = baseUrlOf(request);
    return {
      id: `${base}/${wallet.name}`,
      ...(wallet.publicName !== undefined && { publicName: wallet.publicName }),
      assetCode: wallet.assetCode,
      assetScale: wallet.assetScale,
      authServer: base,
      resourceServer: base,
    };
  });

  await fastify.ready();

  return {
    app: fastify,
    state,
    approveGrant: (ref) => approve(findGrant(ref)),
    denyGrant: (ref) => {
      findGrant(ref).status = 'denied';
    },
  };
}
