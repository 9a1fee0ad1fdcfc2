/**
 * ResourceClient — token-authorized operations on the Resource Server.
 *
 * Every call sends `Authorization: GNAP <token>`. Requests are not signed at
 * this layer. Resource ids are full URLs and are read back verbatim.
 *
 * A 401 means the token expired or was revoked and surfaces as
 * TokenExpiredError; the caller re-runs grant negotiation.
 */
import type { Logger } from 'pino';
import type { ZodType, ZodTypeDef } from 'zod';
import { HttpError, ProtocolError, RequestValidationError, TokenExpiredError } from './errors.js';
import { HttpTransport } from './http.js';
import type { HttpRequest } from './http.js';
import { componentLogger } from './logger.js';
import { amountSchema, describeIssue, incomingPaymentSchema, outgoingPaymentSchema } from './schemas.js';
import type {
  AccessToken,
  Amount,
  CallOptions,
  IncomingPayment,
  OutgoingPayment,
  PaymentMetadata,
  TransportOptions,
} from './types.js';

export interface ResourceClientOptions extends TransportOptions {
  resourceServerUrl: string;
  /** Bearer token value, or the AccessToken returned by GrantClient */
  accessToken: string | AccessToken;
}

interface CreateIncomingPaymentBody {
  walletAddress: string;
  incomingAmount: Amount;
  expiresAt?: string;
  metadata?: PaymentMetadata;
}

interface CreateOutgoingPaymentBody {
  walletAddress: string;
  quoteId: string;
  metadata?: PaymentMetadata;
}

export class ResourceClient {
  readonly resourceServerUrl: string;
  private readonly token: string;
  private readonly transport: HttpTransport;
  private readonly log: Logger;

  constructor(options: ResourceClientOptions) {
    this.resourceServerUrl = options.resourceServerUrl.replace(/\/$/, '');
    this.token = typeof options.accessToken === 'string' ? options.accessToken : options.accessToken.value;
    if (!this.token) {
      throw new RequestValidationError('accessToken must not be empty', 'accessToken');
    }
    this.log = componentLogger('resource-client', options.logger);
    this.transport = new HttpTransport({ ...options, logger: this.log });
  }

  async createIncomingPayment(
    walletAddress: string,
    incomingAmount: Amount,
    expiresAt?: string,
    metadata?: PaymentMetadata,
    options: CallOptions = {},
  ): Promise<IncomingPayment> {
    requireAmount(incomingAmount, 'incomingAmount');
    const payload: CreateIncomingPaymentBody = {
      walletAddress,
      incomingAmount,
      ...(expiresAt !== undefined && { expiresAt }),
      ...(metadata !== undefined && { metadata }),
    };

    const url = `${this.resourceServerUrl}/incoming-payments`;
    const created = await this.call(
      { method: 'POST', url, body: JSON.stringify(payload), signal: options.signal },
      incomingPaymentSchema,
    );

    this.log.info({ id: created.id, walletAddress }, 'incoming payment created');
    // Echo what was asked for when the server leaves it out.
    return {
      ...created,
      walletAddress: created.walletAddress ?? walletAddress,
      incomingAmount: created.incomingAmount ?? incomingAmount,
      ...(created.expiresAt === undefined && expiresAt !== undefined && { expiresAt }),
      ...(created.metadata === undefined && metadata !== undefined && { metadata }),
    };
  }

  async getIncomingPayment(resourceUrl: string, options: CallOptions = {}): Promise<IncomingPayment> {
    requireResourceUrl(resourceUrl);
    const payment = await this.call({ method: 'GET', url: resourceUrl, signal: options.signal }, incomingPaymentSchema);
    this.log.info({ id: payment.id, completed: payment.completed }, 'incoming payment fetched');
    return payment;
  }

  async createOutgoingPayment(
    walletAddress: string,
    quoteId: string,
    metadata?: PaymentMetadata,
    options: CallOptions = {},
  ): Promise<OutgoingPayment> {
    if (!quoteId) {
      throw new RequestValidationError('quoteId must not be empty', 'quoteId');
    }
    const payload: CreateOutgoingPaymentBody = {
      walletAddress,
      quoteId,
      ...(metadata !== undefined && { metadata }),
    };

    const url = `${this.resourceServerUrl}/outgoing-payments`;
    const created = await this.call(
      { method: 'POST', url, body: JSON.stringify(payload), signal: options.signal },
      outgoingPaymentSchema,
    );

    this.log.info({ id: created.id, walletAddress, sentAmount: created.sentAmount }, 'outgoing payment created');
    return {
      ...created,
      walletAddress: created.walletAddress ?? walletAddress,
      quoteId: created.quoteId ?? quoteId,
      ...(created.metadata === undefined && metadata !== undefined && { metadata }),
    };
  }

  async getOutgoingPayment(resourceUrl: string, options: CallOptions = {}): Promise<OutgoingPayment> {
    requireResourceUrl(resourceUrl);
    const payment = await this.call({ method: 'GET', url: resourceUrl, signal: options.signal }, outgoingPaymentSchema);
    this.log.info({ id: payment.id, failed: payment.failed }, 'outgoing payment fetched');
    return payment;
  }

  close(): void {
    this.transport.close();
  }

  private async call<T>(
    request: Omit<HttpRequest, 'headers'>,
    schema: ZodType<T, ZodTypeDef, unknown>,
  ): Promise<T> {
    const headers: Record<string, string> = {
      authorization: `GNAP ${this.token}`,
      accept: 'application/json',
    };
    if (request.body !== undefined) {
      headers['content-type'] = 'application/json';
    }

    let body: unknown;
    try {
      ({ body } = await this.transport.send({ ...request, headers }));
    } catch (error) {
      if (error instanceof HttpError && error.status === 401) {
        this.log.warn({ url: request.url }, 'access token rejected');
        throw new TokenExpiredError(request.url, error.body);
      }
      throw error;
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new ProtocolError(`Malformed resource response: ${describeIssue(parsed.error)}`, {
        url: request.url,
        body,
      });
    }
    return parsed.data;
  }
}

function requireAmount(amount: Amount, field: string): void {
  const parsed = amountSchema.safeParse(amount);
  if (!parsed.success) {
    throw new RequestValidationError(`Invalid ${field}: ${describeIssue(parsed.error)}`, field);
  }
}

function requireResourceUrl(resourceUrl: string): void {
  try {
    new URL(resourceUrl);
  } catch {
    throw new RequestValidationError(
      `Resource id must be the full URL returned by the server, got "${resourceUrl}"`,
      'resourceUrl',
    );
  }
}
