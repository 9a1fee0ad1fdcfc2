/**
 * QuoteClient — signed quote creation on the sending wallet's host.
 *
 *   POST {baseUrl}/quotes
 *   { "walletAddress": <receiver>, "method": "ilp", "sendAmount" | "receiveAmount": Amount }
 *
 * Exactly one of sendAmount / receiveAmount is fixed. The request carries
 * Signature headers and, when a quote grant was negotiated, the bearer token.
 */
import type { Logger } from 'pino';
import { HttpError, ProtocolError, RequestValidationError, TokenExpiredError } from './errors.js';
import { HttpTransport } from './http.js';
import { componentLogger } from './logger.js';
import { amountSchema, describeIssue, quoteSchema } from './schemas.js';
import { Signer } from './signer.js';
import type { AccessToken, Amount, CallOptions, Quote, QuoteAmount, SigningKey, TransportOptions } from './types.js';

export interface QuoteClientOptions extends TransportOptions {
  /** Sender's wallet address; its origin is the default base URL */
  walletAddress: string;
  baseUrl?: string;
  signer: SigningKey | Signer;
  /** Token from a `quote` grant, sent as `Authorization: GNAP <token>` */
  accessToken?: string | AccessToken;
}

interface CreateQuoteBody {
  walletAddress: string;
  method: 'ilp';
  sendAmount?: Amount;
  receiveAmount?: Amount;
}

export class QuoteClient {
  readonly baseUrl: string;
  readonly walletAddress: string;
  private readonly signer: Signer;
  private readonly token?: string;
  private readonly transport: HttpTransport;
  private readonly log: Logger;

  constructor(options: QuoteClientOptions) {
    this.walletAddress = options.walletAddress;
    this.baseUrl = (options.baseUrl ?? originOf(options.walletAddress)).replace(/\/$/, '');
    this.signer = options.signer instanceof Signer ? options.signer : new Signer(options.signer);
    this.token = typeof options.accessToken === 'string' ? options.accessToken : options.accessToken?.value;
    this.log = componentLogger('quote-client', options.logger);
    this.transport = new HttpTransport({ ...options, logger: this.log });
  }

  async createQuote(receiver: string, amount: QuoteAmount, options: CallOptions = {}): Promise<Quote> {
    const payload = buildQuoteBody(receiver, amount);
    const url = `${this.baseUrl}/quotes`;
    const body = JSON.stringify(payload);
    const signed = this.signer.sign('POST', url, body);

    const headers: Record<string, string> = { ...signed.headers, accept: 'application/json' };
    if (this.token) {
      headers['authorization'] = `GNAP ${this.token}`;
    }

    this.log.info({ receiver, keyId: this.signer.keyId }, 'creating quote');

    let responseBody: unknown;
    try {
      ({ body: responseBody } = await this.transport.send({
        method: 'POST',
        url,
        headers,
        body,
        signal: options.signal,
      }));
    } catch (error) {
      if (this.token && error instanceof HttpError && error.status === 401) {
        throw new TokenExpiredError(url, error.body);
      }
      throw error;
    }

    const parsed = quoteSchema.safeParse(responseBody);
    if (!parsed.success) {
      throw new ProtocolError(`Malformed quote response: ${describeIssue(parsed.error)}`, { url, body: responseBody });
    }

    const quote = parsed.data;
    this.log.info(
      { id: quote.id, sendAmount: quote.sendAmount, receiveAmount: quote.receiveAmount },
      'quote created',
    );
    return quote;
  }

  close(): void {
    this.transport.close();
  }
}

function buildQuoteBody(receiver: string, amount: QuoteAmount): CreateQuoteBody {
  if (!receiver) {
    throw new RequestValidationError('Quote receiver wallet address must not be empty', 'receiver');
  }
  if (amount.sendAmount !== undefined && amount.receiveAmount !== undefined) {
    throw new RequestValidationError('Specify either sendAmount or receiveAmount, not both', 'sendAmount');
  }

  if (amount.sendAmount !== undefined) {
    checkAmount(amount.sendAmount, 'sendAmount');
    return { walletAddress: receiver, method: 'ilp', sendAmount: amount.sendAmount };
  }
  if (amount.receiveAmount !== undefined) {
    checkAmount(amount.receiveAmount, 'receiveAmount');
    return { walletAddress: receiver, method: 'ilp', receiveAmount: amount.receiveAmount };
  }
  throw new RequestValidationError('Specify sendAmount or receiveAmount', 'sendAmount');
}

function checkAmount(amount: Amount, field: string): void {
  const parsed = amountSchema.safeParse(amount);
  if (!parsed.success) {
    throw new RequestValidationError(`Invalid ${field}: ${describeIssue(parsed.error)}`, field);
  }
}

function originOf(walletAddress: string): string {
  try {
    return new URL(walletAddress).origin;
  } catch {
    throw new RequestValidationError(`walletAddress must be an absolute URL, got "${walletAddress}"`, 'walletAddress');
  }
}
