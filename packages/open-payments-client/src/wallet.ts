/**
 * WalletLookup — public wallet address metadata. Unauthenticated and unsigned.
 */
import type { Logger } from 'pino';
import { ProtocolError, RequestValidationError } from './errors.js';
import { HttpTransport } from './http.js';
import { componentLogger } from './logger.js';
import { describeIssue, walletAddressSchema } from './schemas.js';
import type { CallOptions, TransportOptions, WalletAddress } from './types.js';

export class WalletLookup {
  private readonly transport: HttpTransport;
  private readonly log: Logger;

  constructor(options: TransportOptions = {}) {
    this.log = componentLogger('wallet-lookup', options.logger);
    this.transport = new HttpTransport({ ...options, logger: this.log });
  }

  async getWalletAddress(walletAddress: string, options: CallOptions = {}): Promise<WalletAddress> {
    try {
      new URL(walletAddress);
    } catch {
      throw new RequestValidationError(`walletAddress must be an absolute URL, got "${walletAddress}"`, 'walletAddress');
    }

    const { body } = await this.transport.send({
      method: 'GET',
      url: walletAddress,
      headers: { accept: 'application/json' },
      signal: options.signal,
    });

    const parsed = walletAddressSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProtocolError(`Malformed wallet address document: ${describeIssue(parsed.error)}`, {
        url: walletAddress,
        body,
      });
    }

    this.log.info({ id: parsed.data.id, assetCode: parsed.data.assetCode }, 'wallet address resolved');
    return parsed.data;
  }

  close(): void {
    this.transport.close();
  }
}
