/**
 * Unit tests — WalletLookup
 */
import { describe, it, expect } from 'vitest';
import { HttpError, ProtocolError, RequestValidationError, WalletLookup } from 'open-payments-client';
import { json, stubFetch } from '../helpers/fetch-stub.js';

const DOC = {
  id: 'https://wallet.test/alice',
  publicName: 'Alice',
  assetCode: 'USD',
  assetScale: 2,
  authServer: 'https://auth.wallet.test',
  resourceServer: 'https://wallet.test',
};

describe('WalletLookup', () => {
  it('fetches the wallet document without credentials', async () => {
    const stub = stubFetch(json(200, DOC));
    const lookup = new WalletLookup({ fetchImpl: stub.fetchImpl });

    await expect(lookup.getWalletAddress('https://wallet.test/alice')).resolves.toEqual(DOC);
    expect(stub.calls[0]?.method).toBe('GET');
    expect(stub.calls[0]?.headers.get('authorization')).toBeNull();
    expect(stub.calls[0]?.headers.get('signature')).toBeNull();
  });

  it('throws ProtocolError when a required field is missing', async () => {
    const { authServer: _omitted, ...partial } = DOC;
    const stub = stubFetch(json(200, partial));
    const lookup = new WalletLookup({ fetchImpl: stub.fetchImpl });

    await expect(lookup.getWalletAddress('https://wallet.test/alice')).rejects.toThrow(ProtocolError);
  });

  it('surfaces an unknown wallet as HttpError', async () => {
    const stub = stubFetch(json(404, { error: 'unknown_wallet' }), json(404, { error: 'unknown_wallet' }));
    const lookup = new WalletLookup({ fetchImpl: stub.fetchImpl });

    await expect(lookup.getWalletAddress('https://wallet.test/carol')).rejects.toMatchObject({
      status: 404,
      code: 'http_error',
    });
    await expect(lookup.getWalletAddress('https://wallet.test/carol')).rejects.toThrow(HttpError);
  });

  it('rejects a non-URL wallet address', async () => {
    const lookup = new WalletLookup();
    await expect(lookup.getWalletAddress('$wallet.test/alice')).rejects.toThrow(RequestValidationError);
  });
});
