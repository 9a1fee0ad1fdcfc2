/**
 * Error taxonomy.
 *
 * Every error carries a `code` so callers can switch on it without
 * instanceof chains. Transport failures (timeout, abort, network, closed)
 * are kept apart from protocol-level rejections (http_error, token_expired,
 * protocol_error). Nothing here is retried automatically.
 */

export type OpenPaymentsErrorCode =
  | 'signing_failed'
  | 'protocol_error'
  | 'unexpected_interaction'
  | 'invalid_continuation'
  | 'http_error'
  | 'token_expired'
  | 'timeout'
  | 'aborted'
  | 'network_error'
  | 'closed'
  | 'invalid_request'
  | 'invalid_config';

export class OpenPaymentsError extends Error {
  readonly code: OpenPaymentsErrorCode;
  readonly details?: unknown;

  constructor(message: string, options: { code: OpenPaymentsErrorCode; details?: unknown; cause?: unknown }) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'OpenPaymentsError';
    this.code = options.code;
    this.details = options.details;
  }
}

/** The private key could not produce a signature. */
export class SigningError extends OpenPaymentsError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: 'signing_failed', cause });
    this.name = 'SigningError';
  }
}

/** A 2xx response that is malformed or contradictory. */
export class ProtocolError extends OpenPaymentsError {
  readonly url: string;

  constructor(message: string, options: { url: string; body?: unknown }) {
    super(message, { code: 'protocol_error', details: options.body });
    this.name = 'ProtocolError';
    this.url = options.url;
  }

  get body(): unknown {
    return this.details;
  }
}

/** A non-interactive grant request was answered with an interaction handle. */
export class UnexpectedInteractionRequiredError extends OpenPaymentsError {
  readonly redirectUrl: string;

  constructor(redirectUrl: string) {
    super('Authorization Server requires user interaction for a non-interactive grant request', {
      code: 'unexpected_interaction',
      details: { redirectUrl },
    });
    this.name = 'UnexpectedInteractionRequiredError';
    this.redirectUrl = redirectUrl;
  }
}

/** continueGrant was called without a continuation issued to this client. */
export class InvalidContinuationError extends OpenPaymentsError {
  readonly continuationUri: string;

  constructor(message: string, continuationUri: string) {
    super(message, { code: 'invalid_continuation', details: { continuationUri } });
    this.name = 'InvalidContinuationError';
    this.continuationUri = continuationUri;
  }
}

/** Non-2xx response from any endpoint. */
export class HttpError extends OpenPaymentsError {
  readonly status: number;
  readonly url: string;

  constructor(message: string, options: { status: number; url: string; body: unknown }) {
    super(message, { code: 'http_error', details: options.body });
    this.name = 'HttpError';
    this.status = options.status;
    this.url = options.url;
  }

  get body(): unknown {
    return this.details;
  }
}

/** Alias kept for Resource Server call sites. */
export { HttpError as ResourceRequestError };

/**
 * 401 from the Resource Server. The token expired or was revoked; re-run
 * grant negotiation.
 */
export class TokenExpiredError extends OpenPaymentsError {
  readonly status = 401;
  readonly url: string;

  constructor(url: string, body: unknown) {
    super(`Access token rejected (401) at ${url}; negotiate a new grant`, {
      code: 'token_expired',
      details: body,
    });
    this.name = 'TokenExpiredError';
    this.url = url;
  }

  get body(): unknown {
    return this.details;
  }
}

export type TransportErrorCode = 'timeout' | 'aborted' | 'network_error' | 'closed';

export class TransportError extends OpenPaymentsError {
  readonly url: string;

  constructor(message: string, options: { code: TransportErrorCode; url: string; cause?: unknown }) {
    super(message, { code: options.code, cause: options.cause });
    this.name = 'TransportError';
    this.url = options.url;
  }
}

/** Caller input rejected before any I/O. `field` names the offending input. */
export class RequestValidationError extends OpenPaymentsError {
  readonly field: string;

  constructor(message: string, field: string) {
    super(message, { code: 'invalid_request', details: { field } });
    this.name = 'RequestValidationError';
    this.field = field;
  }
}

export class ConfigError extends OpenPaymentsError {
  constructor(message: string, issues: string[]) {
    super(message, { code: 'invalid_config', details: issues });
    this.name = 'ConfigError';
  }
}

export function isOpenPaymentsError(error: unknown): error is OpenPaymentsError {
  return error instanceof OpenPaymentsError;
}
