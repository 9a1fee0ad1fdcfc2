/**
 * GrantClient — GNAP grant negotiation against an Authorization Server.
 *
 * Per attempt:
 *
 *   BUILDING ─▶ SENT ─▶ GRANTED
 *                    ├▶ PENDING_INTERACTION ─(user consents out of band)─▶ CONTINUING ─▶ GRANTED | FAILED
 *                    └▶ FAILED
 *
 * Grant requests are signed (see signer.ts). Continuation and token
 * management use only `Authorization: GNAP <token>`. Nothing is retried: a
 * failed authorization decision goes straight back to the caller.
 */
import { randomBytes } from 'crypto';
import type { Logger } from 'pino';
import { toGrantRequestBody } from './access.js';
import {
  HttpError,
  InvalidContinuationError,
  ProtocolError,
  RequestValidationError,
  UnexpectedInteractionRequiredError,
} from './errors.js';
import { HttpTransport } from './http.js';
import type { HttpResponse } from './http.js';
import { componentLogger, maskToken } from './logger.js';
import { describeIssue, grantResponseSchema, rotatedTokenSchema } from './schemas.js';
import type { GrantResponseBody, TokenBody } from './schemas.js';
import { Signer } from './signer.js';
import type {
  AccessRight,
  AccessToken,
  CallOptions,
  Continuation,
  GrantRequest,
  GrantResponse,
  GrantState,
  GrantTransition,
  SignedHeaders,
  SigningKey,
  TransportOptions,
} from './types.js';

interface PendingGrant {
  attempt: number;
  continuation: Continuation;
  requested: readonly AccessRight[];
}

/** 32 bytes of entropy, base64url */
const NONCE_BYTES = 32;

export interface GrantClientOptions extends TransportOptions {
  /** Authorization Server base URL; grant requests go to `${authServerUrl}/` */
  authServerUrl: string;
  /** Signing key, or a Signer when the clock must be controlled */
  signer: SigningKey | Signer;
  /** Observer for every state transition */
  onTransition?: (transition: GrantTransition) => void;
}

export class GrantClient {
  readonly authServerUrl: string;
  private readonly signer: Signer;
  private readonly transport: HttpTransport;
  private readonly log: Logger;
  private readonly onTransition?: (transition: GrantTransition) => void;
  /** Continuations issued to this client, keyed by URI. One URI may serve several grants. */
  private readonly pending = new Map<string, PendingGrant[]>();
  private attempts = 0;

  constructor(options: GrantClientOptions) {
    this.authServerUrl = normalizeBaseUrl(options.authServerUrl);
    this.signer = options.signer instanceof Signer ? options.signer : new Signer(options.signer);
    this.log = componentLogger('grant-client', options.logger);
    this.transport = new HttpTransport({ ...options, logger: this.log });
    this.onTransition = options.onTransition;
  }

  /** Grant for automated access with no user present. */
  async requestGrantNonInteractive(
    accessRights: readonly AccessRight[],
    clientId: string,
    options: CallOptions = {},
  ): Promise<GrantResponse> {
    const attempt = this.begin();
    const request = this.build(attempt, accessRights, clientId);
    const body = await this.send(attempt, request, options);

    if (body.interact) {
      this.transition(attempt, 'SENT', 'FAILED');
      if (body.access_token) {
        await this.discard(body.access_token, accessRights, options);
      }
      throw new UnexpectedInteractionRequiredError(body.interact.redirect);
    }

    return this.settle(attempt, 'SENT', body, accessRights);
  }

  /**
   * Grant that may need end-user consent. A pending result carries the
   * redirect URL to show the user; finish with continueGrant().
   */
  async requestGrantInteractive(
    accessRights: readonly AccessRight[],
    clientId: string,
    redirectUri: string,
    options: CallOptions = {},
  ): Promise<GrantResponse> {
    if (!isAbsoluteUrl(redirectUri)) {
      throw new RequestValidationError(`redirectUri must be an absolute URL, got "${redirectUri}"`, 'redirectUri');
    }

    const attempt = this.begin();
    const request = this.build(attempt, accessRights, clientId, {
      redirectUri,
      nonce: randomBytes(NONCE_BYTES).toString('base64url'),
    });
    const body = await this.send(attempt, request, options);

    return this.settle(attempt, 'SENT', body, accessRights);
  }

  /**
   * Finish a grant after the user consented. Only continuations received by
   * this client in a pending response are accepted. `interactRef` is the
   * reference the Authorization Server appended to the redirect, if any.
   */
  async continueGrant(
    continuationUri: string,
    continuationToken: string,
    interactRef?: string,
    options: CallOptions = {},
  ): Promise<GrantResponse> {
    const candidates = this.pending.get(continuationUri);
    if (!candidates) {
      throw new InvalidContinuationError(
        'No pending interaction for this continuation URI; request an interactive grant first',
        continuationUri,
      );
    }
    const pendingGrant = candidates.find((entry) => entry.continuation.accessToken === continuationToken);
    if (!pendingGrant) {
      throw new InvalidContinuationError('Continuation token does not match the pending grant', continuationUri);
    }

    const { attempt, requested } = pendingGrant;
    this.transition(attempt, 'PENDING_INTERACTION', 'CONTINUING');
    this.log.info({ continuationUri }, 'continuing grant');

    const headers: Record<string, string> = { authorization: `GNAP ${continuationToken}` };
    let body: string | undefined;
    if (interactRef !== undefined) {
      body = JSON.stringify({ interact_ref: interactRef });
      headers['content-type'] = 'application/json';
    }

    let response: HttpResponse;
    try {
      response = await this.transport.send({
        method: 'POST',
        url: continuationUri,
        headers,
        body,
        signal: options.signal,
      });
    } catch (error) {
      // A server answer consumes the continuation; a transport failure hands it back.
      if (error instanceof HttpError) {
        this.release(pendingGrant);
        this.transition(attempt, 'CONTINUING', 'FAILED');
        this.log.warn({ status: error.status, continuationUri }, 'grant continuation rejected');
      } else {
        this.transition(attempt, 'CONTINUING', 'PENDING_INTERACTION');
        this.log.warn({ err: error, continuationUri }, 'grant continuation not delivered');
      }
      throw error;
    }

    this.release(pendingGrant);
    const grant = this.parse(attempt, 'CONTINUING', continuationUri, response.body);
    if (!grant.access_token) {
      this.transition(attempt, 'CONTINUING', 'FAILED');
      throw new ProtocolError('Continuation response did not include an access token', {
        url: continuationUri,
        body: response.body,
      });
    }

    return this.settle(attempt, 'CONTINUING', grant, requested);
  }

  /** Exchange a token for a fresh one through its management URL. */
  async rotateToken(token: AccessToken, options: CallOptions = {}): Promise<AccessToken> {
    const response = await this.transport.send({
      method: 'POST',
      url: token.manageUrl,
      headers: { authorization: `GNAP ${token.value}` },
      signal: options.signal,
    });

    const parsed = rotatedTokenSchema.safeParse(response.body);
    if (!parsed.success) {
      throw new ProtocolError(`Malformed token rotation response: ${describeIssue(parsed.error)}`, {
        url: token.manageUrl,
        body: response.body,
      });
    }

    const rotated = toAccessToken(parsed.data.access_token, token.access);
    this.log.info({ token: maskToken(rotated.value) }, 'access token rotated');
    return rotated;
  }

  /** Revoke a token. The token must not be used afterwards. */
  async revokeToken(token: AccessToken, options: CallOptions = {}): Promise<void> {
    await this.transport.send({
      method: 'DELETE',
      url: token.manageUrl,
      headers: { authorization: `GNAP ${token.value}` },
      signal: options.signal,
    });
    this.log.info({ token: maskToken(token.value) }, 'access token revoked');
  }

  /** Release the underlying transport. */
  close(): void {
    this.transport.close();
    this.pending.clear();
  }

  // ── Internals ──────────────────────────────────────────────────────────────

  private track(entry: PendingGrant): void {
    const entries = this.pending.get(entry.continuation.uri) ?? [];
    entries.push(entry);
    this.pending.set(entry.continuation.uri, entries);
  }

  private release(entry: PendingGrant): void {
    const { uri } = entry.continuation;
    const remaining = (this.pending.get(uri) ?? []).filter((candidate) => candidate !== entry);
    if (remaining.length > 0) {
      this.pending.set(uri, remaining);
    } else {
      this.pending.delete(uri);
    }
  }

  /** Revoke a token the caller will never see. A failed revocation is logged, not raised. */
  private async discard(
    issued: TokenBody | TokenBody[],
    requested: readonly AccessRight[],
    options: CallOptions,
  ): Promise<void> {
    for (const token of Array.isArray(issued) ? issued : [issued]) {
      try {
        await this.revokeToken(toAccessToken(token, requested), options);
      } catch (error) {
        this.log.warn(
          { err: error, token: maskToken(token.value) },
          'could not revoke token issued alongside interaction',
        );
      }
    }
  }

  private begin(): number {
    this.attempts += 1;
    return this.attempts;
  }

  private build(
    attempt: number,
    accessRights: readonly AccessRight[],
    clientId: string,
    interaction?: GrantRequest['interaction'],
  ): GrantRequest {
    this.transition(attempt, null, 'BUILDING');

    if (accessRights.length === 0) {
      this.transition(attempt, 'BUILDING', 'FAILED');
      throw new RequestValidationError('At least one access right is required', 'accessRights');
    }
    if (!clientId) {
      this.transition(attempt, 'BUILDING', 'FAILED');
      throw new RequestValidationError('clientId must not be empty', 'clientId');
    }

    return { accessRights: [...accessRights], clientId, interaction };
  }

  private async send(attempt: number, request: GrantRequest, options: CallOptions): Promise<GrantResponseBody> {
    const url = `${this.authServerUrl}/`;
    const body = JSON.stringify(toGrantRequestBody(request));

    // Signed right before sending; headers are never reused across attempts.
    let signed: SignedHeaders;
    try {
      signed = this.signer.sign('POST', url, body);
    } catch (error) {
      this.transition(attempt, 'BUILDING', 'FAILED');
      throw error;
    }

    this.log.info(
      {
        resources: request.accessRights.map((right) => right.type),
        interactive: request.interaction !== undefined,
        keyId: this.signer.keyId,
      },
      'requesting grant',
    );

    let response: HttpResponse;
    try {
      response = await this.transport.send({
        method: 'POST',
        url,
        headers: { ...signed.headers, 'content-type': 'application/json' },
        body,
        signal: options.signal,
      });
    } catch (error) {
      this.transition(attempt, 'BUILDING', 'SENT');
      this.transition(attempt, 'SENT', 'FAILED');
      if (error instanceof HttpError) {
        this.log.warn({ status: error.status }, 'grant request rejected');
      } else {
        this.log.warn({ err: error }, 'grant request not delivered');
      }
      throw error;
    }

    this.transition(attempt, 'BUILDING', 'SENT');
    return this.parse(attempt, 'SENT', url, response.body);
  }

  private parse(attempt: number, state: GrantState, url: string, raw: unknown): GrantResponseBody {
    const parsed = grantResponseSchema.safeParse(raw);
    if (!parsed.success) {
      this.transition(attempt, state, 'FAILED');
      throw new ProtocolError(`Malformed grant response: ${describeIssue(parsed.error)}`, { url, body: raw });
    }
    return parsed.data;
  }

  private settle(
    attempt: number,
    from: GrantState,
    body: GrantResponseBody,
    requested: readonly AccessRight[],
  ): GrantResponse {
    const continuation = body.continue
      ? {
          uri: body.continue.uri,
          accessToken: body.continue.access_token.value,
          ...(body.continue.wait !== undefined && { waitSeconds: body.continue.wait }),
        }
      : undefined;

    if (body.access_token) {
      const first = Array.isArray(body.access_token) ? body.access_token[0] : body.access_token;
      const accessToken = toAccessToken(first, requested);
      this.transition(attempt, from, 'GRANTED');
      this.log.info(
        { token: maskToken(accessToken.value), expiresIn: accessToken.expiresInSeconds },
        'grant approved',
      );
      return { status: 'granted', accessToken, ...(continuation && { continuation }) };
    }

    if (body.interact) {
      if (continuation) {
        this.track({ attempt, continuation, requested });
      }
      this.transition(attempt, from, 'PENDING_INTERACTION');
      this.log.info({ redirectUrl: body.interact.redirect }, 'grant pending user interaction');
      return {
        status: 'pending_interaction',
        interaction: {
          redirectUrl: body.interact.redirect,
          ...(body.interact.finish !== undefined && { finishNonce: body.interact.finish }),
        },
        ...(continuation && { continuation }),
      };
    }

    this.transition(attempt, from, 'FAILED');
    throw new ProtocolError('Grant response contained neither an access token nor an interaction handle', {
      url: `${this.authServerUrl}/`,
      body,
    });
  }

  private transition(attempt: number, from: GrantState | null, to: GrantState): void {
    this.log.debug({ attempt, from, to }, 'grant state');
    this.onTransition?.({ attempt, from, to });
  }
}

/** Server token → AccessToken. Reports the requested rights when `access` is absent. */
function toAccessToken(token: TokenBody, requested: readonly AccessRight[]): AccessToken {
  return {
    value: token.value,
    manageUrl: token.manage,
    ...(token.expires_in !== undefined && { expiresInSeconds: token.expires_in }),
    access: token.access ?? [...requested],
  };
}

function isAbsoluteUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;
}
