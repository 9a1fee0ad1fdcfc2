/**
 * HttpTransport — the one place that talks to fetch.
 *
 * Owns the timeout, links caller cancellation, parses bodies and turns
 * failures into TransportError (never reached the server, or gave up) or
 * HttpError (server answered non-2xx). Components hold one transport for
 * their lifetime and release it with close().
 */
import type { Logger } from 'pino';
import { HttpError, TransportError } from './errors.js';
import type { CallOptions, TransportOptions } from './types.js';

export const DEFAULT_TIMEOUT_MS = 30_000;

export interface HttpRequest extends CallOptions {
  method: 'GET' | 'POST' | 'DELETE';
  url: string;
  headers?: Record<string, string>;
  /** Pre-serialized body; must be the exact bytes that were signed */
  body?: string;
}

export interface HttpResponse {
  status: number;
  /** Parsed JSON, raw text when not JSON, undefined when empty */
  body: unknown;
}

export class HttpTransport {
  readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly log: Logger;
  private readonly inFlight = new Set<AbortController>();
  private closed = false;

  constructor(options: TransportOptions & { logger: Logger }) {
    const parsedTimeout = Number(options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
    this.timeoutMs = Number.isFinite(parsedTimeout) && parsedTimeout > 0
      ? parsedTimeout
      : DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.log = options.logger;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Send one request. Rejects with HttpError on any non-2xx status. */
  async send(request: HttpRequest): Promise<HttpResponse> {
    const { method, url } = request;

    if (this.closed) {
      throw new TransportError(`Transport is closed; cannot ${method} ${url}`, { code: 'closed', url });
    }

    const controller = new AbortController();
    this.inFlight.add(controller);
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    const onCallerAbort = (): void => controller.abort();
    if (request.signal?.aborted) {
      controller.abort();
    } else {
      request.signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    this.log.debug({ method, url }, 'http request');

    try {
      const response = await this.fetchImpl(url, {
        method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });

      const rawBody = await response.text();
      const body = parseBody(rawBody);

      this.log.debug({ method, url, status: response.status }, 'http response');

      if (!response.ok) {
        throw new HttpError(`${method} ${url} failed with status ${response.status}`, {
          status: response.status,
          url,
          body,
        });
      }

      return { status: response.status, body };
    } catch (error) {
      if (error instanceof HttpError) {
        throw error;
      }

      if (isAbortError(error) || controller.signal.aborted) {
        if (timedOut) {
          throw new TransportError(`${method} ${url} timed out after ${this.timeoutMs}ms`, {
            code: 'timeout',
            url,
            cause: error,
          });
        }
        if (this.closed) {
          throw new TransportError(`${method} ${url} aborted: transport closed`, { code: 'closed', url, cause: error });
        }
        throw new TransportError(`${method} ${url} was cancelled by the caller`, { code: 'aborted', url, cause: error });
      }

      throw new TransportError(`${method} ${url} failed due to a network error`, {
        code: 'network_error',
        url,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
      request.signal?.removeEventListener('abort', onCallerAbort);
      this.inFlight.delete(controller);
    }
  }

  /** Abort in-flight requests and refuse new ones. Idempotent. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const controller of this.inFlight) {
      controller.abort();
    }
    this.inFlight.clear();
  }
}

export interface Closeable {
  close(): void;
}

/**
 * Run `fn` with `client`, then close it on every exit path.
 *
 *   const payment = await withClient(new ResourceClient(opts), (rs) => rs.getIncomingPayment(id));
 */
export async function withClient<C extends Closeable, R>(client: C, fn: (client: C) => Promise<R>): Promise<R> {
  try {
    return await fn(client);
  } finally {
    client.close();
  }
}

function parseBody(raw: string): unknown {
  if (!raw.trim()) {
    return undefined;
  }

  try {
    return JSON.parse(raw) as unknown;
  } catch {
    return raw;
  }
}

function isAbortError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError';
}
