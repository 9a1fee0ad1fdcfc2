/**
 * signedRoute / signedHandler — helpers for marking Fastify routes as signed.
 *
 * Usage (signedRoute):
 *   fastify.route(signedRoute({
 *     method: 'POST',
 *     url: '/quotes',
 *     handler: async (req, reply) => reply.send({ id: '…' }),
 *   }));
 *
 * Usage (signedHandler — spread into shorthand route options):
 *   fastify.post('/', { ...signedHandler(), schema }, handler);
 */
import type { FastifyReply, FastifyRequest, HTTPMethods, RouteOptions } from 'fastify';

export interface SignedRouteOptions {
  method: HTTPMethods | HTTPMethods[];
  url: string;
  handler: (request: FastifyRequest, reply: FastifyReply) => Promise<unknown> | unknown;
  schema?: RouteOptions['schema'];
}

/**
 * Returns a full `RouteOptions` object with `config.requireSignature` set.
 * Pass the result directly to `fastify.route(...)`.
 */
export function signedRoute(options: SignedRouteOptions): RouteOptions {
  return {
    method: options.method,
    url: options.url,
    schema: options.schema,
    config: { requireSignature: true },
    handler: options.handler,
  };
}

/** Route config to spread into shorthand route options. */
export function signedHandler(): { config: { requireSignature: true } } {
  return { config: { requireSignature: true } };
}
