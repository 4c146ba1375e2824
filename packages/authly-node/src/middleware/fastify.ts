import { AuthlyError } from '../errors.js';
import type { PeerIdentity } from '../types.js';
import { errorBody, verifyRequestPeer } from './shared.js';
import type { AuthlyPeerMiddlewareOptions, RequestSocketLike } from './types.js';

// ── Fastify-compatible interfaces (peer dep only) ──────────────────

export interface FastifyRequest {
  raw: { socket: RequestSocketLike };
  authlyPeer?: PeerIdentity | null;
}

export interface FastifyReply {
  code(statusCode: number): FastifyReply;
  send(payload: unknown): void;
}

export interface FastifyInstance {
  decorateRequest(property: string, value: unknown): void;
  addHook(
    hookName: string,
    handler: (request: FastifyRequest, reply: FastifyReply) => Promise<void>,
  ): void;
}

// ── Plugin ─────────────────────────────────────────────────────────

/**
 * Fastify plugin that verifies the TLS client certificate chain on every
 * request and decorates `request.authlyPeer`.
 *
 * Usage:
 *   await authlyPeerFastifyPlugin(fastify, { trustStore });
 */
export async function authlyPeerFastifyPlugin(
  fastify: FastifyInstance,
  options: AuthlyPeerMiddlewareOptions,
): Promise<void> {
  const { onError } = options;

  fastify.decorateRequest('authlyPeer', null);

  fastify.addHook('onRequest', async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      request.authlyPeer = verifyRequestPeer(request.raw.socket, options);
    } catch (err: unknown) {
      const authlyErr = AuthlyError.from(err);
      if (onError) {
        onError(authlyErr, request, reply);
        return;
      }
      reply.code(authlyErr.httpStatus).send(errorBody(authlyErr));
    }
  });
}
