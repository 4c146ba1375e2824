import { AuthlyError } from '../errors.js';
import type { PeerIdentity } from '../types.js';
import { errorBody, verifyRequestPeer } from './shared.js';
import type { AuthlyPeerMiddlewareOptions, RequestSocketLike } from './types.js';

export interface ExpressRequest {
  socket: RequestSocketLike;
  authlyPeer?: PeerIdentity | null;
}

export interface ExpressResponse {
  status(code: number): ExpressResponse;
  json(body: unknown): void;
}

export type ExpressNextFunction = (err?: unknown) => void;

/**
 * Express middleware that verifies the TLS client certificate chain.
 *
 * The server must request client certificates without letting OpenSSL reject
 * them (see `mtlsServerOptions`). On success `req.authlyPeer` holds the
 * verified identity (or `null` for an optional, absent certificate).
 *
 * Usage:
 *   app.use(authlyPeerExpressMiddleware({ trustStore }));
 */
export function authlyPeerExpressMiddleware(
  options: AuthlyPeerMiddlewareOptions,
): (req: ExpressRequest, res: ExpressResponse, next: ExpressNextFunction) => void {
  const { onError } = options;

  return (req: ExpressRequest, res: ExpressResponse, next: ExpressNextFunction) => {
    let peer: PeerIdentity | null;
    try {
      peer = verifyRequestPeer(req.socket, options);
    } catch (err: unknown) {
      const authlyErr = AuthlyError.from(err);
      if (onError) {
        onError(authlyErr, req, res);
        return;
      }
      res.status(authlyErr.httpStatus).json(errorBody(authlyErr));
      return;
    }

    req.authlyPeer = peer;
    next();
  };
}
