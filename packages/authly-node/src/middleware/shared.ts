import { AuthlyError } from '../errors.js';
import { peerChainFromSocket } from '../peer.js';
import type { PeerSocketLike } from '../peer.js';
import type { PeerIdentity } from '../types.js';
import type { AuthlyPeerMiddlewareOptions, RequestSocketLike } from './types.js';

function hasPeerCertificate(socket: RequestSocketLike): socket is PeerSocketLike {
  return typeof socket.getPeerCertificate === 'function';
}

/**
 * Verify the client chain on a request socket.
 *
 * Returns the peer identity, `null` when no certificate was sent and none is
 * required, or throws the classified AuthlyError.
 */
export function verifyRequestPeer(
  socket: RequestSocketLike | undefined,
  options: AuthlyPeerMiddlewareOptions,
): PeerIdentity | null {
  const chain = socket && hasPeerCertificate(socket) ? peerChainFromSocket(socket) : [];
  if (chain.length === 0) {
    if (options.required ?? true) {
      throw AuthlyError.peerCertificateRequired();
    }
    return null;
  }
  const now = options.now ? options.now() : new Date();
  return options.trustStore.verifyChain(chain, chain[0], { now });
}

/** JSON body sent when a request is rejected. */
export function errorBody(err: AuthlyError): { error: string; message: string; status: number } {
  return {
    error: err.code,
    message: err.message,
    status: err.httpStatus,
  };
}
