import type { AuthlyError } from '../errors.js';
import type { PeerCertificateLike } from '../peer.js';
import type { TrustStore } from '../trust-store.js';

export interface AuthlyPeerMiddlewareOptions {
  trustStore: TrustStore;
  /** Reject requests that carry no client certificate. Default: true. */
  required?: boolean;
  onError?: (error: AuthlyError, req: unknown, res: unknown) => void;
  /** Clock for certificate validity checks. */
  now?: () => Date;
}

/**
 * The request socket as the middleware sees it. Plain HTTP sockets have no
 * `getPeerCertificate`; TLS sockets do.
 */
export interface RequestSocketLike {
  remoteAddress?: string;
  getPeerCertificate?(detailed: true): PeerCertificateLike | null;
}
