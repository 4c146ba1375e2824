import type { IdentityCredential } from '../identity.js';
import type { TrustStore } from '../trust-store.js';

/** TLS options for an HTTPS server whose clients present Authly identities. */
export interface MtlsServerOptions {
  key: string;
  cert: string;
  ca: string;
  requestCert: true;
  /** The middleware rejects with a JSON error instead of a TLS alert. */
  rejectUnauthorized: false;
  minVersion: 'TLSv1.2';
}

/**
 * Options for `https.createServer` that present `credential` and ask clients
 * for certificates issued under `trustStore`. Pair with
 * `authlyPeerExpressMiddleware` or `authlyPeerFastifyPlugin`.
 */
export function mtlsServerOptions(
  trustStore: TrustStore,
  credential: IdentityCredential,
): MtlsServerOptions {
  return {
    ...credential.tlsOptions(),
    ca: trustStore.toPem(),
    requestCert: true,
    rejectUnauthorized: false,
    minVersion: 'TLSv1.2',
  };
}
