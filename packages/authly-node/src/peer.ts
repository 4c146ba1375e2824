import { X509Certificate } from 'node:crypto';
import { AuthlyError } from './errors.js';

/** Shape of `tls.TLSSocket#getPeerCertificate(true)` entries used here. */
export interface PeerCertificateLike {
  raw?: Buffer;
  issuerCertificate?: PeerCertificateLike;
}

/** Anything exposing the peer's certificate chain the way a TLS socket does. */
export interface PeerSocketLike {
  getPeerCertificate(detailed: true): PeerCertificateLike | null;
}

/**
 * Collect the certificates the peer presented, leaf first.
 *
 * Follows `issuerCertificate` links until they loop (Node links a
 * self-signed root to itself). Returns an empty array when the peer sent no
 * certificate. Throws MALFORMED_CHAIN for undecodable DER.
 */
export function peerChainFromSocket(socket: PeerSocketLike): X509Certificate[] {
  const chain: X509Certificate[] = [];
  const seen = new Set<string>();

  let entry = socket.getPeerCertificate(true) ?? undefined;
  while (entry?.raw && entry.raw.length > 0) {
    let cert: X509Certificate;
    try {
      cert = new X509Certificate(entry.raw);
    } catch (err: unknown) {
      throw AuthlyError.malformedChain('Peer presented an undecodable certificate', err);
    }
    if (seen.has(cert.fingerprint256)) break;
    seen.add(cert.fingerprint256);
    chain.push(cert);
    entry = entry.issuerCertificate;
  }
  return chain;
}
