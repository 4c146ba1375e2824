import { X509Certificate } from 'node:crypto';
import { MAX_CHAIN_DEPTH } from './constants.js';
import { AuthlyError } from './errors.js';
import { describeSource, isPem, parsePemBlocks, readMaterial, toPem } from './pem.js';
import type { MaterialSource } from './pem.js';
import { commonNameOf, parseServiceId } from './service-id.js';
import type { PeerIdentity } from './types.js';

export interface VerifyChainOptions {
  /** Point in time the validity windows are checked against. Default: now. */
  now?: Date;
}

// ── Certificate helpers ───────────────────────────────────────────

/** Parsed validity window of a certificate. */
export function validityOf(cert: X509Certificate): { notBefore: Date; notAfter: Date } {
  return { notBefore: new Date(cert.validFrom), notAfter: new Date(cert.validTo) };
}

/**
 * Throw EXPIRED_CERTIFICATE unless `now` lies inside the certificate's window.
 * `role` names the certificate in the message ("Peer", "Intermediate", ...).
 */
export function assertWithinValidity(cert: X509Certificate, now: Date, role: string): void {
  const { notBefore, notAfter } = validityOf(cert);
  if (Number.isNaN(notBefore.getTime()) || Number.isNaN(notAfter.getTime())) {
    throw AuthlyError.malformedChain(`${role} certificate has an unreadable validity window`);
  }
  if (now.getTime() < notBefore.getTime()) {
    throw AuthlyError.expiredCertificate(
      `${role} certificate is not valid before ${notBefore.toISOString()}`,
    );
  }
  if (now.getTime() > notAfter.getTime()) {
    throw AuthlyError.expiredCertificate(
      `${role} certificate expired at ${notAfter.toISOString()}`,
    );
  }
}

/** Signature check that treats key-type errors as a failed verification. */
function signedBy(cert: X509Certificate, issuer: X509Certificate): boolean {
  try {
    return cert.verify(issuer.publicKey);
  } catch {
    return false;
  }
}

/** Build the PeerIdentity descriptor for a verified leaf. */
export function describePeer(leaf: X509Certificate, chainLength: number): PeerIdentity {
  const { notBefore, notAfter } = validityOf(leaf);
  const commonName = commonNameOf(leaf.subject);
  return Object.freeze({
    subject: leaf.subject,
    commonName,
    serviceId: commonName !== null ? parseServiceId(commonName) : null,
    issuer: leaf.issuer,
    fingerprint256: leaf.fingerprint256,
    serialNumber: leaf.serialNumber,
    notBefore,
    notAfter,
    chainLength,
  });
}

/**
 * Parse certificates from PEM text or a single DER certificate.
 * Throws a plain Error; callers attach their own error code.
 */
export function parseCertificates(data: Buffer): X509Certificate[] {
  if (!isPem(data)) {
    return [new X509Certificate(data)];
  }

  const certs: X509Certificate[] = [];
  for (const block of parsePemBlocks(data.toString('utf8'))) {
    if (block.label !== 'CERTIFICATE') {
      throw new Error(`Unexpected PEM block "${block.label}"`);
    }
    const cert = new X509Certificate(block.der);
    if (!cert.publicKey.asymmetricKeyType) {
      throw new Error('Certificate has no usable public key');
    }
    certs.push(cert);
  }
  return certs;
}

// ── TrustStore ────────────────────────────────────────────────────

/**
 * Ordered, immutable set of trust anchors.
 *
 * Safe to share between any number of concurrent handshakes.
 */
export class TrustStore {
  private readonly _anchors: readonly X509Certificate[];
  private readonly _fingerprints: ReadonlySet<string>;

  private constructor(anchors: X509Certificate[]) {
    this._anchors = Object.freeze([...anchors]);
    this._fingerprints = new Set(anchors.map(a => a.fingerprint256));
  }

  /** Load anchors from a file path or bytes (PEM bundle or a single DER certificate). */
  static async load(source: MaterialSource): Promise<TrustStore> {
    let data: Buffer;
    try {
      data = await readMaterial(source);
    } catch (err: unknown) {
      throw AuthlyError.trustMaterial(`Trust material unreadable: ${describeSource(source)}`, err);
    }
    return TrustStore.fromBytes(data, describeSource(source));
  }

  /** Synchronous variant of {@link TrustStore.load} for material already in memory. */
  static fromPem(pem: string | Buffer): TrustStore {
    const data = typeof pem === 'string' ? Buffer.from(pem, 'utf8') : pem;
    return TrustStore.fromBytes(data, `<${data.byteLength} bytes>`);
  }

  static fromCertificates(certs: readonly X509Certificate[]): TrustStore {
    if (certs.length === 0) {
      throw AuthlyError.trustMaterial('Trust store requires at least one anchor');
    }
    return new TrustStore([...certs]);
  }

  private static fromBytes(data: Buffer, label: string): TrustStore {
    if (data.toString('utf8').trim().length === 0) {
      throw AuthlyError.trustMaterial(`Trust material is empty: ${label}`);
    }

    let certs: X509Certificate[];
    try {
      certs = parseCertificates(data);
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : 'parse failure';
      throw AuthlyError.trustMaterial(`Unparseable trust material in ${label}: ${reason}`, err);
    }

    if (certs.length === 0) {
      throw AuthlyError.trustMaterial(`No certificates found in ${label}`);
    }
    return new TrustStore(certs);
  }

  get anchors(): readonly X509Certificate[] {
    return this._anchors;
  }

  get size(): number {
    return this._anchors.length;
  }

  /** True if the certificate is itself one of the anchors. */
  isAnchor(cert: X509Certificate): boolean {
    return this._fingerprints.has(cert.fingerprint256);
  }

  /** Anchors as a PEM bundle, suitable for a TLS `ca` option. */
  toPem(): string {
    return this._anchors.map(a => toPem('CERTIFICATE', a.raw)).join('');
  }

  /**
   * Validate that a presented chain resolves to one of the anchors.
   *
   * The leaf defaults to the first element of `peerChain`; the remaining
   * elements are candidate intermediates in any order. Every link must be
   * signed by the next certificate, every issuer below the anchor must be a
   * CA, and every certificate on the path (anchor included) must be inside
   * its validity window at `now`.
   */
  verifyChain(
    peerChain: readonly X509Certificate[],
    peerLeaf?: X509Certificate,
    options?: VerifyChainOptions,
  ): PeerIdentity {
    const now = options?.now ?? new Date();
    const leaf = peerLeaf ?? (peerChain.length > 0 ? peerChain[0] : undefined);
    if (leaf === undefined) {
      throw AuthlyError.malformedChain('Peer presented no certificate');
    }

    const intermediates = peerChain.filter(c => c.fingerprint256 !== leaf.fingerprint256);
    const visited = new Set<string>([leaf.fingerprint256]);

    assertWithinValidity(leaf, now, 'Peer');

    let current = leaf;
    for (let depth = 1; depth <= MAX_CHAIN_DEPTH; depth++) {
      if (this.isAnchor(current)) {
        return describePeer(leaf, depth);
      }

      const anchor = this._anchors.find(a => current.checkIssued(a) && signedBy(current, a));
      if (anchor) {
        assertWithinValidity(anchor, now, 'Trust anchor');
        return describePeer(leaf, depth + 1);
      }

      const candidates = intermediates.filter(
        c => !visited.has(c.fingerprint256) && current.checkIssued(c),
      );
      if (candidates.length === 0) {
        throw AuthlyError.untrustedPeer('Certificate chain does not resolve to a trusted anchor');
      }

      const issuer = candidates.find(c => signedBy(current, c));
      if (!issuer) {
        throw AuthlyError.malformedChain(`Signature linkage broken at depth ${depth}`);
      }
      if (!issuer.ca) {
        throw AuthlyError.malformedChain(`Issuer at depth ${depth} is not a certificate authority`);
      }
      assertWithinValidity(issuer, now, 'Intermediate');

      visited.add(issuer.fingerprint256);
      current = issuer;
    }

    throw AuthlyError.malformedChain(`Certificate chain exceeds maximum depth of ${MAX_CHAIN_DEPTH}`);
  }
}
