import type { ServiceId } from './service-id.js';

/** Identity of a peer whose certificate chain was verified against a trust store. */
export interface PeerIdentity {
  /** Full subject, one `KEY=value` attribute per line. */
  subject: string;
  commonName: string | null;
  /** Authly service id when the Common Name is one. */
  serviceId: ServiceId | null;
  issuer: string;
  /** SHA-256 fingerprint of the leaf, colon-separated hex. */
  fingerprint256: string;
  serialNumber: string;
  notBefore: Date;
  notAfter: Date;
  /** Certificates on the verified path, leaf and anchor included. */
  chainLength: number;
}
