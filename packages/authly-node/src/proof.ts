import { createHash, randomBytes, verify as cryptoVerify } from 'node:crypto';
import type { KeyObject } from 'node:crypto';
import { CHALLENGE_LENGTH, PROOF_CONTEXT, SESSION_CONFIRM_CONTEXT } from './constants.js';
import { digestFor } from './identity.js';

/**
 * Key-possession proof.
 *
 * The client signs a transcript that ties the server's challenge to this
 * TLS connection (exported keying material) and to the server certificate it
 * verified. A signature captured on one connection is useless on another.
 */
export interface ProofTranscriptInput {
  challenge: Uint8Array;
  /** TLS exported keying material of the connection. */
  exporter: Uint8Array;
  /** DER of the server leaf certificate the client verified. */
  serverCertificate: Uint8Array;
}

function lengthPrefixed(bytes: Uint8Array): Buffer {
  const prefix = Buffer.alloc(4);
  prefix.writeUInt32BE(bytes.length, 0);
  return Buffer.concat([prefix, bytes]);
}

/** Fresh random challenge for a HELLO frame. */
export function createChallenge(): Buffer {
  return randomBytes(CHALLENGE_LENGTH);
}

/** Bytes the client signs: context label, then each field length-prefixed. */
export function buildProofTranscript(input: ProofTranscriptInput): Buffer {
  const serverHash = createHash('sha256').update(input.serverCertificate).digest();
  return Buffer.concat([
    Buffer.from(PROOF_CONTEXT, 'utf8'),
    lengthPrefixed(input.challenge),
    lengthPrefixed(input.exporter),
    lengthPrefixed(serverHash),
  ]);
}

/**
 * Check a proof signature against the presenter's public key.
 * Returns false for a bad signature; throws SIGNING for an unsupported key type.
 */
export function verifyProofSignature(
  transcript: Uint8Array,
  signature: Uint8Array,
  publicKey: KeyObject,
): boolean {
  const digest = digestFor(publicKey.asymmetricKeyType);
  try {
    return cryptoVerify(digest, transcript, publicKey, signature);
  } catch {
    // Malformed DER signatures throw instead of returning false
    return false;
  }
}

/** Value the server returns in ACCEPT to confirm both ends share the same TLS session. */
export function computeSessionBinding(exporter: Uint8Array): string {
  return createHash('sha256')
    .update(SESSION_CONFIRM_CONTEXT, 'utf8')
    .update(exporter)
    .digest('hex');
}
