import { AuthlyError, AuthlyErrorCode, isAuthlyErrorCode } from './errors.js';
import { decodeJsonPayload } from './frame.js';
import type { Frame } from './frame.js';

// ── Handshake messages ────────────────────────────────────────────

/** Server → client: protocol version and challenge. */
export interface HelloMessage {
  version: number;
  /** Base64 challenge bytes. */
  challenge: string;
}

/** Client → server: presented chain and proof signature. */
export interface IdentityMessage {
  /** Base64 DER certificates, leaf first. */
  chain: string[];
  /** Base64 signature over the proof transcript. */
  signature: string;
}

/** Server → client: identity accepted. */
export interface AcceptMessage {
  /** Hex session binding computed from the exporter. */
  binding: string;
  /** Service id the server recognised, if any. */
  serviceId: string | null;
}

/** Server → client: identity or handshake refused. */
export interface RejectMessage {
  code: AuthlyErrorCode;
  message: string;
}

/** Server → client: request handler failure. */
export interface ErrorMessage {
  message: string;
}

// ── Field readers ─────────────────────────────────────────────────

function readString(body: Record<string, unknown>, field: string, frame: string): string {
  const value = body[field];
  if (typeof value !== 'string' || value.length === 0) {
    throw AuthlyError.protocolViolation(`${frame}.${field} must be a non-empty string`);
  }
  return value;
}

function isBase64(value: string): boolean {
  return /^[A-Za-z0-9+/]+={0,2}$/.test(value);
}

// ── Parsers ───────────────────────────────────────────────────────

export function parseHello(frame: Frame): HelloMessage {
  const body = decodeJsonPayload(frame);
  const version = body.version;
  if (typeof version !== 'number' || !Number.isInteger(version)) {
    throw AuthlyError.protocolViolation('HELLO.version must be an integer');
  }
  const challenge = readString(body, 'challenge', 'HELLO');
  if (!isBase64(challenge)) {
    throw AuthlyError.protocolViolation('HELLO.challenge must be base64');
  }
  return { version, challenge };
}

export function parseIdentity(frame: Frame): IdentityMessage {
  const body = decodeJsonPayload(frame);
  const chain = body.chain;
  if (!Array.isArray(chain) || chain.length === 0) {
    throw AuthlyError.protocolViolation('IDENTITY.chain must be a non-empty array');
  }
  const certs: string[] = [];
  for (const entry of chain) {
    if (typeof entry !== 'string' || !isBase64(entry)) {
      throw AuthlyError.protocolViolation('IDENTITY.chain entries must be base64 strings');
    }
    certs.push(entry);
  }
  const signature = readString(body, 'signature', 'IDENTITY');
  if (!isBase64(signature)) {
    throw AuthlyError.protocolViolation('IDENTITY.signature must be base64');
  }
  return { chain: certs, signature };
}

export function parseAccept(frame: Frame): AcceptMessage {
  const body = decodeJsonPayload(frame);
  const binding = readString(body, 'binding', 'ACCEPT');
  const serviceId = body.serviceId;
  if (serviceId !== undefined && serviceId !== null && typeof serviceId !== 'string') {
    throw AuthlyError.protocolViolation('ACCEPT.serviceId must be a string');
  }
  return { binding, serviceId: serviceId ?? null };
}

/** Unknown codes from the server are reported as UNTRUSTED_PEER refusals. */
export function parseReject(frame: Frame): RejectMessage {
  const body = decodeJsonPayload(frame);
  const code = isAuthlyErrorCode(body.code) ? body.code : AuthlyErrorCode.UNTRUSTED_PEER;
  const message = typeof body.message === 'string' && body.message.length > 0
    ? body.message
    : 'Identity rejected by server';
  return { code, message };
}

export function parseErrorMessage(frame: Frame): ErrorMessage {
  const body = decodeJsonPayload(frame);
  return {
    message: typeof body.message === 'string' ? body.message : 'Request failed',
  };
}
