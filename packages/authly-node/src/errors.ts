/**
 * Authly error codes.
 * Every code belongs to one category and carries an HTTP status for middleware responses.
 */
export enum AuthlyErrorCode {
  TRUST_MATERIAL = 'AUTHLY_TRUST_MATERIAL',
  CREDENTIAL_LOAD = 'AUTHLY_CREDENTIAL_LOAD',
  KEY_MISMATCH = 'AUTHLY_KEY_MISMATCH',
  INVALID_ENDPOINT = 'AUTHLY_INVALID_ENDPOINT',
  CONFIGURATION = 'AUTHLY_CONFIGURATION',
  TRANSPORT = 'AUTHLY_TRANSPORT',
  TIMEOUT = 'AUTHLY_TIMEOUT',
  CANCELLED = 'AUTHLY_CANCELLED',
  UNTRUSTED_PEER = 'AUTHLY_UNTRUSTED_PEER',
  EXPIRED_CERTIFICATE = 'AUTHLY_EXPIRED_CERTIFICATE',
  MALFORMED_CHAIN = 'AUTHLY_MALFORMED_CHAIN',
  PEER_CERTIFICATE_REQUIRED = 'AUTHLY_PEER_CERTIFICATE_REQUIRED',
  SIGNING = 'AUTHLY_SIGNING',
  CHANNEL_CLOSED = 'AUTHLY_CHANNEL_CLOSED',
  PROTOCOL_VIOLATION = 'AUTHLY_PROTOCOL_VIOLATION',
  REQUEST_FAILED = 'AUTHLY_REQUEST_FAILED',
  INTERNAL = 'AUTHLY_INTERNAL',
}

/**
 * Where an error originates.
 *
 * - `configuration`: bad trust material, credential or settings; needs an operator.
 * - `verification`: a certificate or proof was rejected.
 * - `transport`: network or deadline; may be retried.
 * - `session`: failure on an already established session.
 */
export type AuthlyErrorCategory =
  | 'configuration'
  | 'verification'
  | 'transport'
  | 'session'
  | 'internal';

const CATEGORY_MAP: Record<AuthlyErrorCode, AuthlyErrorCategory> = {
  [AuthlyErrorCode.TRUST_MATERIAL]: 'configuration',
  [AuthlyErrorCode.CREDENTIAL_LOAD]: 'configuration',
  [AuthlyErrorCode.KEY_MISMATCH]: 'configuration',
  [AuthlyErrorCode.INVALID_ENDPOINT]: 'configuration',
  [AuthlyErrorCode.CONFIGURATION]: 'configuration',
  [AuthlyErrorCode.TRANSPORT]: 'transport',
  [AuthlyErrorCode.TIMEOUT]: 'transport',
  [AuthlyErrorCode.CANCELLED]: 'transport',
  [AuthlyErrorCode.UNTRUSTED_PEER]: 'verification',
  [AuthlyErrorCode.EXPIRED_CERTIFICATE]: 'verification',
  [AuthlyErrorCode.MALFORMED_CHAIN]: 'verification',
  [AuthlyErrorCode.PEER_CERTIFICATE_REQUIRED]: 'verification',
  [AuthlyErrorCode.SIGNING]: 'verification',
  [AuthlyErrorCode.CHANNEL_CLOSED]: 'session',
  [AuthlyErrorCode.PROTOCOL_VIOLATION]: 'session',
  [AuthlyErrorCode.REQUEST_FAILED]: 'session',
  [AuthlyErrorCode.INTERNAL]: 'internal',
};

/** Map from AuthlyErrorCode to HTTP status code. */
const HTTP_STATUS_MAP: Record<AuthlyErrorCode, number> = {
  [AuthlyErrorCode.TRUST_MATERIAL]: 500,
  [AuthlyErrorCode.CREDENTIAL_LOAD]: 500,
  [AuthlyErrorCode.KEY_MISMATCH]: 500,
  [AuthlyErrorCode.INVALID_ENDPOINT]: 500,
  [AuthlyErrorCode.CONFIGURATION]: 500,
  [AuthlyErrorCode.TRANSPORT]: 502,
  [AuthlyErrorCode.TIMEOUT]: 504,
  [AuthlyErrorCode.CANCELLED]: 499,
  [AuthlyErrorCode.UNTRUSTED_PEER]: 495,
  [AuthlyErrorCode.EXPIRED_CERTIFICATE]: 495,
  [AuthlyErrorCode.MALFORMED_CHAIN]: 495,
  [AuthlyErrorCode.PEER_CERTIFICATE_REQUIRED]: 496,
  [AuthlyErrorCode.SIGNING]: 401,
  [AuthlyErrorCode.CHANNEL_CLOSED]: 503,
  [AuthlyErrorCode.PROTOCOL_VIOLATION]: 400,
  [AuthlyErrorCode.REQUEST_FAILED]: 502,
  [AuthlyErrorCode.INTERNAL]: 500,
};

/** Retryable error codes (transient conditions). */
const RETRYABLE_CODES = new Set([
  AuthlyErrorCode.TRANSPORT,
  AuthlyErrorCode.TIMEOUT,
  AuthlyErrorCode.CHANNEL_CLOSED,
]);

const CODE_VALUES = new Set<string>(Object.values(AuthlyErrorCode));

/** Narrow an untrusted string (e.g. from the wire) to an AuthlyErrorCode. */
export function isAuthlyErrorCode(value: unknown): value is AuthlyErrorCode {
  return typeof value === 'string' && CODE_VALUES.has(value);
}

/**
 * Structured error type for Authly operations.
 * Messages never contain key material.
 */
export class AuthlyError extends Error {
  readonly code: AuthlyErrorCode;
  readonly category: AuthlyErrorCategory;
  readonly httpStatus: number;
  readonly retryable: boolean;

  constructor(code: AuthlyErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AuthlyError';
    this.code = code;
    this.category = CATEGORY_MAP[code];
    this.httpStatus = HTTP_STATUS_MAP[code];
    this.retryable = RETRYABLE_CODES.has(code);
  }

  /** Serializable form used on the wire and by the CLI. */
  toJSON(): { code: AuthlyErrorCode; message: string } {
    return { code: this.code, message: this.message };
  }

  // ── Convenience factories ──────────────────────────────────────────

  static trustMaterial(message: string, cause?: unknown): AuthlyError {
    return new AuthlyError(AuthlyErrorCode.TRUST_MATERIAL, message, { cause });
  }

  static credentialLoad(message: string, cause?: unknown): AuthlyError {
    return new AuthlyError(AuthlyErrorCode.CREDENTIAL_LOAD, message, { cause });
  }

  static keyMismatch(): AuthlyError {
    return new AuthlyError(
      AuthlyErrorCode.KEY_MISMATCH,
      'Private key does not match the certificate public key',
    );
  }

  static invalidEndpoint(message: string): AuthlyError {
    return new AuthlyError(AuthlyErrorCode.INVALID_ENDPOINT, message);
  }

  static configuration(message: string): AuthlyError {
    return new AuthlyError(AuthlyErrorCode.CONFIGURATION, message);
  }

  static transport(message: string, cause?: unknown): AuthlyError {
    return new AuthlyError(AuthlyErrorCode.TRANSPORT, message, { cause });
  }

  static timeout(message: string): AuthlyError {
    return new AuthlyError(AuthlyErrorCode.TIMEOUT, message);
  }

  static cancelled(message = 'Operation cancelled'): AuthlyError {
    return new AuthlyError(AuthlyErrorCode.CANCELLED, message);
  }

  static untrustedPeer(message: string): AuthlyError {
    return new AuthlyError(AuthlyErrorCode.UNTRUSTED_PEER, message);
  }

  static expiredCertificate(message: string): AuthlyError {
    return new AuthlyError(AuthlyErrorCode.EXPIRED_CERTIFICATE, message);
  }

  static malformedChain(message: string, cause?: unknown): AuthlyError {
    return new AuthlyError(AuthlyErrorCode.MALFORMED_CHAIN, message, { cause });
  }

  static peerCertificateRequired(): AuthlyError {
    return new AuthlyError(
      AuthlyErrorCode.PEER_CERTIFICATE_REQUIRED,
      'Peer did not present a certificate',
    );
  }

  static signing(message: string, cause?: unknown): AuthlyError {
    return new AuthlyError(AuthlyErrorCode.SIGNING, message, { cause });
  }

  static channelClosed(message = 'Channel is closed', cause?: unknown): AuthlyError {
    return new AuthlyError(AuthlyErrorCode.CHANNEL_CLOSED, message, { cause });
  }

  static protocolViolation(message: string): AuthlyError {
    return new AuthlyError(AuthlyErrorCode.PROTOCOL_VIOLATION, message);
  }

  static requestFailed(message: string): AuthlyError {
    return new AuthlyError(AuthlyErrorCode.REQUEST_FAILED, message);
  }

  static internalError(message: string, cause?: unknown): AuthlyError {
    return new AuthlyError(AuthlyErrorCode.INTERNAL, message, { cause });
  }

  /** Wrap anything thrown into an AuthlyError, keeping AuthlyErrors as they are. */
  static from(err: unknown, fallback: AuthlyErrorCode = AuthlyErrorCode.INTERNAL): AuthlyError {
    if (err instanceof AuthlyError) return err;
    const message = err instanceof Error ? err.message : 'Unknown error';
    return new AuthlyError(fallback, message, { cause: err });
  }
}
