// authly-node constants — protocol, limits and defaults

/** Library version. */
export const AUTHLY_CLIENT_VERSION = '0.3.0';

// ── Protocol ────────────────────────────────────────────────────────

/** ALPN protocol identifier negotiated on every connection. */
export const AUTHLY_ALPN_PROTOCOL = 'authly/1';

/** Protocol version carried in the server HELLO. */
export const PROTOCOL_VERSION = 1;

/** TLS exporter label used for channel binding. */
export const EXPORTER_LABEL = 'EXPORTER-authly-identity-v1';

/** Length of exported keying material in bytes. */
export const EXPORTER_LENGTH = 32;

/** Length of the server challenge in bytes. */
export const CHALLENGE_LENGTH = 32;

/** Domain separation prefix for the key-possession proof. */
export const PROOF_CONTEXT = 'authly-identity-proof/v1';

/** Domain separation prefix for the session-binding confirmation. */
export const SESSION_CONFIRM_CONTEXT = 'authly-session-confirm/v1';

// ── Limits ──────────────────────────────────────────────────────────

/** Size of the frame header: length (4) + type (1) + sequence (4). */
export const FRAME_HEADER_SIZE = 9;

/** Maximum frame payload accepted by default (1 MB). */
export const DEFAULT_MAX_FRAME_PAYLOAD = 1024 * 1024;

/** Maximum certificates walked when building a chain. */
export const MAX_CHAIN_DEPTH = 8;

/** Largest sequence number before it wraps back to 1. */
export const MAX_SEQUENCE = 0xffffffff;

// ── Defaults ────────────────────────────────────────────────────────

/** Default Authly URL when none is configured. */
export const DEFAULT_AUTHLY_URL = 'https://authly';

/** Default HTTPS port. */
export const DEFAULT_PORT = 443;

/** Mounted path of the Authly local CA certificate. */
export const DEFAULT_CA_PATH = '/etc/authly/certs/local.crt';

/** Mounted path of the service identity (certificate + key). */
export const DEFAULT_IDENTITY_PATH = '/etc/authly/identity/identity.pem';

/** Default handshake deadline (10 seconds). */
export const DEFAULT_HANDSHAKE_TIMEOUT_MS = 10_000;

/** Default keepalive ping interval (30 seconds). */
export const DEFAULT_KEEPALIVE_INTERVAL_MS = 30_000;

/** Default time allowed for a keepalive pong (10 seconds). */
export const DEFAULT_KEEPALIVE_TIMEOUT_MS = 10_000;

/** Default per-request timeout (30 seconds). */
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

/** Default first retry delay. */
export const DEFAULT_RETRY_BASE_DELAY_MS = 250;

/** Upper bound on retry delay. */
export const DEFAULT_RETRY_MAX_DELAY_MS = 10_000;
