// authly-node — Authly service identity client
//
// Mutual authentication between a service and Authly: verify the server
// against local trust anchors, prove possession of the service identity,
// then exchange requests over the authenticated session.

// Constants
export {
  AUTHLY_CLIENT_VERSION,
  AUTHLY_ALPN_PROTOCOL,
  PROTOCOL_VERSION,
  DEFAULT_AUTHLY_URL,
  DEFAULT_PORT,
  DEFAULT_CA_PATH,
  DEFAULT_IDENTITY_PATH,
  DEFAULT_HANDSHAKE_TIMEOUT_MS,
  DEFAULT_KEEPALIVE_INTERVAL_MS,
  DEFAULT_KEEPALIVE_TIMEOUT_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_MAX_FRAME_PAYLOAD,
  MAX_CHAIN_DEPTH,
} from './constants.js';

// Errors
export { AuthlyError, AuthlyErrorCode, isAuthlyErrorCode } from './errors.js';
export type { AuthlyErrorCategory } from './errors.js';

// Logging & configuration
export { Logger, LogLevel, createLogger, parseLogLevel } from './logger.js';
export type { LogEntry, LogOutput, LoggerOptions } from './logger.js';
export { loadClientConfig } from './config.js';
export type { ClientConfig } from './config.js';

// Trust & identity
export type { MaterialSource } from './pem.js';
export { parseServiceId, isServiceId, commonNameOf } from './service-id.js';
export type { ServiceId } from './service-id.js';
export type { PeerIdentity } from './types.js';
export { TrustStore } from './trust-store.js';
export type { VerifyChainOptions } from './trust-store.js';
export { IdentityCredential } from './identity.js';
export type { CredentialLoadOptions } from './identity.js';
export { parseEndpoint } from './endpoint.js';
export type { Endpoint } from './endpoint.js';
export { peerChainFromSocket } from './peer.js';
export type { PeerCertificateLike, PeerSocketLike } from './peer.js';

// Wire protocol
export { FrameType, FrameDecoder, encodeFrame } from './frame.js';
export type { Frame } from './frame.js';
export { buildProofTranscript, computeSessionBinding, verifyProofSignature } from './proof.js';

// Handshake, session & client
export { HandshakeEngine, connectTcp } from './handshake.js';
export type { HandshakeOptions, TransportConnector } from './handshake.js';
export { formatHandshakeTrace } from './trace.js';
export type { HandshakeState, TraceStep } from './trace.js';
export { Session } from './session.js';
export type { SessionOptions, SendOptions } from './session.js';
export { Authly, peerMatches } from './client.js';
export type { AuthlyOptions, ConnectOptions, ConnectWithOptions, ReconnectPolicy } from './client.js';
export { withRetry, backoffDelay } from './retry.js';
export type { RetryOptions } from './retry.js';

// Server
export { IdentityServer } from './server.js';
export type {
  IdentityServerOptions,
  IdentityServerStats,
  ServerSessionInfo,
  RequestContext,
  RequestHandler,
  AuthorizeHook,
} from './server.js';

// Middleware
export { authlyPeerExpressMiddleware } from './middleware/express.js';
export type { ExpressRequest, ExpressResponse, ExpressNextFunction } from './middleware/express.js';
export { authlyPeerFastifyPlugin } from './middleware/fastify.js';
export type { FastifyRequest, FastifyReply, FastifyInstance } from './middleware/fastify.js';
export { mtlsServerOptions } from './middleware/server-options.js';
export type { MtlsServerOptions } from './middleware/server-options.js';
export type { AuthlyPeerMiddlewareOptions, RequestSocketLike } from './middleware/types.js';
