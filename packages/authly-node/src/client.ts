import { EventEmitter } from 'node:events';
import { loadClientConfig } from './config.js';
import { AuthlyError, AuthlyErrorCode } from './errors.js';
import { HandshakeEngine } from './handshake.js';
import type { TransportConnector } from './handshake.js';
import { IdentityCredential } from './identity.js';
import { Logger } from './logger.js';
import type { MaterialSource } from './pem.js';
import { withRetry } from './retry.js';
import type { Session, SessionOptions } from './session.js';
import type { TraceStep } from './trace.js';
import { TrustStore } from './trust-store.js';
import type { PeerIdentity } from './types.js';

// ── Types ──────────────────────────────────────────────────────────

interface ConnectCommon {
  /** Authly URL, `https://host[:port]`. */
  url: string;
  /** Handshake deadline per attempt. Default: 10s. */
  timeoutMs?: number;
  /** Retries for transport failures and timeouts. Default: 0. */
  retries?: number;
  /**
   * Pin the server: its service id, Common Name or SHA-256 fingerprint must
   * equal this value. Checked after normal chain verification.
   */
  expectedPeerIdentity?: string;
  /** Name the server certificate must match, when it differs from the URL host. */
  servername?: string;
  /** Session settings for this connection, over the client's `session` defaults. */
  session?: SessionOptions;
  /** Re-establish the session when it is lost. Default: off. */
  reconnect?: boolean | ReconnectPolicy;
  signal?: AbortSignal;
}

export interface ReconnectPolicy {
  /** Handshake attempts per outage before giving up. Default: 5. */
  maxAttempts?: number;
  /** Delay before the second attempt. Default: the client's `retryBaseDelayMs`. */
  baseDelayMs?: number;
  maxDelayMs?: number;
}

export interface ConnectOptions extends ConnectCommon {
  /** Trust anchors: path or bytes. */
  caPath: MaterialSource;
  /** Identity: combined certificate + key, or the key alone when `certPath` is set. */
  idPath: MaterialSource;
  certPath?: MaterialSource;
}

export interface ConnectWithOptions extends ConnectCommon {
  trustStore: TrustStore;
  credential: IdentityCredential;
}

export interface AuthlyOptions {
  logger?: Logger;
  session?: SessionOptions;
  connector?: TransportConnector;
  /** Clock for certificate validity checks. */
  now?: () => Date;
  retryBaseDelayMs?: number;
  retryMaxDelayMs?: number;
  maxFramePayload?: number;
}

const RETRIED_CODES = new Set([AuthlyErrorCode.TRANSPORT, AuthlyErrorCode.TIMEOUT]);
const DEFAULT_RECONNECT_ATTEMPTS = 5;

interface Material {
  trustStore: TrustStore;
  credential: IdentityCredential;
}

interface Attempt {
  signal: AbortSignal;
  abort(reason: AuthlyError): void;
  /** Stop following the caller's signal. */
  detach(): void;
}

/** How a lost session is rebuilt; `load` runs again on every try. */
interface ReconnectPlan {
  options: ConnectCommon;
  policy: ReconnectPolicy;
  load: () => Promise<Material>;
}

/** True when `expected` names the peer by service id, Common Name or fingerprint. */
export function peerMatches(peer: PeerIdentity, expected: string): boolean {
  const wanted = expected.trim();
  if (wanted.length === 0) return false;
  if (peer.commonName !== null && peer.commonName === wanted) return true;
  if (peer.serviceId !== null && peer.serviceId === wanted.toLowerCase()) return true;
  return peer.fingerprint256.toUpperCase() === wanted.toUpperCase();
}

// ── Authly ─────────────────────────────────────────────────────────

/**
 * Connection manager: the entry point applications use.
 *
 * Owns at most one live Session. A new `connect` supersedes the previous
 * one: an attempt still in flight is cancelled and an established session
 * is closed before the new handshake starts.
 *
 * With `reconnect`, a session that ends without `close()` is rebuilt from
 * freshly loaded material, backing off between attempts. Emits `reconnect`
 * (Session) when a new session takes over and `reconnect_failed`
 * (AuthlyError) when the attempts run out or hit a verification failure.
 *
 * ```ts
 * const authly = new Authly();
 * const session = await authly.connect({
 *   url: 'https://authly',
 *   caPath: '/etc/authly/certs/local.crt',
 *   idPath: '/etc/authly/identity/identity.pem',
 * });
 * const reply = await session.send(Buffer.from('{"op":"whoami"}'));
 * ```
 */
export class Authly extends EventEmitter {
  private readonly _options: AuthlyOptions;
  private readonly _log: Logger;
  private _session: Session | null = null;
  private _credential: IdentityCredential | null = null;
  private _attempt: Attempt | null = null;
  private _lastTrace: readonly TraceStep[] = [];

  constructor(options?: AuthlyOptions) {
    super();
    this._options = options ?? {};
    this._log = (this._options.logger ?? new Logger()).child('authly');
  }

  /** Current session, if one is established and not yet closed. */
  get session(): Session | null {
    return this._session;
  }

  /** Trace of the most recent handshake attempt. */
  get lastTrace(): readonly TraceStep[] {
    return this._lastTrace;
  }

  isConnected(): boolean {
    return this._session !== null && this._session.isAlive();
  }

  /** True if the credential of the current connection expires within `ms`. */
  credentialExpiresWithin(ms: number): boolean {
    if (!this._credential) {
      throw AuthlyError.configuration('No credential loaded; connect first');
    }
    return this._credential.expiresWithin(ms, this._now());
  }

  /**
   * Load trust anchors and identity from disk, then connect.
   * No network I/O happens unless both load.
   */
  async connect(options: ConnectOptions): Promise<Session> {
    const load = async (): Promise<Material> => {
      const trustStore = await TrustStore.load(options.caPath);
      const credential = await IdentityCredential.load(options.idPath, options.certPath, {
        now: this._now(),
      });
      return { trustStore, credential };
    };

    const attempt = this._supersede(options.signal);
    try {
      const material = await load();
      this._throwIfAborted(attempt);
      return await this._establish({ ...options, ...material }, attempt, planFor(options, load));
    } finally {
      this._release(attempt);
    }
  }

  /** Connect with trust material and credential already loaded (and possibly shared). */
  async connectWith(options: ConnectWithOptions): Promise<Session> {
    const { trustStore, credential } = options;
    const attempt = this._supersede(options.signal);
    try {
      return await this._establish(options, attempt, planFor(options, async () => ({ trustStore, credential })));
    } finally {
      this._release(attempt);
    }
  }

  /** Connect using `AUTHLY_*` environment variables (see `loadClientConfig`). */
  async connectFromEnvironment(env?: Record<string, string | undefined>): Promise<Session> {
    const config = loadClientConfig(env);
    if (!this._options.logger) {
      this._log.setLevel(config.logLevel);
    }
    return this.connect({
      url: config.url,
      caPath: config.caPath,
      idPath: config.identityPath,
      timeoutMs: config.handshakeTimeoutMs,
      retries: config.retries,
      session: {
        keepaliveIntervalMs: config.keepaliveIntervalMs,
        keepaliveTimeoutMs: config.keepaliveTimeoutMs,
      },
    });
  }

  /** Cancel any attempt in flight and close the session. */
  close(): void {
    this._attempt?.abort(AuthlyError.cancelled('Client closed'));
    this._attempt = null;
    const session = this._session;
    // Cleared first so the close handler does not reconnect
    this._session = null;
    session?.close();
  }

  // ── Internals ──────────────────────────────────────────────────

  private _now(): Date {
    return this._options.now ? this._options.now() : new Date();
  }

  private _supersede(external?: AbortSignal): Attempt {
    if (this._attempt) {
      this._log.info('cancelling in-flight connect');
      this._attempt.abort(AuthlyError.cancelled('Superseded by a newer connect'));
    }
    const previous = this._session;
    if (previous) {
      this._log.info('closing session superseded by a new connect', { sessionId: previous.id });
      this._session = null;
      previous.close();
    }

    const controller = new AbortController();
    const onAbort = (): void => {
      controller.abort(AuthlyError.cancelled());
    };
    if (external?.aborted) {
      onAbort();
    } else {
      external?.addEventListener('abort', onAbort, { once: true });
    }
    const attempt: Attempt = {
      signal: controller.signal,
      abort: reason => controller.abort(reason),
      detach: () => external?.removeEventListener('abort', onAbort),
    };
    this._attempt = attempt;
    return attempt;
  }

  private _release(attempt: Attempt): void {
    attempt.detach();
    if (this._attempt === attempt) {
      this._attempt = null;
    }
  }

  private _throwIfAborted(attempt: Attempt): void {
    if (attempt.signal.aborted) {
      const reason: unknown = attempt.signal.reason;
      throw reason instanceof AuthlyError ? reason : AuthlyError.cancelled();
    }
  }

  private async _establish(
    options: ConnectWithOptions,
    attempt: Attempt,
    plan: ReconnectPlan | null,
    retries: number = options.retries ?? 0,
  ): Promise<Session> {
    const session = await withRetry(
      async (n) => {
        const engine = new HandshakeEngine({
          url: options.url,
          trustStore: options.trustStore,
          credential: options.credential,
          timeoutMs: options.timeoutMs,
          servername: options.servername,
          signal: attempt.signal,
          logger: this._log,
          now: this._options.now,
          connector: this._options.connector,
          maxFramePayload: this._options.maxFramePayload,
          session: { ...this._options.session, ...options.session },
        });
        this._log.debug('handshake attempt', { url: options.url, attempt: n + 1 });
        try {
          return await engine.run();
        } finally {
          this._lastTrace = engine.trace;
        }
      },
      {
        maxRetries: retries,
        baseDelayMs: this._options.retryBaseDelayMs,
        maxDelayMs: this._options.retryMaxDelayMs,
        retryOn: error => RETRIED_CODES.has(error.code),
        signal: attempt.signal,
        onRetry: (error, n, delayMs) => {
          this._log.warn('connect failed, retrying', { attempt: n + 1, delayMs, code: error.code, error: error.message });
        },
      },
    );

    if (attempt.signal.aborted) {
      session.close();
      this._throwIfAborted(attempt);
    }

    const expected = options.expectedPeerIdentity;
    if (expected !== undefined && !peerMatches(session.peerIdentity(), expected)) {
      session.close();
      throw AuthlyError.untrustedPeer(
        `Server identity "${session.peerIdentity().subject.replace(/\n/g, ', ')}" does not match expected "${expected}"`,
      );
    }

    this._session = session;
    this._credential = options.credential;
    session.once('close', (reason: AuthlyError) => {
      const current = this._session === session;
      if (current) {
        this._session = null;
      }
      this._log.info('session closed', { sessionId: session.id, code: reason.code });
      if (current && plan) {
        this._reconnect(plan, reason);
      }
    });
    return session;
  }

  private _reconnect(plan: ReconnectPlan, lost: AuthlyError): void {
    const { policy } = plan;
    const attempt = this._supersede(plan.options.signal);
    this._log.warn('session lost, reconnecting', { code: lost.code, error: lost.message });

    withRetry(
      async () => {
        const material = await plan.load();
        this._throwIfAborted(attempt);
        return this._establish({ ...plan.options, ...material }, attempt, plan, 0);
      },
      {
        maxRetries: Math.max(1, policy.maxAttempts ?? DEFAULT_RECONNECT_ATTEMPTS) - 1,
        baseDelayMs: policy.baseDelayMs ?? this._options.retryBaseDelayMs,
        maxDelayMs: policy.maxDelayMs ?? this._options.retryMaxDelayMs,
        retryOn: error => RETRIED_CODES.has(error.code),
        signal: attempt.signal,
        onRetry: (error, n, delayMs) => {
          this._log.warn('reconnect failed, retrying', { attempt: n + 1, delayMs, code: error.code, error: error.message });
        },
      },
    ).then(
      session => {
        this._release(attempt);
        this._log.info('reconnected', { sessionId: session.id });
        this.emit('reconnect', session);
      },
      (err: unknown) => {
        this._release(attempt);
        const error = AuthlyError.from(err);
        // Superseded by connect() or stopped by close()
        if (error.code === AuthlyErrorCode.CANCELLED) return;
        this._log.error('reconnect failed', { code: error.code, error: error.message });
        this.emit('reconnect_failed', error);
      },
    );
  }
}

function planFor(options: ConnectCommon, load: () => Promise<Material>): ReconnectPlan | null {
  if (!options.reconnect) return null;
  return { options, policy: options.reconnect === true ? {} : options.reconnect, load };
}
