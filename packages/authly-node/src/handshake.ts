import { isIP, connect as netConnect } from 'node:net';
import type { Socket } from 'node:net';
import { performance } from 'node:perf_hooks';
import type { Duplex } from 'node:stream';
import { connect as tlsConnect } from 'node:tls';
import type { TLSSocket } from 'node:tls';
import type { X509Certificate } from 'node:crypto';
import { FrameChannel } from './channel.js';
import { timingSafeStringEqual } from './compare.js';
import {
  AUTHLY_ALPN_PROTOCOL,
  CHALLENGE_LENGTH,
  DEFAULT_HANDSHAKE_TIMEOUT_MS,
  EXPORTER_LABEL,
  EXPORTER_LENGTH,
  PROTOCOL_VERSION,
} from './constants.js';
import { parseEndpoint } from './endpoint.js';
import type { Endpoint } from './endpoint.js';
import { AuthlyError } from './errors.js';
import { FrameType } from './frame.js';
import type { IdentityCredential } from './identity.js';
import { Logger } from './logger.js';
import { parseAccept, parseHello, parseReject } from './messages.js';
import type { AcceptMessage, IdentityMessage } from './messages.js';
import { peerChainFromSocket } from './peer.js';
import { buildProofTranscript, computeSessionBinding } from './proof.js';
import { Session } from './session.js';
import type { SessionOptions } from './session.js';
import type { HandshakeState, TraceStep } from './trace.js';
import type { TrustStore } from './trust-store.js';
import type { PeerIdentity } from './types.js';

/** Opens the byte stream the TLS session runs over. */
export type TransportConnector = (endpoint: Endpoint, signal: AbortSignal) => Promise<Duplex>;

export interface HandshakeOptions {
  url: string;
  trustStore: TrustStore;
  credential: IdentityCredential;
  /** Deadline for the whole handshake, from `run()` to `established`. Default: 10s. */
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Name the server certificate must match. Default: the URL host. */
  servername?: string;
  logger?: Logger;
  /** Clock used for certificate validity checks. */
  now?: () => Date;
  connector?: TransportConnector;
  maxFramePayload?: number;
  session?: SessionOptions;
  onTransition?: (step: TraceStep) => void;
}

/** Default connector: plain TCP. */
export function connectTcp(endpoint: Endpoint, signal: AbortSignal): Promise<Duplex> {
  return new Promise<Duplex>((resolve, reject) => {
    const socket: Socket = netConnect({ host: endpoint.host, port: endpoint.port });

    const onAbort = (): void => {
      socket.destroy();
    };
    signal.addEventListener('abort', onAbort, { once: true });

    socket.once('connect', () => {
      signal.removeEventListener('abort', onAbort);
      resolve(socket);
    });
    socket.on('error', (err: Error) => {
      signal.removeEventListener('abort', onAbort);
      reject(AuthlyError.transport(`Connection to ${endpoint.origin} failed: ${err.message}`, err));
    });
  });
}

function abortReason(signal: AbortSignal): AuthlyError {
  return signal.reason instanceof AuthlyError ? signal.reason : AuthlyError.cancelled('Handshake cancelled');
}

/**
 * Client side of the Authly handshake.
 *
 * Drives one connection attempt through
 * `init → transport_connecting → tls_negotiating → peer_verifying →
 * identity_presenting → established`, or into `failed` from any state.
 * The peer's chain is verified before any proof is sent, so a server that
 * fails verification never sees the identity.
 *
 * Single-use: `run()` may be called once.
 */
export class HandshakeEngine {
  private readonly _options: HandshakeOptions;
  private readonly _log: Logger;
  private readonly _trace: TraceStep[] = [];
  private _state: HandshakeState = 'init';
  private _startedAt = 0;

  constructor(options: HandshakeOptions) {
    this._options = options;
    this._log = (options.logger ?? new Logger()).child('handshake');
  }

  get state(): HandshakeState {
    return this._state;
  }

  get trace(): readonly TraceStep[] {
    return [...this._trace];
  }

  async run(): Promise<Session> {
    if (this._state !== 'init' || this._trace.length > 0) {
      throw AuthlyError.internalError('Handshake engine is single-use');
    }
    this._startedAt = performance.now();
    this._record('init', true, { url: this._options.url });

    const timeoutMs = this._options.timeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS;
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(AuthlyError.timeout(`Handshake did not complete within ${timeoutMs}ms`));
    }, timeoutMs);
    timer.unref();

    const external = this._options.signal;
    const onExternalAbort = (): void => {
      controller.abort(AuthlyError.cancelled('Handshake cancelled'));
    };
    if (external?.aborted) {
      onExternalAbort();
    } else {
      external?.addEventListener('abort', onExternalAbort, { once: true });
    }

    const signal = controller.signal;
    let transport: Duplex | undefined;
    let tls: TLSSocket | undefined;
    let channel: FrameChannel | undefined;

    try {
      if (signal.aborted) throw abortReason(signal);
      const endpoint = parseEndpoint(this._options.url);
      const servername = this._options.servername ?? endpoint.servername;

      this._transition('transport_connecting', { host: endpoint.host, port: endpoint.port });
      const connector = this._options.connector ?? connectTcp;
      transport = await this._race(connector(endpoint, signal), signal);

      this._transition('tls_negotiating', { servername: servername ?? '(none)' });
      tls = tlsConnect({
        socket: transport,
        host: endpoint.host,
        servername,
        ca: this._options.trustStore.toPem(),
        // Chain verification is ours; OpenSSL's verdict is cross-checked below
        rejectUnauthorized: false,
        ALPNProtocols: [AUTHLY_ALPN_PROTOCOL],
        minVersion: 'TLSv1.2',
      });
      await this._race(secureConnected(tls), signal);

      this._transition('peer_verifying', { protocol: tls.getProtocol() ?? 'unknown' });
      const { peer, leaf } = this._verifyPeer(tls, servername ?? endpoint.host);

      this._transition('identity_presenting', { peer: peer.commonName ?? peer.subject });
      channel = new FrameChannel(tls, { maxFramePayload: this._options.maxFramePayload });
      const accept = await this._race(this._presentIdentity(channel, tls, leaf), signal);

      this._transition('established', accept.serviceId ? { serviceId: accept.serviceId } : undefined);
      this._log.info('session established', {
        origin: endpoint.origin,
        peer: peer.subject,
        fingerprint: peer.fingerprint256,
      });

      return new Session({
        ...this._options.session,
        maxFramePayload: this._options.session?.maxFramePayload ?? this._options.maxFramePayload,
        logger: this._options.session?.logger ?? this._options.logger,
        channel,
        peer,
        origin: endpoint.origin,
        serviceId: accept.serviceId,
      });
    } catch (err: unknown) {
      const error = AuthlyError.from(err);
      if (channel) {
        channel.destroy(error);
      } else {
        tls?.destroy();
        transport?.destroy();
      }
      this._fail(error);
      throw error;
    } finally {
      clearTimeout(timer);
      external?.removeEventListener('abort', onExternalAbort);
    }
  }

  // ── Steps ───────────────────────────────────────────────────────

  private _verifyPeer(socket: TLSSocket, hostname: string): { peer: PeerIdentity; leaf: X509Certificate } {
    if (socket.alpnProtocol !== AUTHLY_ALPN_PROTOCOL) {
      throw AuthlyError.protocolViolation(
        `Server did not negotiate ${AUTHLY_ALPN_PROTOCOL} (got ${String(socket.alpnProtocol)})`,
      );
    }

    const chain = peerChainFromSocket(socket);
    if (chain.length === 0) {
      throw AuthlyError.peerCertificateRequired();
    }
    const [leaf] = chain;
    const peer = this._options.trustStore.verifyChain(chain, leaf, { now: this._now() });

    const matched = isIP(hostname) !== 0 ? leaf.checkIP(hostname) : leaf.checkHost(hostname);
    if (matched === undefined) {
      throw AuthlyError.untrustedPeer(`Server certificate does not match "${hostname}"`);
    }

    if (!socket.authorized) {
      throw AuthlyError.untrustedPeer(
        `TLS layer rejected the server certificate: ${String(socket.authorizationError)}`,
      );
    }
    return { peer, leaf };
  }

  private async _presentIdentity(
    channel: FrameChannel,
    socket: TLSSocket,
    serverLeaf: X509Certificate,
  ): Promise<AcceptMessage> {
    const { credential } = this._options;
    credential.assertValidAt(this._now());

    const helloFrame = await channel.receive();
    if (helloFrame.type === FrameType.REJECT) {
      const reject = parseReject(helloFrame);
      throw new AuthlyError(reject.code, `Server refused the connection: ${reject.message}`);
    }
    if (helloFrame.type !== FrameType.HELLO) {
      throw AuthlyError.protocolViolation(`Expected HELLO, received ${FrameType[helloFrame.type]}`);
    }
    const hello = parseHello(helloFrame);
    if (hello.version !== PROTOCOL_VERSION) {
      throw AuthlyError.protocolViolation(`Unsupported protocol version ${hello.version}`);
    }
    const challenge = Buffer.from(hello.challenge, 'base64');
    if (challenge.length !== CHALLENGE_LENGTH) {
      throw AuthlyError.protocolViolation(`Challenge must be ${CHALLENGE_LENGTH} bytes`);
    }

    const exporter = socket.exportKeyingMaterial(EXPORTER_LENGTH, EXPORTER_LABEL);
    const transcript = buildProofTranscript({
      challenge,
      exporter,
      serverCertificate: serverLeaf.raw,
    });
    const identity: IdentityMessage = {
      chain: credential.chain.map(c => c.raw.toString('base64')),
      signature: credential.sign(transcript).toString('base64'),
    };
    await channel.send(FrameType.IDENTITY, 0, Buffer.from(JSON.stringify(identity), 'utf8'));

    const reply = await channel.receive();
    if (reply.type === FrameType.REJECT) {
      const reject = parseReject(reply);
      throw new AuthlyError(reject.code, `Server rejected identity: ${reject.message}`);
    }
    if (reply.type !== FrameType.ACCEPT) {
      throw AuthlyError.protocolViolation(`Expected ACCEPT, received ${FrameType[reply.type]}`);
    }
    const accept = parseAccept(reply);
    if (!timingSafeStringEqual(accept.binding, computeSessionBinding(exporter))) {
      throw AuthlyError.protocolViolation('Session binding does not match this connection');
    }
    return accept;
  }

  // ── Helpers ─────────────────────────────────────────────────────

  private _now(): Date {
    return this._options.now ? this._options.now() : new Date();
  }

  /** Race a step against the deadline and cancellation signal. */
  private _race<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
    if (signal.aborted) {
      return Promise.reject(abortReason(signal));
    }
    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => reject(abortReason(signal));
      signal.addEventListener('abort', onAbort, { once: true });
      promise.then(
        value => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (err: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(err);
        },
      );
    });
  }

  private _transition(state: HandshakeState, detail?: TraceStep['detail']): void {
    this._state = state;
    this._record(state, true, detail);
    this._log.debug('handshake state', { state, ...detail });
  }

  private _fail(error: AuthlyError): void {
    const from = this._state;
    this._state = 'failed';
    this._record('failed', false, { from }, `${error.code}: ${error.message}`);
    this._log.warn('handshake failed', { from, code: error.code, error: error.message });
  }

  private _record(
    state: HandshakeState,
    ok: boolean,
    detail?: TraceStep['detail'],
    error?: string,
  ): void {
    const step: TraceStep = {
      step: this._trace.length + 1,
      state,
      elapsedMs: performance.now() - this._startedAt,
      ok,
      ...(detail ? { detail } : {}),
      ...(error ? { error } : {}),
    };
    this._trace.push(step);
    this._options.onTransition?.(step);
  }
}

function secureConnected(socket: TLSSocket): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    socket.once('secureConnect', () => resolve());
    // Stays attached until the channel takes over error handling
    socket.on('error', (err: Error) => {
      reject(AuthlyError.transport(`TLS negotiation failed: ${err.message}`, err));
    });
  });
}
