import { randomUUID, X509Certificate } from 'node:crypto';
import { EventEmitter } from 'node:events';
import type { AddressInfo } from 'node:net';
import { createServer } from 'node:tls';
import type { Server, TLSSocket } from 'node:tls';
import { FrameChannel } from './channel.js';
import {
  AUTHLY_ALPN_PROTOCOL,
  DEFAULT_HANDSHAKE_TIMEOUT_MS,
  EXPORTER_LABEL,
  EXPORTER_LENGTH,
  PROTOCOL_VERSION,
} from './constants.js';
import { AuthlyError } from './errors.js';
import { FrameType } from './frame.js';
import type { Frame } from './frame.js';
import type { IdentityCredential } from './identity.js';
import { Logger } from './logger.js';
import { parseIdentity } from './messages.js';
import type { AcceptMessage, ErrorMessage, HelloMessage, RejectMessage } from './messages.js';
import { buildProofTranscript, computeSessionBinding, createChallenge, verifyProofSignature } from './proof.js';
import type { TrustStore } from './trust-store.js';
import type { PeerIdentity } from './types.js';

// ── Types ──────────────────────────────────────────────────────────

export interface RequestContext {
  sessionId: string;
  sequence: number;
  peer: PeerIdentity;
}

export type RequestHandler = (
  payload: Buffer,
  context: RequestContext,
) => Uint8Array | string | Promise<Uint8Array | string>;

/** Final say on a verified client. Return false to reject it. */
export type AuthorizeHook = (peer: PeerIdentity) => boolean | Promise<boolean>;

export interface IdentityServerOptions {
  trustStore: TrustStore;
  credential: IdentityCredential;
  handler?: RequestHandler;
  authorize?: AuthorizeHook;
  /** Time a client has to present its identity. Default: 10s. */
  handshakeTimeoutMs?: number;
  logger?: Logger;
  now?: () => Date;
  maxFramePayload?: number;
}

export interface IdentityServerStats {
  handshakesStarted: number;
  identitiesReceived: number;
  sessionsEstablished: number;
  rejected: number;
}

export interface ServerSessionInfo {
  id: string;
  peer: PeerIdentity;
  remoteAddress: string | undefined;
}

interface ServerSession extends ServerSessionInfo {
  channel: FrameChannel;
}

const noHandler: RequestHandler = () => {
  throw AuthlyError.requestFailed('No request handler configured');
};

function json(body: unknown): Buffer {
  return Buffer.from(JSON.stringify(body), 'utf8');
}

// ── IdentityServer ─────────────────────────────────────────────────

/**
 * Server half of the Authly identity protocol.
 *
 * Presents its own credential over TLS, challenges every client for proof
 * of key possession, verifies the client chain against its trust store and
 * then serves requests. Emits `session` (ServerSessionInfo) when a client is
 * accepted and `rejected` (AuthlyError, remote address) when one is refused.
 */
export class IdentityServer extends EventEmitter {
  private readonly _options: IdentityServerOptions;
  private readonly _server: Server;
  private readonly _log: Logger;
  private readonly _sockets = new Set<TLSSocket>();
  private readonly _sessions = new Map<string, ServerSession>();
  private readonly _stats: IdentityServerStats = {
    handshakesStarted: 0,
    identitiesReceived: 0,
    sessionsEstablished: 0,
    rejected: 0,
  };

  constructor(options: IdentityServerOptions) {
    super();
    this._options = options;
    this._log = (options.logger ?? new Logger()).child('server');
    this._server = createServer(
      {
        ...options.credential.tlsOptions(),
        ALPNProtocols: [AUTHLY_ALPN_PROTOCOL],
        minVersion: 'TLSv1.2',
      },
      socket => this._onConnection(socket),
    );
    this._server.on('tlsClientError', (err: Error) => {
      this._log.debug('TLS handshake with client failed', { error: err.message });
    });
  }

  get stats(): Readonly<IdentityServerStats> {
    return { ...this._stats };
  }

  /** Sessions currently established. */
  get sessions(): ServerSessionInfo[] {
    return [...this._sessions.values()].map(({ id, peer, remoteAddress }) => ({ id, peer, remoteAddress }));
  }

  /** Port the server listens on, once listening. */
  get port(): number | null {
    const address = this._server.address();
    return address !== null && typeof address === 'object' ? address.port : null;
  }

  listen(port = 0, host = '127.0.0.1'): Promise<AddressInfo> {
    return new Promise<AddressInfo>((resolve, reject) => {
      const onError = (err: Error): void => reject(AuthlyError.transport(`Cannot listen on ${host}:${port}: ${err.message}`, err));
      this._server.once('error', onError);
      this._server.listen(port, host, () => {
        this._server.off('error', onError);
        const address = this._server.address();
        if (address === null || typeof address === 'string') {
          reject(AuthlyError.internalError('Server is not bound to a TCP address'));
          return;
        }
        this._log.info('listening', { host: address.address, port: address.port });
        resolve(address);
      });
    });
  }

  /** Send CLOSE to every established session. */
  endSessions(): void {
    for (const session of this._sessions.values()) {
      session.channel.end();
    }
  }

  /** Stop accepting connections and drop the open ones. */
  close(): Promise<void> {
    for (const socket of this._sockets) {
      socket.destroy();
    }
    return new Promise<void>((resolve, reject) => {
      this._server.close(err => (err ? reject(err) : resolve()));
    });
  }

  // ── Connection handling ──────────────────────────────────────────

  private _now(): Date {
    return this._options.now ? this._options.now() : new Date();
  }

  private _onConnection(socket: TLSSocket): void {
    this._stats.handshakesStarted++;
    this._sockets.add(socket);
    socket.once('close', () => this._sockets.delete(socket));

    const channel = new FrameChannel(socket, { maxFramePayload: this._options.maxFramePayload });
    this._handshake(socket, channel).catch((err: unknown) => {
      const error = AuthlyError.from(err);
      this._log.error('connection handler failed', { code: error.code, error: error.message });
      channel.destroy(error);
    });
  }

  private async _handshake(socket: TLSSocket, channel: FrameChannel): Promise<void> {
    const timeoutMs = this._options.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS;
    const timer = setTimeout(() => {
      channel.destroy(AuthlyError.timeout(`Client did not present an identity within ${timeoutMs}ms`));
    }, timeoutMs);
    timer.unref();

    let peer: PeerIdentity;
    let exporter: Buffer;
    try {
      const challenge = createChallenge();
      const hello: HelloMessage = { version: PROTOCOL_VERSION, challenge: challenge.toString('base64') };
      await channel.send(FrameType.HELLO, 0, json(hello));

      const frame = await channel.receive();
      if (frame.type !== FrameType.IDENTITY) {
        throw AuthlyError.protocolViolation(`Expected IDENTITY, received ${FrameType[frame.type]}`);
      }
      const identity = parseIdentity(frame);
      this._stats.identitiesReceived++;

      const chain = identity.chain.map(b64 => {
        try {
          return new X509Certificate(Buffer.from(b64, 'base64'));
        } catch (err: unknown) {
          throw AuthlyError.malformedChain('Client presented an undecodable certificate', err);
        }
      });
      const [leaf] = chain;
      peer = this._options.trustStore.verifyChain(chain, leaf, { now: this._now() });

      exporter = socket.exportKeyingMaterial(EXPORTER_LENGTH, EXPORTER_LABEL);
      const transcript = buildProofTranscript({
        challenge,
        exporter,
        serverCertificate: this._options.credential.certificate.raw,
      });
      if (!verifyProofSignature(transcript, Buffer.from(identity.signature, 'base64'), leaf.publicKey)) {
        throw AuthlyError.signing('Identity proof signature does not verify');
      }

      if (this._options.authorize && !(await this._options.authorize(peer))) {
        throw AuthlyError.untrustedPeer('Client identity is not authorized');
      }
    } catch (err: unknown) {
      clearTimeout(timer);
      await this._reject(socket, channel, AuthlyError.from(err));
      return;
    }

    clearTimeout(timer);
    const accept: AcceptMessage = { binding: computeSessionBinding(exporter), serviceId: peer.serviceId };
    await channel.send(FrameType.ACCEPT, 0, json(accept));
    this._establish(socket, channel, peer);
  }

  private async _reject(socket: TLSSocket, channel: FrameChannel, error: AuthlyError): Promise<void> {
    this._stats.rejected++;
    this._log.info('client rejected', {
      remoteAddress: socket.remoteAddress,
      code: error.code,
      error: error.message,
    });
    this.emit('rejected', error, socket.remoteAddress);

    if (channel.closed) return;
    const reject: RejectMessage = { code: error.code, message: error.message };
    await channel.send(FrameType.REJECT, 0, json(reject));
    channel.end();
  }

  private _establish(socket: TLSSocket, channel: FrameChannel, peer: PeerIdentity): void {
    const session: ServerSession = {
      id: randomUUID(),
      peer,
      remoteAddress: socket.remoteAddress,
      channel,
    };
    this._sessions.set(session.id, session);
    this._stats.sessionsEstablished++;
    this._log.info('client accepted', { sessionId: session.id, peer: peer.subject });

    channel.attach({
      onFrame: frame => this._onSessionFrame(session, frame),
      onClose: reason => {
        this._sessions.delete(session.id);
        this._log.debug('session ended', { sessionId: session.id, code: reason.code });
      },
    });
    this.emit('session', { id: session.id, peer, remoteAddress: session.remoteAddress });
  }

  private _onSessionFrame(session: ServerSession, frame: Frame): void {
    const { channel } = session;
    const onSendError = (err: unknown): void => {
      channel.destroy(AuthlyError.from(err));
    };

    switch (frame.type) {
      case FrameType.REQUEST:
        this._dispatch(session, frame).catch(onSendError);
        return;
      case FrameType.PING:
        channel.send(FrameType.PONG, frame.sequence).catch(onSendError);
        return;
      case FrameType.PONG:
        return;
      case FrameType.CLOSE:
        channel.destroy(AuthlyError.channelClosed('Client closed the session'));
        return;
      default:
        channel.destroy(
          AuthlyError.protocolViolation(`Unexpected ${FrameType[frame.type]} frame from client`),
        );
    }
  }

  private async _dispatch(session: ServerSession, frame: Frame): Promise<void> {
    const handler = this._options.handler ?? noHandler;
    let result: Uint8Array | string;
    try {
      result = await handler(frame.payload, {
        sessionId: session.id,
        sequence: frame.sequence,
        peer: session.peer,
      });
    } catch (err: unknown) {
      const message: ErrorMessage = { message: err instanceof Error ? err.message : 'Request failed' };
      this._log.debug('request handler failed', { sessionId: session.id, error: message.message });
      if (!session.channel.closed) {
        await session.channel.send(FrameType.ERROR, frame.sequence, json(message));
      }
      return;
    }

    if (session.channel.closed) return;
    const payload = typeof result === 'string' ? Buffer.from(result, 'utf8') : result;
    await session.channel.send(FrameType.RESPONSE, frame.sequence, payload);
  }
}
