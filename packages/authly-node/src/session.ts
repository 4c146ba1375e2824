import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'node:events';
import { performance } from 'node:perf_hooks';
import type { FrameChannel } from './channel.js';
import {
  DEFAULT_KEEPALIVE_INTERVAL_MS,
  DEFAULT_KEEPALIVE_TIMEOUT_MS,
  DEFAULT_MAX_FRAME_PAYLOAD,
  DEFAULT_REQUEST_TIMEOUT_MS,
  MAX_SEQUENCE,
} from './constants.js';
import { AuthlyError, AuthlyErrorCode } from './errors.js';
import { FrameType } from './frame.js';
import type { Frame } from './frame.js';
import { Logger } from './logger.js';
import { parseErrorMessage } from './messages.js';
import type { PeerIdentity } from './types.js';

export interface SessionOptions {
  /** Idle time before a keepalive PING is sent. `0` disables keepalive. Default: 30s. */
  keepaliveIntervalMs?: number;
  /** Time allowed for a PONG. Default: 10s. */
  keepaliveTimeoutMs?: number;
  /** Per-request deadline. `0` disables it. Default: 30s. */
  requestTimeoutMs?: number;
  /** Largest request payload `send` accepts; the server's frame limit. Default: 1 MiB. */
  maxFramePayload?: number;
  logger?: Logger;
}

export interface SessionInit extends SessionOptions {
  channel: FrameChannel;
  peer: PeerIdentity;
  /** `https://host:port` the session was established with. */
  origin: string;
  /** Service id the server assigned to this client in ACCEPT, if any. */
  serviceId: string | null;
}

export interface SendOptions {
  /** Overrides the session's request timeout for this call. */
  timeoutMs?: number;
}

interface Exchange {
  sequence: number;
  expect: FrameType.RESPONSE | FrameType.PONG;
  resolve: (payload: Buffer) => void;
  reject: (err: AuthlyError) => void;
  timer: NodeJS.Timeout | null;
}

/**
 * An authenticated channel to Authly.
 *
 * Requests are serialized: each `send` waits for the previous exchange to
 * finish, and every frame carries the next sequence number. The session
 * ends on `close()`, a peer disconnect, a protocol violation, a request
 * timeout or a failed keepalive; `close` is emitted exactly once, with the
 * AuthlyError that ended it.
 */
export class Session extends EventEmitter {
  readonly id: string = randomUUID();
  readonly origin: string;
  readonly serviceId: string | null;

  private readonly _channel: FrameChannel;
  private readonly _peer: PeerIdentity;
  private readonly _log: Logger;
  private readonly _keepaliveIntervalMs: number;
  private readonly _keepaliveTimeoutMs: number;
  private readonly _requestTimeoutMs: number;
  private readonly _maxFramePayload: number;
  private readonly _keepalive: NodeJS.Timeout | null;

  private _sequence = 0;
  private _tail: Promise<void> = Promise.resolve();
  private _pending = 0;
  private _inflight: Exchange | null = null;
  private _lastActivity: number = Date.now();
  private _closeReason: AuthlyError | null = null;

  constructor(init: SessionInit) {
    super();
    this._channel = init.channel;
    this._peer = init.peer;
    this.origin = init.origin;
    this.serviceId = init.serviceId;
    this._log = (init.logger ?? new Logger()).child('session');
    this._keepaliveIntervalMs = init.keepaliveIntervalMs ?? DEFAULT_KEEPALIVE_INTERVAL_MS;
    this._keepaliveTimeoutMs = init.keepaliveTimeoutMs ?? DEFAULT_KEEPALIVE_TIMEOUT_MS;
    this._requestTimeoutMs = init.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this._maxFramePayload = init.maxFramePayload ?? DEFAULT_MAX_FRAME_PAYLOAD;

    if (this._keepaliveIntervalMs > 0) {
      this._keepalive = setInterval(() => this._onKeepaliveTick(), this._keepaliveIntervalMs);
      this._keepalive.unref();
    } else {
      this._keepalive = null;
    }

    this._channel.attach({
      onFrame: frame => this._onFrame(frame),
      onClose: reason => this._teardown(reason, false),
    });
  }

  // ── Accessors ───────────────────────────────────────────────────

  /** Verified identity of the server. Never changes for the life of the session. */
  peerIdentity(): PeerIdentity {
    return this._peer;
  }

  /** Sequence number of the last frame sent. */
  get sequence(): number {
    return this._sequence;
  }

  /** Time the last frame was received from the server. */
  get lastActivity(): Date {
    return new Date(this._lastActivity);
  }

  get closed(): boolean {
    return this._closeReason !== null;
  }

  get closeReason(): AuthlyError | null {
    return this._closeReason;
  }

  /**
   * True while the session is open and the server has been heard from within
   * one keepalive interval plus timeout.
   */
  isAlive(now: number = Date.now()): boolean {
    if (this._closeReason) return false;
    if (this._keepaliveIntervalMs === 0) return true;
    return now - this._lastActivity <= this._keepaliveIntervalMs + this._keepaliveTimeoutMs;
  }

  // ── Operations ──────────────────────────────────────────────────

  /**
   * Send a request and resolve with the server's response payload.
   * A payload over the frame limit is refused locally and the session stays open.
   */
  send(payload: Uint8Array, options?: SendOptions): Promise<Buffer> {
    if (payload.length > this._maxFramePayload) {
      return Promise.reject(
        AuthlyError.protocolViolation(
          `Request payload of ${payload.length} bytes exceeds the frame limit of ${this._maxFramePayload}`,
        ),
      );
    }
    const timeoutMs = options?.timeoutMs ?? this._requestTimeoutMs;
    return this._enqueue(() => this._exchange(FrameType.REQUEST, FrameType.RESPONSE, payload, timeoutMs));
  }

  /** Round-trip a PING; resolves with the latency in milliseconds. */
  async ping(): Promise<number> {
    return this._enqueue(async () => {
      const started = performance.now();
      await this._exchange(FrameType.PING, FrameType.PONG, Buffer.alloc(0), this._keepaliveTimeoutMs);
      return performance.now() - started;
    });
  }

  /** Close the session. Safe to call any number of times. */
  close(): void {
    this._teardown(AuthlyError.channelClosed('Session closed'), true);
  }

  // ── Internals ───────────────────────────────────────────────────

  private _enqueue<T>(task: () => Promise<T>): Promise<T> {
    this._pending++;
    const result = this._tail.then(task);
    const settle = (): void => {
      this._pending--;
    };
    // The chain continues after a failed exchange; the caller gets the failure
    this._tail = result.then(settle, settle);
    return result;
  }

  private _nextSequence(): number {
    this._sequence = this._sequence >= MAX_SEQUENCE ? 1 : this._sequence + 1;
    return this._sequence;
  }

  private _exchange(
    type: FrameType.REQUEST | FrameType.PING,
    expect: FrameType.RESPONSE | FrameType.PONG,
    payload: Uint8Array,
    timeoutMs: number,
  ): Promise<Buffer> {
    if (this._closeReason) {
      return Promise.reject(AuthlyError.channelClosed(`Session is closed: ${this._closeReason.message}`));
    }

    const sequence = this._nextSequence();
    return new Promise<Buffer>((resolve, reject) => {
      let timer: NodeJS.Timeout | null = null;
      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          this._teardown(
            AuthlyError.timeout(`No ${FrameType[expect]} for frame ${sequence} within ${timeoutMs}ms`),
            false,
          );
        }, timeoutMs);
        timer.unref();
      }
      this._inflight = { sequence, expect, resolve, reject, timer };

      this._channel.send(type, sequence, payload).catch((err: unknown) => {
        this._teardown(AuthlyError.from(err, AuthlyErrorCode.CHANNEL_CLOSED), false);
      });
    });
  }

  private _finishInflight(): Exchange | null {
    const inflight = this._inflight;
    if (inflight?.timer) clearTimeout(inflight.timer);
    this._inflight = null;
    return inflight;
  }

  private _onFrame(frame: Frame): void {
    this._lastActivity = Date.now();

    switch (frame.type) {
      case FrameType.PING:
        this._channel.send(FrameType.PONG, frame.sequence).catch((err: unknown) => {
          this._teardown(AuthlyError.from(err, AuthlyErrorCode.CHANNEL_CLOSED), false);
        });
        return;
      case FrameType.CLOSE:
        this._teardown(AuthlyError.channelClosed('Server closed the session'), false);
        return;
      case FrameType.RESPONSE:
      case FrameType.ERROR:
      case FrameType.PONG:
        this._onReply(frame);
        return;
      default:
        this._teardown(
          AuthlyError.protocolViolation(`Unexpected ${FrameType[frame.type]} frame on an established session`),
          false,
        );
    }
  }

  private _onReply(frame: Frame): void {
    const inflight = this._inflight;
    if (!inflight || inflight.sequence !== frame.sequence) {
      this._teardown(
        AuthlyError.protocolViolation(
          `Reply for sequence ${frame.sequence} does not match an outstanding request`,
        ),
        false,
      );
      return;
    }

    if (frame.type === FrameType.ERROR && inflight.expect === FrameType.RESPONSE) {
      let message: string;
      try {
        message = parseErrorMessage(frame).message;
      } catch (err: unknown) {
        this._teardown(AuthlyError.from(err), false);
        return;
      }
      this._finishInflight();
      inflight.reject(AuthlyError.requestFailed(message));
      return;
    }

    if (frame.type !== inflight.expect) {
      this._teardown(
        AuthlyError.protocolViolation(
          `Expected ${FrameType[inflight.expect]} for sequence ${frame.sequence}, received ${FrameType[frame.type]}`,
        ),
        false,
      );
      return;
    }

    this._finishInflight();
    inflight.resolve(frame.payload);
  }

  private _onKeepaliveTick(): void {
    if (this._closeReason || this._pending > 0) return;
    if (Date.now() - this._lastActivity < this._keepaliveIntervalMs) return;

    this.ping().then(
      rtt => this._log.debug('keepalive', { sessionId: this.id, rttMs: Math.round(rtt) }),
      (err: unknown) => {
        const error = AuthlyError.from(err);
        this._log.warn('keepalive failed', { sessionId: this.id, code: error.code, error: error.message });
        this._teardown(error, false);
      },
    );
  }

  private _teardown(reason: AuthlyError, graceful: boolean): void {
    if (this._closeReason) return;
    this._closeReason = reason;

    if (this._keepalive) clearInterval(this._keepalive);
    this._finishInflight()?.reject(reason);

    if (graceful) {
      this._channel.end();
    } else {
      this._channel.destroy(reason);
    }

    this._log.debug('session closed', { sessionId: this.id, code: reason.code, reason: reason.message });
    this.emit('close', reason);
  }
}
