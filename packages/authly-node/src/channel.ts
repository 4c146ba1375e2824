import type { Duplex } from 'node:stream';
import { DEFAULT_MAX_FRAME_PAYLOAD } from './constants.js';
import { AuthlyError } from './errors.js';
import { encodeFrame, FrameDecoder, FrameType } from './frame.js';
import type { Frame } from './frame.js';

export interface FrameChannelOptions {
  maxFramePayload?: number;
}

/** Push-mode consumer installed once the handshake is over. */
export interface FrameListener {
  onFrame(frame: Frame): void;
  onClose(reason: AuthlyError): void;
}

interface Waiter {
  resolve: (frame: Frame) => void;
  reject: (err: AuthlyError) => void;
}

/**
 * Frames over a byte stream (normally a TLS socket).
 *
 * Starts in pull mode (`receive()`), which the handshake uses; `attach()`
 * switches to push mode for the session. `destroy()` is idempotent and
 * releases the underlying stream exactly once.
 */
export class FrameChannel {
  private readonly _stream: Duplex;
  private readonly _decoder: FrameDecoder;
  private readonly _queue: Frame[] = [];
  private readonly _waiters: Waiter[] = [];
  private _listener: FrameListener | null = null;
  private _closeReason: AuthlyError | null = null;

  constructor(stream: Duplex, options?: FrameChannelOptions) {
    this._stream = stream;
    this._decoder = new FrameDecoder(options?.maxFramePayload ?? DEFAULT_MAX_FRAME_PAYLOAD);

    stream.on('data', (chunk: Buffer) => this._onData(chunk));
    stream.on('end', () => this.destroy(AuthlyError.channelClosed('Peer closed the connection')));
    stream.on('close', () => this.destroy(AuthlyError.channelClosed('Connection closed')));
    stream.on('error', (err: Error) => {
      this.destroy(AuthlyError.channelClosed(`Connection failed: ${err.message}`, err));
    });
  }

  get closed(): boolean {
    return this._closeReason !== null;
  }

  /** Why the channel closed, once it has. */
  get closeReason(): AuthlyError | null {
    return this._closeReason;
  }

  /** Next frame in pull mode. Rejects with the close reason once closed. */
  receive(): Promise<Frame> {
    const queued = this._queue.shift();
    if (queued) return Promise.resolve(queued);
    if (this._closeReason) return Promise.reject(this._closeReason);
    if (this._listener) {
      return Promise.reject(AuthlyError.internalError('Channel is in push mode'));
    }
    return new Promise<Frame>((resolve, reject) => {
      this._waiters.push({ resolve, reject });
    });
  }

  /** Switch to push mode. Frames queued so far are delivered first. */
  attach(listener: FrameListener): void {
    this._listener = listener;
    for (let frame = this._queue.shift(); frame; frame = this._queue.shift()) {
      listener.onFrame(frame);
    }
    if (this._closeReason) {
      listener.onClose(this._closeReason);
    }
  }

  send(type: FrameType, sequence: number, payload?: Uint8Array): Promise<void> {
    if (this._closeReason) {
      return Promise.reject(this._closeReason);
    }
    const frame = encodeFrame(type, sequence, payload);
    return new Promise<void>((resolve, reject) => {
      this._stream.write(frame, (err?: Error | null) => {
        if (err) {
          reject(AuthlyError.channelClosed(`Write failed: ${err.message}`, err));
        } else {
          resolve();
        }
      });
    });
  }

  /** Send CLOSE, flush, then release the stream. */
  end(): void {
    if (this._closeReason) return;
    this._closeReason = AuthlyError.channelClosed('Channel closed locally');
    this._stream.end(encodeFrame(FrameType.CLOSE, 0), () => this._stream.destroy());
    this._settle(this._closeReason);
  }

  destroy(reason: AuthlyError = AuthlyError.channelClosed('Channel closed locally')): void {
    if (this._closeReason) return;
    this._closeReason = reason;
    this._stream.destroy();
    this._settle(reason);
  }

  private _settle(reason: AuthlyError): void {
    for (let w = this._waiters.shift(); w; w = this._waiters.shift()) {
      w.reject(reason);
    }
    this._listener?.onClose(reason);
  }

  private _onData(chunk: Buffer): void {
    if (this._closeReason) return;

    let frames: Frame[];
    try {
      frames = this._decoder.push(chunk);
    } catch (err: unknown) {
      this.destroy(AuthlyError.from(err));
      return;
    }

    for (const frame of frames) {
      if (this._closeReason) return;
      if (this._listener) {
        this._listener.onFrame(frame);
        continue;
      }
      const waiter = this._waiters.shift();
      if (waiter) {
        waiter.resolve(frame);
      } else {
        this._queue.push(frame);
      }
    }
  }
}
