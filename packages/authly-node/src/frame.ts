import { DEFAULT_MAX_FRAME_PAYLOAD, FRAME_HEADER_SIZE, MAX_SEQUENCE } from './constants.js';
import { AuthlyError } from './errors.js';

// ── Frame types ───────────────────────────────────────────────────

export enum FrameType {
  HELLO = 0x01,
  IDENTITY = 0x02,
  ACCEPT = 0x03,
  REJECT = 0x04,
  REQUEST = 0x10,
  RESPONSE = 0x11,
  ERROR = 0x12,
  PING = 0x20,
  PONG = 0x21,
  CLOSE = 0x30,
}

const FRAME_TYPES = new Set<number>([
  FrameType.HELLO,
  FrameType.IDENTITY,
  FrameType.ACCEPT,
  FrameType.REJECT,
  FrameType.REQUEST,
  FrameType.RESPONSE,
  FrameType.ERROR,
  FrameType.PING,
  FrameType.PONG,
  FrameType.CLOSE,
]);

function isFrameType(value: number): value is FrameType {
  return FRAME_TYPES.has(value);
}

export interface Frame {
  type: FrameType;
  sequence: number;
  payload: Buffer;
}

// ── Encoding ──────────────────────────────────────────────────────

/** Encode one frame: `[u32 length][u8 type][u32 sequence][payload]`, big-endian. */
export function encodeFrame(
  type: FrameType,
  sequence: number,
  payload: Uint8Array = Buffer.alloc(0),
): Buffer {
  if (!Number.isInteger(sequence) || sequence < 0 || sequence > MAX_SEQUENCE) {
    throw AuthlyError.protocolViolation(`Sequence ${sequence} out of range`);
  }
  const frame = Buffer.alloc(FRAME_HEADER_SIZE + payload.length);
  frame.writeUInt32BE(payload.length, 0);
  frame.writeUInt8(type, 4);
  frame.writeUInt32BE(sequence, 5);
  frame.set(payload, FRAME_HEADER_SIZE);
  return frame;
}

/** Encode a frame whose payload is a JSON document. */
export function encodeJsonFrame(type: FrameType, sequence: number, body: unknown): Buffer {
  return encodeFrame(type, sequence, Buffer.from(JSON.stringify(body), 'utf8'));
}

/**
 * Parse a JSON payload into a plain object. Anything else (arrays, scalars,
 * invalid JSON) is a protocol violation.
 */
export function decodeJsonPayload(frame: Frame): Record<string, unknown> {
  let value: unknown;
  try {
    value = JSON.parse(frame.payload.toString('utf8'));
  } catch {
    throw AuthlyError.protocolViolation(`Frame ${FrameType[frame.type]} carries invalid JSON`);
  }
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw AuthlyError.protocolViolation(`Frame ${FrameType[frame.type]} payload must be an object`);
  }
  return Object.fromEntries(Object.entries(value));
}

// ── Decoding ──────────────────────────────────────────────────────

/**
 * Incremental frame decoder. Feed it stream chunks of any size; it returns
 * every frame completed so far and keeps the remainder buffered.
 */
export class FrameDecoder {
  private _buffer: Buffer = Buffer.alloc(0);
  private readonly _maxPayload: number;

  constructor(maxPayload: number = DEFAULT_MAX_FRAME_PAYLOAD) {
    this._maxPayload = maxPayload;
  }

  /** Bytes received but not yet part of a complete frame. */
  get buffered(): number {
    return this._buffer.length;
  }

  push(chunk: Uint8Array): Frame[] {
    this._buffer = this._buffer.length === 0
      ? Buffer.from(chunk)
      : Buffer.concat([this._buffer, chunk]);

    const frames: Frame[] = [];
    while (this._buffer.length >= FRAME_HEADER_SIZE) {
      const length = this._buffer.readUInt32BE(0);
      if (length > this._maxPayload) {
        throw AuthlyError.protocolViolation(
          `Frame payload of ${length} bytes exceeds limit of ${this._maxPayload}`,
        );
      }
      const type = this._buffer.readUInt8(4);
      if (!isFrameType(type)) {
        throw AuthlyError.protocolViolation(`Unknown frame type 0x${type.toString(16).padStart(2, '0')}`);
      }
      const total = FRAME_HEADER_SIZE + length;
      if (this._buffer.length < total) break;

      frames.push({
        type,
        sequence: this._buffer.readUInt32BE(5),
        payload: Buffer.from(this._buffer.subarray(FRAME_HEADER_SIZE, total)),
      });
      this._buffer = this._buffer.subarray(total);
    }
    return frames;
  }
}
