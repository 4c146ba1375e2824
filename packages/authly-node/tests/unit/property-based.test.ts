/**
 * authly-node — Property-Based Tests
 *
 * Uses fast-check to generate randomized inputs and check wire and helper invariants.
 * Covers: frame decoding under arbitrary chunking, service id normalization,
 * timing-safe comparison, PEM encoding, proof transcript layout and backoff bounds.
 */
import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { timingSafeBytesEqual, timingSafeStringEqual } from '../../src/compare.js';
import { FrameDecoder, FrameType, encodeFrame } from '../../src/frame.js';
import type { Frame } from '../../src/frame.js';
import { parsePemBlocks, toPem } from '../../src/pem.js';
import { buildProofTranscript, computeSessionBinding } from '../../src/proof.js';
import { backoffDelay } from '../../src/retry.js';
import { isServiceId, parseServiceId } from '../../src/service-id.js';

// ── Arbitraries ──────────────────────────────────────────────────────

const hexChar = fc.mapToConstant(
  { num: 10, build: v => String.fromCharCode(0x30 + v) }, // 0-9
  { num: 6, build: v => String.fromCharCode(0x61 + v) },  // a-f
);

const hexDigits = fc.string({ unit: hexChar, minLength: 32, maxLength: 32 });

const frameType = fc.constantFrom(
  FrameType.REQUEST,
  FrameType.RESPONSE,
  FrameType.ERROR,
  FrameType.PING,
  FrameType.PONG,
  FrameType.CLOSE,
);

const frame = fc.record({
  type: frameType,
  sequence: fc.integer({ min: 0, max: 0xffffffff }),
  payload: fc.uint8Array({ minLength: 0, maxLength: 64 }),
});

/** Split a buffer at the given (unsorted, possibly duplicate) cut points. */
function split(bytes: Buffer, cuts: number[]): Buffer[] {
  const points = [...new Set(cuts.map(c => c % (bytes.length + 1)))].sort((a, b) => a - b);
  const chunks: Buffer[] = [];
  let start = 0;
  for (const point of points) {
    chunks.push(bytes.subarray(start, point));
    start = point;
  }
  chunks.push(bytes.subarray(start));
  return chunks;
}

// ── Frame codec ─────────────────────────────────────────────────────

describe('PROP: frame decoding', () => {
  it('PROP-FRAME-001: decoding is independent of how the stream is chunked', () => {
    fc.assert(
      fc.property(
        fc.array(frame, { minLength: 1, maxLength: 8 }),
        fc.array(fc.nat(), { maxLength: 20 }),
        (frames, cuts) => {
          const wire = Buffer.concat(frames.map(f => encodeFrame(f.type, f.sequence, f.payload)));
          const decoder = new FrameDecoder();
          const decoded: Frame[] = [];
          for (const chunk of split(wire, cuts)) {
            decoded.push(...decoder.push(chunk));
          }
          expect(decoder.buffered).toBe(0);
          expect(decoded.map(f => [f.type, f.sequence, f.payload.toString('hex')])).toEqual(
            frames.map(f => [f.type, f.sequence, Buffer.from(f.payload).toString('hex')]),
          );
        },
      ),
      { numRuns: 200 },
    );
  });

  it('PROP-FRAME-002: encoded length is header plus payload', () => {
    fc.assert(
      fc.property(frame, f => {
        const bytes = encodeFrame(f.type, f.sequence, f.payload);
        expect(bytes.length).toBe(9 + f.payload.length);
        expect(bytes.readUInt32BE(0)).toBe(f.payload.length);
      }),
    );
  });

  it('PROP-FRAME-003: a truncated frame stays buffered', () => {
    fc.assert(
      fc.property(frame, fc.nat(), (f, cut) => {
        const bytes = encodeFrame(f.type, f.sequence, f.payload);
        const keep = cut % bytes.length;
        const decoder = new FrameDecoder();
        expect(decoder.push(bytes.subarray(0, keep))).toEqual([]);
        expect(decoder.buffered).toBe(keep);
      }),
    );
  });
});

// ── Service ids ─────────────────────────────────────────────────────

describe('PROP: service ids', () => {
  it('PROP-SID-001: case and surrounding whitespace normalize away', () => {
    fc.assert(
      fc.property(hexDigits, fc.boolean(), fc.constantFrom('', ' ', '\t', '\n'), (digits, upper, pad) => {
        const id = `s.${digits}`;
        const written = pad + (upper ? id.toUpperCase() : id) + pad;
        expect(parseServiceId(written)).toBe(id);
      }),
    );
  });

  it('PROP-SID-002: parse results always satisfy isServiceId', () => {
    fc.assert(
      fc.property(fc.string({ maxLength: 40 }), input => {
        const parsed = parseServiceId(input);
        if (parsed !== null) expect(isServiceId(parsed)).toBe(true);
      }),
    );
  });

  it('PROP-SID-003: any other length of digits is rejected', () => {
    fc.assert(
      fc.property(fc.string({ unit: hexChar, maxLength: 64 }).filter(s => s.length !== 32), digits => {
        expect(parseServiceId(`s.${digits}`)).toBeNull();
      }),
    );
  });
});

// ── Timing-safe comparison ──────────────────────────────────────────

describe('PROP: timing-safe comparison', () => {
  it('PROP-CMP-001: agrees with Buffer.equals', () => {
    fc.assert(
      fc.property(fc.uint8Array({ maxLength: 48 }), fc.uint8Array({ maxLength: 48 }), (a, b) => {
        expect(timingSafeBytesEqual(a, b)).toBe(Buffer.from(a).equals(Buffer.from(b)));
      }),
      { numRuns: 300 },
    );
  });

  it('PROP-CMP-002: is reflexive for strings', () => {
    fc.assert(
      fc.property(fc.string(), s => {
        expect(timingSafeStringEqual(s, s)).toBe(true);
      }),
    );
  });

  it('PROP-CMP-003: a zero-padded copy is not equal', () => {
    fc.assert(
      fc.property(fc.uint8Array({ maxLength: 32 }), a => {
        const padded = Buffer.concat([a, Buffer.alloc(1)]);
        expect(timingSafeBytesEqual(a, padded)).toBe(false);
      }),
    );
  });
});

// ── PEM ─────────────────────────────────────────────────────────────

describe('PROP: PEM encoding', () => {
  it('PROP-PEM-001: toPem output parses back to the same bytes', () => {
    fc.assert(
      fc.property(fc.uint8Array({ minLength: 1, maxLength: 300 }), bytes => {
        const der = Buffer.from(bytes);
        const [block] = parsePemBlocks(toPem('CERTIFICATE', der));
        expect(block.label).toBe('CERTIFICATE');
        expect(block.der.equals(der)).toBe(true);
      }),
    );
  });

  it('PROP-PEM-002: body lines never exceed 64 characters', () => {
    fc.assert(
      fc.property(fc.uint8Array({ minLength: 1, maxLength: 300 }), bytes => {
        const lines = toPem('CERTIFICATE', Buffer.from(bytes)).split('\n').slice(1, -2);
        for (const line of lines) expect(line.length).toBeLessThanOrEqual(64);
      }),
    );
  });
});

// ── Proof transcript ────────────────────────────────────────────────

describe('PROP: proof transcript', () => {
  it('PROP-PROOF-001: length is context plus three prefixed fields', () => {
    fc.assert(
      fc.property(
        fc.uint8Array({ maxLength: 64 }),
        fc.uint8Array({ maxLength: 64 }),
        fc.uint8Array({ minLength: 1, maxLength: 256 }),
        (challenge, exporter, serverCertificate) => {
          const transcript = buildProofTranscript({ challenge, exporter, serverCertificate });
          expect(transcript.length).toBe(24 + 4 + challenge.length + 4 + exporter.length + 4 + 32);
        },
      ),
    );
  });

  it('PROP-PROOF-002: moving a byte between challenge and exporter changes the transcript', () => {
    fc.assert(
      fc.property(fc.uint8Array({ minLength: 1, maxLength: 32 }), fc.uint8Array({ maxLength: 32 }), (challenge, exporter) => {
        const server = Buffer.from('server');
        const a = buildProofTranscript({ challenge, exporter, serverCertificate: server });
        const b = buildProofTranscript({
          challenge: challenge.subarray(0, challenge.length - 1),
          exporter: Buffer.concat([challenge.subarray(challenge.length - 1), exporter]),
          serverCertificate: server,
        });
        expect(a.equals(b)).toBe(false);
      }),
    );
  });

  it('PROP-PROOF-003: session bindings differ for different exporters', () => {
    fc.assert(
      fc.property(fc.uint8Array({ minLength: 32, maxLength: 32 }), fc.uint8Array({ minLength: 32, maxLength: 32 }), (a, b) => {
        fc.pre(!Buffer.from(a).equals(Buffer.from(b)));
        expect(computeSessionBinding(a)).not.toBe(computeSessionBinding(b));
      }),
    );
  });
});

// ── Backoff ─────────────────────────────────────────────────────────

describe('PROP: backoff', () => {
  it('PROP-BACKOFF-001: delays are non-decreasing and bounded', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 1000 }),
        fc.integer({ min: 1, max: 60_000 }),
        fc.integer({ min: 0, max: 30 }),
        (base, max, attempt) => {
          const current = backoffDelay(attempt, base, max);
          expect(current).toBeLessThanOrEqual(max);
          expect(current).toBeGreaterThanOrEqual(Math.min(base, max));
          expect(backoffDelay(attempt + 1, base, max)).toBeGreaterThanOrEqual(current);
        },
      ),
    );
  });
});
