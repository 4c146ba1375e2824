import { timingSafeEqual } from 'node:crypto';

/**
 * Timing-safe byte comparison.
 *
 * Different-length inputs are compared as zero-padded buffers of the longer
 * length before being rejected, so the work done does not depend on where
 * they differ.
 */
export function timingSafeBytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    const maxLen = Math.max(a.length, b.length);
    const padA = Buffer.alloc(maxLen, 0);
    const padB = Buffer.alloc(maxLen, 0);
    padA.set(a);
    padB.set(b);
    timingSafeEqual(padA, padB);
    return false;
  }

  if (a.length === 0) return true;

  return timingSafeEqual(a, b);
}

/** Timing-safe comparison of two strings (e.g. hex digests). */
export function timingSafeStringEqual(a: string, b: string): boolean {
  return timingSafeBytesEqual(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8'));
}
