import { readFile } from 'node:fs/promises';

/** A file path, or the material itself. */
export type MaterialSource = string | Buffer | Uint8Array;

export interface PemBlock {
  label: string;
  der: Buffer;
}

const PEM_BLOCK_RE = /-----BEGIN ([A-Z0-9 ]+)-----([\s\S]*?)-----END ([A-Z0-9 ]+)-----/g;
const BASE64_BODY_RE = /^[A-Za-z0-9+/]*={0,2}$/;

/** True when the bytes look like PEM text rather than DER. */
export function isPem(data: Buffer): boolean {
  return data.includes('-----BEGIN ');
}

/**
 * Split PEM text into its blocks.
 *
 * Throws a plain Error on mismatched BEGIN/END labels or a body that is not
 * base64. Callers map it to their own error code.
 */
export function parsePemBlocks(text: string): PemBlock[] {
  const blocks: PemBlock[] = [];
  for (const match of text.matchAll(PEM_BLOCK_RE)) {
    const [, label, body, endLabel] = match;
    if (label !== endLabel) {
      throw new Error(`PEM block "${label}" closed by "${endLabel}"`);
    }
    // RFC 7468 headers (Proc-Type etc.) mean legacy encryption
    if (body.includes(':')) {
      throw new Error(`PEM block "${label}" carries encryption headers`);
    }
    const compact = body.replace(/\s+/g, '');
    if (compact.length === 0 || !BASE64_BODY_RE.test(compact)) {
      throw new Error(`PEM block "${label}" is not valid base64`);
    }
    blocks.push({ label, der: Buffer.from(compact, 'base64') });
  }
  return blocks;
}

/** Encode DER bytes as a PEM block with LF line endings. */
export function toPem(label: string, der: Buffer): string {
  const b64 = der.toString('base64');
  const lines: string[] = [];
  for (let i = 0; i < b64.length; i += 64) {
    lines.push(b64.slice(i, i + 64));
  }
  return `-----BEGIN ${label}-----\n${lines.join('\n')}\n-----END ${label}-----\n`;
}

/**
 * Resolve a material source to bytes. Strings are file paths.
 *
 * Read failures propagate as the original fs error.
 */
export async function readMaterial(source: MaterialSource): Promise<Buffer> {
  if (typeof source === 'string') {
    return readFile(source);
  }
  return Buffer.isBuffer(source) ? source : Buffer.from(source);
}

/** Short description of a source for error messages (never the content). */
export function describeSource(source: MaterialSource): string {
  return typeof source === 'string' ? source : `<${source.byteLength} bytes>`;
}
