import { createPrivateKey, sign as cryptoSign, X509Certificate } from 'node:crypto';
import type { KeyObject } from 'node:crypto';
import { AuthlyError } from './errors.js';
import { describeSource, isPem, parsePemBlocks, readMaterial, toPem } from './pem.js';
import type { MaterialSource, PemBlock } from './pem.js';
import { commonNameOf, parseServiceId } from './service-id.js';
import type { ServiceId } from './service-id.js';
import { assertWithinValidity, validityOf } from './trust-store.js';

const KEY_LABELS = new Set(['PRIVATE KEY', 'EC PRIVATE KEY', 'RSA PRIVATE KEY']);

export interface CredentialLoadOptions {
  /** Check the validity window at load time. Default: true. */
  checkValidity?: boolean;
  /** Point in time used for the validity check. Default: now. */
  now?: Date;
}

/** Signature algorithm used for a key type, as passed to `crypto.sign`. */
export function digestFor(keyType: string | undefined): string | null {
  switch (keyType) {
    case 'ec':
    case 'rsa':
      return 'sha256';
    case 'ed25519':
    case 'ed448':
      return null;
    default:
      throw AuthlyError.signing(`Unsupported key type: ${keyType ?? 'unknown'}`);
  }
}

interface ParsedMaterial {
  certs: X509Certificate[];
  keys: KeyObject[];
}

function parseMaterial(data: Buffer, label: string): ParsedMaterial {
  const parsed: ParsedMaterial = { certs: [], keys: [] };

  if (!isPem(data)) {
    // A bare DER blob can only be a certificate
    try {
      parsed.certs.push(new X509Certificate(data));
    } catch (err: unknown) {
      throw AuthlyError.credentialLoad(`Unparseable credential material in ${label}`, err);
    }
    return parsed;
  }

  let blocks: PemBlock[];
  try {
    blocks = parsePemBlocks(data.toString('utf8'));
  } catch (err: unknown) {
    throw AuthlyError.credentialLoad(`Invalid identity PEM in ${label}`, err);
  }

  for (const block of blocks) {
    if (block.label === 'CERTIFICATE') {
      try {
        parsed.certs.push(new X509Certificate(block.der));
      } catch (err: unknown) {
        throw AuthlyError.credentialLoad(`Unparseable certificate in ${label}`, err);
      }
    } else if (KEY_LABELS.has(block.label)) {
      try {
        parsed.keys.push(createPrivateKey({ key: toPem(block.label, block.der), format: 'pem' }));
      } catch (err: unknown) {
        throw AuthlyError.credentialLoad(`Unparseable private key in ${label}`, err);
      }
    } else if (block.label === 'ENCRYPTED PRIVATE KEY') {
      throw AuthlyError.credentialLoad(`Encrypted private keys are not supported (${label})`);
    } else {
      throw AuthlyError.credentialLoad(`Unexpected PEM block "${block.label}" in ${label}`);
    }
  }
  return parsed;
}

async function readCredentialSource(source: MaterialSource): Promise<ParsedMaterial> {
  let data: Buffer;
  try {
    data = await readMaterial(source);
  } catch (err: unknown) {
    throw AuthlyError.credentialLoad(`Credential unreadable: ${describeSource(source)}`, err);
  }
  return parseMaterial(data, describeSource(source));
}

/**
 * The local service identity: a private key and the certificate chain that
 * names it.
 *
 * The key leaves this object only through {@link sign} and
 * {@link tlsOptions}.
 */
export class IdentityCredential {
  private readonly _privateKey: KeyObject;
  private readonly _chain: readonly X509Certificate[];

  private constructor(privateKey: KeyObject, chain: X509Certificate[]) {
    this._privateKey = privateKey;
    this._chain = Object.freeze([...chain]);
  }

  /**
   * Load a credential.
   *
   * With one source it must contain the certificate chain and exactly one
   * private key (the usual `identity.pem`). With two, the first holds the key
   * and the second the certificate chain.
   */
  static async load(
    keySource: MaterialSource,
    certSource?: MaterialSource,
    options?: CredentialLoadOptions,
  ): Promise<IdentityCredential> {
    const keyMaterial = await readCredentialSource(keySource);
    const certMaterial = certSource !== undefined
      ? await readCredentialSource(certSource)
      : keyMaterial;

    if (certSource !== undefined && keyMaterial.certs.length > 0) {
      throw AuthlyError.credentialLoad('Key source must not contain certificates');
    }
    if (certSource !== undefined && certMaterial.keys.length > 0) {
      throw AuthlyError.credentialLoad('Certificate source must not contain private keys');
    }

    return IdentityCredential.fromParts(keyMaterial.keys, certMaterial.certs, options);
  }

  /** Build from PEM already in memory (certificate chain + private key). */
  static fromPem(pem: string | Buffer, options?: CredentialLoadOptions): IdentityCredential {
    const data = typeof pem === 'string' ? Buffer.from(pem, 'utf8') : pem;
    const material = parseMaterial(data, `<${data.byteLength} bytes>`);
    return IdentityCredential.fromParts(material.keys, material.certs, options);
  }

  private static fromParts(
    keys: KeyObject[],
    certs: X509Certificate[],
    options?: CredentialLoadOptions,
  ): IdentityCredential {
    if (certs.length === 0) {
      throw AuthlyError.credentialLoad('Certificate not found');
    }
    if (keys.length === 0) {
      throw AuthlyError.credentialLoad('Private key not found');
    }
    if (keys.length > 1) {
      throw AuthlyError.credentialLoad('Expected exactly one private key');
    }

    const [key] = keys;
    const [leaf] = certs;
    if (!leaf.checkPrivateKey(key)) {
      throw AuthlyError.keyMismatch();
    }

    const credential = new IdentityCredential(key, certs);
    if (options?.checkValidity ?? true) {
      credential.assertValidAt(options?.now ?? new Date());
    }
    return credential;
  }

  /** Leaf certificate. */
  get certificate(): X509Certificate {
    return this._chain[0];
  }

  /** Leaf followed by any intermediates, in presentation order. */
  get chain(): readonly X509Certificate[] {
    return this._chain;
  }

  get subject(): string {
    return this.certificate.subject;
  }

  get serviceId(): ServiceId | null {
    const cn = commonNameOf(this.certificate.subject);
    return cn !== null ? parseServiceId(cn) : null;
  }

  get keyType(): string | undefined {
    return this._privateKey.asymmetricKeyType;
  }

  /** Not-after time of the leaf certificate. */
  expiry(): Date {
    return validityOf(this.certificate).notAfter;
  }

  /** True if the leaf expires within `ms` of `now`, for proactive rotation. */
  expiresWithin(ms: number, now: Date = new Date()): boolean {
    return this.expiry().getTime() - now.getTime() <= ms;
  }

  /** Throw EXPIRED_CERTIFICATE if any certificate of the chain is outside its window. */
  assertValidAt(now: Date): void {
    this._chain.forEach((cert, i) => {
      assertWithinValidity(cert, now, i === 0 ? 'Identity' : 'Identity intermediate');
    });
  }

  /** Prove possession of the private key over `challenge`. */
  sign(challenge: Uint8Array): Buffer {
    const digest = digestFor(this._privateKey.asymmetricKeyType);
    try {
      return cryptoSign(digest, challenge, this._privateKey);
    } catch (err: unknown) {
      throw AuthlyError.signing('Key operation failed', err);
    }
  }

  /** Certificate chain as PEM (no key). */
  certificatePem(): string {
    return this._chain.map(c => toPem('CERTIFICATE', c.raw)).join('');
  }

  /** `key` and `cert` options presenting this identity on a TLS server. */
  tlsOptions(): { key: string; cert: string } {
    return {
      key: this._privateKey.export({ type: 'pkcs8', format: 'pem' }).toString(),
      cert: this.certificatePem(),
    };
  }
}
