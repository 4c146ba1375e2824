/**
 * authly CLI
 *
 * Commands: connect, inspect, verify, version, help
 * Uses Node.js built-in parseArgs.
 */
import { X509Certificate } from 'node:crypto';
import { parseArgs } from 'node:util';
import { Authly } from './client.js';
import { loadClientConfig } from './config.js';
import { AUTHLY_CLIENT_VERSION } from './constants.js';
import { AuthlyError } from './errors.js';
import { IdentityCredential } from './identity.js';
import { Logger, LogLevel } from './logger.js';
import { isPem, parsePemBlocks, readMaterial } from './pem.js';
import { commonNameOf, parseServiceId } from './service-id.js';
import { formatHandshakeTrace } from './trace.js';
import { parseCertificates, TrustStore, validityOf } from './trust-store.js';
import type { PeerIdentity } from './types.js';

// ── Exit codes ────────────────────────────────────────────────────

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_USAGE = 2;
export const EXIT_ERROR = 3;

// ── IO ────────────────────────────────────────────────────────────

export interface CliIo {
  stdout(text: string): void;
  stderr(text: string): void;
  env: Record<string, string | undefined>;
}

const processIo: CliIo = {
  stdout: text => process.stdout.write(text + '\n'),
  stderr: text => process.stderr.write(text + '\n'),
  env: process.env,
};

class UsageError extends Error {}

// ── Helpers ───────────────────────────────────────────────────────

function usage(io: CliIo, message: string, jsonMode: boolean): number {
  if (jsonMode) {
    io.stdout(JSON.stringify({ error: 'USAGE_ERROR', message }));
  } else {
    io.stderr(`Error: ${message}`);
    io.stderr('Run "authly help" for usage information.');
  }
  return EXIT_USAGE;
}

/** Verification, transport and session failures exit 1; configuration and internal errors exit 3. */
function exitCodeFor(err: AuthlyError): number {
  return err.category === 'configuration' || err.category === 'internal' ? EXIT_ERROR : EXIT_FAILED;
}

function failure(io: CliIo, err: unknown, jsonMode: boolean): number {
  const authlyErr = AuthlyError.from(err);
  if (jsonMode) {
    io.stdout(JSON.stringify({ error: authlyErr.code, message: authlyErr.message, httpStatus: authlyErr.httpStatus }));
  } else {
    io.stderr(`Error: ${authlyErr.message} (${authlyErr.code})`);
  }
  return exitCodeFor(authlyErr);
}

function parseNonNegativeInt(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  if (!/^[0-9]+$/.test(value)) {
    throw new UsageError(`${flag} must be a non-negative integer`);
  }
  return Number(value);
}

function describeIdentity(peer: PeerIdentity): Record<string, string | number | null> {
  return {
    subject: peer.subject.replace(/\n/g, ', '),
    serviceId: peer.serviceId,
    issuer: peer.issuer.replace(/\n/g, ', '),
    fingerprint256: peer.fingerprint256,
    notBefore: peer.notBefore.toISOString(),
    notAfter: peer.notAfter.toISOString(),
    chainLength: peer.chainLength,
  };
}

function printFields(io: CliIo, fields: Record<string, string | number | boolean | null>): void {
  for (const [key, value] of Object.entries(fields)) {
    io.stdout(`  ${key.padEnd(16)} ${value === null ? '-' : String(value)}`);
  }
}

// ── Command: connect ──────────────────────────────────────────────

async function cmdConnect(argv: string[], io: CliIo): Promise<number> {
  const { values } = parseArgs({
    args: argv,
    options: {
      url: { type: 'string' },
      ca: { type: 'string' },
      identity: { type: 'string' },
      cert: { type: 'string' },
      timeout: { type: 'string' },
      retries: { type: 'string' },
      'expect-peer': { type: 'string' },
      servername: { type: 'string' },
      trace: { type: 'boolean', default: false },
      json: { type: 'boolean', default: false },
      help: { type: 'boolean', default: false },
    },
    strict: true,
  });

  if (values.help) {
    io.stdout(`Usage: authly connect [--url <https-url>] [--ca <file>] [--identity <file>]
  [--cert <file>] [--timeout <ms>] [--retries <n>] [--expect-peer <id>]
  [--servername <name>] [--trace] [--json]

Connect to Authly, verify the server and present the local identity.
Unset options fall back to AUTHLY_URL, AUTHLY_CA_PATH and AUTHLY_IDENTITY_PATH.`);
    return EXIT_OK;
  }

  const jsonMode = values.json ?? false;
  let timeoutMs: number | undefined;
  let retries: number | undefined;
  try {
    timeoutMs = parseNonNegativeInt(values.timeout, '--timeout');
    retries = parseNonNegativeInt(values.retries, '--retries');
  } catch (err: unknown) {
    return usage(io, err instanceof Error ? err.message : 'Invalid arguments', jsonMode);
  }

  const logger = new Logger({ level: LogLevel.SILENT });
  const authly = new Authly({ logger });
  try {
    const config = loadClientConfig(io.env);
    const session = await authly.connect({
      url: values.url ?? config.url,
      caPath: values.ca ?? config.caPath,
      idPath: values.identity ?? config.identityPath,
      certPath: values.cert,
      timeoutMs: timeoutMs ?? config.handshakeTimeoutMs,
      retries: retries ?? config.retries,
      expectedPeerIdentity: values['expect-peer'],
      servername: values.servername,
    });
    const rttMs = await session.ping();
    const peer = session.peerIdentity();
    const result = {
      ok: true,
      origin: session.origin,
      sessionId: session.id,
      assignedServiceId: session.serviceId,
      rttMs: Number(rttMs.toFixed(2)),
      peer: describeIdentity(peer),
    };
    authly.close();

    if (jsonMode) {
      io.stdout(JSON.stringify(values.trace ? { ...result, trace: authly.lastTrace } : result));
    } else {
      io.stdout(`Connected to ${result.origin}`);
      printFields(io, { ...result.peer, assignedServiceId: result.assignedServiceId, rttMs: result.rttMs });
      if (values.trace) io.stdout(formatHandshakeTrace(authly.lastTrace));
    }
    return EXIT_OK;
  } catch (err: unknown) {
    authly.close();
    if (values.trace && !jsonMode && authly.lastTrace.length > 0) {
      io.stderr(formatHandshakeTrace(authly.lastTrace));
    }
    return failure(io, err, jsonMode);
  }
}

// ── Command: inspect ──────────────────────────────────────────────

async function cmdInspect(argv: string[], io: CliIo): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      json: { type: 'boolean', default: false },
      help: { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: true,
  });

  if (values.help) {
    io.stdout(`Usage: authly inspect <file> [--json]

Show the certificates in a PEM/DER file (trust bundle or identity).`);
    return EXIT_OK;
  }

  const jsonMode = values.json ?? false;
  const file = positionals[0];
  if (!file) return usage(io, 'Missing file argument', jsonMode);

  try {
    let data: Buffer;
    try {
      data = await readMaterial(file);
    } catch (err: unknown) {
      throw AuthlyError.credentialLoad(`Cannot read ${file}`, err);
    }

    let certs: X509Certificate[];
    let hasKey = false;
    if (isPem(data) && parsePemBlocks(data.toString('utf8')).some(b => b.label.endsWith('PRIVATE KEY'))) {
      // Validity is reported below, so load it even when expired
      const credential = IdentityCredential.fromPem(data, { checkValidity: false });
      certs = [...credential.chain];
      hasKey = true;
    } else {
      try {
        certs = parseCertificates(data);
      } catch (err: unknown) {
        throw AuthlyError.trustMaterial(`Unparseable certificates in ${file}`, err);
      }
    }

    const now = new Date();
    const entries = certs.map(cert => {
      const { notBefore, notAfter } = validityOf(cert);
      const commonName = commonNameOf(cert.subject);
      return {
        subject: cert.subject.replace(/\n/g, ', '),
        issuer: cert.issuer.replace(/\n/g, ', '),
        serviceId: commonName !== null ? parseServiceId(commonName) : null,
        ca: cert.ca,
        notBefore: notBefore.toISOString(),
        notAfter: notAfter.toISOString(),
        expired: now.getTime() > notAfter.getTime(),
        fingerprint256: cert.fingerprint256,
      };
    });

    if (jsonMode) {
      io.stdout(JSON.stringify({ file, privateKey: hasKey, certificates: entries }));
    } else {
      io.stdout(`${file}: ${entries.length} certificate(s)${hasKey ? ' + private key' : ''}`);
      entries.forEach((entry, i) => {
        io.stdout(`[${i}]`);
        printFields(io, entry);
      });
    }
    return EXIT_OK;
  } catch (err: unknown) {
    return failure(io, err, jsonMode);
  }
}

// ── Command: verify ───────────────────────────────────────────────

async function cmdVerify(argv: string[], io: CliIo): Promise<number> {
  const { values } = parseArgs({
    args: argv,
    options: {
      ca: { type: 'string' },
      chain: { type: 'string' },
      at: { type: 'string' },
      json: { type: 'boolean', default: false },
      help: { type: 'boolean', default: false },
    },
    strict: true,
  });

  if (values.help) {
    io.stdout(`Usage: authly verify --ca <file> --chain <file> [--at <iso-date>] [--json]

Verify a certificate chain (leaf first) against trust anchors.`);
    return EXIT_OK;
  }

  const jsonMode = values.json ?? false;
  if (!values.ca) return usage(io, 'Missing required argument: --ca', jsonMode);
  if (!values.chain) return usage(io, 'Missing required argument: --chain', jsonMode);

  let now = new Date();
  if (values.at !== undefined) {
    now = new Date(values.at);
    if (Number.isNaN(now.getTime())) {
      return usage(io, `Invalid date for --at: ${values.at}`, jsonMode);
    }
  }

  try {
    const trustStore = await TrustStore.load(values.ca);
    let chain: X509Certificate[];
    try {
      chain = parseCertificates(await readMaterial(values.chain));
    } catch (err: unknown) {
      throw AuthlyError.malformedChain(`Cannot read a certificate chain from ${values.chain}`, err);
    }
    const peer = trustStore.verifyChain(chain, undefined, { now });

    if (jsonMode) {
      io.stdout(JSON.stringify({ valid: true, peer: describeIdentity(peer) }));
    } else {
      io.stdout('VALID');
      printFields(io, describeIdentity(peer));
    }
    return EXIT_OK;
  } catch (err: unknown) {
    const authlyErr = AuthlyError.from(err);
    if (jsonMode) {
      io.stdout(JSON.stringify({ valid: false, error: authlyErr.code, message: authlyErr.message }));
      return exitCodeFor(authlyErr);
    }
    io.stdout(`INVALID: ${authlyErr.message} (${authlyErr.code})`);
    return exitCodeFor(authlyErr);
  }
}

// ── Command: version / help ───────────────────────────────────────

function cmdVersion(io: CliIo): number {
  io.stdout(`authly ${AUTHLY_CLIENT_VERSION}`);
  return EXIT_OK;
}

function cmdHelp(io: CliIo): number {
  io.stdout(`authly ${AUTHLY_CLIENT_VERSION} - Authly service identity client

Usage: authly <command> [options]

Commands:
  connect   Connect to Authly and verify both identities
  inspect   Show certificates in a PEM/DER file
  verify    Verify a certificate chain against trust anchors
  version   Print the version
  help      Show this help

Run "authly <command> --help" for command options.

Exit codes:
  0  Success
  1  Verification or handshake failure
  2  Usage error (missing args, unknown command)
  3  Configuration or internal error`);
  return EXIT_OK;
}

// ── Main ──────────────────────────────────────────────────────────

/** Run the CLI with `argv` (arguments after the program name). Resolves with the exit code. */
export async function runCli(argv: string[], io: CliIo = processIo): Promise<number> {
  const command = argv[0];
  const commandArgs = argv.slice(1);
  const jsonMode = argv.includes('--json');

  try {
    switch (command) {
      case undefined:
      case 'help':
      case '--help':
        return cmdHelp(io);
      case 'connect':
        return await cmdConnect(commandArgs, io);
      case 'inspect':
        return await cmdInspect(commandArgs, io);
      case 'verify':
        return await cmdVerify(commandArgs, io);
      case 'version':
      case '--version':
      case '-v':
        return cmdVersion(io);
      default:
        return usage(io, `Unknown command: ${command}`, jsonMode);
    }
  } catch (err: unknown) {
    // parseArgs rejects unknown or malformed options with a TypeError
    if (err instanceof TypeError || err instanceof UsageError) {
      return usage(io, err.message, jsonMode);
    }
    return failure(io, err, jsonMode);
  }
}
