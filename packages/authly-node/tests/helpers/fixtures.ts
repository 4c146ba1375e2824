/**
 * Shared test fixtures: certificate material under tests/fixtures and small
 * in-process stand-ins (duplex pairs, an identity server, a silent TCP peer).
 */
import { X509Certificate } from 'node:crypto';
import { readFileSync } from 'node:fs';
import { createServer } from 'node:net';
import type { Server, Socket } from 'node:net';
import { Duplex } from 'node:stream';
import { fileURLToPath } from 'node:url';
import { AuthlyError } from '../../src/errors.js';
import { IdentityCredential } from '../../src/identity.js';
import { Logger, LogLevel } from '../../src/logger.js';
import type { LogEntry } from '../../src/logger.js';
import { IdentityServer } from '../../src/server.js';
import type { IdentityServerOptions } from '../../src/server.js';
import { TrustStore } from '../../src/trust-store.js';

const FIXTURES_DIR = fileURLToPath(new URL('../fixtures/', import.meta.url));

export const IDENTITY_SERVICE_ID = 's.f3e799137c034e1eb4cd3e4f65705932';
export const CA_FINGERPRINT =
  'E4:1C:4A:0D:2E:71:87:14:28:A0:51:FE:21:FF:76:61:24:C8:BB:18:AA:7F:5C:D3:B3:DD:AB:3E:CB:D4:26:59';
export const SERVER_FINGERPRINT =
  'CF:E5:84:5E:6F:18:26:50:2E:BD:DD:E0:22:12:BD:04:23:3F:52:45:E1:94:D3:94:78:A2:43:EB:F7:A7:39:B9';
export const IDENTITY_FINGERPRINT =
  '00:79:95:38:1F:34:47:73:2A:6B:DA:2C:CD:90:2C:88:D1:D2:A1:F2:54:DC:1E:DC:DD:A7:26:A7:83:63:30:C6';

/** Not-after of every long-lived fixture certificate. */
export const FIXTURE_NOT_AFTER = '2126-09-25T03:05:38.000Z';
/** Not-before of the fixture CA and the identities issued by it. */
export const FIXTURE_NOT_BEFORE = '2026-10-19T03:05:38.000Z';

export function fixturePath(name: string): string {
  return FIXTURES_DIR + name;
}

export function readFixture(name: string): Buffer {
  return readFileSync(fixturePath(name));
}

/** First certificate of a fixture file. */
export function certificate(name: string): X509Certificate {
  return new X509Certificate(readFixture(name));
}

/** Every certificate of a PEM fixture, in file order. */
export function certificates(name: string): X509Certificate[] {
  const text = readFixture(name).toString('utf8');
  const blocks = text.match(/-----BEGIN CERTIFICATE-----[\s\S]*?-----END CERTIFICATE-----/g) ?? [];
  return blocks.map(block => new X509Certificate(block));
}

export function trustStore(name = 'ca.crt'): TrustStore {
  return TrustStore.fromPem(readFixture(name));
}

export function credential(name = 'identity.pem'): IdentityCredential {
  return IdentityCredential.fromPem(readFixture(name), { checkValidity: false });
}

/** Logger that records entries instead of writing them. */
export function memoryLogger(level: LogLevel = LogLevel.DEBUG): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = new Logger({ level, component: 'authly', output: entry => entries.push(entry) });
  return { logger, entries };
}

export function quietLogger(): Logger {
  return new Logger({ level: LogLevel.SILENT });
}

/**
 * Two connected in-memory streams: bytes written to one are read from the
 * other, ending one ends the other's readable side and destroying one
 * destroys both.
 */
export function duplexPair(): [Duplex, Duplex] {
  const make = (other: () => Duplex): Duplex =>
    new Duplex({
      read() {},
      write(chunk: Buffer, _encoding, callback) {
        other().push(chunk);
        callback();
      },
      final(callback) {
        other().push(null);
        callback();
      },
      destroy(error, callback) {
        other().destroy();
        callback(error);
      },
    });
  const left = make(() => right);
  const right = make(() => left);
  return [left, right];
}

export interface RunningServer {
  server: IdentityServer;
  url: string;
  port: number;
}

/** Identity server on an ephemeral loopback port, presenting the fixture server identity. */
export async function startIdentityServer(
  overrides: Partial<IdentityServerOptions> = {},
  identity = 'server-identity.pem',
): Promise<RunningServer> {
  const server = new IdentityServer({
    trustStore: trustStore(),
    credential: credential(identity),
    logger: quietLogger(),
    ...overrides,
  });
  const address = await server.listen(0, '127.0.0.1');
  return { server, url: `https://127.0.0.1:${address.port}`, port: address.port };
}

export interface SilentPeer {
  port: number;
  /** Connections accepted so far. */
  accepted(): number;
  /** Accepted connections that have since closed. */
  released(): number;
  close(): Promise<void>;
}

/** TCP listener that accepts connections and never answers. */
export async function startSilentPeer(): Promise<SilentPeer> {
  const sockets = new Set<Socket>();
  let accepted = 0;
  let released = 0;
  const server: Server = createServer(socket => {
    accepted++;
    sockets.add(socket);
    // Reading is what lets the peer see the client's FIN
    socket.resume();
    socket.on('error', () => sockets.delete(socket));
    socket.on('close', () => {
      sockets.delete(socket);
      released++;
    });
  });
  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  const port = address !== null && typeof address === 'object' ? address.port : 0;
  return {
    port,
    accepted: () => accepted,
    released: () => released,
    close: () =>
      new Promise<void>(resolve => {
        for (const socket of sockets) socket.destroy();
        server.close(() => resolve());
      }),
  };
}

/** A loopback port with nothing listening on it. */
export async function unusedPort(): Promise<number> {
  const server = createServer();
  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  const port = address !== null && typeof address === 'object' ? address.port : 0;
  await new Promise<void>(resolve => server.close(() => resolve()));
  return port;
}

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/** The AuthlyError `fn` throws. */
export function catchAuthly(fn: () => unknown): AuthlyError {
  try {
    fn();
  } catch (err: unknown) {
    if (err instanceof AuthlyError) return err;
    throw err;
  }
  throw new Error('Expected an AuthlyError to be thrown');
}

/** The AuthlyError `promise` rejects with. */
export async function rejectionOf(promise: Promise<unknown>): Promise<AuthlyError> {
  try {
    await promise;
  } catch (err: unknown) {
    if (err instanceof AuthlyError) return err;
    throw err;
  }
  throw new Error('Expected an AuthlyError rejection');
}
