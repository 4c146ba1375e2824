import { isIP } from 'node:net';
import { DEFAULT_PORT } from './constants.js';
import { AuthlyError } from './errors.js';

/** Parsed Authly endpoint. */
export interface Endpoint {
  /** Host to connect to (IPv6 literals without brackets). */
  host: string;
  port: number;
  /** TLS server name; absent for IP literals, which SNI does not carry. */
  servername?: string;
  /** Normalized `https://host:port` form, for logs and errors. */
  origin: string;
}

/**
 * Parse an Authly URL. Only `https` is accepted: there is no plaintext mode.
 */
export function parseEndpoint(url: string): Endpoint {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : 'parse failure';
    throw AuthlyError.invalidEndpoint(`Invalid Authly URL "${url}": ${reason}`);
  }

  if (parsed.protocol !== 'https:') {
    throw AuthlyError.invalidEndpoint(
      `Unsupported URL scheme "${parsed.protocol.replace(/:$/, '')}"; only https is allowed`,
    );
  }
  if (parsed.hostname === '') {
    throw AuthlyError.invalidEndpoint(`Authly URL "${url}" has no host`);
  }
  if (parsed.username !== '' || parsed.password !== '') {
    throw AuthlyError.invalidEndpoint('Authly URL must not carry credentials');
  }

  const host = parsed.hostname.startsWith('[') && parsed.hostname.endsWith(']')
    ? parsed.hostname.slice(1, -1)
    : parsed.hostname;
  const port = parsed.port !== '' ? Number(parsed.port) : DEFAULT_PORT;

  return {
    host,
    port,
    ...(isIP(host) === 0 ? { servername: host } : {}),
    origin: `https://${parsed.host}`,
  };
}
