import {
  DEFAULT_AUTHLY_URL,
  DEFAULT_CA_PATH,
  DEFAULT_IDENTITY_PATH,
  DEFAULT_HANDSHAKE_TIMEOUT_MS,
  DEFAULT_KEEPALIVE_INTERVAL_MS,
  DEFAULT_KEEPALIVE_TIMEOUT_MS,
} from './constants.js';
import { AuthlyError } from './errors.js';
import { LogLevel, parseLogLevel } from './logger.js';

/** Maximum number of automatic connect retries accepted from configuration. */
const MAX_CONFIG_RETRIES = 20;

export interface ClientConfig {
  url: string;
  caPath: string;
  identityPath: string;
  handshakeTimeoutMs: number;
  retries: number;
  keepaliveIntervalMs: number;
  keepaliveTimeoutMs: number;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function readInteger(
  env: Env,
  name: string,
  fallback: number,
  bounds: { min: number; max?: number },
): number {
  const raw = nonEmpty(env[name]);
  if (raw === undefined) return fallback;

  if (!/^[0-9]+$/.test(raw)) {
    throw AuthlyError.configuration(`${name} must be a non-negative integer`);
  }
  const value = Number(raw);
  if (value < bounds.min || (bounds.max !== undefined && value > bounds.max)) {
    const range = bounds.max !== undefined ? `${bounds.min}..${bounds.max}` : `>= ${bounds.min}`;
    throw AuthlyError.configuration(`${name} must be in range ${range}`);
  }
  return value;
}

/**
 * Resolve client configuration from environment variables.
 *
 * | Variable                        | Default                               |
 * |---------------------------------|---------------------------------------|
 * | `AUTHLY_URL`                    | `https://authly`                      |
 * | `AUTHLY_CA_PATH`                | `/etc/authly/certs/local.crt`         |
 * | `AUTHLY_IDENTITY_PATH`          | `/etc/authly/identity/identity.pem`   |
 * | `AUTHLY_HANDSHAKE_TIMEOUT_MS`   | `10000`                               |
 * | `AUTHLY_CONNECT_RETRIES`        | `0`                                   |
 * | `AUTHLY_KEEPALIVE_INTERVAL_MS`  | `30000` (`0` disables keepalive)      |
 * | `AUTHLY_KEEPALIVE_TIMEOUT_MS`   | `10000`                               |
 * | `AUTHLY_LOG_LEVEL`              | `warn`                                |
 */
export function loadClientConfig(env: Env = process.env): ClientConfig {
  const rawLevel = nonEmpty(env.AUTHLY_LOG_LEVEL);
  let logLevel = LogLevel.WARN;
  if (rawLevel !== undefined) {
    const parsed = parseLogLevel(rawLevel);
    if (parsed === undefined) {
      throw AuthlyError.configuration(
        'AUTHLY_LOG_LEVEL must be one of debug, info, warn, error, silent',
      );
    }
    logLevel = parsed;
  }

  return {
    url: nonEmpty(env.AUTHLY_URL) ?? DEFAULT_AUTHLY_URL,
    caPath: nonEmpty(env.AUTHLY_CA_PATH) ?? DEFAULT_CA_PATH,
    identityPath: nonEmpty(env.AUTHLY_IDENTITY_PATH) ?? DEFAULT_IDENTITY_PATH,
    handshakeTimeoutMs: readInteger(env, 'AUTHLY_HANDSHAKE_TIMEOUT_MS', DEFAULT_HANDSHAKE_TIMEOUT_MS, { min: 1 }),
    retries: readInteger(env, 'AUTHLY_CONNECT_RETRIES', 0, { min: 0, max: MAX_CONFIG_RETRIES }),
    keepaliveIntervalMs: readInteger(env, 'AUTHLY_KEEPALIVE_INTERVAL_MS', DEFAULT_KEEPALIVE_INTERVAL_MS, { min: 0 }),
    keepaliveTimeoutMs: readInteger(env, 'AUTHLY_KEEPALIVE_TIMEOUT_MS', DEFAULT_KEEPALIVE_TIMEOUT_MS, { min: 1 }),
    logLevel,
  };
}
