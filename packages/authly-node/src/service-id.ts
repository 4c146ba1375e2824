/**
 * Authly service identifiers.
 *
 * A service entity id is a 128-bit value written as `s.` followed by 32 hex
 * digits, e.g. `s.f3e799137c034e1eb4cd3e4f65705932`. Service certificates
 * carry it as their Common Name.
 */

export type ServiceId = string & { readonly __brand: 'ServiceId' };

const SERVICE_ID_RE = /^s\.[0-9a-f]{32}$/;

/** Normalize and validate a service id. Returns `null` if it is not one. */
export function parseServiceId(value: string): ServiceId | null {
  const normalized = value.trim().toLowerCase();
  return isServiceId(normalized) ? normalized : null;
}

export function isServiceId(value: string): value is ServiceId {
  return SERVICE_ID_RE.test(value);
}

/**
 * Extract the Common Name from a Node.js X509 subject string
 * (`CN=...\nO=...`, one attribute per line). Returns the first CN.
 */
export function commonNameOf(subject: string): string | null {
  for (const line of subject.split('\n')) {
    if (line.startsWith('CN=')) {
      return line.slice(3);
    }
  }
  return null;
}
