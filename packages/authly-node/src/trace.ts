/**
 * Handshake trace
 *
 * Every handshake attempt records its state transitions with timing, so a
 * failed connect can be explained after the fact (`authly connect` prints it,
 * `Authly#lastTrace` exposes it).
 */

export type HandshakeState =
  | 'init'
  | 'transport_connecting'
  | 'tls_negotiating'
  | 'peer_verifying'
  | 'identity_presenting'
  | 'established'
  | 'failed';

export interface TraceStep {
  step: number;
  state: HandshakeState;
  /** Milliseconds since the attempt started. */
  elapsedMs: number;
  ok: boolean;
  detail?: Record<string, string | number | boolean>;
  error?: string;
}

export function formatHandshakeTrace(trace: readonly TraceStep[]): string {
  if (trace.length === 0) return '(empty trace)';

  const lines: string[] = [];
  for (const step of trace) {
    const status = step.ok ? 'OK' : 'FAIL';
    const elapsed = step.elapsedMs.toFixed(2);
    const dots = '.'.repeat(Math.max(1, 24 - step.state.length));
    lines.push(`[${step.step}] ${step.state} ${dots} ${status} (+${elapsed}ms)`);

    if (step.detail) {
      for (const [key, value] of Object.entries(step.detail)) {
        const display = typeof value === 'string' ? `"${value}"` : String(value);
        lines.push(`      ${key}: ${display}`);
      }
    }

    if (step.error) {
      lines.push(`      error: "${step.error}"`);
    }
  }

  return lines.join('\n');
}
