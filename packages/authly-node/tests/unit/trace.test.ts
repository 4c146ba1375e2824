/**
 * authly-node — Handshake Trace Formatting Tests
 */
import { describe, it, expect } from 'vitest';
import { formatHandshakeTrace } from '../../src/trace.js';
import type { TraceStep } from '../../src/trace.js';

describe('AQ: formatHandshakeTrace', () => {
  it('AQ-TR-001: an empty trace says so', () => {
    expect(formatHandshakeTrace([])).toBe('(empty trace)');
  });

  it('AQ-TR-002: renders steps, details and errors', () => {
    const trace: TraceStep[] = [
      { step: 1, state: 'transport_connecting', elapsedMs: 0.5, ok: true, detail: { host: '127.0.0.1', port: 8443 } },
      { step: 2, state: 'failed', elapsedMs: 12.5, ok: false, detail: { from: 'tls_negotiating' }, error: 'AUTHLY_TRANSPORT: reset' },
    ];
    expect(formatHandshakeTrace(trace).split('\n')).toEqual([
      '[1] transport_connecting .... OK (+0.50ms)',
      '      host: "127.0.0.1"',
      '      port: 8443',
      '[2] failed .................. FAIL (+12.50ms)',
      '      from: "tls_negotiating"',
      '      error: "AUTHLY_TRANSPORT: reset"',
    ]);
  });

  it('AQ-TR-003: non-string details render bare', () => {
    const line = formatHandshakeTrace([
      { step: 1, state: 'identity_presenting', elapsedMs: 1, ok: true, detail: { signed: true } },
    ]);
    expect(line).toBe('[1] identity_presenting ..... OK (+1.00ms)\n      signed: true');
  });
});
