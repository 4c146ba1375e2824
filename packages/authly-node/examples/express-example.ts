/**
 * authly-node — Express Integration Example
 *
 * An HTTPS service that only answers callers presenting an Authly service
 * identity:
 *   1. Load the Authly trust anchors and this service's own identity
 *   2. Start an HTTPS server that requests client certificates
 *   3. The middleware verifies each caller and sets req.authlyPeer
 *
 * Prerequisites:
 *   npm install express authly-node
 *
 * Run:
 *   AUTHLY_CA_PATH=./ca.crt AUTHLY_IDENTITY_PATH=./identity.pem npx tsx examples/express-example.ts
 */

import express from 'express';
import { createServer } from 'node:https';
import {
  authlyPeerExpressMiddleware,
  IdentityCredential,
  loadClientConfig,
  mtlsServerOptions,
  TrustStore,
} from 'authly-node';
import type { PeerIdentity } from 'authly-node';

declare global {
  namespace Express {
    interface Request {
      authlyPeer?: PeerIdentity | null;
    }
  }
}

// ── Setup ───────────────────────────────────────────────────────

const config = loadClientConfig();
const trustStore = await TrustStore.load(config.caPath);
const credential = await IdentityCredential.load(config.identityPath);

const app = express();

// Public: health check, client certificate optional
app.use('/healthz', authlyPeerExpressMiddleware({ trustStore, required: false }));
app.get('/healthz', (req, res) => {
  res.json({ ok: true, caller: req.authlyPeer?.serviceId ?? null });
});

// Protected: everything under /api
app.use('/api', authlyPeerExpressMiddleware({ trustStore }));

app.get('/api/whoami', (req, res) => {
  const peer = req.authlyPeer;
  res.json({
    serviceId: peer?.serviceId ?? null,
    subject: peer?.subject ?? null,
    fingerprint: peer?.fingerprint256 ?? null,
  });
});

// ── Start Server ────────────────────────────────────────────────

const PORT = 3443;
createServer(mtlsServerOptions(trustStore, credential), app).listen(PORT, () => {
  console.log(`authly Express example running on https://localhost:${PORT}`);
  console.log(`Serving as ${credential.serviceId ?? credential.subject}`);
});
