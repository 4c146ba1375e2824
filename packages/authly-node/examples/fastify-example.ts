/**
 * authly-node — Fastify Integration Example
 *
 * Same service as the Express example, on Fastify: HTTPS with client
 * certificates requested, each request verified against the Authly trust
 * anchors before it reaches a route.
 *
 * Prerequisites:
 *   npm install fastify authly-node
 *
 * Run:
 *   AUTHLY_CA_PATH=./ca.crt AUTHLY_IDENTITY_PATH=./identity.pem npx tsx examples/fastify-example.ts
 */

import Fastify from 'fastify';
import {
  authlyPeerFastifyPlugin,
  IdentityCredential,
  loadClientConfig,
  mtlsServerOptions,
  TrustStore,
} from 'authly-node';
import type { PeerIdentity } from 'authly-node';

declare module 'fastify' {
  interface FastifyRequest {
    authlyPeer?: PeerIdentity | null;
  }
}

// ── Setup ───────────────────────────────────────────────────────

const config = loadClientConfig();
const trustStore = await TrustStore.load(config.caPath);
const credential = await IdentityCredential.load(config.identityPath);

const fastify = Fastify({ logger: false, https: mtlsServerOptions(trustStore, credential) });

// The plugin only decorates the request and adds an onRequest hook
await authlyPeerFastifyPlugin(
  {
    decorateRequest: (property, value) => {
      fastify.decorateRequest(property, value);
    },
    addHook: (_hookName, handler) => {
      fastify.addHook('onRequest', (request, reply) => handler(request, reply));
    },
  },
  { trustStore },
);

fastify.get('/api/whoami', async (request) => {
  const peer = request.authlyPeer;
  return {
    serviceId: peer?.serviceId ?? null,
    subject: peer?.subject ?? null,
  };
});

// ── Start Server ────────────────────────────────────────────────

const PORT = 3444;
fastify.listen({ port: PORT }, (err) => {
  if (err) throw err;
  console.log(`authly Fastify example running on https://localhost:${PORT}`);
});
