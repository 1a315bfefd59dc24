/**
 * HTTP Signature Verifier Service
 */

import 'dotenv/config';
import { loadConfig } from './config.js';
import { loadClients } from './clients.js';
import { InboundVerifier } from './inbound-verifier.js';
import { createApp } from './app.js';

const config = loadConfig();
const { registry, signedHeaders } = loadClients(config.clientsFile);

const verifier = new InboundVerifier(registry, {
  locations: config.locations,
  optional: config.optional,
  signedHeaders,
});

const app = createApp({ verifier, clients: registry, realm: config.realm });

const server = app.listen(config.port, () => {
  console.log(`🔐 HTTP Signature Verifier Service running on port ${config.port}`);
  console.log(`   Clients: ${registry.size > 0 ? registry.keyIds().join(', ') : 'none'}`);
  console.log(`   Header locations: ${config.locations.join(', ')}`);
  console.log(`   Signatures: ${config.optional ? 'optional' : 'required'}`);
});

// Graceful shutdown
process.on('SIGTERM', () => {
  console.log('SIGTERM received, closing server...');
  server.close(() => process.exit(0));
});
