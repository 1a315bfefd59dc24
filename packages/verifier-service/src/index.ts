/**
 * @httpsig/verifier-service
 *
 * Inbound HTTP signature verification: client registry, verifier, Express
 * middleware and the verification service app.
 */

export { InboundClientRegistry, loadClients, parseClientsConfig, ClientsFileSchema } from './clients.js';
export type { ClientsFile, LoadedClients } from './clients.js';
export { InboundVerifier } from './inbound-verifier.js';
export type { InboundVerifierOptions } from './inbound-verifier.js';
export { httpSignatureMiddleware, sendVerificationFailure } from './middleware.js';
export type { MiddlewareOptions } from './middleware.js';
export { createApp } from './app.js';
export type { AppOptions } from './app.js';
export { loadConfig } from './config.js';

export type {
  InboundClient,
  InboundRequest,
  InboundResult,
  MiddlewareMode,
  Principal,
  PrincipalType,
  RequestVerificationInfo,
  ServiceConfig,
} from './types.js';
