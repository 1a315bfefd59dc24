/**
 * @httpsig/core
 *
 * HTTP signatures (Cavage-style `Signature` header): parsing, signing string
 * construction, signing and verification.
 */

// Types
export type {
  SignatureAlgorithm,
  SignatureDescriptor,
  HeaderRecord,
  CanonicalRequestView,
  KeyMaterial,
  HeadersConfig,
  SignedHeadersConfig,
  SignatureLocation,
  SignOptions,
  SignResult,
} from './types.js';
export { REQUEST_TARGET, DEFAULT_SIGNED_HEADERS } from './types.js';

// Codec
export {
  parseSignatureHeader,
  validateSyntax,
  serializeSignatureHeader,
  tokenizeSignatureHeader,
  extractSignatureHeader,
  formatSignatureHeader,
} from './signature-header.js';
export type { SignatureComponent } from './signature-header.js';

// Request views and signing string
export { createRequestView, getHeaderValues, withHeaders } from './request-view.js';
export type { RequestViewInput } from './request-view.js';
export { buildSigningString, requestTarget } from './canonical.js';

// Header selection
export {
  createHeaderSelectionPolicy,
  resolveSignedHeaders,
  headersConfig,
  signedHeadersConfig,
  selectHeaders,
} from './headers-policy.js';
export type { HeaderSelectionPolicy, HeaderSelectionPolicyOptions } from './headers-policy.js';

// Keys
export {
  rsaPrivateKey,
  rsaPublicKey,
  hmacSecret,
  generateRsaKeyPair,
  impliedAlgorithm,
} from './keys.js';
export type { RsaKeyPairPem } from './keys.js';

// Signing and verification
export { SUPPORTED_ALGORITHMS, parseAlgorithm, unsupportedAlgorithm } from './algorithms.js';
export { sign } from './signer.js';
export { verify } from './verifier.js';
export { signOutbound } from './outbound.js';
export type { OutboundTarget, OutboundOptions, OutboundResult } from './outbound.js';

// Errors
export { ErrorCodes, ErrorHttpStatus, HttpSignatureError } from './errors.js';
export type { ErrorCode } from './errors.js';
