/**
 * Type definitions for HTTP signatures (Cavage-style `Signature` header)
 */

import type { KeyObject } from 'node:crypto';
import type { HttpSignatureError } from './errors.js';

/**
 * Algorithms this library can sign and verify with
 */
export type SignatureAlgorithm = 'rsa-sha256' | 'hmac-sha256';

/**
 * Pseudo-header covering the lowercased method and the path (+ query)
 */
export const REQUEST_TARGET = '(request-target)';

/**
 * Headers signed when nothing else is configured
 */
export const DEFAULT_SIGNED_HEADERS: readonly string[] = Object.freeze([REQUEST_TARGET, 'date']);

/**
 * Structured form of a `Signature` header value.
 */
export interface SignatureDescriptor {
  readonly keyId: string;
  /** Lowercase algorithm token, empty when the header did not carry one */
  readonly algorithm: string;
  /** Component names in signing order */
  readonly headers: readonly string[];
  /** Base64 signature */
  readonly signatureValue: string;
}

/**
 * Header values as handed over by a transport (Node, Express, fetch adapters)
 */
export type HeaderRecord = Readonly<Record<string, string | readonly string[] | undefined>>;

/**
 * The part of an HTTP request that takes part in signing.
 */
export interface CanonicalRequestView {
  readonly method: string;
  readonly path: string;
  /** Already encoded query, without the leading `?` */
  readonly query?: string;
  /** host[:port] of the target, used to add a missing `host` header when signing outbound */
  readonly authority?: string;
  readonly headers: HeaderRecord;
}

/**
 * Key material for one identity.
 *
 * RSA keys sign with the private half and verify with the public half;
 * an HMAC secret does both.
 */
export type KeyMaterial =
  | { readonly kind: 'rsa'; readonly privateKey?: KeyObject; readonly publicKey?: KeyObject }
  | { readonly kind: 'hmac'; readonly secret: Buffer };

/**
 * Headers to sign for one method
 */
export interface HeadersConfig {
  /** Signed on every request */
  readonly always: readonly string[];
  /** Signed only when the request carries them */
  readonly ifPresent: readonly string[];
}

/**
 * Header configuration with per-method overrides (methods are upper-cased)
 */
export interface SignedHeadersConfig {
  readonly defaultConfig?: HeadersConfig;
  readonly methods: ReadonlyMap<string, HeadersConfig>;
}

/**
 * Where a signature travels on the request
 */
export type SignatureLocation = 'signature' | 'authorization';

export interface SignOptions {
  view: CanonicalRequestView;
  /** Component names, in signing order */
  headers: readonly string[];
  keyId: string;
  algorithm: string;
  key: KeyMaterial;
}

export type SignResult =
  | { ok: true; descriptor: SignatureDescriptor }
  | { ok: false; error: HttpSignatureError };
