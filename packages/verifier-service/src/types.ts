/**
 * Type definitions for the verifier service
 */

import type {
  ErrorCode,
  HeaderRecord,
  KeyMaterial,
  SignatureAlgorithm,
  SignatureLocation,
} from '@httpsig/core';

export type PrincipalType = 'service' | 'user';

/**
 * A caller known to the service by its keyId.
 */
export interface InboundClient {
  keyId: string;
  principalName: string;
  principalType: PrincipalType;
  algorithm: SignatureAlgorithm;
  key: KeyMaterial;
}

export interface Principal {
  name: string;
  type: PrincipalType;
  keyId: string;
}

export interface InboundRequest {
  method: string;
  url: string;
  headers: HeaderRecord;
}

export interface InboundResult {
  /** A signature header was present in one of the configured locations */
  signed: boolean;
  verified: boolean;
  principal?: Principal;
  error?: string;
  errorCode?: ErrorCode;
}

export type MiddlewareMode = 'observe' | 'require-verified';

/**
 * Verification info attached to each request by the middleware
 */
export interface RequestVerificationInfo {
  signed: boolean;
  result: InboundResult;
}

export interface ServiceConfig {
  port: number;
  clientsFile: string;
  locations: SignatureLocation[];
  optional: boolean;
  realm: string;
}
