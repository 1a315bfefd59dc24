/**
 * Type definitions for the signer CLI
 */

import type { SignatureLocation } from '@httpsig/core';

interface BaseSignerConfig {
  key_id: string;
  /** Components to sign; the CLI default applies when absent */
  signed_headers?: string[];
  location?: SignatureLocation;
}

export interface RsaSignerConfig extends BaseSignerConfig {
  algorithm: 'rsa-sha256';
  private_key: string; // PEM (PKCS#8)
  public_key: string;  // PEM (SPKI)
}

export interface HmacSignerConfig extends BaseSignerConfig {
  algorithm: 'hmac-sha256';
  hmac_secret: string;
}

export type SignerConfig = RsaSignerConfig | HmacSignerConfig;

export interface SignedRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

export interface FetchResult {
  status: number;
  statusText: string;
  headers: Record<string, string>;
  body: string;
}
