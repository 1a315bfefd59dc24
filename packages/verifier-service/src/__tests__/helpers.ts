import {
  createRequestView,
  generateRsaKeyPair,
  headersConfig,
  hmacSecret,
  rsaPrivateKey,
  rsaPublicKey,
  signOutbound,
  signedHeadersConfig,
  type KeyMaterial,
  type SignatureLocation,
} from '@httpsig/core';
import { InboundClientRegistry } from '../clients.js';
import type { InboundRequest } from '../types.js';

export const DATE = 'Thu, 08 Jun 2014 18:32:30 GMT';
export const SECRET = 'test-secret';

export const rsaPair = generateRsaKeyPair();

export function createRegistry(): InboundClientRegistry {
  return new InboundClientRegistry([
    {
      keyId: 'hmac-key',
      principalName: 'reporting-job',
      principalType: 'service',
      algorithm: 'hmac-sha256',
      key: hmacSecret(SECRET),
    },
    {
      keyId: 'rsa-key',
      principalName: 'alice',
      principalType: 'user',
      algorithm: 'rsa-sha256',
      key: rsaPublicKey(rsaPair.publicKey),
    },
  ]);
}

export interface SignedRequestOptions {
  keyId?: string;
  algorithm?: string;
  key?: KeyMaterial;
  components?: string[];
  method?: string;
  url?: string;
  headers?: Record<string, string>;
  location?: SignatureLocation;
}

/**
 * Request signed the way a calling service would sign it
 */
export function signedRequest(options: SignedRequestOptions = {}): InboundRequest & {
  headers: Record<string, string>;
} {
  const method = options.method ?? 'GET';
  const url = options.url ?? 'http://example.org/reports?year=2024';
  const headers = { date: DATE, ...options.headers };

  const result = signOutbound(
    {
      keyId: options.keyId ?? 'hmac-key',
      algorithm: options.algorithm ?? 'hmac-sha256',
      key: options.key ?? hmacSecret(SECRET),
      signedHeaders: signedHeadersConfig(
        headersConfig(options.components ?? ['(request-target)', 'date'])
      ),
      ...(options.location ? { location: options.location } : {}),
    },
    createRequestView({ method, url, headers })
  );
  if (!result.ok) {
    throw result.error;
  }

  return { method, url, headers: { ...headers, ...result.headers } };
}

export function rsaSignedRequest(options: SignedRequestOptions = {}) {
  return signedRequest({
    keyId: 'rsa-key',
    algorithm: 'rsa-sha256',
    key: rsaPrivateKey(rsaPair.privateKey),
    ...options,
  });
}
