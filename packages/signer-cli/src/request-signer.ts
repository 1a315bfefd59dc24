/**
 * HTTP Request Signer
 *
 * Signs outgoing requests with the configured RSA key or HMAC secret
 */

import {
  createRequestView,
  getHeaderValues,
  headersConfig,
  hmacSecret,
  rsaPrivateKey,
  signOutbound,
  signedHeadersConfig,
  type KeyMaterial,
  type SignatureDescriptor,
  type SignedHeadersConfig,
} from '@httpsig/core';
import type { SignedRequest, SignerConfig } from './types.js';

export const USER_AGENT = 'httpsig-cli/0.1.0';

/**
 * Signed on every request unless the configuration lists its own headers
 */
export const DEFAULT_CLI_HEADERS: SignedHeadersConfig = signedHeadersConfig(
  headersConfig(['(request-target)', 'host', 'date'], ['content-type', 'content-length', 'digest'])
);

export interface RequestSignOptions {
  headers?: Record<string, string>;
  body?: string;
  /** Clock used for a generated Date header */
  now?: Date;
}

export interface SignedRequestWithDescriptor extends SignedRequest {
  descriptor: SignatureDescriptor;
}

export class RequestSigner {
  private readonly key: KeyMaterial;
  private readonly signedHeaders: SignedHeadersConfig;

  constructor(private config: SignerConfig) {
    this.key =
      config.algorithm === 'rsa-sha256'
        ? rsaPrivateKey(config.private_key)
        : hmacSecret(config.hmac_secret);
    this.signedHeaders = config.signed_headers
      ? signedHeadersConfig(headersConfig(config.signed_headers))
      : DEFAULT_CLI_HEADERS;
  }

  /**
   * Sign an HTTP request
   *
   * Date and Host are generated when they are signed but not supplied.
   */
  sign(method: string, url: string, options: RequestSignOptions = {}): SignedRequestWithDescriptor {
    const headers: Record<string, string> = {
      'User-Agent': USER_AGENT,
      ...options.headers,
    };

    if (options.body !== undefined) {
      if (!getHeaderValues(headers, 'content-type')) {
        headers['Content-Type'] = 'application/json';
      }
      if (!getHeaderValues(headers, 'content-length')) {
        headers['Content-Length'] = Buffer.byteLength(options.body).toString();
      }
    }

    const view = createRequestView({ method: method.toUpperCase(), url, headers });
    const result = signOutbound(
      {
        keyId: this.config.key_id,
        algorithm: this.config.algorithm,
        key: this.key,
        signedHeaders: this.signedHeaders,
        ...(this.config.location ? { location: this.config.location } : {}),
      },
      view,
      options.now ? { now: options.now } : {}
    );

    if (!result.ok) {
      throw result.error;
    }

    return {
      method: view.method,
      url,
      headers: { ...headers, ...result.headers },
      ...(options.body !== undefined ? { body: options.body } : {}),
      descriptor: result.descriptor,
    };
  }
}
