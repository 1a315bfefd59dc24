/**
 * Inbound signature verification against configured clients
 */

import {
  DEFAULT_SIGNED_HEADERS,
  ErrorCodes,
  HttpSignatureError,
  createRequestView,
  extractSignatureHeader,
  headersConfig,
  parseAlgorithm,
  parseSignatureHeader,
  selectHeaders,
  signedHeadersConfig,
  tokenizeSignatureHeader,
  unsupportedAlgorithm,
  validateSyntax,
  verify as verifySignature,
  type SignatureLocation,
  type SignedHeadersConfig,
} from '@httpsig/core';
import type { InboundClientRegistry } from './clients.js';
import type { InboundRequest, InboundResult } from './types.js';

export interface InboundVerifierOptions {
  /** Header locations searched in order (default: Signature, then Authorization) */
  locations?: SignatureLocation[];
  /** Unsigned requests pass without an error */
  optional?: boolean;
  /** Minimum headers a signature must cover, per method */
  signedHeaders?: SignedHeadersConfig;
}

export class InboundVerifier {
  private readonly locations: readonly SignatureLocation[];
  private readonly optional: boolean;
  private readonly signedHeaders: SignedHeadersConfig;

  constructor(
    private readonly clients: InboundClientRegistry,
    options: InboundVerifierOptions = {}
  ) {
    this.locations = [...(options.locations ?? ['signature', 'authorization'])];
    this.optional = options.optional ?? false;
    this.signedHeaders = options.signedHeaders ?? signedHeadersConfig(headersConfig(DEFAULT_SIGNED_HEADERS));
  }

  /**
   * Verify the signature on a request.
   *
   * Failures are reported in the result, never thrown.
   */
  verify(request: InboundRequest): InboundResult {
    try {
      return this.verifyRequest(request);
    } catch (error) {
      console.error('Signature verification error:', error);
      return {
        signed: true,
        verified: false,
        error: error instanceof Error ? error.message : 'Internal verification error',
      };
    }
  }

  private verifyRequest(request: InboundRequest): InboundResult {
    const raw = extractSignatureHeader(request.headers, this.locations);
    if (raw === null) {
      if (this.optional) {
        return { signed: false, verified: false };
      }
      return unsigned(
        new HttpSignatureError(
          ErrorCodes.SIGNATURE_MISSING,
          `Missing signature header (searched: ${this.locations.join(', ')})`
        )
      );
    }

    if (tokenizeSignatureHeader(raw).length === 0) {
      return failed(
        new HttpSignatureError(
          ErrorCodes.SIGNATURE_HEADER_MALFORMED,
          'Signature header has no parseable component'
        )
      );
    }

    const descriptor = parseSignatureHeader(raw);
    const syntaxError = validateSyntax(descriptor);
    if (syntaxError) {
      return failed(syntaxError);
    }

    const client = this.clients.resolve(descriptor.keyId);
    if (!client) {
      return failed(
        new HttpSignatureError(ErrorCodes.KEY_NOT_FOUND, `Unknown keyId: ${descriptor.keyId}`)
      );
    }

    const algorithm = descriptor.algorithm ? parseAlgorithm(descriptor.algorithm) : client.algorithm;
    if (!algorithm) {
      return failed(unsupportedAlgorithm(descriptor.algorithm));
    }
    if (algorithm !== client.algorithm) {
      return failed(
        new HttpSignatureError(
          ErrorCodes.ALGORITHM_MISMATCH,
          `Algorithm ${descriptor.algorithm} does not match ${client.algorithm} configured for ${client.keyId}`
        )
      );
    }

    const method = request.method.toUpperCase();
    const view = createRequestView({ method, url: request.url, headers: request.headers });
    const minimumHeaders = selectHeaders(this.signedHeaders, method, view);

    const error = verifySignature(descriptor, view, client.key, minimumHeaders);
    if (error) {
      return failed(error);
    }

    return {
      signed: true,
      verified: true,
      principal: {
        name: client.principalName,
        type: client.principalType,
        keyId: client.keyId,
      },
    };
  }
}

function failed(error: HttpSignatureError): InboundResult {
  return { signed: true, verified: false, error: error.message, errorCode: error.code };
}

function unsigned(error: HttpSignatureError): InboundResult {
  return { signed: false, verified: false, error: error.message, errorCode: error.code };
}
