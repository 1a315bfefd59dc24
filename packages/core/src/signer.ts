/**
 * HTTP request signer
 */

import type { SignOptions, SignResult } from './types.js';
import { buildSigningString } from './canonical.js';
import { computeSignature, parseAlgorithm, unsupportedAlgorithm } from './algorithms.js';

/**
 * Sign a request view over the given components.
 *
 * The returned descriptor lists exactly the components used, in order, so a
 * verifier can rebuild the same signing string. Components the request does
 * not carry are left out of the signing string but stay in the list.
 */
export function sign(options: SignOptions): SignResult {
  const algorithm = parseAlgorithm(options.algorithm);
  if (!algorithm) {
    return { ok: false, error: unsupportedAlgorithm(options.algorithm) };
  }

  const signingString = buildSigningString(options.view, options.headers);
  const signature = computeSignature(algorithm, options.key, signingString);
  if (!signature.ok) {
    return signature;
  }

  return {
    ok: true,
    descriptor: Object.freeze({
      keyId: options.keyId,
      algorithm,
      headers: Object.freeze([...options.headers]),
      signatureValue: signature.value,
    }),
  };
}
