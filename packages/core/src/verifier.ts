/**
 * HTTP signature verifier
 *
 * Checks a parsed signature against the verifier's own view of the request
 * and key material already resolved for the claimed keyId.
 */

import type { CanonicalRequestView, KeyMaterial, SignatureDescriptor } from './types.js';
import { ErrorCodes, HttpSignatureError } from './errors.js';
import { validateSyntax } from './signature-header.js';
import { buildSigningString } from './canonical.js';
import { checkSignature, parseAlgorithm, unsupportedAlgorithm } from './algorithms.js';
import { impliedAlgorithm } from './keys.js';

/**
 * Verify a signature.
 *
 * 1. Syntactic validation of the descriptor
 * 2. Every minimum header must be listed in the descriptor
 * 3. Signing string rebuilt from the descriptor's own header list
 * 4. Cryptographic check (HMAC compared in constant time)
 *
 * @param minimumHeaders - components that must be covered, matched case-insensitively
 * @returns undefined on success
 */
export function verify(
  descriptor: SignatureDescriptor,
  view: CanonicalRequestView,
  key: KeyMaterial,
  minimumHeaders: Iterable<string> = []
): HttpSignatureError | undefined {
  const syntaxError = validateSyntax(descriptor);
  if (syntaxError) {
    return syntaxError;
  }

  const signed = new Set(descriptor.headers.map((name) => name.toLowerCase()));
  for (const required of minimumHeaders) {
    if (!signed.has(required.toLowerCase())) {
      return new HttpSignatureError(
        ErrorCodes.REQUIRED_HEADER_MISSING,
        `Header ${required} is required to be signed, yet it is not in the signed headers`,
        required
      );
    }
  }

  const signingString = buildSigningString(view, descriptor.headers);

  const token = descriptor.algorithm || impliedAlgorithm(key);
  const algorithm = parseAlgorithm(token);
  if (!algorithm) {
    return unsupportedAlgorithm(token);
  }

  return checkSignature(algorithm, key, signingString, descriptor.signatureValue);
}
