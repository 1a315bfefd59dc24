/**
 * Signature primitives for the supported algorithms
 */

import { createHmac, sign as rsaSign, verify as rsaVerify, timingSafeEqual } from 'node:crypto';
import type { KeyMaterial, SignatureAlgorithm } from './types.js';
import { ErrorCodes, HttpSignatureError } from './errors.js';

export const SUPPORTED_ALGORITHMS: readonly SignatureAlgorithm[] = ['rsa-sha256', 'hmac-sha256'];

export function parseAlgorithm(token: string): SignatureAlgorithm | undefined {
  const lower = token.toLowerCase();
  return SUPPORTED_ALGORITHMS.find((algorithm) => algorithm === lower);
}

export function unsupportedAlgorithm(token: string): HttpSignatureError {
  return new HttpSignatureError(
    ErrorCodes.SIGNATURE_ALGORITHM_UNSUPPORTED,
    `Unsupported algorithm: ${token} (supported: ${SUPPORTED_ALGORITHMS.join(', ')})`
  );
}

/**
 * Compute a base64 signature over the UTF-8 bytes of `data`.
 */
export function computeSignature(
  algorithm: SignatureAlgorithm,
  key: KeyMaterial,
  data: string
): { ok: true; value: string } | { ok: false; error: HttpSignatureError } {
  const bytes = Buffer.from(data, 'utf-8');

  switch (algorithm) {
    case 'rsa-sha256':
      if (key.kind !== 'rsa' || !key.privateKey) {
        return { ok: false, error: keyUnusable(key, algorithm, 'signing') };
      }
      // PKCS#1 v1.5 is the default padding for RSA keys
      return { ok: true, value: rsaSign('sha256', bytes, key.privateKey).toString('base64') };
    case 'hmac-sha256':
      if (key.kind !== 'hmac') {
        return { ok: false, error: keyUnusable(key, algorithm, 'signing') };
      }
      return { ok: true, value: createHmac('sha256', key.secret).update(bytes).digest('base64') };
  }
}

/**
 * Check a base64 signature over the UTF-8 bytes of `data`.
 *
 * @returns undefined when the signature matches
 */
export function checkSignature(
  algorithm: SignatureAlgorithm,
  key: KeyMaterial,
  data: string,
  signatureBase64: string
): HttpSignatureError | undefined {
  const bytes = Buffer.from(data, 'utf-8');
  const signature = Buffer.from(signatureBase64, 'base64');

  switch (algorithm) {
    case 'rsa-sha256': {
      if (key.kind !== 'rsa' || !key.publicKey) {
        return keyUnusable(key, algorithm, 'verification');
      }
      let valid: boolean;
      try {
        valid = rsaVerify('sha256', bytes, key.publicKey, signature);
      } catch {
        valid = false;
      }
      return valid ? undefined : signatureInvalid();
    }
    case 'hmac-sha256': {
      if (key.kind !== 'hmac') {
        return keyUnusable(key, algorithm, 'verification');
      }
      const expected = createHmac('sha256', key.secret).update(bytes).digest();
      if (expected.length !== signature.length || !timingSafeEqual(expected, signature)) {
        return signatureInvalid();
      }
      return undefined;
    }
  }
}

function keyUnusable(
  key: KeyMaterial,
  algorithm: SignatureAlgorithm,
  use: 'signing' | 'verification'
): HttpSignatureError {
  return new HttpSignatureError(
    ErrorCodes.KEY_UNUSABLE,
    `Key material of type ${key.kind} cannot be used for ${algorithm} ${use}`
  );
}

function signatureInvalid(): HttpSignatureError {
  return new HttpSignatureError(ErrorCodes.SIGNATURE_INVALID, 'Signature verification failed');
}
