/**
 * Key material builders
 */

import {
  X509Certificate,
  createPrivateKey,
  createPublicKey,
  generateKeyPairSync,
  type KeyObject,
} from 'node:crypto';
import type { KeyMaterial, SignatureAlgorithm } from './types.js';

export interface RsaKeyPairPem {
  publicKey: string;   // PEM (SPKI)
  privateKey: string;  // PEM (PKCS#8)
}

/**
 * RSA key for signing. The public half is derived from the private key, so
 * the same material can also verify.
 */
export function rsaPrivateKey(pem: string | Buffer): KeyMaterial {
  const privateKey = assertRsa(createPrivateKey(pem));
  const material: KeyMaterial = { kind: 'rsa', privateKey, publicKey: createPublicKey(privateKey) };
  return Object.freeze(material);
}

/**
 * RSA key for verification, from a public key or an X.509 certificate PEM.
 */
export function rsaPublicKey(pem: string | Buffer): KeyMaterial {
  const text = typeof pem === 'string' ? pem : pem.toString('utf-8');
  const publicKey = assertRsa(
    text.includes('-----BEGIN CERTIFICATE-----')
      ? new X509Certificate(text).publicKey
      : createPublicKey(text)
  );
  const material: KeyMaterial = { kind: 'rsa', publicKey };
  return Object.freeze(material);
}

export function hmacSecret(secret: string | Buffer): KeyMaterial {
  const bytes = typeof secret === 'string' ? Buffer.from(secret, 'utf-8') : Buffer.from(secret);
  const material: KeyMaterial = { kind: 'hmac', secret: bytes };
  return Object.freeze(material);
}

/**
 * Generate an RSA key pair in PEM format
 */
export function generateRsaKeyPair(modulusLength = 2048): RsaKeyPairPem {
  const { publicKey, privateKey } = generateKeyPairSync('rsa', {
    modulusLength,
    publicKeyEncoding: {
      type: 'spki',
      format: 'pem',
    },
    privateKeyEncoding: {
      type: 'pkcs8',
      format: 'pem',
    },
  });

  return {
    publicKey,
    privateKey,
  };
}

/**
 * Algorithm a key is used with when the signature header names none
 */
export function impliedAlgorithm(key: KeyMaterial): SignatureAlgorithm {
  return key.kind === 'rsa' ? 'rsa-sha256' : 'hmac-sha256';
}

function assertRsa(key: KeyObject): KeyObject {
  if (key.asymmetricKeyType !== 'rsa') {
    throw new Error(`Expected an RSA key, got ${key.asymmetricKeyType ?? 'unknown'}`);
  }
  return key;
}
