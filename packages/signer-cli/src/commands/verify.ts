/**
 * Verify Command
 *
 * Checks a signature locally against a public key or shared secret
 */

import { readFile } from 'node:fs/promises';
import chalk from 'chalk';
import {
  createRequestView,
  hmacSecret,
  parseSignatureHeader,
  rsaPublicKey,
  verify,
  type HttpSignatureError,
  type KeyMaterial,
  type SignatureDescriptor,
} from '@httpsig/core';
import { parseHeaderOptions, parseNameList } from '../header-options.js';

export interface VerifyInput {
  method: string;
  url: string;
  headers: Record<string, string>;
  /** Signature header value, with or without the `Signature ` scheme */
  signature: string;
  key: KeyMaterial;
  required?: string[];
}

export interface VerifyOutcome {
  descriptor: SignatureDescriptor;
  error?: HttpSignatureError;
}

export function checkRequestSignature(input: VerifyInput): VerifyOutcome {
  const descriptor = parseSignatureHeader(input.signature.replace(/^\s*signature\s+/i, ''));
  const view = createRequestView({
    method: input.method.toUpperCase(),
    url: input.url,
    headers: input.headers,
  });
  const error = verify(descriptor, view, input.key, input.required ?? []);
  return error ? { descriptor, error } : { descriptor };
}

export async function verifyCommand(
  url: string,
  options: {
    signature: string;
    publicKey?: string;
    secret?: string;
    method?: string;
    header?: string[];
    require?: string;
  }
): Promise<void> {
  if ((options.publicKey === undefined) === (options.secret === undefined)) {
    console.error(chalk.red('❌ Provide exactly one of --public-key or --secret'));
    process.exit(1);
  }

  try {
    const key =
      options.publicKey !== undefined
        ? rsaPublicKey(await readFile(options.publicKey))
        : hmacSecret(options.secret ?? '');

    const { descriptor, error } = checkRequestSignature({
      method: options.method || 'GET',
      url,
      headers: parseHeaderOptions(options.header),
      signature: options.signature,
      key,
      required: parseNameList(options.require),
    });

    console.log(`  Key ID: ${descriptor.keyId || '(none)'}`);
    console.log(`  Algorithm: ${descriptor.algorithm || '(from key)'}`);
    console.log(`  Components: ${descriptor.headers.join(' ')}\n`);

    if (error) {
      console.log(chalk.red(`❌ ${error.code}: ${error.message}`));
      process.exit(1);
    }

    console.log(chalk.green('✅ Signature verified'));
  } catch (error) {
    console.error('❌ Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}
