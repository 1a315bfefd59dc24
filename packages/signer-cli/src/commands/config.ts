/**
 * Config Command
 *
 * Display current configuration
 */

import chalk from 'chalk';
import { KeyStorage } from '../key-storage.js';
import { DEFAULT_CLI_HEADERS } from '../request-signer.js';

export async function configCommand(): Promise<void> {
  console.log('🔧 Signer Configuration\n');

  const config = await KeyStorage.load();

  if (!config) {
    console.log(chalk.red('❌ No configuration found.'));
    console.log('Run "httpsig keygen" to generate a key.\n');
    return;
  }

  const signedHeaders = config.signed_headers ?? [
    ...(DEFAULT_CLI_HEADERS.defaultConfig?.always ?? []),
    ...(DEFAULT_CLI_HEADERS.defaultConfig?.ifPresent ?? []).map((name) => `${name}?`),
  ];

  console.log('Configuration File:', KeyStorage.getConfigPath());
  console.log('');
  console.log('Settings:');
  console.log(`  Key ID: ${config.key_id}`);
  console.log(`  Algorithm: ${config.algorithm}`);
  console.log(`  Header: ${config.location === 'authorization' ? 'Authorization: Signature' : 'Signature'}`);
  console.log(`  Signed headers: ${signedHeaders.join(' ')}`);
  console.log('');

  if (config.algorithm === 'rsa-sha256') {
    console.log('Public Key (PEM):');
    console.log(config.public_key);
    console.log('Private Key: ✓ (stored securely)');
  } else {
    console.log('Shared secret: ✓ (stored securely)');
  }
  console.log('');
}
