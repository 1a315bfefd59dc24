/**
 * Key Generation Command
 *
 * Generates an RSA key pair or HMAC secret and saves configuration
 */

import { randomBytes } from 'node:crypto';
import chalk from 'chalk';
import ora from 'ora';
import prompts from 'prompts';
import { generateRsaKeyPair } from '@httpsig/core';
import { KeyStorage } from '../key-storage.js';
import type { SignerConfig } from '../types.js';

const HMAC_SECRET_BYTES = 32;

export function createSignerConfig(options: { keyId: string; hmac?: boolean }): SignerConfig {
  if (options.hmac) {
    return {
      key_id: options.keyId,
      algorithm: 'hmac-sha256',
      hmac_secret: randomBytes(HMAC_SECRET_BYTES).toString('base64'),
    };
  }

  const keyPair = generateRsaKeyPair();
  return {
    key_id: options.keyId,
    algorithm: 'rsa-sha256',
    private_key: keyPair.privateKey,
    public_key: keyPair.publicKey,
  };
}

export async function keygenCommand(options: {
  keyId: string;
  hmac?: boolean;
  force?: boolean;
}): Promise<void> {
  if (KeyStorage.exists() && !options.force) {
    const answer = await prompts({
      type: 'confirm',
      name: 'overwrite',
      message: `Overwrite existing configuration at ${KeyStorage.getConfigPath()}?`,
      initial: false,
    });
    if (answer.overwrite !== true) {
      console.log(chalk.yellow('Keeping existing configuration'));
      return;
    }
  }

  const spinner = ora(options.hmac ? 'Generating HMAC secret...' : 'Generating RSA key pair...').start();

  try {
    const config = createSignerConfig(options);
    spinner.succeed(chalk.green(`Generated ${config.algorithm} key`));

    await KeyStorage.save(config);

    console.log('\nConfiguration:');
    console.log(`  Key ID: ${config.key_id}`);
    console.log(`  Algorithm: ${config.algorithm}`);
    console.log(`  Config file: ${KeyStorage.getConfigPath()}\n`);

    if (config.algorithm === 'rsa-sha256') {
      console.log('Public Key (PEM):');
      console.log(config.public_key);
    } else {
      console.log('Shared secret:');
      console.log(config.hmac_secret);
      console.log('');
    }

    console.log(chalk.yellow('⚠️  IMPORTANT:'));
    const material = config.algorithm === 'rsa-sha256' ? 'this public key' : 'this secret';
    console.log(`  1. Register ${material} with the receiving service under keyId "${config.key_id}"`);
    console.log('  2. Keep your private key material secure (stored in config file)');
    console.log('  3. Never share a private key with anyone\n');
  } catch (error) {
    spinner.fail(chalk.red('Key generation failed'));
    console.error('❌ Error generating key:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}
