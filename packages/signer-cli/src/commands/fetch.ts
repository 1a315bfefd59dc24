/**
 * Fetch Command
 *
 * Fetch a URL with signed request
 */

import chalk from 'chalk';
import ora from 'ora';
import { KeyStorage } from '../key-storage.js';
import { RequestSigner } from '../request-signer.js';
import { HttpClient } from '../http-client.js';
import { parseHeaderOptions } from '../header-options.js';

export async function fetchCommand(
  url: string,
  options: {
    method?: string;
    body?: string;
    header?: string[];
    verbose?: boolean;
  }
): Promise<void> {
  const method = options.method || 'GET';

  console.log(`🔏 Fetching ${url} with signed request...\n`);

  try {
    const config = await KeyStorage.load();
    if (!config) {
      console.error(chalk.red('❌ No configuration found. Run "httpsig keygen" first.'));
      process.exit(1);
    }

    if (options.verbose) {
      console.log('Configuration:');
      console.log(`  Key ID: ${config.key_id}`);
      console.log(`  Algorithm: ${config.algorithm}\n`);
    }

    const signer = new RequestSigner(config);
    const client = new HttpClient();

    const signedRequest = signer.sign(method, url, {
      headers: parseHeaderOptions(options.header),
      ...(options.body !== undefined ? { body: options.body } : {}),
    });

    if (options.verbose) {
      const location = config.location === 'authorization' ? 'Authorization' : 'Signature';
      const value = signedRequest.headers[location.toLowerCase()];
      console.log('Signature:');
      console.log(`  Components: ${signedRequest.descriptor.headers.join(' ')}`);
      console.log(`  ${location}: ${value}\n`);
    }

    const spinner = ora('Sending request...').start();
    const result = await client.fetch(signedRequest);
    spinner.stop();

    console.log(client.formatResponse(result));

    if (result.status === 401 && result.headers['www-authenticate']) {
      console.log(chalk.yellow('\n🔒 The server rejected the signature.'));
      console.log('  Check that the keyId is registered and the signed headers match its requirements.');
    }

    // Exit with error code if not successful
    if (result.status >= 400) {
      process.exit(1);
    }
  } catch (error) {
    console.error('❌ Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}
