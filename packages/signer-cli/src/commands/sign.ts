/**
 * Sign Command
 *
 * Prints the headers a request needs, without sending it
 */

import chalk from 'chalk';
import { KeyStorage } from '../key-storage.js';
import { RequestSigner } from '../request-signer.js';
import { parseHeaderOptions } from '../header-options.js';

export async function signCommand(
  url: string,
  options: {
    method?: string;
    body?: string;
    header?: string[];
  }
): Promise<void> {
  try {
    const config = await KeyStorage.load();
    if (!config) {
      console.error(chalk.red('❌ No configuration found. Run "httpsig keygen" first.'));
      process.exit(1);
    }

    const signer = new RequestSigner(config);
    const signed = signer.sign(options.method || 'GET', url, {
      headers: parseHeaderOptions(options.header),
      ...(options.body !== undefined ? { body: options.body } : {}),
    });

    console.log(chalk.bold(`${signed.method} ${signed.url}`));
    console.log(chalk.gray(`Signed components: ${signed.descriptor.headers.join(' ')}\n`));
    for (const [name, value] of Object.entries(signed.headers)) {
      console.log(`${name}: ${value}`);
    }
  } catch (error) {
    console.error('❌ Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}
