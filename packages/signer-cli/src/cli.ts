#!/usr/bin/env tsx

/**
 * HTTP Signature CLI
 *
 * Sign, send and check requests carrying a `Signature` header
 */

import { Command } from 'commander';
import { keygenCommand } from './commands/keygen.js';
import { signCommand } from './commands/sign.js';
import { fetchCommand } from './commands/fetch.js';
import { verifyCommand } from './commands/verify.js';
import { configCommand } from './commands/config.js';
import { collectHeader } from './header-options.js';

const program = new Command();

program
  .name('httpsig')
  .description('Sign HTTP requests with the Signature header (rsa-sha256, hmac-sha256)')
  .version('0.1.0');

/**
 * keygen command - Generate RSA key pair or HMAC secret
 */
program
  .command('keygen')
  .description('Generate a signing key and save configuration')
  .requiredOption('--key-id <id>', 'keyId the receiving service knows this key by')
  .option('--hmac', 'Generate an HMAC shared secret instead of an RSA key pair')
  .option('-f, --force', 'Overwrite an existing configuration without asking')
  .action(async (options) => {
    await keygenCommand({
      keyId: options.keyId,
      hmac: options.hmac,
      force: options.force,
    });
  });

/**
 * sign command - Print signature headers for a request
 */
program
  .command('sign')
  .description('Print the headers that sign a request, without sending it')
  .argument('<url>', 'URL to sign')
  .option('-m, --method <method>', 'HTTP method (default: GET)', 'GET')
  .option('-d, --body <data>', 'Request body (JSON)')
  .option('-H, --header <header>', 'Extra header "Name: value" (repeatable)', collectHeader)
  .action(async (url, options) => {
    await signCommand(url, {
      method: options.method,
      body: options.body,
      header: options.header,
    });
  });

/**
 * fetch command - Fetch URL with signed request
 */
program
  .command('fetch')
  .description('Fetch a URL with signed HTTP request')
  .argument('<url>', 'URL to fetch')
  .option('-m, --method <method>', 'HTTP method (default: GET)', 'GET')
  .option('-d, --body <data>', 'Request body (JSON)')
  .option('-H, --header <header>', 'Extra header "Name: value" (repeatable)', collectHeader)
  .option('-v, --verbose', 'Verbose output')
  .action(async (url, options) => {
    await fetchCommand(url, {
      method: options.method,
      body: options.body,
      header: options.header,
      verbose: options.verbose,
    });
  });

/**
 * verify command - Check a signature locally
 */
program
  .command('verify')
  .description('Verify a Signature header value against a key')
  .argument('<url>', 'URL the request was sent to')
  .requiredOption('--signature <value>', 'Signature header value')
  .option('--public-key <file>', 'RSA public key or certificate (PEM)')
  .option('--secret <secret>', 'HMAC shared secret')
  .option('-m, --method <method>', 'HTTP method (default: GET)', 'GET')
  .option('-H, --header <header>', 'Request header "Name: value" (repeatable)', collectHeader)
  .option('--require <names>', 'Headers the signature must cover, e.g. "(request-target) date"')
  .action(async (url, options) => {
    await verifyCommand(url, {
      signature: options.signature,
      publicKey: options.publicKey,
      secret: options.secret,
      method: options.method,
      header: options.header,
      require: options.require,
    });
  });

/**
 * config command - Display configuration
 */
program
  .command('config')
  .description('Display current signer configuration')
  .action(async () => {
    await configCommand();
  });

/**
 * Examples
 */
program.addHelpText(
  'after',
  `
Examples:
  # Generate an RSA key pair
  $ httpsig keygen --key-id billing-service

  # Generate an HMAC secret
  $ httpsig keygen --key-id reporting-job --hmac

  # Print the signature headers for a request
  $ httpsig sign https://api.example.com/reports -H "Accept: application/json"

  # Fetch with POST and body
  $ httpsig fetch https://api.example.com/reports -m POST -d '{"year":2024}'

  # Verify a signature
  $ httpsig verify https://api.example.com/reports --secret change-me \\
      --signature 'keyId="reporting-job",algorithm="hmac-sha256",headers="(request-target) date",signature="..."' \\
      -H "Date: Thu, 08 Jun 2014 18:32:30 GMT" --require "(request-target) date"

  # Show configuration
  $ httpsig config
`
);

// Parse arguments
await program.parseAsync();
