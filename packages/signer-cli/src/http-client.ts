/**
 * HTTP Client for signed requests
 */

import type { SignedRequest, FetchResult } from './types.js';

const IMPORTANT_HEADERS = [
  'content-type',
  'www-authenticate',
  'x-httpsig-verified',
  'x-httpsig-key-id',
  'x-httpsig-principal',
];

const MAX_BODY_LENGTH = 500;

export class HttpClient {
  /**
   * Execute a signed request
   */
  async fetch(signedRequest: SignedRequest): Promise<FetchResult> {
    try {
      const response = await fetch(signedRequest.url, {
        method: signedRequest.method,
        headers: signedRequest.headers,
        body: signedRequest.body,
      });

      const body = await response.text();

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key] = value;
      });

      return {
        status: response.status,
        statusText: response.statusText,
        headers,
        body,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Request failed: ${message}`, { cause: error });
    }
  }

  /**
   * Display response in a readable format
   */
  formatResponse(result: FetchResult): string {
    const lines: string[] = [];

    lines.push(`Status: ${result.status} ${result.statusText}`);
    lines.push('');

    lines.push('Headers:');
    for (const header of IMPORTANT_HEADERS) {
      if (result.headers[header]) {
        lines.push(`  ${header}: ${result.headers[header]}`);
      }
    }

    lines.push('');

    lines.push('Body:');
    if (result.body.length > MAX_BODY_LENGTH) {
      lines.push(result.body.substring(0, MAX_BODY_LENGTH) + '...');
      lines.push(`(truncated, ${result.body.length} bytes total)`);
    } else {
      lines.push(result.body);
    }

    return lines.join('\n');
  }
}
