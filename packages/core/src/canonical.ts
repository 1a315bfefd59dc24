/**
 * Signing string construction
 *
 * This is what gets signed by the client and rebuilt by the verifier.
 */

import { REQUEST_TARGET, type CanonicalRequestView } from './types.js';
import { getHeaderValues } from './request-view.js';

/**
 * Build the signing string for the given components, in order.
 *
 * Every emitted line ends with `\n`. Headers the request does not carry are
 * skipped, so one default header list can serve requests of many shapes.
 *
 * @example
 * buildSigningString(view, ['date', '(request-target)'])
 * // 'date: Thu, 08 Jun 2014 18:32:30 GMT\n(request-target): get /my/resource\n'
 */
export function buildSigningString(
  view: CanonicalRequestView,
  components: readonly string[]
): string {
  const lines: string[] = [];

  for (const component of components) {
    const name = component.toLowerCase();

    if (name === REQUEST_TARGET) {
      lines.push(`${REQUEST_TARGET}: ${requestTarget(view)}`);
      continue;
    }

    const values = getHeaderValues(view.headers, name);
    if (values) {
      lines.push(`${name}: ${values.join(', ')}`);
    }
  }

  return lines.map((line) => `${line}\n`).join('');
}

/**
 * `get /path?query` form used by the (request-target) pseudo-header
 */
export function requestTarget(view: CanonicalRequestView): string {
  const target = view.query ? `${view.path}?${view.query}` : view.path;
  return `${view.method.toLowerCase()} ${target}`;
}
