/**
 * Signature header codec
 *
 * Parses and serializes `keyId="...",algorithm="...",headers="...",signature="..."`.
 * Parsing is tolerant: malformed components are dropped, well-formed ones kept.
 */

import {
  DEFAULT_SIGNED_HEADERS,
  type HeaderRecord,
  type SignatureDescriptor,
  type SignatureLocation,
} from './types.js';
import { ErrorCodes, HttpSignatureError } from './errors.js';
import { getHeaderValues } from './request-view.js';

export interface SignatureComponent {
  name: string;
  value: string;
}

interface ParseState {
  keyId: string;
  algorithm: string;
  headers: string[] | null;
  signatureValue: string;
}

const AUTHORIZATION_SCHEME = 'signature';

/**
 * Split a header value into its well-formed `name=value` components.
 *
 * Commas inside double quotes do not split. A component whose value is
 * neither a complete quoted string nor a bare quote-free value is dropped.
 */
export function tokenizeSignatureHeader(raw: string): SignatureComponent[] {
  const components: SignatureComponent[] = [];

  for (const piece of splitOutsideQuotes(raw)) {
    const component = parseComponent(piece);
    if (component) {
      components.push(component);
    }
  }

  return components;
}

/**
 * Parse a `Signature` header value. Never fails.
 *
 * @example
 * parseSignatureHeader('keyId="rsa-key-1",algorithm="rsa-sha256",signature="abc="')
 * // { keyId: 'rsa-key-1', algorithm: 'rsa-sha256', headers: ['(request-target)', 'date'], signatureValue: 'abc=' }
 */
export function parseSignatureHeader(raw: string): SignatureDescriptor {
  const state = tokenizeSignatureHeader(raw).reduce<ParseState>(applyComponent, {
    keyId: '',
    algorithm: '',
    headers: null,
    signatureValue: '',
  });

  return Object.freeze({
    keyId: state.keyId,
    algorithm: state.algorithm,
    headers: Object.freeze(state.headers ?? [...DEFAULT_SIGNED_HEADERS]),
    signatureValue: state.signatureValue,
  });
}

/**
 * Syntactic check, independent of any request or key.
 */
export function validateSyntax(descriptor: SignatureDescriptor): HttpSignatureError | undefined {
  if (!descriptor.keyId) {
    return new HttpSignatureError(
      ErrorCodes.SIGNATURE_PARAM_MISSING,
      'keyId is a mandatory signature header component'
    );
  }
  if (!descriptor.signatureValue) {
    return new HttpSignatureError(
      ErrorCodes.SIGNATURE_PARAM_MISSING,
      'signature is a mandatory signature header component'
    );
  }
  return undefined;
}

/**
 * Render a descriptor back to header-value form, fields in fixed order.
 */
export function serializeSignatureHeader(descriptor: SignatureDescriptor): string {
  return [
    `keyId="${descriptor.keyId}"`,
    `algorithm="${descriptor.algorithm}"`,
    `headers="${descriptor.headers.join(' ')}"`,
    `signature="${descriptor.signatureValue}"`,
  ].join(',');
}

/**
 * Find the signature parameters on a request, trying locations in order.
 *
 * `Authorization` only counts when it uses the `Signature` scheme; the scheme
 * prefix is stripped.
 */
export function extractSignatureHeader(
  headers: HeaderRecord,
  locations: readonly SignatureLocation[] = ['signature', 'authorization']
): string | null {
  for (const location of locations) {
    const values = getHeaderValues(headers, location);
    if (!values) continue;

    for (const value of values) {
      if (location === 'signature') {
        return value;
      }
      const trimmed = value.trimStart();
      const spaceIndex = trimmed.search(/\s/);
      if (spaceIndex === -1) continue;
      if (trimmed.slice(0, spaceIndex).toLowerCase() === AUTHORIZATION_SCHEME) {
        return trimmed.slice(spaceIndex).trim();
      }
    }
  }
  return null;
}

/**
 * Header name and value to attach for a given location
 */
export function formatSignatureHeader(
  descriptor: SignatureDescriptor,
  location: SignatureLocation = 'signature'
): { name: string; value: string } {
  const params = serializeSignatureHeader(descriptor);
  if (location === 'authorization') {
    return { name: 'authorization', value: `Signature ${params}` };
  }
  return { name: 'signature', value: params };
}

// --- Internal parsing helpers ---

function applyComponent(state: ParseState, component: SignatureComponent): ParseState {
  switch (component.name) {
    case 'keyId':
      return { ...state, keyId: component.value };
    case 'algorithm':
      return { ...state, algorithm: component.value.toLowerCase() };
    case 'headers': {
      const names = component.value.split(/\s+/).filter(Boolean);
      return { ...state, headers: names.length > 0 ? names : null };
    }
    case 'signature':
      return { ...state, signatureValue: component.value };
    default:
      return state;
  }
}

/**
 * Split on commas that are not inside a quoted string.
 */
function splitOutsideQuotes(value: string): string[] {
  const pieces: string[] = [];
  let current = '';
  let inString = false;

  for (const char of value) {
    if (char === '"') {
      inString = !inString;
      current += char;
    } else if (char === ',' && !inString) {
      pieces.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  pieces.push(current);

  return pieces;
}

function parseComponent(piece: string): SignatureComponent | null {
  const eqIndex = piece.indexOf('=');
  if (eqIndex === -1) return null;

  const name = piece.slice(0, eqIndex).trim();
  const rawValue = piece.slice(eqIndex + 1).trim();
  if (!name || name.includes('"')) return null;

  if (rawValue.startsWith('"')) {
    // Complete quoted string with no quote inside
    if (rawValue.length < 2 || !rawValue.endsWith('"')) return null;
    const inner = rawValue.slice(1, -1);
    if (inner.includes('"')) return null;
    return { name, value: inner };
  }

  // A bare value must be non-empty
  if (!rawValue || rawValue.includes('"')) return null;
  return { name, value: rawValue };
}
