/**
 * Outbound request signing
 *
 * Signs a request for a configured target and reports the headers the caller
 * has to attach.
 */

import type {
  CanonicalRequestView,
  KeyMaterial,
  SignatureDescriptor,
  SignatureLocation,
  SignedHeadersConfig,
} from './types.js';
import type { HttpSignatureError } from './errors.js';
import {
  createHeaderSelectionPolicy,
  resolveSignedHeaders,
  selectHeaders,
  type HeaderSelectionPolicy,
} from './headers-policy.js';
import { getHeaderValues, withHeaders } from './request-view.js';
import { formatSignatureHeader } from './signature-header.js';
import { sign } from './signer.js';

/**
 * Everything needed to sign requests for one outbound target
 */
export interface OutboundTarget {
  keyId: string;
  algorithm: string;
  key: KeyMaterial;
  /** Overrides the policy for this target */
  signedHeaders?: SignedHeadersConfig;
  /** Defaults to the `Signature` header */
  location?: SignatureLocation;
}

export interface OutboundOptions {
  policy?: HeaderSelectionPolicy;
  /** Clock used for a generated `date` header */
  now?: Date;
}

export type OutboundResult =
  | {
      ok: true;
      descriptor: SignatureDescriptor;
      /** Headers to add to the request, signature header included */
      headers: Record<string, string>;
    }
  | { ok: false; error: HttpSignatureError };

const EMPTY_POLICY = createHeaderSelectionPolicy();

/**
 * Sign a request for an outbound target.
 *
 * When `date` or `host` are selected but missing from the request, they are
 * generated (from `now` and the view's authority), signed, and returned for
 * the caller to attach.
 */
export function signOutbound(
  target: OutboundTarget,
  view: CanonicalRequestView,
  options: OutboundOptions = {}
): OutboundResult {
  const headers = target.signedHeaders
    ? selectHeaders(target.signedHeaders, view.method, view)
    : resolveSignedHeaders(options.policy ?? EMPTY_POLICY, target.keyId, target.algorithm, view);

  const added: Record<string, string> = {};
  const selected = new Set(headers.map((name) => name.toLowerCase()));

  if (selected.has('date') && !getHeaderValues(view.headers, 'date')) {
    added.date = (options.now ?? new Date()).toUTCString();
  }
  if (selected.has('host') && !getHeaderValues(view.headers, 'host') && view.authority) {
    added.host = view.authority;
  }

  const result = sign({
    view: withHeaders(view, added),
    headers,
    keyId: target.keyId,
    algorithm: target.algorithm,
    key: target.key,
  });
  if (!result.ok) {
    return result;
  }

  const signatureHeader = formatSignatureHeader(result.descriptor, target.location);
  return {
    ok: true,
    descriptor: result.descriptor,
    headers: { ...added, [signatureHeader.name]: signatureHeader.value },
  };
}
