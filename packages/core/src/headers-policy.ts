/**
 * Header selection policy
 *
 * Decides which components an outbound signature covers, and which ones an
 * inbound signature must cover.
 */

import {
  DEFAULT_SIGNED_HEADERS,
  REQUEST_TARGET,
  type CanonicalRequestView,
  type HeadersConfig,
  type SignedHeadersConfig,
} from './types.js';
import { getHeaderValues } from './request-view.js';

export interface HeaderSelectionPolicy {
  /** Per target identity (keyId) */
  readonly targets: ReadonlyMap<string, SignedHeadersConfig>;
  /** Per algorithm token */
  readonly algorithms: ReadonlyMap<string, SignedHeadersConfig>;
  /** Process-level default */
  readonly defaultConfig?: SignedHeadersConfig;
}

type HeadersInput = readonly string[] | SignedHeadersConfig;

export interface HeaderSelectionPolicyOptions {
  targets?: Readonly<Record<string, HeadersInput>>;
  algorithms?: Readonly<Record<string, HeadersInput>>;
  defaultHeaders?: HeadersInput;
}

export function headersConfig(
  always: readonly string[],
  ifPresent: readonly string[] = []
): HeadersConfig {
  return Object.freeze({
    always: Object.freeze([...always]),
    ifPresent: Object.freeze([...ifPresent]),
  });
}

/**
 * @param methods - per-method overrides; keys are matched case-insensitively
 */
export function signedHeadersConfig(
  defaultConfig?: HeadersConfig,
  methods: Readonly<Record<string, HeadersConfig>> = {}
): SignedHeadersConfig {
  const byMethod = new Map<string, HeadersConfig>();
  for (const [method, config] of Object.entries(methods)) {
    byMethod.set(method.toUpperCase(), config);
  }
  return Object.freeze({
    ...(defaultConfig ? { defaultConfig } : {}),
    methods: byMethod,
  });
}

/**
 * Components to sign for a method.
 *
 * `ifPresent` names are kept only when the view carries them; without a view
 * only `always` is returned.
 */
export function selectHeaders(
  config: SignedHeadersConfig,
  method: string,
  view?: CanonicalRequestView
): string[] {
  const selected = config.methods.get(method.toUpperCase()) ?? config.defaultConfig;
  if (!selected) {
    return [];
  }

  const headers = [...selected.always];
  if (view) {
    for (const name of selected.ifPresent) {
      if (name.toLowerCase() === REQUEST_TARGET || getHeaderValues(view.headers, name)) {
        headers.push(name);
      }
    }
  }
  return headers;
}

export function createHeaderSelectionPolicy(
  options: HeaderSelectionPolicyOptions = {}
): HeaderSelectionPolicy {
  const toMap = (input: Readonly<Record<string, HeadersInput>> = {}, lowerKeys = false) =>
    new Map(
      Object.entries(input).map(
        ([key, value]) => [lowerKeys ? key.toLowerCase() : key, toConfig(value)] as const
      )
    );

  return Object.freeze({
    targets: toMap(options.targets),
    algorithms: toMap(options.algorithms, true),
    ...(options.defaultHeaders ? { defaultConfig: toConfig(options.defaultHeaders) } : {}),
  });
}

/**
 * Resolve the ordered component list for an outbound signature.
 *
 * Order of precedence: target identity, algorithm, process default, then
 * `["(request-target)", "date"]`. Never fails.
 */
export function resolveSignedHeaders(
  policy: HeaderSelectionPolicy,
  keyId: string,
  algorithm?: string,
  view?: CanonicalRequestView
): string[] {
  const config =
    policy.targets.get(keyId) ??
    (algorithm !== undefined ? policy.algorithms.get(algorithm.toLowerCase()) : undefined) ??
    policy.defaultConfig;

  if (!config) {
    return [...DEFAULT_SIGNED_HEADERS];
  }
  return selectHeaders(config, view?.method ?? 'GET', view);
}

function toConfig(input: HeadersInput): SignedHeadersConfig {
  if (isHeaderList(input)) {
    return signedHeadersConfig(headersConfig(input));
  }
  return input;
}

function isHeaderList(input: HeadersInput): input is readonly string[] {
  return Array.isArray(input);
}
