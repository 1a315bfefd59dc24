/**
 * HTTP signature error codes
 */

export const ErrorCodes = {
  /** No signature header on the request */
  SIGNATURE_MISSING: 'E_SIGNATURE_MISSING',
  /** Signature header yielded no usable component */
  SIGNATURE_HEADER_MALFORMED: 'E_SIGNATURE_HEADER_MALFORMED',
  /** keyId or signature missing */
  SIGNATURE_PARAM_MISSING: 'E_SIGNATURE_PARAM_MISSING',
  /** A header the verifier requires was not signed */
  REQUIRED_HEADER_MISSING: 'E_REQUIRED_HEADER_MISSING',
  /** Algorithm is neither rsa-sha256 nor hmac-sha256 */
  SIGNATURE_ALGORITHM_UNSUPPORTED: 'E_SIGNATURE_ALGORITHM_UNSUPPORTED',
  /** Header algorithm differs from the one configured for the key */
  ALGORITHM_MISMATCH: 'E_ALGORITHM_MISMATCH',
  /** Key material cannot serve the algorithm or direction */
  KEY_UNUSABLE: 'E_KEY_UNUSABLE',
  /** Key not found by resolver */
  KEY_NOT_FOUND: 'E_KEY_NOT_FOUND',
  /** Cryptographic verification failed */
  SIGNATURE_INVALID: 'E_SIGNATURE_INVALID',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export const ErrorHttpStatus: Record<ErrorCode, number> = {
  [ErrorCodes.SIGNATURE_MISSING]: 401,
  [ErrorCodes.SIGNATURE_HEADER_MALFORMED]: 400,
  [ErrorCodes.SIGNATURE_PARAM_MISSING]: 400,
  [ErrorCodes.REQUIRED_HEADER_MISSING]: 401,
  [ErrorCodes.SIGNATURE_ALGORITHM_UNSUPPORTED]: 400,
  [ErrorCodes.ALGORITHM_MISMATCH]: 401,
  [ErrorCodes.KEY_UNUSABLE]: 500,
  [ErrorCodes.KEY_NOT_FOUND]: 401,
  [ErrorCodes.SIGNATURE_INVALID]: 401,
};

/**
 * HTTP signature error with code and HTTP status.
 */
export class HttpSignatureError extends Error {
  readonly code: ErrorCode;
  readonly httpStatus: number;
  /** Component name for REQUIRED_HEADER_MISSING */
  readonly component?: string;

  constructor(code: ErrorCode, message: string, component?: string) {
    super(message);
    this.name = 'HttpSignatureError';
    this.code = code;
    this.httpStatus = ErrorHttpStatus[code];
    if (component !== undefined) {
      this.component = component;
    }
  }
}
