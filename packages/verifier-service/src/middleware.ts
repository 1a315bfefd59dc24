import type { Request, Response, NextFunction } from 'express';
import { ErrorHttpStatus } from '@httpsig/core';
import type { InboundVerifier } from './inbound-verifier.js';
import type { InboundResult, MiddlewareMode, RequestVerificationInfo } from './types.js';

export interface MiddlewareOptions {
  verifier: InboundVerifier;
  /** observe (default) never blocks; require-verified answers failures itself */
  mode?: MiddlewareMode;
  /** Key under `res.locals` holding the verification info (default: httpsig) */
  attachProperty?: string;
  realm?: string;
}

/**
 * Express middleware for HTTP signature verification.
 *
 * @example
 * ```typescript
 * const { registry, signedHeaders } = loadClients('./clients.json');
 * const verifier = new InboundVerifier(registry, { signedHeaders });
 *
 * app.use('/internal', httpSignatureMiddleware({ verifier, mode: 'require-verified' }));
 *
 * app.get('/internal/report', (_req, res) => {
 *   const info: RequestVerificationInfo = res.locals.httpsig;
 *   res.json({ caller: info.result.principal?.name });
 * });
 * ```
 */
export function httpSignatureMiddleware(
  options: MiddlewareOptions
): (req: Request, res: Response, next: NextFunction) => void {
  const { verifier, mode = 'observe', attachProperty = 'httpsig', realm = 'httpsig' } = options;

  return (req: Request, res: Response, next: NextFunction): void => {
    const result = verifier.verify({
      method: req.method,
      url: req.originalUrl,
      headers: req.headers,
    });

    const info: RequestVerificationInfo = { signed: result.signed, result };
    res.locals[attachProperty] = info;

    if (mode === 'require-verified' && result.error !== undefined) {
      sendVerificationFailure(res, result, realm);
      return;
    }

    next();
  };
}

/**
 * Answer a failed verification with the status of its error code; 401
 * answers carry a `WWW-Authenticate: Signature` challenge.
 */
export function sendVerificationFailure(res: Response, result: InboundResult, realm: string): void {
  const status = result.errorCode ? ErrorHttpStatus[result.errorCode] : 500;
  if (status === 401) {
    res.setHeader('WWW-Authenticate', `Signature realm="${realm}"`);
  }
  res.status(status).json({
    error: 'Signature verification failed',
    details: result.error,
    code: result.errorCode,
  });
}
