/**
 * HTTP signature verifier service
 *
 * Verifies `Signature` / `Authorization: Signature` headers for NGINX
 * `auth_request` or as a standalone verification endpoint.
 */

import express from 'express';
import { z } from 'zod';
import type { InboundClientRegistry } from './clients.js';
import type { InboundVerifier } from './inbound-verifier.js';
import { sendVerificationFailure } from './middleware.js';

export interface AppOptions {
  verifier: InboundVerifier;
  clients: InboundClientRegistry;
  realm: string;
}

const HeaderValueSchema = z.union([z.string(), z.array(z.string())]);

const VerifyBodySchema = z.object({
  method: z.string().min(1),
  url: z.string().min(1),
  headers: z.record(HeaderValueSchema),
});

export function createApp(options: AppOptions): express.Express {
  const { verifier, clients, realm } = options;
  const app = express();

  app.use(express.json());

  /**
   * Health check endpoint
   */
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      service: 'verifier',
      clients: clients.size,
    });
  });

  /**
   * Verification for NGINX auth_request
   *
   * The original request line comes from X-Original-* headers; signed headers
   * are forwarded unchanged by the proxy.
   */
  app.post('/authorize', (req, res) => {
    const method = req.get('x-original-method') || req.method;
    const host = req.get('x-original-host') || req.get('host') || 'localhost';
    const uri = req.get('x-original-uri') || req.originalUrl;
    const protocol = req.get('x-forwarded-proto') || 'http';

    const result = verifier.verify({
      method: method.toUpperCase(),
      url: `${protocol}://${host}${uri}`,
      headers: req.headers,
    });

    if (result.error !== undefined) {
      sendVerificationFailure(res, result, realm);
      return;
    }

    // Passed downstream by NGINX auth_request_set; unsigned requests only get
    // here when signatures are optional
    res.setHeader('X-HttpSig-Verified', String(result.verified));
    if (result.principal) {
      res.setHeader('X-HttpSig-Key-Id', result.principal.keyId);
      res.setHeader('X-HttpSig-Principal', result.principal.name);
    }
    res.status(200).json(result);
  });

  /**
   * Verify endpoint (alternative to /authorize)
   * Accepts full request details in body
   */
  app.post('/verify', (req, res) => {
    const parsed = VerifyBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: 'Missing required fields: method, url, headers',
      });
      return;
    }

    const { method, url, headers } = parsed.data;
    res.json(verifier.verify({ method: method.toUpperCase(), url, headers }));
  });

  // Error handler
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    console.error('Error:', err);
    res.status(500).json({ error: err.message || 'Internal server error' });
  });

  return app;
}
