import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Request, Response } from 'express';
import { ErrorCodes } from '@httpsig/core';
import { httpSignatureMiddleware } from './middleware.js';
import { InboundVerifier } from './inbound-verifier.js';
import { createRegistry, signedRequest, DATE } from './__tests__/helpers.js';

describe('httpSignatureMiddleware', () => {
  const verifier = new InboundVerifier(createRegistry());

  beforeEach(() => {
    vi.clearAllMocks();
  });

  function createMockRequest(options: {
    headers?: Record<string, string>;
    method?: string;
    originalUrl?: string;
  }): Partial<Request> {
    return {
      headers: options.headers || {},
      method: options.method || 'GET',
      originalUrl: options.originalUrl || '/reports?year=2024',
    };
  }

  function createMockResponse(): Partial<Response> {
    const res: Partial<Response> = {
      locals: {},
      setHeader: vi.fn().mockReturnThis() as unknown as Response['setHeader'],
      status: vi.fn().mockReturnThis() as unknown as Response['status'],
      json: vi.fn().mockReturnThis() as unknown as Response['json'],
    };
    return res;
  }

  it('attaches the verification result for signed requests', () => {
    const middleware = httpSignatureMiddleware({ verifier });
    const req = createMockRequest({ headers: signedRequest().headers });
    const res = createMockResponse();
    const next = vi.fn();

    middleware(req as Request, res as Response, next);

    expect(res.locals?.httpsig).toEqual({
      signed: true,
      result: {
        signed: true,
        verified: true,
        principal: { name: 'reporting-job', type: 'service', keyId: 'hmac-key' },
      },
    });
    expect(next).toHaveBeenCalled();
  });

  it('lets failures through in observe mode', () => {
    const middleware = httpSignatureMiddleware({ verifier });
    const req = createMockRequest({ headers: { date: DATE } });
    const res = createMockResponse();
    const next = vi.fn();

    middleware(req as Request, res as Response, next);

    expect(res.locals?.httpsig.signed).toBe(false);
    expect(res.locals?.httpsig.result.errorCode).toBe(ErrorCodes.SIGNATURE_MISSING);
    expect(next).toHaveBeenCalled();
    expect(res.status).not.toHaveBeenCalled();
  });

  it('uses custom attachProperty', () => {
    const middleware = httpSignatureMiddleware({ verifier, attachProperty: 'caller' });
    const req = createMockRequest({ headers: signedRequest().headers });
    const res = createMockResponse();

    middleware(req as Request, res as Response, vi.fn());

    expect(res.locals?.caller.result.verified).toBe(true);
    expect(res.locals?.httpsig).toBeUndefined();
  });

  it('blocks unverified requests in require-verified mode', () => {
    const middleware = httpSignatureMiddleware({
      verifier,
      mode: 'require-verified',
      realm: 'internal',
    });
    const req = createMockRequest({
      headers: signedRequest().headers,
      originalUrl: '/reports?year=2025',
    });
    const res = createMockResponse();
    const next = vi.fn();

    middleware(req as Request, res as Response, next);

    expect(next).not.toHaveBeenCalled();
    expect(res.setHeader).toHaveBeenCalledWith('WWW-Authenticate', 'Signature realm="internal"');
    expect(res.status).toHaveBeenCalledWith(401);
    expect(res.json).toHaveBeenCalledWith({
      error: 'Signature verification failed',
      details: 'Signature verification failed',
      code: ErrorCodes.SIGNATURE_INVALID,
    });
  });

  it('blocks unsigned requests in require-verified mode', () => {
    const middleware = httpSignatureMiddleware({ verifier, mode: 'require-verified' });
    const req = createMockRequest({ headers: {} });
    const res = createMockResponse();
    const next = vi.fn();

    middleware(req as Request, res as Response, next);

    expect(next).not.toHaveBeenCalled();
    expect(res.setHeader).toHaveBeenCalledWith('WWW-Authenticate', 'Signature realm="httpsig"');
    expect(res.status).toHaveBeenCalledWith(401);
  });

  it('answers 400 without a challenge for malformed headers', () => {
    const middleware = httpSignatureMiddleware({ verifier, mode: 'require-verified' });
    const req = createMockRequest({ headers: { signature: 'keyId="hmac-key"' } });
    const res = createMockResponse();

    middleware(req as Request, res as Response, vi.fn());

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.setHeader).not.toHaveBeenCalled();
  });

  it('passes unsigned requests when signatures are optional', () => {
    const middleware = httpSignatureMiddleware({
      verifier: new InboundVerifier(createRegistry(), { optional: true }),
      mode: 'require-verified',
    });
    const req = createMockRequest({ headers: {} });
    const res = createMockResponse();
    const next = vi.fn();

    middleware(req as Request, res as Response, next);

    expect(res.locals?.httpsig).toEqual({ signed: false, result: { signed: false, verified: false } });
    expect(next).toHaveBeenCalled();
  });
});
