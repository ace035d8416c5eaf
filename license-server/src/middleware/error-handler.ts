import type { NextFunction, Request, RequestHandler, Response } from 'express';
import multer from 'multer';
import { LicenseServerError, ValidationError, isTransientStorageError } from '../errors';
import type { FailureReason } from '../types';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger('http');

// ─── Business failures ──────────────────────────────────────

const FAILURE_STATUS: Record<FailureReason, number> = {
  invalid_format: 400,
  not_found: 404,
  expired: 403,
  inactive: 403,
  activation_limit: 403,
  domain_not_activated: 403,
  signature_invalid: 403,
  rate_limited: 429,
  no_release: 404,
};

// Coarse on purpose; callers only learn the category.
const FAILURE_MESSAGE: Record<FailureReason, string> = {
  invalid_format: 'Malformed license key or domain',
  not_found: 'License not found',
  expired: 'License has expired',
  inactive: 'License is not active',
  activation_limit: 'Activation limit reached',
  domain_not_activated: 'Domain is not activated for this license',
  signature_invalid: 'Download link is invalid or has expired',
  rate_limited: 'Too many requests. Try again later.',
  no_release: 'No release available',
};

export function sendFailure(res: Response, failure: { reason: FailureReason; status?: string }): void {
  res.status(FAILURE_STATUS[failure.reason]).json({
    success: false,
    reason: failure.reason,
    ...(failure.status ? { status: failure.status } : {}),
    message: FAILURE_MESSAGE[failure.reason],
  });
}

// ─── Express plumbing ───────────────────────────────────────

/** Forwards rejected promises from async handlers to the error middleware. */
export function asyncHandler(handler: (req: Request, res: Response, next: NextFunction) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ error: 'Not found' });
}

export function errorHandler(isDev: boolean) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    if (isBodyParseError(err)) {
      res.status(400).json({ success: false, reason: 'invalid_format', message: 'Request body is not valid JSON' });
      return;
    }

    if (err instanceof multer.MulterError) {
      res.status(400).json({ error: err.code, message: err.message });
      return;
    }

    if (err instanceof ValidationError) {
      res.status(400).json(err.toJSON());
      return;
    }

    if (isTransientStorageError(err)) {
      log.warn({ err, url: req.originalUrl, method: req.method }, 'Storage unavailable');
      res.setHeader('Retry-After', '1');
      res.status(503).json(err.toJSON());
      return;
    }

    log.error({ err, url: req.originalUrl, method: req.method }, 'Unhandled error');

    const message = err instanceof Error ? err.message : String(err);
    res.status(500).json({
      error: err instanceof LicenseServerError ? err.code : 'internal_error',
      message: isDev ? message : 'Internal server error',
    });
  };
}
