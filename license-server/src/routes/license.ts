/**
 * License Routes
 *
 * Public endpoints called by installed plugins. No admin auth.
 *
 * POST /v1/license/activate   — Bind a domain to a license
 * POST /v1/license/validate   — Heartbeat from an activated domain
 * POST /v1/license/deactivate — Release a domain's activation slot
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import type { Config } from '../config';
import { asyncHandler, sendFailure } from '../middleware/error-handler';
import { rateLimitFor } from '../middleware/rate-limit';
import type { Services } from '../services/container';

const licenseBody = z.object({
  licenseKey: z.string().max(64),
  domain: z.string().max(2048),
});

function clientIp(req: Request): string | null {
  return req.ip ?? req.socket.remoteAddress ?? null;
}

export function licenseRoutes(services: Services, config: Config): Router {
  const router = Router();
  const { licenseService, rateLimiter } = services;

  const parseBody = (req: Request, res: Response) => {
    const parsed = licenseBody.safeParse(req.body);
    if (!parsed.success) {
      sendFailure(res, { reason: 'invalid_format' });
      return null;
    }
    return parsed.data;
  };

  // ─── Activate ─────────────────────────────────────────────

  router.post(
    '/activate',
    rateLimitFor(rateLimiter, config.rateLimit, 'activate'),
    asyncHandler(async (req, res) => {
      const body = parseBody(req, res);
      if (!body) return;

      const result = await licenseService.activate(body.licenseKey, body.domain, {
        ip: clientIp(req),
        userAgent: req.get('user-agent') ?? null,
      });
      if (!result.success) {
        sendFailure(res, result);
        return;
      }
      res.json(result);
    })
  );

  // ─── Validate (heartbeat) ─────────────────────────────────

  router.post(
    '/validate',
    rateLimitFor(rateLimiter, config.rateLimit, 'validate'),
    asyncHandler(async (req, res) => {
      const body = parseBody(req, res);
      if (!body) return;

      const result = await licenseService.validateHeartbeat(body.licenseKey, body.domain, clientIp(req));
      if (!result.success) {
        sendFailure(res, result);
        return;
      }
      res.json(result);
    })
  );

  // ─── Deactivate ───────────────────────────────────────────

  router.post(
    '/deactivate',
    rateLimitFor(rateLimiter, config.rateLimit, 'deactivate'),
    asyncHandler(async (req, res) => {
      const body = parseBody(req, res);
      if (!body) return;

      const result = await licenseService.deactivate(body.licenseKey, body.domain);
      if (!result.success) {
        sendFailure(res, result);
        return;
      }
      res.json(result);
    })
  );

  return router;
}
