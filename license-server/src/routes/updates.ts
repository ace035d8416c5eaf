/**
 * Update Routes
 *
 * Public endpoints called by installed plugins:
 *   POST /v1/updates/check    — Heartbeat + newest release, with a signed download URL
 *   GET  /v1/updates/download — Stream a release zip (signed URL only)
 */

import { Router } from 'express';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { Config } from '../config';
import { asyncHandler, sendFailure } from '../middleware/error-handler';
import { rateLimitFor } from '../middleware/rate-limit';
import type { Services } from '../services/container';
import { parseDownloadToken } from '../services/signed-url.service';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger('updates');

const checkBody = z.object({
  licenseKey: z.string().max(64),
  domain: z.string().max(2048),
  slug: z.string().min(1).max(128),
  version: z.string().min(1).max(64),
});

export function updateRoutes(services: Services, config: Config): Router {
  const router = Router();
  const { updateService, rateLimiter } = services;

  // ─── Update check ─────────────────────────────────────────

  router.post(
    '/check',
    rateLimitFor(rateLimiter, config.rateLimit, 'update_check'),
    asyncHandler(async (req, res) => {
      const parsed = checkBody.safeParse(req.body);
      if (!parsed.success) {
        sendFailure(res, { reason: 'invalid_format' });
        return;
      }

      const { licenseKey, domain, slug, version } = parsed.data;
      const result = await updateService.checkForUpdate(licenseKey, domain, slug, version, req.ip);

      // "No release" is an answer, not an error, for an update poll.
      if (!result.success && result.reason === 'no_release') {
        res.json({ success: false, reason: 'no_release' });
        return;
      }
      if (!result.success) {
        sendFailure(res, result);
        return;
      }
      res.json(result);
    })
  );

  // ─── Download ─────────────────────────────────────────────

  router.get(
    '/download',
    rateLimitFor(rateLimiter, config.rateLimit, 'download'),
    asyncHandler(async (req, res) => {
      const token = parseDownloadToken(req.query);
      if (!token) {
        sendFailure(res, { reason: 'signature_invalid' });
        return;
      }

      const auth = await updateService.authorizeDownload(token);
      if (!auth.success) {
        sendFailure(res, auth);
        return;
      }

      const { release, filePath } = auth;
      const downloadName = `${release.slug}-${release.version}${path.extname(filePath) || '.zip'}`;

      res.setHeader('Content-Type', 'application/zip');
      res.setHeader('Content-Length', String(fs.statSync(filePath).size));
      res.setHeader('Content-Disposition', `attachment; filename="${downloadName}"`);
      res.setHeader('Cache-Control', 'no-store');

      const stream = fs.createReadStream(filePath);
      stream.on('error', (err) => {
        log.error({ err, releaseId: release.id }, 'Release stream failed');
        res.destroy(err);
      });
      stream.pipe(res);
    })
  );

  return router;
}
