/**
 * Admin Routes — License & Release Management
 *
 * Everything except /login requires an admin JWT.
 *
 * POST   /admin/login                       — Exchange credentials for a 24h token
 * GET    /admin/licenses                    — List licenses (filters + pagination)
 * POST   /admin/licenses                    — Create a license; the key is returned once
 * GET    /admin/licenses/:id                — License summary + activation history
 * PATCH  /admin/licenses/:id                — Change expiry, grace or capacity
 * DELETE /admin/licenses/:id                — Delete a license and its activations
 * POST   /admin/licenses/:id/revoke         — Revoke
 * POST   /admin/licenses/:id/suspend        — Suspend
 * POST   /admin/licenses/:id/reactivate     — Back to active
 * PUT    /admin/licenses/:id/status         — Set any administrative status
 * GET    /admin/owners/:ownerId/licenses    — Licenses of one owner
 * DELETE /admin/activations/:id             — Force-deactivate one activation
 * GET    /admin/releases                    — List releases
 * POST   /admin/releases                    — Upload a release zip
 * PATCH  /admin/releases/:id                — Enable/disable a release
 * GET    /admin/rate-limit/:identifier      — Limiter state per action
 * POST   /admin/rate-limit/unblock          — Lift a block
 */

import bcrypt from 'bcryptjs';
import crypto from 'crypto';
import { Router, type Request, type Response } from 'express';
import rateLimit from 'express-rate-limit';
import fs from 'fs';
import multer from 'multer';
import path from 'path';
import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import type { Config, RateAction } from '../config';
import type { Secrets } from '../secrets';
import { adminFrom, ADMIN_TOKEN_TTL, requireAdmin, signAdminToken } from '../middleware/admin-auth';
import { asyncHandler } from '../middleware/error-handler';
import { policyFor, rateKey } from '../middleware/rate-limit';
import type { Services } from '../services/container';
import { LICENSE_STATUSES, type LicenseStatus } from '../types';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger('admin');

// ─── Request schemas ────────────────────────────────────────

const isoDate = z
  .string()
  .datetime({ offset: true })
  .transform((v) => new Date(v));

const licenseStatus = z.enum(['active', 'inactive', 'suspended', 'revoked']);

const loginBody = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

const createLicenseBody = z.object({
  ownerId: z.string().min(1).max(191),
  productId: z.string().min(1).max(191),
  orderRef: z.string().max(191).nullable().optional(),
  maxActivations: z.number().int().min(0).nullable().optional(),
  expiresAt: isoDate.nullable().optional(),
  graceUntil: isoDate.nullable().optional(),
});

const updateTermsBody = z
  .object({
    maxActivations: z.number().int().min(0).nullable(),
    expiresAt: isoDate.nullable(),
    graceUntil: isoDate.nullable(),
  })
  .partial()
  .refine((b) => Object.keys(b).length > 0, 'No fields to update');

const listQuery = z.object({
  status: licenseStatus.optional(),
  ownerId: z.string().optional(),
  productId: z.string().optional(),
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(100).default(50),
});

const releaseFields = z.object({
  productId: z.string().min(1).max(191),
  slug: z.string().min(1).max(128),
  version: z.string().min(1).max(64),
  changelog: z.string().max(65535).optional(),
});

const statusBody = z.object({ status: licenseStatus });

const releaseToggleBody = z.object({ isActive: z.boolean() });

const unblockBody = z.object({
  identifier: z.string().min(1).max(64),
  action: z.enum(['activate', 'validate', 'deactivate', 'update_check', 'download']).optional(),
});

const RATE_ACTIONS: readonly RateAction[] = ['activate', 'validate', 'deactivate', 'update_check', 'download'];

function sendInvalid(res: Response, error: z.ZodError): void {
  res.status(400).json({ error: 'invalid_input', details: error.flatten().fieldErrors });
}

function hashFile(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash('sha256');
    fs.createReadStream(filePath)
      .on('error', reject)
      .on('data', (chunk) => hash.update(chunk))
      .on('end', () => resolve(hash.digest('hex')));
  });
}

export function adminRoutes(services: Services, config: Config, secrets: Secrets): Router {
  const router = Router();
  const { licenseService, updateService, rateLimiter, adminUsers } = services;

  router.use(
    rateLimit({
      windowMs: config.admin.rateLimitWindowMs,
      max: config.admin.rateLimitMax,
      standardHeaders: true,
      legacyHeaders: false,
      message: { error: 'Too many admin requests. Try again later.' },
    })
  );

  // ─── Multer config ────────────────────────────────────────

  const upload = multer({
    storage: multer.diskStorage({
      destination: (_req, _file, cb) => {
        fs.mkdirSync(config.paths.releases, { recursive: true });
        cb(null, config.paths.releases);
      },
      filename: (_req, file, cb) => cb(null, `${uuid()}-${path.basename(file.originalname)}`),
    }),
    limits: { fileSize: 200 * 1024 * 1024 },
    fileFilter: (_req, file, cb) => {
      if (path.extname(file.originalname).toLowerCase() === '.zip') {
        cb(null, true);
      } else {
        cb(new multer.MulterError('LIMIT_UNEXPECTED_FILE', file.fieldname));
      }
    },
  });

  // ─── Login ────────────────────────────────────────────────

  router.post('/login', (req: Request, res: Response): void => {
    const parsed = loginBody.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'Username and password required' });
      return;
    }

    const { username, password } = parsed.data;
    const user = adminUsers.findByUsername(username);

    if (!user || !bcrypt.compareSync(password, user.passwordHash)) {
      log.warn({ username }, 'Failed admin login');
      res.status(401).json({ error: 'Invalid credentials' });
      return;
    }

    const token = signAdminToken({ userId: user.id, username: user.username, role: 'admin' }, secrets.jwtSecret);
    res.json({ token, expiresIn: ADMIN_TOKEN_TTL });
  });

  // All remaining routes require admin auth
  router.use(requireAdmin(secrets.jwtSecret));

  // ─── Licenses ─────────────────────────────────────────────

  router.get(
    '/licenses',
    asyncHandler(async (req, res) => {
      const parsed = listQuery.safeParse(req.query);
      if (!parsed.success) {
        sendInvalid(res, parsed.error);
        return;
      }

      const { page, limit, ...filters } = parsed.data;
      const { licenses, total } = await licenseService.listLicenses({
        ...filters,
        limit,
        offset: (page - 1) * limit,
      });

      res.json({
        licenses,
        pagination: { page, limit, total, pages: Math.ceil(total / limit) },
      });
    })
  );

  router.post(
    '/licenses',
    asyncHandler(async (req, res) => {
      const parsed = createLicenseBody.safeParse(req.body);
      if (!parsed.success) {
        sendInvalid(res, parsed.error);
        return;
      }

      const created = await licenseService.createLicense(parsed.data);
      log.info({ licenseId: created.licenseId, by: adminFrom(res)?.username }, 'License issued');
      res.status(201).json(created);
    })
  );

  router.get(
    '/licenses/:id',
    asyncHandler(async (req, res) => {
      const license = await licenseService.getLicenseSummary(req.params.id);
      if (!license) {
        res.status(404).json({ error: 'License not found' });
        return;
      }

      const activations = await licenseService.listActivations(license.id, true);
      res.json({ license, activations });
    })
  );

  router.patch(
    '/licenses/:id',
    asyncHandler(async (req, res) => {
      const parsed = updateTermsBody.safeParse(req.body);
      if (!parsed.success) {
        sendInvalid(res, parsed.error);
        return;
      }

      const license = await licenseService.updateTerms(req.params.id, parsed.data);
      if (!license) {
        res.status(404).json({ error: 'License not found' });
        return;
      }
      res.json({ message: 'License updated', license });
    })
  );

  router.delete(
    '/licenses/:id',
    asyncHandler(async (req, res) => {
      if (!(await licenseService.deleteLicense(req.params.id))) {
        res.status(404).json({ error: 'License not found' });
        return;
      }
      res.json({ message: 'License deleted' });
    })
  );

  const changeStatus = async (req: Request, res: Response, status: LicenseStatus): Promise<void> => {
    const license = await licenseService.setStatus(req.params.id, status);
    if (!license) {
      res.status(404).json({ error: 'License not found' });
      return;
    }
    log.info({ licenseId: license.id, status, by: adminFrom(res)?.username }, 'License status changed by admin');
    res.json({ message: `License is now ${status}`, license });
  };

  router.post('/licenses/:id/revoke', asyncHandler((req, res) => changeStatus(req, res, 'revoked')));
  router.post('/licenses/:id/suspend', asyncHandler((req, res) => changeStatus(req, res, 'suspended')));
  router.post('/licenses/:id/reactivate', asyncHandler((req, res) => changeStatus(req, res, 'active')));

  router.put(
    '/licenses/:id/status',
    asyncHandler(async (req, res) => {
      const parsed = statusBody.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: `status must be one of ${LICENSE_STATUSES.join(', ')}` });
        return;
      }
      await changeStatus(req, res, parsed.data.status);
    })
  );

  router.get(
    '/owners/:ownerId/licenses',
    asyncHandler(async (req, res) => {
      res.json({ licenses: await licenseService.listOwnerLicenses(req.params.ownerId) });
    })
  );

  // ─── Activations ──────────────────────────────────────────

  router.delete(
    '/activations/:id',
    asyncHandler(async (req, res) => {
      const activation = await licenseService.deactivateActivation(req.params.id, 'admin');
      if (!activation) {
        res.status(404).json({ error: 'Activation not found' });
        return;
      }
      res.json({ message: 'Activation deactivated', activation });
    })
  );

  // ─── Releases ─────────────────────────────────────────────

  router.get(
    '/releases',
    asyncHandler(async (req, res) => {
      const productId = typeof req.query.productId === 'string' ? req.query.productId : undefined;
      res.json({ releases: await updateService.listReleases(productId) });
    })
  );

  router.post(
    '/releases',
    upload.single('file'),
    asyncHandler(async (req, res) => {
      const file = req.file;
      if (!file) {
        res.status(400).json({ error: 'No file uploaded' });
        return;
      }

      const parsed = releaseFields.safeParse(req.body);
      if (!parsed.success) {
        fs.rmSync(file.path, { force: true });
        sendInvalid(res, parsed.error);
        return;
      }

      try {
        const release = await updateService.registerRelease({
          ...parsed.data,
          changelog: parsed.data.changelog ?? null,
          fileName: file.filename,
          fileSize: file.size,
          fileHash: await hashFile(file.path),
        });
        res.status(201).json({ release });
      } catch (err) {
        fs.rmSync(file.path, { force: true });
        throw err;
      }
    })
  );

  router.patch(
    '/releases/:id',
    asyncHandler(async (req, res) => {
      const parsed = releaseToggleBody.safeParse(req.body);
      if (!parsed.success) {
        sendInvalid(res, parsed.error);
        return;
      }
      if (!(await updateService.setReleaseActive(req.params.id, parsed.data.isActive))) {
        res.status(404).json({ error: 'Release not found' });
        return;
      }
      res.json({ message: parsed.data.isActive ? 'Release enabled' : 'Release disabled' });
    })
  );

  // ─── Rate limiter ─────────────────────────────────────────

  router.get(
    '/rate-limit/:identifier',
    asyncHandler(async (req, res) => {
      const stats = await Promise.all(
        RATE_ACTIONS.map(async (action) => ({
          action,
          ...(await rateLimiter.stats(
            rateKey(req.params.identifier, action),
            policyFor(config.rateLimit, action).windowSeconds
          )),
        }))
      );
      res.json({ stats });
    })
  );

  router.post(
    '/rate-limit/unblock',
    asyncHandler(async (req, res) => {
      const parsed = unblockBody.safeParse(req.body);
      if (!parsed.success) {
        sendInvalid(res, parsed.error);
        return;
      }

      const { identifier, action } = parsed.data;
      const actions = action ? [action] : RATE_ACTIONS;
      await Promise.all(actions.map((a) => rateLimiter.reset(rateKey(identifier, a))));

      log.info({ identifier, actions, by: adminFrom(res)?.username }, 'Rate limit cleared');
      res.json({ message: 'Identifier unblocked', actions });
    })
  );

  return router;
}
