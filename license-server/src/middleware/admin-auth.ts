import type { NextFunction, Request, Response } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger('admin-auth');

export const ADMIN_TOKEN_TTL = '24h';

const claimsSchema = z.object({
  userId: z.string(),
  username: z.string(),
  role: z.literal('admin'),
});

export type AdminClaims = z.infer<typeof claimsSchema>;

export function signAdminToken(claims: AdminClaims, secret: string): string {
  return jwt.sign(claims, secret, { expiresIn: ADMIN_TOKEN_TTL });
}

export function verifyAdminToken(token: string, secret: string): AdminClaims | null {
  try {
    const parsed = claimsSchema.safeParse(jwt.verify(token, secret));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

/** Reads the claims stored by `requireAdmin`. */
export function adminFrom(res: Response): AdminClaims | null {
  const parsed = claimsSchema.safeParse(res.locals.admin);
  return parsed.success ? parsed.data : null;
}

export function requireAdmin(secret: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;
    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      res.status(401).json({ error: 'Authentication required' });
      return;
    }

    const claims = verifyAdminToken(authHeader.substring(7), secret);
    if (!claims) {
      log.warn({ path: req.path }, 'Rejected admin token');
      res.status(401).json({ error: 'Invalid or expired token' });
      return;
    }

    res.locals.admin = claims;
    next();
  };
}
