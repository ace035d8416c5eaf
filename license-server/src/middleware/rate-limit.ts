import type { RequestHandler } from 'express';
import type { RateAction, RatePolicy } from '../config';
import type { RateLimiter } from '../services/rate-limiter';
import { createChildLogger } from '../utils/logger';
import { sendFailure } from './error-handler';

const log = createChildLogger('rate-limit');

export interface RatePolicies {
  policies: Readonly<Record<RateAction, RatePolicy>>;
  fallback: RatePolicy;
  blockSeconds: number;
}

function isRateAction(rates: RatePolicies, action: string): action is RateAction {
  return Object.hasOwn(rates.policies, action);
}

export function policyFor(rates: RatePolicies, action: string): RatePolicy {
  return isRateAction(rates, action) ? rates.policies[action] : rates.fallback;
}

/** Limits are counted per action, so heavy heartbeat traffic never eats into activations. */
export function rateKey(identifier: string, action: string): string {
  return `${action}:${identifier}`;
}

/** CheckRate(identifier, action): picks the action's policy and asks the limiter. */
export async function checkRate(
  limiter: RateLimiter,
  rates: RatePolicies,
  identifier: string,
  action: string
): Promise<boolean> {
  const { limit, windowSeconds } = policyFor(rates, action);
  return limiter.allow(rateKey(identifier, action), limit, windowSeconds);
}

export function rateLimitFor(limiter: RateLimiter, rates: RatePolicies, action: RateAction): RequestHandler {
  return (req, res, next) => {
    const ip = req.ip ?? req.socket.remoteAddress ?? 'unknown';

    checkRate(limiter, rates, ip, action)
      .then((allowed) => {
        if (allowed) {
          next();
          return;
        }
        log.info({ action, path: req.path }, 'Request rate limited');
        res.setHeader('Retry-After', String(rates.blockSeconds));
        sendFailure(res, { reason: 'rate_limited' });
      })
      .catch(next);
  };
}
