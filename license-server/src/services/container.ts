import type { Config } from '../config';
import type { Db } from '../db';
import { SqliteActivationRepository } from '../repositories/activation.repository';
import { SqliteAdminUserRepository } from '../repositories/admin-user.repository';
import { SqliteLicenseRepository } from '../repositories/license.repository';
import { SqliteReleaseRepository } from '../repositories/release.repository';
import type { Secrets } from '../secrets';
import { type Clock, systemClock } from '../utils/clock';
import { ActivationLedger } from './activation-ledger';
import { ExemptDomainMatcher } from './domain';
import { KeyService } from './key.service';
import { LicenseService } from './license.service';
import { MemoryRateLimitStore, type RateLimitStore, RateLimiter } from './rate-limiter';
import { SignedUrlService } from './signed-url.service';
import { UpdateService } from './update.service';

export interface ServiceOptions {
  config: Config;
  secrets: Secrets;
  db: Db;
  clock?: Clock;
  rateLimitStore?: RateLimitStore;
}

/** Wires every component from one config struct and one set of secrets. */
export function createServices({ config, secrets, db, clock = systemClock, rateLimitStore }: ServiceOptions) {
  const licenses = new SqliteLicenseRepository(db);
  const activations = new SqliteActivationRepository(db);
  const releases = new SqliteReleaseRepository(db);
  const adminUsers = new SqliteAdminUserRepository(db);

  const keys = new KeyService(secrets, licenses, config.licensing.keyGenerationAttempts);
  const exempt = new ExemptDomainMatcher(config.licensing.exemptDomains);
  const ledger = new ActivationLedger(
    activations,
    exempt,
    secrets.ipSalt,
    { exemptBypassesExpiry: config.licensing.exemptBypassesExpiry, storageTimeoutMs: config.storage.timeoutMs },
    clock
  );
  const signedUrls = new SignedUrlService(
    secrets.signingSecret,
    { downloadUrl: `${config.publicBaseUrl}/v1/updates/download`, ttlSeconds: config.signedUrls.ttlSeconds },
    clock
  );

  const licenseService = new LicenseService({
    licenses,
    activations,
    keys,
    ledger,
    signedUrls,
    options: { gracePeriodDays: config.licensing.gracePeriodDays, storageTimeoutMs: config.storage.timeoutMs },
    clock,
  });

  const updateService = new UpdateService({
    releases,
    licenses,
    licenseService,
    ledger,
    signedUrls,
    releasesDir: config.paths.releases,
    storageTimeoutMs: config.storage.timeoutMs,
    clock,
  });

  const limiterStore = rateLimitStore ?? new MemoryRateLimitStore(clock);
  const rateLimiter = new RateLimiter(limiterStore, { blockSeconds: config.rateLimit.blockSeconds }, clock);

  return { licenseService, updateService, rateLimiter, rateLimitStore: limiterStore, adminUsers, keys, clock };
}

export type Services = ReturnType<typeof createServices>;
