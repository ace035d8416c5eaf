import fs from 'fs';
import os from 'os';
import path from 'path';
import { type Config, loadConfig } from '../config';
import { type Db, openDatabase } from '../db';
import type { Secrets } from '../secrets';
import { createServices } from '../services/container';
import type { CreateLicenseInput, License } from '../types';
import type { Clock } from '../utils/clock';

export const START = new Date('2026-03-01T12:00:00.000Z');

export class ManualClock {
  private current: number;

  constructor(start: Date = START) {
    this.current = start.getTime();
  }

  readonly now: Clock = () => new Date(this.current);

  advanceSeconds(seconds: number): void {
    this.current += seconds * 1000;
  }

  advanceDays(days: number): void {
    this.advanceSeconds(days * 24 * 60 * 60);
  }

  set(date: Date): void {
    this.current = date.getTime();
  }
}

export const TEST_SECRETS: Secrets = {
  hashSalt: 'test-hash-salt-0123456789abcdef0123',
  keySecret: 'test-key-secret-0123456789abcdef012',
  signingSecret: 'test-signing-secret-0123456789abcde',
  ipSalt: 'test-ip-salt-0123456789abcdef012345',
  jwtSecret: 'test-jwt-secret-0123456789abcdef012',
};

export function tempDir(prefix = 'license-server-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function testConfig(env: Record<string, string> = {}): Config {
  return loadConfig({
    NODE_ENV: 'test',
    DB_PATH: ':memory:',
    ...env,
  });
}

export interface TestContext {
  config: Config;
  db: Db;
  clock: ManualClock;
  services: ReturnType<typeof createServices>;
}

export function createTestContext(env: Record<string, string> = {}, clock = new ManualClock()): TestContext {
  const config = testConfig(env);
  const db = openDatabase(config.paths.db);
  const services = createServices({ config, secrets: TEST_SECRETS, db, clock: clock.now });
  return { config, db, clock, services };
}

/** Creates a license and returns the plaintext key with it. */
export async function issueLicense(
  ctx: TestContext,
  input: Partial<CreateLicenseInput> = {}
): Promise<{ licenseId: string; key: string }> {
  const { licenseId, licenseKey } = await ctx.services.licenseService.createLicense({
    ownerId: 'owner-1',
    productId: 'plugin-pro',
    ...input,
  });
  return { licenseId, key: licenseKey };
}

export function makeLicense(overrides: Partial<License> = {}): License {
  return {
    id: 'lic-1',
    ownerId: 'owner-1',
    productId: 'plugin-pro',
    orderRef: null,
    keyHash: 'a'.repeat(64),
    keyVerificationHash: 'b'.repeat(64),
    status: 'active',
    expiresAt: null,
    graceUntil: null,
    maxActivations: null,
    failedAttempts: 0,
    createdAt: START,
    updatedAt: START,
    ...overrides,
  };
}
