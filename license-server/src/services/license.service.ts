import { ValidationError } from '../errors';
import type { ActivationRepository } from '../repositories/activation.repository';
import type { LicenseQuery, LicenseRepository, LicenseTerms } from '../repositories/license.repository';
import type {
  ActivateResult,
  Activation,
  CreateLicenseInput,
  CreatedLicense,
  DeactivateResult,
  Failure,
  HeartbeatResult,
  License,
  LicenseStatus,
  LicenseSummary,
  SignedDownloadUrl,
} from '../types';
import { type Clock, addDays, systemClock } from '../utils/clock';
import { hashPrefix } from '../utils/crypto';
import { createChildLogger } from '../utils/logger';
import { withTimeout } from '../utils/storage';
import { type ActivationLedger, type ClientInfo, remaining } from './activation-ledger';
import { normalizeDomain } from './domain';
import { canonicalizeKey, type KeyService, maskKeyHash } from './key.service';
import { effectiveStatus } from './license-state';
import type { SignedUrlService } from './signed-url.service';

const log = createChildLogger('license-service');

export interface LicenseServiceOptions {
  gracePeriodDays: number;
  storageTimeoutMs: number;
}

export interface LicenseServiceDeps {
  licenses: LicenseRepository;
  activations: ActivationRepository;
  keys: KeyService;
  ledger: ActivationLedger;
  signedUrls: SignedUrlService;
  options: LicenseServiceOptions;
  clock?: Clock;
}

/** `domain` is the caller's raw input; the ledger normalizes it exactly once. */
type Resolved = { success: true; license: License; domain: string };

export interface HeartbeatOutcome {
  result: HeartbeatResult;
  /** Set whenever the key resolved, even if the heartbeat was refused. */
  license: License | null;
}

/**
 * Public entry points of the engine. Every call resolves the key fresh and
 * re-derives the effective status; nothing is cached across requests.
 */
export class LicenseService {
  private readonly licenses: LicenseRepository;
  private readonly activations: ActivationRepository;
  private readonly keys: KeyService;
  private readonly ledger: ActivationLedger;
  private readonly signedUrls: SignedUrlService;
  private readonly options: LicenseServiceOptions;
  private readonly clock: Clock;

  constructor(deps: LicenseServiceDeps) {
    this.licenses = deps.licenses;
    this.activations = deps.activations;
    this.keys = deps.keys;
    this.ledger = deps.ledger;
    this.signedUrls = deps.signedUrls;
    this.options = deps.options;
    this.clock = deps.clock ?? systemClock;
  }

  // ─── Issuance ─────────────────────────────────────────────

  async createLicense(input: CreateLicenseInput): Promise<CreatedLicense> {
    const ownerId = input.ownerId.trim();
    const productId = input.productId.trim();
    if (!ownerId || !productId) {
      throw new ValidationError('ownerId and productId are required');
    }

    const maxActivations = normalizeCapacity(input.maxActivations);
    const expiresAt = input.expiresAt ?? null;
    const graceUntil = input.graceUntil !== undefined ? input.graceUntil : this.defaultGrace(expiresAt);
    assertGraceOrder(expiresAt, graceUntil);

    const licenseKey = await this.keys.generateKey(productId, ownerId);
    const hashes = this.keys.hashKey(licenseKey);

    const license = await withTimeout('create license', this.options.storageTimeoutMs, () =>
      this.licenses.create({
        ownerId,
        productId,
        orderRef: input.orderRef ?? null,
        keyHash: hashes.primaryHash,
        keyVerificationHash: hashes.verificationHash,
        expiresAt,
        graceUntil,
        maxActivations,
        now: this.clock(),
      })
    );

    log.info({ licenseId: license.id, productId, keyHash: hashPrefix(hashes.primaryHash) }, 'License created');
    return { licenseId: license.id, licenseKey };
  }

  // ─── Client operations ────────────────────────────────────

  async activate(keyInput: unknown, domainInput: unknown, client: ClientInfo = {}): Promise<ActivateResult> {
    const resolved = await this.resolve(keyInput, domainInput);
    if (!resolved.success) return resolved;
    return this.ledger.activate(resolved.license, resolved.domain, client);
  }

  async heartbeat(keyInput: unknown, domainInput: unknown, ip?: string | null): Promise<HeartbeatOutcome> {
    const resolved = await this.resolve(keyInput, domainInput);
    if (!resolved.success) return { result: resolved, license: null };

    const result = await this.ledger.validate(resolved.license, resolved.domain, ip);
    return { result, license: resolved.license };
  }

  async validateHeartbeat(keyInput: unknown, domainInput: unknown, ip?: string | null): Promise<HeartbeatResult> {
    return (await this.heartbeat(keyInput, domainInput, ip)).result;
  }

  async deactivate(keyInput: unknown, domainInput: unknown): Promise<DeactivateResult> {
    const resolved = await this.resolve(keyInput, domainInput);
    if (!resolved.success) return resolved;

    const changed = await this.ledger.deactivate(resolved.license, resolved.domain);
    if (!changed) return { success: false, reason: 'domain_not_activated' };

    return { success: true, remainingActivations: await this.ledger.remainingActivations(resolved.license) };
  }

  // ─── Download capabilities ────────────────────────────────

  issueDownloadToken(licenseId: string, releaseId: string): SignedDownloadUrl {
    return this.signedUrls.issue(licenseId, releaseId);
  }

  verifyDownloadToken(licenseId: string, releaseId: string, expiresAt: number, signature: string): boolean {
    return this.signedUrls.verify(licenseId, releaseId, expiresAt, signature);
  }

  // ─── Administration ───────────────────────────────────────

  async findLicense(licenseId: string): Promise<License | null> {
    return withTimeout('find license', this.options.storageTimeoutMs, () => this.licenses.findById(licenseId));
  }

  async getLicenseSummary(licenseId: string): Promise<LicenseSummary | null> {
    const license = await this.findLicense(licenseId);
    return license ? this.summarize(license) : null;
  }

  async listLicenses(query: LicenseQuery): Promise<{ licenses: LicenseSummary[]; total: number }> {
    const { licenses, total } = await withTimeout('list licenses', this.options.storageTimeoutMs, () =>
      this.licenses.list(query)
    );
    return { licenses: await Promise.all(licenses.map((l) => this.summarize(l))), total };
  }

  async listOwnerLicenses(ownerId: string): Promise<LicenseSummary[]> {
    const licenses = await withTimeout('list owner licenses', this.options.storageTimeoutMs, () =>
      this.licenses.findByOwner(ownerId)
    );
    return Promise.all(licenses.map((l) => this.summarize(l)));
  }

  /** Changes administrative intent. Existing activations are kept. */
  async setStatus(licenseId: string, status: LicenseStatus): Promise<LicenseSummary | null> {
    const changed = await withTimeout('set status', this.options.storageTimeoutMs, () =>
      this.licenses.updateStatus(licenseId, status, this.clock())
    );
    if (!changed) return null;

    log.info({ licenseId, status }, 'License status changed');
    return this.getLicenseSummary(licenseId);
  }

  async updateTerms(licenseId: string, terms: LicenseTerms): Promise<LicenseSummary | null> {
    const current = await this.findLicense(licenseId);
    if (!current) return null;

    const next: LicenseTerms = { ...terms };
    if (terms.maxActivations !== undefined) {
      next.maxActivations = normalizeCapacity(terms.maxActivations);
    }
    // A new expiry without an explicit grace moves grace along with it.
    if (terms.expiresAt !== undefined && terms.graceUntil === undefined) {
      next.graceUntil = this.defaultGrace(terms.expiresAt);
    }
    assertGraceOrder(
      next.expiresAt !== undefined ? next.expiresAt : current.expiresAt,
      next.graceUntil !== undefined ? next.graceUntil : current.graceUntil
    );

    const updated = await withTimeout('update terms', this.options.storageTimeoutMs, () =>
      this.licenses.updateTerms(licenseId, next, this.clock())
    );
    if (!updated) return null;

    log.info({ licenseId }, 'License terms updated');
    return this.summarize(updated);
  }

  /** Hard delete; activations cascade. */
  async deleteLicense(licenseId: string): Promise<boolean> {
    const deleted = await withTimeout('delete license', this.options.storageTimeoutMs, () =>
      this.licenses.delete(licenseId)
    );
    if (deleted) log.warn({ licenseId }, 'License deleted');
    return deleted;
  }

  async listActivations(licenseId: string, includeInactive = false): Promise<Activation[]> {
    return withTimeout('list activations', this.options.storageTimeoutMs, () =>
      this.activations.listByLicense(licenseId, includeInactive)
    );
  }

  async deactivateActivation(activationId: string, reason = 'admin'): Promise<Activation | null> {
    const activation = await withTimeout('deactivate activation', this.options.storageTimeoutMs, () =>
      this.activations.deactivateById(activationId, reason, this.clock())
    );
    if (activation) {
      log.info({ activationId, licenseId: activation.licenseId, domain: activation.domain, reason }, 'Activation revoked');
    }
    return activation;
  }

  // ─── Internals ────────────────────────────────────────────

  private defaultGrace(expiresAt: Date | null): Date | null {
    return expiresAt ? addDays(expiresAt, this.options.gracePeriodDays) : null;
  }

  /**
   * Format checks run before storage. Any miss, including a verification
   * hash mismatch, is reported as not_found.
   */
  private async resolve(
    keyInput: unknown,
    domainInput: unknown
  ): Promise<Resolved | Failure<'invalid_format' | 'not_found'>> {
    const key = canonicalizeKey(keyInput);
    const domain = typeof domainInput === 'string' ? domainInput : null;
    if (!key || domain === null || !normalizeDomain(domain)) {
      return { success: false, reason: 'invalid_format' };
    }

    const hashes = this.keys.hashKey(key);
    const license = await withTimeout('license lookup', this.options.storageTimeoutMs, () =>
      this.licenses.findByKeyHash(hashes.primaryHash)
    );

    if (!license || !this.keys.verifyChain(hashes, license.keyVerificationHash)) {
      log.debug({ keyHash: hashPrefix(hashes.primaryHash) }, 'License key not found');
      return { success: false, reason: 'not_found' };
    }
    return { success: true, license, domain };
  }

  private async summarize(license: License): Promise<LicenseSummary> {
    const activeDomains = await this.ledger.activeDomains(license);
    const counted = activeDomains.filter((d) => !this.ledger.isExempt(d)).length;

    return {
      id: license.id,
      ownerId: license.ownerId,
      productId: license.productId,
      orderRef: license.orderRef,
      maskedKey: maskKeyHash(license.keyHash),
      status: license.status,
      effectiveStatus: effectiveStatus(license, this.clock()),
      expiresAt: license.expiresAt,
      graceUntil: license.graceUntil,
      maxActivations: license.maxActivations,
      remainingActivations: remaining(license.maxActivations, counted),
      activeDomains,
      failedAttempts: license.failedAttempts,
      createdAt: license.createdAt,
      updatedAt: license.updatedAt,
    };
  }
}

/** 0 and null both mean unlimited; null is what gets stored. */
function normalizeCapacity(value: number | null | undefined): number | null {
  if (value === undefined || value === null || value === 0) return null;
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError('maxActivations must be a non-negative integer', { maxActivations: value });
  }
  return value;
}

function assertGraceOrder(expiresAt: Date | null, graceUntil: Date | null): void {
  if (expiresAt && graceUntil && graceUntil.getTime() < expiresAt.getTime()) {
    throw new ValidationError('graceUntil must not be earlier than expiresAt');
  }
}
