import type { ActivationRepository } from '../repositories/activation.repository';
import type { ActivateResult, EffectiveStatus, Failure, HeartbeatResult, License } from '../types';
import { type Clock, systemClock } from '../utils/clock';
import { hashIp, hashPrefix, hashUserAgent } from '../utils/crypto';
import { createChildLogger } from '../utils/logger';
import { retryOnce, withTimeout } from '../utils/storage';
import { type ExemptDomainMatcher, normalizeDomain } from './domain';
import { describeStatus, isUsable } from './license-state';

const log = createChildLogger('activation-ledger');

export interface LedgerOptions {
  /** Let allow-listed domains keep working after expiry. Never overrides an inactive license. */
  exemptBypassesExpiry: boolean;
  storageTimeoutMs: number;
}

export interface ClientInfo {
  ip?: string | null;
  userAgent?: string | null;
}

export type Gate =
  | { allowed: true; status: EffectiveStatus; exempt: boolean }
  | { allowed: false; failure: Failure<'expired' | 'inactive'> };

export function remaining(maxActivations: number | null, counted: number): number | null {
  return maxActivations === null ? null : Math.max(0, maxActivations - counted);
}

/**
 * Per-license set of bound domains. Callers hand in a resolved license;
 * key lookup happens upstream.
 */
export class ActivationLedger {
  constructor(
    private readonly activations: ActivationRepository,
    private readonly exempt: ExemptDomainMatcher,
    private readonly ipSalt: string,
    private readonly options: LedgerOptions,
    private readonly clock: Clock = systemClock
  ) {}

  isExempt(domain: string): boolean {
    return this.exempt.matches(domain);
  }

  async activate(license: License, domainInput: string, client: ClientInfo = {}): Promise<ActivateResult> {
    const now = this.clock();
    const domain = normalizeDomain(domainInput);
    if (!domain) return { success: false, reason: 'invalid_format' };

    const gate = this.gate(license, domain, now);
    if (!gate.allowed) {
      log.info({ licenseId: license.id, domain, reason: gate.failure.reason }, 'Activation refused');
      return gate.failure;
    }

    const outcome = await retryOnce('activate', () =>
      withTimeout('activate', this.options.storageTimeoutMs, () =>
        this.activations.activate({
          licenseId: license.id,
          domain,
          ipHash: hashIp(client.ip, this.ipSalt),
          userAgentHash: hashUserAgent(client.userAgent),
          maxActivations: license.maxActivations,
          countsTowardCapacity: (d) => !this.exempt.matches(d),
          now,
        })
      )
    );

    if (outcome.kind === 'limit_reached') {
      log.info(
        { licenseId: license.id, domain, maxActivations: license.maxActivations, inUse: outcome.countedActive },
        'Activation limit reached'
      );
      return { success: false, reason: 'activation_limit', status: gate.status };
    }

    if (outcome.kind === 'created') {
      log.info({ licenseId: license.id, domain, exempt: gate.exempt }, 'Domain activated');
    } else {
      log.debug({ licenseId: license.id, domain }, 'Domain re-activated');
    }

    return {
      success: true,
      status: gate.status,
      domain,
      expiresAt: license.expiresAt,
      remainingActivations: remaining(license.maxActivations, outcome.countedActive),
      alreadyActive: outcome.kind === 'refreshed',
      exempt: gate.exempt,
    };
  }

  /** Heartbeat. The domain must already hold a live activation. */
  async validate(license: License, domainInput: string, ip?: string | null): Promise<HeartbeatResult> {
    const now = this.clock();
    const domain = normalizeDomain(domainInput);
    if (!domain) return { success: false, reason: 'invalid_format' };

    const gate = this.gate(license, domain, now);
    if (!gate.allowed) return gate.failure;

    const activation = await withTimeout('heartbeat', this.options.storageTimeoutMs, () =>
      this.activations.touch(license.id, domain, hashIp(ip, this.ipSalt), now)
    );
    if (!activation) {
      return { success: false, reason: 'domain_not_activated', status: gate.status };
    }

    return {
      success: true,
      status: gate.status,
      domain,
      expiresAt: license.expiresAt,
      graceUntil: license.graceUntil,
      validationCount: activation.validationCount,
      exempt: gate.exempt,
    };
  }

  /** Soft-deactivates; false when the domain had no live activation. */
  async deactivate(license: License, domainInput: string, reason = 'client_request'): Promise<boolean> {
    const domain = normalizeDomain(domainInput);
    if (!domain) return false;

    const changed = await withTimeout('deactivate', this.options.storageTimeoutMs, () =>
      this.activations.deactivate(license.id, domain, reason, this.clock())
    );
    if (changed) {
      log.info({ licenseId: license.id, domain, reason }, 'Domain deactivated');
    }
    return changed;
  }

  async activeDomains(license: License): Promise<string[]> {
    return withTimeout('list activations', this.options.storageTimeoutMs, () =>
      this.activations.listActiveDomains(license.id)
    );
  }

  /** Capacity left after non-exempt live domains; null when unlimited. */
  async remainingActivations(license: License): Promise<number | null> {
    if (license.maxActivations === null) return null;
    const domains = await this.activeDomains(license);
    return remaining(license.maxActivations, domains.filter((d) => !this.exempt.matches(d)).length);
  }

  /**
   * Gate for requests that carry no domain, such as a signed download. An
   * expired license gets through only while it holds a live exempt domain.
   */
  async admitLicense(license: License): Promise<Gate> {
    const { status, reason } = describeStatus(license, this.clock());
    if (isUsable(status)) {
      return { allowed: true, status, exempt: false };
    }
    if (status === 'expired' && this.options.exemptBypassesExpiry) {
      const domains = await this.activeDomains(license);
      if (domains.some((d) => this.exempt.matches(d))) {
        log.debug({ licenseId: license.id }, 'Expired license admitted through an exempt domain');
        return { allowed: true, status, exempt: true };
      }
    }

    log.debug({ keyHash: hashPrefix(license.keyHash), reason }, 'License not usable');
    return {
      allowed: false,
      failure: { success: false, reason: status === 'expired' ? 'expired' : 'inactive', status },
    };
  }

  private gate(license: License, domain: string, now: Date): Gate {
    const { status, reason } = describeStatus(license, now);
    const exempt = this.exempt.matches(domain);

    if (isUsable(status)) {
      return { allowed: true, status, exempt };
    }
    if (status === 'expired' && exempt && this.options.exemptBypassesExpiry) {
      log.debug({ licenseId: license.id, domain }, 'Exempt domain allowed past expiry');
      return { allowed: true, status, exempt };
    }

    log.debug({ keyHash: hashPrefix(license.keyHash), reason }, 'License not usable');
    return {
      allowed: false,
      failure: { success: false, reason: status === 'expired' ? 'expired' : 'inactive', status },
    };
  }
}
