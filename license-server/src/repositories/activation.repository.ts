import { v4 as uuid } from 'uuid';
import type { Db } from '../db';
import type { Activation } from '../types';

export interface ActivationRequest {
  licenseId: string;
  domain: string;
  ipHash: string | null;
  userAgentHash: string | null;
  /** `null` disables the capacity check. */
  maxActivations: number | null;
  /** Exempt domains are neither checked nor counted against capacity. */
  countsTowardCapacity: (domain: string) => boolean;
  now: Date;
}

export type ActivationOutcome =
  | { kind: 'created' | 'refreshed'; activation: Activation; countedActive: number }
  | { kind: 'limit_reached'; countedActive: number };

export interface ActivationRepository {
  /**
   * Binds a domain, or refreshes an existing live binding, as one atomic
   * step: the lookup, the capacity count and the insert cannot interleave
   * with another activation of the same license.
   */
  activate(request: ActivationRequest): Promise<ActivationOutcome>;
  findActive(licenseId: string, domain: string): Promise<Activation | null>;
  /** Heartbeat: bumps last-seen and the validation counter of a live binding. */
  touch(licenseId: string, domain: string, ipHash: string | null, now: Date): Promise<Activation | null>;
  deactivate(licenseId: string, domain: string, reason: string, now: Date): Promise<boolean>;
  deactivateById(activationId: string, reason: string, now: Date): Promise<Activation | null>;
  listActiveDomains(licenseId: string): Promise<string[]>;
  listByLicense(licenseId: string, includeInactive: boolean): Promise<Activation[]>;
}

interface ActivationRow {
  id: string;
  license_id: string;
  domain: string;
  ip_hash: string | null;
  user_agent_hash: string | null;
  activated_at: number;
  last_seen_at: number;
  validation_count: number;
  is_active: number;
  deactivated_at: number | null;
  deactivated_reason: string | null;
}

function toActivation(row: ActivationRow): Activation {
  return {
    id: row.id,
    licenseId: row.license_id,
    domain: row.domain,
    ipHash: row.ip_hash,
    userAgentHash: row.user_agent_hash,
    activatedAt: new Date(row.activated_at),
    lastSeenAt: new Date(row.last_seen_at),
    validationCount: row.validation_count,
    isActive: row.is_active === 1,
    deactivatedAt: row.deactivated_at === null ? null : new Date(row.deactivated_at),
    deactivatedReason: row.deactivated_reason,
  };
}

export class SqliteActivationRepository implements ActivationRepository {
  private readonly activateTx: (request: ActivationRequest) => ActivationOutcome;

  constructor(private readonly db: Db) {
    const tx = db.transaction((request: ActivationRequest) => this.activateUnsafe(request));
    // BEGIN IMMEDIATE takes the write lock up front, so two processes sharing
    // the file cannot both pass the capacity check.
    this.activateTx = (request) => tx.immediate(request);
  }

  async activate(request: ActivationRequest): Promise<ActivationOutcome> {
    return this.activateTx(request);
  }

  async findActive(licenseId: string, domain: string): Promise<Activation | null> {
    const row = this.db
      .prepare<[string, string], ActivationRow>(
        'SELECT * FROM activations WHERE license_id = ? AND domain = ? AND is_active = 1'
      )
      .get(licenseId, domain);
    return row ? toActivation(row) : null;
  }

  async touch(licenseId: string, domain: string, ipHash: string | null, now: Date): Promise<Activation | null> {
    const row = this.db
      .prepare<[number, string | null, string, string], ActivationRow>(
        `UPDATE activations
         SET last_seen_at = ?, validation_count = validation_count + 1, ip_hash = COALESCE(?, ip_hash)
         WHERE license_id = ? AND domain = ? AND is_active = 1
         RETURNING *`
      )
      .get(now.getTime(), ipHash, licenseId, domain);
    return row ? toActivation(row) : null;
  }

  async deactivate(licenseId: string, domain: string, reason: string, now: Date): Promise<boolean> {
    const result = this.db
      .prepare(
        `UPDATE activations SET is_active = 0, deactivated_at = ?, deactivated_reason = ?
         WHERE license_id = ? AND domain = ? AND is_active = 1`
      )
      .run(now.getTime(), reason, licenseId, domain);
    return result.changes > 0;
  }

  async deactivateById(activationId: string, reason: string, now: Date): Promise<Activation | null> {
    const row = this.db
      .prepare<[number, string, string], ActivationRow>(
        `UPDATE activations SET is_active = 0, deactivated_at = ?, deactivated_reason = ?
         WHERE id = ? AND is_active = 1
         RETURNING *`
      )
      .get(now.getTime(), reason, activationId);
    return row ? toActivation(row) : null;
  }

  async listActiveDomains(licenseId: string): Promise<string[]> {
    return this.activeDomains(licenseId);
  }

  async listByLicense(licenseId: string, includeInactive: boolean): Promise<Activation[]> {
    const sql = includeInactive
      ? 'SELECT * FROM activations WHERE license_id = ? ORDER BY last_seen_at DESC'
      : 'SELECT * FROM activations WHERE license_id = ? AND is_active = 1 ORDER BY last_seen_at DESC';
    return this.db.prepare<[string], ActivationRow>(sql).all(licenseId).map(toActivation);
  }

  // ─── Transaction body ─────────────────────────────────────

  private activateUnsafe(request: ActivationRequest): ActivationOutcome {
    const { licenseId, domain, now } = request;
    const counted = () => this.activeDomains(licenseId).filter(request.countsTowardCapacity).length;

    const existing = this.db
      .prepare<[string, string], { id: string }>(
        'SELECT id FROM activations WHERE license_id = ? AND domain = ? AND is_active = 1'
      )
      .get(licenseId, domain);

    if (existing) {
      const refreshed = this.db
        .prepare<[number, string | null, string | null, string], ActivationRow>(
          `UPDATE activations
           SET last_seen_at = ?, validation_count = validation_count + 1,
               ip_hash = COALESCE(?, ip_hash), user_agent_hash = COALESCE(?, user_agent_hash)
           WHERE id = ?
           RETURNING *`
        )
        .get(now.getTime(), request.ipHash, request.userAgentHash, existing.id);
      if (!refreshed) {
        throw new Error(`Activation ${existing.id} vanished inside its transaction`);
      }
      return { kind: 'refreshed', activation: toActivation(refreshed), countedActive: counted() };
    }

    if (request.maxActivations !== null && request.countsTowardCapacity(domain)) {
      const inUse = counted();
      if (inUse >= request.maxActivations) {
        return { kind: 'limit_reached', countedActive: inUse };
      }
    }

    const inserted = this.db
      .prepare<[string, string, string, string | null, string | null, number, number], ActivationRow>(
        `INSERT INTO activations (id, license_id, domain, ip_hash, user_agent_hash, activated_at, last_seen_at,
           validation_count, is_active)
         VALUES (?, ?, ?, ?, ?, ?, ?, 0, 1)
         RETURNING *`
      )
      .get(uuid(), licenseId, domain, request.ipHash, request.userAgentHash, now.getTime(), now.getTime());
    if (!inserted) {
      throw new Error('Activation insert returned no row');
    }
    return { kind: 'created', activation: toActivation(inserted), countedActive: counted() };
  }

  private activeDomains(licenseId: string): string[] {
    return this.db
      .prepare<[string], { domain: string }>('SELECT domain FROM activations WHERE license_id = ? AND is_active = 1')
      .all(licenseId)
      .map((r) => r.domain);
  }
}
