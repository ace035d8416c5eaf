import { v4 as uuid } from 'uuid';
import type { Db } from '../db';
import type { License, LicenseStatus } from '../types';

export interface NewLicense {
  ownerId: string;
  productId: string;
  orderRef: string | null;
  keyHash: string;
  keyVerificationHash: string;
  expiresAt: Date | null;
  graceUntil: Date | null;
  maxActivations: number | null;
  now: Date;
}

export interface LicenseTerms {
  expiresAt?: Date | null;
  graceUntil?: Date | null;
  maxActivations?: number | null;
}

export interface LicenseQuery {
  status?: LicenseStatus;
  ownerId?: string;
  productId?: string;
  limit: number;
  offset: number;
}

export interface LicenseRepository {
  create(input: NewLicense): Promise<License>;
  findById(id: string): Promise<License | null>;
  findByKeyHash(keyHash: string): Promise<License | null>;
  findByOwner(ownerId: string): Promise<License[]>;
  list(query: LicenseQuery): Promise<{ licenses: License[]; total: number }>;
  updateStatus(id: string, status: LicenseStatus, now: Date): Promise<boolean>;
  updateTerms(id: string, terms: LicenseTerms, now: Date): Promise<License | null>;
  delete(id: string): Promise<boolean>;
}

interface LicenseRow {
  id: string;
  owner_id: string;
  product_id: string;
  order_ref: string | null;
  key_hash: string;
  key_verification_hash: string;
  status: LicenseStatus;
  expires_at: number | null;
  grace_until: number | null;
  max_activations: number | null;
  failed_attempts: number;
  created_at: number;
  updated_at: number;
}

const toDate = (ms: number | null): Date | null => (ms === null ? null : new Date(ms));
const toMs = (date: Date | null): number | null => (date === null ? null : date.getTime());

function toLicense(row: LicenseRow): License {
  return {
    id: row.id,
    ownerId: row.owner_id,
    productId: row.product_id,
    orderRef: row.order_ref,
    keyHash: row.key_hash,
    keyVerificationHash: row.key_verification_hash,
    status: row.status,
    expiresAt: toDate(row.expires_at),
    graceUntil: toDate(row.grace_until),
    maxActivations: row.max_activations,
    failedAttempts: row.failed_attempts,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

export class SqliteLicenseRepository implements LicenseRepository {
  constructor(private readonly db: Db) {}

  async create(input: NewLicense): Promise<License> {
    const id = uuid();
    const now = input.now.getTime();

    this.db
      .prepare(
        `INSERT INTO licenses (id, owner_id, product_id, order_ref, key_hash, key_verification_hash, status,
           expires_at, grace_until, max_activations, failed_attempts, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, 'active', ?, ?, ?, 0, ?, ?)`
      )
      .run(
        id,
        input.ownerId,
        input.productId,
        input.orderRef,
        input.keyHash,
        input.keyVerificationHash,
        toMs(input.expiresAt),
        toMs(input.graceUntil),
        input.maxActivations,
        now,
        now
      );

    const created = await this.findById(id);
    if (!created) {
      throw new Error(`License ${id} vanished after insert`);
    }
    return created;
  }

  async findById(id: string): Promise<License | null> {
    const row = this.db.prepare<[string], LicenseRow>('SELECT * FROM licenses WHERE id = ?').get(id);
    return row ? toLicense(row) : null;
  }

  async findByKeyHash(keyHash: string): Promise<License | null> {
    const row = this.db.prepare<[string], LicenseRow>('SELECT * FROM licenses WHERE key_hash = ?').get(keyHash);
    return row ? toLicense(row) : null;
  }

  async findByOwner(ownerId: string): Promise<License[]> {
    return this.db
      .prepare<[string], LicenseRow>('SELECT * FROM licenses WHERE owner_id = ? ORDER BY created_at DESC')
      .all(ownerId)
      .map(toLicense);
  }

  async list(query: LicenseQuery): Promise<{ licenses: License[]; total: number }> {
    let where = 'WHERE 1=1';
    const params: string[] = [];

    if (query.status) {
      where += ' AND status = ?';
      params.push(query.status);
    }
    if (query.ownerId) {
      where += ' AND owner_id = ?';
      params.push(query.ownerId);
    }
    if (query.productId) {
      where += ' AND product_id = ?';
      params.push(query.productId);
    }

    const total =
      this.db.prepare<string[], { total: number }>(`SELECT COUNT(*) AS total FROM licenses ${where}`).get(...params)
        ?.total ?? 0;

    const rows = this.db
      .prepare<(string | number)[], LicenseRow>(
        `SELECT * FROM licenses ${where} ORDER BY created_at DESC LIMIT ? OFFSET ?`
      )
      .all(...params, query.limit, query.offset);

    return { licenses: rows.map(toLicense), total };
  }

  async updateStatus(id: string, status: LicenseStatus, now: Date): Promise<boolean> {
    const result = this.db
      .prepare('UPDATE licenses SET status = ?, updated_at = ? WHERE id = ?')
      .run(status, now.getTime(), id);
    return result.changes > 0;
  }

  async updateTerms(id: string, terms: LicenseTerms, now: Date): Promise<License | null> {
    const sets: string[] = [];
    const params: (number | null)[] = [];

    if (terms.expiresAt !== undefined) {
      sets.push('expires_at = ?');
      params.push(toMs(terms.expiresAt));
    }
    if (terms.graceUntil !== undefined) {
      sets.push('grace_until = ?');
      params.push(toMs(terms.graceUntil));
    }
    if (terms.maxActivations !== undefined) {
      sets.push('max_activations = ?');
      params.push(terms.maxActivations);
    }

    if (sets.length > 0) {
      this.db
        .prepare(`UPDATE licenses SET ${sets.join(', ')}, updated_at = ? WHERE id = ?`)
        .run(...params, now.getTime(), id);
    }
    return this.findById(id);
  }

  async delete(id: string): Promise<boolean> {
    return this.db.prepare('DELETE FROM licenses WHERE id = ?').run(id).changes > 0;
  }
}
