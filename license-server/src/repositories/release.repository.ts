import { v4 as uuid } from 'uuid';
import type { Db } from '../db';
import type { Release } from '../types';

export interface NewRelease {
  productId: string;
  slug: string;
  version: string;
  fileName: string;
  fileSize: number;
  fileHash: string;
  changelog: string | null;
  now: Date;
}

export interface ReleaseRepository {
  create(input: NewRelease): Promise<Release>;
  findById(id: string): Promise<Release | null>;
  /** Active releases of one product/slug, in no particular order. */
  listActive(productId: string, slug: string): Promise<Release[]>;
  list(productId?: string): Promise<Release[]>;
  setActive(id: string, isActive: boolean): Promise<boolean>;
  incrementDownloads(id: string): Promise<void>;
}

interface ReleaseRow {
  id: string;
  product_id: string;
  slug: string;
  version: string;
  file_name: string;
  file_size: number;
  file_hash: string;
  changelog: string | null;
  is_active: number;
  download_count: number;
  released_at: number;
}

function toRelease(row: ReleaseRow): Release {
  return {
    id: row.id,
    productId: row.product_id,
    slug: row.slug,
    version: row.version,
    fileName: row.file_name,
    fileSize: row.file_size,
    fileHash: row.file_hash,
    changelog: row.changelog,
    isActive: row.is_active === 1,
    downloadCount: row.download_count,
    releasedAt: new Date(row.released_at),
  };
}

export class SqliteReleaseRepository implements ReleaseRepository {
  constructor(private readonly db: Db) {}

  async create(input: NewRelease): Promise<Release> {
    const row = this.db
      .prepare<[string, string, string, string, string, number, string, string | null, number], ReleaseRow>(
        `INSERT INTO releases (id, product_id, slug, version, file_name, file_size, file_hash, changelog, released_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
         RETURNING *`
      )
      .get(
        uuid(),
        input.productId,
        input.slug,
        input.version,
        input.fileName,
        input.fileSize,
        input.fileHash,
        input.changelog,
        input.now.getTime()
      );
    if (!row) {
      throw new Error('Release insert returned no row');
    }
    return toRelease(row);
  }

  async findById(id: string): Promise<Release | null> {
    const row = this.db.prepare<[string], ReleaseRow>('SELECT * FROM releases WHERE id = ?').get(id);
    return row ? toRelease(row) : null;
  }

  async listActive(productId: string, slug: string): Promise<Release[]> {
    return this.db
      .prepare<[string, string], ReleaseRow>(
        'SELECT * FROM releases WHERE product_id = ? AND slug = ? AND is_active = 1'
      )
      .all(productId, slug)
      .map(toRelease);
  }

  async list(productId?: string): Promise<Release[]> {
    const rows = productId
      ? this.db
          .prepare<[string], ReleaseRow>('SELECT * FROM releases WHERE product_id = ? ORDER BY released_at DESC')
          .all(productId)
      : this.db.prepare<[], ReleaseRow>('SELECT * FROM releases ORDER BY released_at DESC').all();
    return rows.map(toRelease);
  }

  async setActive(id: string, isActive: boolean): Promise<boolean> {
    return this.db.prepare('UPDATE releases SET is_active = ? WHERE id = ?').run(isActive ? 1 : 0, id).changes > 0;
  }

  async incrementDownloads(id: string): Promise<void> {
    this.db.prepare('UPDATE releases SET download_count = download_count + 1 WHERE id = ?').run(id);
  }
}
