import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { createChildLogger } from './utils/logger';

const log = createChildLogger('db');

export type Db = Database.Database;

/**
 * Opens the license store. Pass `:memory:` for an ephemeral database.
 */
export function openDatabase(dbPath: string): Db {
  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.pragma('busy_timeout = 5000');

  runMigrations(db);
  return db;
}

export function runMigrations(db: Db): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS licenses (
      id TEXT PRIMARY KEY,
      owner_id TEXT NOT NULL,
      product_id TEXT NOT NULL,
      order_ref TEXT,
      key_hash TEXT UNIQUE NOT NULL,
      key_verification_hash TEXT NOT NULL,
      status TEXT NOT NULL DEFAULT 'active' CHECK(status IN ('active', 'inactive', 'suspended', 'revoked')),
      expires_at INTEGER,
      grace_until INTEGER,
      max_activations INTEGER CHECK(max_activations IS NULL OR max_activations >= 0),
      failed_attempts INTEGER NOT NULL DEFAULT 0,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL,
      CHECK(grace_until IS NULL OR expires_at IS NULL OR grace_until >= expires_at)
    );

    CREATE TABLE IF NOT EXISTS activations (
      id TEXT PRIMARY KEY,
      license_id TEXT NOT NULL REFERENCES licenses(id) ON DELETE CASCADE,
      domain TEXT NOT NULL,
      ip_hash TEXT,
      user_agent_hash TEXT,
      activated_at INTEGER NOT NULL,
      last_seen_at INTEGER NOT NULL,
      validation_count INTEGER NOT NULL DEFAULT 0,
      is_active INTEGER NOT NULL DEFAULT 1,
      deactivated_at INTEGER,
      deactivated_reason TEXT
    );

    CREATE TABLE IF NOT EXISTS releases (
      id TEXT PRIMARY KEY,
      product_id TEXT NOT NULL,
      slug TEXT NOT NULL,
      version TEXT NOT NULL,
      file_name TEXT NOT NULL,
      file_size INTEGER NOT NULL,
      file_hash TEXT NOT NULL,
      changelog TEXT,
      is_active INTEGER NOT NULL DEFAULT 1,
      download_count INTEGER NOT NULL DEFAULT 0,
      released_at INTEGER NOT NULL,
      UNIQUE(product_id, slug, version)
    );

    CREATE TABLE IF NOT EXISTS admin_users (
      id TEXT PRIMARY KEY,
      username TEXT UNIQUE NOT NULL,
      password_hash TEXT NOT NULL,
      created_at INTEGER NOT NULL
    );

    -- At most one live binding per (license, domain); deactivated rows stay as history.
    CREATE UNIQUE INDEX IF NOT EXISTS uq_activations_live ON activations(license_id, domain) WHERE is_active = 1;

    CREATE INDEX IF NOT EXISTS idx_licenses_owner ON licenses(owner_id);
    CREATE INDEX IF NOT EXISTS idx_licenses_status ON licenses(status);
    CREATE INDEX IF NOT EXISTS idx_activations_license ON activations(license_id, is_active);
    CREATE INDEX IF NOT EXISTS idx_activations_last_seen ON activations(last_seen_at);
    CREATE INDEX IF NOT EXISTS idx_releases_product ON releases(product_id, slug, is_active);
  `);

  log.debug('Database schema ready');
}

export function closeDatabase(db: Db): void {
  if (db.open) {
    db.close();
  }
}
