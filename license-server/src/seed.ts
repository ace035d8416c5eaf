/**
 * Seed script — ensures an admin user exists.
 *
 * Run standalone: npm run seed -w license-server
 * Also called on server startup.
 */

import bcrypt from 'bcryptjs';
import { loadConfigFromEnvironment } from './config';
import { closeDatabase, openDatabase } from './db';
import { SqliteAdminUserRepository } from './repositories/admin-user.repository';
import { createChildLogger } from './utils/logger';

const log = createChildLogger('seed');

export function ensureAdminUser(
  adminUsers: SqliteAdminUserRepository,
  credentials: { username: string; password: string },
  now: Date = new Date()
): boolean {
  if (adminUsers.findByUsername(credentials.username)) {
    log.debug({ username: credentials.username }, 'Admin user already exists');
    return false;
  }

  adminUsers.create(credentials.username, bcrypt.hashSync(credentials.password, 12), now);
  log.info({ username: credentials.username }, 'Created admin user');
  return true;
}

if (require.main === module) {
  const config = loadConfigFromEnvironment();
  const db = openDatabase(config.paths.db);
  try {
    ensureAdminUser(new SqliteAdminUserRepository(db), config.admin);
    log.info('Seed done');
  } finally {
    closeDatabase(db);
  }
}
