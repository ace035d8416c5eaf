import { v4 as uuid } from 'uuid';
import type { Db } from '../db';

export interface AdminUser {
  id: string;
  username: string;
  passwordHash: string;
  createdAt: Date;
}

interface AdminUserRow {
  id: string;
  username: string;
  password_hash: string;
  created_at: number;
}

export class SqliteAdminUserRepository {
  constructor(private readonly db: Db) {}

  findByUsername(username: string): AdminUser | null {
    const row = this.db
      .prepare<[string], AdminUserRow>('SELECT * FROM admin_users WHERE username = ?')
      .get(username);
    return row
      ? { id: row.id, username: row.username, passwordHash: row.password_hash, createdAt: new Date(row.created_at) }
      : null;
  }

  create(username: string, passwordHash: string, now: Date): string {
    const id = uuid();
    this.db
      .prepare('INSERT INTO admin_users (id, username, password_hash, created_at) VALUES (?, ?, ?, ?)')
      .run(id, username, passwordHash, now.getTime());
    return id;
  }
}
