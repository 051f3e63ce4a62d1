import type Database from 'better-sqlite3';
import { createLogger } from '../log.js';

const log = createLogger('roles');

export enum Role { BASE = 'BASE', ADMIN = 'ADMIN', SUPER = 'SUPER' }

export class AuthzError extends Error {
  readonly code = 'NotAuthorized';
  constructor(msg = 'Not authorized') {
    super(msg);
    this.name = 'AuthzError';
  }
}

const RANK: Record<Role, number> = { [Role.BASE]: 0, [Role.ADMIN]: 1, [Role.SUPER]: 2 };

function parseRole(raw: string): Role {
  if (raw === Role.SUPER) return Role.SUPER;
  if (raw === Role.ADMIN) return Role.ADMIN;
  return Role.BASE;
}

/** Role table guarding administrative ledger operations. SUPER implies ADMIN. */
export class AccessControl {
  constructor(private readonly db: Database.Database) {}

  getRole(uid: string): Role {
    const row = this.db.prepare<[string], { role: string }>('SELECT role FROM roles WHERE user_id = ?').get(uid);
    return row ? parseRole(row.role) : Role.BASE;
  }

  hasRole(uid: string, role: Role): boolean {
    return RANK[this.getRole(uid)] >= RANK[role];
  }

  require(uid: string, role: Role): void {
    if (!this.hasRole(uid, role)) {
      log.warn({ msg: 'admin_check_miss', userId: uid, required: role });
      throw new AuthzError(`${role} role required`);
    }
  }

  /** Bootstraps the first super admin; no caller check. */
  seedSuperAdmin(uid: string): void {
    this.write(uid, Role.SUPER);
  }

  grant(caller: string, uid: string, role: Role.ADMIN | Role.SUPER): void {
    this.require(caller, Role.SUPER);
    this.write(uid, role);
    log.info({ msg: 'role_granted', by: caller, userId: uid, role });
  }

  revoke(caller: string, uid: string): void {
    this.require(caller, Role.SUPER);
    this.db.prepare('DELETE FROM roles WHERE user_id = ?').run(uid);
    log.info({ msg: 'role_revoked', by: caller, userId: uid });
  }

  private write(uid: string, role: Role): void {
    this.db.prepare(
      'INSERT INTO roles(user_id, role, added_at) VALUES(?, ?, ?) ON CONFLICT(user_id) DO UPDATE SET role = excluded.role',
    ).run(uid, role, Date.now());
  }
}
