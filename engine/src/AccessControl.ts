import { Store } from './Store';
import { AuthorizationError, ValidationError } from './errors';
import type { ConfigRow, Lease, Property } from './types';

/**
 * Role checks. Roles: the market owner, the admin roster, the owner of a
 * property and the tenant of a lease.
 */
export class AccessControl {
  constructor(private readonly store: Store) {}

  owner(): string {
    const row = this.store.db.prepare<unknown[], ConfigRow>(
      'SELECT * FROM market_config WHERE id = 1'
    ).get();
    if (!row) {
      throw new ValidationError('Market is not initialized');
    }
    return row.owner;
  }

  oracleAccount(): string | null {
    const row = this.store.db.prepare<unknown[], ConfigRow>(
      'SELECT * FROM market_config WHERE id = 1'
    ).get();
    return row ? row.oracle_account : null;
  }

  isOwner(account: string): boolean {
    return this.owner() === account;
  }

  isAdmin(account: string): boolean {
    return this.store.db.prepare('SELECT 1 FROM admins WHERE account = ?').get(account) !== undefined;
  }

  admins(): string[] {
    return this.store.db.prepare<unknown[], { account: string }>(
      'SELECT account FROM admins ORDER BY account'
    ).all().map((r) => r.account);
  }

  requireOwner(caller: string): void {
    if (!this.isOwner(caller)) {
      throw new AuthorizationError('Only the market owner can do this');
    }
  }

  requireAdmin(caller: string): void {
    if (!this.isAdmin(caller)) {
      throw new AuthorizationError(`${caller} is not an admin`);
    }
  }

  requireOracle(caller: string): void {
    const oracle = this.oracleAccount();
    if (oracle === null || oracle !== caller) {
      throw new AuthorizationError('Only the configured oracle account can do this');
    }
  }

  requirePropertyOwner(caller: string, property: Property): void {
    if (property.owner !== caller) {
      throw new AuthorizationError(`Only the owner of property ${property.id} can do this`);
    }
  }

  requireTenant(caller: string, lease: Lease): void {
    if (lease.tenant !== caller) {
      throw new AuthorizationError(`Only the tenant of lease ${lease.id} can do this`);
    }
  }

  requireLeaseParty(caller: string, lease: Lease): void {
    if (lease.tenant !== caller && lease.owner !== caller) {
      throw new AuthorizationError(`Only the tenant or owner of lease ${lease.id} can do this`);
    }
  }

  addAdmin(caller: string, account: string): void {
    this.requireOwner(caller);
    this.store.atomic(() => {
      const result = this.store.db.prepare(
        'INSERT OR IGNORE INTO admins (account, added_at) VALUES (?, ?)'
      ).run(account, this.store.now());
      if (result.changes > 0) {
        this.store.emit('admin.added', { account });
      }
    });
  }

  removeAdmin(caller: string, account: string): void {
    this.requireOwner(caller);
    this.store.atomic(() => {
      const result = this.store.db.prepare('DELETE FROM admins WHERE account = ?').run(account);
      if (result.changes === 0) {
        throw new ValidationError(`${account} is not an admin`);
      }
      this.store.emit('admin.removed', { account });
    });
  }
}
