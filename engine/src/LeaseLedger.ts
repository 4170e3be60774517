import { Store } from './Store';
import { NotFoundError, ValidationError } from './errors';
import { parseLeaseRow } from './rows';
import type { DisputeStatus, DisputeWinner, Lease, LeaseRow } from './types';

export interface NewLease {
  property_id: number;
  bid_id: number | null;
  tenant: string;
  owner: string;
  token: string;
  duration: number;
  escrow_amount: bigint;
}

export interface DisputePatch {
  status?: DisputeStatus;
  reason?: string;
  raised_by?: string;
  tenant_response?: string;
  /** null clears an outstanding oracle request */
  oracle_nonce?: number | null;
  winner?: DisputeWinner;
  resolved_by?: string;
  resolved_at?: number;
}

export class LeaseLedger {
  constructor(private readonly store: Store) {}

  insert(lease: NewLease): Lease {
    const result = this.store.db.prepare(`
      INSERT INTO leases (property_id, bid_id, tenant, owner, token, start_time, duration, escrow_amount, active, escrow_beneficiary)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, 1, ?)
    `).run(
      lease.property_id,
      lease.bid_id,
      lease.tenant,
      lease.owner,
      lease.token,
      this.store.now(),
      lease.duration,
      lease.escrow_amount.toString(),
      lease.tenant
    );
    return this.require(Number(result.lastInsertRowid));
  }

  get(id: number): Lease | null {
    const row = this.store.db.prepare<unknown[], LeaseRow>('SELECT * FROM leases WHERE id = ?').get(id);
    return row ? parseLeaseRow(row) : null;
  }

  require(id: number): Lease {
    const lease = this.get(id);
    if (!lease) {
      throw new NotFoundError(`Lease ${id} not found`);
    }
    return lease;
  }

  requireActive(id: number): Lease {
    const lease = this.require(id);
    if (!lease.active) {
      throw new ValidationError(`Lease ${id} is not active`);
    }
    return lease;
  }

  byTenant(tenant: string): Lease[] {
    return this.store.db.prepare<unknown[], LeaseRow>(
      'SELECT * FROM leases WHERE tenant = ? ORDER BY id ASC'
    ).all(tenant).map(parseLeaseRow);
  }

  byProperty(propertyId: number): Lease[] {
    return this.store.db.prepare<unknown[], LeaseRow>(
      'SELECT * FROM leases WHERE property_id = ? ORDER BY id ASC'
    ).all(propertyId).map(parseLeaseRow);
  }

  /** Active leases whose term has ended and that carry no open dispute. */
  due(now: number): Lease[] {
    return this.store.db.prepare<unknown[], LeaseRow>(`
      SELECT * FROM leases
      WHERE active = 1
        AND start_time + duration <= ?
        AND dispute_status IN ('none', 'resolved')
      ORDER BY id ASC
    `).all(now).map(parseLeaseRow);
  }

  setEscrow(id: number, amount: bigint): void {
    this.store.db.prepare('UPDATE leases SET escrow_amount = ? WHERE id = ?').run(amount.toString(), id);
  }

  close(id: number, beneficiary: string): void {
    this.store.db.prepare(
      'UPDATE leases SET active = 0, closed_at = ?, escrow_beneficiary = ? WHERE id = ?'
    ).run(this.store.now(), beneficiary, id);
  }

  updateDispute(id: number, patch: DisputePatch): void {
    const sets: string[] = [];
    const values: (string | number | null)[] = [];

    if (patch.status !== undefined) {
      sets.push('dispute_status = ?');
      values.push(patch.status);
    }
    if (patch.reason !== undefined) {
      sets.push('dispute_reason = ?');
      values.push(patch.reason);
    }
    if (patch.raised_by !== undefined) {
      sets.push('raised_by = ?');
      values.push(patch.raised_by);
    }
    if (patch.tenant_response !== undefined) {
      sets.push('tenant_response = ?');
      values.push(patch.tenant_response);
    }
    if (patch.oracle_nonce !== undefined) {
      sets.push('oracle_nonce = ?');
      values.push(patch.oracle_nonce);
    }
    if (patch.winner !== undefined) {
      sets.push('dispute_winner = ?');
      values.push(patch.winner);
    }
    if (patch.resolved_by !== undefined) {
      sets.push('resolved_by = ?');
      values.push(patch.resolved_by);
    }
    if (patch.resolved_at !== undefined) {
      sets.push('resolved_at = ?');
      values.push(patch.resolved_at);
    }
    if (sets.length === 0) return;

    this.store.db.prepare(`UPDATE leases SET ${sets.join(', ')} WHERE id = ?`).run(...values, id);
  }

  /** Record one admin vote; returns false if that admin already voted. */
  recordVote(id: number, admin: string, forTenant: boolean): boolean {
    const result = this.store.db.prepare(`
      INSERT OR IGNORE INTO dispute_votes (lease_id, admin, for_tenant, timestamp)
      VALUES (?, ?, ?, ?)
    `).run(id, admin, forTenant ? 1 : 0, this.store.now());
    if (result.changes === 0) return false;

    const column = forTenant ? 'votes_for_tenant' : 'votes_for_owner';
    this.store.db.prepare(`UPDATE leases SET ${column} = ${column} + 1 WHERE id = ?`).run(id);
    return true;
  }
}
