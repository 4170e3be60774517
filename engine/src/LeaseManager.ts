import type { MarketContext } from './context';
import type { SettlementPlan } from './SettlementCoordinator';
import { lockKeys } from './LockRegistry';
import { intentNumber } from './intent';
import { TimelockNotElapsed, ValidationError } from './errors';
import type { Continuation, Lease } from './types';

export interface LeaseSweepResult {
  expired: number[];
  failed: { lease_id: number; error: string }[];
}

export class LeaseManager {
  constructor(private readonly ctx: MarketContext) {
    ctx.settlements.register('expire_lease', {
      commit: (c) => this.commitExpire(c),
    });
    ctx.settlements.register('escrow_return', {
      commit: (c) => this.commitEscrowReturn(c),
      rollback: (c, reason) => {
        ctx.store.emit('lease.escrow_return_failed', { lease_id: c.entity_id, reason });
      },
    });
  }

  /** End a lease whose term is over and hand the escrow back to the tenant. */
  async expireLease(caller: string, leaseId: number): Promise<Lease> {
    const { store, leases, locks, settlements } = this.ctx;

    const continuation = store.atomic(() => {
      const lease = leases.requireActive(leaseId);
      locks.assertFree([lockKeys.lease(lease.id), lockKeys.property(lease.property_id)]);
      if (lease.dispute.status === 'raised' || lease.dispute.status === 'pending_tenant_response') {
        throw new ValidationError(`Lease ${lease.id} has an open dispute`);
      }
      const endsAt = lease.start_time + lease.duration;
      if (store.now() < endsAt) {
        throw new TimelockNotElapsed(
          `Lease ${lease.id} has not ended: ${endsAt - store.now()}s remaining`,
          endsAt
        );
      }

      store.logger.log(`Expiring lease ${lease.id} (requested by ${caller})`);
      return settlements.open({
        kind: 'expire_lease',
        entityId: lease.id,
        locks: [lockKeys.lease(lease.id), lockKeys.property(lease.property_id)],
        recipient: lease.tenant,
        token: lease.token,
        amount: lease.escrow_amount,
        intent: { lease_id: lease.id, property_id: lease.property_id },
        memo: `Escrow return for expired lease ${lease.id}`,
      });
    });

    await settlements.dispatch(continuation);
    return leases.require(leaseId);
  }

  /** Expire every due lease. Each lease settles on its own. */
  async checkExpiredLeases(caller: string): Promise<LeaseSweepResult> {
    const { store, leases } = this.ctx;
    const result: LeaseSweepResult = { expired: [], failed: [] };

    for (const lease of leases.due(store.now())) {
      try {
        const updated = await this.expireLease(caller, lease.id);
        if (!updated.active) {
          result.expired.push(lease.id);
        }
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        store.logger.error(`Failed to expire lease ${lease.id}:`, message);
        result.failed.push({ lease_id: lease.id, error: message });
      }
    }

    if (result.expired.length > 0) {
      store.logger.log(`Expired ${result.expired.length} lease(s)`);
    }
    return result;
  }

  /** Pay escrow left on a closed lease to its recorded beneficiary. */
  async releaseLeaseEscrow(caller: string, leaseId: number): Promise<Lease> {
    const { store, leases, locks, settlements } = this.ctx;

    const continuation = store.atomic(() => {
      const lease = leases.require(leaseId);
      locks.assertFree([lockKeys.lease(lease.id)]);
      if (lease.active) {
        throw new ValidationError(`Lease ${lease.id} is still active`);
      }
      if (lease.escrow_amount === 0n) {
        throw new ValidationError(`Lease ${lease.id} holds no escrow`);
      }
      store.logger.log(`Releasing escrow of lease ${lease.id} (requested by ${caller})`);
      return settlements.open(escrowReturnPlan(lease, lease.escrow_beneficiary, lease.escrow_amount));
    });

    await settlements.dispatch(continuation);
    return leases.require(leaseId);
  }

  private commitExpire(c: Continuation): SettlementPlan[] {
    const { leases, properties, store } = this.ctx;
    const lease = leases.require(intentNumber(c, 'lease_id'));

    leases.setEscrow(lease.id, 0n);
    leases.close(lease.id, lease.tenant);
    properties.relistForLease(intentNumber(c, 'property_id'));

    store.emit('lease.expired', {
      lease_id: lease.id,
      property_id: lease.property_id,
      tenant: lease.tenant,
      escrow_returned: c.amount.toString(),
    });
    store.logger.log(`Lease ${lease.id} expired`);
    return [];
  }

  private commitEscrowReturn(c: Continuation): SettlementPlan[] {
    const { leases, store } = this.ctx;
    const lease = leases.require(intentNumber(c, 'lease_id'));

    leases.setEscrow(lease.id, 0n);
    store.emit('lease.escrow_released', {
      lease_id: lease.id,
      recipient: c.recipient,
      amount: c.amount.toString(),
    });
    return [];
  }
}

export function escrowReturnPlan(lease: Lease, recipient: string, amount: bigint): SettlementPlan {
  return {
    kind: 'escrow_return',
    entityId: lease.id,
    locks: [lockKeys.lease(lease.id)],
    recipient,
    token: lease.token,
    amount,
    intent: { lease_id: lease.id },
    memo: `Escrow return for lease ${lease.id}`,
  };
}
