import type { MarketContext } from './context';
import type { SettlementPlan } from './SettlementCoordinator';
import { lockKeys } from './LockRegistry';
import { escrowReturnPlan } from './LeaseManager';
import { checkedSub } from './amount';
import { intentNumber, intentOneOf, intentString } from './intent';
import { ExternalCallFailure, ValidationError } from './errors';
import type { Continuation, DisputeWinner, Lease, OracleResolution } from './types';

export interface OracleRequest {
  lease_id: number;
  nonce: number;
}

/** Outbound channel to the dispute oracle. */
export interface OracleClient {
  requestResolution(request: OracleRequest): Promise<void>;
}

const WINNERS: readonly DisputeWinner[] = ['tenant', 'owner'];

/**
 * Lease disputes: raised by either party, voted on by admins and settled
 * by an admin decision or by the oracle account.
 */
export class DisputeResolver {
  constructor(
    private readonly ctx: MarketContext,
    private readonly oracle: OracleClient | null = null,
  ) {
    ctx.settlements.register('dispute_payout', {
      commit: (c) => this.commitPayout(c),
    });
  }

  raise(caller: string, leaseId: number, reason: string): Lease {
    if (!reason || reason.trim().length === 0) {
      throw new ValidationError('reason is required');
    }
    const { store, leases, access, locks } = this.ctx;

    return store.atomic(() => {
      const lease = leases.requireActive(leaseId);
      access.requireLeaseParty(caller, lease);
      locks.assertFree([lockKeys.lease(lease.id)]);
      if (lease.dispute.status !== 'none') {
        throw new ValidationError(`Lease ${lease.id} already has a dispute`);
      }

      leases.updateDispute(lease.id, { status: 'raised', reason, raised_by: caller });
      store.emit('dispute.raised', { lease_id: lease.id, raised_by: caller, reason });
      store.logger.log(`Dispute raised on lease ${lease.id} by ${caller}`);
      return leases.require(lease.id);
    });
  }

  requestTenantResponse(caller: string, leaseId: number): Lease {
    const { store, leases, access, locks } = this.ctx;
    access.requireAdmin(caller);

    return store.atomic(() => {
      const lease = leases.requireActive(leaseId);
      locks.assertFree([lockKeys.lease(lease.id)]);
      if (lease.dispute.status !== 'raised') {
        throw new ValidationError(`Lease ${lease.id} has no raised dispute`);
      }
      leases.updateDispute(lease.id, { status: 'pending_tenant_response' });
      store.emit('dispute.response_requested', { lease_id: lease.id, requested_by: caller });
      return leases.require(lease.id);
    });
  }

  submitTenantResponse(caller: string, leaseId: number, response: string): Lease {
    if (!response || response.trim().length === 0) {
      throw new ValidationError('response is required');
    }
    const { store, leases, access, locks } = this.ctx;

    return store.atomic(() => {
      const lease = leases.requireActive(leaseId);
      access.requireTenant(caller, lease);
      locks.assertFree([lockKeys.lease(lease.id)]);
      if (lease.dispute.status !== 'pending_tenant_response') {
        throw new ValidationError(`Lease ${lease.id} is not awaiting a tenant response`);
      }
      leases.updateDispute(lease.id, { status: 'raised', tenant_response: response });
      store.emit('dispute.tenant_responded', { lease_id: lease.id, tenant: caller });
      return leases.require(lease.id);
    });
  }

  /** Record an admin vote. Votes are advisory; they never resolve a dispute. */
  vote(caller: string, leaseId: number, forTenant: boolean): Lease {
    const { store, leases, access, locks } = this.ctx;
    access.requireAdmin(caller);

    return store.atomic(() => {
      const lease = leases.requireActive(leaseId);
      locks.assertFree([lockKeys.lease(lease.id)]);
      requireOpenDispute(lease);
      if (!leases.recordVote(lease.id, caller, forTenant)) {
        throw new ValidationError(`${caller} has already voted on lease ${lease.id}`);
      }
      const updated = leases.require(lease.id);
      store.emit('dispute.vote_cast', {
        lease_id: lease.id,
        admin: caller,
        for_tenant: forTenant,
        votes_for_tenant: updated.dispute.votes_for_tenant,
        votes_for_owner: updated.dispute.votes_for_owner,
      });
      return updated;
    });
  }

  async resolveDispute(caller: string, leaseId: number, winner: DisputeWinner, payout: bigint): Promise<Lease> {
    const { store, leases, access, settlements } = this.ctx;
    access.requireAdmin(caller);

    const continuation = store.atomic(() => {
      const lease = leases.requireActive(leaseId);
      requireOpenDispute(lease);
      return settlements.open(this.payoutPlan(lease, winner, payout, caller, 'admin'));
    });

    await settlements.dispatch(continuation);
    return leases.require(leaseId);
  }

  /** Hand the decision to the oracle. A failed request clears the nonce. */
  async requestOracleDispute(caller: string, leaseId: number): Promise<Lease> {
    const { store, leases, access, locks } = this.ctx;
    access.requireAdmin(caller);
    if (!this.oracle) {
      throw new ValidationError('No oracle client is configured');
    }

    const nonce = store.atomic(() => {
      if (access.oracleAccount() === null) {
        throw new ValidationError('No oracle account is configured');
      }
      const lease = leases.requireActive(leaseId);
      locks.assertFree([lockKeys.lease(lease.id)]);
      requireOpenDispute(lease);
      if (lease.dispute.oracle_nonce !== null) {
        throw new ValidationError(`Lease ${lease.id} already has an outstanding oracle request`);
      }

      const next = this.nextOracleNonce();
      leases.updateDispute(lease.id, { oracle_nonce: next });
      store.emit('dispute.oracle_requested', { lease_id: lease.id, nonce: next, requested_by: caller });
      return next;
    });

    try {
      await this.oracle.requestResolution({ lease_id: leaseId, nonce });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      store.atomic(() => {
        const lease = leases.require(leaseId);
        if (lease.dispute.oracle_nonce === nonce) {
          leases.updateDispute(leaseId, { oracle_nonce: null });
        }
        store.emit('dispute.oracle_request_failed', { lease_id: leaseId, nonce, reason: message });
      });
      throw new ExternalCallFailure(`Oracle request for lease ${leaseId} failed: ${message}`);
    }

    return leases.require(leaseId);
  }

  async resolveDisputeFromOracle(caller: string, resolution: OracleResolution): Promise<Lease> {
    const { store, leases, access, settlements } = this.ctx;
    access.requireOracle(caller);

    const continuation = store.atomic(() => {
      const lease = leases.requireActive(resolution.leaseId);
      requireOpenDispute(lease);
      if (lease.dispute.oracle_nonce === null || lease.dispute.oracle_nonce !== resolution.nonce) {
        throw new ValidationError(`Oracle nonce ${resolution.nonce} does not match the outstanding request`);
      }
      return settlements.open(
        this.payoutPlan(lease, resolution.winner, resolution.payoutAmount, caller, 'oracle')
      );
    });

    await settlements.dispatch(continuation);
    return leases.require(resolution.leaseId);
  }

  private payoutPlan(
    lease: Lease,
    winner: DisputeWinner,
    payout: bigint,
    resolver: string,
    source: 'admin' | 'oracle',
  ): SettlementPlan {
    if (payout < 0n) {
      throw new ValidationError('payout must not be negative');
    }
    if (payout > lease.escrow_amount) {
      throw new ValidationError(
        `Payout ${payout.toString()} exceeds the lease escrow of ${lease.escrow_amount.toString()}`
      );
    }
    const recipient = winner === 'tenant' ? lease.tenant : lease.owner;
    const counterparty = winner === 'tenant' ? lease.owner : lease.tenant;

    return {
      kind: 'dispute_payout',
      entityId: lease.id,
      locks: [lockKeys.lease(lease.id), lockKeys.property(lease.property_id)],
      recipient,
      token: lease.token,
      amount: payout,
      intent: {
        lease_id: lease.id,
        property_id: lease.property_id,
        winner,
        counterparty,
        resolver,
        source,
      },
      memo: `Dispute payout for lease ${lease.id}`,
    };
  }

  private commitPayout(c: Continuation): SettlementPlan[] {
    const { leases, properties, store } = this.ctx;
    const lease = leases.require(intentNumber(c, 'lease_id'));
    const winner = intentOneOf(c, 'winner', WINNERS);
    const counterparty = intentString(c, 'counterparty');
    const remaining = checkedSub(lease.escrow_amount, c.amount, 'lease escrow');

    leases.setEscrow(lease.id, remaining);
    leases.updateDispute(lease.id, {
      status: 'resolved',
      winner,
      resolved_by: intentString(c, 'resolver'),
      resolved_at: store.now(),
      oracle_nonce: null,
    });
    leases.close(lease.id, counterparty);
    properties.relistForLease(intentNumber(c, 'property_id'));

    store.emit('dispute.resolved', {
      lease_id: lease.id,
      winner,
      payout: c.amount.toString(),
      remaining: remaining.toString(),
      source: intentString(c, 'source'),
    });
    store.emit('lease.closed', { lease_id: lease.id, property_id: lease.property_id });
    store.logger.log(`Dispute on lease ${lease.id} resolved for ${winner}`);

    if (remaining === 0n) return [];
    return [escrowReturnPlan(lease, counterparty, remaining)];
  }

  private nextOracleNonce(): number {
    const { db } = this.ctx.store;
    db.prepare('UPDATE market_config SET oracle_nonce = oracle_nonce + 1 WHERE id = 1').run();
    const row = db.prepare<unknown[], { oracle_nonce: number }>(
      'SELECT oracle_nonce FROM market_config WHERE id = 1'
    ).get();
    if (!row) {
      throw new ValidationError('Market is not initialized');
    }
    return row.oracle_nonce;
  }
}

function requireOpenDispute(lease: Lease): void {
  if (lease.dispute.status !== 'raised' && lease.dispute.status !== 'pending_tenant_response') {
    throw new ValidationError(`Lease ${lease.id} has no open dispute`);
  }
}
