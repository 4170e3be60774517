import type { MarketContext } from './context';
import type { SettlementPlan } from './SettlementCoordinator';
import { lockKeys } from './LockRegistry';
import { DISPUTABLE_STATES, REFUND_PATHS } from './BidStateMachine';
import { checkedSub } from './amount';
import { intentAmount, intentNumber, intentOneOf, intentString } from './intent';
import { AuthorizationError, TimelockNotElapsed, ValidationError } from './errors';
import type {
  Bid,
  BidAction,
  BidDisputeWinner,
  Continuation,
  DepositNotification,
  DepositResult,
  Property,
  RefundReason,
} from './types';

const REFUND_REASONS: readonly RefundReason[] = [
  'rejected', 'cancelled', 'outbid', 'lost_bid', 'expired', 'escrow_timeout', 'dispute', 'admin_refund',
];
const BID_ACTION_VALUES: readonly BidAction[] = ['purchase', 'lease'];

interface BidMessage {
  property_id: number;
  action: BidAction;
  token_account: string;
}

type EscrowAcceptance =
  | { kind: 'expired'; continuation: Continuation }
  | { kind: 'accepted'; followUps: SettlementPlan[] };

/**
 * Bid lifecycle: deposits create pending bids; the property owner accepts
 * directly or through the document escrow flow; every fund movement is a
 * settlement.
 */
export class BidLifecycle {
  constructor(private readonly ctx: MarketContext) {
    ctx.settlements.register('accept_bid', {
      commit: (c) => this.commitAccept(c),
    });
    ctx.settlements.register('release_escrow', {
      commit: (c) => this.commitRelease(c),
    });
    ctx.settlements.register('refund_bid', {
      commit: (c) => this.commitRefund(c),
      rollback: (c, reason) => this.rollbackRefund(c, reason),
    });
  }

  // ============== DEPOSITS ==============

  /**
   * Handle a deposit notification from a token account. The whole amount
   * becomes the bid, so nothing is handed back.
   */
  deposit(tokenAccount: string, notification: DepositNotification): DepositResult {
    const message = parseBidMessage(notification.message);
    const { store, properties, bids, ledger, locks, timelocks, tokens } = this.ctx;

    if (!tokens.isSupported(tokenAccount)) {
      throw new ValidationError(`Token ${tokenAccount} is not supported`);
    }
    if (message.token_account !== tokenAccount) {
      throw new ValidationError('token_account does not match the calling token account');
    }
    if (notification.amount <= 0n) {
      throw new ValidationError('Deposit amount must be positive');
    }

    return store.atomic(() => {
      const property = properties.require(message.property_id);
      locks.assertFree([lockKeys.property(property.id)]);

      if (property.owner === notification.sender) {
        throw new ValidationError('Owners cannot bid on their own property');
      }
      requireListedFor(property, message.action);
      if (message.action === 'lease' && notification.amount < property.damage_escrow) {
        throw new ValidationError(
          `Lease bid must cover the damage escrow of ${property.damage_escrow.toString()}`
        );
      }
      if (properties.hasEscrowBid(property.id)) {
        throw new ValidationError(`Property ${property.id} has a transaction in escrow`);
      }

      ledger.credit(tokenAccount, notification.amount);
      const expiry = timelocks.get('bid_expiry');
      const bid = bids.insert({
        property_id: property.id,
        bidder: notification.sender,
        token: tokenAccount,
        amount: notification.amount,
        action: message.action,
        expires_at: expiry > 0 ? store.now() + expiry : null,
      });

      store.emit('bid.placed', {
        bid_id: bid.id,
        property_id: property.id,
        bidder: bid.bidder,
        token: bid.token,
        amount: bid.amount.toString(),
        action: bid.action,
        expires_at: bid.expires_at,
      });
      store.logger.log(`Bid ${bid.id} placed on property ${property.id} by ${bid.bidder}`);

      return { bid, unused: 0n };
    });
  }

  // ============== ACCEPTANCE ==============

  /**
   * Accept a pending bid and pay the seller straight away. An expired bid
   * is refunded instead.
   */
  async accept(caller: string, bidId: number): Promise<Bid> {
    const { store, settlements, bids } = this.ctx;

    const continuation = store.atomic(() => {
      const { bid, property } = this.loadPendingForOwner(caller, bidId);
      if (this.isExpired(bid)) {
        store.logger.log(`Bid ${bid.id} expired before acceptance; refunding`);
        return settlements.open(this.refundPlan(bid, 'expired'));
      }
      this.requireAcceptable(bid, property);
      return settlements.open(this.acceptPlan(bid, property));
    });

    await settlements.dispatch(continuation);
    return bids.require(bidId);
  }

  /** Accept into the document escrow flow; no funds move yet. */
  async acceptWithEscrow(caller: string, bidId: number): Promise<Bid> {
    const { store, settlements, bids } = this.ctx;

    const outcome = store.atomic((): EscrowAcceptance => {
      const { bid, property } = this.loadPendingForOwner(caller, bidId);
      if (this.isExpired(bid)) {
        return { kind: 'expired', continuation: settlements.open(this.refundPlan(bid, 'expired')) };
      }
      this.requireAcceptable(bid, property);

      const retained = bid.action === 'lease' ? property.damage_escrow : 0n;
      bids.transition(bid, 'accepted', caller, { retained_amount: retained });
      store.emit('bid.escrow_accepted', {
        bid_id: bid.id,
        property_id: property.id,
        seller: property.owner,
        buyer: bid.bidder,
      });
      return { kind: 'accepted', followUps: this.competingRefunds(property.id, bid.id) };
    });

    if (outcome.kind === 'expired') {
      await settlements.dispatch(outcome.continuation);
    } else {
      settlements.launchAll(outcome.followUps);
    }
    return bids.require(bidId);
  }

  // ============== DOCUMENT ESCROW ==============

  confirmDocumentRelease(caller: string, bidId: number, documentTokenId: string): Bid {
    if (!documentTokenId) {
      throw new ValidationError('document_token_id is required');
    }
    const { store, access, bids } = this.ctx;

    return store.atomic(() => {
      const { bid, property } = this.loadUnlocked(bidId);
      access.requirePropertyOwner(caller, property);

      const updated = bids.transition(bid, 'docs_released', caller, {
        document_token_id: documentTokenId,
      });
      store.emit('bid.docs_released', {
        bid_id: bid.id,
        property_id: property.id,
        document_token_id: documentTokenId,
      });
      return updated;
    });
  }

  /** Buyer acknowledges the documents; starts the escrow-release timelock. */
  confirmDocumentReceipt(caller: string, bidId: number): Bid {
    const { store, bids } = this.ctx;

    return store.atomic(() => {
      const { bid } = this.loadUnlocked(bidId);
      requireBuyer(caller, bid);

      const now = store.now();
      const updated = bids.transition(bid, 'docs_confirmed', caller, { docs_confirmed_at: now });
      store.emit('bid.docs_confirmed', { bid_id: bid.id, confirmed_at: now });
      return updated;
    });
  }

  async releaseEscrow(caller: string, bidId: number): Promise<Bid> {
    const { store, settlements, timelocks, bids } = this.ctx;

    const continuation = store.atomic(() => {
      const { bid, property } = this.loadUnlocked(bidId);
      requireBuyer(caller, bid);
      if (bid.state !== 'docs_confirmed' || bid.docs_confirmed_at === null) {
        throw new ValidationError(`Bid ${bid.id} documents have not been confirmed`);
      }
      timelocks.requireElapsed('escrow_release_delay', bid.docs_confirmed_at, 'Escrow release');
      return settlements.open(this.releasePlan(bid, property));
    });

    await settlements.dispatch(continuation);
    return bids.require(bidId);
  }

  /** Hand the property over once the seller has been paid. */
  completeTransaction(caller: string, bidId: number): Bid {
    const { store, bids } = this.ctx;

    return store.atomic(() => {
      const { bid, property } = this.loadUnlocked(bidId);
      if (caller !== bid.bidder && caller !== property.owner) {
        throw new AuthorizationError('Only the buyer or seller can complete the transaction');
      }
      if (bid.state !== 'payment_released') {
        throw new ValidationError(`Bid ${bid.id} payment has not been released`);
      }

      const completed = bids.transition(bid, 'completed', caller, { held_amount: 0n });
      this.handOver(completed, property.owner, property.lease_duration, bid.retained_amount);
      store.emit('bid.completed', { bid_id: bid.id, property_id: property.id });
      return bids.require(bidId);
    });
  }

  /** Refund an escrowed bid that stalled before documents were confirmed. */
  async refundEscrowTimeout(caller: string, bidId: number, timeout: number): Promise<Bid> {
    const { store, settlements, timelocks, bids } = this.ctx;
    if (!Number.isInteger(timeout) || timeout < 0) {
      throw new ValidationError('timeout must be a non-negative integer number of seconds');
    }
    const floor = timelocks.get('escrow_release_delay');
    if (timeout < floor) {
      throw new ValidationError(
        `timeout is below the market's minimum escrow timeout, which is the escrow release delay (${floor}s)`
      );
    }

    const continuation = store.atomic(() => {
      const { bid } = this.loadUnlocked(bidId);
      if (bid.state !== 'accepted' && bid.state !== 'docs_released') {
        throw new ValidationError(`Bid ${bid.id} is not awaiting documents`);
      }
      const availableAt = bid.updated_at + timeout;
      if (store.now() < availableAt) {
        throw new TimelockNotElapsed(
          `Escrow timeout not reached: ${availableAt - store.now()}s remaining`,
          availableAt
        );
      }
      store.logger.log(`Bid ${bid.id} escrow timed out (requested by ${caller})`);
      return settlements.open(this.refundPlan(bid, 'escrow_timeout'));
    });

    await settlements.dispatch(continuation);
    return bids.require(bidId);
  }

  // ============== DISPUTES ==============

  raiseDispute(caller: string, bidId: number, reason: string): Bid {
    if (!reason || reason.trim().length === 0) {
      throw new ValidationError('reason is required');
    }
    const { store, bids } = this.ctx;

    return store.atomic(() => {
      const { bid, property } = this.loadUnlocked(bidId);
      if (caller !== bid.bidder && caller !== property.owner) {
        throw new AuthorizationError('Only the buyer or seller can dispute this bid');
      }
      if (!DISPUTABLE_STATES.includes(bid.state)) {
        throw new ValidationError(`Bid ${bid.id} cannot be disputed in state ${bid.state}`);
      }

      const updated = bids.transition(bid, 'disputed', caller, { dispute_reason: reason });
      store.emit('bid.disputed', { bid_id: bid.id, raised_by: caller, reason });
      return updated;
    });
  }

  /** Admin decision on a bid dispute: refund the buyer or pay the seller. */
  async resolveBidDispute(caller: string, bidId: number, winner: BidDisputeWinner): Promise<Bid> {
    const { store, access, settlements, bids } = this.ctx;
    access.requireAdmin(caller);

    const continuation = store.atomic(() => {
      const { bid, property } = this.loadUnlocked(bidId);
      if (bid.state !== 'disputed') {
        throw new ValidationError(`Bid ${bid.id} is not disputed`);
      }
      store.logger.log(`Bid ${bid.id} dispute resolved for ${winner} by ${caller}`);
      return winner === 'buyer'
        ? settlements.open(this.refundPlan(bid, 'dispute'))
        : settlements.open(this.releasePlan(bid, property));
    });

    await settlements.dispatch(continuation);
    return bids.require(bidId);
  }

  // ============== REFUNDS ==============

  async reject(caller: string, bidId: number): Promise<Bid> {
    const { store, settlements, bids } = this.ctx;

    const continuation = store.atomic(() => {
      const { bid } = this.loadPendingForOwner(caller, bidId);
      return settlements.open(this.refundPlan(bid, 'rejected'));
    });

    await settlements.dispatch(continuation);
    return bids.require(bidId);
  }

  async cancel(caller: string, bidId: number): Promise<Bid> {
    const { store, settlements, bids, locks } = this.ctx;

    const continuation = store.atomic(() => {
      const bid = bids.require(bidId);
      locks.assertFree([lockKeys.bid(bid.id)]);
      requireBuyer(caller, bid);
      requirePending(bid);
      return settlements.open(this.refundPlan(bid, 'cancelled'));
    });

    await settlements.dispatch(continuation);
    return bids.require(bidId);
  }

  async refundExpiredBid(caller: string, bidId: number): Promise<Bid> {
    const { store, settlements, bids, locks } = this.ctx;

    const continuation = store.atomic(() => {
      const bid = bids.require(bidId);
      locks.assertFree([lockKeys.bid(bid.id)]);
      requirePending(bid);
      if (bid.expires_at === null) {
        throw new ValidationError(`Bid ${bid.id} does not expire`);
      }
      if (store.now() < bid.expires_at) {
        throw new TimelockNotElapsed(
          `Bid ${bid.id} has not expired: ${bid.expires_at - store.now()}s remaining`,
          bid.expires_at
        );
      }
      store.logger.log(`Refunding expired bid ${bid.id} (requested by ${caller})`);
      return settlements.open(this.refundPlan(bid, 'expired'));
    });

    await settlements.dispatch(continuation);
    return bids.require(bidId);
  }

  /**
   * Refund every pending bid on a property. Each refund is its own
   * settlement, so a failed transfer leaves only that bid pending.
   */
  async refundBids(caller: string, propertyId: number): Promise<Bid[]> {
    const { store, settlements, bids, locks, properties, access } = this.ctx;
    access.requireAdmin(caller);

    const plans = store.atomic(() => {
      const property = properties.require(propertyId);
      locks.assertFree([lockKeys.property(property.id)]);
      const open = bids.openByProperty(property.id).filter((b) => !locks.isHeld(lockKeys.bid(b.id)));
      if (open.length === 0) {
        throw new ValidationError(`Property ${property.id} has no open bids`);
      }
      store.logger.log(`Refunding ${open.length} bid(s) on property ${property.id} (requested by ${caller})`);
      return open.map((b) => this.refundPlan(b, 'admin_refund'));
    });

    settlements.launchAll(plans);
    await settlements.idle();
    return plans.map((plan) => bids.require(plan.entityId));
  }

  /**
   * Let a losing bidder recover a bid that was never refunded after the
   * property went to someone else.
   */
  async claimLostBid(caller: string, bidId: number): Promise<Bid> {
    const { store, settlements, bids, locks, properties, leases, timelocks } = this.ctx;

    const continuation = store.atomic(() => {
      const bid = bids.require(bidId);
      requireBuyer(caller, bid);
      if (bid.refunded_at !== null) {
        throw new ValidationError(`Bid ${bid.id} has already been refunded`);
      }
      requirePending(bid);
      if (bid.held_amount === 0n) {
        throw new ValidationError(`Bid ${bid.id} holds no funds`);
      }
      locks.assertFree([lockKeys.bid(bid.id)]);

      const property = properties.require(bid.property_id);
      let lostAt: number | null = null;
      switch (bid.action) {
        case 'purchase':
          if (property.status === 'sold' && property.sold_to !== bid.bidder && property.sold_at !== null) {
            lostAt = property.sold_at;
          }
          break;
        case 'lease':
          if (property.status === 'leased' && property.active_lease_id !== null) {
            const lease = leases.require(property.active_lease_id);
            if (lease.tenant !== bid.bidder) {
              lostAt = lease.start_time;
            }
          }
          break;
      }
      if (lostAt === null) {
        throw new ValidationError(`Property ${property.id} has not gone to another bidder`);
      }

      timelocks.requireElapsed('lost_bid_claim_delay', lostAt, 'Lost bid claim');
      return settlements.open(this.refundPlan(bid, 'lost_bid'));
    });

    await settlements.dispatch(continuation);
    return bids.require(bidId);
  }

  // ============== Settlement handlers ==============

  private commitAccept(c: Continuation): SettlementPlan[] {
    const { bids, store } = this.ctx;
    const bid = bids.require(intentNumber(c, 'bid_id'));
    const seller = intentString(c, 'seller');
    const retained = intentAmount(c, 'retained');

    const completed = bids.transition(bid, 'completed', seller, {
      held_amount: 0n,
      retained_amount: retained,
    });
    this.handOver(completed, seller, intentNumber(c, 'lease_duration'), retained);

    store.emit('bid.accepted', {
      bid_id: bid.id,
      property_id: bid.property_id,
      seller,
      buyer: bid.bidder,
      payout: c.amount.toString(),
    });
    store.logger.log(`Bid ${bid.id} accepted; paid ${c.amount.toString()} to ${seller}`);

    return this.competingRefunds(bid.property_id, bid.id);
  }

  private commitRelease(c: Continuation): SettlementPlan[] {
    const { bids, store } = this.ctx;
    const bid = bids.require(intentNumber(c, 'bid_id'));

    bids.transition(bid, 'payment_released', null, { held_amount: bid.retained_amount });
    store.emit('bid.payment_released', {
      bid_id: bid.id,
      seller: c.recipient,
      amount: c.amount.toString(),
    });
    return [];
  }

  private commitRefund(c: Continuation): SettlementPlan[] {
    const { bids, store } = this.ctx;
    const reason = intentOneOf(c, 'reason', REFUND_REASONS);
    let bid = bids.require(intentNumber(c, 'bid_id'));

    const path = REFUND_PATHS[reason];
    for (let i = 0; i < path.length; i++) {
      const last = i === path.length - 1;
      bid = bids.transition(bid, path[i], null, last ? { held_amount: 0n, refunded_at: store.now() } : {});
    }

    store.emit('bid.refunded', {
      bid_id: bid.id,
      bidder: bid.bidder,
      amount: c.amount.toString(),
      reason,
    });
    store.logger.log(`Bid ${bid.id} refunded (${reason})`);
    return [];
  }

  private rollbackRefund(c: Continuation, failure: string): void {
    this.ctx.store.emit('bid.refund_failed', {
      bid_id: c.entity_id,
      reason: intentString(c, 'reason'),
      failure,
    });
  }

  // ============== Helpers ==============

  private handOver(bid: Bid, seller: string, leaseDuration: number, escrow: bigint): void {
    const { properties, leases, store } = this.ctx;

    if (bid.action === 'purchase') {
      properties.markSold(bid.property_id, bid.bidder);
      store.emit('property.sold', {
        property_id: bid.property_id,
        seller,
        buyer: bid.bidder,
        bid_id: bid.id,
      });
      return;
    }

    const lease = leases.insert({
      property_id: bid.property_id,
      bid_id: bid.id,
      tenant: bid.bidder,
      owner: seller,
      token: bid.token,
      duration: leaseDuration,
      escrow_amount: escrow,
    });
    properties.markLeased(bid.property_id, lease.id);
    store.emit('lease.created', {
      lease_id: lease.id,
      property_id: lease.property_id,
      tenant: lease.tenant,
      owner: lease.owner,
      escrow_amount: escrow.toString(),
      start_time: lease.start_time,
      duration: lease.duration,
    });
  }

  private acceptPlan(bid: Bid, property: Property): SettlementPlan {
    const retained = bid.action === 'lease' ? property.damage_escrow : 0n;
    return {
      kind: 'accept_bid',
      entityId: bid.id,
      locks: [lockKeys.bid(bid.id), lockKeys.property(property.id)],
      recipient: property.owner,
      token: bid.token,
      amount: checkedSub(bid.held_amount, retained, 'seller payout'),
      intent: {
        bid_id: bid.id,
        property_id: property.id,
        seller: property.owner,
        retained: retained.toString(),
        lease_duration: property.lease_duration,
      },
      memo: `Bid ${bid.id} accepted`,
    };
  }

  private releasePlan(bid: Bid, property: Property): SettlementPlan {
    return {
      kind: 'release_escrow',
      entityId: bid.id,
      locks: [lockKeys.bid(bid.id), lockKeys.property(property.id)],
      recipient: property.owner,
      token: bid.token,
      amount: checkedSub(bid.held_amount, bid.retained_amount, 'escrow release'),
      intent: { bid_id: bid.id },
      memo: `Escrow released for bid ${bid.id}`,
    };
  }

  private refundPlan(bid: Bid, reason: RefundReason): SettlementPlan {
    return {
      kind: 'refund_bid',
      entityId: bid.id,
      locks: [lockKeys.bid(bid.id)],
      recipient: bid.bidder,
      token: bid.token,
      amount: bid.held_amount,
      intent: { bid_id: bid.id, reason },
      memo: `Refund bid ${bid.id} (${reason})`,
    };
  }

  private competingRefunds(propertyId: number, winnerId: number): SettlementPlan[] {
    return this.ctx.bids
      .openByProperty(propertyId, winnerId)
      .map((b) => this.refundPlan(b, 'outbid'));
  }

  private loadUnlocked(bidId: number): { bid: Bid; property: Property } {
    const bid = this.ctx.bids.require(bidId);
    this.ctx.locks.assertFree([lockKeys.bid(bid.id), lockKeys.property(bid.property_id)]);
    return { bid, property: this.ctx.properties.require(bid.property_id) };
  }

  private loadPendingForOwner(caller: string, bidId: number): { bid: Bid; property: Property } {
    const loaded = this.loadUnlocked(bidId);
    this.ctx.access.requirePropertyOwner(caller, loaded.property);
    requirePending(loaded.bid);
    return loaded;
  }

  private requireAcceptable(bid: Bid, property: Property): void {
    requireListedFor(property, bid.action);
    if (this.ctx.properties.hasEscrowBid(property.id)) {
      throw new ValidationError(`Property ${property.id} has a transaction in escrow`);
    }
  }

  private isExpired(bid: Bid): boolean {
    return bid.expires_at !== null && this.ctx.store.now() >= bid.expires_at;
  }
}

function requirePending(bid: Bid): void {
  if (bid.state !== 'pending') {
    throw new ValidationError(`Bid ${bid.id} is not pending (state: ${bid.state})`);
  }
}

function requireBuyer(caller: string, bid: Bid): void {
  if (bid.bidder !== caller) {
    throw new AuthorizationError(`Only the bidder of bid ${bid.id} can do this`);
  }
}

function requireListedFor(property: Property, action: BidAction): void {
  const wanted = action === 'purchase' ? 'listed_for_sale' : 'listed_for_lease';
  if (property.status !== wanted) {
    throw new ValidationError(
      `Property ${property.id} is not listed for ${action === 'purchase' ? 'sale' : 'lease'}`
    );
  }
}

/** Parse the deposit message: {"property_id", "action", "token_account"}. */
export function parseBidMessage(text: string): BidMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new ValidationError('Invalid bid message: expected JSON');
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ValidationError('Invalid bid message: expected an object');
  }

  const propertyId = 'property_id' in parsed ? parsed.property_id : undefined;
  const action = 'action' in parsed ? parsed.action : undefined;
  const tokenAccount = 'token_account' in parsed ? parsed.token_account : undefined;

  const id = typeof propertyId === 'string' && /^\d+$/.test(propertyId) ? Number(propertyId) : propertyId;
  if (typeof id !== 'number' || !Number.isSafeInteger(id) || id <= 0) {
    throw new ValidationError('Invalid bid message: property_id must be a positive integer');
  }
  const normalized = typeof action === 'string' ? action.toLowerCase() : '';
  const bidAction = BID_ACTION_VALUES.find((a) => a === normalized);
  if (bidAction === undefined) {
    throw new ValidationError('Invalid bid message: action must be purchase or lease');
  }
  if (typeof tokenAccount !== 'string' || tokenAccount.length === 0) {
    throw new ValidationError('Invalid bid message: token_account is required');
  }

  return { property_id: id, action: bidAction, token_account: tokenAccount };
}
