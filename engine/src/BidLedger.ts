import { Store } from './Store';
import { NotFoundError } from './errors';
import { assertTransition } from './BidStateMachine';
import { BID_STATES, oneOf, parseBidRow } from './rows';
import type { Bid, BidAction, BidRow, BidState, BidTransition } from './types';

export interface NewBid {
  property_id: number;
  bidder: string;
  token: string;
  amount: bigint;
  action: BidAction;
  expires_at: number | null;
}

/** Non-state fields a transition or commit may rewrite. */
export interface BidPatch {
  held_amount?: bigint;
  retained_amount?: bigint;
  document_token_id?: string;
  docs_confirmed_at?: number;
  dispute_reason?: string;
  refunded_at?: number;
}

interface TransitionRow {
  bid_id: number;
  from_state: string | null;
  to_state: string;
  actor: string | null;
  timestamp: number;
}

/**
 * Bid records with lookups by property and by bidder. State changes go
 * through `transition`, which enforces the graph and appends to history.
 */
export class BidLedger {
  constructor(private readonly store: Store) {}

  insert(bid: NewBid): Bid {
    const now = this.store.now();
    const result = this.store.db.prepare(`
      INSERT INTO bids (property_id, bidder, token, amount, held_amount, action, state, created_at, updated_at, expires_at)
      VALUES (?, ?, ?, ?, ?, ?, 'pending', ?, ?, ?)
    `).run(
      bid.property_id,
      bid.bidder,
      bid.token,
      bid.amount.toString(),
      bid.amount.toString(),
      bid.action,
      now,
      now,
      bid.expires_at
    );

    const id = Number(result.lastInsertRowid);
    this.appendHistory(id, null, 'pending', bid.bidder);
    return this.require(id);
  }

  get(id: number): Bid | null {
    const row = this.store.db.prepare<unknown[], BidRow>('SELECT * FROM bids WHERE id = ?').get(id);
    return row ? parseBidRow(row) : null;
  }

  require(id: number): Bid {
    const bid = this.get(id);
    if (!bid) {
      throw new NotFoundError(`Bid ${id} not found`);
    }
    return bid;
  }

  byProperty(propertyId: number): Bid[] {
    return this.store.db.prepare<unknown[], BidRow>(
      'SELECT * FROM bids WHERE property_id = ? ORDER BY id ASC'
    ).all(propertyId).map(parseBidRow);
  }

  byBidder(bidder: string): Bid[] {
    return this.store.db.prepare<unknown[], BidRow>(
      'SELECT * FROM bids WHERE bidder = ? ORDER BY id ASC'
    ).all(bidder).map(parseBidRow);
  }

  /** Pending bids on a property that still hold funds. */
  openByProperty(propertyId: number, excludeId?: number): Bid[] {
    return this.byProperty(propertyId).filter(
      (b) => b.state === 'pending' && b.held_amount > 0n && b.id !== excludeId
    );
  }

  transition(bid: Bid, to: BidState, actor: string | null, patch: BidPatch = {}): Bid {
    assertTransition(bid.state, to);
    this.store.db.prepare(
      'UPDATE bids SET state = ?, updated_at = ? WHERE id = ?'
    ).run(to, this.store.now(), bid.id);
    this.appendHistory(bid.id, bid.state, to, actor);
    this.patch(bid.id, patch);

    this.store.emit('bid.state_changed', {
      bid_id: bid.id,
      property_id: bid.property_id,
      from: bid.state,
      to,
      actor,
    });
    return this.require(bid.id);
  }

  patch(id: number, patch: BidPatch): void {
    const sets: string[] = [];
    const values: (string | number)[] = [];

    if (patch.held_amount !== undefined) {
      sets.push('held_amount = ?');
      values.push(patch.held_amount.toString());
    }
    if (patch.retained_amount !== undefined) {
      sets.push('retained_amount = ?');
      values.push(patch.retained_amount.toString());
    }
    if (patch.document_token_id !== undefined) {
      sets.push('document_token_id = ?');
      values.push(patch.document_token_id);
    }
    if (patch.docs_confirmed_at !== undefined) {
      sets.push('docs_confirmed_at = ?');
      values.push(patch.docs_confirmed_at);
    }
    if (patch.dispute_reason !== undefined) {
      sets.push('dispute_reason = ?');
      values.push(patch.dispute_reason);
    }
    if (patch.refunded_at !== undefined) {
      sets.push('refunded_at = ?');
      values.push(patch.refunded_at);
    }
    if (sets.length === 0) return;

    this.store.db.prepare(`UPDATE bids SET ${sets.join(', ')} WHERE id = ?`).run(...values, id);
  }

  history(id: number): BidTransition[] {
    return this.store.db.prepare<unknown[], TransitionRow>(
      'SELECT bid_id, from_state, to_state, actor, timestamp FROM bid_transitions WHERE bid_id = ? ORDER BY id ASC'
    ).all(id).map((row) => ({
      bid_id: row.bid_id,
      from_state: row.from_state === null ? null : oneOf(BID_STATES, row.from_state, 'bid state'),
      to_state: oneOf(BID_STATES, row.to_state, 'bid state'),
      actor: row.actor,
      timestamp: row.timestamp,
    }));
  }

  private appendHistory(id: number, from: BidState | null, to: BidState, actor: string | null): void {
    this.store.db.prepare(`
      INSERT INTO bid_transitions (bid_id, from_state, to_state, actor, timestamp)
      VALUES (?, ?, ?, ?, ?)
    `).run(id, from, to, actor, this.store.now());
  }
}
