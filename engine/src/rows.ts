import type {
  Bid,
  BidAction,
  BidRow,
  BidState,
  Continuation,
  ContinuationRow,
  ContinuationStatus,
  DisputeStatus,
  DisputeWinner,
  Lease,
  LeaseRow,
  Property,
  PropertyRow,
  PropertyStatus,
  SettlementIntent,
  SettlementKind,
} from './types';

export const PROPERTY_STATUSES: readonly PropertyStatus[] = [
  'listed_for_sale', 'listed_for_lease', 'sold', 'leased', 'delisted',
];
export const BID_ACTIONS: readonly BidAction[] = ['purchase', 'lease'];
export const BID_STATES: readonly BidState[] = [
  'pending', 'accepted', 'docs_released', 'docs_confirmed', 'payment_released',
  'completed', 'rejected', 'cancelled', 'expired', 'refunded', 'disputed',
];
export const DISPUTE_STATUSES: readonly DisputeStatus[] = [
  'none', 'raised', 'pending_tenant_response', 'resolved',
];
export const DISPUTE_WINNERS: readonly DisputeWinner[] = ['tenant', 'owner'];
export const CONTINUATION_STATUSES: readonly ContinuationStatus[] = [
  'pending', 'committed', 'rolled_back', 'abandoned',
];
export const SETTLEMENT_KINDS: readonly SettlementKind[] = [
  'accept_bid', 'release_escrow', 'refund_bid', 'dispute_payout',
  'escrow_return', 'expire_lease', 'withdraw_surplus',
];

/** Narrow a stored string to one of the allowed literals. */
export function oneOf<T extends string>(values: readonly T[], value: string, field: string): T {
  const match = values.find((v) => v === value);
  if (match === undefined) {
    throw new Error(`Corrupt ${field} value in database: ${value}`);
  }
  return match;
}

export function parsePropertyRow(row: PropertyRow): Property {
  return {
    id: row.id,
    owner: row.owner,
    status: oneOf(PROPERTY_STATUSES, row.status, 'property status'),
    price: BigInt(row.price),
    lease_duration: row.lease_duration,
    damage_escrow: BigInt(row.damage_escrow),
    active_lease_id: row.active_lease_id,
    sold_to: row.sold_to,
    sold_at: row.sold_at,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

export function parseBidRow(row: BidRow): Bid {
  return {
    id: row.id,
    property_id: row.property_id,
    bidder: row.bidder,
    token: row.token,
    amount: BigInt(row.amount),
    held_amount: BigInt(row.held_amount),
    retained_amount: BigInt(row.retained_amount),
    action: oneOf(BID_ACTIONS, row.action, 'bid action'),
    state: oneOf(BID_STATES, row.state, 'bid state'),
    created_at: row.created_at,
    updated_at: row.updated_at,
    expires_at: row.expires_at,
    document_token_id: row.document_token_id,
    docs_confirmed_at: row.docs_confirmed_at,
    dispute_reason: row.dispute_reason,
    refunded_at: row.refunded_at,
  };
}

export function parseLeaseRow(row: LeaseRow): Lease {
  return {
    id: row.id,
    property_id: row.property_id,
    bid_id: row.bid_id,
    tenant: row.tenant,
    owner: row.owner,
    token: row.token,
    start_time: row.start_time,
    duration: row.duration,
    escrow_amount: BigInt(row.escrow_amount),
    active: row.active === 1,
    escrow_beneficiary: row.escrow_beneficiary,
    closed_at: row.closed_at,
    dispute: {
      status: oneOf(DISPUTE_STATUSES, row.dispute_status, 'dispute status'),
      reason: row.dispute_reason,
      raised_by: row.raised_by,
      votes_for_tenant: row.votes_for_tenant,
      votes_for_owner: row.votes_for_owner,
      oracle_nonce: row.oracle_nonce,
      tenant_response: row.tenant_response,
      winner: row.dispute_winner === null
        ? null
        : oneOf(DISPUTE_WINNERS, row.dispute_winner, 'dispute winner'),
      resolved_by: row.resolved_by,
      resolved_at: row.resolved_at,
    },
  };
}

export function parseContinuationRow(row: ContinuationRow): Continuation {
  return {
    id: row.id,
    kind: oneOf(SETTLEMENT_KINDS, row.kind, 'settlement kind'),
    entity_id: row.entity_id,
    lock_keys: parseStringArray(row.lock_keys),
    recipient: row.recipient,
    token: row.token,
    amount: BigInt(row.amount),
    memo: row.memo,
    intent: parseIntent(row.intent),
    status: oneOf(CONTINUATION_STATUSES, row.status, 'continuation status'),
    failure_reason: row.failure_reason,
    created_at: row.created_at,
    resolved_at: row.resolved_at,
  };
}

function parseStringArray(text: string): string[] {
  const parsed: unknown = JSON.parse(text);
  if (!Array.isArray(parsed)) return [];
  return parsed.filter((v): v is string => typeof v === 'string');
}

function parseIntent(text: string): SettlementIntent {
  const parsed: unknown = JSON.parse(text);
  const intent: SettlementIntent = {};
  if (typeof parsed !== 'object' || parsed === null) return intent;

  for (const [key, value] of Object.entries(parsed)) {
    if (
      value === null ||
      typeof value === 'string' ||
      typeof value === 'number' ||
      typeof value === 'boolean'
    ) {
      intent[key] = value;
    }
  }
  return intent;
}
