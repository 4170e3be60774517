// ============== Enums ==============

export type PropertyStatus = 'listed_for_sale' | 'listed_for_lease' | 'sold' | 'leased' | 'delisted';

export type BidAction = 'purchase' | 'lease';

export type BidState =
  | 'pending'
  | 'accepted'
  | 'docs_released'
  | 'docs_confirmed'
  | 'payment_released'
  | 'completed'
  | 'rejected'
  | 'cancelled'
  | 'expired'
  | 'refunded'
  | 'disputed';

export type DisputeStatus = 'none' | 'raised' | 'pending_tenant_response' | 'resolved';

export type DisputeWinner = 'tenant' | 'owner';

export type BidDisputeWinner = 'buyer' | 'seller';

export type ContinuationStatus = 'pending' | 'committed' | 'rolled_back' | 'abandoned';

export type SettlementKind =
  | 'accept_bid'
  | 'release_escrow'
  | 'refund_bid'
  | 'dispute_payout'
  | 'escrow_return'
  | 'expire_lease'
  | 'withdraw_surplus';

/** Why a bid is being refunded; decides the state path the refund commits. */
export type RefundReason =
  | 'rejected'
  | 'cancelled'
  | 'outbid'
  | 'lost_bid'
  | 'expired'
  | 'escrow_timeout'
  | 'dispute'
  | 'admin_refund';

// ============== Core Types ==============

export interface Property {
  id: number;
  owner: string;
  status: PropertyStatus;
  price: bigint;
  lease_duration: number;
  damage_escrow: bigint;
  active_lease_id: number | null;
  sold_to: string | null;
  sold_at: number | null;
  created_at: number;
  updated_at: number;
}

export interface Bid {
  id: number;
  property_id: number;
  bidder: string;
  token: string;
  amount: bigint;
  /** Part of the bid still in custody */
  held_amount: bigint;
  /** Damage escrow kept back from the seller on lease bids */
  retained_amount: bigint;
  action: BidAction;
  state: BidState;
  created_at: number;
  updated_at: number;
  expires_at: number | null;
  document_token_id: string | null;
  docs_confirmed_at: number | null;
  dispute_reason: string | null;
  refunded_at: number | null;
}

export interface BidTransition {
  bid_id: number;
  from_state: BidState | null;
  to_state: BidState;
  actor: string | null;
  timestamp: number;
}

export interface DisputeInfo {
  status: DisputeStatus;
  reason: string | null;
  raised_by: string | null;
  votes_for_tenant: number;
  votes_for_owner: number;
  oracle_nonce: number | null;
  tenant_response: string | null;
  winner: DisputeWinner | null;
  resolved_by: string | null;
  resolved_at: number | null;
}

export interface Lease {
  id: number;
  property_id: number;
  bid_id: number | null;
  tenant: string;
  owner: string;
  token: string;
  start_time: number;
  duration: number;
  escrow_amount: bigint;
  active: boolean;
  escrow_beneficiary: string;
  closed_at: number | null;
  dispute: DisputeInfo;
}

export interface TimelockSettings {
  bid_expiry: number;
  escrow_release_delay: number;
  lost_bid_claim_delay: number;
  lock_recovery_delay: number;
}

export interface MarketConfig {
  owner: string;
  oracle_account: string | null;
  timelocks: TimelockSettings;
  supported_tokens: string[];
  admins: string[];
}

/** Flat key/value description of what a settlement commits. */
export type IntentValue = string | number | boolean | null;
export type SettlementIntent = Record<string, IntentValue>;

export interface Continuation {
  id: number;
  kind: SettlementKind;
  entity_id: number;
  lock_keys: string[];
  recipient: string;
  token: string;
  amount: bigint;
  memo: string;
  intent: SettlementIntent;
  status: ContinuationStatus;
  failure_reason: string | null;
  created_at: number;
  resolved_at: number | null;
}

export interface SolvencyReport {
  token: string;
  balance: bigint;
  obligations: bigint;
  surplus: bigint;
  solvent: boolean;
}

// ============== Raw Row Types (SQLite) ==============

export interface PropertyRow {
  id: number;
  owner: string;
  status: string;
  price: string;
  lease_duration: number;
  damage_escrow: string;
  active_lease_id: number | null;
  sold_to: string | null;
  sold_at: number | null;
  created_at: number;
  updated_at: number;
}

export interface BidRow {
  id: number;
  property_id: number;
  bidder: string;
  token: string;
  amount: string;
  held_amount: string;
  retained_amount: string;
  action: string;
  state: string;
  created_at: number;
  updated_at: number;
  expires_at: number | null;
  document_token_id: string | null;
  docs_confirmed_at: number | null;
  dispute_reason: string | null;
  refunded_at: number | null;
}

export interface LeaseRow {
  id: number;
  property_id: number;
  bid_id: number | null;
  tenant: string;
  owner: string;
  token: string;
  start_time: number;
  duration: number;
  escrow_amount: string;
  active: number;
  escrow_beneficiary: string;
  closed_at: number | null;
  dispute_status: string;
  dispute_reason: string | null;
  raised_by: string | null;
  votes_for_tenant: number;
  votes_for_owner: number;
  oracle_nonce: number | null;
  tenant_response: string | null;
  dispute_winner: string | null;
  resolved_by: string | null;
  resolved_at: number | null;
}

export interface ContinuationRow {
  id: number;
  kind: string;
  entity_id: number;
  lock_keys: string;
  recipient: string;
  token: string;
  amount: string;
  memo: string;
  intent: string;
  status: string;
  failure_reason: string | null;
  created_at: number;
  resolved_at: number | null;
}

export interface ConfigRow {
  owner: string;
  oracle_account: string | null;
  bid_expiry: number;
  escrow_release_delay: number;
  lost_bid_claim_delay: number;
  lock_recovery_delay: number;
  oracle_nonce: number;
}

// ============== Inputs ==============

export interface ListingInput {
  status: 'listed_for_sale' | 'listed_for_lease';
  price: bigint;
  /** Seconds; required for lease listings */
  lease_duration?: number;
  damage_escrow?: bigint;
}

export interface DepositNotification {
  sender: string;
  amount: bigint;
  /** JSON: {"property_id", "action", "token_account"} */
  message: string;
}

export interface DepositResult {
  bid: Bid;
  /** Amount the token account should hand back to the sender */
  unused: bigint;
}

export interface OracleResolution {
  leaseId: number;
  nonce: number;
  winner: DisputeWinner;
  payoutAmount: bigint;
}

export type ForceUnlockResolution = 'commit' | 'abandon';
