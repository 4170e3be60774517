import { ValidationError } from './errors';
import type { BidState, RefundReason } from './types';

/** Legal bid transitions. Anything not listed here is rejected. */
export const BID_TRANSITIONS: Readonly<Record<BidState, readonly BidState[]>> = {
  pending: ['completed', 'rejected', 'cancelled', 'expired', 'accepted'],
  expired: ['refunded'],
  accepted: ['docs_released', 'disputed', 'refunded'],
  docs_released: ['docs_confirmed', 'disputed', 'refunded'],
  docs_confirmed: ['payment_released', 'disputed'],
  payment_released: ['completed'],
  // Admin resolution of a bid dispute: refund the buyer or pay the seller
  disputed: ['refunded', 'payment_released'],
  completed: [],
  rejected: [],
  cancelled: [],
  refunded: [],
};

/** States in which the bid's funds are locked into the escrow flow. */
export const ESCROW_STATES: readonly BidState[] = [
  'accepted',
  'docs_released',
  'docs_confirmed',
  'payment_released',
  'disputed',
];

export const DISPUTABLE_STATES: readonly BidState[] = ['accepted', 'docs_released', 'docs_confirmed'];

/**
 * State path each refund reason commits, starting from the bid's current
 * state. `expired` passes through the expired state on its way out.
 */
export const REFUND_PATHS: Readonly<Record<RefundReason, readonly BidState[]>> = {
  rejected: ['rejected'],
  cancelled: ['cancelled'],
  outbid: ['rejected'],
  lost_bid: ['rejected'],
  expired: ['expired', 'refunded'],
  escrow_timeout: ['refunded'],
  admin_refund: ['cancelled'],
  dispute: ['refunded'],
};

export function canTransition(from: BidState, to: BidState): boolean {
  return BID_TRANSITIONS[from].includes(to);
}

export function assertTransition(from: BidState, to: BidState): void {
  if (!canTransition(from, to)) {
    throw new ValidationError(`Invalid bid transition: ${from} -> ${to}`);
  }
}

export function isTerminal(state: BidState): boolean {
  return BID_TRANSITIONS[state].length === 0;
}

/** True when every consecutive pair in `states` is a legal edge. */
export function isLegalPath(states: BidState[]): boolean {
  for (let i = 1; i < states.length; i++) {
    if (!canTransition(states[i - 1], states[i])) return false;
  }
  return true;
}
