import { Store } from './Store';
import { TimelockNotElapsed, ValidationError } from './errors';
import type { ConfigRow, TimelockSettings } from './types';

export type TimelockName = keyof TimelockSettings;

const DAY = 24 * 60 * 60;

export const DEFAULT_TIMELOCKS: TimelockSettings = {
  bid_expiry: 7 * DAY,
  escrow_release_delay: DAY,
  lost_bid_claim_delay: DAY,
  lock_recovery_delay: 60 * 60,
};

const TIMELOCK_NAMES: readonly TimelockName[] = [
  'bid_expiry',
  'escrow_release_delay',
  'lost_bid_claim_delay',
  'lock_recovery_delay',
];

// Ten years; guards against unit mix-ups (milliseconds instead of seconds)
const MAX_DURATION = 10 * 365 * DAY;

export class TimelockPolicy {
  constructor(private readonly store: Store) {}

  all(): TimelockSettings {
    const row = this.store.db.prepare<unknown[], ConfigRow>(
      'SELECT * FROM market_config WHERE id = 1'
    ).get();
    if (!row) return { ...DEFAULT_TIMELOCKS };
    return {
      bid_expiry: row.bid_expiry,
      escrow_release_delay: row.escrow_release_delay,
      lost_bid_claim_delay: row.lost_bid_claim_delay,
      lock_recovery_delay: row.lock_recovery_delay,
    };
  }

  get(name: TimelockName): number {
    return this.all()[name];
  }

  /** Callers check ownership; this only validates and writes. */
  set(update: Partial<TimelockSettings>): TimelockSettings {
    const next = { ...this.all() };
    for (const name of TIMELOCK_NAMES) {
      const value = update[name];
      if (value === undefined) continue;
      validateDuration(name, value);
      next[name] = value;
    }

    this.store.db.prepare(`
      UPDATE market_config
      SET bid_expiry = ?, escrow_release_delay = ?, lost_bid_claim_delay = ?, lock_recovery_delay = ?
      WHERE id = 1
    `).run(next.bid_expiry, next.escrow_release_delay, next.lost_bid_claim_delay, next.lock_recovery_delay);

    return next;
  }

  /** Throws unless `name`'s duration has passed since `since`. */
  requireElapsed(name: TimelockName, since: number, label: string = name): void {
    const availableAt = since + this.get(name);
    const now = this.store.now();
    if (now < availableAt) {
      throw new TimelockNotElapsed(
        `${label} not yet available: ${availableAt - now}s remaining`,
        availableAt
      );
    }
  }
}

export function validateDuration(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(`${name} must be a non-negative integer number of seconds`);
  }
  if (value > MAX_DURATION) {
    throw new ValidationError(`${name} exceeds the maximum of ${MAX_DURATION} seconds`);
  }
}
