import { describe, it, expect, beforeEach, vi } from 'vitest';
import Database from 'better-sqlite3';
import { initDatabase } from '../src/db/schema';
import { Store } from '../src/Store';
import { BalanceLedger } from '../src/BalanceLedger';
import { LockRegistry } from '../src/LockRegistry';
import {
  assertTransition,
  canTransition,
  isLegalPath,
  isTerminal,
} from '../src/BidStateMachine';
import { ArithmeticError, ReentrancyViolation, TimelockNotElapsed, ValidationError } from '../src/errors';
import { U128_MAX } from '../src/amount';
import { DAY, START, TOKEN, createTestMarket } from './helpers';

/* ------------------------------------------------------------------ */
/*  Schema                                                              */
/* ------------------------------------------------------------------ */

describe('Database Schema', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = initDatabase(':memory:');
  });

  it('should create all required tables', () => {
    const tables = db.prepare<unknown[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type='table'"
    ).all();
    const tableNames = tables.map((t) => t.name);

    expect(tableNames).toContain('market_config');
    expect(tableNames).toContain('balances');
    expect(tableNames).toContain('properties');
    expect(tableNames).toContain('bids');
    expect(tableNames).toContain('bid_transitions');
    expect(tableNames).toContain('leases');
    expect(tableNames).toContain('dispute_votes');
    expect(tableNames).toContain('locks');
    expect(tableNames).toContain('continuations');
    expect(tableNames).toContain('lock_audit');
    expect(tableNames).toContain('events');
  });

  it('should be safe to initialize twice', () => {
    const { market } = createTestMarket({ db });
    const again = createTestMarket({ db, owner: 'someoneelse' });
    expect(again.market.getConfig().owner).toBe(market.getConfig().owner);
  });
});

/* ------------------------------------------------------------------ */
/*  Store & events                                                      */
/* ------------------------------------------------------------------ */

describe('Store', () => {
  let store: Store;

  beforeEach(() => {
    store = new Store(initDatabase(':memory:'), () => START, { log: vi.fn(), error: vi.fn() });
  });

  it('publishes events only after the outermost commit', () => {
    const seen: string[] = [];
    store.events.subscribe((e) => seen.push(e.event_name));

    store.atomic(() => {
      store.emit('outer.first', {});
      store.atomic(() => {
        store.emit('inner.second', {});
      });
      expect(seen).toEqual([]);
    });

    expect(seen).toEqual(['outer.first', 'inner.second']);
  });

  it('drops rows and events when the block throws', () => {
    const seen: string[] = [];
    store.events.subscribe((e) => seen.push(e.event_name));

    expect(() => store.atomic(() => {
      store.emit('doomed', { value: 1 });
      throw new ValidationError('nope');
    })).toThrow('nope');

    expect(seen).toEqual([]);
    expect(store.events.list()).toEqual([]);
  });

  it('keeps outer events when a nested block fails and is caught', () => {
    const seen: string[] = [];
    store.events.subscribe((e) => seen.push(e.event_name));

    store.atomic(() => {
      store.emit('kept', {});
      try {
        store.atomic(() => {
          store.emit('discarded', {});
          throw new Error('inner failure');
        });
      } catch {
        // expected
      }
    });

    expect(seen).toEqual(['kept']);
    expect(store.events.list().map((e) => e.event_name)).toEqual(['kept']);
  });

  it('stores records with version 1 and the clock time', () => {
    store.atomic(() => store.emit('bid.placed', { bid_id: 3, amount: '100' }));
    const [event] = store.events.list({ name: 'bid.placed' });

    expect(event.version).toBe(1);
    expect(event.timestamp).toBe(START);
    expect(event.data).toEqual({ bid_id: 3, amount: '100' });
  });
});

/* ------------------------------------------------------------------ */
/*  BalanceLedger                                                       */
/* ------------------------------------------------------------------ */

describe('BalanceLedger', () => {
  let ledger: BalanceLedger;

  beforeEach(() => {
    const store = new Store(initDatabase(':memory:'), () => START);
    ledger = new BalanceLedger(store);
  });

  it('starts every token at zero', () => {
    expect(ledger.balanceOf(TOKEN)).toBe(0n);
  });

  it('credits and debits with checked arithmetic', () => {
    ledger.credit(TOKEN, 100n);
    ledger.debit(TOKEN, 40n);
    expect(ledger.balanceOf(TOKEN)).toBe(60n);
  });

  it('rejects a debit below zero and leaves the balance unchanged', () => {
    ledger.credit(TOKEN, 10n);
    expect(() => ledger.debit(TOKEN, 11n)).toThrow(ArithmeticError);
    expect(ledger.balanceOf(TOKEN)).toBe(10n);
  });

  it('rejects a credit past 2^128 - 1', () => {
    ledger.credit(TOKEN, U128_MAX);
    expect(() => ledger.credit(TOKEN, 1n)).toThrow('Overflow in balance credit');
    expect(ledger.balanceOf(TOKEN)).toBe(U128_MAX);
  });

  it('keeps tokens separate', () => {
    ledger.credit(TOKEN, 5n);
    ledger.credit('eurc.token', 7n);
    expect(ledger.balanceOf(TOKEN)).toBe(5n);
    expect(ledger.balanceOf('eurc.token')).toBe(7n);
  });
});

/* ------------------------------------------------------------------ */
/*  LockRegistry                                                        */
/* ------------------------------------------------------------------ */

describe('LockRegistry', () => {
  let locks: LockRegistry;

  beforeEach(() => {
    locks = new LockRegistry(new Store(initDatabase(':memory:'), () => START));
  });

  it('grants free keys to a holder', () => {
    const token = locks.tryAcquire(['bid:1', 'property:1'], 7);
    expect(token).toEqual({ keys: ['bid:1', 'property:1'], holder: 7 });
    expect(locks.holderOf('property:1')).toBe(7);
  });

  it('refuses a held key with the key and holder', () => {
    locks.tryAcquire(['bid:1', 'property:1'], 7);

    try {
      locks.tryAcquire(['property:1'], 8);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ReentrancyViolation);
      if (err instanceof ReentrancyViolation) {
        expect(err.key).toBe('property:1');
        expect(err.message).toBe('property:1 is locked by in-flight settlement 7');
      }
    }
  });

  it('takes all keys or none', () => {
    locks.tryAcquire(['property:1'], 7);
    expect(() => locks.tryAcquire(['bid:2', 'property:1'], 9)).toThrow(ReentrancyViolation);
    expect(locks.isHeld('bid:2')).toBe(false);
  });

  it('releases idempotently', () => {
    locks.tryAcquire(['bid:1'], 7);
    locks.release('bid:1');
    locks.release('bid:1');
    expect(locks.isHeld('bid:1')).toBe(false);
    expect(locks.tryAcquire(['bid:1'], 8).holder).toBe(8);
  });
});

/* ------------------------------------------------------------------ */
/*  TimelockPolicy                                                      */
/* ------------------------------------------------------------------ */

describe('TimelockPolicy', () => {
  it('uses the default durations', () => {
    const { market } = createTestMarket();
    expect(market.timelocks.all()).toEqual({
      bid_expiry: 7 * DAY,
      escrow_release_delay: DAY,
      lost_bid_claim_delay: DAY,
      lock_recovery_delay: 3600,
    });
  });

  it('gates on the configured duration', () => {
    const { market, clock } = createTestMarket();

    try {
      market.timelocks.requireElapsed('escrow_release_delay', START);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(TimelockNotElapsed);
      if (err instanceof TimelockNotElapsed) {
        expect(err.availableAt).toBe(START + DAY);
        expect(err.message).toBe('escrow_release_delay not yet available: 86400s remaining');
      }
    }

    clock.advance(DAY);
    expect(() => market.timelocks.requireElapsed('escrow_release_delay', START)).not.toThrow();
  });

  it('rejects negative and fractional durations', () => {
    const { market } = createTestMarket();
    expect(() => market.timelocks.set({ bid_expiry: -1 })).toThrow(ValidationError);
    expect(() => market.timelocks.set({ bid_expiry: 1.5 })).toThrow(ValidationError);
    expect(market.timelocks.get('bid_expiry')).toBe(7 * DAY);
  });
});

/* ------------------------------------------------------------------ */
/*  Bid state machine                                                   */
/* ------------------------------------------------------------------ */

describe('BidStateMachine', () => {
  it('allows the documented edges', () => {
    expect(canTransition('pending', 'accepted')).toBe(true);
    expect(canTransition('pending', 'completed')).toBe(true);
    expect(canTransition('expired', 'refunded')).toBe(true);
    expect(canTransition('docs_confirmed', 'payment_released')).toBe(true);
    expect(canTransition('disputed', 'refunded')).toBe(true);
  });

  it('rejects everything else', () => {
    expect(canTransition('completed', 'refunded')).toBe(false);
    expect(canTransition('pending', 'payment_released')).toBe(false);
    expect(canTransition('docs_confirmed', 'refunded')).toBe(false);
    expect(() => assertTransition('refunded', 'pending')).toThrow('Invalid bid transition: refunded -> pending');
  });

  it('marks terminal states', () => {
    expect(isTerminal('completed')).toBe(true);
    expect(isTerminal('refunded')).toBe(true);
    expect(isTerminal('expired')).toBe(false);
  });

  it('checks whole paths', () => {
    expect(isLegalPath(['pending', 'accepted', 'docs_released', 'docs_confirmed', 'payment_released', 'completed'])).toBe(true);
    expect(isLegalPath(['pending', 'expired', 'refunded'])).toBe(true);
    expect(isLegalPath(['pending', 'docs_released'])).toBe(false);
  });
});
