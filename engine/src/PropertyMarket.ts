import Database from 'better-sqlite3';
import { Store, systemClock } from './Store';
import type { Clock, Logger } from './Store';
import { AccessControl } from './AccessControl';
import { BalanceLedger } from './BalanceLedger';
import { BidLedger } from './BidLedger';
import { BidLifecycle } from './BidLifecycle';
import { DisputeResolver } from './DisputeResolver';
import type { OracleClient } from './DisputeResolver';
import { LeaseLedger } from './LeaseLedger';
import { LeaseManager } from './LeaseManager';
import { LockRegistry } from './LockRegistry';
import { PropertyRegistry } from './PropertyRegistry';
import { SettlementCoordinator } from './SettlementCoordinator';
import type { TokenRail } from './SettlementCoordinator';
import { DEFAULT_TIMELOCKS, TimelockPolicy, validateDuration } from './TimelockPolicy';
import { TokenWhitelist } from './TokenWhitelist';
import { Treasury } from './Treasury';
import { migrate } from './db/schema';
import type { MarketContext } from './context';
import type { EventListener, EventQuery, MarketEvent } from './EventLog';
import type {
  Bid,
  BidTransition,
  Continuation,
  Lease,
  MarketConfig,
  Property,
  SolvencyReport,
  TimelockSettings,
} from './types';

export interface MarketOptions {
  db: Database.Database;
  /** Market owner; only used when the database has no configuration yet */
  owner: string;
  rail: TokenRail;
  oracle?: OracleClient;
  clock?: Clock;
  logger?: Logger;
  supportedTokens?: string[];
  admins?: string[];
  timelocks?: Partial<TimelockSettings>;
  oracleAccount?: string;
}

/**
 * Entry point wiring every component over one database. Operations live on
 * the sub-services; reads are exposed here.
 */
export class PropertyMarket {
  readonly store: Store;
  readonly properties: PropertyRegistry;
  readonly bids: BidLifecycle;
  readonly leases: LeaseManager;
  readonly disputes: DisputeResolver;
  readonly treasury: Treasury;
  readonly settlements: SettlementCoordinator;
  readonly access: AccessControl;
  readonly ledger: BalanceLedger;
  readonly locks: LockRegistry;
  readonly timelocks: TimelockPolicy;
  readonly tokens: TokenWhitelist;

  private readonly bidLedger: BidLedger;
  private readonly leaseLedger: LeaseLedger;

  constructor(options: MarketOptions) {
    migrate(options.db);
    this.store = new Store(options.db, options.clock ?? systemClock, options.logger ?? console);
    this.initialize(options);

    this.access = new AccessControl(this.store);
    this.ledger = new BalanceLedger(this.store);
    this.locks = new LockRegistry(this.store);
    this.timelocks = new TimelockPolicy(this.store);
    this.tokens = new TokenWhitelist(this.store);
    this.properties = new PropertyRegistry(this.store, this.access, this.locks);
    this.bidLedger = new BidLedger(this.store);
    this.leaseLedger = new LeaseLedger(this.store);
    this.settlements = new SettlementCoordinator(this.store, this.ledger, this.locks, options.rail);

    const ctx: MarketContext = {
      store: this.store,
      access: this.access,
      ledger: this.ledger,
      locks: this.locks,
      timelocks: this.timelocks,
      tokens: this.tokens,
      properties: this.properties,
      bids: this.bidLedger,
      leases: this.leaseLedger,
      settlements: this.settlements,
    };

    this.bids = new BidLifecycle(ctx);
    this.leases = new LeaseManager(ctx);
    this.disputes = new DisputeResolver(ctx, options.oracle ?? null);
    this.treasury = new Treasury(ctx);
  }

  // ============== Views ==============

  getConfig(): MarketConfig {
    return {
      owner: this.access.owner(),
      oracle_account: this.access.oracleAccount(),
      timelocks: this.timelocks.all(),
      supported_tokens: this.tokens.list(),
      admins: this.access.admins(),
    };
  }

  getProperty(id: number): Property | null {
    return this.properties.get(id);
  }

  getBid(id: number): Bid | null {
    return this.bidLedger.get(id);
  }

  getBidHistory(id: number): BidTransition[] {
    return this.bidLedger.history(id);
  }

  getBidsForProperty(propertyId: number): Bid[] {
    return this.bidLedger.byProperty(propertyId);
  }

  getBidsByBidder(bidder: string): Bid[] {
    return this.bidLedger.byBidder(bidder);
  }

  getLease(id: number): Lease | null {
    return this.leaseLedger.get(id);
  }

  getLeasesByTenant(tenant: string): Lease[] {
    return this.leaseLedger.byTenant(tenant);
  }

  getLeasesForProperty(propertyId: number): Lease[] {
    return this.leaseLedger.byProperty(propertyId);
  }

  balanceOf(token: string): bigint {
    return this.ledger.balanceOf(token);
  }

  auditSolvency(): SolvencyReport[] {
    return this.ledger.audit();
  }

  getContinuation(id: number): Continuation | null {
    return this.settlements.get(id);
  }

  pendingSettlements(): Continuation[] {
    return this.settlements.pending();
  }

  events(query?: EventQuery): MarketEvent[] {
    return this.store.events.list(query);
  }

  subscribe(listener: EventListener): () => void {
    return this.store.events.subscribe(listener);
  }

  /** Settle the outcome of a deferred transfer request. */
  settlementCallback(continuationId: number, success: boolean, reason?: string): Continuation {
    return success
      ? this.settlements.resolve(continuationId, { success: true })
      : this.settlements.resolve(continuationId, { success: false, reason: reason ?? 'transfer failed' });
  }

  /** Resolves once every background settlement has finished. */
  idle(): Promise<void> {
    return this.settlements.idle();
  }

  private initialize(options: MarketOptions): void {
    const { db } = this.store;
    const existing = db.prepare('SELECT 1 FROM market_config WHERE id = 1').get();
    if (existing !== undefined) return;

    const timelocks = { ...DEFAULT_TIMELOCKS, ...options.timelocks };
    for (const [name, value] of Object.entries(timelocks)) {
      validateDuration(name, value);
    }
    const now = this.store.now();

    this.store.atomic(() => {
      db.prepare(`
        INSERT INTO market_config (id, owner, oracle_account, bid_expiry, escrow_release_delay, lost_bid_claim_delay, lock_recovery_delay)
        VALUES (1, ?, ?, ?, ?, ?, ?)
      `).run(
        options.owner,
        options.oracleAccount ?? null,
        timelocks.bid_expiry,
        timelocks.escrow_release_delay,
        timelocks.lost_bid_claim_delay,
        timelocks.lock_recovery_delay
      );

      const addAdmin = db.prepare('INSERT OR IGNORE INTO admins (account, added_at) VALUES (?, ?)');
      for (const admin of [options.owner, ...(options.admins ?? [])]) {
        addAdmin.run(admin, now);
      }
      const addToken = db.prepare('INSERT OR IGNORE INTO supported_tokens (token, added_at) VALUES (?, ?)');
      for (const token of options.supportedTokens ?? []) {
        addToken.run(token, now);
      }
      this.store.emit('market.initialized', { owner: options.owner });
    });
    this.store.logger.log(`Market initialized with owner ${options.owner}`);
  }
}
