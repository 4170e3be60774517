import { expect, vi } from 'vitest';
import { initDatabase } from '../src/db/schema';
import { PropertyMarket } from '../src/PropertyMarket';
import type { MarketOptions } from '../src/PropertyMarket';
import type { TokenRail, TransferAck, TransferRequest } from '../src/SettlementCoordinator';
import type { OracleClient, OracleRequest } from '../src/DisputeResolver';
import type { Property, SolvencyReport } from '../src/types';

export const OWNER = 'marketowner';
export const TOKEN = 'usdc.token';
export const START = 1_700_000_000;
export const DAY = 86_400;

export type RailMode = 'commit' | 'fail' | 'defer' | 'throw';

/** In-process token rail; records requests and answers per `mode`. */
export class FakeRail implements TokenRail {
  requests: TransferRequest[] = [];
  mode: RailMode = 'commit';
  /** Recipients whose transfers always fail */
  failFor = new Set<string>();

  async requestTransfer(request: TransferRequest): Promise<TransferAck> {
    this.requests.push(request);
    if (this.failFor.has(request.recipient)) {
      return { status: 'failed', reason: 'recipient account frozen' };
    }
    switch (this.mode) {
      case 'fail':
        return { status: 'failed', reason: 'insufficient liquidity' };
      case 'defer':
        return { status: 'deferred' };
      case 'throw':
        throw new Error('connection reset');
      default:
        return { status: 'committed' };
    }
  }
}

export class FakeOracle implements OracleClient {
  requests: OracleRequest[] = [];
  fail = false;

  async requestResolution(request: OracleRequest): Promise<void> {
    this.requests.push(request);
    if (this.fail) {
      throw new Error('oracle unreachable');
    }
  }
}

export interface TestMarket {
  market: PropertyMarket;
  rail: FakeRail;
  oracle: FakeOracle;
  clock: { now: number; advance(seconds: number): void };
}

export function createTestMarket(overrides: Partial<MarketOptions> = {}): TestMarket {
  const rail = new FakeRail();
  const oracle = new FakeOracle();
  const clock = {
    now: START,
    advance(seconds: number) {
      this.now += seconds;
    },
  };

  const market = new PropertyMarket({
    db: initDatabase(':memory:'),
    owner: OWNER,
    rail,
    oracle,
    clock: () => clock.now,
    logger: { log: vi.fn(), error: vi.fn() },
    supportedTokens: [TOKEN],
    admins: ['admin1', 'admin2'],
    oracleAccount: 'oracle',
    ...overrides,
  });

  return { market, rail, oracle, clock };
}

export function listForSale(market: PropertyMarket, seller: string = 'alice', price: bigint = 100n): Property {
  return market.properties.register(seller, { status: 'listed_for_sale', price });
}

export function listForLease(
  market: PropertyMarket,
  landlord: string = 'alice',
  damageEscrow: bigint = 30n,
  duration: number = 30 * DAY,
): Property {
  return market.properties.register(landlord, {
    status: 'listed_for_lease',
    price: 100n,
    lease_duration: duration,
    damage_escrow: damageEscrow,
  });
}

export function bidMessage(propertyId: number, action: 'purchase' | 'lease', token: string = TOKEN): string {
  return JSON.stringify({ property_id: propertyId, action, token_account: token });
}

export function placeBid(
  market: PropertyMarket,
  bidder: string,
  propertyId: number,
  amount: bigint,
  action: 'purchase' | 'lease' = 'purchase',
): number {
  const { bid } = market.bids.deposit(TOKEN, {
    sender: bidder,
    amount,
    message: bidMessage(propertyId, action),
  });
  return bid.id;
}

/** States a bid has been in, oldest first. */
export function statePath(market: PropertyMarket, bidId: number): string[] {
  return market.getBidHistory(bidId).map((t) => t.to_state);
}

/** Every token balance covers what the market owes out of it. */
export function expectSolvent(market: PropertyMarket): void {
  expect(market.auditSolvency().filter((r) => !r.solvent)).toEqual([]);
}

/** Audit after every committed operation; collects the reports that fail. */
export function trackSolvency(market: PropertyMarket): SolvencyReport[] {
  const failures: SolvencyReport[] = [];
  market.subscribe(() => {
    failures.push(...market.auditSolvency().filter((r) => !r.solvent));
  });
  return failures;
}
