import type { Store } from './Store';
import type { AccessControl } from './AccessControl';
import type { BalanceLedger } from './BalanceLedger';
import type { BidLedger } from './BidLedger';
import type { LeaseLedger } from './LeaseLedger';
import type { LockRegistry } from './LockRegistry';
import type { PropertyRegistry } from './PropertyRegistry';
import type { SettlementCoordinator } from './SettlementCoordinator';
import type { TimelockPolicy } from './TimelockPolicy';
import type { TokenWhitelist } from './TokenWhitelist';

/** Components shared by the lifecycle services. */
export interface MarketContext {
  store: Store;
  access: AccessControl;
  ledger: BalanceLedger;
  locks: LockRegistry;
  timelocks: TimelockPolicy;
  tokens: TokenWhitelist;
  properties: PropertyRegistry;
  bids: BidLedger;
  leases: LeaseLedger;
  settlements: SettlementCoordinator;
}
