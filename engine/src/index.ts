// Main market
export { PropertyMarket } from './PropertyMarket';
export type { MarketOptions } from './PropertyMarket';

// Components
export { Store, systemClock } from './Store';
export type { Clock, Logger } from './Store';
export { EventLog, EVENT_VERSION } from './EventLog';
export type { EventData, EventListener, EventQuery, EventValue, MarketEvent } from './EventLog';
export { AccessControl } from './AccessControl';
export { BalanceLedger } from './BalanceLedger';
export { BidLedger } from './BidLedger';
export { BidLifecycle, parseBidMessage } from './BidLifecycle';
export { DisputeResolver } from './DisputeResolver';
export type { OracleClient, OracleRequest } from './DisputeResolver';
export { LeaseLedger } from './LeaseLedger';
export { LeaseManager } from './LeaseManager';
export type { LeaseSweepResult } from './LeaseManager';
export { LockRegistry, lockKeys } from './LockRegistry';
export type { LockToken } from './LockRegistry';
export { PropertyRegistry } from './PropertyRegistry';
export { SettlementCoordinator } from './SettlementCoordinator';
export type {
  SettlementHandler,
  SettlementOutcome,
  SettlementPlan,
  TokenRail,
  TransferAck,
  TransferRequest,
} from './SettlementCoordinator';
export { DEFAULT_TIMELOCKS, TimelockPolicy } from './TimelockPolicy';
export type { TimelockName } from './TimelockPolicy';
export { TokenWhitelist } from './TokenWhitelist';
export { Treasury } from './Treasury';
export type { ForceUnlockRequest } from './Treasury';

// State machine
export {
  BID_TRANSITIONS,
  ESCROW_STATES,
  REFUND_PATHS,
  assertTransition,
  canTransition,
  isLegalPath,
  isTerminal,
} from './BidStateMachine';

// Storage
export { initDatabase, migrate } from './db/schema';

// Errors
export {
  MarketError,
  ValidationError,
  NotFoundError,
  AuthorizationError,
  ArithmeticError,
  ExternalCallFailure,
  TimelockNotElapsed,
  ReentrancyViolation,
} from './errors';
export type { MarketErrorCode } from './errors';

// Amounts
export { U128_MAX, checkedAdd, checkedSub, parseAmount } from './amount';

// Types
export type * from './types';
