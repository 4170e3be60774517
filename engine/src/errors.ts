export type MarketErrorCode =
  | 'validation'
  | 'not_found'
  | 'authorization'
  | 'arithmetic'
  | 'external_call'
  | 'timelock'
  | 'reentrancy';

/**
 * Base class for every rejection the engine raises. A rejected operation
 * leaves all entities unchanged.
 */
export class MarketError extends Error {
  constructor(
    message: string,
    public readonly code: MarketErrorCode,
  ) {
    super(message);
    this.name = 'MarketError';
  }
}

export class ValidationError extends MarketError {
  constructor(message: string, code: 'validation' | 'not_found' = 'validation') {
    super(message, code);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends ValidationError {
  constructor(message: string) {
    super(message, 'not_found');
    this.name = 'NotFoundError';
  }
}

export class AuthorizationError extends MarketError {
  constructor(message: string) {
    super(message, 'authorization');
    this.name = 'AuthorizationError';
  }
}

export class ArithmeticError extends MarketError {
  constructor(message: string) {
    super(message, 'arithmetic');
    this.name = 'ArithmeticError';
  }
}

export class ExternalCallFailure extends MarketError {
  constructor(message: string) {
    super(message, 'external_call');
    this.name = 'ExternalCallFailure';
  }
}

export class TimelockNotElapsed extends MarketError {
  constructor(
    message: string,
    public readonly availableAt: number,
  ) {
    super(message, 'timelock');
    this.name = 'TimelockNotElapsed';
  }
}

export class ReentrancyViolation extends MarketError {
  constructor(
    message: string,
    public readonly key: string,
  ) {
    super(message, 'reentrancy');
    this.name = 'ReentrancyViolation';
  }
}
