import { ArithmeticError, ValidationError } from './errors';

/** Largest amount the ledger can hold (2^128 - 1 base units). */
export const U128_MAX = (1n << 128n) - 1n;

export function checkedAdd(a: bigint, b: bigint, what: string): bigint {
  const result = a + b;
  if (result > U128_MAX) {
    throw new ArithmeticError(`Overflow in ${what}`);
  }
  return result;
}

export function checkedSub(a: bigint, b: bigint, what: string): bigint {
  if (b > a) {
    throw new ArithmeticError(`Underflow in ${what}`);
  }
  return a - b;
}

/**
 * Parse an amount given as a decimal string, a bigint or a safe integer.
 * Amounts are whole base units; no decimals or signs.
 */
export function parseAmount(value: unknown, field: string = 'amount'): bigint {
  if (typeof value === 'bigint') {
    if (value < 0n || value > U128_MAX) {
      throw new ValidationError(`${field} is out of range`);
    }
    return value;
  }
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new ValidationError(`${field} must be a non-negative integer`);
    }
    return BigInt(value);
  }
  if (typeof value !== 'string' || !/^\d{1,39}$/.test(value)) {
    throw new ValidationError(`${field} must be a decimal string of base units`);
  }
  const parsed = BigInt(value);
  if (parsed > U128_MAX) {
    throw new ValidationError(`${field} is out of range`);
  }
  return parsed;
}

export function sumAmounts(values: bigint[], what: string): bigint {
  return values.reduce((total, v) => checkedAdd(total, v, what), 0n);
}
