import { describe, it, expect } from 'vitest';
import { U128_MAX, checkedAdd, checkedSub, parseAmount } from '../src/amount';
import { ArithmeticError, ValidationError } from '../src/errors';

describe('checked arithmetic', () => {
  it('adds up to the 128-bit ceiling', () => {
    expect(checkedAdd(U128_MAX - 1n, 1n, 'test')).toBe(U128_MAX);
  });

  it('rejects overflow past 2^128 - 1', () => {
    expect(() => checkedAdd(U128_MAX, 1n, 'balance credit')).toThrow(ArithmeticError);
    expect(() => checkedAdd(U128_MAX, 1n, 'balance credit')).toThrow('Overflow in balance credit');
  });

  it('subtracts down to zero', () => {
    expect(checkedSub(5n, 5n, 'test')).toBe(0n);
  });

  it('rejects underflow below zero', () => {
    expect(() => checkedSub(5n, 6n, 'balance debit')).toThrow('Underflow in balance debit');
  });
});

describe('parseAmount', () => {
  it('parses decimal strings of base units', () => {
    expect(parseAmount('1000')).toBe(1000n);
    expect(parseAmount('340282366920938463463374607431768211455')).toBe(U128_MAX);
  });

  it('accepts safe integers and bigints', () => {
    expect(parseAmount(42)).toBe(42n);
    expect(parseAmount(7n)).toBe(7n);
  });

  it('rejects values above 2^128 - 1', () => {
    expect(() => parseAmount('340282366920938463463374607431768211456')).toThrow('amount is out of range');
  });

  it('rejects signs, decimals and non-numeric input', () => {
    expect(() => parseAmount('-1')).toThrow(ValidationError);
    expect(() => parseAmount('1.5', 'price')).toThrow('price must be a decimal string of base units');
    expect(() => parseAmount(1.5)).toThrow('amount must be a non-negative integer');
    expect(() => parseAmount(null)).toThrow(ValidationError);
  });
});
