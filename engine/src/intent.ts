import type { Continuation } from './types';

// Typed reads of a continuation's stored intent. A missing or mistyped
// field means the row was written by a different handler version.

export function intentNumber(continuation: Continuation, key: string): number {
  const value = continuation.intent[key];
  if (typeof value !== 'number') {
    throw new Error(`Settlement ${continuation.id} intent is missing number field ${key}`);
  }
  return value;
}

export function intentString(continuation: Continuation, key: string): string {
  const value = continuation.intent[key];
  if (typeof value !== 'string') {
    throw new Error(`Settlement ${continuation.id} intent is missing string field ${key}`);
  }
  return value;
}

export function intentAmount(continuation: Continuation, key: string): bigint {
  return BigInt(intentString(continuation, key));
}

export function intentOneOf<T extends string>(
  continuation: Continuation,
  key: string,
  values: readonly T[],
): T {
  const value = intentString(continuation, key);
  const match = values.find((v) => v === value);
  if (match === undefined) {
    throw new Error(`Settlement ${continuation.id} intent has unexpected ${key}: ${value}`);
  }
  return match;
}
