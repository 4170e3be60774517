/**
 * Request body validation. Failures throw the engine's ValidationError so
 * the route layer answers them like any other rejected input.
 */

import { ValidationError, parseAmount } from '@estate-escrow/engine';

export type Body = Record<string, unknown>;

export function readBody(value: unknown): Body {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return {};
  }
  const body: Body = {};
  for (const [key, field] of Object.entries(value)) {
    body[key] = field;
  }
  return body;
}

export function validateAccountName(name: unknown, field: string = 'account'): string {
  if (!name || typeof name !== 'string') {
    throw new ValidationError(`${field} is required`);
  }
  if (name.length > 12) {
    throw new ValidationError(`${field} must be 12 characters or fewer`);
  }
  if (!/^[a-z1-5.]+$/.test(name)) {
    throw new ValidationError(`${field} must contain only a-z, 1-5, and '.'`);
  }
  return name;
}

export function requireString(body: Body, field: string, maxLength: number = 1024): string {
  const value = body[field];
  if (typeof value !== 'string' || value.length === 0) {
    throw new ValidationError(`${field} is required`);
  }
  if (value.length > maxLength) {
    throw new ValidationError(`${field} must be ${maxLength} characters or fewer`);
  }
  return value;
}

export function optionalString(body: Body, field: string): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ValidationError(`${field} must be a string`);
  }
  return value;
}

export function requireAmount(body: Body, field: string): bigint {
  if (body[field] === undefined) {
    throw new ValidationError(`${field} is required`);
  }
  return parseAmount(body[field], field);
}

export function optionalAmount(body: Body, field: string): bigint | undefined {
  return body[field] === undefined ? undefined : parseAmount(body[field], field);
}

export function requireBoolean(body: Body, field: string): boolean {
  const value = body[field];
  if (typeof value !== 'boolean') {
    throw new ValidationError(`${field} must be true or false`);
  }
  return value;
}

export function requireInteger(body: Body, field: string): number {
  const value = body[field];
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
    throw new ValidationError(`${field} must be a non-negative integer`);
  }
  return value;
}

export function optionalInteger(body: Body, field: string): number | undefined {
  return body[field] === undefined ? undefined : requireInteger(body, field);
}

/** Path parameter id, e.g. `/bids/:id`. */
export function requireId(value: string | undefined, field: string = 'id'): number {
  if (value === undefined || !/^\d{1,15}$/.test(value)) {
    throw new ValidationError(`${field} must be a positive integer`);
  }
  const id = parseInt(value, 10);
  if (id < 1) {
    throw new ValidationError(`${field} must be a positive integer`);
  }
  return id;
}

export function requireOneOf<T extends string>(body: Body, field: string, allowed: readonly T[]): T {
  const value = body[field];
  const match = allowed.find((a) => a === value);
  if (match === undefined) {
    throw new ValidationError(`${field} must be one of: ${allowed.join(', ')}`);
  }
  return match;
}

/** Webhook targets: http(s) only, nothing local or private. */
export function validateUrl(url: unknown, field: string = 'url'): string {
  if (!url || typeof url !== 'string') {
    throw new ValidationError(`${field} is required`);
  }
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ValidationError(`${field} must be a valid URL`);
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ValidationError(`${field} must use http or https protocol`);
  }

  const hostname = parsed.hostname.toLowerCase().replace(/^\[|\]$/g, '');
  if (hostname === 'localhost' || hostname === '127.0.0.1' || hostname === '::1' || hostname === '0.0.0.0') {
    throw new ValidationError(`${field} must not point to localhost`);
  }

  const blocked = [
    /^10\./, /^172\.(1[6-9]|2\d|3[01])\./, /^192\.168\./, /^169\.254\./, /^127\./, /^0\./,
    /^fc[0-9a-f]{2}:/, /^fd[0-9a-f]{2}:/, /^fe80:/,
  ];
  if (blocked.some((p) => p.test(hostname))) {
    throw new ValidationError(`${field} must not point to private IP ranges`);
  }
  return url;
}
