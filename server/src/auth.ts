/**
 * Signed-request authentication for mutating API calls.
 *
 * The caller signs
 *   digest = SHA256(account + "\n" + timestamp + "\n" + SHA256(requestBody))
 * with an active key and sends X-Account, X-Timestamp and X-Signature. The
 * server recovers the public key and compares it with the account's
 * on-chain active keys.
 */

import type { IncomingMessage } from 'http';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { Key, sha256 } from '@proton/js';

export class AuthError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AuthError';
  }
}

export interface AuthConfig {
  /** Seconds a timestamp may differ from server time */
  timestampWindow: number;
  /** Signed requests per account per minute */
  rateLimit: number;
}

export type KeyResolver = (account: string) => Promise<string[]>;
export type KeyRecoverer = (signature: string, digest: string) => string;

export function createDigest(account: string, timestamp: number, bodyHash: string): string {
  return sha256(`${account}\n${timestamp}\n${bodyHash}`);
}

export function hashBody(body: string): string {
  return sha256(body);
}

export function recoverPublicKey(signature: string, digest: string): string {
  const sig = Key.Signature.fromString(signature);
  return sig.recover(Buffer.from(digest, 'hex')).toString();
}

// ── Raw bodies ─────────────────────────────────────────────────

const rawBodies = new WeakMap<IncomingMessage, string>();
const callers = new WeakMap<IncomingMessage, string>();

/** `verify` hook for express.json: keeps the wire bytes for signature checks. */
export function captureRawBody(req: IncomingMessage, _res: unknown, buf: Buffer): void {
  rawBodies.set(req, buf.toString('utf-8'));
}

export function rawBodyOf(req: IncomingMessage): string {
  return rawBodies.get(req) ?? '';
}

/** Account proven by the request signature. */
export function callerOf(req: IncomingMessage): string {
  const account = callers.get(req);
  if (!account) {
    throw new AuthError('Request is not authenticated');
  }
  return account;
}

// ── Key lookup ─────────────────────────────────────────────────

interface KeyCacheEntry {
  keys: string[];
  expiresAt: number;
}

const KEY_CACHE_TTL = 5 * 60 * 1000;

interface KeyWeight {
  key: string;
}

interface AccountPermission {
  perm_name: string;
  required_auth: { keys: KeyWeight[] };
}

/** The part of JsonRpc the resolver reads. */
export interface AccountReader {
  get_account(accountName: string): Promise<{ permissions: AccountPermission[] }>;
}

/** Active keys from `get_account`, cached for five minutes. */
export function chainKeyResolver(rpc: AccountReader): KeyResolver {
  const cache = new Map<string, KeyCacheEntry>();

  return async (account: string): Promise<string[]> => {
    const cached = cache.get(account);
    if (cached && Date.now() < cached.expiresAt) {
      return cached.keys;
    }

    const accountInfo = await rpc.get_account(account);
    const active = accountInfo.permissions.find((p) => p.perm_name === 'active');
    if (!active) {
      throw new AuthError(`Account '${account}' has no active permission`);
    }
    const keys = active.required_auth.keys.map((k) => k.key);
    if (keys.length === 0) {
      throw new AuthError(`Account '${account}' has no active keys`);
    }

    cache.set(account, { keys, expiresAt: Date.now() + KEY_CACHE_TTL });
    return keys;
  };
}

// ── Verification ───────────────────────────────────────────────

export class RequestAuthenticator {
  private requests = new Map<string, number[]>();

  constructor(
    private readonly resolveKeys: KeyResolver,
    private readonly config: AuthConfig,
    private readonly recover: KeyRecoverer = recoverPublicKey,
    private readonly now: () => number = () => Math.floor(Date.now() / 1000),
  ) {}

  /** Returns the authenticated account or throws AuthError. */
  async verify(headers: Record<string, string | string[] | undefined>, body: string): Promise<string> {
    const account = header(headers, 'x-account');
    const timestampStr = header(headers, 'x-timestamp');
    const signature = header(headers, 'x-signature');

    if (!account || !timestampStr || !signature) {
      throw new AuthError(
        'Authentication required: X-Account, X-Timestamp and X-Signature headers are required'
      );
    }

    const timestamp = parseInt(timestampStr, 10);
    if (isNaN(timestamp)) {
      throw new AuthError('Invalid X-Timestamp: must be a Unix timestamp');
    }
    if (Math.abs(this.now() - timestamp) > this.config.timestampWindow) {
      throw new AuthError(
        `Request timestamp too far from server time (window: ${this.config.timestampWindow}s)`
      );
    }

    const digest = createDigest(account, timestamp, hashBody(body));
    let recoveredKey: string;
    try {
      recoveredKey = this.recover(signature, digest);
    } catch {
      throw new AuthError('Invalid signature: could not recover public key');
    }

    let keys: string[];
    try {
      keys = await this.resolveKeys(account);
    } catch (err) {
      if (err instanceof AuthError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new AuthError(`Could not load keys for account '${account}': ${message}`);
    }
    if (!keys.includes(recoveredKey)) {
      throw new AuthError(
        `Signature verification failed: recovered key does not match any active key for account '${account}'`
      );
    }

    this.checkRateLimit(account);
    return account;
  }

  middleware(): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
      this.verify(req.headers, rawBodyOf(req))
        .then((account) => {
          callers.set(req, account);
          next();
        })
        .catch((err: unknown) => {
          if (err instanceof AuthError) {
            res.status(401).json({ error: err.message });
            return;
          }
          next(err);
        });
    };
  }

  private checkRateLimit(account: string): void {
    const nowMs = this.now() * 1000;
    const recent = (this.requests.get(account) || []).filter((t) => nowMs - t < 60_000);

    if (recent.length >= this.config.rateLimit) {
      throw new AuthError(
        `Rate limit exceeded: ${this.config.rateLimit} requests per minute for account '${account}'`
      );
    }
    recent.push(nowMs);
    this.requests.set(account, recent);
  }
}

function header(headers: Record<string, string | string[] | undefined>, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}
