import type { Server } from 'http';
import { vi } from 'vitest';
import { PropertyMarket, initDatabase } from '@estate-escrow/engine';
import type { TokenRail, TransferAck, TransferRequest } from '@estate-escrow/engine';
import { RequestAuthenticator, createDigest, hashBody } from '../src/auth';
import type { KeyRecoverer, KeyResolver } from '../src/auth';
import { createApp } from '../src/app';
import { WebhookDispatcher } from '../src/webhooks/dispatcher';

export const OWNER = 'marketowner';
export const TOKEN = 'usdc.token';
export const START = 1_700_000_000;

/** Records requests; answers committed unless told to defer. */
export class FakeRail implements TokenRail {
  requests: TransferRequest[] = [];
  defer = false;

  async requestTransfer(request: TransferRequest): Promise<TransferAck> {
    this.requests.push(request);
    return this.defer ? { status: 'deferred' } : { status: 'committed' };
  }
}

/**
 * Stand-in for signature recovery: a signature is "<account>:<digest>" and
 * recovers that account's key only when the digest matches.
 */
export const recoverStub: KeyRecoverer = (signature, digest) => {
  const [account, signed] = signature.split(':');
  if (!account || !signed) {
    throw new Error('malformed signature');
  }
  return signed === digest ? `PUB_${account}` : 'PUB_other';
};

export const resolveStub: KeyResolver = async (account) => [`PUB_${account}`];

export function signHeaders(
  account: string,
  body: string,
  timestamp: number = Math.floor(Date.now() / 1000),
): Record<string, string> {
  const digest = createDigest(account, timestamp, hashBody(body));
  return {
    'X-Account': account,
    'X-Timestamp': String(timestamp),
    'X-Signature': `${account}:${digest}`,
  };
}

export interface TestServer {
  market: PropertyMarket;
  rail: FakeRail;
  dispatcher: WebhookDispatcher;
  baseUrl: string;
  clock: { now: number };
  get(path: string, headers?: Record<string, string>): Promise<Response>;
  post(path: string, account: string, body?: Record<string, unknown>): Promise<Response>;
  close(): Promise<void>;
}

export async function startTestServer(webhookAdminToken?: string): Promise<TestServer> {
  const rail = new FakeRail();
  const clock = { now: START };
  const db = initDatabase(':memory:');
  const market = new PropertyMarket({
    db,
    owner: OWNER,
    rail,
    clock: () => clock.now,
    logger: { log: vi.fn(), error: vi.fn() },
    supportedTokens: [TOKEN],
  });
  const dispatcher = new WebhookDispatcher(db, { fetch: vi.fn(), retryDelays: [] });

  const app = createApp({
    market,
    authenticator: new RequestAuthenticator(resolveStub, { timestampWindow: 300, rateLimit: 1000 }, recoverStub),
    callbackAccounts: [OWNER, TOKEN],
    corsOrigins: ['http://localhost:3000'],
    rateLimitRpm: 1000,
    dispatcher,
    webhookAdminToken,
  });

  const server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, () => resolve(s));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Test server did not bind a TCP port');
  }
  const baseUrl = `http://127.0.0.1:${address.port}`;

  return {
    market,
    rail,
    dispatcher,
    baseUrl,
    clock,
    get: (path, headers = {}) => fetch(`${baseUrl}${path}`, { headers }),
    post: (path, account, body = {}) => {
      const text = JSON.stringify(body);
      return fetch(`${baseUrl}${path}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...signHeaders(account, text) },
        body: text,
      });
    },
    close: () => new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    }),
  };
}

export function bidMessage(propertyId: number, action: 'purchase' | 'lease'): string {
  return JSON.stringify({ property_id: propertyId, action, token_account: TOKEN });
}
