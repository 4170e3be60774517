import { describe, it, expect, vi } from 'vitest';
import { sha256 } from '@proton/js';
import {
  AuthError,
  RequestAuthenticator,
  chainKeyResolver,
  createDigest,
  hashBody,
  recoverPublicKey,
} from '../src/auth';
import type { AuthConfig } from '../src/auth';
import { recoverStub, resolveStub } from './helpers';

const NOW = 1_704_067_200;
const BODY = '{"status":"listed_for_sale","price":"100"}';

function headersFor(account: string, body: string, timestamp: number = NOW): Record<string, string> {
  return {
    'x-account': account,
    'x-timestamp': String(timestamp),
    'x-signature': `${account}:${createDigest(account, timestamp, hashBody(body))}`,
  };
}

function authenticator(config: Partial<AuthConfig> = {}): RequestAuthenticator {
  return new RequestAuthenticator(
    resolveStub,
    { timestampWindow: 300, rateLimit: 60, ...config },
    recoverStub,
    () => NOW,
  );
}

describe('digest', () => {
  it('hashes account, timestamp and body hash on separate lines', () => {
    const digest = createDigest('alice', NOW, 'abc123');

    expect(digest).toBe(sha256(`alice\n${NOW}\nabc123`));
    expect(digest).toHaveLength(64);
  });

  it('changes with any input', () => {
    const base = createDigest('alice', NOW, hashBody(BODY));

    expect(createDigest('bob', NOW, hashBody(BODY))).not.toBe(base);
    expect(createDigest('alice', NOW + 1, hashBody(BODY))).not.toBe(base);
    expect(createDigest('alice', NOW, hashBody('{}'))).not.toBe(base);
  });

  it('refuses to recover from a malformed signature', () => {
    expect(() => recoverPublicKey('not-a-signature', createDigest('alice', NOW, hashBody('')))).toThrow();
  });
});

describe('RequestAuthenticator', () => {
  it('returns the signing account', async () => {
    await expect(authenticator().verify(headersFor('alice', BODY), BODY)).resolves.toBe('alice');
  });

  it('requires all three headers', async () => {
    const headers = headersFor('alice', BODY);
    delete headers['x-signature'];

    await expect(authenticator().verify(headers, BODY)).rejects.toThrow(
      'Authentication required: X-Account, X-Timestamp and X-Signature headers are required'
    );
  });

  it('rejects a non-numeric timestamp', async () => {
    const headers = { ...headersFor('alice', BODY), 'x-timestamp': 'yesterday' };

    await expect(authenticator().verify(headers, BODY)).rejects.toThrow(
      'Invalid X-Timestamp: must be a Unix timestamp'
    );
  });

  it('enforces the timestamp window', async () => {
    const auth = authenticator({ timestampWindow: 60 });

    await expect(auth.verify(headersFor('alice', BODY, NOW - 60), BODY)).resolves.toBe('alice');
    await expect(auth.verify(headersFor('alice', BODY, NOW + 61), BODY)).rejects.toThrow(
      'Request timestamp too far from server time (window: 60s)'
    );
  });

  it('rejects signatures it cannot recover', async () => {
    const headers = { ...headersFor('alice', BODY), 'x-signature': 'garbage' };

    await expect(authenticator().verify(headers, BODY)).rejects.toThrow(
      'Invalid signature: could not recover public key'
    );
  });

  it('rejects a signature over a different body', async () => {
    await expect(authenticator().verify(headersFor('alice', BODY), '{}')).rejects.toThrow(
      "Signature verification failed: recovered key does not match any active key for account 'alice'"
    );
  });

  it('rejects a signature made by another account', async () => {
    const headers = { ...headersFor('mallory', BODY), 'x-account': 'alice' };

    await expect(authenticator().verify(headers, BODY)).rejects.toThrow(AuthError);
  });

  it('turns key lookup failures into authentication errors', async () => {
    const auth = new RequestAuthenticator(
      async () => {
        throw new Error('unknown key');
      },
      { timestampWindow: 300, rateLimit: 60 },
      recoverStub,
      () => NOW,
    );

    await expect(auth.verify(headersFor('ghost', BODY), BODY)).rejects.toThrow(
      "Could not load keys for account 'ghost': unknown key"
    );
  });

  it('rate limits each account separately', async () => {
    const auth = authenticator({ rateLimit: 2 });

    await auth.verify(headersFor('alice', BODY), BODY);
    await auth.verify(headersFor('alice', BODY), BODY);

    await expect(auth.verify(headersFor('alice', BODY), BODY)).rejects.toThrow(
      "Rate limit exceeded: 2 requests per minute for account 'alice'"
    );
    await expect(auth.verify(headersFor('bob', BODY), BODY)).resolves.toBe('bob');
  });
});

describe('chainKeyResolver', () => {
  function accountWith(permissions: Array<{ perm_name: string; keys: string[] }>) {
    return {
      permissions: permissions.map((p) => ({
        perm_name: p.perm_name,
        required_auth: { keys: p.keys.map((key) => ({ key })) },
      })),
    };
  }

  it('reads active keys and caches them', async () => {
    const rpc = {
      get_account: vi.fn().mockResolvedValue(accountWith([
        { perm_name: 'owner', keys: ['PUB_K1_owner'] },
        { perm_name: 'active', keys: ['PUB_K1_active1', 'PUB_K1_active2'] },
      ])),
    };
    const resolve = chainKeyResolver(rpc);

    expect(await resolve('alice')).toEqual(['PUB_K1_active1', 'PUB_K1_active2']);
    expect(await resolve('alice')).toEqual(['PUB_K1_active1', 'PUB_K1_active2']);
    expect(rpc.get_account).toHaveBeenCalledTimes(1);
    expect(rpc.get_account).toHaveBeenCalledWith('alice');
  });

  it('requires an active permission with keys', async () => {
    const noActive = chainKeyResolver({
      get_account: vi.fn().mockResolvedValue(accountWith([{ perm_name: 'owner', keys: ['PUB_K1_owner'] }])),
    });
    const noKeys = chainKeyResolver({
      get_account: vi.fn().mockResolvedValue(accountWith([{ perm_name: 'active', keys: [] }])),
    });

    await expect(noActive('alice')).rejects.toThrow("Account 'alice' has no active permission");
    await expect(noKeys('alice')).rejects.toThrow("Account 'alice' has no active keys");
  });
});
