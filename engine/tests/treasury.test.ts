import { describe, it, expect, beforeEach } from 'vitest';
import { AuthorizationError, ValidationError } from '../src/errors';
import type { PropertyMarket } from '../src/PropertyMarket';
import { DAY, OWNER, TOKEN, createTestMarket, listForSale, placeBid } from './helpers';
import type { FakeRail } from './helpers';

describe('Market configuration', () => {
  let market: PropertyMarket;

  beforeEach(() => {
    ({ market } = createTestMarket());
  });

  it('seeds the owner, admins, tokens and oracle', () => {
    expect(market.getConfig()).toEqual({
      owner: OWNER,
      oracle_account: 'oracle',
      timelocks: {
        bid_expiry: 7 * DAY,
        escrow_release_delay: DAY,
        lost_bid_claim_delay: DAY,
        lock_recovery_delay: 3600,
      },
      supported_tokens: [TOKEN],
      admins: ['admin1', 'admin2', 'marketowner'],
    });
    expect(market.events({ name: 'market.initialized' })[0].data).toEqual({ owner: OWNER });
  });

  it('lets the owner change timelocks', () => {
    const next = market.treasury.setTimelocks(OWNER, { escrow_release_delay: 2 * DAY });

    expect(next.escrow_release_delay).toBe(2 * DAY);
    expect(market.timelocks.get('escrow_release_delay')).toBe(2 * DAY);
    expect(market.events({ name: 'config.timelocks_updated' })[0].data).toEqual({
      bid_expiry: 7 * DAY,
      escrow_release_delay: 2 * DAY,
      lost_bid_claim_delay: DAY,
      lock_recovery_delay: 3600,
    });
    expect(() => market.treasury.setTimelocks('admin1', { bid_expiry: DAY })).toThrow(AuthorizationError);
  });

  it('manages the admin roster', () => {
    market.access.addAdmin(OWNER, 'admin3');
    expect(market.access.isAdmin('admin3')).toBe(true);

    market.access.removeAdmin(OWNER, 'admin1');
    expect(market.access.admins()).toEqual(['admin2', 'admin3', 'marketowner']);
    expect(() => market.access.removeAdmin(OWNER, 'admin1')).toThrow('admin1 is not an admin');
    expect(() => market.access.addAdmin('admin2', 'mallory')).toThrow('Only the market owner can do this');
  });

  it('manages the token whitelist', () => {
    market.treasury.addSupportedToken(OWNER, 'eurc.token');
    expect(market.getConfig().supported_tokens).toEqual(['eurc.token', TOKEN]);

    market.treasury.removeSupportedToken(OWNER, 'eurc.token');
    expect(market.getConfig().supported_tokens).toEqual([TOKEN]);
    expect(() => market.treasury.removeSupportedToken(OWNER, 'eurc.token')).toThrow(
      'Token eurc.token is not supported'
    );
  });

  it('keeps a token that still has a balance', () => {
    listForSale(market);
    placeBid(market, 'bob', 1, 100n);

    expect(() => market.treasury.removeSupportedToken(OWNER, TOKEN)).toThrow(
      'Token usdc.token still has a balance of 100'
    );
  });
});

describe('Surplus withdrawal', () => {
  let market: PropertyMarket;
  let rail: FakeRail;

  beforeEach(() => {
    ({ market, rail } = createTestMarket());
    listForSale(market);
    placeBid(market, 'bob', 1, 100n);
    market.ledger.credit(TOKEN, 50n);
  });

  it('reports the surplus above obligations', () => {
    expect(market.auditSolvency()).toEqual([
      { token: TOKEN, balance: 150n, obligations: 100n, surplus: 50n, solvent: true },
    ]);
  });

  it('never withdraws funds owed to bidders', async () => {
    await expect(market.treasury.withdrawSurplus(OWNER, TOKEN, 60n)).rejects.toThrow(
      'Amount 60 exceeds the surplus of 50'
    );
    expect(market.balanceOf(TOKEN)).toBe(150n);
  });

  it('sends the surplus to the owner by default', async () => {
    const continuation = await market.treasury.withdrawSurplus(OWNER, TOKEN, 50n);

    expect(continuation.status).toBe('committed');
    expect(rail.requests[0]).toEqual({
      continuation_id: 1,
      recipient: OWNER,
      token_account: TOKEN,
      amount: '50',
      memo: 'settle:1',
    });
    expect(market.balanceOf(TOKEN)).toBe(100n);
    expect(market.events({ name: 'treasury.withdrawn' })[0].data).toEqual({
      token: TOKEN,
      recipient: OWNER,
      amount: '50',
    });
  });

  it('is reserved to the owner', async () => {
    await expect(market.treasury.withdrawSurplus('admin1', TOKEN, 10n)).rejects.toThrow(
      'Only the market owner can do this'
    );
    await expect(market.treasury.withdrawSurplus(OWNER, TOKEN, 0n)).rejects.toThrow(ValidationError);
  });
});

describe('Property listings', () => {
  let market: PropertyMarket;

  beforeEach(() => {
    ({ market } = createTestMarket());
  });

  it('validates listings', () => {
    expect(() => market.properties.register('alice', { status: 'listed_for_lease', price: 10n }))
      .toThrow('lease_duration is required for lease listings');
    expect(() => market.properties.register('alice', { status: 'listed_for_sale', price: -1n }))
      .toThrow('price must not be negative');
  });

  it('delists and relists a property', () => {
    listForSale(market);

    expect(market.properties.delist('alice', 1).status).toBe('delisted');
    expect(() => placeBid(market, 'bob', 1, 100n)).toThrow('Property 1 is not listed for sale');
    expect(() => market.properties.delist('bob', 1)).toThrow(AuthorizationError);

    const relisted = market.properties.relist('alice', 1, { status: 'listed_for_sale', price: 150n });
    expect(relisted.status).toBe('listed_for_sale');
    expect(relisted.price).toBe(150n);
  });

  it('lets the buyer relist a sold property', async () => {
    listForSale(market);
    placeBid(market, 'bob', 1, 100n);
    await market.bids.accept('alice', 1);

    expect(() => market.properties.relist('alice', 1, { status: 'listed_for_sale', price: 200n }))
      .toThrow('Only the owner of property 1 can do this');
    expect(market.properties.relist('bob', 1, { status: 'listed_for_sale', price: 200n }).owner).toBe('bob');
  });

  it('keeps a sold property off the market while a losing bid is unrefunded', async () => {
    const { market: m, rail, clock } = createTestMarket();
    listForSale(m);
    placeBid(m, 'bob', 1, 100n);
    placeBid(m, 'carol', 1, 90n);
    rail.failFor.add('carol');
    await m.bids.accept('alice', 1);
    await m.idle();

    expect(() => m.properties.relist('bob', 1, { status: 'listed_for_sale', price: 1000n }))
      .toThrow('Property 1 still has open bids');
    expect(m.getProperty(1)?.status).toBe('sold');

    rail.failFor.clear();
    clock.advance(DAY);
    expect((await m.bids.claimLostBid('carol', 2)).state).toBe('rejected');
    expect(m.properties.relist('bob', 1, { status: 'listed_for_sale', price: 1000n }).status)
      .toBe('listed_for_sale');
  });

  it('lists the properties of an owner', () => {
    listForSale(market, 'alice');
    listForSale(market, 'carol');
    listForSale(market, 'alice');

    expect(market.properties.byOwner('alice').map((p) => p.id)).toEqual([1, 3]);
  });
});
