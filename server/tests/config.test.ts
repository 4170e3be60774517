import { describe, it, expect } from 'vitest';
import { loadConfig, parseTokens } from '../src/config';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({ XPR_ACCOUNT: 'estatemarket' });

    expect(config).toEqual({
      port: 3001,
      dbPath: './data/market.db',
      rpcEndpoint: 'https://proton.eosusa.io',
      account: 'estatemarket',
      privateKey: undefined,
      permission: 'active',
      marketOwner: 'estatemarket',
      tokens: [{ contract: 'eosio.token', symbol: 'XPR', precision: 4 }],
      oracleContract: null,
      corsOrigins: ['http://localhost:3000', 'http://localhost:3001'],
      rateLimitRpm: 100,
      authTimestampWindow: 300,
      authRateLimit: 60,
      webhookAdminToken: undefined,
      leaseSweepIntervalMs: 3600000,
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      XPR_ACCOUNT: 'estatemarket',
      MARKET_OWNER: 'estateowner',
      PORT: '8080',
      ORACLE_CONTRACT: 'estateoracle',
      CORS_ORIGINS: 'https://market.example.com, ',
      SUPPORTED_TOKENS: 'xtokens:XUSDC:6',
      WEBHOOK_ADMIN_TOKEN: 'test-secret',
    });

    expect(config.port).toBe(8080);
    expect(config.marketOwner).toBe('estateowner');
    expect(config.oracleContract).toBe('estateoracle');
    expect(config.corsOrigins).toEqual(['https://market.example.com']);
    expect(config.tokens).toEqual([{ contract: 'xtokens', symbol: 'XUSDC', precision: 6 }]);
    expect(config.webhookAdminToken).toBe('test-secret');
  });

  it('requires a market owner', () => {
    expect(() => loadConfig({})).toThrow('MARKET_OWNER (or XPR_ACCOUNT) environment variable is required');
  });
});

describe('parseTokens', () => {
  it('parses several entries', () => {
    expect(parseTokens('eosio.token:XPR:4, xtokens:XUSDC:6')).toEqual([
      { contract: 'eosio.token', symbol: 'XPR', precision: 4 },
      { contract: 'xtokens', symbol: 'XUSDC', precision: 6 },
    ]);
  });

  it('rejects incomplete entries', () => {
    expect(() => parseTokens('eosio.token:XPR')).toThrow(
      "Invalid SUPPORTED_TOKENS entry 'eosio.token:XPR': expected contract:SYMBOL:precision"
    );
    expect(() => parseTokens('eosio.token:XPR:19')).toThrow(
      "Invalid SUPPORTED_TOKENS entry 'eosio.token:XPR:19': expected contract:SYMBOL:precision"
    );
  });
});
