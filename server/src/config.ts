/**
 * Token contract accepted for deposits, with the symbol and precision used
 * to format transfer quantities.
 */
export interface TokenConfig {
  contract: string;
  symbol: string;
  precision: number;
}

export interface ServerConfig {
  port: number;
  dbPath: string;
  rpcEndpoint: string;
  account: string | undefined;
  privateKey: string | undefined;
  permission: string;
  marketOwner: string;
  tokens: TokenConfig[];
  oracleContract: string | null;
  corsOrigins: string[];
  rateLimitRpm: number;
  authTimestampWindow: number;
  authRateLimit: number;
  webhookAdminToken: string | undefined;
  leaseSweepIntervalMs: number;
}

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): ServerConfig {
  const marketOwner = env.MARKET_OWNER || env.XPR_ACCOUNT;
  if (!marketOwner) {
    throw new Error('MARKET_OWNER (or XPR_ACCOUNT) environment variable is required');
  }

  return {
    port: parseInt(env.PORT || '3001'),
    dbPath: env.DB_PATH || './data/market.db',
    rpcEndpoint: env.XPR_RPC_ENDPOINT || 'https://proton.eosusa.io',
    account: env.XPR_ACCOUNT,
    privateKey: env.XPR_PRIVATE_KEY,
    permission: env.XPR_PERMISSION || 'active',
    marketOwner,
    tokens: parseTokens(env.SUPPORTED_TOKENS || 'eosio.token:XPR:4'),
    oracleContract: env.ORACLE_CONTRACT || null,
    corsOrigins: splitList(env.CORS_ORIGINS || 'http://localhost:3000,http://localhost:3001'),
    rateLimitRpm: parseInt(env.RATE_LIMIT_RPM || '100'),
    authTimestampWindow: parseInt(env.AUTH_TIMESTAMP_WINDOW || '300'),
    authRateLimit: parseInt(env.AUTH_RATE_LIMIT || '60'),
    webhookAdminToken: env.WEBHOOK_ADMIN_TOKEN,
    leaseSweepIntervalMs: parseInt(env.LEASE_SWEEP_INTERVAL_MS || '3600000'),
  };
}

/** "eosio.token:XPR:4,xtokens:XUSDC:6" */
export function parseTokens(value: string): TokenConfig[] {
  return splitList(value).map((entry) => {
    const [contract, symbol, precision] = entry.split(':').map((p) => p.trim());
    const digits = parseInt(precision ?? '');
    if (!contract || !symbol || !Number.isInteger(digits) || digits < 0 || digits > 18) {
      throw new Error(`Invalid SUPPORTED_TOKENS entry '${entry}': expected contract:SYMBOL:precision`);
    }
    return { contract, symbol, precision: digits };
  });
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
}
