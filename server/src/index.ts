import { PropertyMarket, initDatabase } from '@estate-escrow/engine';
import { loadConfig } from './config';
import { createSession } from './session';
import { ChainTokenRail } from './rail';
import { ChainOracleClient } from './oracle';
import { RequestAuthenticator, chainKeyResolver } from './auth';
import { WebhookDispatcher } from './webhooks/dispatcher';
import { createApp } from './app';

const config = loadConfig();

console.log('Initializing database...');
const db = initDatabase(config.dbPath);

const { rpc, session } = createSession({
  rpcEndpoint: config.rpcEndpoint,
  privateKey: config.privateKey,
  account: config.account,
  permission: config.permission,
});

const market = new PropertyMarket({
  db,
  owner: config.marketOwner,
  rail: new ChainTokenRail(session, config.tokens),
  oracle: config.oracleContract ? new ChainOracleClient(session, config.oracleContract) : undefined,
  supportedTokens: config.tokens.map((t) => t.contract),
  oracleAccount: config.oracleContract ?? undefined,
});

const dispatcher = new WebhookDispatcher(db);
dispatcher.attach(market);

const authenticator = new RequestAuthenticator(chainKeyResolver(rpc), {
  timestampWindow: config.authTimestampWindow,
  rateLimit: config.authRateLimit,
});

const app = createApp({
  market,
  authenticator,
  callbackAccounts: [session.auth.actor, ...config.tokens.map((t) => t.contract)],
  corsOrigins: config.corsOrigins,
  rateLimitRpm: config.rateLimitRpm,
  dispatcher,
  webhookAdminToken: config.webhookAdminToken,
});

const server = app.listen(config.port, () => {
  console.log(`API server running on port ${config.port}`);
});

// Leases past their term hand back their escrow; run as the market owner
const sweep = setInterval(() => {
  market.leases.checkExpiredLeases(market.access.owner()).then(
    (result) => {
      if (result.expired.length > 0 || result.failed.length > 0) {
        console.log(`Lease sweep: ${result.expired.length} expired, ${result.failed.length} failed`);
      }
    },
    (err: unknown) => {
      console.error('Lease sweep failed:', err);
    }
  );
}, config.leaseSweepIntervalMs);
sweep.unref();

function shutdown(): void {
  console.log('\nShutting down...');
  clearInterval(sweep);
  server.close();
  market.idle()
    .then(() => dispatcher.flush())
    .catch((err: unknown) => console.error('Error while draining settlements:', err))
    .finally(() => {
      db.close();
      process.exit(0);
    });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

console.log('Estate escrow server started');
