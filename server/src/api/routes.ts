import { Router } from 'express';
import type { Request, RequestHandler, Response } from 'express';
import {
  AuthorizationError,
  MarketError,
  NotFoundError,
  ValidationError,
} from '@estate-escrow/engine';
import type { ListingInput, PropertyMarket, TimelockSettings } from '@estate-escrow/engine';
import { AuthError, callerOf } from '../auth';
import type { WebhookDispatcher } from '../webhooks/dispatcher';
import {
  optionalAmount,
  optionalInteger,
  optionalString,
  readBody,
  requireAmount,
  requireBoolean,
  requireId,
  requireInteger,
  requireOneOf,
  requireString,
  validateAccountName,
  validateUrl,
} from '../util/validate';
import type { Body } from '../util/validate';

export interface RouteOptions {
  /** Signed-request middleware; sets the caller for mutating routes */
  authenticate: RequestHandler;
  /** Accounts allowed to report settlement outcomes */
  callbackAccounts: string[];
  dispatcher?: WebhookDispatcher;
  webhookAdminToken?: string;
}

export type Wire = string | number | boolean | null | Wire[] | { [key: string]: Wire };

/** JSON-safe copy of a value; amounts travel as decimal strings. */
export function toWire(value: unknown): Wire {
  if (typeof value === 'bigint') return value.toString();
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (value === null || value === undefined) return null;
  if (Array.isArray(value)) return value.map(toWire);
  if (typeof value === 'object') {
    const out: { [key: string]: Wire } = {};
    for (const [key, field] of Object.entries(value)) {
      if (field !== undefined) out[key] = toWire(field);
    }
    return out;
  }
  return null;
}

const STATUS_BY_CODE: Record<MarketError['code'], number> = {
  validation: 400,
  not_found: 404,
  authorization: 403,
  arithmetic: 422,
  external_call: 502,
  timelock: 409,
  reentrancy: 409,
};

export function sendError(res: Response, err: unknown): void {
  if (err instanceof MarketError) {
    res.status(STATUS_BY_CODE[err.code]).json({ error: err.message, code: err.code });
    return;
  }
  if (err instanceof AuthError) {
    res.status(401).json({ error: err.message });
    return;
  }
  console.error('[api] Unhandled error:', err);
  res.status(500).json({ error: 'Internal server error' });
}

function handle(fn: (req: Request) => unknown, status: number = 200): RequestHandler {
  return (req: Request, res: Response) => {
    Promise.resolve()
      .then(() => fn(req))
      .then((result) => {
        res.status(status).json(toWire(result));
      })
      .catch((err: unknown) => sendError(res, err));
  };
}

export function createRoutes(market: PropertyMarket, options: RouteOptions): Router {
  const router = Router();
  const auth = options.authenticate;
  const db = market.store.db;

  // ============== CONFIG ==============

  router.get('/config', handle(() => market.getConfig()));

  router.get('/balances', handle(() => ({ balances: market.auditSolvency() })));

  router.get('/events', handle((req) => {
    const { name, limit = '100' } = req.query;
    return {
      events: market.events({
        name: typeof name === 'string' ? name : undefined,
        limit: parseInt(typeof limit === 'string' ? limit : '100') || 100,
      }),
    };
  }));

  // ============== PROPERTIES ==============

  router.get('/properties/:id', handle((req) => market.properties.require(requireId(req.params.id))));

  router.get('/properties/:id/bids', handle((req) => {
    const property = market.properties.require(requireId(req.params.id));
    return { bids: market.getBidsForProperty(property.id) };
  }));

  router.get('/properties/:id/leases', handle((req) => {
    const property = market.properties.require(requireId(req.params.id));
    return { leases: market.getLeasesForProperty(property.id) };
  }));

  router.post('/properties', auth, handle((req) => {
    const body = readBody(req.body);
    return market.properties.register(callerOf(req), readListing(body));
  }, 201));

  router.post('/properties/:id/relist', auth, handle((req) => {
    const body = readBody(req.body);
    return market.properties.relist(callerOf(req), requireId(req.params.id), readListing(body));
  }));

  router.post('/properties/:id/delist', auth, handle((req) =>
    market.properties.delist(callerOf(req), requireId(req.params.id))
  ));

  // Admin: refund every pending bid on the property
  router.post('/properties/:id/refund-bids', auth, handle(async (req) => ({
    bids: await market.bids.refundBids(callerOf(req), requireId(req.params.id)),
  })));

  // ============== ACCOUNTS ==============

  router.get('/accounts/:account/properties', handle((req) => ({
    properties: market.properties.byOwner(validateAccountName(req.params.account)),
  })));

  router.get('/accounts/:account/bids', handle((req) => ({
    bids: market.getBidsByBidder(validateAccountName(req.params.account)),
  })));

  router.get('/accounts/:account/leases', handle((req) => ({
    leases: market.getLeasesByTenant(validateAccountName(req.params.account)),
  })));

  // ============== DEPOSITS & SETTLEMENTS ==============

  // The authenticated caller is the token account forwarding the transfer
  router.post('/deposits', auth, handle((req) => {
    const body = readBody(req.body);
    const { bid, unused } = market.bids.deposit(callerOf(req), {
      sender: validateAccountName(body.sender, 'sender'),
      amount: requireAmount(body, 'amount'),
      message: requireString(body, 'message'),
    });
    return { bid, unused };
  }, 201));

  router.get('/settlements', handle(() => ({ settlements: market.pendingSettlements() })));

  router.get('/settlements/:id', handle((req) => {
    const id = requireId(req.params.id);
    const continuation = market.getContinuation(id);
    if (!continuation) {
      throw new NotFoundError(`Settlement ${id} not found`);
    }
    return continuation;
  }));

  router.post('/settlements/:id', auth, handle((req) => {
    const caller = callerOf(req);
    if (!options.callbackAccounts.includes(caller)) {
      throw new AuthorizationError(`Account ${caller} may not report settlement outcomes`);
    }
    const body = readBody(req.body);
    return market.settlementCallback(
      requireId(req.params.id),
      requireBoolean(body, 'success'),
      optionalString(body, 'reason')
    );
  }));

  // ============== BIDS ==============

  router.get('/bids/:id', handle((req) => {
    const id = requireId(req.params.id);
    const bid = market.getBid(id);
    if (!bid) {
      throw new NotFoundError(`Bid ${id} not found`);
    }
    return bid;
  }));

  router.get('/bids/:id/history', handle((req) => {
    const id = requireId(req.params.id);
    if (!market.getBid(id)) {
      throw new NotFoundError(`Bid ${id} not found`);
    }
    return { history: market.getBidHistory(id) };
  }));

  router.post('/bids/:id/:action', auth, handle((req) => {
    const caller = callerOf(req);
    const id = requireId(req.params.id);
    const body = readBody(req.body);
    const { bids } = market;

    switch (req.params.action) {
      case 'accept':
        return bids.accept(caller, id);
      case 'accept-escrow':
        return bids.acceptWithEscrow(caller, id);
      case 'reject':
        return bids.reject(caller, id);
      case 'cancel':
        return bids.cancel(caller, id);
      case 'release-docs':
        return bids.confirmDocumentRelease(caller, id, requireString(body, 'document_token_id', 256));
      case 'confirm-docs':
        return bids.confirmDocumentReceipt(caller, id);
      case 'release-escrow':
        return bids.releaseEscrow(caller, id);
      case 'complete':
        return bids.completeTransaction(caller, id);
      case 'refund-timeout':
        return bids.refundEscrowTimeout(caller, id, requireInteger(body, 'timeout'));
      case 'dispute':
        return bids.raiseDispute(caller, id, requireString(body, 'reason'));
      case 'resolve-dispute':
        return bids.resolveBidDispute(caller, id, requireOneOf(body, 'winner', ['buyer', 'seller'] as const));
      case 'claim':
        return bids.claimLostBid(caller, id);
      case 'refund-expired':
        return bids.refundExpiredBid(caller, id);
      default:
        throw new NotFoundError(`Unknown bid action '${req.params.action}'`);
    }
  }));

  // ============== LEASES ==============

  router.get('/leases/:id', handle((req) => {
    const id = requireId(req.params.id);
    const lease = market.getLease(id);
    if (!lease) {
      throw new NotFoundError(`Lease ${id} not found`);
    }
    return lease;
  }));

  router.post('/leases/check-expired', auth, handle((req) =>
    market.leases.checkExpiredLeases(callerOf(req))
  ));

  router.post('/leases/:id/:action', auth, handle((req) => {
    const caller = callerOf(req);
    const id = requireId(req.params.id);
    const body = readBody(req.body);
    const { disputes, leases } = market;

    switch (req.params.action) {
      case 'dispute':
        return disputes.raise(caller, id, requireString(body, 'reason'));
      case 'request-response':
        return disputes.requestTenantResponse(caller, id);
      case 'respond':
        return disputes.submitTenantResponse(caller, id, requireString(body, 'response'));
      case 'vote':
        return disputes.vote(caller, id, requireBoolean(body, 'for_tenant'));
      case 'resolve':
        return disputes.resolveDispute(
          caller,
          id,
          requireOneOf(body, 'winner', ['tenant', 'owner'] as const),
          requireAmount(body, 'payout_amount')
        );
      case 'request-oracle':
        return disputes.requestOracleDispute(caller, id);
      case 'oracle-resolve':
        return disputes.resolveDisputeFromOracle(caller, {
          leaseId: id,
          nonce: requireInteger(body, 'nonce'),
          winner: requireOneOf(body, 'winner', ['tenant', 'owner'] as const),
          payoutAmount: requireAmount(body, 'payout_amount'),
        });
      case 'expire':
        return leases.expireLease(caller, id);
      case 'release-escrow':
        return leases.releaseLeaseEscrow(caller, id);
      default:
        throw new NotFoundError(`Unknown lease action '${req.params.action}'`);
    }
  }));

  // ============== ADMIN ==============

  router.post('/admin/:action', auth, handle((req) => {
    const caller = callerOf(req);
    const body = readBody(req.body);
    const { treasury, access } = market;

    switch (req.params.action) {
      case 'timelocks':
        return { timelocks: treasury.setTimelocks(caller, readTimelocks(body)) };
      case 'oracle': {
        const account = body.account === null ? null : validateAccountName(body.account);
        treasury.setOracleAccount(caller, account);
        return market.getConfig();
      }
      case 'add-token':
        treasury.addSupportedToken(caller, validateAccountName(body.token, 'token'));
        return market.getConfig();
      case 'remove-token':
        treasury.removeSupportedToken(caller, validateAccountName(body.token, 'token'));
        return market.getConfig();
      case 'add-admin':
        access.addAdmin(caller, validateAccountName(body.account));
        return market.getConfig();
      case 'remove-admin':
        access.removeAdmin(caller, validateAccountName(body.account));
        return market.getConfig();
      case 'withdraw': {
        const recipient = body.recipient === undefined
          ? undefined
          : validateAccountName(body.recipient, 'recipient');
        return treasury.withdrawSurplus(
          caller,
          validateAccountName(body.token, 'token'),
          requireAmount(body, 'amount'),
          recipient
        );
      }
      case 'force-unlock':
        return treasury.forceUnlock(caller, requireInteger(body, 'continuation_id'), {
          resolution: requireOneOf(body, 'resolution', ['commit', 'abandon'] as const),
          reason: requireString(body, 'reason', 256),
        });
      default:
        throw new NotFoundError(`Unknown admin action '${req.params.action}'`);
    }
  }));

  // ============== WEBHOOKS ==============

  const webhookAdminToken = options.webhookAdminToken;

  function requireWebhookAuth(req: Request, res: Response): boolean {
    if (!webhookAdminToken) {
      res.status(503).json({ error: 'Webhooks not configured (WEBHOOK_ADMIN_TOKEN not set)' });
      return false;
    }
    const header = req.headers.authorization;
    if (!header || header !== `Bearer ${webhookAdminToken}`) {
      res.status(401).json({ error: 'Unauthorized' });
      return false;
    }
    return true;
  }

  router.post('/webhooks', (req: Request, res: Response) => {
    if (!requireWebhookAuth(req, res)) return;

    try {
      const body = readBody(req.body);
      const url = validateUrl(body.url);
      const token = requireString(body, 'token', 256);
      const eventFilter = body.event_filter;
      if (
        !Array.isArray(eventFilter) ||
        eventFilter.length === 0 ||
        !eventFilter.every((f): f is string => typeof f === 'string')
      ) {
        throw new ValidationError('event_filter must be a non-empty array of event types');
      }
      const accountFilter = body.account_filter === undefined || body.account_filter === null
        ? null
        : validateAccountName(body.account_filter, 'account_filter');

      const count = db.prepare<unknown[], { cnt: number }>(
        'SELECT COUNT(*) as cnt FROM webhook_subscriptions'
      ).get();
      if (count && count.cnt >= 100) {
        res.status(429).json({ error: 'Webhook subscription limit reached (max 100)' });
        return;
      }

      const result = db.prepare(`
        INSERT INTO webhook_subscriptions (url, token, event_filter, account_filter, enabled)
        VALUES (?, ?, ?, ?, 1)
      `).run(url, token, JSON.stringify(eventFilter), accountFilter);

      options.dispatcher?.reload();

      res.status(201).json({
        id: Number(result.lastInsertRowid),
        url,
        event_filter: eventFilter,
        account_filter: accountFilter,
        enabled: true,
      });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/webhooks', (req: Request, res: Response) => {
    if (!requireWebhookAuth(req, res)) return;

    const subscriptions = db.prepare(
      'SELECT id, url, event_filter, account_filter, enabled, failure_count, created_at FROM webhook_subscriptions ORDER BY id ASC'
    ).all();

    res.json({ subscriptions });
  });

  router.delete('/webhooks/:id', (req: Request, res: Response) => {
    if (!requireWebhookAuth(req, res)) return;

    const id = parseInt(req.params.id);
    const result = db.prepare('DELETE FROM webhook_subscriptions WHERE id = ?').run(id);
    if (result.changes === 0) {
      res.status(404).json({ error: 'Subscription not found' });
      return;
    }

    options.dispatcher?.reload();
    res.json({ deleted: true, id });
  });

  return router;
}

function readListing(body: Body): ListingInput {
  return {
    status: requireOneOf(body, 'status', ['listed_for_sale', 'listed_for_lease'] as const),
    price: requireAmount(body, 'price'),
    lease_duration: optionalInteger(body, 'lease_duration'),
    damage_escrow: optionalAmount(body, 'damage_escrow'),
  };
}

function readTimelocks(body: Body): Partial<TimelockSettings> {
  const update: Partial<TimelockSettings> = {};
  const names = ['bid_expiry', 'escrow_release_delay', 'lost_bid_claim_delay', 'lock_recovery_delay'] as const;
  for (const name of names) {
    const value = optionalInteger(body, name);
    if (value !== undefined) update[name] = value;
  }
  return update;
}
