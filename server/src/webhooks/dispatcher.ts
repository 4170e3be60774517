import Database from 'better-sqlite3';
import type { MarketEvent, PropertyMarket } from '@estate-escrow/engine';

export interface WebhookSubscription {
  id: number;
  url: string;
  token: string;
  event_filter: string;
  account_filter: string | null;
  enabled: number;
  failure_count: number;
  created_at: number;
}

interface WebhookPayload {
  event_id: number;
  event_type: string;
  version: number;
  timestamp: number;
  data: MarketEvent['data'];
}

export interface DispatcherOptions {
  fetch?: typeof fetch;
  /** Delay before each retry; one more attempt than entries */
  retryDelays?: number[];
}

export const MAX_FAILURES = 50;
const RETRY_DELAYS = [1000, 5000, 15000];

export function ensureWebhookTables(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS webhook_subscriptions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      url TEXT NOT NULL,
      token TEXT NOT NULL,
      event_filter TEXT NOT NULL,
      account_filter TEXT,
      enabled INTEGER DEFAULT 1,
      created_at INTEGER DEFAULT (strftime('%s','now')),
      failure_count INTEGER DEFAULT 0
    );

    CREATE TABLE IF NOT EXISTS webhook_deliveries (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      subscription_id INTEGER NOT NULL,
      event_type TEXT NOT NULL,
      payload TEXT NOT NULL,
      status_code INTEGER,
      attempted_at INTEGER DEFAULT (strftime('%s','now'))
    );

    CREATE INDEX IF NOT EXISTS idx_webhook_deliveries_sub ON webhook_deliveries(subscription_id);
  `);
}

/**
 * Delivers committed market events to subscribed URLs. Deliveries run in
 * the background with retries; subscriptions that keep failing are disabled.
 */
export class WebhookDispatcher {
  private subscriptions: WebhookSubscription[] = [];
  private inflight = new Set<Promise<void>>();
  private readonly fetchFn: typeof fetch;
  private readonly retryDelays: number[];

  constructor(
    private readonly db: Database.Database,
    options: DispatcherOptions = {},
  ) {
    this.fetchFn = options.fetch ?? fetch;
    this.retryDelays = options.retryDelays ?? RETRY_DELAYS;
    ensureWebhookTables(db);
    this.reload();
  }

  /** Reload enabled subscriptions into the in-memory cache. */
  reload(): void {
    this.subscriptions = this.db.prepare<unknown[], WebhookSubscription>(
      'SELECT * FROM webhook_subscriptions WHERE enabled = 1'
    ).all();
  }

  /** Forward every committed market event. Returns the unsubscribe function. */
  attach(market: PropertyMarket): () => void {
    return market.subscribe((event) => this.dispatch(event));
  }

  dispatch(event: MarketEvent): void {
    const accounts = accountsInvolved(event);

    for (const sub of this.subscriptions) {
      if (!matches(sub, event.event_name, accounts)) continue;

      const payload: WebhookPayload = {
        event_id: event.id,
        event_type: event.event_name,
        version: event.version,
        timestamp: event.timestamp,
        data: event.data,
      };

      const delivery = this.deliver(sub, payload)
        .catch((err) => {
          console.error(`[webhook] Delivery failed for sub ${sub.id}:`, err);
        })
        .finally(() => {
          this.inflight.delete(delivery);
        });
      this.inflight.add(delivery);
    }
  }

  /** Resolves once every delivery started so far has finished. */
  async flush(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight]);
    }
  }

  private async deliver(sub: WebhookSubscription, payload: WebhookPayload): Promise<void> {
    const body = JSON.stringify(payload);
    let lastStatusCode = 0;

    for (let attempt = 0; attempt <= this.retryDelays.length; attempt++) {
      try {
        const response = await this.fetchFn(sub.url, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            'Authorization': `Bearer ${sub.token}`,
            'X-Webhook-Event': payload.event_type,
          },
          body,
          signal: AbortSignal.timeout(10000),
        });

        lastStatusCode = response.status;
        this.logDelivery(sub.id, payload.event_type, body, response.status);

        if (response.ok) {
          if (sub.failure_count > 0) {
            this.db.prepare('UPDATE webhook_subscriptions SET failure_count = 0 WHERE id = ?').run(sub.id);
            sub.failure_count = 0;
          }
          return;
        }

        // 4xx other than 429 will not succeed on retry
        if (response.status >= 400 && response.status < 500 && response.status !== 429) {
          this.incrementFailure(sub);
          return;
        }
      } catch (err) {
        console.warn(`[webhook] Attempt ${attempt + 1} for sub ${sub.id} failed:`, err instanceof Error ? err.message : err);
      }

      if (attempt < this.retryDelays.length) {
        await new Promise((resolve) => setTimeout(resolve, this.retryDelays[attempt]));
      }
    }

    if (lastStatusCode === 0) {
      this.logDelivery(sub.id, payload.event_type, body, 0);
    }
    this.incrementFailure(sub);
  }

  private incrementFailure(sub: WebhookSubscription): void {
    sub.failure_count++;

    if (sub.failure_count >= MAX_FAILURES) {
      this.db.prepare(
        'UPDATE webhook_subscriptions SET failure_count = ?, enabled = 0 WHERE id = ?'
      ).run(sub.failure_count, sub.id);
      this.subscriptions = this.subscriptions.filter((s) => s.id !== sub.id);
      console.log(`[webhook] Subscription ${sub.id} disabled after ${MAX_FAILURES} failures`);
    } else {
      this.db.prepare(
        'UPDATE webhook_subscriptions SET failure_count = ? WHERE id = ?'
      ).run(sub.failure_count, sub.id);
    }
  }

  private logDelivery(subscriptionId: number, eventType: string, payload: string, statusCode: number): void {
    try {
      this.db.prepare(
        'INSERT INTO webhook_deliveries (subscription_id, event_type, payload, status_code) VALUES (?, ?, ?, ?)'
      ).run(subscriptionId, eventType, payload, statusCode);
    } catch (err) {
      console.error(`[webhook] Could not log delivery for sub ${subscriptionId}:`, err);
    }
  }
}

/** Exact names, "*" or a prefix wildcard such as "bid.*". */
export function matches(sub: WebhookSubscription, eventType: string, accounts: string[]): boolean {
  let filters: unknown;
  try {
    filters = JSON.parse(sub.event_filter);
  } catch {
    return false;
  }
  if (!Array.isArray(filters)) return false;

  const eventMatches = filters.some((f) => {
    if (typeof f !== 'string') return false;
    if (f === '*') return true;
    if (f.endsWith('.*')) {
      return eventType.startsWith(f.slice(0, -1));
    }
    return f === eventType;
  });
  if (!eventMatches) return false;

  if (sub.account_filter) {
    return accounts.includes(sub.account_filter);
  }
  return true;
}

/** String fields of the record; account names are matched against these. */
export function accountsInvolved(event: MarketEvent): string[] {
  return Object.values(event.data).filter((v): v is string => typeof v === 'string');
}
