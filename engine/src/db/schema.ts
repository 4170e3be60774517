import Database from 'better-sqlite3';

export function initDatabase(dbPath: string): Database.Database {
  const db = new Database(dbPath);

  // Enable foreign keys
  db.pragma('foreign_keys = ON');
  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }

  migrate(db);
  return db;
}

/**
 * Create every table and index. Idempotent, so it is safe to run on an
 * existing database file.
 */
export function migrate(db: Database.Database): void {
  db.exec(`
    -- Singleton market configuration (id is always 1)
    CREATE TABLE IF NOT EXISTS market_config (
      id INTEGER PRIMARY KEY CHECK (id = 1),
      owner TEXT NOT NULL,
      oracle_account TEXT,
      bid_expiry INTEGER NOT NULL,
      escrow_release_delay INTEGER NOT NULL,
      lost_bid_claim_delay INTEGER NOT NULL,
      lock_recovery_delay INTEGER NOT NULL,
      oracle_nonce INTEGER NOT NULL DEFAULT 0
    );

    CREATE TABLE IF NOT EXISTS admins (
      account TEXT PRIMARY KEY,
      added_at INTEGER NOT NULL
    );

    -- Whitelisted token accounts
    CREATE TABLE IF NOT EXISTS supported_tokens (
      token TEXT PRIMARY KEY,
      added_at INTEGER NOT NULL
    );

    -- Amounts are decimal strings (up to 2^128 - 1)
    CREATE TABLE IF NOT EXISTS balances (
      token TEXT PRIMARY KEY,
      amount TEXT NOT NULL DEFAULT '0'
    );

    CREATE TABLE IF NOT EXISTS properties (
      id INTEGER PRIMARY KEY,
      owner TEXT NOT NULL,
      status TEXT NOT NULL,
      price TEXT NOT NULL DEFAULT '0',
      lease_duration INTEGER NOT NULL DEFAULT 0,
      damage_escrow TEXT NOT NULL DEFAULT '0',
      active_lease_id INTEGER,
      sold_to TEXT,
      sold_at INTEGER,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_properties_owner ON properties(owner);

    CREATE TABLE IF NOT EXISTS bids (
      id INTEGER PRIMARY KEY,
      property_id INTEGER NOT NULL,
      bidder TEXT NOT NULL,
      token TEXT NOT NULL,
      amount TEXT NOT NULL,
      held_amount TEXT NOT NULL,
      retained_amount TEXT NOT NULL DEFAULT '0',
      action TEXT NOT NULL,
      state TEXT NOT NULL,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL,
      expires_at INTEGER,
      document_token_id TEXT,
      docs_confirmed_at INTEGER,
      dispute_reason TEXT,
      refunded_at INTEGER,
      FOREIGN KEY (property_id) REFERENCES properties(id)
    );

    CREATE INDEX IF NOT EXISTS idx_bids_property ON bids(property_id);
    CREATE INDEX IF NOT EXISTS idx_bids_bidder ON bids(bidder);
    CREATE INDEX IF NOT EXISTS idx_bids_token ON bids(token);

    -- Append-only history of bid state changes
    CREATE TABLE IF NOT EXISTS bid_transitions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      bid_id INTEGER NOT NULL,
      from_state TEXT,
      to_state TEXT NOT NULL,
      actor TEXT,
      timestamp INTEGER NOT NULL,
      FOREIGN KEY (bid_id) REFERENCES bids(id)
    );

    CREATE INDEX IF NOT EXISTS idx_bid_transitions_bid ON bid_transitions(bid_id);

    -- Leases embed their dispute
    CREATE TABLE IF NOT EXISTS leases (
      id INTEGER PRIMARY KEY,
      property_id INTEGER NOT NULL,
      bid_id INTEGER,
      tenant TEXT NOT NULL,
      owner TEXT NOT NULL,
      token TEXT NOT NULL,
      start_time INTEGER NOT NULL,
      duration INTEGER NOT NULL,
      escrow_amount TEXT NOT NULL,
      active INTEGER NOT NULL DEFAULT 1,
      escrow_beneficiary TEXT NOT NULL,
      closed_at INTEGER,
      dispute_status TEXT NOT NULL DEFAULT 'none',
      dispute_reason TEXT,
      raised_by TEXT,
      votes_for_tenant INTEGER NOT NULL DEFAULT 0,
      votes_for_owner INTEGER NOT NULL DEFAULT 0,
      oracle_nonce INTEGER,
      tenant_response TEXT,
      dispute_winner TEXT,
      resolved_by TEXT,
      resolved_at INTEGER,
      FOREIGN KEY (property_id) REFERENCES properties(id)
    );

    CREATE INDEX IF NOT EXISTS idx_leases_tenant ON leases(tenant);
    CREATE INDEX IF NOT EXISTS idx_leases_property ON leases(property_id);
    CREATE INDEX IF NOT EXISTS idx_leases_active ON leases(active);

    -- One vote per admin per dispute
    CREATE TABLE IF NOT EXISTS dispute_votes (
      lease_id INTEGER NOT NULL,
      admin TEXT NOT NULL,
      for_tenant INTEGER NOT NULL,
      timestamp INTEGER NOT NULL,
      PRIMARY KEY (lease_id, admin)
    );

    -- Held reentrancy locks; holder is a continuation id
    CREATE TABLE IF NOT EXISTS locks (
      key TEXT PRIMARY KEY,
      continuation_id INTEGER NOT NULL,
      acquired_at INTEGER NOT NULL
    );

    -- Settlements awaiting (or past) their transfer callback
    CREATE TABLE IF NOT EXISTS continuations (
      id INTEGER PRIMARY KEY,
      kind TEXT NOT NULL,
      entity_id INTEGER NOT NULL,
      lock_keys TEXT NOT NULL,
      recipient TEXT NOT NULL,
      token TEXT NOT NULL,
      amount TEXT NOT NULL,
      memo TEXT NOT NULL DEFAULT '',
      intent TEXT NOT NULL,
      status TEXT NOT NULL DEFAULT 'pending',
      failure_reason TEXT,
      created_at INTEGER NOT NULL,
      resolved_at INTEGER
    );

    CREATE INDEX IF NOT EXISTS idx_continuations_status ON continuations(status);

    -- Record of locks released by the owner instead of a callback
    CREATE TABLE IF NOT EXISTS lock_audit (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      lock_key TEXT NOT NULL,
      continuation_id INTEGER NOT NULL,
      released_by TEXT NOT NULL,
      resolution TEXT NOT NULL,
      reason TEXT,
      timestamp INTEGER NOT NULL
    );

    -- State-change records
    CREATE TABLE IF NOT EXISTS events (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      event_name TEXT NOT NULL,
      version INTEGER NOT NULL DEFAULT 1,
      data TEXT NOT NULL,
      timestamp INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_events_name ON events(event_name);
  `);
}
