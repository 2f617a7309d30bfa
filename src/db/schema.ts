export const SCHEMA_VERSION = 2;

export const CREATE_LISTING_TABLES_SQL = `
  -- 1. listings (one row per listing URL; never deleted)
  CREATE TABLE IF NOT EXISTS listings (
    listing_url TEXT PRIMARY KEY,
    property_id TEXT,
    address TEXT,
    city TEXT,
    county TEXT,
    state_code TEXT,
    postal_code TEXT,
    price INTEGER,
    beds INTEGER,
    baths REAL,
    sqft INTEGER,
    list_date TEXT,
    has_septic_system INTEGER NOT NULL DEFAULT 0,
    has_private_well INTEGER NOT NULL DEFAULT 0,
    septic_mentions TEXT NOT NULL DEFAULT '[]',
    well_mentions TEXT NOT NULL DEFAULT '[]',
    agent_url TEXT,
    agent_name TEXT,
    agent_phone TEXT,
    brokerage_name TEXT,
    first_seen_at TEXT NOT NULL,
    last_seen_at TEXT NOT NULL,
    times_seen INTEGER NOT NULL DEFAULT 1
  );

  CREATE INDEX IF NOT EXISTS idx_listings_last_seen ON listings(last_seen_at DESC);
  CREATE INDEX IF NOT EXISTS idx_listings_first_seen ON listings(first_seen_at DESC);
  CREATE INDEX IF NOT EXISTS idx_listings_septic_well ON listings(has_septic_system, has_private_well);
  CREATE INDEX IF NOT EXISTS idx_listings_city ON listings(city);
  CREATE INDEX IF NOT EXISTS idx_listings_property_id ON listings(property_id);

  -- 2. agents (profile cache keyed by profile URL)
  CREATE TABLE IF NOT EXISTS agents (
    agent_url TEXT PRIMARY KEY,
    agent_name TEXT,
    agent_phone TEXT,
    fetched_at TEXT NOT NULL
  );
`;

export const CREATE_RUN_LOG_SQL = `
  CREATE TABLE IF NOT EXISTS run_log (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    run_type TEXT NOT NULL,
    state TEXT NOT NULL DEFAULT 'running',
    started_at TEXT NOT NULL,
    finished_at TEXT,
    candidates_found INTEGER DEFAULT 0,
    total_processed INTEGER DEFAULT 0,
    new_listings INTEGER DEFAULT 0,
    updated_listings INTEGER DEFAULT 0,
    septic_matches INTEGER DEFAULT 0,
    well_matches INTEGER DEFAULT 0,
    newsworthy_count INTEGER DEFAULT 0,
    errors TEXT,
    dry_run INTEGER DEFAULT 0
  );

  CREATE INDEX IF NOT EXISTS idx_run_log_started ON run_log(started_at DESC);
`;

export const EXPECTED_TABLES = ["listings", "agents", "run_log"] as const;
