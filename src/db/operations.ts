import Fuse from "fuse.js";
import { initializeDatabase, type SqliteDatabase } from "./index";
import { logger } from "../logger";
import type { AgentCache, ListingQuery, ListingStore, RunLog } from "./store";
import type {
  AgentCacheEntry,
  ListingInput,
  ListingRecord,
  RunLogEntry,
  RunState,
  RunStats,
  StoreStats,
  UpsertResult,
} from "../types";

interface ListingRow {
  listing_url: string;
  property_id: string | null;
  address: string | null;
  city: string | null;
  county: string | null;
  state_code: string | null;
  postal_code: string | null;
  price: number | null;
  beds: number | null;
  baths: number | null;
  sqft: number | null;
  list_date: string | null;
  has_septic_system: number;
  has_private_well: number;
  septic_mentions: string;
  well_mentions: string;
  agent_url: string | null;
  agent_name: string | null;
  agent_phone: string | null;
  brokerage_name: string | null;
  first_seen_at: string;
  last_seen_at: string;
  times_seen: number;
}

interface AgentRow {
  agent_url: string;
  agent_name: string | null;
  agent_phone: string | null;
  fetched_at: string;
}

interface RunLogRow {
  id: number;
  run_type: string;
  state: string;
  started_at: string;
  finished_at: string | null;
  total_processed: number | null;
  new_listings: number | null;
  updated_listings: number | null;
  newsworthy_count: number | null;
  errors: string | null;
  dry_run: number | null;
}

const HOUR_MS = 60 * 60 * 1000;
const DEFAULT_LIST_LIMIT = 100;
const DEFAULT_SEARCH_LIMIT = 20;
// Upper bound on rows handed to the fuzzy matcher.
const SEARCH_POOL_SIZE = 5000;

export function parseStringArray(raw: string | null): string[] {
  if (!raw) return [];
  try {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed)
      ? parsed.filter((v): v is string => typeof v === "string")
      : [];
  } catch {
    logger.warn(`Ignoring malformed JSON array column: ${raw.slice(0, 80)}`);
    return [];
  }
}

function rowToRecord(row: ListingRow): ListingRecord {
  return {
    listingUrl: row.listing_url,
    propertyId: row.property_id,
    address: row.address,
    city: row.city,
    county: row.county,
    stateCode: row.state_code,
    postalCode: row.postal_code,
    price: row.price,
    beds: row.beds,
    baths: row.baths,
    sqft: row.sqft,
    listDate: row.list_date,
    hasSepticSystem: row.has_septic_system === 1,
    hasPrivateWell: row.has_private_well === 1,
    septicMentions: parseStringArray(row.septic_mentions),
    wellMentions: parseStringArray(row.well_mentions),
    agentUrl: row.agent_url,
    agentName: row.agent_name,
    agentPhone: row.agent_phone,
    brokerageName: row.brokerage_name,
    firstSeenAt: row.first_seen_at,
    lastSeenAt: row.last_seen_at,
    timesSeen: row.times_seen,
  };
}

function rowToRunLogEntry(row: RunLogRow): RunLogEntry {
  return {
    id: row.id,
    runType: row.run_type,
    state: row.state,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    totalProcessed: row.total_processed ?? 0,
    newListings: row.new_listings ?? 0,
    updatedListings: row.updated_listings ?? 0,
    newsworthyCount: row.newsworthy_count ?? 0,
    errors: parseStringArray(row.errors),
    dryRun: row.dry_run === 1,
  };
}

/**
 * SQLite-backed listing store, agent cache and run log. Every method is
 * synchronous underneath (better-sqlite3) but exposed as a promise so the
 * pipeline can swap in other stores.
 */
export class SqliteStore implements ListingStore, AgentCache, RunLog {
  constructor(
    private readonly db: SqliteDatabase,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async init(): Promise<void> {
    initializeDatabase(this.db);
  }

  // Listings

  async upsert(input: ListingInput): Promise<UpsertResult> {
    const seenAt = this.now().toISOString();

    const apply = this.db.transaction((listing: ListingInput): boolean => {
      const existing = this.db
        .prepare<[string], { times_seen: number }>(
          "SELECT times_seen FROM listings WHERE listing_url = ?",
        )
        .get(listing.listingUrl);

      if (existing) {
        // Address and first_seen_at are fixed at first observation.
        this.db
          .prepare(
            `UPDATE listings SET
              last_seen_at = ?,
              times_seen = times_seen + 1,
              price = ?,
              agent_url = ?,
              agent_name = ?,
              agent_phone = ?,
              brokerage_name = ?,
              has_septic_system = ?,
              has_private_well = ?,
              septic_mentions = ?,
              well_mentions = ?
            WHERE listing_url = ?`,
          )
          .run(
            seenAt,
            listing.price,
            listing.agentUrl,
            listing.agentName,
            listing.agentPhone,
            listing.brokerageName,
            listing.hasSepticSystem ? 1 : 0,
            listing.hasPrivateWell ? 1 : 0,
            JSON.stringify(listing.septicMentions),
            JSON.stringify(listing.wellMentions),
            listing.listingUrl,
          );
        return false;
      }

      this.db
        .prepare(
          `INSERT INTO listings (
            listing_url, property_id, address, city, county, state_code,
            postal_code, price, beds, baths, sqft, list_date,
            has_septic_system, has_private_well, septic_mentions, well_mentions,
            agent_url, agent_name, agent_phone, brokerage_name,
            first_seen_at, last_seen_at, times_seen
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 1)`,
        )
        .run(
          listing.listingUrl,
          listing.propertyId,
          listing.address,
          listing.city,
          listing.county,
          listing.stateCode,
          listing.postalCode,
          listing.price,
          listing.beds,
          listing.baths,
          listing.sqft,
          listing.listDate,
          listing.hasSepticSystem ? 1 : 0,
          listing.hasPrivateWell ? 1 : 0,
          JSON.stringify(listing.septicMentions),
          JSON.stringify(listing.wellMentions),
          listing.agentUrl,
          listing.agentName,
          listing.agentPhone,
          listing.brokerageName,
          seenAt,
          seenAt,
        );
      return true;
    });

    const isNew = apply(input);
    const record = this.findByUrl(input.listingUrl);
    if (!record) {
      throw new Error(`Listing missing after upsert: ${input.listingUrl}`);
    }

    logger.debug(
      `${isNew ? "Inserted" : "Updated"} ${input.listingUrl} (seen ${record.timesSeen}x)`,
    );
    return { isNew, record };
  }

  async getByUrl(listingUrl: string): Promise<ListingRecord | null> {
    return this.findByUrl(listingUrl);
  }

  async getListings(query: ListingQuery = {}): Promise<ListingRecord[]> {
    const conditions: string[] = [];
    const params: Array<string | number> = [];

    if (query.since) {
      conditions.push("last_seen_at > ?");
      params.push(query.since);
    }
    if (query.septicOnly) {
      conditions.push("has_septic_system = 1");
    }
    if (query.wellOnly) {
      conditions.push("has_private_well = 1");
    }
    if (query.city) {
      conditions.push("city = ? COLLATE NOCASE");
      params.push(query.city);
    }

    const whereClause =
      conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    params.push(query.limit ?? DEFAULT_LIST_LIMIT);

    return this.db
      .prepare<Array<string | number>, ListingRow>(
        `SELECT * FROM listings ${whereClause}
         ORDER BY last_seen_at DESC, listing_url
         LIMIT ?`,
      )
      .all(...params)
      .map(rowToRecord);
  }

  async getNewSepticWellListings(hours: number): Promise<ListingRecord[]> {
    const cutoff = new Date(this.now().getTime() - hours * HOUR_MS).toISOString();
    return this.db
      .prepare<[string], ListingRow>(
        `SELECT * FROM listings
         WHERE first_seen_at > ?
           AND (has_septic_system = 1 OR has_private_well = 1)
         ORDER BY first_seen_at DESC, listing_url`,
      )
      .all(cutoff)
      .map(rowToRecord);
  }

  async searchListings(
    text: string,
    limit: number = DEFAULT_SEARCH_LIMIT,
  ): Promise<ListingRecord[]> {
    const needle = text.trim();
    if (!needle) return [];

    const pool = this.db
      .prepare<[number], ListingRow>(
        "SELECT * FROM listings ORDER BY last_seen_at DESC LIMIT ?",
      )
      .all(SEARCH_POOL_SIZE)
      .map(rowToRecord);

    const fuse = new Fuse(pool, {
      keys: ["address", "city", "county", "postalCode"],
      threshold: 0.3,
      ignoreLocation: true,
    });

    return fuse.search(needle, { limit }).map((hit) => hit.item);
  }

  async getAllCities(): Promise<string[]> {
    return this.db
      .prepare<[], { city: string }>(
        `SELECT DISTINCT city FROM listings
         WHERE city IS NOT NULL AND city != ''
         ORDER BY city`,
      )
      .all()
      .map((row) => row.city);
  }

  async getStats(): Promise<StoreStats> {
    const cutoff = new Date(this.now().getTime() - 24 * HOUR_MS).toISOString();
    const row = this.db
      .prepare<
        [string],
        {
          total: number;
          septic: number | null;
          well: number | null;
          recent: number | null;
        }
      >(
        `SELECT
          COUNT(*) as total,
          SUM(has_septic_system) as septic,
          SUM(has_private_well) as well,
          SUM(CASE WHEN first_seen_at > ? THEN 1 ELSE 0 END) as recent
        FROM listings`,
      )
      .get(cutoff);

    return {
      totalListings: row?.total ?? 0,
      withSeptic: row?.septic ?? 0,
      withWell: row?.well ?? 0,
      newLast24h: row?.recent ?? 0,
    };
  }

  // Agent cache

  async lookup(agentUrl: string): Promise<AgentCacheEntry | null> {
    const row = this.db
      .prepare<[string], AgentRow>("SELECT * FROM agents WHERE agent_url = ?")
      .get(agentUrl);
    if (!row) return null;
    return {
      agentUrl: row.agent_url,
      agentName: row.agent_name,
      agentPhone: row.agent_phone,
      fetchedAt: row.fetched_at,
    };
  }

  async store(
    agentUrl: string,
    agentName: string | null,
    agentPhone: string | null,
  ): Promise<void> {
    // A null never overwrites a value we already know.
    this.db
      .prepare(
        `INSERT INTO agents (agent_url, agent_name, agent_phone, fetched_at)
         VALUES (?, ?, ?, ?)
         ON CONFLICT(agent_url) DO UPDATE SET
           agent_name = COALESCE(excluded.agent_name, agents.agent_name),
           agent_phone = COALESCE(excluded.agent_phone, agents.agent_phone),
           fetched_at = excluded.fetched_at`,
      )
      .run(agentUrl, agentName, agentPhone, this.now().toISOString());
  }

  // Run log

  async createRun(runType: string, dryRun: boolean): Promise<number> {
    const result = this.db
      .prepare(
        "INSERT INTO run_log (run_type, started_at, dry_run) VALUES (?, ?, ?)",
      )
      .run(runType, this.now().toISOString(), dryRun ? 1 : 0);
    return Number(result.lastInsertRowid);
  }

  async finishRun(
    runId: number,
    state: Extract<RunState, "completed" | "failed">,
    stats: RunStats,
  ): Promise<void> {
    this.db
      .prepare(
        `UPDATE run_log SET
          finished_at = ?,
          state = ?,
          candidates_found = ?,
          total_processed = ?,
          new_listings = ?,
          updated_listings = ?,
          septic_matches = ?,
          well_matches = ?,
          newsworthy_count = ?,
          errors = ?
        WHERE id = ?`,
      )
      .run(
        stats.completedAt ?? this.now().toISOString(),
        state,
        stats.candidatesFound,
        stats.totalProcessed,
        stats.newListings,
        stats.updatedListings,
        stats.septicMatches,
        stats.wellMatches,
        stats.newsworthyCount,
        stats.errors.length > 0 ? JSON.stringify(stats.errors) : null,
        runId,
      );
  }

  async getLastRun(): Promise<RunLogEntry | null> {
    const row = this.db
      .prepare<[], RunLogRow>(
        "SELECT * FROM run_log ORDER BY started_at DESC, id DESC LIMIT 1",
      )
      .get();
    return row ? rowToRunLogEntry(row) : null;
  }

  private findByUrl(listingUrl: string): ListingRecord | null {
    const row = this.db
      .prepare<[string], ListingRow>(
        "SELECT * FROM listings WHERE listing_url = ?",
      )
      .get(listingUrl);
    return row ? rowToRecord(row) : null;
  }
}
