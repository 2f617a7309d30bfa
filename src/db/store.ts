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

export interface ListingQuery {
  /** ISO timestamp; only listings seen after it. */
  since?: string;
  septicOnly?: boolean;
  wellOnly?: boolean;
  city?: string;
  limit?: number;
}

export interface ListingStore {
  init(): Promise<void>;
  upsert(input: ListingInput): Promise<UpsertResult>;
  getByUrl(listingUrl: string): Promise<ListingRecord | null>;
  getListings(query?: ListingQuery): Promise<ListingRecord[]>;
  getNewSepticWellListings(hours: number): Promise<ListingRecord[]>;
  searchListings(text: string, limit?: number): Promise<ListingRecord[]>;
  getAllCities(): Promise<string[]>;
  getStats(): Promise<StoreStats>;
}

export interface AgentCache {
  lookup(agentUrl: string): Promise<AgentCacheEntry | null>;
  store(
    agentUrl: string,
    agentName: string | null,
    agentPhone: string | null,
  ): Promise<void>;
}

export interface RunLog {
  createRun(runType: string, dryRun: boolean): Promise<number>;
  finishRun(
    runId: number,
    state: Extract<RunState, "completed" | "failed">,
    stats: RunStats,
  ): Promise<void>;
  getLastRun(): Promise<RunLogEntry | null>;
}
