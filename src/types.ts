export interface Address {
  line: string | null;
  city: string | null;
  county: string | null;
  stateCode: string | null;
  postalCode: string | null;
}

export interface AdvertiserPhone {
  number: string;
  type: string | null;
  primary: boolean;
}

export interface Advertiser {
  name: string | null;
  href: string | null;
  phones: AdvertiserPhone[];
  brokerName: string | null;
  officeName: string | null;
}

/** Minimally-detailed listing from a bulk search call. */
export interface Candidate {
  propertyId: string | null;
  listingId: string | null;
  permalink: string | null;
  address: Address;
  price: number | null;
  beds: number | null;
  baths: number | null;
  sqft: number | null;
  listDate: string | null;
  advertisers: Advertiser[];
}

export interface DetailEntry {
  category: string;
  parentCategory: string | null;
  texts: string[];
}

export interface SourceAgent {
  name: string | null;
  phone: string | null;
  officeName: string | null;
}

/** Fully detailed listing from a per-item detail call. */
export interface EnrichedRecord extends Candidate {
  status: string | null;
  details: DetailEntry[];
  descriptionText: string | null;
  sourceAgents: SourceAgent[];
}

export interface ClassificationResult {
  hasSepticSystem: boolean;
  hasPrivateWell: boolean;
  septicMentions: string[];
  wellMentions: string[];
}

export interface ListingInput {
  listingUrl: string;
  propertyId: string | null;
  address: string | null;
  city: string | null;
  county: string | null;
  stateCode: string | null;
  postalCode: string | null;
  price: number | null;
  beds: number | null;
  baths: number | null;
  sqft: number | null;
  listDate: string | null;
  hasSepticSystem: boolean;
  hasPrivateWell: boolean;
  septicMentions: string[];
  wellMentions: string[];
  agentUrl: string | null;
  agentName: string | null;
  agentPhone: string | null;
  brokerageName: string | null;
}

export interface ListingRecord extends ListingInput {
  firstSeenAt: string;
  lastSeenAt: string;
  timesSeen: number;
}

export interface UpsertResult {
  isNew: boolean;
  record: ListingRecord;
}

export interface AgentCacheEntry {
  agentUrl: string;
  agentName: string | null;
  agentPhone: string | null;
  fetchedAt: string;
}

export interface AgentProfile {
  name: string | null;
  phone: string | null;
}

export interface Partition {
  label: string;
  location: string | null;
  stateCode: string;
}

export interface SearchResult {
  partition: string;
  candidates: Candidate[];
  success: boolean;
  error?: string;
  total: number | null;
  rateLimited: boolean;
  responseTimeMs: number;
}

export type RunState =
  | "idle"
  | "searching"
  | "deduplicating"
  | "enriching"
  | "finalizing"
  | "completed"
  | "failed";

export interface RunStats {
  candidatesFound: number;
  totalProcessed: number;
  newListings: number;
  updatedListings: number;
  septicMatches: number;
  wellMatches: number;
  newsworthyCount: number;
  skippedCount: number;
  detailsMissing: number;
  partitionsSearched: number;
  partitionsFailed: number;
  errors: string[];
  startedAt: string;
  completedAt: string | null;
}

export interface PipelineRunResult {
  runId: number | null;
  state: Extract<RunState, "completed" | "failed">;
  stats: RunStats;
  durationMs: number | null;
  records: ListingRecord[];
  newsworthy: ListingRecord[];
}

export interface StoreStats {
  totalListings: number;
  withSeptic: number;
  withWell: number;
  newLast24h: number;
}

export interface RunLogEntry {
  id: number;
  runType: string;
  state: string;
  startedAt: string;
  finishedAt: string | null;
  totalProcessed: number;
  newListings: number;
  updatedListings: number;
  newsworthyCount: number;
  errors: string[];
  dryRun: boolean;
}

export function createRunStats(startedAt: Date): RunStats {
  return {
    candidatesFound: 0,
    totalProcessed: 0,
    newListings: 0,
    updatedListings: 0,
    septicMatches: 0,
    wellMatches: 0,
    newsworthyCount: 0,
    skippedCount: 0,
    detailsMissing: 0,
    partitionsSearched: 0,
    partitionsFailed: 0,
    errors: [],
    startedAt: startedAt.toISOString(),
    completedAt: null,
  };
}

export function runDurationMs(stats: RunStats): number | null {
  if (!stats.completedAt) return null;
  return Date.parse(stats.completedAt) - Date.parse(stats.startedAt);
}
