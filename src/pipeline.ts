import { errorMessage, logger } from "./logger";
import { classify } from "./classifier";
import { runCoordinated } from "./concurrency";
import { sleep as defaultSleep } from "./connectors/base";
import { dedupe } from "./dedup";
import { isNewsworthy, type NewsworthyPolicy } from "./newsworthy";
import { normalizePhone, toListingInput } from "./normalizer";
import { createRunStats, runDurationMs } from "./types";
import type { Notifier } from "./alerts";
import type { AgentProfileFetcher } from "./connectors/agent-profile";
import type { DetailFetcher } from "./connectors/realtor-details";
import type { SearchClient } from "./connectors/realtor-search";
import type { AgentCache, ListingStore, RunLog } from "./db/store";
import type {
  Candidate,
  EnrichedRecord,
  ListingInput,
  ListingRecord,
  Partition,
  PipelineRunResult,
  RunState,
  RunStats,
} from "./types";

export interface PipelineDeps {
  searchClient: SearchClient;
  detailFetcher: DetailFetcher;
  store: ListingStore;
  notifier: Notifier;
  agentCache?: AgentCache;
  agentProfiles?: AgentProfileFetcher;
  runLog?: RunLog;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export interface PipelineOptions {
  partitions: Partition[];
  dateFloor: string | null;
  pageLimit: number;
  maxConcurrentDetails: number;
  politenessDelayMs: number;
  newsworthy: NewsworthyPolicy;
  listingBaseUrl: string;
  agentProfileLookups?: boolean;
  runType?: string;
  dryRun?: boolean;
  /** Run deadline; stops new candidates from starting once fired. */
  signal?: AbortSignal;
}

export class RunAbortedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RunAbortedError";
  }
}

interface ProducedListing {
  input: ListingInput;
  /** Agent name/phone came from the listing or a profile fetch, not the cache. */
  agentFresh: boolean;
}

function candidateLabel(candidate: Candidate): string {
  return candidate.propertyId ?? candidate.permalink ?? "unknown-candidate";
}

function throwIfAborted(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new RunAbortedError(`Run deadline reached during ${stage}`);
  }
}

export async function runPipeline(
  deps: PipelineDeps,
  options: PipelineOptions,
): Promise<PipelineRunResult> {
  const now = deps.now ?? (() => new Date());
  const sleep = deps.sleep ?? defaultSleep;
  const runType = options.runType ?? "scheduled";
  const { signal } = options;

  let state: RunState = "idle";
  const transition = (next: RunState): void => {
    logger.debug(`Run state: ${state} -> ${next}`);
    state = next;
  };

  const stats: RunStats = createRunStats(now());
  const records: ListingRecord[] = [];
  const newsworthy: ListingRecord[] = [];
  let runId: number | null = null;

  logger.info("═══════════════════════════════════════════════════");
  logger.info(`  Listing Scan: ${runType}${options.dryRun ? " (dry run)" : ""}`);
  logger.info("═══════════════════════════════════════════════════");

  async function resolveAgent(input: ListingInput): Promise<ProducedListing> {
    const hasAgentData = Boolean(input.agentName || input.agentPhone);
    if (!input.agentUrl || (input.agentName && input.agentPhone)) {
      return { input, agentFresh: hasAgentData };
    }

    const cached = await deps.agentCache?.lookup(input.agentUrl);
    if (cached) {
      return {
        input: {
          ...input,
          agentName: input.agentName ?? cached.agentName,
          agentPhone: input.agentPhone ?? cached.agentPhone,
        },
        agentFresh: hasAgentData,
      };
    }

    if (!options.agentProfileLookups || !deps.agentProfiles) {
      return { input, agentFresh: hasAgentData };
    }

    const profile = await deps.agentProfiles.fetchProfile(input.agentUrl);
    if (!profile) {
      return { input, agentFresh: hasAgentData };
    }

    return {
      input: {
        ...input,
        agentName: input.agentName ?? profile.name,
        agentPhone: input.agentPhone ?? (normalizePhone(profile.phone) || null),
      },
      agentFresh: true,
    };
  }

  async function produce(candidate: Candidate): Promise<ProducedListing | null> {
    let details: EnrichedRecord | null = null;
    if (candidate.propertyId) {
      details = await deps.detailFetcher.fetchDetails(candidate.propertyId);
      if (!details) stats.detailsMissing++;
    } else {
      stats.detailsMissing++;
    }

    const classification = classify(details ?? candidate);
    const input = toListingInput(
      candidate,
      details,
      classification,
      options.listingBaseUrl,
    );

    if (!input) {
      stats.skippedCount++;
      logger.warn(`Skipping ${candidateLabel(candidate)}: no permalink`);
      return null;
    }

    return resolveAgent(input);
  }

  async function consume(item: ProducedListing): Promise<void> {
    const { isNew, record } = await deps.store.upsert(item.input);

    if (isNew) {
      stats.newListings++;
    } else {
      stats.updatedListings++;
    }
    if (record.hasSepticSystem) stats.septicMatches++;
    if (record.hasPrivateWell) stats.wellMatches++;

    records.push(record);
    if (isNewsworthy(record, isNew, options.newsworthy, now())) {
      newsworthy.push(record);
    }

    if (item.agentFresh && deps.agentCache && record.agentUrl) {
      await cacheAgent(deps.agentCache, record);
    }
  }

  // The listing is already stored; a cache miss here only costs a later lookup.
  async function cacheAgent(
    cache: AgentCache,
    record: ListingRecord,
  ): Promise<void> {
    if (!record.agentUrl) return;
    try {
      await cache.store(record.agentUrl, record.agentName, record.agentPhone);
    } catch (error) {
      const message = `agent-cache/${record.agentUrl}: ${errorMessage(error)}`;
      logger.warn(`Failed to cache agent ${message}`);
      stats.errors.push(message);
    }
  }

  async function notifySafely(
    action: string,
    send: () => Promise<void>,
  ): Promise<void> {
    try {
      await send();
    } catch (error) {
      logger.error(`Notifier ${action} failed: ${errorMessage(error)}`);
    }
  }

  try {
    if (deps.runLog) {
      runId = await deps.runLog.createRun(runType, options.dryRun ?? false);
      logger.info(`Run ID: ${runId}`);
    }

    // Searching
    transition("searching");
    logger.info(
      `Step 1/4: Searching ${options.partitions.length} partition(s)...`,
    );
    const allCandidates: Candidate[] = [];

    for (const [index, partition] of options.partitions.entries()) {
      throwIfAborted(signal, "search");
      if (index > 0 && options.politenessDelayMs > 0) {
        await sleep(options.politenessDelayMs);
      }

      const result = await deps.searchClient.search(
        partition,
        options.dateFloor,
        options.pageLimit,
      );
      stats.partitionsSearched++;

      if (!result.success) {
        stats.partitionsFailed++;
        stats.errors.push(
          `search/${partition.label}: ${result.error ?? "unknown error"}`,
        );
      }
      allCandidates.push(...result.candidates);
    }
    stats.candidatesFound = allCandidates.length;

    // Deduplicating
    transition("deduplicating");
    logger.info(`Step 2/4: Deduplicating ${allCandidates.length} candidates...`);
    const unique = dedupe(allCandidates);
    stats.totalProcessed = unique.length;

    // Enriching
    transition("enriching");
    logger.info(
      `Step 3/4: Enriching ${unique.length} listings (concurrency: ${options.maxConcurrentDetails})...`,
    );
    const summary = await runCoordinated({
      items: unique,
      concurrency: options.maxConcurrentDetails,
      signal,
      produce,
      consume,
      onProduceError: (candidate, error) => {
        const message = `${candidateLabel(candidate)}: ${errorMessage(error)}`;
        logger.error(`Failed to process listing ${message}`);
        stats.errors.push(message);
      },
      onConsumeError: (item, error) => {
        const message = `${item.input.listingUrl}: ${errorMessage(error)}`;
        logger.error(`Failed to store listing ${message}`);
        stats.errors.push(message);
      },
    });

    if (summary.aborted) {
      stats.skippedCount += summary.notStarted;
      throw new RunAbortedError(
        `Run deadline reached during enrichment (${summary.notStarted} listing(s) not started, ${summary.written} stored)`,
      );
    }

    // Finalizing
    transition("finalizing");
    logger.info("Step 4/4: Finalizing run...");
    stats.newsworthyCount = newsworthy.length;
    stats.completedAt = now().toISOString();

    if (deps.runLog && runId !== null) {
      await deps.runLog.finishRun(runId, "completed", stats);
    }

    await notifySafely("success report", () =>
      deps.notifier.reportSuccess(stats, records, newsworthy),
    );

    transition("completed");
    const durationMs = runDurationMs(stats);

    logger.info("Summary");
    logger.info(`  Candidates found: ${stats.candidatesFound}`);
    logger.info(`  Unique processed: ${stats.totalProcessed}`);
    logger.info(`  New listings: ${stats.newListings}`);
    logger.info(`  Updated listings: ${stats.updatedListings}`);
    logger.info(`  Septic matches: ${stats.septicMatches}`);
    logger.info(`  Well matches: ${stats.wellMatches}`);
    logger.info(`  Newsworthy: ${stats.newsworthyCount}`);
    logger.info(`  Skipped: ${stats.skippedCount}`);
    logger.info(
      `  Partitions: ${stats.partitionsSearched - stats.partitionsFailed}/${stats.partitionsSearched} succeeded`,
    );
    logger.info(`  Errors: ${stats.errors.length}`);
    if (durationMs !== null) {
      logger.info(`  Duration: ${(durationMs / 1000).toFixed(1)}s`);
    }
    logger.info("═══════════════════════════════════════════════════");

    return {
      runId,
      state: "completed",
      stats,
      durationMs,
      records,
      newsworthy,
    };
  } catch (error) {
    const failedDuring = state;
    transition("failed");

    const message = `Pipeline run failed during ${failedDuring}: ${errorMessage(error)}`;
    logger.error(message);
    stats.errors.push(message);
    stats.newsworthyCount = newsworthy.length;
    stats.completedAt = now().toISOString();

    if (deps.runLog && runId !== null) {
      try {
        await deps.runLog.finishRun(runId, "failed", stats);
      } catch (logError) {
        logger.error(`Failed to record run failure: ${errorMessage(logError)}`);
      }
    }

    await notifySafely("failure report", () =>
      deps.notifier.reportFailure(message),
    );

    return {
      runId,
      state: "failed",
      stats,
      durationMs: runDurationMs(stats),
      records,
      newsworthy,
    };
  }
}
