import { createTelegramNotifier } from "./alerts";
import { createAgentProfileFetcher } from "./connectors/agent-profile";
import { createDetailFetcher } from "./connectors/realtor-details";
import { computeDateFloor, createSearchClient } from "./connectors/realtor-search";
import { openDatabase, type SqliteDatabase } from "./db";
import { SqliteStore } from "./db/operations";
import { logger } from "./logger";
import { runPipeline, type PipelineDeps, type PipelineOptions } from "./pipeline";
import type { AppConfig } from "./config";
import type { PipelineRunResult } from "./types";

export interface Runtime {
  config: AppConfig;
  db: SqliteDatabase;
  store: SqliteStore;
  deps: PipelineDeps;
}

/** Opens and migrates the database and builds every pipeline collaborator. */
export async function createRuntime(config: AppConfig): Promise<Runtime> {
  const { env, sources, queries } = config;
  const origin = sources.listingBaseUrl;

  const db = openDatabase(env.databasePath);
  const store = new SqliteStore(db);
  await store.init();

  const deps: PipelineDeps = {
    searchClient: createSearchClient({
      graphqlUrl: sources.graphqlUrl,
      origin,
      userAgent: sources.userAgent,
      maxPageSize: sources.maxPageSize,
      endpoint: sources.search,
      query: queries.search,
    }),
    detailFetcher: createDetailFetcher({
      graphqlUrl: sources.graphqlUrl,
      origin,
      userAgent: sources.userAgent,
      endpoint: sources.details,
      query: queries.details,
    }),
    agentProfiles: createAgentProfileFetcher({
      userAgent: sources.userAgent,
      timeoutMs: sources.agentProfiles.timeoutMs,
    }),
    store,
    agentCache: store,
    runLog: store,
    notifier: createTelegramNotifier({
      botToken: env.telegramBotToken,
      chatIds: env.telegramChatIds,
      dryRun: env.dryRun,
    }),
  };

  return { config, db, store, deps };
}

export function buildPipelineOptions(
  config: AppConfig,
  runType: string,
  now: Date = new Date(),
): PipelineOptions {
  const { env, sources, partitions } = config;

  return {
    partitions,
    dateFloor: computeDateFloor(env.daysOld, now),
    pageLimit: env.pageLimit,
    maxConcurrentDetails: env.maxConcurrentDetails,
    politenessDelayMs: sources.politenessDelayMs,
    newsworthy: env.newsworthy,
    listingBaseUrl: sources.listingBaseUrl,
    agentProfileLookups: env.agentProfileLookups,
    runType,
    dryRun: env.dryRun,
    signal:
      env.runTimeoutMs > 0 ? AbortSignal.timeout(env.runTimeoutMs) : undefined,
  };
}

export function runIngest(
  runtime: Runtime,
  runType: string,
): Promise<PipelineRunResult> {
  const options = buildPipelineOptions(runtime.config, runType);
  if (options.signal) {
    logger.info(`Run deadline: ${runtime.config.env.runTimeoutMs}ms`);
  }
  return runPipeline(runtime.deps, options);
}

export function closeRuntime(runtime: Runtime): void {
  runtime.db.close();
}
