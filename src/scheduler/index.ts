import cron, { type ScheduledTask } from "node-cron";
import { errorMessage, logger } from "../logger";
import type { RunLog } from "../db/store";
import type { PipelineRunResult } from "../types";

export type IngestRunner = (runType: string) => Promise<PipelineRunResult>;
export type GuardedIngestRunner = (
  runType: string,
) => Promise<PipelineRunResult | null>;

const CATCH_UP_AFTER_HOURS = 24;

/** One run at a time per process; a run requested mid-run is skipped. */
export function createRunGuard(run: IngestRunner): GuardedIngestRunner {
  let running = false;

  return async (runType) => {
    if (running) {
      logger.warn(`[LOCK] Pipeline already running, skipping ${runType} run`);
      return null;
    }
    running = true;
    try {
      return await run(runType);
    } finally {
      running = false;
    }
  };
}

export interface SchedulerOptions {
  schedule: string;
  timezone: string;
  runLog: RunLog;
  now?: () => Date;
}

export async function shouldCatchUp(
  runLog: RunLog,
  now: Date,
): Promise<boolean> {
  const lastRun = await runLog.getLastRun();
  if (!lastRun) {
    logger.info("[CATCH-UP] No previous runs found");
    return true;
  }

  const hoursSinceLastRun =
    (now.getTime() - new Date(lastRun.startedAt).getTime()) / (1000 * 60 * 60);
  if (lastRun.state !== "completed" || hoursSinceLastRun > CATCH_UP_AFTER_HOURS) {
    logger.info(
      `[CATCH-UP] Last run (${lastRun.state}) was ${hoursSinceLastRun.toFixed(1)}h ago`,
    );
    return true;
  }

  logger.info(
    `[CATCH-UP] Last run was ${hoursSinceLastRun.toFixed(1)}h ago, no catch-up needed`,
  );
  return false;
}

export function startScheduler(
  run: GuardedIngestRunner,
  options: SchedulerOptions,
): ScheduledTask {
  if (!cron.validate(options.schedule)) {
    throw new Error(`Invalid INGEST_SCHEDULE: "${options.schedule}"`);
  }

  logger.info("Starting scheduler...");

  const task = cron.schedule(
    options.schedule,
    async () => {
      logger.info("[CRON] Starting scheduled listing scan...");
      try {
        const result = await run("scheduled");
        if (!result) return;
        logger.info(
          `[CRON] Scan ${result.state}: ${result.stats.newListings} new, ${result.stats.updatedListings} updated, ${result.stats.errors.length} errors`,
        );
      } catch (error) {
        logger.error(`[CRON] Scheduled scan failed: ${errorMessage(error)}`);
      }
    },
    { timezone: options.timezone },
  );
  logger.info(`  ✓ Listing scan: "${options.schedule}" (${options.timezone})`);

  const now = options.now ?? (() => new Date());
  shouldCatchUp(options.runLog, now())
    .then((needed) => (needed ? run("catch-up") : null))
    .catch((error: unknown) => {
      logger.error(`[SCHEDULER] Startup catch-up failed: ${errorMessage(error)}`);
    });

  return task;
}
