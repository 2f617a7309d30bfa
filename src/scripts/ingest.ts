import "dotenv/config";
import { errorMessage, logger } from "../logger";
import { loadConfig } from "../config";
import { closeRuntime, createRuntime, runIngest, type Runtime } from "../bootstrap";

logger.info("═══════════════════════════════════════════════════");
logger.info("  Manual Ingest: Septic / Well Listing Scan");
logger.info("═══════════════════════════════════════════════════");

let runtime: Runtime | null = null;

try {
  runtime = await createRuntime(loadConfig());
  const result = await runIngest(runtime, "manual");
  const { stats } = result;

  logger.info("═══════════════════════════════════════════════════");
  logger.info(`  Ingest ${result.state === "completed" ? "Complete" : "FAILED"}`);
  logger.info("═══════════════════════════════════════════════════");
  logger.info(`  Run ID:        ${result.runId ?? "n/a"}`);
  logger.info(`  Processed:     ${stats.totalProcessed}`);
  logger.info(`  New:           ${stats.newListings}`);
  logger.info(`  Updated:       ${stats.updatedListings}`);
  logger.info(`  Septic / well: ${stats.septicMatches} / ${stats.wellMatches}`);
  logger.info(`  Newsworthy:    ${stats.newsworthyCount}`);
  logger.info(`  Errors:        ${stats.errors.length}`);
  if (result.durationMs !== null) {
    logger.info(`  Duration:      ${(result.durationMs / 1000).toFixed(1)}s`);
  }

  if (stats.errors.length > 0) {
    logger.warn("Errors encountered:");
    stats.errors.forEach((e) => logger.warn(`  • ${e}`));
  }

  // Per-listing errors still count as a completed run
  process.exitCode = result.state === "completed" ? 0 : 1;
} catch (error) {
  logger.error(`Ingest could not start: ${errorMessage(error)}`);
  process.exitCode = 1;
} finally {
  if (runtime) closeRuntime(runtime);
}
