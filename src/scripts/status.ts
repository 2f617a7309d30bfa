/**
 * Prints listing totals, the last run and the active configuration.
 */

import "dotenv/config";
import { logger } from "../logger";
import { getDatabaseStats, initializeDatabase, openDatabase } from "../db";
import { SqliteStore } from "../db/operations";
import { loadConfig } from "../config";

const config = loadConfig();
const db = openDatabase(config.env.databasePath);
initializeDatabase(db);
const store = new SqliteStore(db);

logger.info("═══════════════════════════════════════════════════");
logger.info("  System Status");
logger.info("═══════════════════════════════════════════════════");

const stats = await store.getStats();
logger.info(`🏠 Total listings: ${stats.totalListings}`);
logger.info(`🚽 With septic: ${stats.withSeptic}`);
logger.info(`💧 With private well: ${stats.withWell}`);
logger.info(`🆕 First seen in last 24h: ${stats.newLast24h}`);
logger.info(`👤 Cached agents: ${getDatabaseStats(db).agents ?? 0}`);

const lastRun = await store.getLastRun();
if (lastRun) {
  logger.info(`\n🕐 Last run:`);
  logger.info(`   Type: ${lastRun.runType}${lastRun.dryRun ? " (dry run)" : ""}`);
  logger.info(`   Started: ${lastRun.startedAt}`);
  logger.info(`   Finished: ${lastRun.finishedAt ?? "still running"}`);
  logger.info(`   State: ${lastRun.state}`);
  logger.info(
    `   Processed: ${lastRun.totalProcessed}, New: ${lastRun.newListings}, Updated: ${lastRun.updatedListings}`,
  );
  if (lastRun.errors.length > 0) {
    logger.info(`   Errors: ${lastRun.errors.length} (first: ${lastRun.errors[0]})`);
  }
} else {
  logger.info("\n🕐 No runs recorded yet");
}

logger.info(`\n⚙️  Environment: ${config.env.nodeEnv}`);
logger.info(`🧪 Dry run: ${config.env.dryRun}`);
logger.info(`🗺  Partitions: ${config.partitions.map((p) => p.label).join(", ")}`);
logger.info(`⏰ Schedule: ${config.env.ingestSchedule} (${config.env.timezone})`);

logger.info("═══════════════════════════════════════════════════");
db.close();
