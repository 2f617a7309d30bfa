import "dotenv/config";
import { serve } from "@hono/node-server";
import { errorMessage, logger } from "./logger";
import { checkDatabaseIntegrity } from "./db";
import { loadConfig, type AppConfig } from "./config";
import { createRuntime, runIngest, type Runtime } from "./bootstrap";
import { createRunGuard, startScheduler } from "./scheduler";
import { createApp } from "./server";

logger.info("═══════════════════════════════════════════════════");
logger.info("  Septic / Well Listing Tracker");
logger.info("═══════════════════════════════════════════════════");

let config: AppConfig;
try {
  config = loadConfig();
} catch (error) {
  logger.error("Failed to load configuration:", error);
  process.exit(1);
}

let runtime: Runtime;
try {
  runtime = await createRuntime(config);
} catch (error) {
  logger.error(`Failed to initialize database: ${errorMessage(error)}`);
  process.exit(1);
}

const integrity = checkDatabaseIntegrity(runtime.db);
if (!integrity.ok) {
  logger.error(`Database integrity check failed: ${integrity.result}`);
  logger.error(
    `Please restore from backup or delete ${config.env.databasePath} to recreate.`,
  );
  process.exit(1);
}

const app = createApp({
  config,
  db: runtime.db,
  store: runtime.store,
  runLog: runtime.store,
});

const port = config.env.port;
logger.info(`Starting server on port ${port}...`);

startScheduler(
  createRunGuard((runType) => runIngest(runtime, runType)),
  {
    schedule: config.env.ingestSchedule,
    timezone: config.env.timezone,
    runLog: runtime.store,
  },
);

serve({ fetch: app.fetch, port }, (info) => {
  logger.info(`✅ Listing tracker started on http://localhost:${info.port}`);
  logger.info(`   Health: http://localhost:${info.port}/health`);
  logger.info(`   Status: http://localhost:${info.port}/status`);
  logger.info("═══════════════════════════════════════════════════");
});
