import { Hono } from "hono";
import { getDatabaseStats, quickHealthCheck, type SqliteDatabase } from "./db";
import type { ListingStore, RunLog } from "./db/store";
import type { AppConfig } from "./config";

export interface ServerDeps {
  config: AppConfig;
  db: SqliteDatabase;
  store: ListingStore;
  runLog: RunLog;
}

export function createApp(deps: ServerDeps): Hono {
  const { config, db, store, runLog } = deps;
  const app = new Hono();

  app.get("/health", (c) => {
    const dbOk = quickHealthCheck(db);

    return c.json(
      {
        status: dbOk ? "healthy" : "degraded",
        timestamp: new Date().toISOString(),
        dryRun: config.env.dryRun,
        database: {
          ok: dbOk,
          tables: getDatabaseStats(db),
        },
      },
      dbOk ? 200 : 503,
    );
  });

  app.get("/status", async (c) => {
    const [listings, lastRun] = await Promise.all([
      store.getStats(),
      runLog.getLastRun(),
    ]);

    return c.json({
      timestamp: new Date().toISOString(),
      dryRun: config.env.dryRun,
      environment: config.env.nodeEnv,
      schedule: config.env.ingestSchedule,
      partitions: config.partitions.map((p) => p.label),
      newsworthy: config.env.newsworthy,
      listings,
      lastRun,
    });
  });

  return app;
}
