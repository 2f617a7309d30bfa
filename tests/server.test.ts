import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { loadConfig } from "../src/config";
import { openDatabase, type SqliteDatabase } from "../src/db";
import { SqliteStore } from "../src/db/operations";
import { createApp } from "../src/server";
import { createRunStats } from "../src/types";
import { makeListingInput } from "./helpers";

const CONFIG_DIR = join(dirname(fileURLToPath(import.meta.url)), "..", "config");

describe("http server", () => {
  let db: SqliteDatabase;
  let store: SqliteStore;

  beforeEach(async () => {
    db = openDatabase(":memory:");
    store = new SqliteStore(db, () => new Date("2025-03-01T12:00:00.000Z"));
    await store.init();
  });

  afterEach(() => {
    db.close();
  });

  function app() {
    return createApp({
      config: loadConfig({ configDir: CONFIG_DIR, env: { DRY_RUN: "true" } }),
      db,
      store,
      runLog: store,
    });
  }

  it("reports health with table counts", async () => {
    const response = await app().request("/health");

    expect(response.status).toBe(200);
    const body = await response.json();
    expect(body).toMatchObject({
      status: "healthy",
      dryRun: true,
      database: {
        ok: true,
        tables: { listings: 0, agents: 0, run_log: 0, _migrations: 2 },
      },
    });
  });

  it("reports listing stats and the last run", async () => {
    await store.upsert(makeListingInput({ hasSepticSystem: true }));
    const runId = await store.createRun("manual", false);
    const stats = createRunStats(new Date("2025-03-01T12:00:00.000Z"));
    stats.totalProcessed = 1;
    stats.newListings = 1;
    stats.completedAt = "2025-03-01T12:01:00.000Z";
    await store.finishRun(runId, "completed", stats);

    const response = await app().request("/status");

    expect(response.status).toBe(200);
    const body = await response.json();
    expect(body).toMatchObject({
      dryRun: true,
      schedule: "0 8 * * *",
      newsworthy: { kind: "rolling", hours: 24 },
      listings: { totalListings: 1, withSeptic: 1, withWell: 0, newLast24h: 1 },
      lastRun: {
        id: runId,
        runType: "manual",
        state: "completed",
        totalProcessed: 1,
        newListings: 1,
      },
    });
  });
});
