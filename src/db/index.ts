import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "fs";
import { dirname } from "path";
import { EXPECTED_TABLES, SCHEMA_VERSION } from "./schema";
import { runMigrations } from "./migrations";
import { logger } from "../logger";

export type SqliteDatabase = Database.Database;

const MEMORY_PATH = ":memory:";

export function openDatabase(path: string): SqliteDatabase {
  if (path !== MEMORY_PATH) {
    const dataDir = dirname(path);
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
      logger.info(`Created data directory: ${dataDir}`);
    }
  }

  const db = new Database(path);

  // WAL lets the status script read while an ingest run writes
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  db.pragma("busy_timeout = 5000");

  return db;
}

export function initializeDatabase(db: SqliteDatabase): void {
  logger.info("Initializing database...");

  try {
    runMigrations(db);

    const tableNames = db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type='table' ORDER BY name",
      )
      .all()
      .map((t) => t.name)
      .filter((n) => n !== "sqlite_sequence");

    logger.info(
      `Database initialized with ${tableNames.length} tables: ${tableNames.join(", ")}`,
    );

    const missing = EXPECTED_TABLES.filter((t) => !tableNames.includes(t));
    if (missing.length > 0) {
      logger.warn(`Missing tables after migration: ${missing.join(", ")}`);
    }
  } catch (error) {
    logger.error("Failed to initialize database:", error);
    throw error;
  }
}

export function checkDatabaseIntegrity(db: SqliteDatabase): {
  ok: boolean;
  result: string;
} {
  try {
    const result = db
      .prepare<[], { integrity_check: string }>("PRAGMA integrity_check")
      .get();
    const isOk = result?.integrity_check === "ok";

    if (!isOk) {
      logger.error(`Database integrity check FAILED: ${result?.integrity_check}`);
    } else {
      logger.info("Database integrity check passed");
    }

    return { ok: isOk, result: result?.integrity_check ?? "unknown" };
  } catch (error) {
    logger.error("Database integrity check threw error:", error);
    return { ok: false, result: String(error) };
  }
}

export function getDatabaseStats(db: SqliteDatabase): Record<string, number> {
  const stats: Record<string, number> = {};

  for (const table of [...EXPECTED_TABLES, "_migrations"]) {
    try {
      const result = db
        .prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM ${table}`)
        .get();
      stats[table] = result?.count ?? 0;
    } catch {
      stats[table] = -1; // table missing
    }
  }

  return stats;
}

export function quickHealthCheck(db: SqliteDatabase): boolean {
  try {
    const result = db.prepare<[], { ok: number }>("SELECT 1 as ok").get();
    return result?.ok === 1;
  } catch {
    return false;
  }
}

export { SCHEMA_VERSION };
