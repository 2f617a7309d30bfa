import type Database from "better-sqlite3";
import { CREATE_LISTING_TABLES_SQL, CREATE_RUN_LOG_SQL } from "./schema";
import { logger } from "../logger";

interface Migration {
  id: string;
  description: string;
  sql: string;
}

const MIGRATIONS: Migration[] = [
  {
    id: "0001_listings_and_agents",
    description: "Listings with visit tracking and the agent profile cache",
    sql: CREATE_LISTING_TABLES_SQL,
  },
  {
    id: "0002_run_log",
    description: "Per-run statistics and terminal state",
    sql: CREATE_RUN_LOG_SQL,
  },
];

function ensureMigrationTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id TEXT PRIMARY KEY,
      description TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);
}

function isApplied(db: Database.Database, id: string): boolean {
  const row = db
    .prepare<[string], { id: string }>(
      "SELECT id FROM _migrations WHERE id = ? LIMIT 1",
    )
    .get(id);
  return row !== undefined;
}

export function runMigrations(db: Database.Database): string[] {
  ensureMigrationTable(db);
  const applied: string[] = [];

  for (const migration of MIGRATIONS) {
    if (isApplied(db, migration.id)) {
      continue;
    }

    logger.info(`Applying migration ${migration.id}: ${migration.description}`);
    const apply = db.transaction(() => {
      db.exec(migration.sql);
      db.prepare("INSERT INTO _migrations (id, description) VALUES (?, ?)").run(
        migration.id,
        migration.description,
      );
    });

    try {
      apply();
      applied.push(migration.id);
      logger.info(`Applied migration ${migration.id}`);
    } catch (error) {
      logger.error(`Migration ${migration.id} failed:`, error);
      throw error;
    }
  }

  return applied;
}
