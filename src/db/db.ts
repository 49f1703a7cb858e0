import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { applyDbMigrations } from "./migrations";
import { StorageUnavailableError } from "./errors";
import { logger } from "../logger";

export type SqliteDb = Database.Database;

export function openSqlite(dbPath: string, options: { busyTimeoutMs?: number } = {}): SqliteDb {
  const { busyTimeoutMs = 30_000 } = options;

  let db: SqliteDb | null = null;
  try {
    if (dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    db = new Database(dbPath, { timeout: busyTimeoutMs });

    // WAL lets readers proceed while the single writer commits.
    db.pragma("journal_mode = WAL");
    db.pragma("synchronous = NORMAL");
    db.pragma("temp_store = MEMORY");
    db.pragma("cache_size = 10000");
    db.pragma("foreign_keys = ON");
    return db;
  } catch (err) {
    if (db?.open) db.close();
    throw new StorageUnavailableError(dbPath, err);
  }
}

export function applySchema(db: SqliteDb, schemaSql: string) {
  db.exec(schemaSql);

  try {
    const result = applyDbMigrations(db);
    if (result.applied.length > 0) {
      logger.info({ appliedMigrations: result.applied }, "Applied DB migrations");
    }
    logger.debug({ totalMigrations: result.total, appliedCount: result.applied.length }, "DB migration check complete");
  } catch (err) {
    logger.error({ err }, "Failed to apply schema migrations");
    throw err;
  }
}
