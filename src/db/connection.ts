import { applySchema, openSqlite, type SqliteDb } from "./db";
import { isBusyError, StorageBusyError } from "./errors";
import { Mutex } from "./lock";
import { SCHEMA_SQL } from "./schema";
import { logger } from "../logger";

export type ConnectionManagerOptions = {
  dbPath: string;
  busyTimeoutMs?: number;
  /** Retries after the first busy failure. */
  maxRetries?: number;
  retryBaseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
};

export type ConnectionManager = {
  readonly dbPath: string;
  /** Opens the file and applies schema + migrations. Throws StorageUnavailableError if the file cannot be opened. */
  init(): Promise<void>;
  /**
   * Runs one synchronous database operation under the process-wide lock.
   * Busy/locked failures are retried with exponential back-off; anything else propagates at once.
   */
  withConnection<T>(operationName: string, operation: (db: SqliteDb) => T): Promise<T>;
  close(): Promise<void>;
};

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function retryDelayMs(attempt: number, baseMs: number): number {
  return baseMs * 2 ** attempt;
}

export function createConnectionManager(options: ConnectionManagerOptions): ConnectionManager {
  const { dbPath, busyTimeoutMs = 30_000, maxRetries = 3, retryBaseDelayMs = 100, sleep = delay } = options;
  const lock = new Mutex();
  let db: SqliteDb | null = null;

  function connection(): SqliteDb {
    if (db && db.open) return db;
    const opened = openSqlite(dbPath, { busyTimeoutMs });
    try {
      applySchema(opened, SCHEMA_SQL);
    } catch (err) {
      opened.close();
      throw err;
    }
    db = opened;
    return opened;
  }

  async function withConnection<T>(operationName: string, operation: (conn: SqliteDb) => T): Promise<T> {
    return lock.runExclusive(async () => {
      for (let attempt = 1; ; attempt += 1) {
        try {
          return operation(connection());
        } catch (err) {
          if (!isBusyError(err)) throw err;

          if (attempt > maxRetries) {
            logger.error({ err, operationName, attempts: attempt }, "Database still locked; giving up");
            throw new StorageBusyError(attempt, err);
          }

          const waitMs = retryDelayMs(attempt, retryBaseDelayMs);
          logger.warn(
            { operationName, attempt, maxAttempts: maxRetries + 1, waitMs },
            "Database locked; retrying after back-off"
          );
          await sleep(waitMs);
        }
      }
    });
  }

  return {
    dbPath,
    async init() {
      await lock.runExclusive(() => {
        connection();
      });
      logger.info({ dbPath }, "SQLite ready");
    },
    withConnection,
    async close() {
      await lock.runExclusive(() => {
        if (db && db.open) db.close();
        db = null;
      });
    }
  };
}
