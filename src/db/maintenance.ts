import type { ConnectionManager } from "./connection";
import type { NutritionLedger, SweepResult } from "./nutritionRepo";
import type { SubscriptionStats, SubscriptionStore } from "./subscriptionsRepo";
import { logger } from "../logger";

// Largest delay setInterval accepts; anything above fires after 1 ms.
export const MAX_TIMER_MS = 2 ** 31 - 1;

export type DbMaintenanceResult = {
  startedAt: Date;
  retentionHours: number;
  expiredSubscriptionsDeleted: number;
  ledger: SweepResult;
  subscriptionStats: SubscriptionStats | null;
};

export type DatabaseStatus = {
  journalMode: string;
  synchronous: number;
  tables: string[];
  databaseSizeBytes: number;
  foodAnalysesCount: number;
  subscriptionsCount: number;
};

/**
 * Sweeps lapsed subscriptions and ledger rows past the retention horizon.
 * Both stores report their own failures, so this never throws.
 */
export async function runDbMaintenance(params: {
  subscriptions: SubscriptionStore;
  ledger: NutritionLedger;
  retentionHours: number;
  now?: () => number;
}): Promise<DbMaintenanceResult> {
  const { subscriptions, ledger, now = Date.now } = params;
  const retentionHours = Math.max(1, Math.floor(params.retentionHours));
  const startedAt = new Date(now());

  const expiredSubscriptionsDeleted = await subscriptions.sweepExpired();
  const ledgerResult = await ledger.sweepOlderThan(retentionHours);
  const subscriptionStats = await subscriptions.stats();

  const result = {
    startedAt,
    retentionHours,
    expiredSubscriptionsDeleted,
    ledger: ledgerResult,
    subscriptionStats
  };
  logger.info(result, "DB maintenance complete");
  return result;
}

export function startMaintenanceScheduler(params: {
  intervalMs: number;
  run: () => Promise<DbMaintenanceResult>;
  onResult?: (result: DbMaintenanceResult) => Promise<void>;
}): { stop: () => void } {
  const { run, onResult } = params;
  const intervalMs = Math.min(params.intervalMs, MAX_TIMER_MS);
  let running = false;

  const tick = async () => {
    if (running) {
      logger.warn("Previous maintenance run still in progress; skipping this tick");
      return;
    }
    running = true;
    try {
      const result = await run();
      if (onResult) await onResult(result);
    } catch (err) {
      logger.error({ err }, "Scheduled maintenance failed");
    } finally {
      running = false;
    }
  };

  const timer = setInterval(() => {
    void tick();
  }, intervalMs);
  timer.unref();

  logger.info({ intervalMs }, "Maintenance scheduler started");
  return {
    stop: () => {
      clearInterval(timer);
      logger.info("Maintenance scheduler stopped");
    }
  };
}

export async function getDatabaseStatus(conn: ConnectionManager): Promise<DatabaseStatus | null> {
  try {
    return await conn.withConnection("db.status", (db) => {
      const journalMode = db.pragma("journal_mode", { simple: true });
      const synchronous = db.pragma("synchronous", { simple: true });
      const tables = db
        .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
        .all() as { name: string }[];
      const size = db
        .prepare("SELECT page_count * page_size AS size FROM pragma_page_count(), pragma_page_size()")
        .get() as { size: number };
      const food = db.prepare("SELECT COUNT(*) AS count FROM food_analyses").get() as { count: number };
      const subs = db.prepare("SELECT COUNT(*) AS count FROM subscriptions").get() as { count: number };

      return {
        journalMode: String(journalMode),
        synchronous: Number(synchronous),
        tables: tables.map((t) => t.name),
        databaseSizeBytes: size.size,
        foodAnalysesCount: food.count,
        subscriptionsCount: subs.count
      };
    });
  } catch (err) {
    logger.error({ err }, "Failed to read database status");
    return null;
  }
}

/** Truncates the WAL and refreshes planner statistics. */
export async function optimizeDatabase(conn: ConnectionManager): Promise<boolean> {
  try {
    await conn.withConnection("db.optimize", (db) => {
      db.pragma("wal_checkpoint(TRUNCATE)");
      db.exec("ANALYZE");
    });
    logger.info("Database checkpointed and analysed");
    return true;
  } catch (err) {
    logger.error({ err }, "Failed to optimize database");
    return false;
  }
}
