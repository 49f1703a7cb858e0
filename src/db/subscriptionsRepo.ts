import type { ConnectionManager } from "./connection";
import type { SqliteDb } from "./db";
import { logger } from "../logger";

export const DAY_MS = 24 * 60 * 60 * 1000;
/** A billing month is a flat 30 days; renewals stack in 30-day blocks. */
export const SUBSCRIPTION_MONTH_MS = 30 * DAY_MS;
export const EXPIRING_SOON_DAYS = 7;

export type SubscriptionRow = {
  user_id: number;
  start_date: number;
  end_date: number;
  created_at: number;
  updated_at: number;
};

export type SubscriptionRecord = {
  userId: number;
  startDate: Date;
  endDate: Date;
  createdAt: Date;
  updatedAt: Date;
  daysLeft: number;
  isActive: boolean;
};

export type SubscriptionStatus =
  | ({ hasSubscription: true } & Omit<SubscriptionRecord, "userId">)
  | { hasSubscription: false; startDate: null; endDate: null; daysLeft: 0; isActive: false };

export type SubscriptionStats = {
  total: number;
  active: number;
  expired: number;
  expiringSoon: number;
};

export type SubscriptionStore = {
  upsertSubscription(userId: number, months: number): Promise<boolean>;
  getStatus(userId: number): Promise<SubscriptionStatus>;
  revoke(userId: number): Promise<boolean>;
  sweepExpired(): Promise<number>;
  listAll(): Promise<SubscriptionRecord[]>;
  stats(): Promise<SubscriptionStats | null>;
};

const NO_SUBSCRIPTION: SubscriptionStatus = {
  hasSubscription: false,
  startDate: null,
  endDate: null,
  daysLeft: 0,
  isActive: false
};

export function computeDaysLeft(endMs: number, nowMs: number): number {
  return Math.max(0, Math.floor((endMs - nowMs) / DAY_MS));
}

/**
 * New end date for a purchase of `months`. An active window is extended from its
 * current end; a missing or lapsed one restarts from now.
 */
export function nextEndDate(existingEndMs: number | null, months: number, nowMs: number): number {
  const extension = months * SUBSCRIPTION_MONTH_MS;
  if (existingEndMs !== null && existingEndMs > nowMs) {
    return existingEndMs + extension;
  }
  return nowMs + extension;
}

export function toSubscriptionRecord(row: SubscriptionRow, nowMs: number): SubscriptionRecord {
  return {
    userId: row.user_id,
    startDate: new Date(row.start_date),
    endDate: new Date(row.end_date),
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
    daysLeft: computeDaysLeft(row.end_date, nowMs),
    isActive: row.end_date > nowMs
  };
}

export function getSubscriptionRow(db: SqliteDb, userId: number): SubscriptionRow | null {
  const row = db.prepare("SELECT * FROM subscriptions WHERE user_id = ?").get(userId) as SubscriptionRow | undefined;
  return row ?? null;
}

function writeSubscription(db: SqliteDb, userId: number, months: number, nowMs: number): number {
  const txn = db.transaction(() => {
    const existing = getSubscriptionRow(db, userId);
    if (!existing) {
      const endDate = nextEndDate(null, months, nowMs);
      db.prepare(
        "INSERT INTO subscriptions (user_id, start_date, end_date, created_at, updated_at) VALUES (?, ?, ?, ?, ?)"
      ).run(userId, nowMs, endDate, nowMs, nowMs);
      return endDate;
    }

    const endDate = nextEndDate(existing.end_date, months, nowMs);
    // A lapsed window starts over, so its start date moves to now as well.
    const startDate = existing.end_date > nowMs ? existing.start_date : nowMs;
    db.prepare("UPDATE subscriptions SET start_date = ?, end_date = ?, updated_at = ? WHERE user_id = ?").run(
      startDate,
      endDate,
      nowMs,
      userId
    );
    return endDate;
  });
  return txn();
}

export function createSubscriptionStore(params: { conn: ConnectionManager; now?: () => number }): SubscriptionStore {
  const { conn, now = Date.now } = params;

  return {
    async upsertSubscription(userId, months) {
      if (!Number.isInteger(months) || months < 1) {
        logger.warn({ userId, months }, "Rejected subscription upsert with invalid month count");
        return false;
      }
      try {
        const nowMs = now();
        const endDate = await conn.withConnection("subscriptions.upsert", (db) =>
          writeSubscription(db, userId, months, nowMs)
        );
        logger.info({ userId, months, endDate: new Date(endDate).toISOString() }, "Subscription activated");
        return true;
      } catch (err) {
        logger.error({ err, userId, months }, "Failed to upsert subscription");
        return false;
      }
    },

    async getStatus(userId) {
      try {
        const row = await conn.withConnection("subscriptions.get", (db) => getSubscriptionRow(db, userId));
        if (!row) return NO_SUBSCRIPTION;
        const { userId: _ignored, ...record } = toSubscriptionRecord(row, now());
        return { hasSubscription: true, ...record };
      } catch (err) {
        logger.error({ err, userId }, "Failed to read subscription status");
        return NO_SUBSCRIPTION;
      }
    },

    async revoke(userId) {
      try {
        const changes = await conn.withConnection(
          "subscriptions.revoke",
          (db) => db.prepare("DELETE FROM subscriptions WHERE user_id = ?").run(userId).changes
        );
        logger.info({ userId, existed: changes > 0 }, "Subscription revoked");
        return changes > 0;
      } catch (err) {
        logger.error({ err, userId }, "Failed to revoke subscription");
        return false;
      }
    },

    async sweepExpired() {
      try {
        const nowMs = now();
        const deleted = await conn.withConnection(
          "subscriptions.sweepExpired",
          (db) => db.prepare("DELETE FROM subscriptions WHERE end_date < ?").run(nowMs).changes
        );
        if (deleted > 0) logger.info({ deleted }, "Expired subscriptions removed");
        return deleted;
      } catch (err) {
        logger.error({ err }, "Failed to sweep expired subscriptions");
        return 0;
      }
    },

    async listAll() {
      try {
        const rows = await conn.withConnection(
          "subscriptions.listAll",
          (db) => db.prepare("SELECT * FROM subscriptions ORDER BY end_date DESC").all() as SubscriptionRow[]
        );
        const nowMs = now();
        return rows.map((row) => toSubscriptionRecord(row, nowMs));
      } catch (err) {
        logger.error({ err }, "Failed to list subscriptions");
        return [];
      }
    },

    async stats() {
      try {
        const nowMs = now();
        const row = await conn.withConnection(
          "subscriptions.stats",
          (db) =>
            db
              .prepare(
                [
                  "SELECT COUNT(*) AS total,",
                  "COALESCE(SUM(CASE WHEN end_date > @now THEN 1 ELSE 0 END), 0) AS active,",
                  "COALESCE(SUM(CASE WHEN end_date - @now >= @day AND end_date - @now < @soonLimit THEN 1 ELSE 0 END), 0) AS expiringSoon",
                  "FROM subscriptions"
                ].join(" ")
              )
              .get({ now: nowMs, day: DAY_MS, soonLimit: (EXPIRING_SOON_DAYS + 1) * DAY_MS }) as {
              total: number;
              active: number;
              expiringSoon: number;
            }
        );
        return {
          total: row.total,
          active: row.active,
          expired: row.total - row.active,
          expiringSoon: row.expiringSoon
        };
      } catch (err) {
        logger.error({ err }, "Failed to compute subscription stats");
        return null;
      }
    }
  };
}
