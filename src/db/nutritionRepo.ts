import { addDays, startOfDay } from "date-fns";
import type { ConnectionManager } from "./connection";
import type { SqliteDb } from "./db";
import { logger } from "../logger";

export const WATER_DISH_NAME = "Water";
const HOUR_MS = 60 * 60 * 1000;

export type NutritionEventInput = {
  userId: number;
  rawText: string;
  dishName: string;
  weightG: number;
  calories: number;
  proteinG: number;
  fatG: number;
  carbsG: number;
  waterMl: number;
};

export type FoodAnalysisRow = {
  id: number;
  user_id: number;
  analysis_text: string;
  dish_name: string;
  dish_weight: number;
  calories: number;
  protein: number;
  fat: number;
  carbs: number;
  water_ml: number;
  created_at: number;
};

export type DailyStats = {
  dishesCount: number;
  totalCalories: number;
  totalProtein: number;
  totalFat: number;
  totalCarbs: number;
  waterMl: number;
};

export type LedgerEntry = {
  id: number;
  createdAt: Date;
  dishName: string;
  weightG: number;
  calories: number;
  proteinG: number;
  fatG: number;
  carbsG: number;
  waterMl: number;
};

export type WindowedStats = DailyStats & {
  windowStart: Date;
  windowEnd: Date;
  totalWeight: number;
  averageCalories: number;
  entries: LedgerEntry[];
};

export type SweepResult = {
  usersScanned: number;
  totalDeleted: number;
  errorCount: number;
};

export type NutritionLedger = {
  appendEvent(input: NutritionEventInput): Promise<boolean>;
  addWater(userId: number, waterMl: number): Promise<boolean>;
  dailyStats(userId: number): Promise<DailyStats | null>;
  windowedStats(userId: number, hours: number): Promise<WindowedStats | null>;
  clearUserHistory(userId: number): Promise<boolean>;
  sweepOlderThan(hours: number): Promise<SweepResult>;
};

/** Local calendar day containing `nowMs`, as a half-open [start, end) range. */
export function calendarDayWindow(nowMs: number): { start: number; end: number } {
  const start = startOfDay(nowMs);
  return { start: start.getTime(), end: addDays(start, 1).getTime() };
}

/** Only strictly positive-calorie, non-water rows count as an analysed dish. */
export function isCountedDish(row: Pick<FoodAnalysisRow, "dish_name" | "calories">): boolean {
  return row.dish_name !== WATER_DISH_NAME && row.calories > 0;
}

export function aggregateRows(rows: FoodAnalysisRow[]): DailyStats & { totalWeight: number } {
  const totals = {
    dishesCount: 0,
    totalCalories: 0,
    totalProtein: 0,
    totalFat: 0,
    totalCarbs: 0,
    totalWeight: 0,
    waterMl: 0
  };

  for (const row of rows) {
    if (isCountedDish(row)) {
      totals.dishesCount += 1;
      totals.totalCalories += row.calories;
      totals.totalProtein += row.protein;
      totals.totalFat += row.fat;
      totals.totalCarbs += row.carbs;
      totals.totalWeight += row.dish_weight;
    }
    totals.waterMl += row.water_ml;
  }

  return totals;
}

function toLedgerEntry(row: FoodAnalysisRow): LedgerEntry {
  return {
    id: row.id,
    createdAt: new Date(row.created_at),
    dishName: row.dish_name,
    weightG: row.dish_weight,
    calories: row.calories,
    proteinG: row.protein,
    fatG: row.fat,
    carbsG: row.carbs,
    waterMl: row.water_ml
  };
}

function nonNegative(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : 0;
}

export function insertFoodAnalysis(db: SqliteDb, input: NutritionEventInput, createdAt: number): number {
  const result = db
    .prepare(
      [
        "INSERT INTO food_analyses",
        "(user_id, analysis_text, dish_name, dish_weight, calories, protein, fat, carbs, water_ml, created_at)",
        "VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)"
      ].join(" ")
    )
    .run(
      input.userId,
      input.rawText,
      input.dishName,
      nonNegative(input.weightG),
      nonNegative(input.calories),
      nonNegative(input.proteinG),
      nonNegative(input.fatG),
      nonNegative(input.carbsG),
      nonNegative(input.waterMl),
      createdAt
    );
  return Number(result.lastInsertRowid);
}

export function selectRowsBetween(db: SqliteDb, userId: number, fromMs: number, toMs: number, toInclusive: boolean) {
  const upper = toInclusive ? "created_at <= ?" : "created_at < ?";
  return db
    .prepare(`SELECT * FROM food_analyses WHERE user_id = ? AND created_at >= ? AND ${upper} ORDER BY created_at, id`)
    .all(userId, fromMs, toMs) as FoodAnalysisRow[];
}

function upsertTodayWater(db: SqliteDb, userId: number, waterMl: number, nowMs: number) {
  const { start, end } = calendarDayWindow(nowMs);
  const txn = db.transaction(() => {
    const latest = db
      .prepare(
        "SELECT id, water_ml FROM food_analyses WHERE user_id = ? AND created_at >= ? AND created_at < ? ORDER BY created_at DESC, id DESC LIMIT 1"
      )
      .get(userId, start, end) as Pick<FoodAnalysisRow, "id" | "water_ml"> | undefined;

    if (latest) {
      db.prepare("UPDATE food_analyses SET water_ml = water_ml + ? WHERE id = ?").run(waterMl, latest.id);
      return { rowId: latest.id, inserted: false, waterMl: latest.water_ml + waterMl };
    }

    const rowId = insertFoodAnalysis(
      db,
      {
        userId,
        rawText: "",
        dishName: WATER_DISH_NAME,
        weightG: 0,
        calories: 0,
        proteinG: 0,
        fatG: 0,
        carbsG: 0,
        waterMl
      },
      nowMs
    );
    return { rowId, inserted: true, waterMl };
  });
  return txn();
}

export function createNutritionLedger(params: { conn: ConnectionManager; now?: () => number }): NutritionLedger {
  const { conn, now = Date.now } = params;

  return {
    async appendEvent(input) {
      try {
        const createdAt = now();
        const id = await conn.withConnection("ledger.append", (db) => insertFoodAnalysis(db, input, createdAt));
        logger.info(
          { userId: input.userId, id, dishName: input.dishName, calories: input.calories, waterMl: input.waterMl },
          "Nutrition event recorded"
        );
        logger.debug({ userId: input.userId, id, rawText: input.rawText }, "Nutrition event analysis text");
        return true;
      } catch (err) {
        logger.error({ err, userId: input.userId }, "Failed to record nutrition event");
        return false;
      }
    },

    async addWater(userId, waterMl) {
      if (!Number.isFinite(waterMl) || waterMl <= 0) {
        logger.warn({ userId, waterMl }, "Rejected non-positive water amount");
        return false;
      }
      try {
        const nowMs = now();
        const result = await conn.withConnection("ledger.addWater", (db) => upsertTodayWater(db, userId, waterMl, nowMs));
        logger.info({ userId, added: waterMl, ...result }, "Water recorded");
        return true;
      } catch (err) {
        logger.error({ err, userId, waterMl }, "Failed to record water");
        return false;
      }
    },

    async dailyStats(userId) {
      try {
        const { start, end } = calendarDayWindow(now());
        const rows = await conn.withConnection("ledger.dailyStats", (db) =>
          selectRowsBetween(db, userId, start, end, false)
        );
        if (rows.length === 0) return null;
        const { totalWeight: _weight, ...stats } = aggregateRows(rows);
        return stats;
      } catch (err) {
        logger.error({ err, userId }, "Failed to compute daily stats");
        return null;
      }
    },

    async windowedStats(userId, hours) {
      try {
        const nowMs = now();
        const fromMs = nowMs - hours * HOUR_MS;
        const rows = await conn.withConnection("ledger.windowedStats", (db) =>
          selectRowsBetween(db, userId, fromMs, nowMs, true)
        );
        const totals = aggregateRows(rows);
        return {
          ...totals,
          windowStart: new Date(fromMs),
          windowEnd: new Date(nowMs),
          averageCalories: totals.dishesCount > 0 ? totals.totalCalories / totals.dishesCount : 0,
          entries: rows.map(toLedgerEntry)
        };
      } catch (err) {
        logger.error({ err, userId, hours }, "Failed to compute windowed stats");
        return null;
      }
    },

    async clearUserHistory(userId) {
      try {
        const deleted = await conn.withConnection(
          "ledger.clearUser",
          (db) => db.prepare("DELETE FROM food_analyses WHERE user_id = ?").run(userId).changes
        );
        logger.info({ userId, deleted }, "User nutrition history cleared");
        return true;
      } catch (err) {
        logger.error({ err, userId }, "Failed to clear user nutrition history");
        return false;
      }
    },

    async sweepOlderThan(hours) {
      const cutoffMs = now() - hours * HOUR_MS;

      let userIds: number[];
      try {
        const rows = await conn.withConnection(
          "ledger.sweep.users",
          (db) => db.prepare("SELECT DISTINCT user_id FROM food_analyses ORDER BY user_id").all() as { user_id: number }[]
        );
        userIds = rows.map((row) => row.user_id);
      } catch (err) {
        logger.error({ err, hours }, "Ledger sweep could not list users");
        return { usersScanned: 0, totalDeleted: 0, errorCount: 1 };
      }

      const result: SweepResult = { usersScanned: userIds.length, totalDeleted: 0, errorCount: 0 };
      for (const userId of userIds) {
        try {
          const deleted = await conn.withConnection(
            "ledger.sweep.user",
            (db) => db.prepare("DELETE FROM food_analyses WHERE user_id = ? AND created_at < ?").run(userId, cutoffMs).changes
          );
          result.totalDeleted += deleted;
          if (deleted > 0) logger.debug({ userId, deleted }, "Swept old ledger rows");
        } catch (err) {
          result.errorCount += 1;
          logger.error({ err, userId }, "Ledger sweep failed for user");
        }
      }

      logger.info({ hours, cutoff: new Date(cutoffMs).toISOString(), ...result }, "Ledger sweep complete");
      return result;
    }
  };
}
