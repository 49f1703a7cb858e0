import path from "node:path";
import { createConnectionManager, type ConnectionManager } from "../connection";
import {
  MAX_TIMER_MS,
  getDatabaseStatus,
  optimizeDatabase,
  runDbMaintenance,
  startMaintenanceScheduler,
  type DbMaintenanceResult
} from "../maintenance";
import { createNutritionLedger } from "../nutritionRepo";
import { createSubscriptionStore, DAY_MS } from "../subscriptionsRepo";
import { brokenConnection, fakeClock, HOUR_MS, makeTempDir, NOON, noSleep, removeDir } from "../../__tests__/helpers/fixtures";

describe("database maintenance", () => {
  let dir: string;
  let conn: ConnectionManager;

  beforeEach(async () => {
    dir = makeTempDir();
    conn = createConnectionManager({ dbPath: path.join(dir, "bot.sqlite"), sleep: noSleep });
    await conn.init();
  });

  afterEach(async () => {
    await conn.close();
    removeDir(dir);
  });

  it("removes lapsed subscriptions and ledger rows past retention", async () => {
    const clock = fakeClock(NOON - 40 * DAY_MS);
    const subscriptions = createSubscriptionStore({ conn, now: clock.now });
    const ledger = createNutritionLedger({ conn, now: clock.now });

    await subscriptions.upsertSubscription(1, 1);
    await ledger.addWater(1, 250);
    clock.set(NOON - HOUR_MS);
    await subscriptions.upsertSubscription(2, 1);
    await ledger.addWater(2, 250);
    clock.set(NOON);

    const result = await runDbMaintenance({ subscriptions, ledger, retentionHours: 24, now: clock.now });

    expect(result).toEqual({
      startedAt: new Date(NOON),
      retentionHours: 24,
      expiredSubscriptionsDeleted: 1,
      ledger: { usersScanned: 2, totalDeleted: 1, errorCount: 0 },
      subscriptionStats: { total: 1, active: 1, expired: 0, expiringSoon: 0 }
    });
  });

  it("clamps the retention window to at least one hour", async () => {
    const subscriptions = createSubscriptionStore({ conn });
    const ledger = createNutritionLedger({ conn });
    const result = await runDbMaintenance({ subscriptions, ledger, retentionHours: 0.2 });
    expect(result.retentionHours).toBe(1);
  });

  it("reports journal mode, tables and row counts", async () => {
    await createNutritionLedger({ conn }).addWater(1, 250);

    const status = await getDatabaseStatus(conn);
    expect(status).toMatchObject({
      journalMode: "wal",
      foodAnalysesCount: 1,
      subscriptionsCount: 0
    });
    expect(status?.tables).toEqual(expect.arrayContaining(["food_analyses", "schema_migrations", "subscriptions"]));
    expect(status?.databaseSizeBytes).toBeGreaterThan(0);
  });

  it("optimizes the database", async () => {
    expect(await optimizeDatabase(conn)).toBe(true);
  });

  it("reports failures as null or false", async () => {
    expect(await getDatabaseStatus(brokenConnection())).toBeNull();
    expect(await optimizeDatabase(brokenConnection())).toBe(false);
  });
});

describe("maintenance scheduler", () => {
  const result: DbMaintenanceResult = {
    startedAt: new Date(NOON),
    retentionHours: 24,
    expiredSubscriptionsDeleted: 0,
    ledger: { usersScanned: 0, totalDeleted: 0, errorCount: 0 },
    subscriptionStats: null
  };

  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it("runs on every interval and hands each result on until stopped", async () => {
    const run = jest.fn(async () => result);
    const onResult = jest.fn(async (_result: DbMaintenanceResult) => {});
    const scheduler = startMaintenanceScheduler({ intervalMs: 1000, run, onResult });

    await jest.advanceTimersByTimeAsync(999);
    expect(run).not.toHaveBeenCalled();

    await jest.advanceTimersByTimeAsync(2001);
    expect(run).toHaveBeenCalledTimes(3);
    expect(onResult).toHaveBeenCalledTimes(3);
    expect(onResult).toHaveBeenLastCalledWith(result);

    scheduler.stop();
    await jest.advanceTimersByTimeAsync(5000);
    expect(run).toHaveBeenCalledTimes(3);
  });

  it("caps an oversized interval instead of firing every millisecond", async () => {
    const run = jest.fn(async () => result);
    const scheduler = startMaintenanceScheduler({ intervalMs: 600 * HOUR_MS, run });

    await jest.advanceTimersByTimeAsync(100);
    expect(run).not.toHaveBeenCalled();

    await jest.advanceTimersByTimeAsync(MAX_TIMER_MS - 100);
    expect(run).toHaveBeenCalledTimes(1);
    scheduler.stop();
  });

  it("keeps ticking after a failed run", async () => {
    const run = jest
      .fn<Promise<DbMaintenanceResult>, []>()
      .mockRejectedValueOnce(new Error("boom"))
      .mockResolvedValue(result);
    const scheduler = startMaintenanceScheduler({ intervalMs: 1000, run });

    await jest.advanceTimersByTimeAsync(2000);
    expect(run).toHaveBeenCalledTimes(2);
    scheduler.stop();
  });

  it("skips a tick while the previous run is still going", async () => {
    let finish: () => void = () => {};
    const run = jest.fn(
      () =>
        new Promise<DbMaintenanceResult>((resolve) => {
          finish = () => resolve(result);
        })
    );
    const scheduler = startMaintenanceScheduler({ intervalMs: 1000, run });

    await jest.advanceTimersByTimeAsync(3000);
    expect(run).toHaveBeenCalledTimes(1);

    finish();
    await jest.advanceTimersByTimeAsync(1000);
    expect(run).toHaveBeenCalledTimes(2);
    scheduler.stop();
  });
});
