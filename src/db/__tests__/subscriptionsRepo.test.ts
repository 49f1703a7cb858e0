import path from "node:path";
import { createConnectionManager, type ConnectionManager } from "../connection";
import {
  computeDaysLeft,
  createSubscriptionStore,
  DAY_MS,
  nextEndDate,
  SUBSCRIPTION_MONTH_MS,
  type SubscriptionStore
} from "../subscriptionsRepo";
import { brokenConnection, fakeClock, HOUR_MS, makeTempDir, NOON, noSleep, removeDir } from "../../__tests__/helpers/fixtures";

describe("subscription store", () => {
  let dir: string;
  let conn: ConnectionManager;
  let clock: ReturnType<typeof fakeClock>;
  let store: SubscriptionStore;

  beforeEach(async () => {
    dir = makeTempDir();
    clock = fakeClock();
    conn = createConnectionManager({ dbPath: path.join(dir, "bot.sqlite"), sleep: noSleep });
    await conn.init();
    store = createSubscriptionStore({ conn, now: clock.now });
  });

  afterEach(async () => {
    await conn.close();
    removeDir(dir);
  });

  it("reports no subscription for an unknown user", async () => {
    expect(await store.getStatus(42)).toEqual({
      hasSubscription: false,
      startDate: null,
      endDate: null,
      daysLeft: 0,
      isActive: false
    });
  });

  it("starts a new subscription at now for 30 days per month", async () => {
    expect(await store.upsertSubscription(42, 1)).toBe(true);

    const status = await store.getStatus(42);
    expect(status.hasSubscription).toBe(true);
    expect(status.isActive).toBe(true);
    expect(status.startDate?.getTime()).toBe(NOON);
    expect(status.endDate?.getTime()).toBe(NOON + SUBSCRIPTION_MONTH_MS);
    expect(status.daysLeft).toBe(30);
  });

  it("stacks a renewal onto an active window", async () => {
    await store.upsertSubscription(42, 1);
    clock.advance(5 * DAY_MS);
    await store.upsertSubscription(42, 2);

    const status = await store.getStatus(42);
    expect(status.startDate?.getTime()).toBe(NOON);
    expect(status.endDate?.getTime()).toBe(NOON + 3 * SUBSCRIPTION_MONTH_MS);
    expect(status.daysLeft).toBe(85);
  });

  it("restarts a lapsed window from now", async () => {
    await store.upsertSubscription(42, 1);
    clock.advance(31 * DAY_MS);

    const lapsed = await store.getStatus(42);
    expect(lapsed.hasSubscription).toBe(true);
    expect(lapsed.isActive).toBe(false);
    expect(lapsed.daysLeft).toBe(0);

    await store.upsertSubscription(42, 1);
    const renewed = await store.getStatus(42);
    expect(renewed.startDate?.getTime()).toBe(clock.now());
    expect(renewed.endDate?.getTime()).toBe(clock.now() + SUBSCRIPTION_MONTH_MS);
    expect(renewed.isActive).toBe(true);
  });

  it("rejects month counts that are not positive integers", async () => {
    expect(await store.upsertSubscription(42, 0)).toBe(false);
    expect(await store.upsertSubscription(42, 1.5)).toBe(false);
    expect((await store.getStatus(42)).hasSubscription).toBe(false);
  });

  it("revokes only existing subscriptions", async () => {
    await store.upsertSubscription(42, 1);
    expect(await store.revoke(42)).toBe(true);
    expect(await store.revoke(42)).toBe(false);
    expect((await store.getStatus(42)).hasSubscription).toBe(false);
  });

  describe("with a mix of windows", () => {
    beforeEach(async () => {
      // user 3 ended yesterday, user 2 ends in 3 days, user 4 ends in 12 hours, user 1 in 30 days
      clock.set(NOON - 31 * DAY_MS);
      await store.upsertSubscription(3, 1);
      clock.set(NOON - 27 * DAY_MS);
      await store.upsertSubscription(2, 1);
      clock.set(NOON - 30 * DAY_MS + 12 * HOUR_MS);
      await store.upsertSubscription(4, 1);
      clock.set(NOON);
      await store.upsertSubscription(1, 1);
    });

    it("aggregates totals, active, expired and expiring soon", async () => {
      expect(await store.stats()).toEqual({ total: 4, active: 3, expired: 1, expiringSoon: 1 });
    });

    it("lists every row by end date, latest first", async () => {
      const all = await store.listAll();
      expect(all.map((r) => r.userId)).toEqual([1, 2, 4, 3]);
      expect(all.map((r) => r.isActive)).toEqual([true, true, true, false]);
      expect(all.map((r) => r.daysLeft)).toEqual([30, 3, 0, 0]);
    });

    it("sweeps only lapsed windows", async () => {
      expect(await store.sweepExpired()).toBe(1);
      expect(await store.sweepExpired()).toBe(0);
      expect((await store.listAll()).map((r) => r.userId)).toEqual([1, 2, 4]);
    });
  });

  describe("when storage fails", () => {
    it("returns failure values instead of throwing", async () => {
      const broken = createSubscriptionStore({ conn: brokenConnection(), now: clock.now });

      expect(await broken.upsertSubscription(42, 1)).toBe(false);
      expect((await broken.getStatus(42)).hasSubscription).toBe(false);
      expect(await broken.revoke(42)).toBe(false);
      expect(await broken.sweepExpired()).toBe(0);
      expect(await broken.listAll()).toEqual([]);
      expect(await broken.stats()).toBeNull();
    });
  });
});

describe("window arithmetic", () => {
  it("extends from the current end only while it is in the future", () => {
    expect(nextEndDate(NOON + DAY_MS, 1, NOON)).toBe(NOON + DAY_MS + SUBSCRIPTION_MONTH_MS);
    expect(nextEndDate(NOON - DAY_MS, 1, NOON)).toBe(NOON + SUBSCRIPTION_MONTH_MS);
    expect(nextEndDate(null, 2, NOON)).toBe(NOON + 2 * SUBSCRIPTION_MONTH_MS);
  });

  it("floors days left and never goes negative", () => {
    expect(computeDaysLeft(NOON + DAY_MS + 23 * HOUR_MS, NOON)).toBe(1);
    expect(computeDaysLeft(NOON - DAY_MS, NOON)).toBe(0);
  });
});
