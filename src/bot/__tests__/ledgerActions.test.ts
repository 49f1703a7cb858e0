import type { BotServices } from "../services";
import { clearStats, logWater } from "../flows/ledgerActions";
import { createNutritionLedger } from "../../db/nutritionRepo";
import { brokenConnection, makeTempDir, removeDir } from "../../__tests__/helpers/fixtures";
import { createTestServices, TEST_BOT_ENV } from "../../__tests__/helpers/services";

describe("ledger actions", () => {
  let dir: string;
  let services: BotServices;

  beforeEach(async () => {
    dir = makeTempDir();
    ({ services } = await createTestServices(dir));
  });

  afterEach(async () => {
    await services.conn.close();
    removeDir(dir);
  });

  const brokenLedger = () => createNutritionLedger({ conn: brokenConnection() });

  describe("logWater", () => {
    it("only lets the owner of the button log water", async () => {
      expect(await logWater(services, 7, 8)).toEqual({ kind: "not_owner" });
      expect(await services.ledger.dailyStats(8)).toBeNull();
    });

    it("adds a portion and reports today's total", async () => {
      expect(await logWater(services, 7, 7)).toEqual({ kind: "logged", addedMl: 250, todayMl: 250 });
      expect(await logWater(services, 7, 7)).toEqual({ kind: "logged", addedMl: 250, todayMl: 500 });
    });

    it("reports a failed write", async () => {
      expect(await logWater({ env: TEST_BOT_ENV, ledger: brokenLedger() }, 7, 7)).toEqual({ kind: "failed" });
    });
  });

  describe("clearStats", () => {
    it("only lets the owner clear their history", async () => {
      await services.ledger.addWater(8, 250);
      expect(await clearStats(services, 7, 8)).toEqual({ kind: "not_owner" });
      expect((await services.ledger.dailyStats(8))?.waterMl).toBe(250);
    });

    it("clears the owner's history", async () => {
      await services.ledger.addWater(7, 250);
      expect(await clearStats(services, 7, 7)).toEqual({ kind: "cleared" });
      expect(await services.ledger.dailyStats(7)).toBeNull();
    });

    it("reports a failed delete", async () => {
      expect(await clearStats({ ledger: brokenLedger() }, 7, 7)).toEqual({ kind: "failed" });
    });
  });
});
