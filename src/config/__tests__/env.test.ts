import { loadEnv, parseIdList } from "../env";

const REQUIRED = { BOT_TOKEN: "test-token", ANTHROPIC_API_KEY: "test-secret" };

describe("loadEnv", () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("applies defaults", () => {
    const env = loadEnv(REQUIRED);

    expect(env).toMatchObject({
      PORT: 3000,
      ANALYSIS_API_BASE_URL: "https://api.anthropic.com",
      DB_PATH: "./data/bot.sqlite",
      DB_BUSY_TIMEOUT_MS: 30_000,
      ADMIN_TELEGRAM_USER_IDS: [],
      MAX_FREE_TRIALS: 2,
      LEDGER_RETENTION_HOURS: 24,
      MAINTENANCE_INTERVAL_HOURS: 24,
      WATER_PORTION_ML: 250,
      DAILY_WATER_GOAL_ML: 2000,
      SUBSCRIPTION_PRICE_USD: 2,
      PAYMENT_CONTACT: "@admin"
    });
    expect(env.USDT_TRC20_WALLET).toBeUndefined();
  });

  it("coerces numeric settings and parses admin ids", () => {
    const env = loadEnv({ ...REQUIRED, PORT: "8080", MAX_FREE_TRIALS: "0", ADMIN_TELEGRAM_USER_IDS: "1, 2" });
    expect(env.PORT).toBe(8080);
    expect(env.MAX_FREE_TRIALS).toBe(0);
    expect(env.ADMIN_TELEGRAM_USER_IDS).toEqual([1, 2]);
  });

  it("throws when a required variable is missing", () => {
    const consoleError = jest.spyOn(console, "error").mockImplementation(() => {});
    expect(() => loadEnv({ ANTHROPIC_API_KEY: "test-secret" })).toThrow("Invalid environment variables.");
    expect(consoleError).toHaveBeenCalledTimes(1);
  });

  it("rejects a malformed number", () => {
    jest.spyOn(console, "error").mockImplementation(() => {});
    expect(() => loadEnv({ ...REQUIRED, WATER_PORTION_ML: "lots" })).toThrow("Invalid environment variables.");
  });

  it("rejects a maintenance interval longer than a timer can hold", () => {
    jest.spyOn(console, "error").mockImplementation(() => {});
    expect(loadEnv({ ...REQUIRED, MAINTENANCE_INTERVAL_HOURS: "596" }).MAINTENANCE_INTERVAL_HOURS).toBe(596);
    expect(() => loadEnv({ ...REQUIRED, MAINTENANCE_INTERVAL_HOURS: "600" })).toThrow("Invalid environment variables.");
  });
});

describe("parseIdList", () => {
  it("keeps whole numbers and drops the rest", () => {
    expect(parseIdList("1, 2,x,3")).toEqual([1, 2, 3]);
    expect(parseIdList(" , ")).toEqual([]);
    expect(parseIdList(undefined)).toEqual([]);
  });
});
