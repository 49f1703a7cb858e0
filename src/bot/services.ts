import type { AdminRegistry } from "../admin/adminRegistry";
import type { FoodAnalyzer } from "../analysis/foodAnalyzer";
import type { Env } from "../config/env";
import type { ConnectionManager } from "../db/connection";
import type { NutritionLedger } from "../db/nutritionRepo";
import type { SubscriptionStore } from "../db/subscriptionsRepo";
import type { EntitlementPolicy } from "../entitlements/entitlementPolicy";
import type { ProfileRepository } from "../profiles/profileStore";

export type BotEnv = Pick<
  Env,
  | "BOT_TOKEN"
  | "BACKUP_DIR"
  | "LEDGER_RETENTION_HOURS"
  | "WATER_PORTION_ML"
  | "DAILY_WATER_GOAL_ML"
  | "SUBSCRIPTION_PRICE_USD"
  | "PAYMENT_CONTACT"
  | "USDT_TRC20_WALLET"
  | "MAX_FREE_TRIALS"
>;

/** Everything the chat layer talks to. */
export type BotServices = {
  env: BotEnv;
  conn: ConnectionManager;
  subscriptions: SubscriptionStore;
  ledger: NutritionLedger;
  profiles: ProfileRepository;
  policy: EntitlementPolicy;
  admins: AdminRegistry;
  analyzer: FoodAnalyzer;
  now?: () => number;
};
