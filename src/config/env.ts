import { z } from "zod";

export function parseIdList(val?: string): number[] {
  if (!val) return [];
  return val
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean)
    .map((s) => Number(s))
    .filter((n) => Number.isSafeInteger(n));
}

const EnvSchema = z.object({
  BOT_TOKEN: z.string().min(1),
  PORT: z.coerce.number().int().positive().default(3000),

  // External food-photo analysis (Anthropic Messages API).
  ANTHROPIC_API_KEY: z.string().min(1),
  ANALYSIS_MODEL: z.string().min(1).default("claude-3-5-haiku-20241022"),
  ANALYSIS_API_BASE_URL: z.string().url().default("https://api.anthropic.com"),
  ANALYSIS_TIMEOUT_MS: z.coerce.number().int().min(1000).default(60_000),

  // Embedded store. DB_BUSY_TIMEOUT_MS bounds how long one connection waits on a locked file.
  DB_PATH: z.string().min(1).default("./data/bot.sqlite"),
  DB_BUSY_TIMEOUT_MS: z.coerce.number().int().min(0).default(30_000),

  PROFILES_PATH: z.string().min(1).default("./data/profiles.json"),
  ADMINS_PATH: z.string().min(1).default("./data/admins.json"),
  BACKUP_DIR: z.string().min(1).default("./data/backups"),

  // Comma-separated Telegram numeric user ids. Merged with ADMINS_PATH on startup.
  ADMIN_TELEGRAM_USER_IDS: z.string().optional().transform(parseIdList),

  MAX_FREE_TRIALS: z.coerce.number().int().min(0).default(2),

  LEDGER_RETENTION_HOURS: z.coerce.number().int().min(1).default(24),
  // 0 disables the in-process scheduler (use `npm run cleanup` from cron instead).
  // Capped below the 32-bit timer limit (~596.5 h).
  MAINTENANCE_INTERVAL_HOURS: z.coerce.number().min(0).max(596).default(24),

  WATER_PORTION_ML: z.coerce.number().int().positive().default(250),
  DAILY_WATER_GOAL_ML: z.coerce.number().int().positive().default(2000),

  SUBSCRIPTION_PRICE_USD: z.coerce.number().positive().default(2),
  PAYMENT_CONTACT: z.string().min(1).default("@admin"),
  USDT_TRC20_WALLET: z.string().optional()
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(raw: NodeJS.ProcessEnv): Env {
  const parsed = EnvSchema.safeParse(raw);
  if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error(parsed.error.flatten().fieldErrors);
    throw new Error("Invalid environment variables.");
  }
  return parsed.data;
}
