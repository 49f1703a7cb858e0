import "dotenv/config";

import express from "express";
import { loadAdminRegistry } from "./admin/adminRegistry";
import { createFoodAnalyzer } from "./analysis/foodAnalyzer";
import { createBot } from "./bot/bot";
import { renderMaintenanceResult } from "./bot/format";
import { loadEnv } from "./config/env";
import { createConnectionManager } from "./db/connection";
import { runDbMaintenance, startMaintenanceScheduler } from "./db/maintenance";
import { createNutritionLedger } from "./db/nutritionRepo";
import { createSubscriptionStore } from "./db/subscriptionsRepo";
import { createEntitlementPolicy } from "./entitlements/entitlementPolicy";
import { logger } from "./logger";
import { createJsonProfileStore } from "./profiles/profileStore";

const HOUR_MS = 60 * 60 * 1000;

async function main() {
  const env = loadEnv(process.env);

  // A database that cannot be opened is fatal; nothing below works without it.
  const conn = createConnectionManager({ dbPath: env.DB_PATH, busyTimeoutMs: env.DB_BUSY_TIMEOUT_MS });
  await conn.init();

  const subscriptions = createSubscriptionStore({ conn });
  const ledger = createNutritionLedger({ conn });
  const profiles = createJsonProfileStore({ filePath: env.PROFILES_PATH, maxFreeTrials: env.MAX_FREE_TRIALS });
  const admins = await loadAdminRegistry({ seedIds: env.ADMIN_TELEGRAM_USER_IDS, filePath: env.ADMINS_PATH });
  const policy = createEntitlementPolicy({ subscriptions, profiles });
  const analyzer = createFoodAnalyzer({ env });

  if (admins.list().length === 0) {
    logger.warn("No admin ids configured; admin commands are unreachable until ADMIN_TELEGRAM_USER_IDS is set.");
  }

  const bot = createBot({ env, conn, subscriptions, ledger, profiles, policy, admins, analyzer });

  const notifyAdmins = async (text: string) => {
    for (const adminId of admins.list()) {
      try {
        await bot.telegram.sendMessage(adminId, text);
      } catch (err) {
        logger.warn({ err, adminId }, "Failed to notify admin");
      }
    }
  };

  const scheduler =
    env.MAINTENANCE_INTERVAL_HOURS > 0
      ? startMaintenanceScheduler({
          intervalMs: env.MAINTENANCE_INTERVAL_HOURS * HOUR_MS,
          run: () => runDbMaintenance({ subscriptions, ledger, retentionHours: env.LEDGER_RETENTION_HOURS }),
          onResult: async (result) => {
            if (result.expiredSubscriptionsDeleted > 0 || result.ledger.totalDeleted > 0) {
              await notifyAdmins(renderMaintenanceResult(result));
            }
          }
        })
      : null;

  // Start the HTTP server first so hosting platforms detect the port promptly.
  const app = express();

  app.get("/healthz", (_req, res) => {
    res.status(200).json({ ok: true });
  });

  const server = app.listen(env.PORT, () => {
    logger.info({ port: env.PORT }, "HTTP server listening");
  });

  const shutdown = (signal: string) => {
    logger.warn({ signal }, "Shutting down...");
    scheduler?.stop();
    bot.stop(signal);
    server.close(() => {
      conn
        .close()
        .catch((err: unknown) => logger.error({ err }, "Failed to close database"))
        .finally(() => process.exit(0));
    });
  };

  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  // Launch bot after HTTP server is listening so the port is bound even if Telegram hangs.
  try {
    logger.info("Launching Telegram bot");
    // Ensure we are in polling mode and not blocked by a lingering webhook.
    await bot.telegram.deleteWebhook({ drop_pending_updates: true });
    // launch() resolves only when polling stops, so it is not awaited here.
    bot.launch().catch((err: unknown) => {
      logger.error({ err }, "Telegram polling stopped with an error");
      process.exit(1);
    });
    logger.info("Telegram bot launched");
    await notifyAdmins(`🟢 Bot restarted\nTime: ${new Date().toISOString()}`);
  } catch (err) {
    logger.error({ err }, "Failed to launch Telegram bot; check BOT_TOKEN and network access");
    process.exit(1);
  }
}

main().catch((err) => {
  logger.fatal({ err }, "Fatal error");
  process.exit(1);
});
