import "dotenv/config";

import { loadEnv } from "./config/env";
import { createConnectionManager } from "./db/connection";
import { runDbMaintenance } from "./db/maintenance";
import { createNutritionLedger } from "./db/nutritionRepo";
import { createSubscriptionStore } from "./db/subscriptionsRepo";
import { logger } from "./logger";

// One-shot maintenance run for cron: `npm run cleanup`.
async function main() {
  const env = loadEnv(process.env);
  const conn = createConnectionManager({ dbPath: env.DB_PATH, busyTimeoutMs: env.DB_BUSY_TIMEOUT_MS });
  await conn.init();

  try {
    const result = await runDbMaintenance({
      subscriptions: createSubscriptionStore({ conn }),
      ledger: createNutritionLedger({ conn }),
      retentionHours: env.LEDGER_RETENTION_HOURS
    });
    if (result.ledger.errorCount > 0) {
      process.exitCode = 1;
    }
  } finally {
    await conn.close();
  }
}

main().catch((err) => {
  logger.fatal({ err }, "Maintenance run failed");
  process.exit(1);
});
