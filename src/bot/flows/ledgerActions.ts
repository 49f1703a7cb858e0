import type { Telegraf } from "telegraf";
import { logger } from "../../logger";
import { GENERIC_ERROR_TEXT, renderDailyStats } from "../format";
import { buildClearStatsKeyboard, CALLBACK_PATTERNS } from "../menus";
import type { BotServices } from "../services";

const NOT_YOUR_BUTTON = "❌ This button is not for you.";

export type WaterResult =
  | { kind: "not_owner" }
  | { kind: "failed" }
  | { kind: "logged"; addedMl: number; todayMl: number };

export type ClearResult = { kind: "not_owner" } | { kind: "failed" } | { kind: "cleared" };

export async function logWater(
  services: Pick<BotServices, "env" | "ledger">,
  callerId: number,
  ownerId: number
): Promise<WaterResult> {
  if (callerId !== ownerId) return { kind: "not_owner" };

  const addedMl = services.env.WATER_PORTION_ML;
  const ok = await services.ledger.addWater(ownerId, addedMl);
  if (!ok) return { kind: "failed" };

  const today = await services.ledger.dailyStats(ownerId);
  return { kind: "logged", addedMl, todayMl: today?.waterMl ?? addedMl };
}

export async function clearStats(
  services: Pick<BotServices, "ledger">,
  callerId: number,
  ownerId: number
): Promise<ClearResult> {
  if (callerId !== ownerId) return { kind: "not_owner" };
  const ok = await services.ledger.clearUserHistory(ownerId);
  return ok ? { kind: "cleared" } : { kind: "failed" };
}

export function registerLedgerHandlers(bot: Telegraf, services: BotServices) {
  const { env, ledger } = services;

  bot.command("stats", async (ctx) => {
    const telegramUserId = ctx.from?.id;
    if (!telegramUserId) return;
    try {
      const stats = await ledger.dailyStats(telegramUserId);
      await ctx.reply(renderDailyStats(stats, env.DAILY_WATER_GOAL_ML), buildClearStatsKeyboard(telegramUserId));
    } catch (err) {
      logger.error({ err, telegramUserId }, "Error in stats command");
      await ctx.reply(GENERIC_ERROR_TEXT);
    }
  });

  bot.action(CALLBACK_PATTERNS.addWater, async (ctx) => {
    const telegramUserId = ctx.from?.id;
    if (!telegramUserId) return;
    const ownerId = Number(ctx.match[1]);

    const result = await logWater(services, telegramUserId, ownerId);
    if (result.kind === "not_owner") {
      await ctx.answerCbQuery(NOT_YOUR_BUTTON, { show_alert: true });
      return;
    }
    if (result.kind === "failed") {
      await ctx.answerCbQuery("Could not log water. Please try again.", { show_alert: true });
      return;
    }

    await ctx.answerCbQuery(`💧 +${result.addedMl} ml logged. Today: ${result.todayMl} ml`, { show_alert: true });
    const stats = await ledger.dailyStats(ownerId);
    await ctx.reply(renderDailyStats(stats, env.DAILY_WATER_GOAL_ML));
  });

  bot.action(CALLBACK_PATTERNS.clearStats, async (ctx) => {
    const telegramUserId = ctx.from?.id;
    if (!telegramUserId) return;
    const ownerId = Number(ctx.match[1]);

    const result = await clearStats(services, telegramUserId, ownerId);
    if (result.kind === "not_owner") {
      await ctx.answerCbQuery(NOT_YOUR_BUTTON, { show_alert: true });
      return;
    }

    await ctx.answerCbQuery();
    if (result.kind === "failed") {
      await ctx.editMessageText("❌ Could not clear your stats. Please try again.");
      return;
    }
    logger.info({ telegramUserId }, "User cleared nutrition history");
    await ctx.editMessageText("✅ All your stats were cleared.\n\n💡 You can start tracking again any time.");
  });
}
