import { Telegraf } from "telegraf";

import { logger } from "../logger";
import { commandArgs } from "./commandArgs";
import { GENERIC_ERROR_TEXT, modeLabel, renderPaymentInfo, renderStatus } from "./format";
import { registerAdminCommands } from "./flows/adminCommands";
import { handleFoodPhoto } from "./flows/analyzePhoto";
import { registerLedgerHandlers } from "./flows/ledgerActions";
import { renderHelpText, renderWelcomeText } from "./menus";
import type { BotServices } from "./services";

export const ANALYSIS_MODES = ["ai"] as const;

function isAnalysisMode(value: string): value is (typeof ANALYSIS_MODES)[number] {
  return ANALYSIS_MODES.some((mode) => mode === value);
}

export function createBot(services: BotServices) {
  const { env, profiles, policy, now = Date.now } = services;

  const bot = new Telegraf(env.BOT_TOKEN);

  bot.start(async (ctx) => {
    try {
      const telegramUserId = ctx.from.id;
      logger.info({ telegramUserId }, "Telegram /start");
      const profile = await profiles.get(telegramUserId);
      await ctx.reply(renderWelcomeText(telegramUserId, profile.maxFreeTrials));
    } catch (err) {
      logger.error({ err }, "Error in start command");
      await ctx.reply(GENERIC_ERROR_TEXT);
    }
  });

  bot.command("help", async (ctx) => {
    await ctx.reply(renderHelpText({ priceUsd: env.SUBSCRIPTION_PRICE_USD, maxFreeTrials: env.MAX_FREE_TRIALS }));
  });

  bot.command("status", async (ctx) => {
    const telegramUserId = ctx.from?.id;
    if (!telegramUserId) return;
    try {
      const decision = await policy.canUseAnalysis(telegramUserId);
      const usage = await policy.getUsageSummary(telegramUserId);
      await ctx.reply(
        renderStatus({
          decision,
          usage,
          priceUsd: env.SUBSCRIPTION_PRICE_USD,
          paymentContact: env.PAYMENT_CONTACT,
          nowMs: now()
        })
      );
    } catch (err) {
      logger.error({ err, telegramUserId }, "Error in status command");
      await ctx.reply(GENERIC_ERROR_TEXT);
    }
  });

  bot.command("payment", async (ctx) => {
    const telegramUserId = ctx.from?.id;
    if (!telegramUserId) return;
    await ctx.reply(
      renderPaymentInfo({
        userId: telegramUserId,
        priceUsd: env.SUBSCRIPTION_PRICE_USD,
        maxFreeTrials: env.MAX_FREE_TRIALS,
        paymentContact: env.PAYMENT_CONTACT,
        usdtWallet: env.USDT_TRC20_WALLET
      })
    );
  });

  bot.command("mode", async (ctx) => {
    const telegramUserId = ctx.from?.id;
    if (!telegramUserId) return;
    try {
      const requested = commandArgs(ctx.message.text)[0]?.toLowerCase();
      if (requested) {
        if (!isAnalysisMode(requested)) {
          await ctx.reply(`Unknown mode. Available: ${ANALYSIS_MODES.join(", ")}`);
          return;
        }
        await policy.setPreferredMode(telegramUserId, requested);
        await ctx.reply(`Mode set to ${modeLabel(requested)}.`);
        return;
      }

      const decision = await policy.canUseAnalysis(telegramUserId);
      const usage = await policy.getUsageSummary(telegramUserId);
      const access =
        decision.reason === "subscription"
          ? "active subscription"
          : decision.reason === "free_trial"
            ? `${decision.remainingTrials} free analyses left`
            : "needs a subscription";
      await ctx.reply([`• AI analysis: ${access}`, "", `Current mode: ${modeLabel(usage.preferredMode)}`].join("\n"));
    } catch (err) {
      logger.error({ err, telegramUserId }, "Error in mode command");
      await ctx.reply(GENERIC_ERROR_TEXT);
    }
  });

  registerLedgerHandlers(bot, services);
  registerAdminCommands(bot, services);

  bot.on("photo", async (ctx) => {
    const telegramUserId = ctx.from?.id;
    if (!telegramUserId) return;
    // Telegram lists sizes smallest first.
    const largest = ctx.message.photo[ctx.message.photo.length - 1];
    if (!largest) return;
    await handleFoodPhoto({ ctx, userId: telegramUserId, fileId: largest.file_id, services });
  });

  bot.on("text", async (ctx) => {
    if (ctx.message.text.startsWith("/")) return;
    await ctx.reply(`📸 Send a photo of your food to analyse it!\n\n🆔 Your ID: ${ctx.from.id}`);
  });

  bot.catch((err, ctx) => {
    logger.error({ err, updateId: ctx.update.update_id }, "Bot handler error");
  });

  return bot;
}
