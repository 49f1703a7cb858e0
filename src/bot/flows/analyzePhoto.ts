import type { Context } from "telegraf";
import { parseNutrition, type ParsedNutrition } from "../../analysis/nutritionParser";
import type { EntitlementDecision } from "../../entitlements/entitlementPolicy";
import { httpFetch } from "../../http/client";
import { logger } from "../../logger";
import { renderAnalysisReply } from "../format";
import { buildWaterKeyboard } from "../menus";
import type { BotServices } from "../services";

const PHOTO_ERROR_TEXT = [
  "❌ Could not analyse the photo.",
  "",
  "Try:",
  "• A sharper photo",
  "• Making sure the food is clearly visible",
  "• Again in a few minutes"
].join("\n");

type AllowedDecision = Extract<EntitlementDecision, { allowed: true }>;

export type PhotoAnalysisOutcome = {
  parsed: ParsedNutrition;
  /** False when the ledger write failed; the user still gets the result. */
  recorded: boolean;
  lastTrialUsed: boolean;
};

export async function downloadTelegramFile(ctx: Context, fileId: string): Promise<Uint8Array> {
  const link = await ctx.telegram.getFileLink(fileId);
  const resp = await httpFetch(link.href, { requestName: "telegram_file_download", timeoutMs: 30_000 });
  if (!resp.ok) {
    throw new Error(`Telegram file download failed with status ${resp.status}`);
  }
  return new Uint8Array(await resp.arrayBuffer());
}

/**
 * Analyses one photo for a user who is already entitled, records it in the ledger
 * and consumes a free trial when that was the grant. Analysis errors propagate
 * before anything is recorded or consumed.
 */
export async function analyzeAndRecord(params: {
  services: Pick<BotServices, "analyzer" | "ledger" | "policy">;
  userId: number;
  imageBytes: Uint8Array;
  decision: AllowedDecision;
}): Promise<PhotoAnalysisOutcome> {
  const { services, userId, imageBytes, decision } = params;

  const rawText = await services.analyzer.analyzeFoodImage(imageBytes);
  const parsed = parseNutrition(rawText);

  logger.info(
    { userId, reason: decision.reason, calories: parsed.calories, estimated: parsed.estimated },
    "Food photo analysed"
  );
  if (parsed.calories > 0 && parsed.estimated.includes("protein")) {
    logger.warn({ userId, rawText }, "Analysis returned calories without macronutrients");
  }

  const recorded = await services.ledger.appendEvent({
    userId,
    rawText,
    dishName: parsed.dishName,
    weightG: parsed.weightG,
    calories: parsed.calories,
    proteinG: parsed.proteinG,
    fatG: parsed.fatG,
    carbsG: parsed.carbsG,
    waterMl: 0
  });
  if (!recorded) {
    logger.warn({ userId }, "Analysis not recorded in the ledger");
  }

  let lastTrialUsed = false;
  if (decision.reason === "free_trial") {
    await services.policy.consumeTrial(userId);
    lastTrialUsed = decision.remainingTrials <= 1;
  }

  return { parsed, recorded, lastTrialUsed };
}

export async function handleFoodPhoto(params: {
  ctx: Context;
  userId: number;
  fileId: string;
  services: BotServices;
}) {
  const { ctx, userId, fileId, services } = params;
  const { env, policy } = services;

  const decision = await policy.canUseAnalysis(userId);
  if (!decision.allowed) {
    logger.info({ userId }, "Photo analysis refused: no entitlement");
    await ctx.reply(
      [
        "❌ No access to analysis",
        "",
        "🎁 You have used all your free analyses.",
        `💳 Activate a subscription for $${env.SUBSCRIPTION_PRICE_USD}/month.`,
        "",
        "Use /payment to see how to pay."
      ].join("\n")
    );
    return;
  }

  const processing = await ctx.reply("🔍 Analysing your photo...\n\nThis can take 5-30 seconds.");

  try {
    const imageBytes = await downloadTelegramFile(ctx, fileId);
    const outcome = await analyzeAndRecord({ services, userId, imageBytes, decision });

    await ctx.reply(
      renderAnalysisReply(outcome.parsed, env.WATER_PORTION_ML),
      buildWaterKeyboard(userId, env.WATER_PORTION_ML)
    );

    if (outcome.lastTrialUsed) {
      await ctx.reply(
        [
          "🎁 That was your last free analysis!",
          "",
          `💳 To keep going, activate a subscription for $${env.SUBSCRIPTION_PRICE_USD}/month.`,
          "Use /payment to see how to pay."
        ].join("\n")
      );
    }
  } catch (err) {
    logger.error({ err, userId }, "Food photo analysis failed");
    await ctx.reply(PHOTO_ERROR_TEXT);
  } finally {
    await ctx.deleteMessage(processing.message_id).catch((err: unknown) => {
      logger.warn({ err, userId }, "Failed to delete processing notice");
    });
  }
}
