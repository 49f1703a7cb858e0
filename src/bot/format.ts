import { format } from "date-fns";
import type { ParsedNutrition } from "../analysis/nutritionParser";
import type { DbMaintenanceResult, DatabaseStatus } from "../db/maintenance";
import { WATER_DISH_NAME, type DailyStats, type WindowedStats } from "../db/nutritionRepo";
import { computeDaysLeft, type SubscriptionRecord, type SubscriptionStats } from "../db/subscriptionsRepo";
import type { EntitlementDecision, UsageSummary } from "../entitlements/entitlementPolicy";

export const GENERIC_ERROR_TEXT = "Sorry, there was an error. Please try again.";

export function modeLabel(mode: string): string {
  return mode === "ai" ? "AI" : mode;
}

export function formatDay(date: Date): string {
  return format(date, "yyyy-MM-dd");
}

export function renderAnalysisReply(parsed: ParsedNutrition, waterPortionMl: number): string {
  const lines = [
    `🍽️ ${parsed.dishName || "Dish"}`,
    "",
    `⚖️ Weight: ${parsed.weightG.toFixed(0)} g`,
    `🔥 Calories: ${parsed.calories.toFixed(0)} kcal`,
    `🥩 Protein: ${parsed.proteinG.toFixed(1)} g`,
    `🧈 Fat: ${parsed.fatG.toFixed(1)} g`,
    `🍞 Carbs: ${parsed.carbsG.toFixed(1)} g`,
    ""
  ];

  if (parsed.proteinG === 0 && parsed.fatG === 0 && parsed.carbsG === 0) {
    lines.push("⚠️ Macronutrients were not recognised. Try a clearer photo.", "");
  } else if (parsed.estimated.some((field) => field !== "weight")) {
    lines.push("ℹ️ Some macronutrients were estimated from the calorie total.", "");
  }

  lines.push(`💧 Tap below to log ${waterPortionMl} ml of water.`);
  return lines.join("\n");
}

export function renderDailyStats(stats: DailyStats | null, dailyWaterGoalMl: number): string {
  if (!stats) {
    return ["📊 Today so far:", "", "🍽️ Dishes: 0", "📸 Send a food photo to start tracking."].join("\n");
  }

  const lines = [
    "📊 Today so far:",
    "",
    `🍽️ Dishes: ${stats.dishesCount}`,
    `🔥 Calories: ${stats.totalCalories.toFixed(0)} kcal`,
    `🥩 Protein: ${stats.totalProtein.toFixed(1)} g`,
    `🧈 Fat: ${stats.totalFat.toFixed(1)} g`,
    `🍞 Carbs: ${stats.totalCarbs.toFixed(1)} g`,
    `💧 Water: ${stats.waterMl.toFixed(0)} ml`,
    ""
  ];

  if (stats.waterMl < dailyWaterGoalMl) {
    const remaining = dailyWaterGoalMl - stats.waterMl;
    lines.push(`💡 ${remaining.toFixed(0)} ml of water to go to reach ${dailyWaterGoalMl} ml today.`);
  } else {
    lines.push("✅ Daily water goal reached!");
  }
  return lines.join("\n");
}

export function renderStatus(params: {
  decision: EntitlementDecision;
  usage: UsageSummary;
  priceUsd: number;
  paymentContact: string;
  nowMs: number;
}): string {
  const { decision, usage, priceUsd, paymentContact, nowMs } = params;
  const lines = ["🔐 Analysis access:", ""];

  if (decision.reason === "subscription") {
    lines.push(
      "✅ Active subscription",
      `📅 Valid until: ${format(decision.expiresAt, "dd.MM.yyyy")}`,
      `⏰ Days left: ${computeDaysLeft(decision.expiresAt.getTime(), nowMs)}`
    );
  } else if (decision.reason === "free_trial") {
    lines.push("🎁 Free trial", `🔢 Trials left: ${decision.remainingTrials}`);
  } else {
    lines.push(
      "❌ No access",
      `🎁 Free trials used: ${usage.freeTrialsUsed}/${usage.maxFreeTrials}`,
      "💳 Activate a subscription to continue.",
      "",
      `💰 Price: $${priceUsd} per month`,
      `📧 Contact: ${paymentContact}`
    );
  }

  lines.push("", "📊 Usage:", `• Analyses run: ${usage.totalUses}`, `• Preferred mode: ${modeLabel(usage.preferredMode)}`);
  return lines.join("\n");
}

export function renderPaymentInfo(params: {
  userId: number;
  priceUsd: number;
  maxFreeTrials: number;
  paymentContact: string;
  usdtWallet?: string;
}): string {
  const { userId, priceUsd, maxFreeTrials, paymentContact, usdtWallet } = params;
  const lines = [
    "💳 Subscription",
    "",
    `💰 Price: $${priceUsd} per month`,
    `🎁 Free trials: ${maxFreeTrials} per user`,
    "⏰ Each month is 30 days from activation",
    "",
    `📧 To pay, contact ${paymentContact} and send your ID: ${userId}`
  ];
  if (usdtWallet) {
    lines.push(`🪙 USDT (TRC20): ${usdtWallet}`);
  }
  return lines.join("\n");
}

export function renderWindowedStats(userId: number, hours: number, stats: WindowedStats): string {
  const lines = [`📊 User ${userId}, last ${hours} h:`, ""];

  if (stats.entries.length === 0) {
    lines.push("🍽️ Dishes: 0");
    return lines.join("\n");
  }

  lines.push(
    `🍽️ Dishes: ${stats.dishesCount}`,
    `⚖️ Total weight: ${stats.totalWeight.toFixed(0)} g`,
    `🔥 Calories: ${stats.totalCalories.toFixed(1)} kcal`,
    `🥩 Protein: ${stats.totalProtein.toFixed(1)} g`,
    `🧈 Fat: ${stats.totalFat.toFixed(1)} g`,
    `🍞 Carbs: ${stats.totalCarbs.toFixed(1)} g`,
    `💧 Water: ${stats.waterMl.toFixed(0)} ml`,
    `📈 Average per dish: ${stats.averageCalories.toFixed(1)} kcal`,
    "",
    "📋 Entries:"
  );

  stats.entries.forEach((entry, index) => {
    const time = format(entry.createdAt, "HH:mm");
    const n = index + 1;
    if (entry.dishName && entry.dishName !== WATER_DISH_NAME) {
      const water = entry.waterMl > 0 ? ` | 💧 +${entry.waterMl.toFixed(0)} ml` : "";
      lines.push(
        `${n}. 🕐 ${time} | 🍴 ${entry.dishName}`,
        `   ⚖️ ${entry.weightG.toFixed(0)} g | 🔥 ${entry.calories.toFixed(0)} kcal | 🥩 ${entry.proteinG.toFixed(1)} g | 🧈 ${entry.fatG.toFixed(1)} g | 🍞 ${entry.carbsG.toFixed(1)} g${water}`
      );
    } else if (entry.waterMl > 0) {
      lines.push(`${n}. 🕐 ${time} | 💧 Water: +${entry.waterMl.toFixed(0)} ml`);
    }
  });
  return lines.join("\n");
}

export function renderSubscriptionList(records: SubscriptionRecord[]): string {
  if (records.length === 0) return "No subscriptions yet.";

  const active = records.filter((r) => r.isActive);
  const expired = records.length - active.length;
  const lines = ["💳 Subscriptions:", ""];

  if (active.length > 0) {
    lines.push("✅ Active:");
    for (const record of active) {
      lines.push(`🆔 ${record.userId} | until ${formatDay(record.endDate)} | ${record.daysLeft} days left`);
    }
  }
  if (expired > 0) {
    lines.push("", `❌ Expired: ${expired}`, "💡 Use /admin_cleanup to remove them.");
  }
  lines.push("", `📊 Total: ${records.length}`);
  return lines.join("\n");
}

export function renderSubscriptionStats(stats: SubscriptionStats): string[] {
  return [
    `💳 Active subscriptions: ${stats.active}`,
    `📅 Expired subscriptions: ${stats.expired}`,
    `⏰ Expiring within a week: ${stats.expiringSoon}`
  ];
}

export function renderMaintenanceResult(result: DbMaintenanceResult): string {
  const { ledger } = result;
  return [
    "🧹 Maintenance finished",
    "",
    `🗑️ Expired subscriptions removed: ${result.expiredSubscriptionsDeleted}`,
    `📉 Ledger rows older than ${result.retentionHours} h removed: ${ledger.totalDeleted}`,
    `👥 Users scanned: ${ledger.usersScanned}`,
    `⚠️ Errors: ${ledger.errorCount}`
  ].join("\n");
}

export function renderDatabaseStatus(status: DatabaseStatus): string {
  return [
    "🗄️ Database status",
    "",
    `Journal mode: ${status.journalMode}`,
    `Synchronous: ${status.synchronous}`,
    `Tables: ${status.tables.join(", ")}`,
    `Size: ${(status.databaseSizeBytes / 1024).toFixed(1)} KB`,
    `Ledger rows: ${status.foodAnalysesCount}`,
    `Subscriptions: ${status.subscriptionsCount}`
  ].join("\n");
}

export const TELEGRAM_MESSAGE_LIMIT = 4000;

/** Splits on line boundaries so each chunk fits in one Telegram message. */
export function splitMessage(text: string, limit = TELEGRAM_MESSAGE_LIMIT): string[] {
  const chunks: string[] = [];
  let current = "";
  for (const line of text.split("\n")) {
    const candidate = current ? `${current}\n${line}` : line;
    if (candidate.length <= limit) {
      current = candidate;
      continue;
    }
    if (current) chunks.push(current);
    let rest = line;
    while (rest.length > limit) {
      chunks.push(rest.slice(0, limit));
      rest = rest.slice(limit);
    }
    current = rest;
  }
  if (current) chunks.push(current);
  return chunks;
}
