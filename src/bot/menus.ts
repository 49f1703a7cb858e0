import { Markup } from "telegraf";

export const BUTTON_LABELS = {
  clearStats: "🗑️ Clear all my stats"
} as const;

export const CALLBACK_PATTERNS = {
  addWater: /^water:add:(\d+)$/,
  clearStats: /^stats:clear:(\d+)$/
} as const;

// Callback data carries the owner's id so a forwarded or shared button cannot act for someone else.
export function addWaterCallback(userId: number): string {
  return `water:add:${userId}`;
}

export function clearStatsCallback(userId: number): string {
  return `stats:clear:${userId}`;
}

export function buildWaterKeyboard(userId: number, portionMl: number) {
  return Markup.inlineKeyboard([[Markup.button.callback(`💧 +${portionMl} ml water`, addWaterCallback(userId))]]);
}

export function buildClearStatsKeyboard(userId: number) {
  return Markup.inlineKeyboard([[Markup.button.callback(BUTTON_LABELS.clearStats, clearStatsCallback(userId))]]);
}

export function renderWelcomeText(userId: number, maxFreeTrials: number): string {
  return [
    "🍽️ Welcome!",
    "",
    `🆔 Your ID: ${userId}`,
    "",
    "Send me a photo of your meal and I will estimate:",
    "• Calories",
    "• Protein, fat and carbs",
    "• Portion weight",
    "",
    `🎁 You have ${maxFreeTrials} free analyses to try it out.`,
    "",
    "Use /help to see all commands."
  ].join("\n");
}

export function renderHelpText(params: { priceUsd: number; maxFreeTrials: number }): string {
  return [
    "❓ How to use the bot",
    "",
    "1. Send a photo of your food.",
    "2. Get calories and macronutrients for the dish.",
    "3. Log water with the button under each result.",
    "",
    "💰 Pricing:",
    `• ${params.maxFreeTrials} free analyses for everyone`,
    `• $${params.priceUsd} per month after that`,
    "• A month is 30 days",
    "",
    "Commands:",
    "/start - Welcome message",
    "/help - This help",
    "/status - Your access status",
    "/payment - How to pay",
    "/stats - Today's nutrition and water",
    "/mode - Analysis mode"
  ].join("\n");
}

export function renderAdminHelpText(): string {
  return [
    "🔧 Admin commands",
    "",
    "👥 Users:",
    "/admin_users - All users",
    "/admin_user <user_id> - One user",
    "/admin_user_stats <user_id> - Ledger for the last 24 h",
    "/admin_stats - Totals",
    "/admin_subscriptions - All subscriptions",
    "",
    "💳 Subscriptions:",
    "/admin_subscribe <user_id> <months> - Activate (1-12 months)",
    "/admin_extend <user_id> <months> - Extend (1-12 months)",
    "/admin_revoke <user_id> - Revoke",
    "",
    "🎁 Trials:",
    "/admin_reset_trials <user_id> - Reset free trials",
    "/admin_add_trials <user_id> <count> - Give back trials (1-10)",
    "",
    "🔐 Admins:",
    "/admin_add_admin <user_id>",
    "/admin_remove_admin <user_id>",
    "/admin_list_admins",
    "",
    "📊 System:",
    "/admin_cleanup - Remove expired subscriptions",
    "/cleanup_stats - Remove ledger rows older than the retention window",
    "/admin_db_status - Database diagnostics",
    "/admin_optimize_db - Checkpoint and analyse the database",
    "/admin_backup - Snapshot user profiles"
  ].join("\n");
}
