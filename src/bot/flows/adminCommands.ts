import type { Telegraf } from "telegraf";
import { getDatabaseStatus, optimizeDatabase } from "../../db/maintenance";
import { remainingTrials } from "../../entitlements/entitlementPolicy";
import { logger } from "../../logger";
import { parseUserIdAndCount, parseUserIdArg } from "../commandArgs";
import {
  formatDay,
  GENERIC_ERROR_TEXT,
  modeLabel,
  renderDatabaseStatus,
  renderSubscriptionList,
  renderSubscriptionStats,
  renderWindowedStats,
  splitMessage
} from "../format";
import { renderAdminHelpText } from "../menus";
import type { BotServices } from "../services";

const USER_STATS_WINDOW_HOURS = 24;
const MAX_MONTHS = 12;
const MAX_ADDED_TRIALS = 10;

/** Produces the reply text for one admin command. */
export type AdminHandler = (params: { text: string; adminId: number }) => Promise<string>;

export const ADMIN_COMMANDS = [
  "admin_help",
  "admin_users",
  "admin_user",
  "admin_user_stats",
  "admin_subscribe",
  "admin_extend",
  "admin_revoke",
  "admin_reset_trials",
  "admin_add_trials",
  "admin_stats",
  "admin_subscriptions",
  "admin_cleanup",
  "cleanup_stats",
  "admin_add_admin",
  "admin_remove_admin",
  "admin_list_admins",
  "admin_db_status",
  "admin_optimize_db",
  "admin_backup"
] as const;

export type AdminCommand = (typeof ADMIN_COMMANDS)[number];

export function createAdminHandlers(services: BotServices): Record<AdminCommand, AdminHandler> {
  const { env, conn, subscriptions, ledger, profiles, policy, admins } = services;

  async function grantMonths(text: string, command: "admin_subscribe" | "admin_extend"): Promise<string> {
    const parsed = parseUserIdAndCount(text, {
      usage: `/${command} <user_id> <months>`,
      label: "Months",
      min: 1,
      max: MAX_MONTHS
    });
    if (!parsed.ok) return parsed.message;
    const { userId, count } = parsed.value;

    const ok = await policy.activateSubscription(userId, count);
    if (!ok) return "❌ Could not update the subscription. Please try again.";

    const status = await subscriptions.getStatus(userId);
    const lines = [
      command === "admin_subscribe" ? "✅ Subscription activated!" : "✅ Subscription extended!",
      "",
      `👤 User: ${userId}`,
      command === "admin_subscribe" ? `⏰ Months: ${count}` : `⏰ Added: ${count} months`
    ];
    if (status.hasSubscription) {
      lines.push(`📅 Valid until: ${formatDay(status.endDate)}`, `⏰ Days left: ${status.daysLeft}`);
    }
    return lines.join("\n");
  }

  return {
    async admin_help() {
      return renderAdminHelpText();
    },

    async admin_users() {
      const all = await profiles.all();
      if (all.length === 0) return "No users yet.";

      const lines = ["👥 Users:", ""];
      for (const profile of all) {
        const status = await subscriptions.getStatus(profile.userId);
        lines.push(
          `🆔 ${profile.userId}`,
          `📅 Created: ${profile.createdAt.slice(0, 10)}`,
          `🎁 Trials: ${profile.freeTrialsUsed}/${profile.maxFreeTrials}`,
          status.hasSubscription && status.isActive
            ? `💳 Subscription: ✅ until ${formatDay(status.endDate)}`
            : "💳 Subscription: ❌",
          "─".repeat(30)
        );
      }
      return lines.join("\n");
    },

    async admin_user({ text }) {
      const parsed = parseUserIdArg(text, "/admin_user <user_id>");
      if (!parsed.ok) return parsed.message;
      const { userId } = parsed.value;

      const usage = await policy.getUsageSummary(userId);
      const status = await subscriptions.getStatus(userId);
      const lines = [
        `👤 User ${userId}`,
        "",
        `📅 Created: ${usage.createdAt}`,
        `🎁 Free trials: ${usage.freeTrialsUsed}/${usage.maxFreeTrials}`
      ];
      if (status.hasSubscription && status.isActive) {
        lines.push(
          "💳 Subscription: ✅ active",
          `📅 Valid until: ${formatDay(status.endDate)}`,
          `⏰ Days left: ${status.daysLeft}`
        );
      } else if (status.hasSubscription) {
        lines.push(`💳 Subscription: ❌ expired ${formatDay(status.endDate)}`);
      } else {
        lines.push("💳 Subscription: ❌ none");
      }
      lines.push(`🔢 Analyses run: ${usage.totalUses}`, `🔧 Preferred mode: ${modeLabel(usage.preferredMode)}`);
      return lines.join("\n");
    },

    async admin_user_stats({ text }) {
      const parsed = parseUserIdArg(text, "/admin_user_stats <user_id>");
      if (!parsed.ok) return parsed.message;
      const { userId } = parsed.value;

      const stats = await ledger.windowedStats(userId, USER_STATS_WINDOW_HOURS);
      if (!stats) return "❌ Could not read the ledger. Please try again.";

      const usage = await policy.getUsageSummary(userId);
      return [
        renderWindowedStats(userId, USER_STATS_WINDOW_HOURS, stats),
        "",
        "👤 Profile:",
        `📅 Created: ${usage.createdAt}`,
        `🎁 Free trials: ${usage.freeTrialsUsed}/${usage.maxFreeTrials}`,
        `🔢 Analyses run: ${usage.totalUses}`
      ].join("\n");
    },

    admin_subscribe({ text }) {
      return grantMonths(text, "admin_subscribe");
    },

    admin_extend({ text }) {
      return grantMonths(text, "admin_extend");
    },

    async admin_revoke({ text }) {
      const parsed = parseUserIdArg(text, "/admin_revoke <user_id>");
      if (!parsed.ok) return parsed.message;
      const { userId } = parsed.value;

      const existed = await policy.revokeSubscription(userId);
      return existed ? `✅ Subscription revoked for user ${userId}.` : `User ${userId} has no subscription.`;
    },

    async admin_reset_trials({ text }) {
      const parsed = parseUserIdArg(text, "/admin_reset_trials <user_id>");
      if (!parsed.ok) return parsed.message;
      const { userId } = parsed.value;

      const profile = await policy.resetTrials(userId);
      return `✅ Trials reset for user ${userId}.\n🎁 Available: ${remainingTrials(profile)}`;
    },

    async admin_add_trials({ text }) {
      const parsed = parseUserIdAndCount(text, {
        usage: "/admin_add_trials <user_id> <count>",
        label: "Count",
        min: 1,
        max: MAX_ADDED_TRIALS
      });
      if (!parsed.ok) return parsed.message;
      const { userId, count } = parsed.value;

      const profile = await policy.addTrials(userId, count);
      return `✅ Gave back up to ${count} trials to user ${userId}.\n🎁 Available now: ${remainingTrials(profile)}`;
    },

    async admin_stats() {
      const all = await profiles.all();
      const stats = await subscriptions.stats();
      const totalUses = all.reduce((sum, p) => sum + p.totalUses, 0);
      const trialsUsed = all.reduce((sum, p) => sum + p.freeTrialsUsed, 0);

      const lines = ["📊 Totals:", "", `👥 Users: ${all.length}`, `🤖 Analyses run: ${totalUses}`];
      if (stats) {
        lines.push(...renderSubscriptionStats(stats));
      } else {
        lines.push("💳 Subscription stats unavailable");
      }
      lines.push(`🎁 Free trials used: ${trialsUsed}`);
      if (stats) {
        lines.push(`💰 Expected revenue: $${stats.active * env.SUBSCRIPTION_PRICE_USD}/month`);
      }
      return lines.join("\n");
    },

    async admin_subscriptions() {
      return renderSubscriptionList(await subscriptions.listAll());
    },

    async admin_cleanup() {
      const removed = await subscriptions.sweepExpired();
      const all = await profiles.all();
      const inactive = all.filter((p) => !p.subscriptionActive && remainingTrials(p) === 0).length;
      return [
        "🧹 Cleanup finished",
        "",
        `👥 Users: ${all.length}`,
        `❌ Without access: ${inactive}`,
        `🗑️ Expired subscriptions removed: ${removed}`
      ].join("\n");
    },

    async cleanup_stats() {
      const result = await ledger.sweepOlderThan(env.LEDGER_RETENTION_HOURS);
      return [
        `🧹 Ledger rows older than ${env.LEDGER_RETENTION_HOURS} h removed`,
        "",
        `👥 Users scanned: ${result.usersScanned}`,
        `🗑️ Rows removed: ${result.totalDeleted}`,
        `⚠️ Errors: ${result.errorCount}`
      ].join("\n");
    },

    async admin_add_admin({ text, adminId }) {
      const parsed = parseUserIdArg(text, "/admin_add_admin <user_id>");
      if (!parsed.ok) return parsed.message;
      const { userId } = parsed.value;

      const added = await admins.add(userId);
      if (!added) return `User ${userId} is already an admin.`;
      logger.info({ adminId, userId }, "Admin granted");
      return `✅ Admin added: ${userId}\n👥 Admins: ${admins.list().length}`;
    },

    async admin_remove_admin({ text, adminId }) {
      const parsed = parseUserIdArg(text, "/admin_remove_admin <user_id>");
      if (!parsed.ok) return parsed.message;
      const { userId } = parsed.value;

      const result = await admins.remove(userId);
      if (result === "not_admin") return `User ${userId} is not an admin.`;
      if (result === "last_admin") return "❌ Cannot remove the last admin.";
      logger.info({ adminId, userId }, "Admin revoked");
      return `✅ Admin removed: ${userId}\n👥 Admins: ${admins.list().length}`;
    },

    async admin_list_admins() {
      const ids = admins.list();
      const lines = ["👥 Admins:", ""];
      ids.forEach((id, index) => lines.push(`${index + 1}. 🆔 ${id}`));
      lines.push("", `📊 Total: ${ids.length}`);
      return lines.join("\n");
    },

    async admin_db_status() {
      const status = await getDatabaseStatus(conn);
      return status ? renderDatabaseStatus(status) : "❌ Could not read database status.";
    },

    async admin_optimize_db() {
      const ok = await optimizeDatabase(conn);
      return ok ? "✅ Database optimized." : "❌ Database optimization failed.";
    },

    async admin_backup() {
      const target = await profiles.snapshot(env.BACKUP_DIR);
      const count = (await profiles.all()).length;
      return `✅ Backup written\n📁 File: ${target}\n👥 Users: ${count}`;
    }
  };
}

export function registerAdminCommands(bot: Telegraf, services: BotServices) {
  const handlers = createAdminHandlers(services);

  for (const command of ADMIN_COMMANDS) {
    const handler = handlers[command];
    bot.command(command, async (ctx) => {
      const telegramUserId = ctx.from?.id;
      if (!telegramUserId) return;
      if (!services.admins.isAdmin(telegramUserId)) {
        await ctx.reply("Unauthorized.");
        return;
      }

      try {
        const reply = await handler({ text: ctx.message.text, adminId: telegramUserId });
        for (const chunk of splitMessage(reply)) {
          await ctx.reply(chunk);
        }
      } catch (err) {
        logger.error({ err, command, telegramUserId }, "Admin command failed");
        await ctx.reply(GENERIC_ERROR_TEXT);
      }
    });
  }
}
