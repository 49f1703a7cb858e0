import type { SubscriptionStore } from "../db/subscriptionsRepo";
import { logger } from "../logger";
import type { ProfileRepository, TrialProfile } from "../profiles/profileStore";

export type EntitlementDecision =
  | { allowed: true; reason: "subscription"; expiresAt: Date }
  | { allowed: true; reason: "free_trial"; remainingTrials: number }
  | { allowed: false; reason: "no_access" };

export type UsageSummary = {
  createdAt: string;
  freeTrialsUsed: number;
  maxFreeTrials: number;
  remainingTrials: number;
  subscriptionActive: boolean;
  subscriptionExpires: string | null;
  totalUses: number;
  preferredMode: string;
};

export type EntitlementPolicy = {
  canUseAnalysis(userId: number): Promise<EntitlementDecision>;
  /** Call only after a successful analysis that was allowed as a free trial. */
  consumeTrial(userId: number): Promise<void>;
  activateSubscription(userId: number, months: number): Promise<boolean>;
  revokeSubscription(userId: number): Promise<boolean>;
  resetTrials(userId: number): Promise<TrialProfile>;
  /** Gives back up to `count` used trials. */
  addTrials(userId: number, count: number): Promise<TrialProfile>;
  setPreferredMode(userId: number, mode: string): Promise<void>;
  getUsageSummary(userId: number): Promise<UsageSummary>;
};

export function remainingTrials(profile: Pick<TrialProfile, "maxFreeTrials" | "freeTrialsUsed">): number {
  return Math.max(0, profile.maxFreeTrials - profile.freeTrialsUsed);
}

export function createEntitlementPolicy(params: {
  subscriptions: SubscriptionStore;
  profiles: ProfileRepository;
}): EntitlementPolicy {
  const { subscriptions, profiles } = params;

  // The profile copy is a display cache; a failed refresh leaves it stale but the store stays correct.
  async function refreshShadow(userId: number) {
    try {
      const status = await subscriptions.getStatus(userId);
      await profiles.upsert(userId, (draft) => {
        draft.subscriptionActive = status.isActive;
        draft.subscriptionExpires = status.hasSubscription ? status.endDate.toISOString() : null;
      });
    } catch (err) {
      logger.warn({ err, userId }, "Failed to refresh subscription shadow on profile");
    }
  }

  return {
    async canUseAnalysis(userId) {
      const status = await subscriptions.getStatus(userId);
      if (status.hasSubscription && status.isActive) {
        return { allowed: true, reason: "subscription", expiresAt: status.endDate };
      }

      try {
        const profile = await profiles.get(userId);
        const remaining = remainingTrials(profile);
        if (remaining > 0) {
          return { allowed: true, reason: "free_trial", remainingTrials: remaining };
        }
      } catch (err) {
        logger.error({ err, userId }, "Failed to read trial profile");
      }
      return { allowed: false, reason: "no_access" };
    },

    async consumeTrial(userId) {
      try {
        const profile = await profiles.upsert(userId, (draft) => {
          draft.freeTrialsUsed = Math.min(draft.maxFreeTrials, draft.freeTrialsUsed + 1);
          draft.totalUses += 1;
        });
        logger.info({ userId, freeTrialsUsed: profile.freeTrialsUsed }, "Free trial consumed");
      } catch (err) {
        logger.error({ err, userId }, "Failed to record free trial use");
      }
    },

    async activateSubscription(userId, months) {
      const ok = await subscriptions.upsertSubscription(userId, months);
      if (ok) await refreshShadow(userId);
      return ok;
    },

    async revokeSubscription(userId) {
      const existed = await subscriptions.revoke(userId);
      await refreshShadow(userId);
      return existed;
    },

    resetTrials(userId) {
      return profiles.upsert(userId, (draft) => {
        draft.freeTrialsUsed = 0;
      });
    },

    addTrials(userId, count) {
      return profiles.upsert(userId, (draft) => {
        draft.freeTrialsUsed = Math.max(0, draft.freeTrialsUsed - count);
      });
    },

    async setPreferredMode(userId, mode) {
      await profiles.upsert(userId, (draft) => {
        draft.preferredMode = mode;
      });
    },

    async getUsageSummary(userId) {
      const profile = await profiles.get(userId);
      return {
        createdAt: profile.createdAt,
        freeTrialsUsed: profile.freeTrialsUsed,
        maxFreeTrials: profile.maxFreeTrials,
        remainingTrials: remainingTrials(profile),
        subscriptionActive: profile.subscriptionActive,
        subscriptionExpires: profile.subscriptionExpires,
        totalUses: profile.totalUses,
        preferredMode: profile.preferredMode
      };
    }
  };
}
