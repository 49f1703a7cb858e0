import fs from "node:fs/promises";
import path from "node:path";
import { format } from "date-fns";
import { z } from "zod";
import { Mutex } from "../db/lock";
import { logger } from "../logger";

export const DEFAULT_MAX_FREE_TRIALS = 2;
export const DEFAULT_PREFERRED_MODE = "ai";

/**
 * Per-user trial counters plus a denormalized copy of subscription facts for display.
 * The Entitlement Store stays authoritative for subscriptions.
 */
export type TrialProfile = {
  userId: number;
  createdAt: string;
  freeTrialsUsed: number;
  maxFreeTrials: number;
  subscriptionActive: boolean;
  subscriptionExpires: string | null;
  totalUses: number;
  preferredMode: string;
};

export type ProfileRepository = {
  /** Returns the profile, creating and persisting a fresh one on first access. */
  get(userId: number): Promise<TrialProfile>;
  upsert(userId: number, mutator: (draft: TrialProfile) => void): Promise<TrialProfile>;
  all(): Promise<TrialProfile[]>;
  /** Writes a timestamped copy of every profile into `dir` and returns its path. */
  snapshot(dir: string): Promise<string>;
};

// On-disk layout, keyed by user id.
const StoredProfileSchema = z.object({
  user_id: z.number().int().optional(),
  created_at: z.string(),
  free_trials_used: z.number().int().min(0).default(0),
  max_free_trials: z.number().int().min(0).default(DEFAULT_MAX_FREE_TRIALS),
  subscription_active: z.boolean().default(false),
  subscription_expires: z.string().nullable().default(null),
  total_claude_uses: z.number().int().min(0).default(0),
  preferred_mode: z.string().default(DEFAULT_PREFERRED_MODE)
});

type StoredProfile = z.infer<typeof StoredProfileSchema>;

function fromStored(userId: number, stored: StoredProfile): TrialProfile {
  return {
    userId,
    createdAt: stored.created_at,
    freeTrialsUsed: stored.free_trials_used,
    maxFreeTrials: stored.max_free_trials,
    subscriptionActive: stored.subscription_active,
    subscriptionExpires: stored.subscription_expires,
    totalUses: stored.total_claude_uses,
    preferredMode: stored.preferred_mode
  };
}

function toStored(profile: TrialProfile): StoredProfile {
  return {
    user_id: profile.userId,
    created_at: profile.createdAt,
    free_trials_used: profile.freeTrialsUsed,
    max_free_trials: profile.maxFreeTrials,
    subscription_active: profile.subscriptionActive,
    subscription_expires: profile.subscriptionExpires,
    total_claude_uses: profile.totalUses,
    preferred_mode: profile.preferredMode
  };
}

function isMissingFile(err: unknown): boolean {
  // fs errors come from another realm under Jest, so match on the code alone.
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

export function parseProfileFile(raw: string): { profiles: Map<number, TrialProfile>; skipped: string[] } {
  const parsed: unknown = JSON.parse(raw);
  const top = z.record(z.string(), z.unknown()).parse(parsed);

  const profiles = new Map<number, TrialProfile>();
  const skipped: string[] = [];
  for (const [key, value] of Object.entries(top)) {
    const userId = Number(key);
    const record = StoredProfileSchema.safeParse(value);
    if (!Number.isSafeInteger(userId) || !record.success) {
      skipped.push(key);
      continue;
    }
    profiles.set(userId, fromStored(userId, record.data));
  }
  return { profiles, skipped };
}

function serialize(profiles: Map<number, TrialProfile>): string {
  const out: Record<string, StoredProfile> = {};
  for (const [userId, profile] of profiles) {
    out[String(userId)] = toStored(profile);
  }
  return `${JSON.stringify(out, null, 2)}\n`;
}

async function writeFileAtomic(filePath: string, contents: string) {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(tmpPath, contents, "utf8");
  await fs.rename(tmpPath, filePath);
}

export function createJsonProfileStore(params: {
  filePath: string;
  maxFreeTrials?: number;
  now?: () => number;
}): ProfileRepository {
  const { filePath, maxFreeTrials = DEFAULT_MAX_FREE_TRIALS, now = Date.now } = params;
  const lock = new Mutex();
  let cache: Map<number, TrialProfile> | null = null;

  async function load(): Promise<Map<number, TrialProfile>> {
    if (cache) return cache;

    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf8");
    } catch (err) {
      if (!isMissingFile(err)) throw err;
      cache = new Map();
      return cache;
    }

    try {
      const { profiles, skipped } = parseProfileFile(raw);
      if (skipped.length > 0) {
        logger.warn({ filePath, skipped }, "Skipped unreadable profile records");
      }
      cache = profiles;
    } catch (err) {
      // Keep the unreadable file for inspection instead of overwriting it on the next save.
      const asidePath = `${filePath}.corrupt-${now()}`;
      await fs.rename(filePath, asidePath);
      logger.error({ err, filePath, asidePath }, "Profile file unreadable; starting with an empty profile store");
      cache = new Map();
    }
    return cache;
  }

  function freshProfile(userId: number): TrialProfile {
    return {
      userId,
      createdAt: new Date(now()).toISOString(),
      freeTrialsUsed: 0,
      maxFreeTrials,
      subscriptionActive: false,
      subscriptionExpires: null,
      totalUses: 0,
      preferredMode: DEFAULT_PREFERRED_MODE
    };
  }

  async function commit(profiles: Map<number, TrialProfile>, next: TrialProfile) {
    const staged = new Map(profiles);
    staged.set(next.userId, next);
    await writeFileAtomic(filePath, serialize(staged));
    profiles.set(next.userId, next);
  }

  return {
    get(userId) {
      return lock.runExclusive(async () => {
        const profiles = await load();
        const existing = profiles.get(userId);
        if (existing) return { ...existing };

        const created = freshProfile(userId);
        await commit(profiles, created);
        logger.info({ userId }, "Trial profile created");
        return { ...created };
      });
    },

    upsert(userId, mutator) {
      return lock.runExclusive(async () => {
        const profiles = await load();
        const draft = { ...(profiles.get(userId) ?? freshProfile(userId)) };
        mutator(draft);
        draft.userId = userId;
        await commit(profiles, draft);
        return { ...draft };
      });
    },

    all() {
      return lock.runExclusive(async () => {
        const profiles = await load();
        return [...profiles.values()].map((profile) => ({ ...profile }));
      });
    },

    snapshot(dir) {
      return lock.runExclusive(async () => {
        const profiles = await load();
        const target = path.join(dir, `profiles-${format(now(), "yyyyMMdd-HHmmss")}.json`);
        const users: unknown = JSON.parse(serialize(profiles));
        const body = { timestamp: new Date(now()).toISOString(), users };
        await writeFileAtomic(target, `${JSON.stringify(body, null, 2)}\n`);
        logger.info({ target, count: profiles.size }, "Profile snapshot written");
        return target;
      });
    }
  };
}
