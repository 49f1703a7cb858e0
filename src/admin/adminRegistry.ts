import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { Mutex } from "../db/lock";
import { logger } from "../logger";

export type AdminRegistry = {
  isAdmin(userId: number): boolean;
  list(): number[];
  /** False if the user is already an admin. */
  add(userId: number): Promise<boolean>;
  /** The last remaining admin cannot be removed. */
  remove(userId: number): Promise<"removed" | "not_admin" | "last_admin">;
};

const AdminFileSchema = z.object({
  adminIds: z.array(z.number().int())
});

async function readPersistedIds(filePath: string): Promise<number[]> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT") return [];
    throw err;
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    logger.warn({ err, filePath }, "Ignoring unreadable admin file");
    return [];
  }
  const parsed = AdminFileSchema.safeParse(json);
  if (!parsed.success) {
    logger.warn({ filePath, issues: parsed.error.issues }, "Ignoring malformed admin file");
    return [];
  }
  return parsed.data.adminIds;
}

/**
 * Admin identities seeded from configuration and extended at runtime.
 * Runtime changes are written back to `filePath` so they survive restarts.
 */
export async function loadAdminRegistry(params: { seedIds: number[]; filePath: string }): Promise<AdminRegistry> {
  const { seedIds, filePath } = params;
  const lock = new Mutex();
  const ids = new Set<number>([...seedIds, ...(await readPersistedIds(filePath))]);

  async function persist() {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const tmpPath = `${filePath}.${process.pid}.tmp`;
    await fs.writeFile(tmpPath, `${JSON.stringify({ adminIds: [...ids] }, null, 2)}\n`, "utf8");
    await fs.rename(tmpPath, filePath);
  }

  logger.info({ adminCount: ids.size }, "Admin registry loaded");

  return {
    isAdmin(userId) {
      return ids.has(userId);
    },

    list() {
      return [...ids];
    },

    add(userId) {
      return lock.runExclusive(async () => {
        if (ids.has(userId)) return false;
        ids.add(userId);
        try {
          await persist();
        } catch (err) {
          ids.delete(userId);
          throw err;
        }
        logger.info({ userId }, "Admin added");
        return true;
      });
    },

    remove(userId) {
      return lock.runExclusive(async () => {
        if (!ids.has(userId)) return "not_admin" as const;
        if (ids.size === 1) return "last_admin" as const;
        ids.delete(userId);
        try {
          await persist();
        } catch (err) {
          ids.add(userId);
          throw err;
        }
        logger.info({ userId }, "Admin removed");
        return "removed" as const;
      });
    }
  };
}
