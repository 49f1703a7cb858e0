import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { ConnectionManager } from "../../db/connection";

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "nutrition-bot-"));
}

export function removeDir(dir: string) {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Noon keeps +/- a few hours inside the same local calendar day. */
export const NOON = new Date(2026, 9, 19, 12, 0, 0).getTime();
export const HOUR_MS = 60 * 60 * 1000;

export function fakeClock(startMs = NOON) {
  let current = startMs;
  return {
    now: () => current,
    set(ms: number) {
      current = ms;
    },
    advance(ms: number) {
      current += ms;
    }
  };
}

export async function noSleep(_ms: number): Promise<void> {}

/** A manager whose every operation fails, for exercising store failure values. */
export function brokenConnection(): ConnectionManager {
  return {
    dbPath: "broken",
    async init() {},
    async withConnection() {
      throw new Error("disk I/O error");
    },
    async close() {}
  };
}
