export type StorageErrorCode = "STORAGE_BUSY" | "STORAGE_UNAVAILABLE";

export class StorageError extends Error {
  readonly code: StorageErrorCode;

  constructor(code: StorageErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StorageError";
    this.code = code;
  }
}

/** Lock contention outlasted every retry. */
export class StorageBusyError extends StorageError {
  readonly attempts: number;

  constructor(attempts: number, cause?: unknown) {
    super("STORAGE_BUSY", `Database still locked after ${attempts} attempts`, { cause });
    this.name = "StorageBusyError";
    this.attempts = attempts;
  }
}

/** The database file could not be opened at all. */
export class StorageUnavailableError extends StorageError {
  constructor(dbPath: string, cause?: unknown) {
    super("STORAGE_UNAVAILABLE", `Cannot open database at ${dbPath}`, { cause });
    this.name = "StorageUnavailableError";
  }
}

const BUSY_CODES = new Set(["SQLITE_BUSY", "SQLITE_LOCKED", "SQLITE_BUSY_SNAPSHOT", "SQLITE_BUSY_RECOVERY"]);

export function isBusyError(err: unknown): boolean {
  if (typeof err !== "object" || err === null) return false;
  const code = "code" in err ? err.code : undefined;
  if (typeof code === "string" && BUSY_CODES.has(code)) return true;
  const message = "message" in err ? err.message : undefined;
  return typeof message === "string" && /database (table )?is locked|database is busy/i.test(message);
}
