export type ArgParseResult<T> = { ok: true; value: T } | { ok: false; message: string };

/** Words after the command itself; `/cmd@BotName a b` gives `["a", "b"]`. */
export function commandArgs(text: string | undefined): string[] {
  const parts = String(text ?? "").trim().split(/\s+/);
  return parts.slice(1).filter(Boolean);
}

function parseWholeNumber(raw: string): number | null {
  if (!/^\d+$/.test(raw)) return null;
  const value = Number(raw);
  return Number.isSafeInteger(value) ? value : null;
}

export function parseUserIdArg(text: string | undefined, usage: string): ArgParseResult<{ userId: number }> {
  const args = commandArgs(text);
  if (args.length !== 1) return { ok: false, message: `Usage: ${usage}` };

  const userId = parseWholeNumber(args[0]);
  if (userId === null || userId === 0) {
    return { ok: false, message: `User id must be a positive whole number. Usage: ${usage}` };
  }
  return { ok: true, value: { userId } };
}

export function parseUserIdAndCount(
  text: string | undefined,
  options: { usage: string; label: string; min: number; max: number }
): ArgParseResult<{ userId: number; count: number }> {
  const { usage, label, min, max } = options;
  const args = commandArgs(text);
  if (args.length !== 2) return { ok: false, message: `Usage: ${usage}` };

  const userId = parseWholeNumber(args[0]);
  if (userId === null || userId === 0) {
    return { ok: false, message: `User id must be a positive whole number. Usage: ${usage}` };
  }

  const count = parseWholeNumber(args[1]);
  if (count === null || count < min || count > max) {
    return { ok: false, message: `${label} must be between ${min} and ${max}.` };
  }
  return { ok: true, value: { userId, count } };
}
