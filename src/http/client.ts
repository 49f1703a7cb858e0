import { logger } from "../logger";

const DEFAULT_RETRYABLE_STATUSES = new Set([408, 429, 500, 502, 503, 504, 529]);

export type HttpFetchOptions = {
  method?: string;
  headers?: Record<string, string>;
  body?: string | null;
  signal?: AbortSignal | null;
  timeoutMs?: number;
  maxRetries?: number;
  retryBaseDelayMs?: number;
  retryMaxDelayMs?: number;
  retryJitterMs?: number;
  retryOnStatuses?: Set<number> | number[];
  requestName?: string;
  logMeta?: Record<string, unknown>;
  /** POST is only retried when the caller marks it idempotent. */
  idempotent?: boolean;
};

type ErrorLike = { name?: unknown; code?: unknown; message?: unknown };

function errorFields(err: unknown): ErrorLike {
  if (!err || typeof err !== "object") return {};
  return {
    name: "name" in err ? err.name : undefined,
    code: "code" in err ? err.code : undefined,
    message: "message" in err ? err.message : undefined
  };
}

function safeUrlMeta(url: string): { host: string | null; path: string } {
  try {
    const parsed = new URL(url);
    return { host: parsed.host, path: parsed.pathname };
  } catch {
    return { host: null, path: url };
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function backoffDelayMs(attempt: number, base: number, max: number, jitter: number): number {
  const exp = Math.min(max, base * Math.max(1, 2 ** (attempt - 1)));
  const extra = jitter > 0 ? Math.floor(Math.random() * jitter) : 0;
  return exp + extra;
}

function normalizeRetryStatuses(input?: Set<number> | number[]): Set<number> {
  if (!input) return DEFAULT_RETRYABLE_STATUSES;
  if (input instanceof Set) return input;
  return new Set(input);
}

function isRetryableMethod(method: string, idempotent: boolean): boolean {
  if (idempotent) return true;
  return method === "GET" || method === "HEAD" || method === "OPTIONS";
}

function createAttemptSignal(timeoutMs: number, upstream?: AbortSignal | null) {
  const controller = new AbortController();
  let timedOut = false;

  const onUpstreamAbort = () => {
    controller.abort(upstream?.reason);
  };

  if (upstream) {
    if (upstream.aborted) {
      controller.abort(upstream.reason);
    } else {
      upstream.addEventListener("abort", onUpstreamAbort, { once: true });
    }
  }

  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort(new Error(`Request timed out after ${timeoutMs}ms`));
  }, timeoutMs);
  timeoutId.unref();

  return {
    signal: controller.signal,
    wasTimeout: () => timedOut,
    cleanup: () => {
      clearTimeout(timeoutId);
      if (upstream) upstream.removeEventListener("abort", onUpstreamAbort);
    }
  };
}

function isRetryableNetworkError(err: unknown): boolean {
  const { name, code, message } = errorFields(err);
  if (name === "AbortError") return true;
  if (typeof message === "string" && message.toLowerCase().includes("fetch failed")) return true;
  if (typeof code === "string") {
    return ["ECONNRESET", "ECONNREFUSED", "ETIMEDOUT", "EAI_AGAIN", "ENOTFOUND"].includes(code);
  }
  return false;
}

export async function httpFetch(url: string, options: HttpFetchOptions = {}): Promise<Response> {
  const {
    timeoutMs = 10_000,
    maxRetries = 2,
    retryBaseDelayMs = 250,
    retryMaxDelayMs = 2_000,
    retryJitterMs = 150,
    retryOnStatuses,
    requestName = "http_request",
    logMeta,
    idempotent = false,
    signal: upstreamSignal,
    method: methodInput,
    headers,
    body
  } = options;

  const method = String(methodInput ?? "GET").toUpperCase();
  const canRetry = maxRetries > 0 && isRetryableMethod(method, idempotent);
  const retryStatuses = normalizeRetryStatuses(retryOnStatuses);
  const maxAttempts = canRetry ? maxRetries + 1 : 1;
  const urlMeta = safeUrlMeta(url);

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    const attemptSignal = createAttemptSignal(timeoutMs, upstreamSignal);

    try {
      const response = await fetch(url, { method, headers, body, signal: attemptSignal.signal });
      attemptSignal.cleanup();

      const shouldRetryStatus = canRetry && attempt < maxAttempts && retryStatuses.has(response.status);
      if (!shouldRetryStatus) {
        return response;
      }

      try {
        await response.body?.cancel();
      } catch (err) {
        logger.debug({ err, requestName }, "Could not cancel response body before retrying");
      }

      const waitMs = backoffDelayMs(attempt, retryBaseDelayMs, retryMaxDelayMs, retryJitterMs);
      logger.warn(
        { requestName, method, status: response.status, attempt, maxAttempts, waitMs, ...urlMeta, ...logMeta },
        "HTTP request retrying after retryable status"
      );
      await delay(waitMs);
    } catch (err: unknown) {
      const timedOut = attemptSignal.wasTimeout();
      attemptSignal.cleanup();

      const upstreamAborted = !!upstreamSignal?.aborted;
      const shouldRetryError =
        canRetry && attempt < maxAttempts && !upstreamAborted && (timedOut || isRetryableNetworkError(err));

      if (!shouldRetryError) {
        throw err;
      }

      const { name, code, message } = errorFields(err);
      const waitMs = backoffDelayMs(attempt, retryBaseDelayMs, retryMaxDelayMs, retryJitterMs);
      logger.warn(
        {
          requestName,
          method,
          timedOut,
          attempt,
          maxAttempts,
          waitMs,
          errorName: name,
          errorCode: code,
          errorMessage: message,
          ...urlMeta,
          ...logMeta
        },
        "HTTP request retrying after network/timeout error"
      );
      await delay(waitMs);
    }
  }

  throw new Error("httpFetch exhausted retries unexpectedly");
}
