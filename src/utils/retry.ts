import { getConfig } from "../config.js";
import { log } from "./logger.js";

export type RetryOptions = {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** "fixed" waits baseDelayMs every time; "exponential" doubles it per attempt. */
  backoff?: "fixed" | "exponential";
  /** Return false to rethrow immediately instead of retrying. */
  shouldRetry?: (err: unknown) => boolean;
  label?: string;
};

export function retryDelay(
  attempt: number,
  opts: Required<Pick<RetryOptions, "baseDelayMs" | "maxDelayMs" | "backoff">>,
): number {
  const raw = opts.backoff === "fixed" ? opts.baseDelayMs : opts.baseDelayMs * 2 ** (attempt - 1);
  return Math.min(raw, opts.maxDelayMs);
}

export async function withRetry<T>(fn: () => Promise<T>, opts?: RetryOptions): Promise<T> {
  const defaults = getConfig().retry;
  const maxAttempts = opts?.maxAttempts ?? defaults.maxAttempts;
  const timing = {
    baseDelayMs: opts?.baseDelayMs ?? defaults.baseDelayMs,
    maxDelayMs: opts?.maxDelayMs ?? defaults.maxDelayMs,
    backoff: opts?.backoff ?? defaults.backoff,
  };

  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (attempt === maxAttempts || (opts?.shouldRetry && !opts.shouldRetry(err))) break;
      const delay = retryDelay(attempt, timing);
      log.debug("Retrying after failure", {
        label: opts?.label,
        attempt,
        delayMs: delay,
        error: err instanceof Error ? err.message : String(err),
      });
      await new Promise((r) => setTimeout(r, delay));
    }
  }
  throw lastError;
}
