import { setTimeout as sleep } from "timers/promises";
import { log } from "../logger.js";

// ── Completion retry ─────────────────────────────────────
// Backoff for opening a completion stream. Embedding calls never come
// through here; their failures go straight back to the caller.

export interface RetryPolicy {
  /** Attempts after the first one. */
  maxRetries: number;
  /** First pause; each later pause doubles it. */
  baseDelayMs: number;
  /** Longest single pause. */
  maxDelayMs: number;
  retryableStatuses: readonly number[];
  label: string;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 15_000,
  retryableStatuses: [408, 429, 500, 502, 503, 504],
  label: "completion",
};

const TRANSIENT_NETWORK_CODES = ["ECONNRESET", "ETIMEDOUT", "ECONNREFUSED", "EAI_AGAIN"];

/** Pause before retry number `retry` (0-based). */
export function backoffDelay(retry: number, policy: RetryPolicy): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** retry);
}

/**
 * Call `fn` until it succeeds, fails with something not worth retrying,
 * or runs out of attempts. The last error is rethrown as is.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  overrides: Partial<RetryPolicy> = {},
): Promise<T> {
  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...overrides };

  for (let retry = 0; ; retry++) {
    try {
      return await fn();
    } catch (error: unknown) {
      const exhausted = retry >= policy.maxRetries;
      if (exhausted || !isRetryable(error, policy.retryableStatuses)) throw error;

      const delayMs = backoffDelay(retry, policy);
      log.warn(
        {
          label: policy.label,
          status: statusOf(error),
          retry: retry + 1,
          of: policy.maxRetries,
          delayMs,
        },
        "🔁 Transient failure, retrying",
      );
      await sleep(delayMs);
    }
  }
}

export function isRetryable(
  error: unknown,
  statuses: readonly number[] = DEFAULT_RETRY_POLICY.retryableStatuses,
): boolean {
  // undici reports dropped connections as TypeError("fetch failed")
  if (error instanceof TypeError) return true;
  if (error instanceof Error && TRANSIENT_NETWORK_CODES.some((c) => error.message.includes(c))) {
    return true;
  }
  const status = statusOf(error);
  return status !== undefined && statuses.includes(status);
}

/** HTTP status carried by an SDK error (`status`) or a plain client error (`statusCode`). */
function statusOf(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  if ("status" in error && typeof error.status === "number") return error.status;
  if ("statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return undefined;
}
