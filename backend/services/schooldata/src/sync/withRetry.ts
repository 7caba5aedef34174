// backend/services/schooldata/src/sync/withRetry.ts
import { setTimeout as delay } from "node:timers/promises";
import type { IBoundLogger } from "@shared/logger/Logger";
import type { RetryPolicy } from "../config";

export type Sleep = (ms: number) => Promise<void>;

export const realSleep: Sleep = async (ms) => {
  await delay(ms);
};

/**
 * Delay before retry number `attemptIndex + 1`: base·2^i, never shorter than
 * a server hint, never longer than maxDelayMs. Deterministic (no jitter).
 */
export function backoffDelay(attemptIndex: number, policy: RetryPolicy, hintMs?: number): number {
  const exp = policy.baseDelayMs * 2 ** attemptIndex;
  return Math.min(policy.maxDelayMs, Math.max(exp, hintMs ?? 0));
}

export type WithRetryOptions = {
  policy: RetryPolicy;
  label: string;
  log: IBoundLogger;
  isRetryable: (err: unknown) => boolean;
  retryAfterMs?: (err: unknown) => number | undefined;
  sleep?: Sleep;
};

/** Bounded attempts; non-retryable errors and the last failure are rethrown as-is. */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: WithRetryOptions): Promise<T> {
  const { policy, label, log, isRetryable } = opts;
  const sleep = opts.sleep ?? realSleep;
  const attempts = Math.max(1, policy.attempts);

  for (let i = 0; ; i++) {
    try {
      return await fn(i + 1);
    } catch (err) {
      if (i + 1 >= attempts || !isRetryable(err)) throw err;
      const waitMs = backoffDelay(i, policy, opts.retryAfterMs?.(err));
      log.warn(
        { label, attempt: i + 1, attempts, waitMs, err: log.serializeError(err) },
        "attempt failed; retrying"
      );
      await sleep(waitMs);
    }
  }
}
