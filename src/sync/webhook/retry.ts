import { setTimeout as delay } from "timers/promises";
import type { RetryPolicy } from "@/sync/config/env";

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 2_000,
  maxDelayMs: 30_000,
  jitter: 0.25,
};

/**
 * Delay before the attempt after `attempt` (1-based):
 * `baseDelayMs * 2^(attempt-1)`, capped at `maxDelayMs`, then spread by ±jitter.
 */
export function backoffDelay(attempt: number, policy: RetryPolicy, random: () => number = Math.random): number {
  const base = policy.baseDelayMs * Math.pow(2, attempt - 1);
  const capped = Math.min(base, policy.maxDelayMs);
  if (policy.jitter <= 0) return capped;
  const factor = 1 + (random() * 2 - 1) * policy.jitter;
  return Math.max(0, Math.round(capped * factor));
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Rejects with the signal's abort error if cancelled while waiting. */
export const sleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};
