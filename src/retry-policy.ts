// Sales Call Scorecard - Retry and timeout policy for external calls
//
// Every external call the coordinator makes goes through runWithRetry():
// each attempt is time-boxed by withTimeout(); a timeout counts as a
// transient failure. Transient failures are retried with exponential backoff
// up to maxRetries; permanent failures stop at once.

import type { RetryConfig } from "./config.js";
import { DEFAULT_RETRY_CONFIG } from "./config.js";
import { StageTimeoutError, classifyError } from "./errors.js";
import type { ErrorClassification } from "./types.js";

export interface RetryPolicy {
  /** Retries after the first attempt. */
  maxRetries: number;
  /** Delay before retry number `retry` (1-based). */
  delayFor(retry: number): number;
  classify(err: unknown): ErrorClassification;
  sleep(ms: number): Promise<void>;
}

export const realSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export function createRetryPolicy(
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  overrides: Partial<RetryPolicy> = {},
): RetryPolicy {
  return {
    maxRetries: config.maxRetries,
    delayFor: (retry) =>
      Math.min(config.maxDelayMs, config.baseDelayMs * config.multiplier ** Math.max(0, retry - 1)),
    classify: classifyError,
    sleep: realSleep,
    ...overrides,
  };
}

/**
 * Race `work` against a timer. The underlying call is not cancelled; its
 * eventual result is ignored once the timer wins.
 */
export async function withTimeout<T>(work: () => Promise<T>, timeoutMs: number, service: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new StageTimeoutError(service, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([work(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/** Thrown by runWithRetry when the budget is spent or the error is permanent. */
export class RetryFailure extends Error {
  constructor(
    readonly error: unknown,
    readonly classification: ErrorClassification,
    readonly attempts: number,
  ) {
    super(error instanceof Error ? error.message : String(error), { cause: error });
    this.name = "RetryFailure";
  }

  get retries(): number {
    return this.attempts - 1;
  }
}

export interface RetryHooks {
  onRetry?(attempt: number, err: unknown, delayMs: number): void;
}

export interface RetryOutcome<T> {
  value: T;
  attempts: number;
}

export async function runWithRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {},
): Promise<RetryOutcome<T>> {
  let attempt = 0;
  for (;;) {
    attempt++;
    try {
      const value = await operation(attempt);
      return { value, attempts: attempt };
    } catch (err) {
      const classification = policy.classify(err);
      if (classification === "permanent" || attempt > policy.maxRetries) {
        throw new RetryFailure(err, classification, attempt);
      }
      const delayMs = policy.delayFor(attempt);
      hooks.onRetry?.(attempt, err, delayMs);
      await policy.sleep(delayMs);
    }
  }
}
