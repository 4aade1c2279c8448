import { setTimeout as delay } from "node:timers/promises";
import { OperationAbortedError } from "./esnl-errors";

export type RetryPolicy = {
  // total number of attempts (including the first)
  maxAttempts: number;

  // delay before the second attempt
  initialDelayMs: number;

  // each subsequent delay is the previous one times this
  multiplier: number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  initialDelayMs: 2000,
  multiplier: 2,
};

/**
 * A pause between attempts. Must reject if the signal is aborted while waiting.
 */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal: signal });
  } catch (e) {
    if (signal?.aborted) throw new OperationAbortedError();
    throw e;
  }
};

export type RetryOptions = {
  sleep?: Sleep;
  signal?: AbortSignal;

  /**
   * Called after a failed attempt that is going to be retried.
   */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
};

/**
 * The delays taken before attempts 2..maxAttempts.
 * e.g. the default policy gives [2000, 4000, 8000, 16000]
 *
 * @param policy
 */
export function backoffDelays(policy: RetryPolicy): number[] {
  const delays: number[] = [];

  for (let attempt = 1; attempt < policy.maxAttempts; attempt++)
    delays.push(
      policy.initialDelayMs * Math.pow(policy.multiplier, attempt - 1),
    );

  return delays;
}

/**
 * Run the operation until it resolves or the policy runs out of attempts. The
 * error of the final attempt is rethrown. Aborting the signal stops any
 * further attempts (an attempt already in flight is expected to watch the
 * signal itself).
 *
 * @param operation called with the 1-based attempt number
 * @param policy
 * @param options
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {},
): Promise<T> {
  const pause = options.sleep ?? sleep;
  const delays = backoffDelays(policy);

  for (let attempt = 1; ; attempt++) {
    if (options.signal?.aborted) throw new OperationAbortedError();

    try {
      return await operation(attempt);
    } catch (e) {
      if (e instanceof OperationAbortedError || options.signal?.aborted)
        throw new OperationAbortedError();

      if (attempt >= policy.maxAttempts) throw e;

      const delayMs = delays[attempt - 1];

      options.onRetry?.(e, attempt, delayMs);

      await pause(delayMs, options.signal);
    }
  }
}
