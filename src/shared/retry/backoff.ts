export type BackoffPolicy = {
  baseDelayMs: number;      // wait after the first pending attempt
  maxIntervalMs: number;    // cap for a single wait
  maxTotalMs: number;       // budget for the whole loop
};

/**
 * Wait before the next attempt: `min(base * 2^attempt, maxInterval)`, never past
 * the end of the total budget. Returns null once the budget is spent.
 */
export const computeBackoffDelayMs = (policy: BackoffPolicy, attempt: number, elapsedMs: number): number | null => {
  const remainingMs = policy.maxTotalMs - elapsedMs;
  if (remainingMs <= 0) return null;

  const backoff = Math.min(policy.maxIntervalMs, policy.baseDelayMs * Math.pow(2, attempt));
  return Math.max(0, Math.min(backoff, remainingMs));
};

/**
 * Resolves after `ms`, or as soon as `signal` aborts. Callers check `signal.aborted`.
 */
export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
