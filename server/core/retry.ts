export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  jitterEnabled: boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 250,
  maxDelayMs: 5_000,
  backoffMultiplier: 2,
  jitterEnabled: true,
};

/**
 * Calculate retry delay with exponential backoff and jitter
 */
export function calculateRetryDelay(attempt: number, policy: RetryPolicy, random: () => number = Math.random): number {
  let delay = policy.initialDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1);
  delay = Math.min(delay, policy.maxDelayMs);

  if (policy.jitterEnabled) {
    // ±25%
    const jitter = delay * 0.25 * (random() * 2 - 1);
    delay += jitter;
  }

  return Math.max(0, Math.round(delay));
}

export interface RetryContext {
  attempt: number;
}

/**
 * Runs `operation` until it succeeds, `shouldRetry` declines, or attempts run out.
 */
export async function withRetry<T>(
  operation: (context: RetryContext) => Promise<T>,
  policy: RetryPolicy,
  options: {
    shouldRetry: (error: unknown) => boolean;
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
    sleep?: (ms: number) => Promise<void>;
  }
): Promise<T> {
  const sleep = options.sleep ?? ((ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms)));
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation({ attempt });
    } catch (error) {
      if (attempt >= maxAttempts || !options.shouldRetry(error)) {
        throw error;
      }
      const delay = calculateRetryDelay(attempt, policy);
      options.onRetry?.(error, attempt, delay);
      await sleep(delay);
    }
  }
}
