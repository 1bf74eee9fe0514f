export interface BackoffPolicy {
  baseDelay: number;
  maxDelay: number;
}

// Exponential backoff: 5s, 10s, 20s, 40s, max 60s
export const DEFAULT_BACKOFF: BackoffPolicy = {
  baseDelay: 5000,
  maxDelay: 60000,
};

/** Delay before retry number `attempt` (0-based), without jitter. */
export function backoffDelay(attempt: number, policy: BackoffPolicy = DEFAULT_BACKOFF): number {
  return Math.min(policy.baseDelay * Math.pow(2, attempt), policy.maxDelay);
}

/**
 * Adds up to 100% multiplicative jitter so devices retrying together
 * spread out.
 */
export function withJitter(delay: number, random: () => number = Math.random): number {
  return Math.round(delay + random() * delay);
}

export function formatDelay(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  return `${(ms / 1000).toFixed(1)}s`;
}
