import { ProviderError } from '@care-companion/shared';

export interface RetryPolicy {
    retries: number;
    timeoutMs: number;
    baseDelayMs: number;
    maxDelayMs: number;
}

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delay before retry number `attempt` (1-based): base * 2^(attempt-1), capped
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
    const raw = policy.baseDelayMs * 2 ** Math.max(0, attempt - 1);
    return Math.min(policy.maxDelayMs, raw);
}

export interface RetryOutcome<T> {
    value?: T;
    error?: unknown;
    attempts: number;
}

/**
 * Runs `fn` until it succeeds, the error is not retryable, or the budget is spent.
 * Only a ProviderError marked retryable earns another attempt.
 */
export async function withBackoff<T>(
    fn: (attempt: number) => Promise<T>,
    policy: RetryPolicy,
    sleep: Sleep = defaultSleep,
    onRetry?: (attempt: number, delayMs: number, err: unknown) => void,
): Promise<RetryOutcome<T>> {
    let attempt = 0;
    while (true) {
        attempt += 1;
        try {
            const value = await fn(attempt);
            return { value, attempts: attempt };
        } catch (err) {
            const retryable = err instanceof ProviderError && err.retryable;
            if (!retryable || attempt > policy.retries) {
                return { error: err, attempts: attempt };
            }
            const delay = backoffDelay(policy, attempt);
            onRetry?.(attempt, delay, err);
            await sleep(delay);
        }
    }
}
