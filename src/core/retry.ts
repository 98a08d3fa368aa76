/**
 * Retry with exponential backoff for model invocations.
 *
 * Delays are local to the task being retried; nothing here blocks other
 * tasks running alongside it.
 */

export interface RetryPolicy {
    /** Total attempts, the first call included. */
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
}

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/** Delay after failed attempt `attempt` (1-based): min(max, base · 2^(attempt-1)). */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
    return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
}

export type RetryOutcome<T> =
    | { ok: true; value: T; attempts: number }
    | { ok: false; error: Error; attempts: number; interrupted: boolean };

export interface RetryOptions {
    sleep?: Sleep;
    /** Called before waiting out the delay that precedes the next attempt. */
    onRetry?: (error: Error, attempt: number, delayMs: number) => void;
    /** Once aborted, no further attempt starts and the outcome is `interrupted`. */
    signal?: AbortSignal;
}

/**
 * Run `operation` until it resolves or `maxAttempts` is reached. Never
 * throws: the last error is returned in the outcome.
 */
export async function retryWithBackoff<T>(
    operation: (attempt: number) => Promise<T>,
    policy: RetryPolicy,
    options: RetryOptions = {},
): Promise<RetryOutcome<T>> {
    const sleep = options.sleep ?? defaultSleep;
    const maxAttempts = Math.max(1, policy.maxAttempts);
    let lastError = new Error("no attempt was made");

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        try {
            const value = await operation(attempt);
            return { ok: true, value, attempts: attempt };
        } catch (err) {
            lastError = err instanceof Error ? err : new Error(String(err));
            if (attempt === maxAttempts) break;
            if (options.signal?.aborted) return { ok: false, error: lastError, attempts: attempt, interrupted: true };
            const delay = backoffDelay(attempt, policy);
            options.onRetry?.(lastError, attempt, delay);
            await sleep(delay);
            if (options.signal?.aborted) return { ok: false, error: lastError, attempts: attempt, interrupted: true };
        }
    }
    return { ok: false, error: lastError, attempts: maxAttempts, interrupted: false };
}
