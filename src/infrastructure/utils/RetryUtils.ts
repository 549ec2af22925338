/**
 * Retry Utilities
 *
 * Bounded retry with backoff for transient network failures.
 */

export interface RetryOptions {
    /** Maximum number of attempts, first one included (default: 3) */
    maxAttempts?: number;
    /** Delay before the first retry in milliseconds (default: 1000) */
    initialBackoffMs?: number;
    /** Upper bound for any single delay (default: 30000) */
    maxBackoffMs?: number;
    /** Growth factor between delays; 1 keeps the backoff fixed (default: 1) */
    backoffMultiplier?: number;
    /** Decides whether a failed attempt may be retried (default: all errors) */
    isRetryable?: (error: unknown) => boolean;
    /** Called before each wait */
    onRetry?: (attempt: number, error: unknown, nextDelayMs: number) => void;
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
    maxAttempts: 3,
    initialBackoffMs: 1000,
    maxBackoffMs: 30000,
    backoffMultiplier: 1,
    isRetryable: () => true,
    onRetry: () => { },
};

/**
 * Runs `fn` until it resolves, the error is not retryable, or attempts run out.
 *
 * @throws The last error once no further attempt is allowed
 */
export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    options?: RetryOptions
): Promise<T> {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    const maxAttempts = Math.max(1, Math.floor(opts.maxAttempts));
    let currentBackoff = opts.initialBackoffMs;

    for (let attempt = 1; ; attempt++) {
        try {
            return await fn(attempt);
        } catch (error) {
            if (attempt >= maxAttempts || !opts.isRetryable(error)) {
                throw error;
            }

            const delay = Math.min(currentBackoff, opts.maxBackoffMs);
            opts.onRetry(attempt, error, delay);

            if (delay > 0) {
                await sleep(delay);
            }

            currentBackoff = Math.min(currentBackoff * opts.backoffMultiplier, opts.maxBackoffMs);
        }
    }
}

function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}
