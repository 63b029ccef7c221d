/**
 * Student Provisioning - Backoff Utilities
 *
 * Exponential backoff with full jitter, used between compare-and-swap
 * attempts on the directory's ID counters.
 *
 * @see https://aws.amazon.com/blogs/architecture/exponential-backoff-and-jitter/
 */

// =============================================================================
// Types
// =============================================================================

export interface RetryConfig {
    /** Base delay in milliseconds (default: 20) */
    baseDelayMs: number;
    /** Maximum delay in milliseconds (default: 500) */
    maxDelayMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
    baseDelayMs: 20,
    maxDelayMs: 500,
};

// =============================================================================
// Delay Calculation
// =============================================================================

/**
 * Calculate delay with exponential backoff and full jitter.
 *
 * @param attempt - Attempt that just failed (0-indexed)
 * @returns Delay in milliseconds, in [0, min(base * 2^attempt, max))
 */
export function calculateDelay(
    attempt: number,
    config: RetryConfig = DEFAULT_RETRY_CONFIG,
    random: () => number = Math.random
): number {
    const exponentialDelay = config.baseDelayMs * Math.pow(2, attempt);
    const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs);
    return Math.floor(random() * cappedDelay);
}

/**
 * Sleep for the specified duration. Rejects with the signal's reason if
 * the signal aborts first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(signal.reason);
            return;
        }
        const onAbort = (): void => {
            clearTimeout(timer);
            reject(signal?.reason);
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}
