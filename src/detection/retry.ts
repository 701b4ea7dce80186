/**
 * Retry with exponential backoff
 */

import { CancellationError, throwIfAborted } from './errors.js';

export interface RetryPolicy {
    maxAttempts: number;  // including the first attempt
    baseDelayMs: number;
    maxDelayMs: number;
}

export interface RetryOptions {
    isRetryable: (error: unknown) => boolean;
    signal?: AbortSignal;
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
    return Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(2, attempt - 1));
}

/**
 * Resolves after `ms`, or rejects with CancellationError once the signal aborts
 */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(new CancellationError());
            return;
        }

        const onAbort = (): void => {
            clearTimeout(timer);
            reject(new CancellationError());
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Run `operation` until it succeeds, fails with a non-retryable error, or the
 * attempts run out. The last retryable error is rethrown on exhaustion.
 */
export async function retryWithBackoff<T>(
    operation: (attempt: number) => Promise<T>,
    policy: RetryPolicy,
    options: RetryOptions
): Promise<T> {
    const sleep = options.sleep ?? abortableSleep;
    const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));

    for (let attempt = 1; ; attempt++) {
        throwIfAborted(options.signal);
        try {
            return await operation(attempt);
        } catch (error) {
            if (!options.isRetryable(error) || attempt >= maxAttempts) {
                throw error;
            }
            const delayMs = backoffDelay(policy, attempt);
            options.onRetry?.(error, attempt, delayMs);
            await sleep(delayMs, options.signal);
        }
    }
}
