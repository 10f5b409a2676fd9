import type { OcrConfig } from '../types/config.types.js';
import { OCRTransientError, RateLimitError } from '../errors/index.js';

export interface RetryOptions {
    maxRetries: number;
    initialDelayMs: number;
    maxDelayMs: number;
    backoffMultiplier: number;
    retryableErrors?: string[];
    /** Stop retrying once aborted */
    signal?: AbortSignal;
    onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

/**
 * Message fragments of errors that are worth another attempt
 */
export const RETRYABLE_ERROR_PATTERNS = ['429', '503', 'TIMEOUT', 'ECONNRESET', 'ETIMEDOUT'];

/**
 * Retry options for OCR calls
 */
export function getRetryOptions(ocrConfig: OcrConfig): RetryOptions {
    return {
        maxRetries: ocrConfig.retryLimit,
        initialDelayMs: ocrConfig.retryDelayMs,
        maxDelayMs: 30000,
        backoffMultiplier: ocrConfig.backoffMultiplier,
        retryableErrors: RETRYABLE_ERROR_PATTERNS,
    };
}

/**
 * Check if an error is retryable
 */
export function isRetryableError(error: Error, retryableErrors: string[] = []): boolean {
    if (error instanceof OCRTransientError || error instanceof RateLimitError) {
        return true;
    }

    const errorString = error.message + (error.name || '');
    return retryableErrors.some(pattern =>
        errorString.includes(pattern) || error.name.includes(pattern)
    );
}

/**
 * Calculate delay with exponential backoff
 */
export function calculateBackoffDelay(
    attempt: number,
    initialDelayMs: number,
    backoffMultiplier: number,
    maxDelayMs: number
): number {
    const delay = initialDelayMs * Math.pow(backoffMultiplier, attempt - 1);
    // ±10% jitter
    const jitter = delay * 0.1 * (Math.random() * 2 - 1);
    return Math.max(0, Math.min(delay + jitter, maxDelayMs));
}

/**
 * Sleep for a specified duration; resolves early when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise(resolve => {
        if (signal?.aborted) {
            resolve();
            return;
        }
        const onAbort = (): void => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}

/**
 * Execute a function with retry logic
 * Rethrows the last error once retries are exhausted or the error is not retryable
 */
export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    options: RetryOptions
): Promise<T> {
    let lastError: Error | undefined;

    for (let attempt = 1; attempt <= options.maxRetries + 1; attempt++) {
        try {
            return await fn(attempt);
        } catch (error) {
            lastError = toError(error);

            if (attempt > options.maxRetries || options.signal?.aborted) {
                break;
            }

            if (!isRetryableError(lastError, options.retryableErrors)) {
                throw lastError;
            }

            let delayMs = calculateBackoffDelay(
                attempt,
                options.initialDelayMs,
                options.backoffMultiplier,
                options.maxDelayMs
            );

            if (lastError instanceof RateLimitError && lastError.retryAfterMs) {
                delayMs = Math.max(delayMs, lastError.retryAfterMs);
            }

            options.onRetry?.(attempt, lastError, delayMs);

            await sleep(delayMs, options.signal);
        }
    }

    throw lastError;
}

/**
 * Run `fn` with a deadline
 *
 * `fn` receives a signal that aborts on timeout or when the parent signal
 * aborts. On timeout the promise rejects with the error built by `onTimeout`.
 */
export async function withTimeout<T>(
    fn: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    options: {
        signal?: AbortSignal;
        onTimeout: () => Error;
    }
): Promise<T> {
    const controller = new AbortController();
    const parent = options.signal;
    const abortFromParent = (): void => controller.abort(parent?.reason);

    if (parent?.aborted) {
        controller.abort(parent.reason);
    } else {
        parent?.addEventListener('abort', abortFromParent, { once: true });
    }

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            const error = options.onTimeout();
            reject(error);
            controller.abort(error);
        }, timeoutMs);
    });

    try {
        return await Promise.race([fn(controller.signal), deadline]);
    } finally {
        clearTimeout(timer);
        parent?.removeEventListener('abort', abortFromParent);
    }
}
