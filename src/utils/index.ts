export { createLogger, withLogContext } from './logger.js';
export type { Logger, LogMeta } from './logger.js';

export { hashBuffer, shortHash } from './hash.js';

export {
    withRetry,
    withTimeout,
    sleep,
    isRetryableError,
    calculateBackoffDelay,
    getRetryOptions,
    RETRYABLE_ERROR_PATTERNS,
} from './retry.js';
export type { RetryOptions } from './retry.js';

export { RateLimiter } from './rate-limiter.js';

export { VetDocEventEmitter, createEventEmitter } from './events.js';
export type { VetDocEvents } from './events.js';

export { systemClock, elapsedSeconds } from './clock.js';
export type { Clock } from './clock.js';

export { sanitizeFilename, MAX_FILENAME_LENGTH, DEFAULT_FILENAME } from './filename.js';
