import { describe, it, expect, vi } from 'vitest';
import { RateLimiter } from '../src/utils/rate-limiter.js';
import {
    sleep,
    isRetryableError,
    calculateBackoffDelay,
    getRetryOptions,
    withRetry,
    withTimeout,
    RETRYABLE_ERROR_PATTERNS,
} from '../src/utils/retry.js';
import { hashBuffer, shortHash } from '../src/utils/hash.js';
import { createLogger, withLogContext } from '../src/utils/logger.js';
import { createEventEmitter } from '../src/utils/events.js';
import { elapsedSeconds } from '../src/utils/clock.js';
import { sanitizeFilename } from '../src/utils/filename.js';
import { DEFAULT_OCR_CONFIG } from '../src/types/config.types.js';
import { OCRFatalError, OCRTransientError, RateLimitError, withCorrelationId } from '../src/errors/index.js';
import { hangUntilAborted } from './setup.js';
import { createMockLogger } from './mocks/index.js';

describe('Utilities', () => {
    describe('RateLimiter', () => {
        it('should acquire tokens', async () => {
            const limiter = new RateLimiter({ requestsPerMinute: 1000 });
            await expect(limiter.acquire()).resolves.toBeUndefined();
        });

        it('should consume one token per acquire', async () => {
            const limiter = new RateLimiter({ requestsPerMinute: 10 });
            await limiter.acquire();
            await limiter.acquire();
            expect(limiter.getStatus().availableTokens).toBe(8);
        });

        it('should drain available tokens', () => {
            const limiter = new RateLimiter({ requestsPerMinute: 10 });
            limiter.drain();
            expect(limiter.getStatus().availableTokens).toBe(0);
        });

        it('should report its configured rate', () => {
            expect(new RateLimiter({ requestsPerMinute: 30 }).getStatus().requestsPerMinute).toBe(30);
        });

        it('should stop waiting when the signal aborts', async () => {
            const limiter = new RateLimiter({ requestsPerMinute: 1 });
            await limiter.acquire();

            const controller = new AbortController();
            const pending = limiter.acquire(controller.signal);
            controller.abort();

            await expect(pending).resolves.toBeUndefined();
        });
    });

    describe('Retry helpers', () => {
        it('should sleep for specified duration', async () => {
            const start = Date.now();
            await sleep(50);
            expect(Date.now() - start).toBeGreaterThanOrEqual(45);
        });

        it('should end sleep early on abort', async () => {
            const controller = new AbortController();
            const start = Date.now();
            const pending = sleep(5000, controller.signal);
            controller.abort();
            await pending;
            expect(Date.now() - start).toBeLessThan(1000);
        });

        it('should identify RateLimitError and OCRTransientError as retryable', () => {
            expect(isRetryableError(new RateLimitError('Rate limited'))).toBe(true);
            expect(isRetryableError(new OCRTransientError('Timed out'))).toBe(true);
        });

        it('should not retry OCRFatalError', () => {
            expect(isRetryableError(new OCRFatalError('Rejected'), RETRYABLE_ERROR_PATTERNS)).toBe(false);
        });

        it('should identify retryable errors with patterns', () => {
            const patterns = RETRYABLE_ERROR_PATTERNS;

            expect(isRetryableError(new Error('Error 429 Too Many Requests'), patterns)).toBe(true);
            expect(isRetryableError(new Error('Service Unavailable 503'), patterns)).toBe(true);
            expect(isRetryableError(new Error('TIMEOUT exceeded'), patterns)).toBe(true);
            expect(isRetryableError(new Error('ECONNRESET'), patterns)).toBe(true);
            expect(isRetryableError(new Error('ETIMEDOUT'), patterns)).toBe(true);
        });

        it('should identify non-retryable errors', () => {
            expect(isRetryableError(new Error('Invalid input'))).toBe(false);
            expect(isRetryableError(new Error('Not found'), RETRYABLE_ERROR_PATTERNS)).toBe(false);
        });

        it('should grow the backoff delay within the jitter band', () => {
            const first = calculateBackoffDelay(1, 1000, 2, 30000);
            const third = calculateBackoffDelay(3, 1000, 2, 30000);
            expect(first).toBeGreaterThanOrEqual(900);
            expect(first).toBeLessThanOrEqual(1100);
            expect(third).toBeGreaterThanOrEqual(3600);
            expect(third).toBeLessThanOrEqual(4400);
        });

        it('should cap the backoff delay', () => {
            expect(calculateBackoffDelay(10, 1000, 2, 5000)).toBe(5000);
        });

        it('should derive retry options from OCR config', () => {
            const options = getRetryOptions({ ...DEFAULT_OCR_CONFIG, retryLimit: 4, retryDelayMs: 250 });
            expect(options.maxRetries).toBe(4);
            expect(options.initialDelayMs).toBe(250);
            expect(options.retryableErrors).toEqual(RETRYABLE_ERROR_PATTERNS);
        });
    });

    describe('withRetry', () => {
        const fastRetry = { maxRetries: 2, initialDelayMs: 0, maxDelayMs: 0, backoffMultiplier: 1 };

        it('should retry transient failures until success', async () => {
            const fn = vi.fn<(attempt: number) => Promise<string>>()
                .mockRejectedValueOnce(new OCRTransientError('flaky'))
                .mockResolvedValueOnce('done');

            await expect(withRetry(fn, fastRetry)).resolves.toBe('done');
            expect(fn).toHaveBeenCalledTimes(2);
            expect(fn).toHaveBeenNthCalledWith(2, 2);
        });

        it('should rethrow the last error after maxRetries', async () => {
            const onRetry = vi.fn();
            const fn = vi.fn<(attempt: number) => Promise<string>>()
                .mockRejectedValue(new OCRTransientError('still down'));

            await expect(withRetry(fn, { ...fastRetry, onRetry })).rejects.toThrow('still down');
            expect(fn).toHaveBeenCalledTimes(3);
            expect(onRetry).toHaveBeenCalledTimes(2);
        });

        it('should not retry non-retryable errors', async () => {
            const fn = vi.fn<(attempt: number) => Promise<string>>()
                .mockRejectedValue(new Error('Invalid input'));

            await expect(withRetry(fn, fastRetry)).rejects.toThrow('Invalid input');
            expect(fn).toHaveBeenCalledTimes(1);
        });

        it('should stop retrying once the signal aborts', async () => {
            const controller = new AbortController();
            const fn = vi.fn<(attempt: number) => Promise<string>>(async () => {
                controller.abort();
                throw new OCRTransientError('flaky');
            });

            await expect(withRetry(fn, { ...fastRetry, signal: controller.signal })).rejects.toThrow('flaky');
            expect(fn).toHaveBeenCalledTimes(1);
        });
    });

    describe('withTimeout', () => {
        it('should resolve when the function finishes in time', async () => {
            const result = await withTimeout(async () => 'fast', 1000, {
                onTimeout: () => new Error('too slow'),
            });
            expect(result).toBe('fast');
        });

        it('should reject with the timeout error and abort the function signal', async () => {
            let seen: AbortSignal | undefined;
            const pending = withTimeout(
                signal => {
                    seen = signal;
                    return hangUntilAborted<string>(signal);
                },
                20,
                { onTimeout: () => new OCRTransientError('too slow', { code: 'OCR_TIMEOUT' }) }
            );

            await expect(pending).rejects.toMatchObject({ code: 'OCR_TIMEOUT' });
            expect(seen?.aborted).toBe(true);
        });

        it('should abort the function when the parent aborts', async () => {
            const parent = new AbortController();
            const pending = withTimeout(
                signal => hangUntilAborted<string>(signal),
                5000,
                { signal: parent.signal, onTimeout: () => new Error('too slow') }
            );
            parent.abort(new Error('cancelled'));

            await expect(pending).rejects.toThrow('cancelled');
        });
    });

    describe('Hash utilities', () => {
        it('should hash buffer consistently', () => {
            const buffer = Buffer.from('test content');
            expect(hashBuffer(buffer)).toBe(hashBuffer(buffer));
        });

        it('should produce the SHA-256 hex digest', () => {
            expect(hashBuffer(Buffer.from('abc'))).toBe(
                'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
            );
        });

        it('should create short hash', () => {
            const full = hashBuffer(Buffer.from('test'));
            const short = shortHash(full);
            expect(short.length).toBe(8);
            expect(full.startsWith(short)).toBe(true);
        });
    });

    describe('Logger', () => {
        it('should create logger with config', () => {
            const logger = createLogger({ level: 'info', structured: true });
            expect(logger.info).toBeDefined();
            expect(logger.debug).toBeDefined();
        });

        it('should route entries to a custom logger', () => {
            const customLogger = vi.fn();
            const logger = createLogger({ level: 'info', structured: true, customLogger });

            logger.warn('careful', { documentId: 'doc-1', correlationId: 'corr-1' });

            expect(customLogger).toHaveBeenCalledWith('warn', 'careful', { documentId: 'doc-1', correlationId: 'corr-1' });
        });

        it('should add the correlation id of the current run', () => {
            const customLogger = vi.fn();
            const logger = createLogger({ level: 'info', structured: true, customLogger });

            withCorrelationId('corr-7', () => logger.info('inside', { pageNumber: 3 }));

            expect(customLogger).toHaveBeenCalledWith('info', 'inside', { correlationId: 'corr-7', pageNumber: 3 });
        });

        it('should add a fresh correlation id outside a run', () => {
            const customLogger = vi.fn();
            const logger = createLogger({ level: 'info', structured: true, customLogger });

            logger.debug('outside');

            expect(customLogger).toHaveBeenCalledWith('debug', 'outside', {
                correlationId: expect.stringMatching(/^vdoc_\d+_[a-z0-9]+$/),
            });
        });

        it('should merge bound context into every entry', () => {
            const base = createMockLogger();
            const logger = withLogContext(base, { correlationId: 'corr-1', documentId: 'doc-1' });

            logger.info('hello', { pageNumber: 2 });

            expect(base.info).toHaveBeenCalledWith('hello', {
                correlationId: 'corr-1',
                documentId: 'doc-1',
                pageNumber: 2,
            });
        });
    });

    describe('Clock', () => {
        it('should round elapsed time to milliseconds', () => {
            expect(elapsedSeconds(1000, 2234.56)).toBe(1.235);
            expect(elapsedSeconds(0, 0)).toBe(0);
        });
    });

    describe('sanitizeFilename', () => {
        it('should strip directories and unsafe characters', () => {
            expect(sanitizeFilename('../../informe final.pdf')).toBe('informe_final.pdf');
            expect(sanitizeFilename('C:\\scans\\rx (1).pdf')).toBe('rx__1_.pdf');
        });

        it('should fall back to the default name', () => {
            expect(sanitizeFilename(undefined)).toBe('upload.pdf');
            expect(sanitizeFilename('')).toBe('upload.pdf');
            expect(sanitizeFilename('dir/')).toBe('upload.pdf');
        });

        it('should truncate long names', () => {
            expect(sanitizeFilename('a'.repeat(300))).toHaveLength(200);
        });
    });

    describe('EventEmitter', () => {
        it('should emit and receive events', () => {
            const emitter = createEventEmitter();
            const handler = vi.fn();

            emitter.on('pipeline:start', handler);
            emitter.emit('pipeline:start', { documentId: 'doc-1', filename: 'a.pdf', byteLength: 10 });

            expect(handler).toHaveBeenCalledWith({ documentId: 'doc-1', filename: 'a.pdf', byteLength: 10 });
        });

        it('should support once listener', () => {
            const emitter = createEventEmitter();
            const handler = vi.fn();

            emitter.once('pipeline:state', handler);
            emitter.emit('pipeline:state', { documentId: 'doc-1', from: null, to: 'VALIDATED' });
            emitter.emit('pipeline:state', { documentId: 'doc-1', from: 'VALIDATED', to: 'CHUNKED' });

            expect(handler).toHaveBeenCalledTimes(1);
        });

        it('should remove listeners with off', () => {
            const emitter = createEventEmitter();
            const handler = vi.fn();

            emitter.on('image:skipped', handler);
            emitter.off('image:skipped', handler);
            emitter.emit('image:skipped', { documentId: 'doc-1', pageNumber: 0, reason: 'decode', error: 'x' });

            expect(handler).not.toHaveBeenCalled();
        });
    });
});
