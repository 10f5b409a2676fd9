import type { RateLimitConfig } from '../types/config.types.js';
import { sleep } from './retry.js';

/**
 * Token bucket shared by every OCR call of a pipeline
 *
 * Holds at most `requestsPerMinute` tokens and refills continuously.
 * `drain` empties the bucket after the service answers 429, so chunks
 * running in parallel back off together instead of each hitting the limit.
 */
export class RateLimiter {
    private readonly capacity: number;
    private readonly refillIntervalMs = 60000;
    private tokens: number;
    private refilledAt: number;

    constructor(config: RateLimitConfig) {
        this.capacity = config.requestsPerMinute;
        this.tokens = config.requestsPerMinute;
        this.refilledAt = Date.now();
    }

    /**
     * Wait for a token and take it
     * Returns without a token once the signal aborts
     */
    async acquire(signal?: AbortSignal): Promise<void> {
        this.refill();

        while (this.tokens < 1) {
            if (signal?.aborted) return;
            await sleep(this.msUntilNextToken(), signal);
            this.refill();
        }

        this.tokens -= 1;
    }

    /**
     * Drop every available token
     */
    drain(): void {
        this.refill();
        this.tokens = Math.min(this.tokens, 0);
    }

    getStatus(): { requestsPerMinute: number; availableTokens: number } {
        this.refill();
        return {
            requestsPerMinute: this.capacity,
            availableTokens: Math.floor(this.tokens),
        };
    }

    private refill(): void {
        const now = Date.now();
        const earned = ((now - this.refilledAt) / this.refillIntervalMs) * this.capacity;

        this.tokens = Math.min(this.tokens + earned, this.capacity);
        this.refilledAt = now;
    }

    private msUntilNextToken(): number {
        return Math.ceil(((1 - this.tokens) / this.capacity) * this.refillIntervalMs);
    }
}
