import { performance } from 'perf_hooks';

/**
 * Time source for processing time measurement (milliseconds)
 */
export interface Clock {
    now(): number;
}

/**
 * Monotonic clock backed by performance.now()
 */
export const systemClock: Clock = {
    now: () => performance.now(),
};

/**
 * Elapsed seconds between two readings, rounded to milliseconds
 */
export function elapsedSeconds(startMs: number, endMs: number): number {
    return Math.round(endMs - startMs) / 1000;
}
