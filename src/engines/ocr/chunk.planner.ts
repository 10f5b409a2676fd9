import type { ChunkPlan, PageRange } from '../../types/document.types.js';
import { ConfigurationError, InvalidDocumentError } from '../../errors/index.js';

/**
 * Partition [0, pageCount) into contiguous ranges of at most `maxPagesPerCall` pages
 *
 * @example
 * planChunks(20, 15); // [{ index: 0, startPage: 0, endPage: 15 }, { index: 1, startPage: 15, endPage: 20 }]
 */
export function planChunks(pageCount: number, maxPagesPerCall: number): ChunkPlan {
    if (!Number.isInteger(maxPagesPerCall) || maxPagesPerCall < 1) {
        throw new ConfigurationError('maxPagesPerCall must be a positive integer', {
            maxPagesPerCall,
        });
    }

    if (!Number.isInteger(pageCount) || pageCount <= 0) {
        throw new InvalidDocumentError('Document has no pages', 'empty', { pageCount });
    }

    const ranges: PageRange[] = [];
    for (let start = 0; start < pageCount; start += maxPagesPerCall) {
        ranges.push(Object.freeze({
            index: ranges.length,
            startPage: start,
            endPage: Math.min(start + maxPagesPerCall, pageCount),
        }));
    }

    return Object.freeze(ranges);
}

/**
 * Human-readable range, 0-based inclusive
 */
export function describeRange(range: PageRange): string {
    const last = range.endPage - 1;
    return range.startPage === last ? `page ${last}` : `pages ${range.startPage}-${last}`;
}
