import type { PageNumbering } from './enums.js';
import type { PageRange } from './document.types.js';

/**
 * Recognized text of one page
 */
export interface PageText {
    /** Page number, global unless stated otherwise by the adapter */
    pageNumber: number;
    text: string;
}

/**
 * One OCR call: the chunk's own PDF bytes plus where it sits in the document
 */
export interface OcrChunkRequest {
    /** Standalone PDF holding only the chunk's pages */
    documentBytes: Uint8Array;
    /** Position of the chunk in the source document */
    range: PageRange;
    /** Page count of the source document */
    totalPages: number;
}

/**
 * What an adapter returns for one chunk
 */
export interface OcrChunkResult {
    /** How `pages[].pageNumber` must be read */
    numbering: PageNumbering;
    pages: PageText[];
}

/**
 * Chunk result after the offset transform: every page number is absolute
 */
export interface AbsoluteChunkPages {
    range: PageRange;
    pages: PageText[];
}

/**
 * OCR Adapter Interface
 *
 * External text recognition capability. Implementations throw
 * OCRTransientError for failures worth retrying and OCRFatalError otherwise.
 *
 * @example
 * ```typescript
 * const adapter: IOcrAdapter = {
 *     async extractText(request) {
 *         const pages = await myService.recognize(request.documentBytes);
 *         return { numbering: 'chunk-local', pages };
 *     },
 * };
 * ```
 */
export interface IOcrAdapter {
    extractText(request: OcrChunkRequest, signal: AbortSignal): Promise<OcrChunkResult>;
}

/**
 * Reassembled, page-ordered text of the whole document
 */
export interface ReassembledText {
    /** Pages 0..pageCount-1, in order */
    pages: PageText[];
    /** Page texts joined in page order */
    fullText: string;
}
