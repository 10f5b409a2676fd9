import type { ChunkStatus, PipelineState } from './enums.js';
import type { ExtractedImage } from './image.types.js';
import type { PageText } from './ocr.types.js';
import type { ReportInfo } from './report.types.js';

/**
 * Per-call overrides layered over the instance configuration
 */
export interface ProcessingOptions {
    /** Pages per OCR call */
    maxPagesPerCall?: number;
    /** Images below this pixel area are ignored */
    minImageAreaPx?: number;
    /** Share of pages an image may repeat on before it counts as letterhead */
    maxImageRepetitionFraction?: number;
    /** Retries of a transient OCR failure */
    ocrRetryLimit?: number;
    /** Timeout of one OCR call */
    ocrTimeoutSeconds?: number;
}

/**
 * Input of one pipeline run
 */
export interface ProcessInput {
    documentId: string;
    filename: string;
    documentBytes: Uint8Array;
    options?: ProcessingOptions;
}

/**
 * Output of one pipeline run
 */
export interface ProcessingResult {
    readonly documentId: string;
    /** Sanitized filename */
    readonly filename: string;
    readonly totalPages: number;
    /** Surviving images in (page, within-page) order */
    readonly images: readonly ExtractedImage[];
    readonly reportInfo: Readonly<ReportInfo>;
    /** Wall-clock seconds from start to completion, 3 decimals */
    readonly processingTimeSeconds: number;
    /** SHA-256 of the input bytes */
    readonly fileHash: string;
    /** Reassembled per-page text */
    readonly pages: readonly PageText[];
    /** Page texts joined in page order */
    readonly fullText: string;
}

/**
 * OCR progress of one chunk
 */
export interface ChunkProgress {
    /** Chunk index (0-based) */
    chunkIndex: number;
    totalChunks: number;
    status: ChunkStatus;
    pageRange: {
        start: number;
        end: number;
    };
    /** Attempt number when retrying */
    retryCount?: number;
    error?: string;
}

/**
 * State transition notification
 */
export interface StateTransition {
    documentId: string;
    from: PipelineState | null;
    to: PipelineState;
}
