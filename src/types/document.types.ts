import type { PDFDocument } from 'pdf-lib';

/**
 * Validated input document
 * Immutable for the whole pipeline run
 */
export interface SourceDocument {
    /** Raw PDF bytes, starting with the PDF signature */
    readonly bytes: Uint8Array;
    /** Size in bytes */
    readonly byteLength: number;
    /** Total number of pages (always > 0) */
    readonly pageCount: number;
    /** SHA-256 hash of the bytes */
    readonly fileHash: string;
}

/**
 * Result of loading a PDF document
 */
export interface PDFLoadResult {
    document: SourceDocument;
    /** Parsed document, shared read-only by the page tasks */
    pdf: PDFDocument;
}

/**
 * Half-open page range [startPage, endPage) of one OCR call
 */
export interface PageRange {
    /** Zero-based chunk index */
    readonly index: number;
    /** First page (0-based, inclusive) */
    readonly startPage: number;
    /** Past-the-end page (0-based, exclusive) */
    readonly endPage: number;
}

/**
 * Ordered chunk ranges covering [0, pageCount) exactly once
 */
export type ChunkPlan = readonly PageRange[];

/**
 * PDF Processor Interface
 *
 * Abstraction over the PDF library so the orchestrator can be tested
 * without real documents.
 */
export interface IPDFProcessor {
    /**
     * Validate and parse raw bytes
     * @throws InvalidDocumentError
     */
    load(bytes: Uint8Array): Promise<PDFLoadResult>;

    /**
     * Build a standalone PDF holding only the pages of `range`
     */
    extractChunk(pdf: PDFDocument, range: PageRange): Promise<Uint8Array>;
}
