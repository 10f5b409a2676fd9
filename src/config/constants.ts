/**
 * System constants for the document pipeline
 * Centralizes magic numbers for maintainability
 */

// ============================================
// Document Validation
// ============================================

export const DOCUMENT_LIMITS = {
    /**
     * Every accepted document starts with these bytes
     */
    PDF_MAGIC_BYTES: '%PDF-',

    /**
     * Characters kept in a sanitized filename
     */
    MAX_FILENAME_LENGTH: 200,

    /**
     * Name used when the upload has none left after sanitizing
     */
    DEFAULT_FILENAME: 'upload.pdf',
} as const;

// ============================================
// OCR Settings
// ============================================

export const OCR_DEFAULTS = {
    /**
     * Low temperature keeps transcription literal
     */
    temperature: 0,

    /**
     * Room for 15 dense pages of transcription
     */
    maxOutputTokens: 32768,

    model: 'gemini-2.0-flash',
} as const;

/**
 * Instruction sent with every chunk
 * Pages are numbered from 1 within the chunk
 */
export function buildOcrPrompt(pageCount: number): string {
    return `You are transcribing a scanned veterinary diagnostic report.
The attached PDF has ${pageCount} page(s).

Transcribe ALL visible text of every page exactly as written, keeping line breaks,
labels (e.g. "Paciente:", "Propietario:", "Diagnóstico:") and their values on the same line.
Do not translate, summarize or correct spelling. Leave image-only pages as an empty string.

Respond with JSON only:
{"pages": [{"page": 1, "text": "..."}, ...]}
with one entry per page, "page" counting from 1 within this PDF.`;
}

// ============================================
// Image Storage
// ============================================

export const STORAGE_DEFAULTS = {
    /**
     * Directory created under the store's base directory
     */
    IMAGE_DIR: 'extracted_images',
} as const;

export type DocumentLimits = typeof DOCUMENT_LIMITS;
export type OcrDefaults = typeof OCR_DEFAULTS;
