/**
 * OCR Output Schemas
 *
 * Zod schemas for the JSON the OCR model is asked to return.
 *
 * @module schemas/ocr-output
 */

import { z } from 'zod';

/**
 * Transcription of a single page, numbered from 1 within the chunk
 */
export const OcrPageSchema = z.object({
    page: z.number().int().min(1),
    text: z.string(),
});

export type OcrPage = z.infer<typeof OcrPageSchema>;

/**
 * Whole chunk transcription
 */
export const OcrPagesSchema = z.object({
    pages: z.array(OcrPageSchema),
});

export type OcrPages = z.infer<typeof OcrPagesSchema>;
