/**
 * Schemas
 * Re-export all schemas for easy access
 */

export {
    OcrPageSchema,
    OcrPagesSchema,
    type OcrPage,
    type OcrPages,
} from './ocr-output.schemas.js';
