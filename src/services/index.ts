export { PDFProcessor, hasPdfSignature } from './pdf.processor.js';
export { GeminiOcrAdapter } from './ocr/gemini-ocr.adapter.js';
export type { OcrModel, GeminiOcrOptions } from './ocr/gemini-ocr.adapter.js';
export { LocalImageStore } from './storage/local-image.store.js';
export { MemoryImageStore } from './storage/memory-image.store.js';
export { extensionFor, imageFileName } from './storage/image-key.js';
