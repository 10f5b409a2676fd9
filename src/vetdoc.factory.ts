import { VetDocPipeline } from './vetdoc.js';
import type { RateLimitConfig, VetDocConfig } from './types/config.types.js';
import { DEFAULT_RATE_LIMIT_CONFIG } from './types/config.types.js';
import type { IImageStore } from './types/image.types.js';
import { resolveConfig } from './config/resolve.js';
import { ConfigurationError } from './errors/index.js';
import { createLogger } from './utils/logger.js';
import { RateLimiter } from './utils/rate-limiter.js';
import { GeminiOcrAdapter } from './services/ocr/gemini-ocr.adapter.js';
import { LocalImageStore } from './services/storage/local-image.store.js';
import { MemoryImageStore } from './services/storage/memory-image.store.js';

export interface VetDocFactoryOptions extends VetDocConfig {
    /** Gemini API key for OCR */
    geminiApiKey: string;
    /** Gemini model name */
    model?: string;
    rateLimitConfig?: Partial<RateLimitConfig>;
    /** Write images under `<outputDir>/extracted_images/`; in memory when omitted */
    outputDir?: string;
    /** Overrides `outputDir` */
    imageStore?: IImageStore;
}

/**
 * Create a pipeline wired to Gemini OCR and local image storage
 *
 * @example
 * ```typescript
 * const pipeline = createVetDocPipeline({
 *     geminiApiKey: process.env.GEMINI_API_KEY ?? '',
 *     outputDir: './data',
 * });
 * ```
 */
export function createVetDocPipeline(options: VetDocFactoryOptions): VetDocPipeline {
    if (!options.geminiApiKey) {
        throw new ConfigurationError('geminiApiKey is required');
    }

    const { geminiApiKey, model, rateLimitConfig, outputDir, imageStore, ...userConfig } = options;

    const config = resolveConfig(userConfig);
    const logger = createLogger(config.logging);
    const rateLimiter = new RateLimiter({ ...DEFAULT_RATE_LIMIT_CONFIG, ...rateLimitConfig });

    const ocrAdapter = GeminiOcrAdapter.create({ apiKey: geminiApiKey, model }, rateLimiter, logger);
    const store = imageStore
        ?? (outputDir !== undefined ? new LocalImageStore(outputDir, logger) : new MemoryImageStore({ retainBytes: false }));

    return new VetDocPipeline(userConfig, {
        ocrAdapter,
        imageStore: store,
        logger,
    });
}
