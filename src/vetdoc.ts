import type { ResolvedConfig, VetDocConfig } from './types/config.types.js';
import type { IPDFProcessor } from './types/document.types.js';
import type { IOcrAdapter } from './types/ocr.types.js';
import type { IImageStore } from './types/image.types.js';
import type { ProcessInput, ProcessingResult } from './types/result.types.js';
import { resolveConfig } from './config/resolve.js';
import { createLogger } from './utils/logger.js';
import type { Logger } from './utils/logger.js';
import { createEventEmitter } from './utils/events.js';
import type { VetDocEventEmitter } from './utils/events.js';
import type { Clock } from './utils/clock.js';
import { PDFProcessor } from './services/pdf.processor.js';
import { MemoryImageStore } from './services/storage/memory-image.store.js';
import { PipelineEngine } from './engines/pipeline.engine.js';

/**
 * Collaborators of the pipeline; only the OCR adapter is required
 */
export interface VetDocDependencies {
    ocrAdapter: IOcrAdapter;
    /** Defaults to a memory store that keeps references only */
    imageStore?: IImageStore;
    pdfProcessor?: IPDFProcessor;
    logger?: Logger;
    clock?: Clock;
}

/**
 * Veterinary report processing pipeline
 *
 * @example
 * ```typescript
 * import { VetDocPipeline, GeminiOcrAdapter, RateLimiter, createLogger } from 'vetdoc-pipeline';
 *
 * const logger = createLogger({ level: 'info', structured: true });
 * const ocrAdapter = GeminiOcrAdapter.create(
 *     { apiKey: process.env.GEMINI_API_KEY ?? '' },
 *     new RateLimiter({ requestsPerMinute: 60 }),
 *     logger
 * );
 * const pipeline = new VetDocPipeline({ ocrConfig: { maxPagesPerCall: 15 } }, { ocrAdapter, logger });
 *
 * const result = await pipeline.process({
 *     documentId: 'a1b2c3d4e5f6',
 *     filename: 'informe.pdf',
 *     documentBytes: pdfBytes,
 * });
 * console.log(result.reportInfo.diagnosis);
 * ```
 */
export class VetDocPipeline {
    /** Progress and lifecycle events */
    readonly events: VetDocEventEmitter;

    private readonly config: ResolvedConfig;
    private readonly logger: Logger;
    private readonly engine: PipelineEngine;

    constructor(userConfig: VetDocConfig, deps: VetDocDependencies) {
        this.config = resolveConfig(userConfig);
        this.logger = deps.logger ?? createLogger(this.config.logging);
        this.events = createEventEmitter();

        this.engine = new PipelineEngine(this.config, {
            pdfProcessor: deps.pdfProcessor ?? new PDFProcessor(this.config.documentConfig, this.logger),
            ocrAdapter: deps.ocrAdapter,
            imageStore: deps.imageStore ?? new MemoryImageStore({ retainBytes: false }),
            events: this.events,
            logger: this.logger,
            clock: deps.clock,
        });

        this.logger.debug('Pipeline initialized', {
            ocrConfig: this.config.ocrConfig,
            imageConfig: this.config.imageConfig,
        });
    }

    /**
     * Process one PDF document
     * @throws ProcessingError subclass; never returns a partial result
     */
    async process(input: ProcessInput): Promise<ProcessingResult> {
        return this.engine.run(input);
    }

    /**
     * Get the resolved configuration
     */
    getConfig(): ResolvedConfig {
        return this.config;
    }
}
