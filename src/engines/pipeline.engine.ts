import type { ResolvedConfig } from '../types/config.types.js';
import type { IPDFProcessor } from '../types/document.types.js';
import type { IOcrAdapter } from '../types/ocr.types.js';
import type { ExtractedImage, FilteredImage, IImageStore } from '../types/image.types.js';
import type { ProcessInput, ProcessingResult } from '../types/result.types.js';
import type { PipelineState } from '../types/enums.js';
import { PipelineStateEnum, StorageFailurePolicyEnum } from '../types/enums.js';
import {
    StorageWriteError,
    UnexpectedError,
    annotateOperation,
    generateCorrelationId,
    withCorrelationId,
    wrapError,
} from '../errors/index.js';
import { applyProcessingOptions } from '../config/resolve.js';
import type { VetDocEventEmitter } from '../utils/events.js';
import type { Logger } from '../utils/logger.js';
import { withLogContext } from '../utils/logger.js';
import type { Clock } from '../utils/clock.js';
import { elapsedSeconds, systemClock } from '../utils/clock.js';
import { sanitizeFilename } from '../utils/filename.js';
import { shortHash } from '../utils/hash.js';
import { planChunks } from './ocr/chunk.planner.js';
import { OcrRunner } from './ocr/ocr.runner.js';
import { reassemblePages } from './ocr/page.reassembler.js';
import { ImageExtractor } from './images/image.extractor.js';
import { filterImages } from './images/image.filter.js';
import { parseReportFields } from './report/field.parser.js';

export interface PipelineDependencies {
    pdfProcessor: IPDFProcessor;
    ocrAdapter: IOcrAdapter;
    imageStore: IImageStore;
    events: VetDocEventEmitter;
    logger: Logger;
    clock?: Clock;
}

/**
 * Runs one document through validation, chunked OCR, image extraction
 * and field parsing
 *
 * States advance VALIDATED → CHUNKED → OCRED → REASSEMBLED →
 * IMAGES_EXTRACTED → PARSED → COMPLETE. Any failure moves to FAILED,
 * cancels outstanding work and rejects; there is no partial result.
 */
export class PipelineEngine {
    private readonly pdfProcessor: IPDFProcessor;
    private readonly imageStore: IImageStore;
    private readonly events: VetDocEventEmitter;
    private readonly logger: Logger;
    private readonly clock: Clock;
    private readonly ocrRunner: OcrRunner;
    private readonly imageExtractor: ImageExtractor;

    constructor(
        private readonly config: ResolvedConfig,
        deps: PipelineDependencies
    ) {
        this.pdfProcessor = deps.pdfProcessor;
        this.imageStore = deps.imageStore;
        this.events = deps.events;
        this.logger = deps.logger;
        this.clock = deps.clock ?? systemClock;
        this.ocrRunner = new OcrRunner(deps.ocrAdapter, deps.pdfProcessor, deps.logger);
        this.imageExtractor = new ImageExtractor(deps.logger);
    }

    async run(input: ProcessInput): Promise<ProcessingResult> {
        const correlationId = generateCorrelationId();
        return withCorrelationId(correlationId, () => this.execute(input, correlationId));
    }

    private async execute(input: ProcessInput, correlationId: string): Promise<ProcessingResult> {
        const startedAt = this.clock.now();
        const { documentId } = input;
        const logger = withLogContext(this.logger, { correlationId, documentId });
        const controller = new AbortController();
        let state: PipelineState | null = null;

        const transition = (to: PipelineState): void => {
            this.events.emit('pipeline:state', { documentId, from: state, to });
            logger.debug('Pipeline state', { from: state, to });
            state = to;
        };

        this.events.emit('pipeline:start', {
            documentId,
            filename: input.filename,
            byteLength: input.documentBytes.length,
        });
        logger.info('Processing started', { byteLength: input.documentBytes.length });

        try {
            const config = applyProcessingOptions(this.config, input.options);
            const filename = sanitizeFilename(input.filename);

            const { document, pdf } = await this.pdfProcessor.load(input.documentBytes);
            transition(PipelineStateEnum.VALIDATED);

            const plan = planChunks(document.pageCount, config.ocrConfig.maxPagesPerCall);
            transition(PipelineStateEnum.CHUNKED);

            logger.info('Document planned', {
                pageCount: document.pageCount,
                chunkCount: plan.length,
                fileHash: shortHash(document.fileHash),
            });

            const [chunks, candidates] = await Promise.all([
                this.ocrRunner.runAll(pdf, plan, document.pageCount, {
                    ocrConfig: config.ocrConfig,
                    signal: controller.signal,
                    onProgress: progress => this.events.emit('ocr:chunk', progress),
                }),
                this.imageExtractor.extractAll(pdf, {
                    imageConfig: config.imageConfig,
                    signal: controller.signal,
                    onSkipped: error => this.events.emit('image:skipped', {
                        documentId,
                        pageNumber: error.pageNumber,
                        reason: 'decode',
                        error: error.message,
                    }),
                }),
            ]);
            transition(PipelineStateEnum.OCRED);

            const text = reassemblePages(chunks, document.pageCount);
            transition(PipelineStateEnum.REASSEMBLED);

            const { kept, dropped } = filterImages(candidates, document.pageCount, config.imageConfig);
            logger.debug('Images filtered', {
                candidates: candidates.length,
                kept: kept.length,
                dropped: dropped.map(d => `${d.pageNumber}:${d.indexOnPage}:${d.reason}`),
            });

            const images = await this.storeImages(kept, documentId, config, logger);
            transition(PipelineStateEnum.IMAGES_EXTRACTED);

            const reportInfo = Object.freeze(parseReportFields(text.fullText));
            transition(PipelineStateEnum.PARSED);

            const result: ProcessingResult = Object.freeze({
                documentId,
                filename,
                totalPages: document.pageCount,
                images: Object.freeze(images),
                reportInfo,
                processingTimeSeconds: elapsedSeconds(startedAt, this.clock.now()),
                fileHash: document.fileHash,
                pages: Object.freeze(text.pages),
                fullText: text.fullText,
            });
            transition(PipelineStateEnum.COMPLETE);

            this.events.emit('pipeline:complete', result);
            logger.info('Processing completed', {
                totalPages: result.totalPages,
                imageCount: images.length,
                processingTimeSeconds: result.processingTimeSeconds,
            });

            return result;
        } catch (error) {
            controller.abort(error);

            const failedIn: string = state ?? 'RECEIVED';
            const processingError = annotateOperation(wrapError(error, UnexpectedError), failedIn);
            transition(PipelineStateEnum.FAILED);

            logger.error('Processing failed', {
                state: failedIn,
                code: processingError.code,
                error: processingError.message,
            });
            this.events.emit('pipeline:error', { documentId, error: processingError });

            throw processingError;
        }
    }

    /**
     * Write surviving images one at a time, in result order
     */
    private async storeImages(
        kept: readonly FilteredImage[],
        documentId: string,
        config: ResolvedConfig,
        logger: Logger
    ): Promise<ExtractedImage[]> {
        const images: ExtractedImage[] = [];

        for (const image of kept) {
            let storageReference: string;
            try {
                storageReference = await this.imageStore.put(image.bytes, {
                    documentId,
                    pageNumber: image.pageNumber,
                    index: image.indexOnPage,
                    mimeType: image.mimeType,
                });
            } catch (error) {
                const cause = error instanceof Error ? error : new Error(String(error));

                if (config.storageConfig.failurePolicy === StorageFailurePolicyEnum.FAIL) {
                    throw new StorageWriteError(
                        `Image on page ${image.pageNumber} could not be stored: ${cause.message}`,
                        image.pageNumber,
                        image.indexOnPage,
                        cause
                    );
                }

                logger.warn('Image not stored, skipping', {
                    pageNumber: image.pageNumber,
                    index: image.indexOnPage,
                    error: cause.message,
                });
                this.events.emit('image:skipped', {
                    documentId,
                    pageNumber: image.pageNumber,
                    reason: 'storage',
                    error: cause.message,
                });
                continue;
            }

            images.push(Object.freeze({
                pageNumber: image.pageNumber,
                width: image.width,
                height: image.height,
                mimeType: image.mimeType,
                storageReference,
            }));
        }

        return images;
    }
}
