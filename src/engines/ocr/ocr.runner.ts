import pLimit from 'p-limit';
import type { PDFDocument } from 'pdf-lib';
import type { OcrConfig } from '../../types/config.types.js';
import type { ChunkPlan, IPDFProcessor, PageRange } from '../../types/document.types.js';
import type { AbsoluteChunkPages, IOcrAdapter, OcrChunkRequest, OcrChunkResult } from '../../types/ocr.types.js';
import type { ChunkProgress } from '../../types/result.types.js';
import { ChunkStatusEnum } from '../../types/enums.js';
import type { ChunkStatus } from '../../types/enums.js';
import { OCRFatalError, OCRTransientError } from '../../errors/index.js';
import { getRetryOptions, withRetry, withTimeout } from '../../utils/retry.js';
import type { Logger } from '../../utils/logger.js';
import { toAbsolutePages } from './page.reassembler.js';

export interface OcrRunContext {
    ocrConfig: OcrConfig;
    /** Aborted when the document fails */
    signal: AbortSignal;
    onProgress?: (progress: ChunkProgress) => void;
}

/**
 * Drives the OCR adapter: one task per chunk, bounded concurrency,
 * per-attempt timeout, retry of transient failures
 */
export class OcrRunner {
    constructor(
        private readonly adapter: IOcrAdapter,
        private readonly pdfProcessor: IPDFProcessor,
        private readonly logger: Logger
    ) { }

    /**
     * OCR every chunk of the plan
     * Results come back in plan order; the first fatal failure rejects
     */
    async runAll(pdf: PDFDocument, plan: ChunkPlan, totalPages: number, context: OcrRunContext): Promise<AbsoluteChunkPages[]> {
        const limit = pLimit(context.ocrConfig.maxConcurrency);

        // aborted by the first failing chunk or by the caller
        const controller = new AbortController();
        const abortFromParent = (): void => controller.abort(context.signal.reason);
        if (context.signal.aborted) {
            controller.abort(context.signal.reason);
        } else {
            context.signal.addEventListener('abort', abortFromParent, { once: true });
        }
        const runContext: OcrRunContext = { ...context, signal: controller.signal };

        const tasks = plan.map(range => limit(async () => {
            if (controller.signal.aborted) {
                throw this.cancelled(range, 0);
            }

            try {
                const documentBytes = await this.pdfProcessor.extractChunk(pdf, range);
                return await this.runChunk({ documentBytes, range, totalPages }, plan.length, runContext);
            } catch (error) {
                controller.abort(error);
                throw error;
            }
        }));

        try {
            return await Promise.all(tasks);
        } catch (error) {
            limit.clearQueue();
            throw error;
        } finally {
            context.signal.removeEventListener('abort', abortFromParent);
        }
    }

    /**
     * OCR one chunk
     *
     * Each attempt gets `timeoutSeconds`; a timeout is an OCRTransientError
     * (OCR_TIMEOUT). Transient failures are retried `retryLimit` times, then
     * escalated to OCRFatalError. Anything else is fatal at once.
     */
    async runChunk(request: OcrChunkRequest, totalChunks: number, context: OcrRunContext): Promise<AbsoluteChunkPages> {
        const { range } = request;
        const { ocrConfig, signal } = context;
        const timeoutMs = ocrConfig.timeoutSeconds * 1000;
        let attempts = 0;

        this.report(context, range, totalChunks, ChunkStatusEnum.PROCESSING);

        let result: OcrChunkResult;
        try {
            result = await withRetry(
                async (attempt) => {
                    attempts = attempt;
                    if (signal.aborted) {
                        throw this.cancelled(range, attempt - 1);
                    }

                    return withTimeout(
                        attemptSignal => this.adapter.extractText(request, attemptSignal),
                        timeoutMs,
                        {
                            signal,
                            onTimeout: () => new OCRTransientError(
                                `OCR call timed out after ${ocrConfig.timeoutSeconds}s`,
                                { code: 'OCR_TIMEOUT', chunkIndex: range.index }
                            ),
                        }
                    );
                },
                {
                    ...getRetryOptions(ocrConfig),
                    signal,
                    onRetry: (attempt, error, delayMs) => {
                        this.logger.warn('OCR chunk retry', {
                            chunkIndex: range.index,
                            attempt,
                            delayMs: Math.round(delayMs),
                            error: error.message,
                        });
                        this.report(context, range, totalChunks, ChunkStatusEnum.RETRYING, {
                            retryCount: attempt,
                            error: error.message,
                        });
                    },
                }
            );
        } catch (error) {
            const fatal = this.toFatal(error, range, attempts);
            this.logger.error('OCR chunk failed', {
                chunkIndex: range.index,
                attempts: fatal.attempts,
                error: fatal.message,
            });
            this.report(context, range, totalChunks, ChunkStatusEnum.FAILED, { error: fatal.message });
            throw fatal;
        }

        const pages = toAbsolutePages(result, range);

        this.logger.debug('OCR chunk completed', {
            chunkIndex: range.index,
            attempts,
            pageCount: pages.pages.length,
        });
        this.report(context, range, totalChunks, ChunkStatusEnum.COMPLETED);

        return pages;
    }

    private toFatal(error: unknown, range: PageRange, attempts: number): OCRFatalError {
        if (error instanceof OCRFatalError) {
            return error;
        }

        const cause = error instanceof Error ? error : new Error(String(error));
        return new OCRFatalError(
            `OCR failed for chunk ${range.index} after ${attempts} attempt(s): ${cause.message}`,
            {
                chunkIndex: range.index,
                attempts,
                cause,
                details: {
                    startPage: range.startPage,
                    endPage: range.endPage,
                    lastErrorCode: cause instanceof OCRTransientError ? cause.code : undefined,
                },
            }
        );
    }

    private cancelled(range: PageRange, attempts: number): OCRFatalError {
        return new OCRFatalError(`OCR cancelled for chunk ${range.index}`, {
            chunkIndex: range.index,
            attempts,
            details: { cancelled: true },
        });
    }

    private report(
        context: OcrRunContext,
        range: PageRange,
        totalChunks: number,
        status: ChunkStatus,
        extra: { retryCount?: number; error?: string } = {}
    ): void {
        context.onProgress?.({
            chunkIndex: range.index,
            totalChunks,
            status,
            pageRange: { start: range.startPage, end: range.endPage },
            ...extra,
        });
    }
}
