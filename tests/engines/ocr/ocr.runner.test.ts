/**
 * OCR Runner Tests
 *
 * Timeouts, retries and fail-fast behaviour against scripted adapters.
 */

import { describe, it, expect, vi, beforeAll } from 'vitest';
import { PDFDocument } from 'pdf-lib';
import { OcrRunner, type OcrRunContext } from '../../../src/engines/ocr/ocr.runner.js';
import { planChunks } from '../../../src/engines/ocr/chunk.planner.js';
import { OCRFatalError, OCRTransientError } from '../../../src/errors/index.js';
import { DEFAULT_OCR_CONFIG } from '../../../src/types/config.types.js';
import type { IPDFProcessor } from '../../../src/types/document.types.js';
import type { ChunkProgress } from '../../../src/types/result.types.js';
import type { OcrChunkRequest, OcrChunkResult } from '../../../src/types/ocr.types.js';
import { hangUntilAborted } from '../../setup.js';
import {
    chunkLocalResult,
    createDelayedOcrAdapter,
    createMockLogger,
    createMockOcrAdapter,
    loggedMessages,
} from '../../mocks/index.js';

const fastOcrConfig = {
    ...DEFAULT_OCR_CONFIG,
    timeoutSeconds: 0.02,
    retryDelayMs: 0,
    backoffMultiplier: 1,
};

function createStubPdfProcessor(): IPDFProcessor {
    return {
        load: vi.fn<IPDFProcessor['load']>(async () => {
            throw new Error('not used');
        }),
        extractChunk: vi.fn<IPDFProcessor['extractChunk']>(async (_pdf, range) => new Uint8Array([range.index])),
    };
}

function createContext(overrides: Partial<OcrRunContext> = {}): OcrRunContext {
    return {
        ocrConfig: fastOcrConfig,
        signal: new AbortController().signal,
        ...overrides,
    };
}

const request: OcrChunkRequest = {
    documentBytes: new Uint8Array([1, 2, 3]),
    range: { index: 0, startPage: 0, endPage: 2 },
    totalPages: 2,
};

describe('OcrRunner', () => {
    let pdf: PDFDocument;

    beforeAll(async () => {
        pdf = await PDFDocument.create();
    });

    describe('runChunk', () => {
        it('should return absolute pages for a successful call', async () => {
            const adapter = createMockOcrAdapter();
            const runner = new OcrRunner(adapter, createStubPdfProcessor(), createMockLogger());

            const result = await runner.runChunk(
                { ...request, range: { index: 1, startPage: 15, endPage: 17 } },
                2,
                createContext()
            );

            expect(result.pages).toEqual([
                { pageNumber: 15, text: 'Texto de la página 15' },
                { pageNumber: 16, text: 'Texto de la página 16' },
            ]);
        });

        it('should succeed after two timeouts with a retry limit of 2', async () => {
            const adapter = createMockOcrAdapter();
            adapter.extractText
                .mockImplementationOnce((_request, signal) => hangUntilAborted<OcrChunkResult>(signal))
                .mockImplementationOnce((_request, signal) => hangUntilAborted<OcrChunkResult>(signal));
            const logger = createMockLogger();
            const progress: ChunkProgress[] = [];
            const runner = new OcrRunner(adapter, createStubPdfProcessor(), logger);

            const result = await runner.runChunk(request, 1, createContext({
                onProgress: update => progress.push(update),
            }));

            expect(result.pages.map(page => page.pageNumber)).toEqual([0, 1]);
            expect(adapter.extractText).toHaveBeenCalledTimes(3);
            expect(progress.map(update => update.status)).toEqual([
                'PROCESSING',
                'RETRYING',
                'RETRYING',
                'COMPLETED',
            ]);
            expect(progress[1]).toMatchObject({
                retryCount: 1,
                error: 'OCR call timed out after 0.02s',
            });
            expect(loggedMessages(logger, 'warn')).toEqual(['OCR chunk retry', 'OCR chunk retry']);
        });

        it('should escalate a third timeout to a fatal error', async () => {
            const adapter = createMockOcrAdapter();
            adapter.extractText.mockImplementation((_request, signal) => hangUntilAborted<OcrChunkResult>(signal));
            const runner = new OcrRunner(adapter, createStubPdfProcessor(), createMockLogger());

            const error = await runner.runChunk(request, 1, createContext()).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(OCRFatalError);
            expect(error).toMatchObject({
                message: 'OCR failed for chunk 0 after 3 attempt(s): OCR call timed out after 0.02s',
                attempts: 3,
                chunkIndex: 0,
                details: { lastErrorCode: 'OCR_TIMEOUT' },
            });
            expect(adapter.extractText).toHaveBeenCalledTimes(3);
        });

        it('should honour a retry limit of zero', async () => {
            const adapter = createMockOcrAdapter();
            adapter.extractText.mockRejectedValue(new OCRTransientError('Service unavailable'));
            const runner = new OcrRunner(adapter, createStubPdfProcessor(), createMockLogger());

            await expect(
                runner.runChunk(request, 1, createContext({ ocrConfig: { ...fastOcrConfig, retryLimit: 0 } }))
            ).rejects.toMatchObject({ attempts: 1 });
            expect(adapter.extractText).toHaveBeenCalledTimes(1);
        });

        it('should treat non-transient errors as fatal at once', async () => {
            const adapter = createMockOcrAdapter();
            adapter.extractText.mockRejectedValue(new Error('Invalid input'));
            const runner = new OcrRunner(adapter, createStubPdfProcessor(), createMockLogger());

            await expect(runner.runChunk(request, 1, createContext())).rejects.toMatchObject({
                name: 'OCRFatalError',
                message: 'OCR failed for chunk 0 after 1 attempt(s): Invalid input',
                attempts: 1,
            });
            expect(adapter.extractText).toHaveBeenCalledTimes(1);
        });

        it('should pass an adapter OCRFatalError through unchanged', async () => {
            const rejected = new OCRFatalError('API key rejected');
            const adapter = createMockOcrAdapter();
            adapter.extractText.mockRejectedValue(rejected);
            const runner = new OcrRunner(adapter, createStubPdfProcessor(), createMockLogger());

            await expect(runner.runChunk(request, 1, createContext())).rejects.toBe(rejected);
        });

        it('should retry errors whose message looks transient', async () => {
            const adapter = createMockOcrAdapter();
            adapter.extractText
                .mockRejectedValueOnce(new Error('Service Unavailable 503'))
                .mockImplementationOnce(async (req) => chunkLocalResult(req));
            const runner = new OcrRunner(adapter, createStubPdfProcessor(), createMockLogger());

            const result = await runner.runChunk(request, 1, createContext());

            expect(result.pages).toHaveLength(2);
            expect(adapter.extractText).toHaveBeenCalledTimes(2);
        });

        it('should reject pages outside the chunk range', async () => {
            const adapter = createMockOcrAdapter();
            adapter.extractText.mockResolvedValue({
                numbering: 'chunk-local',
                pages: [{ pageNumber: 7, text: 'stray' }],
            });
            const runner = new OcrRunner(adapter, createStubPdfProcessor(), createMockLogger());

            await expect(runner.runChunk(request, 1, createContext())).rejects.toMatchObject({
                name: 'ReassemblyError',
            });
        });

        it('should not call the adapter once cancelled', async () => {
            const controller = new AbortController();
            controller.abort();
            const adapter = createMockOcrAdapter();
            const runner = new OcrRunner(adapter, createStubPdfProcessor(), createMockLogger());

            await expect(
                runner.runChunk(request, 1, createContext({ signal: controller.signal }))
            ).rejects.toMatchObject({
                message: 'OCR cancelled for chunk 0',
                attempts: 0,
                details: { cancelled: true },
            });
            expect(adapter.extractText).not.toHaveBeenCalled();
        });
    });

    describe('runAll', () => {
        it('should return chunk results in plan order whatever the completion order', async () => {
            const adapter = createDelayedOcrAdapter([40, 20, 0]);
            const runner = new OcrRunner(adapter, createStubPdfProcessor(), createMockLogger());

            const results = await runner.runAll(pdf, planChunks(5, 2), 5, createContext({
                ocrConfig: { ...fastOcrConfig, timeoutSeconds: 1 },
            }));

            expect(results.map(chunk => chunk.range.index)).toEqual([0, 1, 2]);
            expect(results.flatMap(chunk => chunk.pages.map(page => page.pageNumber))).toEqual([0, 1, 2, 3, 4]);
        });

        it('should send each chunk its own bytes and range', async () => {
            const adapter = createMockOcrAdapter();
            const runner = new OcrRunner(adapter, createStubPdfProcessor(), createMockLogger());

            await runner.runAll(pdf, planChunks(20, 15), 20, createContext());

            const requests = adapter.extractText.mock.calls.map(([req]) => req);
            expect(requests.map(req => [req.range.startPage, req.range.endPage])).toEqual([
                [0, 15],
                [15, 20],
            ]);
            expect(requests.map(req => Array.from(req.documentBytes))).toEqual([[0], [1]]);
            expect(requests.every(req => req.totalPages === 20)).toBe(true);
        });

        it('should keep at most maxConcurrency calls in flight', async () => {
            let active = 0;
            let peak = 0;
            const adapter = createMockOcrAdapter();
            adapter.extractText.mockImplementation(async (req) => {
                active++;
                peak = Math.max(peak, active);
                await new Promise(resolve => setTimeout(resolve, 10));
                active--;
                return chunkLocalResult(req);
            });
            const runner = new OcrRunner(adapter, createStubPdfProcessor(), createMockLogger());

            await runner.runAll(pdf, planChunks(10, 1), 10, createContext({
                ocrConfig: { ...fastOcrConfig, maxConcurrency: 3, timeoutSeconds: 1 },
            }));

            expect(peak).toBe(3);
            expect(adapter.extractText).toHaveBeenCalledTimes(10);
        });

        it('should stop dispatching chunks after a fatal failure', async () => {
            const adapter = createMockOcrAdapter();
            adapter.extractText.mockRejectedValue(new Error('Invalid input'));
            const runner = new OcrRunner(adapter, createStubPdfProcessor(), createMockLogger());

            await expect(
                runner.runAll(pdf, planChunks(3, 1), 3, createContext({
                    ocrConfig: { ...fastOcrConfig, maxConcurrency: 1 },
                }))
            ).rejects.toMatchObject({
                message: 'OCR failed for chunk 0 after 1 attempt(s): Invalid input',
            });
            expect(adapter.extractText).toHaveBeenCalledTimes(1);
        });

        it('should not start any chunk when the caller has already aborted', async () => {
            const controller = new AbortController();
            controller.abort();
            const adapter = createMockOcrAdapter();
            const runner = new OcrRunner(adapter, createStubPdfProcessor(), createMockLogger());

            await expect(
                runner.runAll(pdf, planChunks(2, 1), 2, createContext({ signal: controller.signal }))
            ).rejects.toBeInstanceOf(OCRFatalError);
            expect(adapter.extractText).not.toHaveBeenCalled();
        });
    });
});
