import { GoogleGenerativeAI, type GenerateContentRequest, type SingleRequestOptions } from '@google/generative-ai';
import type { IOcrAdapter, OcrChunkRequest, OcrChunkResult, PageText } from '../../types/ocr.types.js';
import { PageNumberingEnum } from '../../types/enums.js';
import { OcrPagesSchema } from '../../schemas/index.js';
import { buildOcrPrompt, OCR_DEFAULTS } from '../../config/constants.js';
import { OCRFatalError, OCRTransientError, RateLimitError } from '../../errors/index.js';
import type { RateLimiter } from '../../utils/rate-limiter.js';
import type { Logger } from '../../utils/logger.js';

/**
 * The slice of a Gemini model the adapter calls
 * GenerativeModel satisfies it; tests pass a stub
 */
export interface OcrModel {
    generateContent(
        request: GenerateContentRequest,
        requestOptions?: SingleRequestOptions
    ): Promise<{ response: { text(): string } }>;
}

export interface GeminiOcrOptions {
    apiKey: string;
    model?: string;
}

/**
 * Strip a markdown code fence around a JSON answer
 */
function stripCodeFence(text: string): string {
    const trimmed = text.trim();
    const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(trimmed);
    return fenced?.[1] ?? trimmed;
}

/**
 * OCR adapter backed by Gemini vision
 *
 * Sends the chunk PDF inline and asks for `{ pages: [{ page, text }] }`,
 * pages numbered from 1 within the chunk.
 */
export class GeminiOcrAdapter implements IOcrAdapter {
    constructor(
        private readonly model: OcrModel,
        private readonly rateLimiter: RateLimiter,
        private readonly logger: Logger
    ) { }

    static create(options: GeminiOcrOptions, rateLimiter: RateLimiter, logger: Logger): GeminiOcrAdapter {
        const genAI = new GoogleGenerativeAI(options.apiKey);
        const model = genAI.getGenerativeModel({ model: options.model ?? OCR_DEFAULTS.model });
        return new GeminiOcrAdapter(model, rateLimiter, logger);
    }

    async extractText(request: OcrChunkRequest, signal: AbortSignal): Promise<OcrChunkResult> {
        const chunkIndex = request.range.index;
        const pageCount = request.range.endPage - request.range.startPage;

        await this.rateLimiter.acquire(signal);
        if (signal.aborted) {
            throw new OCRFatalError('OCR call cancelled', { chunkIndex });
        }

        let text: string;
        try {
            const result = await this.model.generateContent(
                {
                    contents: [{
                        role: 'user',
                        parts: [
                            {
                                inlineData: {
                                    mimeType: 'application/pdf',
                                    data: Buffer.from(request.documentBytes).toString('base64'),
                                },
                            },
                            { text: buildOcrPrompt(pageCount) },
                        ],
                    }],
                    generationConfig: {
                        temperature: OCR_DEFAULTS.temperature,
                        maxOutputTokens: OCR_DEFAULTS.maxOutputTokens,
                        responseMimeType: 'application/json',
                    },
                },
                { signal }
            );
            text = result.response.text();
        } catch (error) {
            throw this.mapError(error, chunkIndex);
        }

        const pages = this.parsePages(text, chunkIndex);

        this.logger.debug('OCR chunk transcribed', {
            chunkIndex,
            pageCount: pages.length,
        });

        return { numbering: PageNumberingEnum.CHUNK_LOCAL, pages };
    }

    /**
     * Validate the model's JSON and convert to 0-based chunk-local pages
     */
    private parsePages(text: string, chunkIndex: number): PageText[] {
        let json: unknown;
        try {
            json = JSON.parse(stripCodeFence(text));
        } catch {
            throw new OCRTransientError('OCR response is not valid JSON', {
                code: 'OCR_MALFORMED_OUTPUT',
                chunkIndex,
                details: { preview: text.substring(0, 200) },
            });
        }

        const parsed = OcrPagesSchema.safeParse(json);
        if (!parsed.success) {
            throw new OCRTransientError('OCR response does not match the expected shape', {
                code: 'OCR_MALFORMED_OUTPUT',
                chunkIndex,
                details: { issues: parsed.error.issues },
            });
        }

        return parsed.data.pages.map(page => ({
            pageNumber: page.page - 1,
            text: page.text,
        }));
    }

    /**
     * Classify Gemini API failures
     * Errors that match no rule are returned as-is for pattern classification
     */
    private mapError(error: unknown, chunkIndex: number): Error {
        const cause = error instanceof Error ? error : new Error(String(error));
        const message = cause.message.toLowerCase();

        if (message.includes('429') || message.includes('rate limit') || message.includes('resource_exhausted')) {
            this.rateLimiter.drain();
            return new RateLimitError('Gemini API rate limit exceeded');
        }

        if (message.includes('quota') || message.includes('api key') || message.includes('permission')
            || message.includes('400') || message.includes('401') || message.includes('403')) {
            return new OCRFatalError('Gemini API rejected the request', {
                chunkIndex,
                cause,
                details: { originalError: cause.message },
            });
        }

        if (message.includes('safety') || message.includes('blocked')) {
            return new OCRFatalError('Content blocked by safety filters', {
                chunkIndex,
                cause,
                details: { originalError: cause.message },
            });
        }

        if (message.includes('500') || message.includes('503') || message.includes('network')
            || message.includes('fetch failed')) {
            return new OCRTransientError('Gemini API unavailable', {
                chunkIndex,
                cause,
            });
        }

        this.logger.error('Gemini API error', {
            chunkIndex,
            error: cause.message,
        });
        return cause;
    }
}
