import { z } from 'zod';
import type { StorageFailurePolicy } from './enums.js';

/**
 * OCR call configuration
 */
export interface OcrConfig {
    /** Maximum pages per OCR call (default: 15) */
    maxPagesPerCall: number;
    /** Maximum concurrent OCR calls (default: 3) */
    maxConcurrency: number;
    /** Retries of a transient failure before it becomes fatal (default: 2) */
    retryLimit: number;
    /** Timeout of a single call in seconds (default: 120) */
    timeoutSeconds: number;
    /** Initial retry delay in milliseconds (default: 1000) */
    retryDelayMs: number;
    /** Backoff multiplier for exponential retry (default: 2) */
    backoffMultiplier: number;
}

/**
 * Image extraction and noise filter configuration
 */
export interface ImageConfig {
    /** Objects below this pixel area are ignored at extraction (default: 10000) */
    minAreaPx: number;
    /** Share of pages an image may appear on before it is letterhead (default: 0.3) */
    maxRepetitionFraction: number;
    /** Absolute page count above which an image is letterhead (default: unset) */
    maxRepetitions?: number;
    /** Long/short side ratio above which an image is a strip (default: 8) */
    maxAspectRatio: number;
    /** Near-square images up to this side length are icons (default: 128) */
    iconMaxSidePx: number;
    /** How far from 1:1 an icon may be (default: 0.15) */
    iconSquareTolerance: number;
    /** Minimum width in pixels (default: 0) */
    minImageWidth: number;
    /** Minimum height in pixels (default: 0) */
    minImageHeight: number;
    /** Minimum encoded size in bytes (default: 0) */
    minImageBytes: number;
    /** Pages decoded concurrently (default: 4) */
    concurrency: number;
}

/**
 * Input document limits
 */
export interface DocumentConfig {
    /** Maximum accepted file size (default: 20 MiB) */
    maxFileSizeBytes: number;
}

/**
 * Image storage configuration
 */
export interface StorageConfig {
    /** Skip an image whose write fails, or fail the document (default: skip) */
    failurePolicy: StorageFailurePolicy;
}

/**
 * Rate limiting configuration for OCR adapters
 */
export interface RateLimitConfig {
    /** Requests per minute limit (default: 60) */
    requestsPerMinute: number;
}

/**
 * Logging configuration
 */
export interface LogConfig {
    /** Log level */
    level: 'debug' | 'info' | 'warn' | 'error';
    /** Enable structured JSON logging (default: true) */
    structured: boolean;
    /** Custom logger function */
    customLogger?: (level: string, message: string, meta?: Record<string, unknown>) => void;
}

/**
 * Main pipeline configuration
 */
export interface VetDocConfig {
    ocrConfig?: Partial<OcrConfig>;
    imageConfig?: Partial<ImageConfig>;
    documentConfig?: Partial<DocumentConfig>;
    storageConfig?: Partial<StorageConfig>;
    logging?: Partial<LogConfig>;
}

/**
 * Internal resolved configuration with all defaults applied
 */
export interface ResolvedConfig {
    ocrConfig: OcrConfig;
    imageConfig: ImageConfig;
    documentConfig: DocumentConfig;
    storageConfig: StorageConfig;
    logging: LogConfig;
}

/**
 * Default configuration values
 */
export const DEFAULT_OCR_CONFIG: OcrConfig = {
    maxPagesPerCall: 15,
    maxConcurrency: 3,
    retryLimit: 2,
    timeoutSeconds: 120,
    retryDelayMs: 1000,
    backoffMultiplier: 2,
};

export const DEFAULT_IMAGE_CONFIG: ImageConfig = {
    minAreaPx: 10_000,
    maxRepetitionFraction: 0.3,
    maxAspectRatio: 8,
    iconMaxSidePx: 128,
    iconSquareTolerance: 0.15,
    minImageWidth: 0,
    minImageHeight: 0,
    minImageBytes: 0,
    concurrency: 4,
};

export const DEFAULT_DOCUMENT_CONFIG: DocumentConfig = {
    maxFileSizeBytes: 20 * 1024 * 1024,
};

export const DEFAULT_STORAGE_CONFIG: StorageConfig = {
    failurePolicy: 'skip',
};

export const DEFAULT_RATE_LIMIT_CONFIG: RateLimitConfig = {
    requestsPerMinute: 60,
};

export const DEFAULT_LOG_CONFIG: LogConfig = {
    level: 'info',
    structured: true,
};

/**
 * Zod schema for config validation
 */
export const configSchema = z.object({
    ocrConfig: z
        .object({
            maxPagesPerCall: z.number().int().min(1).max(50).optional(),
            maxConcurrency: z.number().int().min(1).max(10).optional(),
            retryLimit: z.number().int().min(0).max(10).optional(),
            timeoutSeconds: z.number().positive().max(3600).optional(),
            retryDelayMs: z.number().min(0).max(60000).optional(),
            backoffMultiplier: z.number().min(1).max(5).optional(),
        })
        .optional(),
    imageConfig: z
        .object({
            minAreaPx: z.number().int().min(0).optional(),
            maxRepetitionFraction: z.number().min(0).max(1).optional(),
            maxRepetitions: z.number().int().min(1).optional(),
            maxAspectRatio: z.number().min(1).optional(),
            iconMaxSidePx: z.number().int().min(0).optional(),
            iconSquareTolerance: z.number().min(0).max(1).optional(),
            minImageWidth: z.number().int().min(0).optional(),
            minImageHeight: z.number().int().min(0).optional(),
            minImageBytes: z.number().int().min(0).optional(),
            concurrency: z.number().int().min(1).max(32).optional(),
        })
        .optional(),
    documentConfig: z
        .object({
            maxFileSizeBytes: z.number().int().positive().optional(),
        })
        .optional(),
    storageConfig: z
        .object({
            failurePolicy: z.enum(['skip', 'fail']).optional(),
        })
        .optional(),
    logging: z
        .object({
            level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
            structured: z.boolean().optional(),
        })
        .optional(),
});

/**
 * Zod schema for per-call processing options
 */
export const processingOptionsSchema = z.object({
    maxPagesPerCall: z.number().int().min(1).max(50).optional(),
    minImageAreaPx: z.number().int().min(0).optional(),
    maxImageRepetitionFraction: z.number().min(0).max(1).optional(),
    ocrRetryLimit: z.number().int().min(0).max(10).optional(),
    ocrTimeoutSeconds: z.number().positive().max(3600).optional(),
});
