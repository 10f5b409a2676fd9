import type { ResolvedConfig, VetDocConfig } from '../types/config.types.js';
import type { ProcessingOptions } from '../types/result.types.js';
import {
    configSchema,
    processingOptionsSchema,
    DEFAULT_DOCUMENT_CONFIG,
    DEFAULT_IMAGE_CONFIG,
    DEFAULT_LOG_CONFIG,
    DEFAULT_OCR_CONFIG,
    DEFAULT_STORAGE_CONFIG,
} from '../types/config.types.js';
import { ConfigurationError } from '../errors/index.js';

/**
 * Validate user config and fill in defaults
 */
export function resolveConfig(userConfig: VetDocConfig = {}): ResolvedConfig {
    const validation = configSchema.safeParse(userConfig);
    if (!validation.success) {
        throw new ConfigurationError('Invalid configuration', {
            errors: validation.error.errors,
        });
    }

    return {
        ocrConfig: {
            ...DEFAULT_OCR_CONFIG,
            ...userConfig.ocrConfig,
        },
        imageConfig: {
            ...DEFAULT_IMAGE_CONFIG,
            ...userConfig.imageConfig,
        },
        documentConfig: {
            ...DEFAULT_DOCUMENT_CONFIG,
            ...userConfig.documentConfig,
        },
        storageConfig: {
            ...DEFAULT_STORAGE_CONFIG,
            ...userConfig.storageConfig,
        },
        logging: {
            ...DEFAULT_LOG_CONFIG,
            ...userConfig.logging,
        },
    };
}

/**
 * Layer per-call options over a resolved config
 */
export function applyProcessingOptions(config: ResolvedConfig, options?: ProcessingOptions): ResolvedConfig {
    if (!options) return config;

    const validation = processingOptionsSchema.safeParse(options);
    if (!validation.success) {
        throw new ConfigurationError('Invalid processing options', {
            errors: validation.error.errors,
        });
    }

    return {
        ...config,
        ocrConfig: {
            ...config.ocrConfig,
            maxPagesPerCall: options.maxPagesPerCall ?? config.ocrConfig.maxPagesPerCall,
            retryLimit: options.ocrRetryLimit ?? config.ocrConfig.retryLimit,
            timeoutSeconds: options.ocrTimeoutSeconds ?? config.ocrConfig.timeoutSeconds,
        },
        imageConfig: {
            ...config.imageConfig,
            minAreaPx: options.minImageAreaPx ?? config.imageConfig.minAreaPx,
            maxRepetitionFraction: options.maxImageRepetitionFraction ?? config.imageConfig.maxRepetitionFraction,
        },
    };
}
