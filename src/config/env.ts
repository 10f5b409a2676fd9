/**
 * Centralized Environment Configuration
 *
 * Validates and exports all environment variables with Zod.
 * Import this module instead of accessing process.env directly.
 *
 * @example
 * ```typescript
 * import { env } from './config/env.js';
 * console.log(env.LOG_LEVEL);
 * ```
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';

/**
 * Environment variable schema with validation
 */
const envSchema = z.object({
    /**
     * Log level for the logger
     * @default 'info'
     */
    LOG_LEVEL: z
        .enum(['debug', 'info', 'warn', 'error'])
        .default('info')
        .describe('Log level: debug, info, warn, error'),

    /**
     * Gemini API key used by the OCR adapter
     */
    GEMINI_API_KEY: z
        .string()
        .optional()
        .describe('Gemini API key for OCR'),

    /**
     * Gemini model used for OCR
     * @default 'gemini-2.0-flash'
     */
    GEMINI_MODEL: z
        .string()
        .min(1)
        .default('gemini-2.0-flash')
        .describe('Gemini model name'),

    /**
     * Base directory for extracted images
     * @default '.'
     */
    VETDOC_OUTPUT_DIR: z
        .string()
        .min(1)
        .default('.')
        .describe('Directory that receives extracted_images/'),
});

/**
 * Validated environment type
 */
export type Env = z.infer<typeof envSchema>;

/**
 * Parse environment variables with validation
 * Throws a ConfigurationError listing every invalid variable
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
    const result = envSchema.safeParse(source);

    if (!result.success) {
        const errors = result.error.issues
            .map(issue => `  ${issue.path.join('.')}: ${issue.message}`)
            .join('\n');

        throw new ConfigurationError(`Environment validation failed:\n${errors}`, {
            issues: result.error.issues,
        });
    }

    return result.data;
}

/**
 * Validated environment variables
 * Use this instead of process.env for type-safe access
 */
export const env = parseEnv();
