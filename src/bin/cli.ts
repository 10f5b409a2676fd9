#!/usr/bin/env node

import 'dotenv/config';
import { Command, InvalidArgumentError } from 'commander';
import { randomUUID } from 'crypto';
import { readFileSync } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { ProcessingOptions } from '../types/result.types.js';
import { env } from '../config/env.js';
import { isProcessingError } from '../errors/index.js';
import { planChunks, describeRange } from '../engines/ocr/chunk.planner.js';
import { parseReportFields } from '../engines/report/field.parser.js';
import { createVetDocPipeline } from '../vetdoc.factory.js';

function readVersion(): string {
    try {
        const pkgPath = fileURLToPath(new URL('../../package.json', import.meta.url));
        const parsed = z.object({ version: z.string() }).safeParse(JSON.parse(readFileSync(pkgPath, 'utf-8')));
        return parsed.success ? parsed.data.version : '0.0.0';
    } catch {
        return '0.0.0';
    }
}

function parseInteger(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new InvalidArgumentError('Not an integer.');
    }
    return parsed;
}

function parseNumber(value: string): number {
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
        throw new InvalidArgumentError('Not a number.');
    }
    return parsed;
}

function printError(error: unknown): void {
    const body = isProcessingError(error)
        ? error.toJSON()
        : { message: error instanceof Error ? error.message : String(error) };
    console.error(JSON.stringify(body, null, 2));
    process.exitCode = 1;
}

const program = new Command();

program
    .name('vetdoc')
    .description('Veterinary report processing - OCR, image extraction and field parsing')
    .version(readVersion());

program
    .command('process')
    .description('Process a PDF report and print the result as JSON')
    .argument('<file>', 'PDF file')
    .option('-o, --out <dir>', 'Base directory for extracted_images/')
    .option('--document-id <id>', 'Document id (default: random 12 hex chars)')
    .option('--max-pages-per-call <n>', 'Pages per OCR call', parseInteger)
    .option('--min-image-area <px>', 'Ignore images smaller than this area', parseInteger)
    .option('--repetition-fraction <f>', 'Share of pages an image may repeat on', parseNumber)
    .option('--retry-limit <n>', 'Retries of a transient OCR failure', parseInteger)
    .option('--timeout <s>', 'Timeout of one OCR call in seconds', parseNumber)
    .option('--dry-run', 'Keep extracted images in memory')
    .action(async (file: string, options: {
        out?: string;
        documentId?: string;
        maxPagesPerCall?: number;
        minImageArea?: number;
        repetitionFraction?: number;
        retryLimit?: number;
        timeout?: number;
        dryRun?: boolean;
    }) => {
        try {
            const apiKey = env.GEMINI_API_KEY;
            if (!apiKey) {
                throw new Error('GEMINI_API_KEY is required for this command.');
            }

            const pipeline = createVetDocPipeline({
                geminiApiKey: apiKey,
                model: env.GEMINI_MODEL,
                outputDir: options.dryRun ? undefined : options.out ?? env.VETDOC_OUTPUT_DIR,
                logging: { level: env.LOG_LEVEL, structured: false },
            });

            const processingOptions: ProcessingOptions = {
                maxPagesPerCall: options.maxPagesPerCall,
                minImageAreaPx: options.minImageArea,
                maxImageRepetitionFraction: options.repetitionFraction,
                ocrRetryLimit: options.retryLimit,
                ocrTimeoutSeconds: options.timeout,
            };

            const result = await pipeline.process({
                documentId: options.documentId ?? randomUUID().replace(/-/g, '').substring(0, 12),
                filename: path.basename(file),
                documentBytes: await fs.readFile(file),
                options: processingOptions,
            });

            console.log(JSON.stringify(result, null, 2));
        } catch (error) {
            printError(error);
        }
    });

program
    .command('parse')
    .description('Extract report fields from a text file')
    .argument('<textfile>', 'OCR text file')
    .action(async (textfile: string) => {
        try {
            const text = await fs.readFile(textfile, 'utf-8');
            console.log(JSON.stringify(parseReportFields(text), null, 2));
        } catch (error) {
            printError(error);
        }
    });

program
    .command('plan')
    .description('Show how a document of <pages> pages is split into OCR calls')
    .argument('<pages>', 'Page count', parseInteger)
    .option('--max-pages-per-call <n>', 'Pages per OCR call', parseInteger, 15)
    .action((pages: number, options: { maxPagesPerCall: number }) => {
        try {
            for (const range of planChunks(pages, options.maxPagesPerCall)) {
                console.log(`chunk ${range.index}: [${range.startPage}, ${range.endPage}) ${describeRange(range)}`);
            }
        } catch (error) {
            printError(error);
        }
    });

program.parseAsync().catch(printError);
