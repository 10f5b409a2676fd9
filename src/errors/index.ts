import { AsyncLocalStorage } from 'async_hooks';

/**
 * Error context for correlation and tracing
 */
export interface ErrorContext {
    /** Unique correlation ID for request tracing */
    correlationId?: string;
    /** Timestamp when error occurred */
    timestamp?: Date;
    /** Original cause of the error */
    cause?: Error;
    /** Pipeline state or operation that was being performed */
    operation?: string;
}

/**
 * Generate a unique correlation ID
 */
export function generateCorrelationId(): string {
    return `vdoc_${Date.now()}_${Math.random().toString(36).substring(2, 11)}`;
}

const correlationScope = new AsyncLocalStorage<string>();

/**
 * Run `fn` with `id` as the correlation id of everything it logs or throws
 */
export function withCorrelationId<T>(id: string, fn: () => T): T {
    return correlationScope.run(id, fn);
}

/**
 * Correlation id of the current async context, or a fresh one outside any run
 */
export function getCorrelationId(): string {
    return correlationScope.getStore() ?? generateCorrelationId();
}

/**
 * Base error class for the pipeline
 * Every failure surfaced by `process` is a ProcessingError subclass
 */
export class ProcessingError extends Error {
    public readonly code: string;
    public readonly details?: Record<string, unknown>;
    public readonly correlationId: string;
    public readonly timestamp: Date;
    public readonly cause?: Error;
    public readonly operation?: string;

    constructor(
        message: string,
        code: string,
        details?: Record<string, unknown>,
        context?: ErrorContext
    ) {
        super(message);
        this.name = 'ProcessingError';
        this.code = code;
        this.details = details;
        this.correlationId = context?.correlationId ?? getCorrelationId();
        this.timestamp = context?.timestamp ?? new Date();
        this.cause = context?.cause;
        this.operation = context?.operation;
        Error.captureStackTrace(this, this.constructor);
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
            correlationId: this.correlationId,
            timestamp: this.timestamp.toISOString(),
            operation: this.operation,
            cause: this.cause ? {
                name: this.cause.name,
                message: this.cause.message,
            } : undefined,
        };
    }
}

export function isProcessingError(error: unknown): error is ProcessingError {
    return error instanceof ProcessingError;
}

/**
 * Wrap an unknown error into a ProcessingError
 */
export function wrapError(
    error: unknown,
    ErrorClass: new (message: string, details?: Record<string, unknown>) => ProcessingError,
    operation?: string
): ProcessingError {
    if (error instanceof ProcessingError) {
        return error;
    }

    const originalError = error instanceof Error ? error : new Error(String(error));
    const wrapped = new ErrorClass(originalError.message, {
        originalError: originalError.name,
    });

    Object.defineProperty(wrapped, 'cause', { value: originalError });
    if (operation !== undefined) {
        Object.defineProperty(wrapped, 'operation', { value: operation });
    }

    return wrapped;
}

/**
 * Record the operation an error surfaced in, unless one is already set
 */
export function annotateOperation<E extends ProcessingError>(error: E, operation: string): E {
    if (error.operation === undefined) {
        Object.defineProperty(error, 'operation', { value: operation });
    }
    return error;
}

/**
 * Configuration-related errors
 */
export class ConfigurationError extends ProcessingError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, 'CONFIGURATION_ERROR', details);
        this.name = 'ConfigurationError';
    }
}

/**
 * Input is not a usable PDF (bad signature, no pages, too large, unparseable)
 */
export class InvalidDocumentError extends ProcessingError {
    public readonly reason: 'signature' | 'empty' | 'oversized' | 'unparseable';

    constructor(
        message: string,
        reason: InvalidDocumentError['reason'],
        details?: Record<string, unknown>
    ) {
        super(message, 'INVALID_DOCUMENT', { reason, ...details });
        this.name = 'InvalidDocumentError';
        this.reason = reason;
    }
}

/**
 * OCR failure worth retrying (timeout, transient service failure)
 */
export class OCRTransientError extends ProcessingError {
    public readonly chunkIndex?: number;

    constructor(
        message: string,
        options: {
            code?: string;
            chunkIndex?: number;
            cause?: Error;
            details?: Record<string, unknown>;
        } = {}
    ) {
        super(message, options.code ?? 'OCR_TRANSIENT', options.details, { cause: options.cause });
        this.name = 'OCRTransientError';
        this.chunkIndex = options.chunkIndex;
    }
}

/**
 * OCR failure that ends the document (retries exhausted or non-retryable)
 */
export class OCRFatalError extends ProcessingError {
    public readonly chunkIndex?: number;
    public readonly attempts: number;

    constructor(
        message: string,
        options: {
            chunkIndex?: number;
            attempts?: number;
            cause?: Error;
            details?: Record<string, unknown>;
        } = {}
    ) {
        super(
            message,
            'OCR_FATAL',
            { chunkIndex: options.chunkIndex, attempts: options.attempts, ...options.details },
            { cause: options.cause }
        );
        this.name = 'OCRFatalError';
        this.chunkIndex = options.chunkIndex;
        this.attempts = options.attempts ?? 1;
    }
}

/**
 * OCR output does not cover the document exactly once
 */
export class ReassemblyError extends ProcessingError {
    public readonly missingPages: number[];
    public readonly duplicatePages: number[];

    constructor(
        message: string,
        options: {
            missingPages?: number[];
            duplicatePages?: number[];
            details?: Record<string, unknown>;
        } = {}
    ) {
        super(message, 'REASSEMBLY_ERROR', {
            missingPages: options.missingPages,
            duplicatePages: options.duplicatePages,
            ...options.details,
        });
        this.name = 'ReassemblyError';
        this.missingPages = options.missingPages ?? [];
        this.duplicatePages = options.duplicatePages ?? [];
    }
}

/**
 * A single embedded image could not be decoded (recovered locally)
 */
export class ImageDecodeError extends ProcessingError {
    public readonly pageNumber: number;
    public readonly sourceRef: string;

    constructor(message: string, pageNumber: number, sourceRef: string, cause?: Error) {
        super(message, 'IMAGE_DECODE_ERROR', { pageNumber, sourceRef }, { cause });
        this.name = 'ImageDecodeError';
        this.pageNumber = pageNumber;
        this.sourceRef = sourceRef;
    }
}

/**
 * The image store rejected a write
 */
export class StorageWriteError extends ProcessingError {
    public readonly pageNumber: number;
    public readonly index: number;

    constructor(message: string, pageNumber: number, index: number, cause?: Error) {
        super(message, 'STORAGE_WRITE_ERROR', { pageNumber, index }, { cause });
        this.name = 'StorageWriteError';
        this.pageNumber = pageNumber;
        this.index = index;
    }
}

/**
 * Rate limit errors (retryable)
 */
export class RateLimitError extends ProcessingError {
    public readonly retryAfterMs?: number;

    constructor(message: string, retryAfterMs?: number) {
        super(message, 'RATE_LIMIT_ERROR', { retryAfterMs });
        this.name = 'RateLimitError';
        this.retryAfterMs = retryAfterMs;
    }
}

/**
 * Anything thrown inside the pipeline that is not one of the above
 */
export class UnexpectedError extends ProcessingError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, 'UNEXPECTED_ERROR', details);
        this.name = 'UnexpectedError';
    }
}
