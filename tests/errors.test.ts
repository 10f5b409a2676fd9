import { describe, it, expect } from 'vitest';
import {
    ProcessingError,
    ConfigurationError,
    InvalidDocumentError,
    OCRTransientError,
    OCRFatalError,
    ReassemblyError,
    ImageDecodeError,
    StorageWriteError,
    RateLimitError,
    UnexpectedError,
    withCorrelationId,
    isProcessingError,
    wrapError,
    annotateOperation,
} from '../src/errors/index.js';

describe('Error Classes', () => {
    describe('ProcessingError', () => {
        it('should create with message and code', () => {
            const error = new ProcessingError('Test error', 'TEST_CODE');
            expect(error.message).toBe('Test error');
            expect(error.code).toBe('TEST_CODE');
            expect(error.name).toBe('ProcessingError');
        });

        it('should generate a correlation id', () => {
            const error = new ProcessingError('Test error', 'TEST');
            expect(error.correlationId).toMatch(/^vdoc_\d+_[a-z0-9]+$/);
        });

        it('should take the correlation id of the current run', async () => {
            const error = await withCorrelationId('corr-9', async () => {
                await Promise.resolve();
                return new InvalidDocumentError('Document has no pages', 'empty');
            });

            expect(error.correlationId).toBe('corr-9');
        });

        it('should keep context values', () => {
            const cause = new Error('root cause');
            const error = new ProcessingError('Test error', 'TEST', undefined, {
                correlationId: 'corr-1',
                cause,
                operation: 'CHUNKED',
            });
            expect(error.correlationId).toBe('corr-1');
            expect(error.cause).toBe(cause);
            expect(error.operation).toBe('CHUNKED');
        });

        it('should serialize to JSON', () => {
            const error = new ProcessingError('Test error', 'TEST', { key: 'value' }, {
                cause: new TypeError('bad type'),
            });
            const json = error.toJSON();
            expect(json.name).toBe('ProcessingError');
            expect(json.code).toBe('TEST');
            expect(json.message).toBe('Test error');
            expect(json.details).toEqual({ key: 'value' });
            expect(json.cause).toEqual({ name: 'TypeError', message: 'bad type' });
        });
    });

    describe('InvalidDocumentError', () => {
        it('should carry the reason in details', () => {
            const error = new InvalidDocumentError('Document is empty', 'empty', { byteLength: 0 });
            expect(error.code).toBe('INVALID_DOCUMENT');
            expect(error.reason).toBe('empty');
            expect(error.details).toEqual({ reason: 'empty', byteLength: 0 });
        });
    });

    describe('OCR errors', () => {
        it('should default the transient code', () => {
            const error = new OCRTransientError('Service unavailable', { chunkIndex: 2 });
            expect(error.code).toBe('OCR_TRANSIENT');
            expect(error.chunkIndex).toBe(2);
        });

        it('should accept a specific transient code', () => {
            const error = new OCRTransientError('Timed out', { code: 'OCR_TIMEOUT' });
            expect(error.code).toBe('OCR_TIMEOUT');
        });

        it('should record attempts on fatal errors', () => {
            const error = new OCRFatalError('Gave up', { chunkIndex: 1, attempts: 3 });
            expect(error.code).toBe('OCR_FATAL');
            expect(error.attempts).toBe(3);
            expect(error.details).toEqual({ chunkIndex: 1, attempts: 3 });
        });

        it('should default attempts to 1', () => {
            expect(new OCRFatalError('Rejected').attempts).toBe(1);
        });
    });

    describe('ReassemblyError', () => {
        it('should list missing and duplicate pages', () => {
            const error = new ReassemblyError('Bad coverage', { missingPages: [3], duplicatePages: [4] });
            expect(error.missingPages).toEqual([3]);
            expect(error.duplicatePages).toEqual([4]);
            expect(error.code).toBe('REASSEMBLY_ERROR');
        });
    });

    describe('Image and storage errors', () => {
        it('should identify the image object', () => {
            const error = new ImageDecodeError('Bad JPEG', 3, '12 0 R');
            expect(error.pageNumber).toBe(3);
            expect(error.sourceRef).toBe('12 0 R');
            expect(error.code).toBe('IMAGE_DECODE_ERROR');
        });

        it('should identify the failed write', () => {
            const error = new StorageWriteError('disk full', 2, 1);
            expect(error.pageNumber).toBe(2);
            expect(error.index).toBe(1);
            expect(error.code).toBe('STORAGE_WRITE_ERROR');
        });
    });

    describe('RateLimitError', () => {
        it('should store retryAfterMs', () => {
            const error = new RateLimitError('Rate limited', 5000);
            expect(error.retryAfterMs).toBe(5000);
        });
    });

    describe('helpers', () => {
        it('should detect processing errors', () => {
            expect(isProcessingError(new ConfigurationError('x'))).toBe(true);
            expect(isProcessingError(new Error('x'))).toBe(false);
        });

        it('should pass processing errors through wrapError', () => {
            const original = new ConfigurationError('Invalid');
            expect(wrapError(original, UnexpectedError)).toBe(original);
        });

        it('should wrap unknown errors', () => {
            const wrapped = wrapError(new RangeError('out of range'), UnexpectedError, 'PARSED');
            expect(wrapped).toBeInstanceOf(UnexpectedError);
            expect(wrapped.message).toBe('out of range');
            expect(wrapped.details).toEqual({ originalError: 'RangeError' });
            expect(wrapped.cause?.message).toBe('out of range');
            expect(wrapped.operation).toBe('PARSED');
        });

        it('should wrap non-Error values', () => {
            const wrapped = wrapError('plain string', UnexpectedError);
            expect(wrapped.message).toBe('plain string');
            expect(wrapped.operation).toBeUndefined();
        });

        it('should annotate the operation once', () => {
            const error = annotateOperation(new OCRFatalError('x'), 'CHUNKED');
            annotateOperation(error, 'OCRED');
            expect(error.operation).toBe('CHUNKED');
        });

        it('should annotate a wrapped error', () => {
            const error = annotateOperation(wrapError(new Error('boom'), UnexpectedError), 'VALIDATED');
            expect(error.operation).toBe('VALIDATED');
        });
    });
});
