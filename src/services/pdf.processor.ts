import { PDFDocument } from 'pdf-lib';
import type { DocumentConfig } from '../types/config.types.js';
import type { IPDFProcessor, PageRange, PDFLoadResult } from '../types/document.types.js';
import { DOCUMENT_LIMITS } from '../config/constants.js';
import { InvalidDocumentError } from '../errors/index.js';
import { hashBuffer } from '../utils/hash.js';
import type { Logger } from '../utils/logger.js';

/**
 * Check the leading PDF signature
 */
export function hasPdfSignature(bytes: Uint8Array): boolean {
    const magic = DOCUMENT_LIMITS.PDF_MAGIC_BYTES;
    if (bytes.length < magic.length) return false;

    for (let i = 0; i < magic.length; i++) {
        if (bytes[i] !== magic.charCodeAt(i)) return false;
    }
    return true;
}

/**
 * PDF processing service
 */
export class PDFProcessor implements IPDFProcessor {
    constructor(
        private readonly documentConfig: DocumentConfig,
        private readonly logger: Logger
    ) { }

    /**
     * Validate raw bytes and parse them with pdf-lib
     */
    async load(bytes: Uint8Array): Promise<PDFLoadResult> {
        if (bytes.length === 0) {
            throw new InvalidDocumentError('Document is empty', 'empty');
        }

        if (bytes.length > this.documentConfig.maxFileSizeBytes) {
            throw new InvalidDocumentError('Document exceeds the maximum file size', 'oversized', {
                byteLength: bytes.length,
                maxFileSizeBytes: this.documentConfig.maxFileSizeBytes,
            });
        }

        if (!hasPdfSignature(bytes)) {
            throw new InvalidDocumentError('Document does not start with a PDF signature', 'signature');
        }

        let pdf: PDFDocument;
        let pageCount: number;
        try {
            pdf = await PDFDocument.load(bytes, { ignoreEncryption: true, updateMetadata: false });
            // a missing page tree only surfaces here
            pageCount = pdf.getPageCount();
        } catch (error) {
            throw new InvalidDocumentError('Document could not be parsed as PDF', 'unparseable', {
                error: error instanceof Error ? error.message : String(error),
            });
        }

        if (pageCount === 0) {
            throw new InvalidDocumentError('Document has no pages', 'empty');
        }

        const fileHash = hashBuffer(bytes);

        this.logger.debug('PDF loaded', {
            byteLength: bytes.length,
            pageCount,
            fileHash,
        });

        return {
            document: {
                bytes,
                byteLength: bytes.length,
                pageCount,
                fileHash,
            },
            pdf,
        };
    }

    /**
     * Copy the pages of a range into a new standalone PDF
     */
    async extractChunk(pdf: PDFDocument, range: PageRange): Promise<Uint8Array> {
        const chunk = await PDFDocument.create();
        const indices: number[] = [];
        for (let page = range.startPage; page < range.endPage; page++) {
            indices.push(page);
        }

        const copied = await chunk.copyPages(pdf, indices);
        for (const page of copied) {
            chunk.addPage(page);
        }

        const bytes = await chunk.save();

        this.logger.debug('Chunk PDF built', {
            chunkIndex: range.index,
            pageStart: range.startPage,
            pageEnd: range.endPage,
            byteLength: bytes.length,
        });

        return bytes;
    }
}
