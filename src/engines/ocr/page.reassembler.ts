import type { PageRange } from '../../types/document.types.js';
import type { AbsoluteChunkPages, OcrChunkResult, PageText, ReassembledText } from '../../types/ocr.types.js';
import { PageNumberingEnum } from '../../types/enums.js';
import { ReassemblyError } from '../../errors/index.js';

/**
 * Convert an adapter result to absolute page numbers
 *
 * Chunk-local numbers are shifted by the chunk's first page. Any page that
 * lands outside the chunk's range is rejected.
 */
export function toAbsolutePages(result: OcrChunkResult, range: PageRange): AbsoluteChunkPages {
    const offset = result.numbering === PageNumberingEnum.CHUNK_LOCAL ? range.startPage : 0;

    const pages = result.pages.map(page => ({
        pageNumber: page.pageNumber + offset,
        text: page.text,
    }));

    const outOfRange = pages
        .map(page => page.pageNumber)
        .filter(n => !Number.isInteger(n) || n < range.startPage || n >= range.endPage);

    if (outOfRange.length > 0) {
        throw new ReassemblyError(`OCR returned pages outside chunk ${range.index}`, {
            details: {
                chunkIndex: range.index,
                startPage: range.startPage,
                endPage: range.endPage,
                outOfRange,
            },
        });
    }

    return { range, pages };
}

/**
 * Merge chunk results (any order) into one page-ordered text
 *
 * The merged pages must be exactly 0..pageCount-1; nothing is dropped or repaired.
 */
export function reassemblePages(chunks: readonly AbsoluteChunkPages[], pageCount: number): ReassembledText {
    const pages: PageText[] = chunks
        .flatMap(chunk => chunk.pages)
        .sort((a, b) => a.pageNumber - b.pageNumber);

    const seen = new Set<number>();
    const duplicatePages: number[] = [];
    for (const page of pages) {
        if (seen.has(page.pageNumber)) {
            duplicatePages.push(page.pageNumber);
        }
        seen.add(page.pageNumber);
    }

    const missingPages: number[] = [];
    for (let n = 0; n < pageCount; n++) {
        if (!seen.has(n)) missingPages.push(n);
    }

    const unexpected = [...seen].filter(n => n < 0 || n >= pageCount);

    if (duplicatePages.length > 0 || missingPages.length > 0 || unexpected.length > 0 || pages.length !== pageCount) {
        throw new ReassemblyError(
            `OCR output covers ${pages.length} page(s), expected ${pageCount}`,
            {
                missingPages,
                duplicatePages,
                details: { pageCount, received: pages.length, unexpected },
            }
        );
    }

    return {
        pages,
        fullText: pages.map(page => page.text).join('\n'),
    };
}
