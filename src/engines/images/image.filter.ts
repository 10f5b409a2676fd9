import type { ImageConfig } from '../../types/config.types.js';
import type {
    DroppedImage,
    FilteredImage,
    ImageDropReason,
    ImageFilterResult,
    ImageSignature,
    RawImageCandidate,
} from '../../types/image.types.js';
import { hashBuffer } from '../../utils/hash.js';

export type ImageFilterConfig = Pick<
    ImageConfig,
    | 'maxRepetitionFraction'
    | 'maxRepetitions'
    | 'maxAspectRatio'
    | 'iconMaxSidePx'
    | 'iconSquareTolerance'
    | 'minImageWidth'
    | 'minImageHeight'
    | 'minImageBytes'
>;

/**
 * Content signature of an image: SHA-256 of its encoded bytes
 */
export function imageSignature(bytes: Uint8Array): ImageSignature {
    return hashBuffer(bytes);
}

/**
 * Distinct pages an image may appear on before it counts as letterhead
 *
 * @example
 * repetitionThreshold(6, 0.3); // 2
 * repetitionThreshold(20, 0.3); // 6
 */
export function repetitionThreshold(totalPages: number, fraction: number): number {
    return Math.max(2, Math.floor(totalPages * fraction));
}

function isRepeated(pageSpan: number, totalPages: number, config: ImageFilterConfig): boolean {
    if (pageSpan >= repetitionThreshold(totalPages, config.maxRepetitionFraction)) {
        return true;
    }
    return config.maxRepetitions !== undefined && pageSpan > config.maxRepetitions;
}

/**
 * Geometry and size rules; undefined when the image passes
 */
export function geometryDropReason(
    image: Pick<RawImageCandidate, 'width' | 'height' | 'bytes'>,
    config: ImageFilterConfig
): ImageDropReason | undefined {
    const { width, height } = image;
    const longSide = Math.max(width, height);
    const shortSide = Math.min(width, height);

    if (width < config.minImageWidth || height < config.minImageHeight) {
        return 'too-small';
    }
    if (image.bytes.length < config.minImageBytes) {
        return 'file-size';
    }
    if (shortSide === 0 || longSide / shortSide > config.maxAspectRatio) {
        return 'aspect-ratio';
    }
    if (Math.abs(width / height - 1) <= config.iconSquareTolerance && longSide <= config.iconMaxSidePx) {
        return 'icon';
    }
    return undefined;
}

/**
 * Remove letterhead, duplicates, strips and icons
 *
 * An image whose signature appears on enough distinct pages is dropped
 * everywhere. Other repeated signatures keep their first occurrence.
 * Survivors keep (page, within-page) order.
 */
export function filterImages(
    candidates: readonly RawImageCandidate[],
    totalPages: number,
    config: ImageFilterConfig
): ImageFilterResult {
    const ordered = [...candidates].sort(
        (a, b) => a.pageNumber - b.pageNumber || a.indexOnPage - b.indexOnPage
    );

    const signed = ordered.map(candidate => ({
        ...candidate,
        signature: imageSignature(candidate.bytes),
    }));

    const pagesBySignature = new Map<ImageSignature, Set<number>>();
    for (const image of signed) {
        const pages = pagesBySignature.get(image.signature) ?? new Set<number>();
        pages.add(image.pageNumber);
        pagesBySignature.set(image.signature, pages);
    }

    const kept: FilteredImage[] = [];
    const dropped: DroppedImage[] = [];
    const seen = new Set<ImageSignature>();

    const drop = (image: FilteredImage, reason: ImageDropReason): void => {
        dropped.push({
            pageNumber: image.pageNumber,
            indexOnPage: image.indexOnPage,
            signature: image.signature,
            reason,
        });
    };

    for (const image of signed) {
        const pageSpan = pagesBySignature.get(image.signature)?.size ?? 0;

        if (isRepeated(pageSpan, totalPages, config)) {
            drop(image, 'repeated');
            continue;
        }
        if (seen.has(image.signature)) {
            drop(image, 'duplicate');
            continue;
        }
        seen.add(image.signature);

        const reason = geometryDropReason(image, config);
        if (reason) {
            drop(image, reason);
            continue;
        }

        kept.push(image);
    }

    return { kept, dropped };
}
