import type { ImageFormat } from './enums.js';

/**
 * Embedded raster object found on a page
 */
export interface RawImageCandidate {
    /** 0-based page the object is drawn on */
    pageNumber: number;
    /** Position among the page's images, in drawing order */
    indexOnPage: number;
    width: number;
    height: number;
    format: ImageFormat;
    mimeType: string;
    /** Encoded image bytes (JPEG, JPEG 2000 or PNG) */
    bytes: Uint8Array;
    /** PDF object reference, e.g. "12 0 R" */
    sourceRef: string;
}

/**
 * Content fingerprint used to detect duplicates across pages
 */
export type ImageSignature = string;

/**
 * Candidate that survived the noise filters
 */
export interface FilteredImage extends RawImageCandidate {
    signature: ImageSignature;
}

/**
 * Why a candidate was removed
 */
export type ImageDropReason =
    | 'repeated'
    | 'duplicate'
    | 'aspect-ratio'
    | 'icon'
    | 'too-small'
    | 'file-size';

export interface DroppedImage {
    pageNumber: number;
    indexOnPage: number;
    signature: ImageSignature;
    reason: ImageDropReason;
}

export interface ImageFilterResult {
    kept: FilteredImage[];
    dropped: DroppedImage[];
}

/**
 * Final image record of a processing result
 */
export interface ExtractedImage {
    pageNumber: number;
    width: number;
    height: number;
    mimeType: string;
    /** Reference returned by the image store */
    storageReference: string;
}

/**
 * Where an image is being written
 */
export interface ImageStoreKey {
    documentId: string;
    pageNumber: number;
    /** Position of the image on its page, in drawing order */
    index: number;
    mimeType: string;
}

/**
 * Image Store Interface
 *
 * Persistence for surviving images. Returns a reference that ends up in
 * ExtractedImage.storageReference.
 */
export interface IImageStore {
    put(bytes: Uint8Array, key: ImageStoreKey): Promise<string>;
}
