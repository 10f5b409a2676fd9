import pLimit from 'p-limit';
import sharp from 'sharp';
import {
    PDFArray,
    PDFDict,
    PDFName,
    PDFNumber,
    PDFRawStream,
    decodePDFRawStream,
} from 'pdf-lib';
import type { PDFDocument } from 'pdf-lib';
import type { ImageConfig } from '../../types/config.types.js';
import type { RawImageCandidate } from '../../types/image.types.js';
import { ImageFormatEnum } from '../../types/enums.js';
import { ImageDecodeError } from '../../errors/index.js';
import type { Logger } from '../../utils/logger.js';
import { XObjectWalker } from './xobject.walker.js';
import type { ImageXObject } from './xobject.walker.js';

const WIDTH = PDFName.of('Width');
const HEIGHT = PDFName.of('Height');
const FILTER = PDFName.of('Filter');
const DECODE_PARMS = PDFName.of('DecodeParms');
const PREDICTOR = PDFName.of('Predictor');
const COLOR_SPACE = PDFName.of('ColorSpace');
const BITS_PER_COMPONENT = PDFName.of('BitsPerComponent');
const N = PDFName.of('N');
const ICC_BASED = PDFName.of('ICCBased');

/** Filters decodePDFRawStream understands */
const GENERIC_FILTERS = new Set(['FlateDecode', 'LZWDecode', 'ASCIIHexDecode', 'ASCII85Decode', 'RunLengthDecode']);

type ColorModel = 'gray' | 'rgb' | 'cmyk';

const CHANNELS: Record<ColorModel, number> = { gray: 1, rgb: 3, cmyk: 4 };

export interface ImageExtractionContext {
    imageConfig: Pick<ImageConfig, 'minAreaPx' | 'concurrency'>;
    signal: AbortSignal;
    /** Called for every object that could not be decoded */
    onSkipped?: (error: ImageDecodeError) => void;
}

function filterNames(dict: PDFDict): string[] {
    const filter = dict.lookup(FILTER);
    if (filter instanceof PDFName) {
        return [filter.toString().replace(/^\//, '')];
    }
    if (filter instanceof PDFArray) {
        const names: string[] = [];
        for (let i = 0; i < filter.size(); i++) {
            const entry = filter.lookup(i);
            if (entry instanceof PDFName) names.push(entry.toString().replace(/^\//, ''));
        }
        return names;
    }
    return [];
}

function colorModel(dict: PDFDict): ColorModel | undefined {
    const colorSpace = dict.lookup(COLOR_SPACE);

    if (colorSpace instanceof PDFName) {
        switch (colorSpace.toString()) {
            case '/DeviceGray': return 'gray';
            case '/DeviceRGB': return 'rgb';
            case '/DeviceCMYK': return 'cmyk';
            default: return undefined;
        }
    }

    if (colorSpace instanceof PDFArray && colorSpace.lookup(0) === ICC_BASED) {
        const profile = colorSpace.lookup(1);
        const components = profile instanceof PDFRawStream
            ? profile.dict.lookupMaybe(N, PDFNumber)?.asNumber()
            : undefined;
        if (components === 1) return 'gray';
        if (components === 3) return 'rgb';
        if (components === 4) return 'cmyk';
    }

    return undefined;
}

function cmykToRgb(samples: Uint8Array, pixels: number): Uint8Array {
    const rgb = new Uint8Array(pixels * 3);
    for (let p = 0; p < pixels; p++) {
        const c = samples[p * 4] ?? 0;
        const m = samples[p * 4 + 1] ?? 0;
        const y = samples[p * 4 + 2] ?? 0;
        const k = samples[p * 4 + 3] ?? 0;
        rgb[p * 3] = Math.round(((255 - c) * (255 - k)) / 255);
        rgb[p * 3 + 1] = Math.round(((255 - m) * (255 - k)) / 255);
        rgb[p * 3 + 2] = Math.round(((255 - y) * (255 - k)) / 255);
    }
    return rgb;
}

/**
 * Pulls embedded raster images out of PDF pages
 *
 * JPEG and JPEG 2000 streams keep their encoded bytes; raw samples are
 * re-encoded to PNG. An object that cannot be decoded is skipped on its own.
 */
export class ImageExtractor {
    constructor(private readonly logger: Logger) { }

    /**
     * Candidates of every page, sorted by (pageNumber, indexOnPage)
     */
    async extractAll(pdf: PDFDocument, context: ImageExtractionContext): Promise<RawImageCandidate[]> {
        const limit = pLimit(context.imageConfig.concurrency);
        const pageCount = pdf.getPageCount();

        const tasks: Array<Promise<RawImageCandidate[]>> = [];
        for (let pageIndex = 0; pageIndex < pageCount; pageIndex++) {
            tasks.push(limit(() => this.extractPage(pdf, pageIndex, context)));
        }

        try {
            const perPage = await Promise.all(tasks);
            return perPage
                .flat()
                .sort((a, b) => a.pageNumber - b.pageNumber || a.indexOnPage - b.indexOnPage);
        } catch (error) {
            limit.clearQueue();
            throw error;
        }
    }

    /**
     * Candidates of one page in drawing order
     */
    async extractPage(pdf: PDFDocument, pageIndex: number, context: ImageExtractionContext): Promise<RawImageCandidate[]> {
        // the run is already failing; its result is discarded
        if (context.signal.aborted) return [];

        const page = pdf.getPage(pageIndex);
        const { images, undecodable } = new XObjectWalker(page).walk();

        for (const reason of undecodable) {
            this.logger.warn('Content stream not decodable, using resource order', {
                pageNumber: pageIndex,
                reason,
            });
        }

        const candidates: RawImageCandidate[] = [];
        for (const [indexOnPage, xobject] of images.entries()) {
            try {
                const candidate = await this.decode(xobject, pageIndex, indexOnPage, context.imageConfig.minAreaPx);
                if (candidate) candidates.push(candidate);
            } catch (error) {
                const decodeError = error instanceof ImageDecodeError
                    ? error
                    : new ImageDecodeError(
                        `Image ${xobject.sourceRef} could not be decoded`,
                        pageIndex,
                        xobject.sourceRef,
                        error instanceof Error ? error : new Error(String(error))
                    );

                this.logger.warn('Image skipped', {
                    pageNumber: pageIndex,
                    sourceRef: xobject.sourceRef,
                    error: decodeError.message,
                    cause: decodeError.cause?.message,
                });
                context.onSkipped?.(decodeError);
            }
        }

        return candidates;
    }

    /**
     * Decode one image XObject; undefined when it is below the area threshold
     */
    private async decode(
        xobject: ImageXObject,
        pageNumber: number,
        indexOnPage: number,
        minAreaPx: number
    ): Promise<RawImageCandidate | undefined> {
        const { stream, sourceRef } = xobject;
        const dict = stream.dict;
        const fail = (message: string): ImageDecodeError =>
            new ImageDecodeError(`Image ${sourceRef}: ${message}`, pageNumber, sourceRef);

        const width = dict.lookupMaybe(WIDTH, PDFNumber)?.asNumber();
        const height = dict.lookupMaybe(HEIGHT, PDFNumber)?.asNumber();
        if (width === undefined || height === undefined || width <= 0 || height <= 0) {
            throw fail('missing or invalid dimensions');
        }

        if (width * height < minAreaPx) return undefined;

        const base = { pageNumber, indexOnPage, width, height, sourceRef };
        const filters = filterNames(dict);
        const last = filters[filters.length - 1];

        if (last === 'DCTDecode') {
            if (filters.length > 1) throw fail(`unsupported filter chain ${filters.join(',')}`);
            const bytes = stream.contents;
            await sharp(bytes).metadata();
            return { ...base, format: ImageFormatEnum.JPEG, mimeType: 'image/jpeg', bytes };
        }

        if (last === 'JPXDecode') {
            if (filters.length > 1) throw fail(`unsupported filter chain ${filters.join(',')}`);
            return { ...base, format: ImageFormatEnum.JPEG2000, mimeType: 'image/jp2', bytes: stream.contents };
        }

        const unsupported = filters.filter(name => !GENERIC_FILTERS.has(name));
        if (unsupported.length > 0) throw fail(`unsupported filter ${unsupported.join(',')}`);

        const parms = dict.lookup(DECODE_PARMS);
        const predictor = parms instanceof PDFDict ? parms.lookupMaybe(PREDICTOR, PDFNumber)?.asNumber() : undefined;
        if (predictor !== undefined && predictor > 1) throw fail(`unsupported predictor ${predictor}`);

        const bits = dict.lookupMaybe(BITS_PER_COMPONENT, PDFNumber)?.asNumber();
        if (bits !== 8) throw fail(`unsupported bits per component ${bits ?? 'none'}`);

        const model = colorModel(dict);
        if (!model) throw fail('unsupported color space');

        const samples = decodePDFRawStream(stream).decode();
        const pixels = width * height;
        const expected = pixels * CHANNELS[model];
        if (samples.length < expected) {
            throw fail(`expected ${expected} sample bytes, found ${samples.length}`);
        }

        const raw = model === 'cmyk'
            ? cmykToRgb(samples, pixels)
            : samples.subarray(0, expected);
        const channels = model === 'gray' ? 1 : 3;

        const png = await sharp(Buffer.from(raw), { raw: { width, height, channels } }).png().toBuffer();

        return {
            ...base,
            format: ImageFormatEnum.PNG,
            mimeType: 'image/png',
            bytes: new Uint8Array(png),
        };
    }
}
