/**
 * Test Fixtures
 *
 * Builders for real PDF documents (pdf-lib) with embedded images (sharp).
 * Uses @faker-js/faker for ids.
 */

import { faker } from '@faker-js/faker';
import sharp from 'sharp';
import {
    PDFDocument,
    PDFName,
    concatTransformationMatrix,
    drawObject,
    popGraphicsState,
    pushGraphicsState,
} from 'pdf-lib';
import type { PDFImage } from 'pdf-lib';
import type { ProcessInput } from '../../src/types/result.types.js';

// ========================================
// IDS
// ========================================

/**
 * 12 hex characters, like the ids the service hands out
 */
export function createDocumentId(): string {
    return faker.string.hexadecimal({ length: 12, casing: 'lower', prefix: '' });
}

// ========================================
// IMAGES
// ========================================

export interface Color {
    r: number;
    g: number;
    b: number;
}

export async function createPngImage(width: number, height: number, background: Color): Promise<Uint8Array> {
    const png = await sharp({
        create: { width, height, channels: 3, background },
    }).png().toBuffer();
    return new Uint8Array(png);
}

export async function createJpegImage(width: number, height: number, background: Color): Promise<Uint8Array> {
    const jpeg = await sharp({
        create: { width, height, channels: 3, background },
    }).jpeg().toBuffer();
    return new Uint8Array(jpeg);
}

// ========================================
// PDF
// ========================================

/**
 * Something drawn on a page, in order
 */
export type PageItem =
    | { kind: 'image'; image: PDFImage; width?: number; height?: number }
    | { kind: 'broken-jpeg'; width: number; height: number };

/**
 * Create a document with `pageCount` blank pages and let `draw` place images
 */
export async function buildPdf(
    pageCount: number,
    draw: (doc: PDFDocument) => Promise<Map<number, PageItem[]>> | Map<number, PageItem[]> = () => new Map()
): Promise<Uint8Array> {
    const doc = await PDFDocument.create();
    for (let i = 0; i < pageCount; i++) {
        doc.addPage([595, 842]);
    }

    const items = await draw(doc);

    for (const [pageIndex, pageItems] of items) {
        const page = doc.getPage(pageIndex);
        let y = 700;

        for (const [i, item] of pageItems.entries()) {
            if (item.kind === 'image') {
                page.drawImage(item.image, {
                    x: 50,
                    y,
                    width: item.width ?? item.image.width,
                    height: item.height ?? item.image.height,
                });
            } else {
                const stream = doc.context.stream(new Uint8Array([0x00, 0x13, 0x37, 0x42, 0x99, 0x10]), {
                    Type: 'XObject',
                    Subtype: 'Image',
                    Width: item.width,
                    Height: item.height,
                    ColorSpace: 'DeviceRGB',
                    BitsPerComponent: 8,
                    Filter: 'DCTDecode',
                });
                const ref = doc.context.register(stream);
                const name = `Broken${pageIndex}_${i}`;
                page.node.setXObject(PDFName.of(name), ref);
                page.pushOperators(
                    pushGraphicsState(),
                    concatTransformationMatrix(item.width, 0, 0, item.height, 50, y),
                    drawObject(name),
                    popGraphicsState()
                );
            }
            y -= 160;
        }
    }

    return doc.save();
}

/**
 * Blank document of `pageCount` pages
 */
export async function createBlankPdf(pageCount: number): Promise<Uint8Array> {
    return buildPdf(pageCount);
}

/**
 * Process input around a document
 */
export function createProcessInput(documentBytes: Uint8Array, overrides?: Partial<ProcessInput>): ProcessInput {
    return {
        documentId: createDocumentId(),
        filename: 'informe radiologico.pdf',
        documentBytes,
        ...overrides,
    };
}

// ========================================
// REPORT TEXT
// ========================================

export const SAMPLE_REPORT = [
    'Paciente: Luna',
    'Especie: Canino',
    'Raza: Golden Retriever',
    'Sexo: Hembra',
    'Edad: 5 años',
    'Tutor: María García',
    'Derivante: Dr. Juan Pérez M.V.',
    'Fecha: 15/01/2025',
    '',
    'DIAGNÓSTICO RADIOGRÁFICO:',
    'Se observa cardiomegalia con un índice VHS de 11.5v.',
    'Patrón alveolar leve en lóbulos caudales.',
    'No se observan signos de efusión pleural.',
    '',
    'Se recomienda ecocardiograma complementario para evaluar función cardíaca.',
    '',
].join('\n');
