import {
    PDFArray,
    PDFContentStream,
    PDFDict,
    PDFName,
    PDFRawStream,
    PDFRef,
    decodePDFRawStream,
} from 'pdf-lib';
import type { PDFObject, PDFPage } from 'pdf-lib';

const XOBJECT = PDFName.of('XObject');
const RESOURCES = PDFName.of('Resources');
const SUBTYPE = PDFName.of('Subtype');
const IMAGE = PDFName.of('Image');
const FORM = PDFName.of('Form');

/** `/Name Do` in a content stream */
const DO_OPERATOR = /\/([^\s/[\]()<>{}%]+)\s+Do(?![A-Za-z0-9])/g;

/**
 * Image XObject reached from a page
 */
export interface ImageXObject {
    /** Resource name the object is drawn under */
    name: string;
    /** Object reference, e.g. "12 0 R" */
    sourceRef: string;
    stream: PDFRawStream;
}

export interface WalkResult {
    images: ImageXObject[];
    /** Content streams that could not be decoded (drawing order lost) */
    undecodable: string[];
}

/**
 * Decode `#xx` escapes of a PDF name
 */
function decodeName(encoded: string): string {
    return encoded.replace(/#([0-9A-Fa-f]{2})/g, (_, hex: string) => String.fromCharCode(parseInt(hex, 16)));
}

function nameOf(key: PDFName): string {
    return decodeName(key.toString().replace(/^\//, ''));
}

/**
 * Unfiltered bytes of a content stream
 */
export function streamBytes(stream: PDFObject | undefined): Uint8Array {
    if (stream instanceof PDFRawStream) {
        return decodePDFRawStream(stream).decode();
    }
    if (stream instanceof PDFContentStream) {
        return stream.getUnencodedContents();
    }
    return new Uint8Array(0);
}

/**
 * XObject names in the order the content invokes them
 */
export function drawOrder(content: Uint8Array): string[] {
    const text = Buffer.from(content).toString('latin1');
    const names: string[] = [];
    for (const match of text.matchAll(DO_OPERATOR)) {
        const name = match[1];
        if (name !== undefined) names.push(decodeName(name));
    }
    return names;
}

/**
 * Collects the image XObjects of a page
 *
 * Order: as drawn by the content stream, descending into form XObjects;
 * images never drawn follow in resource-dictionary order. Each object is
 * reported once.
 */
export class XObjectWalker {
    private readonly seenRefs = new Set<string>();
    private readonly visitedForms = new Set<string>();
    private readonly images: ImageXObject[] = [];
    private readonly undecodable: string[] = [];

    constructor(private readonly page: PDFPage) { }

    walk(): WalkResult {
        const resources = this.page.node.Resources();
        const contents = this.page.node.Contents();

        const streams: PDFObject[] = [];
        if (contents instanceof PDFArray) {
            for (let i = 0; i < contents.size(); i++) {
                const part = contents.lookup(i);
                if (part !== undefined) streams.push(part);
            }
        } else if (contents !== undefined) {
            streams.push(contents);
        }

        const chunks: Uint8Array[] = [];
        for (const [i, stream] of streams.entries()) {
            try {
                chunks.push(streamBytes(stream));
            } catch (error) {
                this.undecodable.push(`page content ${i}: ${error instanceof Error ? error.message : String(error)}`);
            }
        }

        this.visit(resources, drawOrder(Buffer.concat(chunks.map(chunk => Buffer.from(chunk)))), 'page');

        return { images: this.images, undecodable: this.undecodable };
    }

    private visit(resources: PDFDict | undefined, drawn: string[], scope: string): void {
        const xobjects = resources?.lookupMaybe(XOBJECT, PDFDict);
        if (!xobjects) return;

        const byName = new Map<string, PDFObject>();
        for (const [key, value] of xobjects.entries()) {
            byName.set(nameOf(key), value);
        }

        for (const name of drawn) {
            const value = byName.get(name);
            if (value !== undefined) this.visitObject(name, value, resources, scope);
        }

        for (const [name, value] of byName) {
            if (!drawn.includes(name)) this.visitObject(name, value, resources, scope);
        }
    }

    private visitObject(name: string, value: PDFObject, parentResources: PDFDict | undefined, scope: string): void {
        const sourceRef = value instanceof PDFRef ? value.toString() : `${scope}/${name}`;
        const stream = this.page.doc.context.lookup(value);
        if (!(stream instanceof PDFRawStream)) return;

        const subtype = stream.dict.lookup(SUBTYPE);

        if (subtype === IMAGE) {
            if (this.seenRefs.has(sourceRef)) return;
            this.seenRefs.add(sourceRef);
            this.images.push({ name, sourceRef, stream });
            return;
        }

        if (subtype === FORM) {
            if (this.visitedForms.has(sourceRef)) return;
            this.visitedForms.add(sourceRef);

            const formResources = stream.dict.lookupMaybe(RESOURCES, PDFDict) ?? parentResources;
            let drawn: string[] = [];
            try {
                drawn = drawOrder(streamBytes(stream));
            } catch (error) {
                this.undecodable.push(`form ${sourceRef}: ${error instanceof Error ? error.message : String(error)}`);
            }
            this.visit(formResources, drawn, sourceRef);
        }
    }
}
