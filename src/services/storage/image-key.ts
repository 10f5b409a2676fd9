import type { ImageStoreKey } from '../../types/image.types.js';

const EXTENSIONS: Record<string, string> = {
    'image/jpeg': 'jpg',
    'image/jp2': 'jp2',
    'image/png': 'png',
};

/**
 * File extension for an image MIME type
 */
export function extensionFor(mimeType: string): string {
    return EXTENSIONS[mimeType] ?? 'bin';
}

const PLAIN_CHAR = /^[A-Za-z0-9._-]$/;

/**
 * Encode a document id as a single path segment
 *
 * Bytes outside `[A-Za-z0-9._-]` become `%XX`, as do the dots of an id made
 * only of dots; the empty id is `%`. Distinct ids never share a segment.
 */
export function encodeSegment(value: string): string {
    if (value === '') return '%';

    const dotsOnly = /^\.+$/.test(value);
    let encoded = '';
    for (const byte of Buffer.from(value, 'utf8')) {
        const char = String.fromCharCode(byte);
        encoded += PLAIN_CHAR.test(char) && !(dotsOnly && char === '.')
            ? char
            : `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
    }
    return encoded;
}

/**
 * `page<n>_img<i>.<ext>`
 */
export function imageFileName(key: ImageStoreKey): string {
    return `page${key.pageNumber}_img${key.index}.${extensionFor(key.mimeType)}`;
}
