import { DOCUMENT_LIMITS } from '../config/constants.js';

export const MAX_FILENAME_LENGTH = DOCUMENT_LIMITS.MAX_FILENAME_LENGTH;
export const DEFAULT_FILENAME = DOCUMENT_LIMITS.DEFAULT_FILENAME;

const UNSAFE_FILENAME_CHARS = /[^a-zA-Z0-9._-]/g;

/**
 * Reduce a client-supplied filename to a safe basename
 *
 * @example
 * sanitizeFilename('../../informe final.pdf'); // 'informe_final.pdf'
 */
export function sanitizeFilename(filename: string | undefined): string {
    if (!filename) return DEFAULT_FILENAME;

    const base = filename.split('/').pop()?.split('\\').pop() ?? '';
    const safe = base.replace(UNSAFE_FILENAME_CHARS, '_').substring(0, MAX_FILENAME_LENGTH);

    return safe || DEFAULT_FILENAME;
}
