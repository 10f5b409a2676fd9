import { createHash } from 'crypto';

/**
 * Hex SHA-256 digest of raw bytes
 *
 * Used as the document fingerprint and as the content signature that
 * groups identical images across pages.
 */
export function hashBuffer(bytes: Uint8Array): string {
    return createHash('sha256').update(bytes).digest('hex');
}

/** Leading characters of a digest, for log lines */
export function shortHash(digest: string, length = 8): string {
    return digest.slice(0, length);
}
