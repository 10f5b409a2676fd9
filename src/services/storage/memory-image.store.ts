import type { IImageStore, ImageStoreKey } from '../../types/image.types.js';
import { imageFileName, encodeSegment } from './image-key.js';

export interface MemoryImageStoreOptions {
    /** Keep the bytes of every stored image; off, the store only hands out references */
    retainBytes?: boolean;
}

/**
 * Keeps images in memory; references look like `memory://<documentId>/page<n>_img<i>.<ext>`
 */
export class MemoryImageStore implements IImageStore {
    private readonly images = new Map<string, Uint8Array>();
    private readonly retainBytes: boolean;

    constructor(options: MemoryImageStoreOptions = {}) {
        this.retainBytes = options.retainBytes ?? true;
    }

    async put(bytes: Uint8Array, key: ImageStoreKey): Promise<string> {
        const reference = `memory://${encodeSegment(key.documentId)}/${imageFileName(key)}`;
        if (this.retainBytes) {
            this.images.set(reference, bytes);
        }
        return reference;
    }

    get(reference: string): Uint8Array | undefined {
        return this.images.get(reference);
    }

    get size(): number {
        return this.images.size;
    }

    clear(): void {
        this.images.clear();
    }
}
