import * as fs from 'fs/promises';
import * as path from 'path';
import type { IImageStore, ImageStoreKey } from '../../types/image.types.js';
import { STORAGE_DEFAULTS } from '../../config/constants.js';
import type { Logger } from '../../utils/logger.js';
import { imageFileName, encodeSegment } from './image-key.js';

/**
 * Writes images to `<baseDir>/extracted_images/<documentId>/page<n>_img<i>.<ext>`
 */
export class LocalImageStore implements IImageStore {
    constructor(
        private readonly baseDir: string,
        private readonly logger: Logger
    ) { }

    async put(bytes: Uint8Array, key: ImageStoreKey): Promise<string> {
        const dir = path.join(this.baseDir, STORAGE_DEFAULTS.IMAGE_DIR, encodeSegment(key.documentId));
        const filePath = path.join(dir, imageFileName(key));

        await fs.mkdir(dir, { recursive: true });
        await fs.writeFile(filePath, bytes);

        this.logger.debug('Image written', {
            documentId: key.documentId,
            pageNumber: key.pageNumber,
            path: filePath,
        });

        return filePath;
    }
}
