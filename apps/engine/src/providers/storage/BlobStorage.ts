import { put } from '@vercel/blob';
import { classifyError } from '../../errors';
import { createLogger, errorMessage } from '../../logger';
import { ObjectStorage } from './ObjectStorage';

const logger = createLogger('blob-storage');

/**
 * Public object storage on Vercel Blob
 */
export class BlobStorage implements ObjectStorage {
    readonly name = 'Vercel Blob';

    constructor(private readonly token: string) {}

    isConfigured(): boolean {
        return !!this.token;
    }

    async upload(data: Buffer, destination: string, contentType: string): Promise<string> {
        logger.info('Uploading object', { destination, bytes: data.length });

        try {
            const blob = await put(destination, data, {
                access: 'public',
                contentType,
                addRandomSuffix: true,
                token: this.token,
            });
            logger.info('Object uploaded', { url: blob.url });
            return blob.url;
        } catch (error) {
            logger.error('Upload failed', { destination, error: errorMessage(error) });
            throw classifyError(error, 'Blob upload');
        }
    }
}

export default BlobStorage;
