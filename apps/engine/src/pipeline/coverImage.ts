/**
 * Cover Images
 *
 * Best-effort branch of the publish pipeline. Nothing here throws: any
 * failure is logged and the post goes out without a cover.
 */

import fs from 'fs';
import path from 'path';
import slugify from 'slugify';
import { createLogger, errorMessage } from '../logger';
import { AiProvider } from '../providers/ai/AiProvider';
import { COVER_IMAGE_PROMPT } from '../providers/ai/prompts';
import { ObjectStorage } from '../providers/storage/ObjectStorage';
import { RetryPolicy } from './retry';
import { Blog, Topic } from './types';

const logger = createLogger('cover-image');

export interface CoverImage {
    url: string;
    localPath: string;
}

export interface CoverImageSettings {
    enabled: boolean;
    tempDir: string;
}

function extensionFor(mimeType: string): string {
    return mimeType === 'image/jpeg' ? 'jpg' : 'png';
}

export class CoverImageService {
    constructor(
        private readonly ai: AiProvider,
        private readonly storage: ObjectStorage | null,
        private readonly retry: RetryPolicy,
        private readonly settings: CoverImageSettings
    ) {}

    isAvailable(): boolean {
        return this.settings.enabled && !!this.storage && this.storage.isConfigured();
    }

    /**
     * Generate, stage locally and upload a cover; null when skipped or failed
     */
    async create(blog: Blog, topic: Topic): Promise<CoverImage | null> {
        const storage = this.storage;
        if (!storage || !this.isAvailable()) {
            logger.debug('Cover images disabled or storage not configured');
            return null;
        }

        let localPath: string | null = null;
        try {
            const prompt = COVER_IMAGE_PROMPT(blog.title, topic.description, topic.keywords);
            const image = await this.retry.execute('cover image', () => this.ai.generateImage(prompt));
            if (!image) {
                logger.warn('No cover image generated', { blogId: blog.id });
                return null;
            }

            const ext = extensionFor(image.mimeType);
            await fs.promises.mkdir(this.settings.tempDir, { recursive: true });
            localPath = path.join(this.settings.tempDir, `${blog.id}.${ext}`);
            await fs.promises.writeFile(localPath, image.data);

            const slug = slugify(blog.title, { lower: true, strict: true }).slice(0, 80) || blog.id;
            const url = await this.retry.execute('cover upload', () =>
                storage.upload(image.data, `covers/${slug}.${ext}`, image.mimeType)
            );

            logger.info('Cover image ready', { blogId: blog.id, url });
            return { url, localPath };
        } catch (error) {
            logger.warn('Cover image branch failed, publishing without image', {
                blogId: blog.id,
                error: errorMessage(error),
            });
            if (localPath) {
                await this.removeFile(localPath);
            }
            return null;
        }
    }

    /**
     * Remove the staged local copy
     */
    async discard(image: CoverImage | null): Promise<void> {
        if (image) {
            await this.removeFile(image.localPath);
        }
    }

    private async removeFile(filePath: string): Promise<void> {
        try {
            await fs.promises.rm(filePath, { force: true });
            logger.debug('Temporary image removed', { filePath });
        } catch (error) {
            logger.warn('Could not remove temporary image', { filePath, error: errorMessage(error) });
        }
    }
}

export default CoverImageService;
