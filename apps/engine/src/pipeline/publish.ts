/**
 * Publish Step (daily job)
 *
 * Takes today's pending topic through generation, storage as a draft,
 * the optional cover image and submission to the publishing platform.
 *
 * Topic states: pending -> in_progress -> completed | failed.
 * A generation failure leaves the topic in_progress for an operator to retry.
 * A submission failure keeps the blog as a draft and marks the topic failed.
 */

import { TerminalError } from '../errors';
import { createLogger, errorMessage } from '../logger';
import { PublishedPost, Publisher } from '../providers/publishing/Publisher';
import { Repository } from '../storage/Repository';
import { CoverImage, CoverImageService } from './coverImage';
import { startOfUtcDay, toDateKey } from './dates';
import { ContentGenerator } from './generate';
import { RetryPolicy } from './retry';
import { Blog, Clock, Topic } from './types';

const logger = createLogger('publish');

export interface BlogPublisherDeps {
    repo: Repository;
    generator: ContentGenerator;
    publisher: Publisher;
    coverImages: CoverImageService;
    retry: RetryPolicy;
    clock: Clock;
}

export type PublishOutcome =
    | { outcome: 'no_topic'; date: string }
    | {
        outcome: 'published';
        date: string;
        topicId: string;
        blogId: string;
        title: string;
        category: string;
        wordCount: number;
        remotePostId: string;
        remoteUrl: string;
        coverImageUrl: string | null;
    };

export class BlogPublisher {
    constructor(private readonly deps: BlogPublisherDeps) {}

    async run(): Promise<PublishOutcome> {
        const { repo, clock } = this.deps;
        const today = startOfUtcDay(clock.now());
        const date = toDateKey(today);

        const topic = await repo.findPendingTopicFor(today);
        if (!topic) {
            logger.info('No pending topic scheduled for today', { date });
            return { outcome: 'no_topic', date };
        }

        logger.info('Processing topic', { topicId: topic.id, title: topic.title, date });
        await repo.updateTopicStatus(topic.id, 'in_progress');

        const category = await repo.getCategory(topic.categoryId);
        if (!category) {
            throw new TerminalError(`Category ${topic.categoryId} for topic ${topic.id} not found`);
        }

        const article = await this.deps.generator.generate(topic, category);

        const draft = await repo.createBlog({
            topicId: topic.id,
            title: article.title,
            seoTitle: article.seoTitle,
            content: article.content,
            metaDescription: article.metaDescription,
            tags: article.tags,
            wordCount: article.wordCount,
        });
        logger.info('Draft stored', { blogId: draft.id, wordCount: draft.wordCount });

        const cover = await this.attachCover(draft, topic);

        const blog = (await repo.getBlog(draft.id)) ?? draft;
        let published: PublishedPost;
        try {
            published = await this.submit(blog, topic);
        } finally {
            await this.deps.coverImages.discard(cover);
        }

        return {
            outcome: 'published',
            date,
            topicId: topic.id,
            blogId: blog.id,
            title: blog.title,
            category: category.name,
            wordCount: blog.wordCount,
            remotePostId: published.remoteId,
            remoteUrl: published.remoteUrl,
            coverImageUrl: blog.coverImageUrl,
        };
    }

    /**
     * Image branch including the cover URL write; any failure means no cover
     */
    private async attachCover(draft: Blog, topic: Topic): Promise<CoverImage | null> {
        const { repo, coverImages } = this.deps;
        const cover = await coverImages.create(draft, topic);
        if (!cover) {
            return null;
        }

        try {
            await repo.setBlogCoverImage(draft.id, cover.url);
            return cover;
        } catch (error) {
            logger.warn('Could not store cover image URL, publishing without image', {
                blogId: draft.id,
                error: errorMessage(error),
            });
            await coverImages.discard(cover);
            return null;
        }
    }

    private async submit(blog: Blog, topic: Topic): Promise<PublishedPost> {
        const { repo, publisher, retry, clock } = this.deps;

        let published: PublishedPost;
        try {
            published = await retry.execute('publish', () =>
                publisher.submit({
                    title: blog.title,
                    seoTitle: blog.seoTitle,
                    contentMarkdown: blog.content,
                    tags: blog.tags,
                    metaDescription: blog.metaDescription,
                    coverImageUrl: blog.coverImageUrl,
                })
            );
        } catch (error) {
            logger.error('Publishing failed, keeping draft', {
                blogId: blog.id,
                topicId: topic.id,
                error: errorMessage(error),
            });
            await this.recordSubmissionFailure(blog, topic);
            throw new TerminalError(`Publishing to ${publisher.name} failed: ${errorMessage(error)}`, { cause: error });
        }

        await repo.markBlogPublished(blog.id, {
            remotePostId: published.remoteId,
            remoteUrl: published.remoteUrl,
            publishedAt: clock.now(),
        });
        await repo.updateTopicStatus(topic.id, 'completed');
        logger.info('Blog published', { blogId: blog.id, url: published.remoteUrl });
        return published;
    }

    // Status writes after a failed submission must not mask the submission error
    private async recordSubmissionFailure(blog: Blog, topic: Topic): Promise<void> {
        const { repo } = this.deps;
        const writes: Array<[string, () => Promise<void>]> = [
            ['blog draft', () => repo.markBlogDraft(blog.id)],
            ['topic failed', () => repo.updateTopicStatus(topic.id, 'failed')],
        ];

        for (const [step, write] of writes) {
            try {
                await write();
            } catch (error) {
                logger.error('Could not record publishing failure', {
                    step,
                    blogId: blog.id,
                    topicId: topic.id,
                    error: errorMessage(error),
                });
            }
        }
    }
}

export default BlogPublisher;
