/**
 * Composition root: builds the engine's object graph from configuration
 */

import { EngineConfig } from './config';
import { createLogger } from './logger';
import { Database, createDatabase } from './db';
import { createAiProvider } from './providers/ai';
import { NewsDataProvider } from './providers/news/NewsDataProvider';
import { HashnodePublisher } from './providers/publishing/HashnodePublisher';
import { Publisher } from './providers/publishing/Publisher';
import { BlobStorage } from './providers/storage/BlobStorage';
import { CoverImageService } from './pipeline/coverImage';
import { ContentGenerator } from './pipeline/generate';
import { JobRunner, createJobHandlers } from './pipeline/orchestrator';
import { BlogPublisher } from './pipeline/publish';
import { RetryPolicy } from './pipeline/retry';
import { TopicGenerator } from './pipeline/topicGenerator';
import { Clock, systemClock } from './pipeline/types';
import { JobScheduler } from './scheduler/cron';
import { PgRepository } from './storage/repo';
import { Repository } from './storage/Repository';

const logger = createLogger('container');

export interface Engine {
    db: Database;
    repo: Repository;
    publisher: Publisher;
    runner: JobRunner;
    scheduler: JobScheduler;
    clock: Clock;
}

export function createEngine(config: EngineConfig, clock: Clock = systemClock): Engine {
    const db = createDatabase(config.database.url);
    const repo = new PgRepository(db);
    const retry = new RetryPolicy();
    const ai = createAiProvider(config);

    const news = config.news.apiKey
        ? new NewsDataProvider({
            apiKey: config.news.apiKey,
            category: config.news.category,
            maxArticles: config.news.maxArticles,
            timeoutMs: config.ai.timeoutMs,
        })
        : null;

    const publisher = new HashnodePublisher({
        apiUrl: config.hashnode.apiUrl,
        token: config.hashnode.token,
        publicationId: config.hashnode.publicationId,
        timeoutMs: config.ai.timeoutMs,
    });

    const storage = config.images.blobToken ? new BlobStorage(config.images.blobToken) : null;

    const topicGenerator = new TopicGenerator(
        { repo, ai, news, retry, clock },
        {
            targetCount: config.topics.perRun,
            similarityThreshold: config.topics.similarityThreshold,
            lookbackDays: config.topics.lookbackDays,
            maxAttempts: 3,
            temperature: config.ai.temperature,
            maxTokens: config.ai.maxTokensTopics,
        }
    );

    const blogPublisher = new BlogPublisher({
        repo,
        generator: new ContentGenerator(ai, retry, {
            temperature: config.ai.temperature,
            maxTokens: config.ai.maxTokensBlog,
        }),
        publisher,
        coverImages: new CoverImageService(ai, storage, retry, {
            enabled: config.images.enabled,
            tempDir: config.images.tempDir,
        }),
        retry,
        clock,
    });

    const runner = new JobRunner(repo, createJobHandlers(topicGenerator, blogPublisher), clock);
    const scheduler = new JobScheduler(runner, {
        topicCron: config.scheduler.topicCron,
        publishCron: config.scheduler.publishCron,
        timezone: config.scheduler.timezone,
    });

    return { db, repo, publisher, runner, scheduler, clock };
}

/**
 * Probe the publishing platform at startup. An unreachable platform is only
 * a warning: today's run keeps the draft and fails the topic.
 */
export async function verifyPublisher(publisher: Publisher): Promise<boolean> {
    const reachable = await publisher.testConnection();
    if (!reachable) {
        logger.warn('Publishing platform unreachable, posts will stay as drafts until it recovers', {
            publisher: publisher.name,
        });
    }
    return reachable;
}

export default createEngine;
