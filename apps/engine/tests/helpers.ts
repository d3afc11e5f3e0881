/**
 * In-process stand-ins for storage and external services
 */

import { v4 as uuid } from 'uuid';
import { AiProvider, GeneratedImage, GenerationOptions } from '../src/providers/ai/AiProvider';
import { PostSubmission, PublishedPost, Publisher } from '../src/providers/publishing/Publisher';
import { ObjectStorage } from '../src/providers/storage/ObjectStorage';
import { RetryPolicy } from '../src/pipeline/retry';
import { fingerprint } from '../src/pipeline/similarity';
import {
    Blog,
    BlogPublication,
    BlogStatus,
    Category,
    CategoryPatch,
    Clock,
    EngineStats,
    GenerationHistory,
    JobDetails,
    JobLog,
    JobType,
    LogStatus,
    NewBlog,
    NewCategory,
    NewTopic,
    Topic,
    TopicStatus,
} from '../src/pipeline/types';
import { ListOptions, LogQuery, Page, Repository } from '../src/storage/Repository';

// ============================================================================
// Clock and sleep
// ============================================================================

export class FixedClock implements Clock {
    constructor(private current: Date) {}

    now(): Date {
        return new Date(this.current.getTime());
    }

    set(date: Date): void {
        this.current = date;
    }
}

export function recordingSleep(): { delays: number[]; sleep: (ms: number) => Promise<void> } {
    const delays: number[] = [];
    return {
        delays,
        sleep: async (ms: number) => {
            delays.push(ms);
        },
    };
}

export function instantRetry(): RetryPolicy {
    return new RetryPolicy({ sleep: async () => undefined });
}

// ============================================================================
// Repository
// ============================================================================

function byTime<T>(key: (item: T) => Date, direction: 1 | -1 = 1) {
    return (a: T, b: T) => direction * (key(a).getTime() - key(b).getTime());
}

export class InMemoryRepository implements Repository {
    categories: Category[] = [];
    topics: Topic[] = [];
    history: GenerationHistory[] = [];
    blogs: Blog[] = [];
    logs: JobLog[] = [];
    pingError: Error | null = null;

    private tick = 0;

    constructor(private readonly base: Date = new Date('2026-01-01T00:00:00Z')) {}

    /** Monotonic creation timestamps */
    private stamp(): Date {
        this.tick++;
        return new Date(this.base.getTime() + this.tick * 1000);
    }

    async listCategories(options: { activeOnly?: boolean } = {}): Promise<Category[]> {
        return this.categories
            .filter(c => !options.activeOnly || c.isActive)
            .sort((a, b) => a.name.localeCompare(b.name));
    }

    async getCategory(id: string): Promise<Category | null> {
        return this.categories.find(c => c.id === id) ?? null;
    }

    async findCategoryByName(name: string): Promise<Category | null> {
        return this.categories.find(c => c.name === name) ?? null;
    }

    async createCategory(input: NewCategory): Promise<Category> {
        const now = this.stamp();
        const category: Category = {
            id: uuid(),
            name: input.name,
            description: input.description ?? null,
            isActive: input.isActive ?? true,
            lastUsedAt: null,
            usageCount: 0,
            createdAt: now,
            updatedAt: now,
        };
        this.categories.push(category);
        return category;
    }

    async updateCategory(id: string, patch: CategoryPatch): Promise<Category | null> {
        const category = this.categories.find(c => c.id === id);
        if (!category) {
            return null;
        }
        if (patch.name !== undefined) category.name = patch.name;
        if (patch.description !== undefined) category.description = patch.description;
        if (patch.isActive !== undefined) category.isActive = patch.isActive;
        category.updatedAt = this.stamp();
        return category;
    }

    async selectNextCategory(): Promise<Category | null> {
        const active = this.categories.filter(c => c.isActive);
        active.sort((a, b) => {
            if (a.lastUsedAt === null || b.lastUsedAt === null) {
                if (a.lastUsedAt !== b.lastUsedAt) {
                    return a.lastUsedAt === null ? -1 : 1;
                }
            } else if (a.lastUsedAt.getTime() !== b.lastUsedAt.getTime()) {
                return a.lastUsedAt.getTime() - b.lastUsedAt.getTime();
            }
            if (a.usageCount !== b.usageCount) {
                return a.usageCount - b.usageCount;
            }
            return a.createdAt.getTime() - b.createdAt.getTime();
        });
        return active[0] ?? null;
    }

    async listTopics(options: ListOptions<TopicStatus>): Promise<Topic[]> {
        return this.topics
            .filter(t => !options.status || t.status === options.status)
            .sort(byTime(t => t.createdAt, -1))
            .slice(0, options.limit);
    }

    async listUpcomingTopics(from: Date, until: Date): Promise<Topic[]> {
        return this.topics
            .filter(t => t.scheduledDate >= from && t.scheduledDate <= until)
            .sort(byTime(t => t.scheduledDate));
    }

    async getTopic(id: string): Promise<Topic | null> {
        return this.topics.find(t => t.id === id) ?? null;
    }

    async findPendingTopicFor(day: Date): Promise<Topic | null> {
        const matches = this.topics
            .filter(t => t.status === 'pending' && t.scheduledDate.getTime() === day.getTime())
            .sort(byTime(t => t.createdAt));
        return matches[0] ?? null;
    }

    async updateTopicStatus(id: string, status: TopicStatus): Promise<void> {
        const topic = this.topics.find(t => t.id === id);
        if (topic) {
            topic.status = status;
            topic.updatedAt = this.stamp();
        }
    }

    async listRecentTitles(categoryId: string, since: Date): Promise<string[]> {
        const corpus = [
            ...this.topics
                .filter(t => t.categoryId === categoryId && t.createdAt >= since)
                .map(t => ({ title: t.title, at: t.createdAt })),
            ...this.history
                .filter(h => h.categoryId === categoryId && h.generatedAt >= since)
                .map(h => ({ title: h.topicTitle, at: h.generatedAt })),
        ].sort(byTime(entry => entry.at));
        return [...new Set(corpus.map(entry => entry.title))];
    }

    async saveTopicBatch(categoryId: string, topics: NewTopic[], usedAt: Date): Promise<Topic[]> {
        const saved = topics.map(input => {
            const now = this.stamp();
            const topic: Topic = {
                id: uuid(),
                categoryId,
                title: input.title,
                description: input.description,
                keywords: input.keywords,
                status: 'pending',
                scheduledDate: input.scheduledDate,
                createdAt: now,
                updatedAt: now,
            };
            this.topics.push(topic);
            this.history.push({
                id: uuid(),
                categoryId,
                topicTitle: input.title,
                topicKeywords: input.keywords,
                topicHash: fingerprint(input.title),
                generatedAt: usedAt,
            });
            return topic;
        });

        const category = this.categories.find(c => c.id === categoryId);
        if (category) {
            category.lastUsedAt = usedAt;
            category.usageCount += 1;
        }
        return saved;
    }

    /** Seed a topic directly */
    addTopic(categoryId: string, fields: Partial<Topic> & { title: string; scheduledDate: Date }): Topic {
        const now = this.stamp();
        const topic: Topic = {
            id: uuid(),
            categoryId,
            description: 'A practical walkthrough',
            keywords: 'testing, automation',
            status: 'pending',
            createdAt: now,
            updatedAt: now,
            ...fields,
        };
        this.topics.push(topic);
        return topic;
    }

    async createBlog(input: NewBlog): Promise<Blog> {
        const now = this.stamp();
        const blog: Blog = {
            id: uuid(),
            ...input,
            status: 'draft',
            coverImageUrl: null,
            remotePostId: null,
            remoteUrl: null,
            publishedAt: null,
            createdAt: now,
            updatedAt: now,
        };
        this.blogs.push(blog);
        return { ...blog };
    }

    async getBlog(id: string): Promise<Blog | null> {
        const blog = this.blogs.find(b => b.id === id);
        return blog ? { ...blog } : null;
    }

    async listBlogs(options: ListOptions<BlogStatus>): Promise<Blog[]> {
        return this.blogs
            .filter(b => !options.status || b.status === options.status)
            .sort(byTime(b => b.createdAt, -1))
            .slice(0, options.limit);
    }

    async setBlogCoverImage(id: string, url: string): Promise<void> {
        this.patchBlog(id, { coverImageUrl: url });
    }

    async markBlogPublished(id: string, publication: BlogPublication): Promise<void> {
        this.patchBlog(id, { status: 'published', ...publication });
    }

    async markBlogDraft(id: string): Promise<void> {
        this.patchBlog(id, { status: 'draft' });
    }

    private patchBlog(id: string, patch: Partial<Blog>): void {
        const index = this.blogs.findIndex(b => b.id === id);
        if (index >= 0) {
            this.blogs[index] = { ...this.blogs[index], ...patch, updatedAt: this.stamp() };
        }
    }

    async appendLog(jobType: JobType, status: LogStatus, details: JobDetails): Promise<JobLog> {
        const log: JobLog = { id: uuid(), jobType, status, details, createdAt: this.stamp() };
        this.logs.push(log);
        return log;
    }

    async listLogs(query: LogQuery): Promise<Page<JobLog>> {
        const matching = this.logs
            .filter(l => !query.jobType || l.jobType === query.jobType)
            .sort(byTime(l => l.createdAt, -1));
        return {
            items: matching.slice(query.offset, query.offset + query.limit),
            total: matching.length,
        };
    }

    async getStats(): Promise<EngineStats> {
        return {
            totalCategories: this.categories.length,
            activeCategories: this.categories.filter(c => c.isActive).length,
            pendingTopics: this.topics.filter(t => t.status === 'pending').length,
            failedTopics: this.topics.filter(t => t.status === 'failed').length,
            publishedBlogs: this.blogs.filter(b => b.status === 'published').length,
            draftBlogs: this.blogs.filter(b => b.status === 'draft').length,
        };
    }

    async ping(): Promise<void> {
        if (this.pingError) {
            throw this.pingError;
        }
    }
}

// ============================================================================
// External services
// ============================================================================

type Scripted<T> = T | Error;

/**
 * Returns scripted responses in order; the last entry repeats
 */
export class ScriptedAiProvider implements AiProvider {
    readonly name = 'Scripted';
    readonly prompts: string[] = [];
    readonly options: Array<GenerationOptions | undefined> = [];
    imageRequests = 0;

    constructor(
        private readonly responses: Array<Scripted<string>>,
        private readonly images: Array<Scripted<GeneratedImage | null>> = [null]
    ) {}

    async complete(prompt: string, options?: GenerationOptions): Promise<string> {
        this.prompts.push(prompt);
        this.options.push(options);
        const next = this.responses[Math.min(this.prompts.length - 1, this.responses.length - 1)];
        if (next instanceof Error) {
            throw next;
        }
        return next;
    }

    async generateImage(): Promise<GeneratedImage | null> {
        this.imageRequests++;
        const next = this.images[Math.min(this.imageRequests - 1, this.images.length - 1)];
        if (next instanceof Error) {
            throw next;
        }
        return next;
    }

    isConfigured(): boolean {
        return true;
    }
}

export class FakePublisher implements Publisher {
    readonly name = 'FakeBlog';
    readonly submissions: PostSubmission[] = [];
    reachable = true;

    constructor(private readonly outcome: Scripted<PublishedPost> = { remoteId: 'post-1', remoteUrl: 'https://blog.test/post-1' }) {}

    async submit(post: PostSubmission): Promise<PublishedPost> {
        this.submissions.push(post);
        if (this.outcome instanceof Error) {
            throw this.outcome;
        }
        return this.outcome;
    }

    isConfigured(): boolean {
        return true;
    }

    async testConnection(): Promise<boolean> {
        return this.reachable;
    }
}

export class FakeStorage implements ObjectStorage {
    readonly name = 'FakeStorage';
    readonly uploads: Array<{ destination: string; contentType: string; bytes: number }> = [];

    constructor(private readonly failure: Error | null = null) {}

    async upload(data: Buffer, destination: string, contentType: string): Promise<string> {
        if (this.failure) {
            throw this.failure;
        }
        this.uploads.push({ destination, contentType, bytes: data.length });
        return `https://cdn.test/${destination}`;
    }

    isConfigured(): boolean {
        return true;
    }
}

// ============================================================================
// Article fixtures
// ============================================================================

function words(count: number): string {
    return `${Array(count).fill('insight').join(' ')}.`;
}

/**
 * Markdown body with a 50-word intro, three ## sections and one ### heading.
 * Word count is 54 + 3 * sectionWords.
 */
export function articleContent(sectionWords = 260): string {
    return [
        words(50),
        '',
        '## Overview',
        '',
        words(sectionWords),
        '',
        '### Detail',
        '',
        '## Practice',
        '',
        words(sectionWords),
        '',
        '## Summary',
        '',
        words(sectionWords),
    ].join('\n');
}

export const VALID_SEO_TITLE = 'Seo '.repeat(12).trim();
export const VALID_META_DESCRIPTION = 'Meta '.repeat(30).trim();

export function articlePayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
    return {
        title: 'Shipping Faster With Feature Flags',
        seo_title: VALID_SEO_TITLE,
        content: articleContent(),
        meta_description: VALID_META_DESCRIPTION,
        tags: ['DevOps', 'Feature Flags'],
        estimated_read_time: '7 min read',
        ...overrides,
    };
}

export function articleResponse(overrides: Record<string, unknown> = {}): string {
    return JSON.stringify(articlePayload(overrides));
}
