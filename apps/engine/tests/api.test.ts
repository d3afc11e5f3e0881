/**
 * Tests for the management API
 */

import { createApp } from '../src/api/app';
import { TerminalError } from '../src/errors';
import { JobHandler, JobRunner } from '../src/pipeline/orchestrator';
import { JobDetails, JobType } from '../src/pipeline/types';
import { JobScheduler } from '../src/scheduler/cron';
import { FixedClock, InMemoryRepository, articleContent } from './helpers';

const NOW = new Date('2026-03-02T06:00:00Z');

function build(overrides: Partial<Record<JobType, JobHandler>> = {}) {
    const repo = new InMemoryRepository();
    const clock = new FixedClock(NOW);
    const runner = new JobRunner(repo, {
        topic_generation: async () => ({ topicsGenerated: 7 }),
        blog_publishing: async () => ({ outcome: 'no_topic', date: '2026-03-02' }),
        ...overrides,
    }, clock);
    const scheduler = new JobScheduler(runner, { topicCron: '0 6 * * 1', publishCron: '0 9 * * *', timezone: 'UTC' });
    const app = createApp({ repo, runner, scheduler, clock });
    return { app, repo, runner };
}

function json(body: unknown, method = 'POST'): RequestInit {
    return { method, body: JSON.stringify(body), headers: { 'Content-Type': 'application/json' } };
}

describe('GET /health', () => {
    it('should report a reachable database', async () => {
        const { app } = build();
        const res = await app.request('/health');

        expect(res.status).toBe(200);
        expect(await res.json()).toEqual({ status: 'healthy', database: 'connected' });
    });

    it('should return 503 when the database is unreachable', async () => {
        const { app, repo } = build();
        repo.pingError = new Error('connection refused');

        const res = await app.request('/health');
        expect(res.status).toBe(503);
        expect(await res.json()).toEqual({ status: 'unhealthy', database: 'disconnected' });
    });
});

describe('categories', () => {
    it('should create a category', async () => {
        const { app, repo } = build();
        const res = await app.request('/categories', json({ name: 'Edge Computing', description: 'CDN workers' }));

        expect(res.status).toBe(201);
        expect(await res.json()).toMatchObject({
            name: 'Edge Computing',
            description: 'CDN workers',
            is_active: true,
            usage_count: 0,
            last_used_at: null,
        });
        expect(repo.categories).toHaveLength(1);
    });

    it('should reject a duplicate name', async () => {
        const { app, repo } = build();
        await repo.createCategory({ name: 'DevOps' });

        const res = await app.request('/categories', json({ name: 'DevOps' }));
        expect(res.status).toBe(409);
        expect(await res.json()).toEqual({ detail: 'Category "DevOps" already exists' });
    });

    it('should validate the body', async () => {
        const { app } = build();

        expect((await app.request('/categories', json({ name: '' }))).status).toBe(422);

        const res = await app.request('/categories', { method: 'POST', body: 'name=DevOps' });
        expect(res.status).toBe(400);
        expect(await res.json()).toEqual({ detail: 'Request body must be valid JSON' });
    });

    it('should filter active categories', async () => {
        const { app, repo } = build();
        await repo.createCategory({ name: 'DevOps' });
        await repo.createCategory({ name: 'Blockchain', isActive: false });
        await repo.createCategory({ name: 'Cloud Computing' });

        const all = await app.request('/categories');
        const active = await app.request('/categories?active_only=true');

        expect(await all.json()).toHaveLength(3);
        expect(await active.json()).toMatchObject([{ name: 'Cloud Computing' }, { name: 'DevOps' }]);
    });

    it('should update a category', async () => {
        const { app, repo } = build();
        const category = await repo.createCategory({ name: 'DevOps' });

        const res = await app.request(`/categories/${category.id}`, json({ is_active: false }, 'PATCH'));

        expect(res.status).toBe(200);
        expect(await res.json()).toMatchObject({ id: category.id, is_active: false });
        expect(category.isActive).toBe(false);
    });

    it('should return 404 for an unknown category', async () => {
        const { app } = build();

        const unknown = await app.request('/categories/7d3f2a40-51c4-4a8e-9a63-0b7b8e1f2c11', json({ is_active: false }, 'PATCH'));
        const malformed = await app.request('/categories/not-an-id', json({ is_active: false }, 'PATCH'));

        expect(unknown.status).toBe(404);
        expect(malformed.status).toBe(404);
        expect(await unknown.json()).toEqual({ detail: 'Category not found' });
    });
});

describe('topics and blogs', () => {
    async function seed(repo: InMemoryRepository) {
        const category = await repo.createCategory({ name: 'Cloud Computing' });
        const today = repo.addTopic(category.id, { title: 'Topic today', scheduledDate: new Date('2026-03-02T00:00:00Z'), status: 'completed' });
        repo.addTopic(category.id, { title: 'Topic in two days', scheduledDate: new Date('2026-03-04T00:00:00Z') });
        repo.addTopic(category.id, { title: 'Topic next week', scheduledDate: new Date('2026-03-09T00:00:00Z') });
        const blog = await repo.createBlog({
            topicId: today.id,
            title: 'Topic today',
            seoTitle: 'Topic today, explained',
            content: articleContent(),
            metaDescription: 'About today',
            tags: ['cloud'],
            wordCount: 834,
        });
        return { category, today, blog };
    }

    it('should list topics by status with a limit', async () => {
        const { app, repo } = build();
        await seed(repo);

        const pending = await app.request('/topics?status=pending&limit=1');
        expect(await pending.json()).toMatchObject([{ title: 'Topic next week', status: 'pending' }]);

        expect((await app.request('/topics?status=archived')).status).toBe(422);
    });

    it('should list upcoming topics for the requested days', async () => {
        const { app, repo } = build();
        await seed(repo);

        const res = await app.request('/topics/upcoming?days=2');
        expect(await res.json()).toMatchObject([
            { title: 'Topic today', scheduled_date: '2026-03-02' },
            { title: 'Topic in two days', scheduled_date: '2026-03-04' },
        ]);
    });

    it('should return a blog with its topic and category', async () => {
        const { app, repo } = build();
        const { blog, category, today } = await seed(repo);

        const res = await app.request(`/blogs/${blog.id}`);

        expect(res.status).toBe(200);
        expect(await res.json()).toMatchObject({
            id: blog.id,
            status: 'draft',
            content: articleContent(),
            topic: { id: today.id, title: 'Topic today' },
            category: { id: category.id, name: 'Cloud Computing' },
        });
    });

    it('should return 404 for an unknown blog', async () => {
        const { app } = build();
        const res = await app.request('/blogs/7d3f2a40-51c4-4a8e-9a63-0b7b8e1f2c11');

        expect(res.status).toBe(404);
        expect(await res.json()).toEqual({ detail: 'Blog not found' });
    });

    it('should list blogs by status', async () => {
        const { app, repo } = build();
        await seed(repo);

        expect(await (await app.request('/blogs?status=draft')).json()).toHaveLength(1);
        expect(await (await app.request('/blogs?status=published')).json()).toHaveLength(0);
    });
});

describe('jobs', () => {
    it('should run topic generation synchronously', async () => {
        const { app } = build();
        const res = await app.request('/jobs/generate-topics', { method: 'POST' });

        expect(res.status).toBe(200);
        expect(await res.json()).toEqual({
            status: 'completed',
            job_type: 'topic_generation',
            details: { topicsGenerated: 7, executionTimeMs: 0 },
        });
    });

    it('should return 409 while the job is running', async () => {
        let release: (details: JobDetails) => void = () => undefined;
        const gate = new Promise<JobDetails>(resolve => {
            release = resolve;
        });
        const { app, runner } = build({ blog_publishing: () => gate });

        const inFlight = runner.run('blog_publishing');
        const res = await app.request('/jobs/publish-blog', { method: 'POST' });

        expect(res.status).toBe(409);
        expect(await res.json()).toEqual({ detail: 'Job blog_publishing is already running' });

        release({});
        await inFlight;
    });

    it('should report a failed job', async () => {
        const { app } = build({
            blog_publishing: async () => {
                throw new TerminalError('Publishing to Hashnode failed: rejected');
            },
        });

        const res = await app.request('/jobs/publish-blog', { method: 'POST' });
        expect(res.status).toBe(500);
        expect(await res.json()).toEqual({ detail: 'Publishing to Hashnode failed: rejected', kind: 'terminal' });
    });

    it('should list scheduled jobs', async () => {
        const { app } = build();
        const res = await app.request('/scheduler/jobs');

        expect(await res.json()).toMatchObject([
            { id: 'topic_generation', schedule: '0 6 * * 1', running: false, last_run_at: null },
            { id: 'blog_publishing', schedule: '0 9 * * *', running: false, last_run_at: null },
        ]);
    });

    it('should accept a manual trigger', async () => {
        const { app, repo } = build();
        const res = await app.request('/scheduler/run/topic_generation', { method: 'POST' });

        expect(res.status).toBe(202);
        expect(await res.json()).toEqual({ status: 'accepted', job_id: 'topic_generation' });

        await new Promise(resolve => setImmediate(resolve));
        expect(repo.logs.map(log => log.status)).toEqual(['started', 'completed']);
    });

    it('should return 404 for an unknown job id', async () => {
        const { app } = build();
        const res = await app.request('/scheduler/run/cleanup', { method: 'POST' });

        expect(res.status).toBe(404);
        expect(await res.json()).toEqual({ detail: 'Job cleanup not found' });
    });
});

describe('stats and logs', () => {
    it('should report counts', async () => {
        const { app, repo } = build();
        await repo.createCategory({ name: 'DevOps' });
        await repo.createCategory({ name: 'Blockchain', isActive: false });

        const res = await app.request('/stats');
        expect(await res.json()).toEqual({
            total_categories: 2,
            active_categories: 1,
            pending_topics: 0,
            failed_topics: 0,
            published_blogs: 0,
            draft_blogs: 0,
        });
    });

    it('should page through logs newest first', async () => {
        const { app, repo } = build();
        await repo.appendLog('topic_generation', 'started', {});
        await repo.appendLog('topic_generation', 'completed', { topicsGenerated: 7 });
        await repo.appendLog('blog_publishing', 'started', {});

        const res = await app.request('/logs?job_type=topic_generation&page=2&limit=1');
        expect(await res.json()).toMatchObject({
            items: [{ job_type: 'topic_generation', status: 'started' }],
            total: 2,
            page: 2,
            limit: 1,
        });
    });

    it('should return 404 for unknown routes', async () => {
        const { app } = build();
        const res = await app.request('/nowhere');

        expect(res.status).toBe(404);
        expect(await res.json()).toEqual({ detail: 'Not found' });
    });
});
