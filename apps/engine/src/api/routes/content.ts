import { Hono } from 'hono';
import { z } from 'zod';
import { addDays, startOfUtcDay } from '../../pipeline/dates';
import { BLOG_STATUSES, TOPIC_STATUSES } from '../../pipeline/types';
import type { ApiDeps } from '../app';
import { formatBlog, formatCategory, formatTopic } from '../format';
import { parseQuery, uuidParam } from '../validation';

const limit = z.coerce.number().int().min(1).max(500).default(50);

const topicsQuerySchema = z.object({
    status: z.enum(TOPIC_STATUSES).optional(),
    limit,
});

const upcomingQuerySchema = z.object({
    days: z.coerce.number().int().min(1).max(90).default(7),
});

const blogsQuerySchema = z.object({
    status: z.enum(BLOG_STATUSES).optional(),
    limit,
});

export function contentRoute({ repo, clock }: ApiDeps): Hono {
    const route = new Hono();

    // GET /topics
    route.get('/topics', async (c) => {
        const query = parseQuery(c, topicsQuerySchema);
        const topics = await repo.listTopics({ status: query.status, limit: query.limit });
        return c.json(topics.map(formatTopic));
    });

    // GET /topics/upcoming (scheduled from today through the next `days` days)
    route.get('/topics/upcoming', async (c) => {
        const { days } = parseQuery(c, upcomingQuerySchema);
        const today = startOfUtcDay(clock.now());
        const topics = await repo.listUpcomingTopics(today, addDays(today, days));
        return c.json(topics.map(formatTopic));
    });

    // GET /blogs
    route.get('/blogs', async (c) => {
        const query = parseQuery(c, blogsQuerySchema);
        const blogs = await repo.listBlogs({ status: query.status, limit: query.limit });
        return c.json(blogs.map(formatBlog));
    });

    // GET /blogs/:id
    route.get('/blogs/:id', async (c) => {
        const id = c.req.param('id');
        const blog = uuidParam.safeParse(id).success ? await repo.getBlog(id) : null;
        if (!blog) {
            return c.json({ detail: 'Blog not found' }, 404);
        }

        const topic = await repo.getTopic(blog.topicId);
        const category = topic ? await repo.getCategory(topic.categoryId) : null;

        return c.json({
            ...formatBlog(blog),
            content: blog.content,
            topic: topic ? formatTopic(topic) : null,
            category: category ? formatCategory(category) : null,
        });
    });

    return route;
}
