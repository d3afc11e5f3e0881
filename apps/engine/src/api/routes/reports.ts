import { Hono } from 'hono';
import { z } from 'zod';
import { JOB_TYPES } from '../../pipeline/types';
import type { ApiDeps } from '../app';
import { formatLog } from '../format';
import { parseQuery } from '../validation';

const logsQuerySchema = z.object({
    job_type: z.enum(JOB_TYPES).optional(),
    page: z.coerce.number().int().min(1).default(1),
    limit: z.coerce.number().int().min(1).max(200).default(50),
});

export function reportsRoute({ repo }: ApiDeps): Hono {
    const route = new Hono();

    // GET /stats
    route.get('/stats', async (c) => {
        const stats = await repo.getStats();
        return c.json({
            total_categories: stats.totalCategories,
            active_categories: stats.activeCategories,
            pending_topics: stats.pendingTopics,
            failed_topics: stats.failedTopics,
            published_blogs: stats.publishedBlogs,
            draft_blogs: stats.draftBlogs,
        });
    });

    // GET /logs
    route.get('/logs', async (c) => {
        const query = parseQuery(c, logsQuerySchema);
        const { items, total } = await repo.listLogs({
            jobType: query.job_type,
            limit: query.limit,
            offset: (query.page - 1) * query.limit,
        });
        return c.json({
            items: items.map(formatLog),
            total,
            page: query.page,
            limit: query.limit,
        });
    });

    return route;
}
