import { Hono } from 'hono';
import type { ApiDeps } from '../app';
import { formatScheduledJob } from '../format';

export function jobsRoute({ runner, scheduler }: ApiDeps): Hono {
    const route = new Hono();

    // POST /jobs/generate-topics (runs to completion)
    route.post('/jobs/generate-topics', async (c) => {
        const details = await runner.run('topic_generation');
        return c.json({ status: 'completed', job_type: 'topic_generation', details });
    });

    // POST /jobs/publish-blog (runs to completion)
    route.post('/jobs/publish-blog', async (c) => {
        const details = await runner.run('blog_publishing');
        return c.json({ status: 'completed', job_type: 'blog_publishing', details });
    });

    // GET /scheduler/jobs
    route.get('/scheduler/jobs', (c) => c.json(scheduler.listJobs().map(formatScheduledJob)));

    // POST /scheduler/run/:jobId (starts in the background)
    route.post('/scheduler/run/:jobId', (c) => {
        const jobType = scheduler.trigger(c.req.param('jobId'));
        return c.json({ status: 'accepted', job_id: jobType }, 202);
    });

    return route;
}
