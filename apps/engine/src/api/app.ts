/**
 * Management API
 *
 * Read access to categories, topics, blogs, logs and stats, category
 * administration, and manual job triggers.
 */

import { Hono } from 'hono';
import { JobRunner } from '../pipeline/orchestrator';
import { Clock } from '../pipeline/types';
import { JobScheduler } from '../scheduler/cron';
import { Repository } from '../storage/Repository';
import { errorHandler } from './errorHandler';
import { categoriesRoute } from './routes/categories';
import { contentRoute } from './routes/content';
import { health } from './routes/health';
import { jobsRoute } from './routes/jobs';
import { reportsRoute } from './routes/reports';

export interface ApiDeps {
    repo: Repository;
    runner: JobRunner;
    scheduler: JobScheduler;
    clock: Clock;
}

export function createApp(deps: ApiDeps): Hono {
    const app = new Hono();

    app.onError(errorHandler);
    app.notFound(c => c.json({ detail: 'Not found' }, 404));

    app.route('', health(deps));
    app.route('', categoriesRoute(deps));
    app.route('', contentRoute(deps));
    app.route('', jobsRoute(deps));
    app.route('', reportsRoute(deps));

    return app;
}

export default createApp;
