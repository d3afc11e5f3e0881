import { Hono } from 'hono';
import { createLogger, errorMessage } from '../../logger';
import type { ApiDeps } from '../app';

const logger = createLogger('api');

export function health({ repo }: ApiDeps): Hono {
    const route = new Hono();

    route.get('/health', async (c) => {
        try {
            await repo.ping();
            return c.json({ status: 'healthy', database: 'connected' });
        } catch (error) {
            logger.warn('Health check failed', { error: errorMessage(error) });
            return c.json({ status: 'unhealthy', database: 'disconnected' }, 503);
        }
    });

    return route;
}
