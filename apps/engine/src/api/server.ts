import { serve, type ServerType } from '@hono/node-server';
import type { Hono } from 'hono';
import { createLogger } from '../logger';

const logger = createLogger('api');

/**
 * Serve the management API on the given port
 */
export function startServer(app: Hono, port: number): ServerType {
    const server = serve({ fetch: app.fetch, port }, (info) => {
        logger.info('Management API listening', { port: info.port });
    });
    return server;
}

/**
 * Stop accepting connections and wait for open ones to finish
 */
export function stopServer(server: ServerType): Promise<void> {
    return new Promise((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
    });
}
