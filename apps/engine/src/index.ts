import type { ServerType } from '@hono/node-server';
import config, { validateConfig } from './config';
import { createApp } from './api/app';
import { startServer, stopServer } from './api/server';
import { Engine, createEngine, verifyPublisher } from './container';
import { createLogger, errorMessage } from './logger';
import { runMigrations } from './storage/migrate';

const logger = createLogger('main');

let engine: Engine | null = null;
let server: ServerType | null = null;

/**
 * Graceful shutdown handler
 */
async function shutdown(signal: string): Promise<void> {
    logger.info(`Received ${signal}, shutting down...`);

    try {
        engine?.scheduler.stop();
        if (server) {
            await stopServer(server);
        }
        await engine?.db.close();
        logger.info('Shutdown complete');
        process.exit(0);
    } catch (error) {
        logger.error('Shutdown failed', { error: errorMessage(error) });
        process.exit(1);
    }
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
    logger.info('Blog automation engine starting...', {
        nodeEnv: config.nodeEnv,
        aiProvider: config.ai.provider,
        topicsPerRun: config.topics.perRun,
    });

    try {
        validateConfig();
        logger.info('Configuration validated');

        engine = createEngine(config);

        const dbConnected = await engine.db.checkConnection();
        if (!dbConnected) {
            throw new Error('Failed to connect to database');
        }
        await runMigrations(engine.db);
        await verifyPublisher(engine.publisher);

        if (config.scheduler.enabled) {
            engine.scheduler.start();
        } else {
            logger.info('Scheduler disabled by configuration');
        }

        server = startServer(createApp(engine), config.api.port);

        logger.info('Engine is running. Press Ctrl+C to stop.');
    } catch (error) {
        logger.error('Startup failed', { error: errorMessage(error) });
        process.exit(1);
    }
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', { error: error.message, stack: error.stack });
    process.exit(1);
});

process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', { reason: errorMessage(reason) });
    process.exit(1);
});

void main();
