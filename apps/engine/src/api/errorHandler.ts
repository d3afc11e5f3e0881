import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { EngineError, JobAlreadyRunningError } from '../errors';
import { createLogger } from '../logger';
import { UnknownJobError } from '../scheduler/cron';

const logger = createLogger('api');

/**
 * PostgreSQL error code of a pg driver error, if any
 */
export function getPgErrorCode(err: unknown): string | undefined {
    if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
        return err.code;
    }
    return undefined;
}

/**
 * Render every error as `{ detail }`
 */
export function errorHandler(err: Error, c: Context): Response {
    if (err instanceof HTTPException) {
        return c.json({ detail: err.message }, err.status);
    }

    if (err instanceof JobAlreadyRunningError) {
        return c.json({ detail: err.message }, 409);
    }

    if (err instanceof UnknownJobError) {
        return c.json({ detail: err.message }, 404);
    }

    if (getPgErrorCode(err) === '23505') {
        return c.json({ detail: 'Resource conflict' }, 409);
    }

    if (err instanceof EngineError) {
        logger.error('Job error', { kind: err.kind, error: err.message });
        return c.json({ detail: err.message, kind: err.kind }, 500);
    }

    logger.error('Unhandled error', { error: err.message, stack: err.stack });
    return c.json({ detail: 'Internal server error' }, 500);
}
