import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { createLogger, errorMessage } from './logger';

const logger = createLogger('db');

/**
 * Anything that can run a parameterised query: the pool or a transaction client
 */
export interface Queryable {
    query<T extends QueryResultRow = QueryResultRow>(
        text: string,
        params?: unknown[]
    ): Promise<QueryResult<T>>;
}

export interface Database extends Queryable {
    withTransaction<T>(callback: (client: Queryable) => Promise<T>): Promise<T>;
    checkConnection(): Promise<boolean>;
    close(): Promise<void>;
}

/**
 * Create a PostgreSQL connection pool with query helpers
 */
export function createDatabase(connectionString: string): Database {
    const pool = new Pool({
        connectionString,
        max: 10,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 5000,
    });

    // Log pool events
    pool.on('connect', () => {
        logger.debug('New database connection established');
    });

    pool.on('error', (err) => {
        logger.error('Unexpected database error', { error: err.message });
    });

    /**
     * Execute a query with automatic connection management
     */
    async function query<T extends QueryResultRow = QueryResultRow>(
        text: string,
        params?: unknown[]
    ): Promise<QueryResult<T>> {
        const start = Date.now();
        try {
            const result = await pool.query<T>(text, params);
            logger.debug('Query executed', {
                duration: `${Date.now() - start}ms`,
                rows: result.rowCount
            });
            return result;
        } catch (error) {
            logger.error('Query failed', {
                text: text.substring(0, 100),
                error: errorMessage(error)
            });
            throw error;
        }
    }

    /**
     * Execute a function within a transaction
     */
    async function withTransaction<T>(
        callback: (client: Queryable) => Promise<T>
    ): Promise<T> {
        const client: PoolClient = await pool.connect();
        const tx: Queryable = {
            query: <R extends QueryResultRow>(text: string, params?: unknown[]) =>
                client.query<R>(text, params),
        };
        try {
            await client.query('BEGIN');
            const result = await callback(tx);
            await client.query('COMMIT');
            return result;
        } catch (error) {
            await client.query('ROLLBACK');
            throw error;
        } finally {
            client.release();
        }
    }

    /**
     * Check database connectivity
     */
    async function checkConnection(): Promise<boolean> {
        try {
            await query('SELECT 1');
            logger.info('Database connection verified');
            return true;
        } catch (error) {
            logger.error('Database connection failed', { error: errorMessage(error) });
            return false;
        }
    }

    /**
     * Close all database connections
     */
    async function close(): Promise<void> {
        await pool.end();
        logger.info('Database pool closed');
    }

    return { query, withTransaction, checkConnection, close };
}

export default { createDatabase };
