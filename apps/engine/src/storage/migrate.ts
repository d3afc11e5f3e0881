/**
 * Database Migration Runner
 */

import fs from 'fs';
import path from 'path';
import config from '../config';
import { Database, createDatabase } from '../db';
import { createLogger, errorMessage } from '../logger';

const logger = createLogger('migrate');

const MIGRATIONS_DIR = path.join(__dirname, 'migrations');

/**
 * Apply every .sql file in the migrations directory that has not run yet
 */
export async function runMigrations(db: Database, migrationsDir = MIGRATIONS_DIR): Promise<string[]> {
    logger.info('Running database migrations');

    // Create migrations tracking table
    await db.query(`
      CREATE TABLE IF NOT EXISTS _migrations (
        id SERIAL PRIMARY KEY,
        name VARCHAR(255) UNIQUE NOT NULL,
        applied_at TIMESTAMP WITH TIME ZONE DEFAULT CURRENT_TIMESTAMP
      )
    `);

    if (!fs.existsSync(migrationsDir)) {
        logger.info('No migrations directory found, skipping');
        return [];
    }

    const files = fs.readdirSync(migrationsDir)
        .filter(f => f.endsWith('.sql'))
        .sort();

    const applied: string[] = [];
    for (const file of files) {
        const result = await db.query(
            `SELECT id FROM _migrations WHERE name = $1`,
            [file]
        );

        if (result.rows.length > 0) {
            logger.debug('Migration already applied', { file });
            continue;
        }

        const sql = fs.readFileSync(path.join(migrationsDir, file), 'utf-8');

        logger.info('Applying migration', { file });
        await db.withTransaction(async (client) => {
            await client.query(sql);
            await client.query(`INSERT INTO _migrations (name) VALUES ($1)`, [file]);
        });
        applied.push(file);
    }

    logger.info('All migrations completed', { applied: applied.length });
    return applied;
}

async function main(): Promise<void> {
    const db = createDatabase(config.database.url);
    try {
        const connected = await db.checkConnection();
        if (!connected) {
            throw new Error('Cannot connect to database');
        }
        await runMigrations(db);
    } catch (error) {
        logger.error('Migration failed', { error: errorMessage(error) });
        throw error;
    } finally {
        await db.close();
    }
}

// Run if called directly
if (require.main === module) {
    main()
        .then(() => process.exit(0))
        .catch(() => process.exit(1));
}
