/**
 * Seed Categories CLI
 *
 * Import categories from a JSON file.
 *
 * Usage: npm run seed -- [--file ./seeds/categories.json] [--reset]
 */

import fs from 'fs';
import path from 'path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import config from '../config';
import { createDatabase } from '../db';
import { createLogger, errorMessage } from '../logger';
import { PgRepository } from '../storage/repo';
import { categorySeedSchema, seedCategories } from '../storage/seed';

const logger = createLogger('seed-categories');

const DEFAULT_SEED_FILE = path.join(__dirname, '../../seeds/categories.json');

async function main(): Promise<void> {
    const argv = await yargs(hideBin(process.argv))
        .option('file', {
            alias: 'f',
            type: 'string',
            description: 'Path to JSON file with categories',
            default: DEFAULT_SEED_FILE,
        })
        .option('reset', {
            type: 'boolean',
            description: 'Re-activate existing categories and restore their descriptions',
            default: false,
        })
        .help()
        .parse();

    const filePath = path.resolve(argv.file);
    if (!fs.existsSync(filePath)) {
        logger.error('File not found', { filePath });
        throw new Error(`File not found: ${filePath}`);
    }

    const seeds = categorySeedSchema.parse(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
    logger.info(`Loaded ${seeds.length} categories`, { filePath });

    const db = createDatabase(config.database.url);
    try {
        const connected = await db.checkConnection();
        if (!connected) {
            throw new Error('Cannot connect to database');
        }

        const result = await seedCategories(new PgRepository(db), seeds, { reset: argv.reset });
        logger.info('Seed complete', {
            created: result.created.length,
            skipped: result.skipped.length,
            reset: result.reset.length,
        });
    } catch (error) {
        logger.error('Seed failed', { error: errorMessage(error) });
        throw error;
    } finally {
        await db.close();
    }
}

main()
    .then(() => process.exit(0))
    .catch(() => process.exit(1));
