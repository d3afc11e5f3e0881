/**
 * Run Once CLI
 *
 * Run one or both jobs immediately through the job runner.
 *
 * Usage: npm run run:once -- --job topics|publish|all
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import config, { validateConfig } from '../config';
import { createEngine, verifyPublisher } from '../container';
import { createLogger, errorMessage } from '../logger';
import { JobType } from '../pipeline/types';

const logger = createLogger('run-once');

const JOB_CHOICES = ['topics', 'publish', 'all'] as const;

function jobsFor(choice: string): JobType[] {
    switch (choice) {
        case 'topics':
            return ['topic_generation'];
        case 'publish':
            return ['blog_publishing'];
        default:
            return ['topic_generation', 'blog_publishing'];
    }
}

async function main(): Promise<void> {
    const argv = await yargs(hideBin(process.argv))
        .option('job', {
            alias: 'j',
            choices: JOB_CHOICES,
            description: 'Which job to run',
            default: 'all',
        })
        .help()
        .parse();

    validateConfig();
    const engine = createEngine(config);

    try {
        const connected = await engine.db.checkConnection();
        if (!connected) {
            throw new Error('Cannot connect to database');
        }

        const jobs = jobsFor(argv.job);
        if (jobs.includes('blog_publishing')) {
            await verifyPublisher(engine.publisher);
        }

        for (const jobType of jobs) {
            const details = await engine.runner.run(jobType);
            logger.info('Job finished', { jobType, details });
        }

        const stats = await engine.repo.getStats();
        logger.info('Current stats', { ...stats });
    } catch (error) {
        logger.error('Run failed', { error: errorMessage(error) });
        throw error;
    } finally {
        await engine.db.close();
    }
}

main()
    .then(() => process.exit(0))
    .catch(() => process.exit(1));
