/**
 * Pipeline Orchestrator
 *
 * Runs the two jobs behind a per-job single-instance guard and records a
 * started entry plus exactly one completed or failed entry per run.
 */

import { EngineError, JobAlreadyRunningError } from '../errors';
import { createLogger, errorMessage } from '../logger';
import { Repository } from '../storage/Repository';
import { BlogPublisher } from './publish';
import { TopicGenerator } from './topicGenerator';
import { Clock, JobDetails, JobType, LogStatus, systemClock } from './types';

const logger = createLogger('orchestrator');

export type JobHandler = () => Promise<JobDetails>;

export interface JobRunState {
    running: boolean;
    lastRunAt: Date | null;
    lastStatus: LogStatus | null;
    lastError: string | null;
}

/**
 * Handlers for both job types
 */
export function createJobHandlers(
    topicGenerator: TopicGenerator,
    blogPublisher: BlogPublisher
): Record<JobType, JobHandler> {
    return {
        topic_generation: () => topicGenerator.run(),
        blog_publishing: () => blogPublisher.run(),
    };
}

export class JobRunner {
    private readonly running = new Set<JobType>();
    private readonly lastRuns = new Map<JobType, { at: Date; status: LogStatus; error: string | null }>();

    constructor(
        private readonly repo: Repository,
        private readonly handlers: Record<JobType, JobHandler>,
        private readonly clock: Clock = systemClock
    ) {}

    isRunning(jobType: JobType): boolean {
        return this.running.has(jobType);
    }

    state(jobType: JobType): JobRunState {
        const last = this.lastRuns.get(jobType);
        return {
            running: this.running.has(jobType),
            lastRunAt: last?.at ?? null,
            lastStatus: last?.status ?? null,
            lastError: last?.error ?? null,
        };
    }

    /**
     * Run a job to completion. Throws JobAlreadyRunningError when the same
     * job is in flight; job errors are logged and re-raised.
     */
    async run(jobType: JobType): Promise<JobDetails> {
        if (this.running.has(jobType)) {
            logger.warn('Job already running, skipping', { jobType });
            throw new JobAlreadyRunningError(jobType);
        }

        this.running.add(jobType);
        const startedAt = this.clock.now();
        logger.info('Job started', { jobType });

        try {
            await this.repo.appendLog(jobType, 'started', { startedAt: startedAt.toISOString() });

            const details = await this.handlers[jobType]();
            const summary: JobDetails = {
                ...details,
                executionTimeMs: this.clock.now().getTime() - startedAt.getTime(),
            };

            await this.repo.appendLog(jobType, 'completed', summary);
            this.lastRuns.set(jobType, { at: startedAt, status: 'completed', error: null });
            logger.info('Job completed', { jobType, executionTimeMs: summary.executionTimeMs });
            return summary;
        } catch (error) {
            const message = errorMessage(error);
            logger.error('Job failed', { jobType, error: message });
            this.lastRuns.set(jobType, { at: startedAt, status: 'failed', error: message });
            await this.recordFailure(jobType, error);
            throw error;
        } finally {
            this.running.delete(jobType);
        }
    }

    private async recordFailure(jobType: JobType, error: unknown): Promise<void> {
        const details: JobDetails = { error: errorMessage(error) };
        if (error instanceof EngineError) {
            details.kind = error.kind;
        }
        try {
            await this.repo.appendLog(jobType, 'failed', details);
        } catch (logError) {
            logger.error('Could not record job failure', { jobType, error: errorMessage(logError) });
        }
    }
}

export default JobRunner;
