import cron, { ScheduledTask } from 'node-cron';
import { JobAlreadyRunningError } from '../errors';
import { createLogger, errorMessage } from '../logger';
import { JobRunner } from '../pipeline/orchestrator';
import { JOB_TYPES, JobType, LogStatus } from '../pipeline/types';

const logger = createLogger('scheduler');

export interface ScheduleSettings {
    topicCron: string;
    publishCron: string;
    timezone: string;
}

export interface ScheduledJobInfo {
    id: JobType;
    name: string;
    schedule: string;
    timezone: string;
    running: boolean;
    lastRunAt: Date | null;
    lastStatus: LogStatus | null;
}

const JOB_NAMES: Record<JobType, string> = {
    topic_generation: 'Weekly topic generation',
    blog_publishing: 'Daily blog publishing',
};

export function isJobType(value: string): value is JobType {
    return JOB_TYPES.some(jobType => jobType === value);
}

export class UnknownJobError extends Error {
    constructor(readonly jobId: string) {
        super(`Job ${jobId} not found`);
        this.name = 'UnknownJobError';
    }
}

export class JobScheduler {
    private tasks: ScheduledTask[] = [];

    constructor(
        private readonly runner: JobRunner,
        private readonly settings: ScheduleSettings
    ) {
        for (const jobType of JOB_TYPES) {
            const schedule = this.scheduleFor(jobType);
            if (!cron.validate(schedule)) {
                throw new Error(`Invalid cron schedule for ${jobType}: ${schedule}`);
            }
        }
    }

    /**
     * Register both jobs with node-cron
     */
    start(): void {
        if (this.tasks.length > 0) {
            return;
        }

        for (const jobType of JOB_TYPES) {
            const schedule = this.scheduleFor(jobType);
            const task = cron.schedule(schedule, () => this.fire(jobType), {
                scheduled: true,
                timezone: this.settings.timezone,
            });
            this.tasks.push(task);
            logger.info('Job scheduled', { jobType, schedule, timezone: this.settings.timezone });
        }
    }

    stop(): void {
        for (const task of this.tasks) {
            task.stop();
        }
        if (this.tasks.length > 0) {
            logger.info('Scheduler stopped');
        }
        this.tasks = [];
    }

    listJobs(): ScheduledJobInfo[] {
        return JOB_TYPES.map(jobType => {
            const state = this.runner.state(jobType);
            return {
                id: jobType,
                name: JOB_NAMES[jobType],
                schedule: this.scheduleFor(jobType),
                timezone: this.settings.timezone,
                running: state.running,
                lastRunAt: state.lastRunAt,
                lastStatus: state.lastStatus,
            };
        });
    }

    /**
     * Start a job in the background. Throws UnknownJobError for an unknown id
     * and JobAlreadyRunningError when the job is in flight.
     */
    trigger(jobId: string): JobType {
        if (!isJobType(jobId)) {
            throw new UnknownJobError(jobId);
        }
        if (this.runner.isRunning(jobId)) {
            throw new JobAlreadyRunningError(jobId);
        }

        logger.info('Manual job trigger', { jobType: jobId });
        this.fire(jobId);
        return jobId;
    }

    private scheduleFor(jobType: JobType): string {
        return jobType === 'topic_generation' ? this.settings.topicCron : this.settings.publishCron;
    }

    private fire(jobType: JobType): void {
        this.runner.run(jobType).catch((error: unknown) => {
            if (error instanceof JobAlreadyRunningError) {
                logger.warn('Previous run still in progress, skipping', { jobType });
                return;
            }
            logger.error('Scheduled job failed', { jobType, error: errorMessage(error) });
        });
    }
}

export default JobScheduler;
