/**
 * Response shapes (snake_case on the wire)
 */

import { toDateKey } from '../pipeline/dates';
import { Blog, Category, JobLog, Topic } from '../pipeline/types';
import { ScheduledJobInfo } from '../scheduler/cron';

function iso(date: Date | null): string | null {
    return date ? date.toISOString() : null;
}

export function formatCategory(category: Category) {
    return {
        id: category.id,
        name: category.name,
        description: category.description,
        is_active: category.isActive,
        last_used_at: iso(category.lastUsedAt),
        usage_count: category.usageCount,
        created_at: category.createdAt.toISOString(),
        updated_at: category.updatedAt.toISOString(),
    };
}

export function formatTopic(topic: Topic) {
    return {
        id: topic.id,
        category_id: topic.categoryId,
        title: topic.title,
        description: topic.description,
        keywords: topic.keywords,
        status: topic.status,
        scheduled_date: toDateKey(topic.scheduledDate),
        created_at: topic.createdAt.toISOString(),
    };
}

export function formatBlog(blog: Blog) {
    return {
        id: blog.id,
        topic_id: blog.topicId,
        title: blog.title,
        seo_title: blog.seoTitle,
        meta_description: blog.metaDescription,
        tags: blog.tags,
        word_count: blog.wordCount,
        status: blog.status,
        cover_image_url: blog.coverImageUrl,
        remote_post_id: blog.remotePostId,
        remote_url: blog.remoteUrl,
        published_at: iso(blog.publishedAt),
        created_at: blog.createdAt.toISOString(),
    };
}

export function formatLog(log: JobLog) {
    return {
        id: log.id,
        job_type: log.jobType,
        status: log.status,
        details: log.details,
        created_at: log.createdAt.toISOString(),
    };
}

export function formatScheduledJob(job: ScheduledJobInfo) {
    return {
        id: job.id,
        name: job.name,
        schedule: job.schedule,
        timezone: job.timezone,
        running: job.running,
        last_run_at: iso(job.lastRunAt),
        last_status: job.lastStatus,
    };
}
