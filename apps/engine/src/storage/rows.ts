/**
 * Row schemas
 *
 * Every row read from PostgreSQL is parsed into its typed record here.
 * Column lists alias snake_case columns to the camelCase record fields.
 */

import { z } from 'zod';
import {
    BLOG_STATUSES,
    Blog,
    Category,
    EngineStats,
    JOB_TYPES,
    JobLog,
    LOG_STATUSES,
    TOPIC_STATUSES,
    Topic,
} from '../pipeline/types';

export const CATEGORY_COLUMNS = `id, name, description, is_active AS "isActive",
    last_used_at AS "lastUsedAt", usage_count AS "usageCount",
    created_at AS "createdAt", updated_at AS "updatedAt"`;

export const TOPIC_COLUMNS = `id, category_id AS "categoryId", title, description, keywords, status,
    scheduled_date AS "scheduledDate", created_at AS "createdAt", updated_at AS "updatedAt"`;

export const BLOG_COLUMNS = `id, topic_id AS "topicId", title, seo_title AS "seoTitle", content,
    meta_description AS "metaDescription", tags, word_count AS "wordCount", status,
    cover_image_url AS "coverImageUrl", remote_post_id AS "remotePostId", remote_url AS "remoteUrl",
    published_at AS "publishedAt", created_at AS "createdAt", updated_at AS "updatedAt"`;

export const LOG_COLUMNS = `id, job_type AS "jobType", status, details, created_at AS "createdAt"`;

const categoryRow = z.object({
    id: z.string(),
    name: z.string(),
    description: z.string().nullable(),
    isActive: z.boolean(),
    lastUsedAt: z.date().nullable(),
    usageCount: z.number().int(),
    createdAt: z.date(),
    updatedAt: z.date(),
});

const topicRow = z.object({
    id: z.string(),
    categoryId: z.string(),
    title: z.string(),
    description: z.string(),
    keywords: z.string(),
    status: z.enum(TOPIC_STATUSES),
    scheduledDate: z.date(),
    createdAt: z.date(),
    updatedAt: z.date(),
});

const blogRow = z.object({
    id: z.string(),
    topicId: z.string(),
    title: z.string(),
    seoTitle: z.string(),
    content: z.string(),
    metaDescription: z.string(),
    tags: z.array(z.string()),
    wordCount: z.number().int(),
    status: z.enum(BLOG_STATUSES),
    coverImageUrl: z.string().nullable(),
    remotePostId: z.string().nullable(),
    remoteUrl: z.string().nullable(),
    publishedAt: z.date().nullable(),
    createdAt: z.date(),
    updatedAt: z.date(),
});

const logRow = z.object({
    id: z.string(),
    jobType: z.enum(JOB_TYPES),
    status: z.enum(LOG_STATUSES),
    details: z.record(z.unknown()),
    createdAt: z.date(),
});

// COUNT(*) arrives as a string
const statsRow = z.object({
    totalCategories: z.coerce.number(),
    activeCategories: z.coerce.number(),
    pendingTopics: z.coerce.number(),
    failedTopics: z.coerce.number(),
    publishedBlogs: z.coerce.number(),
    draftBlogs: z.coerce.number(),
});

const titleRow = z.object({ title: z.string() });
const countRow = z.object({ total: z.coerce.number() });

export const toCategory = (row: unknown): Category => categoryRow.parse(row);
export const toTopic = (row: unknown): Topic => topicRow.parse(row);
export const toBlog = (row: unknown): Blog => blogRow.parse(row);
export const toJobLog = (row: unknown): JobLog => logRow.parse(row);
export const toStats = (row: unknown): EngineStats => statsRow.parse(row);
export const toTitle = (row: unknown): string => titleRow.parse(row).title;
export const toCount = (row: unknown): number => countRow.parse(row).total;
