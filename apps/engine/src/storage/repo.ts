/**
 * Storage Repository
 *
 * PostgreSQL implementation of the Repository interface.
 */

import { v4 as uuid } from 'uuid';
import { Database, Queryable } from '../db';
import { createLogger } from '../logger';
import { fingerprint } from '../pipeline/similarity';
import {
    Blog,
    BlogPublication,
    BlogStatus,
    Category,
    CategoryPatch,
    EngineStats,
    JobDetails,
    JobLog,
    JobType,
    LogStatus,
    NewBlog,
    NewCategory,
    NewTopic,
    Topic,
    TopicStatus,
} from '../pipeline/types';
import { ListOptions, LogQuery, Page, Repository } from './Repository';
import {
    BLOG_COLUMNS,
    CATEGORY_COLUMNS,
    LOG_COLUMNS,
    TOPIC_COLUMNS,
    toBlog,
    toCategory,
    toCount,
    toJobLog,
    toStats,
    toTitle,
    toTopic,
} from './rows';

const logger = createLogger('repo');

export class PgRepository implements Repository {
    constructor(private readonly db: Database) {}

    // ========================================================================
    // Categories
    // ========================================================================

    async listCategories(options: { activeOnly?: boolean } = {}): Promise<Category[]> {
        const result = await this.db.query(
            `SELECT ${CATEGORY_COLUMNS}
       FROM categories
       ${options.activeOnly ? 'WHERE is_active = true' : ''}
       ORDER BY name ASC`
        );
        return result.rows.map(toCategory);
    }

    async getCategory(id: string): Promise<Category | null> {
        const result = await this.db.query(
            `SELECT ${CATEGORY_COLUMNS} FROM categories WHERE id = $1`,
            [id]
        );
        return result.rows.length > 0 ? toCategory(result.rows[0]) : null;
    }

    async findCategoryByName(name: string): Promise<Category | null> {
        const result = await this.db.query(
            `SELECT ${CATEGORY_COLUMNS} FROM categories WHERE name = $1`,
            [name]
        );
        return result.rows.length > 0 ? toCategory(result.rows[0]) : null;
    }

    async createCategory(input: NewCategory): Promise<Category> {
        const result = await this.db.query(
            `INSERT INTO categories (id, name, description, is_active)
       VALUES ($1, $2, $3, $4)
       RETURNING ${CATEGORY_COLUMNS}`,
            [uuid(), input.name, input.description ?? null, input.isActive ?? true]
        );
        return toCategory(result.rows[0]);
    }

    async updateCategory(id: string, patch: CategoryPatch): Promise<Category | null> {
        const setClauses: string[] = [];
        const values: unknown[] = [];
        let paramIndex = 1;

        if (patch.name !== undefined) {
            setClauses.push(`name = $${paramIndex++}`);
            values.push(patch.name);
        }
        if (patch.description !== undefined) {
            setClauses.push(`description = $${paramIndex++}`);
            values.push(patch.description);
        }
        if (patch.isActive !== undefined) {
            setClauses.push(`is_active = $${paramIndex++}`);
            values.push(patch.isActive);
        }
        if (setClauses.length === 0) {
            return this.getCategory(id);
        }
        setClauses.push('updated_at = NOW()');

        values.push(id);
        const result = await this.db.query(
            `UPDATE categories SET ${setClauses.join(', ')}
       WHERE id = $${paramIndex}
       RETURNING ${CATEGORY_COLUMNS}`,
            values
        );
        return result.rows.length > 0 ? toCategory(result.rows[0]) : null;
    }

    async selectNextCategory(): Promise<Category | null> {
        const result = await this.db.query(
            `SELECT ${CATEGORY_COLUMNS}
       FROM categories
       WHERE is_active = true
       ORDER BY last_used_at ASC NULLS FIRST, usage_count ASC, created_at ASC
       LIMIT 1`
        );
        return result.rows.length > 0 ? toCategory(result.rows[0]) : null;
    }

    // ========================================================================
    // Topics
    // ========================================================================

    async listTopics(options: ListOptions<TopicStatus>): Promise<Topic[]> {
        const result = options.status
            ? await this.db.query(
                `SELECT ${TOPIC_COLUMNS} FROM topics
         WHERE status = $1
         ORDER BY created_at DESC
         LIMIT $2`,
                [options.status, options.limit]
            )
            : await this.db.query(
                `SELECT ${TOPIC_COLUMNS} FROM topics
         ORDER BY created_at DESC
         LIMIT $1`,
                [options.limit]
            );
        return result.rows.map(toTopic);
    }

    async listUpcomingTopics(from: Date, until: Date): Promise<Topic[]> {
        const result = await this.db.query(
            `SELECT ${TOPIC_COLUMNS} FROM topics
       WHERE scheduled_date >= $1 AND scheduled_date <= $2
       ORDER BY scheduled_date ASC`,
            [from, until]
        );
        return result.rows.map(toTopic);
    }

    async getTopic(id: string): Promise<Topic | null> {
        const result = await this.db.query(
            `SELECT ${TOPIC_COLUMNS} FROM topics WHERE id = $1`,
            [id]
        );
        return result.rows.length > 0 ? toTopic(result.rows[0]) : null;
    }

    async findPendingTopicFor(day: Date): Promise<Topic | null> {
        const result = await this.db.query(
            `SELECT ${TOPIC_COLUMNS} FROM topics
       WHERE scheduled_date = $1 AND status = 'pending'
       ORDER BY created_at ASC
       LIMIT 1`,
            [day]
        );
        return result.rows.length > 0 ? toTopic(result.rows[0]) : null;
    }

    async updateTopicStatus(id: string, status: TopicStatus): Promise<void> {
        await this.db.query(
            `UPDATE topics SET status = $1, updated_at = NOW() WHERE id = $2`,
            [status, id]
        );
    }

    async listRecentTitles(categoryId: string, since: Date): Promise<string[]> {
        const result = await this.db.query(
            `SELECT title FROM (
         SELECT title, created_at AS at FROM topics
         WHERE category_id = $1 AND created_at >= $2
         UNION ALL
         SELECT topic_title AS title, generated_at AS at FROM generation_history
         WHERE category_id = $1 AND generated_at >= $2
       ) corpus
       ORDER BY at ASC`,
            [categoryId, since]
        );
        return [...new Set(result.rows.map(toTitle))];
    }

    async saveTopicBatch(categoryId: string, topics: NewTopic[], usedAt: Date): Promise<Topic[]> {
        return this.db.withTransaction(async (client: Queryable) => {
            const saved: Topic[] = [];

            for (const topic of topics) {
                const inserted = await client.query(
                    `INSERT INTO topics (id, category_id, title, description, keywords, status, scheduled_date)
           VALUES ($1, $2, $3, $4, $5, 'pending', $6)
           RETURNING ${TOPIC_COLUMNS}`,
                    [uuid(), categoryId, topic.title, topic.description, topic.keywords, topic.scheduledDate]
                );
                saved.push(toTopic(inserted.rows[0]));

                await client.query(
                    `INSERT INTO generation_history (id, category_id, topic_title, topic_keywords, topic_hash, generated_at)
           VALUES ($1, $2, $3, $4, $5, $6)`,
                    [uuid(), categoryId, topic.title, topic.keywords, fingerprint(topic.title), usedAt]
                );
            }

            await client.query(
                `UPDATE categories
         SET last_used_at = $1, usage_count = usage_count + 1, updated_at = NOW()
         WHERE id = $2`,
                [usedAt, categoryId]
            );

            logger.debug('Topic batch stored', { categoryId, count: saved.length });
            return saved;
        });
    }

    // ========================================================================
    // Blogs
    // ========================================================================

    async createBlog(input: NewBlog): Promise<Blog> {
        const result = await this.db.query(
            `INSERT INTO blogs (id, topic_id, title, seo_title, content, meta_description, tags, word_count, status)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, 'draft')
       RETURNING ${BLOG_COLUMNS}`,
            [
                uuid(),
                input.topicId,
                input.title,
                input.seoTitle,
                input.content,
                input.metaDescription,
                input.tags,
                input.wordCount,
            ]
        );
        return toBlog(result.rows[0]);
    }

    async getBlog(id: string): Promise<Blog | null> {
        const result = await this.db.query(
            `SELECT ${BLOG_COLUMNS} FROM blogs WHERE id = $1`,
            [id]
        );
        return result.rows.length > 0 ? toBlog(result.rows[0]) : null;
    }

    async listBlogs(options: ListOptions<BlogStatus>): Promise<Blog[]> {
        const result = options.status
            ? await this.db.query(
                `SELECT ${BLOG_COLUMNS} FROM blogs
         WHERE status = $1
         ORDER BY created_at DESC
         LIMIT $2`,
                [options.status, options.limit]
            )
            : await this.db.query(
                `SELECT ${BLOG_COLUMNS} FROM blogs
         ORDER BY created_at DESC
         LIMIT $1`,
                [options.limit]
            );
        return result.rows.map(toBlog);
    }

    async setBlogCoverImage(id: string, url: string): Promise<void> {
        await this.db.query(
            `UPDATE blogs SET cover_image_url = $1, updated_at = NOW() WHERE id = $2`,
            [url, id]
        );
    }

    async markBlogPublished(id: string, publication: BlogPublication): Promise<void> {
        await this.db.query(
            `UPDATE blogs
       SET status = 'published', remote_post_id = $1, remote_url = $2, published_at = $3, updated_at = NOW()
       WHERE id = $4`,
            [publication.remotePostId, publication.remoteUrl, publication.publishedAt, id]
        );
    }

    async markBlogDraft(id: string): Promise<void> {
        await this.db.query(
            `UPDATE blogs SET status = 'draft', updated_at = NOW() WHERE id = $1`,
            [id]
        );
    }

    // ========================================================================
    // Logs
    // ========================================================================

    async appendLog(jobType: JobType, status: LogStatus, details: JobDetails): Promise<JobLog> {
        const result = await this.db.query(
            `INSERT INTO job_logs (id, job_type, status, details)
       VALUES ($1, $2, $3, $4)
       RETURNING ${LOG_COLUMNS}`,
            [uuid(), jobType, status, JSON.stringify(details)]
        );
        return toJobLog(result.rows[0]);
    }

    async listLogs(query: LogQuery): Promise<Page<JobLog>> {
        const filter = query.jobType ? 'WHERE job_type = $1' : '';
        const filterParams = query.jobType ? [query.jobType] : [];
        const next = filterParams.length + 1;

        const [items, count] = await Promise.all([
            this.db.query(
                `SELECT ${LOG_COLUMNS} FROM job_logs ${filter}
         ORDER BY created_at DESC
         LIMIT $${next} OFFSET $${next + 1}`,
                [...filterParams, query.limit, query.offset]
            ),
            this.db.query(
                `SELECT COUNT(*) AS total FROM job_logs ${filter}`,
                filterParams
            ),
        ]);

        return {
            items: items.rows.map(toJobLog),
            total: toCount(count.rows[0]),
        };
    }

    // ========================================================================
    // Stats
    // ========================================================================

    async getStats(): Promise<EngineStats> {
        const result = await this.db.query(`
      SELECT
        (SELECT COUNT(*) FROM categories) AS "totalCategories",
        (SELECT COUNT(*) FROM categories WHERE is_active = true) AS "activeCategories",
        (SELECT COUNT(*) FROM topics WHERE status = 'pending') AS "pendingTopics",
        (SELECT COUNT(*) FROM topics WHERE status = 'failed') AS "failedTopics",
        (SELECT COUNT(*) FROM blogs WHERE status = 'published') AS "publishedBlogs",
        (SELECT COUNT(*) FROM blogs WHERE status = 'draft') AS "draftBlogs"
    `);
        return toStats(result.rows[0]);
    }

    async ping(): Promise<void> {
        await this.db.query('SELECT 1');
    }
}

export default PgRepository;
