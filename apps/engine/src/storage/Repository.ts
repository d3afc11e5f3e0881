/**
 * Repository Interface
 *
 * Typed access to the five record collections. Pipeline stages re-read
 * what they need at each stage boundary instead of holding state.
 */

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

export interface ListOptions<S> {
    status?: S;
    limit: number;
}

export interface LogQuery {
    jobType?: JobType;
    limit: number;
    offset: number;
}

export interface Page<T> {
    items: T[];
    total: number;
}

export interface Repository {
    // Categories
    listCategories(options?: { activeOnly?: boolean }): Promise<Category[]>;
    getCategory(id: string): Promise<Category | null>;
    findCategoryByName(name: string): Promise<Category | null>;
    createCategory(input: NewCategory): Promise<Category>;
    updateCategory(id: string, patch: CategoryPatch): Promise<Category | null>;
    /** Active category used least recently; never-used first, then lowest usage count */
    selectNextCategory(): Promise<Category | null>;

    // Topics
    listTopics(options: ListOptions<TopicStatus>): Promise<Topic[]>;
    listUpcomingTopics(from: Date, until: Date): Promise<Topic[]>;
    getTopic(id: string): Promise<Topic | null>;
    /** Earliest-created pending topic scheduled for the given day */
    findPendingTopicFor(day: Date): Promise<Topic | null>;
    updateTopicStatus(id: string, status: TopicStatus): Promise<void>;
    /** Topic and history titles of a category since a date, oldest first, without repeats */
    listRecentTitles(categoryId: string, since: Date): Promise<string[]>;
    /** Insert topics and their history records, then mark the category as used */
    saveTopicBatch(categoryId: string, topics: NewTopic[], usedAt: Date): Promise<Topic[]>;

    // Blogs
    createBlog(input: NewBlog): Promise<Blog>;
    getBlog(id: string): Promise<Blog | null>;
    listBlogs(options: ListOptions<BlogStatus>): Promise<Blog[]>;
    setBlogCoverImage(id: string, url: string): Promise<void>;
    markBlogPublished(id: string, publication: BlogPublication): Promise<void>;
    markBlogDraft(id: string): Promise<void>;

    // Logs
    appendLog(jobType: JobType, status: LogStatus, details: JobDetails): Promise<JobLog>;
    listLogs(query: LogQuery): Promise<Page<JobLog>>;

    getStats(): Promise<EngineStats>;
    ping(): Promise<void>;
}
