/**
 * Pipeline Types
 */

export const TOPIC_STATUSES = ['pending', 'in_progress', 'completed', 'failed'] as const;
export type TopicStatus = typeof TOPIC_STATUSES[number];

export const BLOG_STATUSES = ['draft', 'published', 'failed'] as const;
export type BlogStatus = typeof BLOG_STATUSES[number];

export const JOB_TYPES = ['topic_generation', 'blog_publishing'] as const;
export type JobType = typeof JOB_TYPES[number];

export const LOG_STATUSES = ['started', 'completed', 'failed'] as const;
export type LogStatus = typeof LOG_STATUSES[number];

export const TOPIC_ANGLES = [
    'how-to',
    'listicle',
    'case-study',
    'tutorial',
    'opinion',
    'comparison',
    'beginner-guide',
] as const;

export type JobDetails = Record<string, unknown>;

export interface Category {
    id: string;
    name: string;
    description: string | null;
    isActive: boolean;
    lastUsedAt: Date | null;
    usageCount: number;
    createdAt: Date;
    updatedAt: Date;
}

export interface NewCategory {
    name: string;
    description?: string | null;
    isActive?: boolean;
}

export interface CategoryPatch {
    name?: string;
    description?: string | null;
    isActive?: boolean;
}

export interface Topic {
    id: string;
    categoryId: string;
    title: string;
    description: string;
    /** Comma-separated keyword list */
    keywords: string;
    status: TopicStatus;
    /** Midnight UTC of the publication day */
    scheduledDate: Date;
    createdAt: Date;
    updatedAt: Date;
}

export interface NewTopic {
    title: string;
    description: string;
    keywords: string;
    scheduledDate: Date;
}

export interface GenerationHistory {
    id: string;
    categoryId: string;
    topicTitle: string;
    topicKeywords: string;
    topicHash: string;
    generatedAt: Date;
}

export interface Blog {
    id: string;
    topicId: string;
    title: string;
    seoTitle: string;
    content: string;
    metaDescription: string;
    tags: string[];
    wordCount: number;
    status: BlogStatus;
    coverImageUrl: string | null;
    remotePostId: string | null;
    remoteUrl: string | null;
    publishedAt: Date | null;
    createdAt: Date;
    updatedAt: Date;
}

export interface NewBlog {
    topicId: string;
    title: string;
    seoTitle: string;
    content: string;
    metaDescription: string;
    tags: string[];
    wordCount: number;
}

export interface BlogPublication {
    remotePostId: string;
    remoteUrl: string;
    publishedAt: Date;
}

export interface JobLog {
    id: string;
    jobType: JobType;
    status: LogStatus;
    details: JobDetails;
    createdAt: Date;
}

export interface EngineStats {
    totalCategories: number;
    activeCategories: number;
    pendingTopics: number;
    failedTopics: number;
    publishedBlogs: number;
    draftBlogs: number;
}

/**
 * Validated article ready to be stored as a draft
 */
export interface ValidatedArticle {
    title: string;
    seoTitle: string;
    content: string;
    metaDescription: string;
    tags: string[];
    estimatedReadTime: string;
    wordCount: number;
}

export interface Clock {
    now(): Date;
}

export const systemClock: Clock = {
    now: () => new Date(),
};
