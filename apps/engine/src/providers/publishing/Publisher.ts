/**
 * Remote blog platform boundary: submit markdown, get back where it lives.
 */

export interface PostSubmission {
    title: string;
    seoTitle?: string;
    contentMarkdown: string;
    tags: string[];
    metaDescription: string;
    coverImageUrl?: string | null;
}

export interface PublishedPost {
    remoteId: string;
    remoteUrl: string;
    slug?: string;
}

export interface Publisher {
    readonly name: string;

    /**
     * Submit an article and return its canonical location
     */
    submit(post: PostSubmission): Promise<PublishedPost>;

    /** Token and publication id are both present */
    isConfigured(): boolean;

    /** Cheap authenticated read against the platform */
    testConnection(): Promise<boolean>;
}
