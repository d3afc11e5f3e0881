import axios, { AxiosInstance } from 'axios';
import slugify from 'slugify';
import { z } from 'zod';
import { AuthError, TransientError, classifyError } from '../../errors';
import { createLogger, errorMessage } from '../../logger';
import { PostSubmission, PublishedPost, Publisher } from './Publisher';

const logger = createLogger('hashnode-publisher');

const MAX_SLUG_LENGTH = 250;

export interface HashnodeSettings {
    apiUrl: string;
    token: string;
    publicationId: string;
    timeoutMs: number;
}

const PUBLISH_POST_MUTATION = `
mutation PublishPost($input: PublishPostInput!) {
  publishPost(input: $input) {
    post {
      id
      slug
      url
    }
  }
}`;

const PUBLICATION_QUERY = `
query Publication($id: ObjectId!) {
  publication(id: $id) {
    id
    title
  }
}`;

const graphQlErrors = z.array(z.object({
    message: z.string(),
    extensions: z.object({ code: z.string().optional() }).passthrough().optional(),
})).optional();

const publishResponse = z.object({
    data: z.object({
        publishPost: z.object({
            post: z.object({ id: z.string(), slug: z.string(), url: z.string() }),
        }).nullable().optional(),
    }).nullable().optional(),
    errors: graphQlErrors,
});

const publicationResponse = z.object({
    data: z.object({
        publication: z.object({ id: z.string(), title: z.string() }).nullable(),
    }).nullable().optional(),
    errors: graphQlErrors,
});

/**
 * Reduce a tag to Hashnode's slug alphabet: lowercase letters, digits and hyphens
 */
export function normalizeTagSlug(tag: string): string {
    return slugify(tag, { lower: true, trim: true })
        .replace(/[^a-z0-9-]/g, '-')
        .replace(/-+/g, '-')
        .replace(/^-+|-+$/g, '')
        .slice(0, MAX_SLUG_LENGTH)
        .replace(/-+$/, '');
}

/**
 * Tag inputs for the mutation, one per distinct slug
 */
export function toHashnodeTags(tags: string[]): Array<{ slug: string; name: string }> {
    const seen = new Set<string>();
    const result: Array<{ slug: string; name: string }> = [];

    for (const tag of tags) {
        const name = tag.trim();
        const slug = normalizeTagSlug(name);
        if (!slug || seen.has(slug)) {
            continue;
        }
        seen.add(slug);
        result.push({ slug, name });
    }
    return result;
}

function raiseGraphQlErrors(errors: Array<{ message: string; extensions?: { code?: string } }>): never {
    const message = errors.map(e => e.message).join('; ');
    if (errors.some(e => e.extensions?.code === 'UNAUTHENTICATED')) {
        throw new AuthError(`Hashnode authentication failed: ${message}`);
    }
    throw classifyError(new Error(message), 'Hashnode GraphQL');
}

/**
 * Hashnode Publisher Implementation
 *
 * Publishes markdown posts through the Hashnode GraphQL API.
 */
export class HashnodePublisher implements Publisher {
    readonly name = 'Hashnode';

    private client: AxiosInstance;

    constructor(private readonly settings: HashnodeSettings) {
        this.client = axios.create({
            baseURL: settings.apiUrl,
            timeout: settings.timeoutMs,
            headers: {
                'Content-Type': 'application/json',
                Authorization: settings.token,
            },
        });
    }

    isConfigured(): boolean {
        return !!(this.settings.token && this.settings.publicationId);
    }

    async testConnection(): Promise<boolean> {
        try {
            const response = await this.client.post('', {
                query: PUBLICATION_QUERY,
                variables: { id: this.settings.publicationId },
            });
            const body = publicationResponse.parse(response.data);
            const publication = body.data?.publication;
            if (body.errors?.length || !publication) {
                logger.error('Hashnode publication lookup failed', {
                    errors: body.errors?.map(e => e.message),
                });
                return false;
            }
            logger.info('Hashnode connection verified', { publication: publication.title });
            return true;
        } catch (error) {
            logger.error('Hashnode connection failed', { error: errorMessage(error) });
            return false;
        }
    }

    async submit(post: PostSubmission): Promise<PublishedPost> {
        const tags = toHashnodeTags(post.tags);
        logger.info('Publishing post', { title: post.title, tags: tags.length });

        const input: Record<string, unknown> = {
            publicationId: this.settings.publicationId,
            title: post.title,
            contentMarkdown: post.contentMarkdown,
            tags,
            metaTags: {
                title: post.seoTitle ?? post.title,
                description: post.metaDescription,
            },
        };
        if (post.coverImageUrl) {
            input.coverImageOptions = { coverImageURL: post.coverImageUrl };
        }

        let data: unknown;
        try {
            const response = await this.client.post('', {
                query: PUBLISH_POST_MUTATION,
                variables: { input },
            });
            data = response.data;
        } catch (error) {
            logger.error('Failed to publish post', { title: post.title, error: errorMessage(error) });
            throw classifyError(error, 'Hashnode API');
        }

        const body = publishResponse.safeParse(data);
        if (!body.success) {
            throw new TransientError(`Unexpected Hashnode response: ${body.error.message}`);
        }
        if (body.data.errors?.length) {
            logger.error('Hashnode rejected post', { title: post.title, errors: body.data.errors.map(e => e.message) });
            raiseGraphQlErrors(body.data.errors);
        }

        const published = body.data.data?.publishPost?.post;
        if (!published) {
            throw new TransientError('Hashnode response did not include the published post');
        }

        logger.info('Post published', { id: published.id, url: published.url });
        return { remoteId: published.id, remoteUrl: published.url, slug: published.slug };
    }
}

export default HashnodePublisher;
