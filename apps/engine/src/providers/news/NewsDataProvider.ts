import axios from 'axios';
import { z } from 'zod';
import { classifyError } from '../../errors';
import { createLogger, errorMessage } from '../../logger';
import { NewsHeadline, NewsProvider } from './NewsProvider';

const logger = createLogger('newsdata');

export interface NewsDataSettings {
    apiKey: string;
    category: string;
    maxArticles: number;
    timeoutMs: number;
}

const latestResponse = z.object({
    status: z.string(),
    results: z.array(z.object({
        title: z.string().nullable().optional(),
        description: z.string().nullable().optional(),
        link: z.string().nullable().optional(),
        source_id: z.string().nullable().optional(),
        pubDate: z.string().nullable().optional(),
        keywords: z.array(z.string()).nullable().optional(),
    })).default([]),
});

/**
 * NewsData.io "latest" endpoint client
 */
export class NewsDataProvider implements NewsProvider {
    readonly name = 'NewsData.io';
    private readonly baseUrl = 'https://newsdata.io/api/1';

    constructor(private readonly settings: NewsDataSettings) {}

    isConfigured(): boolean {
        return !!this.settings.apiKey;
    }

    async fetchRecent(topicHint: string): Promise<NewsHeadline[]> {
        logger.info('Fetching latest headlines', { topicHint, max: this.settings.maxArticles });

        try {
            const response = await axios.get(`${this.baseUrl}/latest`, {
                params: {
                    apikey: this.settings.apiKey,
                    category: this.settings.category,
                    language: 'en',
                    q: topicHint || undefined,
                    size: Math.min(this.settings.maxArticles, 50),
                },
                timeout: this.settings.timeoutMs,
            });

            const body = latestResponse.parse(response.data);
            if (body.status !== 'success') {
                logger.warn('NewsData returned a non-success status', { status: body.status });
                return [];
            }

            const headlines: NewsHeadline[] = [];
            for (const article of body.results) {
                if (!article.title) {
                    continue;
                }
                const published = article.pubDate ? new Date(article.pubDate.replace(' ', 'T') + 'Z') : null;
                headlines.push({
                    title: article.title,
                    source: article.source_id || 'Unknown',
                    url: article.link || '',
                    publishedAt: published && !Number.isNaN(published.getTime()) ? published : null,
                    description: article.description || undefined,
                    keywords: article.keywords ?? [],
                });
            }

            logger.info('Headlines fetched', { count: headlines.length });
            return headlines.slice(0, this.settings.maxArticles);
        } catch (error) {
            logger.error('NewsData request failed', { error: errorMessage(error) });
            throw classifyError(error, 'NewsData API');
        }
    }
}

export default NewsDataProvider;
