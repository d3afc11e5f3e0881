/**
 * Content Generation
 *
 * Expands a topic into a long-form article and validates it.
 */

import { createLogger } from '../logger';
import { AiProvider } from '../providers/ai/AiProvider';
import { parseJsonPayload } from '../providers/ai/json';
import { ARTICLE_PROMPT, ARTICLE_SCHEMA } from '../providers/ai/prompts';
import { validateArticle } from './qualityGate';
import { RetryPolicy } from './retry';
import { Category, Topic, ValidatedArticle } from './types';

const logger = createLogger('generate');

export interface ContentGeneratorSettings {
    temperature: number;
    maxTokens: number;
}

export class ContentGenerator {
    constructor(
        private readonly ai: AiProvider,
        private readonly retry: RetryPolicy,
        private readonly settings: ContentGeneratorSettings
    ) {}

    /**
     * Generate and validate the article for a topic. Parse and rule failures
     * are raised as ValidationError; provider failures after retries propagate as-is.
     */
    async generate(topic: Topic, category: Category): Promise<ValidatedArticle> {
        logger.info('Generating article', { topicId: topic.id, title: topic.title, provider: this.ai.name });

        const prompt = ARTICLE_PROMPT({
            title: topic.title,
            description: topic.description,
            keywords: topic.keywords,
            categoryName: category.name,
            categoryDescription: category.description,
        });

        const response = await this.retry.execute('article generation', () =>
            this.ai.complete(prompt, {
                temperature: this.settings.temperature,
                maxTokens: this.settings.maxTokens,
                responseSchema: ARTICLE_SCHEMA,
            })
        );

        const payload = parseJsonPayload(response, 'object');
        const article = validateArticle(payload);

        logger.info('Article generated', {
            topicId: topic.id,
            title: article.title,
            wordCount: article.wordCount,
        });
        return article;
    }
}

export default ContentGenerator;
