/**
 * Topic Generator (weekly job)
 *
 * Picks the least recently used category, asks the model for candidate
 * topics, drops near-duplicates of the category's recent history and
 * schedules the survivors one per day starting tomorrow.
 */

import { z } from 'zod';
import { TerminalError, ValidationError } from '../errors';
import { createLogger, errorMessage } from '../logger';
import { AiProvider } from '../providers/ai/AiProvider';
import { parseJsonPayload } from '../providers/ai/json';
import { TOPIC_BATCH_SCHEMA, TOPIC_PROMPT } from '../providers/ai/prompts';
import { NewsProvider, formatNewsContext } from '../providers/news/NewsProvider';
import { Repository } from '../storage/Repository';
import { addDays, startOfUtcDay, toDateKey } from './dates';
import { RetryPolicy } from './retry';
import { fingerprint } from './similarity';
import { Category, Clock, JobDetails, NewTopic } from './types';
import { validateBatch } from './uniqueness';

const logger = createLogger('topic-generator');

export interface TopicCandidate {
    title: string;
    description: string;
    keywords: string[];
    angle: string;
}

export interface TopicGeneratorSettings {
    targetCount: number;
    similarityThreshold: number;
    lookbackDays: number;
    maxAttempts: number;
    temperature: number;
    maxTokens: number;
}

export interface TopicGeneratorDeps {
    repo: Repository;
    ai: AiProvider;
    news: NewsProvider | null;
    retry: RetryPolicy;
    clock: Clock;
}

export interface TopicGenerationResult extends JobDetails {
    categoryId: string;
    categoryName: string;
    topicsGenerated: number;
    targetCount: number;
    attempts: number;
    duplicatesRejected: number;
    scheduled: Array<{ id: string; title: string; date: string }>;
}

const candidateSchema = z.object({
    title: z.string().trim().min(1),
    description: z.string().trim().min(1),
    keywords: z.union([
        z.array(z.string()),
        z.string().transform(value => value.split(',')),
    ]).transform(list => list.map(k => k.trim()).filter(k => k.length > 0))
        .refine(list => list.length > 0, 'keywords must not be empty'),
    angle: z.string().trim().min(1),
});

/**
 * Parse a topic batch response, skipping candidates with missing fields
 */
export function parseTopicCandidates(response: string): TopicCandidate[] {
    const items = parseJsonPayload(response, 'array');
    const candidates: TopicCandidate[] = [];

    if (!Array.isArray(items)) {
        throw new ValidationError('schema', ['Expected a JSON array']);
    }

    items.forEach((item, index) => {
        const parsed = candidateSchema.safeParse(item);
        if (parsed.success) {
            candidates.push(parsed.data);
        } else {
            logger.warn('Skipping incomplete topic candidate', {
                index,
                missing: parsed.error.issues.map(i => i.path.join('.') || i.message),
            });
        }
    });

    if (candidates.length === 0) {
        throw new ValidationError('schema', [`No valid topics found in response (${items.length} items)`]);
    }
    return candidates;
}

export class TopicGenerator {
    constructor(
        private readonly deps: TopicGeneratorDeps,
        private readonly settings: TopicGeneratorSettings
    ) {}

    async run(): Promise<TopicGenerationResult> {
        const startedAt = this.deps.clock.now();

        const category = await this.selectCategory();
        const newsContext = await this.fetchNewsContext(category);
        const corpus = await this.fetchHistory(category, startedAt);
        const outcome = await this.generateUnique(category, corpus, newsContext);

        if (outcome.accepted.length < this.settings.targetCount) {
            logger.warn('Generated fewer topics than requested', {
                generated: outcome.accepted.length,
                target: this.settings.targetCount,
            });
        }

        const topics = this.assignSchedule(outcome.accepted, startedAt);
        const saved = await this.deps.repo.saveTopicBatch(category.id, topics, startedAt);

        logger.info('Topic batch stored', { category: category.name, count: saved.length });

        return {
            categoryId: category.id,
            categoryName: category.name,
            topicsGenerated: saved.length,
            targetCount: this.settings.targetCount,
            attempts: outcome.attempts,
            duplicatesRejected: outcome.rejected,
            scheduled: saved.map(topic => ({
                id: topic.id,
                title: topic.title,
                date: toDateKey(topic.scheduledDate),
            })),
        };
    }

    async selectCategory(): Promise<Category> {
        const category = await this.deps.repo.selectNextCategory();
        if (!category) {
            throw new TerminalError('No active categories found');
        }
        logger.info('Selected category', {
            category: category.name,
            lastUsedAt: category.lastUsedAt,
            usageCount: category.usageCount,
        });
        return category;
    }

    /**
     * Optional headline context; failures degrade to no context
     */
    async fetchNewsContext(category: Category): Promise<string> {
        const news = this.deps.news;
        if (!news || !news.isConfigured()) {
            logger.info('News context disabled');
            return '';
        }

        try {
            const headlines = await news.fetchRecent(category.name);
            return formatNewsContext(headlines);
        } catch (error) {
            logger.warn('News context unavailable, continuing without it', { error: errorMessage(error) });
            return '';
        }
    }

    async fetchHistory(category: Category, now: Date): Promise<string[]> {
        const since = addDays(now, -this.settings.lookbackDays);
        const titles = await this.deps.repo.listRecentTitles(category.id, since);
        logger.info('Loaded topic history', { category: category.name, titles: titles.length });
        return titles;
    }

    async generateUnique(
        category: Category,
        history: string[],
        newsContext: string
    ): Promise<{ accepted: TopicCandidate[]; attempts: number; rejected: number }> {
        const target = this.settings.targetCount;
        let accepted: TopicCandidate[] = [];
        let rejected = 0;
        let attempts = 0;

        while (attempts < this.settings.maxAttempts && accepted.length < target) {
            attempts++;
            const remaining = target - accepted.length;
            logger.info('Requesting topic candidates', { attempt: attempts, remaining });

            const prompt = TOPIC_PROMPT({
                categoryName: category.name,
                categoryDescription: category.description,
                count: remaining,
                existingTitles: history,
                newsContext,
            });

            const response = await this.deps.retry.execute('topic generation', () =>
                this.deps.ai.complete(prompt, {
                    temperature: this.settings.temperature,
                    maxTokens: this.settings.maxTokens,
                    responseSchema: TOPIC_BATCH_SCHEMA,
                })
            );

            let candidates: TopicCandidate[];
            try {
                candidates = parseTopicCandidates(response);
            } catch (error) {
                if (error instanceof ValidationError) {
                    logger.warn('Discarding unusable topic response', { attempt: attempts, issues: error.issues });
                    continue;
                }
                throw error;
            }

            const corpus = [...history, ...accepted.map(c => c.title)];
            const known = new Set(corpus.map(fingerprint));
            const fresh: TopicCandidate[] = [];
            for (const candidate of candidates) {
                if (known.has(fingerprint(candidate.title))) {
                    rejected++;
                    logger.warn('Duplicate topic (same keywords)', { title: candidate.title });
                } else {
                    fresh.push(candidate);
                }
            }

            const verdicts = validateBatch(fresh.map(c => c.title), corpus, this.settings.similarityThreshold);
            verdicts.forEach((verdict, index) => {
                if (verdict.isUnique) {
                    accepted.push(fresh[index]);
                } else {
                    rejected++;
                    logger.warn('Duplicate topic', {
                        title: verdict.title,
                        similarTo: verdict.similarTo,
                        score: Number(verdict.score.toFixed(3)),
                    });
                }
            });
        }

        accepted = accepted.slice(0, target);
        return { accepted, attempts, rejected };
    }

    /**
     * One topic per day starting tomorrow, in acceptance order
     */
    assignSchedule(candidates: TopicCandidate[], now: Date): NewTopic[] {
        const tomorrow = addDays(startOfUtcDay(now), 1);
        return candidates.map((candidate, index) => ({
            title: candidate.title,
            description: candidate.description,
            keywords: candidate.keywords.join(', '),
            scheduledDate: addDays(tomorrow, index),
        }));
    }
}

export default TopicGenerator;
