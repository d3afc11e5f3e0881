/**
 * Prompt Templates
 *
 * Topic planning, article writing and cover image prompts, plus the
 * response schemas passed to structured-output generation.
 */

import { TOPIC_ANGLES } from '../../pipeline/types';
import { JsonSchema } from './AiProvider';

export const SYSTEM_PROMPT = `You are an experienced technical writer and content strategist for a technology blog.

RULES:
1. Write accurate, current information and avoid deprecated practices.
2. Address readers directly and keep paragraphs short.
3. Never invent statistics, quotes or product announcements.
4. Follow the requested output format exactly.`;

export const AVOID_HINT_SIZE = 20;

export interface TopicPromptInput {
    categoryName: string;
    categoryDescription: string | null;
    count: number;
    existingTitles: string[];
    newsContext: string;
}

export const TOPIC_PROMPT = (input: TopicPromptInput): string => {
    const recent = input.existingTitles.slice(-AVOID_HINT_SIZE);
    const avoidList = recent.length > 0
        ? recent.map(title => `- ${title}`).join('\n')
        : 'None (first batch)';

    const newsSection = input.newsContext
        ? `
${input.newsContext}

Use these headlines as inspiration for timely topics. Do NOT copy headlines;
find angles that add value beyond the news.
`
        : '';

    return `
Generate blog topics for a technology blog.

Context:
- Category: ${input.categoryName}
- Description: ${input.categoryDescription ?? 'General coverage of the category'}
- Audience: beginners through professionals
${newsSection}
Task:
Generate exactly ${input.count} unique, specific blog topics.

Requirements:
1. Titles are specific and actionable, 8-15 words long
2. Spread topics across these angles: ${TOPIC_ANGLES.join(', ')}
3. Mix beginner, intermediate and advanced difficulty

Topics to AVOID (already covered):
${avoidList}

Return a JSON array of exactly ${input.count} objects:
[
  {
    "title": "The complete topic title",
    "description": "One sentence on what the post covers",
    "keywords": ["keyword1", "keyword2", "keyword3"],
    "angle": "${TOPIC_ANGLES.join('|')}"
  }
]

Return ONLY the JSON array, complete and valid, with every field filled.
`;
};

export interface ArticlePromptInput {
    title: string;
    description: string;
    keywords: string;
    categoryName: string;
    categoryDescription: string | null;
}

export const ARTICLE_PROMPT = (input: ArticlePromptInput): string => `
Write a comprehensive blog post.

Topic: ${input.title}
Category: ${input.categoryName}
${input.categoryDescription ? `Context: ${input.categoryDescription}` : ''}
${input.description ? `Additional context: ${input.description}` : ''}
Target keywords: ${input.keywords || 'relevant keywords'}

Requirements:
1. LENGTH: 1200-1500 words
2. STRUCTURE:
   - An introduction paragraph before the first heading
   - 4-6 main sections using ## headings, with ### subheadings where useful
   - Real-world examples and actionable takeaways
   - A concluding ## section of at least two full sentences
3. FORMATTING:
   - Markdown only; ## for main headings, ### for subheadings
   - Code snippets fenced with a language tag when relevant
   - End the post with a complete sentence
4. SEO:
   - Title: 10-200 characters
   - SEO title: 40-70 characters
   - Meta description: 120-170 characters
   - 3-8 tags

Return ONLY a JSON object:
{
  "title": "Final blog title",
  "seo_title": "Search-optimized title",
  "content": "Full post in Markdown",
  "meta_description": "Meta description",
  "tags": ["tag1", "tag2", "tag3"],
  "estimated_read_time": "X min read"
}
`;

export const COVER_IMAGE_PROMPT = (title: string, description?: string, keywords?: string): string => `Create a professional blog cover image for:

Title: ${title}
${description ? `Description: ${description}` : ''}
${keywords ? `Keywords: ${keywords}` : ''}

Requirements:
- Modern, clean technology theme
- Abstract or conceptual, with no text and no recognisable people
- Landscape 16:9 composition suitable for web publishing`;

export const TOPIC_BATCH_SCHEMA: JsonSchema = {
    type: 'array',
    items: {
        type: 'object',
        properties: {
            title: { type: 'string' },
            description: { type: 'string' },
            keywords: { type: 'array', items: { type: 'string' } },
            angle: { type: 'string' },
        },
        required: ['title', 'description', 'keywords', 'angle'],
    },
};

export const ARTICLE_SCHEMA: JsonSchema = {
    type: 'object',
    properties: {
        title: { type: 'string' },
        seo_title: { type: 'string' },
        content: { type: 'string' },
        meta_description: { type: 'string' },
        tags: { type: 'array', items: { type: 'string' } },
        estimated_read_time: { type: 'string' },
    },
    required: ['title', 'seo_title', 'content', 'meta_description', 'tags'],
};
