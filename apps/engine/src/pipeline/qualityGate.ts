/**
 * Quality Gate
 *
 * Validates generated articles before they are stored. Field limits and
 * markdown structure are checked together and every failing rule is
 * reported in a single ValidationError.
 */

import { z } from 'zod';
import { ValidationError } from '../errors';
import { createLogger } from '../logger';
import { ValidatedArticle } from './types';

const logger = createLogger('quality-gate');

export const QUALITY_RULES = {
    titleLength: { min: 10, max: 200 },
    seoTitleLength: { min: 40, max: 70 },
    metaDescriptionLength: { min: 120, max: 170 },
    tagCount: { min: 1, max: 10 },
    minContentChars: 500,
    minH2: 3,
    minHeadings: 4,
    minIntroChars: 50,
    minClosingChars: 100,
    minWordCount: 800,
    endingWindow: 50,
} as const;

const PROPER_ENDINGS = ['.', '!', '?', ')', '"', "'", '`', '>', '-', '*', '```'];
const SUSPICIOUS_ENDINGS = [',', ' and', ' or', ' the', ' a', ' an', ' in', ' on', ' at', ' to', ' for', ' with'];

const H2_PATTERN = /^##\s+(.+)$/;
const H3_PATTERN = /^###\s+(.+)$/;

export interface ContentAnalysis {
    h2Count: number;
    h3Count: number;
    totalHeadings: number;
    headings: string[];
    hasIntroduction: boolean;
    hasClosingSection: boolean;
    endsProperly: boolean;
    wordCount: number;
}

export interface QualityGateResult {
    passed: boolean;
    issues: string[];
    details: ContentAnalysis;
}

/**
 * Count prose words, ignoring code, link targets and markdown markers
 */
export function countWords(content: string): number {
    const text = content
        .replace(/```[\s\S]*?```/g, '')
        .replace(/`[^`]+`/g, '')
        .replace(/\[([^\]]+)\]\([^)]+\)/g, '$1')
        .replace(/^#+\s+/gm, '')
        .replace(/\*+([^*]+)\*+/g, '$1')
        .replace(/_+([^_]+)_+/g, '$1');

    return text.split(/\s+/).filter(word => word.length > 0).length;
}

/**
 * Heuristic truncation check on the tail of the content
 */
export function endsProperly(content: string): boolean {
    const tail = content.trim().slice(-QUALITY_RULES.endingWindow);
    return PROPER_ENDINGS.some(ending => tail.endsWith(ending))
        && !SUSPICIOUS_ENDINGS.some(ending => tail.endsWith(ending));
}

/**
 * Extract structural metrics from markdown content
 */
export function analyzeContent(content: string): ContentAnalysis {
    const empty: ContentAnalysis = {
        h2Count: 0,
        h3Count: 0,
        totalHeadings: 0,
        headings: [],
        hasIntroduction: false,
        hasClosingSection: false,
        endsProperly: false,
        wordCount: 0,
    };
    if (!content.trim()) {
        return empty;
    }

    const lines = content.trim().split('\n');
    const headings: string[] = [];
    let h2Count = 0;
    let h3Count = 0;
    let firstHeadingLine = -1;
    let lastH2Line = -1;

    lines.forEach((line, index) => {
        const trimmed = line.trim();
        const h2 = H2_PATTERN.exec(trimmed);
        const h3 = h2 ? null : H3_PATTERN.exec(trimmed);

        if (h2) {
            h2Count++;
            headings.push(h2[1].trim());
            lastH2Line = index;
        } else if (h3) {
            h3Count++;
            headings.push(h3[1].trim());
        } else {
            return;
        }
        if (firstHeadingLine === -1) {
            firstHeadingLine = index;
        }
    });

    let hasIntroduction: boolean;
    if (firstHeadingLine === -1) {
        hasIntroduction = content.trim().length >= QUALITY_RULES.minIntroChars;
    } else {
        const intro = lines.slice(0, firstHeadingLine).join('\n').trim();
        hasIntroduction = intro.length >= QUALITY_RULES.minIntroChars;
    }

    const closing = lastH2Line >= 0 ? lines.slice(lastH2Line + 1).join('\n').trim() : '';

    return {
        h2Count,
        h3Count,
        totalHeadings: h2Count + h3Count,
        headings,
        hasIntroduction,
        hasClosingSection: closing.length >= QUALITY_RULES.minClosingChars,
        endsProperly: endsProperly(content),
        wordCount: countWords(content),
    };
}

/**
 * Structural rules on the markdown body
 */
export function checkStructure(content: string): QualityGateResult {
    const details = analyzeContent(content);
    const issues: string[] = [];
    const rules = QUALITY_RULES;

    if (details.h2Count < rules.minH2) {
        issues.push(`Blog must have at least ${rules.minH2} main sections (## headings). Found: ${details.h2Count}`);
    }
    if (details.totalHeadings < rules.minHeadings) {
        issues.push(`Blog must have at least ${rules.minHeadings} headings total (## or ###). Found: ${details.totalHeadings}`);
    }
    if (!details.hasIntroduction) {
        issues.push(`Blog must start with an introduction of at least ${rules.minIntroChars} characters before the first heading`);
    }
    if (!details.hasClosingSection) {
        issues.push(`Blog must end with a closing section of at least ${rules.minClosingChars} characters after the last ## heading`);
    }
    if (details.wordCount < rules.minWordCount) {
        issues.push(`Blog content too short: ${details.wordCount} words (minimum ${rules.minWordCount})`);
    }

    return { passed: issues.length === 0, issues, details };
}

// ============================================================================
// Article validation
// ============================================================================

const optionalText = z.string().optional().nullable();

const rawArticle = z.object({
    title: optionalText,
    seo_title: optionalText,
    seoTitle: optionalText,
    content: optionalText,
    meta_description: optionalText,
    metaDescription: optionalText,
    tags: z.union([z.array(z.string()), z.string()]).optional().nullable(),
    estimated_read_time: optionalText,
    estimatedReadTime: optionalText,
});

function lengthIssue(label: string, value: string, range: { min: number; max: number }): string | null {
    if (value.length < range.min) {
        return `${label} too short: ${value.length} chars (minimum ${range.min})`;
    }
    if (value.length > range.max) {
        return `${label} too long: ${value.length} chars (maximum ${range.max})`;
    }
    return null;
}

/**
 * Validate a parsed model response and return the article with its computed word count
 */
export function validateArticle(payload: unknown): ValidatedArticle {
    const parsed = rawArticle.safeParse(payload);
    if (!parsed.success) {
        throw new ValidationError('schema', parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
    }

    const raw = parsed.data;
    const title = (raw.title ?? '').trim();
    const seoTitle = (raw.seo_title ?? raw.seoTitle ?? '').trim();
    const content = (raw.content ?? '').trim();
    const metaDescription = (raw.meta_description ?? raw.metaDescription ?? '').trim();
    const rawTags = typeof raw.tags === 'string' ? raw.tags.split(',') : raw.tags ?? [];
    const tags = rawTags.map(tag => tag.trim()).filter(tag => tag.length > 0);
    const rules = QUALITY_RULES;

    const issues: string[] = [];
    const required: Array<[string, string]> = [
        ['title', title],
        ['seo_title', seoTitle],
        ['content', content],
        ['meta_description', metaDescription],
    ];
    for (const [field, value] of required) {
        if (!value) {
            issues.push(`Missing required field: ${field}`);
        }
    }

    if (title) {
        const issue = lengthIssue('Title', title, rules.titleLength);
        if (issue) issues.push(issue);
    }
    if (seoTitle) {
        const issue = lengthIssue('SEO title', seoTitle, rules.seoTitleLength);
        if (issue) issues.push(issue);
    }
    if (metaDescription) {
        const issue = lengthIssue('Meta description', metaDescription, rules.metaDescriptionLength);
        if (issue) issues.push(issue);
    }
    if (tags.length < rules.tagCount.min) {
        issues.push('Must have at least 1 tag');
    } else if (tags.length > rules.tagCount.max) {
        issues.push(`Too many tags: ${tags.length} (maximum ${rules.tagCount.max})`);
    }

    let wordCount = 0;
    if (content) {
        if (content.length < rules.minContentChars) {
            issues.push(`Content too short: ${content.length} chars (minimum ${rules.minContentChars})`);
        }
        if (!endsProperly(content)) {
            issues.push('Content appears to be truncated or incomplete (suspicious ending)');
        }
        const structure = checkStructure(content);
        issues.push(...structure.issues);
        wordCount = structure.details.wordCount;
    }

    if (issues.length > 0) {
        logger.warn('Article failed validation', { issues });
        throw new ValidationError('rules', issues);
    }

    return {
        title,
        seoTitle,
        content,
        metaDescription,
        tags,
        estimatedReadTime: (raw.estimated_read_time ?? raw.estimatedReadTime ?? '').trim() || '5 min read',
        wordCount,
    };
}

export default { analyzeContent, checkStructure, countWords, endsProperly, validateArticle };
