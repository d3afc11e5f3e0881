/**
 * Duplicate Detection
 *
 * Compares candidate topic titles against a corpus of earlier titles.
 */

import { combinedSimilarity } from './similarity';

export const DEFAULT_SIMILARITY_THRESHOLD = 0.7;

export interface SimilarityMatch {
    isDuplicate: boolean;
    mostSimilarTitle: string | null;
    score: number;
}

export interface BatchVerdict {
    title: string;
    isUnique: boolean;
    similarTo: string | null;
    score: number;
}

/**
 * Score a candidate against every existing title. The first title reaching
 * the highest score is the one reported.
 */
export function isSimilarToAny(
    candidate: string,
    existingTitles: readonly string[],
    threshold: number = DEFAULT_SIMILARITY_THRESHOLD
): SimilarityMatch {
    let mostSimilarTitle: string | null = null;
    let score = 0;

    for (const existing of existingTitles) {
        const similarity = combinedSimilarity(candidate, existing);
        if (similarity > score) {
            score = similarity;
            mostSimilarTitle = existing;
        }
    }

    return {
        isDuplicate: score >= threshold,
        mostSimilarTitle,
        score,
    };
}

/**
 * Check each candidate against the existing corpus only. Candidates in the
 * same batch are not compared with one another.
 */
export function validateBatch(
    candidates: readonly string[],
    existingTitles: readonly string[],
    threshold: number = DEFAULT_SIMILARITY_THRESHOLD
): BatchVerdict[] {
    return candidates.map(title => {
        const match = isSimilarToAny(title, existingTitles, threshold);
        return {
            title,
            isUnique: !match.isDuplicate,
            similarTo: match.isDuplicate ? match.mostSimilarTitle : null,
            score: match.score,
        };
    });
}

export default { isSimilarToAny, validateBatch, DEFAULT_SIMILARITY_THRESHOLD };
