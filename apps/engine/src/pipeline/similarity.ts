/**
 * Text Similarity
 *
 * Pure helpers for comparing topic titles: keyword-set overlap,
 * character-sequence overlap, a weighted blend of both, and an
 * order-independent keyword fingerprint.
 */

import { createHash } from 'crypto';
import stopWordList from './stopWords.json';

const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

const KEYWORD_WEIGHT = 0.6;
const SEQUENCE_WEIGHT = 0.4;

/**
 * Lowercase, drop everything outside [a-z0-9] and whitespace, collapse whitespace
 */
export function normalize(text: string): string {
    return text
        .toLowerCase()
        .replace(/[^a-z0-9\s]/g, '')
        .split(/\s+/)
        .filter(word => word.length > 0)
        .join(' ');
}

/**
 * Significant words of a text: no stop words, nothing shorter than 3 characters
 */
export function extractKeywords(text: string): Set<string> {
    const words = normalize(text).split(' ');
    return new Set(words.filter(word => word.length > 2 && !STOP_WORDS.has(word)));
}

export function jaccardSimilarity(a: string, b: string): number {
    const keywordsA = extractKeywords(a);
    const keywordsB = extractKeywords(b);

    if (keywordsA.size === 0 && keywordsB.size === 0) {
        return 1.0;
    }
    if (keywordsA.size === 0 || keywordsB.size === 0) {
        return 0.0;
    }

    let intersection = 0;
    for (const word of keywordsA) {
        if (keywordsB.has(word)) {
            intersection++;
        }
    }
    const union = keywordsA.size + keywordsB.size - intersection;
    return intersection / union;
}

// ============================================================================
// Longest-matching-blocks ratio
// ============================================================================

type Match = [aStart: number, bStart: number, size: number];

/**
 * Positions of each character in `b`. For long inputs, characters that make up
 * more than 1% of `b` are left out of the index; matches still extend over them.
 */
function indexPositions(b: string): Map<string, number[]> {
    const positions = new Map<string, number[]>();
    for (let j = 0; j < b.length; j++) {
        const list = positions.get(b[j]);
        if (list) {
            list.push(j);
        } else {
            positions.set(b[j], [j]);
        }
    }

    if (b.length >= 200) {
        const limit = Math.floor(b.length / 100) + 1;
        for (const [char, list] of positions) {
            if (list.length > limit) {
                positions.delete(char);
            }
        }
    }
    return positions;
}

function longestMatch(
    a: string,
    b: string,
    positions: Map<string, number[]>,
    aLow: number,
    aHigh: number,
    bLow: number,
    bHigh: number
): Match {
    let bestI = aLow;
    let bestJ = bLow;
    let bestSize = 0;
    let runLengths = new Map<number, number>();

    for (let i = aLow; i < aHigh; i++) {
        const next = new Map<number, number>();
        for (const j of positions.get(a[i]) ?? []) {
            if (j < bLow) {
                continue;
            }
            if (j >= bHigh) {
                break;
            }
            const size = (runLengths.get(j - 1) ?? 0) + 1;
            next.set(j, size);
            if (size > bestSize) {
                bestI = i - size + 1;
                bestJ = j - size + 1;
                bestSize = size;
            }
        }
        runLengths = next;
    }

    // Grow the block over characters the index left out
    while (bestI > aLow && bestJ > bLow && a[bestI - 1] === b[bestJ - 1]) {
        bestI--;
        bestJ--;
        bestSize++;
    }
    while (bestI + bestSize < aHigh && bestJ + bestSize < bHigh && a[bestI + bestSize] === b[bestJ + bestSize]) {
        bestSize++;
    }

    return [bestI, bestJ, bestSize];
}

/**
 * Total characters covered by the recursive longest-match decomposition
 */
function matchedCharacters(a: string, b: string): number {
    const positions = indexPositions(b);
    const pending: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
    let matched = 0;

    while (pending.length > 0) {
        const next = pending.pop();
        if (!next) {
            break;
        }
        const [aLow, aHigh, bLow, bHigh] = next;
        const [i, j, size] = longestMatch(a, b, positions, aLow, aHigh, bLow, bHigh);
        if (size === 0) {
            continue;
        }
        matched += size;
        if (aLow < i && bLow < j) {
            pending.push([aLow, i, bLow, j]);
        }
        if (i + size < aHigh && j + size < bHigh) {
            pending.push([i + size, aHigh, j + size, bHigh]);
        }
    }
    return matched;
}

/**
 * Diff-style ratio 2*M/T over the normalized strings
 */
export function sequenceSimilarity(a: string, b: string): number {
    const left = normalize(a);
    const right = normalize(b);
    const total = left.length + right.length;
    if (total === 0) {
        return 1.0;
    }
    return (2 * matchedCharacters(left, right)) / total;
}

/**
 * Weighted blend favouring keyword overlap over surface phrasing
 */
export function combinedSimilarity(a: string, b: string): number {
    return KEYWORD_WEIGHT * jaccardSimilarity(a, b) + SEQUENCE_WEIGHT * sequenceSimilarity(a, b);
}

/**
 * SHA-256 of the sorted keyword set; stable across word order and casing
 */
export function fingerprint(title: string): string {
    const keywords = [...extractKeywords(title)].sort();
    return createHash('sha256').update(keywords.join(' '), 'utf8').digest('hex');
}

export default {
    normalize,
    extractKeywords,
    jaccardSimilarity,
    sequenceSimilarity,
    combinedSimilarity,
    fingerprint,
};
