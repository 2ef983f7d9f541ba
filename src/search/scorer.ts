/**
 * Field weights for relevance scoring.
 */
export const FIELD_WEIGHTS = {
    title: 3.0,
    abstract: 2.0,
    summary: 1.5,
    topic: 1.0,
} as const;

/**
 * Fields of a paper that take part in scoring.
 */
export interface ScorablePaper {
    title: string;
    abstract: string;
    topics: string[];
}

/**
 * Number of distinct terms that occur in `text` as case-insensitive substrings.
 */
export function countMatches(text: string, terms: readonly string[]): number {
    const lower = text.toLowerCase();
    let count = 0;
    for (const term of new Set(terms)) {
        if (lower.includes(term)) count++;
    }
    return count;
}

/**
 * Linear relevance score: each field contributes its weight times the
 * number of distinct terms found in it. The summary counts only when
 * present and non-empty; every topic counts separately.
 *
 * Zero exactly when no term matches any field.
 */
export function scorePaper(terms: readonly string[], paper: ScorablePaper, summary: string | null): number {
    if (terms.length === 0) return 0;

    let score = 0;
    score += countMatches(paper.title, terms) * FIELD_WEIGHTS.title;
    score += countMatches(paper.abstract, terms) * FIELD_WEIGHTS.abstract;

    if (summary) {
        score += countMatches(summary, terms) * FIELD_WEIGHTS.summary;
    }

    for (const topic of paper.topics) {
        score += countMatches(topic, terms) * FIELD_WEIGHTS.topic;
    }

    return score;
}

/**
 * Round to two decimal places for display.
 */
export function roundScore(score: number): number {
    return Math.round(score * 100) / 100;
}
