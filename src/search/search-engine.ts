import { tokenize } from '../nlp/tokenizer.js';
import { indexLoadErrorToResearchError, type PaperStore } from '../storage/store.js';
import { isValidArxivId } from '../storage/ids.js';
import { ResearchError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import type { IndexEntry } from '../types/index.js';
import { extractExcerpt } from './excerpt.js';
import { roundScore, scorePaper } from './scorer.js';

const logger = getLogger();

export const DEFAULT_SEARCH_LIMIT = 10;
export const MAX_QUERY_LENGTH = 500;

export interface SearchResult {
    id: string;
    title: string;
    authors: string[];
    score: number;
    excerpt: string;
}

export interface SearchOutcome {
    results: SearchResult[];

    /** Number of entries in the index, matched or not */
    totalPapers: number;
}

interface ScoredPaper {
    id: string;
    entry: IndexEntry;
    summary: string | null;
    score: number;
}

/**
 * Rank the collection against a keyword query.
 *
 * Scores each index entry (and its summary, when one was generated) and
 * returns the top `limit` papers with a non-zero score. Papers with equal
 * scores keep their index order.
 */
export function searchPapers(store: PaperStore, query: string, limit = DEFAULT_SEARCH_LIMIT): SearchOutcome {
    const trimmed = query.trim();
    if (trimmed.length === 0) {
        throw new ResearchError('INVALID_QUERY', 'Query cannot be empty');
    }
    if (trimmed.length > MAX_QUERY_LENGTH) {
        throw new ResearchError('INVALID_QUERY', `Query too long (max ${MAX_QUERY_LENGTH} characters)`);
    }

    const loaded = store.requireIndex();
    if (!loaded.ok) {
        throw indexLoadErrorToResearchError(loaded.error);
    }

    const papers = loaded.value.papers;
    const totalPapers = Object.keys(papers).length;

    const terms = tokenize(trimmed);
    if (terms.length === 0) {
        return { results: [], totalPapers };
    }

    logger.debug({ terms }, 'Searching');

    const scored: ScoredPaper[] = [];
    for (const [id, entry] of Object.entries(papers)) {
        if (!isValidArxivId(id)) {
            logger.warn({ id }, 'Skipping paper with invalid ID');
            continue;
        }

        const summary = entry.has_summary ? store.loadSummary(id) : null;
        const score = scorePaper(terms, entry, summary);
        if (score > 0) {
            scored.push({ id, entry, summary, score });
        }
    }

    // Array.prototype.sort is stable, so ties keep index order
    scored.sort((a, b) => b.score - a.score);

    const results = scored.slice(0, limit).map(({ id, entry, summary, score }) => ({
        id,
        title: entry.title,
        authors: entry.authors,
        score: roundScore(score),
        excerpt: extractExcerpt(terms, summary || entry.abstract),
    }));

    logger.info({ matches: results.length, totalPapers }, 'Search complete');
    return { results, totalPapers };
}
