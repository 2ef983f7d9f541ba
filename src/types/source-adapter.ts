import type { FetchedPaper } from './paper.js';

/**
 * A source of new papers (arXiv).
 */
export interface PaperSource {
    /** Human-readable source name */
    readonly name: string;

    /**
     * Papers on a topic submitted within the last `days` days, newest first.
     */
    searchRecent(topic: string, days: number, maxResults: number): Promise<FetchedPaper[]>;
}

/**
 * A paper linked from a citation lookup (one reference or one citing paper).
 */
export interface LinkedPaper {
    paperId?: string | null;

    /** External identifiers keyed by scheme ("ArXiv", "DOI", ...) */
    externalIds?: Record<string, unknown> | null;
}

export interface CitationLookupResult {
    paperId?: string | null;
    citationCount?: number | null;
    referenceCount?: number | null;
    references?: LinkedPaper[] | null;
    citations?: LinkedPaper[] | null;
}

/**
 * A source of citation data (Semantic Scholar).
 */
export interface CitationProvider {
    readonly name: string;

    /**
     * Look a paper up by arXiv ID. Resolves to null when the source does
     * not know the paper.
     */
    fetchCitationData(arxivId: string): Promise<CitationLookupResult | null>;
}

/**
 * Options for source adapter initialization.
 */
export interface SourceAdapterOptions {
    /** API key (from environment variable) */
    apiKey?: string;
}
