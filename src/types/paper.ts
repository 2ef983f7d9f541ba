/**
 * Paper record: the per-paper document stored at `papers/<ID>/metadata.json`.
 * Created once by the collector, then mutated in place by status updates.
 */
export interface PaperRecord {
    /** Canonical arXiv identifier (e.g., "2401.12345") */
    id: string;

    title: string;

    /** Author names in listed order */
    authors: string[];

    abstract: string;

    /** Publication date (YYYY-MM-DD) */
    published?: string;

    /** Last revision date (YYYY-MM-DD) */
    updated?: string;

    /** arXiv categories (e.g., "cs.CL") */
    categories: string[];

    pdf_url?: string;

    /** ISO timestamp set when the paper was first stored, never updated */
    collected_at: string;

    /** Topic tags (the search topic the paper was collected under) */
    topics: string[];

    has_summary: boolean;
    summary_generated_at?: string;

    has_blog_post?: boolean;
    blog_post_generated_at?: string;

    annotation_count?: number;
    last_annotated_at?: string;

    /** Set when the paper arrived through a shared collection package */
    imported_at?: string;
    imported_from?: string;

    citation_data?: CitationData;
}

/**
 * Citation data attached to a paper by the citation fetcher.
 * Reference lists are already restricted to papers in the local collection.
 */
export type CitationData = UnavailableCitationData | SemanticScholarCitationData;

interface CitationDataBase {
    fetched_at: string;
    citation_count: number;
    reference_count: number;
    references_in_collection: string[];
    cited_by_in_collection: string[];
}

/** Paper was not found in Semantic Scholar. Counts are zero, lists empty. */
export interface UnavailableCitationData extends CitationDataBase {
    source: 'unavailable';
}

export interface SemanticScholarCitationData extends CitationDataBase {
    source: 'semantic_scholar';
}

export type CitationSource = CitationData['source'];

/**
 * Abbreviated paper view kept in the global index for fast listing.
 */
export interface IndexEntry {
    title: string;
    authors: string[];

    /** First 500 characters of the abstract */
    abstract: string;

    topics: string[];
    collected_at: string;
    has_summary: boolean;
    has_blog_post?: boolean;
    imported_at?: string;
}

/**
 * The global index document at `index/papers.json`.
 */
export interface IndexRecord {
    version: string;
    updated_at: string;
    papers: Record<string, IndexEntry>;
}

/**
 * Paper metadata as produced by the arXiv fetcher, before collection.
 */
export interface FetchedPaper {
    id: string;
    title: string;
    authors: string[];
    abstract: string;
    published: string;
    updated: string;
    categories: string[];
    pdf_url: string;
}

/**
 * Output document of the fetch command, consumed by the collect command.
 */
export interface FetchResult {
    success: boolean;
    count: number;
    query: string;
    days: number;
    papers: FetchedPaper[];
}

/**
 * Boolean/integer flags updated by downstream producers, each with a
 * companion timestamp field.
 */
export interface PaperFlags {
    has_summary: boolean;
    has_blog_post: boolean;
    annotation_count: number;
}

export type FlagField = keyof PaperFlags;

export const FLAG_TIMESTAMP_FIELDS = {
    has_summary: 'summary_generated_at',
    has_blog_post: 'blog_post_generated_at',
    annotation_count: 'last_annotated_at',
} as const satisfies Record<FlagField, keyof PaperRecord>;

/** Flags mirrored into the index entry */
export type IndexFlagField = 'has_summary' | 'has_blog_post';

export const INDEX_VERSION = '1.0';

/** Abstract prefix length kept in index entries */
export const INDEX_ABSTRACT_LENGTH = 500;
