/**
 * Citation edges of a single paper, restricted to the local collection.
 */
export interface CitationEdges {
    references: string[];
    cited_by: string[];
}

/**
 * Derived citation graph: paper ID → its in-collection edges.
 * Rebuilt in full from per-paper citation data on every run.
 */
export type CitationGraph = Map<string, CitationEdges>;

export interface GraphStats {
    totalPapers: number;

    /** Papers with at least one reference or one citing paper */
    papersWithCitations: number;

    /** Sum of reference-list lengths; cited_by is the inverse view and is not counted */
    totalEdges: number;
}

export interface HighlyCitedPaper {
    id: string;
    citedByCount: number;
}

/**
 * The citation index document at `index/citations.json`.
 */
export interface CitationsIndex {
    version: string;
    updated_at: string;
    graph: Record<string, CitationEdges>;
    stats: {
        total_papers: number;
        papers_with_citations: number;
        total_edges: number;
        highly_cited: string[];
    };
}
