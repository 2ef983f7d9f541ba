import type { CitationEdges, CitationGraph, CitationsIndex, GraphStats, HighlyCitedPaper } from '../types/index.js';
import type { PaperStore } from '../storage/store.js';
import { isValidArxivId } from '../storage/ids.js';
import { getLogger } from '../utils/logger.js';
import { ResearchError } from '../utils/errors.js';
import { nowIso } from '../utils/time.js';

const logger = getLogger();

export const CITATIONS_INDEX_VERSION = '1.0';
export const DEFAULT_HIGHLY_CITED_TOP = 10;

function validIds(ids: readonly string[], paperId: string, list: keyof CitationEdges): string[] {
    return ids.filter((id) => {
        if (isValidArxivId(id)) return true;
        logger.warn({ paperId, list, id }, 'Dropping invalid ID from citation list');
        return false;
    });
}

/**
 * Build the in-collection citation graph from per-paper citation data.
 *
 * Every indexed paper whose metadata loads becomes a node; papers without
 * citation data get empty edge lists. The two lists are taken as stored and
 * are not reconciled against each other.
 */
export function buildCitationGraph(store: PaperStore): CitationGraph {
    const index = store.loadIndex();
    const graph: CitationGraph = new Map();

    for (const paperId of Object.keys(index.papers)) {
        if (!isValidArxivId(paperId)) {
            logger.warn({ paperId }, 'Skipping invalid paper ID in index');
            continue;
        }

        const paper = store.loadPaper(paperId);
        if (!paper) {
            logger.debug({ paperId }, 'Metadata not loadable, excluding from graph');
            continue;
        }

        const citations = paper.citation_data;
        graph.set(paperId, {
            references: validIds(citations?.references_in_collection ?? [], paperId, 'references'),
            cited_by: validIds(citations?.cited_by_in_collection ?? [], paperId, 'cited_by'),
        });
    }

    return graph;
}

/**
 * Summary counts for a graph. Each reference is one edge; `cited_by` is the
 * reverse view of the same edges and is not counted again.
 */
export function calculateGraphStats(graph: CitationGraph): GraphStats {
    let papersWithCitations = 0;
    let totalEdges = 0;

    for (const edges of graph.values()) {
        if (edges.references.length > 0 || edges.cited_by.length > 0) {
            papersWithCitations++;
        }
        totalEdges += edges.references.length;
    }

    return { totalPapers: graph.size, papersWithCitations, totalEdges };
}

/**
 * Papers cited by at least one other collected paper, most cited first.
 * Ties keep graph insertion order.
 */
export function getHighlyCited(graph: CitationGraph, topN = DEFAULT_HIGHLY_CITED_TOP): HighlyCitedPaper[] {
    const counts: HighlyCitedPaper[] = [];
    for (const [id, edges] of graph) {
        if (edges.cited_by.length > 0) {
            counts.push({ id, citedByCount: edges.cited_by.length });
        }
    }

    counts.sort((a, b) => b.citedByCount - a.citedByCount);
    return counts.slice(0, topN);
}

/**
 * The `index/citations.json` document for a graph.
 */
export function buildCitationsIndex(graph: CitationGraph, topN = DEFAULT_HIGHLY_CITED_TOP): CitationsIndex {
    const stats = calculateGraphStats(graph);
    const highlyCited = getHighlyCited(graph, topN);

    return {
        version: CITATIONS_INDEX_VERSION,
        updated_at: nowIso(),
        graph: Object.fromEntries(graph),
        stats: {
            total_papers: stats.totalPapers,
            papers_with_citations: stats.papersWithCitations,
            total_edges: stats.totalEdges,
            highly_cited: highlyCited.map((paper) => paper.id),
        },
    };
}

export interface BuildGraphResult {
    total_papers: number;
    papers_with_citations: number;
    total_edges: number;
    highly_cited: { id: string; cited_by_count: number }[];
}

/**
 * Rebuild the citation graph and write `index/citations.json`.
 * An empty graph writes nothing.
 */
export function buildGraph(store: PaperStore, topN = DEFAULT_HIGHLY_CITED_TOP): BuildGraphResult {
    if (!store.dataDirExists()) {
        throw new ResearchError('DATA_DIR_NOT_FOUND', `Data directory not found: ${store.dataDir}`);
    }

    const graph = buildCitationGraph(store);
    if (graph.size === 0) {
        return { total_papers: 0, papers_with_citations: 0, total_edges: 0, highly_cited: [] };
    }

    const doc = buildCitationsIndex(graph, topN);
    store.saveCitationsIndex(doc);
    logger.info({ papers: graph.size, edges: doc.stats.total_edges }, 'Wrote citation index');

    return {
        total_papers: doc.stats.total_papers,
        papers_with_citations: doc.stats.papers_with_citations,
        total_edges: doc.stats.total_edges,
        highly_cited: getHighlyCited(graph, topN).map((paper) => ({ id: paper.id, cited_by_count: paper.citedByCount })),
    };
}
