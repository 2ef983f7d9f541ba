import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { fetchCitations } from '../citations/fetch-citations.js';
import {
    buildCitationGraph,
    buildGraph,
    calculateGraphStats,
    getHighlyCited,
} from '../graph/citation-graph.js';
import { PaperStore } from '../storage/store.js';
import type { CitationData, CitationLookupResult, CitationProvider } from '../types/index.js';
import { entryFor, makeRecord, makeTempStore, removeStore, seedStore } from './helpers.js';

function citations(references: string[], citedBy: string[]): CitationData {
    return {
        source: 'semantic_scholar',
        fetched_at: '2024-01-21T00:00:00.000Z',
        citation_count: citedBy.length,
        reference_count: references.length,
        references_in_collection: references,
        cited_by_in_collection: citedBy,
    };
}

/**
 * Provider answering from a fixed table; IDs mapped to an Error reject.
 */
class FakeProvider implements CitationProvider {
    readonly name = 'fake';
    readonly calls: string[] = [];

    constructor(private readonly answers: Record<string, CitationLookupResult | null | Error>) {}

    async fetchCitationData(arxivId: string): Promise<CitationLookupResult | null> {
        this.calls.push(arxivId);
        const answer = this.answers[arxivId];
        if (answer instanceof Error) throw answer;
        return answer ?? null;
    }
}

describe('fetchCitations', () => {
    let store: PaperStore;

    beforeEach(() => {
        store = makeTempStore();
        seedStore(store, [makeRecord('2401.00001'), makeRecord('2401.00002'), makeRecord('2401.00003')]);
    });

    afterEach(() => {
        removeStore(store);
    });

    it('should store in-collection citation data and record failures', async () => {
        const provider = new FakeProvider({
            '2401.00001': {
                citationCount: 10,
                referenceCount: 2,
                references: [{ externalIds: { ArXiv: '2401.00002' } }, { externalIds: { ArXiv: '2499.99999' } }],
                citations: [{ externalIds: { ArXiv: '2401.00003' } }, { externalIds: null }],
            },
            '2401.00002': null,
            '2401.00003': new Error('boom'),
        });

        const summary = await fetchCitations(store, provider, { all: true });

        expect(summary).toEqual({
            success: false,
            papers_processed: 2,
            papers_with_citations: 1,
            papers_not_found: 1,
            errors: ['Fetch failed: 2401.00003'],
        });

        expect(store.loadPaper('2401.00001')?.citation_data).toMatchObject({
            source: 'semantic_scholar',
            citation_count: 10,
            reference_count: 2,
            references_in_collection: ['2401.00002'],
            cited_by_in_collection: ['2401.00003'],
        });
        expect(store.loadPaper('2401.00002')?.citation_data).toMatchObject({
            source: 'unavailable',
            citation_count: 0,
            reference_count: 0,
            references_in_collection: [],
            cited_by_in_collection: [],
        });
        expect(store.loadPaper('2401.00003')?.citation_data).toBeUndefined();
    });

    it('should fetch a single paper', async () => {
        const provider = new FakeProvider({ '2401.00002': { citationCount: 1, referenceCount: 0 } });

        const summary = await fetchCitations(store, provider, { paperId: '2401.00002' });

        expect(provider.calls).toEqual(['2401.00002']);
        expect(summary.success).toBe(true);
        expect(summary.papers_with_citations).toBe(1);
    });

    it('should reject an invalid or unknown paper ID', async () => {
        const provider = new FakeProvider({});
        await expect(fetchCitations(store, provider, { paperId: '../x' })).rejects.toMatchObject({
            code: 'INVALID_PAPER_ID',
        });
        await expect(fetchCitations(store, provider, { paperId: '2401.09999' })).rejects.toMatchObject({
            code: 'PAPER_NOT_IN_COLLECTION',
        });
    });

    it('should require the data directory', async () => {
        const missing = new PaperStore(path.join(os.tmpdir(), 'paper-researcher-missing', 'data'));
        await expect(fetchCitations(missing, new FakeProvider({}), { all: true })).rejects.toMatchObject({
            code: 'DATA_DIR_NOT_FOUND',
        });
    });

    it('should succeed with zero counts for an empty collection', async () => {
        const empty = makeTempStore();
        try {
            const summary = await fetchCitations(empty, new FakeProvider({}), { all: true });
            expect(summary).toEqual({
                success: true,
                papers_processed: 0,
                papers_with_citations: 0,
                papers_not_found: 0,
                errors: [],
            });
        } finally {
            removeStore(empty);
        }
    });
});

describe('citation graph', () => {
    let store: PaperStore;

    beforeEach(() => {
        store = makeTempStore();
        seedStore(store, [
            makeRecord('2401.00001', { citation_data: citations(['2401.00002', '2401.00003'], []) }),
            makeRecord('2401.00002', { citation_data: citations([], ['2401.00001', 'not-an-id']) }),
            makeRecord('2401.00003', { citation_data: citations([], ['2401.00001']) }),
            makeRecord('2401.00004'),
        ]);
    });

    afterEach(() => {
        removeStore(store);
    });

    it('should build edges from stored citation data', () => {
        const graph = buildCitationGraph(store);

        expect([...graph.keys()]).toEqual(['2401.00001', '2401.00002', '2401.00003', '2401.00004']);
        expect(graph.get('2401.00001')).toEqual({ references: ['2401.00002', '2401.00003'], cited_by: [] });
        expect(graph.get('2401.00002')).toEqual({ references: [], cited_by: ['2401.00001'] });
        expect(graph.get('2401.00004')).toEqual({ references: [], cited_by: [] });
    });

    it('should exclude indexed papers whose metadata is missing', () => {
        const index = store.loadIndex();
        index.papers['2401.00009'] = entryFor(makeRecord('2401.00009'));
        store.saveIndex(index);

        expect(buildCitationGraph(store).has('2401.00009')).toBe(false);
    });

    it('should count reference edges only', () => {
        expect(calculateGraphStats(buildCitationGraph(store))).toEqual({
            totalPapers: 4,
            papersWithCitations: 3,
            totalEdges: 2,
        });
    });

    it('should rank highly cited papers with ties in insertion order', () => {
        const graph = buildCitationGraph(store);
        expect(getHighlyCited(graph)).toEqual([
            { id: '2401.00002', citedByCount: 1 },
            { id: '2401.00003', citedByCount: 1 },
        ]);
        expect(getHighlyCited(graph, 1)).toEqual([{ id: '2401.00002', citedByCount: 1 }]);
    });

    it('should write the citation index', () => {
        const result = buildGraph(store, 5);

        expect(result).toEqual({
            total_papers: 4,
            papers_with_citations: 3,
            total_edges: 2,
            highly_cited: [
                { id: '2401.00002', cited_by_count: 1 },
                { id: '2401.00003', cited_by_count: 1 },
            ],
        });

        const doc: unknown = JSON.parse(fs.readFileSync(store.citationsPath, 'utf-8'));
        expect(doc).toMatchObject({
            version: '1.0',
            stats: { total_papers: 4, total_edges: 2, highly_cited: ['2401.00002', '2401.00003'] },
        });
    });

    it('should write nothing for an empty collection', () => {
        const empty = makeTempStore();
        try {
            expect(buildGraph(empty)).toEqual({
                total_papers: 0,
                papers_with_citations: 0,
                total_edges: 0,
                highly_cited: [],
            });
            expect(fs.existsSync(empty.citationsPath)).toBe(false);
        } finally {
            removeStore(empty);
        }
    });
});
