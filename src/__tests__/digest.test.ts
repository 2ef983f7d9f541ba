import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { buildDigestContent, extractSnippet, filterByDate, generateDigest, groupByTopic } from '../digest/digest.js';
import type { PaperStore } from '../storage/store.js';
import type { IndexEntry } from '../types/index.js';
import { entryFor, makeRecord, makeTempStore, removeStore, seedStore, thrownBy } from './helpers.js';

describe('extractSnippet', () => {
    it('should prefer the Problem section', () => {
        const summary = '# Summary\n\n## Problem\nLong documents are slow.\n\n## Method\nSparse.';
        expect(extractSnippet(summary)).toBe('Long documents are slow.');
    });

    it('should fall back to content lines, skipping headings and labels', () => {
        expect(extractSnippet('**Title:** X\n# Heading\nFirst line.\n\nSecond line.')).toBe('First line. Second line.');
    });

    it('should cut at a word boundary', () => {
        expect(extractSnippet(`## Problem\n${'word '.repeat(50)}`, 20)).toBe('word word word word...');
    });

    it('should return empty for an empty summary', () => {
        expect(extractSnippet('')).toBe('');
    });
});

describe('filterByDate', () => {
    const papers: Record<string, IndexEntry> = {
        '2401.00001': entryFor(makeRecord('2401.00001', { collected_at: '2024-01-14T00:00:00.000Z' })),
        '2401.00002': entryFor(makeRecord('2401.00002', { collected_at: '2024-01-18T00:00:00.000Z' })),
        '2401.00003': entryFor(makeRecord('2401.00003', { collected_at: '2024-01-13T23:59:59.000Z' })),
        '2401.00004': entryFor(makeRecord('2401.00004', { collected_at: 'yesterday' })),
        '2401.00005': entryFor(makeRecord('2401.00005', { collected_at: '' })),
    };

    it('should keep papers inside the inclusive window, newest first', () => {
        const selected = filterByDate(papers, new Date('2024-01-14T00:00:00Z'), new Date('2024-01-21T00:00:00Z'));
        expect(selected.map((p) => p.id)).toEqual(['2401.00002', '2401.00001']);
    });
});

describe('digest over a store', () => {
    let store: PaperStore;

    beforeEach(() => {
        store = makeTempStore();
    });

    afterEach(() => {
        removeStore(store);
    });

    function seedTopics(): void {
        seedStore(store, [
            makeRecord('2401.00001', { topics: ['nlp'], authors: ['A', 'B', 'C', 'D'], has_summary: true }),
            makeRecord('2401.00002', { categories: ['cs.LG'] }),
        ]);
        fs.writeFileSync(
            store.summaryPath('2401.00001'),
            '# Summary\n\n## Problem\nLong documents are slow.\n\n## Method\nSparse.'
        );

        const index = store.loadIndex();
        index.papers['2401.00003'] = entryFor(makeRecord('2401.00003'));
        store.saveIndex(index);
    }

    function allPapers(): { id: string; entry: IndexEntry }[] {
        return Object.entries(store.loadIndex().papers).map(([id, entry]) => ({ id, entry }));
    }

    it('should group by topic with categories as fallback and Uncategorized last', () => {
        seedTopics();

        const groups = groupByTopic(allPapers(), store);

        expect([...groups.keys()]).toEqual(['cs.LG', 'nlp', 'Uncategorized']);
        expect(groups.get('cs.LG')?.map((p) => p.id)).toEqual(['2401.00002']);
        expect(groups.get('Uncategorized')?.map((p) => p.id)).toEqual(['2401.00003']);
    });

    it('should list a paper under each of its topics', () => {
        seedStore(store, [makeRecord('2401.00001', { topics: ['vision', 'nlp'] })]);

        const groups = groupByTopic(allPapers(), store);
        expect([...groups.keys()]).toEqual(['nlp', 'vision']);
    });

    it('should render the digest document', () => {
        seedTopics();
        const groups = groupByTopic(allPapers(), store);

        const content = buildDigestContent(
            groups,
            new Date('2024-01-14T00:00:00Z'),
            new Date('2024-01-21T00:00:00Z'),
            store
        );

        expect(content).toBe(
            [
                '# Research Paper Digest',
                '',
                '**Generated:** 2024-01-21',
                '**Period:** 2024-01-14 to 2024-01-21',
                '**Papers:** 3 (1 with summaries)',
                '',
                '---',
                '',
                '## cs.LG',
                '',
                '### [2401.00002] Paper 2401.00002',
                '**Authors:** Ada Example',
                '**Published:** 2024-01-15',
                '',
                '> Abstract of 2401.00002.',
                '',
                '*Summary not available*',
                '',
                '---',
                '',
                '## nlp',
                '',
                '### [2401.00001] Paper 2401.00001',
                '**Authors:** A, B, C et al.',
                '**Published:** 2024-01-15',
                '',
                '> Long documents are slow.',
                '',
                '[View Full Summary](../papers/2401.00001/summary.md)',
                '',
                '---',
                '',
                '## Uncategorized',
                '',
                '### [2401.00003] Paper 2401.00003',
                '**Authors:** Ada Example',
                '',
                '> Abstract of 2401.00003.',
                '',
                '*Summary not available*',
                '',
                '---',
                '',
                '*Generated by paper-researcher*',
                '',
            ].join('\n')
        );
    });

    it('should note an empty period', () => {
        const content = buildDigestContent(new Map(), new Date('2024-01-14T00:00:00Z'), new Date('2024-01-21T00:00:00Z'), store);
        expect(content).toContain('**Papers:** 0 (0 with summaries)\n\n---\n\n*No papers collected in this time period.*\n');
    });

    it('should write the digest of recent papers', () => {
        const now = new Date().toISOString();
        seedStore(store, [
            makeRecord('2401.00001', { collected_at: now, topics: ['nlp'] }),
            makeRecord('2401.00002', { collected_at: '2020-01-01T00:00:00.000Z' }),
        ]);
        const output = path.join(store.dataDir, 'out', 'digest.md');

        const result = generateDigest(store, { output });

        expect(result).toEqual({
            message: 'Digest generated with 1 papers.',
            papers_count: 1,
            topics_count: 1,
            output_path: output,
        });
        const content = fs.readFileSync(output, 'utf-8');
        expect(content).toContain('### [2401.00001] Paper 2401.00001');
        expect(content).not.toContain('2401.00002');
    });

    it('should default to the digests directory', () => {
        seedStore(store, [makeRecord('2401.00001', { collected_at: new Date().toISOString() })]);

        const result = generateDigest(store);

        expect(result.output_path).toMatch(/digests[\\/]\d{4}-\d{2}-\d{2}\.md$/);
        expect(result.output_path && fs.existsSync(result.output_path)).toBe(true);
    });

    it('should report when nothing qualifies', () => {
        seedStore(store, []);
        expect(generateDigest(store)).toEqual({
            message: 'No papers in collection. Run the collect command first.',
            papers_count: 0,
            output_path: null,
        });

        seedStore(store, [makeRecord('2401.00001')]);
        expect(generateDigest(store, { since: '1w' })).toEqual({
            message: 'No papers collected in the last 1w.',
            papers_count: 0,
            output_path: null,
        });
    });

    it('should reject a bad timespan and a missing index', () => {
        expect(thrownBy(() => generateDigest(store, { since: '0d' }))).toMatchObject({ code: 'INVALID_ARGUMENT' });
        expect(thrownBy(() => generateDigest(store))).toMatchObject({ code: 'INDEX_NOT_FOUND' });
    });
});
