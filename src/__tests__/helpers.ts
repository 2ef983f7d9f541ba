import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { PaperStore } from '../storage/store.js';
import type { IndexEntry, PaperRecord } from '../types/index.js';

/**
 * Store over a fresh temp directory.
 */
export function makeTempStore(prefix = 'paper-researcher-test-'): PaperStore {
    return new PaperStore(fs.mkdtempSync(path.join(os.tmpdir(), prefix)));
}

export function removeStore(store: PaperStore): void {
    fs.rmSync(store.dataDir, { recursive: true, force: true });
}

export function makeRecord(id: string, overrides: Partial<PaperRecord> = {}): PaperRecord {
    return {
        id,
        title: `Paper ${id}`,
        authors: ['Ada Example'],
        abstract: `Abstract of ${id}.`,
        published: '2024-01-15',
        categories: ['cs.CL'],
        pdf_url: `https://arxiv.org/pdf/${id}.pdf`,
        collected_at: '2024-01-20T10:00:00.000Z',
        topics: [],
        has_summary: false,
        ...overrides,
    };
}

export function entryFor(record: PaperRecord): IndexEntry {
    return {
        title: record.title,
        authors: record.authors,
        abstract: record.abstract,
        topics: record.topics,
        collected_at: record.collected_at,
        has_summary: record.has_summary,
    };
}

/**
 * Write each record to disk and index all of them.
 */
export function seedStore(store: PaperStore, records: readonly PaperRecord[]): void {
    const papers: Record<string, IndexEntry> = {};
    for (const record of records) {
        store.savePaper(record);
        papers[record.id] = entryFor(record);
    }
    store.saveIndex({ version: '1.0', updated_at: '', papers });
}

export function writeRawIndex(store: PaperStore, value: unknown): void {
    fs.mkdirSync(store.indexDir, { recursive: true });
    fs.writeFileSync(store.indexPath, typeof value === 'string' ? value : JSON.stringify(value));
}

/**
 * The value `fn` throws, or undefined when it returns.
 */
export function thrownBy(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    return undefined;
}
