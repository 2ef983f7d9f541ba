import fs from 'node:fs';
import type { PaperStore } from '../storage/store.js';
import { isValidArxivId } from '../storage/ids.js';
import { fetchResultSchema } from '../storage/schemas.js';
import { INDEX_ABSTRACT_LENGTH, type PaperRecord } from '../types/index.js';
import { ResearchError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { nowIso } from '../utils/time.js';

const logger = getLogger();

export interface CollectSummary {
    success: boolean;
    saved: number;
    duplicates: number;
    total: number;
    errors: string[];
}

function stringField(paper: Record<string, unknown>, key: string): string {
    const value = paper[key];
    return typeof value === 'string' ? value : '';
}

function stringListField(paper: Record<string, unknown>, key: string): string[] {
    const value = paper[key];
    return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

/**
 * Read and validate a fetch output file.
 */
export function readFetchResult(inputPath: string): unknown {
    let text: string;
    try {
        text = fs.readFileSync(inputPath, 'utf-8');
    } catch (error) {
        throw new ResearchError('INPUT_NOT_FOUND', `Input file not found: ${inputPath}`, errorMessage(error));
    }

    try {
        return JSON.parse(text);
    } catch (error) {
        throw new ResearchError('INVALID_JSON', `Invalid JSON in input file: ${errorMessage(error)}`);
    }
}

/**
 * Store fetched papers and add them to the index.
 *
 * Each paper is created once; a paper already on disk (or one without a
 * valid ID) counts as a duplicate and is left untouched. A paper that
 * fails to save is reported in `errors`. Stored papers missing from the
 * index are then added from their on-disk record with a truncated abstract.
 */
export function collectPapers(store: PaperStore, input: unknown): CollectSummary {
    const parsed = fetchResultSchema.safeParse(input);
    if (!parsed.success || !parsed.data.success) {
        throw new ResearchError('INVALID_INPUT', 'Input file indicates failure, aborting');
    }

    const { query, papers } = parsed.data;
    logger.info({ count: papers.length }, 'Processing papers from input');

    fs.mkdirSync(store.dataDir, { recursive: true });
    const index = store.loadIndex();

    let saved = 0;
    let duplicates = 0;
    const errors: string[] = [];
    const collectedAt = nowIso();

    for (const paper of papers) {
        const record: PaperRecord = {
            ...paper,
            id: stringField(paper, 'id'),
            title: stringField(paper, 'title'),
            authors: stringListField(paper, 'authors'),
            abstract: stringField(paper, 'abstract'),
            categories: stringListField(paper, 'categories'),
            collected_at: collectedAt,
            topics: query ? [query] : [],
            has_summary: false,
        };

        try {
            if (store.createPaper(record)) {
                saved++;
            } else {
                duplicates++;
            }
        } catch (error) {
            logger.error({ id: record.id, error: errorMessage(error) }, 'Failed to save paper');
            errors.push(`Failed to save: ${record.id}`);
        }
    }

    for (const paper of papers) {
        const id = stringField(paper, 'id');
        if (!isValidArxivId(id) || id in index.papers) continue;

        const stored = store.loadPaper(id);
        if (!stored) continue;

        index.papers[id] = {
            title: stored.title,
            authors: stored.authors,
            abstract: stored.abstract.slice(0, INDEX_ABSTRACT_LENGTH),
            topics: stored.topics,
            collected_at: stored.collected_at,
            has_summary: stored.has_summary,
        };
    }

    store.saveIndex(index);
    logger.info({ saved, duplicates, errors: errors.length }, `Stored ${saved} new papers`);

    return { success: errors.length === 0, saved, duplicates, total: papers.length, errors };
}
