import fs from 'node:fs';
import path from 'node:path';
import type { IndexEntry, PaperRecord } from '../types/index.js';
import { tokenize } from '../nlp/tokenizer.js';
import { indexLoadErrorToResearchError, type PaperStore } from '../storage/store.js';
import { atomicWriteJson, atomicWriteText } from '../storage/atomic.js';
import { isValidArxivId } from '../storage/ids.js';
import { invalidPaperId } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { formatDate, nowIso, parseTimespan, parseTimestamp } from '../utils/time.js';

const logger = getLogger();

// ─── Types ───────────────────────────────────────────────

export const EXPORT_FORMATS = ['markdown', 'json', 'csv'] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

/** Exactly one way of choosing papers */
export type ExportSelection = { paperId: string } | { all: true } | { query: string };

export interface ExportOptions {
    format: ExportFormat;
    selection: ExportSelection;

    /** Timespan such as "7d"; keeps papers collected within it */
    since?: string;

    /** Output directory; defaults to `<data-dir>/exports/<format>` */
    output?: string;

    /** Add summary text (Markdown and JSON only) */
    includeSummary?: boolean;
}

export interface ExportResult {
    message: string;
    export_count: number;
    format?: ExportFormat;
    output_path: string | null;
}

export interface FilterOptions {
    query?: string;
    since?: Date;
    paperId?: string;
}

export interface SelectedPaper {
    id: string;
    entry: IndexEntry;
}

const CSV_COLUMNS = ['id', 'title', 'authors', 'published', 'categories', 'has_summary', 'pdf_url', 'collected_at'] as const;

type CsvRow = Record<(typeof CSV_COLUMNS)[number], string>;

// ─── Selection ───────────────────────────────────────────

/**
 * Select index entries by ID, collection date, and query terms, newest first.
 * A query keeps a paper when any of its terms occurs in the title, abstract,
 * or topics.
 */
export function filterPapers(papers: Record<string, IndexEntry>, options: FilterOptions = {}): SelectedPaper[] {
    const terms = options.query ? tokenize(options.query) : [];
    const selected: SelectedPaper[] = [];

    for (const [id, entry] of Object.entries(papers)) {
        if (!isValidArxivId(id)) {
            logger.warn({ id }, 'Skipping paper with invalid ID');
            continue;
        }

        if (options.paperId && id !== options.paperId) continue;

        if (options.since && entry.collected_at) {
            const collectedAt = parseTimestamp(entry.collected_at);
            if (!collectedAt) {
                logger.warn({ id, collectedAt: entry.collected_at }, 'Invalid collected_at');
                continue;
            }
            if (collectedAt < options.since) continue;
        }

        if (terms.length > 0) {
            const searchable = [entry.title, entry.abstract, entry.topics.join(' ')].join(' ').toLowerCase();
            if (!terms.some((term) => searchable.includes(term))) continue;
        }

        selected.push({ id, entry });
    }

    selected.sort((a, b) =>
        a.entry.collected_at < b.entry.collected_at ? 1 : a.entry.collected_at > b.entry.collected_at ? -1 : 0
    );
    logger.info({ count: selected.length }, 'Filtered papers');
    return selected;
}

/**
 * Full metadata for a selected paper, or its index entry when the
 * metadata file cannot be read.
 */
function resolvePaper(store: PaperStore, paper: SelectedPaper): PaperRecord {
    return store.loadPaper(paper.id) ?? { ...paper.entry, id: paper.id, categories: [] };
}

// ─── Renderers ───────────────────────────────────────────

/**
 * One paper as a standalone Markdown document.
 */
export function renderPaperMarkdown(record: PaperRecord, summary: string | null, exportedOn: Date): string {
    const lines: string[] = [`# ${record.title || 'Untitled'}`, '', `**arXiv:** [${record.id}](https://arxiv.org/abs/${record.id})`];

    if (record.authors.length > 0) lines.push(`**Authors:** ${record.authors.join(', ')}`);
    if (record.published) lines.push(`**Published:** ${record.published}`);
    if (record.categories.length > 0) lines.push(`**Categories:** ${record.categories.join(', ')}`);

    lines.push('', '## Abstract', '', record.abstract || '*No abstract available*', '');

    if (summary) {
        lines.push('## Summary', '', summary, '');
    }

    lines.push('---', '', `*Exported on ${formatDate(exportedOn)}*`, '');
    return lines.join('\n');
}

function csvField(value: string): string {
    return `"${value.replace(/"/g, '""')}"`;
}

/**
 * Papers as CSV with every field quoted.
 */
export function renderCsv(records: readonly PaperRecord[]): string {
    const rows: CsvRow[] = records.map((record) => ({
        id: record.id,
        title: record.title,
        authors: record.authors.join('; '),
        published: record.published ?? '',
        categories: record.categories.join('; '),
        has_summary: String(record.has_summary),
        pdf_url: record.pdf_url ?? '',
        collected_at: record.collected_at,
    }));

    const lines = [CSV_COLUMNS.map(csvField).join(',')];
    for (const row of rows) {
        lines.push(CSV_COLUMNS.map((column) => csvField(row[column])).join(','));
    }
    return lines.map((line) => `${line}\r\n`).join('');
}

// ─── Main Export Function ────────────────────────────────

/**
 * Export selected papers from the collection to a directory.
 */
export function exportPapers(store: PaperStore, options: ExportOptions): ExportResult {
    const { format, selection } = options;

    if ('paperId' in selection && !isValidArxivId(selection.paperId)) {
        throw invalidPaperId(selection.paperId);
    }

    const since = options.since ? new Date(Date.now() - parseTimespan(options.since)) : undefined;

    const loaded = store.requireIndex();
    if (!loaded.ok) {
        throw indexLoadErrorToResearchError(loaded.error);
    }

    const papers = loaded.value.papers;
    if (Object.keys(papers).length === 0) {
        return {
            message: 'No papers in collection. Run the collect command first.',
            export_count: 0,
            output_path: null,
        };
    }

    const filters: FilterOptions = {
        ...('paperId' in selection ? { paperId: selection.paperId } : {}),
        ...('query' in selection ? { query: selection.query } : {}),
        ...(since ? { since } : {}),
    };
    const selected = filterPapers(papers, filters);

    if (selected.length === 0) {
        let message = 'No papers match the specified criteria.';
        if ('paperId' in selection) {
            message = `Paper ${selection.paperId} not found in collection.`;
        } else if ('query' in selection) {
            message = `No papers match query '${selection.query}'.`;
        } else if (options.since) {
            message = `No papers collected in the last ${options.since}.`;
        }
        return { message, export_count: 0, output_path: null };
    }

    const outputDir = options.output ?? path.join(store.dataDir, 'exports', format);
    fs.mkdirSync(outputDir, { recursive: true });

    const includeSummary = options.includeSummary ?? false;
    let exportCount = 0;

    switch (format) {
        case 'markdown': {
            const exportedOn = new Date();
            for (const paper of selected) {
                const summary = includeSummary ? store.loadSummary(paper.id) : null;
                const content = renderPaperMarkdown(resolvePaper(store, paper), summary, exportedOn);
                atomicWriteText(path.join(outputDir, `paper_${paper.id}.md`), content);
            }
            exportCount = selected.length;
            break;
        }
        case 'json': {
            const records = selected.map((paper) => {
                const record: PaperRecord & { summary_content?: string } = { ...resolvePaper(store, paper) };
                const summary = includeSummary ? store.loadSummary(paper.id) : null;
                if (summary) record.summary_content = summary;
                return record;
            });
            atomicWriteJson(path.join(outputDir, 'papers.json'), {
                exported_at: nowIso(),
                count: records.length,
                papers: records,
            });
            exportCount = records.length;
            break;
        }
        case 'csv': {
            const records = selected.map((paper) => resolvePaper(store, paper));
            atomicWriteText(path.join(outputDir, 'papers.csv'), renderCsv(records));
            exportCount = records.length;
            break;
        }
    }

    logger.info({ count: exportCount, format, outputDir }, 'Export complete');
    return {
        message: `Exported ${exportCount} papers as ${format.toUpperCase()}.`,
        export_count: exportCount,
        format,
        output_path: outputDir,
    };
}
