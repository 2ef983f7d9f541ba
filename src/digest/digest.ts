import fs from 'node:fs';
import path from 'node:path';
import type { IndexEntry } from '../types/index.js';
import { indexLoadErrorToResearchError, type PaperStore } from '../storage/store.js';
import { atomicWriteText } from '../storage/atomic.js';
import { isValidArxivId } from '../storage/ids.js';
import { getLogger } from '../utils/logger.js';
import { formatDate, parseTimespan, parseTimestamp } from '../utils/time.js';

const logger = getLogger();

export const DEFAULT_DIGEST_SPAN = '7d';
export const DEFAULT_SNIPPET_LENGTH = 200;
export const UNCATEGORIZED_TOPIC = 'Uncategorized';

const MAX_LISTED_AUTHORS = 3;

export interface DigestPaper {
    id: string;
    entry: IndexEntry;
}

/** Topic name → papers, in display order */
export type TopicGroups = Map<string, DigestPaper[]>;

export interface DigestOptions {
    /** Timespan such as "7d" */
    since?: string;

    /** Output file; defaults to `<data-dir>/digests/<YYYY-MM-DD>.md` */
    output?: string;
}

export interface DigestResult {
    message: string;
    papers_count: number;
    topics_count?: number;
    output_path: string | null;
}

/**
 * Cut text to `maxLength`, backing up to the last space, and mark the cut.
 */
function truncateAtWord(text: string, maxLength: number): string {
    if (text.length <= maxLength) return text;
    const head = text.slice(0, maxLength);
    const lastSpace = head.lastIndexOf(' ');
    return `${lastSpace === -1 ? head : head.slice(0, lastSpace)}...`;
}

/**
 * A short preview of a summary: the Problem section when there is one,
 * otherwise the first lines that are neither headings nor bold labels.
 */
export function extractSnippet(summary: string, maxLength = DEFAULT_SNIPPET_LENGTH): string {
    if (!summary) return '';

    const problem = /## Problem\s*\n([\s\S]+?)(?:\n##|$)/.exec(summary);
    if (problem?.[1]) {
        return truncateAtWord(problem[1].trim(), maxLength);
    }

    const contentLines: string[] = [];
    for (const rawLine of summary.split('\n')) {
        const line = rawLine.trim();
        if (line && !line.startsWith('#') && !line.startsWith('**')) {
            contentLines.push(line);
            if (contentLines.join(' ').length >= maxLength) break;
        }
    }

    return truncateAtWord(contentLines.join(' '), maxLength);
}

/**
 * Papers collected between `since` and `until` (both inclusive), newest
 * first. Papers without a readable collection date are left out.
 */
export function filterByDate(papers: Record<string, IndexEntry>, since: Date, until: Date): DigestPaper[] {
    const selected: DigestPaper[] = [];

    for (const [id, entry] of Object.entries(papers)) {
        if (!isValidArxivId(id)) {
            logger.warn({ id }, 'Skipping paper with invalid ID');
            continue;
        }
        if (!entry.collected_at) continue;

        const collectedAt = parseTimestamp(entry.collected_at);
        if (!collectedAt) {
            logger.warn({ id, collectedAt: entry.collected_at }, 'Invalid collected_at');
            continue;
        }
        if (collectedAt >= since && collectedAt <= until) {
            selected.push({ id, entry });
        }
    }

    selected.sort((a, b) =>
        a.entry.collected_at < b.entry.collected_at ? 1 : a.entry.collected_at > b.entry.collected_at ? -1 : 0
    );
    return selected;
}

/**
 * Group papers by topic. Topics come from the index entry, then the full
 * metadata, then the arXiv categories; a paper with none of these is
 * Uncategorized. A paper appears under each of its topics. Groups are
 * sorted by name with Uncategorized last.
 */
export function groupByTopic(papers: readonly DigestPaper[], store: PaperStore): TopicGroups {
    const groups = new Map<string, DigestPaper[]>();

    for (const paper of papers) {
        let topics = paper.entry.topics;

        if (topics.length === 0) {
            const metadata = store.loadPaper(paper.id);
            if (metadata) {
                topics = metadata.topics.length > 0 ? metadata.topics : metadata.categories;
            }
        }

        if (topics.length === 0) {
            topics = [UNCATEGORIZED_TOPIC];
        }

        for (const topic of topics) {
            const group = groups.get(topic);
            if (group) {
                group.push(paper);
            } else {
                groups.set(topic, [paper]);
            }
        }
    }

    const names = [...groups.keys()].filter((name) => name !== UNCATEGORIZED_TOPIC).sort();
    if (groups.has(UNCATEGORIZED_TOPIC)) names.push(UNCATEGORIZED_TOPIC);

    const sorted: TopicGroups = new Map();
    for (const name of names) {
        const group = groups.get(name);
        if (group) sorted.set(name, group);
    }

    logger.info({ topics: sorted.size }, 'Grouped papers by topic');
    return sorted;
}

function formatAuthors(authors: readonly string[]): string {
    const listed = authors.slice(0, MAX_LISTED_AUTHORS).join(', ');
    return authors.length > MAX_LISTED_AUTHORS ? `${listed} et al.` : listed;
}

/**
 * Render the digest as Markdown.
 */
export function buildDigestContent(groups: TopicGroups, since: Date, until: Date, store: PaperStore): string {
    const uniqueIds = new Set<string>();
    let withSummary = 0;
    for (const group of groups.values()) {
        for (const paper of group) {
            if (uniqueIds.has(paper.id)) continue;
            uniqueIds.add(paper.id);
            if (paper.entry.has_summary) withSummary++;
        }
    }

    const lines: string[] = [
        '# Research Paper Digest',
        '',
        `**Generated:** ${formatDate(until)}`,
        `**Period:** ${formatDate(since)} to ${formatDate(until)}`,
        `**Papers:** ${uniqueIds.size} (${withSummary} with summaries)`,
        '',
        '---',
        '',
    ];

    if (groups.size === 0) {
        lines.push('*No papers collected in this time period.*', '');
    }

    for (const [topic, papers] of groups) {
        lines.push(`## ${topic}`, '');

        for (const { id, entry } of papers) {
            const published = store.loadPaper(id)?.published ?? '';

            lines.push(`### [${id}] ${entry.title || 'Untitled'}`);
            lines.push(`**Authors:** ${formatAuthors(entry.authors)}`);
            if (published) lines.push(`**Published:** ${published}`);
            lines.push('');

            if (entry.has_summary) {
                const summary = store.loadSummary(id);
                const snippet = summary ? extractSnippet(summary) : '';
                if (snippet) lines.push(`> ${snippet}`, '');
                lines.push(`[View Full Summary](../papers/${id}/summary.md)`);
            } else {
                if (entry.abstract) {
                    lines.push(`> ${truncateAtWord(entry.abstract, DEFAULT_SNIPPET_LENGTH)}`, '');
                }
                lines.push('*Summary not available*');
            }
            lines.push('');
        }

        lines.push('---', '');
    }

    lines.push('*Generated by paper-researcher*', '');
    return lines.join('\n');
}

/**
 * Build a digest of recently collected papers and write it to disk.
 */
export function generateDigest(store: PaperStore, options: DigestOptions = {}): DigestResult {
    const span = options.since ?? DEFAULT_DIGEST_SPAN;
    const until = new Date();
    const since = new Date(until.getTime() - parseTimespan(span));

    logger.info({ since: formatDate(since), until: formatDate(until) }, 'Generating digest');

    const loaded = store.requireIndex();
    if (!loaded.ok) {
        throw indexLoadErrorToResearchError(loaded.error);
    }

    const papers = loaded.value.papers;
    if (Object.keys(papers).length === 0) {
        return { message: 'No papers in collection. Run the collect command first.', papers_count: 0, output_path: null };
    }

    const selected = filterByDate(papers, since, until);
    if (selected.length === 0) {
        return { message: `No papers collected in the last ${span}.`, papers_count: 0, output_path: null };
    }

    const groups = groupByTopic(selected, store);
    const content = buildDigestContent(groups, since, until, store);

    const outputPath = options.output ?? path.join(store.dataDir, 'digests', `${formatDate(until)}.md`);
    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    atomicWriteText(outputPath, content);
    logger.info({ path: outputPath }, 'Wrote digest');

    return {
        message: `Digest generated with ${selected.length} papers.`,
        papers_count: selected.length,
        topics_count: groups.size,
        output_path: outputPath,
    };
}
