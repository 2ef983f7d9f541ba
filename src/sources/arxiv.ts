import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import type { FetchedPaper, PaperSource } from '../types/index.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { ResearchError, errorMessage } from '../utils/errors.js';
import { formatCompactDate } from '../utils/time.js';
import { extractArxivId } from '../storage/ids.js';

const logger = getLogger();

const ARXIV_API = 'https://export.arxiv.org/api/query';

/** The API caps a single query at this many results */
export const ARXIV_MAX_RESULTS = 50;

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Atom feed shapes. Text nodes that carry attributes parse as `{ _: text }`.
 */
const textSchema = z
    .union([z.string(), z.object({ _: z.string() }).transform((node) => node._)])
    .catch('');

const entrySchema = z.object({
    id: textSchema,
    title: textSchema,
    summary: textSchema,
    published: textSchema,
    updated: textSchema,
    author: z.array(z.object({ name: textSchema })).catch([]),
    category: z.array(z.object({ term: z.string().catch('') })).catch([]),
});

const feedSchema = z.object({
    feed: z.object({
        entry: z.array(z.unknown()).catch([]),
    }),
});

const ARRAY_PATHS = new Set(['feed.entry', 'feed.entry.author', 'feed.entry.category']);

/**
 * Build the arXiv search query for a topic over the last `days` days.
 * Punctuation is stripped from the topic; dates are UTC calendar days.
 */
export function buildArxivQuery(topic: string, days: number, now: Date = new Date()): string {
    const start = new Date(now.getTime() - days * DAY_MS);
    const cleanTopic = topic.replace(/[^\p{L}\p{N}_\s]/gu, '');
    return `all:${cleanTopic} AND submittedDate:[${formatCompactDate(start)} TO ${formatCompactDate(now)}]`;
}

function singleLine(text: string): string {
    return text.replace(/\n/g, ' ').trim();
}

/**
 * Parse an arXiv Atom feed into paper metadata.
 * Entries whose id URL carries no arXiv ID are skipped.
 */
export function parseArxivFeed(xml: string): FetchedPaper[] {
    const parser = new XMLParser({
        ignoreAttributes: false,
        attributeNamePrefix: '',
        textNodeName: '_',
        parseTagValue: false,
        parseAttributeValue: false,
        isArray: (_name, jPath) => ARRAY_PATHS.has(jPath),
    });

    const feed = feedSchema.safeParse(parser.parse(xml));
    if (!feed.success) {
        logger.warn('Response is not an Atom feed');
        return [];
    }

    const papers: FetchedPaper[] = [];
    for (const raw of feed.data.feed.entry) {
        const entry = entrySchema.safeParse(raw);
        if (!entry.success) continue;

        const { id, title, summary, published, updated, author, category } = entry.data;
        const arxivId = extractArxivId(id);
        if (!arxivId) {
            logger.warn({ entryId: id }, 'Could not extract arXiv ID');
            continue;
        }

        papers.push({
            id: arxivId,
            title: singleLine(title),
            authors: author.map((a) => a.name),
            abstract: singleLine(summary),
            published: published.slice(0, 10),
            updated: updated.slice(0, 10),
            categories: category.map((c) => c.term),
            pdf_url: `https://arxiv.org/pdf/${arxivId}.pdf`,
        });
    }

    return papers;
}

/**
 * arXiv source adapter.
 * Queries the Atom API, paced by the shared client's `arxiv` rate limit.
 *
 * @see https://info.arxiv.org/help/api/
 */
export class ArxivAdapter implements PaperSource {
    readonly name = 'arXiv';
    readonly sourceId = 'arxiv' as const;
    private httpClient: HttpClient;

    constructor() {
        this.httpClient = getHttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    async searchRecent(topic: string, days: number, maxResults = ARXIV_MAX_RESULTS): Promise<FetchedPaper[]> {
        const query = buildArxivQuery(topic, days);
        const params = new URLSearchParams({
            search_query: query,
            start: '0',
            max_results: String(Math.min(maxResults, ARXIV_MAX_RESULTS)),
            sortBy: 'submittedDate',
            sortOrder: 'descending',
        });

        const url = `${ARXIV_API}?${params.toString()}`;
        logger.info({ topic, days }, 'Searching arXiv');
        logger.debug({ url }, 'arXiv query');

        let body: unknown;
        try {
            const response = await this.httpClient.get(url, { source: 'arxiv' });
            body = response.data;
        } catch (error) {
            throw new ResearchError('ARXIV_API_UNAVAILABLE', 'Failed to fetch papers from arXiv', errorMessage(error));
        }

        if (typeof body !== 'string') {
            throw new ResearchError('ARXIV_API_UNAVAILABLE', 'Unexpected arXiv response', 'Expected an Atom feed');
        }

        const papers = parseArxivFeed(body);
        logger.info({ count: papers.length }, 'Found papers');
        return papers;
    }
}
