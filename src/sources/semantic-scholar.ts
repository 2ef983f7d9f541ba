import { z } from 'zod';
import { getHttpClient, HttpError, type HttpClient } from '../utils/http-client.js';
import { getApiKey } from '../utils/config.js';
import { getLogger } from '../utils/logger.js';
import { isValidArxivId } from '../storage/ids.js';
import type { CitationLookupResult, CitationProvider, LinkedPaper, SourceAdapterOptions } from '../types/index.js';

const logger = getLogger();

const S2_BASE = 'https://api.semanticscholar.org/graph/v1';

/** Fields to request from S2 API */
const CITATION_FIELDS = ['references', 'citations', 'citationCount', 'referenceCount', 'externalIds'].join(',');

/**
 * Semantic Scholar API response types.
 * Linked papers may come back with a null `externalIds` or none at all.
 */
const s2LinkedPaperSchema: z.ZodType<LinkedPaper, z.ZodTypeDef, unknown> = z.object({
    paperId: z.string().nullish(),
    externalIds: z.record(z.string(), z.unknown()).nullish(),
});

const s2CitationResponseSchema: z.ZodType<CitationLookupResult, z.ZodTypeDef, unknown> = z.object({
    paperId: z.string().nullish(),
    citationCount: z.number().nullish(),
    referenceCount: z.number().nullish(),
    references: z.array(s2LinkedPaperSchema).nullish(),
    citations: z.array(s2LinkedPaperSchema).nullish(),
});

/**
 * Canonical arXiv IDs of the linked papers that have one.
 */
export function extractArxivIds(papers: readonly LinkedPaper[] | null | undefined): string[] {
    if (!papers) return [];

    const ids: string[] = [];
    for (const paper of papers) {
        const arxivId = paper.externalIds?.['ArXiv'];
        if (isValidArxivId(arxivId)) {
            ids.push(arxivId);
        }
    }
    return ids;
}

/**
 * Semantic Scholar source adapter.
 * Looks papers up by arXiv ID to read their references and citations.
 *
 * @see https://api.semanticscholar.org/
 */
export class SemanticScholarAdapter implements CitationProvider {
    readonly name = 'Semantic Scholar';
    readonly sourceId = 's2' as const;
    private httpClient: HttpClient;
    private apiKey?: string;

    constructor(options?: SourceAdapterOptions) {
        this.apiKey = options?.apiKey ?? getApiKey('S2_API_KEY');
        this.httpClient = getHttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    /**
     * Fetch citation data for one arXiv paper.
     * Returns null when Semantic Scholar does not know the paper; other
     * failures surface as `HttpError` after the client's retries.
     */
    async fetchCitationData(arxivId: string): Promise<CitationLookupResult | null> {
        const url = `${S2_BASE}/paper/arXiv:${encodeURIComponent(arxivId)}?fields=${CITATION_FIELDS}`;
        logger.debug({ url }, 'S2 fetch citations');

        let data: unknown;
        try {
            const response = await this.httpClient.get(url, {
                source: 's2',
                headers: this.buildHeaders(),
            });
            data = response.data;
        } catch (error) {
            if (error instanceof HttpError && error.status === 404) {
                logger.info({ arxivId }, 'Paper not found in Semantic Scholar');
                return null;
            }
            throw error;
        }

        const parsed = s2CitationResponseSchema.safeParse(data);
        if (!parsed.success) {
            throw new HttpError(`Unexpected Semantic Scholar response for ${arxivId}`, 200, false, data);
        }
        return parsed.data;
    }

    // ─── Private helpers ──────────────────────────────────────

    private buildHeaders(): Record<string, string> {
        const headers: Record<string, string> = {};
        if (this.apiKey) {
            headers['x-api-key'] = this.apiKey;
        }
        return headers;
    }
}
