import { describe, it, expect, vi, afterEach } from 'vitest';
import { buildArxivQuery, parseArxivFeed, ArxivAdapter } from '../sources/arxiv.js';
import { SemanticScholarAdapter, extractArxivIds } from '../sources/semantic-scholar.js';
import { HttpClient, HttpError } from '../utils/http-client.js';

const FAST = { tokensPerSecond: 1000, maxBurst: 10 };

function testClient(maxRetries = 0): HttpClient {
    return new HttpClient({ maxRetries, initialBackoffMs: 1, rateLimits: { arxiv: FAST, s2: FAST } });
}

const FEED = `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title type="html">ArXiv Query</title>
  <entry>
    <id>http://arxiv.org/abs/2401.12345v2</id>
    <updated>2024-01-20T18:00:00Z</updated>
    <published>2024-01-18T09:30:00Z</published>
    <title>Sparse Attention
for Long Documents</title>
    <summary>We propose a method.
More text.</summary>
    <author><name>Ada Example</name></author>
    <author><name>Ben Sample</name></author>
    <link href="http://arxiv.org/abs/2401.12345v2" rel="alternate" type="text/html"/>
    <category term="cs.CL" scheme="http://arxiv.org/schemas/atom"/>
    <category term="cs.LG" scheme="http://arxiv.org/schemas/atom"/>
  </entry>
  <entry>
    <id>http://arxiv.org/abs/2401.00001v1</id>
    <updated>2024-01-02T00:00:00Z</updated>
    <published>2024-01-02T00:00:00Z</published>
    <title>Single Author</title>
    <summary>Short.</summary>
    <author><name>Solo Writer</name></author>
    <category term="cs.AI" scheme="http://arxiv.org/schemas/atom"/>
  </entry>
  <entry>
    <id>http://arxiv.org/api/errors#incorrect_id_format</id>
    <title>Error</title>
  </entry>
</feed>`;

describe('buildArxivQuery', () => {
    it('should strip punctuation and bound the submission dates', () => {
        const now = new Date('2024-01-15T12:00:00Z');
        expect(buildArxivQuery('large language-models!', 7, now)).toBe(
            'all:large languagemodels AND submittedDate:[20240108 TO 20240115]'
        );
    });
});

describe('parseArxivFeed', () => {
    it('should extract canonical IDs and normalize fields', () => {
        const papers = parseArxivFeed(FEED);

        expect(papers).toHaveLength(2);
        expect(papers[0]).toEqual({
            id: '2401.12345',
            title: 'Sparse Attention for Long Documents',
            authors: ['Ada Example', 'Ben Sample'],
            abstract: 'We propose a method. More text.',
            published: '2024-01-18',
            updated: '2024-01-20',
            categories: ['cs.CL', 'cs.LG'],
            pdf_url: 'https://arxiv.org/pdf/2401.12345.pdf',
        });
    });

    it('should read single authors and categories as lists', () => {
        const papers = parseArxivFeed(FEED);
        expect(papers[1]?.authors).toEqual(['Solo Writer']);
        expect(papers[1]?.categories).toEqual(['cs.AI']);
    });

    it('should return nothing for a document that is not a feed', () => {
        expect(parseArxivFeed('<html><body>Error</body></html>')).toEqual([]);
    });
});

describe('ArxivAdapter', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('should query the API and parse the feed', async () => {
        const mockFetch = vi
            .fn()
            .mockResolvedValue(new Response(FEED, { headers: { 'content-type': 'application/atom+xml' } }));
        vi.stubGlobal('fetch', mockFetch);

        const adapter = new ArxivAdapter();
        adapter.setHttpClient(testClient());
        const papers = await adapter.searchRecent('attention', 7, 100);

        expect(papers.map((p) => p.id)).toEqual(['2401.12345', '2401.00001']);

        const url = new URL(String(mockFetch.mock.calls[0]?.[0]));
        expect(url.origin + url.pathname).toBe('https://export.arxiv.org/api/query');
        expect(url.searchParams.get('max_results')).toBe('50');
        expect(url.searchParams.get('sortBy')).toBe('submittedDate');
        expect(url.searchParams.get('sortOrder')).toBe('descending');
        expect(url.searchParams.get('search_query')).toMatch(/^all:attention AND submittedDate:\[\d{8} TO \d{8}\]$/);
    });

    it('should report an unavailable API after retries', async () => {
        vi.stubGlobal('fetch', vi.fn().mockImplementation(() => Promise.resolve(new Response('down', { status: 503 }))));

        const adapter = new ArxivAdapter();
        adapter.setHttpClient(testClient(1));

        await expect(adapter.searchRecent('attention', 7, 10)).rejects.toMatchObject({ code: 'ARXIV_API_UNAVAILABLE' });
    });
});

describe('extractArxivIds', () => {
    it('should keep only valid arXiv identifiers', () => {
        expect(
            extractArxivIds([
                { externalIds: { ArXiv: '2401.00002' } },
                { externalIds: null },
                { paperId: 'abc' },
                { externalIds: { ArXiv: 'bad' } },
                { externalIds: { DOI: '10.1000/xyz' } },
            ])
        ).toEqual(['2401.00002']);
    });

    it('should handle a missing list', () => {
        expect(extractArxivIds(null)).toEqual([]);
    });
});

describe('SemanticScholarAdapter', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('should look the paper up by arXiv ID with the API key', async () => {
        const body = {
            paperId: 'abc',
            citationCount: 12,
            referenceCount: 3,
            references: [{ paperId: 'r1', externalIds: { ArXiv: '2401.00002' } }],
            citations: [{ paperId: 'c1', externalIds: null }],
        };
        const mockFetch = vi.fn().mockResolvedValue(
            new Response(JSON.stringify(body), { headers: { 'content-type': 'application/json' } })
        );
        vi.stubGlobal('fetch', mockFetch);

        const adapter = new SemanticScholarAdapter({ apiKey: 'test-key' });
        adapter.setHttpClient(testClient());
        const result = await adapter.fetchCitationData('2401.00001');

        expect(result).toEqual(body);
        expect(mockFetch).toHaveBeenCalledWith(
            'https://api.semanticscholar.org/graph/v1/paper/arXiv:2401.00001?fields=references,citations,citationCount,referenceCount,externalIds',
            expect.objectContaining({ headers: expect.objectContaining({ 'x-api-key': 'test-key' }) })
        );
    });

    it('should resolve to null for an unknown paper', async () => {
        vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('{}', { status: 404 })));

        const adapter = new SemanticScholarAdapter({ apiKey: 'test-key' });
        adapter.setHttpClient(testClient());

        await expect(adapter.fetchCitationData('2401.00001')).resolves.toBeNull();
    });

    it('should surface other failures as HttpError', async () => {
        vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('oops', { status: 400 })));

        const adapter = new SemanticScholarAdapter({ apiKey: 'test-key' });
        adapter.setHttpClient(testClient());

        await expect(adapter.fetchCitationData('2401.00001')).rejects.toBeInstanceOf(HttpError);
    });
});
