import type { PaperStore } from '../storage/store.js';
import { isValidArxivId } from '../storage/ids.js';
import { extractArxivIds } from '../sources/semantic-scholar.js';
import type { CitationData, CitationLookupResult, CitationProvider, IndexRecord } from '../types/index.js';
import { ResearchError, errorMessage, invalidPaperId } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { nowIso } from '../utils/time.js';

const logger = getLogger();

export type CitationTarget = { paperId: string } | { all: true };

export interface FetchCitationsSummary {
    success: boolean;
    papers_processed: number;
    papers_with_citations: number;
    papers_not_found: number;
    errors: string[];
}

/**
 * Citation data restricted to papers in the collection. A null lookup
 * (paper unknown to the source) is recorded as unavailable.
 */
export function toCitationData(lookup: CitationLookupResult | null, index: IndexRecord): CitationData {
    if (!lookup) {
        return {
            source: 'unavailable',
            fetched_at: nowIso(),
            citation_count: 0,
            reference_count: 0,
            references_in_collection: [],
            cited_by_in_collection: [],
        };
    }

    const inCollection = (id: string): boolean => id in index.papers;

    return {
        source: 'semantic_scholar',
        fetched_at: nowIso(),
        citation_count: lookup.citationCount ?? 0,
        reference_count: lookup.referenceCount ?? 0,
        references_in_collection: extractArxivIds(lookup.references).filter(inCollection),
        cited_by_in_collection: extractArxivIds(lookup.citations).filter(inCollection),
    };
}

/**
 * Fetch citation data for one paper or the whole collection and store it
 * on each paper's metadata. Lookups run one at a time; a failure for one
 * paper is recorded and the run continues.
 */
export async function fetchCitations(
    store: PaperStore,
    provider: CitationProvider,
    target: CitationTarget
): Promise<FetchCitationsSummary> {
    if (!store.dataDirExists()) {
        throw new ResearchError('DATA_DIR_NOT_FOUND', `Data directory not found: ${store.dataDir}`);
    }

    const index = store.loadIndex();
    const summary: FetchCitationsSummary = {
        success: true,
        papers_processed: 0,
        papers_with_citations: 0,
        papers_not_found: 0,
        errors: [],
    };

    if (Object.keys(index.papers).length === 0) {
        logger.warn('No papers in collection');
        return summary;
    }

    let paperIds: string[];
    if ('paperId' in target) {
        if (!isValidArxivId(target.paperId)) {
            throw invalidPaperId(target.paperId);
        }
        if (!(target.paperId in index.papers)) {
            throw new ResearchError('PAPER_NOT_IN_COLLECTION', `Paper not in collection: ${target.paperId}`);
        }
        paperIds = [target.paperId];
    } else {
        paperIds = Object.keys(index.papers);
    }

    logger.info({ count: paperIds.length, source: provider.name }, 'Fetching citations');

    for (const paperId of paperIds) {
        let lookup: CitationLookupResult | null;
        try {
            lookup = await provider.fetchCitationData(paperId);
        } catch (error) {
            logger.error({ paperId, error: errorMessage(error) }, 'Failed to fetch citations');
            summary.errors.push(`Fetch failed: ${paperId}`);
            continue;
        }

        if (lookup) {
            summary.papers_with_citations++;
        } else {
            summary.papers_not_found++;
        }

        const citationData = toCitationData(lookup, index);
        const updated = store.updatePaper(paperId, (record) => {
            record.citation_data = citationData;
        });

        if (updated) {
            summary.papers_processed++;
        } else {
            summary.errors.push(`Failed to update: ${paperId}`);
        }
    }

    summary.success = summary.errors.length === 0;
    logger.info(
        {
            processed: summary.papers_processed,
            withCitations: summary.papers_with_citations,
            notFound: summary.papers_not_found,
            errors: summary.errors.length,
        },
        'Citation fetch complete'
    );
    return summary;
}
