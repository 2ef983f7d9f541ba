/**
 * Library entry point. The CLI lives in `cli/index.ts`.
 */
export * from './types/index.js';

export { PaperStore, indexLoadErrorToResearchError, type IndexLoadError } from './storage/store.js';
export { isValidArxivId, sanitizeUsername, extractArxivId } from './storage/ids.js';
export { atomicWriteJson, atomicWriteText } from './storage/atomic.js';

export { tokenize } from './nlp/tokenizer.js';
export { scorePaper, countMatches, FIELD_WEIGHTS } from './search/scorer.js';
export { extractExcerpt } from './search/excerpt.js';
export { searchPapers, type SearchResult, type SearchOutcome } from './search/search-engine.js';

export {
    buildCitationGraph,
    calculateGraphStats,
    getHighlyCited,
    buildCitationsIndex,
    buildGraph,
} from './graph/citation-graph.js';

export { ArxivAdapter, buildArxivQuery, parseArxivFeed } from './sources/arxiv.js';
export { SemanticScholarAdapter, extractArxivIds } from './sources/semantic-scholar.js';
export { collectPapers, readFetchResult, type CollectSummary } from './collector/collect.js';
export { fetchCitations, type CitationTarget, type FetchCitationsSummary } from './citations/fetch-citations.js';

export { updateSummaryStatus, saveBlogPost } from './status/status-updates.js';
export { saveAnnotation, loadAnnotations, countAnnotations } from './annotations/annotations.js';
export { formatAnnotations } from './annotations/format.js';
export { exportPapers, filterPapers, type ExportOptions, type ExportResult } from './exporters/export.js';
export { generateDigest, filterByDate, groupByTopic, extractSnippet, buildDigestContent } from './digest/digest.js';
export { shareCollection, type ShareOptions, type ShareResult } from './share/share.js';
export { importCollection, type ImportResult } from './share/import.js';

export { ResearchError, type ErrorCode } from './utils/errors.js';
export { HttpClient, HttpError, getHttpClient } from './utils/http-client.js';
export { parseTimespan } from './utils/time.js';
