/**
 * Barrel export for all shared types.
 */
export type {
    PaperRecord,
    CitationData,
    CitationSource,
    UnavailableCitationData,
    SemanticScholarCitationData,
    IndexEntry,
    IndexRecord,
    FetchedPaper,
    FetchResult,
    PaperFlags,
    FlagField,
    IndexFlagField,
} from './paper.js';
export { FLAG_TIMESTAMP_FIELDS, INDEX_VERSION, INDEX_ABSTRACT_LENGTH } from './paper.js';
export type { Annotation, AnnotationType, AnnotationFormat } from './annotation.js';
export { ANNOTATION_TYPES, ANNOTATION_FORMATS } from './annotation.js';
export type { CitationEdges, CitationGraph, GraphStats, HighlyCitedPaper, CitationsIndex } from './graph.js';
export { DEFAULT_CONFIG } from './config.js';
export type { ResearcherConfig, LogLevel, ArxivConfig, HttpConfig } from './config.js';
export type { Result } from './result.js';
export { ok, err } from './result.js';
export type {
    PaperSource,
    CitationProvider,
    CitationLookupResult,
    LinkedPaper,
    SourceAdapterOptions,
} from './source-adapter.js';
