import { z } from 'zod';
import {
    ANNOTATION_TYPES,
    INDEX_VERSION,
    type Annotation,
    type CitationData,
    type IndexEntry,
    type PaperRecord,
} from '../types/index.js';

/**
 * Schemas for documents read back from disk. Fields a producer might have
 * left out fall back to empty values; unknown keys pass through so a
 * read-modify-write keeps them.
 */

const stringList = z.array(z.string()).catch([]);

const citationDataSchema: z.ZodType<CitationData, z.ZodTypeDef, unknown> = z.discriminatedUnion('source', [
    z.object({
        source: z.literal('unavailable'),
        fetched_at: z.string(),
        citation_count: z.number(),
        reference_count: z.number(),
        references_in_collection: stringList,
        cited_by_in_collection: stringList,
    }),
    z.object({
        source: z.literal('semantic_scholar'),
        fetched_at: z.string(),
        citation_count: z.number(),
        reference_count: z.number(),
        references_in_collection: stringList,
        cited_by_in_collection: stringList,
    }),
]);

export const paperRecordSchema: z.ZodType<PaperRecord, z.ZodTypeDef, unknown> = z
    .object({
        id: z.string().catch(''),
        title: z.string().catch(''),
        authors: stringList,
        abstract: z.string().catch(''),
        published: z.string().optional(),
        updated: z.string().optional(),
        categories: stringList,
        pdf_url: z.string().optional(),
        collected_at: z.string().catch(''),
        topics: stringList,
        has_summary: z.boolean().catch(false),
        summary_generated_at: z.string().optional(),
        has_blog_post: z.boolean().optional(),
        blog_post_generated_at: z.string().optional(),
        annotation_count: z.number().int().nonnegative().optional(),
        last_annotated_at: z.string().optional(),
        imported_at: z.string().optional(),
        imported_from: z.string().optional(),
        citation_data: citationDataSchema.optional().catch(undefined),
    })
    .passthrough();

export const indexEntrySchema: z.ZodType<IndexEntry, z.ZodTypeDef, unknown> = z
    .object({
        title: z.string().catch(''),
        authors: stringList,
        abstract: z.string().catch(''),
        topics: stringList,
        collected_at: z.string().catch(''),
        has_summary: z.boolean().catch(false),
        has_blog_post: z.boolean().optional(),
        imported_at: z.string().optional(),
    })
    .passthrough();

/**
 * Outer shape of `index/papers.json`. Entries are validated one by one so a
 * single bad entry does not discard the whole index.
 */
export const rawIndexSchema = z.object({
    version: z.string().catch(INDEX_VERSION),
    updated_at: z.string().catch(''),
    papers: z.record(z.string(), z.unknown()),
});

export const annotationSchema: z.ZodType<Annotation, z.ZodTypeDef, unknown> = z.object({
    id: z.string(),
    paper_id: z.string(),
    author: z.string(),
    created_at: z.string(),
    updated_at: z.string(),
    type: z.enum(ANNOTATION_TYPES),
    content: z.string(),
});

export const manifestSchema = z.object({
    version: z.string(),
    created_at: z.string(),
    created_by: z.string().catch('unknown'),
    paper_count: z.number().int().nonnegative(),
    includes_summaries: z.boolean().catch(false),
    includes_annotations: z.boolean().catch(false),
    description: z.string().catch(''),
});

export type Manifest = z.infer<typeof manifestSchema>;

/**
 * Output of the fetch command, as read by the collector.
 */
export const fetchResultSchema = z.object({
    success: z.boolean().catch(false),
    query: z.string().catch(''),
    papers: z.array(z.record(z.string(), z.unknown())).catch([]),
});
