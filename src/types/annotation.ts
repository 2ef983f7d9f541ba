/**
 * Annotation kinds a user can attach to a paper.
 */
export const ANNOTATION_TYPES = ['note', 'highlight', 'question', 'comment'] as const;

export type AnnotationType = (typeof ANNOTATION_TYPES)[number];

/**
 * A single annotation, stored as one file under `papers/<ID>/annotations/`.
 * Immutable after creation.
 */
export interface Annotation {
    /** Short random token (8 hex characters) */
    id: string;
    paper_id: string;

    /** Sanitized author name */
    author: string;

    created_at: string;
    updated_at: string;
    type: AnnotationType;
    content: string;
}

export const ANNOTATION_FORMATS = ['json', 'markdown', 'text'] as const;

export type AnnotationFormat = (typeof ANNOTATION_FORMATS)[number];
