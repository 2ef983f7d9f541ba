import fs from 'node:fs';
import path from 'node:path';
import { randomUUID } from 'node:crypto';
import type { PaperStore } from '../storage/store.js';
import { atomicWriteJson } from '../storage/atomic.js';
import { isValidArxivId, sanitizeUsername } from '../storage/ids.js';
import { annotationSchema } from '../storage/schemas.js';
import type { Annotation, AnnotationType } from '../types/index.js';
import { ResearchError, errorMessage, invalidPaperId } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { formatCompactTimestamp } from '../utils/time.js';

const logger = getLogger();

export const MIN_ANNOTATION_LENGTH = 1;
export const MAX_ANNOTATION_LENGTH = 50000;

export interface NewAnnotation {
    paperId: string;
    content: string;
    username: string;
    type?: AnnotationType;
}

function annotationFiles(dir: string): string[] {
    let names: string[];
    try {
        names = fs.readdirSync(dir);
    } catch {
        return [];
    }
    return names.filter((name) => name.endsWith('.json')).map((name) => path.join(dir, name));
}

/**
 * Number of annotation files stored for a paper.
 */
export function countAnnotations(store: PaperStore, paperId: string): number {
    if (!isValidArxivId(paperId)) return 0;
    return annotationFiles(store.annotationsDir(paperId)).length;
}

/**
 * Store a new annotation as its own file and refresh the paper's
 * annotation count.
 */
export function saveAnnotation(store: PaperStore, input: NewAnnotation): Annotation {
    const { paperId, content } = input;

    if (!isValidArxivId(paperId)) {
        throw invalidPaperId(paperId);
    }
    if (content.length < MIN_ANNOTATION_LENGTH) {
        throw new ResearchError(
            'INVALID_CONTENT',
            'Annotation content is empty',
            `Content must be at least ${MIN_ANNOTATION_LENGTH} character(s)`
        );
    }
    if (content.length > MAX_ANNOTATION_LENGTH) {
        throw new ResearchError(
            'CONTENT_TOO_LONG',
            'Annotation content is too long',
            `Content must be at most ${MAX_ANNOTATION_LENGTH} characters`
        );
    }
    if (!store.paperDirExists(paperId)) {
        throw new ResearchError(
            'PAPER_NOT_FOUND',
            `Paper ${paperId} not found in collection`,
            'Ensure the paper exists in your collection'
        );
    }

    const annotationsDir = store.annotationsDir(paperId);
    fs.mkdirSync(annotationsDir, { recursive: true });

    const now = new Date();
    const author = sanitizeUsername(input.username);
    const annotation: Annotation = {
        id: randomUUID().slice(0, 8),
        paper_id: paperId,
        author,
        created_at: now.toISOString(),
        updated_at: now.toISOString(),
        type: input.type ?? 'note',
        content,
    };

    const fileName = `${author}_${formatCompactTimestamp(now)}_${annotation.id}.json`;
    atomicWriteJson(path.join(annotationsDir, fileName), annotation);

    const count = countAnnotations(store, paperId);
    if (!store.updateFlag(paperId, 'annotation_count', count)) {
        logger.warn({ paperId, count }, 'Failed to update annotation count');
    }

    logger.info({ paperId, annotationId: annotation.id }, 'Saved annotation');
    return annotation;
}

/**
 * All readable annotations for a paper, newest first.
 */
export function loadAnnotations(store: PaperStore, paperId: string): Annotation[] {
    if (!isValidArxivId(paperId)) return [];

    const annotations: Annotation[] = [];
    for (const file of annotationFiles(store.annotationsDir(paperId))) {
        let raw: unknown;
        try {
            raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
        } catch (error) {
            logger.warn({ file, error: errorMessage(error) }, 'Failed to read annotation');
            continue;
        }

        const parsed = annotationSchema.safeParse(raw);
        if (!parsed.success) {
            logger.warn({ file }, 'Skipping malformed annotation');
            continue;
        }
        annotations.push(parsed.data);
    }

    annotations.sort((a, b) => (a.created_at < b.created_at ? 1 : a.created_at > b.created_at ? -1 : 0));
    return annotations;
}
