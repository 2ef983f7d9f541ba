import fs from 'node:fs';
import type { PaperStore } from '../storage/store.js';
import { atomicWriteText } from '../storage/atomic.js';
import { isValidArxivId } from '../storage/ids.js';
import { ResearchError, errorMessage, invalidPaperId } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

/** Minimum trimmed length of a blog post */
export const MIN_BLOG_POST_LENGTH = 100;

export interface SummaryStatusResult {
    paper_id: string;
    message: string;
    warning?: string;
}

export interface BlogPostResult {
    paper_id: string;
    blog_path: string;
    message: string;
    warning?: string;
}

function requireStoredPaper(store: PaperStore, paperId: string): void {
    if (!isValidArxivId(paperId)) {
        throw invalidPaperId(paperId);
    }
    if (!store.paperDirExists(paperId)) {
        throw new ResearchError(
            'PAPER_NOT_FOUND',
            `Paper ${paperId} not found in collection`,
            'Run the collect command to add papers first'
        );
    }
}

/**
 * Mark a paper as summarized in its metadata and in the index.
 * The two updates are independent: a stale index is reported as a warning,
 * a failed metadata update as an error.
 */
export function updateSummaryStatus(store: PaperStore, paperId: string): SummaryStatusResult {
    requireStoredPaper(store, paperId);

    const metadataUpdated = store.updateFlag(paperId, 'has_summary', true);
    const indexUpdated = store.updateIndexFlag(paperId, 'has_summary', true);

    if (!metadataUpdated) {
        throw new ResearchError(
            'UPDATE_FAILED',
            'Failed to update summary status',
            `Metadata: ${metadataUpdated}, Index: ${indexUpdated}`
        );
    }

    if (!indexUpdated) {
        return {
            paper_id: paperId,
            message: 'Updated metadata only (index update failed)',
            warning: 'Index may be out of sync',
        };
    }

    logger.info({ paperId }, 'Updated summary status');
    return { paper_id: paperId, message: 'Updated summary status' };
}

/**
 * Save a blog post for a summarized paper and flag it in metadata and index.
 */
export function saveBlogPost(store: PaperStore, paperId: string, content: string): BlogPostResult {
    requireStoredPaper(store, paperId);

    const metadata = store.loadPaper(paperId);
    if (!metadata) {
        throw new ResearchError(
            'METADATA_ERROR',
            `Failed to load metadata for paper ${paperId}`,
            'Check that metadata.json exists and is valid'
        );
    }

    if (!metadata.has_summary || !fs.existsSync(store.summaryPath(paperId))) {
        throw new ResearchError(
            'NO_SUMMARY',
            `Paper ${paperId} has no summary`,
            'Generate a summary first, then record it with summary-status'
        );
    }

    if (content.trim().length < MIN_BLOG_POST_LENGTH) {
        throw new ResearchError(
            'INVALID_CONTENT',
            'Blog post content is too short',
            `Content must be at least ${MIN_BLOG_POST_LENGTH} characters`
        );
    }

    const blogPath = store.blogPostPath(paperId);
    try {
        fs.mkdirSync(store.blogPostsDir, { recursive: true });
        atomicWriteText(blogPath, content);
    } catch (error) {
        throw new ResearchError('SAVE_FAILED', 'Failed to save blog post', errorMessage(error));
    }
    logger.info({ paperId, path: blogPath }, 'Saved blog post');

    const warnings: string[] = [];
    if (!store.updateFlag(paperId, 'has_blog_post', true)) {
        warnings.push('Metadata update failed');
    }
    if (!store.updateIndexFlag(paperId, 'has_blog_post', true)) {
        warnings.push('Index update failed');
    }

    return {
        paper_id: paperId,
        blog_path: blogPath,
        message: 'Blog post saved successfully',
        ...(warnings.length > 0 ? { warning: warnings.join('; ') } : {}),
    };
}
