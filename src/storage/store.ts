import fs from 'node:fs';
import path from 'node:path';
import {
    FLAG_TIMESTAMP_FIELDS,
    INDEX_VERSION,
    err,
    ok,
    type CitationsIndex,
    type FlagField,
    type IndexEntry,
    type IndexFlagField,
    type IndexRecord,
    type PaperFlags,
    type PaperRecord,
    type Result,
} from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { ResearchError, errorMessage } from '../utils/errors.js';
import { nowIso } from '../utils/time.js';
import { atomicWriteJson } from './atomic.js';
import { isValidArxivId } from './ids.js';
import { indexEntrySchema, paperRecordSchema, rawIndexSchema } from './schemas.js';

const logger = getLogger();

/**
 * Why a strict index load failed.
 */
export type IndexLoadError =
    | { kind: 'not_found'; path: string }
    | { kind: 'invalid'; path: string; reason: string };

/**
 * Convert an index load failure into the command error it reports as.
 */
export function indexLoadErrorToResearchError(error: IndexLoadError): ResearchError {
    if (error.kind === 'not_found') {
        return new ResearchError(
            'INDEX_NOT_FOUND',
            'No papers collected yet. Run the collect command first.',
            `Index file not found: ${error.path}`
        );
    }
    return new ResearchError('INVALID_INDEX', `Invalid paper index: ${error.reason}`, error.path);
}

function emptyIndex(): IndexRecord {
    return { version: INDEX_VERSION, updated_at: nowIso(), papers: {} };
}

/**
 * JSON document store over one data directory.
 *
 * Layout:
 *   index/papers.json, index/citations.json
 *   papers/<ID>/metadata.json, summary.md, annotations/*.json
 *   blog-posts/<ID>.md
 *
 * Every write goes through an atomic temp-file rename. Loads never cache;
 * each call reads the current file.
 */
export class PaperStore {
    constructor(readonly dataDir: string) {}

    // ─── Paths ────────────────────────────────────────────────

    get indexDir(): string {
        return path.join(this.dataDir, 'index');
    }

    get indexPath(): string {
        return path.join(this.indexDir, 'papers.json');
    }

    get citationsPath(): string {
        return path.join(this.indexDir, 'citations.json');
    }

    get papersDir(): string {
        return path.join(this.dataDir, 'papers');
    }

    get blogPostsDir(): string {
        return path.join(this.dataDir, 'blog-posts');
    }

    /** Callers must validate `id` first */
    paperDir(id: string): string {
        return path.join(this.papersDir, id);
    }

    metadataPath(id: string): string {
        return path.join(this.paperDir(id), 'metadata.json');
    }

    summaryPath(id: string): string {
        return path.join(this.paperDir(id), 'summary.md');
    }

    annotationsDir(id: string): string {
        return path.join(this.paperDir(id), 'annotations');
    }

    blogPostPath(id: string): string {
        return path.join(this.blogPostsDir, `${id}.md`);
    }

    dataDirExists(): boolean {
        return fs.existsSync(this.dataDir);
    }

    paperDirExists(id: string): boolean {
        return isValidArxivId(id) && fs.existsSync(this.paperDir(id));
    }

    // ─── Index ────────────────────────────────────────────────

    /**
     * Load the index, falling back to an empty one when the file is
     * missing, unparseable, or the wrong shape.
     */
    loadIndex(): IndexRecord {
        const result = this.requireIndex();
        if (result.ok) return result.value;

        if (result.error.kind === 'invalid') {
            logger.warn({ path: result.error.path, reason: result.error.reason }, 'Corrupted index, starting empty');
        } else {
            logger.debug({ path: result.error.path }, 'No index found, starting empty');
        }
        return emptyIndex();
    }

    /**
     * Load the index, reporting why it could not be read.
     * Entries under invalid IDs are dropped with a warning.
     */
    requireIndex(): Result<IndexRecord, IndexLoadError> {
        const indexPath = this.indexPath;

        let text: string;
        try {
            text = fs.readFileSync(indexPath, 'utf-8');
        } catch (error) {
            logger.debug({ path: indexPath, error: errorMessage(error) }, 'Index not readable');
            return err({ kind: 'not_found', path: indexPath });
        }

        let raw: unknown;
        try {
            raw = JSON.parse(text);
        } catch (error) {
            return err({ kind: 'invalid', path: indexPath, reason: errorMessage(error) });
        }

        const parsed = rawIndexSchema.safeParse(raw);
        if (!parsed.success) {
            const reason = parsed.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
            return err({ kind: 'invalid', path: indexPath, reason });
        }

        const papers: Record<string, IndexEntry> = {};
        for (const [id, value] of Object.entries(parsed.data.papers)) {
            if (!isValidArxivId(id)) {
                logger.warn({ id }, 'Skipping invalid paper ID in index');
                continue;
            }
            const entry = indexEntrySchema.safeParse(value);
            if (!entry.success) {
                logger.warn({ id }, 'Skipping malformed index entry');
                continue;
            }
            papers[id] = entry.data;
        }

        return ok({ version: parsed.data.version, updated_at: parsed.data.updated_at, papers });
    }

    /**
     * Write the index atomically, stamping `updated_at`.
     */
    saveIndex(index: IndexRecord): void {
        index.updated_at = nowIso();
        fs.mkdirSync(this.indexDir, { recursive: true });
        atomicWriteJson(this.indexPath, index);
        logger.debug({ papers: Object.keys(index.papers).length }, 'Saved index');
    }

    /**
     * Set a flag on one index entry. Returns false when the index is missing
     * or corrupt, or the paper is not in it.
     */
    updateIndexFlag<F extends IndexFlagField>(id: string, field: F, value: IndexEntry[F]): boolean {
        if (!isValidArxivId(id)) return false;

        const result = this.requireIndex();
        if (!result.ok) {
            logger.warn({ id, reason: result.error.kind }, 'Cannot update index flag');
            return false;
        }

        const index = result.value;
        const entry = index.papers[id];
        if (!entry) {
            logger.warn({ id }, 'Paper not found in index');
            return false;
        }

        entry[field] = value;
        try {
            this.saveIndex(index);
            return true;
        } catch (error) {
            logger.error({ id, field, error: errorMessage(error) }, 'Failed to write index');
            return false;
        }
    }

    // ─── Papers ───────────────────────────────────────────────

    /**
     * Load a paper's metadata. Returns null for an invalid ID, a missing or
     * unparseable file, or a document of the wrong shape.
     */
    loadPaper(id: string): PaperRecord | null {
        if (!isValidArxivId(id)) {
            logger.warn({ id }, 'Refusing to load paper with invalid ID');
            return null;
        }

        const metadataPath = this.metadataPath(id);
        let raw: unknown;
        try {
            raw = JSON.parse(fs.readFileSync(metadataPath, 'utf-8'));
        } catch (error) {
            logger.debug({ id, error: errorMessage(error) }, 'Paper metadata not readable');
            return null;
        }

        const parsed = paperRecordSchema.safeParse(raw);
        if (!parsed.success) {
            logger.warn({ id, path: metadataPath }, 'Malformed paper metadata');
            return null;
        }
        return { ...parsed.data, id };
    }

    /**
     * Write a paper's metadata atomically, creating its directory.
     */
    savePaper(record: PaperRecord): void {
        if (!isValidArxivId(record.id)) {
            throw new ResearchError('INVALID_PAPER_ID', `Invalid arXiv ID format: ${record.id}`);
        }
        fs.mkdirSync(this.paperDir(record.id), { recursive: true });
        atomicWriteJson(this.metadataPath(record.id), record);
    }

    /**
     * Store a new paper. Returns false without writing when the ID is
     * invalid or the paper is already stored.
     */
    createPaper(record: PaperRecord): boolean {
        if (!isValidArxivId(record.id)) {
            logger.warn({ id: record.id }, 'Invalid arXiv ID format, skipping');
            return false;
        }
        if (fs.existsSync(this.metadataPath(record.id))) {
            logger.debug({ id: record.id }, 'Paper already exists, skipping');
            return false;
        }
        this.savePaper(record);
        return true;
    }

    /**
     * Read-modify-write a paper's metadata. Returns false when the paper
     * cannot be loaded or written.
     */
    updatePaper(id: string, mutate: (record: PaperRecord) => void): boolean {
        const record = this.loadPaper(id);
        if (!record) return false;

        mutate(record);
        try {
            atomicWriteJson(this.metadataPath(id), record);
            return true;
        } catch (error) {
            logger.error({ id, error: errorMessage(error) }, 'Failed to write paper metadata');
            return false;
        }
    }

    /**
     * Set one status flag on a paper together with its companion timestamp.
     */
    updateFlag<F extends FlagField>(id: string, field: F, value: PaperFlags[F]): boolean {
        const updated = this.updatePaper(id, (record) => {
            Object.assign(record, { [field]: value, [FLAG_TIMESTAMP_FIELDS[field]]: nowIso() });
        });
        if (updated) {
            logger.debug({ id, field, value }, 'Updated paper flag');
        }
        return updated;
    }

    /**
     * Contents of a paper's summary.md, or null when absent.
     */
    loadSummary(id: string): string | null {
        if (!isValidArxivId(id)) return null;
        try {
            return fs.readFileSync(this.summaryPath(id), 'utf-8');
        } catch {
            return null;
        }
    }

    // ─── Citations ────────────────────────────────────────────

    saveCitationsIndex(doc: CitationsIndex): void {
        fs.mkdirSync(this.indexDir, { recursive: true });
        atomicWriteJson(this.citationsPath, doc);
    }
}
