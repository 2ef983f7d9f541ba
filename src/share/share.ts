import fs from 'node:fs';
import path from 'node:path';
import AdmZip from 'adm-zip';
import type { IndexEntry, IndexRecord } from '../types/index.js';
import { indexLoadErrorToResearchError, type PaperStore } from '../storage/store.js';
import { isValidArxivId, sanitizeUsername } from '../storage/ids.js';
import type { Manifest } from '../storage/schemas.js';
import { invalidPaperId } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { nowIso } from '../utils/time.js';

const logger = getLogger();

export const MANIFEST_VERSION = '1.0';

export interface ShareOptions {
    /** Path of the ZIP file to write */
    output: string;

    /** Restrict the package to these papers; all papers when empty */
    paperIds?: string[];

    includeSummaries?: boolean;
    includeAnnotations?: boolean;
    username: string;
    description?: string;
}

export interface ShareResult {
    message: string;
    paper_count: number;
    paper_ids?: string[];
    output_path: string | null;
    includes_summaries?: boolean;
    includes_annotations?: boolean;
}

export function createManifest(
    paperCount: number,
    options: Pick<ShareOptions, 'username' | 'includeSummaries' | 'includeAnnotations' | 'description'>
): Manifest {
    return {
        version: MANIFEST_VERSION,
        created_at: nowIso(),
        created_by: sanitizeUsername(options.username),
        paper_count: paperCount,
        includes_summaries: options.includeSummaries ?? false,
        includes_annotations: options.includeAnnotations ?? false,
        description: options.description ?? '',
    };
}

function jsonBuffer(value: unknown): Buffer {
    return Buffer.from(JSON.stringify(value, null, 2), 'utf-8');
}

/**
 * Add one paper's files to the archive. Returns false when the paper has
 * no metadata to share.
 */
function addPaper(zip: AdmZip, store: PaperStore, paperId: string, options: ShareOptions): boolean {
    const metadataPath = store.metadataPath(paperId);
    if (!fs.existsSync(metadataPath)) {
        logger.warn({ paperId }, 'Skipping paper without metadata.json');
        return false;
    }

    const prefix = `papers/${paperId}`;
    zip.addFile(`${prefix}/metadata.json`, fs.readFileSync(metadataPath));

    if (options.includeSummaries) {
        const summaryPath = store.summaryPath(paperId);
        if (fs.existsSync(summaryPath)) {
            zip.addFile(`${prefix}/summary.md`, fs.readFileSync(summaryPath));
        }
    }

    if (options.includeAnnotations) {
        const annotationsDir = store.annotationsDir(paperId);
        if (fs.existsSync(annotationsDir) && fs.statSync(annotationsDir).isDirectory()) {
            for (const name of fs.readdirSync(annotationsDir).filter((n) => n.endsWith('.json')).sort()) {
                zip.addFile(`${prefix}/annotations/${name}`, fs.readFileSync(path.join(annotationsDir, name)));
            }
        }
    }

    return true;
}

/**
 * Package papers from the collection into a ZIP file that another
 * collection can import. The package carries a manifest and an index
 * restricted to the papers it contains.
 */
export function shareCollection(store: PaperStore, options: ShareOptions): ShareResult {
    const requested = options.paperIds ?? [];
    for (const paperId of requested) {
        if (!isValidArxivId(paperId)) {
            throw invalidPaperId(paperId);
        }
    }

    const loaded = store.requireIndex();
    if (!loaded.ok) {
        throw indexLoadErrorToResearchError(loaded.error);
    }
    const index = loaded.value;

    const candidates = Object.keys(index.papers).filter(
        (id) => requested.length === 0 || requested.includes(id)
    );
    if (candidates.length === 0) {
        return { message: 'No papers to share. Run the collect command first.', paper_count: 0, output_path: null };
    }

    const zip = new AdmZip();
    const shared: Record<string, IndexEntry> = {};
    for (const paperId of candidates) {
        const entry = index.papers[paperId];
        if (entry && addPaper(zip, store, paperId, options)) {
            shared[paperId] = entry;
        }
    }

    const paperIds = Object.keys(shared);
    if (paperIds.length === 0) {
        return { message: 'No papers to share. Run the collect command first.', paper_count: 0, output_path: null };
    }

    const partialIndex: IndexRecord = { version: index.version, updated_at: nowIso(), papers: shared };
    zip.addFile('index/papers.json', jsonBuffer(partialIndex));
    zip.addFile('manifest.json', jsonBuffer(createManifest(paperIds.length, options)));

    const outputPath = path.resolve(options.output);
    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    zip.writeZip(outputPath);

    logger.info({ papers: paperIds.length, path: outputPath }, 'Created collection package');
    return {
        message: `Created collection package with ${paperIds.length} papers.`,
        paper_count: paperIds.length,
        paper_ids: paperIds,
        output_path: outputPath,
        includes_summaries: options.includeSummaries ?? false,
        includes_annotations: options.includeAnnotations ?? false,
    };
}
