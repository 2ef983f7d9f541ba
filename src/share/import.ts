import fs from 'node:fs';
import path from 'node:path';
import AdmZip from 'adm-zip';
import { INDEX_ABSTRACT_LENGTH, type PaperRecord } from '../types/index.js';
import type { PaperStore } from '../storage/store.js';
import { atomicWriteText } from '../storage/atomic.js';
import { isValidArxivId } from '../storage/ids.js';
import { manifestSchema, paperRecordSchema, type Manifest } from '../storage/schemas.js';
import { ResearchError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { nowIso } from '../utils/time.js';

const logger = getLogger();

// ─── Package Limits ──────────────────────────────────────

export const MAX_FILE_SIZE = 100 * 1024 * 1024;
export const MAX_TOTAL_SIZE = 500 * 1024 * 1024;
export const MAX_FILE_COUNT = 10000;
export const MAX_COMPRESSION_RATIO = 100;

export interface ImportResult {
    message: string;
    imported_count: number;
    skipped_count: number;
    annotation_count: number;
    imported_ids: string[];
}

type ZipEntry = ReturnType<AdmZip['getEntries']>[number];

/**
 * Entry names must stay relative and inside the package root.
 */
export function isSafeEntryName(name: string): boolean {
    if (name.startsWith('/') || name.startsWith('\\')) return false;
    if (name.includes('..')) return false;
    if (name.includes(':')) return false;
    return true;
}

function invalidPackage(message: string, details: string | null = null): ResearchError {
    return new ResearchError('INVALID_PACKAGE', message, details);
}

/**
 * Reject packages that are oversized, that expand suspiciously, or that
 * name files outside the package root.
 */
export function checkPackageEntries(entries: readonly ZipEntry[]): void {
    if (entries.length > MAX_FILE_COUNT) {
        throw invalidPackage(`Too many files in package: ${entries.length}`);
    }

    const totalSize = entries.reduce((sum, entry) => sum + entry.header.size, 0);
    if (totalSize > MAX_TOTAL_SIZE) {
        throw invalidPackage(`Package too large: ${totalSize} bytes`);
    }

    for (const entry of entries) {
        const { size, compressedSize } = entry.header;
        if (!isSafeEntryName(entry.entryName)) {
            throw invalidPackage(`Invalid path in package: ${entry.entryName}`);
        }
        if (size > MAX_FILE_SIZE) {
            throw invalidPackage(`File too large: ${entry.entryName}`);
        }
        if (compressedSize > 0 && size / compressedSize > MAX_COMPRESSION_RATIO) {
            throw invalidPackage(`Suspicious compression ratio in ${entry.entryName}`);
        }
    }
}

function readManifest(zip: AdmZip): Manifest {
    const entry = zip.getEntry('manifest.json');
    if (!entry) {
        throw invalidPackage('Package missing manifest.json');
    }

    let raw: unknown;
    try {
        raw = JSON.parse(entry.getData().toString('utf-8'));
    } catch (error) {
        throw invalidPackage('Invalid manifest.json', errorMessage(error));
    }

    const parsed = manifestSchema.safeParse(raw);
    if (!parsed.success) {
        const reason = parsed.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
        throw invalidPackage('Invalid manifest', reason);
    }
    return parsed.data;
}

function openPackage(inputPath: string): AdmZip {
    if (!fs.existsSync(inputPath)) {
        throw new ResearchError('FILE_NOT_FOUND', `Package not found: ${inputPath}`, 'Check the --input path');
    }
    try {
        return new AdmZip(inputPath);
    } catch (error) {
        throw new ResearchError('INVALID_ZIP', 'File is not a valid ZIP archive', errorMessage(error));
    }
}

/**
 * Import papers from a collection package into the store. Papers already
 * in the index are skipped unless `overwrite` is set.
 */
export function importCollection(store: PaperStore, inputPath: string, overwrite = false): ImportResult {
    const zip = openPackage(inputPath);
    const entries = zip.getEntries();

    checkPackageEntries(entries);
    const manifest = readManifest(zip);
    logger.info({ createdBy: manifest.created_by, papers: manifest.paper_count }, 'Importing collection package');

    const index = store.loadIndex();
    const importedIds: string[] = [];
    let skippedCount = 0;
    let annotationCount = 0;

    const metadataEntries = entries.filter(
        (entry) => entry.entryName.startsWith('papers/') && entry.entryName.endsWith('/metadata.json')
    );

    for (const metadataEntry of metadataEntries) {
        const parts = metadataEntry.entryName.split('/');
        const paperId = parts[1];
        if (parts.length !== 3 || paperId === undefined) continue;

        if (!isValidArxivId(paperId)) {
            logger.warn({ paperId }, 'Skipping paper with invalid ID');
            continue;
        }

        if (index.papers[paperId] && !overwrite) {
            logger.info({ paperId }, 'Skipping existing paper');
            skippedCount++;
            continue;
        }

        let record: PaperRecord;
        try {
            const parsed = paperRecordSchema.safeParse(JSON.parse(metadataEntry.getData().toString('utf-8')));
            if (!parsed.success) {
                logger.warn({ paperId }, 'Malformed metadata in package');
                continue;
            }
            record = {
                ...parsed.data,
                id: paperId,
                imported_at: nowIso(),
                imported_from: manifest.created_by,
            };
            store.savePaper(record);
        } catch (error) {
            logger.warn({ paperId, error: errorMessage(error) }, 'Failed to import metadata');
            continue;
        }

        const prefix = `papers/${paperId}/`;
        const summaryEntry = zip.getEntry(`${prefix}summary.md`);
        if (summaryEntry) {
            try {
                atomicWriteText(store.summaryPath(paperId), summaryEntry.getData().toString('utf-8'));
            } catch (error) {
                logger.warn({ paperId, error: errorMessage(error) }, 'Failed to import summary');
            }
        }

        const annotationEntries = entries.filter(
            (entry) => entry.entryName.startsWith(`${prefix}annotations/`) && entry.entryName.endsWith('.json')
        );
        if (annotationEntries.length > 0) {
            const annotationsDir = store.annotationsDir(paperId);
            fs.mkdirSync(annotationsDir, { recursive: true });
            for (const entry of annotationEntries) {
                const name = path.posix.basename(entry.entryName);
                try {
                    atomicWriteText(path.join(annotationsDir, name), entry.getData().toString('utf-8'));
                    annotationCount++;
                } catch (error) {
                    logger.warn({ paperId, name, error: errorMessage(error) }, 'Failed to import annotation');
                }
            }
        }

        index.papers[paperId] = {
            title: record.title,
            authors: record.authors,
            abstract: record.abstract.slice(0, INDEX_ABSTRACT_LENGTH),
            topics: record.topics,
            collected_at: record.collected_at,
            has_summary: record.has_summary,
            ...(record.imported_at ? { imported_at: record.imported_at } : {}),
        };
        importedIds.push(paperId);
        logger.info({ paperId }, 'Imported paper');
    }

    store.saveIndex(index);

    return {
        message: `Imported ${importedIds.length} papers (${skippedCount} skipped).`,
        imported_count: importedIds.length,
        skipped_count: skippedCount,
        annotation_count: annotationCount,
        imported_ids: importedIds,
    };
}
