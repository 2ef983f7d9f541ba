import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { createProgram } from '../cli/program.js';
import { runCommand, toErrorBody } from '../cli/output.js';
import { ResearchError } from '../utils/errors.js';
import type { PaperStore } from '../storage/store.js';
import { makeRecord, makeTempStore, removeStore, seedStore } from './helpers.js';

describe('toErrorBody', () => {
    it('should keep the fields of a ResearchError', () => {
        expect(toErrorBody(new ResearchError('INVALID_QUERY', 'Query cannot be empty'))).toEqual({
            code: 'INVALID_QUERY',
            message: 'Query cannot be empty',
            details: null,
        });
    });

    it('should report system errors as file errors', () => {
        const error = Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
        expect(toErrorBody(error)).toEqual({
            code: 'FILE_ERROR',
            message: 'File operation failed',
            details: 'EACCES: permission denied',
        });
    });

    it('should report anything else as unknown', () => {
        expect(toErrorBody('boom')).toEqual({
            code: 'UNKNOWN_ERROR',
            message: 'An unexpected error occurred',
            details: 'boom',
        });
    });
});

describe('command line', () => {
    let store: PaperStore;
    let log: MockInstance<typeof console.log>;
    let error: MockInstance<typeof console.error>;

    beforeEach(() => {
        store = makeTempStore();
        log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
        process.exitCode = undefined;
        removeStore(store);
    });

    async function run(...args: string[]): Promise<void> {
        await createProgram().parseAsync(['node', 'paper-researcher', ...args, '--data-dir', store.dataDir]);
    }

    function printed(spy: MockInstance<typeof console.log>): unknown {
        return JSON.parse(String(spy.mock.calls[0]?.[0]));
    }

    it('should print search results', async () => {
        seedStore(store, [
            makeRecord('2401.00001', { title: 'Attention mechanisms', abstract: 'A survey.' }),
            makeRecord('2401.00002', { title: 'Protein folding', abstract: 'Unrelated.' }),
        ]);

        await run('search', '-q', 'attention');

        expect(printed(log)).toEqual({
            success: true,
            query: 'attention',
            total_papers: 2,
            match_count: 1,
            results: [
                { id: '2401.00001', title: 'Attention mechanisms', authors: ['Ada Example'], score: 3, excerpt: 'A survey.' },
            ],
        });
        expect(process.exitCode).toBeUndefined();
    });

    it('should collect a fetch output file', async () => {
        const input = path.join(store.dataDir, 'fetch.json');
        fs.writeFileSync(
            input,
            JSON.stringify({
                success: true,
                query: 'attention',
                papers: [{ id: '2401.00001', title: 'T', authors: [], abstract: 'A', categories: [] }],
            })
        );

        await run('collect', '-i', input);

        expect(printed(log)).toEqual({ success: true, saved: 1, duplicates: 0, total: 1, errors: [] });
        expect(process.exitCode).toBeUndefined();
    });

    it('should annotate a paper and list its annotations as JSON', async () => {
        seedStore(store, [makeRecord('2401.00001')]);

        await run('annotate', '--paper-id', '2401.00001', '--content', 'Check table 2', '--username', 'ada', '--type', 'question');

        expect(printed(log)).toMatchObject({
            success: true,
            message: 'Saved annotation for paper 2401.00001.',
            paper_id: '2401.00001',
            author: 'ada',
            type: 'question',
        });

        log.mockClear();
        await run('annotations', '--paper-id', '2401.00001', '-f', 'json');

        expect(printed(log)).toMatchObject({
            success: true,
            paper_id: '2401.00001',
            count: 1,
            annotations: [{ content: 'Check table 2', type: 'question' }],
        });
    });

    it('should say when a paper has no annotations', async () => {
        seedStore(store, [makeRecord('2401.00001')]);

        await run('annotations', '--paper-id', '2401.00001');

        expect(log).toHaveBeenCalledWith('No annotations found for paper 2401.00001.');
    });

    it('should print failures to stderr and set the exit code', async () => {
        await run('summary-status', '--paper-id', 'not-an-id');

        expect(log).not.toHaveBeenCalled();
        expect(printed(error)).toEqual({
            success: false,
            error: {
                code: 'INVALID_PAPER_ID',
                message: 'Invalid arXiv ID format: not-an-id',
                details: 'arXiv ID must be in format YYMM.NNNNN (e.g., 2401.12345)',
            },
        });
        expect(process.exitCode).toBe(1);
    });

    it('should require exactly one export selection', async () => {
        seedStore(store, [makeRecord('2401.00001')]);

        await run('export', '-f', 'csv', '--all', '-q', 'attention');

        expect(printed(error)).toMatchObject({
            error: { code: 'INVALID_ARGUMENT', message: 'Specify exactly one of: --paper-id, --all, --query' },
        });
    });

    it('should reject an unknown export format', async () => {
        await run('export', '-f', 'xml', '--all');
        expect(printed(error)).toMatchObject({ error: { code: 'INVALID_ARGUMENT', message: 'Invalid command options' } });
    });
});

describe('runCommand', () => {
    afterEach(() => {
        vi.restoreAllMocks();
        process.exitCode = undefined;
    });

    it('should leave the exit code alone on success', async () => {
        await runCommand(() => undefined);
        expect(process.exitCode).toBeUndefined();
    });

    it('should report a rejected action', async () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

        await runCommand(async () => {
            throw new ResearchError('NO_SUMMARY', 'Paper 2401.00001 has no summary');
        });

        expect(error).toHaveBeenCalledTimes(1);
        expect(process.exitCode).toBe(1);
    });
});
