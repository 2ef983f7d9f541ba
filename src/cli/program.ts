import fs from 'node:fs';
import path from 'node:path';
import { Command } from 'commander';
import { z } from 'zod';
import { ANNOTATION_FORMATS, ANNOTATION_TYPES, type FetchResult, type ResearcherConfig } from '../types/index.js';
import { resolveConfig, type CliConfig } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { getHttpClient } from '../utils/http-client.js';
import { ResearchError, errorMessage, invalidPaperId } from '../utils/errors.js';
import { PaperStore } from '../storage/store.js';
import { atomicWriteJson } from '../storage/atomic.js';
import { isValidArxivId } from '../storage/ids.js';
import { ArxivAdapter } from '../sources/arxiv.js';
import { SemanticScholarAdapter } from '../sources/semantic-scholar.js';
import { collectPapers, readFetchResult } from '../collector/collect.js';
import { searchPapers } from '../search/search-engine.js';
import { fetchCitations } from '../citations/fetch-citations.js';
import { buildGraph } from '../graph/citation-graph.js';
import { saveBlogPost, updateSummaryStatus } from '../status/status-updates.js';
import { loadAnnotations, saveAnnotation } from '../annotations/annotations.js';
import { formatAnnotations } from '../annotations/format.js';
import { EXPORT_FORMATS, exportPapers, type ExportSelection } from '../exporters/export.js';
import { generateDigest } from '../digest/digest.js';
import { shareCollection } from '../share/share.js';
import { importCollection } from '../share/import.js';
import { printSuccess, runCommand } from './output.js';

const VERSION = '1.0.0';

interface CommandContext {
    config: ResearcherConfig;
    store: PaperStore;
}

// ─── Option Parsing ───────────────────────────────────────

const count = z.coerce.number().int().positive();

const globalOptionsSchema = z.object({
    dataDir: z.string().min(1).optional(),
    logLevel: z.enum(['error', 'warn', 'info', 'debug']).optional(),
    jsonLogs: z.boolean().optional(),
});

/**
 * Validate commander's option values, reporting problems as INVALID_ARGUMENT.
 */
function parseOptions<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, values: unknown): T {
    const parsed = schema.safeParse(values);
    if (!parsed.success) {
        const details = parsed.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
        throw new ResearchError('INVALID_ARGUMENT', 'Invalid command options', details);
    }
    return parsed.data;
}

/**
 * Resolve configuration for a command and configure logging and HTTP.
 */
async function createContext(command: Command): Promise<CommandContext> {
    const globals = parseOptions(globalOptionsSchema, command.optsWithGlobals());

    const cliFlags: CliConfig = {};
    if (globals.dataDir) cliFlags.dataDir = globals.dataDir;
    if (globals.logLevel) cliFlags.logLevel = globals.logLevel;
    if (globals.jsonLogs) cliFlags.jsonLogs = true;

    const config = await resolveConfig(cliFlags);
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    getHttpClient({ timeout: config.http.timeoutMs });

    getLogger().debug({ dataDir: config.dataDir }, 'Resolved configuration');
    return { config, store: new PaperStore(config.dataDir) };
}

function exactlyOne(flags: Record<string, boolean>): void {
    const given = Object.values(flags).filter(Boolean).length;
    if (given !== 1) {
        const names = Object.keys(flags).join(', ');
        throw new ResearchError('INVALID_ARGUMENT', `Specify exactly one of: ${names}`);
    }
}

function collectValues(value: string, previous: string[]): string[] {
    return [...previous, value];
}

// ─── Command Registration ────────────────────────────────

function registerCollectorCommands(program: Command): void {
    const fetchOptions = z.object({
        query: z.string().min(1),
        days: count.optional(),
        max: count.optional(),
        output: z.string().optional(),
    });

    program
        .command('fetch')
        .description('Fetch recent papers on a topic from arXiv')
        .requiredOption('-q, --query <topic>', 'Search topic')
        .option('--days <n>', 'Look-back window in days')
        .option('--max <n>', 'Maximum results (at most 50)')
        .option('-o, --output <path>', 'Write results to a file instead of stdout')
        .action(async (_options: unknown, command: Command) => {
            await runCommand(async () => {
                const { config } = await createContext(command);
                const opts = parseOptions(fetchOptions, command.opts());
                const days = opts.days ?? config.arxiv.days;

                const papers = await new ArxivAdapter().searchRecent(opts.query, days, opts.max ?? config.arxiv.maxResults);
                const result: FetchResult = { success: true, count: papers.length, query: opts.query, days, papers };

                if (opts.output) {
                    fs.mkdirSync(path.dirname(path.resolve(opts.output)), { recursive: true });
                    atomicWriteJson(opts.output, result);
                    getLogger().info({ path: opts.output }, 'Wrote fetch results');
                } else {
                    printSuccess(result);
                }
            });
        });

    program
        .command('collect')
        .description('Store fetched papers and add them to the index')
        .requiredOption('-i, --input <path>', 'Output file of the fetch command')
        .action(async (_options: unknown, command: Command) => {
            await runCommand(async () => {
                const { store } = await createContext(command);
                const opts = parseOptions(z.object({ input: z.string().min(1) }), command.opts());
                const summary = collectPapers(store, readFetchResult(opts.input));
                printSuccess(summary);
                if (!summary.success) process.exitCode = 1;
            });
        });

    program
        .command('search')
        .description('Rank collected papers against a keyword query')
        .requiredOption('-q, --query <query>', 'Search query')
        .option('-l, --limit <n>', 'Maximum results')
        .action(async (_options: unknown, command: Command) => {
            await runCommand(async () => {
                const { config, store } = await createContext(command);
                const opts = parseOptions(z.object({ query: z.string(), limit: count.optional() }), command.opts());
                const { results, totalPapers } = searchPapers(store, opts.query, opts.limit ?? config.searchLimit);
                printSuccess({
                    query: opts.query,
                    total_papers: totalPapers,
                    match_count: results.length,
                    results,
                });
            });
        });
}

function registerCitationCommands(program: Command): void {
    program
        .command('fetch-citations')
        .description('Fetch citation data from Semantic Scholar')
        .option('--paper-id <id>', 'Single paper to fetch')
        .option('--all', 'Fetch for every paper in the collection')
        .action(async (_options: unknown, command: Command) => {
            await runCommand(async () => {
                const { store } = await createContext(command);
                const opts = parseOptions(
                    z.object({ paperId: z.string().optional(), all: z.boolean().optional() }),
                    command.opts()
                );
                exactlyOne({ '--paper-id': opts.paperId !== undefined, '--all': opts.all === true });

                const target = opts.paperId !== undefined ? { paperId: opts.paperId } : { all: true as const };
                const summary = await fetchCitations(store, new SemanticScholarAdapter(), target);
                printSuccess(summary);
                if (!summary.success) process.exitCode = 1;
            });
        });

    program
        .command('build-graph')
        .description('Build the in-collection citation graph')
        .option('--top <n>', 'Number of highly cited papers to report')
        .action(async (_options: unknown, command: Command) => {
            await runCommand(async () => {
                const { config, store } = await createContext(command);
                const opts = parseOptions(z.object({ top: count.optional() }), command.opts());
                printSuccess(buildGraph(store, opts.top ?? config.highlyCitedTop));
            });
        });
}

function readContentFile(file: string, missingCode: 'FILE_NOT_FOUND' | 'FILE_ERROR'): string {
    try {
        return fs.readFileSync(file, 'utf-8');
    } catch (error) {
        throw missingCode === 'FILE_NOT_FOUND'
            ? new ResearchError('FILE_NOT_FOUND', `Content file not found: ${file}`, 'Provide a valid file path with --content-file')
            : new ResearchError('FILE_ERROR', 'Failed to read content file', errorMessage(error));
    }
}

const contentOptions = {
    content: z.string().optional(),
    contentFile: z.string().optional(),
};

function registerWritingCommands(program: Command): void {
    program
        .command('summary-status')
        .description('Record that a summary was generated for a paper')
        .requiredOption('--paper-id <id>', 'Paper ID')
        .action(async (_options: unknown, command: Command) => {
            await runCommand(async () => {
                const { store } = await createContext(command);
                const opts = parseOptions(z.object({ paperId: z.string() }), command.opts());
                printSuccess(updateSummaryStatus(store, opts.paperId));
            });
        });

    program
        .command('save-blog-post')
        .description('Save a blog post for a summarized paper')
        .requiredOption('--paper-id <id>', 'Paper ID')
        .option('--content <text>', 'Blog post content')
        .option('--content-file <path>', 'Read blog post content from a file')
        .action(async (_options: unknown, command: Command) => {
            await runCommand(async () => {
                const { store } = await createContext(command);
                const opts = parseOptions(z.object({ paperId: z.string(), ...contentOptions }), command.opts());
                exactlyOne({ '--content': opts.content !== undefined, '--content-file': opts.contentFile !== undefined });

                if (!isValidArxivId(opts.paperId)) throw invalidPaperId(opts.paperId);
                const content = opts.contentFile !== undefined ? readContentFile(opts.contentFile, 'FILE_ERROR') : opts.content ?? '';
                printSuccess(saveBlogPost(store, opts.paperId, content));
            });
        });

    program
        .command('annotate')
        .description('Add an annotation to a paper')
        .requiredOption('--paper-id <id>', 'Paper ID')
        .option('--content <text>', 'Annotation text')
        .option('--content-file <path>', 'Read annotation text from a file')
        .option('--username <name>', 'Author name')
        .option('--type <type>', `Annotation type: ${ANNOTATION_TYPES.join(' | ')}`, 'note')
        .action(async (_options: unknown, command: Command) => {
            await runCommand(async () => {
                const { config, store } = await createContext(command);
                const opts = parseOptions(
                    z.object({
                        paperId: z.string(),
                        ...contentOptions,
                        username: z.string().optional(),
                        type: z.enum(ANNOTATION_TYPES),
                    }),
                    command.opts()
                );
                exactlyOne({ '--content': opts.content !== undefined, '--content-file': opts.contentFile !== undefined });

                if (!isValidArxivId(opts.paperId)) throw invalidPaperId(opts.paperId);
                const content =
                    opts.contentFile !== undefined ? readContentFile(opts.contentFile, 'FILE_NOT_FOUND') : opts.content ?? '';

                const annotation = saveAnnotation(store, {
                    paperId: opts.paperId,
                    content,
                    username: opts.username ?? config.username,
                    type: opts.type,
                });
                printSuccess({
                    message: `Saved annotation for paper ${opts.paperId}.`,
                    annotation_id: annotation.id,
                    paper_id: annotation.paper_id,
                    author: annotation.author,
                    type: annotation.type,
                });
            });
        });

    program
        .command('annotations')
        .description('List the annotations on a paper')
        .requiredOption('--paper-id <id>', 'Paper ID')
        .option('-f, --format <format>', `Output format: ${ANNOTATION_FORMATS.join(' | ')}`, 'text')
        .action(async (_options: unknown, command: Command) => {
            await runCommand(async () => {
                const { store } = await createContext(command);
                const opts = parseOptions(
                    z.object({ paperId: z.string(), format: z.enum(ANNOTATION_FORMATS) }),
                    command.opts()
                );

                if (!isValidArxivId(opts.paperId)) throw invalidPaperId(opts.paperId);
                if (!store.paperDirExists(opts.paperId)) {
                    throw new ResearchError(
                        'PAPER_NOT_FOUND',
                        `Paper ${opts.paperId} not found in collection`,
                        'Ensure the paper exists in your collection'
                    );
                }

                const annotations = loadAnnotations(store, opts.paperId);
                if (opts.format === 'json') {
                    printSuccess({
                        paper_id: opts.paperId,
                        count: annotations.length,
                        annotations,
                        ...(annotations.length === 0 ? { message: 'No annotations found for this paper.' } : {}),
                    });
                } else if (annotations.length === 0) {
                    console.log(`No annotations found for paper ${opts.paperId}.`);
                } else {
                    console.log(formatAnnotations(annotations, opts.paperId, opts.format));
                }
            });
        });
}

function registerOutputCommands(program: Command): void {
    program
        .command('export')
        .description('Export papers as Markdown, JSON, or CSV')
        .requiredOption('-f, --format <format>', `Export format: ${EXPORT_FORMATS.join(' | ')}`)
        .option('--paper-id <id>', 'Export a single paper')
        .option('--all', 'Export every paper')
        .option('-q, --query <query>', 'Export papers matching a query')
        .option('--since <timespan>', 'Only papers collected within a timespan such as 7d')
        .option('-o, --output <dir>', 'Output directory')
        .option('--include-summary', 'Include summary text')
        .action(async (_options: unknown, command: Command) => {
            await runCommand(async () => {
                const { store } = await createContext(command);
                const opts = parseOptions(
                    z.object({
                        format: z.enum(EXPORT_FORMATS),
                        paperId: z.string().optional(),
                        all: z.boolean().optional(),
                        query: z.string().optional(),
                        since: z.string().optional(),
                        output: z.string().optional(),
                        includeSummary: z.boolean().optional(),
                    }),
                    command.opts()
                );
                exactlyOne({
                    '--paper-id': opts.paperId !== undefined,
                    '--all': opts.all === true,
                    '--query': opts.query !== undefined,
                });

                let selection: ExportSelection;
                if (opts.paperId !== undefined) {
                    selection = { paperId: opts.paperId };
                } else if (opts.query !== undefined) {
                    selection = { query: opts.query };
                } else {
                    selection = { all: true };
                }

                printSuccess(
                    exportPapers(store, {
                        format: opts.format,
                        selection,
                        ...(opts.since !== undefined ? { since: opts.since } : {}),
                        ...(opts.output !== undefined ? { output: opts.output } : {}),
                        includeSummary: opts.includeSummary ?? false,
                    })
                );
            });
        });

    program
        .command('digest')
        .description('Build a Markdown digest of recently collected papers')
        .option('--since <timespan>', 'Timespan such as 7d, 2w, 24h', '7d')
        .option('-o, --output <path>', 'Output file')
        .action(async (_options: unknown, command: Command) => {
            await runCommand(async () => {
                const { store } = await createContext(command);
                const opts = parseOptions(z.object({ since: z.string(), output: z.string().optional() }), command.opts());
                printSuccess(
                    generateDigest(store, {
                        since: opts.since,
                        ...(opts.output !== undefined ? { output: opts.output } : {}),
                    })
                );
            });
        });
}

function registerCollaborationCommands(program: Command): void {
    program
        .command('share')
        .description('Package papers as a ZIP file for sharing')
        .requiredOption('-o, --output <path>', 'Output ZIP file')
        .option('--paper-id <id>', 'Paper to include (repeatable)', collectValues, [])
        .option('--include-summaries', 'Include summaries')
        .option('--include-annotations', 'Include annotations')
        .option('--username <name>', 'Creator name for the manifest')
        .option('--description <text>', 'Description of the collection')
        .action(async (_options: unknown, command: Command) => {
            await runCommand(async () => {
                const { config, store } = await createContext(command);
                const opts = parseOptions(
                    z.object({
                        output: z.string().min(1),
                        paperId: z.array(z.string()),
                        includeSummaries: z.boolean().optional(),
                        includeAnnotations: z.boolean().optional(),
                        username: z.string().optional(),
                        description: z.string().optional(),
                    }),
                    command.opts()
                );
                printSuccess(
                    shareCollection(store, {
                        output: opts.output,
                        paperIds: opts.paperId,
                        includeSummaries: opts.includeSummaries ?? false,
                        includeAnnotations: opts.includeAnnotations ?? false,
                        username: opts.username ?? config.username,
                        ...(opts.description !== undefined ? { description: opts.description } : {}),
                    })
                );
            });
        });

    program
        .command('import')
        .description('Import papers from a shared ZIP package')
        .requiredOption('-i, --input <path>', 'ZIP package to import')
        .option('--overwrite', 'Replace papers already in the collection')
        .action(async (_options: unknown, command: Command) => {
            await runCommand(async () => {
                const { store } = await createContext(command);
                const opts = parseOptions(
                    z.object({ input: z.string().min(1), overwrite: z.boolean().optional() }),
                    command.opts()
                );
                printSuccess(importCollection(store, opts.input, opts.overwrite ?? false));
            });
        });
}

/**
 * Build the command-line program. Global options may be given before or
 * after the command name.
 */
export function createProgram(): Command {
    const program = new Command();

    program
        .name('paper-researcher')
        .description('Collect, search, annotate, and share arXiv papers in a local collection.')
        .version(VERSION)
        .option('-d, --data-dir <dir>', 'Data directory (default: ./data)')
        .option('--log-level <level>', 'Log level: debug | info | warn | error')
        .option('--json-logs', 'Output JSON logs');

    registerCollectorCommands(program);
    registerCitationCommands(program);
    registerWritingCommands(program);
    registerOutputCommands(program);
    registerCollaborationCommands(program);

    return program;
}
