import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type ResearcherConfig } from '../types/index.js';
import { getLogger } from './logger.js';

const logLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

/**
 * Shape accepted in paper-researcher.config.json. Every key is optional.
 */
const fileConfigSchema = z.object({
    dataDir: z.string().min(1).optional(),
    logLevel: logLevelSchema.optional(),
    jsonLogs: z.boolean().optional(),
    username: z.string().min(1).optional(),
    searchLimit: z.number().int().positive().optional(),
    highlyCitedTop: z.number().int().positive().optional(),
    arxiv: z
        .object({
            maxResults: z.number().int().positive().max(50).optional(),
            days: z.number().int().positive().optional(),
        })
        .optional(),
    http: z
        .object({
            timeoutMs: z.number().int().positive().optional(),
        })
        .optional(),
});

type FileConfig = z.infer<typeof fileConfigSchema>;

/**
 * CLI-level overrides. Nested groups are not exposed as flags.
 * Callers leave a key out rather than setting it to undefined.
 */
export type CliConfig = Partial<Omit<ResearcherConfig, 'arxiv' | 'http'>>;

/**
 * Load configuration from paper-researcher.config.json using cosmiconfig.
 * Returns null if no config file is found (defaults are used).
 */
async function loadConfigFile(searchFrom?: string): Promise<FileConfig | null> {
    const explorer = cosmiconfig('paper-researcher', {
        searchPlaces: ['paper-researcher.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            const parsed = fileConfigSchema.safeParse(result.config);
            if (!parsed.success) {
                getLogger().warn(
                    { path: result.filepath, issues: parsed.error.issues.map((i) => i.message) },
                    'Invalid config file, using defaults'
                );
                return null;
            }
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return parsed.data;
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(): CliConfig {
    const env: CliConfig = {};

    const dataDir = process.env['PAPER_RESEARCHER_DATA_DIR'];
    if (dataDir) env.dataDir = dataDir;

    const logLevel = logLevelSchema.safeParse(process.env['LOG_LEVEL']);
    if (logLevel.success) env.logLevel = logLevel.data;

    const username = process.env['PAPER_RESEARCHER_USERNAME'];
    if (username) env.username = username;

    return env;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 *
 * The login name (`USER`) only replaces the default username.
 */
export async function resolveConfig(
    cliFlags: CliConfig,
    options: { searchFrom?: string } = {}
): Promise<ResearcherConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars();
    const loginName = process.env['USER'];

    const merged: ResearcherConfig = {
        ...DEFAULT_CONFIG,
        ...(loginName ? { username: loginName } : {}),
        ...fileConfig,
        ...envConfig,
        ...cliFlags,
        // Deep merge nested objects
        arxiv: {
            ...DEFAULT_CONFIG.arxiv,
            ...fileConfig?.arxiv,
        },
        http: {
            ...DEFAULT_CONFIG.http,
            ...fileConfig?.http,
        },
    };

    return merged;
}

/**
 * Get API key from environment variable.
 * @param name - Environment variable name
 * @returns The API key or undefined
 */
export function getApiKey(name: string): string | undefined {
    return process.env[name];
}
