/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * arXiv fetch defaults.
 */
export interface ArxivConfig {
    /** Upper bound on results per query (the API caps this at 50) */
    maxResults: number;

    /** Default look-back window in days */
    days: number;
}

export interface HttpConfig {
    timeoutMs: number;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface ResearcherConfig {
    dataDir: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    /** Default author name for annotations and share manifests */
    username: string;

    searchLimit: number;
    highlyCitedTop: number;

    arxiv: ArxivConfig;
    http: HttpConfig;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: ResearcherConfig = {
    dataDir: './data',
    logLevel: 'info',
    jsonLogs: false,
    username: 'anonymous',
    searchLimit: 10,
    highlyCitedTop: 10,
    arxiv: {
        maxResults: 50,
        days: 7,
    },
    http: {
        timeoutMs: 30000,
    },
};
