import pino from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 * Uses pino for structured logging with a human-readable default.
 * Logs always go to stderr; stdout is reserved for command results.
 *
 * Modules take their logger at import time, before the CLI has read its
 * flags, so `initLogger()` reconfigures the one root logger in place.
 */
let loggerInstance: pino.Logger | null = null;

const STDERR_FD = 2;

let jsonOutput = false;
let sink: pino.DestinationStream | null = null;

function createSink(jsonLogs: boolean): pino.DestinationStream {
    if (jsonLogs) {
        return pino.destination(STDERR_FD);
    }
    return pino.transport({
        target: 'pino-pretty',
        options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname',
            destination: STDERR_FD,
        },
    });
}

/** Output stream opened on the first log line */
const output: pino.DestinationStream = {
    write(msg: string): void {
        sink ??= createSink(jsonOutput);
        sink.write(msg);
    },
};

/**
 * Initialize the logger with the specified options.
 * Should be called once at CLI startup.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    if (jsonLogs !== jsonOutput) {
        jsonOutput = jsonLogs;
        sink = null;
    }

    const logger = getLogger();
    logger.level = level;
    return logger;
}

/**
 * Get the logger instance.
 * If not initialized, creates a default logger at `LOG_LEVEL` or info.
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = pino({ level: envLogLevel() ?? 'info' }, output);
    }
    return loggerInstance;
}

function envLogLevel(): LogLevel | undefined {
    const value = process.env['LOG_LEVEL'];
    switch (value) {
        case 'error':
        case 'warn':
        case 'info':
        case 'debug':
            return value;
        default:
            return undefined;
    }
}
