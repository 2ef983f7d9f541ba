import { ResearchError, errorMessage, systemErrorCode, type ErrorCode } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export interface ErrorBody {
    code: ErrorCode;
    message: string;
    details: string | null;
}

/**
 * Map any thrown value to the error body a command reports.
 */
export function toErrorBody(error: unknown): ErrorBody {
    if (error instanceof ResearchError) {
        return { code: error.code, message: error.message, details: error.details };
    }
    if (systemErrorCode(error)) {
        return { code: 'FILE_ERROR', message: 'File operation failed', details: errorMessage(error) };
    }
    return { code: 'UNKNOWN_ERROR', message: 'An unexpected error occurred', details: errorMessage(error) };
}

/**
 * Print a success document to stdout.
 */
export function printSuccess(payload: object): void {
    console.log(JSON.stringify({ success: true, ...payload }, null, 2));
}

/**
 * Print a failure document to stderr and mark the process as failed.
 */
export function printError(body: ErrorBody): void {
    console.error(JSON.stringify({ success: false, error: body }, null, 2));
    process.exitCode = 1;
}

/**
 * Run a command action, reporting any failure as a JSON error document.
 */
export async function runCommand(action: () => Promise<void> | void): Promise<void> {
    try {
        await action();
    } catch (error) {
        const body = toErrorBody(error);
        getLogger().debug({ code: body.code, error: errorMessage(error) }, 'Command failed');
        printError(body);
    }
}
